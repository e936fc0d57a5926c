import type { ThemeMode } from "@shared/clock-config";
import { zonedTime } from "../utils/zoned-time";
import type { Rgb } from "./frame";

export type ActiveTheme = "day" | "night";

export type Palette = {
  background: Rgb;
  foreground: Rgb;
  accent: Rgb;
  dim: Rgb;
  warning: Rgb;
  navButton: Rgb;
  navOutline: Rgb;
};

export const DAY_PALETTE: Palette = {
  background: [0, 0, 0],
  foreground: [255, 255, 255],
  accent: [255, 220, 50],
  dim: [128, 128, 128],
  warning: [255, 80, 80],
  navButton: [60, 60, 60],
  navOutline: [128, 128, 128],
};

// Red-shifted so the panel does not light up a dark room.
export const NIGHT_PALETTE: Palette = {
  background: [0, 0, 0],
  foreground: [200, 60, 40],
  accent: [160, 40, 20],
  dim: [80, 24, 16],
  warning: [220, 40, 20],
  navButton: [30, 10, 8],
  navOutline: [80, 24, 16],
};

export const paletteFor = (theme: ActiveTheme): Palette => (theme === "night" ? NIGHT_PALETTE : DAY_PALETTE);

export type SunWindow = {
  sunrise: Date | null;
  sunset: Date | null;
};

export type ThemeStatus = {
  mode: ThemeMode;
  active: ActiveTheme;
};

const FALLBACK_DAY_START_HOUR = 6;
const FALLBACK_NIGHT_START_HOUR = 18;

/** Holds the operator-selected theme mode and resolves it against daylight. */
export class ThemeController {
  private mode: ThemeMode;
  private readonly timezone: string;

  /** `timezone` places the fixed-hour fallback used when sun times are unknown. */
  constructor(initialMode: ThemeMode = "auto", timezone = "UTC") {
    this.mode = initialMode;
    this.timezone = timezone;
  }

  getMode(): ThemeMode {
    return this.mode;
  }

  setMode(mode: ThemeMode): void {
    this.mode = mode;
  }

  resolve(now: Date, sun: SunWindow | null): ActiveTheme {
    if (this.mode !== "auto") return this.mode;
    if (sun?.sunrise && sun.sunset) {
      const t = now.getTime();
      return t >= sun.sunrise.getTime() && t < sun.sunset.getTime() ? "day" : "night";
    }
    const hour = zonedTime(now, this.timezone).hours;
    return hour >= FALLBACK_DAY_START_HOUR && hour < FALLBACK_NIGHT_START_HOUR ? "day" : "night";
  }

  status(now: Date, sun: SunWindow | null): ThemeStatus {
    return { mode: this.mode, active: this.resolve(now, sun) };
  }
}
