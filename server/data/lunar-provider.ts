import * as Astronomy from "astronomy-engine";

export type MoonPhaseName =
  | "New Moon"
  | "Waxing Crescent"
  | "First Quarter"
  | "Waxing Gibbous"
  | "Full Moon"
  | "Waning Gibbous"
  | "Last Quarter"
  | "Waning Crescent";

export type MoonPhase = {
  /** Position in the synodic cycle, 0 = new, 0.5 = full. */
  phase: number;
  illumination: number;
  phaseName: MoonPhaseName;
  nextNew: Date | null;
  nextFull: Date | null;
  daysToNew: number | null;
  daysToFull: number | null;
  moonrise: Date | null;
  moonset: Date | null;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export const moonPhaseName = (phase: number): MoonPhaseName => {
  if (phase < 0.03) return "New Moon";
  if (phase < 0.22) return "Waxing Crescent";
  if (phase < 0.28) return "First Quarter";
  if (phase < 0.47) return "Waxing Gibbous";
  if (phase < 0.53) return "Full Moon";
  if (phase < 0.72) return "Waning Gibbous";
  if (phase < 0.78) return "Last Quarter";
  if (phase < 0.97) return "Waning Crescent";
  return "New Moon";
};

const daysUntil = (from: Date, to: Date | null): number | null =>
  to ? Math.max(0, Math.ceil((to.getTime() - from.getTime()) / DAY_MS)) : null;

export class LunarProvider {
  private readonly observer: Astronomy.Observer;

  constructor(latitude: number, longitude: number) {
    this.observer = new Astronomy.Observer(latitude, longitude, 0);
  }

  getMoonPhase(at: Date = new Date()): MoonPhase {
    const phase = Astronomy.MoonPhase(at) / 360;
    const illumination = Astronomy.Illumination(Astronomy.Body.Moon, at).phase_fraction * 100;
    const nextNew = Astronomy.SearchMoonPhase(0, at, 40)?.date ?? null;
    const nextFull = Astronomy.SearchMoonPhase(180, at, 40)?.date ?? null;
    const dayStart = new Date(at.getTime() - (at.getTime() % DAY_MS));
    const moonrise = Astronomy.SearchRiseSet(Astronomy.Body.Moon, this.observer, +1, dayStart, 1)?.date ?? null;
    const moonset = Astronomy.SearchRiseSet(Astronomy.Body.Moon, this.observer, -1, dayStart, 1)?.date ?? null;

    return {
      phase,
      illumination,
      phaseName: moonPhaseName(phase),
      nextNew,
      nextFull,
      daysToNew: daysUntil(at, nextNew),
      daysToFull: daysUntil(at, nextFull),
      moonrise,
      moonset,
    };
  }
}
