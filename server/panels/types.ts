import type { PanelId } from "@shared/clock-config";
import type { DataProviders } from "../data/providers";
import type { Frame } from "../render/frame";
import type { Palette } from "../render/theme";

export type PanelContext = {
  frame: Frame;
  palette: Palette;
  now: Date;
  timezone: string;
  /** Drawable height above the navigation bar. */
  contentHeight: number;
  data: DataProviders;
};

export type PanelDefinition = {
  id: PanelId;
  title: string;
  refreshSeconds: number;
};

export const PANEL_DEFINITIONS: Record<PanelId, PanelDefinition> = {
  clock: { id: "clock", title: "Clock", refreshSeconds: 1 },
  weather: { id: "weather", title: "Weather", refreshSeconds: 60 },
  airquality: { id: "airquality", title: "Air Quality", refreshSeconds: 300 },
  sunpath: { id: "sunpath", title: "Sun Path", refreshSeconds: 30 },
  daylength: { id: "daylength", title: "Day Length", refreshSeconds: 3600 },
  solar: { id: "solar", title: "Solar Details", refreshSeconds: 30 },
  moon: { id: "moon", title: "Moon Phase", refreshSeconds: 3600 },
  analemma: { id: "analemma", title: "Analemma", refreshSeconds: 3600 },
  analogclock: { id: "analogclock", title: "Analog Clock", refreshSeconds: 1 },
};

export const refreshIntervalMs = (panel: PanelId): number => PANEL_DEFINITIONS[panel].refreshSeconds * 1000;
