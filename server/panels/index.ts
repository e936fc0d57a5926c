import type { PanelId } from "@shared/clock-config";
import type { DataProviders } from "../data/providers";
import { Frame } from "../render/frame";
import { drawNavBar } from "../render/nav-bar";
import { drawCenteredSegmentText } from "../render/segments";
import type { Palette } from "../render/theme";
import { renderAirQualityPanel } from "./air-quality";
import { renderAnalemmaPanel } from "./analemma";
import { renderAnalogClockPanel } from "./analog-clock";
import { renderClockPanel } from "./clock";
import { renderDayLengthPanel } from "./day-length";
import { renderMoonPanel } from "./moon";
import { renderSolarPanel } from "./solar";
import { renderSunPathPanel } from "./sun-path";
import type { PanelContext } from "./types";
import { renderWeatherPanel } from "./weather";

export { PANEL_DEFINITIONS, refreshIntervalMs } from "./types";
export type { PanelContext, PanelDefinition } from "./types";

const assertNever = (value: never): never => {
  throw new Error(`unhandled panel: ${String(value)}`);
};

export const renderPanel = (id: PanelId, ctx: PanelContext): Promise<void> => {
  switch (id) {
    case "clock":
      return renderClockPanel(ctx);
    case "weather":
      return renderWeatherPanel(ctx);
    case "airquality":
      return renderAirQualityPanel(ctx);
    case "sunpath":
      return renderSunPathPanel(ctx);
    case "daylength":
      return renderDayLengthPanel(ctx);
    case "solar":
      return renderSolarPanel(ctx);
    case "moon":
      return renderMoonPanel(ctx);
    case "analemma":
      return renderAnalemmaPanel(ctx);
    case "analogclock":
      return renderAnalogClockPanel(ctx);
    default:
      return assertNever(id);
  }
};

export type FrameRequest = {
  panel: PanelId;
  index: number;
  count: number;
  width: number;
  height: number;
  navBarHeight: number;
  palette: Palette;
  now: Date;
  timezone: string;
  data: DataProviders;
};

/** Renders one panel plus the navigation bar into a fresh frame. */
export const composePanelFrame = async (request: FrameRequest): Promise<Frame> => {
  const frame = new Frame(request.width, request.height, request.palette.background);
  await renderPanel(request.panel, {
    frame,
    palette: request.palette,
    now: request.now,
    timezone: request.timezone,
    contentHeight: request.height - request.navBarHeight,
    data: request.data,
  });
  drawNavBar(frame, request.navBarHeight, request.index, request.count, request.palette);
  return frame;
};

/** Frame shown in place of a panel whose render failed; navigation stays usable. */
export const composeErrorFrame = (request: FrameRequest): Frame => {
  const frame = new Frame(request.width, request.height, request.palette.background);
  const contentHeight = request.height - request.navBarHeight;
  frame.strokeRect({ x: 4, y: 4, width: request.width - 8, height: Math.max(1, contentHeight - 8) }, request.palette.warning);
  drawCenteredSegmentText(
    frame,
    "---",
    request.width / 2,
    Math.floor(contentHeight / 3),
    Math.max(12, Math.floor(contentHeight / 3)),
    request.palette.warning,
  );
  drawNavBar(frame, request.navBarHeight, request.index, request.count, request.palette);
  return frame;
};
