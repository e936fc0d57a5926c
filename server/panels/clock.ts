import type { Rgb } from "../render/frame";
import { drawCenteredSegmentText } from "../render/segments";
import type { PanelContext } from "./types";
import { zonedTime } from "../utils/zoned-time";

const DARK_BLUE: Rgb = [25, 25, 112];
const ORANGE: Rgb = [255, 140, 0];
const LIGHT_BLUE: Rgb = [135, 206, 235];
const PURPLE: Rgb = [147, 112, 219];

export const headerColorForHour = (hour: number): Rgb => {
  if (hour < 6) return DARK_BLUE;
  if (hour < 8) return ORANGE;
  if (hour < 17) return LIGHT_BLUE;
  if (hour < 20) return ORANGE;
  return PURPLE;
};

const pad2 = (value: number): string => String(value).padStart(2, "0");

export const renderClockPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const { hours, minutes, seconds } = zonedTime(ctx.now, ctx.timezone);

  frame.fillRect({ x: 0, y: 0, width: frame.width, height: 8 }, headerColorForHour(hours));

  const digitHeight = Math.max(20, Math.floor(contentHeight * 0.45));
  const top = Math.floor((contentHeight - digitHeight) / 2) - 10;
  drawCenteredSegmentText(frame, `${pad2(hours)}:${pad2(minutes)}`, frame.width / 2, top, digitHeight, palette.foreground);

  const barWidth = Math.floor(frame.width * 0.7);
  const barX = Math.floor((frame.width - barWidth) / 2);
  const barY = top + digitHeight + 20;
  frame.fillRect({ x: barX, y: barY, width: barWidth, height: 6 }, palette.dim);
  frame.fillRect({ x: barX, y: barY, width: Math.round((barWidth * seconds) / 59), height: 6 }, palette.accent);
};
