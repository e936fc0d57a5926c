import { cachedValue } from "../data/timed-cache";
import { drawCenteredSegmentText } from "../render/segments";
import type { PanelContext } from "./types";
import { formatDuration } from "../utils/zoned-time";

const MINUTES_PER_DAY = 24 * 60;

export const renderDayLengthPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const solar = cachedValue(await ctx.data.sunTimes.get());
  const dayLength = solar?.times.dayLengthMinutes ?? null;
  const digitHeight = Math.floor(contentHeight * 0.3);

  drawCenteredSegmentText(frame, formatDuration(dayLength), frame.width / 2, 30, digitHeight, palette.foreground);

  const barX = 20;
  const barWidth = frame.width - 40;
  const barY = 50 + digitHeight;
  frame.fillRect({ x: barX, y: barY, width: barWidth, height: 12 }, palette.dim);
  if (dayLength !== null) {
    frame.fillRect({ x: barX, y: barY, width: Math.round((barWidth * dayLength) / MINUTES_PER_DAY), height: 12 }, palette.accent);
  }

  const change = solar?.dayLengthChangeMinutes ?? null;
  if (change !== null) {
    const label = `${change < 0 ? "-" : ""}${Math.abs(change).toFixed(1)}`;
    drawCenteredSegmentText(frame, label, frame.width / 2, barY + 30, Math.floor(digitHeight / 2), change < 0 ? palette.warning : palette.accent);
  }
};
