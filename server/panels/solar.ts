import { cachedValue } from "../data/timed-cache";
import { drawCenteredSegmentText } from "../render/segments";
import type { PanelContext } from "./types";
import { formatHoursMinutes } from "../utils/zoned-time";

export const renderSolarPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const [timesRead, positionRead] = await Promise.all([ctx.data.sunTimes.get(), ctx.data.sunPosition.get()]);
  const solar = cachedValue(timesRead);
  const position = cachedValue(positionRead);

  const horizonY = Math.floor(contentHeight * 0.6);
  const arcRadius = Math.min(frame.width / 2 - 20, horizonY - 10);
  const cx = frame.width / 2;
  frame.drawLine(10, horizonY, frame.width - 10, horizonY, palette.dim);
  for (let i = 0; i <= 64; i += 1) {
    const angle = Math.PI - (i / 64) * Math.PI;
    frame.setPixel(cx + Math.cos(angle) * arcRadius, horizonY - Math.sin(angle) * arcRadius, palette.dim);
  }

  if (position) {
    // Azimuth 90° (east) maps to the left end of the arc and 270° to the right.
    const t = Math.min(1, Math.max(0, (position.azimuth - 90) / 180));
    const angle = Math.PI - t * Math.PI;
    const lift = Math.max(-0.3, Math.min(1, position.altitude / 90));
    const sx = cx + Math.cos(angle) * arcRadius;
    const sy = horizonY - Math.sin(angle) * arcRadius * Math.max(0.05, lift + 0.3);
    frame.fillCircle(sx, sy, 8, position.altitude > 0 ? palette.accent : palette.dim);
  }

  const digitHeight = Math.max(16, Math.floor(contentHeight * 0.15));
  const labelY = horizonY + 15;
  const sunrise = formatHoursMinutes(solar?.times.sunrise ?? null, ctx.timezone);
  const sunset = formatHoursMinutes(solar?.times.sunset ?? null, ctx.timezone);
  drawCenteredSegmentText(frame, sunrise, frame.width * 0.25, labelY, digitHeight, palette.foreground);
  drawCenteredSegmentText(frame, sunset, frame.width * 0.75, labelY, digitHeight, palette.foreground);
};
