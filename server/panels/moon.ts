import { cachedValue } from "../data/timed-cache";
import { drawCenteredSegmentText } from "../render/segments";
import type { PanelContext } from "./types";

/**
 * Shades a disk by phase: the terminator sweeps from the right limb while
 * waxing and from the left limb while waning.
 */
const drawMoonDisk = (ctx: PanelContext, cx: number, cy: number, radius: number, phase: number) => {
  const { frame, palette } = ctx;
  const waxing = phase < 0.5;
  const terminator = Math.cos(phase * Math.PI * 2);
  for (let dy = -radius; dy <= radius; dy += 1) {
    const halfWidth = Math.sqrt(Math.max(0, radius * radius - dy * dy));
    for (let dx = -Math.floor(halfWidth); dx <= Math.floor(halfWidth); dx += 1) {
      const u = halfWidth === 0 ? 0 : dx / halfWidth;
      const lit = waxing ? u > terminator : -u > terminator;
      frame.setPixel(cx + dx, cy + dy, lit ? palette.foreground : palette.navButton);
    }
  }
};

export const renderMoonPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const moon = cachedValue(await ctx.data.moon.get());
  const radius = Math.floor(Math.min(frame.width / 4, contentHeight / 2 - 20));
  const cx = Math.floor(frame.width / 3);
  const cy = Math.floor(contentHeight / 2);

  if (!moon) {
    frame.strokeCircle(cx, cy, radius, palette.dim);
    return;
  }

  drawMoonDisk(ctx, cx, cy, radius, moon.phase);
  const digitHeight = Math.max(16, Math.floor(contentHeight * 0.18));
  const infoX = Math.floor((frame.width * 3) / 4);
  drawCenteredSegmentText(frame, String(Math.round(moon.illumination)), infoX, cy - digitHeight - 10, digitHeight, palette.foreground);
  if (moon.daysToFull !== null) {
    drawCenteredSegmentText(frame, String(moon.daysToFull), infoX, cy + 10, digitHeight, palette.accent);
  }
};
