import type { PanelContext } from "./types";
import { zonedTime } from "../utils/zoned-time";

const polar = (cx: number, cy: number, radius: number, turns: number): [number, number] => {
  const angle = turns * Math.PI * 2 - Math.PI / 2;
  return [cx + Math.cos(angle) * radius, cy + Math.sin(angle) * radius];
};

export const renderAnalogClockPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const { hours, minutes, seconds } = zonedTime(ctx.now, ctx.timezone);
  const cx = frame.width / 2;
  const cy = contentHeight / 2;
  const radius = Math.max(10, Math.min(frame.width, contentHeight) / 2 - 12);

  frame.strokeCircle(cx, cy, radius, palette.dim);
  for (let tick = 0; tick < 12; tick += 1) {
    const [ox, oy] = polar(cx, cy, radius, tick / 12);
    const [ix, iy] = polar(cx, cy, radius * (tick % 3 === 0 ? 0.82 : 0.9), tick / 12);
    frame.drawLine(ix, iy, ox, oy, palette.foreground, tick % 3 === 0 ? 3 : 1);
  }

  const hourTurns = ((hours % 12) + minutes / 60) / 12;
  const minuteTurns = (minutes + seconds / 60) / 60;
  const [hx, hy] = polar(cx, cy, radius * 0.5, hourTurns);
  const [mx, my] = polar(cx, cy, radius * 0.75, minuteTurns);
  const [sx, sy] = polar(cx, cy, radius * 0.85, seconds / 60);
  frame.drawLine(cx, cy, hx, hy, palette.foreground, 5);
  frame.drawLine(cx, cy, mx, my, palette.foreground, 3);
  frame.drawLine(cx, cy, sx, sy, palette.warning, 1);
  frame.fillCircle(cx, cy, 4, palette.accent);
};
