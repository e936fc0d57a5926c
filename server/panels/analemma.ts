import { cachedValue } from "../data/timed-cache";
import type { Rgb } from "../render/frame";
import { drawCenteredSegmentText } from "../render/segments";
import type { PanelContext } from "./types";

export type Season = "spring" | "summer" | "autumn" | "winter";

export const SEASON_COLORS: Record<Season, Rgb> = {
  spring: [0, 200, 0],
  summer: [255, 220, 50],
  autumn: [255, 140, 0],
  winter: [100, 149, 237],
};

export const seasonForMonth = (month: number): Season => {
  if (month >= 3 && month <= 5) return "spring";
  if (month >= 6 && month <= 8) return "summer";
  if (month >= 9 && month <= 11) return "autumn";
  return "winter";
};

const EOT_SPAN_MINUTES = 15;
const CENTER_ELEVATION = 30;
const ELEVATION_SPAN = 50;
const TODAY_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;

export const renderAnalemmaPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const [analemmaRead, positionRead] = await Promise.all([ctx.data.analemma.get(), ctx.data.sunPosition.get()]);
  const analemma = cachedValue(analemmaRead);
  const position = cachedValue(positionRead);

  const centerX = Math.floor(frame.width / 4);
  const centerY = 10 + Math.floor((contentHeight - 20) / 2);
  const scaleX = Math.floor(frame.width / 8);
  const scaleY = Math.floor((contentHeight - 20) * 0.3);
  frame.drawLine(centerX, 20, centerX, contentHeight - 10, palette.dim);
  frame.drawLine(30, centerY, centerX * 2 - 30, centerY, palette.dim);

  const infoX = frame.width * 0.75;
  const digitHeight = Math.max(16, Math.floor(contentHeight * 0.15));

  if (!analemma) {
    drawCenteredSegmentText(frame, "--", infoX, 30, digitHeight, palette.dim);
    return;
  }

  let today: { x: number; y: number } | null = null;
  for (const point of analemma.points) {
    const x = centerX + Math.trunc((point.equationOfTime / EOT_SPAN_MINUTES) * scaleX);
    const y = centerY - Math.trunc(((point.altitude - CENTER_ELEVATION) / ELEVATION_SPAN) * scaleY);
    frame.fillCircle(x, y, 2, SEASON_COLORS[seasonForMonth(point.month)]);
    if (Math.abs(Date.parse(point.date) - ctx.now.getTime()) < TODAY_WINDOW_MS) {
      today = { x, y };
    }
  }
  if (today) {
    frame.fillCircle(today.x, today.y, 6, palette.foreground);
    frame.strokeCircle(today.x, today.y, 6, SEASON_COLORS.summer);
  }

  const eot = analemma.equationOfTime;
  const eotLabel = `${eot < 0 ? "-" : ""}${Math.abs(eot).toFixed(1)}`;
  drawCenteredSegmentText(frame, eotLabel, infoX, 30, digitHeight, SEASON_COLORS.summer);
  const elevation = position ? String(Math.round(position.altitude)) : "--";
  drawCenteredSegmentText(frame, elevation, infoX, 60 + digitHeight, digitHeight, palette.foreground);
};
