import type { SunTimes } from "../data/solar-provider";
import { cachedValue } from "../data/timed-cache";
import type { Rgb } from "../render/frame";
import { drawCenteredSegmentText } from "../render/segments";
import { formatHoursMinutes, zonedTime } from "../utils/zoned-time";
import type { PanelContext } from "./types";

export const SUN_ABOVE_HORIZON: Rgb = [255, 220, 50];
export const SUN_BELOW_HORIZON: Rgb = [25, 25, 112];
const SUN_OUTLINE: Rgb = [255, 140, 0];

// Chart spans +40° at the top down to -90° at the bottom.
const TOP_ELEVATION = 40;
const ELEVATION_RANGE = 130;
const MINUTES_PER_DAY = 24 * 60;
const HOUR_TICKS = [0, 6, 12, 18, 24];

export type SunChart = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export const sunChartLayout = (frameWidth: number, contentHeight: number): SunChart => ({
  x: 30,
  y: 10,
  width: frameWidth - 40,
  height: Math.max(40, contentHeight - 90),
});

const elevationY = (chart: SunChart, altitude: number): number =>
  chart.y + Math.trunc(((TOP_ELEVATION - altitude) / ELEVATION_RANGE) * chart.height);

const minuteX = (chart: SunChart, minutes: number): number =>
  chart.x + Math.trunc((minutes / MINUTES_PER_DAY) * chart.width);

/** First of today's twilight, rise, noon and set events still ahead of `now`. */
export const nextSolarEvent = (times: SunTimes, now: Date): Date | null =>
  [times.civilDawn, times.sunrise, times.solarNoon, times.sunset, times.civilDusk].find(
    (event): event is Date => event !== null && event.getTime() > now.getTime(),
  ) ?? null;

export const renderSunPathPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const [pathRead, positionRead, timesRead] = await Promise.all([
    ctx.data.sunPath.get(),
    ctx.data.sunPosition.get(),
    ctx.data.sunTimes.get(),
  ]);
  const path = cachedValue(pathRead);
  const position = cachedValue(positionRead);
  const solar = cachedValue(timesRead);

  const chart = sunChartLayout(frame.width, contentHeight);
  const horizonY = elevationY(chart, 0);
  frame.drawLine(chart.x, horizonY, chart.x + chart.width, horizonY, palette.dim, 3);
  for (const hour of HOUR_TICKS) {
    const x = minuteX(chart, hour * 60);
    frame.drawLine(x, chart.y + chart.height, x, chart.y + chart.height + 4, palette.dim);
  }

  if (path) {
    let previous: { x: number; y: number } | null = null;
    for (const sample of path.samples) {
      const point = { x: minuteX(chart, sample.minutes), y: elevationY(chart, sample.altitude) };
      if (previous) {
        const below = previous.y > horizonY && point.y > horizonY;
        frame.drawLine(previous.x, previous.y, point.x, point.y, below ? SUN_BELOW_HORIZON : SUN_ABOVE_HORIZON, 4);
      }
      previous = point;
    }
  }

  if (position) {
    const { hours, minutes } = zonedTime(ctx.now, ctx.timezone);
    const cx = minuteX(chart, hours * 60 + minutes);
    const cy = elevationY(chart, position.altitude);
    frame.fillCircle(cx, cy, 8, SUN_ABOVE_HORIZON);
    frame.strokeCircle(cx, cy, 8, SUN_OUTLINE);
  }

  const infoY = chart.y + chart.height + 20;
  const digitHeight = Math.max(16, Math.floor(contentHeight * 0.12));
  const event = solar ? nextSolarEvent(solar.times, ctx.now) : null;
  drawCenteredSegmentText(frame, formatHoursMinutes(event, ctx.timezone), frame.width * 0.25, infoY, digitHeight, palette.foreground);
  const elevation = position ? String(Math.round(position.altitude)) : "--";
  drawCenteredSegmentText(frame, elevation, frame.width * 0.75, infoY, digitHeight, SUN_ABOVE_HORIZON);
};
