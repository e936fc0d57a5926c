import { cachedValue } from "../data/timed-cache";
import type { DailyForecast } from "../data/forecast";
import { drawCenteredSegmentText } from "../render/segments";
import type { PanelContext } from "./types";

const FORECAST_DAYS = 3;

const drawForecast = (ctx: PanelContext, days: DailyForecast[], top: number, height: number) => {
  const { frame, palette } = ctx;
  if (days.length === 0) return;
  const low = Math.min(...days.map((day) => day.lowTemp));
  const high = Math.max(...days.map((day) => day.highTemp));
  const span = Math.max(1, high - low);
  const columnWidth = Math.floor(frame.width / days.length);

  days.forEach((day, i) => {
    const x = i * columnWidth + Math.floor(columnWidth / 2);
    const yHigh = top + Math.round(((high - day.highTemp) / span) * height);
    const yLow = top + Math.round(((high - day.lowTemp) / span) * height);
    frame.fillRect({ x: x - 6, y: yHigh, width: 12, height: Math.max(2, yLow - yHigh) }, palette.accent);
    const rainHeight = Math.round((day.rainChance / 100) * height);
    frame.fillRect({ x: x + 10, y: top + height - rainHeight, width: 6, height: rainHeight }, palette.dim);
  });
};

export const renderWeatherPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const read = ctx.data.weather ? ctx.data.weather.readWeather() : null;
  const bundle = read ? cachedValue(read) : null;
  const digitHeight = Math.floor(contentHeight * 0.3);

  if (!bundle) {
    drawCenteredSegmentText(frame, "--", frame.width / 2, 30, digitHeight, palette.dim);
    return;
  }

  const color = read?.status === "stale" ? palette.dim : palette.foreground;
  drawCenteredSegmentText(frame, String(Math.round(bundle.current.temperature)), frame.width / 2, 20, digitHeight, color);

  const humidityWidth = Math.round((frame.width - 40) * (bundle.current.humidity / 100));
  frame.fillRect({ x: 20, y: 30 + digitHeight, width: frame.width - 40, height: 4 }, palette.dim);
  frame.fillRect({ x: 20, y: 30 + digitHeight, width: humidityWidth, height: 4 }, palette.accent);

  const forecastTop = 50 + digitHeight;
  drawForecast(ctx, bundle.forecast.slice(0, FORECAST_DAYS), forecastTop, Math.max(10, contentHeight - forecastTop - 10));
};
