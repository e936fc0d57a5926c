import type { AqiCategory } from "../data/weather-math";
import { cachedValue } from "../data/timed-cache";
import type { Rgb } from "../render/frame";
import { drawCenteredSegmentText } from "../render/segments";
import type { PanelContext } from "./types";

export const AQI_COLORS: Record<AqiCategory, Rgb> = {
  Good: [0, 228, 0],
  Moderate: [255, 255, 0],
  "Unhealthy for Sensitive": [255, 126, 0],
  Unhealthy: [255, 0, 0],
  "Very Unhealthy": [143, 63, 151],
  Hazardous: [126, 0, 35],
};

const AQI_SCALE_MAX = 500;

export const renderAirQualityPanel = async (ctx: PanelContext): Promise<void> => {
  const { frame, palette, contentHeight } = ctx;
  const read = ctx.data.weather ? ctx.data.weather.readAirQuality() : null;
  const reading = read ? cachedValue(read) : null;
  const digitHeight = Math.floor(contentHeight * 0.35);

  if (!reading) {
    drawCenteredSegmentText(frame, "--", frame.width / 2, 30, digitHeight, palette.dim);
    return;
  }

  const color = AQI_COLORS[reading.category];
  drawCenteredSegmentText(frame, String(reading.aqi), frame.width / 2, 30, digitHeight, color);

  const gaugeX = 20;
  const gaugeWidth = frame.width - 40;
  const gaugeY = 50 + digitHeight;
  frame.fillRect({ x: gaugeX, y: gaugeY, width: gaugeWidth, height: 10 }, palette.dim);
  const filled = Math.round(gaugeWidth * Math.min(1, reading.aqi / AQI_SCALE_MAX));
  frame.fillRect({ x: gaugeX, y: gaugeY, width: filled, height: 10 }, color);
};
