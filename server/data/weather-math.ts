// US EPA PM2.5 breakpoints: [concentration low, high, index low, high]
const PM25_BREAKPOINTS: ReadonlyArray<readonly [number, number, number, number]> = [
  [0.0, 12.0, 0, 50],
  [12.1, 35.4, 51, 100],
  [35.5, 55.4, 101, 150],
  [55.5, 150.4, 151, 200],
  [150.5, 250.4, 201, 300],
  [250.5, 500.4, 301, 500],
];

export type AqiCategory =
  | "Good"
  | "Moderate"
  | "Unhealthy for Sensitive"
  | "Unhealthy"
  | "Very Unhealthy"
  | "Hazardous";

export const pm25ToAqi = (pm25: number): number => {
  for (const [cLow, cHigh, iLow, iHigh] of PM25_BREAKPOINTS) {
    if (pm25 >= cLow && pm25 <= cHigh) {
      return Math.trunc(((iHigh - iLow) / (cHigh - cLow)) * (pm25 - cLow) + iLow);
    }
  }
  return pm25 > 500.4 ? 500 : 0;
};

export const aqiCategory = (aqi: number): AqiCategory => {
  if (aqi <= 50) return "Good";
  if (aqi <= 100) return "Moderate";
  if (aqi <= 150) return "Unhealthy for Sensitive";
  if (aqi <= 200) return "Unhealthy";
  if (aqi <= 300) return "Very Unhealthy";
  return "Hazardous";
};

const COMPASS_POINTS = [
  "N",
  "NNE",
  "NE",
  "ENE",
  "E",
  "ESE",
  "SE",
  "SSE",
  "S",
  "SSW",
  "SW",
  "WSW",
  "W",
  "WNW",
  "NW",
  "NNW",
] as const;

export type CompassPoint = (typeof COMPASS_POINTS)[number];

export const degreesToCompass = (degrees: number): CompassPoint => {
  const index = ((Math.floor((degrees + 11.25) / 22.5) % 16) + 16) % 16;
  return COMPASS_POINTS[index] ?? "N";
};
