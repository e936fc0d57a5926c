import { describe, expect, it } from "vitest";
import { PANEL_IDS, type PanelId } from "@shared/clock-config";
import { WeatherProvider, type FetchLike } from "../server/data/weather-provider";
import { composeErrorFrame, composePanelFrame, refreshIntervalMs, type FrameRequest } from "../server/panels";
import { AQI_COLORS } from "../server/panels/air-quality";
import { SEASON_COLORS, seasonForMonth } from "../server/panels/analemma";
import { headerColorForHour } from "../server/panels/clock";
import { SUN_ABOVE_HORIZON, SUN_BELOW_HORIZON, nextSolarEvent } from "../server/panels/sun-path";
import { DAY_PALETTE } from "../server/render/theme";
import { fixedProviders, solarFixture } from "./fixtures";

const airOnlyFetch: FetchLike = async (url) => {
  const ok = url.includes("/air_pollution?");
  return {
    ok,
    status: ok ? 200 : 503,
    json: async () => ({ list: [{ components: { pm2_5: 20, pm10: 1, o3: 1, no2: 1, so2: 1, co: 1 } }] }),
  };
};

const request = (panel: PanelId, overrides: Partial<FrameRequest> = {}): FrameRequest => ({
  panel,
  index: PANEL_IDS.indexOf(panel),
  count: PANEL_IDS.length,
  width: 480,
  height: 320,
  navBarHeight: 40,
  palette: DAY_PALETTE,
  now: new Date("2024-06-01T10:00:00Z"),
  timezone: "UTC",
  data: fixedProviders(),
  ...overrides,
});

const activeDot = (index: number) => [184 + index * 14, 300] as const;

describe("panels", () => {
  it("renders every panel with the nav bar marking its position", async () => {
    for (const panel of PANEL_IDS) {
      const frame = await composePanelFrame(request(panel));
      const [x, y] = activeDot(PANEL_IDS.indexOf(panel));
      expect(frame.width).toBe(480);
      expect(frame.height).toBe(320);
      expect(frame.getPixel(x, y)).toEqual(DAY_PALETTE.foreground);
    }
  });

  it("uses the configured refresh cadence", () => {
    expect(PANEL_IDS.map(refreshIntervalMs)).toEqual([
      1000, 60_000, 300_000, 30_000, 3_600_000, 30_000, 3_600_000, 3_600_000, 1000,
    ]);
  });

  it("colours the clock header by hour of day", async () => {
    expect(headerColorForHour(3)).toEqual([25, 25, 112]);
    expect(headerColorForHour(7)).toEqual([255, 140, 0]);
    expect(headerColorForHour(12)).toEqual([135, 206, 235]);
    expect(headerColorForHour(19)).toEqual([255, 140, 0]);
    expect(headerColorForHour(22)).toEqual([147, 112, 219]);
    const frame = await composePanelFrame(request("clock"));
    expect(frame.getPixel(0, 0)).toEqual([135, 206, 235]);
  });

  it("shows a placeholder when weather is not configured", async () => {
    const frame = await composePanelFrame(request("weather"));
    expect(frame.getPixel(200, 70)).toEqual(DAY_PALETTE.dim);
  });

  it("fills the AQI gauge in the category colour", async () => {
    const weather = new WeatherProvider({
      apiKey: "test-key",
      latitude: 0,
      longitude: 0,
      units: "metric",
      weatherTtlMs: 60_000,
      airQualityTtlMs: 60_000,
      timeoutMs: 1000,
      fetchImpl: airOnlyFetch,
    });
    await weather.getAirQuality();
    const frame = await composePanelFrame(request("airquality", { data: fixedProviders(weather) }));
    expect(frame.getPixel(25, 150)).toEqual(AQI_COLORS.Moderate);
    expect(frame.getPixel(300, 150)).toEqual(DAY_PALETTE.dim);
  });

  it("scales the day length bar to the share of the day", async () => {
    const frame = await composePanelFrame(request("daylength"));
    expect(frame.getPixel(25, 136)).toEqual(DAY_PALETTE.accent);
    expect(frame.getPixel(300, 136)).toEqual(DAY_PALETTE.dim);
  });

  it("plots the sun path with the horizon, curve and current sun", async () => {
    const frame = await composePanelFrame(request("sunpath"));
    expect(frame.getPixel(100, 68)).toEqual(DAY_PALETTE.dim);
    expect(frame.getPixel(100, 141)).toEqual(SUN_BELOW_HORIZON);
    expect(frame.getPixel(213, 3)).toEqual(SUN_ABOVE_HORIZON);
  });

  it("picks the next solar event still ahead", () => {
    expect(nextSolarEvent(solarFixture.times, new Date("2024-06-01T10:00:00Z"))).toEqual(solarFixture.times.solarNoon);
    expect(nextSolarEvent(solarFixture.times, new Date("2024-06-01T20:30:00Z"))).toEqual(solarFixture.times.civilDusk);
    expect(nextSolarEvent(solarFixture.times, new Date("2024-06-01T21:00:00Z"))).toBeNull();
  });

  it("plots analemma points by season and highlights today", async () => {
    expect(seasonForMonth(1)).toBe("winter");
    expect(seasonForMonth(4)).toBe("spring");
    expect(seasonForMonth(7)).toBe("summer");
    expect(seasonForMonth(10)).toBe("autumn");
    expect(seasonForMonth(12)).toBe("winter");

    const frame = await composePanelFrame(request("analemma"));
    expect(frame.getPixel(108, 140)).toEqual(SEASON_COLORS.winter);
    expect(frame.getPixel(130, 78)).toEqual(DAY_PALETTE.foreground);
  });

  it("draws an error frame that keeps the nav bar", () => {
    const frame = composeErrorFrame(request("moon"));
    expect(frame.getPixel(4, 4)).toEqual(DAY_PALETTE.warning);
    const [x, y] = activeDot(PANEL_IDS.indexOf("moon"));
    expect(frame.getPixel(x, y)).toEqual(DAY_PALETTE.foreground);
  });
});
