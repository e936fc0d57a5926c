import { describe, expect, it } from "vitest";
import { LunarProvider, moonPhaseName } from "../server/data/lunar-provider";
import { SolarProvider } from "../server/data/solar-provider";

describe("solar provider", () => {
  const solar = new SolarProvider(40, -105);

  it("orders the day's events around solar noon", () => {
    const times = solar.getSunTimes(new Date("2024-06-21T18:00:00Z"));
    expect(times.date).toBe("2024-06-21");
    const { sunrise, sunset, solarNoon, civilDawn, civilDusk, dayLengthMinutes } = times;
    if (!sunrise || !sunset || !solarNoon || !civilDawn || !civilDusk || dayLengthMinutes === null) {
      throw new Error("expected a full set of sun times at mid latitude");
    }
    expect(civilDawn.getTime()).toBeLessThan(sunrise.getTime());
    expect(sunrise.getTime()).toBeLessThan(solarNoon.getTime());
    expect(solarNoon.getTime()).toBeLessThan(sunset.getTime());
    expect(sunset.getTime()).toBeLessThan(civilDusk.getTime());
    expect(dayLengthMinutes).toBeGreaterThan(880);
    expect(dayLengthMinutes).toBeLessThan(920);
  });

  it("puts the sun high in the south near local noon", () => {
    const position = solar.getSunPosition(new Date("2024-06-21T19:00:00Z"));
    expect(position.altitude).toBeGreaterThan(60);
    expect(position.azimuth).toBeGreaterThan(90);
    expect(position.azimuth).toBeLessThan(270);
  });

  it("samples the elevation curve across the day", () => {
    const curve = solar.getElevationCurve(new Date("2024-06-21T06:00:00Z"));
    expect(curve).toHaveLength(48);
    expect(curve[1]?.minutes).toBe(30);
    const highest = Math.max(...curve.map((sample) => sample.altitude));
    const lowest = Math.min(...curve.map((sample) => sample.altitude));
    expect(highest).toBeGreaterThan(70);
    expect(lowest).toBeLessThan(-20);
  });

  it("runs the sun early in November and late in February", () => {
    expect(solar.getEquationOfTime(new Date("2024-11-03T12:00:00Z"))).toBeGreaterThan(15.5);
    expect(solar.getEquationOfTime(new Date("2024-11-03T12:00:00Z"))).toBeLessThan(17);
    expect(solar.getEquationOfTime(new Date("2024-02-11T12:00:00Z"))).toBeLessThan(-13.5);
    expect(solar.getEquationOfTime(new Date("2024-02-11T12:00:00Z"))).toBeGreaterThan(-15);
  });

  it("traces the analemma weekly through the year", () => {
    const points = solar.getAnalemma(2024);
    expect(points).toHaveLength(53);
    expect(points[0]).toMatchObject({ date: "2024-01-01", month: 1 });
    expect(points[52]).toMatchObject({ date: "2024-12-30", month: 12 });
    const altitudes = points.map((point) => point.altitude);
    expect(Math.max(...altitudes)).toBeGreaterThan(72.5);
    expect(Math.max(...altitudes)).toBeLessThan(74);
    expect(Math.min(...altitudes)).toBeGreaterThan(26);
    expect(Math.min(...altitudes)).toBeLessThan(28);
  });

  it("reports lengthening days in spring", () => {
    const change = solar.getDayLengthChange(new Date("2024-03-20T18:00:00Z"));
    expect(change).not.toBeNull();
    expect(change ?? 0).toBeGreaterThan(1);
    expect(change ?? 0).toBeLessThan(4);
  });
});

describe("lunar provider", () => {
  it("names phases by their place in the cycle", () => {
    expect(moonPhaseName(0.01)).toBe("New Moon");
    expect(moonPhaseName(0.1)).toBe("Waxing Crescent");
    expect(moonPhaseName(0.25)).toBe("First Quarter");
    expect(moonPhaseName(0.4)).toBe("Waxing Gibbous");
    expect(moonPhaseName(0.5)).toBe("Full Moon");
    expect(moonPhaseName(0.6)).toBe("Waning Gibbous");
    expect(moonPhaseName(0.75)).toBe("Last Quarter");
    expect(moonPhaseName(0.9)).toBe("Waning Crescent");
    expect(moonPhaseName(0.99)).toBe("New Moon");
  });

  it("finds the next full moon from just after a new moon", () => {
    const moon = new LunarProvider(40, -105).getMoonPhase(new Date("2024-01-11T12:00:00Z"));
    expect(moon.phaseName).toBe("New Moon");
    expect(moon.illumination).toBeLessThan(1);
    expect(moon.daysToFull).toBe(15);
    expect(moon.nextFull?.toISOString().slice(0, 10)).toBe("2024-01-25");
  });
});
