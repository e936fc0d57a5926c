import { describe, expect, it } from "vitest";
import { DAY_PALETTE, NIGHT_PALETTE, ThemeController, paletteFor } from "../server/render/theme";
import { formatDuration, formatHoursMinutes, zonedTime } from "../server/utils/zoned-time";

const sun = { sunrise: new Date("2024-06-01T05:30:00Z"), sunset: new Date("2024-06-01T20:15:00Z") };

describe("theme controller", () => {
  it("follows the sun in auto mode", () => {
    const theme = new ThemeController("auto");
    expect(theme.resolve(new Date("2024-06-01T12:00:00Z"), sun)).toBe("day");
    expect(theme.resolve(new Date("2024-06-01T05:29:59Z"), sun)).toBe("night");
    expect(theme.resolve(new Date("2024-06-01T20:15:00Z"), sun)).toBe("night");
  });

  it("falls back to fixed hours in the location timezone without sun times", () => {
    const utc = new ThemeController();
    expect(utc.resolve(new Date("2024-06-01T12:00:00Z"), null)).toBe("day");
    expect(utc.resolve(new Date("2024-06-01T22:00:00Z"), null)).toBe("night");

    const tokyo = new ThemeController("auto", "Asia/Tokyo");
    expect(tokyo.resolve(new Date("2024-06-01T14:00:00Z"), null)).toBe("night");
    expect(tokyo.resolve(new Date("2024-06-01T00:00:00Z"), null)).toBe("day");
  });

  it("honours a forced mode", () => {
    const theme = new ThemeController("auto");
    theme.setMode("night");
    expect(theme.status(new Date("2024-06-01T12:00:00Z"), sun)).toEqual({ mode: "night", active: "night" });
    expect(paletteFor("night")).toBe(NIGHT_PALETTE);
    expect(paletteFor("day")).toBe(DAY_PALETTE);
  });
});

describe("zoned time", () => {
  const at = new Date("2024-06-01T12:34:56Z");

  it("reads wall-clock fields in a timezone", () => {
    expect(zonedTime(at, "UTC")).toEqual({ hours: 12, minutes: 34, seconds: 56 });
    expect(zonedTime(at, "America/New_York")).toEqual({ hours: 8, minutes: 34, seconds: 56 });
    expect(zonedTime(at, "Not/AZone")).toEqual({ hours: 12, minutes: 34, seconds: 56 });
  });

  it("formats times and durations with placeholders", () => {
    expect(formatHoursMinutes(at, "UTC")).toBe("12:34");
    expect(formatHoursMinutes(null, "UTC")).toBe("--:--");
    expect(formatDuration(615)).toBe("10:15");
    expect(formatDuration(59.6)).toBe("1:00");
    expect(formatDuration(null)).toBe("-:--");
  });
});
