import type { AnalemmaSnapshot, DataProviders, SolarSnapshot, SunPathSnapshot } from "../server/data/providers";
import type { MoonPhase } from "../server/data/lunar-provider";
import type { SunPosition } from "../server/data/solar-provider";
import { TimedCache } from "../server/data/timed-cache";
import type { WeatherProvider } from "../server/data/weather-provider";

export const solarFixture: SolarSnapshot = {
  times: {
    date: "2024-06-01",
    sunrise: new Date("2024-06-01T05:30:00Z"),
    sunset: new Date("2024-06-01T20:15:00Z"),
    solarNoon: new Date("2024-06-01T12:52:00Z"),
    civilDawn: new Date("2024-06-01T04:58:00Z"),
    civilDusk: new Date("2024-06-01T20:47:00Z"),
    dayLengthMinutes: 885,
  },
  dayLengthChangeMinutes: 1.4,
};

export const sunPositionFixture: SunPosition = { altitude: 45, azimuth: 160 };

/** A flat curve well below the horizon. */
export const sunPathFixture: SunPathSnapshot = {
  dayStart: new Date("2024-06-01T00:00:00Z"),
  samples: Array.from({ length: 48 }, (_, i) => ({ minutes: i * 30, altitude: -50 })),
};

export const analemmaFixture: AnalemmaSnapshot = {
  year: 2024,
  points: [
    { date: "2024-01-01", month: 1, altitude: 30, equationOfTime: -3 },
    { date: "2024-05-30", month: 5, altitude: 70, equationOfTime: 2.5 },
  ],
  equationOfTime: 2.2,
};

export const moonFixture: MoonPhase = {
  phase: 0.3,
  illumination: 62,
  phaseName: "Waxing Gibbous",
  nextNew: new Date("2024-06-20T10:00:00Z"),
  nextFull: new Date("2024-06-08T10:00:00Z"),
  daysToNew: 20,
  daysToFull: 8,
  moonrise: new Date("2024-06-01T14:00:00Z"),
  moonset: new Date("2024-06-01T02:00:00Z"),
};

/** Providers backed by fixed values; no astronomy or network work. */
export const fixedProviders = (weather: WeatherProvider | null = null): DataProviders => ({
  weather,
  sunTimes: new TimedCache({ name: "fixture_sun_times", ttlMs: 60_000, fetch: async () => solarFixture }),
  sunPosition: new TimedCache({ name: "fixture_sun_position", ttlMs: 60_000, fetch: async () => sunPositionFixture }),
  sunPath: new TimedCache({ name: "fixture_sun_path", ttlMs: 60_000, fetch: async () => sunPathFixture }),
  analemma: new TimedCache({ name: "fixture_analemma", ttlMs: 60_000, fetch: async () => analemmaFixture }),
  moon: new TimedCache({ name: "fixture_moon", ttlMs: 60_000, fetch: async () => moonFixture }),
});
