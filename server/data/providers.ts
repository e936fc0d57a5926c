import type { ClockConfig } from "@shared/clock-config";
import type { ClockEnv } from "../config/env";
import { zonedTime } from "../utils/zoned-time";
import { LunarProvider, type MoonPhase } from "./lunar-provider";
import { SolarProvider, type AnalemmaPoint, type ElevationSample, type SunPosition, type SunTimes } from "./solar-provider";
import { TimedCache } from "./timed-cache";
import { WeatherProvider, type FetchLike } from "./weather-provider";

export type SolarSnapshot = {
  times: SunTimes;
  dayLengthChangeMinutes: number | null;
};

export type SunPathSnapshot = {
  /** Local midnight the samples start from. */
  dayStart: Date;
  samples: ElevationSample[];
};

export type AnalemmaSnapshot = {
  year: number;
  points: AnalemmaPoint[];
  equationOfTime: number;
};

/**
 * Data sources every panel reads through. Each accessor sits behind a
 * TimedCache so renders never wait on the same computation or request twice
 * within its TTL. Network-backed slots are read without waiting.
 */
export type DataProviders = {
  weather: WeatherProvider | null;
  sunTimes: TimedCache<SolarSnapshot>;
  sunPosition: TimedCache<SunPosition>;
  sunPath: TimedCache<SunPathSnapshot>;
  analemma: TimedCache<AnalemmaSnapshot>;
  moon: TimedCache<MoonPhase>;
};

export type DataProviderOverrides = {
  fetchImpl?: FetchLike;
  /** Fired when a background network refresh commits new data. */
  onUpdate?: () => void;
  now?: () => number;
};

const SUN_TIMES_TTL_MS = 10 * 60 * 1000;
const SUN_POSITION_TTL_MS = 30 * 1000;
const MOON_TTL_MS = 60 * 60 * 1000;
const SUN_PATH_TTL_MS = 10 * 60 * 1000;
const ANALEMMA_TTL_MS = 60 * 60 * 1000;

/** Start of the local calendar day containing `at`. */
export const localDayStart = (at: Date, timezone: string): Date => {
  const { hours, minutes, seconds } = zonedTime(at, timezone);
  const elapsedMs = ((hours * 60 + minutes) * 60 + seconds) * 1000 + at.getMilliseconds();
  return new Date(at.getTime() - elapsedMs);
};
const FAILURE_BACKOFF_MS = 30 * 1000;

export const createDataProviders = (
  config: ClockConfig,
  env: ClockEnv,
  overrides: DataProviderOverrides = {},
): DataProviders => {
  const now = overrides.now ?? Date.now;
  const { latitude, longitude, timezone } = config.location;
  const solar = new SolarProvider(latitude, longitude);
  const lunar = new LunarProvider(latitude, longitude);

  const weather = env.openWeatherApiKey
    ? new WeatherProvider({
        apiKey: env.openWeatherApiKey,
        latitude,
        longitude,
        units: config.weather.units,
        weatherTtlMs: config.weather.update_interval_seconds * 1000,
        airQualityTtlMs: config.air_quality.update_interval_seconds * 1000,
        timeoutMs: env.fetchTimeoutMs,
        failureBackoffMs: FAILURE_BACKOFF_MS,
        fetchImpl: overrides.fetchImpl,
        onUpdate: overrides.onUpdate,
        now,
      })
    : null;

  return {
    weather,
    sunTimes: new TimedCache({
      name: "sun_times",
      ttlMs: SUN_TIMES_TTL_MS,
      now,
      fetch: async () => {
        const at = new Date(now());
        return { times: solar.getSunTimes(at), dayLengthChangeMinutes: solar.getDayLengthChange(at) };
      },
    }),
    sunPosition: new TimedCache({
      name: "sun_position",
      ttlMs: SUN_POSITION_TTL_MS,
      now,
      fetch: async () => solar.getSunPosition(new Date(now())),
    }),
    sunPath: new TimedCache({
      name: "sun_path",
      ttlMs: SUN_PATH_TTL_MS,
      now,
      fetch: async () => {
        const dayStart = localDayStart(new Date(now()), timezone);
        return { dayStart, samples: solar.getElevationCurve(dayStart) };
      },
    }),
    analemma: new TimedCache({
      name: "analemma",
      ttlMs: ANALEMMA_TTL_MS,
      now,
      fetch: async () => {
        const at = new Date(now());
        const year = at.getUTCFullYear();
        return { year, points: solar.getAnalemma(year), equationOfTime: solar.getEquationOfTime(at) };
      },
    }),
    moon: new TimedCache({
      name: "moon",
      ttlMs: MOON_TTL_MS,
      now,
      fetch: async () => lunar.getMoonPhase(new Date(now())),
    }),
  };
};
