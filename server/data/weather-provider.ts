import { z } from "zod";
import type { Units } from "@shared/clock-config";
import { createLogger } from "../utils/log";
import { groupForecast, type DailyForecast } from "./forecast";
import { TimedCache, type CacheRead } from "./timed-cache";
import { aqiCategory, degreesToCompass, pm25ToAqi, type AqiCategory, type CompassPoint } from "./weather-math";

const log = createLogger("weather");

export class ProviderError extends Error {
  readonly status: number | null;
  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "ProviderError";
    this.status = status;
  }
}

export type CurrentWeather = {
  temperature: number;
  feelsLike: number;
  humidity: number;
  description: string;
  windSpeed: number;
  windDirection: CompassPoint;
};

export type WeatherBundle = {
  current: CurrentWeather;
  forecast: DailyForecast[];
};

export type AirQuality = {
  aqi: number;
  category: AqiCategory;
  pm25: number;
  pm10: number;
  o3: number;
  no2: number;
  so2: number;
  co: number;
  updatedAt: number;
};

const currentWeatherSchema = z.object({
  main: z
    .object({
      temp: z.number().default(0),
      feels_like: z.number().default(0),
      humidity: z.number().default(0),
    })
    .default({}),
  weather: z.array(z.object({ description: z.string().default("Unknown") })).default([]),
  wind: z
    .object({
      speed: z.number().default(0),
      deg: z.number().default(0),
    })
    .default({}),
});

const forecastEnvelopeSchema = z.object({
  list: z.array(z.unknown()).default([]),
});

const airPollutionSchema = z.object({
  list: z
    .array(
      z.object({
        components: z.object({
          pm2_5: z.number().default(0),
          pm10: z.number().default(0),
          o3: z.number().default(0),
          no2: z.number().default(0),
          so2: z.number().default(0),
          co: z.number().default(0),
        }),
      }),
    )
    .min(1),
});

const titleCase = (value: string): string =>
  value.replace(/\w\S*/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

export type FetchLike = (input: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}>;

export type WeatherProviderOptions = {
  apiKey: string;
  latitude: number;
  longitude: number;
  units: Units;
  weatherTtlMs: number;
  airQualityTtlMs: number;
  timeoutMs: number;
  failureBackoffMs?: number;
  onUpdate?: () => void;
  baseUrl?: string;
  fetchImpl?: FetchLike;
  now?: () => number;
};

const DEFAULT_BASE_URL = "https://api.openweathermap.org/data/2.5";

/**
 * OpenWeatherMap client. Current conditions and forecast share one cache slot
 * and are committed together; air quality has its own slot.
 */
export class WeatherProvider {
  readonly weather: TimedCache<WeatherBundle>;
  readonly airQuality: TimedCache<AirQuality>;
  private readonly options: WeatherProviderOptions;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;

  constructor(options: WeatherProviderOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
    this.weather = new TimedCache({
      name: "weather",
      ttlMs: options.weatherTtlMs,
      failureBackoffMs: options.failureBackoffMs,
      onUpdate: options.onUpdate,
      now: this.now,
      fetch: () => this.fetchWeatherBundle(),
    });
    this.airQuality = new TimedCache({
      name: "air_quality",
      ttlMs: options.airQualityTtlMs,
      failureBackoffMs: options.failureBackoffMs,
      onUpdate: options.onUpdate,
      now: this.now,
      fetch: () => this.fetchAirQuality(),
    });
  }

  getWeather(): Promise<CacheRead<WeatherBundle>> {
    return this.weather.get();
  }

  getAirQuality(): Promise<CacheRead<AirQuality>> {
    return this.airQuality.get();
  }

  /** Non-blocking reads for the render path; expired slots refresh in the background. */
  readWeather(): CacheRead<WeatherBundle> {
    return this.weather.read();
  }

  readAirQuality(): CacheRead<AirQuality> {
    return this.airQuality.read();
  }

  private endpoint(path: string, withUnits: boolean): string {
    const params = new URLSearchParams({
      lat: String(this.options.latitude),
      lon: String(this.options.longitude),
      appid: this.options.apiKey,
    });
    if (withUnits) params.set("units", this.options.units);
    return `${this.options.baseUrl ?? DEFAULT_BASE_URL}/${path}?${params.toString()}`;
  }

  private async fetchJson(url: string, label: string): Promise<unknown> {
    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`${label} request failed: ${reason}`);
    }
    if (!response.ok) {
      throw new ProviderError(`${label} HTTP ${response.status}`, response.status);
    }
    try {
      return await response.json();
    } catch {
      throw new ProviderError(`${label} returned invalid JSON`, response.status);
    }
  }

  private async fetchWeatherBundle(): Promise<WeatherBundle> {
    const currentRaw = await this.fetchJson(this.endpoint("weather", true), "current weather");
    const current = currentWeatherSchema.safeParse(currentRaw);
    if (!current.success) {
      throw new ProviderError(`current weather payload malformed: ${current.error.issues[0]?.message ?? "unknown"}`);
    }

    const forecastRaw = await this.fetchJson(this.endpoint("forecast", true), "forecast");
    const envelope = forecastEnvelopeSchema.safeParse(forecastRaw);
    if (!envelope.success) {
      throw new ProviderError("forecast payload malformed");
    }
    const grouped = groupForecast(envelope.data.list);
    if (grouped.skipped > 0) {
      log.debug(`skipped ${grouped.skipped} malformed forecast samples`);
    }

    const { main, weather, wind } = current.data;
    return {
      current: {
        temperature: main.temp,
        feelsLike: main.feels_like,
        humidity: main.humidity,
        description: titleCase(weather[0]?.description ?? "Unknown"),
        windSpeed: wind.speed,
        windDirection: degreesToCompass(wind.deg),
      },
      forecast: grouped.days,
    };
  }

  private async fetchAirQuality(): Promise<AirQuality> {
    const raw = await this.fetchJson(this.endpoint("air_pollution", false), "air quality");
    const parsed = airPollutionSchema.safeParse(raw);
    const first = parsed.success ? parsed.data.list[0] : undefined;
    if (!first) {
      throw new ProviderError("air quality payload malformed");
    }
    const { components } = first;
    const aqi = pm25ToAqi(components.pm2_5);
    return {
      aqi,
      category: aqiCategory(aqi),
      pm25: components.pm2_5,
      pm10: components.pm10,
      o3: components.o3,
      no2: components.no2,
      so2: components.so2,
      co: components.co,
      updatedAt: this.now(),
    };
  }
}
