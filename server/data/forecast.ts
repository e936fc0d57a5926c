import { z } from "zod";

export type DailyForecast = {
  date: string;
  highTemp: number;
  lowTemp: number;
  rainChance: number;
  samples: number;
};

const forecastSampleSchema = z.object({
  dt_txt: z.string().regex(/^\d{4}-\d{2}-\d{2}[ T]/),
  main: z.object({ temp: z.number().finite() }),
  pop: z.number().min(0).max(1).optional(),
});

type DayBucket = {
  temps: number[];
  rain: number[];
};

export type ForecastGrouping = {
  days: DailyForecast[];
  skipped: number;
};

/**
 * Groups 3-hourly samples into calendar days. A malformed sample is skipped on
 * its own; a day only survives when at least one of its samples parsed.
 */
export const groupForecast = (samples: readonly unknown[], maxDays = 5): ForecastGrouping => {
  const buckets = new Map<string, DayBucket>();
  let skipped = 0;

  for (const sample of samples) {
    const parsed = forecastSampleSchema.safeParse(sample);
    if (!parsed.success) {
      skipped += 1;
      continue;
    }
    const date = parsed.data.dt_txt.slice(0, 10);
    const bucket = buckets.get(date) ?? { temps: [], rain: [] };
    bucket.temps.push(parsed.data.main.temp);
    bucket.rain.push(Math.trunc((parsed.data.pop ?? 0) * 100));
    buckets.set(date, bucket);
  }

  const days = [...buckets.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .slice(0, Math.max(0, maxDays))
    .map(([date, bucket]) => ({
      date,
      highTemp: Math.max(...bucket.temps),
      lowTemp: Math.min(...bucket.temps),
      rainChance: bucket.rain.length > 0 ? Math.max(...bucket.rain) : 0,
      samples: bucket.temps.length,
    }));

  return { days, skipped };
};
