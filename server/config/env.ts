// Centralized environment switches for the clock runtime
const readNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const readString = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

export type BasicCredentials = {
  user: string;
  password: string;
};

export type ClockEnv = {
  openWeatherApiKey: string | null;
  httpAuth: BasicCredentials | null;
  fetchTimeoutMs: number;
};

export const readClockEnv = (env: NodeJS.ProcessEnv = process.env): ClockEnv => {
  const user = readString(env.HTTP_AUTH_USER);
  const password = readString(env.HTTP_AUTH_PASS);
  return {
    openWeatherApiKey: readString(env.OPENWEATHER_API_KEY),
    httpAuth: user && password ? { user, password } : null,
    fetchTimeoutMs: Math.max(1000, readNumber(env.CLOCK_FETCH_TIMEOUT_MS, 10_000)),
  };
};
