export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const parseLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

let threshold: LogLevel = parseLevel(process.env.CLOCK_LOG_LEVEL);

export const setLogLevel = (level: LogLevel): void => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

const formatTime = (): string =>
  new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

const formatDetail = (detail: unknown): string => {
  if (detail instanceof Error) return detail.stack ?? detail.message;
  if (typeof detail === "string") return detail;
  try {
    return JSON.stringify(detail);
  } catch {
    return String(detail);
  }
};

export type Logger = {
  debug: (message: string, detail?: unknown) => void;
  info: (message: string, detail?: unknown) => void;
  warn: (message: string, detail?: unknown) => void;
  error: (message: string, detail?: unknown) => void;
};

export const createLogger = (source: string): Logger => {
  const emit = (level: LogLevel, message: string, detail?: unknown) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const suffix = detail === undefined ? "" : ` ${formatDetail(detail)}`;
    const line = `${formatTime()} [${level}] [${source}] ${message}${suffix}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  };
  return {
    debug: (message, detail) => emit("debug", message, detail),
    info: (message, detail) => emit("info", message, detail),
    warn: (message, detail) => emit("warn", message, detail),
    error: (message, detail) => emit("error", message, detail),
  };
};
