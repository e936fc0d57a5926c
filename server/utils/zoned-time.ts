export type ZonedTime = {
  hours: number;
  minutes: number;
  seconds: number;
};

const formatters = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timezone: string): Intl.DateTimeFormat => {
  const existing = formatters.get(timezone);
  if (existing) return existing;
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
  } catch {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: "UTC",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
  }
  formatters.set(timezone, formatter);
  return formatter;
};

export const zonedTime = (at: Date, timezone: string): ZonedTime => {
  const parts = formatterFor(timezone).formatToParts(at);
  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = Number(parts.find((part) => part.type === type)?.value ?? 0);
    return Number.isFinite(value) ? value : 0;
  };
  return { hours: read("hour") % 24, minutes: read("minute"), seconds: read("second") };
};

const pad2 = (value: number): string => String(value).padStart(2, "0");

export const formatHoursMinutes = (at: Date | null, timezone: string): string => {
  if (!at) return "--:--";
  const { hours, minutes } = zonedTime(at, timezone);
  return `${pad2(hours)}:${pad2(minutes)}`;
};

export const formatDuration = (minutes: number | null): string => {
  if (minutes === null || !Number.isFinite(minutes)) return "-:--";
  const total = Math.round(minutes);
  return `${Math.floor(total / 60)}:${pad2(total % 60)}`;
};
