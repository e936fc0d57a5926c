import { z } from "zod";

export const PANEL_IDS = [
  "clock",
  "weather",
  "airquality",
  "sunpath",
  "daylength",
  "solar",
  "moon",
  "analemma",
  "analogclock",
] as const;

export const panelIdSchema = z.enum(PANEL_IDS);
export type PanelId = z.infer<typeof panelIdSchema>;

export const themeModeSchema = z.enum(["auto", "day", "night"]);
export type ThemeMode = z.infer<typeof themeModeSchema>;

export const unitsSchema = z.enum(["imperial", "metric"]);
export type Units = z.infer<typeof unitsSchema>;

export const locationConfigSchema = z.object({
  name: z.string().default("Unknown"),
  region: z.string().default("Unknown"),
  timezone: z.string().min(1, "timezone must not be empty").default("UTC"),
  latitude: z.number().min(-90).max(90).default(0),
  longitude: z.number().min(-180).max(180).default(0),
});
export type LocationConfig = z.infer<typeof locationConfigSchema>;

export const displayConfigSchema = z
  .object({
    width: z.number().int().positive().default(480),
    height: z.number().int().positive().default(320),
    framebuffer: z.string().default("/dev/fb1"),
    nav_bar_height: z.number().int().nonnegative().default(40),
  })
  .refine((display) => display.nav_bar_height <= display.height, {
    message: "nav_bar_height must not exceed height",
    path: ["nav_bar_height"],
  });
export type DisplayConfig = z.infer<typeof displayConfigSchema>;

export const httpServerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(8080),
  bind_address: z.string().default("127.0.0.1"),
  rate_limit_per_second: z.number().int().nonnegative().default(10),
});
export type HttpServerConfig = z.infer<typeof httpServerConfigSchema>;

export const weatherConfigSchema = z.object({
  update_interval_seconds: z.number().int().min(60).default(900),
  units: unitsSchema.default("imperial"),
});
export type WeatherConfig = z.infer<typeof weatherConfigSchema>;

export const airQualityConfigSchema = z.object({
  update_interval_seconds: z.number().int().min(60).default(1800),
});
export type AirQualityConfig = z.infer<typeof airQualityConfigSchema>;

export const touchConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    device: z.string().default("/dev/input/event0"),
    swipe_threshold: z.number().int().positive().default(80),
    tap_threshold: z.number().int().positive().default(30),
    tap_timeout: z.number().positive().default(0.4),
    raw_min: z.number().int().default(0),
    raw_max: z.number().int().default(4095),
    swap_axes: z.boolean().default(true),
    invert_x: z.boolean().default(false),
    invert_y: z.boolean().default(true),
    hit_margin: z.number().int().nonnegative().default(10),
  })
  .refine((touch) => touch.raw_min < touch.raw_max, {
    message: "raw_min must be below raw_max",
    path: ["raw_max"],
  });
export type TouchConfig = z.infer<typeof touchConfigSchema>;

export const appearanceConfigSchema = z.object({
  default_view: z
    .number()
    .int()
    .min(0)
    .max(PANEL_IDS.length - 1)
    .default(0),
  theme_mode: themeModeSchema.default("auto"),
});
export type AppearanceConfig = z.infer<typeof appearanceConfigSchema>;

export const clockConfigSchema = z.object({
  location: locationConfigSchema.default({}),
  display: displayConfigSchema.default({}),
  http_server: httpServerConfigSchema.default({}),
  weather: weatherConfigSchema.default({}),
  air_quality: airQualityConfigSchema.default({}),
  touch: touchConfigSchema.default({}),
  appearance: appearanceConfigSchema.default({}),
});
export type ClockConfig = z.infer<typeof clockConfigSchema>;

export const defaultClockConfig = (): ClockConfig => clockConfigSchema.parse({});
