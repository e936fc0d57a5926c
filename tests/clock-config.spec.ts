import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultClockConfig } from "@shared/clock-config";
import { ConfigError, loadClockConfig, parseClockConfig } from "../server/config/clock-config";
import { readClockEnv } from "../server/config/env";

describe("clock config", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "solar-clock-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("fills every section with defaults", () => {
    const config = parseClockConfig({});
    expect(config).toEqual(defaultClockConfig());
    expect(config.display).toEqual({ width: 480, height: 320, framebuffer: "/dev/fb1", nav_bar_height: 40 });
    expect(config.touch.swap_axes).toBe(true);
    expect(config.touch.invert_y).toBe(true);
    expect(config.http_server.bind_address).toBe("127.0.0.1");
  });

  it("lists every validation issue", () => {
    let caught: unknown;
    try {
      parseClockConfig({
        location: { latitude: 91 },
        display: { height: 100, nav_bar_height: 200 },
        appearance: { theme_mode: "sepia" },
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues).toContain("location.latitude: Number must be less than or equal to 90");
    expect(issues).toContain("display.nav_bar_height: nav_bar_height must not exceed height");
  });

  it("rejects raw_min at or above raw_max", () => {
    expect(() => parseClockConfig({ touch: { raw_min: 4095, raw_max: 4095 } })).toThrow(ConfigError);
  });

  it("loads the first file on the search path", async () => {
    const file = path.join(dir, "config.json");
    await writeFile(file, JSON.stringify({ location: { name: "Cabin", timezone: "Europe/Oslo" } }));
    const config = await loadClockConfig(undefined, [path.join(dir, "missing.json"), file]);
    expect(config.location.name).toBe("Cabin");
    expect(config.location.timezone).toBe("Europe/Oslo");
    expect(config.location.region).toBe("Unknown");
  });

  it("uses defaults when no file is found", async () => {
    await expect(loadClockConfig(undefined, [path.join(dir, "none.json")])).resolves.toEqual(defaultClockConfig());
  });

  it("fails for a missing explicit path or invalid JSON", async () => {
    await expect(loadClockConfig(path.join(dir, "absent.json"))).rejects.toBeInstanceOf(ConfigError);
    const broken = path.join(dir, "broken.json");
    await writeFile(broken, "{ not json");
    await expect(loadClockConfig(broken)).rejects.toThrow(/^Invalid JSON in config file/);
  });
});

describe("clock env", () => {
  it("enables basic auth only when both halves are set", () => {
    expect(readClockEnv({ HTTP_AUTH_USER: "admin" }).httpAuth).toBeNull();
    expect(readClockEnv({ HTTP_AUTH_USER: "admin", HTTP_AUTH_PASS: "test-secret" }).httpAuth).toEqual({
      user: "admin",
      password: "test-secret",
    });
  });

  it("parses the API key and fetch timeout", () => {
    expect(readClockEnv({}).openWeatherApiKey).toBeNull();
    expect(readClockEnv({ OPENWEATHER_API_KEY: "  " }).openWeatherApiKey).toBeNull();
    expect(readClockEnv({ OPENWEATHER_API_KEY: "test-key" }).openWeatherApiKey).toBe("test-key");
    expect(readClockEnv({}).fetchTimeoutMs).toBe(10_000);
    expect(readClockEnv({ CLOCK_FETCH_TIMEOUT_MS: "abc" }).fetchTimeoutMs).toBe(10_000);
    expect(readClockEnv({ CLOCK_FETCH_TIMEOUT_MS: "250" }).fetchTimeoutMs).toBe(1000);
    expect(readClockEnv({ CLOCK_FETCH_TIMEOUT_MS: "4000" }).fetchTimeoutMs).toBe(4000);
  });
});
