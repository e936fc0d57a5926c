import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { ClockRuntime } from "../server/app";
import { parseClockConfig } from "../server/config/clock-config";
import { MemorySink } from "../server/display/display-sink";

const config = parseClockConfig({
  location: { latitude: 40, longitude: -105, timezone: "UTC" },
  http_server: { enabled: false },
  appearance: { default_view: 5, theme_mode: "day" },
});

const env = { openWeatherApiKey: null, httpAuth: null, fetchTimeoutMs: 1000 };

describe("clock runtime", () => {
  it("renders the default view and shuts every context down once", async () => {
    const sink = new MemorySink();
    const touchStream = new PassThrough();
    const runtime = new ClockRuntime({ config, env, sink, openTouchDevice: async () => touchStream });

    await runtime.start();
    expect(sink.opened).toBe(true);
    expect(runtime.navigation.getPanel()).toBe("solar");
    expect(runtime.touch?.isRunning()).toBe(true);
    await vi.waitFor(() => expect(sink.writes).toBeGreaterThanOrEqual(1));

    const first = runtime.shutdown();
    const second = runtime.shutdown();
    expect(second).toBe(first);
    await first;

    expect(runtime.signal.aborted).toBe(true);
    expect(touchStream.destroyed).toBe(true);
    expect(sink.opened).toBe(false);
  });

  it("propagates a display open failure", async () => {
    const sink = new MemorySink();
    sink.open = async () => Promise.reject(new Error("no framebuffer"));
    const runtime = new ClockRuntime({ config, env, sink, openTouchDevice: async () => new PassThrough() });
    await expect(runtime.start()).rejects.toThrow("no framebuffer");
  });

  it("skips touch when disabled", () => {
    const runtime = new ClockRuntime({
      config: { ...config, touch: { ...config.touch, enabled: false } },
      env,
      sink: new MemorySink(),
    });
    expect(runtime.touch).toBeNull();
  });
});
