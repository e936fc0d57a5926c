import { PANEL_IDS, type ClockConfig, type PanelId } from "@shared/clock-config";
import type { ClockEnv } from "./config/env";
import { createControlApp } from "./control/routes";
import { startControlServer, type ControlServerHandle } from "./control/server";
import { createDataProviders, type DataProviders } from "./data/providers";
import { cachedValue } from "./data/timed-cache";
import type { FetchLike } from "./data/weather-provider";
import type { DisplaySink } from "./display/display-sink";
import { NavigationState } from "./navigation/navigation-state";
import { navBarLayout } from "./render/nav-bar";
import { RenderScheduler } from "./render/render-scheduler";
import { ThemeController, type SunWindow } from "./render/theme";
import { transformTouchPoint } from "./touch/coordinate-transformer";
import { GestureClassifier } from "./touch/gesture-classifier";
import { TouchHandler, type OpenTouchDevice } from "./touch/touch-handler";
import { createLogger } from "./utils/log";

const log = createLogger("process");

export type ClockRuntimeOptions = {
  config: ClockConfig;
  env: ClockEnv;
  sink: DisplaySink;
  bindAll?: boolean;
  panels?: readonly PanelId[];
  openTouchDevice?: OpenTouchDevice;
  fetchImpl?: FetchLike;
  now?: () => number;
};

/**
 * Wires navigation, rendering, touch input and the control plane around one
 * shared abort signal. `shutdown()` may be called any number of times.
 */
export class ClockRuntime {
  readonly navigation: NavigationState;
  readonly theme: ThemeController;
  readonly data: DataProviders;
  readonly scheduler: RenderScheduler;
  readonly touch: TouchHandler | null;
  private readonly options: ClockRuntimeOptions;
  private readonly controller = new AbortController();
  private control: ControlServerHandle | null = null;
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: ClockRuntimeOptions) {
    this.options = options;
    const { config, env } = options;
    const now = options.now ?? Date.now;

    this.navigation = new NavigationState(options.panels ?? PANEL_IDS, config.appearance.default_view);
    this.theme = new ThemeController(config.appearance.theme_mode, config.location.timezone);
    this.data = createDataProviders(config, env, {
      fetchImpl: options.fetchImpl,
      onUpdate: () => this.navigation.wake.set(),
      now,
    });
    if (!this.data.weather) {
      log.warn("OPENWEATHER_API_KEY not set; weather and air quality unavailable");
    }

    const { width, height, nav_bar_height: navBarHeight } = config.display;
    this.scheduler = new RenderScheduler({
      navigation: this.navigation,
      sink: options.sink,
      theme: this.theme,
      data: this.data,
      width,
      height,
      navBarHeight,
      timezone: config.location.timezone,
      now,
    });

    const touch = config.touch;
    this.touch = touch.enabled
      ? new TouchHandler({
          device: touch.device,
          navigation: this.navigation,
          layout: navBarLayout(width, height, navBarHeight),
          hitMargin: touch.hit_margin,
          openDevice: options.openTouchDevice,
          classifier: new GestureClassifier({
            swipeThreshold: touch.swipe_threshold,
            tapThreshold: touch.tap_threshold,
            tapTimeoutMs: touch.tap_timeout * 1000,
            now,
            transform: (rawX, rawY) =>
              transformTouchPoint(rawX, rawY, {
                rawMin: touch.raw_min,
                rawMax: touch.raw_max,
                width,
                height,
                swapAxes: touch.swap_axes,
                invertX: touch.invert_x,
                invertY: touch.invert_y,
              }),
          }),
        })
      : null;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  getControlPort(): number | null {
    return this.control?.port ?? null;
  }

  /** Opens the display (a DisplayError propagates), then starts the other contexts. */
  async start(): Promise<void> {
    const { config, env, sink } = this.options;
    await sink.open();

    if (this.touch) {
      await this.touch.start();
    } else {
      log.info("touch input disabled by config");
    }

    const http = config.http_server;
    if (http.enabled) {
      let host = http.bind_address;
      if (this.options.bindAll) {
        host = "0.0.0.0";
        log.warn("control plane bound to all interfaces");
      }
      if (!env.httpAuth && host !== "127.0.0.1" && host !== "localhost") {
        log.warn("control plane is reachable off-host without authentication");
      }
      const app = createControlApp({
        navigation: this.navigation,
        frames: this.scheduler,
        theme: this.theme,
        sunWindow: () => this.sunWindow(),
        ratePerSecond: http.rate_limit_per_second,
        auth: env.httpAuth,
        now: this.options.now,
      });
      try {
        this.control = await startControlServer(app, http.port, host);
      } catch (error) {
        log.error(`control plane failed to listen on ${host}:${http.port}`, error);
      }
    }

    this.loop = this.scheduler.run(this.controller.signal).catch((error: unknown) => {
      log.error("render loop crashed", error);
    });
  }

  /** Resolves when the render loop has exited. */
  finished(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  shutdown(): Promise<void> {
    this.stopping ??= this.stop();
    return this.stopping;
  }

  private async stop(): Promise<void> {
    log.info("shutting down");
    this.controller.abort();
    this.touch?.stop();
    await this.control?.close();
    await this.finished();
    try {
      await this.options.sink.close();
    } catch (error) {
      log.warn("display close failed", error);
    }
    log.info("shutdown complete");
  }

  private async sunWindow(): Promise<SunWindow | null> {
    const solar = cachedValue(await this.data.sunTimes.get());
    return solar ? { sunrise: solar.times.sunrise, sunset: solar.times.sunset } : null;
  }
}
