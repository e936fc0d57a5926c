import type { PanelId } from "@shared/clock-config";
import type { DataProviders } from "../data/providers";
import { cachedValue } from "../data/timed-cache";
import type { DisplaySink } from "../display/display-sink";
import { metrics } from "../metrics";
import type { NavigationSnapshot, NavigationState } from "../navigation/navigation-state";
import { composeErrorFrame, composePanelFrame, refreshIntervalMs, type FrameRequest } from "../panels";
import { createLogger } from "../utils/log";
import type { Frame } from "./frame";
import { paletteFor, type SunWindow, type ThemeController } from "./theme";

const log = createLogger("render");

export type RenderSchedulerOptions = {
  navigation: NavigationState;
  sink: DisplaySink;
  theme: ThemeController;
  data: DataProviders;
  width: number;
  height: number;
  navBarHeight: number;
  timezone: string;
  now?: () => number;
  intervalFor?: (panel: PanelId) => number;
  compose?: (request: FrameRequest) => Promise<Frame>;
};

export type RenderOutcome = {
  frame: Frame;
  failed: boolean;
};

/**
 * Render loop. Each cycle consumes the navigation wake latch, renders the
 * panel at the current index, writes it to the sink and then waits for the
 * panel's refresh interval, a navigation step, or abort.
 */
export class RenderScheduler {
  private readonly options: RenderSchedulerOptions;
  private readonly now: () => number;
  private readonly intervalFor: (panel: PanelId) => number;
  private readonly compose: (request: FrameRequest) => Promise<Frame>;
  private lastFrame: Frame | null = null;
  private cycles = 0;

  constructor(options: RenderSchedulerOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.intervalFor = options.intervalFor ?? refreshIntervalMs;
    this.compose = options.compose ?? composePanelFrame;
  }

  getLastFrame(): Frame | null {
    return this.lastFrame;
  }

  getCycleCount(): number {
    return this.cycles;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { navigation, sink } = this.options;
    const wake = navigation.wake;
    log.info("render loop started");

    while (!signal.aborted) {
      // Latch consumed before the index is read: a step landing mid-render re-arms it.
      wake.consume();
      const snapshot = navigation.snapshot();
      const { frame, failed } = await this.render(snapshot);

      try {
        await sink.write(frame);
      } catch (error) {
        log.error(`display write failed for ${snapshot.panel}`, error);
      }
      this.lastFrame = frame;
      this.cycles += 1;
      if (!failed) metrics.framesRendered.inc({ panel: snapshot.panel });

      const reason = await wake.wait(this.intervalFor(snapshot.panel), signal);
      if (reason === "aborted") break;
      if (reason === "signalled") log.debug(`woken early on ${snapshot.panel}`);
    }

    log.info("render loop stopped");
  }

  /** On-demand render of the active panel; never touches the sink. */
  async renderCurrent(): Promise<Frame> {
    const { frame } = await this.render(this.options.navigation.snapshot());
    return frame;
  }

  private async render(snapshot: NavigationSnapshot): Promise<RenderOutcome> {
    const request = await this.buildRequest(snapshot);
    try {
      return { frame: await this.compose(request), failed: false };
    } catch (error) {
      metrics.renderFailures.inc({ panel: snapshot.panel });
      log.error(`panel ${snapshot.panel} failed to render`, error);
      return { frame: composeErrorFrame(request), failed: true };
    }
  }

  private async buildRequest(snapshot: NavigationSnapshot): Promise<FrameRequest> {
    const { options } = this;
    const now = new Date(this.now());
    const solar = cachedValue(await options.data.sunTimes.get());
    const sun: SunWindow | null = solar ? { sunrise: solar.times.sunrise, sunset: solar.times.sunset } : null;
    return {
      panel: snapshot.panel,
      index: snapshot.index,
      count: snapshot.count,
      width: options.width,
      height: options.height,
      navBarHeight: options.navBarHeight,
      palette: paletteFor(options.theme.resolve(now, sun)),
      now,
      timezone: options.timezone,
      data: options.data,
    };
  }
}
