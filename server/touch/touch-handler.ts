import { open } from "node:fs/promises";
import type { Readable } from "node:stream";
import { metrics } from "../metrics";
import type { NavigationState } from "../navigation/navigation-state";
import { resolveNavTarget, type NavBarLayout } from "../render/nav-bar";
import { createLogger } from "../utils/log";
import { EvdevDecoder, type TouchInputEvent } from "./evdev";
import type { GestureClassifier, GestureResult } from "./gesture-classifier";

const log = createLogger("touch");

export type OpenTouchDevice = (path: string) => Promise<Readable>;

export type TouchHandlerOptions = {
  device: string;
  navigation: NavigationState;
  classifier: GestureClassifier;
  layout: NavBarLayout;
  hitMargin: number;
  openDevice?: OpenTouchDevice;
};

const openEvdevStream: OpenTouchDevice = async (path) => {
  const handle = await open(path, "r");
  return handle.createReadStream();
};

const errorCode = (error: unknown): string | null =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : null;

/**
 * Reads the touch device, classifies each contact and applies the resulting
 * navigation step. Device failures disable touch without affecting the rest
 * of the runtime.
 */
export class TouchHandler {
  private readonly options: TouchHandlerOptions;
  private readonly decoder = new EvdevDecoder();
  private stream: Readable | null = null;
  private stopped = false;

  constructor(options: TouchHandlerOptions) {
    this.options = options;
  }

  isRunning(): boolean {
    return this.stream !== null;
  }

  async start(): Promise<boolean> {
    const { device } = this.options;
    const openDevice = this.options.openDevice ?? openEvdevStream;
    let stream: Readable;
    try {
      stream = await openDevice(device);
    } catch (error) {
      const code = errorCode(error);
      if (code === "ENOENT") {
        log.warn(`touch device ${device} not found; touch disabled`);
      } else if (code === "EACCES" || code === "EPERM") {
        log.warn(`no permission to read ${device}; touch disabled`);
      } else {
        log.error(`cannot open touch device ${device}; touch disabled`, error);
      }
      return false;
    }

    if (this.stopped) {
      stream.destroy();
      return false;
    }

    this.stream = stream;
    stream.on("data", (chunk: Buffer | string) => {
      const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      for (const event of this.decoder.push(bytes)) {
        this.handleEvent(event);
      }
    });
    stream.on("error", (error: Error) => {
      log.error(`touch device ${device} read failed; touch stopped`, error);
      this.stop();
    });
    stream.on("end", () => {
      if (!this.stopped) log.warn(`touch device ${device} closed`);
      this.stream = null;
    });
    log.info(`listening for touch on ${device}`);
    return true;
  }

  stop(): void {
    this.stopped = true;
    const stream = this.stream;
    this.stream = null;
    if (stream && !stream.destroyed) {
      stream.destroy();
    }
  }

  handleEvent(event: TouchInputEvent): void {
    const { classifier } = this.options;
    switch (event.kind) {
      case "down":
        classifier.touchDown();
        return;
      case "sample":
        classifier.sample(event.axis, event.value);
        return;
      case "up":
        this.dispatch(classifier.touchUp());
        return;
    }
  }

  private dispatch(gesture: GestureResult): void {
    const { navigation, layout, hitMargin } = this.options;
    metrics.gestures.inc({ kind: gesture.kind });

    if (gesture.kind === "swipe") {
      const result = gesture.direction === "next" ? navigation.next("touch") : navigation.prev("touch");
      log.debug(`swipe ${gesture.direction} (dx=${gesture.dx}) -> ${result.panel}`);
      return;
    }
    if (gesture.kind === "tap") {
      const target = resolveNavTarget(layout, gesture.x, gesture.y, hitMargin);
      if (!target) {
        log.debug(`tap at ${gesture.x},${gesture.y} outside nav buttons`);
        return;
      }
      const result = target === "next" ? navigation.next("touch") : navigation.prev("touch");
      log.debug(`tap ${target} -> ${result.panel}`);
      return;
    }
    log.debug(`no gesture (${gesture.reason})`);
  }
}
