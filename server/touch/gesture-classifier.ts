import type { ScreenPoint } from "./coordinate-transformer";

export type Axis = "x" | "y";

export type SwipeDirection = "prev" | "next";

export type GestureNoneReason = "no_contact" | "no_start" | "unclassified";

export type GestureResult =
  | { kind: "swipe"; direction: SwipeDirection; dx: number; dy: number; durationMs: number }
  | { kind: "tap"; x: number; y: number; durationMs: number }
  | { kind: "none"; reason: GestureNoneReason };

export type GestureState = "idle" | "tracking" | "armed";

export type GestureThresholds = {
  swipeThreshold: number;
  tapThreshold: number;
  tapTimeoutMs: number;
};

type TouchStart = ScreenPoint & { t: number };

export type GestureClassifierOptions = GestureThresholds & {
  transform: (rawX: number, rawY: number) => ScreenPoint;
  now?: () => number;
};

/**
 * Turns one touch-down/touch-up cycle into a gesture.
 *
 * Idle → Tracking on down; Tracking → Armed once both axes reported after the
 * down; Armed/Tracking → Idle on up. Samples seen before a down are stale.
 */
export class GestureClassifier {
  private readonly options: GestureClassifierOptions;
  private readonly now: () => number;
  private state: GestureState = "idle";
  private rawX: number | null = null;
  private rawY: number | null = null;
  private start: TouchStart | null = null;
  private current: ScreenPoint = { x: 0, y: 0 };

  constructor(options: GestureClassifierOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  getState(): GestureState {
    return this.state;
  }

  touchDown(): void {
    this.state = "tracking";
    this.rawX = null;
    this.rawY = null;
    this.start = null;
  }

  sample(axis: Axis, value: number): void {
    if (axis === "x") {
      this.rawX = value;
    } else {
      this.rawY = value;
    }
    if (this.state === "idle" || this.rawX === null || this.rawY === null) return;

    this.current = this.options.transform(this.rawX, this.rawY);
    if (this.state === "tracking") {
      this.start = { ...this.current, t: this.now() };
      this.state = "armed";
    }
  }

  touchUp(): GestureResult {
    const state = this.state;
    const start = this.start;
    this.state = "idle";
    this.start = null;
    this.rawX = null;
    this.rawY = null;

    if (state === "idle") return { kind: "none", reason: "no_contact" };
    if (state === "tracking" || !start) return { kind: "none", reason: "no_start" };
    return this.classify(start, this.current, this.now() - start.t);
  }

  private classify(start: TouchStart, current: ScreenPoint, durationMs: number): GestureResult {
    const { swipeThreshold, tapThreshold, tapTimeoutMs } = this.options;
    const dx = current.x - start.x;
    const dy = current.y - start.y;
    const absDx = Math.abs(dx);
    const absDy = Math.abs(dy);

    if (absDx > swipeThreshold && absDx > absDy) {
      // Rightward motion pages back, leftward pages forward.
      return { kind: "swipe", direction: dx > 0 ? "prev" : "next", dx, dy, durationMs };
    }
    if (absDx < tapThreshold && absDy < tapThreshold && durationMs < tapTimeoutMs) {
      return { kind: "tap", x: current.x, y: current.y, durationMs };
    }
    return { kind: "none", reason: "unclassified" };
  }
}
