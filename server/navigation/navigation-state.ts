import type { PanelId } from "@shared/clock-config";
import { metrics } from "../metrics";
import { WakeSignal } from "./wake-signal";

export type NavigationSource = "touch" | "control";

export type NavigationSnapshot = {
  panel: PanelId;
  index: number;
  count: number;
};

/**
 * Single owner of the active panel index. Every mutation is one synchronous
 * read-modify-write, so touch and control callers are serialized by the event
 * loop and readers never see a half-applied step.
 */
export class NavigationState {
  readonly wake: WakeSignal;
  private readonly panels: readonly PanelId[];
  private index: number;

  constructor(panels: readonly PanelId[], initialIndex = 0, wake: WakeSignal = new WakeSignal()) {
    if (panels.length === 0) {
      throw new RangeError("navigation needs at least one panel");
    }
    this.panels = [...panels];
    this.index = Number.isInteger(initialIndex) && initialIndex >= 0 && initialIndex < panels.length ? initialIndex : 0;
    this.wake = wake;
    metrics.activePanelIndex.set(this.index);
  }

  next(source: NavigationSource = "control"): NavigationSnapshot {
    return this.step(1, source);
  }

  prev(source: NavigationSource = "control"): NavigationSnapshot {
    return this.step(-1, source);
  }

  getIndex(): number {
    return this.index;
  }

  getCount(): number {
    return this.panels.length;
  }

  getPanel(): PanelId {
    return this.panelAt(this.index);
  }

  snapshot(): NavigationSnapshot {
    const index = this.index;
    return { panel: this.panelAt(index), index, count: this.panels.length };
  }

  private panelAt(index: number): PanelId {
    const panel = this.panels[index];
    if (panel === undefined) {
      throw new RangeError(`panel index ${index} out of range`);
    }
    return panel;
  }

  private step(delta: 1 | -1, source: NavigationSource): NavigationSnapshot {
    const count = this.panels.length;
    this.index = (this.index + delta + count) % count;
    const result = this.snapshot();
    metrics.navigationSteps.inc({ direction: delta > 0 ? "next" : "prev", source });
    metrics.activePanelIndex.set(result.index);
    this.wake.set();
    return result;
  }
}
