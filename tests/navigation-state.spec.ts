import { describe, expect, it } from "vitest";
import { PANEL_IDS } from "@shared/clock-config";
import { NavigationState } from "../server/navigation/navigation-state";

describe("navigation state", () => {
  it("wraps in both directions", () => {
    const nav = new NavigationState(PANEL_IDS);
    expect(nav.prev()).toEqual({ panel: "analogclock", index: 8, count: 9 });
    expect(nav.next()).toEqual({ panel: "clock", index: 0, count: 9 });
    expect(nav.next()).toEqual({ panel: "weather", index: 1, count: 9 });
  });

  it("returns to the start after count steps", () => {
    const nav = new NavigationState(PANEL_IDS, 3);
    for (let i = 0; i < nav.getCount(); i += 1) nav.next("touch");
    expect(nav.getIndex()).toBe(3);
    for (let i = 0; i < nav.getCount(); i += 1) nav.prev("touch");
    expect(nav.getIndex()).toBe(3);
  });

  it("serializes interleaved callers without losing steps", async () => {
    const nav = new NavigationState(PANEL_IDS);
    const callers = Array.from({ length: 50 }, (_, i) =>
      Promise.resolve().then(() => (i % 2 === 0 ? nav.next("touch") : nav.next("control"))),
    );
    await Promise.all(callers);
    expect(nav.getIndex()).toBe(50 % 9);
  });

  it("latches the wake signal on every step", () => {
    const nav = new NavigationState(PANEL_IDS);
    expect(nav.wake.isSet()).toBe(false);
    nav.next();
    expect(nav.wake.isSet()).toBe(true);
    nav.wake.consume();
    nav.prev();
    expect(nav.wake.isSet()).toBe(true);
  });

  it("falls back to the first panel for an out-of-range initial index", () => {
    expect(new NavigationState(PANEL_IDS, 12).getPanel()).toBe("clock");
    expect(new NavigationState(PANEL_IDS, 2).getPanel()).toBe("airquality");
  });

  it("rejects an empty panel list", () => {
    expect(() => new NavigationState([])).toThrow(RangeError);
  });
});
