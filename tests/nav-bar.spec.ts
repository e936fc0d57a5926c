import { describe, expect, it } from "vitest";
import { Frame } from "../server/render/frame";
import { drawNavBar, navBarLayout, resolveNavTarget } from "../server/render/nav-bar";
import { DAY_PALETTE } from "../server/render/theme";

describe("navigation bar", () => {
  const layout = navBarLayout(480, 320, 40);

  it("places buttons at the bar edges", () => {
    expect(layout).toEqual({
      top: 280,
      prevButton: { x: 10, y: 285, width: 50, height: 30 },
      nextButton: { x: 420, y: 285, width: 50, height: 30 },
    });
  });

  it("resolves taps on and around the buttons", () => {
    expect(resolveNavTarget(layout, 35, 300, 10)).toBe("prev");
    expect(resolveNavTarget(layout, 0, 280, 10)).toBe("prev");
    expect(resolveNavTarget(layout, 69, 319, 10)).toBe("prev");
    expect(resolveNavTarget(layout, 70, 300, 10)).toBeNull();
    expect(resolveNavTarget(layout, 445, 300, 10)).toBe("next");
    expect(resolveNavTarget(layout, 410, 300, 10)).toBe("next");
    expect(resolveNavTarget(layout, 409, 300, 10)).toBeNull();
    expect(resolveNavTarget(layout, 240, 300, 10)).toBeNull();
  });

  it("never resolves taps above the bar", () => {
    expect(resolveNavTarget(layout, 35, 279, 10)).toBeNull();
    expect(resolveNavTarget(layout, 35, 276, 10)).toBeNull();
  });

  it("draws buttons and highlights the active page dot", () => {
    const frame = new Frame(480, 320, [0, 0, 0]);
    drawNavBar(frame, 40, 0, 7, DAY_PALETTE);
    expect(frame.getPixel(30, 300)).toEqual(DAY_PALETTE.navButton);
    expect(frame.getPixel(10, 285)).toEqual(DAY_PALETTE.navOutline);
    // Seven dots 14px apart centred on 240: the first sits at x=198.
    expect(frame.getPixel(198, 300)).toEqual(DAY_PALETTE.foreground);
    expect(frame.getPixel(212, 300)).toEqual(DAY_PALETTE.dim);
  });
});
