import type { Frame, Rect } from "./frame";
import type { Palette } from "./theme";

const BUTTON_INSET = 10;
const BUTTON_WIDTH = 50;
const BUTTON_HEIGHT = 30;
const DOT_RADIUS = 4;
const DOT_SPACING = 14;

export type NavBarLayout = {
  top: number;
  prevButton: Rect;
  nextButton: Rect;
};

export type NavTarget = "prev" | "next";

export const navBarLayout = (width: number, height: number, navBarHeight: number): NavBarLayout => {
  const top = height - navBarHeight;
  const buttonHeight = Math.min(BUTTON_HEIGHT, navBarHeight);
  const buttonY = top + Math.floor((navBarHeight - buttonHeight) / 2);
  return {
    top,
    prevButton: { x: BUTTON_INSET, y: buttonY, width: BUTTON_WIDTH, height: buttonHeight },
    nextButton: {
      x: width - BUTTON_INSET - BUTTON_WIDTH,
      y: buttonY,
      width: BUTTON_WIDTH,
      height: buttonHeight,
    },
  };
};

const withinExpanded = (rect: Rect, x: number, y: number, margin: number): boolean =>
  x >= rect.x - margin &&
  x < rect.x + rect.width + margin &&
  y >= rect.y - margin &&
  y < rect.y + rect.height + margin;

/**
 * Resolves a tap to a navigation button. Hit rectangles extend `margin` pixels
 * past the drawn buttons but never leave the navigation bar.
 */
export const resolveNavTarget = (
  layout: NavBarLayout,
  x: number,
  y: number,
  margin: number,
): NavTarget | null => {
  if (y < layout.top) return null;
  if (withinExpanded(layout.prevButton, x, y, margin)) return "prev";
  if (withinExpanded(layout.nextButton, x, y, margin)) return "next";
  return null;
};

const drawChevron = (frame: Frame, rect: Rect, pointLeft: boolean, palette: Palette) => {
  const cx = rect.x + rect.width / 2;
  const cy = rect.y + rect.height / 2;
  const reach = Math.max(3, Math.floor(rect.height / 4));
  const tipX = pointLeft ? cx - reach / 2 : cx + reach / 2;
  const tailX = pointLeft ? cx + reach / 2 : cx - reach / 2;
  frame.drawLine(tailX, cy - reach, tipX, cy, palette.foreground, 2);
  frame.drawLine(tipX, cy, tailX, cy + reach, palette.foreground, 2);
};

export const drawNavBar = (
  frame: Frame,
  navBarHeight: number,
  currentIndex: number,
  totalPanels: number,
  palette: Palette,
): void => {
  if (navBarHeight <= 0) return;
  const layout = navBarLayout(frame.width, frame.height, navBarHeight);
  frame.fillRect({ x: 0, y: layout.top, width: frame.width, height: navBarHeight }, palette.background);

  for (const [button, pointLeft] of [
    [layout.prevButton, true],
    [layout.nextButton, false],
  ] as const) {
    frame.fillRect(button, palette.navButton);
    frame.strokeRect(button, palette.navOutline);
    drawChevron(frame, button, pointLeft, palette);
  }

  const totalWidth = (totalPanels - 1) * DOT_SPACING;
  const startX = Math.floor((frame.width - totalWidth) / 2);
  const dotY = layout.top + Math.floor(navBarHeight / 2);
  for (let i = 0; i < totalPanels; i += 1) {
    const color = i === currentIndex ? palette.foreground : palette.dim;
    frame.fillCircle(startX + i * DOT_SPACING, dotY, DOT_RADIUS, color);
  }
};
