import type { Frame, Rgb } from "./frame";

type Segment = "a" | "b" | "c" | "d" | "e" | "f" | "g";

const DIGIT_SEGMENTS: Record<string, readonly Segment[]> = {
  "0": ["a", "b", "c", "d", "e", "f"],
  "1": ["b", "c"],
  "2": ["a", "b", "d", "e", "g"],
  "3": ["a", "b", "c", "d", "g"],
  "4": ["b", "c", "f", "g"],
  "5": ["a", "c", "d", "f", "g"],
  "6": ["a", "c", "d", "e", "f", "g"],
  "7": ["a", "b", "c"],
  "8": ["a", "b", "c", "d", "e", "f", "g"],
  "9": ["a", "b", "c", "d", "f", "g"],
  "-": ["g"],
};

type Metrics = {
  digitWidth: number;
  thickness: number;
  gap: number;
};

const metricsFor = (height: number): Metrics => {
  const thickness = Math.max(2, Math.round(height / 10));
  return { digitWidth: Math.max(thickness * 3, Math.round(height / 2)), thickness, gap: thickness * 2 };
};

const glyphWidth = (char: string, m: Metrics): number => {
  if (char === ":" || char === ".") return m.thickness;
  if (char === " ") return Math.round(m.digitWidth / 2);
  return m.digitWidth;
};

export const measureSegmentText = (text: string, height: number): number => {
  const m = metricsFor(height);
  let width = 0;
  for (const char of text) {
    width += glyphWidth(char, m) + m.gap;
  }
  return Math.max(0, width - m.gap);
};

const drawSegment = (frame: Frame, segment: Segment, x: number, y: number, h: number, m: Metrics, color: Rgb) => {
  const w = m.digitWidth;
  const t = m.thickness;
  const half = Math.floor(h / 2);
  switch (segment) {
    case "a":
      frame.fillRect({ x, y, width: w, height: t }, color);
      return;
    case "b":
      frame.fillRect({ x: x + w - t, y, width: t, height: half }, color);
      return;
    case "c":
      frame.fillRect({ x: x + w - t, y: y + half, width: t, height: h - half }, color);
      return;
    case "d":
      frame.fillRect({ x, y: y + h - t, width: w, height: t }, color);
      return;
    case "e":
      frame.fillRect({ x, y: y + half, width: t, height: h - half }, color);
      return;
    case "f":
      frame.fillRect({ x, y, width: t, height: half }, color);
      return;
    case "g":
      frame.fillRect({ x, y: y + half - Math.floor(t / 2), width: w, height: t }, color);
      return;
  }
};

/**
 * Draws digits, '-', ':', '.' and spaces as seven-segment glyphs. Other
 * characters advance the cursor without drawing. Returns the drawn width.
 */
export const drawSegmentText = (
  frame: Frame,
  text: string,
  x: number,
  y: number,
  height: number,
  color: Rgb,
): number => {
  const m = metricsFor(height);
  let cursor = x;
  for (const char of text) {
    if (char === ":") {
      frame.fillRect({ x: cursor, y: y + Math.round(height * 0.25), width: m.thickness, height: m.thickness }, color);
      frame.fillRect({ x: cursor, y: y + Math.round(height * 0.7), width: m.thickness, height: m.thickness }, color);
    } else if (char === ".") {
      frame.fillRect({ x: cursor, y: y + height - m.thickness, width: m.thickness, height: m.thickness }, color);
    } else {
      for (const segment of DIGIT_SEGMENTS[char] ?? []) {
        drawSegment(frame, segment, cursor, y, height, m, color);
      }
    }
    cursor += glyphWidth(char, m) + m.gap;
  }
  return Math.max(0, cursor - x - m.gap);
};

export const drawCenteredSegmentText = (
  frame: Frame,
  text: string,
  centerX: number,
  y: number,
  height: number,
  color: Rgb,
): void => {
  drawSegmentText(frame, text, Math.round(centerX - measureSegmentText(text, height) / 2), y, height, color);
};
