export type TouchCalibration = {
  rawMin: number;
  rawMax: number;
  width: number;
  height: number;
  /** Panel mounted rotated 90°: raw X drives screen Y and raw Y drives screen X. */
  swapAxes: boolean;
  invertX: boolean;
  invertY: boolean;
};

export type ScreenPoint = {
  x: number;
  y: number;
};

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

const normalize = (raw: number, rawMin: number, rawMax: number): number => {
  const span = rawMax - rawMin;
  if (span <= 0) return 0;
  return (clamp(raw, rawMin, rawMax) - rawMin) / span;
};

const toPixel = (normalized: number, extent: number): number =>
  clamp(Math.floor(normalized * extent), 0, Math.max(0, extent - 1));

/**
 * Maps one raw controller reading onto screen pixels. Out-of-range raw values
 * are clamped, and the result always lies inside the display.
 */
export const transformTouchPoint = (
  rawX: number,
  rawY: number,
  calibration: TouchCalibration,
): ScreenPoint => {
  const nx = normalize(rawX, calibration.rawMin, calibration.rawMax);
  const ny = normalize(rawY, calibration.rawMin, calibration.rawMax);
  let sx = calibration.swapAxes ? ny : nx;
  let sy = calibration.swapAxes ? nx : ny;
  if (calibration.invertX) sx = 1 - sx;
  if (calibration.invertY) sy = 1 - sy;
  return {
    x: toPixel(sx, calibration.width),
    y: toPixel(sy, calibration.height),
  };
};
