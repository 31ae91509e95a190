/**
 * 8-bit RGB triple, one integer per channel (0-255).
 */
export type Rgb = readonly [r: number, g: number, b: number];

/**
 * CIE 1931 chromaticity pair as the hub expects it. z is implied (1 - x - y).
 */
export interface Xy {
  x: number;
  y: number;
}

export const BLACK: Rgb = [0, 0, 0];

// Wide-gamut RGB D65 matrix the hub documentation publishes.
const TO_X = [0.649926, 0.103455, 0.197109] as const;
const TO_Y = [0.234327, 0.743075, 0.022598] as const;
const TO_Z = [0.0, 0.053077, 1.035763] as const;

const LINEAR_THRESHOLD = 0.04045;
const GAMMA = 2.2;

/**
 * Decodes one normalized channel to linear light.
 *
 * The exponent is 2.2 rather than the sRGB 2.4 (and there is no offset):
 * light colors have been tuned against this curve, keep it.
 */
export function gammaDecode(value: number): number {
  return value > LINEAR_THRESHOLD ? Math.pow(value, GAMMA) : value / 12.92;
}

/**
 * Converts an 8-bit RGB color to the xy chromaticity used by the hub.
 * All-black input has no chromaticity and maps to (0, 0).
 */
export function rgbToXy(r: number, g: number, b: number): Xy {
  const red = gammaDecode(r / 255);
  const green = gammaDecode(g / 255);
  const blue = gammaDecode(b / 255);

  const X = red * TO_X[0] + green * TO_X[1] + blue * TO_X[2];
  const Y = red * TO_Y[0] + green * TO_Y[1] + blue * TO_Y[2];
  const Z = red * TO_Z[0] + green * TO_Z[1] + blue * TO_Z[2];

  const sum = X + Y + Z;
  if (sum === 0) {
    return { x: 0, y: 0 };
  }

  return { x: X / sum, y: Y / sum };
}

export function formatRgb([r, g, b]: Rgb): string {
  return `(${r}, ${g}, ${b})`;
}
