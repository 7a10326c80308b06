/**
 * RGBA colors, each channel in the 0-1 range.
 */

export type Color = readonly [number, number, number, number];

/** Build a color from 0-255 sRGB(A) components. */
export function srgba(r: number, g: number, b: number, a: number = 255): Color {
  return [r / 255, g / 255, b / 255, a / 255];
}

/** Gray level `l` with alpha `a`, both 0-255. */
export function gray(l: number, a: number = 255): Color {
  return srgba(l, l, l, a);
}

export const WHITE: Color = srgba(255, 255, 255);
export const RED: Color = srgba(255, 0, 0);
export const YELLOW: Color = srgba(255, 255, 0);
