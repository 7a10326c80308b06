/**
 * Scalar helpers shared by layout and painting.
 */

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Exact at both ends: lerp(a, b, 0) === a and lerp(a, b, 1) === b */
export function lerp(from: number, to: number, t: number): number {
  return (1 - t) * from + t * to;
}

/**
 * Linearly map `value` from [fromMin, fromMax] to [toMin, toMax].
 */
export function remap(
  value: number,
  fromMin: number,
  fromMax: number,
  toMin: number,
  toMax: number
): number {
  const t = (value - fromMin) / (fromMax - fromMin);
  return lerp(toMin, toMax, t);
}

/**
 * Like remap, but clamps `value` to the source range first.
 * A degenerate source range maps to the start of the target range.
 */
export function remapClamp(
  value: number,
  fromMin: number,
  fromMax: number,
  toMin: number,
  toMax: number
): number {
  if (fromMax === fromMin || Number.isNaN(value)) {
    return toMin;
  }
  const lo = Math.min(fromMin, fromMax);
  const hi = Math.max(fromMin, fromMax);
  const t = (clamp(value, lo, hi) - fromMin) / (fromMax - fromMin);
  return lerp(toMin, toMax, t);
}
