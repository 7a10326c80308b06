/**
 * 2D vector and point utilities.
 *
 * All values are plain immutable objects; every function returns a new value.
 */

/** A direction or size in points */
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

/** A screen position in points. Same shape as Vec2, named for intent. */
export type Pos2 = Vec2;

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function pos2(x: number, y: number): Pos2 {
  return { x, y };
}

export const ZERO: Vec2 = { x: 0, y: 0 };

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, factor: number): Vec2 {
  return { x: v.x * factor, y: v.y * factor };
}

export function length(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

export function distance(a: Pos2, b: Pos2): number {
  return length(sub(a, b));
}

export function equals(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Normalize a vector.
 * Returns the zero vector for zero-length input.
 */
export function normalize(v: Vec2): Vec2 {
  const len = length(v);
  if (len > 0) {
    return { x: v.x / len, y: v.y / len };
  }
  return ZERO;
}

/**
 * Unit normal of a segment direction (90 degrees CCW).
 */
export function perpendicular(dx: number, dy: number): Vec2 {
  return normalize({ x: -dy, y: dx });
}
