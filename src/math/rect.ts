/**
 * Axis-aligned rectangle in screen-space points.
 *
 * `min` is the top-left corner, `max` the bottom-right. A rect with
 * `min > max` on either axis is empty and contains nothing.
 */

import { type Pos2, type Vec2, pos2, vec2 } from "./vec2";

export interface Rect {
  readonly min: Pos2;
  readonly max: Pos2;
}

export function rectFromMinMax(min: Pos2, max: Pos2): Rect {
  return { min, max };
}

export function rectFromMinSize(min: Pos2, size: Vec2): Rect {
  return { min, max: pos2(min.x + size.x, min.y + size.y) };
}

export function rectFromCenterSize(center: Pos2, size: Vec2): Rect {
  return {
    min: pos2(center.x - size.x * 0.5, center.y - size.y * 0.5),
    max: pos2(center.x + size.x * 0.5, center.y + size.y * 0.5),
  };
}

/** A rect containing every finite point. Used as "no clipping". */
export function everything(): Rect {
  return {
    min: pos2(-Infinity, -Infinity),
    max: pos2(Infinity, Infinity),
  };
}

export function width(rect: Rect): number {
  return rect.max.x - rect.min.x;
}

export function height(rect: Rect): number {
  return rect.max.y - rect.min.y;
}

export function size(rect: Rect): Vec2 {
  return vec2(width(rect), height(rect));
}

export function center(rect: Rect): Pos2 {
  return pos2((rect.min.x + rect.max.x) / 2, (rect.min.y + rect.max.y) / 2);
}

export function isEmpty(rect: Rect): boolean {
  return !(rect.min.x <= rect.max.x && rect.min.y <= rect.max.y);
}

/** Inclusive on all edges. */
export function contains(rect: Rect, p: Pos2): boolean {
  return (
    rect.min.x <= p.x && p.x <= rect.max.x && rect.min.y <= p.y && p.y <= rect.max.y
  );
}

/** Grow by `amount` on every side. */
export function expand(rect: Rect, amount: number): Rect {
  return expand2(rect, vec2(amount, amount));
}

/** Grow by `amount.x` left and right, `amount.y` top and bottom. */
export function expand2(rect: Rect, amount: Vec2): Rect {
  return {
    min: pos2(rect.min.x - amount.x, rect.min.y - amount.y),
    max: pos2(rect.max.x + amount.x, rect.max.y + amount.y),
  };
}

export function intersect(a: Rect, b: Rect): Rect {
  return {
    min: pos2(Math.max(a.min.x, b.min.x), Math.max(a.min.y, b.min.y)),
    max: pos2(Math.min(a.max.x, b.max.x), Math.min(a.max.y, b.max.y)),
  };
}

export function translate(rect: Rect, delta: Vec2): Rect {
  return {
    min: pos2(rect.min.x + delta.x, rect.min.y + delta.y),
    max: pos2(rect.max.x + delta.x, rect.max.y + delta.y),
  };
}

/** Swap inverted corners so that min <= max on both axes. */
export function normalizeRect(rect: Rect): Rect {
  return {
    min: pos2(Math.min(rect.min.x, rect.max.x), Math.min(rect.min.y, rect.max.y)),
    max: pos2(Math.max(rect.min.x, rect.max.x), Math.max(rect.min.y, rect.max.y)),
  };
}

export function rectEquals(a: Rect, b: Rect): boolean {
  return (
    a.min.x === b.min.x && a.min.y === b.min.y && a.max.x === b.max.x && a.max.y === b.max.y
  );
}

export type Align = "min" | "center" | "max";

/**
 * Position a rect relative to its own min corner.
 * With `["center", "center"]` the rect is centered on its original min.
 */
export function alignRect(rect: Rect, align: readonly [Align, Align]): Rect {
  const [alignX, alignY] = align;
  const w = width(rect);
  const h = height(rect);
  const dx = alignX === "center" ? -w / 2 : alignX === "max" ? -w : 0;
  const dy = alignY === "center" ? -h / 2 : alignY === "max" ? -h : 0;
  return translate(rect, vec2(dx, dy));
}

export function formatRect(rect: Rect): string {
  return `[${rect.min.x} ${rect.min.y} - ${rect.max.x} ${rect.max.y}]`;
}
