/**
 * Paint commands
 *
 * Everything the tessellator needs to draw one primitive. Commands are
 * frozen when pushed to the paint buffer.
 */

import type { Pos2 } from "../math/vec2";
import type { Align, Rect } from "../math/rect";
import type { Color } from "../types/color";
import type { TextStyle } from "../text/types";

export interface LineStyle {
  readonly width: number;
  readonly color: Color;
}

export function lineStyle(width: number, color: Color): LineStyle {
  return { width, color };
}

export interface RectCmd {
  readonly kind: "rect";
  readonly rect: Rect;
  readonly cornerRadius: number;
  readonly fill: Color | null;
  readonly outline: LineStyle | null;
}

export interface CircleCmd {
  readonly kind: "circle";
  readonly center: Pos2;
  readonly radius: number;
  readonly fill: Color | null;
  readonly outline: LineStyle | null;
}

/** Open polyline */
export interface LineCmd {
  readonly kind: "line";
  readonly points: readonly Pos2[];
  readonly color: Color;
  readonly width: number;
}

export interface TextCmd {
  readonly kind: "text";
  /** Anchor point; `align` says which part of the text block sits on it */
  readonly pos: Pos2;
  readonly text: string;
  readonly textStyle: TextStyle;
  readonly color: Color;
  readonly align: readonly [Align, Align];
}

/**
 * Already tessellated geometry.
 * Vertices are interleaved [x, y, r, g, b, a].
 */
export interface MeshCmd {
  readonly kind: "mesh";
  readonly vertices: readonly number[];
  readonly indices: readonly number[];
}

export type PaintCmd = RectCmd | CircleCmd | LineCmd | TextCmd | MeshCmd;

export interface ClippedPaintCmd {
  readonly clipRect: Rect;
  readonly cmd: PaintCmd;
}
