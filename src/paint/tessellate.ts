/**
 * Paint command tessellation
 *
 * Turns the ordered paint stream into indexed triangle batches, one batch
 * per run of commands sharing a clip rect. Filled shapes are outlined as
 * polygons and triangulated with earcut; strokes are extruded into quads.
 */

import earcut from "earcut";
import { type Pos2, perpendicular, pos2 } from "../math/vec2";
import { type Rect, alignRect, isEmpty, rectEquals, rectFromMinSize } from "../math/rect";
import type { Color } from "../types/color";
import type { Fonts } from "../text/types";
import type {
  CircleCmd,
  ClippedPaintCmd,
  LineCmd,
  MeshCmd,
  PaintCmd,
  RectCmd,
  TextCmd,
} from "./PaintCmd";

/** Floats per vertex: x, y, r, g, b, a */
export const VERTEX_STRIDE = 6;

export interface PaintOptions {
  /** Outline each batch's clip rect */
  debugPaintClipRects: boolean;
  /** Segments used for a full circle; rounded corners use a quarter each */
  circleSegments: number;
}

export const DEFAULT_PAINT_OPTIONS: PaintOptions = {
  debugPaintClipRects: false,
  circleSegments: 32,
};

export interface Mesh {
  /** Interleaved [x, y, r, g, b, a] */
  vertices: Float32Array;
  /** Triangle indices */
  indices: Uint32Array;
}

export interface PaintBatch {
  clipRect: Rect;
  mesh: Mesh;
}

/** Tessellation collaborator */
export interface Tessellator {
  tessellate(
    options: PaintOptions,
    fonts: Fonts,
    commands: readonly ClippedPaintCmd[]
  ): PaintBatch[];
}

const CLIP_RECT_DEBUG_COLOR: Color = [1, 0, 1, 1];

/**
 * Accumulates vertices and indices for one batch.
 */
class MeshBuilder {
  readonly vertices: number[] = [];
  readonly indices: number[] = [];

  get vertexCount(): number {
    return this.vertices.length / VERTEX_STRIDE;
  }

  addVertex(p: Pos2, color: Color): void {
    this.vertices.push(p.x, p.y, color[0], color[1], color[2], color[3]);
  }

  /**
   * Fill a simple polygon (clockwise or counter-clockwise).
   */
  fillPolygon(points: readonly Pos2[], color: Color): void {
    if (points.length < 3) return;
    const coords: number[] = [];
    for (const p of points) {
      coords.push(p.x, p.y);
    }
    const base = this.vertexCount;
    for (const p of points) {
      this.addVertex(p, color);
    }
    for (const index of earcut(coords)) {
      this.indices.push(base + index);
    }
  }

  /**
   * Extrude each segment of a path into a quad of the given width.
   */
  strokePath(points: readonly Pos2[], closed: boolean, width: number, color: Color): void {
    if (width <= 0 || points.length < 2) return;
    const half = width / 2;
    const segmentCount = closed ? points.length : points.length - 1;
    for (let i = 0; i < segmentCount; i++) {
      const a = points[i];
      const b = points[(i + 1) % points.length];
      if (!a || !b) continue;
      const n = perpendicular(b.x - a.x, b.y - a.y);
      const base = this.vertexCount;
      this.addVertex(pos2(a.x + n.x * half, a.y + n.y * half), color);
      this.addVertex(pos2(a.x - n.x * half, a.y - n.y * half), color);
      this.addVertex(pos2(b.x + n.x * half, b.y + n.y * half), color);
      this.addVertex(pos2(b.x - n.x * half, b.y - n.y * half), color);
      this.indices.push(base, base + 1, base + 2, base + 1, base + 3, base + 2);
    }
  }

  /** Axis-aligned quad */
  addQuad(min: Pos2, max: Pos2, color: Color): void {
    const base = this.vertexCount;
    this.addVertex(min, color);
    this.addVertex(pos2(max.x, min.y), color);
    this.addVertex(pos2(min.x, max.y), color);
    this.addVertex(max, color);
    this.indices.push(base, base + 1, base + 2, base + 1, base + 3, base + 2);
  }

  addMesh(vertices: readonly number[], indices: readonly number[]): void {
    const base = this.vertexCount;
    this.vertices.push(...vertices);
    for (const index of indices) {
      this.indices.push(base + index);
    }
  }

  build(): Mesh {
    return {
      vertices: new Float32Array(this.vertices),
      indices: new Uint32Array(this.indices),
    };
  }
}

/**
 * Outline of a rect with rounded corners, clockwise from the top-left arc.
 */
export function roundedRectPath(rect: Rect, cornerRadius: number, circleSegments: number): Pos2[] {
  const w = rect.max.x - rect.min.x;
  const h = rect.max.y - rect.min.y;
  const r = Math.max(0, Math.min(cornerRadius, w / 2, h / 2));
  if (r === 0) {
    return [rect.min, pos2(rect.max.x, rect.min.y), rect.max, pos2(rect.min.x, rect.max.y)];
  }

  const steps = Math.max(1, Math.round(circleSegments / 4));
  const corners: [number, number, number][] = [
    [rect.min.x + r, rect.min.y + r, Math.PI],
    [rect.max.x - r, rect.min.y + r, Math.PI * 1.5],
    [rect.max.x - r, rect.max.y - r, 0],
    [rect.min.x + r, rect.max.y - r, Math.PI * 0.5],
  ];
  const path: Pos2[] = [];
  for (const [cx, cy, start] of corners) {
    for (let i = 0; i <= steps; i++) {
      const angle = start + (i / steps) * (Math.PI / 2);
      path.push(pos2(cx + Math.cos(angle) * r, cy + Math.sin(angle) * r));
    }
  }
  return path;
}

export function circlePath(center: Pos2, radius: number, segments: number): Pos2[] {
  const n = Math.max(3, segments);
  const path: Pos2[] = [];
  for (let i = 0; i < n; i++) {
    const angle = (i / n) * Math.PI * 2;
    path.push(pos2(center.x + Math.cos(angle) * radius, center.y + Math.sin(angle) * radius));
  }
  return path;
}

/**
 * Reference tessellator producing flat-colored triangle meshes.
 */
export class MeshTessellator implements Tessellator {
  tessellate(
    options: PaintOptions,
    fonts: Fonts,
    commands: readonly ClippedPaintCmd[]
  ): PaintBatch[] {
    const batches: PaintBatch[] = [];
    let clipRect: Rect | null = null;
    let builder = new MeshBuilder();

    const finish = (): void => {
      if (clipRect === null) return;
      if (options.debugPaintClipRects && !isEmpty(clipRect)) {
        this.outlineClipRect(builder, clipRect, options);
      }
      batches.push({ clipRect, mesh: builder.build() });
    };

    for (const { clipRect: cmdClip, cmd } of commands) {
      if (clipRect === null || !rectEquals(clipRect, cmdClip)) {
        finish();
        clipRect = cmdClip;
        builder = new MeshBuilder();
      }
      this.paintCmd(builder, options, fonts, cmd);
    }
    finish();

    return batches;
  }

  private paintCmd(builder: MeshBuilder, options: PaintOptions, fonts: Fonts, cmd: PaintCmd): void {
    switch (cmd.kind) {
      case "rect":
        this.paintRect(builder, options, cmd);
        break;
      case "circle":
        this.paintCircle(builder, options, cmd);
        break;
      case "line":
        this.paintLine(builder, cmd);
        break;
      case "text":
        this.paintText(builder, fonts, cmd);
        break;
      case "mesh":
        this.paintMesh(builder, cmd);
        break;
    }
  }

  private paintRect(builder: MeshBuilder, options: PaintOptions, cmd: RectCmd): void {
    if (isEmpty(cmd.rect)) return;
    const path = roundedRectPath(cmd.rect, cmd.cornerRadius, options.circleSegments);
    if (cmd.fill) {
      builder.fillPolygon(path, cmd.fill);
    }
    if (cmd.outline) {
      builder.strokePath(path, true, cmd.outline.width, cmd.outline.color);
    }
  }

  private paintCircle(builder: MeshBuilder, options: PaintOptions, cmd: CircleCmd): void {
    if (cmd.radius <= 0) return;
    const path = circlePath(cmd.center, cmd.radius, options.circleSegments);
    if (cmd.fill) {
      builder.fillPolygon(path, cmd.fill);
    }
    if (cmd.outline) {
      builder.strokePath(path, true, cmd.outline.width, cmd.outline.color);
    }
  }

  private paintLine(builder: MeshBuilder, cmd: LineCmd): void {
    builder.strokePath(cmd.points, false, cmd.width, cmd.color);
  }

  /** One quad per visible glyph */
  private paintText(builder: MeshBuilder, fonts: Fonts, cmd: TextCmd): void {
    const galley = fonts.layout(cmd.text, cmd.textStyle, Infinity);
    const origin = alignRect(rectFromMinSize(cmd.pos, galley.size), cmd.align).min;
    for (const glyph of galley.glyphs) {
      if (glyph.char.trim() === "") continue;
      const min = pos2(origin.x + glyph.pos.x, origin.y + glyph.pos.y);
      const max = pos2(min.x + glyph.size.x, min.y + glyph.size.y);
      builder.addQuad(min, max, cmd.color);
    }
  }

  private paintMesh(builder: MeshBuilder, cmd: MeshCmd): void {
    builder.addMesh(cmd.vertices, cmd.indices);
  }

  private outlineClipRect(builder: MeshBuilder, clipRect: Rect, options: PaintOptions): void {
    if (!Number.isFinite(clipRect.min.x) || !Number.isFinite(clipRect.max.x)) return;
    if (!Number.isFinite(clipRect.min.y) || !Number.isFinite(clipRect.max.y)) return;
    builder.strokePath(roundedRectPath(clipRect, 0, options.circleSegments), true, 1, CLIP_RECT_DEBUG_COLOR);
  }
}
