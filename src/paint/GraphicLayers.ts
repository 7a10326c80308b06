/**
 * Paint command buffer
 *
 * Collects paint commands per layer during a frame. At the end of the frame
 * the buffer is drained in the layer order kept by the area registry.
 */

import type { Rect } from "../math/rect";
import { type Layer, layerKey } from "../ui/Layer";
import type { ClippedPaintCmd, PaintCmd } from "./PaintCmd";

export class GraphicLayers {
  private readonly lists = new Map<string, ClippedPaintCmd[]>();
  /** Layers already reported as missing from the order, shared across frames */
  private readonly warned: Set<string>;

  constructor(warned: Set<string> = new Set()) {
    this.warned = warned;
  }

  /** An empty buffer for the next frame that remembers which layers were reported */
  successor(): GraphicLayers {
    return new GraphicLayers(this.warned);
  }

  /**
   * Append a command to a layer. Insertion order within a layer is kept.
   */
  push(layer: Layer, clipRect: Rect, cmd: PaintCmd): void {
    const key = layerKey(layer);
    let list = this.lists.get(key);
    if (!list) {
      list = [];
      this.lists.set(key, list);
    }
    list.push(Object.freeze({ clipRect, cmd: detach(cmd) }));
  }

  /** Commands queued on a layer so far */
  list(layer: Layer): readonly ClippedPaintCmd[] {
    return this.lists.get(layerKey(layer)) ?? [];
  }

  isEmpty(): boolean {
    for (const list of this.lists.values()) {
      if (list.length > 0) return false;
    }
    return true;
  }

  /**
   * Take every command, layer by layer in `order`. Layers that are not in
   * `order` are dropped. The buffer is empty afterwards.
   */
  drain(order: readonly Layer[]): ClippedPaintCmd[] {
    const out: ClippedPaintCmd[] = [];
    const seen = new Set<string>();
    for (const layer of order) {
      const key = layerKey(layer);
      if (seen.has(key)) continue;
      seen.add(key);
      const list = this.lists.get(key);
      if (list) {
        out.push(...list);
      }
    }

    for (const [key, list] of this.lists) {
      if (!seen.has(key) && list.length > 0 && !this.warned.has(key)) {
        this.warned.add(key);
        console.warn(
          `[GraphicLayers] Dropping ${list.length} paint command(s) on unregistered layer ${key}`
        );
      }
    }

    this.lists.clear();
    return out;
  }
}

/** Frozen copy of a command that shares no arrays with the caller */
function detach(cmd: PaintCmd): PaintCmd {
  switch (cmd.kind) {
    case "line":
      return Object.freeze({ ...cmd, points: Object.freeze([...cmd.points]) });
    case "mesh":
      return Object.freeze({
        ...cmd,
        vertices: Object.freeze([...cmd.vertices]),
        indices: Object.freeze([...cmd.indices]),
      });
    default:
      return Object.freeze({ ...cmd });
  }
}
