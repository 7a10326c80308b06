/**
 * Area registry
 *
 * Remembers where each area (window, popup, background) is and keeps the one
 * layer ordering that both painting and hit-testing consult.
 */

import { type Pos2, type Vec2 } from "../math/vec2";
import { contains, expand, rectFromMinSize } from "../math/rect";
import { type Layer, debugLayer, layerEquals, layerKey, orderRank } from "./Layer";

export interface AreaState {
  pos: Pos2;
  size: Vec2;
  /** Whether the area can receive pointer input */
  interactable: boolean;
}

export class Areas {
  /** Keyed by layer id */
  private areas = new Map<string, AreaState>();
  /** Back to front within each order class */
  private layers: Layer[] = [];
  private visibleLastFrame = new Set<string>();
  private visibleCurrentFrame = new Set<string>();
  private wantsToBeOnTop: Layer[] = [];

  count(): number {
    return this.areas.size;
  }

  get(layer: Layer): AreaState | undefined {
    return this.areas.get(layer.id.value);
  }

  /**
   * Record the area's state for this frame. New areas start on top of
   * their order class.
   */
  setState(layer: Layer, state: AreaState): void {
    this.visibleCurrentFrame.add(layerKey(layer));
    this.areas.set(layer.id.value, { ...state });
    if (!this.layers.some((l) => layerEquals(l, layer))) {
      this.layers.push(layer);
    }
  }

  /**
   * The total layer order, back to front: by order class, then by recency
   * within a class. The debug layer is always last.
   */
  order(): Layer[] {
    const ranked = this.layers
      .map((layer, index) => ({ layer, index }))
      .filter(({ layer }) => layer.order !== "debug")
      .sort((a, b) => orderRank(a.layer.order) - orderRank(b.layer.order) || a.index - b.index)
      .map(({ layer }) => layer);
    ranked.push(debugLayer());
    return ranked;
  }

  /**
   * Topmost interactable layer visible last frame whose area, grown by
   * `resizeInteractRadiusSide`, contains `pos`.
   */
  layerAt(pos: Pos2, resizeInteractRadiusSide: number): Layer | null {
    const order = this.order();
    for (let i = order.length - 1; i >= 0; i--) {
      const layer = order[i];
      if (!layer || !this.visibleLastFrame.has(layerKey(layer))) continue;
      const state = this.areas.get(layer.id.value);
      if (!state || !state.interactable) continue;
      const rect = expand(rectFromMinSize(state.pos, state.size), resizeInteractRadiusSide);
      if (contains(rect, pos)) {
        return layer;
      }
    }
    return null;
  }

  isVisible(layer: Layer): boolean {
    return this.visibleLastFrame.has(layerKey(layer));
  }

  /** Raise a layer above the others of its class at the end of the frame. */
  moveToTop(layer: Layer): void {
    this.visibleCurrentFrame.add(layerKey(layer));
    if (!this.wantsToBeOnTop.some((l) => layerEquals(l, layer))) {
      this.wantsToBeOnTop.push(layer);
    }
  }

  /**
   * Forget layers nobody registered this frame and apply pending raises.
   */
  endFrame(): void {
    this.visibleLastFrame = this.visibleCurrentFrame;
    this.visibleCurrentFrame = new Set();
    this.layers = this.layers.filter((l) => this.visibleLastFrame.has(layerKey(l)));
    for (const layer of this.wantsToBeOnTop) {
      this.layers = this.layers.filter((l) => !layerEquals(l, layer));
      this.layers.push(layer);
    }
    this.wantsToBeOnTop = [];
  }

  clone(): Areas {
    const copy = new Areas();
    for (const [key, state] of this.areas) {
      copy.areas.set(key, { ...state });
    }
    copy.layers = [...this.layers];
    copy.visibleLastFrame = new Set(this.visibleLastFrame);
    copy.visibleCurrentFrame = new Set(this.visibleCurrentFrame);
    copy.wantsToBeOnTop = [...this.wantsToBeOnTop];
    return copy;
  }
}
