/**
 * Interaction ownership
 *
 * At most one widget owns an in-progress click and at most one owns an
 * in-progress drag. Ownership is an Id comparison, never a reference to a
 * widget, because widgets do not outlive the frame that declares them.
 */

import type { Rect } from "../math/rect";
import type { Id } from "./Id";
import type { Layer } from "./Layer";

export interface InteractionState {
  /** Widget that started the current click, if any */
  clickId: Id | null;
  /** Widget being dragged, if any */
  dragId: Id | null;
  /**
   * `dragId` is a window-drag placeholder. A widget that wants the drag may
   * take it over.
   */
  dragIsWindow: boolean;
  /** Some hovered widget wants clicks this frame */
  clickInterest: boolean;
  /** Some hovered widget wants drags this frame */
  dragInterest: boolean;
}

export function createInteractionState(): InteractionState {
  return {
    clickId: null,
    dragId: null,
    dragIsWindow: false,
    clickInterest: false,
    dragInterest: false,
  };
}

/** A window being moved by the pointer */
export interface WindowInteraction {
  readonly areaLayer: Layer;
  readonly startRect: Rect;
  readonly kind: "move";
}

/** Result of resolving one region against the pointer */
export interface InteractInfo {
  /** The region as passed in, before click-target enlargement */
  readonly rect: Rect;
  /** The pointer is over the region (and, while a button is held, owns it) */
  readonly hovered: boolean;
  /** Pressed and released on this region */
  readonly clicked: boolean;
  readonly doubleClicked: boolean;
  /** This region owns the current click or drag */
  readonly active: boolean;
}
