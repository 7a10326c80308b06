/**
 * Memory
 *
 * Everything that persists between frames: area positions and ordering,
 * interaction ownership, the window being moved, collapsing-header state and
 * free-form per-widget state.
 */

import { Areas } from "./Areas";
import type { Id } from "./Id";
import type { InputState } from "./InputState";
import {
  type InteractionState,
  type WindowInteraction,
  createInteractionState,
} from "./Interaction";

export class Memory {
  interaction: InteractionState = createInteractionState();
  /** The window currently being moved, if any */
  windowInteraction: WindowInteraction | null = null;
  areas = new Areas();
  /** Open/closed state keyed by header Id */
  collapsingHeaders = new Map<string, boolean>();

  /** Persistent state per widget (scroll offsets, text cursors, etc.) */
  private persistent = new Map<string, unknown>();

  /**
   * Called at the start of each frame with the previous frame's input.
   * This is where click and drag ownership is released.
   */
  beginFrame(prevInput: InputState): void {
    const interaction = this.interaction;
    interaction.clickInterest = false;
    interaction.dragInterest = false;

    if (!prevInput.mouse.couldBeClick) {
      interaction.clickId = null;
    }

    if (!prevInput.mouse.down || prevInput.mouse.pos === null) {
      // Button was up last frame: nothing can be in progress
      interaction.clickId = null;
      interaction.dragId = null;
      interaction.dragIsWindow = false;
      this.windowInteraction = null;
    }
  }

  endFrame(): void {
    this.areas.endFrame();
  }

  /**
   * Start moving a window. The window only holds the drag as a placeholder;
   * any widget that asks for the drag on the same press takes it over.
   */
  startWindowMove(windowInteraction: WindowInteraction, id: Id): void {
    this.interaction.dragId = id;
    this.interaction.dragIsWindow = true;
    this.windowInteraction = windowInteraction;
  }

  isCollapsingHeaderOpen(id: Id, defaultOpen: boolean): boolean {
    return this.collapsingHeaders.get(id.value) ?? defaultOpen;
  }

  setCollapsingHeaderOpen(id: Id, open: boolean): void {
    this.collapsingHeaders.set(id.value, open);
  }

  /**
   * Get persistent state for a widget.
   * Returns the default value if no state exists.
   */
  getState<T>(id: Id, defaultValue: T): T {
    return this.persistent.has(id.value) ? (this.persistent.get(id.value) as T) : defaultValue;
  }

  setState<T>(id: Id, value: T): void {
    this.persistent.set(id.value, value);
  }

  deleteState(id: Id): void {
    this.persistent.delete(id.value);
  }

  /** Forget everything. */
  reset(): void {
    this.interaction = createInteractionState();
    this.windowInteraction = null;
    this.areas = new Areas();
    this.collapsingHeaders.clear();
    this.persistent.clear();
  }

  /**
   * Copy for the next generation. Per-widget values are shared by reference;
   * widgets store immutable values there.
   */
  clone(): Memory {
    const copy = new Memory();
    copy.interaction = { ...this.interaction };
    copy.windowInteraction = this.windowInteraction;
    copy.areas = this.areas.clone();
    copy.collapsingHeaders = new Map(this.collapsingHeaders);
    copy.persistent = new Map(this.persistent);
    return copy;
  }
}
