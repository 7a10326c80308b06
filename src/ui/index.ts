/**
 * Immediate Mode UI System
 *
 * Frame lifecycle, interaction resolution and widget construction.
 */

// Core
export {
  Context,
  type ContextOptions,
  type FrameOutput,
  type FrameStart,
  type PaintStats,
  emptyPaintStats,
} from "./Context";
export { Ui } from "./Ui";
export { Guarded } from "./Guarded";
export { Id, type IdSource, describeSource, sameId } from "./Id";
export { IdRegistry, type IdClash, DEFAULT_ID_CLASH_DISTANCE } from "./IdRegistry";
export {
  InputState,
  type RawInput,
  type InputEvent,
  type MouseInput,
  defaultRawInput,
  MAX_CLICK_DIST,
  MAX_DOUBLE_CLICK_DELAY,
} from "./InputState";
export {
  type InteractionState,
  type InteractInfo,
  type WindowInteraction,
  createInteractionState,
} from "./Interaction";
export { type Layer, type Order, ORDERS, backgroundLayer, debugLayer, layer, layerEquals, layerKey } from "./Layer";
export { Areas, type AreaState } from "./Areas";
export { Memory } from "./Memory";
export { type Output, type CursorIcon, defaultOutput } from "./Output";
export { Sense, sensesNothing } from "./Sense";

// Widgets & containers
export * from "./widgets";
export * from "./containers";
