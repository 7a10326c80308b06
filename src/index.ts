/**
 * imframe - per-frame state engine for immediate mode GUIs
 */

export const VERSION = "0.1.0";

export * from "./ui";
export * as vec2 from "./math/vec2";
export * as rect from "./math/rect";
export { clamp, lerp, remap, remapClamp } from "./math/scalar";
export type { Pos2, Vec2 } from "./math/vec2";
export type { Rect, Align } from "./math/rect";
export * from "./types/color";
export * from "./paint/PaintCmd";
export { GraphicLayers } from "./paint/GraphicLayers";
export {
  MeshTessellator,
  DEFAULT_PAINT_OPTIONS,
  VERTEX_STRIDE,
  type Tessellator,
  type PaintOptions,
  type PaintBatch,
  type Mesh,
} from "./paint/tessellate";
export * from "./style/Style";
export { translate, intoPaintCommands, type WidgetCmd, type InteractFlags } from "./style/translate";
export * from "./text/types";
export { MonospaceFonts, createMonospaceFonts } from "./text/MonospaceFonts";
