/**
 * Area container
 *
 * A floating region on its own layer (a window, a popup). Its position is
 * kept in memory; a movable area can be dragged by any part of it that no
 * widget claims.
 */

import { type Pos2, type Vec2, add } from "../../math/vec2";
import { type Rect, rectFromMinSize } from "../../math/rect";
import type { Context } from "../Context";
import { Id, type IdSource, sameId } from "../Id";
import { type Layer, type Order, layerEquals } from "../Layer";
import { Ui } from "../Ui";

export interface AreaConfig {
  id: IdSource;
  /** Defaults to "middle" (windows) */
  order?: Order;
  /** Position the first time the area is shown */
  defaultPos: Pos2;
  size: Vec2;
  /** Pressing on free space starts a window move. Default true. */
  movable?: boolean;
  /** Receives pointer input. Default true. */
  interactable?: boolean;
}

export interface AreaResult {
  rect: Rect;
  layer: Layer;
  /** The area is being moved by the pointer this frame */
  moving: boolean;
}

export function area(ctx: Context, config: AreaConfig, addContents: (ui: Ui) => void): AreaResult {
  const { movable = true, interactable = true } = config;
  const id = Id.new(config.id);
  const layer: Layer = { order: config.order ?? "middle", id };
  const mouse = ctx.input().mouse;

  const moving = ctx.memory((memory) => {
    const windowInteraction = memory.windowInteraction;
    return (
      windowInteraction !== null &&
      layerEquals(windowInteraction.areaLayer, layer) &&
      memory.interaction.dragIsWindow &&
      sameId(memory.interaction.dragId, id)
    );
  });

  let pos = ctx.memory((memory) => memory.areas.get(layer)?.pos) ?? config.defaultPos;
  if (moving && mouse.down) {
    pos = add(pos, mouse.delta);
  }
  const rect = rectFromMinSize(pos, config.size);

  const pressedHere =
    interactable && mouse.pressed && mouse.pos !== null && layerEquals(ctx.layerAt(mouse.pos), layer);

  ctx.memory((memory) => {
    memory.areas.setState(layer, { pos, size: config.size, interactable });
    if (pressedHere) {
      memory.areas.moveToTop(layer);
      if (movable && memory.interaction.dragId === null) {
        // Widgets inside the area may still take the drag this frame
        memory.startWindowMove({ areaLayer: layer, startRect: rect, kind: "move" }, id);
      }
    }
  });

  if (moving) {
    ctx.output((output) => {
      output.cursorIcon = "grabbing";
    });
  }

  addContents(new Ui(ctx, layer, id, rect));

  return { rect, layer, moving };
}
