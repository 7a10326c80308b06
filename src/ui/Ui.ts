/**
 * Ui
 *
 * A region of a layer that widget code paints into. Cheap to create; a new
 * one is made for every child region every frame.
 */

import type { Pos2 } from "../math/vec2";
import { type Align, type Rect, intersect } from "../math/rect";
import type { PaintCmd } from "../paint/PaintCmd";
import type { Style } from "../style/Style";
import { type WidgetCmd, translate } from "../style/translate";
import type { TextStyle } from "../text/types";
import type { Context } from "./Context";
import { type Id, type IdSource, describeSource } from "./Id";
import type { InputState } from "./InputState";
import type { InteractInfo } from "./Interaction";
import type { Layer } from "./Layer";
import type { CursorIcon } from "./Output";
import { Sense } from "./Sense";

export class Ui {
  readonly ctx: Context;
  readonly layer: Layer;
  /** Parent of the Ids made through this Ui */
  readonly id: Id;
  /** Region available to widgets */
  readonly rect: Rect;
  /** Painting and hit-testing are clipped to this */
  readonly clipRect: Rect;

  constructor(ctx: Context, layer: Layer, id: Id, rect: Rect, clipRect: Rect = rect) {
    this.ctx = ctx;
    this.layer = layer;
    this.id = id;
    this.rect = rect;
    this.clipRect = clipRect;
  }

  input(): InputState {
    return this.ctx.input();
  }

  style(): Style {
    return this.ctx.style();
  }

  /**
   * A sub-region sharing this Ui's layer. Its clip rect is the
   * intersection of both.
   */
  child(rect: Rect, idSource?: IdSource): Ui {
    const id = idSource === undefined ? this.id : this.id.with(idSource);
    return new Ui(this.ctx, this.layer, id, rect, intersect(this.clipRect, rect));
  }

  /** Derive an Id scoped to this Ui without registering it. */
  makeChildId(source: IdSource): Id {
    return this.id.with(source);
  }

  /**
   * Derive an Id scoped to this Ui and register it at `pos`; a clash
   * with another widget is painted as a diagnostic.
   */
  makeUniqueId(source: IdSource, pos: Pos2): Id {
    return this.ctx.registerUniqueId(this.id.with(source), describeSource(source), pos);
  }

  interact(rect: Rect, id: Id | null, sense: Sense): InteractInfo {
    return this.ctx.interact(this.layer, this.clipRect, rect, id, sense);
  }

  /** Hover check that never touches interaction ownership */
  interactHover(rect: Rect): InteractInfo {
    return this.interact(rect, null, Sense.nothing());
  }

  containsMouse(rect: Rect): boolean {
    return this.ctx.containsMouse(this.layer, this.clipRect, rect);
  }

  addPaintCmd(cmd: PaintCmd): void {
    this.ctx.graphics((graphics) => graphics.push(this.layer, this.clipRect, cmd));
  }

  /** Translate a widget command with the current style and paint it. */
  addWidgetCmd(cmd: WidgetCmd): void {
    const commands = translate(cmd, this.style());
    this.ctx.graphics((graphics) => {
      for (const paintCmd of commands) {
        graphics.push(this.layer, this.clipRect, paintCmd);
      }
    });
  }

  label(
    pos: Pos2,
    text: string,
    align: readonly [Align, Align] = ["min", "min"],
    textStyle: TextStyle = "body"
  ): void {
    this.addWidgetCmd({ kind: "text", pos, text, align, textStyle });
  }

  requestCursor(icon: CursorIcon): void {
    this.ctx.output((output) => {
      output.cursorIcon = icon;
    });
  }
}
