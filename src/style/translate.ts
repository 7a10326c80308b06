/**
 * Widget command translation
 *
 * Turns high-level widget commands into paint primitives. Pure: the output
 * depends only on the command and the style, so the same inputs always give
 * identical primitives.
 */

import { type Pos2, pos2, vec2 } from "../math/vec2";
import {
  type Align,
  type Rect,
  center,
  rectFromCenterSize,
  rectFromMinSize,
  width,
} from "../math/rect";
import { lerp, remapClamp } from "../math/scalar";
import type { PaintCmd } from "../paint/PaintCmd";
import type { TextStyle } from "../text/types";
import { type Style, interactVisuals } from "./Style";

/** The interaction flags translation cares about */
export interface InteractFlags {
  readonly active: boolean;
  readonly hovered: boolean;
}

export const CHECKBOX_SIDE = 16;
export const CHECK_MARK_SIDE = 10;
export const RADIO_RADIUS = 8;
export const SLIDER_TRACK_HEIGHT = 8;
export const SLIDER_MARKER_SIDE = 16;
/** Gap between a box/circle and its label */
const LABEL_GAP = 4;

export type WidgetCmd =
  | { readonly kind: "primitives"; readonly commands: readonly PaintCmd[] }
  | {
      readonly kind: "button";
      readonly interact: InteractFlags;
      readonly rect: Rect;
      readonly text: string;
    }
  | {
      readonly kind: "checkbox";
      readonly checked: boolean;
      readonly interact: InteractFlags;
      readonly rect: Rect;
      readonly text: string;
    }
  | {
      readonly kind: "radio";
      readonly checked: boolean;
      readonly interact: InteractFlags;
      readonly rect: Rect;
      readonly text: string;
    }
  | {
      readonly kind: "slider";
      readonly interact: InteractFlags;
      readonly label: string;
      readonly min: number;
      readonly max: number;
      readonly rect: Rect;
      readonly value: number;
    }
  | {
      readonly kind: "text";
      readonly pos: Pos2;
      readonly text: string;
      readonly align: readonly [Align, Align];
      readonly textStyle?: TextStyle;
    };

function label(style: Style, pos: Pos2, text: string, color = style.textColor): PaintCmd {
  return {
    kind: "text",
    pos,
    text,
    textStyle: style.widgetTextStyle,
    color,
    align: ["min", "center"],
  };
}

/**
 * Translate one widget command into paint primitives.
 */
export function translate(cmd: WidgetCmd, style: Style): PaintCmd[] {
  switch (cmd.kind) {
    case "primitives":
      return [...cmd.commands];

    case "button": {
      const visuals = interactVisuals(style, cmd.interact);
      return [
        {
          kind: "rect",
          rect: cmd.rect,
          cornerRadius: style.buttonCornerRadius,
          fill: visuals.fill,
          outline: null,
        },
        {
          kind: "text",
          pos: center(cmd.rect),
          text: cmd.text,
          textStyle: style.widgetTextStyle,
          color: style.textColor,
          align: ["center", "center"],
        },
      ];
    }

    case "checkbox": {
      const visuals = interactVisuals(style, cmd.interact);
      const mid = center(cmd.rect);
      const boxRect = rectFromCenterSize(
        pos2(cmd.rect.min.x + CHECKBOX_SIDE / 2, mid.y),
        vec2(CHECKBOX_SIDE, CHECKBOX_SIDE)
      );
      const out: PaintCmd[] = [
        { kind: "rect", rect: boxRect, cornerRadius: 3, fill: visuals.fill, outline: null },
      ];
      if (cmd.checked) {
        const mark = rectFromCenterSize(center(boxRect), vec2(CHECK_MARK_SIDE, CHECK_MARK_SIDE));
        const markMid = center(mark);
        out.push({
          kind: "line",
          points: [
            pos2(mark.min.x, markMid.y),
            pos2(markMid.x, mark.max.y),
            pos2(mark.max.x, mark.min.y),
          ],
          color: visuals.stroke,
          width: style.lineWidth,
        });
      }
      out.push(label(style, pos2(boxRect.max.x + LABEL_GAP, mid.y), cmd.text, visuals.stroke));
      return out;
    }

    case "radio": {
      const visuals = interactVisuals(style, cmd.interact);
      const mid = center(cmd.rect);
      const circleCenter = pos2(cmd.rect.min.x + RADIO_RADIUS, mid.y);
      const out: PaintCmd[] = [
        {
          kind: "circle",
          center: circleCenter,
          radius: RADIO_RADIUS,
          fill: visuals.fill,
          outline: null,
        },
      ];
      if (cmd.checked) {
        out.push({
          kind: "circle",
          center: circleCenter,
          radius: RADIO_RADIUS * 0.5,
          fill: style.radioDotColor,
          outline: null,
        });
      }
      out.push(
        label(
          style,
          pos2(cmd.rect.min.x + 2 * RADIO_RADIUS + LABEL_GAP, mid.y),
          cmd.text,
          visuals.stroke
        )
      );
      return out;
    }

    case "slider": {
      const visuals = interactVisuals(style, cmd.interact);
      const { rect } = cmd;
      const track = rectFromMinSize(
        pos2(rect.min.x, lerp(rect.min.y, rect.max.y, 2 / 3)),
        vec2(width(rect), SLIDER_TRACK_HEIGHT)
      );
      const markerX = remapClamp(cmd.value, cmd.min, cmd.max, rect.min.x, rect.max.x);
      const marker = rectFromCenterSize(
        pos2(markerX, center(track).y),
        vec2(SLIDER_MARKER_SIDE, SLIDER_MARKER_SIDE)
      );
      return [
        { kind: "rect", rect: track, cornerRadius: 2, fill: style.sliderTrackColor, outline: null },
        { kind: "rect", rect: marker, cornerRadius: 3, fill: visuals.fill, outline: null },
        label(
          style,
          pos2(rect.min.x, lerp(rect.min.y, rect.max.y, 1 / 3)),
          `${cmd.label}: ${cmd.value.toFixed(3)}`
        ),
      ];
    }

    case "text":
      return [
        {
          kind: "text",
          pos: cmd.pos,
          text: cmd.text,
          textStyle: cmd.textStyle ?? "body",
          color: style.textColor,
          align: cmd.align,
        },
      ];
  }
}

/** Translate a whole list, in order. */
export function intoPaintCommands(commands: readonly WidgetCmd[], style: Style): PaintCmd[] {
  const out: PaintCmd[] = [];
  for (const cmd of commands) {
    out.push(...translate(cmd, style));
  }
  return out;
}
