/**
 * Style
 *
 * Spacing, interaction tolerances and widget colors. All colors are RGBA in
 * the 0-1 range.
 */

import { type Vec2, vec2 } from "../math/vec2";
import { type Color, gray, srgba } from "../types/color";
import type { TextStyle } from "../text/types";

/** Colors for one interaction tier */
export interface WidgetVisuals {
  /** Background of boxes, circles, slider markers */
  fill: Color;
  /** Check marks and widget labels */
  stroke: Color;
}

/** Widget colors by tier; each tier is lighter than the one below */
export interface WidgetStyles {
  active: WidgetVisuals;
  hovered: WidgetVisuals;
  idle: WidgetVisuals;
}

export interface Style {
  /** Gap between widgets; half of it enlarges every click target */
  itemSpacing: Vec2;
  /** Extra grab margin around windows for their resize handles */
  resizeInteractRadiusSide: number;
  /** Width of check marks and similar strokes */
  lineWidth: number;
  /** Default text color */
  textColor: Color;
  /** Text style used by widget labels */
  widgetTextStyle: TextStyle;
  buttonCornerRadius: number;
  sliderTrackColor: Color;
  radioDotColor: Color;
  widgets: WidgetStyles;
}

export const DEFAULT_STYLE: Style = {
  itemSpacing: vec2(8, 4),
  resizeInteractRadiusSide: 5,
  lineWidth: 2,
  textColor: srgba(255, 255, 255, 187),
  widgetTextStyle: "button",
  buttonCornerRadius: 5,
  sliderTrackColor: gray(34),
  radioDotColor: gray(0),
  widgets: {
    active: { fill: gray(136), stroke: srgba(255, 255, 255, 255) },
    hovered: { fill: gray(100), stroke: srgba(255, 255, 255, 200) },
    idle: { fill: gray(68), stroke: srgba(255, 255, 255, 170) },
  },
};

/** Partial style accepted by configuration; widget tiers merge field by field */
export type StyleOverrides = Partial<Omit<Style, "widgets">> & {
  widgets?: Partial<{ [Tier in keyof WidgetStyles]: Partial<WidgetVisuals> }>;
};

/** Deep merge a partial style over a base (the default style unless given) */
export function mergeStyle(partial: StyleOverrides, base: Style = DEFAULT_STYLE): Style {
  return {
    ...base,
    ...partial,
    widgets: {
      active: { ...base.widgets.active, ...partial.widgets?.active },
      hovered: { ...base.widgets.hovered, ...partial.widgets?.hovered },
      idle: { ...base.widgets.idle, ...partial.widgets?.idle },
    },
  };
}

export function cloneStyle(style: Style): Style {
  return mergeStyle({}, style);
}

/**
 * Pick the visuals for a widget: active beats hovered beats idle.
 */
export function interactVisuals(
  style: Style,
  interact: { readonly active: boolean; readonly hovered: boolean }
): WidgetVisuals {
  if (interact.active) return style.widgets.active;
  if (interact.hovered) return style.widgets.hovered;
  return style.widgets.idle;
}
