/**
 * Slider Widget
 *
 * Horizontal value slider. While it owns the drag, the value follows the
 * pointer's x position across the slider's width.
 */

import type { Rect } from "../../math/rect";
import { remapClamp } from "../../math/scalar";
import type { IdSource } from "../Id";
import { Sense } from "../Sense";
import type { Ui } from "../Ui";

export interface SliderConfig {
  id: IdSource;
  rect: Rect;
  label: string;
  value: number;
  min: number;
  max: number;
}

export interface SliderResult {
  value: number;
  changed: boolean;
  hovered: boolean;
  active: boolean;
}

export function slider(ui: Ui, config: SliderConfig): SliderResult {
  const { rect, label, min, max } = config;
  const id = ui.makeUniqueId(config.id, rect.min);
  const info = ui.interact(rect, id, Sense.clickAndDrag());

  let value = config.value;
  const mousePos = ui.input().mouse.pos;
  if (info.active && mousePos !== null) {
    value = remapClamp(mousePos.x, rect.min.x, rect.max.x, min, max);
  }

  if (info.hovered || info.active) {
    ui.requestCursor("resizeHorizontal");
  }

  ui.addWidgetCmd({ kind: "slider", interact: info, label, min, max, rect, value });

  return { value, changed: value !== config.value, hovered: info.hovered, active: info.active };
}
