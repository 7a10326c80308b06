/**
 * Radio Button Widget
 *
 * One option of a group. The caller owns the group's value and selects this
 * option when `clicked` is reported.
 */

import type { Rect } from "../../math/rect";
import type { IdSource } from "../Id";
import { Sense } from "../Sense";
import type { Ui } from "../Ui";

export interface RadioButtonConfig {
  id: IdSource;
  rect: Rect;
  text: string;
  checked: boolean;
}

export interface RadioButtonResult {
  clicked: boolean;
  hovered: boolean;
  active: boolean;
}

export function radioButton(ui: Ui, config: RadioButtonConfig): RadioButtonResult {
  const { rect, text, checked } = config;
  const id = ui.makeUniqueId(config.id, rect.min);
  const info = ui.interact(rect, id, Sense.click());

  if (info.hovered) {
    ui.requestCursor("pointingHand");
  }

  ui.addWidgetCmd({ kind: "radio", checked: checked || info.clicked, interact: info, rect, text });

  return { clicked: info.clicked, hovered: info.hovered, active: info.active };
}
