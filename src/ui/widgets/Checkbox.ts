/**
 * Checkbox Widget
 *
 * Box with a check mark and a label; clicking anywhere on it toggles.
 */

import type { Rect } from "../../math/rect";
import type { IdSource } from "../Id";
import { Sense } from "../Sense";
import type { Ui } from "../Ui";

export interface CheckboxConfig {
  id: IdSource;
  rect: Rect;
  text: string;
  checked: boolean;
}

export interface CheckboxResult {
  /** Value after this frame's click, if any */
  checked: boolean;
  changed: boolean;
  hovered: boolean;
  active: boolean;
}

export function checkbox(ui: Ui, config: CheckboxConfig): CheckboxResult {
  const { rect, text } = config;
  const id = ui.makeUniqueId(config.id, rect.min);
  const info = ui.interact(rect, id, Sense.click());

  const checked = info.clicked ? !config.checked : config.checked;
  if (info.hovered) {
    ui.requestCursor("pointingHand");
  }

  ui.addWidgetCmd({ kind: "checkbox", checked, interact: info, rect, text });

  return { checked, changed: checked !== config.checked, hovered: info.hovered, active: info.active };
}
