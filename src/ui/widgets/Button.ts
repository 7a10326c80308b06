/**
 * Button Widget
 *
 * Clickable button for the immediate mode UI system.
 */

import type { Rect } from "../../math/rect";
import type { IdSource } from "../Id";
import { Sense } from "../Sense";
import type { Ui } from "../Ui";

/** Button configuration */
export interface ButtonConfig {
  id: IdSource;
  rect: Rect;
  text: string;
  disabled?: boolean;
}

/** Button result */
export interface ButtonResult {
  clicked: boolean;
  doubleClicked: boolean;
  hovered: boolean;
  active: boolean;
}

/**
 * Render a clickable button.
 */
export function button(ui: Ui, config: ButtonConfig): ButtonResult {
  const { rect, text, disabled = false } = config;

  // A disabled button still reports hover but never takes ownership
  const id = disabled ? null : ui.makeUniqueId(config.id, rect.min);
  const info = ui.interact(rect, id, disabled ? Sense.nothing() : Sense.click());

  if (info.hovered && !disabled) {
    ui.requestCursor("pointingHand");
  }

  ui.addWidgetCmd({
    kind: "button",
    interact: { active: info.active, hovered: info.hovered && !disabled },
    rect,
    text,
  });

  return {
    clicked: info.clicked,
    doubleClicked: info.doubleClicked,
    hovered: info.hovered,
    active: info.active,
  };
}
