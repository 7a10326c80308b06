/**
 * Collapsing Header Widget
 *
 * A clickable header whose open/closed state lives in memory, so it
 * survives across frames without the caller storing it.
 */

import type { Rect } from "../../math/rect";
import type { IdSource } from "../Id";
import { Sense } from "../Sense";
import type { Ui } from "../Ui";

export interface CollapsingHeaderConfig {
  id: IdSource;
  rect: Rect;
  text: string;
  defaultOpen?: boolean;
}

export interface CollapsingHeaderResult {
  open: boolean;
  toggled: boolean;
  hovered: boolean;
}

export function collapsingHeader(ui: Ui, config: CollapsingHeaderConfig): CollapsingHeaderResult {
  const { rect, text, defaultOpen = false } = config;
  const id = ui.makeUniqueId(config.id, rect.min);
  const info = ui.interact(rect, id, Sense.click());

  const open = ui.ctx.memory((memory) => {
    let isOpen = memory.isCollapsingHeaderOpen(id, defaultOpen);
    if (info.clicked) {
      isOpen = !isOpen;
      memory.setCollapsingHeaderOpen(id, isOpen);
    }
    return isOpen;
  });

  if (info.hovered) {
    ui.requestCursor("pointingHand");
  }

  ui.addWidgetCmd({
    kind: "button",
    interact: info,
    rect,
    text: `${open ? "-" : "+"} ${text}`,
  });

  return { open, toggled: info.clicked, hovered: info.hovered };
}
