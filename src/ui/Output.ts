/**
 * Side effects a frame asks the platform layer to perform.
 */

export type CursorIcon =
  | "default"
  | "pointingHand"
  | "text"
  | "grab"
  | "grabbing"
  | "resizeHorizontal"
  | "resizeVertical"
  | "resizeNwSe";

export interface Output {
  /** Cursor to show until the next frame */
  cursorIcon: CursorIcon;
  /** URL to open, if a link was clicked */
  openUrl: string | null;
  /** Text to put on the clipboard; empty for none */
  copiedText: string;
  /** Ask for another frame even without new input */
  needsRepaint: boolean;
}

export function defaultOutput(): Output {
  return {
    cursorIcon: "default",
    openUrl: null,
    copiedText: "",
    needsRepaint: false,
  };
}
