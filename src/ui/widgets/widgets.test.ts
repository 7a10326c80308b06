import { describe, it, expect } from "vitest";
import { rectFromMinMax } from "../../math/rect";
import { type Pos2, ZERO, pos2, vec2 } from "../../math/vec2";
import { Context, type FrameOutput } from "../Context";
import type { RawInput } from "../InputState";
import type { Ui } from "../Ui";
import { button } from "./Button";
import { checkbox } from "./Checkbox";
import { collapsingHeader } from "./CollapsingHeader";
import { radioButton } from "./RadioButton";
import { slider } from "./Slider";

function input(time: number, mouseDown: boolean, mousePos: Pos2 | null): RawInput {
  return { mouseDown, mousePos, scrollDelta: ZERO, screenSize: vec2(800, 600), time, events: [] };
}

/**
 * Drives frames through one context, warming it up so that the background
 * layer can be hit-tested from the first driven frame.
 */
class Frames {
  private ctx: Context;
  private time = 0;

  constructor() {
    this.ctx = new Context();
    this.run(false, null, () => undefined);
  }

  run<T>(mouseDown: boolean, mousePos: Pos2 | null, body: (ui: Ui) => T): { result: T; output: FrameOutput } {
    const { ctx, ui } = this.ctx.beginFrame(input(this.time, mouseDown, mousePos));
    this.time += 0.1;
    this.ctx = ctx;
    const result = body(ui);
    return { result, output: ctx.endFrame() };
  }

  /** Press and release at `pos`, returning the release frame */
  click<T>(pos: Pos2, body: (ui: Ui) => T): { result: T; output: FrameOutput } {
    this.run(true, pos, body);
    return this.run(false, pos, body);
  }
}

const rect = rectFromMinMax(pos2(10, 10), pos2(110, 40));
const inside = pos2(50, 20);

describe("button", () => {
  it("clicks on release and asks for a pointing cursor", () => {
    const frames = new Frames();
    const press = frames.run(true, inside, (ui) => button(ui, { id: "ok", rect, text: "OK" }));
    expect(press.result).toEqual({ clicked: false, doubleClicked: false, hovered: true, active: true });
    expect(press.output.output.cursorIcon).toBe("pointingHand");

    const release = frames.run(false, inside, (ui) => button(ui, { id: "ok", rect, text: "OK" }));
    expect(release.result.clicked).toBe(true);
  });

  it("paints with the active fill while pressed", () => {
    const frames = new Frames();
    const { output } = frames.run(true, inside, (ui) => button(ui, { id: "ok", rect, text: "OK" }));
    const fill = output.primitives[0]?.cmd;
    expect(fill).toMatchObject({ kind: "rect", fill: [136 / 255, 136 / 255, 136 / 255, 1] });
  });

  it("never clicks when disabled", () => {
    const frames = new Frames();
    const { result, output } = frames.click(inside, (ui) =>
      button(ui, { id: "ok", rect, text: "OK", disabled: true })
    );
    expect(result).toEqual({ clicked: false, doubleClicked: false, hovered: true, active: false });
    expect(output.output.cursorIcon).toBe("default");
  });
});

describe("checkbox", () => {
  it("toggles on click", () => {
    const frames = new Frames();
    const { result, output } = frames.click(inside, (ui) =>
      checkbox(ui, { id: "grid", rect, text: "Grid", checked: false })
    );
    expect(result).toMatchObject({ checked: true, changed: true });
    expect(output.primitives.map(({ cmd }) => cmd.kind)).toEqual(["rect", "line", "text"]);
  });

  it("keeps its value without a click", () => {
    const frames = new Frames();
    const { result } = frames.run(false, inside, (ui) =>
      checkbox(ui, { id: "grid", rect, text: "Grid", checked: true })
    );
    expect(result).toMatchObject({ checked: true, changed: false, hovered: true });
  });
});

describe("radioButton", () => {
  it("reports a click so the caller can select it", () => {
    const frames = new Frames();
    const { result, output } = frames.click(inside, (ui) =>
      radioButton(ui, { id: "a", rect, text: "A", checked: false })
    );
    expect(result.clicked).toBe(true);
    expect(output.primitives.map(({ cmd }) => cmd.kind)).toEqual(["circle", "circle", "text"]);
  });
});

describe("slider", () => {
  const track = rectFromMinMax(pos2(0, 10), pos2(200, 40));

  it("follows the pointer while dragged and clamps to the range", () => {
    const frames = new Frames();
    let value = 0;
    const drag = (down: boolean, pos: Pos2) =>
      frames.run(down, pos, (ui) => slider(ui, { id: "volume", rect: track, label: "Volume", value, min: 0, max: 10 }));

    let frame = drag(true, pos2(100, 25));
    expect(frame.result).toMatchObject({ value: 5, changed: true, active: true });
    expect(frame.output.output.cursorIcon).toBe("resizeHorizontal");
    value = frame.result.value;

    // Far past the right end, still owned
    frame = drag(true, pos2(300, 25));
    expect(frame.result).toMatchObject({ value: 10, active: true, hovered: false });
    value = frame.result.value;

    frame = drag(true, pos2(50, 25));
    expect(frame.result.value).toBe(2.5);
    value = frame.result.value;

    frame = drag(false, pos2(50, 25));
    expect(frame.result.value).toBe(2.5);
    value = frame.result.value;

    // Released: moving the pointer no longer changes the value
    frame = drag(false, pos2(150, 25));
    expect(frame.result).toMatchObject({ value: 2.5, changed: false, active: false });
  });
});

describe("collapsingHeader", () => {
  it("remembers its open state across frames", () => {
    const frames = new Frames();
    const header = (ui: Ui) => collapsingHeader(ui, { id: "details", rect, text: "Details" });

    const closed = frames.run(false, null, header);
    expect(closed.result.open).toBe(false);
    expect(closed.output.primitives[1]?.cmd).toMatchObject({ text: "+ Details" });

    const toggled = frames.click(inside, header);
    expect(toggled.result).toMatchObject({ open: true, toggled: true });
    expect(toggled.output.primitives[1]?.cmd).toMatchObject({ text: "- Details" });

    const later = frames.run(false, null, header);
    expect(later.result).toMatchObject({ open: true, toggled: false });
  });

  it("starts open when asked to", () => {
    const frames = new Frames();
    const { result } = frames.run(false, null, (ui) =>
      collapsingHeader(ui, { id: "details", rect, text: "Details", defaultOpen: true })
    );
    expect(result.open).toBe(true);
  });
});
