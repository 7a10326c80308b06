import { describe, it, expect } from "vitest";
import { rectFromMinSize } from "../math/rect";
import { type Pos2, ZERO, pos2, vec2 } from "../math/vec2";
import { Id } from "./Id";
import { InputState } from "./InputState";
import { layer } from "./Layer";
import { Memory } from "./Memory";

function snapshot(...frames: [boolean, Pos2 | null][]): InputState {
  let input = InputState.initial();
  frames.forEach(([mouseDown, mousePos], i) => {
    input = input.next({ mouseDown, mousePos, scrollDelta: ZERO, screenSize: vec2(800, 600), time: i * 0.1, events: [] });
  });
  return input;
}

describe("Memory", () => {
  const owner = Id.new("owner");
  const window = layer("middle", Id.new("window"));

  function claimed(): Memory {
    const memory = new Memory();
    memory.interaction.clickId = owner;
    memory.startWindowMove({ areaLayer: window, startRect: rectFromMinSize(pos2(0, 0), vec2(10, 10)), kind: "move" }, owner);
    memory.interaction.clickInterest = true;
    return memory;
  }

  it("keeps ownership while the press could still be a click", () => {
    const memory = claimed();
    memory.beginFrame(snapshot([true, pos2(0, 0)]));
    expect(memory.interaction.clickId).toBe(owner);
    expect(memory.interaction.dragId).toBe(owner);
    expect(memory.interaction.clickInterest).toBe(false);
  });

  it("drops the click once the press became a drag", () => {
    const memory = claimed();
    memory.beginFrame(snapshot([true, pos2(0, 0)], [true, pos2(20, 0)]));
    expect(memory.interaction.clickId).toBeNull();
    expect(memory.interaction.dragId).toBe(owner);
    expect(memory.windowInteraction).not.toBeNull();
  });

  it("releases everything after the button went up", () => {
    const memory = claimed();
    memory.beginFrame(snapshot([true, pos2(0, 0)], [false, pos2(0, 0)]));
    expect(memory.interaction).toMatchObject({ clickId: null, dragId: null, dragIsWindow: false });
    expect(memory.windowInteraction).toBeNull();
  });

  it("stores per-widget state", () => {
    const memory = new Memory();
    expect(memory.getState(owner, 3)).toBe(3);
    memory.setState(owner, 5);
    expect(memory.getState(owner, 3)).toBe(5);
    memory.deleteState(owner);
    expect(memory.getState(owner, 3)).toBe(3);
  });

  it("forgets everything on reset", () => {
    const memory = claimed();
    memory.setState(owner, 1);
    memory.reset();
    expect(memory.interaction.clickId).toBeNull();
    expect(memory.windowInteraction).toBeNull();
    expect(memory.getState(owner, 0)).toBe(0);
  });

  it("clones independently", () => {
    const memory = new Memory();
    memory.setCollapsingHeaderOpen(owner, true);
    const copy = memory.clone();
    copy.setCollapsingHeaderOpen(owner, false);
    copy.interaction.clickId = owner;
    expect(memory.isCollapsingHeaderOpen(owner, false)).toBe(true);
    expect(memory.interaction.clickId).toBeNull();
  });
});
