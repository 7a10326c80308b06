import { describe, it, expect } from "vitest";
import { clamp, lerp, remap, remapClamp } from "./scalar";

describe("scalar", () => {
  it("lerps exactly at both ends", () => {
    expect(lerp(0.1, 0.7, 0)).toBe(0.1);
    expect(lerp(0.1, 0.7, 1)).toBe(0.7);
    expect(lerp(0, 10, 0.5)).toBe(5);
  });

  it("clamps", () => {
    expect(clamp(-1, 0, 1)).toBe(0);
    expect(clamp(2, 0, 1)).toBe(1);
    expect(clamp(0.5, 0, 1)).toBe(0.5);
  });

  it("remaps without clamping", () => {
    expect(remap(15, 0, 10, 0, 100)).toBe(150);
  });

  describe("remapClamp", () => {
    it("maps the range ends to the target ends", () => {
      expect(remapClamp(-3, -3, 7, 20, 220)).toBe(20);
      expect(remapClamp(7, -3, 7, 20, 220)).toBe(220);
    });

    it("clamps values outside the source range", () => {
      expect(remapClamp(100, 0, 10, 0, 200)).toBe(200);
      expect(remapClamp(-100, 0, 10, 0, 200)).toBe(0);
    });

    it("works with an inverted source range", () => {
      expect(remapClamp(0, 10, 0, 0, 100)).toBe(100);
      expect(remapClamp(20, 10, 0, 0, 100)).toBe(0);
    });

    it("maps a degenerate range or NaN to the target start", () => {
      expect(remapClamp(5, 3, 3, 10, 20)).toBe(10);
      expect(remapClamp(NaN, 0, 1, 10, 20)).toBe(10);
    });
  });
});
