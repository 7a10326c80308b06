import { describe, it, expect } from "vitest";
import { Guarded } from "./Guarded";

describe("Guarded", () => {
  it("gives scoped access and returns the callback result", () => {
    const cell = new Guarded("counter", { n: 1 });
    expect(cell.lock((v) => ++v.n)).toBe(2);
    expect(cell.isLocked()).toBe(false);
  });

  it("throws on re-entry", () => {
    const cell = new Guarded("counter", 0);
    expect(() => cell.lock(() => cell.lock((v) => v))).toThrow("counter already locked");
    expect(() => cell.lock(() => cell.set(1))).toThrow("counter already locked");
  });

  it("releases the lock when the callback throws", () => {
    const cell = new Guarded("counter", 0);
    expect(() =>
      cell.lock(() => {
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(cell.lock((v) => v)).toBe(0);
  });

  it("replaces and returns the previous value", () => {
    const cell = new Guarded("list", [1]);
    expect(cell.replace([])).toEqual([1]);
    expect(cell.lock((v) => v.length)).toBe(0);
  });

  it("refuses access once retired", () => {
    const cell = new Guarded("memory", 0);
    cell.retire();
    expect(() => cell.lock((v) => v)).toThrow("memory belongs to a retired frame generation");
  });
});
