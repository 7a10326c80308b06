import { describe, it, expect } from "vitest";
import { pos2 } from "../math/vec2";
import { Id } from "./Id";
import { IdRegistry } from "./IdRegistry";

describe("IdRegistry", () => {
  it("accepts the first claim", () => {
    const registry = new IdRegistry();
    expect(registry.register(Id.new("a"), '"a"', pos2(0, 0))).toBeNull();
    expect(registry.has(Id.new("a"))).toBe(true);
    expect(registry.size()).toBe(1);
  });

  it("treats a repeat claim within the tolerance as the same widget", () => {
    const registry = new IdRegistry();
    registry.register(Id.new("a"), '"a"', pos2(10, 10));
    expect(registry.register(Id.new("a"), '"a"', pos2(12, 11))).toBeNull();
  });

  it("reports both positions of a clash", () => {
    const registry = new IdRegistry();
    registry.register(Id.new("a"), '"a"', pos2(10, 10));
    const clash = registry.register(Id.new("a"), '"a"', pos2(10, 100));
    expect(clash).not.toBeNull();
    expect(clash?.firstPos).toEqual({ x: 10, y: 10 });
    expect(clash?.secondPos).toEqual({ x: 10, y: 100 });
    expect(clash?.sourceName).toBe('"a"');
  });

  it("uses a configurable distance", () => {
    const registry = new IdRegistry(50);
    registry.register(Id.new("a"), '"a"', pos2(0, 0));
    expect(registry.register(Id.new("a"), '"a"', pos2(30, 0))).toBeNull();
  });

  it("forgets claims on clear", () => {
    const registry = new IdRegistry();
    registry.register(Id.new("a"), '"a"', pos2(0, 0));
    registry.clear();
    expect(registry.size()).toBe(0);
    expect(registry.register(Id.new("a"), '"a"', pos2(100, 0))).toBeNull();
  });
});
