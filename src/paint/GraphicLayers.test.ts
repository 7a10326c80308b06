import { describe, it, expect, vi, afterEach } from "vitest";
import { everything, rectFromMinSize } from "../math/rect";
import { pos2, vec2 } from "../math/vec2";
import { Id } from "../ui/Id";
import { backgroundLayer, debugLayer, layer } from "../ui/Layer";
import { WHITE } from "../types/color";
import { GraphicLayers } from "./GraphicLayers";
import type { PaintCmd } from "./PaintCmd";

function circle(radius: number): PaintCmd {
  return { kind: "circle", center: pos2(0, 0), radius, fill: WHITE, outline: null };
}

describe("GraphicLayers", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const background = backgroundLayer();
  const window = layer("middle", Id.new("window"));

  it("drains layer by layer in the given order", () => {
    const graphics = new GraphicLayers();
    graphics.push(window, everything(), circle(1));
    graphics.push(background, everything(), circle(2));
    graphics.push(window, everything(), circle(3));

    const radii = graphics
      .drain([background, window, debugLayer()])
      .map(({ cmd }) => (cmd.kind === "circle" ? cmd.radius : -1));
    expect(radii).toEqual([2, 1, 3]);
    expect(graphics.isEmpty()).toBe(true);
  });

  it("keeps the clip rect of each command", () => {
    const graphics = new GraphicLayers();
    const clip = rectFromMinSize(pos2(0, 0), vec2(10, 10));
    graphics.push(background, clip, circle(1));
    expect(graphics.drain([background])[0]?.clipRect).toEqual(clip);
  });

  it("freezes pushed commands", () => {
    const graphics = new GraphicLayers();
    graphics.push(background, everything(), circle(1));
    expect(Object.isFrozen(graphics.list(background)[0]?.cmd)).toBe(true);
  });

  it("copies point and vertex arrays on push", () => {
    const graphics = new GraphicLayers();
    const points = [pos2(0, 0), pos2(10, 0)];
    const vertices = [0, 0, 1, 1, 1, 1];
    const indices = [0, 0, 0];
    graphics.push(background, everything(), { kind: "line", points, color: WHITE, width: 1 });
    graphics.push(background, everything(), { kind: "mesh", vertices, indices });
    points.push(pos2(20, 0));
    vertices.push(5);
    indices.length = 0;

    const [line, mesh] = graphics.drain([background]).map(({ cmd }) => cmd);
    expect(line?.kind === "line" ? line.points : null).toEqual([pos2(0, 0), pos2(10, 0)]);
    expect(mesh?.kind === "mesh" ? [mesh.vertices.length, mesh.indices.length] : null).toEqual([6, 3]);
    expect(line?.kind === "line" && Object.isFrozen(line.points)).toBe(true);
  });

  it("shares reported layers with its successor", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const graphics = new GraphicLayers();
    graphics.push(window, everything(), circle(1));
    graphics.drain([background]);

    const next = graphics.successor();
    expect(next.isEmpty()).toBe(true);
    next.push(window, everything(), circle(1));
    next.drain([background]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("drops layers missing from the order with a single warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const graphics = new GraphicLayers();
    graphics.push(window, everything(), circle(1));
    graphics.push(background, everything(), circle(2));

    expect(graphics.drain([background])).toHaveLength(1);
    graphics.push(window, everything(), circle(1));
    expect(graphics.drain([background])).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(graphics.isEmpty()).toBe(true);
  });

  it("drains nothing from an empty buffer", () => {
    expect(new GraphicLayers().drain([background, debugLayer()])).toEqual([]);
  });

  it("visits a repeated layer once", () => {
    const graphics = new GraphicLayers();
    graphics.push(background, everything(), circle(1));
    expect(graphics.drain([background, background])).toHaveLength(1);
  });
});
