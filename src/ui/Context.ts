/**
 * Context
 *
 * Root of all per-session UI state and the frame lifecycle. Each call to
 * beginFrame() derives a new generation of the context from the current
 * one plus new input; widget code for that frame only ever sees that
 * generation. The superseded generation is retired and never mutated again.
 *
 * Mutable subsystems (style, memory, paint buffer, output, id registry) are
 * each guarded separately, so one widget touching the paint buffer never
 * blocks another reading interaction memory.
 */

import { type Pos2, type Vec2, pos2, scale, vec2 } from "../math/vec2";
import {
  type Align,
  type Rect,
  alignRect,
  contains,
  everything,
  expand,
  expand2,
  formatRect,
  intersect,
  rectFromMinSize,
  size,
} from "../math/rect";
import { type Color, RED, YELLOW, gray } from "../types/color";
import { GraphicLayers } from "../paint/GraphicLayers";
import { type ClippedPaintCmd, type PaintCmd, lineStyle } from "../paint/PaintCmd";
import {
  DEFAULT_PAINT_OPTIONS,
  MeshTessellator,
  type PaintBatch,
  type PaintOptions,
  type Tessellator,
  VERTEX_STRIDE,
} from "../paint/tessellate";
import { type Style, type StyleOverrides, cloneStyle, mergeStyle } from "../style/Style";
import { createMonospaceFonts } from "../text/MonospaceFonts";
import {
  DEFAULT_FONT_DEFINITIONS,
  type FontDefinitions,
  type FontFactory,
  type Fonts,
  type Galley,
  type TextStyle,
  cloneFontDefinitions,
  fontDefinitionsEqual,
} from "../text/types";
import { Guarded } from "./Guarded";
import { Id, type IdSource, describeSource, sameId } from "./Id";
import { DEFAULT_ID_CLASH_DISTANCE, IdRegistry } from "./IdRegistry";
import { InputState, type RawInput } from "./InputState";
import type { InteractInfo } from "./Interaction";
import { type Layer, backgroundLayer, debugLayer, layerEquals } from "./Layer";
import { Memory } from "./Memory";
import { type Output, defaultOutput } from "./Output";
import { type Sense, sensesNothing } from "./Sense";
import { Ui } from "./Ui";

export interface ContextOptions {
  /** Overrides merged over DEFAULT_STYLE */
  style?: StyleOverrides;
  paintOptions?: Partial<PaintOptions>;
  fontDefinitions?: FontDefinitions;
  /** Builds Fonts from definitions; defaults to monospace metrics */
  fontFactory?: FontFactory;
  tessellator?: Tessellator;
  /** Repeat Id claims closer than this (points) are not clashes */
  idClashDistance?: number;
  /** Log paint stats to the console, at most once per second */
  logStats?: boolean;
}

export interface PaintStats {
  numBatches: number;
  numPrimitives: number;
  numVertices: number;
  numTriangles: number;
}

export function emptyPaintStats(): PaintStats {
  return { numBatches: 0, numPrimitives: 0, numVertices: 0, numTriangles: 0 };
}

/** Everything a frame produced */
export interface FrameOutput {
  output: Output;
  /** Paint commands in paint order, before tessellation */
  primitives: ClippedPaintCmd[];
  batches: PaintBatch[];
  stats: PaintStats;
}

export interface FrameStart {
  /** The new generation; use it for this frame */
  ctx: Context;
  /** Full-screen Ui on the background layer */
  ui: Ui;
}

interface Collaborators {
  fontFactory: FontFactory;
  tessellator: Tessellator;
  idClashDistance: number;
  logStats: boolean;
}

/** Everything one generation starts from */
interface GenerationParts {
  collaborators: Collaborators;
  style: Style;
  paintOptions: PaintOptions;
  fontDefinitions: FontDefinitions;
  fonts: Fonts | null;
  memory: Memory;
  input: InputState;
  graphics: GraphicLayers;
  lastStatsLogTime: number;
  stats: PaintStats;
}

/** Carries a derived generation into the constructor without building defaults */
class Generation {
  constructor(readonly parts: GenerationParts) {}
}

function initialParts(options: ContextOptions): GenerationParts {
  return {
    collaborators: {
      fontFactory: options.fontFactory ?? createMonospaceFonts,
      tessellator: options.tessellator ?? new MeshTessellator(),
      idClashDistance: options.idClashDistance ?? DEFAULT_ID_CLASH_DISTANCE,
      logStats: options.logStats ?? false,
    },
    style: mergeStyle(options.style ?? {}),
    paintOptions: { ...DEFAULT_PAINT_OPTIONS, ...options.paintOptions },
    fontDefinitions: cloneFontDefinitions(options.fontDefinitions ?? DEFAULT_FONT_DEFINITIONS),
    // Null until the first beginFrame(), since pixelsPerPoint is unknown before
    fonts: null,
    memory: new Memory(),
    input: InputState.initial(),
    graphics: new GraphicLayers(),
    lastStatsLogTime: -Infinity,
    stats: emptyPaintStats(),
  };
}

export class Context {
  private readonly collaborators: Collaborators;

  private readonly styleCell: Guarded<Style>;
  private readonly paintOptionsCell: Guarded<PaintOptions>;
  private readonly fontDefinitionsCell: Guarded<FontDefinitions>;
  private fontsValue: Fonts | null;
  private readonly memoryCell: Guarded<Memory>;
  private inputValue: InputState;
  private readonly graphicsCell: Guarded<GraphicLayers>;
  private readonly outputCell: Guarded<Output>;
  private readonly usedIds: Guarded<IdRegistry>;
  private readonly statsCell: Guarded<PaintStats>;

  private lastStatsLogTime: number;
  private retired = false;
  private ended = false;

  constructor(options: ContextOptions | Generation = {}) {
    const parts = options instanceof Generation ? options.parts : initialParts(options);
    this.collaborators = parts.collaborators;
    this.styleCell = new Guarded("style", parts.style);
    this.paintOptionsCell = new Guarded("paint options", parts.paintOptions);
    this.fontDefinitionsCell = new Guarded("font definitions", parts.fontDefinitions);
    this.fontsValue = parts.fonts;
    this.memoryCell = new Guarded("memory", parts.memory);
    this.inputValue = parts.input;
    this.graphicsCell = new Guarded("graphics", parts.graphics);
    this.outputCell = new Guarded("output", defaultOutput());
    this.usedIds = new Guarded("used ids", new IdRegistry(parts.collaborators.idClashDistance));
    this.statsCell = new Guarded("paint stats", parts.stats);
    this.lastStatsLogTime = parts.lastStatsLogTime;
  }

  // ==================== Frame Lifecycle ====================

  /**
   * Start a frame. Returns the next generation of this context and a Ui
   * covering the whole screen. This generation is retired.
   */
  beginFrame(rawInput: RawInput): FrameStart {
    this.assertLive("beginFrame");
    const next = this.nextGeneration();
    next.beginFrameMut(rawInput);
    this.retire();
    return { ctx: next, ui: next.fullscreenUi() };
  }

  /**
   * Finish the frame: returns what happened (Output) and what to paint.
   */
  endFrame(): FrameOutput {
    this.assertLive("endFrame");
    if (this.ended) {
      throw new Error("endFrame() already called for this frame - call beginFrame() first");
    }
    this.ended = true;

    this.memory((memory) => memory.endFrame());
    const output = this.outputCell.replace(defaultOutput());
    const primitives = this.drainPaintLists();
    const batches = this.collaborators.tessellator.tessellate(
      this.paintOptions(),
      this.fonts(),
      primitives
    );

    const stats: PaintStats = {
      numBatches: batches.length,
      numPrimitives: primitives.length,
      numVertices: 0,
      numTriangles: 0,
    };
    for (const { mesh } of batches) {
      stats.numVertices += mesh.vertices.length / VERTEX_STRIDE;
      stats.numTriangles += mesh.indices.length / 3;
    }
    this.statsCell.set(stats);
    this.logStats(stats);

    return { output, primitives, batches, stats };
  }

  private nextGeneration(): Context {
    return new Context(
      new Generation({
        collaborators: this.collaborators,
        style: this.style(),
        paintOptions: this.paintOptions(),
        fontDefinitions: this.fontDefinitionsCell.lock((defs) => cloneFontDefinitions(defs)),
        fonts: this.fontsValue,
        memory: this.memory((memory) => memory.clone()),
        input: this.inputValue,
        graphics: this.graphics((graphics) => graphics.successor()),
        lastStatsLogTime: this.lastStatsLogTime,
        stats: this.paintStats(),
      })
    );
  }

  private beginFrameMut(rawInput: RawInput): void {
    const prevInput = this.inputValue;
    this.memory((memory) => memory.beginFrame(prevInput));
    this.usedIds.lock((ids) => ids.clear());
    this.inputValue = prevInput.next(rawInput);

    const pixelsPerPoint = this.inputValue.pixelsPerPoint;
    const definitions = this.fontDefinitionsCell.lock((defs) => {
      defs.pixelsPerPoint = pixelsPerPoint;
      return cloneFontDefinitions(defs);
    });
    if (this.fontsValue === null || !fontDefinitionsEqual(this.fontsValue.definitions(), definitions)) {
      this.fontsValue = this.collaborators.fontFactory(definitions);
    }
  }

  private retire(): void {
    this.retired = true;
    for (const cell of [
      this.styleCell,
      this.paintOptionsCell,
      this.fontDefinitionsCell,
      this.memoryCell,
      this.graphicsCell,
      this.outputCell,
      this.usedIds,
      this.statsCell,
    ]) {
      cell.retire();
    }
  }

  private assertLive(operation: string): void {
    if (this.retired) {
      throw new Error(`${operation}() called on a retired context - use the ctx returned by beginFrame()`);
    }
  }

  /** A Ui for the entire screen, behind any windows. */
  private fullscreenUi(): Ui {
    const rect = this.rect();
    const layer = backgroundLayer();
    // Registered every frame so the background is always ordered and hit-testable
    this.memory((memory) =>
      memory.areas.setState(layer, { pos: rect.min, size: size(rect), interactable: true })
    );
    return new Ui(this, layer, layer.id, rect);
  }

  private drainPaintLists(): ClippedPaintCmd[] {
    const order = this.memory((memory) => memory.areas.order());
    return this.graphics((graphics) => graphics.drain(order));
  }

  private logStats(stats: PaintStats): void {
    if (!this.collaborators.logStats) return;
    const now = this.inputValue.time;
    if (now - this.lastStatsLogTime < 1) return;
    this.lastStatsLogTime = now;
    console.log(
      `[Context] batches=${stats.numBatches}, primitives=${stats.numPrimitives}, ` +
        `vertices=${stats.numVertices}, triangles=${stats.numTriangles}`
    );
  }

  // ==================== Accessors ====================

  /** The whole screen */
  rect(): Rect {
    return rectFromMinSize(pos2(0, 0), this.inputValue.screenSize);
  }

  input(): InputState {
    return this.inputValue;
  }

  /**
   * Not valid until the first call to beginFrame(), because the proper
   * pixelsPerPoint is not known before then.
   */
  fonts(): Fonts {
    if (this.fontsValue === null) {
      throw new Error("No fonts available until first call to Context.beginFrame()");
    }
    return this.fontsValue;
  }

  /** Takes effect at the start of the next frame. pixelsPerPoint is overwritten from input. */
  setFonts(definitions: FontDefinitions): void {
    this.fontDefinitionsCell.set(cloneFontDefinitions(definitions));
  }

  /** A copy of the current style */
  style(): Style {
    return this.styleCell.lock((style) => cloneStyle(style));
  }

  setStyle(style: Style): void {
    this.styleCell.set(cloneStyle(style));
  }

  paintOptions(): PaintOptions {
    return this.paintOptionsCell.lock((options) => ({ ...options }));
  }

  setPaintOptions(options: Partial<PaintOptions>): void {
    this.paintOptionsCell.lock((current) => Object.assign(current, options));
  }

  /** Stats of the most recent endFrame() */
  paintStats(): PaintStats {
    return this.statsCell.lock((stats) => ({ ...stats }));
  }

  /** Exclusive access to persistent memory */
  memory<R>(fn: (memory: Memory) => R): R {
    return this.memoryCell.lock(fn);
  }

  /** Exclusive access to this frame's paint buffer */
  graphics<R>(fn: (graphics: GraphicLayers) => R): R {
    return this.graphicsCell.lock(fn);
  }

  /** Exclusive access to this frame's output */
  output<R>(fn: (output: Output) => R): R {
    return this.outputCell.lock(fn);
  }

  pixelsPerPoint(): number {
    return this.inputValue.pixelsPerPoint;
  }

  /** Round a point coordinate to the nearest physical pixel */
  roundToPixel(point: number): number {
    const ppp = this.pixelsPerPoint();
    return Math.round(point * ppp) / ppp;
  }

  roundPosToPixels(pos: Pos2): Pos2 {
    return pos2(this.roundToPixel(pos.x), this.roundToPixel(pos.y));
  }

  roundVecToPixels(v: Vec2): Vec2 {
    return vec2(this.roundToPixel(v.x), this.roundToPixel(v.y));
  }

  roundRectToPixels(rect: Rect): Rect {
    return { min: this.roundPosToPixels(rect.min), max: this.roundPosToPixels(rect.max) };
  }

  // ==================== Ids ====================

  /**
   * Hash `source` into an Id and register it at `pos`.
   * A clash with another position is painted as a diagnostic.
   */
  makeUniqueId(source: IdSource, pos: Pos2): Id {
    return this.registerUniqueId(Id.new(source), describeSource(source), pos);
  }

  /**
   * Register an already derived Id at `pos`. If the same Id was claimed
   * elsewhere this frame, both positions get an error overlay.
   */
  registerUniqueId(id: Id, sourceName: string, pos: Pos2): Id {
    const clash = this.usedIds.lock((ids) => ids.register(id, sourceName, pos));
    if (clash) {
      this.showError(clash.firstPos, `first use of non-unique ID ${sourceName} (name clash?)`);
      this.showError(clash.secondPos, `second use of non-unique ID ${sourceName} (name clash?)`);
    }
    return id;
  }

  // ==================== Interaction ====================

  /** Topmost interactable layer under `pos` */
  layerAt(pos: Pos2): Layer | null {
    const tolerance = this.styleCell.lock((style) => style.resizeInteractRadiusSide);
    return this.memory((memory) => memory.areas.layerAt(pos, tolerance));
  }

  /**
   * True if the pointer is inside `rect` (clipped) and no other layer
   * covers that point.
   */
  containsMouse(layer: Layer, clipRect: Rect, rect: Rect): boolean {
    const pos = this.inputValue.mouse.pos;
    if (pos === null) return false;
    return contains(intersect(rect, clipRect), pos) && layerEquals(this.layerAt(pos), layer);
  }

  /**
   * Resolve a region against the pointer and update click/drag ownership.
   *
   * Without an id, or with a sense of nothing, this is a pure hover probe and
   * leaves memory untouched.
   */
  interact(
    layer: Layer,
    clipRect: Rect,
    rect: Rect,
    interactionId: Id | null,
    sense: Sense
  ): InteractInfo {
    const spacing = this.styleCell.lock((style) => style.itemSpacing);
    // Make small targets easier to hit
    const interactRect = expand2(rect, scale(spacing, 0.5));
    const hovered = this.containsMouse(layer, clipRect, interactRect);

    if (interactionId === null || sensesNothing(sense)) {
      return { rect, hovered, clicked: false, doubleClicked: false, active: false };
    }
    const id = interactionId;
    const mouse = this.inputValue.mouse;

    return this.memory((memory) => {
      const interaction = memory.interaction;
      interaction.clickInterest ||= hovered && sense.click;
      interaction.dragInterest ||= hovered && sense.drag;

      const active = sameId(interaction.clickId, id) || sameId(interaction.dragId, id);

      if (mouse.pressed) {
        if (!hovered) {
          return { rect, hovered: false, clicked: false, doubleClicked: false, active: false };
        }

        let claimed = false;
        if (sense.click && interaction.clickId === null) {
          // Start of a click
          interaction.clickId = id;
          claimed = true;
        }
        if (sense.drag && (interaction.dragId === null || interaction.dragIsWindow)) {
          // Start of a drag
          interaction.dragId = id;
          interaction.dragIsWindow = false;
          preemptWindowMove(memory);
          claimed = true;
        }
        return { rect, hovered: true, clicked: false, doubleClicked: false, active: claimed };
      }

      if (mouse.released) {
        const clicked = hovered && active;
        return {
          rect,
          hovered,
          clicked,
          doubleClicked: clicked && mouse.doubleClick,
          active,
        };
      }

      if (mouse.down) {
        // Only the owner reacts while the button is held
        return { rect, hovered: hovered && active, clicked: false, doubleClicked: false, active };
      }

      return { rect, hovered, clicked: false, doubleClicked: false, active };
    });
  }

  // ==================== Painting & Diagnostics ====================

  /** Queue a paint command on a layer, unclipped. */
  addPaintCmd(layer: Layer, cmd: PaintCmd): void {
    this.graphics((graphics) => graphics.push(layer, everything(), cmd));
  }

  /** Paint an error message at `pos` on the debug layer. */
  showError(pos: Pos2, text: string): void {
    const layer = debugLayer();
    const textStyle: TextStyle = "monospace";
    const galley = this.fonts().layout(text, textStyle, Infinity);
    const rect = alignRect(rectFromMinSize(pos, galley.size), ["min", "min"]);
    this.addPaintCmd(layer, {
      kind: "rect",
      rect: expand(rect, 2),
      cornerRadius: 0,
      fill: gray(0, 240),
      outline: lineStyle(1, RED),
    });
    this.addGalley(layer, rect.min, galley, textStyle, RED);
  }

  debugText(pos: Pos2, text: string): void {
    this.floatingText(debugLayer(), pos, text, "monospace", ["min", "min"], YELLOW);
  }

  debugRect(rect: Rect, color: Color, name: string): void {
    const layer = debugLayer();
    this.addPaintCmd(layer, {
      kind: "rect",
      rect,
      cornerRadius: 0,
      fill: null,
      outline: lineStyle(2, color),
    });
    this.floatingText(layer, rect.min, `${name} ${formatRect(rect)}`, "monospace", ["min", "min"], color);
  }

  /**
   * Show some text anywhere on screen.
   * To center the text at `pos`, use `align: ["center", "center"]`.
   */
  floatingText(
    layer: Layer,
    pos: Pos2,
    text: string,
    textStyle: TextStyle,
    align: readonly [Align, Align],
    color: Color | null = null
  ): Rect {
    const galley = this.fonts().layout(text, textStyle, Infinity);
    const rect = alignRect(rectFromMinSize(pos, galley.size), align);
    this.addGalley(layer, rect.min, galley, textStyle, color);
    return rect;
  }

  /** Already laid out text, with its top-left corner at `pos` */
  addGalley(layer: Layer, pos: Pos2, galley: Galley, textStyle: TextStyle, color: Color | null): void {
    const textColor = color ?? this.styleCell.lock((style) => style.textColor);
    this.addPaintCmd(layer, {
      kind: "text",
      pos,
      text: galley.text,
      textStyle,
      color: textColor,
      align: ["min", "min"],
    });
  }
}

/**
 * A widget that claims the drag takes it from a window being moved, and the
 * window stops moving. This applies to window moves only; other drag owners
 * are never evicted.
 */
function preemptWindowMove(memory: Memory): void {
  memory.windowInteraction = null;
}
