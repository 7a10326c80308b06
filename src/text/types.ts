/**
 * Text layout types
 *
 * The frame engine only needs text sizes and glyph placements; how glyphs
 * are shaped and rasterized is up to the Fonts implementation.
 */

import type { Pos2, Vec2 } from "../math/vec2";

export type TextStyle = "body" | "button" | "heading" | "monospace";

export const TEXT_STYLES: readonly TextStyle[] = ["body", "button", "heading", "monospace"];

/** Font parameters for one text style */
export interface FontSpec {
  /** Font family name, passed through to the rasterizer */
  family: string;
  /** Size in points */
  size: number;
  /** Glyph advance as a fraction of size (monospace metrics) */
  advance: number;
  /** Row height as a fraction of size */
  lineHeight: number;
}

export interface FontDefinitions {
  /** Overwritten from input at the start of each frame */
  pixelsPerPoint: number;
  fonts: Record<TextStyle, FontSpec>;
}

/** One laid out glyph, relative to the galley origin */
export interface GlyphPlacement {
  readonly char: string;
  readonly pos: Pos2;
  readonly size: Vec2;
}

/** A laid out block of text */
export interface Galley {
  readonly text: string;
  readonly size: Vec2;
  readonly rows: readonly { text: string; width: number }[];
  readonly glyphs: readonly GlyphPlacement[];
}

/** Text layout collaborator */
export interface Fonts {
  definitions(): FontDefinitions;
  /** Lay out `text`, wrapping at `wrapWidth` points (Infinity for no wrap). */
  layout(text: string, textStyle: TextStyle, wrapWidth: number): Galley;
  rowHeight(textStyle: TextStyle): number;
}

export type FontFactory = (definitions: FontDefinitions) => Fonts;

export const DEFAULT_FONT_DEFINITIONS: FontDefinitions = {
  pixelsPerPoint: 1,
  fonts: {
    body: { family: "Comfortaa", size: 14, advance: 0.6, lineHeight: 1.2 },
    button: { family: "Comfortaa", size: 14, advance: 0.6, lineHeight: 1.2 },
    heading: { family: "Comfortaa", size: 20, advance: 0.6, lineHeight: 1.2 },
    monospace: { family: "ProggyClean", size: 13, advance: 0.5, lineHeight: 1.0 },
  },
};

export function cloneFontDefinitions(definitions: FontDefinitions): FontDefinitions {
  return {
    pixelsPerPoint: definitions.pixelsPerPoint,
    fonts: {
      body: { ...definitions.fonts.body },
      button: { ...definitions.fonts.button },
      heading: { ...definitions.fonts.heading },
      monospace: { ...definitions.fonts.monospace },
    },
  };
}

export function fontDefinitionsEqual(a: FontDefinitions, b: FontDefinitions): boolean {
  if (a.pixelsPerPoint !== b.pixelsPerPoint) return false;
  return TEXT_STYLES.every((style) => {
    const fa = a.fonts[style];
    const fb = b.fonts[style];
    return (
      fa.family === fb.family &&
      fa.size === fb.size &&
      fa.advance === fb.advance &&
      fa.lineHeight === fb.lineHeight
    );
  });
}
