/**
 * Monospace text layout
 *
 * Reference Fonts implementation: every glyph advances by the same amount,
 * so layout is pure arithmetic and fully deterministic. Real applications
 * plug in a shaping engine through the same interface.
 */

import { pos2, vec2 } from "../math/vec2";
import type {
  FontDefinitions,
  FontFactory,
  Fonts,
  Galley,
  GlyphPlacement,
  TextStyle,
} from "./types";
import { cloneFontDefinitions } from "./types";

interface Row {
  text: string;
  width: number;
}

export class MonospaceFonts implements Fonts {
  private defs: FontDefinitions;

  constructor(definitions: FontDefinitions) {
    this.defs = cloneFontDefinitions(definitions);
  }

  definitions(): FontDefinitions {
    return this.defs;
  }

  /** Width of one glyph in points */
  glyphWidth(textStyle: TextStyle): number {
    const font = this.defs.fonts[textStyle];
    return font.size * font.advance;
  }

  rowHeight(textStyle: TextStyle): number {
    const font = this.defs.fonts[textStyle];
    return font.size * font.lineHeight;
  }

  /**
   * Measure the width of a single line of text.
   */
  measureLine(text: string, textStyle: TextStyle): number {
    return Array.from(text).length * this.glyphWidth(textStyle);
  }

  layout(text: string, textStyle: TextStyle, wrapWidth: number): Galley {
    const rows = this.wrapText(text, textStyle, wrapWidth);
    const glyphWidth = this.glyphWidth(textStyle);
    const rowHeight = this.rowHeight(textStyle);

    const glyphs: GlyphPlacement[] = [];
    let maxWidth = 0;
    rows.forEach((row, rowIndex) => {
      maxWidth = Math.max(maxWidth, row.width);
      Array.from(row.text).forEach((char, column) => {
        glyphs.push({
          char,
          pos: pos2(column * glyphWidth, rowIndex * rowHeight),
          size: vec2(glyphWidth, rowHeight),
        });
      });
    });

    return {
      text,
      size: vec2(maxWidth, rows.length * rowHeight),
      rows,
      glyphs,
    };
  }

  /**
   * Split into rows at newlines, then word-wrap each paragraph.
   * A single word wider than `wrapWidth` gets a row of its own.
   */
  private wrapText(text: string, textStyle: TextStyle, wrapWidth: number): Row[] {
    const rows: Row[] = [];

    for (const para of text.split("\n")) {
      if (wrapWidth === Infinity) {
        rows.push({ text: para, width: this.measureLine(para, textStyle) });
        continue;
      }

      let currentLine = "";
      for (const word of para.split(" ")) {
        const testLine = currentLine ? `${currentLine} ${word}` : word;
        if (currentLine && this.measureLine(testLine, textStyle) > wrapWidth) {
          rows.push({ text: currentLine, width: this.measureLine(currentLine, textStyle) });
          currentLine = word;
        } else {
          currentLine = testLine;
        }
      }
      rows.push({ text: currentLine, width: this.measureLine(currentLine, textStyle) });
    }

    return rows;
  }
}

export const createMonospaceFonts: FontFactory = (definitions) => new MonospaceFonts(definitions);
