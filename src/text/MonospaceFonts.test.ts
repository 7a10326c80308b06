import { describe, it, expect } from "vitest";
import { MonospaceFonts } from "./MonospaceFonts";
import { DEFAULT_FONT_DEFINITIONS, cloneFontDefinitions, fontDefinitionsEqual } from "./types";

describe("MonospaceFonts", () => {
  const fonts = new MonospaceFonts(DEFAULT_FONT_DEFINITIONS);

  it("measures with fixed glyph advance", () => {
    expect(fonts.glyphWidth("monospace")).toBe(6.5);
    expect(fonts.rowHeight("monospace")).toBe(13);
    expect(fonts.measureLine("abcd", "monospace")).toBe(26);
  });

  it("lays out rows and glyphs", () => {
    const galley = fonts.layout("ab\ncde", "monospace", Infinity);
    expect(galley.size).toEqual({ x: 19.5, y: 26 });
    expect(galley.rows.map((row) => row.text)).toEqual(["ab", "cde"]);
    expect(galley.glyphs).toHaveLength(5);
    expect(galley.glyphs[3]).toEqual({ char: "d", pos: { x: 6.5, y: 13 }, size: { x: 6.5, y: 13 } });
  });

  it("word-wraps to the given width", () => {
    const galley = fonts.layout("aa bb cc", "monospace", 40);
    expect(galley.rows.map((row) => row.text)).toEqual(["aa bb", "cc"]);
    expect(galley.size).toEqual({ x: 32.5, y: 26 });
  });

  it("gives an overlong word its own row", () => {
    const galley = fonts.layout("a abcdefgh b", "monospace", 20);
    expect(galley.rows.map((row) => row.text)).toEqual(["a", "abcdefgh", "b"]);
  });

  it("keeps its own copy of the definitions", () => {
    const defs = cloneFontDefinitions(DEFAULT_FONT_DEFINITIONS);
    const own = new MonospaceFonts(defs);
    defs.fonts.body.size = 99;
    expect(fontDefinitionsEqual(own.definitions(), DEFAULT_FONT_DEFINITIONS)).toBe(true);
  });
});
