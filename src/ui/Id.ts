/**
 * Widget identity.
 *
 * Widgets are re-declared every frame, so anything that must survive between
 * frames (click/drag ownership, window positions, toggles) is keyed by an Id
 * derived from a caller-supplied source value.
 */

/** Values an Id can be derived from. */
export type IdSource = string | number | boolean | readonly IdSource[];

/**
 * 53-bit string hash (two interleaved 32-bit multiplicative hashes).
 */
function hashString(text: string, seed: number = 0): number {
  let h1 = 0xdeadbeef ^ seed;
  let h2 = 0x41c6ce57 ^ seed;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    h1 = Math.imul(h1 ^ ch, 2654435761);
    h2 = Math.imul(h2 ^ ch, 1597334677);
  }
  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507);
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909);
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507);
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909);
  return 4294967296 * (2097151 & h2) + (h1 >>> 0);
}

/**
 * Stable textual form of a source. Type-tagged so that `1` and `"1"`
 * hash differently.
 */
export function describeSource(source: IdSource): string {
  if (typeof source === "string") return JSON.stringify(source);
  if (typeof source === "number" || typeof source === "boolean") return String(source);
  return `[${source.map(describeSource).join(", ")}]`;
}

export class Id {
  /** Hex form of the hash; usable as a Map key */
  readonly value: string;

  private constructor(value: string) {
    this.value = value;
  }

  /** Hash a source value into an Id. */
  static new(source: IdSource): Id {
    return new Id(hashString(describeSource(source)).toString(16));
  }

  /** The reserved Id of the full-screen background area. */
  static background(): Id {
    return new Id("background");
  }

  /** Derive a child Id scoped under this one. */
  with(child: IdSource): Id {
    return new Id(hashString(describeSource(child), hashString(this.value)).toString(16));
  }

  equals(other: Id | null): boolean {
    return other !== null && other.value === this.value;
  }

  toString(): string {
    return `Id(${this.value})`;
  }
}

/** Compare two optional Ids by value. */
export function sameId(a: Id | null, b: Id | null): boolean {
  if (a === null || b === null) return a === b;
  return a.value === b.value;
}
