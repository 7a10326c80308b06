/**
 * Id Registry
 *
 * Per-frame record of which Ids were claimed where. Two claims of one Id at
 * different screen positions mean two widgets hashed to the same identity,
 * which would make them share click/drag ownership.
 */

import { type Pos2, distance } from "../math/vec2";
import type { Id } from "./Id";

/** Default distance below which a repeat claim is the same widget */
export const DEFAULT_ID_CLASH_DISTANCE = 4;

export interface IdClash {
  readonly id: Id;
  readonly sourceName: string;
  readonly firstPos: Pos2;
  readonly secondPos: Pos2;
}

export class IdRegistry {
  private used = new Map<string, Pos2>();
  private readonly clashDistance: number;

  constructor(clashDistance: number = DEFAULT_ID_CLASH_DISTANCE) {
    this.clashDistance = clashDistance;
  }

  /**
   * Record that `id` was claimed at `pos` this frame.
   * Returns the clash if the Id was already claimed somewhere else.
   */
  register(id: Id, sourceName: string, pos: Pos2): IdClash | null {
    const previous = this.used.get(id.value);
    this.used.set(id.value, pos);
    if (previous === undefined || distance(previous, pos) < this.clashDistance) {
      return null;
    }
    return { id, sourceName, firstPos: previous, secondPos: pos };
  }

  has(id: Id): boolean {
    return this.used.has(id.value);
  }

  size(): number {
    return this.used.size;
  }

  clear(): void {
    this.used.clear();
  }
}
