/**
 * Layers group paint output and decide which area owns a screen point.
 */

import { Id } from "./Id";

/** Z-order classes, painted in this order. */
export type Order = "background" | "middle" | "foreground" | "debug";

export const ORDERS: readonly Order[] = ["background", "middle", "foreground", "debug"];

export function orderRank(order: Order): number {
  return ORDERS.indexOf(order);
}

export interface Layer {
  readonly order: Order;
  readonly id: Id;
}

export function layer(order: Order, id: Id): Layer {
  return { order, id };
}

/** The full-screen layer behind every window. */
export function backgroundLayer(): Layer {
  return { order: "background", id: Id.background() };
}

/** Reserved layer for diagnostics; always painted last. */
export function debugLayer(): Layer {
  return { order: "debug", id: Id.new("debug") };
}

export function layerEquals(a: Layer | null, b: Layer | null): boolean {
  if (a === null || b === null) return a === b;
  return a.order === b.order && a.id.value === b.id.value;
}

/** Map key for a layer. */
export function layerKey(l: Layer): string {
  return `${l.order}:${l.id.value}`;
}
