/**
 * Which interactions a region is interested in.
 */
export interface Sense {
  readonly click: boolean;
  readonly drag: boolean;
}

export const Sense = {
  nothing: (): Sense => ({ click: false, drag: false }),
  click: (): Sense => ({ click: true, drag: false }),
  drag: (): Sense => ({ click: false, drag: true }),
  clickAndDrag: (): Sense => ({ click: true, drag: true }),
};

export function sensesNothing(sense: Sense): boolean {
  return !sense.click && !sense.drag;
}
