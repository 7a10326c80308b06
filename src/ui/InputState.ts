/**
 * Input snapshot
 *
 * Immutable per-frame view of pointer and keyboard state. Each frame's
 * snapshot is derived from the raw platform input plus the previous
 * snapshot, which is how press/release edges, click candidacy, double-click
 * timing and pointer deltas are computed.
 */

import { type Pos2, type Vec2, ZERO, distance, scale, sub } from "../math/vec2";

/** A pointer press that moves further than this is a drag, not a click */
export const MAX_CLICK_DIST = 6;
/** Seconds between two clicks for them to count as a double-click */
export const MAX_DOUBLE_CLICK_DELAY = 0.3;

export type InputEvent =
  | { type: "copy" }
  | { type: "cut" }
  | { type: "text"; text: string }
  | { type: "key"; key: string; pressed: boolean };

/** What the platform layer hands over each frame. */
export interface RawInput {
  /** Primary button held */
  mouseDown: boolean;
  /** Pointer position in points, or null when the pointer is outside */
  mousePos: Pos2 | null;
  scrollDelta: Vec2;
  /** Screen size in points */
  screenSize: Vec2;
  /** Physical pixels per point. Defaults to 1. */
  pixelsPerPoint?: number;
  /** Monotonic time in seconds */
  time: number;
  events: readonly InputEvent[];
}

export function defaultRawInput(): RawInput {
  return {
    mouseDown: false,
    mousePos: null,
    scrollDelta: ZERO,
    screenSize: ZERO,
    time: 0,
    events: [],
  };
}

export interface MouseInput {
  /** Held down this frame (and over the screen) */
  readonly down: boolean;
  /** Went down this frame */
  readonly pressed: boolean;
  /** Went up this frame */
  readonly released: boolean;
  /** The current press has not yet moved far enough to be a drag */
  readonly couldBeClick: boolean;
  /** Released this frame while it could still be a click */
  readonly click: boolean;
  /** A click shortly after the previous one */
  readonly doubleClick: boolean;
  /** Time of the last click, or -Infinity */
  readonly lastClickTime: number;
  readonly pos: Pos2 | null;
  /** Where the current press started */
  readonly pressOrigin: Pos2 | null;
  /** Movement since last frame */
  readonly delta: Vec2;
  /** Points per second */
  readonly velocity: Vec2;
}

const INITIAL_MOUSE: MouseInput = {
  down: false,
  pressed: false,
  released: false,
  couldBeClick: false,
  click: false,
  doubleClick: false,
  lastClickTime: -Infinity,
  pos: null,
  pressOrigin: null,
  delta: ZERO,
  velocity: ZERO,
};

function nextMouse(prev: MouseInput, raw: RawInput, dt: number): MouseInput {
  const newPos = raw.mousePos;
  const delta = newPos && prev.pos ? sub(newPos, prev.pos) : ZERO;
  const pressed = !prev.down && raw.mouseDown;
  const released = prev.down && !raw.mouseDown;
  const click = released && prev.couldBeClick;
  const doubleClick = click && raw.time - prev.lastClickTime < MAX_DOUBLE_CLICK_DELAY;
  const lastClickTime = click ? raw.time : prev.lastClickTime;

  let pressOrigin = prev.pressOrigin;
  let couldBeClick = prev.couldBeClick;
  if (pressed) {
    pressOrigin = newPos;
    couldBeClick = true;
  } else if (!prev.down || prev.pos === null) {
    pressOrigin = null;
  }

  if (newPos && pressOrigin) {
    couldBeClick = couldBeClick && distance(pressOrigin, newPos) < MAX_CLICK_DIST;
  } else {
    couldBeClick = false;
  }

  // A press resets motion tracking
  const velocity = pressed || dt <= 0 || !newPos ? ZERO : scale(delta, 1 / dt);

  return Object.freeze({
    down: raw.mouseDown && newPos !== null,
    pressed,
    released,
    couldBeClick,
    click,
    doubleClick,
    lastClickTime,
    pos: newPos,
    pressOrigin,
    delta,
    velocity,
  });
}

/**
 * Immutable input state for one frame.
 */
export class InputState {
  readonly mouse: MouseInput;
  readonly scrollDelta: Vec2;
  readonly screenSize: Vec2;
  readonly pixelsPerPoint: number;
  readonly time: number;
  /** Seconds since the previous frame, unclamped */
  readonly unstableDt: number;
  /** Expected duration of this frame */
  readonly predictedDt: number;
  readonly events: readonly InputEvent[];
  /** The raw input this snapshot was built from */
  readonly raw: RawInput;

  private readonly keysHeld: ReadonlySet<string>;
  private readonly keysPressed: ReadonlySet<string>;
  private readonly keysReleased: ReadonlySet<string>;
  private readonly typed: string;

  private constructor(
    mouse: MouseInput,
    raw: RawInput,
    unstableDt: number,
    keysHeld: ReadonlySet<string>,
    keysPressed: ReadonlySet<string>,
    keysReleased: ReadonlySet<string>,
    typed: string
  ) {
    this.mouse = mouse;
    this.raw = raw;
    this.scrollDelta = raw.scrollDelta;
    this.screenSize = raw.screenSize;
    this.pixelsPerPoint = raw.pixelsPerPoint ?? 1;
    this.time = raw.time;
    this.unstableDt = unstableDt;
    this.predictedDt = 1 / 60;
    this.events = [...raw.events];
    this.keysHeld = keysHeld;
    this.keysPressed = keysPressed;
    this.keysReleased = keysReleased;
    this.typed = typed;
    Object.freeze(this);
  }

  /** The state before any input has arrived. */
  static initial(): InputState {
    return new InputState(INITIAL_MOUSE, defaultRawInput(), 0, new Set(), new Set(), new Set(), "");
  }

  /**
   * Derive the next frame's snapshot. `this` is left untouched.
   */
  next(raw: RawInput): InputState {
    const unstableDt = raw.time - this.time;
    const mouse = nextMouse(this.mouse, raw, unstableDt);

    const held = new Set(this.keysHeld);
    const pressed = new Set<string>();
    const released = new Set<string>();
    let typed = "";
    for (const event of raw.events) {
      if (event.type === "key") {
        if (event.pressed) {
          pressed.add(event.key);
          held.add(event.key);
        } else {
          released.add(event.key);
          held.delete(event.key);
        }
      } else if (event.type === "text") {
        typed += event.text;
      }
    }

    return new InputState(mouse, raw, unstableDt, held, pressed, released, typed);
  }

  /** Check if a key went down this frame. */
  isKeyPressed(key: string): boolean {
    return this.keysPressed.has(key);
  }

  /** Check if a key went up this frame. */
  isKeyReleased(key: string): boolean {
    return this.keysReleased.has(key);
  }

  /** Check if a key is currently held. */
  isKeyDown(key: string): boolean {
    return this.keysHeld.has(key);
  }

  /** Text typed this frame. */
  typedText(): string {
    return this.typed;
  }

  /** Whether the platform asked for a copy this frame. */
  wantsCopy(): boolean {
    return this.events.some((e) => e.type === "copy");
  }

  /** Whether the platform asked for a cut this frame. */
  wantsCut(): boolean {
    return this.events.some((e) => e.type === "cut");
  }
}
