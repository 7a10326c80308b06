/**
 * Exclusive access to one mutable subsystem of a Context.
 *
 * Access is scoped to a callback. Re-entering the same cell while it is held
 * is a programming error and throws instead of silently aliasing state.
 * A retired cell belongs to a previous frame's generation and refuses all
 * further access.
 */
export class Guarded<T> {
  readonly name: string;
  private value: T;
  private locked = false;
  private retired = false;

  constructor(name: string, value: T) {
    this.name = name;
    this.value = value;
  }

  /**
   * Run `fn` with exclusive access to the value.
   */
  lock<R>(fn: (value: T) => R): R {
    this.assertUsable();
    this.locked = true;
    try {
      return fn(this.value);
    } finally {
      this.locked = false;
    }
  }

  /** Replace the value. */
  set(value: T): void {
    this.assertUsable();
    this.value = value;
  }

  /** Replace the value, returning the previous one. */
  replace(value: T): T {
    this.assertUsable();
    const previous = this.value;
    this.value = value;
    return previous;
  }

  isLocked(): boolean {
    return this.locked;
  }

  /** Stop all further access; used when a generation is superseded. */
  retire(): void {
    this.retired = true;
  }

  private assertUsable(): void {
    if (this.retired) {
      throw new Error(`${this.name} belongs to a retired frame generation`);
    }
    if (this.locked) {
      throw new Error(`${this.name} already locked`);
    }
  }
}
