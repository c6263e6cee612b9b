/**
 * Monotonic id source shared by concurrent sessions (connection ids, match ids).
 * JavaScript runs sessions on one thread, so next() cannot interleave.
 */
export class Counter {
  private value: number;

  constructor(start = 0) {
    this.value = start;
  }

  /** Increments and returns the new value; the first call returns start + 1. */
  next(): number {
    this.value += 1;
    return this.value;
  }

  /** Last value handed out (start if none yet). */
  get current(): number {
    return this.value;
  }
}
