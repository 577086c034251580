/**
 * Fixed-latency register pipeline for the debug synchronisers.
 * Ring buffer of `latency` stages: a value captured on edge 1 emerges on edge `latency`.
 */
export class DelayLine<T> {
  private head: number;
  private body: T[];
  private readonly latency: number;
  private readonly idle: T;

  constructor(latency: number, idle: T) {
    this.latency = latency;
    this.idle = idle;
    this.head = 0;
    this.body = new Array<T>(latency).fill(idle);
  }

  /** Clock one edge: capture `input`, return the value leaving the last stage. */
  advance(input: T): T {
    this.body[this.head] = input;
    this.head = (this.head + 1) % this.latency;
    return this.body[this.head];
  }

  /** Values in flight, most recently captured first */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.latency; i++) {
      result.push(this.body[(this.head - 1 - i + this.latency * 2) % this.latency]);
    }
    return result;
  }

  /** Drop everything in flight; stages refill with `level` (the idle value by default). */
  clear(level: T = this.idle): void {
    this.head = 0;
    this.body.fill(level);
  }
}
