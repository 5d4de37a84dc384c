import { randRange, type RandomSource } from "./math.js";

export const MIN_LIT_FRACTION = 0.2;
export const MAX_LIT_FRACTION = 0.4;
const TOGGLE_CHANCE = 0.5;
const TIMER_MIN = 0.5;
const TIMER_MAX = 2.0;

/**
 * Lit/dark state for one building's windows. Every cell has its own toggle
 * timer; a toggle is only committed when the lit count stays within
 * `[floor(0.2·N), floor(0.4·N)]`.
 */
export class WindowGrid {
  readonly lit: Uint8Array;
  readonly timers: Float64Array;
  readonly minLit: number;
  readonly maxLit: number;
  private litTotal = 0;

  constructor(
    readonly cols: number,
    readonly rows: number,
    private readonly rand: RandomSource,
  ) {
    const cells = Math.max(0, cols * rows);
    this.lit = new Uint8Array(cells);
    this.timers = new Float64Array(cells);
    this.minLit = Math.floor(MIN_LIT_FRACTION * cells);
    this.maxLit = Math.floor(MAX_LIT_FRACTION * cells);

    const initial = Math.floor((this.minLit + this.maxLit) / 2);
    const order = Array.from({ length: cells }, (_, i) => i);
    for (let i = order.length - 1; i > 0; i -= 1) {
      const j = Math.floor(rand() * (i + 1));
      [order[i], order[j]] = [order[j], order[i]];
    }
    for (const cell of order.slice(0, initial)) {
      this.lit[cell] = 1;
    }
    this.litTotal = initial;
    for (let i = 0; i < cells; i += 1) {
      this.timers[i] = randRange(rand, TIMER_MIN, TIMER_MAX);
    }
  }

  get size(): number {
    return this.lit.length;
  }

  get litCount(): number {
    return this.litTotal;
  }

  isLit(col: number, row: number): boolean {
    return this.lit[row * this.cols + col] === 1;
  }

  step(dt: number): void {
    for (let i = 0; i < this.timers.length; i += 1) {
      this.timers[i] -= dt;
      if (this.timers[i] > 0) {
        continue;
      }
      this.timers[i] = randRange(this.rand, TIMER_MIN, TIMER_MAX);
      if (this.rand() >= TOGGLE_CHANCE) {
        continue;
      }
      const next = this.litTotal + (this.lit[i] === 1 ? -1 : 1);
      if (next < this.minLit || next > this.maxLit) {
        continue;
      }
      this.lit[i] = this.lit[i] === 1 ? 0 : 1;
      this.litTotal = next;
    }
  }
}
