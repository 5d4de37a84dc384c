import { clamp } from "./math.js";

export const SPREAD_THRESHOLD = 0.1;
export const BURN_THRESHOLD = 0.5;
export const ASH_THRESHOLD = 0.8;

/** Fraction of a cell's intensity passed to each 4-neighbour per reference step. */
const SPREAD_SHARE = 0.075;
const DECAY = 0.1;
const BURN_RATE = 0.02;
const ASH_RATE = 0.01;

export interface FireCell {
  readonly x: number;
  readonly y: number;
  readonly intensity: number;
}

/**
 * Square fire simulation over three [0, 1] fields. `step(k)` advances one
 * reference frame scaled by `k` (dt / 16 ms times the speed multiplier).
 * Intensity is capped at `1 - ash`, so fully charred cells no longer burn.
 */
export class FireGrid {
  readonly intensity: Float64Array;
  readonly burn: Float64Array;
  readonly ash: Float64Array;
  private readonly scratch: Float64Array;

  constructor(readonly size: number) {
    const cells = size * size;
    this.intensity = new Float64Array(cells);
    this.burn = new Float64Array(cells);
    this.ash = new Float64Array(cells);
    this.scratch = new Float64Array(cells);
  }

  index(x: number, y: number): number {
    return y * this.size + x;
  }

  /** Three seeds along the bottom: both corners at 0.8, the middle at 0.6. */
  igniteDefault(): void {
    const n = this.size;
    const row = Math.max(0, n - 5);
    this.ignite(Math.min(5, n - 1), row, 0.8);
    this.ignite(Math.max(0, n - 5), row, 0.8);
    this.ignite(Math.floor(n / 2), row, 0.6);
  }

  ignite(x: number, y: number, intensity: number): void {
    this.intensity[this.index(x, y)] = clamp(intensity, 0, 1);
  }

  reset(): void {
    this.intensity.fill(0);
    this.burn.fill(0);
    this.ash.fill(0);
  }

  step(k: number): void {
    const n = this.size;
    const next = this.scratch;
    next.set(this.intensity);

    for (let y = 0; y < n; y += 1) {
      for (let x = 0; x < n; x += 1) {
        const value = this.intensity[this.index(x, y)];
        if (value <= SPREAD_THRESHOLD) {
          continue;
        }
        const share = value * SPREAD_SHARE * k;
        if (x > 0) next[this.index(x - 1, y)] += share;
        if (x < n - 1) next[this.index(x + 1, y)] += share;
        if (y > 0) next[this.index(x, y - 1)] += share;
        if (y < n - 1) next[this.index(x, y + 1)] += share;
        next[this.index(x, y)] -= value * DECAY * k;
      }
    }

    for (let i = 0; i < next.length; i += 1) {
      const intensity = clamp(next[i], 0, 1 - this.ash[i]);
      this.intensity[i] = intensity;
      if (intensity > BURN_THRESHOLD) {
        this.burn[i] = Math.min(1, this.burn[i] + intensity * BURN_RATE * k);
      }
      if (this.burn[i] > ASH_THRESHOLD) {
        this.ash[i] = Math.min(1, this.ash[i] + ASH_RATE * k);
        this.intensity[i] = Math.min(this.intensity[i], 1 - this.ash[i]);
      }
    }
  }

  /** Cells hot enough to char the paper and throw particles. */
  forEachBurning(visit: (cell: FireCell) => void): void {
    const n = this.size;
    for (let y = 0; y < n; y += 1) {
      for (let x = 0; x < n; x += 1) {
        const intensity = this.intensity[this.index(x, y)];
        if (intensity > BURN_THRESHOLD) {
          visit({ x, y, intensity });
        }
      }
    }
  }

  maxIntensity(): number {
    return this.intensity.reduce((max, value) => Math.max(max, value), 0);
  }

  /** True once nothing can spread any more. */
  isExtinguished(): boolean {
    return this.maxIntensity() <= SPREAD_THRESHOLD;
  }
}
