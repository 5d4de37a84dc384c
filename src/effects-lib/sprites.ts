import type { LoadedSheet } from "../platform/pixmap.js";
import type { Rect } from "../platform/types.js";
import { mod } from "./math.js";

export type SpriteSheet = LoadedSheet;

/** Source rectangle of frame `k` in a horizontal strip. */
export const frameRect = (sheet: SpriteSheet, k: number): Rect => ({
  x: k * sheet.frameWidth,
  y: 0,
  w: sheet.frameWidth,
  h: sheet.frameHeight,
});

/** `floor((t mod period) / framePeriod) mod frameCount`. */
export const frameAt = (
  t: number,
  period: number,
  framePeriod: number,
  frameCount: number,
): number => Math.floor(mod(t, period) / framePeriod) % frameCount;

/**
 * Four-frame flap over a 0.4 s cycle walking 0→1→2→3 in the first half and
 * 3→2→1 in the second. Direction -1 plays the mirrored sequence.
 */
export const flapFrame = (local: number, direction: 1 | -1, cycle = 0.4): number => {
  const half = cycle / 2;
  const c = mod(local, cycle);
  const forward =
    c < half ? Math.floor((c / half) * 4) : 3 - Math.floor(((c - half) / half) * 3);
  const clamped = Math.max(0, Math.min(3, forward));
  return direction === 1 ? clamped : 3 - clamped;
};

export interface AnimParam {
  readonly flyDuration: number;
  readonly delay: number;
  readonly direction: 1 | -1;
}

export interface MoverPhase {
  readonly local: number;
  readonly cycle: number;
  /** Position in the current repetition, [0, 1). */
  readonly fraction: number;
}

/** Null while the mover is still waiting for its delay. */
export const moverPhase = (t: number, anim: AnimParam): MoverPhase | null => {
  const local = t - anim.delay;
  if (local < 0) {
    return null;
  }
  const cycle = mod(local, anim.flyDuration);
  return { local, cycle, fraction: cycle / anim.flyDuration };
};
