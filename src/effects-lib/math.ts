import type { Color } from "../platform/types.js";

export const TAU = Math.PI * 2;

export const clamp = (x: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, x));
export const clamp01 = (x: number): number => Math.max(0, Math.min(1, x));
export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

export type RandomSource = () => number;

export const randRange = (rand: RandomSource, a: number, b: number): number =>
  a + rand() * (b - a);
/** Inclusive on both ends. */
export const randInt = (rand: RandomSource, a: number, b: number): number =>
  Math.floor(randRange(rand, a, b + 1));
/** Integer in [0, n), like `rand() % n`. */
export const randBelow = (rand: RandomSource, n: number): number =>
  n <= 0 ? 0 : Math.floor(rand() * n);

export const rgba = (r: number, g: number, b: number, a = 255): Color => ({ r, g, b, a });
export const withAlpha = (color: Color, a: number): Color => ({ ...color, a });

export const WHITE = rgba(255, 255, 255);
export const BLACK = rgba(0, 0, 0);

/** h in degrees, s and v in [0, 1]. */
export const hsvToColor = (h: number, s: number, v: number, a = 255): Color => {
  const hue = ((h % 360) + 360) % 360;
  const c = v * s;
  const x = c * (1 - Math.abs(((hue / 60) % 2) - 1));
  const m = v - c;
  const [r, g, b] =
    hue < 60
      ? [c, x, 0]
      : hue < 120
        ? [x, c, 0]
        : hue < 180
          ? [0, c, x]
          : hue < 240
            ? [0, x, c]
            : hue < 300
              ? [x, 0, c]
              : [c, 0, x];
  return rgba(Math.round((r + m) * 255), Math.round((g + m) * 255), Math.round((b + m) * 255), a);
};

/** Positive remainder. */
export const mod = (a: number, n: number): number => ((a % n) + n) % n;
