import type { Point, Viewport } from "../platform/types.js";
import { clamp, randBelow, type RandomSource } from "./math.js";

export interface Star {
  x: number;
  y: number;
  vx: number;
  vy: number;
  readonly base: number;
  /** 0..1 after the latest step. */
  brightness: number;
  readonly phase: number;
  readonly twinkleSpeed: number;
  readonly bright: boolean;
}

export interface StarFieldOptions {
  readonly count: number;
  readonly amplitude: number;
  readonly minBrightness: number;
  /** Stars move and wrap when set; otherwise they only twinkle. */
  readonly drift: boolean;
  /** Vertical band the stars are seeded and kept in. */
  readonly top: number;
  readonly bottom: number;
  /** Percentage of bright stars. */
  readonly brightPercent: number;
}

export const GLOW_THRESHOLD = 0.8;

/** Twinkling field: `brightness = base + sin(t · speed + phase) · amplitude`, clamped. */
export class StarField {
  readonly stars: Star[];
  time = 0;

  constructor(
    private readonly viewport: Viewport,
    private readonly options: StarFieldOptions,
    rand: RandomSource,
  ) {
    const band = Math.max(1, Math.trunc(options.bottom - options.top));
    this.stars = Array.from({ length: options.count }, () => {
      const base = 0.5 + randBelow(rand, 5) / 10;
      return {
        x: randBelow(rand, viewport.width),
        y: options.top + randBelow(rand, band),
        vx: -0.1 - randBelow(rand, 4) / 10,
        vy: (randBelow(rand, 10) - 5) / 20,
        base,
        brightness: base,
        phase: randBelow(rand, 628) / 100,
        twinkleSpeed: 0.5 + randBelow(rand, 150) / 100,
        bright: randBelow(rand, 100) < options.brightPercent,
      };
    });
  }

  step(dt: number): void {
    const { amplitude, minBrightness, drift, top, bottom } = this.options;
    const W = this.viewport.width;
    this.time += dt;
    for (const star of this.stars) {
      if (drift) {
        star.x += star.vx * dt;
        star.y += star.vy * dt;
        if (star.x < 0) star.x = W;
        if (star.x > W) star.x = 0;
        if (star.y < top) star.y = bottom;
        if (star.y > bottom) star.y = top;
      }
      star.brightness = clamp(
        star.base + Math.sin(this.time * star.twinkleSpeed + star.phase) * amplitude,
        minBrightness,
        1,
      );
    }
  }
}

/** The four plus-shape neighbours drawn around a glowing bright star. */
export const glowPoints = (star: Star): Point[] =>
  star.bright && star.brightness > GLOW_THRESHOLD
    ? [
        { x: star.x - 1, y: star.y },
        { x: star.x + 1, y: star.y },
        { x: star.x, y: star.y - 1 },
        { x: star.x, y: star.y + 1 },
      ]
    : [];

export const toAlpha = (brightness: number): number => Math.round(clamp(brightness, 0, 1) * 255);
