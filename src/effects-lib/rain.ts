import type { Viewport } from "../platform/types.js";
import { randRange, type RandomSource } from "./math.js";

/** tan(15°): horizontal advance per unit of fall. */
export const SLANT = 0.268;

export interface RainDrop {
  x: number;
  y: number;
  /** Pixels per reference frame before the sinusoidal modulation. */
  readonly fall: number;
  readonly phase: number;
}

const REFERENCE_FRAME = 0.016;

/**
 * Slanted point drops. The fall rate swings sinusoidally per drop; drops that
 * leave the bottom respawn above the top across a range widened by the slant
 * so the left edge stays covered.
 */
export class SlantedRain {
  readonly drops: RainDrop[];

  constructor(
    private readonly viewport: Viewport,
    count: number,
    private readonly rand: RandomSource,
  ) {
    this.drops = Array.from({ length: count }, () => ({
      x: this.spawnX(),
      y: randRange(rand, -viewport.height, viewport.height),
      fall: randRange(rand, 8, 16),
      phase: randRange(rand, 0, Math.PI * 2),
    }));
  }

  step(dt: number, elapsed: number, speed: number): void {
    const frames = (dt / REFERENCE_FRAME) * speed;
    const { height: H } = this.viewport;
    for (const drop of this.drops) {
      const dy = drop.fall * (1 + 0.35 * Math.sin(elapsed * 3 + drop.phase)) * frames;
      drop.y += dy;
      drop.x += SLANT * dy;
      if (drop.y > H) {
        drop.y = -randRange(this.rand, 0, H * 0.25);
        drop.x = this.spawnX();
      }
    }
  }

  private spawnX(): number {
    const { width: W, height: H } = this.viewport;
    return randRange(this.rand, -SLANT * H, W);
  }
}

export type FlashState = "dark" | "flashing";

export interface FlashTiming {
  readonly intervalMin: number;
  readonly intervalMax: number;
  readonly durationMin: number;
  readonly durationMax: number;
}

export const HARD_RAIN_FLASH: FlashTiming = {
  intervalMin: 4,
  intervalMax: 8,
  durationMin: 0.15,
  durationMax: 0.15,
};

/** Dark → Flashing → Dark, with a fresh interval drawn after every flash. */
export class FlashMachine {
  state: FlashState = "dark";
  remaining: number;
  flashes = 0;

  constructor(
    private readonly timing: FlashTiming,
    private readonly rand: RandomSource,
  ) {
    this.remaining = randRange(rand, timing.intervalMin, timing.intervalMax);
  }

  step(dt: number): FlashState {
    this.remaining -= dt;
    if (this.remaining > 0) {
      return this.state;
    }
    if (this.state === "dark") {
      this.state = "flashing";
      this.flashes += 1;
      this.remaining += randRange(this.rand, this.timing.durationMin, this.timing.durationMax);
    } else {
      this.state = "dark";
      this.remaining += randRange(this.rand, this.timing.intervalMin, this.timing.intervalMax);
    }
    return this.state;
  }
}
