import type { Viewport } from "../platform/types.js";
import { randBelow, type RandomSource } from "./math.js";
import { createSlotPool, type SlotPool } from "./pooling.js";

export const MAX_TRAIL = 35;
/** Frame length the fall speeds are expressed in. */
const REFERENCE_FRAME = 1 / 60;
const FADE_PER_FRAME = 5;
const FADE_FLOOR = 10;
const REBRIGHTEN_CHANCE = 0.015;

export interface MatrixStream {
  active: boolean;
  x: number;
  /** Head position; character `c` sits at `y - c · charHeight`. */
  y: number;
  /** Pixels per reference frame. */
  speed: number;
  length: number;
  /** Glyph indices into the atlas. */
  readonly glyphs: Uint16Array;
  /** 0..255 per character. */
  readonly brightness: Uint8ClampedArray;
}

export interface MatrixRainOptions {
  readonly maxStreams: number;
  readonly charWidth: number;
  readonly charHeight: number;
  readonly glyphCount: number;
}

/**
 * Pool of falling glyph columns. After every step at least
 * `maxStreams - 10` streams are active.
 */
export class MatrixRain {
  readonly pool: SlotPool<MatrixStream>;
  readonly floor: number;

  constructor(
    private readonly viewport: Viewport,
    private readonly options: MatrixRainOptions,
    private readonly rand: RandomSource,
  ) {
    this.pool = createSlotPool(options.maxStreams, () => ({
      active: false,
      x: -1,
      y: 0,
      speed: 0,
      length: 0,
      glyphs: new Uint16Array(MAX_TRAIL),
      brightness: new Uint8ClampedArray(MAX_TRAIL),
    }));
    this.floor = Math.max(0, options.maxStreams - 10);

    const { width: W, height: H } = viewport;
    const columns = Math.min(
      options.maxStreams,
      Math.ceil(W / Math.max(1, options.charWidth)),
    );
    for (let i = 0; i < columns; i += 1) {
      const stream = this.pool.acquire();
      if (!stream) {
        break;
      }
      this.fill(stream, {
        x: i * options.charWidth,
        y: -randBelow(rand, H * 2),
        speed: 0.5 + randBelow(rand, 8) / 2,
        length: 18 + randBelow(rand, 17),
        minBrightness: 40,
      });
    }
    this.topUp();
  }

  activeCount(): number {
    return this.pool.activeCount();
  }

  step(dt: number, speed: number): void {
    const frames = dt / REFERENCE_FRAME;
    const fade = Math.floor(frames * FADE_PER_FRAME * speed);
    const limit = this.viewport.height;

    this.pool.forEachActive((stream) => {
      stream.y += stream.speed * speed * frames;
      for (let c = stream.length - 1; c >= 1; c -= 1) {
        if (stream.brightness[c] > FADE_FLOOR) {
          stream.brightness[c] = Math.max(FADE_FLOOR, stream.brightness[c] - fade);
        }
      }
      if (this.rand() < REBRIGHTEN_CHANCE) {
        stream.brightness[randBelow(this.rand, stream.length)] = 255;
      }
      if (stream.y > limit + stream.length * this.options.charHeight) {
        this.pool.release(stream);
      }
    });
    this.topUp();
  }

  private topUp() {
    const { width: W, height: H } = this.viewport;
    while (this.pool.activeCount() < this.floor) {
      const stream = this.pool.acquire();
      if (!stream) {
        return;
      }
      this.fill(stream, {
        x: randBelow(this.rand, W + 100),
        y: -randBelow(this.rand, Math.trunc(H / 4)),
        speed: 0.5 + randBelow(this.rand, 20) / 4,
        length: 15 + randBelow(this.rand, 20),
        minBrightness: 30,
      });
    }
  }

  private fill(
    stream: MatrixStream,
    init: { x: number; y: number; speed: number; length: number; minBrightness: number },
  ) {
    stream.x = init.x;
    stream.y = init.y;
    stream.speed = init.speed;
    stream.length = Math.min(MAX_TRAIL, init.length);
    for (let c = 0; c < stream.length; c += 1) {
      stream.glyphs[c] = randBelow(this.rand, this.options.glyphCount);
      stream.brightness[c] = init.minBrightness + randBelow(this.rand, 255 - init.minBrightness);
    }
    stream.brightness[0] = 255;
  }
}
