import type { Renderer, Texture, Viewport } from "../../platform/types.js";
import { readIntFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { randBelow, rgba, type RandomSource } from "../math.js";
import { FlashMachine, type FlashTiming } from "../rain.js";

const REFERENCE_FRAME = 0.016;
const TILE_HEIGHT = 120;
const GRAVITY = 20;
const SKY = rgba(50, 60, 80);
const SKY_FLASH = rgba(200, 220, 255);

export const LIGHTNING: FlashTiming = {
  intervalMin: 8,
  intervalMax: 60,
  durationMin: 0.8,
  durationMax: 2.4,
};

export interface RainLayer {
  /** Background scroll in px/s before the speed multiplier. */
  readonly wind: number;
  /** Share of the wind that drops on this layer drift with. */
  readonly drift: number;
  readonly streakAlpha: number;
}

/** Near, mid and far. */
export const RAIN_LAYERS: readonly RainLayer[] = [
  { wind: 60, drift: 0.5, streakAlpha: 90 },
  { wind: 40, drift: 0.3, streakAlpha: 60 },
  { wind: 20, drift: 0.2, streakAlpha: 35 },
];

export interface StormDrop {
  x: number;
  /** Fall distance; the drop is drawn at `fall mod H` while `fall < H`. */
  fall: number;
  layer: number;
}

export interface RainstormOptions extends CommonOptions {
  readonly drops: number;
}

/** Transparent tile of slanted streaks used as one parallax rain sheet. */
export const rainTile = (
  width: number,
  height: number,
  streaks: number,
  alpha: number,
  rand: RandomSource,
): Uint8ClampedArray => {
  const pixels = new Uint8ClampedArray(width * height * 4);
  for (let s = 0; s < streaks; s += 1) {
    const x0 = randBelow(rand, width);
    const y0 = randBelow(rand, height);
    const length = 6 + randBelow(rand, 10);
    for (let k = 0; k < length; k += 1) {
      const x = (x0 + Math.trunc(k / 3)) % width;
      const y = (y0 + k) % height;
      const i = (y * width + x) * 4;
      pixels[i] = 170;
      pixels[i + 1] = 200;
      pixels[i + 2] = 255;
      pixels[i + 3] = alpha;
    }
  }
  return pixels;
};

export class Storm {
  readonly drops: StormDrop[];
  readonly scroll = RAIN_LAYERS.map(() => 0);

  constructor(
    private readonly viewport: Viewport,
    count: number,
    private readonly rand: RandomSource,
  ) {
    this.drops = Array.from({ length: count }, () => ({
      x: randBelow(rand, viewport.width),
      fall: 200 + randBelow(rand, 200),
      layer: randBelow(rand, RAIN_LAYERS.length),
    }));
  }

  step(dt: number, speed: number): void {
    const { width: W, height: H } = this.viewport;
    const frames = dt / REFERENCE_FRAME;
    RAIN_LAYERS.forEach((layer, i) => {
      this.scroll[i] += layer.wind * speed * dt;
      if (this.scroll[i] >= W) {
        this.scroll[i] -= W;
      }
    });
    for (const drop of this.drops) {
      const layer = RAIN_LAYERS[drop.layer];
      drop.fall += GRAVITY * speed * frames;
      drop.x += layer.wind * layer.drift * speed * dt;
      if (drop.x > W + 10 || drop.x < -10 || drop.fall > H * 2) {
        drop.x = randBelow(this.rand, W);
        drop.fall = 200 + randBelow(this.rand, 200);
      }
    }
  }
}

class RainstormInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: RainstormOptions,
    private readonly storm: Storm,
    private readonly lightning: FlashMachine,
    private readonly tiles: readonly Texture[],
    private readonly renderer: Renderer,
  ) {}

  update(dt: number): void {
    this.storm.step(dt, this.options.speed);
    this.lightning.step(dt);
  }

  render(renderer: Renderer): void {
    const { width: W, height: H } = this.viewport;
    const sky = this.lightning.state === "flashing" ? SKY_FLASH : SKY;
    renderer.fillRect({ x: 0, y: 0, w: W, h: H }, sky);

    // Far sheet lowest, near sheet highest.
    for (let i = RAIN_LAYERS.length - 1; i >= 0; i -= 1) {
      const y = H - TILE_HEIGHT * (i + 1);
      const offset = Math.trunc(this.storm.scroll[i]);
      for (const x of [offset - W, offset, offset + W]) {
        renderer.blit(this.tiles[i], null, { x, y, w: W, h: TILE_HEIGHT });
      }
    }

    for (const drop of this.storm.drops) {
      if (drop.fall >= H) {
        continue;
      }
      const near = drop.layer === 0;
      const alpha = Math.max(0, Math.trunc(255 - (drop.fall / H) * 128));
      const x = Math.trunc(drop.x);
      renderer.drawLine(
        { x, y: Math.trunc(drop.fall) % H },
        { x: x + (near ? 2 : 1), y: Math.trunc(drop.fall + (near ? 10 : 5)) % H },
        rgba(150, 200, 255, alpha),
      );
    }
  }

  teardown(): void {
    for (const tile of this.tiles) {
      this.renderer.destroyTexture(tile);
    }
  }
}

export const RainstormDefinition: EffectDefinition<RainstormOptions> = {
  type: "rainstorm",
  title: "Rainstorm",
  flags: [{ flag: "n", argument: "N", description: "Number of drops (default: 300)" }],
  assets: [],
  parseOptions: (args) => ({
    ...args.common,
    drops: readIntFlag(args.flags, "n", 300, 10, 5000),
  }),
  init: (context: EffectContext, options) => {
    const rand = () => context.rng.next();
    const { width: W } = context.viewport;
    const tiles = RAIN_LAYERS.map((layer) =>
      context.renderer.createTexture(
        W,
        TILE_HEIGHT,
        rainTile(W, TILE_HEIGHT, Math.trunc(W / 6), layer.streakAlpha, rand),
      ),
    );
    return new RainstormInstance(
      context.viewport,
      options,
      new Storm(context.viewport, options.drops, rand),
      new FlashMachine(LIGHTNING, rand),
      tiles,
      context.renderer,
    );
  },
};
