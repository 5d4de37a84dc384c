import type { AudioChunk, AudioDevice } from "../../platform/audio.js";
import { encodeWav } from "../../platform/audio.js";
import type { Compositor } from "../../platform/compositor.js";
import { describeError } from "../../platform/errors.js";
import { MONO_FONTS } from "../../platform/fonts.js";
import type { Color, Renderer, Texture, Viewport } from "../../platform/types.js";
import { readFloatFlag, readIntFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { captureScreenTexture } from "../../runtime/screen-capture.js";
import { integrate, reflectVelocity, resolveElasticCollision, type Body } from "../kinematics.js";
import { hsvToColor, randBelow, rgba, WHITE, type RandomSource } from "../math.js";
import { taperedThickness, Trail } from "../trail.js";

export const WORM_SPEED = 240;
export const WORM_RADIUS = 10;
const GLYPH_SIZE = 8;
const HUE_STEPS = 36;
const CHOMP_RATE = 22050;
const CHOMP_SECONDS = 0.12;

export interface WormsOptions extends CommonOptions {
  readonly worms: number;
  readonly length: number;
  /** 0 keeps heads straight, 1 is the widest random turn. */
  readonly wiggle: number;
  readonly audio: boolean;
}

export interface Worm extends Body {
  readonly color: Color;
  readonly trail: Trail;
}

export const spawnWorm = (viewport: Viewport, length: number, rand: RandomSource): Worm => {
  const x = viewport.width / 2;
  const y = viewport.height / 2;
  const heading = (randBelow(rand, 360) * Math.PI) / 180;
  const color = rgba(randBelow(rand, 256), randBelow(rand, 256), randBelow(rand, 256));
  return {
    x,
    y,
    vx: Math.cos(heading) * WORM_SPEED,
    vy: Math.sin(heading) * WORM_SPEED,
    color,
    trail: new Trail(length, (j) => ({
      x: Math.trunc(x + Math.cos(heading) * j * 0.5),
      y: Math.trunc(y + Math.sin(heading) * j * 0.5),
    })),
  };
};

/** Rotates the heading by a random turn of up to ±10·wiggle radians. */
export const wiggleHeading = (worm: Worm, wiggle: number, rand: RandomSource): void => {
  const turn = (randBelow(rand, 21) - 10) * wiggle;
  const cos = Math.cos(turn);
  const sin = Math.sin(turn);
  const vx = worm.vx * cos - worm.vy * sin;
  worm.vy = worm.vx * sin + worm.vy * cos;
  worm.vx = vx;
};

/** Walls are the pixel edges `[0, W-1] × [0, H-1]`. */
export const bounceInside = (worm: Body, viewport: Viewport): void => {
  if (worm.x < 0) {
    worm.x = 0;
    worm.vx = -worm.vx;
  } else if (worm.x >= viewport.width) {
    worm.x = viewport.width - 1;
    worm.vx = -worm.vx;
  }
  if (worm.y < 0) {
    worm.y = 0;
    worm.vy = -worm.vy;
  } else if (worm.y >= viewport.height) {
    worm.y = viewport.height - 1;
    worm.vy = -worm.vy;
  }
};

/**
 * Pushes `head` out of every segment of `other` (except its head) that it
 * overlaps and mirrors its velocity about the contact normal.
 */
export const collideWithBody = (head: Worm, other: Worm): boolean => {
  let hit = false;
  other.trail.points.forEach((segment, k) => {
    if (k === 0) {
      return;
    }
    const dx = head.x - segment.x;
    const dy = head.y - segment.y;
    const dist = Math.hypot(dx, dy);
    if (dist >= WORM_RADIUS || dist <= 0) {
      return;
    }
    const n = { x: dx / dist, y: dy / dist };
    const overlap = WORM_RADIUS - dist;
    head.x += n.x * overlap;
    head.y += n.y * overlap;
    reflectVelocity(head, n);
    hit = true;
  });
  return hit;
};

export class WormPit {
  readonly worms: Worm[];

  constructor(
    private readonly viewport: Viewport,
    private readonly options: WormsOptions,
    private readonly rand: RandomSource,
  ) {
    this.worms = Array.from({ length: options.worms }, () =>
      spawnWorm(viewport, options.length, rand),
    );
  }

  /** Returns how many contacts happened during the step. */
  step(dt: number): number {
    let contacts = 0;
    for (const worm of this.worms) {
      wiggleHeading(worm, this.options.wiggle, this.rand);
      integrate(worm, dt, this.options.speed);
      bounceInside(worm, this.viewport);
    }
    for (let i = 0; i < this.worms.length; i += 1) {
      for (let j = i + 1; j < this.worms.length; j += 1) {
        const a = this.worms[i];
        const b = this.worms[j];
        if (resolveElasticCollision(a, b, 2 * WORM_RADIUS)) {
          contacts += 1;
        }
        if (collideWithBody(a, b)) {
          contacts += 1;
        }
        if (collideWithBody(b, a)) {
          contacts += 1;
        }
      }
    }
    for (const worm of this.worms) {
      worm.trail.push({ x: Math.trunc(worm.x), y: Math.trunc(worm.y) });
    }
    return contacts;
  }
}

/** Short descending square-ish chirp. */
export const synthesizeChomp = (): Uint8Array => {
  const count = Math.round(CHOMP_RATE * CHOMP_SECONDS);
  const samples = new Float32Array(count);
  let phase = 0;
  for (let i = 0; i < count; i += 1) {
    const t = i / count;
    phase += (2 * Math.PI * (420 - 300 * t)) / CHOMP_RATE;
    samples[i] = Math.sign(Math.sin(phase)) * 0.4 * (1 - t);
  }
  return encodeWav(samples, CHOMP_RATE);
};

interface Glyphs {
  readonly head: Texture;
  /** Body glyph tinted around the colour wheel. */
  readonly body: readonly Texture[];
}

class WormsInstance implements EffectInstance {
  private lastChompAt = Number.NEGATIVE_INFINITY;
  private elapsed = 0;

  constructor(
    private readonly viewport: Viewport,
    private readonly pit: WormPit,
    private readonly renderer: Renderer,
    private readonly background: Texture | null,
    private readonly trails: Texture,
    private readonly glyphs: Glyphs,
    private readonly compositor: Compositor,
    private readonly fullscreenToggled: boolean,
    private readonly audio: AudioDevice,
    private readonly chomp: AudioChunk | null,
  ) {}

  update(dt: number, elapsed: number): void {
    this.elapsed = elapsed;
    const contacts = this.pit.step(dt);
    if (contacts > 0) {
      this.playChomp(elapsed);
    }
    this.carveTrails();
  }

  render(renderer: Renderer): void {
    const { width: W, height: H } = this.viewport;
    if (this.background) {
      renderer.blit(this.background, null, { x: 0, y: 0, w: W, h: H });
      renderer.blit(this.trails, null, { x: 0, y: 0, w: W, h: H });
    }
    this.pit.worms.forEach((worm, i) => {
      const heading = (Math.atan2(worm.vy, worm.vx) * 180) / Math.PI;
      worm.trail.points.forEach((segment, j) => {
        if (j === 0) {
          this.drawGlyph(renderer, this.glyphs.head, segment, heading);
          return;
        }
        const hue = (this.elapsed * 60 + j * 6 + i * 15) % 360;
        const tint = Math.floor(hue / (360 / HUE_STEPS)) % HUE_STEPS;
        this.drawGlyph(renderer, this.glyphs.body[tint], segment, 0);
      });
    });
  }

  async teardown(): Promise<void> {
    for (const texture of [this.glyphs.head, ...this.glyphs.body, this.trails]) {
      this.renderer.destroyTexture(texture);
    }
    if (this.background) {
      this.renderer.destroyTexture(this.background);
    }
    if (this.fullscreenToggled) {
      await this.compositor.toggleFullscreen();
    }
    await this.compositor.setCursorVisible(true);
  }

  private carveTrails() {
    const renderer = this.renderer;
    renderer.setRenderTarget(this.trails);
    for (const worm of this.pit.worms) {
      const points = worm.trail.points;
      for (let j = 0; j + 1 < points.length; j += 1) {
        renderer.drawLine(points[j], points[j + 1], rgba(0, 0, 0), taperedThickness(j, points.length));
      }
    }
    renderer.setRenderTarget(null);
  }

  private drawGlyph(
    renderer: Renderer,
    texture: Texture,
    at: { x: number; y: number },
    rotation: number,
  ) {
    renderer.blit(
      texture,
      null,
      {
        x: at.x - Math.trunc(texture.width / 2),
        y: at.y - Math.trunc(texture.height / 2),
        w: texture.width,
        h: texture.height,
      },
      { rotation },
    );
  }

  private playChomp(elapsed: number) {
    if (!this.chomp || elapsed - this.lastChompAt < this.chomp.durationMs / 1000) {
      return;
    }
    this.lastChompAt = elapsed;
    this.audio.play(this.chomp);
  }
}

const decodeChomp = (context: EffectContext, enabled: boolean): AudioChunk | null => {
  if (!enabled) {
    return null;
  }
  try {
    return context.platform.audio.decode("chomp", synthesizeChomp());
  } catch (error) {
    context.logger.warn(`chomp sound unavailable: ${describeError(error)}`);
    return null;
  }
};

export const WormsDefinition: EffectDefinition<WormsOptions> = {
  type: "worms",
  title: "Worms",
  flags: [
    { flag: "n", argument: "N", description: "Number of worms (default: 3)" },
    { flag: "l", argument: "N", description: "Trail length (segments per worm, default: 50)" },
    { flag: "w", argument: "F", description: "Wiggle factor (0=straight, 1=max wiggle) (default: 0.02)" },
    { flag: "a", argument: "0|1", description: "Audio (1=on, 0=off) (default: 1)" },
  ],
  assets: [],
  parseOptions: (args) => ({
    ...args.common,
    worms: readIntFlag(args.flags, "n", 3, 1, 50),
    length: readIntFlag(args.flags, "l", 50, 5, 100),
    wiggle: readFloatFlag(args.flags, "w", 0.02, 0, 1),
    audio: readIntFlag(args.flags, "a", 1, 0, 1) === 1,
  }),
  init: async (context, options) => {
    const { renderer, viewport, platform } = context;
    const font = platform.fonts.load(MONO_FONTS, GLYPH_SIZE);
    const chomp = decodeChomp(context, options.audio);
    const background = await captureScreenTexture(context, "worms");

    const trails = renderer.createRenderTarget(viewport.width, viewport.height);
    renderer.setRenderTarget(trails);
    renderer.clear(rgba(0, 0, 0, 0));
    renderer.setRenderTarget(null);

    const glyphs: Glyphs = {
      head: renderer.renderText(font, "O", WHITE),
      body: Array.from({ length: HUE_STEPS }, (_, i) =>
        renderer.renderText(font, "-", hsvToColor((i * 360) / HUE_STEPS, 1, 1)),
      ),
    };

    if (options.fullscreen) {
      await platform.compositor.toggleFullscreen();
    }
    await platform.compositor.setCursorVisible(false);
    return new WormsInstance(
      viewport,
      new WormPit(viewport, options, () => context.rng.next()),
      renderer,
      background,
      trails,
      glyphs,
      platform.compositor,
      options.fullscreen,
      platform.audio,
      chomp,
    );
  },
};
