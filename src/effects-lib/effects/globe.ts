import { decodePixelMap, readPixelMapDocument, type DecodedPixelMap } from "../../platform/pixmap.js";
import type { Renderer, Texture, Viewport } from "../../platform/types.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { bounceWalls, integrate, type Body } from "../kinematics.js";
import { TAU } from "../math.js";
import { frameAt } from "../sprites.js";

export const GLOBE_SIZE = 240;
export const GLOBE_FRAMES = 24;
const TEXELS = 120;
const FRAME_PERIOD = 0.125;
const GLOBE_ASSET = "globe_texture";

/**
 * Orthographic view of an equirectangular map turned by `rotation` radians,
 * with a soft limb darkening. Pixels outside the disc stay transparent.
 */
export const renderGlobeFrame = (
  map: DecodedPixelMap,
  size: number,
  rotation: number,
): Uint8ClampedArray => {
  const pixels = new Uint8ClampedArray(size * size * 4);
  const radius = size / 2;
  for (let py = 0; py < size; py += 1) {
    for (let px = 0; px < size; px += 1) {
      const nx = (px + 0.5 - radius) / radius;
      const ny = (py + 0.5 - radius) / radius;
      const r2 = nx * nx + ny * ny;
      if (r2 > 1) {
        continue;
      }
      const nz = Math.sqrt(1 - r2);
      const lat = Math.asin(ny);
      const lon = Math.atan2(nx, nz) + rotation;
      const u = ((lon / TAU) % 1 + 1) % 1;
      const v = lat / Math.PI + 0.5;
      const sx = Math.min(map.width - 1, Math.floor(u * map.width));
      const sy = Math.min(map.height - 1, Math.floor(v * map.height));
      const src = (sy * map.width + sx) * 4;
      const dst = (py * size + px) * 4;
      const shade = 0.35 + 0.65 * nz;
      pixels[dst] = map.pixels[src] * shade;
      pixels[dst + 1] = map.pixels[src + 1] * shade;
      pixels[dst + 2] = map.pixels[src + 2] * shade;
      pixels[dst + 3] = 255;
    }
  }
  return pixels;
};

class GlobeInstance implements EffectInstance {
  private readonly body: Body = { x: 100, y: 100, vx: 200, vy: 150 };

  constructor(
    private readonly viewport: Viewport,
    private readonly options: CommonOptions,
    private readonly frames: readonly Texture[],
    private readonly renderer: Renderer,
  ) {}

  update(dt: number): void {
    integrate(this.body, dt, this.options.speed);
    bounceWalls(this.body, {
      minX: 0,
      minY: 0,
      maxX: this.viewport.width - GLOBE_SIZE,
      maxY: this.viewport.height - GLOBE_SIZE,
    });
  }

  render(renderer: Renderer, elapsed: number): void {
    const count = this.frames.length;
    const frame = frameAt(elapsed * this.options.speed, FRAME_PERIOD * count, FRAME_PERIOD, count);
    renderer.blit(this.frames[frame], null, {
      x: Math.trunc(this.body.x),
      y: Math.trunc(this.body.y),
      w: GLOBE_SIZE,
      h: GLOBE_SIZE,
    });
  }

  teardown(): void {
    for (const frame of this.frames) {
      this.renderer.destroyTexture(frame);
    }
  }
}

export const GlobeDefinition: EffectDefinition<CommonOptions> = {
  type: "globe",
  title: "Spinning Globe",
  flags: [],
  assets: [GLOBE_ASSET],
  parseOptions: (args) => args.common,
  init: (context: EffectContext, options) => {
    const { assets } = context.platform;
    const map = decodePixelMap(GLOBE_ASSET, readPixelMapDocument(GLOBE_ASSET, assets.json(GLOBE_ASSET)));
    const frames = Array.from({ length: GLOBE_FRAMES }, (_, k) =>
      context.renderer.createTexture(
        TEXELS,
        TEXELS,
        renderGlobeFrame(map, TEXELS, (k / GLOBE_FRAMES) * TAU),
      ),
    );
    return new GlobeInstance(context.viewport, options, frames, context.renderer);
  },
};
