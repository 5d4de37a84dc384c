import type { Point, Renderer, Texture, Viewport } from "../../platform/types.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { captureScreenTexture } from "../../runtime/screen-capture.js";
import { BLACK, clamp01, rgba, TAU } from "../math.js";

const FADE_SECONDS = 5;
const MIN_RADIUS = 10;
const TENDRILS = 8;
const TENDRIL_STEPS = 10;
const TENDRIL_LENGTH = 50;
const TENDRIL_COLOR = rgba(50, 50, 50, 100);
const FALLBACK_SIZE: Viewport = { width: 800, height: 600 };

export interface FadeFrame {
  /** 0..1 within the current loop. */
  readonly progress: number;
  readonly radius: number;
  /** Alpha of the background image, 255 → 0. */
  readonly backgroundAlpha: number;
  readonly tendrils: boolean;
}

export const maxHoleRadius = (viewport: Viewport): number =>
  Math.sqrt((viewport.width * viewport.width) / 4 + (viewport.height * viewport.height) / 4) + 50;

/** The hole grows cubically and the loop restarts every `5 / speed` seconds. */
export const fadeFrame = (elapsed: number, speed: number, viewport: Viewport): FadeFrame => {
  const progress = ((elapsed * speed) % FADE_SECONDS) / FADE_SECONDS;
  const growth = progress * progress * progress;
  const maxRadius = maxHoleRadius(viewport);
  const radius = MIN_RADIUS + growth * (maxRadius - MIN_RADIUS);
  return {
    progress,
    radius,
    backgroundAlpha: Math.trunc(255 - growth * 255),
    tendrils: radius < maxRadius * 0.8,
  };
};

/** Polylines curling in toward the hole edge, one per tendril. */
export const tendrilPaths = (center: Point, radius: number): Point[][] => {
  const start = Math.max(MIN_RADIUS, radius - 20);
  return Array.from({ length: TENDRILS }, (_, i) => {
    const angle = (TAU * i) / TENDRILS;
    return Array.from({ length: TENDRIL_STEPS }, (_, step) => {
      const t = step / TENDRIL_STEPS;
      const r = start + TENDRIL_LENGTH * t;
      const a = angle + (Math.PI / 2 - angle) * t * 0.3;
      return { x: center.x + r * Math.cos(a), y: center.y + r * Math.sin(a) };
    });
  });
};

/** Blue radial gradient used when the screen cannot be captured. */
export const radialFallbackPixels = ({ width, height }: Viewport): Uint8ClampedArray => {
  const pixels = new Uint8ClampedArray(width * height * 4);
  const cx = width / 2;
  const cy = height / 2;
  const reach = Math.hypot(cx, cy);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const factor = clamp01(1 - Math.hypot(x - cx, y - cy) / reach);
      const offset = (y * width + x) * 4;
      pixels[offset] = factor * 100;
      pixels[offset + 1] = factor * 150;
      pixels[offset + 2] = factor * 200;
      pixels[offset + 3] = 255;
    }
  }
  return pixels;
};

export const backgroundOrFallback = async (
  context: EffectContext,
  name: string,
  fallback: (size: Viewport) => Uint8ClampedArray,
): Promise<Texture> => {
  const captured = await captureScreenTexture(context, name);
  if (captured) {
    return captured;
  }
  return context.renderer.createTexture(
    FALLBACK_SIZE.width,
    FALLBACK_SIZE.height,
    fallback(FALLBACK_SIZE),
  );
};

class FadeoutInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: CommonOptions,
    private readonly renderer: Renderer,
    private readonly background: Texture,
  ) {}

  update(): void {}

  render(renderer: Renderer, elapsed: number): void {
    const { width: W, height: H } = this.viewport;
    const frame = fadeFrame(elapsed, this.options.speed, this.viewport);
    const center = { x: W / 2, y: H / 2 };
    renderer.blit(this.background, null, { x: 0, y: 0, w: W, h: H }, { alpha: frame.backgroundAlpha });
    renderer.fillCircle(center, frame.radius, BLACK);
    if (!frame.tendrils) {
      return;
    }
    for (const path of tendrilPaths(center, frame.radius)) {
      for (let i = 0; i + 1 < path.length; i += 1) {
        renderer.drawLine(path[i], path[i + 1], TENDRIL_COLOR);
      }
    }
  }

  teardown(): void {
    this.renderer.destroyTexture(this.background);
  }
}

export const FadeoutDefinition: EffectDefinition = {
  type: "fadeout",
  title: "Fade Out",
  flags: [],
  assets: [],
  parseOptions: (args) => args.common,
  init: async (context, options) =>
    new FadeoutInstance(
      context.viewport,
      options,
      context.renderer,
      await backgroundOrFallback(context, "fadeout", radialFallbackPixels),
    ),
};
