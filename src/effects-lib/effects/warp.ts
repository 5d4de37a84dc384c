import { loadSheet, type LoadedSheet } from "../../platform/pixmap.js";
import type { Renderer, Viewport } from "../../platform/types.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { mod } from "../math.js";

const STAR_ASSETS = ["warp_stars_1", "warp_stars_2", "warp_stars_3", "warp_stars_4"];
export const WARP_LAYERS = 17;
const LAYER_DELAY = 0.25;
const PERIOD = 2;

export interface WarpKeyframe {
  /** 0..255 */
  readonly opacity: number;
  readonly scale: number;
}

/** Fade in while growing to 1x, rush to 2.8x, then fade out at 3.5x. */
export const warpKeyframe = (frac: number): WarpKeyframe => {
  if (frac < 0.5) {
    return { opacity: Math.trunc(frac * 2 * 255), scale: 0.5 + frac * 2 * 0.5 };
  }
  if (frac < 0.85) {
    return { opacity: 255, scale: 1 + ((frac - 0.5) / 0.35) * 1.8 };
  }
  const tail = (frac - 0.85) / 0.15;
  return { opacity: Math.trunc((1 - tail) * 255), scale: 2.8 + tail * 0.7 };
};

class WarpInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: CommonOptions,
    private readonly layers: readonly LoadedSheet[],
    private readonly renderer: Renderer,
  ) {}

  update(): void {}

  render(renderer: Renderer, elapsed: number): void {
    const { width: W, height: H } = this.viewport;
    const t = elapsed * this.options.speed;
    for (let i = 0; i < WARP_LAYERS; i += 1) {
      const local = t - i * LAYER_DELAY;
      if (local < 0) {
        continue;
      }
      const { opacity, scale } = warpKeyframe(mod(local, PERIOD) / PERIOD);
      const w = Math.trunc(W * scale);
      const h = Math.trunc(H * scale);
      renderer.blit(
        this.layers[i % this.layers.length].texture,
        null,
        { x: Math.trunc(W / 2) - Math.trunc(w / 2), y: Math.trunc(H / 2) - Math.trunc(h / 2), w, h },
        { alpha: opacity },
      );
    }
  }

  teardown(): void {
    for (const layer of this.layers) {
      this.renderer.destroyTexture(layer.texture);
    }
  }
}

export const WarpDefinition: EffectDefinition<CommonOptions> = {
  type: "warp",
  title: "Warp",
  flags: [],
  assets: STAR_ASSETS,
  parseOptions: (args) => args.common,
  init: async (context: EffectContext, options) => {
    const layers = await Promise.all(
      STAR_ASSETS.map((id) => loadSheet(context.platform.assets, context.renderer, id)),
    );
    return new WarpInstance(context.viewport, options, layers, context.renderer);
  },
};
