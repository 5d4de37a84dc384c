import { MONO_BOLD_FONTS } from "../../platform/fonts.js";
import type { Renderer, Texture, Viewport } from "../../platform/types.js";
import { readIntFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { MatrixRain } from "../matrix-rain.js";
import { rgba } from "../math.js";

const FONT_SIZE = 12;
const GREEN = rgba(0, 255, 0);

export const MATRIX_GLYPHS = Array.from(
  "アイウエオカキクケコサシスセソタチツテトナニヌネノ" +
    "ハヒフヘホマミムメモヤユヨラリルレロワヲン" +
    "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz" +
    "0123456789@#$%^&*()-+=[]{}|;:,.<>?",
);

export interface MatrixOptions extends CommonOptions {
  readonly maxStreams: number;
}

class MatrixInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: MatrixOptions,
    private readonly rain: MatrixRain,
    private readonly atlas: readonly Texture[],
    private readonly charHeight: number,
    private readonly renderer: Renderer,
  ) {}

  update(dt: number): void {
    this.rain.step(dt, this.options.speed);
  }

  render(renderer: Renderer): void {
    const H = this.viewport.height;
    this.rain.pool.forEachActive((stream) => {
      for (let c = 0; c < stream.length; c += 1) {
        const y = Math.trunc(stream.y - c * this.charHeight);
        if (y < -this.charHeight || y > H) {
          continue;
        }
        const glyph = this.atlas[stream.glyphs[c]];
        renderer.blit(
          glyph,
          null,
          { x: stream.x, y, w: glyph.width, h: glyph.height },
          { alpha: stream.brightness[c] },
        );
      }
    });
  }

  teardown(): void {
    for (const glyph of this.atlas) {
      this.renderer.destroyTexture(glyph);
    }
  }
}

export const MatrixDefinition: EffectDefinition<MatrixOptions> = {
  type: "matrix",
  title: "Matrix Rain",
  flags: [{ flag: "n", argument: "N", description: "Maximum number of streams (default: 200)" }],
  assets: [],
  parseOptions: (args) => ({
    ...args.common,
    maxStreams: readIntFlag(args.flags, "n", 200, 10, 1000),
  }),
  init: (context: EffectContext, options) => {
    const font = context.platform.fonts.load(MONO_BOLD_FONTS, FONT_SIZE);
    const cell = context.renderer.measureText(font, "0");
    const charHeight = Math.max(1, Math.round(cell.height));
    const atlas = MATRIX_GLYPHS.map((glyph) => context.renderer.renderText(font, glyph, GREEN));
    const rain = new MatrixRain(
      context.viewport,
      {
        maxStreams: options.maxStreams,
        charWidth: Math.max(1, Math.round(cell.width)),
        charHeight,
        glyphCount: atlas.length,
      },
      () => context.rng.next(),
    );
    return new MatrixInstance(context.viewport, options, rain, atlas, charHeight, context.renderer);
  },
};
