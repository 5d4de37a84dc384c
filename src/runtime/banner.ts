import type { Logger } from "../logger.js";
import { describeError } from "../platform/errors.js";
import { SANS_BOLD_FONTS, type FontLoader } from "../platform/fonts.js";
import type { Color, Renderer, Texture } from "../platform/types.js";

const BANNER_TEXT: Color = { r: 255, g: 255, b: 255, a: 255 };
const BANNER_BACKDROP: Color = { r: 0, g: 0, b: 0, a: 180 };
const BANNER_PADDING = 16;

/** Caption drawn over the top of the frame until `untilSeconds`. */
export class Banner {
  private constructor(
    private readonly texture: Texture,
    private readonly untilSeconds: number,
  ) {}

  /** Null when no font opens; the run goes on without the caption. */
  static create(
    renderer: Renderer,
    fonts: FontLoader,
    logger: Logger,
    text: string,
    untilSeconds: number,
  ): Banner | null {
    try {
      const font = fonts.load(SANS_BOLD_FONTS, 24);
      return new Banner(renderer.renderText(font, text, BANNER_TEXT), untilSeconds);
    } catch (error) {
      logger.warn(`banner disabled: ${describeError(error)}`);
      return null;
    }
  }

  render(renderer: Renderer, elapsed: number): void {
    if (elapsed >= this.untilSeconds) {
      return;
    }
    const { width, height } = this.texture;
    const x = Math.floor((renderer.width - width) / 2);
    const y = Math.floor(renderer.height * 0.1);
    renderer.setBlendMode("alpha");
    renderer.fillRect(
      {
        x: x - BANNER_PADDING,
        y: y - BANNER_PADDING / 2,
        w: width + BANNER_PADDING * 2,
        h: height + BANNER_PADDING,
      },
      BANNER_BACKDROP,
    );
    renderer.blit(this.texture, null, { x, y, w: width, h: height });
  }

  dispose(renderer: Renderer): void {
    renderer.destroyTexture(this.texture);
  }
}
