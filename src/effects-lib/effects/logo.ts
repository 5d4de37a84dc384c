import { loadSheet, type LoadedSheet } from "../../platform/pixmap.js";
import type { Renderer, Viewport } from "../../platform/types.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { integrate, type Body } from "../kinematics.js";
import { TAU, mod } from "../math.js";

const LOGO_ASSET = "logo";
/** The bundled logo is pixel art; it is drawn at this multiple of its size. */
const LOGO_SCALE = 4;
export const LOGO_CYCLE = 50;

export interface LogoTransform {
  readonly scaleX: number;
  readonly scaleY: number;
  /** Degrees. */
  readonly rotation: number;
}

export const logoTransform = (elapsed: number): LogoTransform => {
  const c = mod(elapsed, LOGO_CYCLE) / LOGO_CYCLE;
  return {
    scaleX: 1 + 0.5 * Math.sin(TAU * c),
    scaleY: 1 + 0.3 * Math.cos(TAU * c * 1.5),
    rotation: 360 * Math.sin(TAU * c),
  };
};

class LogoInstance implements EffectInstance {
  private readonly body: Body;
  private readonly baseWidth: number;
  private readonly baseHeight: number;
  private transform: LogoTransform = logoTransform(0);

  constructor(
    private readonly viewport: Viewport,
    private readonly options: CommonOptions,
    private readonly sheet: LoadedSheet,
    private readonly renderer: Renderer,
  ) {
    this.body = { x: viewport.width / 2, y: viewport.height / 2, vx: 150, vy: 100 };
    this.baseWidth = sheet.frameWidth * LOGO_SCALE;
    this.baseHeight = sheet.frameHeight * LOGO_SCALE;
  }

  update(dt: number, elapsed: number): void {
    this.transform = logoTransform(elapsed);
    integrate(this.body, dt, this.options.speed);
    const halfW = Math.trunc(this.baseWidth * this.transform.scaleX) / 2;
    const halfH = Math.trunc(this.baseHeight * this.transform.scaleY) / 2;
    const { width: W, height: H } = this.viewport;
    const body = this.body;
    if (body.x < halfW) {
      body.x = halfW;
      body.vx = -body.vx;
    }
    if (body.x > W - halfW) {
      body.x = W - halfW;
      body.vx = -body.vx;
    }
    if (body.y < halfH) {
      body.y = halfH;
      body.vy = -body.vy;
    }
    if (body.y > H - halfH) {
      body.y = H - halfH;
      body.vy = -body.vy;
    }
  }

  render(renderer: Renderer): void {
    const w = Math.trunc(this.baseWidth * this.transform.scaleX);
    const h = Math.trunc(this.baseHeight * this.transform.scaleY);
    renderer.blit(
      this.sheet.texture,
      null,
      { x: Math.trunc(this.body.x) - Math.trunc(w / 2), y: Math.trunc(this.body.y) - Math.trunc(h / 2), w, h },
      { rotation: this.transform.rotation },
    );
  }

  teardown(): void {
    this.renderer.destroyTexture(this.sheet.texture);
  }
}

export const LogoDefinition: EffectDefinition<CommonOptions> = {
  type: "logo",
  title: "Bouncing Logo",
  flags: [],
  assets: [LOGO_ASSET],
  parseOptions: (args) => args.common,
  init: async (context: EffectContext, options) => {
    const sheet = await loadSheet(context.platform.assets, context.renderer, LOGO_ASSET);
    return new LogoInstance(context.viewport, options, sheet, context.renderer);
  },
};
