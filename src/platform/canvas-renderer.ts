import {
  createCanvas,
  ImageData,
  loadImage,
  type Canvas,
  type Image,
  type SKRSContext2D,
} from "@napi-rs/canvas";

import type {
  BlendMode,
  BlitOptions,
  Color,
  FontHandle,
  GeometryVertex,
  Point,
  Rect,
  Renderer,
  Texture,
} from "./types.js";

type TextureSource = Canvas | Image;

/** Receives every presented frame. */
export interface FramePresenter {
  present(frame: Canvas): void;
  close(): void;
}

export class NullPresenter implements FramePresenter {
  present(): void {}

  close(): void {}
}

const compositeForBlend: Record<BlendMode, GlobalCompositeOperation> = {
  alpha: "source-over",
  additive: "lighter",
  multiply: "multiply",
  none: "copy",
};

type GlobalCompositeOperation = SKRSContext2D["globalCompositeOperation"];

export const cssColor = (color: Color): string =>
  `rgba(${Math.round(color.r)},${Math.round(color.g)},${Math.round(color.b)},${
    Math.max(0, Math.min(255, color.a)) / 255
  })`;

let nextTextureId = 1;

/**
 * Canvas-backed implementation of the drawing surface. Every texture is an
 * off-screen canvas or a decoded image held in a side table so callers only
 * ever see the opaque `Texture` handle.
 */
export class CanvasRenderer implements Renderer {
  readonly width: number;
  readonly height: number;

  private readonly screen: Canvas;
  private readonly screenContext: SKRSContext2D;
  private context: SKRSContext2D;
  private contextSize: { width: number; height: number };
  private blendMode: BlendMode = "alpha";
  private readonly sources = new Map<number, TextureSource>();
  private readonly targets = new Map<number, SKRSContext2D>();

  constructor(
    width: number,
    height: number,
    private readonly presenter: FramePresenter = new NullPresenter(),
  ) {
    this.width = width;
    this.height = height;
    this.screen = createCanvas(width, height);
    this.screenContext = this.screen.getContext("2d");
    this.context = this.screenContext;
    this.contextSize = { width, height };
  }

  clear(color: Color): void {
    const ctx = this.context;
    ctx.save();
    ctx.globalCompositeOperation = "copy";
    ctx.fillStyle = cssColor(color);
    ctx.fillRect(0, 0, this.contextSize.width, this.contextSize.height);
    ctx.restore();
  }

  fillRect(rect: Rect, color: Color): void {
    this.context.fillStyle = cssColor(color);
    this.context.fillRect(rect.x, rect.y, rect.w, rect.h);
  }

  drawLine(from: Point, to: Point, color: Color, thickness = 1): void {
    const ctx = this.context;
    ctx.strokeStyle = cssColor(color);
    ctx.lineWidth = thickness;
    ctx.beginPath();
    ctx.moveTo(from.x + 0.5, from.y + 0.5);
    ctx.lineTo(to.x + 0.5, to.y + 0.5);
    ctx.stroke();
  }

  drawPoint(point: Point, color: Color): void {
    this.context.fillStyle = cssColor(color);
    this.context.fillRect(Math.floor(point.x), Math.floor(point.y), 1, 1);
  }

  fillCircle(center: Point, radius: number, color: Color): void {
    const ctx = this.context;
    ctx.fillStyle = cssColor(color);
    ctx.beginPath();
    ctx.arc(center.x, center.y, Math.max(0, radius), 0, Math.PI * 2);
    ctx.fill();
  }

  strokeCircle(center: Point, radius: number, color: Color): void {
    const ctx = this.context;
    ctx.strokeStyle = cssColor(color);
    ctx.lineWidth = 1;
    ctx.beginPath();
    ctx.arc(center.x, center.y, Math.max(0, radius), 0, Math.PI * 2);
    ctx.stroke();
  }

  blit(texture: Texture, src: Rect | null, dst: Rect, options: BlitOptions = {}): void {
    const source = this.requireSource(texture);
    const ctx = this.context;
    const s = src ?? { x: 0, y: 0, w: texture.width, h: texture.height };
    const rotation = options.rotation ?? 0;
    const flip = options.flip ?? "none";

    ctx.save();
    if (options.alpha !== undefined) {
      ctx.globalAlpha = Math.max(0, Math.min(255, options.alpha)) / 255;
    }
    if (rotation === 0 && flip === "none") {
      ctx.drawImage(source, s.x, s.y, s.w, s.h, dst.x, dst.y, dst.w, dst.h);
      ctx.restore();
      return;
    }
    const pivot = options.pivot ?? { x: dst.x + dst.w / 2, y: dst.y + dst.h / 2 };
    ctx.translate(pivot.x, pivot.y);
    ctx.rotate((rotation * Math.PI) / 180);
    ctx.scale(flip === "horizontal" ? -1 : 1, flip === "vertical" ? -1 : 1);
    ctx.drawImage(source, s.x, s.y, s.w, s.h, dst.x - pivot.x, dst.y - pivot.y, dst.w, dst.h);
    ctx.restore();
  }

  blitGeometry(
    texture: Texture,
    vertices: readonly GeometryVertex[],
    indices: readonly number[],
  ): void {
    const source = this.requireSource(texture);
    const ctx = this.context;
    for (let i = 0; i + 2 < indices.length; i += 3) {
      const a = vertices[indices[i]];
      const b = vertices[indices[i + 1]];
      const c = vertices[indices[i + 2]];
      if (!a || !b || !c) {
        continue;
      }
      const transform = affineFromTriangles(texture, a, b, c);
      if (!transform) {
        continue;
      }
      ctx.save();
      ctx.beginPath();
      ctx.moveTo(a.x, a.y);
      ctx.lineTo(b.x, b.y);
      ctx.lineTo(c.x, c.y);
      ctx.closePath();
      ctx.clip();
      ctx.transform(transform[0], transform[1], transform[2], transform[3], transform[4], transform[5]);
      ctx.drawImage(source, 0, 0);
      ctx.restore();
    }
  }

  setBlendMode(mode: BlendMode): void {
    this.blendMode = mode;
    this.context.globalCompositeOperation = compositeForBlend[mode];
  }

  createTexture(width: number, height: number, pixels: Uint8ClampedArray): Texture {
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext("2d");
    ctx.putImageData(new ImageData(pixels, width, height), 0, 0);
    return this.register(canvas, width, height);
  }

  createRenderTarget(width: number, height: number): Texture {
    const canvas = createCanvas(width, height);
    const texture = this.register(canvas, width, height);
    this.targets.set(texture.id, canvas.getContext("2d"));
    return texture;
  }

  async decodeImage(bytes: Uint8Array): Promise<Texture> {
    const image = await loadImage(Buffer.from(bytes));
    return this.register(image, image.width, image.height);
  }

  setRenderTarget(target: Texture | null): void {
    if (target === null) {
      this.context = this.screenContext;
      this.contextSize = { width: this.width, height: this.height };
    } else {
      const ctx = this.targets.get(target.id);
      if (!ctx) {
        throw new Error(`Texture ${target.id} is not a render target.`);
      }
      this.context = ctx;
      this.contextSize = { width: target.width, height: target.height };
    }
    this.context.globalCompositeOperation = compositeForBlend[this.blendMode];
  }

  renderText(font: FontHandle, text: string, color: Color): Texture {
    const { width, height } = this.measureText(font, text);
    const canvas = createCanvas(Math.max(1, width), Math.max(1, height));
    const ctx = canvas.getContext("2d");
    ctx.font = fontShorthand(font);
    ctx.textBaseline = "top";
    ctx.fillStyle = cssColor(color);
    ctx.fillText(text, 0, 0);
    return this.register(canvas, canvas.width, canvas.height);
  }

  measureText(font: FontHandle, text: string): { width: number; height: number } {
    const ctx = this.screenContext;
    ctx.save();
    ctx.font = fontShorthand(font);
    const metrics = ctx.measureText(text);
    ctx.restore();
    return {
      width: Math.ceil(metrics.width),
      height: Math.ceil(font.size * 1.25),
    };
  }

  destroyTexture(texture: Texture): void {
    this.sources.delete(texture.id);
    this.targets.delete(texture.id);
  }

  present(): void {
    this.presenter.present(this.screen);
  }

  close(): void {
    this.sources.clear();
    this.targets.clear();
    this.presenter.close();
  }

  private register(source: TextureSource, width: number, height: number): Texture {
    const texture: Texture = { id: nextTextureId++, width, height };
    this.sources.set(texture.id, source);
    return texture;
  }

  private requireSource(texture: Texture): TextureSource {
    const source = this.sources.get(texture.id);
    if (!source) {
      throw new Error(`Texture ${texture.id} was destroyed or belongs to another renderer.`);
    }
    return source;
  }
}

const fontShorthand = (font: FontHandle): string => `${font.size}px "${font.family}"`;

/**
 * Solves the 2-D affine map that sends the texture-space triangle of
 * (a, b, c) onto its screen-space triangle. Returns the canvas
 * `transform(a, b, c, d, e, f)` coefficients, or null for a degenerate input.
 */
export const affineFromTriangles = (
  texture: Texture,
  a: GeometryVertex,
  b: GeometryVertex,
  c: GeometryVertex,
): [number, number, number, number, number, number] | null => {
  const sx0 = a.u * texture.width;
  const sy0 = a.v * texture.height;
  const sx1 = b.u * texture.width;
  const sy1 = b.v * texture.height;
  const sx2 = c.u * texture.width;
  const sy2 = c.v * texture.height;
  const det = sx0 * (sy1 - sy2) + sx1 * (sy2 - sy0) + sx2 * (sy0 - sy1);
  if (Math.abs(det) < 1e-9) {
    return null;
  }
  const solve = (d0: number, d1: number, d2: number): [number, number, number] => [
    (d0 * (sy1 - sy2) + d1 * (sy2 - sy0) + d2 * (sy0 - sy1)) / det,
    (d0 * (sx2 - sx1) + d1 * (sx0 - sx2) + d2 * (sx1 - sx0)) / det,
    (d0 * (sx1 * sy2 - sx2 * sy1) + d1 * (sx2 * sy0 - sx0 * sy2) + d2 * (sx0 * sy1 - sx1 * sy0)) /
      det,
  ];
  const [ma, mc, me] = solve(a.x, b.x, c.x);
  const [mb, md, mf] = solve(a.y, b.y, c.y);
  return [ma, mb, mc, md, me, mf];
};
