import type { Color, FontHandle, Renderer, Texture, Viewport } from "../platform/types.js";

export interface MarqueeTiming {
  /** Seconds for one sweep from the right edge to fully off the left. */
  readonly sweep: number;
  /** Seconds per vertical step. */
  readonly step: number;
  readonly rows: readonly number[];
}

export const DEFAULT_MARQUEE: MarqueeTiming = {
  sweep: 10,
  step: 10,
  rows: [0.2, 0.2 + 0.8 / 3, 0.2 + 1.6 / 3],
};

export interface MarqueePosition {
  readonly x: number;
  /** Centre line of the text. */
  readonly y: number;
  readonly row: number;
}

/**
 * x runs linearly from `W` to `-textWidth` over each sweep, reaching the end
 * exactly at the sweep boundary; the row advances every `step` seconds and
 * wraps after all rows were shown.
 */
export const marqueePosition = (
  t: number,
  viewport: Viewport,
  textWidth: number,
  timing: MarqueeTiming = DEFAULT_MARQUEE,
): MarqueePosition => {
  let cycle = t % timing.sweep;
  if (cycle === 0 && t > 0) {
    cycle = timing.sweep;
  }
  const x = viewport.width - (viewport.width + textWidth) * (cycle / timing.sweep);
  const superCycle = timing.step * timing.rows.length;
  const row = Math.floor((t % superCycle) / timing.step);
  return { x, y: timing.rows[row] * viewport.height, row };
};

/** Text rasterised once per string; `setText` with the same string is free. */
export class MarqueeText {
  private current: { text: string; texture: Texture; width: number; height: number } | null = null;
  rasterizations = 0;

  constructor(
    private readonly renderer: Renderer,
    private readonly font: FontHandle,
    private readonly color: Color,
  ) {}

  setText(text: string): void {
    if (this.current?.text === text) {
      return;
    }
    this.release();
    const texture = this.renderer.renderText(this.font, text, this.color);
    this.current = { text, texture, width: texture.width, height: texture.height };
    this.rasterizations += 1;
  }

  get text(): string {
    return this.current?.text ?? "";
  }

  get width(): number {
    return this.current?.width ?? 0;
  }

  get height(): number {
    return this.current?.height ?? 0;
  }

  draw(position: MarqueePosition): void {
    if (!this.current) {
      return;
    }
    const { texture, width, height } = this.current;
    if (position.x <= -width || position.x >= this.renderer.width) {
      return;
    }
    this.renderer.blit(texture, null, {
      x: Math.trunc(position.x),
      y: Math.trunc(position.y - height / 2),
      w: width,
      h: height,
    });
  }

  release(): void {
    if (this.current) {
      this.renderer.destroyTexture(this.current.texture);
      this.current = null;
    }
  }
}
