import type { Canvas } from "@napi-rs/canvas";
import { describe, expect, test } from "vitest";

import { CanvasRenderer, cssColor, type FramePresenter } from "../canvas-renderer.js";

class CapturingPresenter implements FramePresenter {
  readonly pixels: number[][] = [];
  closed = false;

  present(frame: Canvas): void {
    this.pixels.push(Array.from(frame.getContext("2d").getImageData(0, 0, 1, 1).data));
  }

  close(): void {
    this.closed = true;
  }
}

test("cssColor rounds channels and clamps alpha", () => {
  expect(cssColor({ r: 1.4, g: 0, b: 255, a: 300 })).toBe("rgba(1,0,255,1)");
});

describe("CanvasRenderer", () => {
  test("hands the screen to the presenter on present and closes it", () => {
    const presenter = new CapturingPresenter();
    const renderer = new CanvasRenderer(4, 4, presenter);
    renderer.clear({ r: 0, g: 0, b: 0, a: 255 });
    renderer.fillRect({ x: 0, y: 0, w: 2, h: 2 }, { r: 255, g: 0, b: 0, a: 255 });
    renderer.present();
    renderer.close();
    expect(presenter.pixels).toEqual([[255, 0, 0, 255]]);
    expect(presenter.closed).toBe(true);
  });

  test("refuses a destroyed texture", () => {
    const renderer = new CanvasRenderer(4, 4);
    const texture = renderer.createTexture(1, 1, new Uint8ClampedArray([0, 0, 255, 255]));
    renderer.destroyTexture(texture);
    expect(() => renderer.blit(texture, null, { x: 0, y: 0, w: 1, h: 1 })).toThrow(
      `Texture ${texture.id} was destroyed or belongs to another renderer.`,
    );
  });

  test("only render targets can be drawn into", () => {
    const renderer = new CanvasRenderer(4, 4);
    const texture = renderer.createTexture(1, 1, new Uint8ClampedArray(4));
    expect(() => renderer.setRenderTarget(texture)).toThrow(
      `Texture ${texture.id} is not a render target.`,
    );
    const target = renderer.createRenderTarget(2, 2);
    expect(() => renderer.setRenderTarget(target)).not.toThrow();
  });
});
