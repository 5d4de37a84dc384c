import { describe, expect, test } from "vitest";

import { HeadlessRenderer } from "../../__tests__/helpers/headless-platform.js";
import { DEFAULT_MARQUEE, marqueePosition, MarqueeText } from "../marquee.js";
import { WHITE } from "../math.js";

const viewport = { width: 1600, height: 900 };
const font = { family: "headless", size: 20, path: "test.ttf" };

describe("marqueePosition", () => {
  test("sweeps from the right edge to fully off the left", () => {
    expect(marqueePosition(0, viewport, 400).x).toBe(1600);
    expect(marqueePosition(5, viewport, 400).x).toBe(600);
    expect(marqueePosition(10, viewport, 400).x).toBe(-400);
  });

  test("restarts the sweep after each boundary", () => {
    expect(marqueePosition(12.5, viewport, 400).x).toBe(1100);
  });

  test("steps through the rows and wraps", () => {
    expect(marqueePosition(0, viewport, 400).row).toBe(0);
    expect(marqueePosition(10, viewport, 400).row).toBe(1);
    expect(marqueePosition(25, viewport, 400).row).toBe(2);
    expect(marqueePosition(30, viewport, 400).row).toBe(0);
    expect(marqueePosition(10, viewport, 400).y).toBeCloseTo(420);
    expect(marqueePosition(0, viewport, 400).y).toBeCloseTo(180);
  });

  test("honours custom timing", () => {
    const timing = { sweep: 4, step: 4, rows: DEFAULT_MARQUEE.rows };
    expect(marqueePosition(2, viewport, 400, timing).x).toBe(600);
    expect(marqueePosition(4, viewport, 400, timing).row).toBe(1);
  });
});

describe("MarqueeText", () => {
  test("rasterises once per distinct string", () => {
    const renderer = new HeadlessRenderer(800, 600);
    const marquee = new MarqueeText(renderer, font, WHITE);
    marquee.setText("HELLO");
    marquee.setText("HELLO");
    expect(marquee.rasterizations).toBe(1);
    expect(marquee.width).toBe(60);
    expect(marquee.height).toBe(20);

    marquee.setText("BYE");
    expect(marquee.rasterizations).toBe(2);
    expect(renderer.destroyed).toEqual([1]);
  });

  test("blits centred on the row line and skips off-screen positions", () => {
    const renderer = new HeadlessRenderer(800, 600);
    const marquee = new MarqueeText(renderer, font, WHITE);
    marquee.setText("HELLO");
    marquee.draw({ x: 100.7, y: 50, row: 0 });
    marquee.draw({ x: -60, y: 50, row: 0 });
    marquee.draw({ x: 800, y: 50, row: 0 });
    const blits = renderer.calls.filter((call) => call.op === "blit");
    expect(blits).toEqual([
      { op: "blit", texture: 1, dst: { x: 100, y: 40, w: 60, h: 20 }, options: undefined },
    ]);
  });

  test("release frees the texture once", () => {
    const renderer = new HeadlessRenderer(800, 600);
    const marquee = new MarqueeText(renderer, font, WHITE);
    marquee.setText("HELLO");
    marquee.release();
    marquee.release();
    expect(renderer.destroyed).toEqual([1]);
    expect(marquee.text).toBe("");
  });
});
