import { describe, expect, test } from "vitest";

import { createRandomGenerator } from "../../runtime/rng.js";
import { WindowGrid } from "../window-grid.js";

const countLit = (grid: WindowGrid) => grid.lit.reduce((sum, value) => sum + value, 0);

describe("WindowGrid", () => {
  test("starts midway between the lit bounds", () => {
    const rng = createRandomGenerator(1);
    const grid = new WindowGrid(5, 8, () => rng.next());
    expect(grid.minLit).toBe(8);
    expect(grid.maxLit).toBe(16);
    expect(grid.litCount).toBe(12);
    expect(countLit(grid)).toBe(12);
  });

  test("toggles keep the lit count inside the bounds", () => {
    const rng = createRandomGenerator(2);
    const grid = new WindowGrid(5, 8, () => rng.next());
    const seen = new Set<number>();
    for (let i = 0; i < 2000; i += 1) {
      grid.step(0.1);
      expect(grid.litCount).toBeGreaterThanOrEqual(8);
      expect(grid.litCount).toBeLessThanOrEqual(16);
      expect(countLit(grid)).toBe(grid.litCount);
      seen.add(grid.litCount);
    }
    expect(seen.size).toBeGreaterThan(1);
  });

  test("isLit reads row-major cells", () => {
    const rng = createRandomGenerator(3);
    const grid = new WindowGrid(4, 3, () => rng.next());
    expect(grid.isLit(2, 1)).toBe(grid.lit[6] === 1);
  });

  test("an empty building has nothing to light", () => {
    const grid = new WindowGrid(0, 4, () => 0.3);
    grid.step(5);
    expect(grid.size).toBe(0);
    expect(grid.litCount).toBe(0);
  });
});
