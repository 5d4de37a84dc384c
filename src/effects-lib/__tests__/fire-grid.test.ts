import { describe, expect, test } from "vitest";

import { FireGrid } from "../fire-grid.js";

const inUnitRange = (values: Float64Array) => values.every((value) => value >= 0 && value <= 1);

describe("FireGrid", () => {
  test("default ignition seeds three cells along the bottom", () => {
    const grid = new FireGrid(32);
    grid.igniteDefault();
    expect(grid.intensity[grid.index(5, 27)]).toBe(0.8);
    expect(grid.intensity[grid.index(27, 27)]).toBe(0.8);
    expect(grid.intensity[grid.index(16, 27)]).toBe(0.6);
    expect(grid.maxIntensity()).toBe(0.8);
  });

  test("heat spreads to the four neighbours only", () => {
    const grid = new FireGrid(5);
    grid.ignite(2, 2, 0.5);
    grid.step(1);
    expect(grid.intensity[grid.index(2, 2)]).toBeCloseTo(0.45);
    expect(grid.intensity[grid.index(1, 2)]).toBeCloseTo(0.0375);
    expect(grid.intensity[grid.index(2, 3)]).toBeCloseTo(0.0375);
    expect(grid.intensity[grid.index(1, 1)]).toBe(0);
  });

  test("cells at or below the spread threshold stay put", () => {
    const grid = new FireGrid(3);
    grid.ignite(1, 1, 0.1);
    grid.step(1);
    expect(grid.intensity[grid.index(1, 1)]).toBe(0.1);
    expect(grid.intensity[grid.index(0, 1)]).toBe(0);
    expect(grid.isExtinguished()).toBe(true);
  });

  test("burns out with every field in range and ash never receding", () => {
    const grid = new FireGrid(12);
    grid.ignite(6, 6, 1);
    let ash = Float64Array.from(grid.ash);
    let steps = 0;
    while (!grid.isExtinguished() && steps < 3000) {
      grid.step(1);
      steps += 1;
      expect(inUnitRange(grid.intensity)).toBe(true);
      expect(inUnitRange(grid.burn)).toBe(true);
      expect(inUnitRange(grid.ash)).toBe(true);
      expect(grid.ash.every((value, i) => value >= ash[i])).toBe(true);
      ash = Float64Array.from(grid.ash);
    }
    expect(grid.isExtinguished()).toBe(true);
    expect(grid.ash.some((value) => value > 0)).toBe(true);
  });

  test("intensity never exceeds what the ash leaves", () => {
    const grid = new FireGrid(8);
    grid.igniteDefault();
    for (let i = 0; i < 400; i += 1) {
      grid.step(1.5);
      expect(grid.intensity.every((value, cell) => value <= 1 - grid.ash[cell] + 1e-12)).toBe(true);
    }
  });

  test("reset clears every field", () => {
    const grid = new FireGrid(6);
    grid.igniteDefault();
    grid.step(1);
    grid.reset();
    expect(grid.maxIntensity()).toBe(0);
    expect(grid.burn.every((value) => value === 0)).toBe(true);
  });
});
