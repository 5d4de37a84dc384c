import { describe, expect, test } from "vitest";

import { createRandomGenerator, resolveSeed } from "../rng.js";

describe("resolveSeed", () => {
  test.each([
    [42, 42],
    [-1, 4294967295],
    ["42", 42],
    [" 7 ", 7],
    ["a", 0xe40c292c],
  ])("%j resolves to %i", (seed, expected) => {
    expect(resolveSeed(seed)).toBe(expected);
  });

  test("draws a fresh seed when none is configured", () => {
    expect(resolveSeed(undefined, () => 5)).toBe(5);
    expect(resolveSeed("  ", () => 9)).toBe(9);
    expect(resolveSeed(Number.NaN, () => 3)).toBe(3);
  });
});

describe("createRandomGenerator", () => {
  test("replays the same sequence from the same seed", () => {
    const first = createRandomGenerator(1234);
    const second = createRandomGenerator(first.seed);
    const a = Array.from({ length: 5 }, () => first.next());
    const b = Array.from({ length: 5 }, () => second.next());
    expect(first.seed).toBe(1234);
    expect(b).toEqual(a);
  });

  test("numeric text seeds the same sequence as the number", () => {
    const fromText = createRandomGenerator("99");
    const fromNumber = createRandomGenerator(99);
    expect([fromText.next(), fromText.next()]).toEqual([fromNumber.next(), fromNumber.next()]);
  });

  test("stays within [0, 1)", () => {
    const rng = createRandomGenerator(7);
    for (let i = 0; i < 1000; i += 1) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
