import { describe, expect, test } from "vitest";

import { rgba } from "../math.js";
import { ParticleSystem, type Particle } from "../particles.js";
import { compactInPlace, createSlotPool } from "../pooling.js";
import { taperedThickness, Trail } from "../trail.js";

const particle = (x: number, life: number): Particle => ({
  x,
  y: 0,
  vx: 0,
  vy: 0,
  life,
  size: 1,
  color: rgba(255, 128, 0),
});

describe("ParticleSystem", () => {
  test("drops spawns beyond capacity", () => {
    const system = new ParticleSystem<Particle>(3);
    expect([1, 2, 3, 4].map((x) => system.spawn(particle(x, 1)))).toEqual([
      true,
      true,
      true,
      false,
    ]);
    expect(system.count).toBe(3);
  });

  test("removes dead particles and keeps the order of the living", () => {
    const system = new ParticleSystem<Particle>(8);
    [1, 2, 3, 4, 5].forEach((x) => system.spawn(particle(x, x / 10)));
    const survivors = system.step((p) => {
      p.life -= 0.25;
    });
    expect(survivors).toBe(3);
    expect(system.items.map((p) => p.x)).toEqual([3, 4, 5]);
  });

  test("already dead particles are not updated", () => {
    const system = new ParticleSystem<Particle>(2);
    system.spawn(particle(1, 0));
    let updates = 0;
    system.step(() => {
      updates += 1;
    });
    expect(updates).toBe(0);
    expect(system.count).toBe(0);
  });
});

describe("createSlotPool", () => {
  test("hands out free slots until exhausted and reuses released ones", () => {
    const pool = createSlotPool(2, (index) => ({ active: false, index }));
    const first = pool.acquire();
    const second = pool.acquire();
    expect(pool.acquire()).toBeNull();
    expect(pool.activeCount()).toBe(2);
    if (!first || !second) {
      throw new Error("expected two slots");
    }
    pool.release(first);
    expect(pool.activeCount()).toBe(1);
    expect(pool.acquire()).toBe(first);

    const visited: number[] = [];
    pool.forEachActive((slot) => visited.push(slot.index));
    expect(visited).toEqual([0, 1]);
  });
});

describe("compactInPlace", () => {
  test("keeps accepted items in order and truncates", () => {
    const items = [1, 2, 3, 4, 5, 6];
    expect(compactInPlace(items, (value) => value % 2 === 0)).toBe(3);
    expect(items).toEqual([2, 4, 6]);
  });
});

describe("Trail", () => {
  test("push shifts every point toward the tail", () => {
    const trail = new Trail(4, (index) => ({ x: index, y: 0 }));
    trail.push({ x: 10, y: 5 });
    expect(trail.points.map((p) => p.x)).toEqual([10, 0, 1, 2]);
    expect(trail.head).toEqual({ x: 10, y: 5 });
  });

  test("thickness tapers from head to tail", () => {
    expect(taperedThickness(0, 50)).toBe(8);
    expect(taperedThickness(49, 50)).toBe(2);
    expect(taperedThickness(24, 50)).toBe(5);
    expect(taperedThickness(0, 1)).toBe(8);
  });
});
