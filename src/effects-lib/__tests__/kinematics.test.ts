import { describe, expect, test } from "vitest";

import { stepBalls, type Ball } from "../effects/bouncingBall.js";
import {
  bounceWalls,
  kineticEnergy,
  momentum,
  reflectVelocity,
  resolveElasticCollision,
  type Body,
} from "../kinematics.js";
import { createRandomGenerator } from "../../runtime/rng.js";
import { randBelow, rgba } from "../math.js";

const viewport = { width: 800, height: 600 };

const ball = (x: number, vx: number): Ball => ({ x, y: 100, vx, vy: 0, color: rgba(255, 0, 0) });

describe("bounceWalls", () => {
  test("clamps into bounds and negates the crossed axis", () => {
    const body: Body = { x: 790, y: 300, vx: 50, vy: 10 };
    const hit = bounceWalls(body, { minX: 20, minY: 20, maxX: 780, maxY: 580 });
    expect(hit).toBe(true);
    expect(body).toEqual({ x: 780, y: 300, vx: -50, vy: 10 });
  });

  test("leaves bodies inside the bounds untouched", () => {
    const body: Body = { x: 400, y: 300, vx: 50, vy: 10 };
    expect(bounceWalls(body, { minX: 20, minY: 20, maxX: 780, maxY: 580 })).toBe(false);
    expect(body.vx).toBe(50);
  });
});

describe("resolveElasticCollision", () => {
  test("swaps normal components and keeps tangential ones", () => {
    const a: Body = { x: 0, y: 0, vx: 10, vy: 5 };
    const b: Body = { x: 30, y: 0, vx: -10, vy: 0 };
    const before = { p: momentum([a, b]), e: kineticEnergy([a, b]) };

    expect(resolveElasticCollision(a, b, 40)).toBe(true);

    expect(a.x).toBeCloseTo(-5);
    expect(b.x).toBeCloseTo(35);
    expect(a.vx).toBeCloseTo(-10);
    expect(a.vy).toBeCloseTo(5);
    expect(b.vx).toBeCloseTo(10);
    expect(b.vy).toBeCloseTo(0);

    const after = { p: momentum([a, b]), e: kineticEnergy([a, b]) };
    expect(after.p.x).toBeCloseTo(before.p.x);
    expect(after.p.y).toBeCloseTo(before.p.y);
    expect(after.e).toBeCloseTo(before.e);
  });

  test("ignores bodies that are not touching", () => {
    const a: Body = { x: 0, y: 0, vx: 1, vy: 0 };
    const b: Body = { x: 40, y: 0, vx: -1, vy: 0 };
    expect(resolveElasticCollision(a, b, 40)).toBe(false);
    expect(a.vx).toBe(1);
  });

  test("conserves momentum and energy on an oblique hit", () => {
    const a: Body = { x: 0, y: 0, vx: 30, vy: -12 };
    const b: Body = { x: 24, y: 18, vx: -7, vy: 20 };
    const p = momentum([a, b]);
    const e = kineticEnergy([a, b]);
    resolveElasticCollision(a, b, 40);
    expect(momentum([a, b]).x).toBeCloseTo(p.x);
    expect(momentum([a, b]).y).toBeCloseTo(p.y);
    expect(kineticEnergy([a, b])).toBeCloseTo(e);
    expect(Math.hypot(b.x - a.x, b.y - a.y)).toBeCloseTo(40);
  });
});

describe("reflectVelocity", () => {
  test("mirrors only when moving into the normal", () => {
    const body: Body = { x: 0, y: 0, vx: 3, vy: -4 };
    reflectVelocity(body, { x: 0, y: 1 });
    expect(body.vx).toBe(3);
    expect(body.vy).toBe(4);
    reflectVelocity(body, { x: 0, y: 1 });
    expect(body.vy).toBe(4);
  });
});

describe("stepBalls", () => {
  test("head-on balls exchange velocities at contact", () => {
    const balls = [ball(100, 100), ball(300, -100)];
    for (let i = 0; i < 80; i += 1) {
      stepBalls(balls, 0.01, 1, viewport);
    }
    expect(balls[0].x).toBe(180);
    expect(balls[0].vx).toBe(100);

    stepBalls(balls, 0.01, 1, viewport);

    expect(balls[0].x).toBe(180);
    expect(balls[1].x).toBe(220);
    expect(balls[0].vx).toBe(-100);
    expect(balls[1].vx).toBe(100);
    expect(momentum(balls).x).toBe(0);
    expect(kineticEnergy(balls)).toBe(10000);
  });

  test("seeded pair at 16 ms frames swaps velocities and touches at 40 px within a second", () => {
    const rng = createRandomGenerator(1);
    const channel = () => randBelow(rng.next, 256);
    const colour = () => rgba(channel(), channel(), channel());
    const balls: Ball[] = [
      { x: 100, y: 100, vx: 100, vy: 0, color: colour() },
      { x: 300, y: 100, vx: -100, vy: 0, color: colour() },
    ];
    const contacts: number[] = [];
    // 63 frames of 16 ms cover the first second.
    for (let frame = 0; frame < 63; frame += 1) {
      const before = balls[0].vx;
      stepBalls(balls, 0.016, 1, viewport);
      if (balls[0].vx !== before) {
        contacts.push(balls[1].x - balls[0].x);
      }
    }

    expect(contacts).toHaveLength(1);
    expect(contacts[0]).toBeCloseTo(40, 0);
    expect(balls.map((b) => [b.vx, b.vy])).toEqual([
      [-100, 0],
      [100, 0],
    ]);
    expect(balls[0].x).toBeLessThan(balls[1].x);
  });

  test("keeps every ball inside the radius margin", () => {
    const balls = [ball(30, -500), ball(770, 500)];
    stepBalls(balls, 0.1, 1, viewport);
    expect(balls[0].x).toBe(20);
    expect(balls[0].vx).toBe(500);
    expect(balls[1].x).toBe(780);
    expect(balls[1].vx).toBe(-500);
  });
});
