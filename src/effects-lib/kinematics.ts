import type { Point } from "../platform/types.js";

export interface Body {
  x: number;
  y: number;
  vx: number;
  vy: number;
}

export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

export const integrate = (body: Body, dt: number, speed: number): void => {
  body.x += body.vx * dt * speed;
  body.y += body.vy * dt * speed;
};

/** Clamps the body into `bounds` and negates the velocity on each crossed axis. */
export const bounceWalls = (body: Body, bounds: Bounds): boolean => {
  let hit = false;
  if (body.x < bounds.minX || body.x > bounds.maxX) {
    body.vx = -body.vx;
    body.x = Math.max(bounds.minX, Math.min(bounds.maxX, body.x));
    hit = true;
  }
  if (body.y < bounds.minY || body.y > bounds.maxY) {
    body.vy = -body.vy;
    body.y = Math.max(bounds.minY, Math.min(bounds.maxY, body.y));
    hit = true;
  }
  return hit;
};

/**
 * Equal-mass elastic contact: when the centres are closer than `minDistance`
 * the bodies are pushed apart by half the overlap each, and the velocity
 * components along the contact normal are swapped while tangential ones are
 * kept. Returns whether a contact was resolved.
 */
export const resolveElasticCollision = (a: Body, b: Body, minDistance: number): boolean => {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const dist = Math.hypot(dx, dy);
  if (dist >= minDistance || dist <= 0) {
    return false;
  }
  const nx = dx / dist;
  const ny = dy / dist;
  const half = (minDistance - dist) / 2;
  a.x -= nx * half;
  a.y -= ny * half;
  b.x += nx * half;
  b.y += ny * half;

  const tx = -ny;
  const ty = nx;
  const aN = a.vx * nx + a.vy * ny;
  const aT = a.vx * tx + a.vy * ty;
  const bN = b.vx * nx + b.vy * ny;
  const bT = b.vx * tx + b.vy * ty;
  a.vx = bN * nx + aT * tx;
  a.vy = bN * ny + aT * ty;
  b.vx = aN * nx + bT * tx;
  b.vy = aN * ny + bT * ty;
  return true;
};

/** Mirrors the velocity about the unit normal `n` when moving into it. */
export const reflectVelocity = (body: Body, n: Point): void => {
  const dot = body.vx * n.x + body.vy * n.y;
  if (dot >= 0) {
    return;
  }
  body.vx -= 2 * dot * n.x;
  body.vy -= 2 * dot * n.y;
};

export const momentum = (bodies: readonly Body[]): Point => ({
  x: bodies.reduce((sum, body) => sum + body.vx, 0),
  y: bodies.reduce((sum, body) => sum + body.vy, 0),
});

export const kineticEnergy = (bodies: readonly Body[]): number =>
  bodies.reduce((sum, body) => sum + 0.5 * (body.vx * body.vx + body.vy * body.vy), 0);
