import type { Point } from "../platform/types.js";

/**
 * Fixed-length position history. `push` shifts every entry one slot toward
 * the tail and writes the new head at index 0.
 */
export class Trail {
  readonly points: { x: number; y: number }[];

  constructor(
    readonly length: number,
    seed: (index: number) => Point,
  ) {
    this.points = Array.from({ length }, (_, index) => {
      const p = seed(index);
      return { x: p.x, y: p.y };
    });
  }

  get head(): Point {
    return this.points[0];
  }

  push(point: Point): void {
    for (let i = this.length - 1; i > 0; i -= 1) {
      this.points[i].x = this.points[i - 1].x;
      this.points[i].y = this.points[i - 1].y;
    }
    if (this.length > 0) {
      this.points[0].x = point.x;
      this.points[0].y = point.y;
    }
  }
}

/** Linear taper from `head` at index 0 to `tail` at the last index. */
export const taperedThickness = (index: number, length: number, head = 8, tail = 2): number => {
  if (length <= 1) {
    return head;
  }
  return tail + Math.floor(((head - tail) * (length - 1 - index)) / (length - 1));
};
