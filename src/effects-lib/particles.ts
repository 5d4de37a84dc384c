import type { Color } from "../platform/types.js";
import { compactInPlace } from "./pooling.js";

export interface Particle {
  x: number;
  y: number;
  vx: number;
  vy: number;
  /** 1 at spawn, dead at or below 0. */
  life: number;
  size: number;
  color: Color;
}

/**
 * Contiguous particle array with a hard cap. Dead particles are removed by an
 * order-preserving in-place compaction after each step.
 */
export class ParticleSystem<T extends Particle> {
  readonly items: T[] = [];

  constructor(readonly capacity: number) {}

  get count(): number {
    return this.items.length;
  }

  /** Returns false when the system is full and the particle was dropped. */
  spawn(particle: T): boolean {
    if (this.items.length >= this.capacity) {
      return false;
    }
    this.items.push(particle);
    return true;
  }

  step(update: (particle: T, index: number) => void): number {
    this.items.forEach((particle, index) => {
      if (particle.life > 0) {
        update(particle, index);
      }
    });
    return compactInPlace(this.items, (particle) => particle.life > 0);
  }

  clear(): void {
    this.items.length = 0;
  }
}
