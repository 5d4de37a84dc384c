import type { Renderer, Texture, Viewport } from "../../platform/types.js";
import { readIntFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { FireGrid } from "../fire-grid.js";
import { randBelow, rgba, type RandomSource } from "../math.js";
import { ParticleSystem, type Particle } from "../particles.js";

export const PAPER_WIDTH = 600;
export const PAPER_HEIGHT = 800;
export const MAX_PARTICLES = 1000;
export const TOTAL_BURN = 20;
const COOLDOWN = 10;
const PAPER_APPEAR = 2;
const REFERENCE_FRAME = 0.016;
const SPAWN_CHANCE = 3 / 200;
const TEXEL = 4;
const BACKGROUND = rgba(20, 20, 20);
const TRANSPARENT = rgba(0, 0, 0, 0);

export type FireSpecies = "ember" | "ash" | "smoke";

export interface FireParticle extends Particle {
  readonly species: FireSpecies;
}

export type FirePhase = "burning" | "cooldown";

export interface PaperFireOptions extends CommonOptions {
  readonly gridSize: number;
}

/** Off-white sheet with per-texel alpha jitter. */
export const paperPixels = (rand: RandomSource): Uint8ClampedArray => {
  const pixels = new Uint8ClampedArray(PAPER_WIDTH * PAPER_HEIGHT * 4);
  for (let ty = 0; ty < PAPER_HEIGHT; ty += TEXEL) {
    for (let tx = 0; tx < PAPER_WIDTH; tx += TEXEL) {
      const alpha = 245 + randBelow(rand, 11);
      for (let y = ty; y < Math.min(PAPER_HEIGHT, ty + TEXEL); y += 1) {
        for (let x = tx; x < Math.min(PAPER_WIDTH, tx + TEXEL); x += 1) {
          pixels.set([255, 250, 245, alpha], (y * PAPER_WIDTH + x) * 4);
        }
      }
    }
  }
  return pixels;
};

/**
 * Burning sheet: the fire grid, its particles and the animation clock.
 * Burning until `TOTAL_BURN + COOLDOWN` seconds, then reset as soon as the
 * last particle has died.
 */
export class PaperFire {
  readonly grid: FireGrid;
  readonly particles = new ParticleSystem<FireParticle>(MAX_PARTICLES);
  time = 0;
  resets = 0;

  constructor(
    gridSize: number,
    private readonly viewport: Viewport,
    private readonly rand: RandomSource,
  ) {
    this.grid = new FireGrid(gridSize);
    this.grid.igniteDefault();
  }

  get phase(): FirePhase {
    return this.time > TOTAL_BURN + COOLDOWN ? "cooldown" : "burning";
  }

  get paperOrigin(): { x: number; y: number } {
    return {
      x: Math.trunc((this.viewport.width - PAPER_WIDTH) / 2),
      y: this.viewport.height - PAPER_HEIGHT,
    };
  }

  step(dt: number, speed: number): void {
    const k = (dt / REFERENCE_FRAME) * speed;
    this.time += dt * speed;
    this.grid.step(k);
    this.grid.forEachBurning(({ x, y }) => {
      if (this.rand() < SPAWN_CHANCE) {
        this.emit(x, y);
      }
    });
    this.particles.step((p, i) => {
      p.x += p.vx * k;
      p.y += p.vy * k;
      if (p.species === "ash") {
        p.vy += 0.1 * k;
      } else if (p.species === "smoke") {
        p.vy -= 0.05 * k;
        p.vx += Math.sin(this.time + i) * 0.2 * k;
      }
      p.life -= (p.species === "smoke" ? 0.015 : 0.01) * k;
    });
    if (this.phase === "cooldown" && this.particles.count === 0) {
      this.reset();
    }
  }

  reset(): void {
    this.time = 0;
    this.grid.reset();
    this.grid.igniteDefault();
    this.particles.clear();
    this.resets += 1;
  }

  private emit(gx: number, gy: number) {
    const rand = this.rand;
    const origin = this.paperOrigin;
    const n = this.grid.size;
    const species: FireSpecies = (["ember", "ash", "smoke"] as const)[randBelow(rand, 3)];
    const base = {
      x: origin.x + gx * (PAPER_WIDTH / n) + (randBelow(rand, 10) - 5),
      y: origin.y + gy * (PAPER_HEIGHT / n),
      vx: (randBelow(rand, 40) - 20) / 10,
      vy: -(randBelow(rand, 20) + 10) / 10,
      life: 1,
      size: 2 + randBelow(rand, 3),
    };
    if (species === "ember") {
      this.particles.spawn({ ...base, species, color: rgba(255, 100 + randBelow(rand, 100), 0, 255) });
    } else if (species === "ash") {
      const gray = 50 + randBelow(rand, 100);
      this.particles.spawn({ ...base, species, color: rgba(gray, gray, gray, 200) });
    } else {
      const gray = 150 + randBelow(rand, 100);
      this.particles.spawn({
        ...base,
        species,
        vy: -(randBelow(rand, 30) + 5) / 10,
        color: rgba(gray, gray, gray, 100),
      });
    }
  }
}

class PaperFireInstance implements EffectInstance {
  constructor(
    private readonly options: PaperFireOptions,
    private readonly fire: PaperFire,
    private readonly paper: Texture,
    private readonly overlay: Texture,
    private readonly renderer: Renderer,
  ) {}

  update(dt: number): void {
    this.fire.step(dt, this.options.speed);
  }

  render(renderer: Renderer): void {
    renderer.fillRect({ x: 0, y: 0, w: renderer.width, h: renderer.height }, BACKGROUND);
    const origin = this.fire.paperOrigin;
    const paperRect = { x: origin.x, y: origin.y, w: PAPER_WIDTH, h: PAPER_HEIGHT };
    const alpha = this.fire.time < PAPER_APPEAR ? this.fire.time / PAPER_APPEAR : 1;

    this.drawOverlay(renderer);
    renderer.blit(this.paper, null, paperRect, { alpha: Math.trunc(alpha * 255) });
    renderer.setBlendMode("multiply");
    renderer.blit(this.overlay, null, paperRect);

    renderer.setBlendMode("additive");
    for (const p of this.fire.particles.items) {
      const size = Math.max(1, Math.trunc(p.size * p.life));
      const half = Math.trunc(size / 2);
      renderer.fillRect(
        { x: Math.trunc(p.x) - half, y: Math.trunc(p.y) - half, w: size, h: size },
        { ...p.color, a: Math.trunc(p.life * p.color.a) },
      );
    }
    renderer.setBlendMode("alpha");
  }

  teardown(): void {
    this.renderer.destroyTexture(this.paper);
    this.renderer.destroyTexture(this.overlay);
  }

  private drawOverlay(renderer: Renderer) {
    const { grid } = this.fire;
    const n = grid.size;
    const cellW = PAPER_WIDTH / n;
    const cellH = PAPER_HEIGHT / n;
    renderer.setRenderTarget(this.overlay);
    renderer.clear(TRANSPARENT);
    for (let y = 0; y < n; y += 1) {
      for (let x = 0; x < n; x += 1) {
        const i = grid.index(x, y);
        const rect = {
          x: Math.trunc(x * cellW),
          y: Math.trunc(y * cellH),
          w: Math.trunc(cellW) + 1,
          h: Math.trunc(cellH) + 1,
        };
        const ash = grid.ash[i];
        const burn = grid.burn[i];
        if (ash > 0) {
          const gray = 255 - Math.trunc(ash * 255);
          renderer.fillRect(rect, rgba(gray, gray, gray));
        } else if (burn > 0) {
          let r = 255;
          let g = Math.trunc(burn * 255);
          if (burn > 0.5) {
            r = 255 - Math.trunc((burn - 0.5) * 2 * 255);
            g = 128 - Math.trunc((burn - 0.5) * 256);
          }
          renderer.fillRect(rect, rgba(r, g, 0, Math.trunc(grid.intensity[i] * 200)));
        }
      }
    }
    renderer.setRenderTarget(null);
  }
}

export const PaperFireDefinition: EffectDefinition<PaperFireOptions> = {
  type: "paperfire",
  title: "Paper Fire",
  flags: [{ flag: "l", argument: "N", description: "Fire grid cells per side (default: 80)" }],
  assets: [],
  parseOptions: (args) => ({
    ...args.common,
    gridSize: readIntFlag(args.flags, "l", 80, 20, 200),
  }),
  init: (context: EffectContext, options) => {
    const rand = () => context.rng.next();
    const paper = context.renderer.createTexture(PAPER_WIDTH, PAPER_HEIGHT, paperPixels(rand));
    const overlay = context.renderer.createRenderTarget(PAPER_WIDTH, PAPER_HEIGHT);
    const fire = new PaperFire(options.gridSize, context.viewport, rand);
    return new PaperFireInstance(options, fire, paper, overlay, context.renderer);
  },
};
