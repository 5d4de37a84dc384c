import type { Color, Renderer, Viewport } from "../../platform/types.js";
import { readEnumFlag, readFloatFlag } from "../../runtime/cli.js";
import type { CommonOptions, EffectDefinition, EffectInstance } from "../../runtime/effect.js";
import { randBelow, rgba, withAlpha, type RandomSource } from "../math.js";
import { glowPoints, StarField, toAlpha } from "../starfield.js";
import { Trail } from "../trail.js";
import { WindowGrid } from "../window-grid.js";

export const ROTATION_MODES = ["dynamic", "static", "none"] as const;
export type RotationMode = (typeof ROTATION_MODES)[number];

const SKY_STARS = 500;
const BUILDING_COUNT = 13;
const GROUND_MARGIN = 50;
export const MAX_METEORS = 10;
export const METEOR_TAIL = 20;
const METEOR_INTERVAL = 3;
const BUILDING_COLOR = rgba(255, 193, 7);
const DARK_WINDOW = rgba(90, 60, 0);
const LIT_WINDOW = rgba(255, 250, 220);
const STAR_COLOR = rgba(255, 255, 230);
const BRIGHT_STAR_COLOR = rgba(255, 242, 217);
const TAIL_COLOR = rgba(204, 230, 255);

export interface StarryNightOptions extends CommonOptions {
  /** 0..1 */
  readonly density: number;
  /** Meteor frequency multiplier, 0..5. */
  readonly meteors: number;
  readonly rotation: RotationMode;
}

export interface Skyscraper {
  readonly x: number;
  readonly width: number;
  readonly height: number;
  readonly windows: WindowGrid;
}

export interface Meteor {
  x: number;
  y: number;
  readonly vx: number;
  readonly vy: number;
  life: number;
  readonly tail: Trail;
  readonly tailAlpha: number[];
}

export const skyStarCount = (density: number): number => Math.trunc(SKY_STARS * (0.3 + density * 0.7));

export const createSkyline = (viewport: Viewport, rand: RandomSource): Skyscraper[] => {
  const spacing = viewport.width / BUILDING_COUNT;
  return Array.from({ length: BUILDING_COUNT }, (_, i) => {
    const jitter = randBelow(rand, Math.max(1, Math.trunc(spacing * 0.6))) - spacing * 0.3;
    const width = Math.trunc((12 + randBelow(rand, 20)) * (1.25 + rand() * 0.75));
    const height = 120 + randBelow(rand, 150);
    const cols = 2 + randBelow(rand, 6);
    const rows = Math.max(1, Math.trunc(height / 16));
    return { x: Math.trunc(i * spacing + jitter + 15), width, height, windows: new WindowGrid(cols, rows, rand) };
  });
};

/** Meteors enter on the left in the upper part of the sky and fall to the right. */
export const launchMeteor = (viewport: Viewport, rand: RandomSource): Meteor => {
  const x = -50;
  const y = viewport.height * 0.4 - randBelow(rand, Math.max(1, Math.trunc(viewport.height / 3)));
  return {
    x,
    y,
    vx: 250 + randBelow(rand, 150),
    vy: 100 + randBelow(rand, 100),
    life: 1,
    tail: new Trail(METEOR_TAIL, () => ({ x, y })),
    tailAlpha: new Array<number>(METEOR_TAIL).fill(0),
  };
};

export class NightSky {
  readonly stars: StarField;
  readonly skyline: Skyscraper[];
  readonly meteors: Meteor[] = [];
  private meteorTimer = 0;

  constructor(
    private readonly viewport: Viewport,
    private readonly options: StarryNightOptions,
    private readonly rand: RandomSource,
  ) {
    this.stars = new StarField(
      viewport,
      {
        count: skyStarCount(options.density),
        amplitude: 0.4,
        minBrightness: 0.2,
        drift: options.rotation === "dynamic",
        top: 20,
        bottom: viewport.height * 0.75,
        brightPercent: 15,
      },
      rand,
    );
    this.skyline = createSkyline(viewport, rand);
  }

  step(dt: number): void {
    const t = dt * this.options.speed;
    if (this.options.rotation !== "none") {
      this.stars.step(t);
    }
    for (const building of this.skyline) {
      building.windows.step(t);
    }
    if (this.options.meteors > 0) {
      this.meteorTimer += t;
      const interval = METEOR_INTERVAL / this.options.meteors;
      if (this.meteorTimer >= interval) {
        this.meteorTimer -= interval;
        if (this.meteors.length < MAX_METEORS) {
          this.meteors.push(launchMeteor(this.viewport, this.rand));
        }
      }
    }
    for (const meteor of this.meteors) {
      meteor.x += meteor.vx * t;
      meteor.y += meteor.vy * t;
      meteor.life -= t * 1.2;
      meteor.tail.push(meteor);
      meteor.tailAlpha.pop();
      meteor.tailAlpha.unshift(meteor.life);
    }
    const { width: W, height: H } = this.viewport;
    for (let i = this.meteors.length - 1; i >= 0; i -= 1) {
      const meteor = this.meteors[i];
      if (meteor.life <= 0 || meteor.x > W + 100 || meteor.y > H + 100) {
        this.meteors.splice(i, 1);
      }
    }
  }
}

class StarryNightInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly sky: NightSky,
  ) {}

  update(dt: number): void {
    this.sky.step(dt);
  }

  render(renderer: Renderer): void {
    for (const star of this.sky.stars.stars) {
      const color: Color = star.bright ? BRIGHT_STAR_COLOR : STAR_COLOR;
      const alpha = toAlpha(star.brightness);
      renderer.drawPoint({ x: star.x, y: star.y }, withAlpha(color, alpha));
      for (const point of glowPoints(star)) {
        renderer.drawPoint(point, withAlpha(color, Math.trunc(alpha * 0.3)));
      }
    }
    this.renderSkyline(renderer);
    for (const meteor of this.sky.meteors) {
      meteor.tail.points.forEach((point, i) => {
        const alpha = meteor.tailAlpha[i];
        if (alpha > 0.1) {
          renderer.drawPoint(point, withAlpha(TAIL_COLOR, toAlpha(alpha)));
        }
      });
      renderer.drawPoint(meteor, rgba(255, 255, 255, toAlpha(meteor.life)));
    }
  }

  teardown(): void {}

  private renderSkyline(renderer: Renderer) {
    const ground = this.viewport.height - GROUND_MARGIN;
    for (const building of this.sky.skyline) {
      const top = ground - building.height;
      renderer.fillRect({ x: building.x, y: top, w: building.width, h: building.height }, BUILDING_COLOR);
      const { windows } = building;
      const cellW = building.width / windows.cols;
      const cellH = building.height / windows.rows;
      for (let row = 0; row < windows.rows; row += 1) {
        for (let col = 0; col < windows.cols; col += 1) {
          renderer.fillRect(
            {
              x: Math.trunc(building.x + col * cellW + cellW * 0.25),
              y: Math.trunc(top + row * cellH + cellH * 0.25),
              w: Math.max(1, Math.trunc(cellW * 0.5)),
              h: Math.max(1, Math.trunc(cellH * 0.5)),
            },
            windows.isLit(col, row) ? LIT_WINDOW : DARK_WINDOW,
          );
        }
      }
    }
  }
}

export const StarryNightDefinition: EffectDefinition<StarryNightOptions> = {
  type: "starrynight",
  title: "Starry Night",
  flags: [
    { flag: "d", argument: "F", description: "Star density (0=sparse, 1=dense, default: 0.5)" },
    { flag: "m", argument: "F", description: "Meteor frequency multiplier (0-5, default: 1.0)" },
    { flag: "r", argument: "MODE", description: "Rotation: dynamic, static or none (default: dynamic)" },
  ],
  assets: [],
  parseOptions: (args) => ({
    ...args.common,
    density: readFloatFlag(args.flags, "d", 0.5, 0, 1),
    meteors: readFloatFlag(args.flags, "m", 1, 0, 5),
    rotation: readEnumFlag(args.flags, "r", ROTATION_MODES, "dynamic"),
  }),
  init: (context, options) =>
    new StarryNightInstance(
      context.viewport,
      new NightSky(context.viewport, options, () => context.rng.next()),
    ),
};
