import type { Color, Renderer, Viewport } from "../../platform/types.js";
import { readIntFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { clamp, randBelow, rgba, WHITE, type RandomSource } from "../math.js";
import { ParticleSystem, type Particle } from "../particles.js";
import { WindowGrid } from "../window-grid.js";

const REFERENCE_FRAME = 0.016;
const LAYER_COUNTS = [15, 12, 8];
const SCROLL_SPEEDS = [0.2, 0.5, 1.0];
const WINDOW_LAYER = 2;
const CAR_COUNT = 10;
const FLOATER_COUNT = 20;
export const MAX_WEATHER = 500;
const WEATHER_REFILL_BELOW = MAX_WEATHER - 50;
const GROUND = 0.8;

const BUILDING_COLORS = [
  rgba(80, 80, 90),
  rgba(90, 85, 75),
  rgba(70, 70, 85),
  rgba(85, 75, 70),
  rgba(75, 85, 75),
];
const CAR_COLORS = [
  rgba(255, 0, 0),
  rgba(0, 0, 255),
  rgba(255, 255, 0),
  rgba(255, 255, 255),
  rgba(200, 200, 200),
  rgba(100, 100, 100),
];
const WINDOW_LIGHT = rgba(255, 255, 200);
const RAIN = rgba(100, 150, 255, 200);
const SNOW = rgba(255, 255, 255, 200);

export interface Building {
  readonly x: number;
  readonly width: number;
  readonly height: number;
  readonly color: Color;
  readonly windows: WindowGrid | null;
}

export interface Car {
  x: number;
  readonly y: number;
  readonly vx: number;
  readonly truck: boolean;
  readonly color: Color;
}

export type FloaterKind = "balloon" | "bird" | "helicopter";

export interface Floater {
  readonly kind: FloaterKind;
  x: number;
  y: number;
  vx: number;
  readonly vy: number;
  readonly color: Color;
}

export interface WeatherParticle extends Particle {
  readonly snow: boolean;
}

export interface CityscapeOptions extends CommonOptions {
  readonly weather: boolean;
}

/** Sky colour over a slow day cycle. */
export const skyColor = (elapsed: number, speed: number): Color => {
  const t = (elapsed / 10) * speed;
  return rgba(
    Math.trunc(clamp(135 + 120 * Math.sin(t), 0, 255)),
    Math.trunc(clamp(206 + 50 * Math.sin(t + 2), 0, 255)),
    Math.trunc(clamp(235 + 20 * Math.sin(t + 4), 0, 255)),
  );
};

export const layerScale = (layer: number): number => 0.3 + layer * 0.3;

export class City {
  readonly layers: Building[][];
  readonly scroll = LAYER_COUNTS.map(() => 0);
  readonly cars: Car[];
  readonly floaters: Floater[];
  readonly weather = new ParticleSystem<WeatherParticle>(MAX_WEATHER);

  constructor(
    private readonly viewport: Viewport,
    private readonly weatherEnabled: boolean,
    private readonly rand: RandomSource,
  ) {
    this.layers = LAYER_COUNTS.map((count, layer) => this.createLayer(count, layer));
    this.cars = Array.from({ length: CAR_COUNT }, () => this.createCar());
    this.floaters = Array.from({ length: FLOATER_COUNT }, () => this.createFloater());
  }

  step(dt: number, speed: number): void {
    const { width: W, height: H } = this.viewport;
    const rand = this.rand;
    const k = (dt / REFERENCE_FRAME) * speed;

    SCROLL_SPEEDS.forEach((rate, layer) => {
      this.scroll[layer] -= rate * k;
      if (this.scroll[layer] < -200) {
        this.scroll[layer] = 0;
      }
    });

    for (const building of this.layers[WINDOW_LAYER]) {
      building.windows?.step(dt * speed);
    }

    for (const car of this.cars) {
      car.x += car.vx * k;
      if (car.x > W + 100) {
        car.x = -100 - randBelow(rand, 100);
      }
      if (car.x < -100) {
        car.x = W + 100 + randBelow(rand, 100);
      }
    }

    for (const floater of this.floaters) {
      floater.x += floater.vx * k;
      floater.y += floater.vy * k;
      if (floater.x > W + 50) {
        floater.x = -50;
      }
      if (floater.x < -50) {
        floater.x = W + 50;
      }
      if (floater.y < -50) {
        floater.y = H + 50;
        floater.x = randBelow(rand, W);
        floater.vx = (randBelow(rand, 20) - 10) / 10;
      }
    }

    if (this.weatherEnabled && this.weather.count < WEATHER_REFILL_BELOW) {
      for (let i = 0; i < 3; i += 1) {
        const snow = randBelow(rand, 2) === 1;
        const fall = 2 + randBelow(rand, 20) / 10;
        this.weather.spawn({
          x: randBelow(rand, W),
          y: -10,
          vx: snow ? 0 : 0.1,
          vy: snow ? fall * 0.5 : fall,
          life: 1,
          size: snow ? 3 : 1,
          color: snow ? SNOW : RAIN,
          snow,
        });
      }
    }
    this.weather.step((p) => {
      p.x += p.vx * k;
      p.y += p.vy * k;
      if (p.y > H + 20) {
        p.life = 0;
      }
    });
  }

  private createLayer(count: number, layer: number): Building[] {
    const { width: W, height: H } = this.viewport;
    const rand = this.rand;
    const spacing = Math.trunc((W + 200) / count);
    return Array.from({ length: count }, (_, i) => {
      const width = 40 + randBelow(rand, 60);
      const height = Math.trunc(H * layerScale(layer) * (0.4 + randBelow(rand, 60) / 100));
      const color = BUILDING_COLORS[randBelow(rand, BUILDING_COLORS.length)];
      const windows =
        layer === WINDOW_LAYER
          ? new WindowGrid(Math.min(16, Math.trunc(width / 15)), Math.min(32, Math.trunc(height / 25)), rand)
          : null;
      return {
        x: i * spacing - 100 + randBelow(rand, Math.trunc(spacing / 2)),
        width,
        height,
        color,
        windows,
      };
    });
  }

  private createCar(): Car {
    const { width: W, height: H } = this.viewport;
    const rand = this.rand;
    const y = H * 0.82 + (randBelow(rand, 30) - 15);
    const speed = 1 + randBelow(rand, 20) / 10;
    const truck = randBelow(rand, 2) === 1;
    const fromLeft = randBelow(rand, 2) === 0;
    return {
      x: fromLeft ? -50 - randBelow(rand, 200) : W + 50 + randBelow(rand, 200),
      y,
      vx: fromLeft ? speed : -speed,
      truck,
      color: CAR_COLORS[randBelow(rand, CAR_COLORS.length)],
    };
  }

  private createFloater(): Floater {
    const { width: W, height: H } = this.viewport;
    const rand = this.rand;
    const kind = (["balloon", "bird", "helicopter"] as const)[randBelow(rand, 3)];
    const x = randBelow(rand, W);
    if (kind === "balloon") {
      return {
        kind,
        x,
        y: H * 0.9,
        vx: (randBelow(rand, 20) - 10) / 10,
        vy: -0.5 - randBelow(rand, 10) / 10,
        color: rgba(randBelow(rand, 255), randBelow(rand, 255), randBelow(rand, 255)),
      };
    }
    if (kind === "bird") {
      const y = H * 0.4 + randBelow(rand, 100);
      const vx = 2 + randBelow(rand, 40) / 10;
      const vy = (randBelow(rand, 20) - 10) / 10;
      return { kind, x, y, vx: randBelow(rand, 2) ? -vx : vx, vy, color: rgba(100, 100, 100) };
    }
    const y = H * 0.3 + randBelow(rand, 80);
    const vx = 1.5 + randBelow(rand, 20) / 10;
    return { kind, x, y, vx: randBelow(rand, 2) ? -vx : vx, vy: 0, color: rgba(50, 50, 50) };
  }
}

class CityscapeInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: CityscapeOptions,
    private readonly city: City,
  ) {}

  update(dt: number): void {
    this.city.step(dt, this.options.speed);
  }

  render(renderer: Renderer, elapsed: number): void {
    const { width: W, height: H } = this.viewport;
    renderer.fillRect({ x: 0, y: 0, w: W, h: H }, skyColor(elapsed, this.options.speed));
    this.city.layers.forEach((buildings, layer) => {
      for (const building of buildings) {
        this.renderBuilding(renderer, building, layer);
      }
    });
    for (const car of this.city.cars) {
      const w = car.truck ? 25 : 20;
      const h = car.truck ? 10 : 8;
      const x = Math.trunc(car.x);
      const y = Math.trunc(car.y);
      renderer.fillRect({ x, y, w, h }, car.color);
      renderer.fillRect({ x: x + w - 3, y: y + 1, w: 2, h: h - 2 }, WHITE);
    }
    for (const floater of this.city.floaters) {
      this.renderFloater(renderer, floater);
    }
    if (this.options.weather) {
      for (const p of this.city.weather.items) {
        const color = { ...p.color, a: Math.trunc(p.life * p.color.a) };
        if (p.snow) {
          renderer.fillCircle({ x: p.x, y: p.y }, p.size, color);
        } else {
          renderer.drawLine({ x: p.x, y: p.y }, { x: p.x + p.vx * 3, y: p.y + p.vy * 3 }, color);
        }
      }
    }
  }

  teardown(): void {}

  private renderBuilding(renderer: Renderer, building: Building, layer: number) {
    const { width: W, height: H } = this.viewport;
    const scale = layerScale(layer);
    const w = Math.trunc(building.width * scale);
    const h = Math.trunc(building.height * scale);
    let x = building.x + Math.trunc(this.city.scroll[layer]);
    while (x + w < 0) {
      x += W + 200;
    }
    while (x > W) {
      x -= W + 200;
    }
    if (x + w < 0) {
      return;
    }
    const y = Math.trunc(H * GROUND) - h;
    renderer.fillRect({ x, y, w, h }, building.color);

    const windows = building.windows;
    if (!windows || windows.cols === 0 || windows.rows === 0) {
      return;
    }
    const cellW = Math.trunc(w / windows.cols);
    const cellH = Math.trunc(h / windows.rows);
    const margin = 2;
    for (let row = 0; row < windows.rows; row += 1) {
      for (let col = 0; col < windows.cols; col += 1) {
        if (windows.isLit(col, row)) {
          renderer.fillRect(
            {
              x: x + col * cellW + margin,
              y: y + row * cellH + margin,
              w: cellW - 2 * margin,
              h: cellH - 2 * margin,
            },
            WINDOW_LIGHT,
          );
        }
      }
    }
  }

  private renderFloater(renderer: Renderer, floater: Floater) {
    const { x, y, color } = floater;
    switch (floater.kind) {
      case "balloon":
        renderer.fillCircle({ x, y }, 4, color);
        renderer.drawLine({ x, y: y + 4 }, { x, y: y + 14 }, color);
        return;
      case "bird":
        renderer.drawLine({ x: x - 3, y }, { x: x + 3, y }, color);
        renderer.drawLine({ x: x + 3, y }, { x, y: y - 3 }, color);
        renderer.drawLine({ x, y: y - 3 }, { x: x - 3, y }, color);
        return;
      case "helicopter":
        renderer.fillRect({ x: Math.trunc(x) - 6, y: Math.trunc(y) - 6, w: 12, h: 12 }, color);
        return;
    }
  }
}

export const CityscapeDefinition: EffectDefinition<CityscapeOptions> = {
  type: "cityscape",
  title: "Cityscape",
  flags: [{ flag: "w", argument: "0|1", description: "Enable weather effects (default: 1)" }],
  assets: [],
  parseOptions: (args) => ({
    ...args.common,
    weather: readIntFlag(args.flags, "w", 1, 0, 1) === 1,
  }),
  init: (context: EffectContext, options) =>
    new CityscapeInstance(
      context.viewport,
      options,
      new City(context.viewport, options.weather, () => context.rng.next()),
    ),
};
