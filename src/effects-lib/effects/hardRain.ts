import type { Renderer, Viewport } from "../../platform/types.js";
import { readIntFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { rgba, WHITE } from "../math.js";
import { FlashMachine, HARD_RAIN_FLASH, SLANT, SlantedRain } from "../rain.js";

const STREAK = 14;
const DROP = rgba(170, 190, 230, 220);
const DROP_ON_FLASH = rgba(60, 60, 80, 255);

export interface HardRainOptions extends CommonOptions {
  readonly drops: number;
}

class HardRainInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: HardRainOptions,
    private readonly rain: SlantedRain,
    private readonly flash: FlashMachine,
  ) {}

  update(dt: number, elapsed: number): void {
    this.rain.step(dt, elapsed, this.options.speed);
    this.flash.step(dt);
  }

  render(renderer: Renderer): void {
    const flashing = this.flash.state === "flashing";
    if (flashing) {
      renderer.fillRect({ x: 0, y: 0, w: this.viewport.width, h: this.viewport.height }, WHITE);
    }
    const color = flashing ? DROP_ON_FLASH : DROP;
    for (const drop of this.rain.drops) {
      renderer.drawLine(
        { x: drop.x - SLANT * STREAK, y: drop.y - STREAK },
        { x: drop.x, y: drop.y },
        color,
      );
    }
  }

  teardown(): void {}
}

export const HardRainDefinition: EffectDefinition<HardRainOptions> = {
  type: "hardrain",
  title: "Hard Rain",
  flags: [{ flag: "n", argument: "N", description: "Number of drops (default: 1000)" }],
  assets: [],
  parseOptions: (args) => ({
    ...args.common,
    drops: readIntFlag(args.flags, "n", 1000, 10, 5000),
  }),
  init: (context: EffectContext, options) => {
    const rand = () => context.rng.next();
    return new HardRainInstance(
      context.viewport,
      options,
      new SlantedRain(context.viewport, options.drops, rand),
      new FlashMachine(HARD_RAIN_FLASH, rand),
    );
  },
};
