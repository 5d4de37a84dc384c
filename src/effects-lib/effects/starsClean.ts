import type { Renderer } from "../../platform/types.js";
import type { CommonOptions, EffectDefinition, EffectInstance } from "../../runtime/effect.js";
import { rgba, withAlpha } from "../math.js";
import { glowPoints, StarField, toAlpha } from "../starfield.js";

export const CLEAN_STAR_COUNT = 1500;
const STAR_COLOR = rgba(255, 255, 230);
const BRIGHT_STAR_COLOR = rgba(255, 242, 217);

class StarsCleanInstance implements EffectInstance {
  constructor(
    private readonly options: CommonOptions,
    private readonly field: StarField,
  ) {}

  update(dt: number): void {
    this.field.step(dt * this.options.speed);
  }

  render(renderer: Renderer): void {
    for (const star of this.field.stars) {
      const color = withAlpha(star.bright ? BRIGHT_STAR_COLOR : STAR_COLOR, toAlpha(star.brightness));
      renderer.drawPoint(star, color);
      for (const point of glowPoints(star)) {
        renderer.drawPoint(point, color);
      }
    }
  }

  teardown(): void {}
}

export const StarsCleanDefinition: EffectDefinition = {
  type: "starsclean",
  title: "Stars",
  flags: [],
  assets: [],
  parseOptions: (args) => args.common,
  init: (context, options) =>
    new StarsCleanInstance(
      options,
      new StarField(
        context.viewport,
        {
          count: CLEAN_STAR_COUNT,
          amplitude: 0.3,
          minBrightness: 0.2,
          drift: false,
          top: 0,
          bottom: context.viewport.height,
          brightPercent: 15,
        },
        () => context.rng.next(),
      ),
    ),
};
