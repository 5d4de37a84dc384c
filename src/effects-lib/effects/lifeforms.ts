import { AssetDecodeError, describeError } from "../../platform/errors.js";
import type { Color, Point, Renderer, Viewport } from "../../platform/types.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import {
  ConstellationSequence,
  ConstellationTriplet,
  readConstellationCatalog,
  type ConstellationCatalog,
  type ConstellationMorph,
} from "../constellation.js";
import { clamp, randBelow, rgba, WHITE, type RandomSource } from "../math.js";

const CATALOG_ASSET = "constellations";
const REFERENCE_FRAME = 0.016;
const GALAXY_STARS = 1200;
const TWINKLING_STARS = GALAXY_STARS / 2;
const TWINKLE_STEP = 0.2;
const THICK_SHAPES = new Set(["dna"]);
const CLASSIC_LINE = rgba(100, 100, 100);
const CLASSIC_STAR_SIZE = 4;

export interface GalaxyStar {
  readonly x: number;
  readonly y: number;
  /** 50..149 */
  readonly brightness: number;
  readonly twinkles: boolean;
  phase: number;
}

export const createGalaxy = (viewport: Viewport, rand: RandomSource): GalaxyStar[] =>
  Array.from({ length: GALAXY_STARS }, (_, i) => ({
    x: randBelow(rand, viewport.width),
    y: randBelow(rand, viewport.height),
    brightness: 50 + randBelow(rand, 100),
    twinkles: i < TWINKLING_STARS,
    phase: randBelow(rand, 360),
  }));

/** Twinkling stars swing between 40% and 100% of their base brightness. */
export const galaxyBrightness = (star: GalaxyStar): number => {
  if (!star.twinkles) {
    return star.brightness;
  }
  const twinkle = Math.sin(star.phase) * 0.6 + 0.5;
  return Math.trunc(clamp(star.brightness * (0.4 + twinkle * 0.6), 0, 255));
};

const loadCatalog = (context: EffectContext): ConstellationCatalog => {
  try {
    return readConstellationCatalog(context.platform.assets.json(CATALOG_ASSET));
  } catch (error) {
    if (error instanceof AssetDecodeError) {
      throw error;
    }
    throw new AssetDecodeError(CATALOG_ASSET, describeError(error), { cause: error });
  }
};

const drawSegments = (
  renderer: Renderer,
  morph: ConstellationMorph,
  origin: Point,
  color: Color,
  thick: boolean,
) => {
  for (const { from, to } of morph.segments()) {
    const a = { x: Math.trunc(origin.x + from.x), y: Math.trunc(origin.y + from.y) };
    const b = { x: Math.trunc(origin.x + to.x), y: Math.trunc(origin.y + to.y) };
    if (thick) {
      renderer.drawLine(a, b, color, 3);
      continue;
    }
    renderer.drawLine(a, b, color);
    renderer.drawLine({ x: a.x + 1, y: a.y }, { x: b.x + 1, y: b.y }, color);
  }
};

class LifeformsInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: CommonOptions,
    private readonly triplet: ConstellationTriplet,
    private readonly galaxy: GalaxyStar[],
  ) {}

  update(dt: number): void {
    const frames = (dt / REFERENCE_FRAME) * this.options.speed;
    for (const star of this.galaxy) {
      if (star.twinkles) {
        star.phase += TWINKLE_STEP * frames;
      }
    }
    this.triplet.step(dt, this.options.speed);
  }

  render(renderer: Renderer): void {
    for (const star of this.galaxy) {
      const level = galaxyBrightness(star);
      renderer.drawPoint({ x: star.x, y: star.y }, rgba(level, level, level));
    }
    const center = { x: this.viewport.width / 2, y: this.viewport.height / 2 };
    for (const group of this.triplet.groups) {
      const origin = { x: center.x + group.offset.x, y: center.y + group.offset.y };
      const thick = THICK_SHAPES.has(group.style.template.name);
      drawSegments(renderer, group.morph, origin, group.style.line, thick);
      for (const star of group.morph.stars) {
        renderer.drawPoint(
          { x: Math.trunc(origin.x + star.x), y: Math.trunc(origin.y + star.y) },
          group.style.star,
        );
      }
    }
  }

  teardown(): void {}
}

class ClassicLifeformsInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: CommonOptions,
    private readonly sequence: ConstellationSequence,
  ) {}

  update(dt: number): void {
    this.sequence.step(dt, this.options.speed);
  }

  render(renderer: Renderer): void {
    const origin = { x: this.viewport.width / 2, y: this.viewport.height / 2 };
    const morph = this.sequence.morph;
    drawSegments(renderer, morph, origin, CLASSIC_LINE, false);
    const half = CLASSIC_STAR_SIZE / 2;
    for (const star of morph.stars) {
      renderer.fillRect(
        {
          x: Math.trunc(origin.x + star.x - half),
          y: Math.trunc(origin.y + star.y - half),
          w: CLASSIC_STAR_SIZE,
          h: CLASSIC_STAR_SIZE,
        },
        WHITE,
      );
    }
  }

  teardown(): void {}
}

export const LifeformsDefinition: EffectDefinition = {
  type: "lifeforms",
  title: "Life Forms",
  flags: [],
  assets: [CATALOG_ASSET],
  parseOptions: (args) => args.common,
  init: (context, options) => {
    const rand = () => context.rng.next();
    const catalog = loadCatalog(context);
    if (catalog.palette.length === 0) {
      throw new AssetDecodeError(CATALOG_ASSET, "palette is empty");
    }
    return new LifeformsInstance(
      context.viewport,
      options,
      new ConstellationTriplet(catalog.palette, context.viewport, rand),
      createGalaxy(context.viewport, rand),
    );
  },
};

export const ClassicLifeformsDefinition: EffectDefinition = {
  type: "lifeforms-classic",
  title: "Life Forms Classic",
  flags: [],
  assets: [CATALOG_ASSET],
  parseOptions: (args) => args.common,
  init: (context, options) => {
    const catalog = loadCatalog(context);
    if (catalog.classicSequence.length === 0) {
      throw new AssetDecodeError(CATALOG_ASSET, "classic sequence is empty");
    }
    return new ClassicLifeformsInstance(
      context.viewport,
      options,
      new ConstellationSequence(catalog.classicSequence, context.viewport, () =>
        context.rng.next(),
      ),
    );
  },
};
