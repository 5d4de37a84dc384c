import { AssetDecodeError, describeError } from "../../platform/errors.js";
import { loadSheet, type LoadedSheet } from "../../platform/pixmap.js";
import type { Compositor } from "../../platform/compositor.js";
import type { Color, Renderer, Viewport } from "../../platform/types.js";
import { readIntFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { mod, rgba } from "../math.js";
import { frameAt, frameRect, moverPhase, type AnimParam } from "../sprites.js";

const AQUARIUM_ASSET = "aquarium";
const BUBBLE_ASSET = "bubble_sprite";
const SEAFLOOR_ASSET = "seafloor_tile";
const SEAFLOOR_SCALE = 4;

export const FISH_SPECIES = [
  "angel",
  "butterfly",
  "flounder",
  "guppy",
  "jelly",
  "minnow",
  "red",
  "seahorse",
  "sprite",
  "striped",
] as const;

export type FishSpecies = (typeof FISH_SPECIES)[number];

const fishAsset = (species: FishSpecies) => `fish_${species}`;

export interface FishOptions extends CommonOptions {
  readonly fish: number;
  readonly bubbles: number;
}

export interface Swimmer {
  readonly anim: AnimParam;
  readonly row: number;
  readonly species: FishSpecies;
}

export interface BubbleColumn {
  readonly anim: AnimParam;
  /** Percent of the width. */
  readonly x: number;
}

export interface Aquarium {
  readonly fishSize: number;
  readonly swimFramePeriod: number;
  readonly bubbleWidth: number;
  readonly bubbleHeight: number;
  readonly bubbleFramePeriod: number;
  /** Row tops in percent of the height. */
  readonly rows: readonly number[];
  readonly toggleRow: number;
  readonly toggleOffset: number;
  readonly pathFrom: number;
  readonly pathTo: number;
  readonly fish: readonly Swimmer[];
  readonly bubbles: readonly BubbleColumn[];
  readonly floorFallbackTop: number;
  readonly floorFallbackColor: Color;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const num = (record: Record<string, unknown>, key: string): number => {
  const value = record[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new AssetDecodeError(AQUARIUM_ASSET, `${key} must be a number`);
  }
  return value;
};

const section = (record: Record<string, unknown>, key: string): Record<string, unknown> => {
  const value = record[key];
  if (!isRecord(value)) {
    throw new AssetDecodeError(AQUARIUM_ASSET, `${key} must be an object`);
  }
  return value;
};

const list = (record: Record<string, unknown>, key: string): Record<string, unknown>[] => {
  const value = record[key];
  if (!Array.isArray(value) || !value.every(isRecord)) {
    throw new AssetDecodeError(AQUARIUM_ASSET, `${key} must be a list of objects`);
  }
  return value;
};

const isSpecies = (value: unknown): value is FishSpecies =>
  FISH_SPECIES.some((species) => species === value);

export const readAquarium = (value: unknown): Aquarium => {
  if (!isRecord(value)) {
    throw new AssetDecodeError(AQUARIUM_ASSET, "expected an object");
  }
  const anims: AnimParam[] = list(value, "anims").map((anim) => ({
    flyDuration: num(anim, "flyDuration"),
    delay: num(anim, "delay"),
    direction: num(anim, "direction") < 0 ? -1 : 1,
  }));
  const rows = value.rows;
  if (!Array.isArray(rows) || !rows.every((row): row is number => typeof row === "number")) {
    throw new AssetDecodeError(AQUARIUM_ASSET, "rows must be numbers");
  }
  const fish = list(value, "fish").map((entry, index): Swimmer => {
    const anim = anims[num(entry, "anim")];
    const row = num(entry, "row");
    if (!anim || row < 0 || row >= rows.length || !isSpecies(entry.species)) {
      throw new AssetDecodeError(AQUARIUM_ASSET, `fish ${index} is malformed`);
    }
    return { anim, row, species: entry.species };
  });
  const bubbles = list(value, "bubbles").map((entry) => ({
    anim: { flyDuration: num(entry, "flyDuration"), delay: num(entry, "delay"), direction: 1 as const },
    x: num(entry, "x"),
  }));
  const bubble = section(value, "bubble");
  const path = section(value, "path");
  const seafloor = section(value, "seafloor");
  const fallback = seafloor.fallbackColor;
  const floorColor =
    Array.isArray(fallback) && fallback.length === 3 && fallback.every((c) => typeof c === "number")
      ? rgba(Number(fallback[0]), Number(fallback[1]), Number(fallback[2]))
      : rgba(139, 69, 19);
  return {
    fishSize: num(value, "fishSize"),
    swimFramePeriod: num(value, "swimFramePeriod"),
    bubbleWidth: num(bubble, "width"),
    bubbleHeight: num(bubble, "height"),
    bubbleFramePeriod: num(bubble, "framePeriod"),
    rows,
    toggleRow: num(value, "toggleRow"),
    toggleOffset: num(value, "toggleOffset"),
    pathFrom: num(path, "from"),
    pathTo: num(path, "to"),
    fish,
    bubbles,
    floorFallbackTop: num(seafloor, "fallbackTop"),
    floorFallbackColor: floorColor,
  };
};

export interface FishDraw {
  readonly species: FishSpecies;
  readonly x: number;
  readonly y: number;
  readonly frame: number;
  readonly flip: boolean;
}

export interface BubbleDraw {
  readonly x: number;
  readonly y: number;
  readonly frame: number;
}

/** Fish cross from `pathFrom` to `pathTo` of the width, mirrored for right-to-left movers. */
export const layoutFish = (
  aquarium: Aquarium,
  viewport: Viewport,
  t: number,
  cap: number,
  fishHeight = aquarium.fishSize,
): FishDraw[] => {
  const { width: W, height: H } = viewport;
  const draws: FishDraw[] = [];
  for (const swimmer of aquarium.fish) {
    if (draws.length >= cap) {
      break;
    }
    const phase = moverPhase(t, swimmer.anim);
    if (!phase) {
      continue;
    }
    const { flyDuration, direction } = swimmer.anim;
    let top = aquarium.rows[swimmer.row];
    if (swimmer.row === aquarium.toggleRow && mod(phase.local, flyDuration) >= flyDuration / 2) {
      top += aquarium.toggleOffset;
    }
    const from = direction === 1 ? aquarium.pathFrom : aquarium.pathTo;
    const to = direction === 1 ? aquarium.pathTo : aquarium.pathFrom;
    const left = from + (to - from) * phase.fraction;
    draws.push({
      species: swimmer.species,
      x: Math.trunc(left * W - aquarium.fishSize / 2),
      y: Math.trunc((top / 100) * H - fishHeight / 2),
      frame: frameAt(phase.local, aquarium.swimFramePeriod * 2, aquarium.swimFramePeriod, 2),
      flip: direction === -1,
    });
  }
  return draws;
};

/** Bubbles rise `H + bubbleHeight` over each cycle of their column. */
export const layoutBubbles = (
  aquarium: Aquarium,
  viewport: Viewport,
  t: number,
  cap: number,
): BubbleDraw[] => {
  const { width: W, height: H } = viewport;
  const rise = H + aquarium.bubbleHeight;
  const draws: BubbleDraw[] = [];
  for (const column of aquarium.bubbles) {
    if (draws.length >= cap) {
      break;
    }
    const phase = moverPhase(t, column.anim);
    if (!phase) {
      continue;
    }
    draws.push({
      x: Math.trunc((column.x / 100) * W - aquarium.bubbleWidth / 2),
      y: Math.trunc(rise - phase.cycle * (rise / column.anim.flyDuration)),
      frame: frameAt(phase.local, aquarium.bubbleFramePeriod * 2, aquarium.bubbleFramePeriod, 2),
    });
  }
  return draws;
};

class FishInstance implements EffectInstance {
  private readonly fishHeight: number;

  constructor(
    private readonly viewport: Viewport,
    private readonly options: FishOptions,
    private readonly aquarium: Aquarium,
    private readonly sheets: ReadonlyMap<FishSpecies, LoadedSheet>,
    private readonly bubble: LoadedSheet,
    private readonly seafloor: LoadedSheet | null,
    private readonly renderer: Renderer,
    private readonly compositor: Compositor,
  ) {
    const sample = sheets.get(FISH_SPECIES[0]);
    this.fishHeight = sample
      ? Math.round((aquarium.fishSize * sample.frameHeight) / sample.frameWidth)
      : aquarium.fishSize;
  }

  update(): void {}

  render(renderer: Renderer, elapsed: number): void {
    const { width: W, height: H } = this.viewport;
    const t = elapsed * this.options.speed;
    this.renderFloor(renderer, W, H);

    const { bubbleWidth, bubbleHeight } = this.aquarium;
    for (const draw of layoutBubbles(this.aquarium, this.viewport, t, this.options.bubbles)) {
      renderer.blit(this.bubble.texture, frameRect(this.bubble, draw.frame), {
        x: draw.x,
        y: draw.y,
        w: bubbleWidth,
        h: bubbleHeight,
      });
    }

    const size = this.aquarium.fishSize;
    for (const draw of layoutFish(this.aquarium, this.viewport, t, this.options.fish, this.fishHeight)) {
      const sheet = this.sheets.get(draw.species);
      if (!sheet) {
        continue;
      }
      renderer.blit(
        sheet.texture,
        frameRect(sheet, draw.frame),
        { x: draw.x, y: draw.y, w: size, h: this.fishHeight },
        { flip: draw.flip ? "horizontal" : "none" },
      );
    }
  }

  async teardown(): Promise<void> {
    for (const sheet of this.sheets.values()) {
      this.renderer.destroyTexture(sheet.texture);
    }
    this.renderer.destroyTexture(this.bubble.texture);
    if (this.seafloor) {
      this.renderer.destroyTexture(this.seafloor.texture);
    }
    await this.compositor.setCursorVisible(true);
  }

  private renderFloor(renderer: Renderer, W: number, H: number) {
    if (!this.seafloor) {
      const top = this.aquarium.floorFallbackTop;
      renderer.fillRect({ x: 0, y: H - top, w: W, h: top }, this.aquarium.floorFallbackColor);
      return;
    }
    const w = this.seafloor.frameWidth * SEAFLOOR_SCALE;
    const h = this.seafloor.frameHeight * SEAFLOOR_SCALE;
    for (let x = 0; x < W; x += w) {
      renderer.blit(this.seafloor.texture, null, { x, y: H - h, w, h });
    }
  }
}

export const FishDefinition: EffectDefinition<FishOptions> = {
  type: "fishsaver",
  title: "Aquarium",
  flags: [
    { flag: "t", argument: "N", description: "Number of fish (default: 30)" },
    { flag: "m", argument: "N", description: "Number of bubbles (default: 15)" },
  ],
  assets: [AQUARIUM_ASSET, BUBBLE_ASSET, ...FISH_SPECIES.map(fishAsset)],
  parseOptions: (args) => ({
    ...args.common,
    fish: readIntFlag(args.flags, "t", 30, 0, 100),
    bubbles: readIntFlag(args.flags, "m", 15, 0, 100),
  }),
  init: async (context: EffectContext, options) => {
    const { assets, compositor } = context.platform;
    const aquarium = readAquarium(assets.json(AQUARIUM_ASSET));
    const sheets = new Map<FishSpecies, LoadedSheet>();
    for (const species of FISH_SPECIES) {
      sheets.set(species, await loadSheet(assets, context.renderer, fishAsset(species), 2));
    }
    const bubble = await loadSheet(assets, context.renderer, BUBBLE_ASSET, 2);
    let seafloor: LoadedSheet | null = null;
    try {
      seafloor = await loadSheet(assets, context.renderer, SEAFLOOR_ASSET);
    } catch (error) {
      context.logger.debug(`seafloor unavailable, drawing the plain floor: ${describeError(error)}`);
    }
    await compositor.setCursorVisible(false);
    return new FishInstance(
      context.viewport,
      options,
      aquarium,
      sheets,
      bubble,
      seafloor,
      context.renderer,
      compositor,
    );
  },
};
