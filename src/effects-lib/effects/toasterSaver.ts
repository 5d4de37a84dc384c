import { AssetDecodeError } from "../../platform/errors.js";
import { loadSheet, type LoadedSheet } from "../../platform/pixmap.js";
import type { Renderer, Viewport } from "../../platform/types.js";
import { readIntFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { flapFrame, frameRect, moverPhase, type AnimParam } from "../sprites.js";

const FLIGHT_ASSET = "toaster_flight";
const TOASTER_ASSET = "toaster_sprite";
const TOAST_ASSET = "toast_sprite";

export interface ToasterOptions extends CommonOptions {
  readonly toasters: number;
  readonly toasts: number;
}

export interface Pose {
  /** Percent of the width measured from the right edge. */
  readonly right: number;
  /** Percent of the height measured from the top. */
  readonly top: number;
}

export interface FlightEntity {
  readonly kind: "toaster" | "toast";
  readonly anim: AnimParam;
  readonly pose: Pose;
  /** Toast doneness, the frame of the toast sheet. */
  readonly variant: number;
}

export interface FlightTable {
  readonly spriteSize: number;
  readonly displacement: number;
  readonly flapCycle: number;
  readonly entities: readonly FlightEntity[];
}

export interface SpriteDraw {
  readonly kind: FlightEntity["kind"];
  readonly x: number;
  readonly y: number;
  readonly frame: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readNumber = (record: Record<string, unknown>, key: string, where: string): number => {
  const value = record[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new AssetDecodeError(FLIGHT_ASSET, `${where}.${key} must be a number`);
  }
  return value;
};

export const readFlightTable = (value: unknown): FlightTable => {
  if (!isRecord(value) || !isRecord(value.anims) || !isRecord(value.poses)) {
    throw new AssetDecodeError(FLIGHT_ASSET, "expected anims and poses");
  }
  const anims = new Map<string, AnimParam>();
  for (const [name, raw] of Object.entries(value.anims)) {
    if (!isRecord(raw)) {
      throw new AssetDecodeError(FLIGHT_ASSET, `anim ${name} must be an object`);
    }
    const direction = readNumber(raw, "direction", name) < 0 ? -1 : 1;
    anims.set(name, {
      flyDuration: readNumber(raw, "flyDuration", name),
      delay: readNumber(raw, "delay", name),
      direction,
    });
  }
  const poses = new Map<string, Pose>();
  for (const [name, raw] of Object.entries(value.poses)) {
    if (!isRecord(raw)) {
      throw new AssetDecodeError(FLIGHT_ASSET, `pose ${name} must be an object`);
    }
    poses.set(name, { right: readNumber(raw, "right", name), top: readNumber(raw, "top", name) });
  }
  const entities = (Array.isArray(value.entities) ? value.entities : []).map(
    (raw: unknown, index: number): FlightEntity => {
      if (!isRecord(raw)) {
        throw new AssetDecodeError(FLIGHT_ASSET, `entity ${index} must be an object`);
      }
      const anim = typeof raw.anim === "string" ? anims.get(raw.anim) : undefined;
      const pose = typeof raw.pose === "string" ? poses.get(raw.pose) : undefined;
      if (!anim || !pose) {
        throw new AssetDecodeError(FLIGHT_ASSET, `entity ${index} references an unknown anim or pose`);
      }
      return {
        kind: raw.kind === "toast" ? "toast" : "toaster",
        anim,
        pose,
        variant: typeof raw.variant === "number" ? raw.variant : 0,
      };
    },
  );
  const root: Record<string, unknown> = value;
  return {
    spriteSize: readNumber(root, "spriteSize", "flight"),
    displacement: readNumber(root, "displacement", "flight"),
    flapCycle: readNumber(root, "flapCycle", "flight"),
    entities,
  };
};

/**
 * Where every visible sprite is at `elapsed`: toasts first so toasters fly in
 * front of them. Only movers whose delay has passed count towards the caps.
 */
export const layoutFlight = (
  table: FlightTable,
  viewport: Viewport,
  elapsed: number,
  options: ToasterOptions,
): SpriteDraw[] => {
  const { width: W, height: H } = viewport;
  const half = table.spriteSize / 2;
  const draws: SpriteDraw[] = [];
  const pass = (kind: FlightEntity["kind"], cap: number) => {
    let drawn = 0;
    for (const entity of table.entities) {
      if (entity.kind !== kind || drawn >= cap) {
        continue;
      }
      const phase = moverPhase(elapsed, entity.anim);
      if (!phase) {
        continue;
      }
      const startX = W - (entity.pose.right / 100) * W - half;
      const startY = (entity.pose.top / 100) * H - half;
      const travel = table.displacement * phase.fraction * options.speed;
      draws.push({
        kind,
        x: Math.trunc(startX - travel),
        y: Math.trunc(startY + travel),
        frame:
          kind === "toaster"
            ? flapFrame(phase.local, entity.anim.direction, table.flapCycle)
            : entity.variant,
      });
      drawn += 1;
    }
  };
  pass("toast", options.toasts);
  pass("toaster", options.toasters);
  return draws;
};

class ToasterInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: ToasterOptions,
    private readonly table: FlightTable,
    private readonly toaster: LoadedSheet,
    private readonly toast: LoadedSheet,
    private readonly renderer: Renderer,
  ) {}

  update(): void {}

  render(renderer: Renderer, elapsed: number): void {
    const size = this.table.spriteSize;
    for (const draw of layoutFlight(this.table, this.viewport, elapsed, this.options)) {
      const sheet = draw.kind === "toaster" ? this.toaster : this.toast;
      const frame = Math.min(draw.frame, sheet.frameCount - 1);
      renderer.blit(sheet.texture, frameRect(sheet, frame), { x: draw.x, y: draw.y, w: size, h: size });
    }
  }

  teardown(): void {
    this.renderer.destroyTexture(this.toaster.texture);
    this.renderer.destroyTexture(this.toast.texture);
  }
}

export const ToasterDefinition: EffectDefinition<ToasterOptions> = {
  type: "toastersaver",
  title: "Flying Toasters",
  flags: [
    { flag: "t", argument: "N", description: "Number of toasters (default: 30)" },
    { flag: "m", argument: "N", description: "Number of toasts (default: 10)" },
  ],
  assets: [FLIGHT_ASSET, TOASTER_ASSET, TOAST_ASSET],
  parseOptions: (args) => ({
    ...args.common,
    toasters: readIntFlag(args.flags, "t", 30, 0, 100),
    toasts: readIntFlag(args.flags, "m", 10, 0, 100),
  }),
  init: async (context: EffectContext, options) => {
    const { assets } = context.platform;
    const table = readFlightTable(assets.json(FLIGHT_ASSET));
    const toaster = await loadSheet(assets, context.renderer, TOASTER_ASSET, 4);
    const toast = await loadSheet(assets, context.renderer, TOAST_ASSET, 4);
    return new ToasterInstance(context.viewport, options, table, toaster, toast, context.renderer);
  },
};
