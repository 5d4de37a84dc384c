import type { Logger } from "../logger.js";
import type { Platform } from "../platform/platform.js";
import type { Renderer, Viewport } from "../platform/types.js";
import type { RandomGenerator } from "./rng.js";

export interface CommonOptions {
  /** Clamped to [0.1, 10]. */
  readonly speed: number;
  readonly fullscreen: boolean;
}

export type FlagValues = ReadonlyMap<string, string>;

export interface FlagSpec {
  /** Single letter, without the dash. */
  readonly flag: string;
  readonly argument: string;
  readonly description: string;
}

export interface ParsedArguments {
  readonly common: CommonOptions;
  readonly flags: FlagValues;
  readonly positionals: readonly string[];
}

export interface EffectContext {
  readonly viewport: Viewport;
  readonly renderer: Renderer;
  readonly platform: Platform;
  readonly rng: RandomGenerator;
  readonly logger: Logger;
}

/** Running state of one effect. `update` mutates; `render` only reads. */
export interface EffectInstance {
  update(dt: number, elapsed: number): void;
  render(renderer: Renderer, elapsed: number): void;
  teardown(): void | Promise<void>;
  /** Polled after every frame; true ends the run as if the user had exited. */
  finished?(): boolean;
}

export interface EffectDefinition<TOptions extends CommonOptions = CommonOptions> {
  /** Stable key: launcher file name, catalog key and hook argument. */
  readonly type: string;
  readonly title: string;
  readonly flags: readonly FlagSpec[];
  /** Mandatory assets; missing ones abort before `init`. */
  readonly assets: readonly string[];
  /** Runs without drawing to the terminal, for effects that only supervise others. */
  readonly offscreen?: boolean;
  parseOptions(args: ParsedArguments): TOptions;
  init(context: EffectContext, options: TOptions): EffectInstance | Promise<EffectInstance>;
}
