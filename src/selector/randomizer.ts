import { readdirSync, statSync } from "node:fs";
import path from "node:path";

import type { Logger } from "../logger.js";
import { describeError, InitFailure } from "../platform/errors.js";
import type { ChildExit, SubprocessRunner } from "../platform/subprocess.js";
import { readIntFlag } from "../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../runtime/effect.js";
import { HOOK_SCRIPT_NAME } from "./paths.js";
import { ProcessSupervisor } from "./supervisor.js";

export const RANDOMIZER_KEY = "randomizer";
export const BANNER_ENV = "SCREENSAVER_BANNER";

/** Launchers whose names start with one of these take part in the rotation. */
export const ROTATION_PREFIXES: readonly string[] = [
  "fishsaver",
  "bouncingball",
  "globe",
  "hardrain",
  "warp",
  "toastersaver",
  "messages",
  "logo",
  "rainstorm",
  "spotlight",
  "lifeforms",
  "fadeout",
  "matrix",
];

export interface RandomizerOptions extends CommonOptions {
  /** Seconds per effect, clamped to [10, 300]. */
  readonly duration: number;
  readonly showNames: boolean;
}

export interface RotationEntry {
  readonly name: string;
  /** Command line without the fullscreen flag. */
  readonly command: readonly string[];
}

const isExecutableFile = (file: string): boolean => {
  try {
    const stats = statSync(file);
    return stats.isFile() && (stats.mode & 0o111) !== 0;
  } catch {
    return false;
  }
};

/** Installed launchers in `directory` matching the prefix set, sorted by name. */
export const discoverRotation = (
  directory: string,
  prefixes: readonly string[] = ROTATION_PREFIXES,
): RotationEntry[] => {
  let names: string[];
  try {
    names = readdirSync(directory);
  } catch {
    return [];
  }
  return names
    .filter(
      (name) =>
        name !== RANDOMIZER_KEY &&
        name !== HOOK_SCRIPT_NAME &&
        prefixes.some((prefix) => name.startsWith(prefix)) &&
        isExecutableFile(path.join(directory, name)),
    )
    .sort()
    .map((name) => ({ name, command: [path.join(directory, name)] }));
};

/** Uniform over every index but `current`; any index when nothing runs yet. */
export const pickNextIndex = (current: number, size: number, rand: () => number): number => {
  if (size <= 1) {
    return 0;
  }
  if (current < 0 || current >= size) {
    return Math.min(size - 1, Math.floor(rand() * size));
  }
  const pick = Math.min(size - 2, Math.floor(rand() * (size - 1)));
  return pick >= current ? pick + 1 : pick;
};

export const nowPlaying = (name: string): string => `Now Playing: ${name}`;

const describeExit = (exit: ChildExit): string => {
  if (exit.error) {
    return describeError(exit.error);
  }
  return exit.signal ? `killed by ${exit.signal}` : `exit status ${exit.code ?? "unknown"}`;
};

class RandomizerInstance implements EffectInstance {
  private index = -1;
  private switchAt = 0;
  private switching: Promise<void> | null = null;
  private lastExit: ChildExit | null = null;
  private failures = 0;
  private done = false;

  constructor(
    private readonly entries: readonly RotationEntry[],
    private readonly options: RandomizerOptions,
    private readonly supervisor: ProcessSupervisor,
    private readonly rand: () => number,
    private readonly logger: Logger,
  ) {}

  update(_dt: number, elapsed: number): void {
    if (this.done || this.switching) {
      return;
    }
    const exit = this.lastExit;
    if (exit) {
      this.lastExit = null;
      if (exit.code === 0) {
        // The effect was dismissed by the user.
        this.done = true;
        return;
      }
      this.failures += 1;
      this.logger.warn(`${this.entries[this.index].name} stopped: ${describeExit(exit)}`);
      if (this.failures >= this.entries.length) {
        this.logger.error("every effect in the rotation failed");
        this.done = true;
        return;
      }
      this.advance(elapsed);
      return;
    }
    if (this.index < 0 || elapsed >= this.switchAt) {
      this.failures = 0;
      this.advance(elapsed);
    }
  }

  render(): void {}

  finished(): boolean {
    return this.done;
  }

  async teardown(): Promise<void> {
    await this.switching;
    await this.supervisor.stop();
  }

  private advance(elapsed: number): void {
    this.index = pickNextIndex(this.index, this.entries.length, this.rand);
    const entry = this.entries[this.index];
    const env = this.options.showNames ? { [BANNER_ENV]: nowPlaying(entry.name) } : undefined;
    this.switchAt = elapsed + this.options.duration;
    this.switching = this.supervisor
      .start([...entry.command, "-f", this.options.fullscreen ? "1" : "0"], {
        env,
        stdio: "inherit",
      })
      .then((child) => {
        void child.exited.then((exit) => {
          if (this.supervisor.current === child) {
            this.lastExit = exit;
          }
        });
        this.logger.info(`now playing ${entry.name}`);
      })
      .catch((error: unknown) => {
        this.logger.warn(`cannot start ${entry.name}: ${describeError(error)}`);
        this.lastExit = { code: null, signal: null, error: null };
      })
      .finally(() => {
        this.switching = null;
      });
  }
}

export interface RandomizerSetup {
  /** Directory holding the installed launchers. */
  readonly directory: string;
  /** Used when no launcher is installed: command lines by effect key. */
  readonly fallback?: readonly RotationEntry[];
  readonly runner?: SubprocessRunner;
}

export const createRandomizerDefinition = (
  setup: RandomizerSetup,
): EffectDefinition<RandomizerOptions> => ({
  type: RANDOMIZER_KEY,
  title: "Randomizer",
  flags: [
    { flag: "d", argument: "N", description: "Seconds per screensaver, 10-300 (default: 45)" },
    { flag: "r", argument: "0|1", description: "Show screensaver names (default: 1)" },
  ],
  assets: [],
  offscreen: true,
  parseOptions: (args) => ({
    ...args.common,
    duration: readIntFlag(args.flags, "d", 45, 10, 300),
    showNames: readIntFlag(args.flags, "r", 1, 0, 1) === 1,
  }),
  init: (context: EffectContext, options: RandomizerOptions) => {
    const installed = discoverRotation(setup.directory);
    const entries = installed.length > 0 ? installed : [...(setup.fallback ?? [])];
    if (entries.length === 0) {
      throw new InitFailure(`no screensavers to rotate in ${setup.directory}`);
    }
    context.logger.info(`rotating ${entries.length} screensavers every ${options.duration}s`);
    const supervisor = new ProcessSupervisor(
      setup.runner ?? context.platform.subprocess,
      undefined,
      context.logger,
    );
    return new RandomizerInstance(
      entries,
      options,
      supervisor,
      () => context.rng.next(),
      context.logger,
    );
  },
});
