import { createLogger } from "../logger.js";
import { describeError, isPlatformError } from "../platform/errors.js";
import type { Platform } from "../platform/platform.js";
import type { Color, WindowContext } from "../platform/types.js";
import { Banner } from "./banner.js";
import { formatUsage, parseEffectArguments } from "./cli.js";
import { resolveRuntimeConfiguration, type RuntimeConfiguration } from "./config.js";
import type { CommonOptions, EffectContext, EffectDefinition, EffectInstance } from "./effect.js";
import { ExitGate } from "./exit-gate.js";
import { createRandomGenerator } from "./rng.js";

export const EXIT_OK = 0;
export const EXIT_INIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const OPAQUE_BLACK: Color = { r: 0, g: 0, b: 0, a: 255 };

export type LifecyclePhase = "init" | "running" | "exiting";

export interface RunEffectOptions {
  readonly program?: string;
  readonly config?: Partial<RuntimeConfiguration>;
  readonly stdout?: (text: string) => void;
  readonly stderr?: (text: string) => void;
  /** Observes lifecycle transitions and the frame count at each one. */
  readonly onPhase?: (phase: LifecyclePhase, frames: number) => void;
}

const writeStdout = (text: string) => {
  process.stdout.write(`${text}\n`);
};

const writeStderr = (text: string) => {
  process.stderr.write(`${text}\n`);
};

/**
 * Runs one effect to completion: parse flags, open the window, preload
 * assets, `init`, then poll → update → clear → render → present → sleep
 * until an exit event, then `teardown` and close the platform. Resolves with
 * the process exit code.
 */
export const runEffect = async <TOptions extends CommonOptions>(
  definition: EffectDefinition<TOptions>,
  platform: Platform,
  argv: readonly string[],
  options: RunEffectOptions = {},
): Promise<number> => {
  const program = options.program ?? definition.type;
  const stdout = options.stdout ?? writeStdout;
  const stderr = options.stderr ?? writeStderr;
  const config = resolveRuntimeConfiguration(options.config);
  const logger = createLogger(definition.type);

  const parsed = parseEffectArguments(argv, definition.flags);
  if (parsed.kind === "help") {
    stdout(formatUsage(program, definition.flags));
    return EXIT_OK;
  }
  if (parsed.kind === "error") {
    stderr(`${program}: ${parsed.message}`);
    stderr(formatUsage(program, definition.flags));
    return EXIT_USAGE;
  }
  const effectOptions = definition.parseOptions(parsed);
  options.onPhase?.("init", 0);

  let window: WindowContext;
  try {
    window = platform.openWindow({
      title: definition.title,
      fullscreen: effectOptions.fullscreen,
      size: config.fallbackViewport,
      offscreen: definition.offscreen,
    });
  } catch (error) {
    stderr(`[screensaver] ${definition.type}: ${describeError(error)}`);
    platform.close();
    return EXIT_INIT_FAILURE;
  }

  const clock = platform.clock;
  const start = clock.nowMs();
  const gate = new ExitGate(start, config.graceMs);
  const rng = createRandomGenerator(config.seed);
  logger.debug(`seed ${rng.seed}`);
  const context: EffectContext = {
    viewport: window.viewport,
    renderer: window.renderer,
    platform,
    rng,
    logger,
  };

  let instance: EffectInstance;
  try {
    for (const id of definition.assets) {
      platform.assets.get(id);
    }
    instance = await definition.init(context, effectOptions);
  } catch (error) {
    stderr(`[screensaver] ${definition.type}: ${describeError(error)}`);
    if (!isPlatformError(error)) {
      logger.error("init failed", error);
    }
    platform.close();
    return EXIT_INIT_FAILURE;
  }

  options.onPhase?.("running", 0);
  const renderer = window.renderer;
  const banner =
    config.banner === undefined
      ? null
      : Banner.create(renderer, platform.fonts, logger, config.banner, config.bannerSeconds);
  let frames = 0;
  let lastT = 0;
  let exitCode = EXIT_OK;
  try {
    for (;;) {
      const now = clock.nowMs();
      const exitRequested = platform
        .pollInput()
        .some((event) => gate.shouldExit(event, now));
      if (exitRequested) {
        break;
      }
      const t = (clock.nowMs() - start) / 1000;
      const dt = Math.min(Math.max(0, t - lastT), config.maxStepSeconds);
      lastT = t;
      instance.update(dt, t);
      renderer.clear(OPAQUE_BLACK);
      instance.render(renderer, t);
      banner?.render(renderer, t);
      renderer.present();
      frames += 1;
      if (instance.finished?.()) {
        break;
      }
      await clock.sleep(config.frameMs);
    }
  } catch (error) {
    stderr(`[screensaver] ${definition.type}: ${describeError(error)}`);
    logger.error("frame loop failed", error);
    exitCode = EXIT_INIT_FAILURE;
  }

  options.onPhase?.("exiting", frames);
  try {
    await instance.teardown();
  } catch (error) {
    logger.warn(`teardown failed: ${describeError(error)}`);
  } finally {
    banner?.dispose(renderer);
    platform.close();
  }
  return exitCode;
};
