import { createLogger } from "../logger.js";
import type { SubprocessRunner } from "../platform/subprocess.js";
import {
  launchCommand,
  readHookLaunch,
  restoreDefaultHook,
  writeHookScript,
  type HookLaunch,
} from "./hook-script.js";
import { effectPath, type SelectorPaths } from "./paths.js";
import { ProcessSupervisor } from "./supervisor.js";

export const PREVIEW_SECONDS = 10;

export interface SelectorServices {
  /** Points the hook at `key` with `options`. */
  commit(key: string, options: string): Promise<void>;
  restoreDefault(): Promise<void>;
  /** Replaces any running preview; resolves once the new one is spawned. */
  preview(key: string, options: string): Promise<void>;
  /** Stops the preview, if any, and reaps it. */
  shutdown(): Promise<void>;
  /** The launch the installed hook currently runs, if it is one of ours. */
  installed(): Promise<HookLaunch | null>;
}

export const previewCommand = (launch: HookLaunch): string[] => [
  "bash",
  "-c",
  `SDL_VIDEODRIVER=wayland timeout ${PREVIEW_SECONDS}s ${launchCommand(launch)}`,
];

export const createSelectorServices = (
  paths: SelectorPaths,
  runner: SubprocessRunner,
): SelectorServices => {
  const logger = createLogger("selector");
  const supervisor = new ProcessSupervisor(runner, undefined, logger);
  return {
    commit: (key, options) => writeHookScript(paths, { effectPath: effectPath(paths, key), options }),
    restoreDefault: () => restoreDefaultHook(paths),
    preview: async (key, options) => {
      const child = await supervisor.start(
        previewCommand({ effectPath: effectPath(paths, key), options }),
      );
      void child.exited.then((exit) => {
        logger.debug(`preview of ${key} ended (${exit.code ?? exit.signal ?? "unknown"})`);
      });
    },
    shutdown: async () => {
      await supervisor.stop();
    },
    installed: () => readHookLaunch(paths),
  };
};
