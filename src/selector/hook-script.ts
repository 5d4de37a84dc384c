import { existsSync } from "node:fs";
import { chmod, copyFile, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { createLogger } from "../logger.js";
import { describeError } from "../platform/errors.js";
import { waitSubprocess, type SubprocessRunner } from "../platform/subprocess.js";
import type { SelectorPaths } from "./paths.js";

const logger = createLogger("hook");

export const OFFICIAL_HOOK_URL =
  "https://raw.githubusercontent.com/basecamp/omarchy/refs/heads/master/bin/omarchy-cmd-screensaver";

export const BACKUP_FETCH_TIMEOUT_MS = 10_000;

export interface HookLaunch {
  readonly effectPath: string;
  /** Already-composed option string, possibly empty. */
  readonly options: string;
}

export const launchCommand = (launch: HookLaunch): string =>
  launch.options.length > 0 ? `${launch.effectPath} ${launch.options}` : launch.effectPath;

export const renderHookScript = (launch: HookLaunch): string =>
  [
    "#!/bin/bash",
    "",
    "# launch: invoked by the screensaver launcher, the window may not have focus yet",
    "LAUNCH_MODE=0",
    'if [[ "$1" == "launch" ]]; then',
    "  LAUNCH_MODE=1",
    "fi",
    "",
    "hyprctl keyword cursor:invisible true &>/dev/null",
    "",
    `SDL_VIDEODRIVER=wayland ${launchCommand(launch)} >/dev/null 2>&1 &`,
    "SAVER_PID=$!",
    "",
    "screensaver_in_focus() {",
    "  hyprctl activewindow -j | jq -e '.class == \"Screensaver\"' >/dev/null 2>&1",
    "}",
    "",
    "exit_screensaver() {",
    "  hyprctl keyword cursor:invisible false &>/dev/null",
    "  kill $SAVER_PID 2>/dev/null",
    "  pkill -x tte 2>/dev/null",
    '  pkill -f "alacritty --class Screensaver" 2>/dev/null',
    "  exit 0",
    "}",
    "",
    "trap exit_screensaver INT TERM HUP QUIT",
    "",
    "while true; do",
    "  if [[ $LAUNCH_MODE -eq 1 ]]; then",
    "    if ! kill -0 $SAVER_PID 2>/dev/null; then",
    "      exit_screensaver",
    "    fi",
    "  else",
    "    if ! screensaver_in_focus || ! kill -0 $SAVER_PID 2>/dev/null; then",
    "      exit_screensaver",
    "    fi",
    "  fi",
    "  sleep 1",
    "done",
    "",
  ].join("\n");

const LAUNCH_LINE = /^SDL_VIDEODRIVER=wayland (\S+)(?: (.*?))? >\/dev\/null 2>&1 &$/m;

/** Reads back the launch line of a script written by `renderHookScript`. */
export const parseHookLaunch = (script: string): HookLaunch | null => {
  const match = LAUNCH_LINE.exec(script);
  if (!match) {
    return null;
  }
  return { effectPath: match[1], options: match[2] ?? "" };
};

/** Writes beside the target and renames over it, so readers never see a partial file. */
export const writeFileAtomic = async (file: string, content: string, mode = 0o755): Promise<void> => {
  await mkdir(path.dirname(file), { recursive: true });
  const staging = `${file}.${process.pid}.tmp`;
  try {
    await writeFile(staging, content, { mode });
    await chmod(staging, mode);
    await rename(staging, file);
  } catch (error) {
    await rm(staging, { force: true });
    throw error;
  }
};

export const writeHookScript = async (paths: SelectorPaths, launch: HookLaunch): Promise<void> => {
  await writeFileAtomic(paths.hookScript, renderHookScript(launch));
  logger.info(`hook now launches ${launchCommand(launch)}`);
};

export const readHookLaunch = async (paths: SelectorPaths): Promise<HookLaunch | null> => {
  try {
    return parseHookLaunch(await readFile(paths.hookScript, "utf8"));
  } catch (error) {
    logger.debug(`no readable hook at ${paths.hookScript}: ${describeError(error)}`);
    return null;
  }
};

/**
 * Makes sure the backup of the stock hook exists: fetched once with curl,
 * or seeded from `bundledDefault` when the fetch leaves nothing behind.
 */
export const ensureBackup = async (
  paths: SelectorPaths,
  runner: SubprocessRunner,
  bundledDefault: string,
  timeoutMs = BACKUP_FETCH_TIMEOUT_MS,
): Promise<"present" | "fetched" | "bundled"> => {
  if (existsSync(paths.backup)) {
    return "present";
  }
  await mkdir(path.dirname(paths.backup), { recursive: true });
  try {
    const child = runner.run(["curl", "-s", OFFICIAL_HOOK_URL, "-o", paths.backup]);
    const exit = await waitSubprocess(child, timeoutMs);
    if (exit === null) {
      runner.signal(child, "SIGTERM");
      await rm(paths.backup, { force: true });
      logger.warn("backup fetch timed out");
    } else if (exit.error) {
      await rm(paths.backup, { force: true });
      logger.warn(`backup fetch failed: ${describeError(exit.error)}`);
    }
  } catch (error) {
    logger.warn(`backup fetch failed: ${describeError(error)}`);
  }
  if (existsSync(paths.backup)) {
    return "fetched";
  }
  await writeFileAtomic(paths.backup, bundledDefault);
  return "bundled";
};

export const restoreDefaultHook = async (paths: SelectorPaths): Promise<void> => {
  await mkdir(path.dirname(paths.hookScript), { recursive: true });
  const staging = `${paths.hookScript}.${process.pid}.tmp`;
  try {
    await copyFile(paths.backup, staging);
    await chmod(staging, 0o755);
    await rename(staging, paths.hookScript);
  } catch (error) {
    await rm(staging, { force: true });
    throw error;
  }
  logger.info("restored the default hook");
};
