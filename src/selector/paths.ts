import path from "node:path";

export const HOOK_SCRIPT_NAME = "omarchy-cmd-screensaver";

export interface SelectorPaths {
  /** Launchers live here, one per effect key. */
  readonly effectDirectory: string;
  readonly hookScript: string;
  /** Cached copy of the stock hook that restore copies back. */
  readonly backup: string;
}

export const resolveSelectorPaths = (env: NodeJS.ProcessEnv = process.env): SelectorPaths => {
  const home = env.HOME;
  if (!home) {
    const effectDirectory = "/tmp/screensaver-fallback";
    return {
      effectDirectory,
      hookScript: path.join(effectDirectory, HOOK_SCRIPT_NAME),
      backup: "/tmp/omarchy-screensaver-backup",
    };
  }
  const effectDirectory = path.join(home, ".config", "omarchy", "branding", "screensaver");
  return {
    effectDirectory,
    hookScript: path.join(effectDirectory, HOOK_SCRIPT_NAME),
    backup: path.join(home, ".cache", "omarchy-screensaver-backup"),
  };
};

export const effectPath = (paths: SelectorPaths, key: string): string =>
  path.join(paths.effectDirectory, key);
