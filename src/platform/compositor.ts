import { createLogger } from "../logger.js";
import { describeError } from "./errors.js";
import type { SubprocessRunner } from "./subprocess.js";

const log = createLogger("compositor");

/** Compositor-side effects an effect may request. None of them are fatal. */
export interface Compositor {
  setCursorVisible(visible: boolean): Promise<void>;
  toggleFullscreen(): Promise<void>;
  /** Writes a PNG of the current screen to `file`; resolves false when unavailable. */
  captureScreen(file: string): Promise<boolean>;
}

export class NullCompositor implements Compositor {
  async setCursorVisible(): Promise<void> {}

  async toggleFullscreen(): Promise<void> {}

  async captureScreen(): Promise<boolean> {
    return false;
  }
}

export class HyprlandCompositor implements Compositor {
  constructor(private readonly runner: SubprocessRunner) {}

  async setCursorVisible(visible: boolean): Promise<void> {
    await this.exec(["hyprctl", "keyword", "cursor:invisible", visible ? "false" : "true"]);
  }

  async toggleFullscreen(): Promise<void> {
    await this.exec(["hyprctl", "dispatch", "fullscreen"]);
  }

  async captureScreen(file: string): Promise<boolean> {
    return this.exec(["grim", file]);
  }

  private async exec(command: readonly string[]): Promise<boolean> {
    try {
      const exit = await this.runner.run(command).exited;
      if (exit.error) {
        log.debug(exit.error.message);
        return false;
      }
      return exit.code === 0;
    } catch (error) {
      log.debug(`${command.join(" ")}: ${describeError(error)}`);
      return false;
    }
  }
}

export const createCompositor = (
  runner: SubprocessRunner,
  env: NodeJS.ProcessEnv = process.env,
): Compositor =>
  env.SCREENSAVER_COMPOSITOR === "none" ? new NullCompositor() : new HyprlandCompositor(runner);
