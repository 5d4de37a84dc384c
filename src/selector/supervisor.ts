import { createLogger, type Logger } from "../logger.js";
import {
  waitSubprocess,
  type ChildExit,
  type ChildHandle,
  type SpawnOptions,
  type SubprocessRunner,
} from "../platform/subprocess.js";

export const STOP_GRACE_MS = 1000;

/**
 * Owns at most one child at a time. Starting a new one stops the previous
 * child first: SIGTERM, a bounded wait, then SIGKILL, and always a reap.
 */
export class ProcessSupervisor {
  private child: ChildHandle | null = null;

  constructor(
    private readonly runner: SubprocessRunner,
    private readonly graceMs = STOP_GRACE_MS,
    private readonly logger: Logger = createLogger("supervisor"),
  ) {}

  get current(): ChildHandle | null {
    return this.child;
  }

  get running(): boolean {
    return this.child !== null && !this.child.hasExited();
  }

  async start(command: readonly string[], options?: SpawnOptions): Promise<ChildHandle> {
    await this.stop();
    const child = this.runner.run(command, options);
    this.child = child;
    this.logger.debug(`started ${command.join(" ")} (pid ${child.pid ?? "?"})`);
    return child;
  }

  /** Resolves once the child is reaped; null when there was none. */
  async stop(): Promise<ChildExit | null> {
    const child = this.child;
    this.child = null;
    if (!child) {
      return null;
    }
    if (child.hasExited()) {
      return child.exited;
    }
    this.runner.signal(child, "SIGTERM");
    const exit = await waitSubprocess(child, this.graceMs);
    if (exit) {
      return exit;
    }
    this.logger.warn(`pid ${child.pid ?? "?"} ignored SIGTERM, sending SIGKILL`);
    this.runner.signal(child, "SIGKILL");
    return child.exited;
  }
}
