import { spawn, type ChildProcess } from "node:child_process";

import { SubprocessError } from "./errors.js";

export interface ChildExit {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly error: SubprocessError | null;
}

export interface ChildHandle {
  readonly pid: number | null;
  readonly command: readonly string[];
  readonly stdout: NodeJS.ReadableStream | null;
  readonly exited: Promise<ChildExit>;
  hasExited(): boolean;
}

export interface SpawnOptions {
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** `pipe` exposes stdout and discards stderr; `inherit` shares the parent's streams. */
  readonly stdio?: "ignore" | "inherit" | "pipe";
  readonly cwd?: string;
}

export interface SubprocessRunner {
  run(command: readonly string[], options?: SpawnOptions): ChildHandle;
  signal(child: ChildHandle, signal: NodeJS.Signals): boolean;
}

export class NodeSubprocessRunner implements SubprocessRunner {
  private readonly children = new Map<ChildHandle, ChildProcess>();

  run(command: readonly string[], options: SpawnOptions = {}): ChildHandle {
    const [file, ...args] = command;
    if (!file) {
      throw new SubprocessError(command, "empty command");
    }
    const stdio = options.stdio ?? "ignore";
    let child: ChildProcess;
    try {
      child = spawn(file, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: stdio === "pipe" ? ["ignore", "pipe", "ignore"] : stdio,
      });
    } catch (error) {
      throw new SubprocessError(command, "spawn failed", null, { cause: error });
    }

    let finished = false;
    const exited = new Promise<ChildExit>((resolve) => {
      child.once("error", (error) => {
        if (finished) {
          return;
        }
        finished = true;
        resolve({
          code: null,
          signal: null,
          error: new SubprocessError(command, error.message, null, { cause: error }),
        });
      });
      child.once("exit", (code, signal) => {
        if (finished) {
          return;
        }
        finished = true;
        resolve({
          code,
          signal,
          error:
            code !== null && code !== 0
              ? new SubprocessError(command, `exited with status ${code}`, code)
              : null,
        });
      });
    });

    const handle: ChildHandle = {
      pid: child.pid ?? null,
      command,
      stdout: child.stdout,
      exited,
      hasExited: () => finished,
    };
    this.children.set(handle, child);
    void exited.then(() => this.children.delete(handle));
    return handle;
  }

  signal(handle: ChildHandle, signal: NodeJS.Signals): boolean {
    const child = this.children.get(handle);
    if (!child || handle.hasExited()) {
      return false;
    }
    return child.kill(signal);
  }
}

/** Resolves with the exit, or with null once `timeoutMs` passes first. */
export const waitSubprocess = async (
  handle: ChildHandle,
  timeoutMs?: number,
): Promise<ChildExit | null> => {
  if (timeoutMs === undefined) {
    return handle.exited;
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });
  try {
    return await Promise.race([handle.exited, timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/** Runs `command` and resolves with its first non-empty stdout line. */
export const readFirstLine = async (
  runner: SubprocessRunner,
  command: readonly string[],
  timeoutMs: number,
): Promise<string | null> => {
  const child = runner.run(command, { stdio: "pipe" });
  const stdout = child.stdout;
  if (!stdout) {
    return null;
  }
  let buffered = "";
  const firstLine = new Promise<string | null>((resolve) => {
    stdout.on("data", (chunk: Buffer | string) => {
      buffered += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const line = buffered.split("\n").find((candidate) => candidate.trim().length > 0);
      if (line !== undefined && buffered.includes("\n")) {
        resolve(line.trim());
      }
    });
    void child.exited.then(() => {
      const line = buffered.split("\n").find((candidate) => candidate.trim().length > 0);
      resolve(line === undefined ? null : line.trim());
    });
  });
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });
  try {
    return await Promise.race([firstLine, timeout]);
  } finally {
    clearTimeout(timer);
    runner.signal(child, "SIGTERM");
  }
};
