import { openSync } from "node:fs";
import tty from "node:tty";

import { createCanvas, type Canvas, type SKRSContext2D } from "@napi-rs/canvas";

import type { FramePresenter } from "./canvas-renderer.js";
import type { InputEvent } from "./types.js";

/** Logical pixels covered by one character cell. */
export const CELL_WIDTH = 8;
export const CELL_HEIGHT = 16;

const ESC = "\x1b";
const HALF_BLOCK = "▀";

export interface TerminalHandle {
  readonly output: NodeJS.WritableStream;
  readonly input: tty.ReadStream | null;
  readonly columns: number;
  readonly rows: number;
  close(): void;
}

/**
 * Opens the controlling terminal directly so output still reaches the screen
 * when stdout and stderr are redirected by the hook script. Falls back to the
 * process streams when there is no controlling terminal, and returns null
 * when neither is a terminal.
 */
export const openTerminal = (): TerminalHandle | null => {
  try {
    const output = new tty.WriteStream(openSync("/dev/tty", "w"));
    const input = new tty.ReadStream(openSync("/dev/tty", "r"));
    return {
      output,
      input,
      columns: output.columns || 80,
      rows: output.rows || 24,
      close: () => {
        input.destroy();
        output.end();
      },
    };
  } catch {
    // No controlling terminal; try the inherited streams below.
  }
  if (!process.stdout.isTTY) {
    return null;
  }
  return {
    output: process.stdout,
    input: process.stdin.isTTY ? process.stdin : null,
    columns: process.stdout.columns || 80,
    rows: process.stdout.rows || 24,
    close: () => {},
  };
};

const sgrColor = (layer: 38 | 48, r: number, g: number, b: number): string =>
  `${ESC}[${layer};2;${r};${g};${b}m`;

/**
 * Encodes an RGBA buffer of `columns × 2·rows` pixels as rows of upper
 * half-block cells: the foreground carries the top pixel, the background the
 * bottom one. Escape sequences are only emitted when a colour changes.
 */
export const encodeHalfBlocks = (
  pixels: Uint8ClampedArray,
  columns: number,
  rows: number,
): string => {
  const parts: string[] = [`${ESC}[H`];
  for (let row = 0; row < rows; row += 1) {
    let fg = "";
    let bg = "";
    for (let col = 0; col < columns; col += 1) {
      const top = (row * 2 * columns + col) * 4;
      const bottom = ((row * 2 + 1) * columns + col) * 4;
      const nextFg = sgrColor(38, pixels[top], pixels[top + 1], pixels[top + 2]);
      const nextBg = sgrColor(48, pixels[bottom], pixels[bottom + 1], pixels[bottom + 2]);
      if (nextFg !== fg) {
        parts.push(nextFg);
        fg = nextFg;
      }
      if (nextBg !== bg) {
        parts.push(nextBg);
        bg = nextBg;
      }
      parts.push(HALF_BLOCK);
    }
    parts.push(`${ESC}[0m`);
    if (row < rows - 1) {
      parts.push("\r\n");
    }
  }
  return parts.join("");
};

export const terminalEnterSequence = (title: string): string =>
  `${ESC}[?1049h${ESC}[?25l${ESC}]2;${title}\x07${ESC}[?1003h${ESC}[?1006h${ESC}[2J`;

export const terminalLeaveSequence = (): string =>
  `${ESC}[?1003l${ESC}[?1006l${ESC}[0m${ESC}[?25h${ESC}[?1049l`;

export class TerminalPresenter implements FramePresenter {
  private readonly scratch: Canvas;
  private readonly scratchContext: SKRSContext2D;
  private closed = false;

  constructor(
    private readonly terminal: TerminalHandle,
    title: string,
  ) {
    this.scratch = createCanvas(terminal.columns, terminal.rows * 2);
    this.scratchContext = this.scratch.getContext("2d");
    terminal.output.write(terminalEnterSequence(title));
  }

  present(frame: Canvas): void {
    if (this.closed) {
      return;
    }
    const { columns, rows } = this.terminal;
    const ctx = this.scratchContext;
    ctx.drawImage(frame, 0, 0, frame.width, frame.height, 0, 0, columns, rows * 2);
    const image = ctx.getImageData(0, 0, columns, rows * 2);
    this.terminal.output.write(encodeHalfBlocks(image.data, columns, rows));
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.terminal.output.write(terminalLeaveSequence());
  }
}

const MOUSE_REPORT = /\x1b\[<(\d+);(\d+);(\d+)([Mm])/g;

/**
 * Translates one chunk of raw terminal input into platform events. Mouse
 * reports use SGR encoding with 1-based cell coordinates, scaled here to
 * logical pixels at the cell centre.
 */
export const parseTerminalInput = (chunk: string): InputEvent[] => {
  const events: InputEvent[] = [];
  for (const match of chunk.matchAll(MOUSE_REPORT)) {
    const code = Number(match[1]);
    const x = (Number(match[2]) - 1) * CELL_WIDTH + CELL_WIDTH / 2;
    const y = (Number(match[3]) - 1) * CELL_HEIGHT + CELL_HEIGHT / 2;
    if ((code & 32) !== 0) {
      events.push({ type: "pointer-motion", x, y });
    } else if (match[4] === "M" && (code & 64) === 0) {
      events.push({ type: "pointer-button", x, y, button: (code & 3) + 1 });
    }
  }
  const rest = chunk.replace(MOUSE_REPORT, "");
  if (rest.includes("\x03")) {
    events.push({ type: "quit", reason: "ctrl-c" });
  } else if (rest.length > 0) {
    events.push({ type: "key", key: rest });
  }
  return events;
};

const QUIT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

export interface InputSource {
  drain(): InputEvent[];
  close(): void;
}

/** Queues terminal input and termination signals until the next poll. */
export class TerminalInputSource implements InputSource {
  private queue: InputEvent[] = [];
  private readonly onData = (data: Buffer | string): void => {
    this.queue.push(...parseTerminalInput(typeof data === "string" ? data : data.toString("utf8")));
  };
  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.queue.push({ type: "quit", reason: signal });
  };

  constructor(private readonly stream: tty.ReadStream | null) {
    if (stream) {
      stream.setRawMode(true);
      stream.on("data", this.onData);
      stream.resume();
    }
    for (const signal of QUIT_SIGNALS) {
      process.on(signal, this.onSignal);
    }
  }

  drain(): InputEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  close(): void {
    for (const signal of QUIT_SIGNALS) {
      process.off(signal, this.onSignal);
    }
    if (this.stream) {
      this.stream.off("data", this.onData);
      this.stream.setRawMode(false);
      this.stream.pause();
    }
  }
}
