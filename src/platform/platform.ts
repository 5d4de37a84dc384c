import { performance } from "node:perf_hooks";

import { AssetRegistry, createAssetRegistry } from "./assets.js";
import { AplayAudioDevice, MutedAudioDevice, type AudioDevice } from "./audio.js";
import { CanvasRenderer, NullPresenter, type FramePresenter } from "./canvas-renderer.js";
import { createCompositor, type Compositor } from "./compositor.js";
import { describeError, InitFailure } from "./errors.js";
import { CanvasFontLoader, type FontLoader } from "./fonts.js";
import { NodeSubprocessRunner, type SubprocessRunner } from "./subprocess.js";
import {
  CELL_HEIGHT,
  CELL_WIDTH,
  openTerminal,
  TerminalInputSource,
  TerminalPresenter,
  type InputSource,
  type TerminalHandle,
} from "./terminal.js";
import type { Clock, InputEvent, Viewport, WindowContext, WindowRequest } from "./types.js";

export const FALLBACK_VIEWPORT: Viewport = { width: 800, height: 600 };

export interface Platform {
  readonly clock: Clock;
  readonly assets: AssetRegistry;
  readonly fonts: FontLoader;
  readonly audio: AudioDevice;
  readonly compositor: Compositor;
  readonly subprocess: SubprocessRunner;
  openWindow(request: WindowRequest): WindowContext;
  pollInput(): InputEvent[];
  close(): void;
}

export class SystemClock implements Clock {
  nowMs(): number {
    return performance.now();
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    });
  }
}

export interface NodePlatformOptions {
  /** Discard frames and ignore the terminal. */
  readonly headless?: boolean;
  readonly audio?: boolean;
  readonly assetDirectory?: string;
  readonly env?: NodeJS.ProcessEnv;
}

export const viewportForTerminal = (
  terminal: { columns: number; rows: number } | null,
  request: WindowRequest,
): Viewport => {
  if (request.fullscreen && terminal) {
    return { width: terminal.columns * CELL_WIDTH, height: terminal.rows * CELL_HEIGHT };
  }
  return request.size ?? FALLBACK_VIEWPORT;
};

class NodePlatform implements Platform {
  readonly clock = new SystemClock();
  readonly assets: AssetRegistry;
  readonly fonts = new CanvasFontLoader();
  readonly subprocess = new NodeSubprocessRunner();
  readonly audio: AudioDevice;
  readonly compositor: Compositor;

  private terminal: TerminalHandle | null = null;
  private input: InputSource | null = null;
  private renderer: CanvasRenderer | null = null;

  constructor(private readonly options: NodePlatformOptions) {
    this.assets = createAssetRegistry(options.assetDirectory);
    this.audio =
      options.audio === false ? new MutedAudioDevice() : new AplayAudioDevice(this.subprocess);
    this.compositor = createCompositor(this.subprocess, options.env);
  }

  openWindow(request: WindowRequest): WindowContext {
    if (this.renderer) {
      throw new InitFailure("a window is already open");
    }
    this.terminal = this.options.headless || request.offscreen ? null : openTerminal();
    const viewport = viewportForTerminal(this.terminal, request);
    let presenter: FramePresenter = new NullPresenter();
    try {
      if (this.terminal) {
        presenter = new TerminalPresenter(this.terminal, request.title);
      }
      this.renderer = new CanvasRenderer(viewport.width, viewport.height, presenter);
    } catch (error) {
      presenter.close();
      throw new InitFailure(`cannot create renderer: ${describeError(error)}`, { cause: error });
    }
    this.input = new TerminalInputSource(this.terminal?.input ?? null);
    return {
      title: request.title,
      fullscreen: request.fullscreen && this.terminal !== null,
      viewport,
      renderer: this.renderer,
    };
  }

  pollInput(): InputEvent[] {
    return this.input?.drain() ?? [];
  }

  close(): void {
    this.input?.close();
    this.input = null;
    this.renderer?.close();
    this.renderer = null;
    this.terminal?.close();
    this.terminal = null;
    this.audio.close();
  }
}

export const createNodePlatform = (options: NodePlatformOptions = {}): Platform =>
  new NodePlatform(options);
