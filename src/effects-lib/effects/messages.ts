import { describeError } from "../../platform/errors.js";
import { SANS_BOLD_FONTS } from "../../platform/fonts.js";
import { readFirstLine, type SubprocessRunner } from "../../platform/subprocess.js";
import type { Renderer, Viewport } from "../../platform/types.js";
import type { Logger } from "../../logger.js";
import { readFloatFlag } from "../../runtime/cli.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
  ParsedArguments,
} from "../../runtime/effect.js";
import {
  DEFAULT_MARQUEE,
  marqueePosition,
  MarqueeText,
  type MarqueeTiming,
} from "../marquee.js";
import { WHITE } from "../math.js";

export const DEFAULT_MESSAGE = "OUT TO LUNCH   ".repeat(4);
const FONT_SIZE = 20;
const QUOTE_TIMEOUT_MS = 3000;
export const QUOTE_COMMAND_ENV = "SCREENSAVER_QUOTE_CMD";

export interface MessagesOptions extends CommonOptions {
  readonly text: string;
}

export interface QuoteMessagesOptions extends MessagesOptions {
  /** Seconds per sweep and per row step. */
  readonly cycle: number;
  readonly quoteCommand: string | null;
}

const readText = (args: ParsedArguments): string => {
  const text = args.flags.get("t");
  return text === undefined || text.length === 0 ? DEFAULT_MESSAGE : text;
};

/**
 * Pulls one line from a shell command per request. Requests never overlap;
 * failures keep whatever text was last shown.
 */
export class QuoteFeed {
  private pending = false;
  latest: string | null = null;

  constructor(
    private readonly runner: SubprocessRunner,
    private readonly command: string,
    private readonly logger: Logger,
    private readonly timeoutMs = QUOTE_TIMEOUT_MS,
  ) {}

  async refresh(): Promise<string | null> {
    if (this.pending) {
      return this.latest;
    }
    this.pending = true;
    try {
      const line = await readFirstLine(this.runner, ["sh", "-c", this.command], this.timeoutMs);
      if (line) {
        this.latest = line;
      }
    } catch (error) {
      this.logger.debug(`quote source failed: ${describeError(error)}`);
    } finally {
      this.pending = false;
    }
    return this.latest;
  }
}

class MessagesInstance implements EffectInstance {
  private sweep = 0;

  constructor(
    private readonly viewport: Viewport,
    private readonly speed: number,
    private readonly timing: MarqueeTiming,
    private readonly marquee: MarqueeText,
    private readonly fallback: string,
    private readonly feed: QuoteFeed | null,
  ) {
    marquee.setText(feed?.latest ?? fallback);
  }

  update(_dt: number, elapsed: number): void {
    const sweep = Math.floor((elapsed * this.speed) / this.timing.sweep);
    if (sweep === this.sweep) {
      return;
    }
    this.sweep = sweep;
    this.marquee.setText(this.feed?.latest ?? this.fallback);
    if (this.feed) {
      void this.feed.refresh();
    }
  }

  render(_renderer: Renderer, elapsed: number): void {
    const t = elapsed * this.speed;
    this.marquee.draw(marqueePosition(t, this.viewport, this.marquee.width, this.timing));
  }

  teardown(): void {
    this.marquee.release();
  }
}

export const MessagesDefinition: EffectDefinition<MessagesOptions> = {
  type: "messages",
  title: "Messages",
  flags: [{ flag: "t", argument: "TEXT", description: "Text to scroll (default: OUT TO LUNCH)" }],
  assets: [],
  parseOptions: (args) => ({ ...args.common, text: readText(args) }),
  init: (context: EffectContext, options) => {
    const font = context.platform.fonts.load(SANS_BOLD_FONTS, FONT_SIZE);
    return new MessagesInstance(
      context.viewport,
      options.speed,
      DEFAULT_MARQUEE,
      new MarqueeText(context.renderer, font, WHITE),
      options.text,
      null,
    );
  },
};

export const QuoteMessagesDefinition: EffectDefinition<QuoteMessagesOptions> = {
  type: "messages2",
  title: "Messages 2",
  flags: [
    { flag: "t", argument: "TEXT", description: "Fallback text (default: OUT TO LUNCH)" },
    { flag: "d", argument: "F", description: "Seconds per sweep (default: 10)" },
  ],
  assets: [],
  parseOptions: (args) => ({
    ...args.common,
    text: readText(args),
    cycle: readFloatFlag(args.flags, "d", 10, 2, 120),
    quoteCommand: process.env[QUOTE_COMMAND_ENV]?.trim() || null,
  }),
  init: async (context: EffectContext, options) => {
    const font = context.platform.fonts.load(SANS_BOLD_FONTS, FONT_SIZE);
    const timing: MarqueeTiming = {
      sweep: options.cycle,
      step: options.cycle,
      rows: DEFAULT_MARQUEE.rows,
    };
    let feed: QuoteFeed | null = null;
    if (options.quoteCommand) {
      feed = new QuoteFeed(context.platform.subprocess, options.quoteCommand, context.logger);
      await feed.refresh();
    }
    return new MessagesInstance(
      context.viewport,
      options.speed,
      timing,
      new MarqueeText(context.renderer, font, WHITE),
      options.text,
      feed,
    );
  },
};
