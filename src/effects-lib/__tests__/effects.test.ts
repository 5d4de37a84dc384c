import { afterEach, describe, expect, test, vi } from "vitest";

import {
  createHeadlessPlatform,
  type HeadlessPlatform,
} from "../../__tests__/helpers/headless-platform.js";
import { EXIT_OK, EXIT_USAGE, runEffect } from "../../runtime/runner.js";
import {
  MessagesDefinition,
  QUOTE_COMMAND_ENV,
  QuoteMessagesDefinition,
} from "../effects/messages.js";
import { effectDefinitions, findEffectDefinition } from "../registry.js";

const run = async (
  type: string,
  argv: readonly string[],
  setup?: (platform: HeadlessPlatform) => void,
) => {
  const definition = findEffectDefinition(type);
  if (!definition) {
    throw new Error(`unknown effect ${type}`);
  }
  const platform = createHeadlessPlatform({ viewport: { width: 320, height: 240 } });
  platform.input.at(200, { type: "key", key: "q" });
  setup?.(platform);
  const err: string[] = [];
  const code = await runEffect(definition, platform, argv, { stderr: (text) => err.push(text) });
  return { code, err, platform };
};

describe("bundled effects", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("every effect type is unique", () => {
    const types = effectDefinitions.map((definition) => definition.type);
    expect(new Set(types).size).toBe(types.length);
  });

  test.each(effectDefinitions.map((definition) => [definition.type]))(
    "%s runs headless until a key is pressed",
    async (type) => {
      vi.stubEnv(QUOTE_COMMAND_ENV, "");
      const { code, err, platform } = await run(type, []);
      expect(err).toEqual([]);
      expect(code).toBe(EXIT_OK);
      expect(platform.renderer?.presented).toBeGreaterThan(5);
      expect(platform.closed).toBe(true);
    },
  );

  test.each(effectDefinitions.map((definition) => [definition.type]))(
    "%s rejects unknown flags",
    async (type) => {
      const { code, err } = await run(type, ["-Z"]);
      expect(code).toBe(EXIT_USAGE);
      expect(err[0]).toBe(`${type}: invalid option -- 'Z'`);
    },
  );
});

describe("messages", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("scrolls the text given with -t", async () => {
    expect(MessagesDefinition.type).toBe("messages");
    const { code, platform } = await run("messages", ["-t", "GONE FISHING"]);
    expect(code).toBe(EXIT_OK);
    const texts = platform.renderer?.calls.filter((call) => call.op === "text");
    expect(texts).toEqual([{ op: "text", text: "GONE FISHING" }]);
  });

  test("messages2 shows the first line of the quote command", async () => {
    expect(QuoteMessagesDefinition.type).toBe("messages2");
    vi.stubEnv(QUOTE_COMMAND_ENV, "fortune -s");
    const { code, platform } = await run("messages2", ["-t", "FALLBACK"], (p) => {
      p.subprocess.stdoutText = "\nStay curious\nsecond line\n";
    });
    expect(code).toBe(EXIT_OK);
    expect(platform.subprocess.children[0].handle.command).toEqual(["sh", "-c", "fortune -s"]);
    const texts = platform.renderer?.calls.filter((call) => call.op === "text");
    expect(texts?.[0]).toEqual({ op: "text", text: "Stay curious" });
  });

  test("messages2 falls back when the command prints nothing", async () => {
    vi.stubEnv(QUOTE_COMMAND_ENV, "true");
    const { platform } = await run("messages2", ["-t", "FALLBACK"], (p) => {
      p.subprocess.onRun = () => ({ code: 0, signal: null, error: null });
    });
    const texts = platform.renderer?.calls.filter((call) => call.op === "text");
    expect(texts?.[0]).toEqual({ op: "text", text: "FALLBACK" });
  });
});
