import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import type { Logger } from "../../logger.js";
import type { EffectContext, EffectInstance } from "../../runtime/effect.js";
import {
  createHeadlessPlatform,
  FakeSubprocessRunner,
  HeadlessRenderer,
} from "../../__tests__/helpers/headless-platform.js";
import { HOOK_SCRIPT_NAME } from "../paths.js";
import {
  BANNER_ENV,
  createRandomizerDefinition,
  discoverRotation,
  nowPlaying,
  pickNextIndex,
  type RandomizerOptions,
  type RotationEntry,
} from "../randomizer.js";

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("pickNextIndex", () => {
  test("never repeats the current index", () => {
    for (const value of [0, 0.25, 0.5, 0.75, 0.999]) {
      for (let current = 0; current < 5; current += 1) {
        const next = pickNextIndex(current, 5, () => value);
        expect(next).not.toBe(current);
        expect(next).toBeGreaterThanOrEqual(0);
        expect(next).toBeLessThan(5);
      }
    }
  });

  test("skips over the current index", () => {
    expect(pickNextIndex(2, 5, () => 0)).toBe(0);
    expect(pickNextIndex(2, 5, () => 0.5)).toBe(3);
    expect(pickNextIndex(2, 5, () => 0.99)).toBe(4);
  });

  test("picks from the whole range before anything runs", () => {
    expect(pickNextIndex(-1, 5, () => 0.99)).toBe(4);
    expect(pickNextIndex(-1, 1, () => 0.5)).toBe(0);
  });
});

test("nowPlaying labels the banner", () => {
  expect(nowPlaying("warp")).toBe("Now Playing: warp");
});

describe("discoverRotation", () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(path.join(os.tmpdir(), "rotation-"));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  const install = (name: string, mode: number) => {
    const file = path.join(directory, name);
    writeFileSync(file, "#!/bin/sh\n");
    chmodSync(file, mode);
  };

  test("keeps executable launchers with a rotation prefix", () => {
    install("warp", 0o755);
    install("matrix-extra", 0o700);
    install("globe", 0o644);
    install("cityscape", 0o755);
    install("randomizer", 0o755);
    install(HOOK_SCRIPT_NAME, 0o755);
    mkdirSync(path.join(directory, "fishsaver.d"));
    expect(discoverRotation(directory)).toEqual([
      { name: "matrix-extra", command: [path.join(directory, "matrix-extra")] },
      { name: "warp", command: [path.join(directory, "warp")] },
    ]);
  });

  test("is empty for a missing directory", () => {
    expect(discoverRotation(path.join(directory, "absent"))).toEqual([]);
  });
});

describe("randomizer effect", () => {
  const fallback: RotationEntry[] = [
    { name: "warp", command: ["screensaver", "warp"] },
    { name: "matrix", command: ["screensaver", "matrix"] },
  ];

  const options: RandomizerOptions = {
    speed: 1,
    fullscreen: true,
    duration: 10,
    showNames: true,
  };

  const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  const start = async (runner: FakeSubprocessRunner): Promise<EffectInstance> => {
    const definition = createRandomizerDefinition({
      directory: path.join(os.tmpdir(), "no-such-launchers"),
      fallback,
      runner,
    });
    const platform = createHeadlessPlatform();
    const context: EffectContext = {
      viewport: { width: 800, height: 600 },
      renderer: new HeadlessRenderer(800, 600),
      platform,
      rng: { next: () => 0, seed: 0 },
      logger,
    };
    return definition.init(context, options);
  };

  test("parses its flags with clamping", () => {
    const definition = createRandomizerDefinition({ directory: "/nowhere" });
    const parsed = definition.parseOptions({
      common: { speed: 1, fullscreen: false },
      flags: new Map([
        ["d", "5"],
        ["r", "0"],
      ]),
      positionals: [],
    });
    expect(parsed).toEqual({ speed: 1, fullscreen: false, duration: 10, showNames: false });
    expect(definition.offscreen).toBe(true);
  });

  test("refuses to start with nothing to rotate", () => {
    const definition = createRandomizerDefinition({ directory: "/nowhere" });
    const platform = createHeadlessPlatform();
    const context: EffectContext = {
      viewport: { width: 800, height: 600 },
      renderer: new HeadlessRenderer(800, 600),
      platform,
      rng: { next: () => 0, seed: 0 },
      logger,
    };
    expect(() => definition.init(context, options)).toThrow(
      "no screensavers to rotate in /nowhere",
    );
  });

  test("switches effects when the duration runs out", async () => {
    const runner = new FakeSubprocessRunner();
    const instance = await start(runner);
    instance.update(0.016, 0);
    await settle();
    expect(runner.last().handle.command).toEqual(["screensaver", "warp", "-f", "1"]);
    expect(runner.last().options).toEqual({
      env: { [BANNER_ENV]: "Now Playing: warp" },
      stdio: "inherit",
    });

    instance.update(0.016, 5);
    await settle();
    expect(runner.children).toHaveLength(1);

    instance.update(0.016, 10);
    await settle();
    expect(runner.signals).toEqual([
      { command: ["screensaver", "warp", "-f", "1"], signal: "SIGTERM" },
    ]);
    expect(runner.last().handle.command).toEqual(["screensaver", "matrix", "-f", "1"]);
    expect(instance.finished?.()).toBe(false);

    await instance.teardown();
    expect(runner.last().handle.hasExited()).toBe(true);
  });

  test("moves on when an effect crashes", async () => {
    const runner = new FakeSubprocessRunner();
    const instance = await start(runner);
    instance.update(0.016, 0);
    await settle();
    runner.last().finish({ code: 1, signal: null, error: null });
    await settle();
    instance.update(0.016, 1);
    await settle();
    expect(logger.warn).toHaveBeenCalledWith("warp stopped: exit status 1");
    expect(runner.last().handle.command).toEqual(["screensaver", "matrix", "-f", "1"]);
    expect(instance.finished?.()).toBe(false);
    await instance.teardown();
  });

  test("gives up once every effect has failed in a row", async () => {
    const runner = new FakeSubprocessRunner();
    const instance = await start(runner);
    instance.update(0.016, 0);
    for (const elapsed of [1, 2]) {
      await settle();
      runner.last().finish({ code: null, signal: "SIGSEGV", error: null });
      await settle();
      instance.update(0.016, elapsed);
    }
    expect(logger.error).toHaveBeenCalledWith("every effect in the rotation failed");
    expect(instance.finished?.()).toBe(true);
    expect(runner.children).toHaveLength(2);
    await instance.teardown();
  });

  test("ends when the running effect is dismissed", async () => {
    const runner = new FakeSubprocessRunner();
    const instance = await start(runner);
    instance.update(0.016, 0);
    await settle();
    runner.last().finish({ code: 0, signal: null, error: null });
    await settle();
    instance.update(0.016, 3);
    expect(instance.finished?.()).toBe(true);
    await instance.teardown();
    expect(runner.signals).toEqual([]);
  });
});
