import { describe, expect, test } from "vitest";

import { readFirstLine, waitSubprocess } from "../subprocess.js";
import { FakeSubprocessRunner } from "../../__tests__/helpers/headless-platform.js";

describe("waitSubprocess", () => {
  test("gives up after the timeout", async () => {
    const runner = new FakeSubprocessRunner();
    const child = runner.run(["sleep", "60"]);
    await expect(waitSubprocess(child, 5)).resolves.toBeNull();
  });

  test("resolves with the exit", async () => {
    const runner = new FakeSubprocessRunner();
    runner.onRun = () => ({ code: 0, signal: null, error: null });
    const child = runner.run(["true"]);
    await expect(waitSubprocess(child, 1000)).resolves.toEqual({
      code: 0,
      signal: null,
      error: null,
    });
    await expect(waitSubprocess(child)).resolves.toEqual({ code: 0, signal: null, error: null });
  });
});

describe("readFirstLine", () => {
  test("returns the first non-empty line trimmed and stops the child", async () => {
    const runner = new FakeSubprocessRunner();
    runner.stdoutText = "\n  Carpe diem  \nsecond\n";
    await expect(readFirstLine(runner, ["fortune"], 1000)).resolves.toBe("Carpe diem");
    expect(runner.last().options).toEqual({ stdio: "pipe" });
    expect(runner.signals).toEqual([{ command: ["fortune"], signal: "SIGTERM" }]);
  });

  test("is null without a stdout", async () => {
    const runner = new FakeSubprocessRunner();
    await expect(readFirstLine(runner, ["fortune"], 1000)).resolves.toBeNull();
  });

  test("is null when nothing arrives in time", async () => {
    const runner = new FakeSubprocessRunner();
    runner.stdoutText = "no newline yet";
    await expect(readFirstLine(runner, ["fortune"], 10)).resolves.toBeNull();
  });
});
