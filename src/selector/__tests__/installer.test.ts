import { mkdtempSync, readFileSync, rmSync, statSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, test } from "vitest";

import { installLaunchers, quoteShellWord, renderLauncher } from "../installer.js";

describe("launchers", () => {
  let directory: string | null = null;

  afterEach(() => {
    if (directory) {
      rmSync(directory, { recursive: true, force: true });
      directory = null;
    }
  });

  test("quoteShellWord survives embedded quotes", () => {
    expect(quoteShellWord("plain")).toBe("'plain'");
    expect(quoteShellWord("it's")).toBe("'it'\\''s'");
  });

  test("renderLauncher execs the runner with the key and forwards arguments", () => {
    expect(renderLauncher(["/usr/bin/node", "/opt/saver/screensaver.js"], "warp")).toBe(
      "#!/bin/sh\nexec '/usr/bin/node' '/opt/saver/screensaver.js' 'warp' \"$@\"\n",
    );
  });

  test("installLaunchers writes one executable per key", async () => {
    directory = mkdtempSync(path.join(os.tmpdir(), "launchers-"));
    const target = path.join(directory, "screensaver");
    const written = await installLaunchers(target, ["warp", "globe"], ["/usr/bin/screensaver"]);
    expect(written).toEqual([path.join(target, "warp"), path.join(target, "globe")]);
    expect(statSync(written[1]).mode & 0o777).toBe(0o755);
    expect(readFileSync(written[1], "utf8")).toBe(
      "#!/bin/sh\nexec '/usr/bin/screensaver' 'globe' \"$@\"\n",
    );
  });
});
