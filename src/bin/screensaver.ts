#!/usr/bin/env node
import { fileURLToPath } from "node:url";

import { describeError } from "../platform/errors.js";
import { createNodePlatform } from "../platform/platform.js";
import { EXIT_INIT_FAILURE, EXIT_OK, EXIT_USAGE, runEffect } from "../runtime/runner.js";
import { SEED_ENV } from "../runtime/rng.js";
import { createLaunchables } from "../selector/launchables.js";
import { resolveSelectorPaths } from "../selector/paths.js";
import { BANNER_ENV } from "../selector/randomizer.js";

const usage = (keys: readonly string[]): string =>
  [
    "Usage: screensaver <effect> [options]",
    "       screensaver <effect> -h    show the effect's options",
    "",
    `Effects: ${keys.join(", ")}`,
  ].join("\n");

const main = async (argv: readonly string[]): Promise<number> => {
  const launchables = createLaunchables(resolveSelectorPaths(), [
    process.execPath,
    fileURLToPath(import.meta.url),
  ]);
  const keys = launchables.map((definition) => definition.type);
  const [key, ...rest] = argv;
  if (key === undefined || key === "-h" || key === "--help") {
    process.stdout.write(`${usage(keys)}\n`);
    return key === undefined ? EXIT_USAGE : EXIT_OK;
  }
  const definition = launchables.find((candidate) => candidate.type === key);
  if (!definition) {
    process.stderr.write(`screensaver: unknown effect '${key}'\n${usage(keys)}\n`);
    return EXIT_USAGE;
  }
  const platform = createNodePlatform({
    headless: process.env.SCREENSAVER_HEADLESS === "1",
    audio: process.env.SCREENSAVER_AUDIO !== "0",
  });
  return runEffect(definition, platform, rest, {
    program: key,
    config: { banner: process.env[BANNER_ENV], seed: process.env[SEED_ENV] },
  });
};

main(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    process.stderr.write(`[screensaver] ${describeError(error)}\n`);
    process.exit(EXIT_INIT_FAILURE);
  });
