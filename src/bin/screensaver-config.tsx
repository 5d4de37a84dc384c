#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";

import { render } from "ink";

import { createLogger } from "../logger.js";
import { createAssetRegistry } from "../platform/assets.js";
import { describeError } from "../platform/errors.js";
import { NodeSubprocessRunner } from "../platform/subprocess.js";
import { createCatalogStore, loadCatalog } from "../selector/catalog.js";
import { ensureBackup } from "../selector/hook-script.js";
import { installLaunchers } from "../selector/installer.js";
import { createLaunchables, launchableKeys } from "../selector/launchables.js";
import { resolveSelectorPaths } from "../selector/paths.js";
import { SelectorApp } from "../selector/selector-app.js";
import { createSelectorServices } from "../selector/services.js";

const logger = createLogger("screensaver-config");

const DEFAULT_HOOK_ASSET = "default_hook";
const CLEAR_SCREEN = "\x1b[2J\x1b[H";

const runnerCommand = (): string[] => [
  process.execPath,
  path.join(path.dirname(fileURLToPath(import.meta.url)), "screensaver.js"),
];

const install = async (directory: string | undefined): Promise<number> => {
  const paths = resolveSelectorPaths();
  const keys = launchableKeys(createLaunchables(paths, runnerCommand()));
  const written = await installLaunchers(directory ?? paths.effectDirectory, keys, runnerCommand());
  for (const file of written) {
    process.stdout.write(`${file}\n`);
  }
  return 0;
};

const configure = async (): Promise<number> => {
  if (!process.stdin.isTTY) {
    process.stderr.write("screensaver-config: needs an interactive terminal\n");
    return 1;
  }
  const paths = resolveSelectorPaths();
  const assets = createAssetRegistry();
  const runner = new NodeSubprocessRunner();
  const entries = loadCatalog(assets, launchableKeys(createLaunchables(paths, runnerCommand())));

  try {
    await ensureBackup(paths, runner, assets.text(DEFAULT_HOOK_ASSET));
  } catch (error) {
    logger.warn(`cannot prepare the default hook backup: ${describeError(error)}`);
  }

  const services = createSelectorServices(paths, runner);
  const installed = await services.installed();
  const installedKey = installed ? path.basename(installed.effectPath) : undefined;
  const store = createCatalogStore(
    entries,
    installed && installedKey && installed.options.length > 0
      ? { [installedKey]: installed.options }
      : {},
  );

  process.stdout.write(CLEAR_SCREEN);
  const app = render(<SelectorApp store={store} services={services} initialKey={installedKey} />);
  try {
    await app.waitUntilExit();
  } finally {
    await services.shutdown();
  }
  return 0;
};

const main = async (argv: readonly string[]): Promise<number> => {
  const [command, directory] = argv;
  if (command === "install") {
    return install(directory);
  }
  if (command !== undefined) {
    process.stderr.write("Usage: screensaver-config [install [directory]]\n");
    return 2;
  }
  return configure();
};

main(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    process.stderr.write(`screensaver-config: ${describeError(error)}\n`);
    process.exit(1);
  });
