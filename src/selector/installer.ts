import path from "node:path";

import { createLogger } from "../logger.js";
import { writeFileAtomic } from "./hook-script.js";

const logger = createLogger("install");

/** Single-quotes a word for sh. */
export const quoteShellWord = (word: string): string => `'${word.replace(/'/g, "'\\''")}'`;

export const renderLauncher = (runnerCommand: readonly string[], key: string): string =>
  ["#!/bin/sh", `exec ${[...runnerCommand, key].map(quoteShellWord).join(" ")} "$@"`, ""].join("\n");

/**
 * Writes one executable launcher per key into `directory`, so the hook can
 * start an effect by path. Resolves with the files written.
 */
export const installLaunchers = async (
  directory: string,
  keys: Iterable<string>,
  runnerCommand: readonly string[],
): Promise<string[]> => {
  const written: string[] = [];
  for (const key of keys) {
    const file = path.join(directory, key);
    await writeFileAtomic(file, renderLauncher(runnerCommand, key));
    written.push(file);
  }
  logger.info(`installed ${written.length} launchers into ${directory}`);
  return written;
};
