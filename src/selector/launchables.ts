import { effectDefinitions } from "../effects-lib/registry.js";
import type { EffectDefinition } from "../runtime/effect.js";
import type { SelectorPaths } from "./paths.js";
import { createRandomizerDefinition, ROTATION_PREFIXES, type RotationEntry } from "./randomizer.js";

/**
 * Every key a launcher can run: the effect library plus the randomiser.
 * `selfCommand` runs this package's effect runner, used when the
 * randomiser finds no installed launchers.
 */
export const createLaunchables = (
  paths: SelectorPaths,
  selfCommand: readonly string[],
): readonly EffectDefinition[] => {
  const fallback: RotationEntry[] = effectDefinitions
    .filter((definition) => ROTATION_PREFIXES.some((prefix) => definition.type.startsWith(prefix)))
    .map((definition) => ({ name: definition.type, command: [...selfCommand, definition.type] }));
  return [...effectDefinitions, createRandomizerDefinition({ directory: paths.effectDirectory, fallback })];
};

export const launchableKeys = (launchables: readonly EffectDefinition[]): ReadonlySet<string> =>
  new Set(launchables.map((definition) => definition.type));
