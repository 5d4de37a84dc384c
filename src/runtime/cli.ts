import type { CommonOptions, FlagSpec, FlagValues, ParsedArguments } from "./effect.js";

export const SPEED_MIN = 0.1;
export const SPEED_MAX = 10;

export const COMMON_FLAGS: readonly FlagSpec[] = [
  { flag: "s", argument: "F", description: "Speed multiplier (default: 1.0)" },
  { flag: "f", argument: "0|1", description: "Fullscreen (1=yes, 0=windowed) (default: 1)" },
];

export type CliResult =
  | ({ readonly kind: "run" } & ParsedArguments)
  | { readonly kind: "help" }
  | { readonly kind: "error"; readonly message: string };

/** Leading-number parse: "2.5x" reads 2.5, garbage reads 0. */
export const parseLeadingFloat = (text: string): number => {
  const value = Number.parseFloat(text);
  return Number.isNaN(value) ? 0 : value;
};

export const parseLeadingInt = (text: string): number => {
  const value = Number.parseInt(text, 10);
  return Number.isNaN(value) ? 0 : value;
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

export const clampSpeed = (value: number): number => {
  if (Number.isNaN(value)) {
    return SPEED_MIN;
  }
  return clamp(value, SPEED_MIN, SPEED_MAX);
};

/**
 * getopt-style parsing: `-x value` and `-xvalue` both work, `--` ends the
 * options, other words are kept as positionals.
 */
export const parseEffectArguments = (
  argv: readonly string[],
  flags: readonly FlagSpec[],
): CliResult => {
  const known = new Set([...COMMON_FLAGS, ...flags].map((spec) => spec.flag));
  const values = new Map<string, string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const word = argv[i];
    if (word === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!word.startsWith("-") || word.length < 2) {
      positionals.push(word);
      continue;
    }
    const flag = word[1];
    if (flag === "h") {
      return { kind: "help" };
    }
    if (!known.has(flag)) {
      return { kind: "error", message: `invalid option -- '${flag}'` };
    }
    let value = word.slice(2);
    if (value.length === 0) {
      const next = argv[i + 1];
      if (next === undefined) {
        return { kind: "error", message: `option requires an argument -- '${flag}'` };
      }
      value = next;
      i += 1;
    }
    values.set(flag, value);
  }

  const speedText = values.get("s");
  const fullscreenText = values.get("f");
  const common: CommonOptions = {
    speed: speedText === undefined ? 1 : clampSpeed(parseLeadingFloat(speedText)),
    fullscreen: fullscreenText === undefined ? true : parseLeadingInt(fullscreenText) !== 0,
  };
  values.delete("s");
  values.delete("f");
  return { kind: "run", common, flags: values, positionals };
};

export const formatUsage = (program: string, flags: readonly FlagSpec[]): string => {
  const line = (spec: FlagSpec) => `  -${spec.flag} ${spec.argument.padEnd(5)}${spec.description}`;
  return [
    `Usage: ${program} [options]`,
    ...[...COMMON_FLAGS, ...flags].map(line),
    line({ flag: "h", argument: "", description: "Show this help" }),
  ].join("\n");
};

export const readFloatFlag = (
  flags: FlagValues,
  flag: string,
  fallback: number,
  min: number,
  max: number,
): number => {
  const text = flags.get(flag);
  return text === undefined ? fallback : clamp(parseLeadingFloat(text), min, max);
};

export const readIntFlag = (
  flags: FlagValues,
  flag: string,
  fallback: number,
  min: number,
  max: number,
): number => {
  const text = flags.get(flag);
  return text === undefined ? fallback : clamp(parseLeadingInt(text), min, max);
};

export const readEnumFlag = <T extends string>(
  flags: FlagValues,
  flag: string,
  choices: readonly T[],
  fallback: T,
): T => {
  const text = flags.get(flag);
  if (text === undefined) {
    return fallback;
  }
  const byName = choices.find((choice) => choice === text);
  if (byName !== undefined) {
    return byName;
  }
  const index = /^\d+$/.test(text) ? Number(text) : -1;
  return choices[index] ?? fallback;
};
