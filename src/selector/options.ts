interface OptionBase {
  /** Single-letter CLI flag, without the dash. */
  readonly flag: string;
  readonly name: string;
  readonly description: string;
}

export interface FloatOption extends OptionBase {
  readonly kind: "float";
  readonly min: number;
  readonly max: number;
  readonly step: number;
  readonly defaultValue: number;
}

export interface IntOption extends OptionBase {
  readonly kind: "int";
  readonly min: number;
  readonly max: number;
  readonly step: number;
  readonly defaultValue: number;
}

export interface EnumOption extends OptionBase {
  readonly kind: "enum";
  readonly choices: readonly string[];
  readonly defaultValue: string;
}

export interface StringOption extends OptionBase {
  readonly kind: "string";
  readonly defaultValue: string;
}

export type OptionSpec = FloatOption | IntOption | EnumOption | StringOption;

export type OptionValue = number | string;

const speed: FloatOption = {
  kind: "float",
  flag: "s",
  name: "Speed",
  description: "Animation speed multiplier",
  min: 0.1,
  max: 5,
  step: 0.1,
  defaultValue: 1,
};

const messageText: StringOption = {
  kind: "string",
  flag: "t",
  name: "Text",
  description: "Message to scroll across the screen",
  defaultValue: "OUT TO LUNCH",
};

export const optionSchemas: Readonly<Record<string, readonly OptionSpec[]>> = {
  starrynight: [
    speed,
    {
      kind: "float",
      flag: "d",
      name: "Density",
      description: "Star density",
      min: 0,
      max: 1,
      step: 0.1,
      defaultValue: 0.5,
    },
    {
      kind: "float",
      flag: "m",
      name: "Meteors",
      description: "Meteor frequency",
      min: 0,
      max: 5,
      step: 0.1,
      defaultValue: 1,
    },
    {
      kind: "enum",
      flag: "r",
      name: "Rotation",
      description: "Sky motion",
      choices: ["dynamic", "static", "none"],
      defaultValue: "dynamic",
    },
  ],
  messages: [messageText],
  messages2: [
    messageText,
    {
      kind: "float",
      flag: "d",
      name: "Cycle",
      description: "Seconds per sweep",
      min: 2,
      max: 120,
      step: 1,
      defaultValue: 10,
    },
  ],
  fishsaver: [
    {
      kind: "int",
      flag: "t",
      name: "Fish",
      description: "Number of fish",
      min: 0,
      max: 100,
      step: 1,
      defaultValue: 30,
    },
    {
      kind: "int",
      flag: "m",
      name: "Bubbles",
      description: "Number of bubbles",
      min: 0,
      max: 100,
      step: 1,
      defaultValue: 15,
    },
  ],
  toastersaver: [
    {
      kind: "int",
      flag: "t",
      name: "Toasters",
      description: "Number of toasters",
      min: 0,
      max: 100,
      step: 1,
      defaultValue: 30,
    },
    {
      kind: "int",
      flag: "m",
      name: "Toast",
      description: "Number of slices of toast",
      min: 0,
      max: 100,
      step: 1,
      defaultValue: 10,
    },
  ],
  cityscape: [
    {
      kind: "int",
      flag: "w",
      name: "Weather",
      description: "Rain and snow (1=on, 0=off)",
      min: 0,
      max: 1,
      step: 1,
      defaultValue: 1,
    },
  ],
  randomizer: [
    {
      kind: "int",
      flag: "d",
      name: "Duration",
      description: "Seconds per screensaver",
      min: 10,
      max: 300,
      step: 5,
      defaultValue: 45,
    },
    {
      kind: "int",
      flag: "r",
      name: "Show names",
      description: "Show the name of each screensaver (1=yes, 0=no)",
      min: 0,
      max: 1,
      step: 1,
      defaultValue: 1,
    },
  ],
};

export const schemaFor = (key: string): readonly OptionSpec[] => optionSchemas[key] ?? [];

export const isConfigurable = (key: string): boolean => schemaFor(key).length > 0;

const roundToTenth = (value: number): number => Math.round(value * 10) / 10;

const clampTo = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

export const defaultValues = (specs: readonly OptionSpec[]): OptionValue[] =>
  specs.map((spec) => spec.defaultValue);

/** One `+`/`-` press: numbers step and clamp, enums cycle, strings stay. */
export const adjustValue = (spec: OptionSpec, value: OptionValue, direction: 1 | -1): OptionValue => {
  switch (spec.kind) {
    case "float": {
      const current = typeof value === "number" ? value : spec.defaultValue;
      return clampTo(roundToTenth(current + spec.step * direction), spec.min, spec.max);
    }
    case "int": {
      const current = typeof value === "number" ? value : spec.defaultValue;
      return clampTo(Math.round(current) + spec.step * direction, spec.min, spec.max);
    }
    case "enum": {
      const index = spec.choices.indexOf(String(value));
      const base = index < 0 ? spec.choices.indexOf(spec.defaultValue) : index;
      const count = spec.choices.length;
      return spec.choices[(base + direction + count) % count];
    }
    case "string":
      return value;
  }
};

export const formatValue = (spec: OptionSpec, value: OptionValue): string => {
  switch (spec.kind) {
    case "float":
      return (typeof value === "number" ? value : spec.defaultValue).toFixed(1);
    case "int":
      return String(typeof value === "number" ? Math.round(value) : spec.defaultValue);
    case "enum":
    case "string":
      return String(value);
  }
};

/** Escapes for a double-quoted bash word. */
export const quoteShellText = (text: string): string => `"${text.replace(/["\\$`]/g, "\\$&")}"`;

/**
 * Composes the saved option string, e.g. `-s 1.0 -d 0.5 -r dynamic` or
 * `-t "HELLO"`. Empty strings are left out.
 */
export const composeOptionString = (
  specs: readonly OptionSpec[],
  values: readonly OptionValue[],
): string =>
  specs
    .flatMap((spec, i) => {
      const value = values[i] ?? spec.defaultValue;
      if (spec.kind === "string") {
        const text = String(value);
        return text.length > 0 ? [`-${spec.flag} ${quoteShellText(text)}`] : [];
      }
      return [`-${spec.flag} ${formatValue(spec, value)}`];
    })
    .join(" ");

/** Splits a saved option string into words, honouring double quotes and backslashes. */
export const splitShellWords = (text: string): string[] => {
  const words: string[] = [];
  let word = "";
  let inWord = false;
  let quoted = false;
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === "\\" && i + 1 < text.length) {
      word += text[i + 1];
      inWord = true;
      i += 1;
    } else if (ch === '"') {
      quoted = !quoted;
      inWord = true;
    } else if (!quoted && /\s/.test(ch)) {
      if (inWord) {
        words.push(word);
      }
      word = "";
      inWord = false;
    } else {
      word += ch;
      inWord = true;
    }
  }
  if (inWord) {
    words.push(word);
  }
  return words;
};

const readValue = (spec: OptionSpec, text: string): OptionValue => {
  switch (spec.kind) {
    case "float": {
      const value = Number.parseFloat(text);
      return Number.isNaN(value) ? spec.defaultValue : clampTo(value, spec.min, spec.max);
    }
    case "int": {
      const value = Number.parseInt(text, 10);
      return Number.isNaN(value) ? spec.defaultValue : clampTo(value, spec.min, spec.max);
    }
    case "enum":
      return spec.choices.includes(text) ? text : spec.defaultValue;
    case "string":
      return text;
  }
};

/** Reads a saved option string back into editor values; unknown flags are dropped. */
export const parseOptionString = (specs: readonly OptionSpec[], text: string): OptionValue[] => {
  const values = defaultValues(specs);
  const words = splitShellWords(text);
  for (let i = 0; i < words.length; i += 1) {
    const match = /^-(\w)$/.exec(words[i]);
    if (!match || i + 1 >= words.length) {
      continue;
    }
    const index = specs.findIndex((spec) => spec.flag === match[1]);
    if (index >= 0) {
      values[index] = readValue(specs[index], words[i + 1]);
      i += 1;
    }
  }
  return values;
};
