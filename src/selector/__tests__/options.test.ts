import { describe, expect, test } from "vitest";

import {
  adjustValue,
  composeOptionString,
  defaultValues,
  formatValue,
  isConfigurable,
  parseOptionString,
  quoteShellText,
  schemaFor,
  splitShellWords,
  type OptionSpec,
} from "../options.js";

const specNamed = (key: string, flag: string): OptionSpec => {
  const spec = schemaFor(key).find((candidate) => candidate.flag === flag);
  if (!spec) {
    throw new Error(`${key} has no -${flag}`);
  }
  return spec;
};

describe("adjustValue", () => {
  test("steps floats by a tenth and clamps", () => {
    const speed = specNamed("starrynight", "s");
    expect(adjustValue(speed, 1, 1)).toBe(1.1);
    expect(adjustValue(speed, 0.3, -1)).toBe(0.2);
    expect(adjustValue(speed, 5, 1)).toBe(5);
    expect(adjustValue(speed, 0.1, -1)).toBe(0.1);
  });

  test("steps ints by their step", () => {
    const duration = specNamed("randomizer", "d");
    expect(adjustValue(duration, 45, -1)).toBe(40);
    expect(adjustValue(duration, 10, -1)).toBe(10);
    expect(adjustValue(specNamed("fishsaver", "t"), 100, 1)).toBe(100);
  });

  test("cycles enums in both directions", () => {
    const rotation = specNamed("starrynight", "r");
    expect(adjustValue(rotation, "dynamic", 1)).toBe("static");
    expect(adjustValue(rotation, "dynamic", -1)).toBe("none");
    expect(adjustValue(rotation, "none", 1)).toBe("dynamic");
    expect(adjustValue(rotation, "spin", 1)).toBe("static");
  });

  test("leaves text alone", () => {
    expect(adjustValue(specNamed("messages", "t"), "HELLO", 1)).toBe("HELLO");
  });
});

test("formatValue shows floats with one decimal", () => {
  expect(formatValue(specNamed("starrynight", "s"), 1)).toBe("1.0");
  expect(formatValue(specNamed("fishsaver", "t"), 30.4)).toBe("30");
  expect(formatValue(specNamed("starrynight", "r"), "static")).toBe("static");
});

test("quoteShellText escapes what bash expands inside double quotes", () => {
  expect(quoteShellText("OUT TO LUNCH")).toBe('"OUT TO LUNCH"');
  expect(quoteShellText('say "hi" $HOME `x` \\')).toBe('"say \\"hi\\" \\$HOME \\`x\\` \\\\"');
});

describe("composeOptionString", () => {
  test("writes every option in schema order", () => {
    const specs = schemaFor("starrynight");
    expect(composeOptionString(specs, defaultValues(specs))).toBe(
      "-s 1.0 -d 0.5 -m 1.0 -r dynamic",
    );
  });

  test("quotes text and skips it when empty", () => {
    const specs = schemaFor("messages2");
    expect(composeOptionString(specs, ["GONE FISHING", 12])).toBe('-t "GONE FISHING" -d 12.0');
    expect(composeOptionString(specs, ["", 12])).toBe("-d 12.0");
  });
});

describe("parseOptionString", () => {
  test("reads quoted text with escapes", () => {
    expect(parseOptionString(schemaFor("messages2"), '-t "say \\"hi\\"" -d 30')).toEqual([
      'say "hi"',
      30,
    ]);
  });

  test("clamps numbers and drops what it cannot read", () => {
    expect(parseOptionString(schemaFor("fishsaver"), "-t 500 -m abc -x 3")).toEqual([100, 15]);
    expect(parseOptionString(schemaFor("starrynight"), "-r spin")).toEqual([
      1,
      0.5,
      1,
      "dynamic",
    ]);
  });

  test("composes back to a complete string", () => {
    const specs = schemaFor("starrynight");
    expect(composeOptionString(specs, parseOptionString(specs, "-s 2.5 -r none"))).toBe(
      "-s 2.5 -d 0.5 -m 1.0 -r none",
    );
  });

  test("survives quoting every special character", () => {
    const specs = schemaFor("messages");
    const text = 'cost: $5 `now` "quoted" back\\slash';
    expect(parseOptionString(specs, composeOptionString(specs, [text]))).toEqual([text]);
  });
});

test("splitShellWords honours quotes and backslashes", () => {
  expect(splitShellWords('a  "b c" d\\ e ""')).toEqual(["a", "b c", "d e", ""]);
});

test("only effects with a schema are configurable", () => {
  expect(isConfigurable("cityscape")).toBe(true);
  expect(isConfigurable("warp")).toBe(false);
  expect(schemaFor("warp")).toEqual([]);
});
