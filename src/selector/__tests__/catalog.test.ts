import { describe, expect, test, vi } from "vitest";

import { createAssetRegistry } from "../../platform/assets.js";
import { createCatalogStore, loadCatalog, parseCatalog, type CatalogEntry } from "../catalog.js";
import { createLaunchables, launchableKeys } from "../launchables.js";
import { resolveSelectorPaths } from "../paths.js";

const entry = (key: string): CatalogEntry => ({
  key,
  icon: "*",
  title: key.toUpperCase(),
  description: `About ${key}`,
});

describe("parseCatalog", () => {
  test("reads entries in order", () => {
    expect(parseCatalog({ entries: [entry("warp"), entry("globe")] })).toEqual([
      entry("warp"),
      entry("globe"),
    ]);
  });

  test.each([
    [[], "catalog: expected an object with an entries array"],
    [{ entries: "warp" }, "catalog: expected an object with an entries array"],
    [{ entries: ["warp"] }, "catalog: entry 0 is not an object"],
    [
      { entries: [entry("warp"), { key: "globe", icon: "*" }] },
      "catalog: entry 1 is missing a field",
    ],
    [{ entries: [{ ...entry("warp"), key: "" }] }, "catalog: entry 0 is missing a field"],
  ])("rejects %j", (value, message) => {
    expect(() => parseCatalog(value)).toThrow(message);
  });
});

describe("loadCatalog", () => {
  const assets = createAssetRegistry();

  test("keeps catalog order and drops keys nothing can launch", () => {
    const keys = loadCatalog(assets, new Set(["warp", "matrix", "nope"])).map((item) => item.key);
    expect(keys).toEqual(["matrix", "warp"]);
  });

  test("every bundled entry is launchable", () => {
    const launchables = createLaunchables(resolveSelectorPaths({ HOME: "/home/test" }), [
      "screensaver",
    ]);
    const all = parseCatalog(assets.json("catalog"));
    expect(loadCatalog(assets, launchableKeys(launchables))).toEqual(all);
    expect(all.map((item) => item.key)).toContain("randomizer");
  });
});

describe("catalog store", () => {
  test("hydrates subscribers straight away", () => {
    const store = createCatalogStore([entry("warp")], { warp: "-s 2.0" });
    const listener = vi.fn();
    store.subscribe(listener);
    expect(listener).toHaveBeenCalledWith(store.getSnapshot());
    expect(store.getOptions("warp")).toBe("-s 2.0");
    expect(store.getOptions("globe")).toBe("");
  });

  test("publishes a new frozen snapshot on every change", () => {
    const store = createCatalogStore([entry("warp"), entry("globe")]);
    const before = store.getSnapshot();
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);
    store.setOptions("globe", "-s 0.5");
    const after = store.getSnapshot();
    expect(after).not.toBe(before);
    expect(after.options).toEqual({ globe: "-s 0.5" });
    expect(before.options).toEqual({});
    expect(Object.isFrozen(after.options)).toBe(true);
    expect(listener).toHaveBeenLastCalledWith(after);
    unsubscribe();
    store.setOptions("globe", "");
    expect(store.getSnapshot().options).toEqual({});
    expect(listener).toHaveBeenCalledTimes(2);
  });

  test("ignores keys outside the catalog", () => {
    const store = createCatalogStore([entry("warp")]);
    const listener = vi.fn();
    store.subscribe(listener);
    store.setOptions("globe", "-s 0.5");
    expect(listener).toHaveBeenCalledTimes(1);
    expect(store.getEntry("globe")).toBeNull();
    expect(store.getEntry("warp")).toEqual(entry("warp"));
  });
});
