import type { AssetRegistry } from "../platform/assets.js";
import { AssetDecodeError } from "../platform/errors.js";

export const CATALOG_ASSET = "catalog";

export interface CatalogEntry {
  /** Launcher file name and hook argument. */
  readonly key: string;
  readonly icon: string;
  readonly title: string;
  readonly description: string;
}

export interface CatalogSnapshot {
  readonly entries: readonly CatalogEntry[];
  /** Saved option strings by key; absent keys run with the effect defaults. */
  readonly options: Readonly<Record<string, string>>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readEntry = (value: unknown, index: number): CatalogEntry => {
  if (!isRecord(value)) {
    throw new AssetDecodeError(CATALOG_ASSET, `entry ${index} is not an object`);
  }
  const { key, icon, title, description } = value;
  if (
    typeof key !== "string" ||
    key.length === 0 ||
    typeof icon !== "string" ||
    typeof title !== "string" ||
    typeof description !== "string"
  ) {
    throw new AssetDecodeError(CATALOG_ASSET, `entry ${index} is missing a field`);
  }
  return { key, icon, title, description };
};

export const parseCatalog = (value: unknown): CatalogEntry[] => {
  if (!isRecord(value) || !Array.isArray(value.entries)) {
    throw new AssetDecodeError(CATALOG_ASSET, "expected an object with an entries array");
  }
  return value.entries.map(readEntry);
};

/** Catalog entries for the keys that can actually be launched, in catalog order. */
export const loadCatalog = (
  assets: AssetRegistry,
  launchable: ReadonlySet<string>,
): CatalogEntry[] =>
  parseCatalog(assets.json(CATALOG_ASSET)).filter((entry) => launchable.has(entry.key));

const freezeSnapshot = (
  entries: readonly CatalogEntry[],
  options: Readonly<Record<string, string>>,
): CatalogSnapshot =>
  Object.freeze({
    entries: Object.freeze(entries.map((entry) => Object.freeze({ ...entry }))),
    options: Object.freeze({ ...options }),
  });

export type CatalogListener = (snapshot: CatalogSnapshot) => void;

export interface CatalogStore {
  getSnapshot(): CatalogSnapshot;
  getEntry(key: string): CatalogEntry | null;
  getOptions(key: string): string;
  setOptions(key: string, options: string): void;
  subscribe(listener: CatalogListener): () => void;
}

export const createCatalogStore = (
  entries: readonly CatalogEntry[],
  initialOptions: Readonly<Record<string, string>> = {},
): CatalogStore => {
  let current = freezeSnapshot(entries, initialOptions);
  const listeners = new Set<CatalogListener>();

  const notify = (): void => {
    for (const listener of listeners) {
      listener(current);
    }
  };

  return {
    getSnapshot: () => current,
    getEntry: (key) => current.entries.find((entry) => entry.key === key) ?? null,
    getOptions: (key) => current.options[key] ?? "",
    setOptions: (key, options) => {
      if (!current.entries.some((entry) => entry.key === key)) {
        return;
      }
      const next: Record<string, string> = { ...current.options };
      if (options.length === 0) {
        delete next[key];
      } else {
        next[key] = options;
      }
      current = freezeSnapshot(current.entries, next);
      notify();
    },
    subscribe: (listener) => {
      listeners.add(listener);
      // Emit the current snapshot immediately so subscribers can hydrate.
      listener(current);
      return () => {
        listeners.delete(listener);
      };
    },
  };
};
