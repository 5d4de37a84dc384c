import { existsSync, readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { AssetDecodeError } from "./errors.js";

export type AssetContentType = "png" | "jpeg" | "wav" | "ttf" | "text";

export interface AssetBlob {
  readonly id: string;
  readonly contentType: AssetContentType;
  readonly byteLength: number;
  readonly bytes: Uint8Array;
}

const startsWith = (bytes: Uint8Array, prefix: readonly number[], offset = 0): boolean =>
  bytes.length >= offset + prefix.length && prefix.every((value, i) => bytes[offset + i] === value);

const ascii = (text: string): number[] => Array.from(text, (ch) => ch.charCodeAt(0));

export const detectContentType = (bytes: Uint8Array): AssetContentType => {
  if (startsWith(bytes, [0x89, 0x50, 0x4e, 0x47])) {
    return "png";
  }
  if (startsWith(bytes, [0xff, 0xd8, 0xff])) {
    return "jpeg";
  }
  if (startsWith(bytes, ascii("RIFF")) && startsWith(bytes, ascii("WAVE"), 8)) {
    return "wav";
  }
  if (
    startsWith(bytes, [0x00, 0x01, 0x00, 0x00]) ||
    startsWith(bytes, ascii("OTTO")) ||
    startsWith(bytes, ascii("true"))
  ) {
    return "ttf";
  }
  return "text";
};

export type AssetSource = (id: string) => Uint8Array | null;

/**
 * Hands out asset blobs by stable identifier. Bytes are read from the source
 * once and shared by every caller for the life of the process.
 */
export class AssetRegistry {
  private readonly cache = new Map<string, AssetBlob>();

  constructor(private readonly source: AssetSource) {}

  register(id: string, bytes: Uint8Array): AssetBlob {
    const blob: AssetBlob = {
      id,
      contentType: detectContentType(bytes),
      byteLength: bytes.byteLength,
      bytes,
    };
    this.cache.set(id, blob);
    return blob;
  }

  has(id: string): boolean {
    return this.cache.has(id) || this.source(id) !== null;
  }

  get(id: string): AssetBlob {
    const cached = this.cache.get(id);
    if (cached) {
      return cached;
    }
    const bytes = this.source(id);
    if (!bytes) {
      throw new AssetDecodeError(id, "asset is not bundled");
    }
    return this.register(id, bytes);
  }

  text(id: string): string {
    const blob = this.get(id);
    if (blob.contentType !== "text") {
      throw new AssetDecodeError(id, `expected text, found ${blob.contentType}`);
    }
    return new TextDecoder().decode(blob.bytes);
  }

  json(id: string): unknown {
    try {
      return JSON.parse(this.text(id));
    } catch (error) {
      if (error instanceof AssetDecodeError) {
        throw error;
      }
      throw new AssetDecodeError(id, "malformed JSON", { cause: error });
    }
  }
}

/** Walks up from `start` to the directory holding package.json and assets/. */
export const findPackageRoot = (start: string): string => {
  let current = start;
  for (;;) {
    if (existsSync(path.join(current, "package.json")) && existsSync(path.join(current, "assets"))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new Error(`No package root with an assets directory above ${start}.`);
    }
    current = parent;
  }
};

export const defaultAssetDirectory = (): string =>
  path.join(findPackageRoot(path.dirname(fileURLToPath(import.meta.url))), "assets");

/** Asset ids are file names without their extension. */
export const createDirectoryAssetSource = (directory: string): AssetSource => {
  const files = new Map<string, string>();
  for (const name of readdirSync(directory)) {
    const id = name.replace(/\.[^.]+$/, "");
    files.set(id, path.join(directory, name));
  }
  return (id) => {
    const file = files.get(id);
    return file ? new Uint8Array(readFileSync(file)) : null;
  };
};

export const createAssetRegistry = (directory = defaultAssetDirectory()): AssetRegistry =>
  new AssetRegistry(createDirectoryAssetSource(directory));
