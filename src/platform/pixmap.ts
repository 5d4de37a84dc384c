import type { AssetRegistry } from "./assets.js";
import { AssetDecodeError } from "./errors.js";
import type { Renderer, Texture } from "./types.js";

/**
 * Pixel-art sheet stored as text: `rows` holds `height` strings of
 * `width · frames` palette keys, frames laid out left to right. A key missing
 * from the palette (conventionally ".") is transparent.
 */
export interface PixelMapDocument {
  readonly width: number;
  readonly height: number;
  readonly frames: number;
  readonly palette: Readonly<Record<string, string>>;
  readonly rows: readonly string[];
}

export interface DecodedPixelMap {
  readonly frameWidth: number;
  readonly frameHeight: number;
  readonly frameCount: number;
  readonly width: number;
  readonly height: number;
  readonly pixels: Uint8ClampedArray;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0;

export const parseHexColor = (hex: string): [number, number, number, number] | null => {
  const match = /^#([0-9a-f]{6})([0-9a-f]{2})?$/i.exec(hex);
  if (!match) {
    return null;
  }
  const rgb = Number.parseInt(match[1], 16);
  const alpha = match[2] === undefined ? 255 : Number.parseInt(match[2], 16);
  return [(rgb >> 16) & 0xff, (rgb >> 8) & 0xff, rgb & 0xff, alpha];
};

export const readPixelMapDocument = (id: string, value: unknown): PixelMapDocument => {
  if (!isRecord(value)) {
    throw new AssetDecodeError(id, "pixel map must be an object");
  }
  const { width, height, frames, palette, rows } = value;
  if (!isPositiveInteger(width) || !isPositiveInteger(height) || !isPositiveInteger(frames)) {
    throw new AssetDecodeError(id, "width, height and frames must be positive integers");
  }
  if (!isRecord(palette) || !Object.values(palette).every((entry) => typeof entry === "string")) {
    throw new AssetDecodeError(id, "palette must map keys to colour strings");
  }
  if (!Array.isArray(rows) || rows.length !== height) {
    throw new AssetDecodeError(id, `expected ${height} rows`);
  }
  const lines: string[] = [];
  for (const row of rows) {
    if (typeof row !== "string" || row.length !== width * frames) {
      throw new AssetDecodeError(id, `every row must hold ${width * frames} keys`);
    }
    lines.push(row);
  }
  const colours: Record<string, string> = {};
  for (const [key, entry] of Object.entries(palette)) {
    if (typeof entry === "string") {
      colours[key] = entry;
    }
  }
  return { width, height, frames, palette: colours, rows: lines };
};

export const decodePixelMap = (id: string, document: PixelMapDocument): DecodedPixelMap => {
  const width = document.width * document.frames;
  const pixels = new Uint8ClampedArray(width * document.height * 4);
  const palette = new Map<string, [number, number, number, number]>();
  for (const [key, hex] of Object.entries(document.palette)) {
    const rgba = parseHexColor(hex);
    if (!rgba) {
      throw new AssetDecodeError(id, `bad colour ${hex} for key "${key}"`);
    }
    palette.set(key, rgba);
  }
  document.rows.forEach((row, y) => {
    for (let x = 0; x < width; x += 1) {
      const rgba = palette.get(row[x]);
      if (!rgba) {
        continue;
      }
      pixels.set(rgba, (y * width + x) * 4);
    }
  });
  return {
    frameWidth: document.width,
    frameHeight: document.height,
    frameCount: document.frames,
    width,
    height: document.height,
    pixels,
  };
};

export interface LoadedSheet {
  readonly texture: Texture;
  readonly frameWidth: number;
  readonly frameHeight: number;
  readonly frameCount: number;
}

/** Decodes a pixel-map, PNG or JPEG asset into a texture owned by `renderer`. */
export const loadSheet = async (
  assets: AssetRegistry,
  renderer: Renderer,
  id: string,
  frameCount = 1,
): Promise<LoadedSheet> => {
  const blob = assets.get(id);
  if (blob.contentType === "png" || blob.contentType === "jpeg") {
    try {
      const texture = await renderer.decodeImage(blob.bytes);
      return {
        texture,
        frameWidth: Math.floor(texture.width / frameCount),
        frameHeight: texture.height,
        frameCount,
      };
    } catch (error) {
      throw new AssetDecodeError(id, "image decode failed", { cause: error });
    }
  }
  if (blob.contentType !== "text") {
    throw new AssetDecodeError(id, `cannot decode ${blob.contentType} as an image`);
  }
  const decoded = decodePixelMap(id, readPixelMapDocument(id, assets.json(id)));
  return {
    texture: renderer.createTexture(decoded.width, decoded.height, decoded.pixels),
    frameWidth: decoded.frameWidth,
    frameHeight: decoded.frameHeight,
    frameCount: decoded.frameCount,
  };
};
