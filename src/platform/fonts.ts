import path from "node:path";

import { GlobalFonts } from "@napi-rs/canvas";

import { FontUnavailable } from "./errors.js";
import type { FontHandle } from "./types.js";

export const SANS_BOLD_FONTS: readonly string[] = [
  "/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf",
  "/usr/share/fonts/truetype/ttf-dejavu/DejaVuSans-Bold.ttf",
  "/usr/share/fonts/TTF/DejaVuSans-Bold.ttf",
  "/usr/share/fonts/TTF/DejaVuSans.ttf",
  "/usr/share/fonts/truetype/freefont/FreeSansBold.ttf",
];

export const MONO_BOLD_FONTS: readonly string[] = [
  "/usr/share/fonts/truetype/dejavu/DejaVuSansMono-Bold.ttf",
  "/usr/share/fonts/TTF/DejaVuSansMono-Bold.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationMono-Bold.ttf",
  "/usr/share/fonts/liberation/LiberationMono-Bold.ttf",
  "/usr/share/fonts/truetype/freefont/FreeMonoBold.ttf",
  "/usr/share/fonts/gnu-free/FreeMonoBold.otf",
];

export const MONO_FONTS: readonly string[] = [
  "/usr/share/fonts/truetype/dejavu/DejaVuSansMono.ttf",
  "/usr/share/fonts/TTF/DejaVuSansMono.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationMono-Regular.ttf",
  "/usr/share/fonts/liberation/LiberationMono-Regular.ttf",
  ...MONO_BOLD_FONTS,
];

export interface FontLoader {
  /** Tries each candidate in order; throws `FontUnavailable` when none opens. */
  load(candidates: readonly string[], size: number): FontHandle;
}

export type FontRegistrar = (file: string, family: string) => boolean;

const registerWithCanvas: FontRegistrar = (file, family) =>
  GlobalFonts.registerFromPath(file, family);

export class CanvasFontLoader implements FontLoader {
  private readonly families = new Map<string, string | null>();

  constructor(private readonly register: FontRegistrar = registerWithCanvas) {}

  load(candidates: readonly string[], size: number): FontHandle {
    for (const file of candidates) {
      const family = this.familyFor(file);
      if (family) {
        return { family, size, path: file };
      }
    }
    throw new FontUnavailable(candidates);
  }

  private familyFor(file: string): string | null {
    const known = this.families.get(file);
    if (known !== undefined) {
      return known;
    }
    const family = `saver-${path.basename(file).replace(/\.[^.]+$/, "")}`;
    let registered = false;
    try {
      registered = this.register(file, family);
    } catch {
      registered = false;
    }
    const result = registered ? family : null;
    this.families.set(file, result);
    return result;
  }
}
