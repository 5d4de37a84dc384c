import { existsSync, readFileSync, rmSync } from "node:fs";
import path from "node:path";

import { describeError } from "../platform/errors.js";
import type { Texture } from "../platform/types.js";
import type { EffectContext } from "./effect.js";

/**
 * Captures the screen through the compositor into `<name>_temp.png` in the
 * working directory, decodes it and deletes the file. Resolves null when
 * capture or decode fails so callers can fall back.
 */
export const captureScreenTexture = async (
  context: EffectContext,
  name: string,
): Promise<Texture | null> => {
  const file = path.resolve(`${name}_temp.png`);
  try {
    const captured = await context.platform.compositor.captureScreen(file);
    if (!captured || !existsSync(file)) {
      context.logger.debug("screen capture unavailable, using fallback");
      return null;
    }
    return await context.renderer.decodeImage(new Uint8Array(readFileSync(file)));
  } catch (error) {
    context.logger.warn(`screen capture unusable: ${describeError(error)}`);
    return null;
  } finally {
    rmSync(file, { force: true });
  }
};
