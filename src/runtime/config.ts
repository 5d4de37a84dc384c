import type { Viewport } from "../platform/types.js";

export interface RuntimeConfiguration {
  /** Pointer motion is ignored for this long after start. */
  readonly graceMs: number;
  /** Sleep at the end of every frame. */
  readonly frameMs: number;
  /** Upper bound on the per-frame step handed to `update`. */
  readonly maxStepSeconds: number;
  readonly fallbackViewport: Viewport;
  /** Fixed seed for the effect's generator; random when absent. */
  readonly seed?: number | string;
  /** Shown over the first frames of the run, e.g. by the randomiser. */
  readonly banner?: string;
  readonly bannerSeconds: number;
}

export const defaultRuntimeConfiguration: RuntimeConfiguration = {
  graceMs: 2000,
  frameMs: 16,
  maxStepSeconds: 0.05,
  fallbackViewport: { width: 800, height: 600 },
  bannerSeconds: 3,
};

export const resolveRuntimeConfiguration = (
  overrides: Partial<RuntimeConfiguration> = {},
): RuntimeConfiguration => ({ ...defaultRuntimeConfiguration, ...overrides });
