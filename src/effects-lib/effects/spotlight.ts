import type { GeometryVertex, Renderer, Texture, Viewport } from "../../platform/types.js";
import type { CommonOptions, EffectDefinition, EffectInstance } from "../../runtime/effect.js";
import { bounceWalls, integrate, type Body } from "../kinematics.js";
import { randBelow, TAU, type RandomSource } from "../math.js";
import { backgroundOrFallback } from "./fadeout.js";

export const SPOTLIGHT_RADIUS = 120;
export const SPOTLIGHT_SEGMENTS = 32;
const REFERENCE_FRAME = 0.016;

/**
 * Triangle fan over `segments + 1` vertices. Texture coordinates equal the
 * normalised screen position, so the disc shows the part of the background
 * that lies under it.
 */
export const spotlightFan = (
  center: { x: number; y: number },
  radius: number,
  viewport: Viewport,
  segments = SPOTLIGHT_SEGMENTS,
): { vertices: GeometryVertex[]; indices: number[] } => {
  const vertex = (x: number, y: number): GeometryVertex => ({
    x,
    y,
    u: x / viewport.width,
    v: y / viewport.height,
  });
  const vertices = [vertex(center.x, center.y)];
  for (let i = 0; i < segments; i += 1) {
    const angle = (TAU * i) / segments;
    vertices.push(vertex(center.x + radius * Math.cos(angle), center.y + radius * Math.sin(angle)));
  }
  const indices: number[] = [];
  for (let i = 0; i < segments; i += 1) {
    indices.push(0, i + 1, ((i + 1) % segments) + 1);
  }
  return { vertices, indices };
};

/** Red/green ramp used when the screen cannot be captured. */
export const gradientFallbackPixels = ({ width, height }: Viewport): Uint8ClampedArray => {
  const pixels = new Uint8ClampedArray(width * height * 4);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const offset = (y * width + x) * 4;
      pixels[offset] = Math.trunc((x * 255) / width);
      pixels[offset + 1] = Math.trunc((y * 255) / height);
      pixels[offset + 2] = 100;
      pixels[offset + 3] = 255;
    }
  }
  return pixels;
};

/** Wandering beam: a fresh heading at 20–30 px/s every 60–180 frames. */
export class Beam {
  readonly body: Body;
  framesLeft = 0;

  constructor(
    private readonly viewport: Viewport,
    private readonly rand: RandomSource,
    readonly radius = SPOTLIGHT_RADIUS,
  ) {
    this.body = { x: viewport.width / 2, y: viewport.height / 2, vx: 0, vy: 0 };
  }

  step(dt: number, speed: number): void {
    if (this.framesLeft <= 0) {
      const angle = (randBelow(this.rand, 360) * Math.PI) / 180;
      const pace = 20 + randBelow(this.rand, 100) / 10;
      this.body.vx = Math.cos(angle) * pace;
      this.body.vy = Math.sin(angle) * pace;
      this.framesLeft = 60 + randBelow(this.rand, 120);
    }
    this.framesLeft -= dt / REFERENCE_FRAME;
    integrate(this.body, dt, speed);
    const r = this.radius;
    bounceWalls(this.body, {
      minX: r,
      minY: r,
      maxX: this.viewport.width - r,
      maxY: this.viewport.height - r,
    });
  }
}

class SpotlightInstance implements EffectInstance {
  constructor(
    private readonly viewport: Viewport,
    private readonly options: CommonOptions,
    private readonly renderer: Renderer,
    private readonly background: Texture,
    private readonly beam: Beam,
  ) {}

  update(dt: number): void {
    this.beam.step(dt, this.options.speed);
  }

  render(renderer: Renderer): void {
    const { vertices, indices } = spotlightFan(this.beam.body, this.beam.radius, this.viewport);
    renderer.blitGeometry(this.background, vertices, indices);
  }

  teardown(): void {
    this.renderer.destroyTexture(this.background);
  }
}

export const SpotlightDefinition: EffectDefinition = {
  type: "spotlight",
  title: "Spotlight",
  flags: [],
  assets: [],
  parseOptions: (args) => args.common,
  init: async (context, options) =>
    new SpotlightInstance(
      context.viewport,
      options,
      context.renderer,
      await backgroundOrFallback(context, "spotlight", gradientFallbackPixels),
      new Beam(context.viewport, () => context.rng.next()),
    ),
};
