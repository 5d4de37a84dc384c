import type { Color, Point, Viewport } from "../platform/types.js";
import { clamp01, randBelow, type RandomSource } from "./math.js";

export type Edge = readonly [number, number];

export interface ConstellationTemplate {
  readonly name: string;
  readonly vertices: readonly Point[];
  readonly edges: readonly Edge[];
}

export interface ConstellationStyle {
  readonly template: ConstellationTemplate;
  readonly line: Color;
  readonly star: Color;
  readonly background: Color;
}

export type MorphPhase = "scatter" | "connect" | "hold" | "dissolve";

export interface MorphStar {
  x: number;
  y: number;
  targetX: number;
  targetY: number;
  /** Reveal fraction of the edges whose first vertex is this star. */
  connectProgress: number;
}

export interface MorphTiming {
  /** Seconds per phase before the speed multiplier. */
  readonly phaseDuration: number;
  /** HOLD lasts `holdFactor · phaseDuration`. */
  readonly holdFactor: number;
  /**
   * DISSOLVE ends after `dissolveFactor · phaseDuration`; null keeps the group
   * dissolving until its owner reselects.
   */
  readonly dissolveFactor: number | null;
  /** Width of the uniform integer jitter applied once dissolve is far enough along. */
  readonly jitterSpan: number;
}

export const SINGLE_GROUP_TIMING: MorphTiming = {
  phaseDuration: 3,
  holdFactor: 2,
  dissolveFactor: 1.5,
  jitterSpan: 200,
};

export const MULTI_GROUP_TIMING: MorphTiming = {
  phaseDuration: 3,
  holdFactor: 4,
  dissolveFactor: null,
  jitterSpan: 150,
};

export const rotatePoint = (p: Point, angle: number, scale = 1): Point => {
  const x = p.x * scale;
  const y = p.y * scale;
  return {
    x: x * Math.cos(angle) - y * Math.sin(angle),
    y: x * Math.sin(angle) + y * Math.cos(angle),
  };
};

/**
 * Running state of one constellation: stars fly in (SCATTER), edges are
 * revealed one after another (CONNECT), the figure is held (HOLD), then edges
 * recede and the stars drift apart (DISSOLVE).
 */
export class ConstellationMorph {
  phase: MorphPhase = "scatter";
  timer = 0;
  readonly stars: MorphStar[];

  constructor(
    readonly template: ConstellationTemplate,
    private readonly timing: MorphTiming,
    start: (index: number) => Point,
    target: (vertex: Point) => Point,
  ) {
    this.stars = template.vertices.map((vertex, index) => {
      const from = start(index);
      const to = target(vertex);
      return { x: from.x, y: from.y, targetX: to.x, targetY: to.y, connectProgress: 0 };
    });
  }

  /**
   * Advances the phase timer by `dt · speed`. Returns true when a timed
   * DISSOLVE has run out and the owner should move to the next figure.
   */
  step(dt: number, speed: number, rand: RandomSource): boolean {
    const { phaseDuration: duration, holdFactor, dissolveFactor, jitterSpan } = this.timing;
    const edgeCount = this.template.edges.length;
    this.timer += dt * speed;

    switch (this.phase) {
      case "scatter": {
        const t = clamp01(Math.min(1, this.timer / duration) * speed);
        for (const star of this.stars) {
          star.x += (star.targetX - star.x) * t * 0.1;
          star.y += (star.targetY - star.y) * t * 0.1;
        }
        if (this.timer >= duration) {
          this.advance("connect", duration);
        }
        return false;
      }
      case "connect": {
        const progress = this.timer / duration;
        this.template.edges.forEach(([v1], i) => {
          this.stars[v1].connectProgress = clamp01(progress * edgeCount - i);
        });
        if (this.timer >= duration) {
          this.advance("hold", duration);
        }
        return false;
      }
      case "hold":
        if (this.timer >= duration * holdFactor) {
          this.advance("dissolve", duration * holdFactor);
        }
        return false;
      case "dissolve": {
        const progress = this.timer / duration;
        this.template.edges.forEach(([v1], i) => {
          this.stars[v1].connectProgress = clamp01(1 - progress * edgeCount + i);
        });
        // Preserved heuristic: compares progress against a tenth of the edge count.
        if (progress >= edgeCount * 0.1) {
          const half = jitterSpan / 2;
          for (const star of this.stars) {
            star.x += (randBelow(rand, jitterSpan) - half) * progress;
            star.y += (randBelow(rand, jitterSpan) - half) * progress;
          }
        }
        return dissolveFactor !== null && this.timer >= duration * dissolveFactor;
      }
    }
  }

  /** Visible segments: each edge drawn from v1 toward v2 by v1's progress. */
  segments(): Array<{ from: Point; to: Point }> {
    const result: Array<{ from: Point; to: Point }> = [];
    for (const [v1, v2] of this.template.edges) {
      const a = this.stars[v1];
      const b = this.stars[v2];
      if (!a || !b || a.connectProgress <= 0) {
        continue;
      }
      const p = a.connectProgress;
      result.push({
        from: { x: a.x, y: a.y },
        to: { x: a.x + (b.x - a.x) * p, y: a.y + (b.y - a.y) * p },
      });
    }
    return result;
  }

  private advance(next: MorphPhase, elapsed: number) {
    this.phase = next;
    this.timer -= elapsed;
  }
}

export interface Bounds {
  readonly left: number;
  readonly right: number;
  readonly top: number;
  readonly bottom: number;
}

export const rotatedBounds = (template: ConstellationTemplate, angle: number): Bounds => {
  let left = Infinity;
  let right = -Infinity;
  let top = Infinity;
  let bottom = -Infinity;
  for (const vertex of template.vertices) {
    const p = rotatePoint(vertex, angle);
    left = Math.min(left, p.x);
    right = Math.max(right, p.x);
    top = Math.min(top, p.y);
    bottom = Math.max(bottom, p.y);
  }
  return { left, right, top, bottom };
};

export const translateBounds = (b: Bounds, p: Point): Bounds => ({
  left: b.left + p.x,
  right: b.right + p.x,
  top: b.top + p.y,
  bottom: b.bottom + p.y,
});

/** True when the boxes come within `gap` pixels of each other. */
export const boundsOverlap = (a: Bounds, b: Bounds, gap: number): boolean =>
  !(
    a.right + gap < b.left ||
    a.left - gap > b.right ||
    a.bottom + gap < b.top ||
    a.top - gap > b.bottom
  );

export interface PlacementOptions {
  readonly margin: number;
  readonly gap: number;
  readonly attempts: number;
}

export const DEFAULT_PLACEMENT: PlacementOptions = { margin: 50, gap: 20, attempts: 200 };

export interface Placement {
  /** Group centres relative to the viewport centre. */
  readonly offsets: readonly Point[];
  readonly attempts: number;
  readonly fits: boolean;
}

/**
 * Rejection sampling: draw a centre per group inside the margin, accept when
 * every rotated box stays inside the margin and clears every earlier box by
 * the gap. After the last attempt the final candidate is used as is.
 */
export const placeGroups = (
  templates: readonly ConstellationTemplate[],
  rotations: readonly number[],
  viewport: Viewport,
  rand: RandomSource,
  options: PlacementOptions = DEFAULT_PLACEMENT,
): Placement => {
  const { margin, gap } = options;
  const { width: W, height: H } = viewport;
  const local = templates.map((template, i) => rotatedBounds(template, rotations[i] ?? 0));
  let candidates: Point[] = [];

  for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
    candidates = templates.map(() => ({
      x: randBelow(rand, W - 2 * margin) + margin,
      y: randBelow(rand, H - 2 * margin) + margin,
    }));
    const placed = local.map((bounds, i) => translateBounds(bounds, candidates[i]));
    const fits = placed.every((box, i) => {
      const inside =
        box.left >= margin && box.right <= W - margin && box.top >= margin && box.bottom <= H - margin;
      return inside && placed.slice(0, i).every((other) => !boundsOverlap(box, other, gap));
    });
    if (fits) {
      return { offsets: toOffsets(candidates, viewport), attempts: attempt, fits: true };
    }
  }
  return { offsets: toOffsets(candidates, viewport), attempts: options.attempts, fits: false };
};

const toOffsets = (candidates: readonly Point[], viewport: Viewport): Point[] =>
  candidates.map((c) => ({
    x: c.x - Math.trunc(viewport.width / 2),
    y: c.y - Math.trunc(viewport.height / 2),
  }));

/** `count` distinct indices below `size`, drawn without replacement. */
export const pickDistinct = (rand: RandomSource, size: number, count: number): number[] => {
  const picked: number[] = [];
  while (picked.length < Math.min(count, size)) {
    const index = randBelow(rand, size);
    if (!picked.includes(index)) {
      picked.push(index);
    }
  }
  return picked;
};

export interface ActiveGroup {
  readonly style: ConstellationStyle;
  readonly paletteIndex: number;
  readonly rotation: number;
  offset: Point;
  morph: ConstellationMorph;
}

/**
 * Three constellations morphing side by side. Once every group has spent two
 * phase durations dissolving, a fresh triplet is drawn and placed.
 */
export class ConstellationTriplet {
  groups: ActiveGroup[];
  reselections = 0;

  constructor(
    private readonly palette: readonly ConstellationStyle[],
    private readonly viewport: Viewport,
    private readonly rand: RandomSource,
    private readonly timing: MorphTiming = MULTI_GROUP_TIMING,
  ) {
    const { height: H } = viewport;
    const initialY = [-Math.trunc(H / 6), 0, Math.trunc(H / 6)];
    this.groups = [0, 1, 2]
      .filter((index) => index < palette.length)
      .map((index, slot) =>
        this.createGroup(index, this.randomRotation(), { x: 0, y: initialY[slot] }),
      );
  }

  allDissolved(): boolean {
    const threshold = this.timing.phaseDuration * 2;
    return this.groups.every((group) => group.morph.phase === "dissolve" && group.morph.timer >= threshold);
  }

  step(dt: number, speed: number): void {
    if (this.allDissolved()) {
      this.reselect();
    }
    for (const group of this.groups) {
      group.morph.step(dt, speed, this.rand);
    }
  }

  reselect(): void {
    const indices = pickDistinct(this.rand, this.palette.length, 3);
    const rotations = indices.map(() => this.randomRotation());
    const placement = placeGroups(
      indices.map((index) => this.palette[index].template),
      rotations,
      this.viewport,
      this.rand,
    );
    this.groups = indices.map((index, slot) =>
      this.createGroup(index, rotations[slot], placement.offsets[slot]),
    );
    this.reselections += 1;
  }

  private randomRotation(): number {
    return (randBelow(this.rand, 360) * Math.PI) / 180;
  }

  private createGroup(paletteIndex: number, rotation: number, offset: Point): ActiveGroup {
    const { width: W, height: H } = this.viewport;
    const style = this.palette[paletteIndex];
    const morph = new ConstellationMorph(
      style.template,
      this.timing,
      () => ({
        x: randBelow(this.rand, Math.trunc(W / 2)) - W / 4,
        y: randBelow(this.rand, H) - H / 2,
      }),
      (vertex) => rotatePoint(vertex, rotation),
    );
    return { style, paletteIndex, rotation, offset, morph };
  }
}

/** Single figure at a time, cycling through `sequence` in order. */
export class ConstellationSequence {
  index = 0;
  morph: ConstellationMorph;

  constructor(
    private readonly sequence: readonly ConstellationTemplate[],
    private readonly viewport: Viewport,
    private readonly rand: RandomSource,
    private readonly scale = 2,
    private readonly timing: MorphTiming = SINGLE_GROUP_TIMING,
  ) {
    if (sequence.length === 0) {
      throw new Error("constellation sequence is empty");
    }
    this.morph = this.createMorph();
  }

  get current(): ConstellationTemplate {
    return this.sequence[this.index];
  }

  step(dt: number, speed: number): void {
    if (this.morph.step(dt, speed, this.rand)) {
      this.index = (this.index + 1) % this.sequence.length;
      this.morph = this.createMorph();
    }
  }

  private createMorph(): ConstellationMorph {
    const { width: W, height: H } = this.viewport;
    return new ConstellationMorph(
      this.current,
      this.timing,
      () => ({ x: randBelow(this.rand, W) - W / 2, y: randBelow(this.rand, H) - H / 2 }),
      (vertex) => ({ x: vertex.x * this.scale, y: vertex.y * this.scale }),
    );
  }
}

export interface ConstellationCatalog {
  readonly shapes: ReadonlyMap<string, ConstellationTemplate>;
  readonly palette: readonly ConstellationStyle[];
  readonly classicSequence: readonly ConstellationTemplate[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readPair = (value: unknown): readonly [number, number] | null =>
  Array.isArray(value) &&
  value.length === 2 &&
  typeof value[0] === "number" &&
  typeof value[1] === "number"
    ? [value[0], value[1]]
    : null;

const readColor = (value: unknown): Color | null => {
  if (!Array.isArray(value) || value.length < 3 || value.length > 4) {
    return null;
  }
  const channels = value.filter((entry): entry is number => typeof entry === "number");
  if (channels.length !== value.length) {
    return null;
  }
  const [r, g, b, a = 255] = channels;
  return { r, g, b, a };
};

/**
 * Validates the `constellations` asset: named shapes, the multi-group palette
 * referencing shapes by name, and the classic figure order.
 */
export const readConstellationCatalog = (value: unknown): ConstellationCatalog => {
  if (!isRecord(value) || !isRecord(value.shapes)) {
    throw new Error("constellations: expected an object with shapes");
  }
  const shapes = new Map<string, ConstellationTemplate>();
  for (const [name, entry] of Object.entries(value.shapes)) {
    if (!isRecord(entry) || !Array.isArray(entry.vertices) || !Array.isArray(entry.edges)) {
      throw new Error(`constellations: shape ${name} needs vertices and edges`);
    }
    const vertices: Point[] = [];
    for (const raw of entry.vertices) {
      const pair = readPair(raw);
      if (!pair) {
        throw new Error(`constellations: shape ${name} has a malformed vertex`);
      }
      vertices.push({ x: pair[0], y: pair[1] });
    }
    const edges: Edge[] = [];
    for (const raw of entry.edges) {
      const pair = readPair(raw);
      if (!pair || pair.some((v) => !Number.isInteger(v) || v < 0 || v >= vertices.length)) {
        throw new Error(`constellations: shape ${name} has an edge outside its vertices`);
      }
      edges.push(pair);
    }
    shapes.set(name, { name, vertices, edges });
  }

  const lookup = (name: unknown): ConstellationTemplate => {
    const template = typeof name === "string" ? shapes.get(name) : undefined;
    if (!template) {
      throw new Error(`constellations: unknown shape ${String(name)}`);
    }
    return template;
  };

  const palette: ConstellationStyle[] = [];
  for (const entry of Array.isArray(value.palettes) ? value.palettes : []) {
    if (!isRecord(entry)) {
      throw new Error("constellations: palette entries must be objects");
    }
    const line = readColor(entry.line);
    const star = readColor(entry.star);
    const background = readColor(entry.background);
    if (!line || !star || !background) {
      throw new Error(`constellations: palette for ${String(entry.shape)} has a bad colour`);
    }
    palette.push({ template: lookup(entry.shape), line, star, background });
  }

  const sequence = Array.isArray(value.classicSequence) ? value.classicSequence : [];
  return { shapes, palette, classicSequence: sequence.map(lookup) };
};
