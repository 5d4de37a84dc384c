import { describe, expect, test } from "vitest";

import { createAssetRegistry } from "../../platform/assets.js";
import { AssetDecodeError } from "../../platform/errors.js";
import { createRandomGenerator } from "../../runtime/rng.js";
import { City, layerScale, MAX_WEATHER, skyColor } from "../effects/cityscape.js";
import { fadeFrame, maxHoleRadius, tendrilPaths } from "../effects/fadeout.js";
import {
  FISH_SPECIES,
  layoutBubbles,
  layoutFish,
  readAquarium,
  type Aquarium,
} from "../effects/fishSaver.js";
import { logoTransform } from "../effects/logo.js";
import { PaperFire } from "../effects/paperFire.js";
import { Beam, gradientFallbackPixels, spotlightFan } from "../effects/spotlight.js";
import { MAX_METEORS, NightSky, skyStarCount } from "../effects/starryNight.js";
import { layoutFlight, readFlightTable, type FlightTable } from "../effects/toasterSaver.js";
import { warpKeyframe } from "../effects/warp.js";
import { bounceInside, collideWithBody, wiggleHeading, type Worm } from "../effects/worms.js";
import { rgba } from "../math.js";
import { Trail } from "../trail.js";

const assets = createAssetRegistry();

describe("toaster flight", () => {
  const table: FlightTable = {
    spriteSize: 64,
    displacement: 1600,
    flapCycle: 0.4,
    entities: [
      {
        kind: "toaster",
        anim: { flyDuration: 10, delay: 0, direction: 1 },
        pose: { right: 10, top: 20 },
        variant: 0,
      },
      {
        kind: "toaster",
        anim: { flyDuration: 10, delay: 0, direction: -1 },
        pose: { right: 30, top: 40 },
        variant: 0,
      },
      {
        kind: "toast",
        anim: { flyDuration: 10, delay: 5, direction: 1 },
        pose: { right: 50, top: 0 },
        variant: 2,
      },
    ],
  };
  const viewport = { width: 1000, height: 500 };
  const options = { speed: 1, fullscreen: true, toasters: 1, toasts: 5 };

  test("movers wait for their delay and respect the caps", () => {
    expect(layoutFlight(table, viewport, 2.57, options)).toEqual([
      { kind: "toaster", x: 456, y: 479, frame: 3 },
    ]);
  });

  test("toasts are laid out before toasters", () => {
    const draws = layoutFlight(table, viewport, 7.57, options);
    expect(draws.map((draw) => draw.kind)).toEqual(["toast", "toaster"]);
    expect(draws[0]).toEqual({ kind: "toast", x: 56, y: 379, frame: 2 });
    expect(draws[1].frame).toBe(1);
  });

  test("zero caps draw nothing", () => {
    expect(layoutFlight(table, viewport, 7.57, { ...options, toasters: 0, toasts: 0 })).toEqual([]);
  });

  test("the bundled table resolves every entity", () => {
    const bundled = readFlightTable(assets.json("toaster_flight"));
    expect(bundled.spriteSize).toBe(64);
    expect(bundled.entities.filter((entity) => entity.kind === "toast")).toHaveLength(12);
    expect(bundled.entities).toHaveLength(49);
  });

  test("entities must reference a known anim and pose", () => {
    const value = {
      spriteSize: 64,
      displacement: 1600,
      flapCycle: 0.4,
      anims: {},
      poses: {},
      entities: [{ kind: "toaster", anim: "missing", pose: "missing" }],
    };
    expect(() => readFlightTable(value)).toThrow(AssetDecodeError);
  });
});

describe("aquarium layout", () => {
  const aquarium: Aquarium = {
    fishSize: 100,
    swimFramePeriod: 0.5,
    bubbleWidth: 20,
    bubbleHeight: 20,
    bubbleFramePeriod: 0.25,
    rows: [10, 50],
    toggleRow: 1,
    toggleOffset: 10,
    pathFrom: 0,
    pathTo: 1,
    fish: [
      { anim: { flyDuration: 10, delay: 0, direction: 1 }, row: 0, species: FISH_SPECIES[0] },
      { anim: { flyDuration: 10, delay: 0, direction: -1 }, row: 1, species: FISH_SPECIES[1] },
      { anim: { flyDuration: 10, delay: 20, direction: 1 }, row: 0, species: FISH_SPECIES[2] },
    ],
    bubbles: [{ anim: { flyDuration: 4, delay: 0, direction: 1 }, x: 50 }],
    floorFallbackTop: 90,
    floorFallbackColor: rgba(139, 69, 19),
  };
  const viewport = { width: 1000, height: 500 };

  test("fish cross the path and right-to-left swimmers are mirrored", () => {
    expect(layoutFish(aquarium, viewport, 2.5, 10)).toEqual([
      { species: FISH_SPECIES[0], x: 200, y: 0, frame: 1, flip: false },
      { species: FISH_SPECIES[1], x: 700, y: 200, frame: 1, flip: true },
    ]);
  });

  test("the toggle row drops in the second half of each crossing", () => {
    const [, second] = layoutFish(aquarium, viewport, 7.5, 10);
    expect(second).toEqual({ species: FISH_SPECIES[1], x: 200, y: 250, frame: 1, flip: true });
  });

  test("the fish cap limits how many are drawn", () => {
    expect(layoutFish(aquarium, viewport, 2.5, 1)).toHaveLength(1);
  });

  test("bubbles rise from below the floor", () => {
    expect(layoutBubbles(aquarium, viewport, 1, 5)).toEqual([{ x: 490, y: 390, frame: 0 }]);
    expect(layoutBubbles(aquarium, viewport, 1, 0)).toEqual([]);
  });

  test("the bundled aquarium parses", () => {
    const bundled = readAquarium(assets.json("aquarium"));
    expect(bundled.fish.length).toBeGreaterThan(0);
    expect(bundled.toggleRow).toBeLessThan(bundled.rows.length);
  });

  test("malformed aquariums are rejected", () => {
    expect(() => readAquarium({ anims: "nope" })).toThrow(AssetDecodeError);
  });
});

describe("fade out", () => {
  const viewport = { width: 800, height: 600 };

  test("the hole reaches past the corners", () => {
    expect(maxHoleRadius(viewport)).toBe(550);
  });

  test("the hole grows cubically and loops", () => {
    expect(fadeFrame(0, 1, viewport)).toEqual({
      progress: 0,
      radius: 10,
      backgroundAlpha: 255,
      tendrils: true,
    });
    const middle = fadeFrame(2.5, 1, viewport);
    expect(middle.radius).toBeCloseTo(77.5);
    expect(middle.backgroundAlpha).toBe(223);
    expect(fadeFrame(2.5, 2, viewport).progress).toBe(0);
    expect(fadeFrame(4.5, 1, viewport).tendrils).toBe(true);
    expect(fadeFrame(4.8, 1, viewport).tendrils).toBe(false);
  });

  test("tendrils start just inside the hole edge", () => {
    const paths = tendrilPaths({ x: 100, y: 100 }, 100);
    expect(paths).toHaveLength(8);
    expect(paths[0]).toHaveLength(10);
    expect(paths[0][0].x).toBeCloseTo(180);
    expect(paths[0][0].y).toBeCloseTo(100);
  });
});

describe("warp", () => {
  test("fades in, rushes outward and fades out", () => {
    expect(warpKeyframe(0)).toEqual({ opacity: 0, scale: 0.5 });
    expect(warpKeyframe(0.25)).toEqual({ opacity: 127, scale: 0.75 });
    expect(warpKeyframe(0.5)).toEqual({ opacity: 255, scale: 1 });
    expect(warpKeyframe(0.85)).toEqual({ opacity: 255, scale: 2.8 });
    const tail = warpKeyframe(0.925);
    expect(tail.opacity).toBe(127);
    expect(tail.scale).toBeCloseTo(3.15);
  });
});

describe("logo", () => {
  test("pulses and spins over a fifty second cycle", () => {
    expect(logoTransform(0)).toEqual({ scaleX: 1, scaleY: 1.3, rotation: 0 });
    const quarter = logoTransform(12.5);
    expect(quarter.scaleX).toBeCloseTo(1.5);
    expect(quarter.scaleY).toBeCloseTo(0.7879);
    expect(quarter.rotation).toBeCloseTo(360);
    expect(logoTransform(50).rotation).toBe(0);
  });
});

describe("spotlight", () => {
  test("the fan maps screen positions to texture coordinates", () => {
    const viewport = { width: 800, height: 600 };
    const { vertices, indices } = spotlightFan({ x: 400, y: 300 }, 120, viewport, 4);
    expect(vertices).toHaveLength(5);
    expect(vertices[0]).toEqual({ x: 400, y: 300, u: 0.5, v: 0.5 });
    expect(vertices[1]).toEqual({ x: 520, y: 300, u: 0.65, v: 0.5 });
    expect(indices).toEqual([0, 1, 2, 0, 2, 3, 0, 3, 4, 0, 4, 1]);
  });

  test("the fallback ramps red across and green down", () => {
    const pixels = gradientFallbackPixels({ width: 2, height: 2 });
    expect(Array.from(pixels.slice(0, 4))).toEqual([0, 0, 100, 255]);
    expect(Array.from(pixels.slice(12, 16))).toEqual([127, 127, 100, 255]);
  });

  test("the beam stays a radius away from every edge", () => {
    const rng = createRandomGenerator(21);
    const beam = new Beam({ width: 640, height: 480 }, () => rng.next());
    for (let i = 0; i < 5000; i += 1) {
      beam.step(0.05, 10);
      expect(beam.body.x).toBeGreaterThanOrEqual(120);
      expect(beam.body.x).toBeLessThanOrEqual(520);
      expect(beam.body.y).toBeGreaterThanOrEqual(120);
      expect(beam.body.y).toBeLessThanOrEqual(360);
    }
  });
});

describe("worms", () => {
  const worm = (
    x: number,
    y: number,
    vx: number,
    vy: number,
    points: { x: number; y: number }[],
  ): Worm => ({
    x,
    y,
    vx,
    vy,
    color: rgba(0, 255, 0),
    trail: new Trail(points.length, (index) => points[index]),
  });

  test("heads bounce off the pixel edges", () => {
    const head = worm(-3, 900, -5, 4, [{ x: 0, y: 0 }]);
    bounceInside(head, { width: 800, height: 600 });
    expect(head).toMatchObject({ x: 0, y: 599, vx: 5, vy: -4 });
  });

  test("a head is pushed out of another worm's body and reflected", () => {
    const head = worm(5, 0, -10, 0, [{ x: 5, y: 0 }]);
    const other = worm(100, 100, 0, 0, [
      { x: 100, y: 100 },
      { x: 0, y: 0 },
      { x: 500, y: 500 },
    ]);
    expect(collideWithBody(head, other)).toBe(true);
    expect(head.x).toBe(10);
    expect(head.vx).toBe(10);
  });

  test("another worm's head segment does not count", () => {
    const head = worm(101, 100, -10, 0, [{ x: 101, y: 100 }]);
    const other = worm(100, 100, 0, 0, [
      { x: 100, y: 100 },
      { x: 400, y: 400 },
    ]);
    expect(collideWithBody(head, other)).toBe(false);
  });

  test("wiggling turns the heading without changing speed", () => {
    const rng = createRandomGenerator(30);
    const head = worm(0, 0, 240, 0, [{ x: 0, y: 0 }]);
    for (let i = 0; i < 50; i += 1) {
      wiggleHeading(head, 0.3, () => rng.next());
    }
    expect(Math.hypot(head.vx, head.vy)).toBeCloseTo(240);
    const straight = worm(0, 0, 240, 0, [{ x: 0, y: 0 }]);
    wiggleHeading(straight, 0, () => rng.next());
    expect(straight.vx).toBe(240);
  });
});

describe("cityscape", () => {
  test("the sky starts at a morning blue", () => {
    expect(skyColor(0, 1)).toEqual({ r: 135, g: 251, b: 219, a: 255 });
    expect(layerScale(2)).toBeCloseTo(0.9);
  });

  test("builds three parallax layers with windows on the nearest", () => {
    const rng = createRandomGenerator(40);
    const city = new City({ width: 800, height: 600 }, false, () => rng.next());
    expect(city.layers.map((layer) => layer.length)).toEqual([15, 12, 8]);
    expect(city.layers[0].every((building) => building.windows === null)).toBe(true);
    expect(city.layers[2].every((building) => building.windows !== null)).toBe(true);
    expect(city.cars).toHaveLength(10);
    expect(city.floaters).toHaveLength(20);
  });

  test("layers scroll at their own rates", () => {
    const rng = createRandomGenerator(41);
    const city = new City({ width: 800, height: 600 }, false, () => rng.next());
    city.step(0.016, 1);
    expect(city.scroll).toEqual([-0.2, -0.5, -1]);
    expect(city.weather.count).toBe(0);
  });

  test("weather stays under its cap", () => {
    const rng = createRandomGenerator(42);
    const city = new City({ width: 800, height: 600 }, true, () => rng.next());
    city.step(0.016, 1);
    expect(city.weather.count).toBe(3);
    for (let i = 0; i < 2000; i += 1) {
      city.step(0.016, 1);
      expect(city.weather.count).toBeLessThanOrEqual(MAX_WEATHER);
    }
  });
});

describe("paper fire", () => {
  test("the sheet sits centred on the bottom edge", () => {
    const fire = new PaperFire(40, { width: 1920, height: 1080 }, () => 0.5);
    expect(fire.paperOrigin).toEqual({ x: 660, y: 280 });
    expect(fire.phase).toBe("burning");
  });

  test("re-ignites once the cooldown has passed and every particle is gone", () => {
    const rng = createRandomGenerator(50);
    const fire = new PaperFire(40, { width: 1920, height: 1080 }, () => rng.next());
    let steps = 0;
    while (fire.resets === 0 && steps < 2000) {
      fire.step(0.1, 1);
      steps += 1;
      expect(fire.particles.count).toBeLessThanOrEqual(1000);
    }
    expect(fire.resets).toBe(1);
    expect(steps).toBeGreaterThanOrEqual(300);
    expect(fire.time).toBe(0);
    expect(fire.particles.count).toBe(0);
    expect(fire.grid.maxIntensity()).toBe(0.8);
  });
});

describe("starry night", () => {
  const viewport = { width: 1280, height: 720 };
  const options = { speed: 1, fullscreen: true, density: 0, meteors: 5, rotation: "none" as const };

  test("density scales the star count", () => {
    expect(skyStarCount(0)).toBe(150);
    const rng = createRandomGenerator(60);
    const sky = new NightSky(viewport, options, () => rng.next());
    expect(sky.stars.stars).toHaveLength(150);
    expect(sky.skyline).toHaveLength(13);
  });

  test("a frozen sky keeps its stars while meteors come and go", () => {
    const rng = createRandomGenerator(61);
    const sky = new NightSky(viewport, options, () => rng.next());
    const brightness = sky.stars.stars.map((star) => star.brightness);
    let launched = 0;
    for (let i = 0; i < 100; i += 1) {
      const before = sky.meteors.length;
      sky.step(0.1);
      launched += Math.max(0, sky.meteors.length - before);
      expect(sky.meteors.length).toBeLessThanOrEqual(MAX_METEORS);
    }
    expect(launched).toBeGreaterThan(0);
    expect(sky.stars.stars.map((star) => star.brightness)).toEqual(brightness);
  });

  test("no meteors fall when the frequency is zero", () => {
    const rng = createRandomGenerator(62);
    const sky = new NightSky(viewport, { ...options, meteors: 0 }, () => rng.next());
    for (let i = 0; i < 100; i += 1) {
      sky.step(0.1);
    }
    expect(sky.meteors).toEqual([]);
  });
});
