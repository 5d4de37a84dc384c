import type { Color, Renderer, Viewport } from "../../platform/types.js";
import type {
  CommonOptions,
  EffectContext,
  EffectDefinition,
  EffectInstance,
} from "../../runtime/effect.js";
import { bounceWalls, integrate, resolveElasticCollision, type Body } from "../kinematics.js";
import { randBelow, randRange, rgba, type RandomSource } from "../math.js";

export const BALL_COUNT = 10;
export const BALL_RADIUS = 20;
const MAX_SPEED = 200;

export interface Ball extends Body {
  color: Color;
}

/** One physics step: integrate, bounce off the walls, then resolve every pair. */
export const stepBalls = (
  balls: readonly Ball[],
  dt: number,
  speed: number,
  viewport: Viewport,
  radius = BALL_RADIUS,
): void => {
  const bounds = {
    minX: radius,
    minY: radius,
    maxX: viewport.width - radius,
    maxY: viewport.height - radius,
  };
  for (const ball of balls) {
    integrate(ball, dt, speed);
    bounceWalls(ball, bounds);
  }
  for (let i = 0; i < balls.length; i += 1) {
    for (let j = i + 1; j < balls.length; j += 1) {
      resolveElasticCollision(balls[i], balls[j], radius * 2);
    }
  }
};

export const spawnBalls = (count: number, viewport: Viewport, rand: RandomSource): Ball[] =>
  Array.from({ length: count }, () => ({
    x: randRange(rand, BALL_RADIUS, viewport.width - BALL_RADIUS),
    y: randRange(rand, BALL_RADIUS, viewport.height - BALL_RADIUS),
    vx: randRange(rand, -MAX_SPEED, MAX_SPEED),
    vy: randRange(rand, -MAX_SPEED, MAX_SPEED),
    color: rgba(randBelow(rand, 256), randBelow(rand, 256), randBelow(rand, 256)),
  }));

class BouncingBallInstance implements EffectInstance {
  private readonly balls: Ball[];

  constructor(
    private readonly viewport: Viewport,
    private readonly options: CommonOptions,
    rand: RandomSource,
  ) {
    this.balls = spawnBalls(BALL_COUNT, viewport, rand);
  }

  update(dt: number): void {
    stepBalls(this.balls, dt, this.options.speed, this.viewport);
  }

  render(renderer: Renderer): void {
    for (const ball of this.balls) {
      renderer.fillCircle({ x: ball.x, y: ball.y }, BALL_RADIUS, ball.color);
    }
  }

  teardown(): void {}
}

export const BouncingBallDefinition: EffectDefinition<CommonOptions> = {
  type: "bouncingball",
  title: "Bouncing Balls",
  flags: [],
  assets: [],
  parseOptions: (args) => args.common,
  init: (context: EffectContext, options) =>
    new BouncingBallInstance(context.viewport, options, () => context.rng.next()),
};
