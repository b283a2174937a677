import type { RoundConfig } from "./config";
import { FRAGMENT_MAX_COUNT, FRAGMENT_MIN_COUNT } from "./constants";
import { InvalidInputError } from "./errors";
import type { RandomSource } from "./rng";
import type { Obstacle, Vec2 } from "./types";
import { angleToVector, scale } from "./vector";

type SpawnRules = Pick<
  RoundConfig,
  | "width"
  | "height"
  | "obstacleMinRadius"
  | "obstacleMaxRadius"
  | "obstacleRadiusStep"
  | "obstacleMinSpeed"
  | "obstacleMaxSpeed"
>;

function steppedRange(from: number, toExclusive: number, step: number): number[] {
  const values: number[] = [];
  for (let value = from; value < toExclusive; value += step) {
    values.push(value);
  }
  return values;
}

/** Every radius a freshly spawned obstacle may take. */
export function allowedRadii(rules: SpawnRules): number[] {
  return steppedRange(
    rules.obstacleMinRadius,
    rules.obstacleMaxRadius + 1,
    rules.obstacleRadiusStep,
  );
}

/** Radii a fragment of `parentRadius` may take; empty for the terminal size-class. */
export function fragmentRadii(parentRadius: number, rules: SpawnRules): number[] {
  return steppedRange(rules.obstacleMinRadius, parentRadius, rules.obstacleRadiusStep);
}

function pick(values: readonly number[], rng: RandomSource): number {
  const value = values[rng.nextRange(0, values.length)];
  if (value === undefined) {
    throw new InvalidInputError("radius", "cannot pick from an empty radius set");
  }
  return value;
}

function randomVelocity(rng: RandomSource, rules: SpawnRules): Vec2 {
  const heading = rng.nextRange(0, 360);
  const speed = rng.nextFloatRange(rules.obstacleMinSpeed, rules.obstacleMaxSpeed);
  return scale(angleToVector(heading), speed);
}

function randomColor(rng: RandomSource): string {
  return `#${rng.nextRange(0, 0x1000000).toString(16).padStart(6, "0")}`;
}

/**
 * Obstacles placed just past the negative-X and negative-Y edges so nothing
 * appears on top of the ship. The first `floor(count / 2)` enter from the left,
 * the rest (including the odd one) from the top.
 *
 * Draw order per obstacle: radius, edge coordinate, heading, speed, color.
 */
export function spawnOffscreen(count: number, rng: RandomSource, rules: SpawnRules): Obstacle[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidInputError("count", `expected a non-negative integer, got ${count}`);
  }

  const radii = allowedRadii(rules);
  const fromLeft = Math.floor(count / 2);
  const obstacles: Obstacle[] = [];

  for (let i = 0; i < count; i += 1) {
    const radius = pick(radii, rng);
    const position =
      i < fromLeft
        ? { x: -radius, y: rng.nextRange(0, rules.height) }
        : { x: rng.nextRange(0, rules.width), y: -radius };
    const velocity = randomVelocity(rng, rules);

    obstacles.push({ position, velocity, radius, color: randomColor(rng) });
  }

  return obstacles;
}

/**
 * Two or three smaller obstacles at the parent's last position, sharing its
 * color. Returns `[]` when the parent is already the smallest size-class.
 *
 * Draw order: count, then per fragment radius, heading, speed.
 */
export function spawnFragments(parent: Obstacle, rng: RandomSource, rules: SpawnRules): Obstacle[] {
  const radii = fragmentRadii(parent.radius, rules);
  if (radii.length === 0) {
    return [];
  }

  const count = rng.nextRange(FRAGMENT_MIN_COUNT, FRAGMENT_MAX_COUNT + 1);
  const fragments: Obstacle[] = [];

  for (let i = 0; i < count; i += 1) {
    const radius = pick(radii, rng);
    fragments.push({
      position: { ...parent.position },
      velocity: randomVelocity(rng, rules),
      radius,
      color: parent.color,
    });
  }

  return fragments;
}
