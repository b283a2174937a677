import type { RoundConfig } from "./config";
import type { Ship, Vec2 } from "./types";
import { add, angleToVector, length, scale } from "./vector";

export function turn(heading: number, delta: number): number {
  return heading + delta;
}

export function shipForward(heading: number): Vec2 {
  return angleToVector(heading);
}

/**
 * Add forward thrust along `heading`, then clamp speed to `maxSpeed`.
 * The clamp only runs when speed is strictly above the limit, so a
 * zero velocity never reaches the division.
 */
export function accelerate(
  velocity: Vec2,
  heading: number,
  amount: number,
  maxSpeed: number,
): Vec2 {
  const next = add(velocity, scale(shipForward(heading), amount));
  const speed = length(next);

  if (speed > maxSpeed) {
    return scale(next, maxSpeed / speed);
  }

  return next;
}

export function createShip(
  position: Vec2,
  heading: number,
  velocity: Vec2,
  config: Pick<RoundConfig, "shipSizeMajor" | "shipSizeMinor">,
): Ship {
  return {
    position: { ...position },
    velocity: { ...velocity },
    heading,
    sizeMajor: config.shipSizeMajor,
    sizeMinor: config.shipSizeMinor,
  };
}
