import type { Body, Vec2 } from "./types";

function wrapAxis(value: number, bound: number): number {
  if (value >= bound) {
    return 0;
  }

  if (value < 0) {
    return bound - 1;
  }

  return value;
}

/**
 * Apply one frame of velocity and wrap each axis independently.
 * Leaving past the far edge lands on 0; leaving past 0 lands on `bound - 1`.
 */
export function wrapMove(position: Vec2, velocity: Vec2, width: number, height: number): Vec2 {
  return {
    x: wrapAxis(position.x + velocity.x, width),
    y: wrapAxis(position.y + velocity.y, height),
  };
}

export function moveBody<T extends Body>(body: T, width: number, height: number): T {
  return { ...body, position: wrapMove(body.position, body.velocity, width, height) };
}

/**
 * Shortest delta between two points in the toroidal (wrap-around) world.
 * Used for aiming, never for hit testing.
 */
export function shortestDelta(from: Vec2, to: Vec2, width: number, height: number): Vec2 {
  let dx = to.x - from.x;
  let dy = to.y - from.y;

  if (dx > width / 2) dx -= width;
  if (dx < -width / 2) dx += width;
  if (dy > height / 2) dy -= height;
  if (dy < -height / 2) dy += height;

  return { x: dx, y: dy };
}
