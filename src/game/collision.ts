import type { Obstacle, Projectile, Ship, Vec2 } from "./types";
import { add, rotate, scale } from "./vector";

export type Triangle = readonly [Vec2, Vec2, Vec2];

// Closed boundary: a point exactly on the rim counts as inside.
export function pointInCircle(point: Vec2, center: Vec2, radius: number): boolean {
  const dx = point.x - center.x;
  const dy = point.y - center.y;
  return dx * dx + dy * dy <= radius * radius;
}

/** Leading edge of a projectile; this point, not its tail, is hit-tested. */
export function projectileTip(projectile: Projectile, projectileLength: number): Vec2 {
  return add(projectile.position, scale(projectile.direction, projectileLength));
}

/** Arrowhead corners: nose on the major axis, two tail corners on the minor axis. */
export function shipVertices(ship: Ship): Triangle {
  const { position, heading, sizeMajor, sizeMinor } = ship;
  return [
    add(position, rotate({ x: sizeMajor, y: 0 }, heading)),
    add(position, rotate({ x: sizeMinor, y: 0 }, heading + 120)),
    add(position, rotate({ x: sizeMinor, y: 0 }, heading + 240)),
  ];
}

export function shipHitsObstacle(ship: Ship, obstacle: Obstacle): boolean {
  return shipVertices(ship).some((vertex) =>
    pointInCircle(vertex, obstacle.position, obstacle.radius),
  );
}
