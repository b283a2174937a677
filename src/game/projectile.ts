import type { RoundConfig } from "./config";
import { shipForward } from "./ship";
import type { Projectile, Vec2 } from "./types";
import { normalize, scale } from "./vector";

type ProjectileRules = Pick<RoundConfig, "projectileSpeed">;

/** Throws `InvalidInputError` when `direction` has zero length. */
export function spawnProjectile(
  position: Vec2,
  direction: Vec2,
  rules: ProjectileRules,
): Projectile {
  const unit = normalize(direction);
  return {
    position: { ...position },
    direction: unit,
    velocity: scale(unit, rules.projectileSpeed),
    age: 0,
  };
}

export function ageProjectile(projectile: Projectile): Projectile {
  return { ...projectile, age: projectile.age + 1 };
}

export function isProjectileAlive(projectile: Projectile, maxAge: number): boolean {
  return projectile.age <= maxAge;
}

export function tryFire(
  liveProjectileCount: number,
  cap: number,
  shipPosition: Vec2,
  shipHeading: number,
  rules: ProjectileRules,
): Projectile | null {
  if (liveProjectileCount >= cap) {
    return null;
  }

  return spawnProjectile(shipPosition, shipForward(shipHeading), rules);
}
