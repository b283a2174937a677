import type { RoundSnapshot } from "./RoundController";
import { shortestDelta } from "./torus";
import { IDLE_INTENTS, type FrameIntents, type Vec2 } from "./types";
import { length } from "./vector";

/**
 * Deterministic autopilot for headless runs and tape generation.
 *
 * Priorities, highest first:
 * 1. Turn away from an obstacle closing inside the danger radius
 * 2. Turn toward the nearest obstacle and fire once lined up
 * 3. Keep a little forward speed so the ship never parks
 */

// ============================================================================
// TUNABLE PARAMETERS
// ============================================================================

/** How accurately the ship must aim before firing (degrees) */
const AIM_TOLERANCE = 12;

/** Surface distance at which an obstacle becomes a threat (px) */
const DANGER_RADIUS = 60;

/** Speed the autopilot tries to hold (px/frame) */
const CRUISE_SPEED = 2;

// Map any angle to (-180, 180].
function normalizeDegrees(degrees: number): number {
  const wrapped = ((degrees % 360) + 360) % 360;
  return wrapped > 180 ? wrapped - 360 : wrapped;
}

function bearing(delta: Vec2): number {
  return (Math.atan2(delta.y, delta.x) * 180) / Math.PI;
}

interface Target {
  delta: Vec2;
  surfaceDistance: number;
}

export class Autopilot {
  decide(snapshot: RoundSnapshot): FrameIntents {
    if (snapshot.mode === "ended") {
      return { ...IDLE_INTENTS };
    }

    const target = this.nearest(snapshot);
    const { ship, config } = snapshot;
    const speed = length(ship.velocity);
    const intents: FrameIntents = { ...IDLE_INTENTS, thrust: speed < CRUISE_SPEED };

    if (!target) {
      return intents;
    }

    const toTarget = normalizeDegrees(bearing(target.delta) - ship.heading);

    if (target.surfaceDistance < DANGER_RADIUS) {
      // Face away and burn out of the way.
      const away = normalizeDegrees(toTarget + 180);
      intents.left = away < -AIM_TOLERANCE;
      intents.right = away > AIM_TOLERANCE;
      intents.thrust = Math.abs(away) <= 90;
      intents.fire = snapshot.projectileCount < config.projectileCap;
      return intents;
    }

    intents.left = toTarget < -AIM_TOLERANCE;
    intents.right = toTarget > AIM_TOLERANCE;
    intents.fire =
      Math.abs(toTarget) <= AIM_TOLERANCE && snapshot.projectileCount < config.projectileCap;
    return intents;
  }

  private nearest(snapshot: RoundSnapshot): Target | null {
    const { ship, config } = snapshot;
    let best: Target | null = null;

    for (const obstacle of snapshot.obstacles) {
      const delta = shortestDelta(ship.position, obstacle.position, config.width, config.height);
      const surfaceDistance = length(delta) - obstacle.radius;
      if (!best || surfaceDistance < best.surfaceDistance) {
        best = { delta, surfaceDistance };
      }
    }

    return best;
  }
}
