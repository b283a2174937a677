import { parseInteger } from "../utils";
import {
  MIN_OBSTACLES,
  OBSTACLE_MAX_RADIUS,
  OBSTACLE_MAX_SPEED,
  OBSTACLE_MIN_RADIUS,
  OBSTACLE_MIN_SPEED,
  OBSTACLE_RADIUS_STEP,
  PROJECTILE_CAP,
  PROJECTILE_LENGTH,
  PROJECTILE_MAX_AGE,
  PROJECTILE_SPEED,
  SHIP_MAX_SPEED,
  SHIP_SIZE_MAJOR,
  SHIP_SIZE_MINOR,
  SHIP_START_SPEED,
  SHIP_THRUST,
  SHIP_TURN_DEGREES,
  WORLD_HEIGHT,
  WORLD_WIDTH,
} from "./constants";
import { InvalidInputError } from "./errors";
import { crc32 } from "./tape";

export interface RoundConfig {
  width: number;
  height: number;
  shipMaxSpeed: number;
  shipTurnDegrees: number;
  shipThrust: number;
  shipStartSpeed: number;
  shipSizeMajor: number;
  shipSizeMinor: number;
  projectileSpeed: number;
  projectileLength: number;
  projectileMaxAge: number;
  projectileCap: number;
  obstacleMinRadius: number;
  obstacleMaxRadius: number;
  obstacleRadiusStep: number;
  obstacleMinSpeed: number;
  obstacleMaxSpeed: number;
  minObstacles: number;
  initialObstacles: number;
}

export const DEFAULT_ROUND_CONFIG: Readonly<RoundConfig> = Object.freeze({
  width: WORLD_WIDTH,
  height: WORLD_HEIGHT,
  shipMaxSpeed: SHIP_MAX_SPEED,
  shipTurnDegrees: SHIP_TURN_DEGREES,
  shipThrust: SHIP_THRUST,
  shipStartSpeed: SHIP_START_SPEED,
  shipSizeMajor: SHIP_SIZE_MAJOR,
  shipSizeMinor: SHIP_SIZE_MINOR,
  projectileSpeed: PROJECTILE_SPEED,
  projectileLength: PROJECTILE_LENGTH,
  projectileMaxAge: PROJECTILE_MAX_AGE,
  projectileCap: PROJECTILE_CAP,
  obstacleMinRadius: OBSTACLE_MIN_RADIUS,
  obstacleMaxRadius: OBSTACLE_MAX_RADIUS,
  obstacleRadiusStep: OBSTACLE_RADIUS_STEP,
  obstacleMinSpeed: OBSTACLE_MIN_SPEED,
  obstacleMaxSpeed: OBSTACLE_MAX_SPEED,
  minObstacles: MIN_OBSTACLES,
  initialObstacles: MIN_OBSTACLES,
});

function requireInteger(field: keyof RoundConfig, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new InvalidInputError(field, `expected an integer >= ${minimum}, got ${value}`);
  }
}

function requireNumber(field: keyof RoundConfig, value: number, minimum: number): void {
  if (!Number.isFinite(value) || value < minimum) {
    throw new InvalidInputError(field, `expected a number >= ${minimum}, got ${value}`);
  }
}

/**
 * Merge overrides onto the defaults and reject configurations the simulation
 * cannot run with. `initialObstacles` follows `minObstacles` unless given.
 */
export function resolveRoundConfig(overrides: Partial<RoundConfig> = {}): RoundConfig {
  const config: RoundConfig = {
    ...DEFAULT_ROUND_CONFIG,
    initialObstacles: overrides.minObstacles ?? DEFAULT_ROUND_CONFIG.initialObstacles,
    ...overrides,
  };

  requireInteger("width", config.width, 1);
  requireInteger("height", config.height, 1);
  requireNumber("shipMaxSpeed", config.shipMaxSpeed, 0);
  requireNumber("shipTurnDegrees", config.shipTurnDegrees, 0);
  requireNumber("shipThrust", config.shipThrust, 0);
  requireNumber("shipStartSpeed", config.shipStartSpeed, 0);
  requireNumber("shipSizeMajor", config.shipSizeMajor, 0);
  requireNumber("shipSizeMinor", config.shipSizeMinor, 0);
  requireNumber("projectileLength", config.projectileLength, 0);
  requireInteger("projectileMaxAge", config.projectileMaxAge, 0);
  requireInteger("projectileCap", config.projectileCap, 0);
  requireInteger("obstacleMinRadius", config.obstacleMinRadius, 1);
  requireInteger("obstacleMaxRadius", config.obstacleMaxRadius, 1);
  requireInteger("obstacleRadiusStep", config.obstacleRadiusStep, 1);
  requireNumber("obstacleMinSpeed", config.obstacleMinSpeed, 0);
  requireNumber("obstacleMaxSpeed", config.obstacleMaxSpeed, 0);
  requireInteger("minObstacles", config.minObstacles, 0);
  requireInteger("initialObstacles", config.initialObstacles, 0);

  if (!Number.isFinite(config.projectileSpeed) || config.projectileSpeed <= 0) {
    throw new InvalidInputError(
      "projectileSpeed",
      `expected a positive number, got ${config.projectileSpeed}`,
    );
  }
  if (config.shipStartSpeed > config.shipMaxSpeed) {
    throw new InvalidInputError(
      "shipStartSpeed",
      `start speed ${config.shipStartSpeed} exceeds the maximum ${config.shipMaxSpeed}`,
    );
  }
  if (config.obstacleMaxRadius < config.obstacleMinRadius) {
    throw new InvalidInputError(
      "obstacleMaxRadius",
      `allowed radius range [${config.obstacleMinRadius}, ${config.obstacleMaxRadius}] is empty`,
    );
  }
  if (config.obstacleMaxSpeed < config.obstacleMinSpeed) {
    throw new InvalidInputError(
      "obstacleMaxSpeed",
      `speed range [${config.obstacleMinSpeed}, ${config.obstacleMaxSpeed}] is empty`,
    );
  }

  return config;
}

const CONFIG_KEYS = Object.keys(DEFAULT_ROUND_CONFIG);

function canonicalConfig(config: Readonly<RoundConfig>): string {
  return JSON.stringify(config, CONFIG_KEYS);
}

/**
 * 16-bit fingerprint written into tape headers. The default config is 0, any
 * other config hashes to a non-zero value, so a tape replayed under different
 * rules can be told apart from a tampered one.
 */
export function configTag(config: Readonly<RoundConfig>): number {
  const canonical = canonicalConfig(config);
  if (canonical === canonicalConfig(DEFAULT_ROUND_CONFIG)) {
    return 0;
  }
  return crc32(new TextEncoder().encode(canonical)) & 0xffff || 1;
}

type Env = Record<string, string | undefined>;

/** Integer overrides from `ROCKFIELD_*` variables; unset or unparsable values keep the default. */
export function roundConfigFromEnv(env: Env): RoundConfig {
  const d = DEFAULT_ROUND_CONFIG;
  const minObstacles = parseInteger(env.ROCKFIELD_MIN_OBSTACLES, d.minObstacles, 0);
  return resolveRoundConfig({
    width: parseInteger(env.ROCKFIELD_WIDTH, d.width),
    height: parseInteger(env.ROCKFIELD_HEIGHT, d.height),
    projectileCap: parseInteger(env.ROCKFIELD_PROJECTILE_CAP, d.projectileCap, 0),
    projectileMaxAge: parseInteger(env.ROCKFIELD_PROJECTILE_MAX_AGE, d.projectileMaxAge, 0),
    obstacleMinRadius: parseInteger(env.ROCKFIELD_OBSTACLE_MIN_RADIUS, d.obstacleMinRadius),
    obstacleMaxRadius: parseInteger(env.ROCKFIELD_OBSTACLE_MAX_RADIUS, d.obstacleMaxRadius),
    minObstacles,
    initialObstacles: parseInteger(env.ROCKFIELD_INITIAL_OBSTACLES, minObstacles, 0),
  });
}
