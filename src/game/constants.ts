export const WORLD_WIDTH = 800;
export const WORLD_HEIGHT = 600;

// Hosts pace frames; the simulation itself is rate-agnostic.
export const FRAMES_PER_SECOND = 40;

export const SHIP_MAX_SPEED = 10;
export const SHIP_TURN_DEGREES = 10;
export const SHIP_THRUST = 1;
export const SHIP_START_SPEED = 1;
export const SHIP_SIZE_MAJOR = 20;
export const SHIP_SIZE_MINOR = 10;

export const PROJECTILE_SPEED = 30;
export const PROJECTILE_LENGTH = 10;
export const PROJECTILE_MAX_AGE = 30; // frames, inclusive
export const PROJECTILE_CAP = 5;

export const OBSTACLE_MIN_RADIUS = 20;
export const OBSTACLE_MAX_RADIUS = 80;
export const OBSTACLE_RADIUS_STEP = 20;
export const OBSTACLE_MIN_SPEED = 1;
export const OBSTACLE_MAX_SPEED = 3;
export const MIN_OBSTACLES = 5;

export const FRAGMENT_MIN_COUNT = 2;
export const FRAGMENT_MAX_COUNT = 3;

// Rules version tag, written to tape header byte [5]
export const RULES_TAG = 1;

export const DEFAULT_MAX_TAPE_FRAMES = 24_000; // 10 minutes at 40fps
