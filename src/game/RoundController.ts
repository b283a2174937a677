import { configTag, resolveRoundConfig, type RoundConfig } from "./config";
import {
  pointInCircle,
  projectileTip,
  shipHitsObstacle,
  shipVertices,
  type Triangle,
} from "./collision";
import { EntityStore } from "./entity-store";
import { InvalidInputError } from "./errors";
import { assertFrameIntents, type InputSource } from "./input-source";
import { ageProjectile, isProjectileAlive, spawnProjectile, tryFire } from "./projectile";
import { SeededRng, type RandomSource } from "./rng";
import { scoreForHit } from "./score";
import { accelerate, createShip, shipForward, turn } from "./ship";
import { spawnFragments, spawnOffscreen } from "./spawner";
import { serializeTape, TapeRecorder } from "./tape";
import { moveBody } from "./torus";
import {
  IDLE_INTENTS,
  type FrameIntents,
  type FrameResult,
  type Obstacle,
  type ObstacleHit,
  type Projectile,
  type RoundMode,
  type Ship,
  type Vec2,
} from "./types";
import { length, scale } from "./vector";

export interface ShipSetup {
  position: Vec2;
  heading: number;
  velocity?: Vec2;
}

/** Velocity is derived from `direction` and the configured projectile speed. */
export interface ProjectileSetup {
  position: Vec2;
  direction: Vec2;
  age?: number;
}

/**
 * Explicit starting entities; anything left out is created the normal way.
 * Everything given is validated against the round config and copied.
 */
export interface RoundSetup {
  ship?: ShipSetup;
  obstacles?: Obstacle[];
  projectiles?: ProjectileSetup[];
}

export interface RoundOptions {
  config?: Partial<RoundConfig>;
  /** Seed for the built-in xorshift generator. Ignored when `rng` is given. */
  seed?: number;
  rng?: RandomSource;
  setup?: RoundSetup;
  /** Record every frame's intents so the round can be written out as a tape. */
  record?: boolean;
}

export interface ShipView {
  position: Vec2;
  heading: number;
  vertices: Triangle;
}

export interface ProjectileView {
  id: number;
  position: Vec2;
  tip: Vec2;
  age: number;
}

export interface ObstacleView {
  id: number;
  position: Vec2;
  radius: number;
  color: string;
}

/** What a renderer needs to draw one frame. Copies only; mutating it changes nothing. */
export interface RoundRenderState {
  mode: RoundMode;
  frame: number;
  score: number;
  ship: ShipView;
  projectiles: ProjectileView[];
  obstacles: ObstacleView[];
}

/** State handed to the autopilot. */
export interface RoundSnapshot {
  mode: RoundMode;
  frame: number;
  ship: Ship;
  obstacles: Obstacle[];
  projectileCount: number;
  config: Readonly<RoundConfig>;
}

export interface RoundRunRecord {
  seed: number;
  configTag: number;
  inputs: Uint8Array;
  finalScore: number;
  finalRngState: number;
}

const COLOR_PATTERN = /^#[0-9a-f]{6}$/i;

function requireFiniteVector(field: string, v: Vec2): void {
  if (!Number.isFinite(v.x) || !Number.isFinite(v.y)) {
    throw new InvalidInputError(field, `expected finite components, got (${v.x}, ${v.y})`);
  }
}

function requireInArena(field: string, position: Vec2, config: RoundConfig): void {
  requireFiniteVector(field, position);
  const { x, y } = position;
  if (x < 0 || x >= config.width || y < 0 || y >= config.height) {
    throw new InvalidInputError(
      field,
      `(${x}, ${y}) is outside the ${config.width}x${config.height} arena`,
    );
  }
}

function shipFromSetup(setup: ShipSetup, config: RoundConfig): Ship {
  const velocity = setup.velocity ?? { x: 0, y: 0 };
  requireInArena("setup.ship.position", setup.position, config);
  requireFiniteVector("setup.ship.velocity", velocity);
  if (!Number.isFinite(setup.heading)) {
    throw new InvalidInputError(
      "setup.ship.heading",
      `expected a finite angle, got ${setup.heading}`,
    );
  }
  const speed = length(velocity);
  if (speed > config.shipMaxSpeed) {
    throw new InvalidInputError(
      "setup.ship.velocity",
      `speed ${speed} exceeds the maximum ${config.shipMaxSpeed}`,
    );
  }
  return createShip(setup.position, setup.heading, velocity, config);
}

function obstacleFromSetup(obstacle: Obstacle, index: number, config: RoundConfig): Obstacle {
  const field = `setup.obstacles[${index}]`;
  requireInArena(`${field}.position`, obstacle.position, config);
  requireFiniteVector(`${field}.velocity`, obstacle.velocity);
  const { radius, color } = obstacle;
  if (
    !Number.isFinite(radius) ||
    radius < config.obstacleMinRadius ||
    radius > config.obstacleMaxRadius
  ) {
    throw new InvalidInputError(
      `${field}.radius`,
      `expected [${config.obstacleMinRadius}, ${config.obstacleMaxRadius}], got ${radius}`,
    );
  }
  if (!COLOR_PATTERN.test(color)) {
    throw new InvalidInputError(`${field}.color`, `expected #rrggbb, got ${color}`);
  }
  return {
    position: { ...obstacle.position },
    velocity: { ...obstacle.velocity },
    radius,
    color,
  };
}

function projectileFromSetup(
  setup: ProjectileSetup,
  index: number,
  config: RoundConfig,
): Projectile {
  const field = `setup.projectiles[${index}]`;
  requireInArena(`${field}.position`, setup.position, config);
  const age = setup.age ?? 0;
  if (!Number.isInteger(age) || age < 0) {
    throw new InvalidInputError(`${field}.age`, `expected a non-negative integer, got ${age}`);
  }
  const speed = length(setup.direction);
  if (speed === 0 || !Number.isFinite(speed)) {
    throw new InvalidInputError(`${field}.direction`, "expected a non-zero finite vector");
  }
  return { ...spawnProjectile(setup.position, setup.direction, config), age };
}

export class RoundController {
  private readonly config: RoundConfig;

  private readonly rng: RandomSource;

  // Only the built-in generator exposes state for tapes.
  private readonly seededRng: SeededRng | null;

  private readonly seed: number | null;

  private readonly recorder: TapeRecorder | null;

  private mode: RoundMode = "running";

  private score = 0;

  private frame = 0;

  private ship: Ship;

  private readonly projectiles = new EntityStore<Projectile>();

  private readonly obstacles = new EntityStore<Obstacle>();

  constructor(options: RoundOptions = {}) {
    this.config = resolveRoundConfig(options.config);

    if (options.rng) {
      this.rng = options.rng;
      this.seededRng = options.rng instanceof SeededRng ? options.rng : null;
      this.seed = null;
    } else {
      this.seed = (options.seed ?? Date.now()) >>> 0;
      this.seededRng = new SeededRng(this.seed);
      this.rng = this.seededRng;
    }

    this.recorder = options.record === true ? new TapeRecorder() : null;

    const setup = options.setup ?? {};
    this.ship = setup.ship ? shipFromSetup(setup.ship, this.config) : this.createStartingShip();

    const obstacles = setup.obstacles
      ? setup.obstacles.map((obstacle, i) => obstacleFromSetup(obstacle, i, this.config))
      : spawnOffscreen(this.config.initialObstacles, this.rng, this.config);
    const projectiles = (setup.projectiles ?? []).map((projectile, i) =>
      projectileFromSetup(projectile, i, this.config),
    );

    for (const obstacle of obstacles) {
      this.obstacles.insert(obstacle);
    }
    for (const projectile of projectiles) {
      this.projectiles.insert(projectile);
    }
  }

  private createStartingShip(): Ship {
    const center = { x: this.config.width / 2, y: this.config.height / 2 };
    const heading = this.rng.nextRange(0, 360);
    const velocity = scale(shipForward(heading), this.config.shipStartSpeed);
    return createShip(center, heading, velocity, this.config);
  }

  // =========================================================================
  // Frame step
  // =========================================================================

  /**
   * Advance the round by exactly one frame. An ended round ignores the call
   * and reports its final state again.
   */
  advanceFrame(intents: FrameIntents = IDLE_INTENTS): FrameResult {
    if (this.mode === "ended") {
      return this.buildResult([]);
    }

    assertFrameIntents(intents);

    this.frame++;
    this.recorder?.record(intents);

    this.applyIntents(intents);
    this.maintainObstacles();

    const hits: ObstacleHit[] = [];
    const staged = this.updateProjectiles(hits);
    for (const fragment of staged) {
      this.obstacles.insert(fragment);
    }

    this.updateObstacles();

    if (this.mode === "running") {
      this.ship = moveBody(this.ship, this.config.width, this.config.height);
    }

    return this.buildResult(hits);
  }

  /** Read one frame of input from `source`, advance, then move the source on. */
  step(source: InputSource): FrameResult {
    const result = this.advanceFrame(source.getFrameInput());
    source.advance();
    return result;
  }

  /** Advance up to `count` frames, stopping early if the round ends. */
  advanceFrames(count: number, source: InputSource): FrameResult {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidInputError("count", `expected a non-negative integer, got ${count}`);
    }

    let result = this.buildResult([]);
    for (let i = 0; i < count && this.mode === "running"; i++) {
      result = this.step(source);
    }
    return result;
  }

  private applyIntents(intents: FrameIntents): void {
    const ship = this.ship;
    let heading = ship.heading;
    let velocity = ship.velocity;

    if (intents.left) {
      heading = turn(heading, -this.config.shipTurnDegrees);
    }

    if (intents.right) {
      heading = turn(heading, this.config.shipTurnDegrees);
    }

    if (intents.thrust) {
      velocity = accelerate(velocity, heading, this.config.shipThrust, this.config.shipMaxSpeed);
    }

    this.ship = { ...ship, heading, velocity };

    if (intents.fire) {
      const projectile = tryFire(
        this.projectiles.size,
        this.config.projectileCap,
        this.ship.position,
        this.ship.heading,
        this.config,
      );
      if (projectile) {
        this.projectiles.insert(projectile);
      }
    }
  }

  private maintainObstacles(): void {
    const missing = this.config.minObstacles - this.obstacles.size;
    if (missing <= 0) {
      return;
    }

    for (const obstacle of spawnOffscreen(missing, this.rng, this.config)) {
      this.obstacles.insert(obstacle);
    }
  }

  /**
   * Age, move and hit-test every projectile in insertion order. Returns the
   * fragments to merge once every projectile has been processed.
   */
  private updateProjectiles(hits: ObstacleHit[]): Obstacle[] {
    const { width, height, projectileMaxAge, projectileLength } = this.config;
    const staged: Obstacle[] = [];

    for (const [handle, current] of this.projectiles.snapshot()) {
      const aged = ageProjectile(current);

      if (!isProjectileAlive(aged, projectileMaxAge)) {
        this.projectiles.remove(handle);
        continue;
      }

      const moved = moveBody(aged, width, height);
      const tip = projectileTip(moved, projectileLength);
      const target = this.findHitObstacle(tip);

      if (target === null) {
        this.projectiles.replace(handle, moved);
        continue;
      }

      const [obstacleHandle, obstacle] = target;
      this.projectiles.remove(handle);
      this.obstacles.remove(obstacleHandle);

      const points = scoreForHit(obstacle.radius, this.config.obstacleMaxRadius);
      this.score += points;

      const fragments =
        obstacle.radius > this.config.obstacleMinRadius
          ? spawnFragments(obstacle, this.rng, this.config)
          : [];
      staged.push(...fragments);

      hits.push({
        obstacle: obstacleHandle,
        radius: obstacle.radius,
        points,
        fragments: fragments.length,
      });
    }

    return staged;
  }

  // First match in insertion order wins; nearest or smallest is not considered.
  private findHitObstacle(tip: Vec2): [number, Obstacle] | null {
    for (const [handle, obstacle] of this.obstacles.entries()) {
      if (pointInCircle(tip, obstacle.position, obstacle.radius)) {
        return [handle, obstacle];
      }
    }
    return null;
  }

  /**
   * Every obstacle moves before any ship test, so the outcome does not
   * depend on where in the set the colliding obstacle sits.
   */
  private updateObstacles(): void {
    const { width, height } = this.config;

    for (const [handle, obstacle] of this.obstacles.snapshot()) {
      this.obstacles.replace(handle, moveBody(obstacle, width, height));
    }

    for (const obstacle of this.obstacles.values()) {
      if (shipHitsObstacle(this.ship, obstacle)) {
        this.mode = "ended";
        return;
      }
    }
  }

  private buildResult(hits: ObstacleHit[]): FrameResult {
    return {
      frame: this.frame,
      mode: this.mode,
      score: this.score,
      hits,
      finalScore: this.getFinalScore(),
    };
  }

  // =========================================================================
  // Public API (hosts, renderers, replay scripts)
  // =========================================================================

  isRoundOver(): boolean {
    return this.mode === "ended";
  }

  /** Final score once the round has ended; `null` while it is still running. */
  getFinalScore(): number | null {
    return this.mode === "ended" ? this.score : null;
  }

  getScore(): number {
    return this.score;
  }
  getMode(): RoundMode {
    return this.mode;
  }
  getFrame(): number {
    return this.frame;
  }
  getObstacleCount(): number {
    return this.obstacles.size;
  }
  getProjectileCount(): number {
    return this.projectiles.size;
  }
  getSeed(): number | null {
    return this.seed;
  }
  getRngState(): number | null {
    return this.seededRng ? this.seededRng.getState() : null;
  }

  getRenderState(): RoundRenderState {
    const ship = this.ship;
    return {
      mode: this.mode,
      frame: this.frame,
      score: this.score,
      ship: {
        position: { ...ship.position },
        heading: ship.heading,
        vertices: shipVertices(ship),
      },
      projectiles: Array.from(this.projectiles.entries(), ([id, p]) => ({
        id,
        position: { ...p.position },
        tip: projectileTip(p, this.config.projectileLength),
        age: p.age,
      })),
      obstacles: Array.from(this.obstacles.entries(), ([id, o]) => ({
        id,
        position: { ...o.position },
        radius: o.radius,
        color: o.color,
      })),
    };
  }

  getSnapshot(): RoundSnapshot {
    return {
      mode: this.mode,
      frame: this.frame,
      ship: { ...this.ship, position: { ...this.ship.position } },
      obstacles: Array.from(this.obstacles.values(), (o) => ({ ...o })),
      projectileCount: this.projectiles.size,
      config: this.config,
    };
  }

  /** Snapshot the recorded run; `null` unless recording with the built-in generator. */
  getRunRecord(): RoundRunRecord | null {
    if (!this.recorder || this.seed === null || !this.seededRng) {
      return null;
    }

    return {
      seed: this.seed,
      configTag: configTag(this.config),
      inputs: this.recorder.getInputs(),
      finalScore: this.score,
      finalRngState: this.seededRng.getState(),
    };
  }

  /** Serialized tape of the recording so far, or `null` when nothing can be written. */
  getTape(): Uint8Array | null {
    const run = this.getRunRecord();
    if (!run || run.inputs.length === 0) {
      return null;
    }
    return serializeTape(
      run.seed,
      run.inputs,
      run.finalScore,
      run.finalRngState,
      run.configTag,
    );
  }
}

// Functional surface over the controller for hosts that prefer plain calls.

export function advanceFrame(round: RoundController, intents: FrameIntents): FrameResult {
  return round.advanceFrame(intents);
}

export function isRoundOver(round: RoundController): boolean {
  return round.isRoundOver();
}

export function finalScore(round: RoundController): number | null {
  return round.getFinalScore();
}
