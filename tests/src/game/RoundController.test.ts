import { describe, expect, it } from "vitest";
import { Autopilot } from "../../../src/game/Autopilot";
import { InvalidInputError } from "../../../src/game/errors";
import { AutopilotInputSource, ScriptedInputSource } from "../../../src/game/input-source";
import {
  finalScore,
  isRoundOver,
  RoundController,
  type ProjectileSetup,
  type RoundSetup,
} from "../../../src/game/RoundController";
import { SeededRng } from "../../../src/game/rng";
import {
  IDLE_INTENTS,
  type FrameIntents,
  type Obstacle,
} from "../../../src/game/types";
import { length } from "../../../src/game/vector";
import { ScriptedRandom } from "./scripted-random";

const FAR_SHIP = { position: { x: 100, y: 500 }, heading: 0 };

function obstacle(x: number, y: number, radius: number, vx = 0, vy = 0): Obstacle {
  return { position: { x, y }, velocity: { x: vx, y: vy }, radius, color: "#abcdef" };
}

function eastbound(x: number, y: number, age = 0): ProjectileSetup {
  return { position: { x, y }, direction: { x: 1, y: 0 }, age };
}

function setupFailure(setup: RoundSetup): string | null {
  try {
    staticRound(setup);
  } catch (error) {
    return error instanceof InvalidInputError ? error.field : null;
  }
  return null;
}

function staticRound(setup: RoundSetup, rng = new ScriptedRandom(), cap?: number) {
  const config = cap === undefined ? { minObstacles: 0 } : { minObstacles: 0, projectileCap: cap };
  return new RoundController({ rng, config, setup });
}

const FIRE: FrameIntents = { ...IDLE_INTENTS, fire: true };
const THRUST: FrameIntents = { ...IDLE_INTENTS, thrust: true };
const LEFT: FrameIntents = { ...IDLE_INTENTS, left: true };

describe("construction", () => {
  it("starts a seeded round with the minimum obstacle count and a drifting ship", () => {
    const round = new RoundController({ seed: 42 });
    const snapshot = round.getSnapshot();

    expect(round.getMode()).toBe("running");
    expect(round.getFrame()).toBe(0);
    expect(round.getSeed()).toBe(42);
    expect(round.getObstacleCount()).toBe(5);
    expect(round.getProjectileCount()).toBe(0);
    expect(round.getFinalScore()).toBeNull();
    expect(snapshot.ship.position).toEqual({ x: 400, y: 300 });
    expect(length(snapshot.ship.velocity)).toBeCloseTo(1, 12);
  });

  it("rejects an invalid configuration", () => {
    expect(() => new RoundController({ config: { projectileSpeed: 0 } })).toThrow(
      InvalidInputError,
    );
  });
});

describe("setup", () => {
  it("rejects obstacles outside the configured radius range", () => {
    expect(setupFailure({ ship: FAR_SHIP, obstacles: [obstacle(400, 300, 200)] })).toBe(
      "setup.obstacles[0].radius",
    );
    expect(setupFailure({ ship: FAR_SHIP, obstacles: [obstacle(400, 300, 10)] })).toBe(
      "setup.obstacles[0].radius",
    );
  });

  it("rejects obstacles placed outside the arena", () => {
    expect(setupFailure({ ship: FAR_SHIP, obstacles: [obstacle(800, 300, 20)] })).toBe(
      "setup.obstacles[0].position",
    );
  });

  it("rejects projectiles without a direction or with a bad age", () => {
    const still = { position: { x: 10, y: 10 }, direction: { x: 0, y: 0 } };
    expect(setupFailure({ ship: FAR_SHIP, obstacles: [], projectiles: [still] })).toBe(
      "setup.projectiles[0].direction",
    );
    for (const age of [-1, 1.5]) {
      const setup = { ship: FAR_SHIP, obstacles: [], projectiles: [eastbound(10, 10, age)] };
      expect(setupFailure(setup)).toBe("setup.projectiles[0].age");
    }
  });

  it("rejects a ship outside the arena or above its maximum speed", () => {
    expect(setupFailure({ ship: { position: { x: -50, y: 9999 }, heading: 0 } })).toBe(
      "setup.ship.position",
    );
    const fast = { position: { x: 400, y: 300 }, heading: 0, velocity: { x: 500, y: 0 } };
    expect(setupFailure({ ship: fast, obstacles: [] })).toBe("setup.ship.velocity");
  });

  it("derives projectile velocity from direction and the configured speed", () => {
    const round = staticRound({
      ship: FAR_SHIP,
      obstacles: [],
      projectiles: [{ position: { x: 200, y: 100 }, direction: { x: 0, y: 2 } }],
    });

    round.advanceFrame();

    const [projectile] = round.getRenderState().projectiles;
    expect(projectile?.position).toEqual({ x: 200, y: 130 });
    expect(projectile?.age).toBe(1);
  });

  it("copies entities so later changes to the setup do not leak in", () => {
    const rock = obstacle(400, 300, 40);
    const round = staticRound({ ship: FAR_SHIP, obstacles: [rock] });

    rock.position.x = 10;
    rock.radius = 200;

    expect(round.getSnapshot().obstacles).toEqual([obstacle(400, 300, 40)]);
  });
});

describe("obstacle maintenance", () => {
  it("tops the live set up to the minimum before projectiles move", () => {
    const round = new RoundController({
      rng: new SeededRng(7),
      config: { minObstacles: 5, initialObstacles: 0 },
      setup: { ship: { position: { x: 400, y: 300 }, heading: 0 }, obstacles: [] },
    });
    expect(round.getObstacleCount()).toBe(0);

    round.advanceFrame();
    expect(round.getObstacleCount()).toBe(5);

    round.advanceFrame();
    expect(round.getObstacleCount()).toBe(5);
  });
});

describe("projectile hits", () => {
  it("scores the hit, removes both entities and merges fragments", () => {
    const rng = new ScriptedRandom([2, 0, 0, 1, 90], [1, 1]);
    const round = staticRound(
      { ship: FAR_SHIP, obstacles: [obstacle(400, 300, 80)], projectiles: [eastbound(350, 300)] },
      rng,
    );

    const result = round.advanceFrame();

    expect(result.score).toBe(80);
    expect(result.hits).toEqual([{ obstacle: 1, radius: 80, points: 80, fragments: 2 }]);
    expect(round.getProjectileCount()).toBe(0);
    expect(rng.remaining()).toBe(0);

    const fragments = round.getRenderState().obstacles;
    expect(fragments.map((f) => f.radius)).toEqual([20, 40]);
    expect(fragments.map((f) => f.color)).toEqual(["#abcdef", "#abcdef"]);
    expect(fragments[0]?.position).toEqual({ x: 401, y: 300 });
    expect(fragments[1]?.position.x).toBeCloseTo(400, 9);
    expect(fragments[1]?.position.y).toBeCloseTo(301, 9);
  });

  it("takes the first obstacle in insertion order when the tip overlaps several", () => {
    const round = staticRound({
      ship: FAR_SHIP,
      obstacles: [obstacle(395, 300, 20), obstacle(390, 300, 40)],
      projectiles: [eastbound(350, 300)],
    });

    const result = round.advanceFrame();

    expect(result.score).toBe(140);
    expect(result.hits).toEqual([{ obstacle: 1, radius: 20, points: 140, fragments: 0 }]);
    expect(round.getSnapshot().obstacles.map((o) => o.radius)).toEqual([40]);
  });

  it("does not let later projectiles hit fragments staged in the same frame", () => {
    const rng = new ScriptedRandom([2, 0, 0, 0, 180], [1, 1]);
    const round = staticRound(
      {
        ship: FAR_SHIP,
        obstacles: [obstacle(400, 300, 40)],
        projectiles: [eastbound(350, 300), eastbound(370, 300)],
      },
      rng,
    );

    const result = round.advanceFrame();

    expect(result.hits).toEqual([{ obstacle: 1, radius: 40, points: 120, fragments: 2 }]);
    expect(round.getScore()).toBe(120);
    expect(round.getObstacleCount()).toBe(2);
    expect(round.getProjectileCount()).toBe(1);
    expect(round.getRenderState().projectiles[0]?.tip).toEqual({ x: 410, y: 300 });
    expect(rng.remaining()).toBe(0);
  });

  it("lets a second projectile pass once the first destroyed the shared target", () => {
    const round = staticRound({
      ship: FAR_SHIP,
      obstacles: [obstacle(400, 300, 20)],
      projectiles: [eastbound(350, 300), eastbound(350, 300)],
    });

    const result = round.advanceFrame();

    expect(result.hits).toHaveLength(1);
    expect(round.getScore()).toBe(140);
    expect(round.getObstacleCount()).toBe(0);
    expect(round.getProjectileCount()).toBe(1);
  });
});

describe("projectile lifetime and cap", () => {
  it("expires a projectile once its age passes the maximum", () => {
    const round = staticRound({
      ship: FAR_SHIP,
      obstacles: [],
      projectiles: [eastbound(10, 10, 30), eastbound(10, 50, 29)],
    });

    round.advanceFrame();

    const projectiles = round.getRenderState().projectiles;
    expect(projectiles).toHaveLength(1);
    expect(projectiles[0]?.age).toBe(30);
    expect(projectiles[0]?.position).toEqual({ x: 40, y: 50 });
  });

  it("neither moves nor hit-tests a projectile that has just expired", () => {
    const round = staticRound({
      ship: FAR_SHIP,
      obstacles: [obstacle(400, 300, 20)],
      projectiles: [eastbound(350, 300, 30)],
    });

    const result = round.advanceFrame();

    expect(result.hits).toEqual([]);
    expect(result.score).toBe(0);
    expect(round.getObstacleCount()).toBe(1);
    expect(round.getProjectileCount()).toBe(0);
  });

  it("never holds more live projectiles than the cap", () => {
    const round = staticRound(
      { ship: { position: { x: 400, y: 300 }, heading: 0 }, obstacles: [] },
      new ScriptedRandom(),
      2,
    );

    for (let i = 0; i < 3; i++) {
      round.advanceFrame(FIRE);
    }

    expect(round.getProjectileCount()).toBe(2);
  });
});

describe("ship", () => {
  it("turns and thrusts before moving", () => {
    const round = staticRound({ ship: { position: { x: 400, y: 300 }, heading: 0 }, obstacles: [] });

    round.advanceFrame(THRUST);
    expect(round.getSnapshot().ship.position).toEqual({ x: 401, y: 300 });

    round.advanceFrame(LEFT);
    const ship = round.getSnapshot().ship;
    expect(ship.heading).toBe(-10);
    expect(ship.position).toEqual({ x: 402, y: 300 });
  });

  it("ends the round on contact and leaves the ship where it was", () => {
    const round = staticRound({
      ship: { position: { x: 400, y: 300 }, heading: 0, velocity: { x: 1, y: 0 } },
      obstacles: [obstacle(100, 100, 20), obstacle(450, 300, 20, -10, 0)],
    });

    const result = round.advanceFrame();

    expect(result.mode).toBe("ended");
    expect(result.finalScore).toBe(0);
    expect(isRoundOver(round)).toBe(true);
    expect(finalScore(round)).toBe(0);
    expect(round.getSnapshot().ship.position).toEqual({ x: 400, y: 300 });
  });

  it("treats frames after the end as no-ops", () => {
    const round = staticRound({
      ship: { position: { x: 400, y: 300 }, heading: 0 },
      obstacles: [obstacle(400, 300, 20)],
    });
    round.advanceFrame();
    const before = round.getRenderState();

    const result = round.advanceFrame(FIRE);

    expect(result.frame).toBe(1);
    expect(result.hits).toEqual([]);
    expect(round.getRenderState()).toEqual(before);
  });
});

describe("advanceFrames", () => {
  it("rejects negative or fractional counts", () => {
    const round = new RoundController({ seed: 1 });
    const source = new ScriptedInputSource([]);
    expect(() => round.advanceFrames(-1, source)).toThrow(InvalidInputError);
    expect(() => round.advanceFrames(2.5, source)).toThrow(InvalidInputError);
  });

  it("returns the current state for a count of zero", () => {
    const round = new RoundController({ seed: 1 });
    const result = round.advanceFrames(0, new ScriptedInputSource([]));
    expect(result.frame).toBe(0);
    expect(result.mode).toBe("running");
  });

  it("stops early once the round ends", () => {
    const round = staticRound({
      ship: { position: { x: 400, y: 300 }, heading: 0 },
      obstacles: [obstacle(400, 300, 20)],
    });

    const result = round.advanceFrames(10, new ScriptedInputSource([]));

    expect(result.mode).toBe("ended");
    expect(round.getFrame()).toBe(1);
  });
});

describe("determinism", () => {
  function autopilotRun(seed: number, frames: number): RoundController {
    const round = new RoundController({ seed });
    round.advanceFrames(frames, new AutopilotInputSource(round, new Autopilot()));
    return round;
  }

  it("replays the same seed and inputs to the same state", () => {
    const a = autopilotRun(99, 300);
    const b = autopilotRun(99, 300);

    expect(a.getFrame()).toBe(b.getFrame());
    expect(a.getScore()).toBe(b.getScore());
    expect(a.getRngState()).toBe(b.getRngState());
    expect(a.getRenderState()).toEqual(b.getRenderState());
  });

  it("keeps every position inside the arena after each frame", () => {
    const round = new RoundController({ seed: 12345 });
    const source = new AutopilotInputSource(round, new Autopilot());
    const inBounds = (p: { x: number; y: number }) =>
      p.x >= 0 && p.x < 800 && p.y >= 0 && p.y < 600;

    for (let i = 0; i < 500 && !round.isRoundOver(); i++) {
      round.step(source);
      const state = round.getRenderState();
      expect(inBounds(state.ship.position)).toBe(true);
      expect(state.projectiles.every((p) => inBounds(p.position))).toBe(true);
      expect(state.obstacles.every((o) => inBounds(o.position))).toBe(true);
      expect(state.projectiles.length).toBeLessThanOrEqual(5);
    }
  });
});

describe("recording", () => {
  it("produces a tape only when recording with the built-in generator", () => {
    const recorded = new RoundController({ seed: 5, record: true });
    expect(recorded.getTape()).toBeNull();
    recorded.advanceFrame(THRUST);
    expect(recorded.getRunRecord()?.inputs).toEqual(new Uint8Array([0x04]));
    expect(recorded.getTape()?.length).toBe(16 + 1 + 12);

    expect(new RoundController({ seed: 5 }).getRunRecord()).toBeNull();

    const injected = new RoundController({ rng: new SeededRng(5), record: true });
    injected.advanceFrame();
    expect(injected.getTape()).toBeNull();
  });
});
