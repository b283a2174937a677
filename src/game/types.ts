export type RoundMode = "running" | "ended";

export interface Vec2 {
  x: number;
  y: number;
}

/** Anything that drifts across the arena and wraps at its edges. */
export interface Body {
  position: Vec2;
  velocity: Vec2;
}

export interface Ship extends Body {
  // Degrees, never normalised. Only sine/cosine ever read it.
  heading: number;
  sizeMajor: number;
  sizeMinor: number;
}

export interface Projectile extends Body {
  direction: Vec2;
  age: number;
}

export interface Obstacle extends Body {
  radius: number;
  color: string;
}

export interface FrameIntents {
  left: boolean;
  right: boolean;
  thrust: boolean;
  fire: boolean;
}

export const IDLE_INTENTS: Readonly<FrameIntents> = Object.freeze({
  left: false,
  right: false,
  thrust: false,
  fire: false,
});

export interface ObstacleHit {
  obstacle: number;
  radius: number;
  points: number;
  fragments: number;
}

export interface FrameResult {
  frame: number;
  mode: RoundMode;
  score: number;
  hits: ObstacleHit[];
  finalScore: number | null;
}
