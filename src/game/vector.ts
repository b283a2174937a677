import { InvalidInputError } from "./errors";
import type { Vec2 } from "./types";

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function scale(v: Vec2, factor: number): Vec2 {
  return { x: v.x * factor, y: v.y * factor };
}

export function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Rotate by `degrees`. Positive angles turn +x toward +y (clockwise on a y-down screen). */
export function rotate(v: Vec2, degrees: number): Vec2 {
  const radians = degreesToRadians(degrees);
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  return {
    x: v.x * cos - v.y * sin,
    y: v.x * sin + v.y * cos,
  };
}

export function length(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function normalize(v: Vec2): Vec2 {
  const len = length(v);
  if (len === 0 || !Number.isFinite(len)) {
    throw new InvalidInputError("direction", "cannot normalize a zero-length vector");
  }
  return { x: v.x / len, y: v.y / len };
}

/** Unit vector pointing along `degrees`. */
export function angleToVector(degrees: number): Vec2 {
  return rotate({ x: 1, y: 0 }, degrees);
}
