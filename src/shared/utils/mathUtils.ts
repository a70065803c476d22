/**
 * Shared 2D vector math. All helpers are pure and return fresh objects.
 *
 * @module shared/utils/mathUtils
 */
import type { Vec2 } from "../types/navigation";
import { RandomUtils } from "./RandomUtils";

/**
 * Calculates the Euclidean distance between two 2D points.
 */
export function distance(a: Vec2, b: Vec2): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, factor: number): Vec2 {
  return { x: v.x * factor, y: v.y * factor };
}

export function length(v: Vec2): number {
  return Math.hypot(v.x, v.y);
}

export function lengthSquared(v: Vec2): number {
  return v.x * v.x + v.y * v.y;
}

/**
 * Unit vector in the direction of `v`. A zero-length input yields a
 * pseudo-random unit vector instead of NaN.
 */
export function normalize(v: Vec2): Vec2 {
  const len = length(v);
  if (len === 0 || !Number.isFinite(len)) {
    return RandomUtils.unitVector();
  }
  return { x: v.x / len, y: v.y / len };
}

/**
 * Rescales `v` so its magnitude does not exceed `max`.
 */
export function clampMagnitude(v: Vec2, max: number): Vec2 {
  const len = length(v);
  if (len <= max || len === 0) {
    return { x: v.x, y: v.y };
  }
  const factor = max / len;
  return { x: v.x * factor, y: v.y * factor };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
