import type { Vec2 } from "@/shared/types/navigation";
import { lengthSquared, normalize, scale } from "@/shared/utils/mathUtils";

/**
 * Sum of `(self - other) / d²` over every source strictly inside `radius`.
 * Sources at distance zero are skipped.
 */
export function inverseSquareRepulsion(
  self: Vec2,
  sources: Iterable<Vec2>,
  radius: number,
): Vec2 {
  let x = 0;
  let y = 0;
  for (const other of sources) {
    const dx = self.x - other.x;
    const dy = self.y - other.y;
    const d2 = dx * dx + dy * dy;
    if (d2 === 0 || d2 >= radius * radius) continue;
    x += dx / d2;
    y += dy / d2;
  }
  return { x, y };
}

function scaledDirection(sum: Vec2, strength: number, dt: number): Vec2 {
  if (lengthSquared(sum) === 0) return { x: 0, y: 0 };
  return scale(normalize(sum), strength * dt);
}

/**
 * Repulsion from neighbouring agents, normalised to `strength * dt`.
 */
export function separationForce(
  self: Vec2,
  neighbors: Iterable<Vec2>,
  radius: number,
  strength: number,
  dt: number,
): Vec2 {
  return scaledDirection(inverseSquareRepulsion(self, neighbors, radius), strength, dt);
}

/**
 * Repulsion from nearby obstacle centres, normalised to `strength * dt`.
 * A soft bias only; penetration is prevented by hard collision resolution.
 */
export function avoidanceForce(
  self: Vec2,
  obstacleCenters: Iterable<Vec2>,
  radius: number,
  strength: number,
  dt: number,
): Vec2 {
  return scaledDirection(inverseSquareRepulsion(self, obstacleCenters, radius), strength, dt);
}

/**
 * Full-speed velocity toward `target`, or directly away from it when `away`.
 * Zero when the two points coincide.
 */
export function directVelocity(from: Vec2, target: Vec2, speed: number, away = false): Vec2 {
  const offset = away
    ? { x: from.x - target.x, y: from.y - target.y }
    : { x: target.x - from.x, y: target.y - from.y };
  if (lengthSquared(offset) === 0) return { x: 0, y: 0 };
  return scale(normalize(offset), speed);
}
