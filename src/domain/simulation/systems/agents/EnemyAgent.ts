import { BehaviorMode, Facing } from "@/shared/constants/BehaviorEnums";
import type { CollisionShape, Vec2, Waypoints } from "@/shared/types/navigation";

/**
 * Mutable per-agent navigation state. Owned by the round; mutated by the
 * steering system every frame and by the mode controller on signals.
 */
export interface EnemyAgent {
  readonly id: string;
  readonly shape: CollisionShape;
  position: Vec2;
  velocity: Vec2;
  mode: BehaviorMode;
  facing: Facing;
  /** Simplified waypoints; replaced wholesale on recomputation */
  path: Waypoints;
  /** Index of the waypoint currently steered toward */
  pathIndex: number;
  /** Round time (seconds) of the last path request */
  lastRecalc: number;
  /** Caught by the player during flee; frozen until despawn */
  hit: boolean;
  hitTime: number | null;
  /** Set during the update pass, removed in the compaction pass */
  despawnPending: boolean;
}

/**
 * Read-only view handed to the renderer/animator each frame.
 */
export interface AgentSnapshot {
  id: string;
  position: Vec2;
  velocity: Vec2;
  mode: BehaviorMode;
  facing: Facing;
  moving: boolean;
  hit: boolean;
  despawnPending: boolean;
}

export function createEnemyAgent(
  id: string,
  position: Vec2,
  shape: CollisionShape,
  mode: BehaviorMode = BehaviorMode.CHASE,
): EnemyAgent {
  return {
    id,
    shape,
    position: { x: position.x, y: position.y },
    velocity: { x: 0, y: 0 },
    mode,
    facing: Facing.DOWN,
    path: [],
    pathIndex: 0,
    lastRecalc: -Infinity,
    hit: false,
    hitTime: null,
    despawnPending: false,
  };
}

/**
 * Dominant axis of `v` as a facing; horizontal wins only when strictly larger.
 * A zero vector keeps `previous`.
 */
export function facingFromVector(v: Vec2, previous: Facing = Facing.DOWN): Facing {
  if (v.x === 0 && v.y === 0) return previous;
  if (Math.abs(v.x) > Math.abs(v.y)) {
    return v.x > 0 ? Facing.RIGHT : Facing.LEFT;
  }
  return v.y > 0 ? Facing.DOWN : Facing.UP;
}

/**
 * Drops the current path and clears the throttle so the next tick replans.
 */
export function invalidatePath(agent: EnemyAgent, forceRepath = false): void {
  agent.path = [];
  agent.pathIndex = 0;
  if (forceRepath) {
    agent.lastRecalc = -Infinity;
  }
}

export function snapshotAgent(agent: EnemyAgent, movingThreshold: number): AgentSnapshot {
  return {
    id: agent.id,
    position: { ...agent.position },
    velocity: { ...agent.velocity },
    mode: agent.mode,
    facing: agent.facing,
    moving: Math.hypot(agent.velocity.x, agent.velocity.y) > movingThreshold,
    hit: agent.hit,
    despawnPending: agent.despawnPending,
  };
}
