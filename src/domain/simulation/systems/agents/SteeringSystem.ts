import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import type { NavigationConfig } from "@/shared/constants/NavigationConstants";
import { BehaviorMode } from "@/shared/constants/BehaviorEnums";
import { LogCategory } from "@/shared/constants/LogEnums";
import type { Obstacle, Vec2, WorldSize } from "@/shared/types/navigation";
import {
  add,
  clamp,
  clampMagnitude,
  distance,
  length,
  normalize,
  scale,
  sub,
} from "@/shared/utils/mathUtils";
import { logger } from "@/infrastructure/utils/logger";
import type { SpatialGrid } from "@/utils/SpatialGrid";
import type { NavGrid } from "../navigation/NavGrid";
import { PathFinder } from "../navigation/PathFinder";
import { boundsOf, overlapsObstacle, rectCenter, rectsIntersect } from "../world/collision";
import { BehaviorModeController } from "./BehaviorModeController";
import { facingFromVector, invalidatePath, type EnemyAgent } from "./EnemyAgent";
import { avoidanceForce, directVelocity, separationForce } from "./steeringForces";

/**
 * Read-only inputs shared by every agent during one tick.
 */
export interface SteeringContext {
  dt: number;
  /** Round time in seconds */
  now: number;
  playerPosition: Vec2;
  grid: NavGrid;
  world: WorldSize;
  obstacles: ReadonlyMap<string, Obstacle>;
  /** Obstacles by bounds (anchor = bounds centre) */
  obstacleIndex: SpatialGrid<string>;
  /** Previous-tick positions of agents that exert separation */
  neighborIndex: SpatialGrid<string>;
}

export interface SteeringOutcome {
  repathed: boolean;
  collided: boolean;
  obstacleId: string | null;
}

/**
 * Per-agent velocity controller: throttled path requests, path following
 * with direct-vector fallback, separation, obstacle avoidance, bounded
 * acceleration and hard collision resolution.
 */
@injectable()
export class SteeringSystem {
  constructor(
    @inject(TYPES.NavigationConfig) private readonly config: NavigationConfig,
    @inject(TYPES.PathFinder) private readonly pathFinder: PathFinder,
    @inject(TYPES.BehaviorModeController)
    private readonly behavior: BehaviorModeController,
  ) {}

  public get avoidRadius(): number {
    return Math.max(
      this.config.cellSize * this.config.avoidRadiusCellFactor,
      this.config.avoidRadiusMin,
    );
  }

  public get waypointRadius(): number {
    return Math.max(
      this.config.waypointRadiusMin,
      this.config.cellSize * this.config.waypointRadiusCellFactor,
    );
  }

  /**
   * Recomputes the agent's path when its throttle allows. A failed search
   * leaves an empty path.
   */
  public refreshPath(agent: EnemyAgent, ctx: SteeringContext): boolean {
    if (ctx.now - agent.lastRecalc < this.config.recalcInterval) return false;

    agent.lastRecalc = ctx.now;
    const goal = this.behavior.selectGoal(agent, ctx.playerPosition, ctx.grid);
    agent.path = this.pathFinder.requestWaypoints(ctx.grid, agent.position, goal);
    agent.pathIndex = 0;
    return true;
  }

  /**
   * Velocity the agent wants this frame. Advances the path cursor when the
   * current waypoint is within the arrival radius.
   */
  public desiredVelocity(agent: EnemyAgent, playerPosition: Vec2): Vec2 {
    if (agent.mode === BehaviorMode.HALT) return { x: 0, y: 0 };

    if (agent.pathIndex < agent.path.length) {
      if (distance(agent.position, agent.path[agent.pathIndex]) < this.waypointRadius) {
        agent.pathIndex++;
      }
      if (agent.pathIndex < agent.path.length) {
        return directVelocity(agent.position, agent.path[agent.pathIndex], this.config.maxSpeed);
      }
    }

    return directVelocity(
      agent.position,
      playerPosition,
      this.config.maxSpeed,
      agent.mode === BehaviorMode.FLEE,
    );
  }

  public separation(agent: EnemyAgent, ctx: SteeringContext): Vec2 {
    const neighbors = ctx.neighborIndex
      .queryRadius(agent.position, this.config.separationRadius)
      .filter((hit) => hit.entity !== agent.id)
      .map((hit) => hit.anchor);
    return separationForce(
      agent.position,
      neighbors,
      this.config.separationRadius,
      this.config.separationForce,
      ctx.dt,
    );
  }

  public avoidance(agent: EnemyAgent, ctx: SteeringContext): Vec2 {
    const radius = this.avoidRadius;
    const centers = ctx.obstacleIndex
      .queryRadius(agent.position, radius)
      .map((hit) => hit.anchor);
    return avoidanceForce(agent.position, centers, radius, this.config.avoidForce, ctx.dt);
  }

  /**
   * Blends desired velocity with the bias forces, bounded by
   * `acceleration * dt`, and caps the resulting speed.
   */
  public integrate(
    agent: EnemyAgent,
    desired: Vec2,
    separation: Vec2,
    avoidance: Vec2,
    dt: number,
  ): void {
    const steer = add(add(sub(desired, agent.velocity), separation), avoidance);
    const bounded = clampMagnitude(steer, this.config.acceleration * dt);
    agent.velocity = clampMagnitude(add(agent.velocity, bounded), this.config.maxSpeed);

    if (length(agent.velocity) > this.config.facingSpeedThreshold) {
      agent.facing = facingFromVector(agent.velocity, agent.facing);
    }
  }

  public clampToWorld(position: Vec2, world: WorldSize): Vec2 {
    return {
      x: clamp(position.x, 0, world.width),
      y: clamp(position.y, 0, world.height),
    };
  }

  private firstOverlap(
    agent: EnemyAgent,
    position: Vec2,
    ctx: SteeringContext,
  ): Obstacle | null {
    const box = boundsOf(position, agent.shape);
    for (const id of ctx.obstacleIndex.queryRect(box)) {
      const obstacle = ctx.obstacles.get(id);
      if (!obstacle || !rectsIntersect(box, obstacle.bounds)) continue;
      if (overlapsObstacle(position, agent.shape, obstacle)) return obstacle;
    }
    return null;
  }

  /**
   * Moves the agent by `velocity * dt` unless the tentative position overlaps
   * an obstacle. On overlap the agent is nudged away from the obstacle centre,
   * slowed, and its path dropped. An agent that is clear keeps its spot when
   * the nudge would overlap; one already inside the obstacle is always nudged.
   */
  public resolveMovement(
    agent: EnemyAgent,
    ctx: SteeringContext,
  ): { collided: boolean; obstacleId: string | null } {
    const tentative = this.clampToWorld(add(agent.position, scale(agent.velocity, ctx.dt)), ctx.world);
    const obstacle = this.firstOverlap(agent, tentative, ctx);

    if (!obstacle) {
      agent.position = tentative;
      return { collided: false, obstacleId: null };
    }

    const away = normalize(sub(agent.position, rectCenter(obstacle.bounds)));
    const nudged = this.clampToWorld(
      add(agent.position, scale(away, this.config.cellSize * this.config.collisionPushCellFactor)),
      ctx.world,
    );
    const embedded = overlapsObstacle(agent.position, agent.shape, obstacle);
    if (embedded || !this.firstOverlap(agent, nudged, ctx)) {
      agent.position = nudged;
    }
    agent.velocity = scale(agent.velocity, this.config.collisionDamping);
    invalidatePath(agent);

    logger.debug(`[Agent:${agent.id}] collided with ${obstacle.id}`, LogCategory.COLLISION, {
      position: agent.position,
    });
    return { collided: true, obstacleId: obstacle.id };
  }

  /**
   * One full steering update. Caught or halted agents, and non-positive
   * `dt`, are no-ops.
   */
  public step(agent: EnemyAgent, ctx: SteeringContext): SteeringOutcome {
    if (!this.behavior.isActive(agent) || !(ctx.dt > 0)) {
      return { repathed: false, collided: false, obstacleId: null };
    }

    const repathed = this.refreshPath(agent, ctx);
    const separation = this.separation(agent, ctx);
    const avoidance = this.avoidance(agent, ctx);
    const desired = this.desiredVelocity(agent, ctx.playerPosition);

    this.integrate(agent, desired, separation, avoidance, ctx.dt);
    const { collided, obstacleId } = this.resolveMovement(agent, ctx);

    return { repathed, collided, obstacleId };
  }
}
