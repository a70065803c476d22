import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { NavigationConfig } from "../../../shared/constants/NavigationConstants";
import { BehaviorMode, type DayNightSignal } from "../../../shared/constants/BehaviorEnums";
import { LogCategory, LogLevel } from "../../../shared/constants/LogEnums";
import type { CollisionShape, Obstacle, Vec2, WorldSize } from "../../../shared/types/navigation";
import { logger } from "../../../infrastructure/utils/logger";
import { SpatialGrid } from "../../../utils/SpatialGrid";
import { scale } from "../../../shared/utils/mathUtils";
import { NavGrid } from "../systems/navigation/NavGrid";
import { BehaviorModeController, type ModeChange } from "../systems/agents/BehaviorModeController";
import { SteeringSystem, type SteeringContext } from "../systems/agents/SteeringSystem";
import {
  createEnemyAgent,
  snapshotAgent,
  type AgentSnapshot,
  type EnemyAgent,
} from "../systems/agents/EnemyAgent";
import { boundsOf, rectsIntersect, shapesOverlap } from "../systems/world/collision";
import { RoundEventBus, RoundEventType } from "./events";

export interface AgentSpawn {
  id: string;
  position: Vec2;
  shape: CollisionShape;
  mode?: BehaviorMode;
}

/**
 * Placement result for one round. Obstacles never move afterwards.
 */
export interface RoundLayout {
  world: WorldSize;
  obstacles: Obstacle[];
  agents: AgentSpawn[];
}

export interface PlayerState {
  position: Vec2;
  shape: CollisionShape;
}

export interface TickInput {
  /** Seconds since the previous tick */
  dt: number;
  /** Round time in seconds */
  now: number;
  player: PlayerState;
  signals?: readonly DayNightSignal[];
}

export interface TickReport {
  tick: number;
  modeChanges: ModeChange[];
  caught: string[];
  despawned: string[];
  struckBy: string | null;
  collisions: number;
  repaths: number;
  cleared: boolean;
}

interface RoundState {
  world: WorldSize;
  grid: NavGrid;
  obstacles: Map<string, Obstacle>;
  obstacleIndex: SpatialGrid<string>;
  agents: EnemyAgent[];
  tick: number;
  cleared: boolean;
}

/**
 * Owns one round: the grid, the obstacle index and the agents. Drives the
 * per-tick order: signals, neighbour snapshot, agent updates, player
 * contact, compaction, event flush.
 */
@injectable()
export class RoundOrchestrator {
  public readonly events = new RoundEventBus();
  private round: RoundState | null = null;

  constructor(
    @inject(TYPES.NavigationConfig) private readonly config: NavigationConfig,
    @inject(TYPES.SteeringSystem) private readonly steering: SteeringSystem,
    @inject(TYPES.BehaviorModeController)
    private readonly behavior: BehaviorModeController,
  ) {}

  /**
   * Discards any previous round and builds the grid and agents for a new one.
   *
   * @throws Error on duplicate agent or obstacle ids, or an invalid world size
   */
  public startRound(layout: RoundLayout): void {
    const grid = NavGrid.build(
      layout.world,
      this.config.cellSize,
      layout.obstacles,
      this.config.expandCells,
    );

    const obstacles = new Map<string, Obstacle>();
    const obstacleIndex = new SpatialGrid<string>(
      layout.world.width,
      layout.world.height,
      this.config.cellSize * 2,
    );
    for (const obstacle of layout.obstacles) {
      if (obstacles.has(obstacle.id)) {
        throw new Error(`Duplicate obstacle id: ${obstacle.id}`);
      }
      obstacles.set(obstacle.id, obstacle);
      obstacleIndex.insertRect(obstacle.id, obstacle.bounds);
    }

    const seen = new Set<string>();
    const agents = layout.agents.map((spawn) => {
      if (seen.has(spawn.id)) {
        throw new Error(`Duplicate agent id: ${spawn.id}`);
      }
      seen.add(spawn.id);
      return createEnemyAgent(spawn.id, spawn.position, spawn.shape, spawn.mode);
    });

    this.events.clearQueue();
    this.round = {
      world: { width: layout.world.width, height: layout.world.height },
      grid,
      obstacles,
      obstacleIndex,
      agents,
      tick: 0,
      cleared: false,
    };

    logger.info("Round started", LogCategory.ROUND, {
      world: `${layout.world.width}x${layout.world.height}`,
      obstacles: obstacles.size,
      agents: agents.length,
    });
  }

  private requireRound(): RoundState {
    if (!this.round) {
      throw new Error("No round in progress: call startRound() before tick()");
    }
    return this.round;
  }

  public hasRound(): boolean {
    return this.round !== null;
  }

  /**
   * Applies a day/night signal to every agent and queues the resulting
   * mode changes.
   */
  public applySignal(signal: DayNightSignal): ModeChange[] {
    const round = this.requireRound();
    const changes: ModeChange[] = [];

    for (const agent of round.agents) {
      const change = this.behavior.applySignal(agent, signal);
      if (!change) continue;
      changes.push(change);
      this.events.publish(RoundEventType.AGENT_MODE_CHANGED, { ...change, tick: round.tick });
    }

    if (changes.length > 0) {
      logger.info(`Signal ${signal}: ${changes.length} agent(s) switched mode`, LogCategory.BEHAVIOR, {
        to: changes[0].to,
      });
    }
    return changes;
  }

  /**
   * Positions every agent exerts separation from during this tick. Halted and
   * despawning agents are left out.
   */
  private snapshotNeighbors(round: RoundState): SpatialGrid<string> {
    const index = new SpatialGrid<string>(
      round.world.width,
      round.world.height,
      Math.max(this.config.separationRadius, 1),
    );
    for (const agent of round.agents) {
      if (agent.mode === BehaviorMode.HALT || agent.despawnPending) continue;
      index.insert(agent.id, agent.position);
    }
    return index;
  }

  /**
   * First agent overlapping the player, if any. Caught agents are skipped.
   */
  private findPlayerContact(round: RoundState, player: PlayerState): EnemyAgent | null {
    const playerBox = boundsOf(player.position, player.shape);
    for (const agent of round.agents) {
      if (agent.hit || agent.despawnPending) continue;
      if (!rectsIntersect(boundsOf(agent.position, agent.shape), playerBox)) continue;
      if (shapesOverlap(agent.position, agent.shape, player.position, player.shape)) {
        return agent;
      }
    }
    return null;
  }

  public tick(input: TickInput): TickReport {
    const round = this.requireRound();
    round.tick++;
    logger.setTick(round.tick);

    const report: TickReport = {
      tick: round.tick,
      modeChanges: [],
      caught: [],
      despawned: [],
      struckBy: null,
      collisions: 0,
      repaths: 0,
      cleared: false,
    };

    for (const signal of input.signals ?? []) {
      report.modeChanges.push(...this.applySignal(signal));
    }

    const ctx: SteeringContext = {
      dt: input.dt,
      now: input.now,
      playerPosition: input.player.position,
      grid: round.grid,
      world: round.world,
      obstacles: round.obstacles,
      obstacleIndex: round.obstacleIndex,
      neighborIndex: this.snapshotNeighbors(round),
    };

    for (const agent of round.agents) {
      if (agent.hit) {
        if (agent.hitTime !== null && input.now - agent.hitTime >= this.config.despawnDelay) {
          agent.despawnPending = true;
          report.despawned.push(agent.id);
          this.events.publish(RoundEventType.AGENT_DESPAWNED, {
            agentId: agent.id,
            time: input.now,
          });
          logger.agentLog(LogLevel.INFO, LogCategory.ROUND, agent.id, "despawned", {
            caughtAt: agent.hitTime,
          });
        }
        continue;
      }
      if (!this.behavior.isActive(agent)) continue;

      const outcome = this.steering.step(agent, ctx);
      if (outcome.repathed) report.repaths++;
      if (outcome.collided) report.collisions++;
    }

    const contact = this.findPlayerContact(round, input.player);
    if (contact) {
      if (contact.mode === BehaviorMode.FLEE) {
        this.behavior.markCaught(contact, input.now);
        report.caught.push(contact.id);
        this.events.publish(RoundEventType.AGENT_CAUGHT, {
          agentId: contact.id,
          position: { ...contact.position },
          time: input.now,
        });
      } else {
        contact.velocity = scale(contact.velocity, this.config.contactBounce);
        report.struckBy = contact.id;
        this.events.publish(RoundEventType.PLAYER_STRUCK, {
          agentId: contact.id,
          mode: contact.mode,
          playerPosition: { ...input.player.position },
          time: input.now,
        });
        logger.debug(`[Agent:${contact.id}] struck the player`, LogCategory.ROUND);
      }
    }

    if (report.despawned.length > 0) {
      round.agents = round.agents.filter((agent) => !agent.despawnPending);
      if (round.agents.length === 0 && !round.cleared) {
        round.cleared = true;
        report.cleared = true;
        this.events.publish(RoundEventType.ROUND_CLEARED, {
          tick: round.tick,
          time: input.now,
        });
        logger.info("Round cleared", LogCategory.ROUND, { tick: round.tick });
      }
    }

    this.events.flushEvents();
    return report;
  }

  public getSnapshots(): AgentSnapshot[] {
    const round = this.requireRound();
    return round.agents.map((agent) =>
      snapshotAgent(agent, this.config.facingSpeedThreshold),
    );
  }

  public getAgents(): ReadonlyArray<EnemyAgent> {
    return this.requireRound().agents;
  }

  public getAgent(id: string): EnemyAgent | undefined {
    return this.requireRound().agents.find((agent) => agent.id === id);
  }

  public getGrid(): NavGrid {
    return this.requireRound().grid;
  }

  public getTick(): number {
    return this.round?.tick ?? 0;
  }

  public isCleared(): boolean {
    return this.round?.cleared ?? false;
  }

  public endRound(): void {
    if (!this.round) return;
    logger.info("Round ended", LogCategory.ROUND, {
      tick: this.round.tick,
      remaining: this.round.agents.length,
    });
    this.events.clearQueue();
    this.round = null;
  }
}
