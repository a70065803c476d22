import { injectable } from "inversify";
import { BehaviorMode, DayNightSignal } from "@/shared/constants/BehaviorEnums";
import type { GridCell, Vec2 } from "@/shared/types/navigation";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory, LogLevel } from "@/shared/constants/LogEnums";
import type { NavGrid } from "../navigation/NavGrid";
import { invalidatePath, type EnemyAgent } from "./EnemyAgent";

export interface ModeChange {
  agentId: string;
  from: BehaviorMode;
  to: BehaviorMode;
  signal: DayNightSignal;
}

/**
 * Signal-driven transitions. Pairs not listed leave the mode unchanged.
 */
const TRANSITIONS: Record<BehaviorMode, Partial<Record<DayNightSignal, BehaviorMode>>> = {
  [BehaviorMode.CHASE]: {
    [DayNightSignal.NIGHT_BEGIN]: BehaviorMode.HALT,
  },
  [BehaviorMode.HALT]: {
    [DayNightSignal.HALT_WINDOW_ELAPSED]: BehaviorMode.FLEE,
    [DayNightSignal.DAY_BEGIN]: BehaviorMode.CHASE,
  },
  [BehaviorMode.FLEE]: {
    [DayNightSignal.DAY_BEGIN]: BehaviorMode.CHASE,
  },
};

/**
 * Per-agent chase/flee/halt state machine and goal selection.
 */
@injectable()
export class BehaviorModeController {
  public nextMode(mode: BehaviorMode, signal: DayNightSignal): BehaviorMode | null {
    return TRANSITIONS[mode][signal] ?? null;
  }

  /**
   * Applies a day/night signal. Caught agents ignore signals. Entering
   * chase or flee drops the current path and forces an immediate replan.
   */
  public applySignal(agent: EnemyAgent, signal: DayNightSignal): ModeChange | null {
    if (agent.hit) return null;

    const next = this.nextMode(agent.mode, signal);
    if (next === null) return null;

    const change: ModeChange = { agentId: agent.id, from: agent.mode, to: next, signal };
    agent.mode = next;
    if (next !== BehaviorMode.HALT) {
      invalidatePath(agent, true);
    }
    return change;
  }

  /**
   * Marks a fleeing agent as caught. Returns false for agents that are not
   * fleeing or were already caught.
   */
  public markCaught(agent: EnemyAgent, now: number): boolean {
    if (agent.hit || agent.mode !== BehaviorMode.FLEE) return false;

    agent.hit = true;
    agent.hitTime = now;
    agent.velocity = { x: 0, y: 0 };
    invalidatePath(agent);
    logger.agentLog(
      LogLevel.INFO,
      LogCategory.BEHAVIOR,
      agent.id,
      "caught while fleeing",
      { position: agent.position, now },
    );
    return true;
  }

  /**
   * Whether the agent takes part in pathfinding and steering this tick.
   */
  public isActive(agent: EnemyAgent): boolean {
    return !agent.hit && agent.mode !== BehaviorMode.HALT;
  }

  /**
   * Goal cell for the agent's mode: the player's cell when chasing; when
   * fleeing, the agent's cell mirrored away from the player, or the free
   * grid corner farthest from the player if the mirror is blocked.
   * Null in halt mode or when no free corner exists.
   */
  public selectGoal(agent: EnemyAgent, playerPosition: Vec2, grid: NavGrid): GridCell | null {
    const playerCell = grid.clampCell(grid.cellOf(playerPosition));

    switch (agent.mode) {
      case BehaviorMode.CHASE:
        return playerCell;
      case BehaviorMode.HALT:
        return null;
      case BehaviorMode.FLEE: {
        const own = grid.clampCell(grid.cellOf(agent.position));
        const mirrored = grid.clampCell({
          col: own.col + (own.col - playerCell.col),
          row: own.row + (own.row - playerCell.row),
        });
        if (grid.isWalkable(mirrored)) return mirrored;
        return this.farthestFreeCorner(grid, playerCell);
      }
    }
  }

  private farthestFreeCorner(grid: NavGrid, from: GridCell): GridCell | null {
    const corners: GridCell[] = [
      { col: 0, row: 0 },
      { col: grid.cols - 1, row: 0 },
      { col: 0, row: grid.rows - 1 },
      { col: grid.cols - 1, row: grid.rows - 1 },
    ];

    let best: GridCell | null = null;
    let bestDistance = -1;
    for (const corner of corners) {
      if (!grid.isWalkable(corner)) continue;
      const d = Math.hypot(corner.col - from.col, corner.row - from.row);
      if (d > bestDistance) {
        bestDistance = d;
        best = corner;
      }
    }
    return best;
  }
}
