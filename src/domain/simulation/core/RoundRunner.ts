import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import { logger } from "../../../infrastructure/utils/logger";
import { LogCategory } from "../../../shared/constants/LogEnums";
import { DayNightCycle } from "../systems/core/DayNightCycle";
import { RoundOrchestrator, type PlayerState, type TickReport } from "./RoundOrchestrator";

/** Millisecond wall clock. */
export interface Clock {
  now(): number;
}

/** Supplies the player's current position and shape each tick. */
export interface PlayerSource {
  getPlayer(): PlayerState;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Drives the orchestrator from a wall-clock interval with variable `dt`,
 * feeding it the day/night signals for the elapsed time.
 */
@injectable()
export class RoundRunner {
  private tickHandle?: NodeJS.Timeout;
  private lastTickAt = 0;
  private roundTime = 0;
  private player: PlayerSource | null = null;

  constructor(
    @inject(TYPES.RoundOrchestrator) private readonly orchestrator: RoundOrchestrator,
    @inject(TYPES.DayNightCycle) private readonly cycle: DayNightCycle,
    @inject(TYPES.Clock) private readonly clock: Clock,
  ) {}

  public setPlayerSource(source: PlayerSource): void {
    this.player = source;
  }

  /** Round time in seconds accumulated through {@link step}. */
  public getRoundTime(): number {
    return this.roundTime;
  }

  public isRunning(): boolean {
    return this.tickHandle !== undefined;
  }

  /**
   * One deterministic tick of `dt` seconds.
   *
   * @throws Error when no player source is set or no round is in progress
   */
  public step(dt: number): TickReport {
    if (!this.player) {
      throw new Error("No player source: call setPlayerSource() before stepping");
    }
    const elapsed = dt > 0 ? dt : 0;
    this.roundTime += elapsed;
    const signals = this.cycle.advance(elapsed);

    return this.orchestrator.tick({
      dt: elapsed,
      now: this.roundTime,
      player: this.player.getPlayer(),
      signals,
    });
  }

  /**
   * Starts ticking every `intervalMs`. Calling it while running is a no-op.
   * A tick that throws stops the runner.
   */
  public start(intervalMs = 16): void {
    if (this.tickHandle) return;

    this.lastTickAt = this.clock.now();
    this.tickHandle = setInterval(() => {
      const now = this.clock.now();
      const dt = (now - this.lastTickAt) / 1000;
      this.lastTickAt = now;
      try {
        this.step(dt);
      } catch (error) {
        logger.error("Round tick failed, stopping runner", LogCategory.ROUND, {
          error: error instanceof Error ? error.message : String(error),
        });
        this.stop();
      }
    }, intervalMs);

    logger.info(`Round runner started (${intervalMs} ms interval)`, LogCategory.ROUND);
  }

  public stop(): void {
    if (!this.tickHandle) return;
    clearInterval(this.tickHandle);
    this.tickHandle = undefined;
    logger.info("Round runner stopped", LogCategory.ROUND, {
      roundTime: this.roundTime,
    });
  }

  /** Stops ticking and rewinds round time and the day/night cycle. */
  public reset(): void {
    this.stop();
    this.roundTime = 0;
    this.cycle.reset();
  }
}
