import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import type { NavigationConfig } from "../../../../shared/constants/NavigationConstants";
import { DayNightSignal, DayPhase } from "../../../../shared/constants/BehaviorEnums";
import { logger } from "../../../../infrastructure/utils/logger";
import { LogCategory } from "../../../../shared/constants/LogEnums";

export interface DayNightState {
  phase: DayPhase;
  /** Seconds since the cycle started */
  elapsed: number;
  /** Position within the current day+night cycle, 0..1 */
  progress: number;
  isNight: boolean;
  /** Seconds left in the halt window; 0 outside it */
  haltRemaining: number;
}

/**
 * Turns elapsed time into the day/night signals that drive agent modes.
 *
 * Day lasts `dayLength` seconds, night `nightLength`. Entering night emits
 * `night-begin` and opens the halt window; the window counts down from the
 * following tick and emits `halt-window-elapsed` when it runs out. Returning
 * to day emits `day-begin`.
 */
@injectable()
export class DayNightCycle {
  private elapsed = 0;
  private phase: DayPhase = DayPhase.DAY;
  private night = false;
  private haltRemaining = 0;

  constructor(
    @inject(TYPES.NavigationConfig) private readonly config: NavigationConfig,
  ) {}

  private get cycleLength(): number {
    return this.config.dayLength + this.config.nightLength;
  }

  private get cycleTime(): number {
    return this.elapsed % this.cycleLength;
  }

  /**
   * Advances the clock by `dt` seconds and returns the signals raised,
   * in order. Non-positive `dt` raises nothing.
   */
  public advance(dt: number): DayNightSignal[] {
    if (!(dt > 0)) return [];

    const signals: DayNightSignal[] = [];
    const wasNight = this.night;
    const wasHalting = this.phase === DayPhase.HALT;

    this.elapsed += dt;
    this.night = this.cycleTime >= this.config.dayLength;

    if (this.night && !wasNight) {
      this.phase = DayPhase.HALT;
      this.haltRemaining = this.config.haltWindow;
      signals.push(DayNightSignal.NIGHT_BEGIN);
    } else if (this.night && wasHalting) {
      this.haltRemaining -= dt;
      if (this.haltRemaining <= 0) {
        this.haltRemaining = 0;
        this.phase = DayPhase.FLEE;
        signals.push(DayNightSignal.HALT_WINDOW_ELAPSED);
      }
    } else if (!this.night && wasNight) {
      this.phase = DayPhase.DAY;
      this.haltRemaining = 0;
      signals.push(DayNightSignal.DAY_BEGIN);
    }

    if (signals.length > 0) {
      logger.info(`Day/night: ${signals.join(", ")}`, LogCategory.SIMULATION, {
        elapsed: this.elapsed,
        phase: this.phase,
      });
    }
    return signals;
  }

  public getPhase(): DayPhase {
    return this.phase;
  }

  public isNight(): boolean {
    return this.night;
  }

  public getState(): DayNightState {
    return {
      phase: this.phase,
      elapsed: this.elapsed,
      progress: this.cycleTime / this.cycleLength,
      isNight: this.night,
      haltRemaining: this.haltRemaining,
    };
  }

  public reset(): void {
    this.elapsed = 0;
    this.phase = DayPhase.DAY;
    this.night = false;
    this.haltRemaining = 0;
  }
}
