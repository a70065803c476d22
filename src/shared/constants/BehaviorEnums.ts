/**
 * Behaviour-related enumerations for enemy agents.
 *
 * @module shared/constants/BehaviorEnums
 */

/**
 * Discrete behaviour state of an enemy agent.
 */
export enum BehaviorMode {
  CHASE = "chase",
  FLEE = "flee",
  HALT = "halt",
}

/**
 * Day/night signals consumed by the behaviour mode controller.
 */
export enum DayNightSignal {
  NIGHT_BEGIN = "night-begin",
  HALT_WINDOW_ELAPSED = "halt-window-elapsed",
  DAY_BEGIN = "day-begin",
}

/**
 * Phase of the day/night cycle as seen by the round.
 * HALT is the transformation window at the start of each night.
 */
export enum DayPhase {
  DAY = "day",
  HALT = "halt",
  FLEE = "flee",
}

/**
 * Facing direction sampled by the external animator.
 */
export enum Facing {
  UP = "up",
  DOWN = "down",
  LEFT = "left",
  RIGHT = "right",
}
