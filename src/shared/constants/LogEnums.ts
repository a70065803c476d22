/**
 * Log level enumerations for the navigation core.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which subsystem generated the log.
 */
export enum LogCategory {
  /** Round orchestration and tick loop */
  SIMULATION = "simulation",
  /** Grid construction and A* searches */
  NAVIGATION = "navigation",
  /** Per-agent steering integration */
  STEERING = "steering",
  /** Chase/flee/halt mode switches */
  BEHAVIOR = "behavior",
  /** Hard collision resolution against obstacles */
  COLLISION = "collision",
  /** Catch, despawn and round outcome bookkeeping */
  ROUND = "round",
  /** Configuration loading and validation */
  CONFIG = "config",
  /** General/uncategorized logs */
  GENERAL = "general",
}
