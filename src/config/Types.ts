/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  NavigationConfig: Symbol.for("NavigationConfig"),
  PathFinder: Symbol.for("PathFinder"),
  BehaviorModeController: Symbol.for("BehaviorModeController"),
  SteeringSystem: Symbol.for("SteeringSystem"),
  DayNightCycle: Symbol.for("DayNightCycle"),
  RoundOrchestrator: Symbol.for("RoundOrchestrator"),
  RoundRunner: Symbol.for("RoundRunner"),
  Clock: Symbol.for("Clock"),
};
