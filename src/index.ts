import "reflect-metadata";

export { TYPES } from "./config/Types";
export { container, createContainer } from "./config/container";
export {
  CONFIG,
  createNavigationConfig,
  loadNavigationConfigFromEnv,
  navigationEnvName,
} from "./config/config";

export { logger, Logger, LogLevel, LogCategory } from "./infrastructure/utils/logger";
export type { LogEntry, LogFilter } from "./infrastructure/utils/logger";

export {
  DEFAULT_NAVIGATION_CONFIG,
  type NavigationConfig,
} from "./shared/constants/NavigationConstants";
export { PathFailureReason } from "./shared/constants/NavigationEnums";
export { BehaviorMode, DayNightSignal, DayPhase, Facing } from "./shared/constants/BehaviorEnums";
export { ShapeKind } from "./shared/constants/CollisionEnums";
export { RoundEventType, ALL_ROUND_EVENT_TYPES } from "./shared/constants/EventEnums";
export type * from "./shared/types/navigation";
export { RandomUtils } from "./shared/utils/RandomUtils";
export { SpatialGrid } from "./utils/SpatialGrid";

export { NavGrid, cellOf, centerOf } from "./domain/simulation/systems/navigation/NavGrid";
export {
  PathFinder,
  searchPath,
  findPath,
  simplifyPath,
  compressWaypoints,
  type PathSearchResult,
} from "./domain/simulation/systems/navigation/PathFinder";
export { findNearestFreeCell, pathCost } from "./domain/simulation/systems/navigation/helpers";
export {
  rectShape,
  circleShape,
  maskFromRows,
  boundsOf,
  shapesOverlap,
  overlapsObstacle,
} from "./domain/simulation/systems/world/collision";
export {
  createEnemyAgent,
  facingFromVector,
  type EnemyAgent,
  type AgentSnapshot,
} from "./domain/simulation/systems/agents/EnemyAgent";
export {
  BehaviorModeController,
  type ModeChange,
} from "./domain/simulation/systems/agents/BehaviorModeController";
export {
  SteeringSystem,
  type SteeringContext,
  type SteeringOutcome,
} from "./domain/simulation/systems/agents/SteeringSystem";
export { separationForce, avoidanceForce } from "./domain/simulation/systems/agents/steeringForces";
export { DayNightCycle, type DayNightState } from "./domain/simulation/systems/core/DayNightCycle";
export {
  RoundOrchestrator,
  type RoundLayout,
  type AgentSpawn,
  type PlayerState,
  type TickInput,
  type TickReport,
} from "./domain/simulation/core/RoundOrchestrator";
export {
  RoundRunner,
  systemClock,
  type Clock,
  type PlayerSource,
} from "./domain/simulation/core/RoundRunner";
export { BatchedEventEmitter } from "./domain/simulation/core/BatchedEventEmitter";
export { RoundEventBus, type RoundEventPayloads } from "./domain/simulation/core/events";
