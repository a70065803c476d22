/**
 * Tunables of the navigation core, bundled into one immutable struct that is
 * handed to the grid, path finder, steering and round constructors.
 *
 * Distances are world pixels, times are seconds.
 *
 * @module shared/constants/NavigationConstants
 */
export interface NavigationConfig {
  /** Edge length of a navigation grid cell */
  readonly cellSize: number;
  /** Blocked margin (in cells) added around every obstacle footprint */
  readonly expandCells: number;
  /** A* node expansion budget per search */
  readonly maxExpansions: number;
  /** Minimum seconds between two path requests of the same agent */
  readonly recalcInterval: number;
  readonly maxSpeed: number;
  /** Maximum velocity change per second */
  readonly acceleration: number;
  readonly separationRadius: number;
  readonly separationForce: number;
  readonly avoidForce: number;
  /** Obstacle avoidance radius is max(avoidRadiusMin, cellSize * avoidRadiusCellFactor) */
  readonly avoidRadiusMin: number;
  readonly avoidRadiusCellFactor: number;
  /** Waypoint arrival radius is max(waypointRadiusMin, cellSize * waypointRadiusCellFactor) */
  readonly waypointRadiusMin: number;
  readonly waypointRadiusCellFactor: number;
  /** Push-out distance on a hard collision, as a fraction of the cell size */
  readonly collisionPushCellFactor: number;
  /** Velocity multiplier applied on a hard collision */
  readonly collisionDamping: number;
  /** Velocity multiplier applied to an agent that strikes the player */
  readonly contactBounce: number;
  /** Seconds a caught agent stays in the world before it despawns */
  readonly despawnDelay: number;
  readonly dayLength: number;
  readonly nightLength: number;
  /** Transformation window at the start of the night during which agents halt */
  readonly haltWindow: number;
  /** Minimum speed at which facing follows velocity */
  readonly facingSpeedThreshold: number;
  /** Ring radius searched for a free start cell when the agent stands in a blocked one */
  readonly startCellSearchRadius: number;
}

export const DEFAULT_NAVIGATION_CONFIG: NavigationConfig = Object.freeze({
  cellSize: 48,
  expandCells: 1,
  maxExpansions: 25000,
  recalcInterval: 0.85,
  maxSpeed: 150,
  acceleration: 900,
  separationRadius: 36,
  separationForce: 420,
  avoidForce: 600,
  avoidRadiusMin: 32,
  avoidRadiusCellFactor: 0.8,
  waypointRadiusMin: 10,
  waypointRadiusCellFactor: 0.35,
  collisionPushCellFactor: 0.06,
  collisionDamping: 0.55,
  contactBounce: -0.3,
  despawnDelay: 0.7,
  dayLength: 20,
  nightLength: 12,
  haltWindow: 0.56,
  facingSpeedThreshold: 4,
  startCellSearchRadius: 2,
});

/** Fields that must be whole numbers */
export const INTEGER_CONFIG_KEYS: ReadonlyArray<keyof NavigationConfig> = [
  "expandCells",
  "maxExpansions",
  "startCellSearchRadius",
];

/** Fields that may be zero or negative */
export const SIGNED_CONFIG_KEYS: ReadonlyArray<keyof NavigationConfig> = [
  "expandCells",
  "startCellSearchRadius",
  "contactBounce",
  "collisionDamping",
  "separationForce",
  "avoidForce",
];
