import type { ShapeKind } from "../constants/CollisionEnums";

/**
 * Continuous 2D vector in world space (pixels).
 */
export interface Vec2 {
  x: number;
  y: number;
}

/**
 * Axis-aligned rectangle, top-left anchored.
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface WorldSize {
  width: number;
  height: number;
}

/**
 * Integer cell coordinates in the navigation grid.
 */
export interface GridCell {
  col: number;
  row: number;
}

export interface RectShape {
  kind: ShapeKind.RECT;
  width: number;
  height: number;
}

export interface CircleShape {
  kind: ShapeKind.CIRCLE;
  radius: number;
}

/**
 * Per-pixel occupancy mask, row-major, non-zero means solid.
 */
export interface MaskShape {
  kind: ShapeKind.MASK;
  width: number;
  height: number;
  bits: Uint8Array;
}

/**
 * Opaque collision volume used for precise overlap tests. A shape is always
 * centred on the position of the body that carries it.
 */
export type CollisionShape = RectShape | CircleShape | MaskShape;

/**
 * Immovable obstacle footprint supplied by the placement layer.
 * `bounds` drives grid rasterisation and the broad phase; `shape`
 * (centred on the bounds centre) drives the precise overlap test.
 */
export interface Obstacle {
  id: string;
  bounds: Rect;
  shape: CollisionShape;
}

/**
 * Ordered list of world-space waypoints produced by path simplification.
 */
export type Waypoints = Vec2[];
