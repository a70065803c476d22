import { ShapeKind } from "@/shared/constants/CollisionEnums";
import type {
  CollisionShape,
  MaskShape,
  Obstacle,
  Rect,
  Vec2,
} from "@/shared/types/navigation";

/**
 * Overlap tests between centred collision shapes.
 *
 * Rect and circle pairs are solved analytically. Any pair involving a mask
 * is sampled at pixel centres over the intersection of the two bounding
 * boxes, which mirrors a per-pixel mask overlap.
 *
 * @module domain/simulation/systems/world/collision
 */

export function rectShape(width: number, height: number): CollisionShape {
  return { kind: ShapeKind.RECT, width, height };
}

export function circleShape(radius: number): CollisionShape {
  return { kind: ShapeKind.CIRCLE, radius };
}

/**
 * Builds a mask from rows of "#" (solid) and "." (empty) characters.
 */
export function maskFromRows(rows: string[]): MaskShape {
  const height = rows.length;
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const bits = new Uint8Array(width * height);
  rows.forEach((row, y) => {
    for (let x = 0; x < row.length; x++) {
      if (row[x] === "#") bits[y * width + x] = 1;
    }
  });
  return { kind: ShapeKind.MASK, width, height, bits };
}

export function shapeExtent(shape: CollisionShape): { width: number; height: number } {
  switch (shape.kind) {
    case ShapeKind.CIRCLE:
      return { width: shape.radius * 2, height: shape.radius * 2 };
    case ShapeKind.RECT:
    case ShapeKind.MASK:
      return { width: shape.width, height: shape.height };
  }
}

/**
 * Axis-aligned bounding box of `shape` centred on `center`.
 */
export function boundsOf(center: Vec2, shape: CollisionShape): Rect {
  const { width, height } = shapeExtent(shape);
  return { x: center.x - width / 2, y: center.y - height / 2, width, height };
}

export function rectCenter(rect: Rect): Vec2 {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}

/**
 * Strict overlap: rectangles that only share an edge do not intersect.
 */
export function rectsIntersect(a: Rect, b: Rect): boolean {
  return (
    a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}

function intersection(a: Rect, b: Rect): Rect {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  return {
    x,
    y,
    width: Math.min(a.x + a.width, b.x + b.width) - x,
    height: Math.min(a.y + a.height, b.y + b.height) - y,
  };
}

/**
 * Whether world point `p` is inside `shape` centred on `center`.
 */
export function containsPoint(center: Vec2, shape: CollisionShape, p: Vec2): boolean {
  switch (shape.kind) {
    case ShapeKind.RECT:
      return (
        Math.abs(p.x - center.x) < shape.width / 2 &&
        Math.abs(p.y - center.y) < shape.height / 2
      );
    case ShapeKind.CIRCLE: {
      const dx = p.x - center.x;
      const dy = p.y - center.y;
      return dx * dx + dy * dy < shape.radius * shape.radius;
    }
    case ShapeKind.MASK: {
      const ix = Math.floor(p.x - (center.x - shape.width / 2));
      const iy = Math.floor(p.y - (center.y - shape.height / 2));
      if (ix < 0 || iy < 0 || ix >= shape.width || iy >= shape.height) {
        return false;
      }
      return shape.bits[iy * shape.width + ix] !== 0;
    }
  }
}

function circleRectOverlap(circleCenter: Vec2, radius: number, rect: Rect): boolean {
  const nearestX = Math.max(rect.x, Math.min(circleCenter.x, rect.x + rect.width));
  const nearestY = Math.max(rect.y, Math.min(circleCenter.y, rect.y + rect.height));
  const dx = circleCenter.x - nearestX;
  const dy = circleCenter.y - nearestY;
  return dx * dx + dy * dy < radius * radius;
}

function sampledOverlap(
  aCenter: Vec2,
  a: CollisionShape,
  bCenter: Vec2,
  b: CollisionShape,
  area: Rect,
): boolean {
  const startX = Math.floor(area.x);
  const startY = Math.floor(area.y);
  const endX = Math.ceil(area.x + area.width);
  const endY = Math.ceil(area.y + area.height);

  for (let y = startY; y < endY; y++) {
    for (let x = startX; x < endX; x++) {
      const p = { x: x + 0.5, y: y + 0.5 };
      if (containsPoint(aCenter, a, p) && containsPoint(bCenter, b, p)) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Precise overlap between two centred shapes. Runs the bounding-box test
 * first, so callers may use it directly as a combined broad/narrow phase.
 */
export function shapesOverlap(
  aCenter: Vec2,
  a: CollisionShape,
  bCenter: Vec2,
  b: CollisionShape,
): boolean {
  const aBounds = boundsOf(aCenter, a);
  const bBounds = boundsOf(bCenter, b);
  if (!rectsIntersect(aBounds, bBounds)) return false;

  if (a.kind === ShapeKind.RECT && b.kind === ShapeKind.RECT) {
    return true;
  }
  if (a.kind === ShapeKind.CIRCLE && b.kind === ShapeKind.CIRCLE) {
    const reach = a.radius + b.radius;
    const dx = aCenter.x - bCenter.x;
    const dy = aCenter.y - bCenter.y;
    return dx * dx + dy * dy < reach * reach;
  }
  if (a.kind === ShapeKind.CIRCLE && b.kind === ShapeKind.RECT) {
    return circleRectOverlap(aCenter, a.radius, bBounds);
  }
  if (a.kind === ShapeKind.RECT && b.kind === ShapeKind.CIRCLE) {
    return circleRectOverlap(bCenter, b.radius, aBounds);
  }
  return sampledOverlap(aCenter, a, bCenter, b, intersection(aBounds, bBounds));
}

/**
 * Whether a body at `center` overlaps `obstacle`'s collision shape.
 */
export function overlapsObstacle(
  center: Vec2,
  shape: CollisionShape,
  obstacle: Obstacle,
): boolean {
  return shapesOverlap(center, shape, rectCenter(obstacle.bounds), obstacle.shape);
}
