import { injectable, inject } from "inversify";
import { TYPES } from "@/config/Types";
import type { NavigationConfig } from "@/shared/constants/NavigationConstants";
import { PathFailureReason } from "@/shared/constants/NavigationEnums";
import type { GridCell, Vec2, Waypoints } from "@/shared/types/navigation";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { BinaryHeap } from "./BinaryHeap";
import { NavGrid, centerOf, sameCell } from "./NavGrid";
import { findNearestFreeCell } from "./helpers";

export interface PathSearchResult {
  path: GridCell[] | null;
  /** Nodes expanded (popped and closed); never exceeds the budget */
  expanded: number;
  failure: PathFailureReason | null;
}

interface OpenEntry {
  index: number;
  g: number;
  f: number;
  seq: number;
}

const NEIGHBOR_OFFSETS: ReadonlyArray<{ dx: number; dy: number; cost: number }> = [
  { dx: -1, dy: -1, cost: Math.SQRT2 },
  { dx: 0, dy: -1, cost: 1 },
  { dx: 1, dy: -1, cost: Math.SQRT2 },
  { dx: -1, dy: 0, cost: 1 },
  { dx: 1, dy: 0, cost: 1 },
  { dx: -1, dy: 1, cost: Math.SQRT2 },
  { dx: 0, dy: 1, cost: 1 },
  { dx: 1, dy: 1, cost: Math.SQRT2 },
];

/** Direction changes below this dot-product gap are treated as colinear */
const COLINEAR_EPSILON = 0.001;
const ZERO_SEGMENT_EPSILON = 1e-12;

function failed(reason: PathFailureReason, expanded = 0): PathSearchResult {
  return { path: null, expanded, failure: reason };
}

/**
 * A* over the 8-connected grid with Euclidean step costs and a Euclidean
 * heuristic. Ties on f are broken by insertion order.
 */
export function searchPath(
  grid: NavGrid,
  start: GridCell,
  goal: GridCell,
  maxExpansions: number = Infinity,
): PathSearchResult {
  if (sameCell(start, goal)) {
    return { path: [{ col: start.col, row: start.row }], expanded: 0, failure: null };
  }
  if (!grid.isInBounds(start.col, start.row)) return failed(PathFailureReason.START_OUT_OF_BOUNDS);
  if (!grid.isInBounds(goal.col, goal.row)) return failed(PathFailureReason.GOAL_OUT_OF_BOUNDS);
  if (grid.isBlocked(start.col, start.row)) return failed(PathFailureReason.START_BLOCKED);
  if (grid.isBlocked(goal.col, goal.row)) return failed(PathFailureReason.GOAL_BLOCKED);

  const cols = grid.cols;
  const size = cols * grid.rows;
  const gScore = new Float64Array(size).fill(Infinity);
  const parent = new Int32Array(size).fill(-1);
  const closed = new Uint8Array(size);
  const startIndex = start.row * cols + start.col;
  const goalIndex = goal.row * cols + goal.col;
  const heuristic = (col: number, row: number): number =>
    Math.hypot(goal.col - col, goal.row - row);

  const open = new BinaryHeap<OpenEntry>((a, b) => a.f - b.f || a.seq - b.seq);
  let seq = 0;
  gScore[startIndex] = 0;
  open.push({ index: startIndex, g: 0, f: heuristic(start.col, start.row), seq: seq++ });

  let expanded = 0;
  while (open.length > 0) {
    const current = open.pop();
    if (!current) break;
    if (closed[current.index] === 1 || current.g > gScore[current.index]) continue;

    if (expanded >= maxExpansions) {
      return failed(PathFailureReason.BUDGET_EXCEEDED, expanded);
    }
    expanded++;
    closed[current.index] = 1;

    if (current.index === goalIndex) {
      const path: GridCell[] = [];
      for (let index = goalIndex; index !== -1; index = parent[index]) {
        path.push({ col: index % cols, row: Math.floor(index / cols) });
      }
      path.reverse();
      return { path, expanded, failure: null };
    }

    const col = current.index % cols;
    const row = Math.floor(current.index / cols);
    for (const { dx, dy, cost } of NEIGHBOR_OFFSETS) {
      const nCol = col + dx;
      const nRow = row + dy;
      if (grid.isBlocked(nCol, nRow)) continue;
      const nIndex = nRow * cols + nCol;
      if (closed[nIndex] === 1) continue;

      const tentative = current.g + cost;
      if (tentative < gScore[nIndex]) {
        gScore[nIndex] = tentative;
        parent[nIndex] = current.index;
        open.push({
          index: nIndex,
          g: tentative,
          f: tentative + heuristic(nCol, nRow),
          seq: seq++,
        });
      }
    }
  }

  return failed(PathFailureReason.UNREACHABLE, expanded);
}

/**
 * Shortest cell path from `start` to `goal`, or null when there is none
 * within the expansion budget. Null means "not found this attempt", not
 * "provably unreachable".
 */
export function findPath(
  grid: NavGrid,
  start: GridCell,
  goal: GridCell,
  maxExpansions: number = Infinity,
): GridCell[] | null {
  return searchPath(grid, start, goal, maxExpansions).path;
}

/**
 * Drops interior points where the direction does not change. First and last
 * points are always kept; points next to a zero-length segment are kept.
 */
export function compressWaypoints(points: ReadonlyArray<Vec2>): Waypoints {
  if (points.length <= 2) {
    return points.map((p) => ({ x: p.x, y: p.y }));
  }

  const compressed: Waypoints = [{ x: points[0].x, y: points[0].y }];
  for (let i = 1; i < points.length - 1; i++) {
    const prev = points[i - 1];
    const pt = points[i];
    const next = points[i + 1];
    const d1x = pt.x - prev.x;
    const d1y = pt.y - prev.y;
    const d2x = next.x - pt.x;
    const d2y = next.y - pt.y;
    const len1 = Math.hypot(d1x, d1y);
    const len2 = Math.hypot(d2x, d2y);

    if (len1 * len1 < ZERO_SEGMENT_EPSILON || len2 * len2 < ZERO_SEGMENT_EPSILON) {
      compressed.push({ x: pt.x, y: pt.y });
      continue;
    }

    const alignment = (d1x / len1) * (d2x / len2) + (d1y / len1) * (d2y / len2);
    if (alignment < 1 - COLINEAR_EPSILON) {
      compressed.push({ x: pt.x, y: pt.y });
    }
  }

  const last = points[points.length - 1];
  compressed.push({ x: last.x, y: last.y });
  return compressed;
}

/**
 * Converts a cell path to world-space cell centres and compresses it.
 */
export function simplifyPath(path: ReadonlyArray<GridCell>, cellSize: number): Waypoints {
  return compressWaypoints(path.map((cell) => centerOf(cell.col, cell.row, cellSize)));
}

/**
 * Path service shared by all agents of a round. Wraps the search with the
 * configured budget, start-cell recovery and failure bookkeeping.
 */
@injectable()
export class PathFinder {
  private searches = 0;
  private failures = 0;
  private totalExpanded = 0;
  private lastFailureReason: PathFailureReason | null = null;

  constructor(
    @inject(TYPES.NavigationConfig) private readonly config: NavigationConfig,
  ) {}

  public get lastFailure(): PathFailureReason | null {
    return this.lastFailureReason;
  }

  public search(grid: NavGrid, start: GridCell, goal: GridCell): PathSearchResult {
    const result = searchPath(grid, start, goal, this.config.maxExpansions);
    this.searches++;
    this.totalExpanded += result.expanded;
    this.lastFailureReason = result.failure;

    if (result.failure) {
      this.failures++;
      logger.debug(`No path: ${result.failure}`, LogCategory.NAVIGATION, {
        start,
        goal,
        expanded: result.expanded,
      });
    }
    return result;
  }

  /**
   * Simplified waypoints from a world position to `goal`. An agent standing
   * in a blocked cell (inside the expansion margin) starts from the nearest
   * free cell. Empty when no path was found.
   */
  public requestWaypoints(grid: NavGrid, from: Vec2, goal: GridCell | null): Waypoints {
    if (!goal) {
      this.searches++;
      this.failures++;
      this.lastFailureReason = PathFailureReason.NO_GOAL;
      return [];
    }

    const ownCell = grid.clampCell(grid.cellOf(from));
    const start = findNearestFreeCell(grid, ownCell, this.config.startCellSearchRadius);
    if (!start) {
      this.searches++;
      this.failures++;
      this.lastFailureReason = PathFailureReason.START_BLOCKED;
      return [];
    }

    const { path } = this.search(grid, start, goal);
    return path ? simplifyPath(path, grid.cellSize) : [];
  }

  public getStats(): { searches: number; failures: number; averageExpanded: number } {
    return {
      searches: this.searches,
      failures: this.failures,
      averageExpanded: this.searches > 0 ? this.totalExpanded / this.searches : 0,
    };
  }
}
