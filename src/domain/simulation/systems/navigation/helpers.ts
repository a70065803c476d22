import type { GridCell } from "@/shared/types/navigation";
import type { NavGrid } from "./NavGrid";

/**
 * Nearest free cell to `cell` within a square ring search of `maxRadius`.
 * Returns `cell` itself when it is free, or null when nothing free is in reach.
 */
export function findNearestFreeCell(
  grid: NavGrid,
  cell: GridCell,
  maxRadius: number,
): GridCell | null {
  if (grid.isWalkable(cell)) {
    return { col: cell.col, row: cell.row };
  }

  for (let radius = 1; radius <= maxRadius; radius++) {
    let best: GridCell | null = null;
    let bestDistSq = Infinity;

    for (let dy = -radius; dy <= radius; dy++) {
      for (let dx = -radius; dx <= radius; dx++) {
        if (Math.max(Math.abs(dx), Math.abs(dy)) !== radius) continue;
        const col = cell.col + dx;
        const row = cell.row + dy;
        if (grid.isBlocked(col, row)) continue;
        const distSq = dx * dx + dy * dy;
        if (distSq < bestDistSq) {
          bestDistSq = distSq;
          best = { col, row };
        }
      }
    }

    if (best) return best;
  }

  return null;
}

/**
 * Euclidean length of a cell path (1 per cardinal step, √2 per diagonal).
 */
export function pathCost(path: ReadonlyArray<GridCell>): number {
  let cost = 0;
  for (let i = 1; i < path.length; i++) {
    cost += Math.hypot(path[i].col - path[i - 1].col, path[i].row - path[i - 1].row);
  }
  return cost;
}
