import type { GridCell, Rect, Vec2, WorldSize } from "@/shared/types/navigation";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";

export const FREE = 0;
export const BLOCKED = 1;

/**
 * Cell containing a world position (floor division).
 */
export function cellOf(pos: Vec2, cellSize: number): GridCell {
  return {
    col: Math.floor(pos.x / cellSize),
    row: Math.floor(pos.y / cellSize),
  };
}

/**
 * World-space centre of a cell. Inverse of {@link cellOf} up to truncation.
 */
export function centerOf(col: number, row: number, cellSize: number): Vec2 {
  return {
    x: col * cellSize + cellSize / 2,
    y: row * cellSize + cellSize / 2,
  };
}

export function sameCell(a: GridCell, b: GridCell): boolean {
  return a.col === b.col && a.row === b.row;
}

/**
 * Binary occupancy grid covering the world. Immutable once built: agents
 * share one instance per round and only read from it.
 */
export class NavGrid {
  public readonly cols: number;
  public readonly rows: number;
  public readonly cellSize: number;
  private readonly cells: Uint8Array;

  private constructor(cols: number, rows: number, cellSize: number, cells: Uint8Array) {
    this.cols = cols;
    this.rows = rows;
    this.cellSize = cellSize;
    this.cells = cells;
  }

  /**
   * Rasterises every obstacle rectangle into the cells it overlaps, grown by
   * `expandCells` on all four sides and clamped to the grid.
   *
   * @throws Error on a non-positive world size or cell size, or a negative margin
   */
  public static build(
    world: WorldSize,
    cellSize: number,
    obstacles: ReadonlyArray<{ bounds: Rect }>,
    expandCells: number,
  ): NavGrid {
    if (!(world.width > 0) || !(world.height > 0)) {
      throw new Error(`World size must be positive, got ${world.width}x${world.height}`);
    }
    if (!(cellSize > 0)) {
      throw new Error(`Cell size must be positive, got ${cellSize}`);
    }
    if (!Number.isInteger(expandCells) || expandCells < 0) {
      throw new Error(`expandCells must be a non-negative integer, got ${expandCells}`);
    }

    const cols = Math.ceil(world.width / cellSize);
    const rows = Math.ceil(world.height / cellSize);
    const cells = new Uint8Array(cols * rows);

    for (const { bounds } of obstacles) {
      const left = Math.floor(bounds.x / cellSize);
      const top = Math.floor(bounds.y / cellSize);
      // Half-open on the far edges: a rect ending exactly on a cell boundary
      // does not reach into the next cell.
      const right = Math.max(left, Math.ceil((bounds.x + bounds.width) / cellSize) - 1);
      const bottom = Math.max(top, Math.ceil((bounds.y + bounds.height) / cellSize) - 1);

      if (right < 0 || bottom < 0 || left >= cols || top >= rows) continue;

      const minCol = Math.max(0, Math.max(0, left) - expandCells);
      const maxCol = Math.min(cols - 1, Math.min(cols - 1, right) + expandCells);
      const minRow = Math.max(0, Math.max(0, top) - expandCells);
      const maxRow = Math.min(rows - 1, Math.min(rows - 1, bottom) + expandCells);

      for (let row = minRow; row <= maxRow; row++) {
        cells.fill(BLOCKED, row * cols + minCol, row * cols + maxCol + 1);
      }
    }

    const grid = new NavGrid(cols, rows, cellSize, cells);
    logger.info("NavGrid built", LogCategory.NAVIGATION, {
      size: `${cols}x${rows}`,
      cellSize,
      obstacles: obstacles.length,
      blocked: grid.countBlocked(),
    });
    return grid;
  }

  public isInBounds(col: number, row: number): boolean {
    return col >= 0 && row >= 0 && col < this.cols && row < this.rows;
  }

  /**
   * Out-of-bounds cells count as blocked.
   */
  public isBlocked(col: number, row: number): boolean {
    if (!this.isInBounds(col, row)) return true;
    return this.cells[row * this.cols + col] === BLOCKED;
  }

  public isWalkable(cell: GridCell): boolean {
    return !this.isBlocked(cell.col, cell.row);
  }

  public clampCell(cell: GridCell): GridCell {
    return {
      col: Math.max(0, Math.min(this.cols - 1, cell.col)),
      row: Math.max(0, Math.min(this.rows - 1, cell.row)),
    };
  }

  public cellOf(pos: Vec2): GridCell {
    return cellOf(pos, this.cellSize);
  }

  public centerOf(cell: GridCell): Vec2 {
    return centerOf(cell.col, cell.row, this.cellSize);
  }

  public countBlocked(): number {
    let blocked = 0;
    for (const value of this.cells) {
      blocked += value;
    }
    return blocked;
  }

  /**
   * Row-major copy of the occupancy flags (`matrix[row][col]`).
   */
  public toMatrix(): number[][] {
    const matrix: number[][] = [];
    for (let row = 0; row < this.rows; row++) {
      matrix.push(Array.from(this.cells.subarray(row * this.cols, (row + 1) * this.cols)));
    }
    return matrix;
  }
}
