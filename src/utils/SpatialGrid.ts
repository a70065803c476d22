import type { Rect, Vec2 } from "../shared/types/navigation";

interface SpatialEntry {
  /** Point used for radius queries (rect centre for rect entries) */
  anchor: Vec2;
  /** Extent used for rect queries; a point entry has zero size */
  bounds: Rect;
  /** Bucket keys the entry is registered in */
  keys: string[];
}

/**
 * Uniform bucket grid for broad-phase queries. Point entries live in one
 * bucket; rect entries are registered in every bucket their bounds touch.
 */
export class SpatialGrid<T = string> {
  private cells = new Map<string, Set<T>>();
  private entries = new Map<T, SpatialEntry>();
  private readonly cellSize: number;
  private readonly cols: number;
  private readonly rows: number;

  constructor(worldWidth: number, worldHeight: number, cellSize: number) {
    this.cellSize = cellSize;
    this.cols = Math.max(1, Math.ceil(worldWidth / cellSize));
    this.rows = Math.max(1, Math.ceil(worldHeight / cellSize));
  }

  private toCol(x: number): number {
    return Math.max(0, Math.min(this.cols - 1, Math.floor(x / this.cellSize)));
  }

  private toRow(y: number): number {
    return Math.max(0, Math.min(this.rows - 1, Math.floor(y / this.cellSize)));
  }

  private cellKey(col: number, row: number): string {
    return `${col},${row}`;
  }

  private register(entity: T, anchor: Vec2, bounds: Rect): void {
    this.remove(entity);

    const keys: string[] = [];
    const minCol = this.toCol(bounds.x);
    const maxCol = this.toCol(bounds.x + bounds.width);
    const minRow = this.toRow(bounds.y);
    const maxRow = this.toRow(bounds.y + bounds.height);

    for (let row = minRow; row <= maxRow; row++) {
      for (let col = minCol; col <= maxCol; col++) {
        const key = this.cellKey(col, row);
        let bucket = this.cells.get(key);
        if (!bucket) {
          bucket = new Set();
          this.cells.set(key, bucket);
        }
        bucket.add(entity);
        keys.push(key);
      }
    }

    this.entries.set(entity, { anchor: { ...anchor }, bounds: { ...bounds }, keys });
  }

  public insert(entity: T, position: Vec2): void {
    this.register(entity, position, {
      x: position.x,
      y: position.y,
      width: 0,
      height: 0,
    });
  }

  public insertRect(entity: T, bounds: Rect): void {
    this.register(
      entity,
      { x: bounds.x + bounds.width / 2, y: bounds.y + bounds.height / 2 },
      bounds,
    );
  }

  public remove(entity: T): void {
    const entry = this.entries.get(entity);
    if (!entry) return;

    for (const key of entry.keys) {
      const bucket = this.cells.get(key);
      if (!bucket) continue;
      bucket.delete(entity);
      if (bucket.size === 0) {
        this.cells.delete(key);
      }
    }

    this.entries.delete(entity);
  }

  public has(entity: T): boolean {
    return this.entries.has(entity);
  }

  public get size(): number {
    return this.entries.size;
  }

  private collect(area: Rect): Set<T> {
    const found = new Set<T>();
    const minCol = this.toCol(area.x);
    const maxCol = this.toCol(area.x + area.width);
    const minRow = this.toRow(area.y);
    const maxRow = this.toRow(area.y + area.height);

    for (let row = minRow; row <= maxRow; row++) {
      for (let col = minCol; col <= maxCol; col++) {
        const bucket = this.cells.get(this.cellKey(col, row));
        if (!bucket) continue;
        for (const entity of bucket) {
          found.add(entity);
        }
      }
    }
    return found;
  }

  /**
   * Entities whose anchor lies within `radius` of `center` (inclusive).
   */
  public queryRadius(
    center: Vec2,
    radius: number,
  ): Array<{ entity: T; anchor: Vec2; distance: number }> {
    const results: Array<{ entity: T; anchor: Vec2; distance: number }> = [];
    const candidates = this.collect({
      x: center.x - radius,
      y: center.y - radius,
      width: radius * 2,
      height: radius * 2,
    });

    for (const entity of candidates) {
      const entry = this.entries.get(entity);
      if (!entry) continue;
      const distance = Math.hypot(entry.anchor.x - center.x, entry.anchor.y - center.y);
      if (distance <= radius) {
        results.push({ entity, anchor: { ...entry.anchor }, distance });
      }
    }

    return results;
  }

  /**
   * Entities whose stored bounds touch `area` (inclusive of shared edges).
   */
  public queryRect(area: Rect): T[] {
    const results: T[] = [];
    for (const entity of this.collect(area)) {
      const entry = this.entries.get(entity);
      if (!entry) continue;
      const b = entry.bounds;
      if (
        b.x <= area.x + area.width &&
        b.x + b.width >= area.x &&
        b.y <= area.y + area.height &&
        b.y + b.height >= area.y
      ) {
        results.push(entity);
      }
    }
    return results;
  }

  public getStats(): {
    totalEntities: number;
    totalCells: number;
    occupiedCells: number;
    maxEntitiesInCell: number;
  } {
    let maxEntities = 0;
    for (const bucket of this.cells.values()) {
      maxEntities = Math.max(maxEntities, bucket.size);
    }

    return {
      totalEntities: this.entries.size,
      totalCells: this.cols * this.rows,
      occupiedCells: this.cells.size,
      maxEntitiesInCell: maxEntities,
    };
  }
}
