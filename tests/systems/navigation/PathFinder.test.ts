import { describe, it, expect, beforeEach } from "vitest";
import { NavGrid } from "../../../src/domain/simulation/systems/navigation/NavGrid";
import {
  PathFinder,
  compressWaypoints,
  findPath,
  searchPath,
  simplifyPath,
} from "../../../src/domain/simulation/systems/navigation/PathFinder";
import { pathCost } from "../../../src/domain/simulation/systems/navigation/helpers";
import { PathFailureReason } from "../../../src/shared/constants/NavigationEnums";
import type { GridCell } from "../../../src/shared/types/navigation";
import { RandomUtils } from "../../../src/shared/utils/RandomUtils";
import { createTestConfig } from "../../setup";

/**
 * Grid con celda de 10 px y las celdas indicadas bloqueadas
 */
function gridWithBlocked(cols: number, rows: number, blocked: GridCell[]): NavGrid {
  return NavGrid.build(
    { width: cols * 10, height: rows * 10 },
    10,
    blocked.map(({ col, row }) => ({
      bounds: { x: col * 10, y: row * 10, width: 10, height: 10 },
    })),
    0,
  );
}

/**
 * Dijkstra por fuerza bruta (O(n²), sin heap) con los mismos costes
 */
function bruteForceCost(grid: NavGrid, start: GridCell, goal: GridCell): number | null {
  const n = grid.cols * grid.rows;
  const dist = new Array<number>(n).fill(Infinity);
  const done = new Array<boolean>(n).fill(false);
  dist[start.row * grid.cols + start.col] = 0;

  for (;;) {
    let current = -1;
    for (let i = 0; i < n; i++) {
      if (!done[i] && dist[i] < Infinity && (current === -1 || dist[i] < dist[current])) {
        current = i;
      }
    }
    if (current === -1) return null;
    if (current === goal.row * grid.cols + goal.col) return dist[current];
    done[current] = true;

    const col = current % grid.cols;
    const row = Math.floor(current / grid.cols);
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        if (dx === 0 && dy === 0) continue;
        if (grid.isBlocked(col + dx, row + dy)) continue;
        const next = (row + dy) * grid.cols + (col + dx);
        const candidate = dist[current] + Math.hypot(dx, dy);
        if (candidate < dist[next]) dist[next] = candidate;
      }
    }
  }
}

function expectValidPath(grid: NavGrid, path: GridCell[], start: GridCell, goal: GridCell): void {
  expect(path[0]).toEqual(start);
  expect(path[path.length - 1]).toEqual(goal);
  for (let i = 0; i < path.length; i++) {
    expect(grid.isWalkable(path[i])).toBe(true);
    if (i > 0) {
      const step = Math.max(
        Math.abs(path[i].col - path[i - 1].col),
        Math.abs(path[i].row - path[i - 1].row),
      );
      expect(step).toBe(1);
    }
  }
}

describe("searchPath", () => {
  describe("terminación", () => {
    it("debe devolver un solo elemento si start == goal", () => {
      const grid = gridWithBlocked(5, 5, []);
      const result = searchPath(grid, { col: 3, row: 1 }, { col: 3, row: 1 });

      expect(result).toEqual({ path: [{ col: 3, row: 1 }], expanded: 0, failure: null });
    });

    it("debe devolver null si el inicio está bloqueado", () => {
      const grid = gridWithBlocked(5, 5, [{ col: 0, row: 0 }]);
      const result = searchPath(grid, { col: 0, row: 0 }, { col: 4, row: 4 });

      expect(result.path).toBeNull();
      expect(result.failure).toBe(PathFailureReason.START_BLOCKED);
    });

    it("debe devolver null si la meta está bloqueada", () => {
      const grid = gridWithBlocked(5, 5, [{ col: 4, row: 4 }]);

      expect(searchPath(grid, { col: 0, row: 0 }, { col: 4, row: 4 }).failure).toBe(
        PathFailureReason.GOAL_BLOCKED,
      );
    });

    it("debe rechazar celdas fuera del grid", () => {
      const grid = gridWithBlocked(5, 5, []);

      expect(searchPath(grid, { col: -1, row: 0 }, { col: 4, row: 4 }).failure).toBe(
        PathFailureReason.START_OUT_OF_BOUNDS,
      );
      expect(searchPath(grid, { col: 0, row: 0 }, { col: 5, row: 4 }).failure).toBe(
        PathFailureReason.GOAL_OUT_OF_BOUNDS,
      );
    });

    it("debe agotar la región alcanzable si la meta está encerrada", () => {
      const grid = gridWithBlocked(5, 5, [
        { col: 3, row: 3 },
        { col: 4, row: 3 },
        { col: 3, row: 4 },
      ]);
      const result = searchPath(grid, { col: 0, row: 0 }, { col: 4, row: 4 }, 1000);

      expect(result.path).toBeNull();
      expect(result.failure).toBe(PathFailureReason.UNREACHABLE);
      // 25 celdas - 3 bloqueadas - la meta encerrada
      expect(result.expanded).toBe(21);
    });

    it("no debe exceder el presupuesto de expansiones", () => {
      const grid = gridWithBlocked(10, 10, []);

      const tight = searchPath(grid, { col: 0, row: 0 }, { col: 9, row: 9 }, 9);
      expect(tight.path).toBeNull();
      expect(tight.failure).toBe(PathFailureReason.BUDGET_EXCEEDED);
      expect(tight.expanded).toBe(9);

      const enough = searchPath(grid, { col: 0, row: 0 }, { col: 9, row: 9 }, 10);
      expect(enough.expanded).toBe(10);
      expect(enough.path).toHaveLength(10);
    });
  });

  describe("optimalidad", () => {
    it("debe rodear una celda bloqueada en el grid 5x5 con coste 2 + 3√2", () => {
      const grid = gridWithBlocked(5, 5, [{ col: 2, row: 2 }]);
      const start = { col: 0, row: 0 };
      const goal = { col: 4, row: 4 };

      const path = findPath(grid, start, goal);

      expect(path).not.toBeNull();
      if (!path) return;
      expectValidPath(grid, path, start, goal);
      expect(path).toHaveLength(6);
      expect(pathCost(path)).toBeCloseTo(2 + 3 * Math.SQRT2, 9);
      expect(path).not.toContainEqual({ col: 2, row: 2 });
    });

    it("debe seguir la recta en un grid vacío", () => {
      const grid = gridWithBlocked(10, 3, []);
      const path = findPath(grid, { col: 1, row: 1 }, { col: 8, row: 1 });

      expect(path).toEqual(
        [1, 2, 3, 4, 5, 6, 7, 8].map((col) => ({ col, row: 1 })),
      );
    });

    it("debe coincidir con Dijkstra en grids aleatorios 10x10", () => {
      RandomUtils.seed("dijkstra-cross-check");

      for (let trial = 0; trial < 40; trial++) {
        const blocked: GridCell[] = [];
        for (let row = 0; row < 10; row++) {
          for (let col = 0; col < 10; col++) {
            if (RandomUtils.chance(0.25)) blocked.push({ col, row });
          }
        }
        const start = { col: RandomUtils.intRange(0, 9), row: RandomUtils.intRange(0, 9) };
        const goal = { col: RandomUtils.intRange(0, 9), row: RandomUtils.intRange(0, 9) };
        const isEndpoint = (c: GridCell): boolean =>
          (c.col === start.col && c.row === start.row) ||
          (c.col === goal.col && c.row === goal.row);
        const grid = gridWithBlocked(10, 10, blocked.filter((c) => !isEndpoint(c)));

        const path = findPath(grid, start, goal);
        const expected = bruteForceCost(grid, start, goal);

        if (expected === null) {
          expect(path).toBeNull();
        } else {
          expect(path).not.toBeNull();
          if (!path) continue;
          expectValidPath(grid, path, start, goal);
          expect(pathCost(path)).toBeCloseTo(expected, 9);
        }
      }
    });
  });
});

describe("PathFinder", () => {
  let pathFinder: PathFinder;

  beforeEach(() => {
    pathFinder = new PathFinder(createTestConfig({ cellSize: 10 }));
  });

  it("debe devolver waypoints simplificados en coordenadas de mundo", () => {
    const grid = gridWithBlocked(10, 10, []);

    const waypoints = pathFinder.requestWaypoints(grid, { x: 15, y: 5 }, { col: 9, row: 0 });

    expect(waypoints).toEqual([
      { x: 15, y: 5 },
      { x: 95, y: 5 },
    ]);
    expect(pathFinder.lastFailure).toBeNull();
  });

  it("debe arrancar desde la celda libre más cercana si la propia está bloqueada", () => {
    const grid = gridWithBlocked(10, 10, [{ col: 0, row: 0 }]);

    const waypoints = pathFinder.requestWaypoints(grid, { x: 5, y: 5 }, { col: 9, row: 0 });

    expect(waypoints).toEqual([
      { x: 15, y: 5 },
      { x: 95, y: 5 },
    ]);
  });

  it("debe devolver lista vacía y registrar el motivo sin meta", () => {
    const grid = gridWithBlocked(10, 10, []);

    expect(pathFinder.requestWaypoints(grid, { x: 5, y: 5 }, null)).toEqual([]);
    expect(pathFinder.lastFailure).toBe(PathFailureReason.NO_GOAL);
  });

  it("debe devolver lista vacía si la meta es inalcanzable", () => {
    const grid = gridWithBlocked(5, 5, [
      { col: 3, row: 3 },
      { col: 4, row: 3 },
      { col: 3, row: 4 },
    ]);

    expect(pathFinder.requestWaypoints(grid, { x: 5, y: 5 }, { col: 4, row: 4 })).toEqual([]);
    expect(pathFinder.lastFailure).toBe(PathFailureReason.UNREACHABLE);
  });

  it("debe respetar el presupuesto configurado", () => {
    const limited = new PathFinder(createTestConfig({ cellSize: 10, maxExpansions: 5 }));
    const grid = gridWithBlocked(10, 10, []);

    const result = limited.search(grid, { col: 0, row: 0 }, { col: 9, row: 9 });

    expect(result.failure).toBe(PathFailureReason.BUDGET_EXCEEDED);
    expect(result.expanded).toBe(5);
  });

  it("debe acumular estadísticas", () => {
    const grid = gridWithBlocked(10, 10, []);
    pathFinder.search(grid, { col: 0, row: 0 }, { col: 9, row: 9 });
    pathFinder.requestWaypoints(grid, { x: 5, y: 5 }, null);

    expect(pathFinder.getStats()).toEqual({
      searches: 2,
      failures: 1,
      averageExpanded: 5,
    });
  });

  it("debe producir waypoints estables al volver a comprimirlos", () => {
    const grid = gridWithBlocked(5, 5, [{ col: 2, row: 2 }]);
    const path = findPath(grid, { col: 0, row: 0 }, { col: 4, row: 4 });
    expect(path).not.toBeNull();
    if (!path) return;

    const waypoints = simplifyPath(path, 10);

    expect(waypoints[0]).toEqual({ x: 5, y: 5 });
    expect(waypoints[waypoints.length - 1]).toEqual({ x: 45, y: 45 });
    expect(waypoints.length).toBeLessThanOrEqual(path.length);
    expect(compressWaypoints(waypoints)).toEqual(waypoints);
  });
});
