import { describe, it, expect } from "vitest";
import { NavGrid, cellOf, centerOf, BLOCKED, FREE } from "../../../src/domain/simulation/systems/navigation/NavGrid";
import type { Rect } from "../../../src/shared/types/navigation";

function blockedCells(grid: NavGrid): string[] {
  const cells: string[] = [];
  grid.toMatrix().forEach((row, r) =>
    row.forEach((value, c) => {
      if (value === BLOCKED) cells.push(`${c},${r}`);
    }),
  );
  return cells;
}

describe("NavGrid", () => {
  describe("build", () => {
    it("debe calcular columnas y filas con ceil", () => {
      const grid = NavGrid.build({ width: 95, height: 41 }, 10, [], 0);

      expect(grid.cols).toBe(10);
      expect(grid.rows).toBe(5);
      expect(grid.countBlocked()).toBe(0);
    });

    it("debe bloquear las celdas que toca el obstáculo", () => {
      const grid = NavGrid.build(
        { width: 100, height: 100 },
        10,
        [{ bounds: { x: 25, y: 25, width: 10, height: 10 } }],
        0,
      );

      expect(blockedCells(grid)).toEqual(["2,2", "3,2", "2,3", "3,3"]);
    });

    it("no debe invadir la celda siguiente si el borde cae justo en el límite", () => {
      const grid = NavGrid.build(
        { width: 100, height: 100 },
        10,
        [{ bounds: { x: 20, y: 20, width: 10, height: 10 } }],
        0,
      );

      expect(blockedCells(grid)).toEqual(["2,2"]);
    });

    it("debe expandir el bloqueo expandCells celdas por lado", () => {
      const grid = NavGrid.build(
        { width: 100, height: 100 },
        10,
        [{ bounds: { x: 25, y: 25, width: 10, height: 10 } }],
        1,
      );

      expect(grid.countBlocked()).toBe(16);
      expect(grid.isBlocked(1, 1)).toBe(true);
      expect(grid.isBlocked(4, 4)).toBe(true);
      expect(grid.isBlocked(5, 5)).toBe(false);
      expect(grid.isBlocked(0, 2)).toBe(false);
    });

    it("debe recortar la expansión a los límites del grid", () => {
      const grid = NavGrid.build(
        { width: 50, height: 50 },
        10,
        [{ bounds: { x: 0, y: 0, width: 10, height: 10 } }],
        2,
      );

      expect(grid.countBlocked()).toBe(9);
      expect(grid.isBlocked(2, 2)).toBe(true);
      expect(grid.isBlocked(3, 0)).toBe(false);
    });

    it("debe rasterizar solo la parte dentro del mundo", () => {
      const grid = NavGrid.build(
        { width: 100, height: 100 },
        10,
        [
          { bounds: { x: -15, y: -15, width: 20, height: 20 } },
          { bounds: { x: 200, y: 200, width: 30, height: 30 } },
        ],
        0,
      );

      expect(blockedCells(grid)).toEqual(["0,0"]);
    });

    it("debe bloquear exactamente las celdas que intersectan la huella expandida", () => {
      const cellSize = 10;
      const expand = 1;
      const obstacles: Rect[] = [
        { x: 12, y: 47, width: 7, height: 18 },
        { x: 60, y: 5, width: 25, height: 3 },
        { x: 33, y: 80, width: 14, height: 14 },
      ];
      const grid = NavGrid.build(
        { width: 100, height: 100 },
        cellSize,
        obstacles.map((bounds) => ({ bounds })),
        expand,
      );

      const touches = (c: number, r: number, b: Rect): boolean =>
        c * cellSize < b.x + b.width &&
        (c + 1) * cellSize > b.x &&
        r * cellSize < b.y + b.height &&
        (r + 1) * cellSize > b.y;

      for (let r = 0; r < grid.rows; r++) {
        for (let c = 0; c < grid.cols; c++) {
          let expected = false;
          for (const b of obstacles) {
            for (let dr = -expand; dr <= expand && !expected; dr++) {
              for (let dc = -expand; dc <= expand && !expected; dc++) {
                expected = touches(c + dc, r + dr, b);
              }
            }
          }
          expect(grid.isBlocked(c, r)).toBe(expected);
        }
      }
    });

    it("debe rechazar tamaños inválidos", () => {
      expect(() => NavGrid.build({ width: 0, height: 10 }, 10, [], 0)).toThrow(
        "World size must be positive",
      );
      expect(() => NavGrid.build({ width: 10, height: 10 }, 0, [], 0)).toThrow(
        "Cell size must be positive",
      );
      expect(() => NavGrid.build({ width: 10, height: 10 }, 5, [], -1)).toThrow(
        "expandCells must be a non-negative integer",
      );
    });
  });

  describe("consultas", () => {
    const grid = NavGrid.build(
      { width: 40, height: 30 },
      10,
      [{ bounds: { x: 10, y: 10, width: 10, height: 10 } }],
      0,
    );

    it("debe tratar las celdas fuera de rango como bloqueadas", () => {
      expect(grid.isBlocked(-1, 0)).toBe(true);
      expect(grid.isBlocked(4, 0)).toBe(true);
      expect(grid.isBlocked(0, 3)).toBe(true);
      expect(grid.isInBounds(3, 2)).toBe(true);
    });

    it("debe recortar celdas a los límites", () => {
      expect(grid.clampCell({ col: -3, row: 9 })).toEqual({ col: 0, row: 2 });
    });

    it("debe exponer la matriz por filas", () => {
      expect(grid.toMatrix()).toEqual([
        [FREE, FREE, FREE, FREE],
        [FREE, BLOCKED, FREE, FREE],
        [FREE, FREE, FREE, FREE],
      ]);
    });
  });

  describe("coordenadas", () => {
    it("debe convertir posición a celda con floor", () => {
      expect(cellOf({ x: 47.9, y: 48 }, 48)).toEqual({ col: 0, row: 1 });
      expect(cellOf({ x: -0.5, y: 0 }, 48)).toEqual({ col: -1, row: 0 });
    });

    it("debe devolver el centro de la celda", () => {
      expect(centerOf(2, 3, 48)).toEqual({ x: 120, y: 168 });
    });

    it("debe cumplir cellOf(centerOf(c)) == c para toda celda válida", () => {
      const grid = NavGrid.build({ width: 1280, height: 720 }, 48, [], 0);
      for (let row = 0; row < grid.rows; row++) {
        for (let col = 0; col < grid.cols; col++) {
          expect(grid.cellOf(grid.centerOf({ col, row }))).toEqual({ col, row });
        }
      }
    });
  });
});
