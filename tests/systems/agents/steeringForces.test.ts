import { describe, it, expect } from "vitest";
import {
  avoidanceForce,
  directVelocity,
  inverseSquareRepulsion,
  separationForce,
} from "../../../src/domain/simulation/systems/agents/steeringForces";

describe("steeringForces", () => {
  describe("separationForce", () => {
    it("debe ser simétrica entre dos agentes", () => {
      const a = { x: 12, y: 30 };
      const b = { x: 30, y: 18 };

      const onA = separationForce(a, [b], 36, 420, 0.1);
      const onB = separationForce(b, [a], 36, 420, 0.1);

      expect(onA.x).toBeCloseTo(-onB.x, 10);
      expect(onA.y).toBeCloseTo(-onB.y, 10);
      expect(Math.hypot(onA.x, onA.y)).toBeCloseTo(42, 10);
      expect(Math.hypot(onB.x, onB.y)).toBeCloseTo(42, 10);
    });

    it("debe empujar en dirección opuesta al vecino", () => {
      const force = separationForce({ x: 0, y: 0 }, [{ x: 10, y: 0 }], 36, 420, 0.1);

      expect(force.x).toBeCloseTo(-42, 10);
      expect(force.y).toBeCloseTo(0, 10);
    });

    it("debe ignorar vecinos fuera del radio o coincidentes", () => {
      expect(separationForce({ x: 0, y: 0 }, [{ x: 36, y: 0 }], 36, 420, 0.1)).toEqual({
        x: 0,
        y: 0,
      });
      expect(separationForce({ x: 5, y: 5 }, [{ x: 5, y: 5 }], 36, 420, 0.1)).toEqual({
        x: 0,
        y: 0,
      });
    });

    it("debe pesar más a los vecinos cercanos", () => {
      const sum = inverseSquareRepulsion(
        { x: 0, y: 0 },
        [
          { x: 2, y: 0 },
          { x: 0, y: -10 },
        ],
        36,
      );

      expect(sum.x).toBeCloseTo(-0.5, 12);
      expect(sum.y).toBeCloseTo(0.1, 12);
    });
  });

  describe("avoidanceForce", () => {
    it("debe alejarse del centro del obstáculo con magnitud avoidForce*dt", () => {
      const force = avoidanceForce({ x: 100, y: 100 }, [{ x: 100, y: 120 }], 38.4, 600, 0.05);

      expect(force.x).toBeCloseTo(0, 10);
      expect(force.y).toBeCloseTo(-30, 10);
    });

    it("debe ser cero sin obstáculos cercanos", () => {
      expect(avoidanceForce({ x: 0, y: 0 }, [], 32, 600, 0.1)).toEqual({ x: 0, y: 0 });
    });
  });

  describe("directVelocity", () => {
    it("debe apuntar hacia el objetivo a velocidad máxima", () => {
      const v = directVelocity({ x: 0, y: 0 }, { x: 3, y: 4 }, 150);

      expect(v.x).toBeCloseTo(90, 10);
      expect(v.y).toBeCloseTo(120, 10);
    });

    it("debe apuntar en sentido contrario al huir", () => {
      const v = directVelocity({ x: 0, y: 0 }, { x: 3, y: 4 }, 150, true);

      expect(v.x).toBeCloseTo(-90, 10);
      expect(v.y).toBeCloseTo(-120, 10);
    });

    it("debe ser cero si ya está en el objetivo", () => {
      expect(directVelocity({ x: 7, y: 7 }, { x: 7, y: 7 }, 150)).toEqual({ x: 0, y: 0 });
    });
  });
});
