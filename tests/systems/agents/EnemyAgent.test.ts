import { describe, it, expect } from "vitest";
import {
  createEnemyAgent,
  facingFromVector,
  invalidatePath,
  snapshotAgent,
} from "../../../src/domain/simulation/systems/agents/EnemyAgent";
import { circleShape } from "../../../src/domain/simulation/systems/world/collision";
import { BehaviorMode, Facing } from "../../../src/shared/constants/BehaviorEnums";

describe("EnemyAgent", () => {
  it("debe crearse en chase, quieto y sin camino", () => {
    const spawn = { x: 10, y: 20 };
    const agent = createEnemyAgent("e1", spawn, circleShape(12));

    expect(agent.mode).toBe(BehaviorMode.CHASE);
    expect(agent.velocity).toEqual({ x: 0, y: 0 });
    expect(agent.path).toEqual([]);
    expect(agent.lastRecalc).toBe(-Infinity);
    expect(agent.hit).toBe(false);
    expect(agent.position).not.toBe(spawn);
  });

  describe("facingFromVector", () => {
    it("debe elegir el eje dominante", () => {
      expect(facingFromVector({ x: 5, y: 1 })).toBe(Facing.RIGHT);
      expect(facingFromVector({ x: -5, y: 1 })).toBe(Facing.LEFT);
      expect(facingFromVector({ x: 1, y: -5 })).toBe(Facing.UP);
      expect(facingFromVector({ x: 1, y: 5 })).toBe(Facing.DOWN);
    });

    it("debe preferir el eje vertical en empate", () => {
      expect(facingFromVector({ x: 3, y: -3 })).toBe(Facing.UP);
    });

    it("debe conservar la orientación previa con vector cero", () => {
      expect(facingFromVector({ x: 0, y: 0 }, Facing.LEFT)).toBe(Facing.LEFT);
    });
  });

  it("debe limpiar el camino y opcionalmente el throttle", () => {
    const agent = createEnemyAgent("e1", { x: 0, y: 0 }, circleShape(12));
    agent.path = [{ x: 1, y: 1 }];
    agent.pathIndex = 1;
    agent.lastRecalc = 4;

    invalidatePath(agent);
    expect(agent.path).toEqual([]);
    expect(agent.lastRecalc).toBe(4);

    invalidatePath(agent, true);
    expect(agent.lastRecalc).toBe(-Infinity);
  });

  it("debe marcar moving solo por encima del umbral", () => {
    const agent = createEnemyAgent("e1", { x: 0, y: 0 }, circleShape(12));
    agent.velocity = { x: 3, y: 0 };
    expect(snapshotAgent(agent, 4).moving).toBe(false);

    agent.velocity = { x: 3, y: 3 };
    const snapshot = snapshotAgent(agent, 4);
    expect(snapshot.moving).toBe(true);
    expect(snapshot).toEqual({
      id: "e1",
      position: { x: 0, y: 0 },
      velocity: { x: 3, y: 3 },
      mode: BehaviorMode.CHASE,
      facing: Facing.DOWN,
      moving: true,
      hit: false,
      despawnPending: false,
    });
  });
});
