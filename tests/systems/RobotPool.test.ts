import { describe, it, expect, beforeEach } from "vitest";
import { RobotPool } from "../../src/domain/simulation/systems/fleet/RobotPool";
import type { Robot } from "../../src/domain/simulation/systems/fleet/Robot";
import { WarehouseGrid } from "../../src/domain/simulation/systems/warehouse/WarehouseGrid";
import {
  simulationEvents,
  SimulationEventType,
} from "../../src/domain/simulation/core/events";
import { RobotState } from "../../src/shared/constants/RobotEnums";
import { createRobot, RecordingScheduler } from "../setup";

describe("RobotPool", () => {
  let scheduler: RecordingScheduler;
  let grid: WarehouseGrid;
  let pool: RobotPool;
  let robots: Robot[];

  beforeEach(() => {
    scheduler = new RecordingScheduler();
    grid = new WarehouseGrid({ width: 40, height: 10, dropoff: { x: 0, y: 9 } });
    pool = new RobotPool(scheduler);
    robots = Array.from({ length: 10 }, (_, i) =>
      createRobot(i, { x: 20 + i, y: 0 }, grid, scheduler),
    );
    pool.seed(robots);
  });

  it("debe sembrar todos los robots como disponibles en orden", () => {
    expect(pool.size).toBe(10);
    expect(pool.getAvailable().map((robot) => robot.id)).toEqual([
      0, 1, 2, 3, 4, 5, 6, 7, 8, 9,
    ]);
    expect(pool.getWorking()).toHaveLength(0);
    expect(pool.getCharging()).toHaveLength(0);
  });

  it("debe rechazar ids repetidos", () => {
    expect(() => pool.seed([robots[0]])).toThrow("Robot 0 is already in the pool");
  });

  describe("acquire", () => {
    it("debe entregar en orden FIFO y marcarlos trabajando", () => {
      const first = pool.acquire();
      const second = pool.acquire();

      expect(first?.id).toBe(0);
      expect(second?.id).toBe(1);
      expect(first?.state).toBe(RobotState.WORKING);
      expect(pool.getWorking().map((robot) => robot.id)).toEqual([0, 1]);
      expect(pool.getAvailable()).toHaveLength(8);
    });

    it("debe devolver null cuando los 10 robots están trabajando", () => {
      for (let i = 0; i < 10; i++) {
        expect(pool.acquire()).not.toBeNull();
      }

      expect(pool.acquire()).toBeNull();
      expect(pool.getWorking()).toHaveLength(10);
    });

    it("debe publicar ROBOT_ACQUIRED con el tick actual", () => {
      const acquired: Array<{ robotId: number; tick: number }> = [];
      simulationEvents.subscribe(SimulationEventType.ROBOT_ACQUIRED, (payload) => {
        acquired.push(payload);
      });
      scheduler.tick = 7;

      pool.acquire();
      simulationEvents.flushEvents();

      expect(acquired).toEqual([{ robotId: 0, tick: 7 }]);
    });
  });

  describe("release", () => {
    it("debe mover un robot trabajando a cargando", () => {
      const robot = pool.acquire();
      if (!robot) throw new Error("expected a robot");

      pool.release(robot);

      expect(robot.state).toBe(RobotState.CHARGING);
      expect(pool.getWorking()).toHaveLength(0);
      expect(pool.getCharging()).toEqual([robot]);
    });

    it("debe rechazar liberar un robot que no trabaja", () => {
      expect(() => pool.release(robots[4])).toThrow(
        "Cannot release robot 4: it is available, not working",
      );
      expect(pool.getAvailable()).toHaveLength(10);
      expect(pool.getCharging()).toHaveLength(0);
    });
  });

  describe("chargeTick", () => {
    it("debe devolver el robot al final de disponibles cuando termina de cargar", () => {
      const robot = pool.acquire();
      if (!robot) throw new Error("expected a robot");
      robot.moveTo({ x: 20, y: 1 });
      robot.moveTo({ x: 20, y: 2 });
      pool.release(robot);

      expect(pool.chargeTick(robot)).toBe(false);
      expect(robot.chargeLevel()).toBe(99);
      expect(pool.getCharging()).toEqual([robot]);

      expect(pool.chargeTick(robot)).toBe(true);
      expect(robot.chargeLevel()).toBe(100);
      expect(robot.state).toBe(RobotState.AVAILABLE);
      expect(pool.getCharging()).toHaveLength(0);
      expect(pool.getAvailable().map((r) => r.id)).toEqual([
        1, 2, 3, 4, 5, 6, 7, 8, 9, 0,
      ]);
    });

    it("debe rechazar cargar un robot que no está cargando", () => {
      expect(() => pool.chargeTick(robots[2])).toThrow(
        "Cannot charge robot 2: it is available, not charging",
      );
    });
  });

  it("debe mantener cada robot en exactamente una lista", () => {
    const a = pool.acquire();
    const b = pool.acquire();
    if (!a || !b) throw new Error("expected robots");
    pool.release(a);

    const snapshot = pool.getSnapshot();
    const all = [...snapshot.available, ...snapshot.working, ...snapshot.charging];

    expect(all.sort((x, y) => x - y)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(snapshot.working).toEqual([1]);
    expect(snapshot.charging).toEqual([0]);
    expect(snapshot.robots[0].state).toBe(RobotState.CHARGING);
  });

  it("debe buscar robots por id", () => {
    expect(pool.getRobot(5)).toBe(robots[5]);
    expect(pool.getRobot(42)).toBeUndefined();
  });
});
