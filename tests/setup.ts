import "reflect-metadata";
import { beforeEach } from "vitest";
import { createSimulationConfig, type SimulationConfig } from "../src/config/config";
import { logger } from "../src/infrastructure/utils/logger";
import { simulationEvents } from "../src/domain/simulation/core/events";
import { EventDriver } from "../src/domain/simulation/core/EventDriver";
import { SimulationRunner } from "../src/domain/simulation/core/SimulationRunner";
import type { TaskEvent } from "../src/domain/simulation/core/TaskEvent";
import type { IEventScheduler, TaskRecipient } from "../src/domain/simulation/ports";
import {
  InventorySystem,
  Pathfinder,
  PickerStation,
  Robot,
  RobotPool,
  RobotScheduler,
  WarehouseGrid,
  type WarehouseLayout,
} from "../src/domain/simulation/systems";
import type { Task } from "../src/domain/types/simulation/tasks";
import type { GridPoint } from "../src/shared/types/warehouse";
import { RandomUtils } from "../src/shared/utils/RandomUtils";

beforeEach(() => {
  simulationEvents.clearQueue();
  simulationEvents.removeAllListeners();
  simulationEvents.setBatchingEnabled(true);
  logger.clear();
  logger.setTick(0);
  RandomUtils.seed("test-seed");
});

/**
 * Config pequeño para tests: grid 30x20, 2 robots, sin estantes.
 */
export function createTestConfig(
  overrides: Partial<SimulationConfig> = {},
): SimulationConfig {
  return createSimulationConfig({
    fleetSize: 2,
    fleetOrigin: { x: 0, y: 0 },
    gridWidth: 30,
    gridHeight: 20,
    dropoff: { x: 0, y: 10 },
    shelfCount: 0,
    shelfOrigin: { x: 10, y: 5 },
    shelfSpacing: 5,
    rechargeThreshold: 100,
    chargeDrainPerMove: 1,
    pickDurationTicks: 1,
    retryDelayTicks: 1,
    maxDispatchesPerTick: 10000,
    tickIntervalMs: 10,
    maxCommandQueue: 5,
    randomSeed: "test-seed",
    ...overrides,
  });
}

/**
 * Scheduler falso que sólo registra los reenvíos.
 */
export class RecordingScheduler implements IEventScheduler {
  public readonly scheduled: Array<{ event: TaskEvent; delay: number }> = [];
  public tick = 0;

  scheduleEvent(event: TaskEvent, delay = 0): void {
    this.scheduled.push({ event, delay });
  }

  now(): number {
    return this.tick;
  }
}

export interface RecordingRecipient extends TaskRecipient {
  received: Task[];
}

/**
 * Destinatario falso que registra las tareas recibidas.
 */
export function createRecordingRecipient(
  name: string,
  onTask?: (task: Task, event: TaskEvent) => void,
): RecordingRecipient {
  const received: Task[] = [];
  return {
    recipientName: name,
    received,
    handleTask(task: Task, event: TaskEvent): void {
      received.push(task);
      onTask?.(task, event);
    },
  };
}

export function createRobot(
  id: number,
  position: GridPoint,
  grid: WarehouseGrid,
  scheduler: IEventScheduler,
  config: SimulationConfig = createTestConfig(),
  charge?: number,
): Robot {
  return new Robot({ id, position, grid, scheduler, tuning: config, charge });
}

export interface TestWarehouse {
  config: SimulationConfig;
  driver: EventDriver;
  grid: WarehouseGrid;
  pathfinder: Pathfinder;
  pool: RobotPool;
  picker: PickerStation;
  scheduler: RobotScheduler;
  inventory: InventorySystem;
  runner: SimulationRunner;
}

/**
 * Arma el grafo completo de componentes sin contenedor.
 */
export function createTestWarehouse(
  overrides: Partial<SimulationConfig> = {},
  layout: Partial<WarehouseLayout> = {},
): TestWarehouse {
  const config = createTestConfig(overrides);
  const driver = new EventDriver(config);
  const grid = new WarehouseGrid({
    width: config.gridWidth,
    height: config.gridHeight,
    dropoff: config.dropoff,
    ...layout,
  });
  const pathfinder = new Pathfinder(grid);
  const pool = new RobotPool(driver);
  const picker = new PickerStation(driver, config);
  const scheduler = new RobotScheduler(driver, pathfinder, pool, picker, config);
  const inventory = new InventorySystem(grid, driver, scheduler, config);
  const runner = new SimulationRunner(
    config,
    driver,
    grid,
    pool,
    picker,
    inventory,
  );
  return {
    config,
    driver,
    grid,
    pathfinder,
    pool,
    picker,
    scheduler,
    inventory,
    runner,
  };
}
