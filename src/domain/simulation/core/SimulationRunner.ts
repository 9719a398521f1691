import { EventEmitter } from "node:events";
import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { SimulationConfig } from "../../../config/config";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import type { InventoryItem } from "../../../shared/types/warehouse";
import type {
  CompletedOrder,
  SimulationCommand,
  SimulationSnapshot,
} from "../../../shared/types/commands/SimulationCommand";
import { RandomUtils } from "../../../shared/utils/RandomUtils";
import catalog from "../data/catalog.json";
import type { EventDriver } from "./EventDriver";
import { simulationEvents, SimulationEventType } from "./events";
import { CommandProcessor } from "./runner/CommandProcessor";
import { Robot } from "../systems/fleet/Robot";
import type { RobotPool } from "../systems/fleet/RobotPool";
import type { InventorySystem } from "../systems/inventory/InventorySystem";
import type { PickerStation } from "../systems/picker/PickerStation";
import type { WarehouseGrid } from "../systems/warehouse/WarehouseGrid";

const DEFAULT_CATALOG: readonly InventoryItem[] = catalog;

export interface SimulationRunnerEvents {
  tick: [snapshot: SimulationSnapshot];
  commandRejected: [command: SimulationCommand];
}

/**
 * Main simulation orchestrator.
 *
 * Owns the warehouse setup, the command queue and the tick loop. Each step
 * applies queued commands, advances the event driver by one tick and then
 * flushes the batched simulation events.
 */
@injectable()
export class SimulationRunner {
  private readonly emitter = new EventEmitter();
  private readonly commands: SimulationCommand[] = [];
  private readonly commandProcessor: CommandProcessor;
  private readonly completedOrders: CompletedOrder[] = [];
  private tickHandle?: NodeJS.Timeout;
  private initialized = false;
  private timeScale = 1;

  constructor(
    @inject(TYPES.SimulationConfig) private readonly config: SimulationConfig,
    @inject(TYPES.EventDriver) public readonly driver: EventDriver,
    @inject(TYPES.WarehouseGrid) public readonly grid: WarehouseGrid,
    @inject(TYPES.RobotPool) public readonly pool: RobotPool,
    @inject(TYPES.PickerStation) public readonly picker: PickerStation,
    @inject(TYPES.InventorySystem) public readonly inventory: InventorySystem,
  ) {
    this.commandProcessor = new CommandProcessor(this);
  }

  public on<K extends keyof SimulationRunnerEvents>(
    event: K,
    listener: (...args: SimulationRunnerEvents[K]) => void,
  ): void {
    this.emitter.on(event, listener);
  }

  public off<K extends keyof SimulationRunnerEvents>(
    event: K,
    listener: (...args: SimulationRunnerEvents[K]) => void,
  ): void {
    this.emitter.off(event, listener);
  }

  private emit<K extends keyof SimulationRunnerEvents>(
    event: K,
    ...args: SimulationRunnerEvents[K]
  ): void {
    this.emitter.emit(event, ...args);
  }

  public get TimeScale(): number {
    return this.timeScale;
  }

  public setTimeScale(scale: number): void {
    this.timeScale = scale;
    logger.info(`Time scale set to ${scale}`, LogCategory.SIMULATION);
  }

  public get isRunning(): boolean {
    return this.tickHandle !== undefined;
  }

  /**
   * Seeds the fleet and stocks the default catalogue. Safe to call twice.
   */
  public initialize(): void {
    if (this.initialized) return;
    this.initialized = true;

    RandomUtils.seed(this.config.randomSeed);

    const robots: Robot[] = [];
    for (let i = 0; i < this.config.fleetSize; i++) {
      robots.push(
        new Robot({
          id: i,
          position: {
            x: this.config.fleetOrigin.x + i,
            y: this.config.fleetOrigin.y,
          },
          grid: this.grid,
          scheduler: this.driver,
          tuning: this.config,
        }),
      );
    }
    this.pool.seed(robots);

    for (const item of DEFAULT_CATALOG) {
      this.inventory.addItem(item);
    }

    simulationEvents.subscribe(SimulationEventType.ORDER_COMPLETED, (event) => {
      this.completedOrders.push({
        eventId: event.eventId,
        sku: event.sku,
        createdAt: event.createdAt,
        completedAt: event.tick,
      });
    });

    logger.info(
      `Warehouse ready: ${this.grid.width}x${this.grid.height} grid, ${this.pool.size} robot(s), ${this.inventory.getShelves().length} shelf(s), ${DEFAULT_CATALOG.length} item(s)`,
      LogCategory.SIMULATION,
    );
  }

  /**
   * Raises and schedules an order for one unit of `sku`.
   *
   * @returns The order's event id, or `null` for an unknown SKU
   */
  public placeOrder(sku: string): string | null {
    const event = this.inventory.generateOrder(sku);
    if (!event) return null;

    this.driver.scheduleEvent(event);
    simulationEvents.publish(SimulationEventType.ORDER_PLACED, {
      eventId: event.id,
      sku,
      tick: this.driver.now(),
    });
    logger.info(`Order ${event.id} placed for ${sku}`, LogCategory.SIMULATION);
    return event.id;
  }

  /**
   * Queues a command for the next tick.
   *
   * @returns `false` when the queue is full and the command was rejected
   */
  public enqueueCommand(command: SimulationCommand): boolean {
    if (this.commands.length >= this.config.maxCommandQueue) {
      logger.warn(
        `Command queue full (${this.config.maxCommandQueue}), rejecting ${command.type}`,
        LogCategory.SIMULATION,
      );
      this.emit("commandRejected", command);
      return false;
    }
    this.commands.push(command);
    return true;
  }

  public getQueuedCommandCount(): number {
    return this.commands.length;
  }

  /**
   * Advances the simulation by `ticks` ticks.
   */
  public step(ticks = 1): SimulationSnapshot {
    for (let i = 0; i < ticks; i++) {
      this.commandProcessor.process(this.commands);
      this.driver.tick();
      simulationEvents.flushEvents();
    }

    const snapshot = this.getSnapshot();
    this.emit("tick", snapshot);
    return snapshot;
  }

  /**
   * Starts the real-time loop: one step every `tickIntervalMs / timeScale`.
   */
  public start(): void {
    if (this.tickHandle) {
      logger.warn("Simulation already running", LogCategory.SIMULATION);
      return;
    }
    this.initialize();
    this.scheduleNextStep();
    logger.info(
      `Simulation started (${this.config.tickIntervalMs}ms per tick)`,
      LogCategory.SIMULATION,
    );
  }

  public stop(): void {
    if (!this.tickHandle) return;
    clearTimeout(this.tickHandle);
    this.tickHandle = undefined;
    logger.info("Simulation stopped", LogCategory.SIMULATION);
  }

  public getSnapshot(): SimulationSnapshot {
    return {
      tick: this.driver.now(),
      timeScale: this.timeScale,
      running: this.isRunning,
      fleet: this.pool.getSnapshot(),
      grid: this.grid.getSnapshot(),
      pendingEvents: this.driver.pendingCount(),
      driver: this.driver.getStats(),
      pickCount: this.picker.getPickCount(),
      completedOrders: [...this.completedOrders],
    };
  }

  private scheduleNextStep(): void {
    const delay = Math.max(1, this.config.tickIntervalMs / this.timeScale);
    this.tickHandle = setTimeout(() => {
      try {
        this.step();
      } catch (error) {
        logger.error("Simulation step failed", LogCategory.SIMULATION, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      if (this.tickHandle) this.scheduleNextStep();
    }, delay);
  }
}
