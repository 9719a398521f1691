import type { SimulationConfig } from "../../../../config/config";
import {
  logger,
  LogCategory,
  LogLevel,
} from "../../../../infrastructure/utils/logger";
import { RobotState } from "../../../../shared/constants/RobotEnums";
import { TaskType } from "../../../../shared/constants/TaskEnums";
import type {
  GridPoint,
  RobotSnapshot,
} from "../../../../shared/types/warehouse";
import type { Task } from "../../../types/simulation/tasks";
import type { TaskEvent } from "../../core/TaskEvent";
import type { IEventScheduler, TaskRecipient } from "../../ports";
import type { WarehouseGrid } from "../warehouse/WarehouseGrid";

export const MAX_CHARGE = 100;

export type RobotTuning = Pick<
  SimulationConfig,
  "rechargeThreshold" | "chargeDrainPerMove" | "retryDelayTicks"
>;

export interface RobotOptions {
  id: number;
  position: GridPoint;
  grid: WarehouseGrid;
  scheduler: IEventScheduler;
  tuning: RobotTuning;
  charge?: number;
}

/**
 * A mobile robot that carries shelves across the warehouse floor.
 *
 * Robots are the recipients of the primitive steps of a retrieval chain:
 * moving one cell, raising the shelf underneath them and lowering it again.
 * Each primitive takes one tick. Lifecycle state is owned by the RobotPool.
 */
export class Robot implements TaskRecipient {
  public readonly id: number;
  /** Seed position; robots return here after every retrieval */
  public readonly home: GridPoint;
  private position: GridPoint;
  private carrying = false;
  private charge: number;
  private lifecycle: RobotState = RobotState.AVAILABLE;
  private readonly grid: WarehouseGrid;
  private readonly scheduler: IEventScheduler;
  private readonly tuning: RobotTuning;

  constructor(options: RobotOptions) {
    this.id = options.id;
    this.home = { ...options.position };
    this.position = { ...options.position };
    this.grid = options.grid;
    this.scheduler = options.scheduler;
    this.tuning = options.tuning;
    this.charge = Math.max(0, Math.min(MAX_CHARGE, options.charge ?? MAX_CHARGE));
  }

  public get recipientName(): string {
    return `robot-${this.id}`;
  }

  public get state(): RobotState {
    return this.lifecycle;
  }

  /**
   * Records the pool list this robot now belongs to. Only the RobotPool
   * calls this, in the same step that moves the robot between lists.
   */
  public transitionTo(state: RobotState): void {
    this.lifecycle = state;
  }

  public getLocation(): GridPoint {
    return { ...this.position };
  }

  public hasShelf(): boolean {
    return this.carrying;
  }

  public chargeLevel(): number {
    return this.charge;
  }

  public advanceCharge(): void {
    this.charge = Math.min(MAX_CHARGE, this.charge + 1);
  }

  public needsMoreCharge(): boolean {
    return this.charge < this.tuning.rechargeThreshold;
  }

  public moveTo(point: GridPoint): void {
    this.position = { ...point };
    this.charge = Math.max(0, this.charge - this.tuning.chargeDrainPerMove);
  }

  public raiseShelf(): void {
    if (this.carrying) {
      throw new Error(`${this.recipientName} is already carrying a shelf`);
    }
    this.grid.liftShelf(this.position);
    this.carrying = true;
  }

  /**
   * True while this robot stands on a shelf home whose shelf another robot
   * has taken away. The raise is retried until the shelf comes back.
   */
  public awaitingShelf(): boolean {
    return (
      !this.carrying &&
      this.grid.isShelfHome(this.position) &&
      !this.grid.isShelfParked(this.position)
    );
  }

  public lowerShelf(): void {
    if (!this.carrying) {
      throw new Error(`${this.recipientName} has no shelf to lower`);
    }
    this.grid.placeShelf(this.position);
    this.carrying = false;
  }

  public handleTask(task: Task, event: TaskEvent): void {
    switch (task.type) {
      case TaskType.SPECIFIC_ROBOT_TO_LOCATION:
        this.moveTo(task.location);
        break;
      case TaskType.RAISE_SHELF:
        if (this.awaitingShelf()) {
          logger.robotLog(
            LogLevel.DEBUG,
            LogCategory.FLEET,
            this.id,
            `Shelf at [${this.position.x},${this.position.y}] is out: waiting`,
          );
          event.prependTask(task, this);
          break;
        }
        this.raiseShelf();
        logger.robotLog(
          LogLevel.DEBUG,
          LogCategory.FLEET,
          this.id,
          `Raised shelf at [${this.position.x},${this.position.y}]`,
        );
        break;
      case TaskType.LOWER_SHELF:
        this.lowerShelf();
        logger.robotLog(
          LogLevel.DEBUG,
          LogCategory.FLEET,
          this.id,
          `Lowered shelf at [${this.position.x},${this.position.y}]`,
        );
        break;
      default:
        throw new Error(
          `${this.recipientName} cannot handle task ${task.type}`,
        );
    }
    this.scheduler.scheduleEvent(event, this.tuning.retryDelayTicks);
  }

  public getSnapshot(): RobotSnapshot {
    return {
      id: this.id,
      position: this.getLocation(),
      home: { ...this.home },
      hasShelf: this.carrying,
      charge: this.charge,
      state: this.lifecycle,
    };
  }

  public toString(): string {
    return this.recipientName;
  }
}
