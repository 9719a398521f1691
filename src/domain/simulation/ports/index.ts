/**
 * Port interfaces for simulation components
 *
 * These interfaces break circular dependencies between the scheduler,
 * the robots and the event driver by defining contracts instead of
 * requiring concrete implementations.
 *
 * @module domain/simulation/ports
 */

import type { Task } from "../../types/simulation/tasks";
import type { TaskEvent } from "../core/TaskEvent";
import type { GridPoint } from "@/shared/types/warehouse";

/**
 * Component a task can be routed to. The driver pops a step from the front
 * of an event and hands the task to the step's recipient.
 */
export interface TaskRecipient {
  readonly recipientName: string;
  handleTask(task: Task, event: TaskEvent): void;
}

/**
 * Port for the event driver
 */
export interface IEventScheduler {
  /**
   * Re-submits an event, optionally deferred by `delay` ticks
   */
  scheduleEvent(event: TaskEvent, delay?: number): void;

  /**
   * Current simulated tick
   */
  now(): number;
}

/**
 * Port for the warehouse floor as seen by route planning
 */
export interface IGridModel {
  readonly width: number;
  readonly height: number;
  cells(): Iterable<number>;
  inBounds(point: GridPoint): boolean;
  toIndex(point: GridPoint): number;
  toPoint(index: number): GridPoint;
  canTraverse(index: number, carryingShelf: boolean): boolean;
}

/**
 * Port for the picker station
 */
export interface IPickerPort extends TaskRecipient {
  getDropoffLocation(): GridPoint;
}
