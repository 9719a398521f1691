import { injectable, inject } from "inversify";
import { TYPES } from "../../../config/Types";
import type { SimulationConfig } from "../../../config/config";
import { logger, LogCategory } from "../../../infrastructure/utils/logger";
import { TaskEventKind } from "../../../shared/constants/TaskEnums";
import type { IEventScheduler } from "../ports";
import type { TaskEvent } from "./TaskEvent";
import { simulationEvents, SimulationEventType } from "./events";

export interface EventDriverStats {
  tick: number;
  dispatched: number;
  completed: number;
  failed: number;
  pending: number;
}

/**
 * Discrete-event driver: owns simulated time and the queue of pending task
 * events.
 *
 * Events are bucketed by the tick they are due at. {@link tick} advances the
 * clock by one and dispatches every due event in submission order; an event
 * re-submitted with no delay while the tick runs is dispatched in the same
 * tick. Dispatching pops the front step of the event's chain and hands it to
 * the step's recipient. An event with nothing left in its chain is complete.
 */
@injectable()
export class EventDriver implements IEventScheduler {
  private readonly buckets = new Map<number, TaskEvent[]>();
  private currentTick = 0;
  private pending = 0;
  private dispatched = 0;
  private completed = 0;
  private failed = 0;
  private readonly maxDispatchesPerTick: number;

  constructor(@inject(TYPES.SimulationConfig) config: SimulationConfig) {
    this.maxDispatchesPerTick = config.maxDispatchesPerTick;
  }

  public now(): number {
    return this.currentTick;
  }

  public scheduleEvent(event: TaskEvent, delay = 0): void {
    if (!Number.isInteger(delay) || delay < 0) {
      throw new Error(
        `Invalid delay ${delay} for event ${event.id}: expected a non-negative integer`,
      );
    }
    this.enqueue(event, this.currentTick + delay);
  }

  /**
   * Advances simulated time by one tick and dispatches everything due.
   *
   * @returns Number of dispatches performed during the tick
   */
  public tick(): number {
    this.currentTick++;
    logger.setTick(this.currentTick);

    let dispatchesThisTick = 0;
    for (
      let due = this.nextDueTick();
      due !== undefined;
      due = this.nextDueTick()
    ) {
      const bucket = this.buckets.get(due) ?? [];
      let i = 0;
      while (
        i < bucket.length &&
        dispatchesThisTick < this.maxDispatchesPerTick
      ) {
        this.pending--;
        dispatchesThisTick++;
        this.dispatch(bucket[i]);
        i++;
      }
      this.buckets.delete(due);

      if (i < bucket.length) {
        this.deferDue(bucket.slice(i));
        break;
      }
    }

    return dispatchesThisTick;
  }

  /**
   * Runs `ticks` consecutive ticks.
   */
  public run(ticks: number): void {
    for (let i = 0; i < ticks; i++) {
      this.tick();
    }
  }

  /**
   * Ticks until nothing is pending or `maxTicks` have elapsed.
   *
   * @returns Number of ticks run
   */
  public runUntilIdle(maxTicks: number): number {
    let ran = 0;
    while (this.pending > 0 && ran < maxTicks) {
      this.tick();
      ran++;
    }
    return ran;
  }

  public pendingCount(): number {
    return this.pending;
  }

  public getStats(): EventDriverStats {
    return {
      tick: this.currentTick,
      dispatched: this.dispatched,
      completed: this.completed,
      failed: this.failed,
      pending: this.pending,
    };
  }

  private nextDueTick(): number | undefined {
    let next: number | undefined;
    for (const dueAt of this.buckets.keys()) {
      if (dueAt <= this.currentTick && (next === undefined || dueAt < next)) {
        next = dueAt;
      }
    }
    return next;
  }

  /**
   * Moves the rest of this tick's work to the next tick once the dispatch
   * limit is hit.
   */
  private deferDue(leftover: TaskEvent[]): void {
    const deferred = [...leftover];
    for (
      let due = this.nextDueTick();
      due !== undefined;
      due = this.nextDueTick()
    ) {
      deferred.push(...(this.buckets.get(due) ?? []));
      this.buckets.delete(due);
    }

    logger.error(
      `Dispatch limit of ${this.maxDispatchesPerTick} reached; deferring ${deferred.length} event(s) to the next tick`,
      LogCategory.SIMULATION,
    );
    for (const event of deferred) {
      this.pending--;
      this.enqueue(event, this.currentTick + 1);
    }
  }

  private enqueue(event: TaskEvent, dueAt: number): void {
    const bucket = this.buckets.get(dueAt);
    if (bucket) {
      bucket.push(event);
    } else {
      this.buckets.set(dueAt, [event]);
    }
    this.pending++;
  }

  private dispatch(event: TaskEvent): void {
    const step = event.nextStep();
    if (!step) {
      this.complete(event);
      return;
    }

    this.dispatched++;
    try {
      step.recipient.handleTask(step.task, event);
    } catch (error) {
      this.failed++;
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(
        `Dropping event ${event.id}: ${step.recipient.recipientName} failed on ${step.task.type}`,
        LogCategory.SIMULATION,
        { reason },
      );
      simulationEvents.publish(SimulationEventType.EVENT_DROPPED, {
        eventId: event.id,
        recipient: step.recipient.recipientName,
        reason,
        tick: this.currentTick,
      });
    }
  }

  private complete(event: TaskEvent): void {
    this.completed++;
    if (event.kind !== TaskEventKind.ORDER) return;

    logger.info(
      `Order ${event.id} completed after ${this.currentTick - event.createdAt} tick(s)`,
      LogCategory.SIMULATION,
    );
    simulationEvents.publish(SimulationEventType.ORDER_COMPLETED, {
      eventId: event.id,
      sku: event.item?.sku,
      createdAt: event.createdAt,
      tick: this.currentTick,
    });
  }
}
