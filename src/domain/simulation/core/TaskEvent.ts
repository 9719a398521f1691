import { randomUUID } from "node:crypto";
import { TaskEventKind } from "@/shared/constants/TaskEnums";
import type { InventoryItem } from "@/shared/types/warehouse";
import type { Task } from "../../types/simulation/tasks";
import type { TaskRecipient } from "../ports";

export interface TaskStep {
  task: Task;
  recipient: TaskRecipient;
}

export interface TaskEventOptions {
  kind: TaskEventKind;
  createdAt?: number;
  /** Item the order was raised for, kept for reporting */
  item?: InventoryItem;
  id?: string;
}

/**
 * One logical unit of work (an order, or a robot's charging session) and the
 * ordered chain of steps still left to run for it.
 *
 * The driver consumes the chain strictly front to back, one step per
 * dispatch. Handlers add work with {@link prependTask}, which inserts at the
 * front. Steps are stored as a stack whose top is the front of the chain, so
 * both operations are O(1).
 */
export class TaskEvent {
  public readonly id: string;
  public readonly kind: TaskEventKind;
  public readonly createdAt: number;
  public readonly item?: InventoryItem;
  private readonly stack: TaskStep[] = [];

  constructor(options: TaskEventOptions) {
    this.kind = options.kind;
    this.createdAt = options.createdAt ?? 0;
    this.item = options.item;
    this.id = options.id ?? `${options.kind}_${randomUUID().slice(0, 8)}`;
  }

  /**
   * Creates an event whose chain holds a single step.
   */
  public static single(
    task: Task,
    recipient: TaskRecipient,
    options: TaskEventOptions,
  ): TaskEvent {
    const event = new TaskEvent(options);
    event.prependTask(task, recipient);
    return event;
  }

  public prependTask(task: Task, recipient: TaskRecipient): void {
    this.stack.push({ task, recipient });
  }

  /**
   * Removes and returns the front step.
   */
  public nextStep(): TaskStep | undefined {
    return this.stack.pop();
  }

  public peek(): TaskStep | undefined {
    return this.stack[this.stack.length - 1];
  }

  public get size(): number {
    return this.stack.length;
  }

  public isEmpty(): boolean {
    return this.stack.length === 0;
  }

  /**
   * Remaining steps in execution order (front first).
   */
  public steps(): readonly TaskStep[] {
    return [...this.stack].reverse();
  }
}

/**
 * Collects steps in execution order and prepends them onto an event in one
 * pass, so the first step given ends up at the front of the chain.
 */
export class TaskChainBuilder {
  private readonly pending: TaskStep[] = [];

  public then(task: Task, recipient: TaskRecipient): this {
    this.pending.push({ task, recipient });
    return this;
  }

  public get length(): number {
    return this.pending.length;
  }

  /**
   * @returns Number of steps prepended
   */
  public prependTo(event: TaskEvent): number {
    for (let i = this.pending.length - 1; i >= 0; i--) {
      const step = this.pending[i];
      event.prependTask(step.task, step.recipient);
    }
    return this.pending.length;
  }
}
