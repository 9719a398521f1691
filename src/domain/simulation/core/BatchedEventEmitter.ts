import { EventEmitter } from "node:events";

type EventName<TEvents> = keyof TEvents & string;

/**
 * Typed EventEmitter that buffers published events while batching is enabled.
 *
 * Handlers run when the runner flushes at the end of a tick, so listeners
 * never observe a task chain halfway through a dispatch.
 */
export class BatchedEventEmitter<TEvents extends object> extends EventEmitter {
  private eventQueue: Array<{ name: EventName<TEvents>; payload: unknown }> =
    [];
  private batchingEnabled = true;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  public publish<K extends EventName<TEvents>>(
    name: K,
    payload: TEvents[K],
  ): void {
    if (!this.batchingEnabled) {
      super.emit(name, payload);
      return;
    }

    this.eventQueue.push({ name, payload });
  }

  /**
   * @returns A function that removes the listener
   */
  public subscribe<K extends EventName<TEvents>>(
    name: K,
    listener: (payload: TEvents[K]) => void,
  ): () => void {
    this.on(name, listener);
    return () => {
      this.off(name, listener);
    };
  }

  /**
   * Delivers every queued event in publish order.
   *
   * @returns Number of events delivered
   */
  public flushEvents(): number {
    if (this.eventQueue.length === 0) return 0;

    const batch = this.eventQueue.splice(0);
    const wasBatchingEnabled = this.batchingEnabled;

    this.batchingEnabled = false;

    try {
      for (const event of batch) {
        super.emit(event.name, event.payload);
      }
    } finally {
      this.batchingEnabled = wasBatchingEnabled;
    }
    return batch.length;
  }

  public setBatchingEnabled(enabled: boolean): void {
    this.batchingEnabled = enabled;
    if (!enabled) {
      this.flushEvents();
    }
  }

  public clearQueue(): void {
    this.eventQueue = [];
  }

  public getQueueSize(): number {
    return this.eventQueue.length;
  }
}
