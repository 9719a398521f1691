import { describe, it, expect, beforeEach } from "vitest";
import { EventDriver } from "../../src/domain/simulation/core/EventDriver";
import { TaskEvent } from "../../src/domain/simulation/core/TaskEvent";
import {
  simulationEvents,
  SimulationEventType,
} from "../../src/domain/simulation/core/events";
import { TaskEventKind, TaskType } from "../../src/shared/constants/TaskEnums";
import type { Task } from "../../src/domain/types/simulation/tasks";
import { createRecordingRecipient, createTestConfig } from "../setup";

const raise: Task = { type: TaskType.RAISE_SHELF };

describe("EventDriver", () => {
  let driver: EventDriver;

  beforeEach(() => {
    driver = new EventDriver(createTestConfig());
  });

  it("debe empezar en el tick 0 sin eventos pendientes", () => {
    expect(driver.now()).toBe(0);
    expect(driver.pendingCount()).toBe(0);
  });

  it("debe despachar en el mismo tick los reenvíos sin retardo", () => {
    const recipient = createRecordingRecipient("relay", (_task, event) => {
      driver.scheduleEvent(event);
    });
    const event = new TaskEvent({ kind: TaskEventKind.ORDER });
    event.prependTask(raise, recipient);
    event.prependTask(raise, recipient);
    driver.scheduleEvent(event);

    const dispatches = driver.tick();

    expect(dispatches).toBe(3);
    expect(recipient.received).toHaveLength(2);
    expect(driver.getStats()).toEqual({
      tick: 1,
      dispatched: 2,
      completed: 1,
      failed: 0,
      pending: 0,
    });
  });

  it("debe despachar eventos del mismo tick en orden de envío", () => {
    const order: string[] = [];
    const recipient = createRecordingRecipient("sink", (_task, event) => {
      order.push(event.id);
    });
    for (const id of ["a", "b", "c"]) {
      driver.scheduleEvent(
        TaskEvent.single(raise, recipient, { kind: TaskEventKind.ORDER, id }),
      );
    }

    driver.tick();

    expect(order).toEqual(["a", "b", "c"]);
  });

  it("debe respetar el retardo", () => {
    const recipient = createRecordingRecipient("slow", (_task, event) => {
      driver.scheduleEvent(event, 2);
    });
    driver.scheduleEvent(
      TaskEvent.single(raise, recipient, { kind: TaskEventKind.ORDER }),
    );

    driver.tick();
    expect(driver.pendingCount()).toBe(1);
    driver.tick();
    expect(driver.getStats().completed).toBe(0);
    driver.tick();
    expect(driver.getStats().completed).toBe(1);
    expect(driver.pendingCount()).toBe(0);
  });

  it("debe publicar ORDER_COMPLETED sólo para pedidos", () => {
    const completed: string[] = [];
    simulationEvents.subscribe(SimulationEventType.ORDER_COMPLETED, (payload) => {
      completed.push(`${payload.eventId}@${payload.tick}`);
    });

    driver.scheduleEvent(
      new TaskEvent({ kind: TaskEventKind.ORDER, id: "order-1", createdAt: 0 }),
    );
    driver.scheduleEvent(new TaskEvent({ kind: TaskEventKind.CHARGE, id: "charge-1" }));
    driver.tick();
    simulationEvents.flushEvents();

    expect(completed).toEqual(["order-1@1"]);
    expect(driver.getStats().completed).toBe(2);
  });

  it("debe descartar el evento cuando el destinatario falla", () => {
    const dropped: string[] = [];
    simulationEvents.subscribe(SimulationEventType.EVENT_DROPPED, (payload) => {
      dropped.push(`${payload.eventId}:${payload.recipient}:${payload.reason}`);
    });
    const failing = createRecordingRecipient("broken", () => {
      throw new Error("boom");
    });
    driver.scheduleEvent(
      TaskEvent.single(raise, failing, { kind: TaskEventKind.ORDER, id: "e1" }),
    );

    expect(() => driver.tick()).not.toThrow();
    simulationEvents.flushEvents();

    expect(dropped).toEqual(["e1:broken:boom"]);
    expect(driver.getStats().failed).toBe(1);
    expect(driver.pendingCount()).toBe(0);
  });

  it("debe rechazar retardos inválidos", () => {
    const event = new TaskEvent({ kind: TaskEventKind.ORDER, id: "bad" });
    expect(() => driver.scheduleEvent(event, -1)).toThrow("Invalid delay -1");
    expect(() => driver.scheduleEvent(event, 0.5)).toThrow("Invalid delay 0.5");
  });

  it("debe diferir al siguiente tick lo que supera el límite de despachos", () => {
    driver = new EventDriver(createTestConfig({ maxDispatchesPerTick: 2 }));
    const recipient = createRecordingRecipient("sink");
    for (const id of ["a", "b", "c"]) {
      driver.scheduleEvent(
        TaskEvent.single(raise, recipient, { kind: TaskEventKind.ORDER, id }),
      );
    }

    expect(driver.tick()).toBe(2);
    expect(recipient.received).toHaveLength(2);
    expect(driver.pendingCount()).toBe(1);

    expect(driver.tick()).toBe(1);
    expect(recipient.received).toHaveLength(3);
    expect(driver.pendingCount()).toBe(0);
  });

  it("debe correr hasta quedar inactivo", () => {
    const recipient = createRecordingRecipient("slow", (_task, event) => {
      driver.scheduleEvent(event, 1);
    });
    const event = new TaskEvent({ kind: TaskEventKind.ORDER });
    event.prependTask(raise, recipient);
    event.prependTask(raise, recipient);
    driver.scheduleEvent(event);

    const ran = driver.runUntilIdle(50);

    expect(ran).toBe(3);
    expect(driver.now()).toBe(3);
    expect(driver.getStats().completed).toBe(1);
  });

  it("debe avanzar n ticks con run", () => {
    driver.run(5);
    expect(driver.now()).toBe(5);
  });
});
