import { describe, it, expect } from "vitest";
import {
  TaskChainBuilder,
  TaskEvent,
} from "../../src/domain/simulation/core/TaskEvent";
import { TaskEventKind, TaskType } from "../../src/shared/constants/TaskEnums";
import { createRecordingRecipient } from "../setup";

describe("TaskEvent", () => {
  const robot = createRecordingRecipient("robot-0");
  const picker = createRecordingRecipient("picker");

  it("debe generar un id con el tipo de evento como prefijo", () => {
    const event = new TaskEvent({ kind: TaskEventKind.ORDER, createdAt: 4 });

    expect(event.id).toMatch(/^order_[0-9a-f]{8}$/);
    expect(event.createdAt).toBe(4);
    expect(event.isEmpty()).toBe(true);
  });

  it("debe respetar un id explícito", () => {
    const event = new TaskEvent({ kind: TaskEventKind.CHARGE, id: "charge-7" });
    expect(event.id).toBe("charge-7");
  });

  it("debe consumir primero la tarea antepuesta", () => {
    const event = new TaskEvent({ kind: TaskEventKind.ORDER });
    event.prependTask({ type: TaskType.LOWER_SHELF }, robot);
    event.prependTask({ type: TaskType.RAISE_SHELF }, robot);

    expect(event.size).toBe(2);
    expect(event.peek()?.task.type).toBe(TaskType.RAISE_SHELF);
    expect(event.nextStep()?.task.type).toBe(TaskType.RAISE_SHELF);
    expect(event.nextStep()?.task.type).toBe(TaskType.LOWER_SHELF);
    expect(event.nextStep()).toBeUndefined();
  });

  it("debe crear eventos de un solo paso", () => {
    const event = TaskEvent.single({ type: TaskType.RAISE_SHELF }, robot, {
      kind: TaskEventKind.ORDER,
    });

    expect(event.size).toBe(1);
    expect(event.peek()?.recipient).toBe(robot);
  });

  describe("TaskChainBuilder", () => {
    it("debe conservar el orden de ejecución al anteponer", () => {
      const event = TaskEvent.single(
        { type: TaskType.LOWER_SHELF },
        robot,
        { kind: TaskEventKind.ORDER },
      );

      const count = new TaskChainBuilder()
        .then({ type: TaskType.RAISE_SHELF }, robot)
        .then(
          {
            type: TaskType.PICK_ITEM_FROM_SHELF,
            item: { sku: "SKU-1", name: "Widget" },
          },
          picker,
        )
        .then({ type: TaskType.SPECIFIC_ROBOT_TO_LOCATION, location: { x: 1, y: 2 } }, robot)
        .prependTo(event);

      expect(count).toBe(3);
      expect(event.steps().map((step) => step.task.type)).toEqual([
        TaskType.RAISE_SHELF,
        TaskType.PICK_ITEM_FROM_SHELF,
        TaskType.SPECIFIC_ROBOT_TO_LOCATION,
        TaskType.LOWER_SHELF,
      ]);
      expect(event.steps()[1].recipient).toBe(picker);
    });

    it("debe no hacer nada si está vacío", () => {
      const event = new TaskEvent({ kind: TaskEventKind.ORDER });
      const builder = new TaskChainBuilder();

      expect(builder.length).toBe(0);
      expect(builder.prependTo(event)).toBe(0);
      expect(event.isEmpty()).toBe(true);
    });
  });
});
