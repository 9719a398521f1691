import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import type { SimulationConfig } from "../../../../config/config";
import { logger, LogCategory } from "../../../../infrastructure/utils/logger";
import { TaskType } from "../../../../shared/constants/TaskEnums";
import type { GridPoint, PickRecord } from "../../../../shared/types/warehouse";
import type { Task } from "../../../types/simulation/tasks";
import { simulationEvents, SimulationEventType } from "../../core/events";
import type { TaskEvent } from "../../core/TaskEvent";
import type { IEventScheduler, IPickerPort } from "../../ports";

/**
 * Human picker at the drop-off cell. Takes the ordered item off a shelf a
 * robot has brought over, then lets the robot carry the shelf back.
 */
@injectable()
export class PickerStation implements IPickerPort {
  public readonly recipientName = "picker";
  private readonly dropoff: GridPoint;
  private readonly pickDuration: number;
  private readonly picks: PickRecord[] = [];

  constructor(
    @inject(TYPES.EventDriver) private readonly driver: IEventScheduler,
    @inject(TYPES.SimulationConfig) config: SimulationConfig,
  ) {
    this.dropoff = { ...config.dropoff };
    this.pickDuration = config.pickDurationTicks;
  }

  public getDropoffLocation(): GridPoint {
    return { ...this.dropoff };
  }

  public handleTask(task: Task, event: TaskEvent): void {
    if (task.type !== TaskType.PICK_ITEM_FROM_SHELF) {
      const message = `Picker cannot handle task ${task.type} (event ${event.id})`;
      logger.error(message, LogCategory.PICKER);
      throw new Error(message);
    }

    const record: PickRecord = {
      sku: task.item.sku,
      eventId: event.id,
      tick: this.driver.now(),
    };
    this.picks.push(record);
    logger.info(
      `Picked ${task.item.name} (${task.item.sku}) for ${event.id}`,
      LogCategory.PICKER,
    );
    simulationEvents.publish(SimulationEventType.ITEM_PICKED, record);

    this.driver.scheduleEvent(event, this.pickDuration);
  }

  public getPicks(): readonly PickRecord[] {
    return [...this.picks];
  }

  public getPickCount(): number {
    return this.picks.length;
  }
}
