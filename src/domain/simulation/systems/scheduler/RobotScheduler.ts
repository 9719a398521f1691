import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import type { SimulationConfig } from "../../../../config/config";
import {
  logger,
  LogCategory,
  LogLevel,
} from "../../../../infrastructure/utils/logger";
import { TaskEventKind, TaskType } from "../../../../shared/constants/TaskEnums";
import type {
  EndItemRetrievalTask,
  PlotPathTask,
  RetrieveFromLocationTask,
  RobotChargeTask,
  Task,
} from "../../../types/simulation/tasks";
import { simulationEvents, SimulationEventType } from "../../core/events";
import { TaskChainBuilder, TaskEvent } from "../../core/TaskEvent";
import type { IEventScheduler, IPickerPort, TaskRecipient } from "../../ports";
import type { Pathfinder } from "../pathfinding/Pathfinder";
import type { RobotPool } from "../fleet/RobotPool";

/**
 * Expands compound tasks into primitive robot steps.
 *
 * An order arrives as a single retrieve-from-location step. The scheduler
 * binds it to an available robot and rewrites the front of the chain into the
 * full round trip: fetch the shelf, bring it to the picker, put it back, go
 * home, then hand the robot over to charging through a separate event.
 */
@injectable()
export class RobotScheduler implements TaskRecipient {
  public readonly recipientName = "scheduler";
  private readonly retryDelay: number;

  constructor(
    @inject(TYPES.EventDriver) private readonly driver: IEventScheduler,
    @inject(TYPES.Pathfinder) private readonly pathfinder: Pathfinder,
    @inject(TYPES.RobotPool) private readonly pool: RobotPool,
    @inject(TYPES.PickerStation) private readonly picker: IPickerPort,
    @inject(TYPES.SimulationConfig) config: SimulationConfig,
  ) {
    this.retryDelay = config.retryDelayTicks;
  }

  public handleTask(task: Task, event: TaskEvent): void {
    switch (task.type) {
      case TaskType.AVAILABLE_ROBOT_RETRIEVE_FROM_LOCATION:
        this.startRetrieval(task, event);
        break;
      case TaskType.SPECIFIC_ROBOT_PLOT_PATH:
        this.plotPath(task, event);
        break;
      case TaskType.END_ITEM_RETRIEVAL:
        this.endRetrieval(task, event);
        break;
      case TaskType.ROBOT_CHARGE:
        this.charge(task, event);
        break;
      default: {
        const message = `Scheduler cannot handle task ${task.type} (event ${event.id})`;
        logger.error(message, LogCategory.SCHEDULER);
        throw new Error(message);
      }
    }
  }

  private startRetrieval(
    task: RetrieveFromLocationTask,
    event: TaskEvent,
  ): void {
    const robot = this.pool.acquire();
    if (!robot) {
      logger.debug(
        `No robots available for ${event.id}: deferring`,
        LogCategory.SCHEDULER,
      );
      event.prependTask(task, this);
      this.driver.scheduleEvent(event, this.retryDelay);
      return;
    }

    const home = robot.getLocation();
    logger.info(
      `Sending robot ${robot.id} to [${task.location.x},${task.location.y}] for ${task.item.sku}`,
      LogCategory.SCHEDULER,
    );

    new TaskChainBuilder()
      .then(
        { type: TaskType.SPECIFIC_ROBOT_PLOT_PATH, robot, location: task.location },
        this,
      )
      .then({ type: TaskType.RAISE_SHELF }, robot)
      .then(
        {
          type: TaskType.SPECIFIC_ROBOT_PLOT_PATH,
          robot,
          location: this.picker.getDropoffLocation(),
        },
        this,
      )
      .then({ type: TaskType.PICK_ITEM_FROM_SHELF, item: task.item }, this.picker)
      .then(
        { type: TaskType.SPECIFIC_ROBOT_PLOT_PATH, robot, location: task.location },
        this,
      )
      .then({ type: TaskType.LOWER_SHELF }, robot)
      .then(
        { type: TaskType.SPECIFIC_ROBOT_PLOT_PATH, robot, location: home },
        this,
      )
      .then({ type: TaskType.END_ITEM_RETRIEVAL, robot }, this)
      .prependTo(event);

    this.driver.scheduleEvent(event);
  }

  private plotPath(task: PlotPathTask, event: TaskEvent): void {
    const { robot, location } = task;
    const from = robot.getLocation();
    const route = this.pathfinder.findPath(from, location, robot.hasShelf());

    if (!route) {
      logger.robotLog(
        LogLevel.WARN,
        LogCategory.SCHEDULER,
        robot.id,
        `Already at [${location.x},${location.y}] or no route from [${from.x},${from.y}]`,
      );
      simulationEvents.publish(SimulationEventType.ROUTE_UNAVAILABLE, {
        robotId: robot.id,
        from,
        to: { ...location },
        carryingShelf: robot.hasShelf(),
        tick: this.driver.now(),
      });
      this.driver.scheduleEvent(event, this.retryDelay);
      return;
    }

    const builder = new TaskChainBuilder();
    for (const waypoint of route) {
      builder.then(
        { type: TaskType.SPECIFIC_ROBOT_TO_LOCATION, location: waypoint },
        robot,
      );
    }
    builder.prependTo(event);
    this.driver.scheduleEvent(event);
  }

  private endRetrieval(task: EndItemRetrievalTask, event: TaskEvent): void {
    this.pool.release(task.robot);
    this.driver.scheduleEvent(event);

    const charging = TaskEvent.single(
      { type: TaskType.ROBOT_CHARGE, robot: task.robot },
      this,
      { kind: TaskEventKind.CHARGE, createdAt: this.driver.now() },
    );
    this.driver.scheduleEvent(charging);
  }

  private charge(task: RobotChargeTask, event: TaskEvent): void {
    if (this.pool.chargeTick(task.robot)) return;

    event.prependTask(task, this);
    this.driver.scheduleEvent(event, this.retryDelay);
  }
}
