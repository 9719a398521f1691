import { injectable, inject } from "inversify";
import { TYPES } from "../../../../config/Types";
import type { IEventScheduler } from "../../ports";
import {
  logger,
  LogCategory,
  LogLevel,
} from "../../../../infrastructure/utils/logger";
import { RobotState } from "../../../../shared/constants/RobotEnums";
import type { FleetSnapshot } from "../../../../shared/types/warehouse";
import { simulationEvents, SimulationEventType } from "../../core/events";
import type { Robot } from "./Robot";

/**
 * Fleet lifecycle: every robot sits in exactly one of the Available, Working
 * or Charging lists.
 *
 * Acquisition is FIFO from the head of Available; a robot that finishes
 * charging joins the tail. Transitions always remove from one list before
 * adding to another.
 */
@injectable()
export class RobotPool {
  private readonly available: Robot[] = [];
  private readonly working = new Set<Robot>();
  private readonly charging = new Set<Robot>();
  private readonly byId = new Map<number, Robot>();

  constructor(
    @inject(TYPES.EventDriver) private readonly clock: IEventScheduler,
  ) {}

  /**
   * Adds robots to Available in the given order. Startup only.
   */
  public seed(robots: Iterable<Robot>): void {
    for (const robot of robots) {
      if (this.byId.has(robot.id)) {
        throw new Error(`Robot ${robot.id} is already in the pool`);
      }
      this.byId.set(robot.id, robot);
      robot.transitionTo(RobotState.AVAILABLE);
      this.available.push(robot);
    }
    logger.info(
      `Fleet seeded with ${this.byId.size} robot(s)`,
      LogCategory.FLEET,
    );
  }

  /**
   * Takes the longest-idle available robot, or `null` when all are busy.
   */
  public acquire(): Robot | null {
    const robot = this.available.shift();
    if (!robot) return null;

    this.working.add(robot);
    robot.transitionTo(RobotState.WORKING);
    logger.robotLog(LogLevel.DEBUG, LogCategory.FLEET, robot.id, "Acquired");
    simulationEvents.publish(SimulationEventType.ROBOT_ACQUIRED, {
      robotId: robot.id,
      tick: this.clock.now(),
    });
    return robot;
  }

  /**
   * Sends a working robot to charge.
   */
  public release(robot: Robot): void {
    if (!this.working.has(robot)) {
      throw new Error(
        `Cannot release robot ${robot.id}: it is ${robot.state}, not working`,
      );
    }

    this.working.delete(robot);
    this.charging.add(robot);
    robot.transitionTo(RobotState.CHARGING);
    logger.robotLog(
      LogLevel.DEBUG,
      LogCategory.FLEET,
      robot.id,
      `Released to charge at ${robot.chargeLevel()}%`,
    );
    simulationEvents.publish(SimulationEventType.ROBOT_RELEASED, {
      robotId: robot.id,
      tick: this.clock.now(),
    });
  }

  /**
   * Advances a charging robot by one unit.
   *
   * @returns `true` when the robot is charged and back in Available
   */
  public chargeTick(robot: Robot): boolean {
    if (!this.charging.has(robot)) {
      throw new Error(
        `Cannot charge robot ${robot.id}: it is ${robot.state}, not charging`,
      );
    }

    robot.advanceCharge();
    if (robot.needsMoreCharge()) return false;

    this.charging.delete(robot);
    this.available.push(robot);
    robot.transitionTo(RobotState.AVAILABLE);
    logger.robotLog(
      LogLevel.DEBUG,
      LogCategory.FLEET,
      robot.id,
      `Charged to ${robot.chargeLevel()}%, available again`,
    );
    simulationEvents.publish(SimulationEventType.ROBOT_CHARGED, {
      robotId: robot.id,
      charge: robot.chargeLevel(),
      tick: this.clock.now(),
    });
    return true;
  }

  public getAvailable(): readonly Robot[] {
    return [...this.available];
  }

  public getWorking(): readonly Robot[] {
    return [...this.working];
  }

  public getCharging(): readonly Robot[] {
    return [...this.charging];
  }

  public get size(): number {
    return this.byId.size;
  }

  public getRobot(id: number): Robot | undefined {
    return this.byId.get(id);
  }

  public getSnapshot(): FleetSnapshot {
    return {
      available: this.available.map((robot) => robot.id),
      working: [...this.working].map((robot) => robot.id),
      charging: [...this.charging].map((robot) => robot.id),
      robots: [...this.byId.values()]
        .sort((a, b) => a.id - b.id)
        .map((robot) => robot.getSnapshot()),
    };
  }
}
