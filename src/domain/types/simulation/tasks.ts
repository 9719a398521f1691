import type { TaskType } from "@/shared/constants/TaskEnums";
import type { GridPoint, InventoryItem } from "@/shared/types/warehouse";
import type { Robot } from "../../simulation/systems/fleet/Robot";

export interface RetrieveFromLocationTask {
  type: TaskType.AVAILABLE_ROBOT_RETRIEVE_FROM_LOCATION;
  location: GridPoint;
  item: InventoryItem;
}

export interface PlotPathTask {
  type: TaskType.SPECIFIC_ROBOT_PLOT_PATH;
  robot: Robot;
  location: GridPoint;
}

export interface ToLocationTask {
  type: TaskType.SPECIFIC_ROBOT_TO_LOCATION;
  location: GridPoint;
}

export interface EndItemRetrievalTask {
  type: TaskType.END_ITEM_RETRIEVAL;
  robot: Robot;
}

export interface RobotChargeTask {
  type: TaskType.ROBOT_CHARGE;
  robot: Robot;
}

export interface RaiseShelfTask {
  type: TaskType.RAISE_SHELF;
}

export interface LowerShelfTask {
  type: TaskType.LOWER_SHELF;
}

export interface PickItemTask {
  type: TaskType.PICK_ITEM_FROM_SHELF;
  item: InventoryItem;
}

/**
 * One primitive or compound instruction in a task event's chain.
 */
export type Task =
  | RetrieveFromLocationTask
  | PlotPathTask
  | ToLocationTask
  | EndItemRetrievalTask
  | RobotChargeTask
  | RaiseShelfTask
  | LowerShelfTask
  | PickItemTask;
