/**
 * Task type enumerations for the robot task chains.
 *
 * @module shared/constants/TaskEnums
 */

/**
 * Enumeration of task types carried by a task event's chain.
 */
export enum TaskType {
  AVAILABLE_ROBOT_RETRIEVE_FROM_LOCATION = "available_robot_retrieve_from_location",
  SPECIFIC_ROBOT_PLOT_PATH = "specific_robot_plot_path",
  SPECIFIC_ROBOT_TO_LOCATION = "specific_robot_to_location",
  END_ITEM_RETRIEVAL = "end_item_retrieval",
  ROBOT_CHARGE = "robot_charge",
  RAISE_SHELF = "raise_shelf",
  LOWER_SHELF = "lower_shelf",
  PICK_ITEM_FROM_SHELF = "pick_item_from_shelf",
}

/**
 * Kind of logical work a task event represents.
 */
export enum TaskEventKind {
  ORDER = "order",
  CHARGE = "charge",
}
