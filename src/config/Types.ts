/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationConfig: Symbol.for("SimulationConfig"),
  SimulationRunner: Symbol.for("SimulationRunner"),
  EventDriver: Symbol.for("EventDriver"),

  WarehouseGrid: Symbol.for("WarehouseGrid"),
  Pathfinder: Symbol.for("Pathfinder"),
  RobotPool: Symbol.for("RobotPool"),
  RobotScheduler: Symbol.for("RobotScheduler"),
  PickerStation: Symbol.for("PickerStation"),
  InventorySystem: Symbol.for("InventorySystem"),
};
