/**
 * Systems Index
 * ==============
 *
 * Central re-export for the warehouse simulation systems.
 *
 * ┌──────────────────────────────────────────────────────────────┐
 * │ DOMAIN       │ SYSTEMS                                       │
 * ├──────────────────────────────────────────────────────────────┤
 * │ FLOOR        │ WarehouseGrid, Pathfinder                     │
 * │ FLEET        │ Robot, RobotPool                              │
 * │ ORDERS       │ RobotScheduler, PickerStation, InventorySystem│
 * └──────────────────────────────────────────────────────────────┘
 */

// FLOOR
export { WarehouseGrid } from "./warehouse/WarehouseGrid";
export type { WarehouseLayout } from "./warehouse/WarehouseGrid";
export { Pathfinder } from "./pathfinding/Pathfinder";
export type { PathfinderStats } from "./pathfinding/Pathfinder";

// FLEET
export { Robot, MAX_CHARGE } from "./fleet/Robot";
export type { RobotOptions, RobotTuning } from "./fleet/Robot";
export { RobotPool } from "./fleet/RobotPool";

// ORDERS
export { RobotScheduler } from "./scheduler/RobotScheduler";
export { PickerStation } from "./picker/PickerStation";
export { InventorySystem } from "./inventory/InventorySystem";
export type { StockedItem } from "./inventory/InventorySystem";
