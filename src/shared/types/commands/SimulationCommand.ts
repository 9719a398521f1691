import type { EventDriverStats } from "../../../domain/simulation/core/EventDriver";
import type { SimulationCommandType } from "../../constants/CommandEnums";
import type { FleetSnapshot, GridSnapshot } from "../warehouse";

export interface PlaceOrderCommand {
  type: SimulationCommandType.PLACE_ORDER;
  sku: string;
}

export interface AddItemCommand {
  type: SimulationCommandType.ADD_ITEM;
  sku: string;
  name: string;
}

export interface SetTimeScaleCommand {
  type: SimulationCommandType.SET_TIME_SCALE;
  multiplier: number;
}

/**
 * Commands accepted by the runner; queued and applied at the start of the
 * next tick.
 */
export type SimulationCommand =
  | PlaceOrderCommand
  | AddItemCommand
  | SetTimeScaleCommand;

export interface CompletedOrder {
  eventId: string;
  sku?: string;
  createdAt: number;
  completedAt: number;
}

export interface SimulationSnapshot {
  tick: number;
  timeScale: number;
  running: boolean;
  fleet: FleetSnapshot;
  grid: GridSnapshot;
  pendingEvents: number;
  driver: EventDriverStats;
  pickCount: number;
  completedOrders: CompletedOrder[];
}
