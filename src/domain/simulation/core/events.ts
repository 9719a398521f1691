import { BatchedEventEmitter } from "./BatchedEventEmitter";
import { SimulationEventType } from "../../../shared/constants/EventEnums";
import type { GridPoint } from "../../../shared/types/warehouse";

/**
 * Payload carried by each simulation event.
 */
export interface SimulationEventPayloads {
  [SimulationEventType.ORDER_PLACED]: {
    eventId: string;
    sku: string;
    tick: number;
  };
  [SimulationEventType.ORDER_COMPLETED]: {
    eventId: string;
    sku?: string;
    createdAt: number;
    tick: number;
  };
  [SimulationEventType.ROBOT_ACQUIRED]: { robotId: number; tick: number };
  [SimulationEventType.ROBOT_RELEASED]: { robotId: number; tick: number };
  [SimulationEventType.ROBOT_CHARGED]: {
    robotId: number;
    charge: number;
    tick: number;
  };
  [SimulationEventType.ROUTE_UNAVAILABLE]: {
    robotId: number;
    from: GridPoint;
    to: GridPoint;
    carryingShelf: boolean;
    tick: number;
  };
  [SimulationEventType.ITEM_PICKED]: {
    eventId: string;
    sku: string;
    tick: number;
  };
  [SimulationEventType.EVENT_DROPPED]: {
    eventId: string;
    recipient: string;
    reason: string;
    tick: number;
  };
}

/**
 * Global event bus for simulation events.
 * Batched; the runner flushes after every tick.
 *
 * @see BatchedEventEmitter for batching behavior
 */
export const simulationEvents = new BatchedEventEmitter<SimulationEventPayloads>();

export { SimulationEventType };
