/**
 * Domain event names emitted on the simulation event bus.
 *
 * @module shared/constants/EventEnums
 */

export enum SimulationEventType {
  ORDER_PLACED = "order:placed",
  ORDER_COMPLETED = "order:completed",
  ROBOT_ACQUIRED = "robot:acquired",
  ROBOT_RELEASED = "robot:released",
  ROBOT_CHARGED = "robot:charged",
  ROUTE_UNAVAILABLE = "route:unavailable",
  ITEM_PICKED = "item:picked",
  EVENT_DROPPED = "event:dropped",
}
