import type { CellKind } from "../constants/CellEnums";
import type { RobotState } from "../constants/RobotEnums";

/**
 * Integer coordinate on the warehouse floor.
 */
export interface GridPoint {
  x: number;
  y: number;
}

export interface InventoryItem {
  sku: string;
  name: string;
}

export interface Shelf {
  id: string;
  /** Home cell where the shelf is parked when no robot carries it */
  location: GridPoint;
}

export interface PickRecord {
  sku: string;
  eventId: string;
  tick: number;
}

export interface RobotSnapshot {
  id: number;
  position: GridPoint;
  home: GridPoint;
  hasShelf: boolean;
  charge: number;
  state: RobotState;
}

export interface FleetSnapshot {
  available: number[];
  working: number[];
  charging: number[];
  robots: RobotSnapshot[];
}

export interface GridSnapshot {
  width: number;
  height: number;
  dropoff: GridPoint;
  obstacles: GridPoint[];
  parkedShelves: GridPoint[];
}

export interface CellDescriptor {
  index: number;
  point: GridPoint;
  kind: CellKind;
}

export function samePoint(a: GridPoint, b: GridPoint): boolean {
  return a.x === b.x && a.y === b.y;
}

export function manhattan(a: GridPoint, b: GridPoint): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}
