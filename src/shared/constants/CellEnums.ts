/**
 * Warehouse floor cell enumerations.
 *
 * @module shared/constants/CellEnums
 */

/**
 * Static kind of a grid cell.
 */
export enum CellKind {
  FLOOR = "floor",
  OBSTACLE = "obstacle",
  SHELF_HOME = "shelf_home",
  DROPOFF = "dropoff",
}
