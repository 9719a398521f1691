/**
 * Command type enumerations accepted by the simulation runner.
 *
 * @module shared/constants/CommandEnums
 */

export enum SimulationCommandType {
  PLACE_ORDER = "PLACE_ORDER",
  ADD_ITEM = "ADD_ITEM",
  SET_TIME_SCALE = "SET_TIME_SCALE",
}
