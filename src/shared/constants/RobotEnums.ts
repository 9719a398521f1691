/**
 * Robot lifecycle enumerations.
 *
 * @module shared/constants/RobotEnums
 */

/**
 * Pool list a robot currently belongs to.
 */
export enum RobotState {
  AVAILABLE = "available",
  WORKING = "working",
  CHARGING = "charging",
}
