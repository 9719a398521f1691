/**
 * Log level enumerations for the warehouse simulation.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which component generated the log.
 * Useful for filtering and analyzing behavior by subsystem.
 */
export enum LogCategory {
  /** Event driver, runner and command processing */
  SIMULATION = "simulation",
  /** Task chain expansion and robot dispatch */
  SCHEDULER = "scheduler",
  /** Route planning on the warehouse grid */
  PATHFINDING = "pathfinding",
  /** Robot pool transitions, movement and charging */
  FLEET = "fleet",
  /** Picker station drop-offs */
  PICKER = "picker",
  /** Shelves, items and order generation */
  INVENTORY = "inventory",
  /** HTTP application */
  HTTP = "http",
  /** General/uncategorized logs */
  GENERAL = "general",
}
