/**
 * Log level enumerations for the simulation system.
 *
 * Defines all log levels used in the logging system.
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
  /** Round coordinator and run lifecycle */
  SIMULATION = "simulation",
  /** Agent actors and their decisions */
  AGENTS = "agents",
  /** Destination assignment between competing movers */
  CONFLICT = "conflict",
  /** Worker thread pool */
  WORKERS = "workers",
  /** Grid state transitions and invariants */
  GRID = "grid",
  /** HTTP and WebSocket observers */
  NETWORK = "network",
  /** General/uncategorized logs */
  GENERAL = "general",
}
