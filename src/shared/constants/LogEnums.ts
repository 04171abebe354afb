/**
 * Log level enumerations for the simulation system.
 *
 * Defines all log levels and categories used in the logging system.
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
 * Enumeration of log categories for identifying which system generated the log.
 */
export enum LogCategory {
  /** Turn scheduler and session lifecycle */
  SIMULATION = "simulation",
  /** Behaviour machines and registry */
  AGENTS = "agents",
  /** Pathfinding and single-step movement */
  MOVEMENT = "movement",
  /** Hunting, stalls and removals by predation */
  PREDATION = "predation",
  /** Grid, resources, items and hideables */
  WORLD = "world",
  /** HTTP surface */
  API = "api",
  /** General/uncategorized logs */
  GENERAL = "general",
}

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some((level) => level === value);
}
