/**
 * Log level enumerations for the quest engine.
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
  /** Quest state machine transitions */
  QUESTS = "quests",
  /** Prerequisite evaluation */
  CONDITIONS = "conditions",
  /** Inbound gameplay events and outbound lifecycle delivery */
  EVENTS = "events",
  /** Export and restore of player state */
  STORAGE = "storage",
  /** Configuration and catalog loading */
  CONFIG = "config",
  /** General/uncategorized logs */
  GENERAL = "general",
}
