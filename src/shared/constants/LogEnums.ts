/**
 * Log level enumerations for the compatibility layer.
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
 * Enumeration of log categories for identifying which part of the library
 * generated the log.
 */
export enum LogCategory {
  /** Container bootstrap and configuration */
  CONFIG = "config",
  /** Alias tables and name formatting */
  NAMING = "naming",
  /** Item comparison */
  ITEMS = "items",
  /** Host catalog lookups */
  CATALOG = "catalog",
  /** General/uncategorized logs */
  GENERAL = "general",
}
