/**
 * Log level enumerations for the ledger backend.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, lowest severity first.
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
  /** Command processing and the operation surface */
  LEDGER = "ledger",
  /** Roles, tiers and blacklist */
  ACCESS = "access",
  /** Resource pool registry */
  POOL = "pool",
  /** Allocation request lifecycle */
  REQUESTS = "requests",
  /** Balance ledger, transfers and returns */
  BALANCES = "balances",
  /** Control plane switches */
  CONTROL = "control",
  /** HTTP host adapter */
  HTTP = "http",
  /** Logical clock */
  CLOCK = "clock",
  /** General/uncategorized logs */
  GENERAL = "general",
}
