/**
 * Debug Config Schema
 *
 * Configuration for the debug module: log output, history limits and the
 * default log level.
 *
 * @module config/schema/debug
 */

// =============================================================================
// Log Levels
// =============================================================================

/** Valid log level names, most verbose first */
export const LOG_LEVEL_NAMES = ['debug', 'verbose', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

// =============================================================================
// Log Output Config
// =============================================================================

/**
 * Configuration for log output.
 */
export interface LogOutputConfigSchema {
  /** Write logs to the console (default: true). History is kept either way. */
  stdout: boolean;
}

/** Default log output configuration */
export const DEFAULT_LOG_OUTPUT_CONFIG: LogOutputConfigSchema = {
  stdout: true,
};

// =============================================================================
// Log History Config
// =============================================================================

/**
 * Configuration for log history retention.
 *
 * Controls how many log entries are kept in memory for diagnostics.
 */
export interface LogHistoryConfigSchema {
  /** Maximum number of log entries to retain in memory */
  maxLogHistoryEntries: number;
}

/** Default log history configuration */
export const DEFAULT_LOG_HISTORY_CONFIG: LogHistoryConfigSchema = {
  maxLogHistoryEntries: 1000,
};

// =============================================================================
// Log Level Config
// =============================================================================

export interface LogLevelConfigSchema {
  /** Default log level (debug, verbose, info, warn, error, silent) */
  defaultLogLevel: LogLevelName;
}

/** Default log level configuration */
export const DEFAULT_LOG_LEVEL_CONFIG: LogLevelConfigSchema = {
  defaultLogLevel: 'info',
};

// =============================================================================
// Complete Debug Config
// =============================================================================

export interface DebugConfigSchema {
  logOutput: LogOutputConfigSchema;
  logHistory: LogHistoryConfigSchema;
  logLevel: LogLevelConfigSchema;
}

/** Default debug configuration */
export const DEFAULT_DEBUG_CONFIG: DebugConfigSchema = {
  logOutput: DEFAULT_LOG_OUTPUT_CONFIG,
  logHistory: DEFAULT_LOG_HISTORY_CONFIG,
  logLevel: DEFAULT_LOG_LEVEL_CONFIG,
};

export function isLogLevelName(value: string): value is LogLevelName {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}
