/**
 * Errors and Logging
 *
 * Typed error classes for the tag graph and a pluggable logger.
 * Not-found lookups and rejected edges are not errors: they surface as
 * `null`, empty arrays or an edge status.
 */

/**
 * Base class for every error raised by the engine
 */
export class TagGraphError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TagGraphError';
    this.code = code;
  }
}

/**
 * Database could not be opened, initialized or migrated
 */
export class DatabaseError extends TagGraphError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DATABASE_ERROR', cause);
    this.name = 'DatabaseError';
  }
}

/**
 * Bulk import could not run (missing or unreadable source)
 */
export class ImportError extends TagGraphError {
  readonly sourcePath: string;

  constructor(message: string, sourcePath: string, cause?: unknown) {
    super(message, 'IMPORT_ERROR', cause);
    this.name = 'ImportError';
    this.sourcePath = sourcePath;
  }
}

/**
 * Configuration is invalid. Carries every problem found, not just the first.
 */
export class ConfigError extends TagGraphError {
  readonly errors: string[];

  constructor(message: string, errors: string[] = [], cause?: unknown) {
    super(errors.length > 0 ? `${message}:\n${errors.join('\n')}` : message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Caller passed input the engine cannot store
 */
export class ValidationError extends TagGraphError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// =============================================================================
// Logging
// =============================================================================

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function format(message: string, context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return `[taggraph] ${message}`;
  }
  return `[taggraph] ${message} ${JSON.stringify(context)}`;
}

/**
 * Console logger. Debug output only when TAGGRAPH_DEBUG is set.
 */
export const defaultLogger: Logger = {
  debug(message, context) {
    if (process.env.TAGGRAPH_DEBUG) {
      console.debug(format(message, context));
    }
  },
  info(message, context) {
    console.info(format(message, context));
  },
  warn(message, context) {
    console.warn(format(message, context));
  },
  error(message, context) {
    console.error(format(message, context));
  },
};

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

let currentLogger: Logger = defaultLogger;

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function getLogger(): Logger {
  return currentLogger;
}

export function logDebug(message: string, context?: LogContext): void {
  currentLogger.debug(message, context);
}

export function logInfo(message: string, context?: LogContext): void {
  currentLogger.info(message, context);
}

export function logWarn(message: string, context?: LogContext): void {
  currentLogger.warn(message, context);
}
