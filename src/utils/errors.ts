import { StrataError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the Strata CLI
 */

export class InvalidSelectorError extends StrataError {
  constructor(public readonly spec: string, reason: string) {
    super(`Invalid selector '${spec}': ${reason}`, ErrorCodes.INVALID_SELECTOR, { spec });
    this.name = 'InvalidSelectorError';
  }
}

export class CatalogLookupError extends StrataError {
  constructor(public readonly uniqueId: string) {
    super(`Node '${uniqueId}' is in the dependency graph but has no catalog entry`, ErrorCodes.CATALOG_LOOKUP, { uniqueId });
    this.name = 'CatalogLookupError';
  }
}

export class GraphIntegrityError extends StrataError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.GRAPH_INTEGRITY, details);
    this.name = 'GraphIntegrityError';
  }
}

export class FileSystemError extends StrataError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends StrataError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends StrataError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof StrataError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
