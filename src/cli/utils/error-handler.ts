// CLI error handling utilities

import { ConfigError, PreflightError, ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof ConfigError) {
    return `Config Error (${error.configPath}): ${error.message}`;
  }

  if (error instanceof PreflightError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for a fault outside the checks
 */
export function exitCodeForError(error: unknown): number {
  return error instanceof PreflightError ? error.exitCode : 1;
}

/**
 * Report a fault outside the checks and terminate
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`); // eslint-disable-line no-console
  if (error instanceof PreflightError) {
    logger.debug('Unhandled error', { ...error.toJSON(), stack: error.stack });
  } else if (error instanceof Error) {
    logger.debug('Unhandled error', { name: error.name, stack: error.stack });
  }
  process.exit(exitCodeForError(error));
}
