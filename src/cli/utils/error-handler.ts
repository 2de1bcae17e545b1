// CLI error handling utilities

import { CsvLintError, ConfigurationError, NotFoundError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { ValidationResult } from '../../models/validation.js';

/**
 * Process exit codes
 */
export const ExitCode = {
  VALID: 0,
  FATAL: 1,
  INVALID: 2
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Exit code for a finished validation: fatal aborts beat ordinary defects
 */
export function exitCodeFor(result: ValidationResult): ExitCodeValue {
  if (result.valid) {
    return ExitCode.VALID;
  }
  return result.halted ? ExitCode.FATAL : ExitCode.INVALID;
}

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof NotFoundError) {
    return error.message;
  }

  if (error instanceof ConfigurationError) {
    return error.message;
  }

  if (error instanceof CsvLintError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  if (error instanceof Error && !(error instanceof CsvLintError)) {
    logger.exception(error);
  }

  const exitCode = error instanceof CsvLintError ? error.exitCode : ExitCode.FATAL;
  process.exit(exitCode);
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`Warning: ${message}`);
}
