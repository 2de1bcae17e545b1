// Domain-specific error types for csvlint

/**
 * Base error class for all csvlint errors
 */
export abstract class CsvLintError extends Error {
  abstract readonly code: string;
  abstract readonly exitCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Invalid option values or configuration file contents
 */
export class ConfigurationError extends CsvLintError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly exitCode = 1;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Not found errors
 */
export class NotFoundError extends CsvLintError {
  readonly code = 'NOT_FOUND';
  readonly exitCode = 1;

  constructor(resourceType: string, id: string) {
    super(`${resourceType} '${id}' does not exist`, { resourceType, id });
  }
}

/**
 * Input source cannot be used
 */
export class InputError extends CsvLintError {
  readonly code = 'INPUT_ERROR';
  readonly exitCode = 1;
}
