// Public API

export * from './models/index.js';
export * from './services/index.js';
export { CsvLintError, ConfigurationError, NotFoundError, InputError } from './core/errors.js';
export { Logger, LogLevel, logger, parseLogLevel } from './core/logger.js';
export type { LoggerConfig, LogSink, LogLevelName } from './core/logger.js';
export { validateMode, validateConfigFile } from './core/schemas.js';
export type { ValidationModeInput, ValidatedMode } from './core/schemas.js';
export { parseDelimiter } from './core/validation.js';
