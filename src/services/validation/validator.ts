// CSV validator service

import { ValidationMode } from '../../models/types.js';
import { IoDefect, ValidationResult } from '../../models/validation.js';
import { Logger, logger as defaultLogger } from '../../core/logger.js';
import { ValidationModeInput, validateMode } from '../../core/schemas.js';
import { describeDelimiter } from '../../core/validation.js';
import { scanRecords, scanRecordsAsync } from '../scanner/scanner.js';
import { ByteSource, isByteSource } from '../source/byte-source.js';
import { FileSource, FileSourceOptions } from '../source/file-source.js';
import { ValidationRun } from './validation-run.js';

/**
 * Mode settings plus the logger to report through
 */
export interface ValidatorOptions extends ValidationModeInput {
  logger?: Logger;
}

/**
 * Checks a delimited-text stream against RFC 4180 and the configured dialect.
 *
 * One instance can validate any number of inputs; every call gets its own
 * scanner and defect accumulator, so runs never see each other's state.
 * Recoverable problems come back as defects, never as thrown errors.
 */
export class CsvValidator {
  readonly mode: Readonly<ValidationMode>;
  private readonly logger: Logger;
  private readonly misconfiguration: IoDefect | null;

  /**
   * @throws ConfigurationError when the mode values are malformed
   */
  constructor(options: ValidatorOptions = {}) {
    const { logger, ...modeInput } = options;
    this.mode = Object.freeze(validateMode(modeInput));
    this.logger = (logger ?? defaultLogger).child('validator');
    this.misconfiguration = this.checkStrictDelimiter();
  }

  /**
   * Validate an async byte source
   */
  async validate(source: ByteSource | AsyncIterable<Uint8Array | string>): Promise<ValidationResult> {
    const label = isByteSource(source) ? source.describe() : 'stream-input';
    const run = this.startRun(label);
    if (run.isStopped()) {
      return run.finish();
    }

    try {
      const chunks = isByteSource(source) ? source.read() : source;
      for await (const record of scanRecordsAsync(chunks, this.mode)) {
        if (!run.inspect(record)) {
          break;
        }
      }
    } catch (error) {
      run.abortOnReadFailure(error);
    }

    return run.finish();
  }

  /**
   * Validate chunks that are already in memory or read synchronously
   */
  validateSync(chunks: Iterable<Uint8Array>, label = 'buffer-input'): ValidationResult {
    const run = this.startRun(label);
    if (run.isStopped()) {
      return run.finish();
    }

    try {
      for (const record of scanRecords(chunks, this.mode)) {
        if (!run.inspect(record)) {
          break;
        }
      }
    } catch (error) {
      run.abortOnReadFailure(error);
    }

    return run.finish();
  }

  private startRun(label: string): ValidationRun {
    const run = new ValidationRun(this.mode, this.logger, label);
    this.logger.debug('Validation started', {
      source: label,
      delimiter: this.mode.delimiter,
      lazyQuotes: this.mode.lazyQuotes,
      rfc4180: this.mode.rfc4180
    });

    if (this.misconfiguration) {
      run.abort(this.misconfiguration);
    }
    return run;
  }

  /**
   * Strict mode only accepts a comma; anything else fails every run up front
   */
  private checkStrictDelimiter(): IoDefect | null {
    if (!this.mode.rfc4180 || this.mode.delimiter === ',') {
      return null;
    }
    const message = `RFC 4180 mode requires a comma delimiter, got ${describeDelimiter(this.mode.delimiter)}`;
    return {
      category: 'io',
      recordNumber: 0,
      message,
      cause: 'configuration'
    };
  }
}

/**
 * Validate a file on disk
 */
export async function validateFile(
  filePath: string,
  options: ValidatorOptions = {},
  sourceOptions?: FileSourceOptions
): Promise<ValidationResult> {
  return new CsvValidator(options).validate(new FileSource(filePath, sourceOptions));
}
