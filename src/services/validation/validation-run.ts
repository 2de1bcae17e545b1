// Defect accumulator for a single validation run

import { ScannedRecord } from '../../models/record.js';
import { ValidationMode } from '../../models/types.js';
import { Defect, EncodingDefect, IoDefect, ValidationResult } from '../../models/validation.js';
import { Logger } from '../../core/logger.js';
import {
  checkFieldCount,
  checkLineEnding,
  checkUnescapedCharacters,
  forwardMalformations
} from './rules.js';

/**
 * Owns the defect list and verdict for one pass over one input.
 * Never shared between runs.
 */
export class ValidationRun {
  private readonly errors: Defect[] = [];
  private headerFieldCount: number | null = null;
  private lastRecordNumber = 0;
  private halted = false;
  private truncated = false;

  constructor(
    private readonly mode: ValidationMode,
    private readonly logger: Logger,
    private readonly label: string
  ) {}

  /**
   * True once a fatal condition or the defect cap has ended the run
   */
  isStopped(): boolean {
    return this.halted || this.truncated;
  }

  /**
   * Apply every rule to one record. Returns false when scanning must stop.
   */
  inspect(record: ScannedRecord): boolean {
    if (this.isStopped()) {
      return false;
    }
    this.lastRecordNumber = record.recordNumber;

    if (record.encodingFault) {
      // The record is incomplete: only what was already detected in it is reliable
      this.errors.push(...forwardMalformations(record));
      if (this.applyCap()) {
        return false;
      }
      const defect: EncodingDefect = {
        category: 'encoding',
        recordNumber: record.recordNumber,
        message: record.encodingFault.message,
        byteOffset: record.encodingFault.byteOffset
      };
      this.abort(defect);
      return false;
    }

    if (this.headerFieldCount === null) {
      this.headerFieldCount = record.fields.length;
    } else {
      this.errors.push(...checkFieldCount(record, this.headerFieldCount));
    }
    this.errors.push(...checkLineEnding(record, this.mode));
    this.errors.push(...forwardMalformations(record));
    this.errors.push(...checkUnescapedCharacters(record, this.mode.delimiter));

    return !this.applyCap();
  }

  /**
   * Stop the run with a trailing fatal defect
   */
  abort(defect: EncodingDefect | IoDefect): void {
    this.errors.push(defect);
    this.halted = true;
    this.logger.warn('Validation halted', {
      source: this.label,
      category: defect.category,
      recordNumber: defect.recordNumber
    });
  }

  /**
   * Record a failed read from the byte source
   */
  abortOnReadFailure(error: unknown): void {
    const cause = error instanceof Error ? error.message : String(error);
    this.abort({
      category: 'io',
      recordNumber: this.lastRecordNumber + 1,
      message: `I/O error: ${cause}`,
      cause
    });
  }

  finish(): ValidationResult {
    const result: ValidationResult = {
      valid: !this.halted && !this.truncated && this.errors.length === 0,
      errors: [...this.errors],
      halted: this.halted,
      truncated: this.truncated,
      recordCount: this.lastRecordNumber
    };

    this.logger.debug('Validation finished', {
      source: this.label,
      records: result.recordCount,
      errors: result.errors.length,
      valid: result.valid
    });

    return result;
  }

  private applyCap(): boolean {
    const { maxErrors } = this.mode;
    if (maxErrors === undefined || this.errors.length < maxErrors) {
      return false;
    }

    this.errors.splice(maxErrors);
    this.truncated = true;
    this.logger.warn(`Stopped after reaching ${maxErrors} error(s)`, {
      source: this.label,
      recordNumber: this.lastRecordNumber
    });
    return true;
  }
}
