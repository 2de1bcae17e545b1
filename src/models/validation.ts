// Validation result types

import { LineEnding, QuoteErrorKind } from './types.js';

interface DefectBase {
  /** Record the defect is attributed to (0 for run-level configuration faults) */
  recordNumber: number;
  /** Human-readable detail */
  message: string;
}

export interface FieldCountDefect extends DefectBase {
  category: 'field-count-mismatch';
  expected: number;
  actual: number;
  /** Values of the offending record */
  fields: string[];
}

export interface LineEndingDefect extends DefectBase {
  category: 'line-ending';
  /** Terminator actually seen; null when the line had none */
  found: Exclude<LineEnding, '\r\n'> | null;
}

export interface QuoteDefect extends DefectBase {
  category: 'quote';
  kind: QuoteErrorKind;
  field: number;
}

export interface UnescapedCharacterDefect extends DefectBase {
  category: 'unescaped-special-character';
  field: number;
  characters: string[];
}

export interface EncodingDefect extends DefectBase {
  category: 'encoding';
  byteOffset: number;
}

export interface IoDefect extends DefectBase {
  category: 'io';
  cause: string;
}

/**
 * A single detected rule violation
 */
export type Defect =
  | FieldCountDefect
  | LineEndingDefect
  | QuoteDefect
  | UnescapedCharacterDefect
  | EncodingDefect
  | IoDefect;

/**
 * Outcome of one validation run
 */
export interface ValidationResult {
  /** True only when the whole input was read and no defect was found */
  valid: boolean;
  /** Defects in physical file order */
  errors: Defect[];
  /** A fatal condition stopped the scan early */
  halted: boolean;
  /** The defect cap stopped the scan early */
  truncated: boolean;
  recordCount: number;
}
