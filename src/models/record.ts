// Records produced by the scanner

import { LineEnding, QuoteErrorKind } from './types.js';

/**
 * One decoded cell of a record
 */
export interface ScannedField {
  value: string;
  /** Field opened with a quote character */
  quoted: boolean;
  /** Field content was produced by lazy-quote recovery */
  recovered: boolean;
}

/**
 * Low-level quote problem found while tokenizing a record
 */
export interface Malformation {
  kind: QuoteErrorKind;
  /** 1-based field number */
  field: number;
  byteOffset: number;
}

/**
 * Invalid UTF-8 that stopped the scan inside a record
 */
export interface EncodingFault {
  byteOffset: number;
  message: string;
}

/**
 * A single logical row as seen by the validator.
 * Only lives for one validation step.
 */
export interface ScannedRecord {
  /** 1-based; the header is record 1 */
  recordNumber: number;
  fields: ScannedField[];
  /** Raw terminator, or null when the record ended with the input */
  lineEnding: LineEnding | null;
  malformations: Malformation[];
  malformed: boolean;
  encodingFault?: EncodingFault;
}
