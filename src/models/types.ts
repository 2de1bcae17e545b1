// Core type definitions for csvlint

// Line terminators recognized by the scanner, kept verbatim
export type LineEnding = '\r\n' | '\n' | '\r';

// Defect categories
export type ErrorCategory =
  | 'field-count-mismatch'
  | 'line-ending'
  | 'quote'
  | 'unescaped-special-character'
  | 'encoding'
  | 'io';

// Quote defect subkinds
export type QuoteErrorKind = 'unterminated-quote' | 'bare-quote' | 'malformed-escape';

// Strict-mode policy for a last line with no terminator
export type FinalLineEndingPolicy = 'allow' | 'header-only' | 'reject';

// Report formats
export type OutputFormat = 'text' | 'json';

/**
 * Immutable dialect settings for one validation run
 */
export interface ValidationMode {
  /** Single ASCII field separator */
  delimiter: string;
  lazyQuotes: boolean;
  /** Strict RFC 4180: comma delimiter and CRLF line endings */
  rfc4180: boolean;
  /** Stop after this many defects */
  maxErrors?: number;
  missingFinalLineEnding: FinalLineEndingPolicy;
}

/**
 * Helper for exhaustive switches over closed unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
