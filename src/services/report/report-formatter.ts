// Human-readable and JSON rendering of validation results

import { Defect, ValidationResult } from '../../models/validation.js';
import { ErrorCategory, assertNever } from '../../models/types.js';

/**
 * Defect counts grouped the way the summary prints them
 */
export interface DefectSummary {
  total: number;
  fieldCount: number;
  lineEnding: number;
  quote: number;
  other: number;
}

export interface ReportOptions {
  /** Strict mode changes the success line */
  rfc4180?: boolean;
}

type SummaryGroup = Exclude<keyof DefectSummary, 'total'>;

function groupOf(category: ErrorCategory): SummaryGroup {
  switch (category) {
    case 'field-count-mismatch':
      return 'fieldCount';
    case 'line-ending':
      return 'lineEnding';
    case 'quote':
    case 'unescaped-special-character':
      return 'quote';
    case 'encoding':
    case 'io':
      return 'other';
    default:
      return assertNever(category);
  }
}

/**
 * Format a single defect as one line
 */
export function formatDefect(defect: Defect): string {
  if (defect.recordNumber === 0) {
    return `Error: ${defect.message}`;
  }
  return `Record #${defect.recordNumber} has error: ${defect.message}`;
}

/**
 * Count defects per summary group
 */
export function summarize(result: ValidationResult): DefectSummary {
  const summary: DefectSummary = { total: result.errors.length, fieldCount: 0, lineEnding: 0, quote: 0, other: 0 };
  for (const defect of result.errors) {
    summary[groupOf(defect.category)]++;
  }
  return summary;
}

/**
 * Render the full text report, one entry per output line
 */
export function formatReport(result: ValidationResult, options: ReportOptions = {}): string[] {
  if (result.valid) {
    return [options.rfc4180 ? 'file is valid and complies with RFC 4180' : 'file is valid'];
  }

  const summary = summarize(result);
  const lines: string[] = [`Found ${summary.total} validation error(s):`];

  if (summary.fieldCount > 0) {
    lines.push(`  - ${summary.fieldCount} field count error(s)`);
  }
  if (summary.lineEnding > 0) {
    lines.push(`  - ${summary.lineEnding} line ending error(s) (RFC 4180 requires CRLF)`);
  }
  if (summary.quote > 0) {
    lines.push(`  - ${summary.quote} quote/escaping error(s)`);
  }
  if (summary.other > 0) {
    lines.push(`  - ${summary.other} other error(s)`);
  }
  lines.push('');

  for (const defect of result.errors) {
    lines.push(formatDefect(defect));
  }

  if (result.truncated) {
    lines.push('');
    lines.push(`stopped after ${summary.total} error(s); later records were not checked`);
  }

  if (result.halted) {
    lines.push('');
    lines.push('unable to parse any further');
  }

  return lines;
}

/**
 * Render the result as pretty-printed JSON
 */
export function formatJson(result: ValidationResult): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Banner printed before a strict-mode run
 */
export function strictModeBanner(): string[] {
  return [
    'Running in strict RFC 4180 compliance mode',
    '- Delimiter: comma (,)',
    '- Line endings: CRLF required',
    '- Quote escaping: strict',
    ''
  ];
}
