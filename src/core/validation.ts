// Input validation for command-line values

import { ConfigurationError } from './errors.js';
import { DelimiterSchema, FinalLineEndingPolicySchema } from './schemas.js';
import { FinalLineEndingPolicy } from '../models/types.js';

/**
 * Spellings accepted for delimiters that are awkward to type in a shell
 */
const DELIMITER_ALIASES: Record<string, string> = {
  '\\t': '\t',
  tab: '\t',
  comma: ',',
  pipe: '|',
  colon: ':',
  semicolon: ';'
};

/**
 * Delimiters documented for the CLI
 */
export const COMMON_DELIMITERS = [',', '\t', '|', ':', ';'] as const;

/**
 * Resolves a delimiter argument to its single character
 */
export function parseDelimiter(input: string): string {
  const resolved = DELIMITER_ALIASES[input.toLowerCase()] ?? input;

  if (!DelimiterSchema.safeParse(resolved).success) {
    throw new ConfigurationError(
      `error parsing delimiter '${input}', note that only one-character delimiters are supported`,
      'delimiter'
    );
  }

  return resolved;
}

/**
 * Parses the --max-errors argument
 */
export function parseMaxErrors(input: string): number {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(`Invalid max errors '${input}': expected a positive integer`, 'maxErrors');
  }

  const value = parseInt(trimmed, 10);
  if (value === 0) {
    throw new ConfigurationError('Max errors must be at least 1', 'maxErrors');
  }

  return value;
}

/**
 * Parses the --final-line-ending argument
 */
export function parseFinalLineEndingPolicy(input: string): FinalLineEndingPolicy {
  const result = FinalLineEndingPolicySchema.safeParse(input.trim().toLowerCase());
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid final line ending policy '${input}'. Valid values are: ${FinalLineEndingPolicySchema.options.join(', ')}`,
      'missingFinalLineEnding'
    );
  }
  return result.data;
}

/**
 * Printable form of a delimiter for messages
 */
export function describeDelimiter(delimiter: string): string {
  switch (delimiter) {
    case '\t':
      return 'tab (\\t)';
    case ',':
      return 'comma (,)';
    case '|':
      return 'pipe (|)';
    case ':':
      return 'colon (:)';
    case ';':
      return 'semicolon (;)';
    default:
      return `'${delimiter}'`;
  }
}
