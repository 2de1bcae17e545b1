// Zod schemas for validation modes and configuration files

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Characters that can never act as a field separator
 */
const RESERVED_DELIMITERS = ['"', '\r', '\n'];

/**
 * Field delimiter: one ASCII character other than quote, CR or LF
 */
export const DelimiterSchema = z
  .string()
  .length(1, 'Delimiter must be a single character')
  .refine(c => c.charCodeAt(0) < 0x80, 'Delimiter must be an ASCII character')
  .refine(c => !RESERVED_DELIMITERS.includes(c), 'Delimiter cannot be a quote or line-ending character');

/**
 * Strict-mode policy for the final line terminator
 */
export const FinalLineEndingPolicySchema = z.enum(['allow', 'header-only', 'reject']);

/**
 * Report format enum
 */
export const OutputFormatSchema = z.enum(['text', 'json']);

/**
 * Defect cap
 */
export const MaxErrorsSchema = z.number().int('Max errors must be an integer').positive('Max errors must be positive');

/**
 * Validation mode with defaults filled in
 */
export const ValidationModeSchema = z.object({
  delimiter: DelimiterSchema.default(','),
  lazyQuotes: z.boolean().default(false),
  rfc4180: z.boolean().default(false),
  maxErrors: MaxErrorsSchema.optional(),
  missingFinalLineEnding: FinalLineEndingPolicySchema.default('allow')
});

/**
 * Contents of .csvlint.yaml
 */
export const ConfigFileSchema = z
  .object({
    delimiter: DelimiterSchema.optional(),
    lazyQuotes: z.boolean().optional(),
    rfc4180: z.boolean().optional(),
    maxErrors: MaxErrorsSchema.optional(),
    missingFinalLineEnding: FinalLineEndingPolicySchema.optional(),
    format: OutputFormatSchema.optional()
  })
  .strict();

/**
 * Type exports
 */
export type ValidationModeInput = z.input<typeof ValidationModeSchema>;
export type ValidatedMode = z.infer<typeof ValidationModeSchema>;
export type ValidatedConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Turn the first zod issue into a ConfigurationError
 */
export function toConfigurationError(error: z.ZodError, source: string): ConfigurationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
  const detail = issue ? issue.message : 'invalid value';
  const where = field ? ` (${field})` : '';
  return new ConfigurationError(`Invalid ${source}${where}: ${detail}`, field, {
    issues: error.issues.length
  });
}

/**
 * Validation helper functions
 */
export function validateMode(data: unknown): ValidatedMode {
  const result = ValidationModeSchema.safeParse(data);
  if (!result.success) {
    throw toConfigurationError(result.error, 'validation mode');
  }
  return result.data;
}

export function validateConfigFile(data: unknown): ValidatedConfigFile {
  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    throw toConfigurationError(result.error, 'configuration file');
  }
  return result.data;
}
