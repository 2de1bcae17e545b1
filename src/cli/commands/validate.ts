// Validate command - check a delimited-text file against RFC 4180

import { Command } from 'commander';
import { Logger, LogLevel } from '../../core/logger.js';
import {
  COMMON_DELIMITERS,
  describeDelimiter,
  parseDelimiter,
  parseFinalLineEndingPolicy,
  parseMaxErrors
} from '../../core/validation.js';
import { ValidationModeInput } from '../../core/schemas.js';
import { OutputFormat } from '../../models/types.js';
import { ConfigService } from '../../services/config/config-service.js';
import { CsvValidator } from '../../services/validation/validator.js';
import { ByteSource } from '../../services/source/byte-source.js';
import { FileSource } from '../../services/source/file-source.js';
import { StreamSource } from '../../services/source/stream-source.js';
import { formatJson, formatReport, strictModeBanner } from '../../services/report/report-formatter.js';
import { ExitCodeValue, exitCodeFor, warn, withErrorHandling } from '../utils/error-handler.js';

export interface ValidateOptions {
  delimiter?: string;
  lazyquotes?: boolean;
  rfc4180?: boolean;
  maxErrors?: string;
  finalLineEnding?: string;
  json?: boolean;
  config?: string;
  verbose?: boolean;
}

/**
 * Effective settings for one invocation
 */
export interface ResolvedSettings {
  mode: ValidationModeInput & { delimiter: string; lazyQuotes: boolean; rfc4180: boolean };
  format: OutputFormat;
  warnings: string[];
}

/**
 * Merge command-line flags over the configuration file.
 * Strict mode forces a comma delimiter and strict quoting.
 */
export async function resolveSettings(options: ValidateOptions, configService: ConfigService): Promise<ResolvedSettings> {
  const defaults = await configService.getValidationDefaults();
  const warnings: string[] = [];

  const rfc4180 = options.rfc4180 ?? defaults.rfc4180;
  let delimiter = options.delimiter !== undefined ? parseDelimiter(options.delimiter) : defaults.delimiter;
  let lazyQuotes = options.lazyquotes ?? defaults.lazyQuotes;

  if (rfc4180) {
    if (delimiter !== ',') {
      warnings.push('--rfc4180 mode requires comma delimiter, ignoring --delimiter option');
      delimiter = ',';
    }
    if (lazyQuotes) {
      warnings.push('--rfc4180 mode disables lazy quotes, ignoring --lazyquotes option');
      lazyQuotes = false;
    }
  } else if (delimiter !== ',' || lazyQuotes) {
    warnings.push('not using defaults, may not validate CSV to RFC 4180');
  }

  const maxErrors = options.maxErrors !== undefined ? parseMaxErrors(options.maxErrors) : defaults.maxErrors;
  const missingFinalLineEnding = options.finalLineEnding !== undefined
    ? parseFinalLineEndingPolicy(options.finalLineEnding)
    : defaults.missingFinalLineEnding;
  const format = options.json ? 'json' : await configService.getOutputFormat();

  return {
    mode: { delimiter, lazyQuotes, rfc4180, maxErrors, missingFinalLineEnding },
    format,
    warnings
  };
}

async function openSource(file: string): Promise<ByteSource> {
  if (file === '-') {
    return new StreamSource(process.stdin, 'stdin');
  }
  const source = new FileSource(file);
  await source.ensureReadable();
  return source;
}

/**
 * Run one validation and print the report. Returns the process exit code.
 */
export async function runValidate(file: string, options: ValidateOptions): Promise<ExitCodeValue> {
  if (options.verbose) {
    Logger.configure({ level: LogLevel.DEBUG });
  }

  const configService = new ConfigService({ configPath: options.config });
  const settings = await resolveSettings(options, configService);
  for (const message of settings.warnings) {
    warn(message);
  }

  const source = await openSource(file);
  const validator = new CsvValidator(settings.mode);

  if (settings.format === 'text' && settings.mode.rfc4180) {
    for (const line of strictModeBanner()) {
      console.log(line);
    }
  }

  const result = await validator.validate(source);

  if (settings.format === 'json') {
    console.log(formatJson(result));
  } else {
    for (const line of formatReport(result, { rfc4180: settings.mode.rfc4180 })) {
      console.log(line);
    }
  }

  return exitCodeFor(result);
}

export const validateCommand = new Command('validate')
  .description('Validate a CSV file against RFC 4180 (use - for stdin)')
  .argument('<file>', 'CSV file to validate')
  .option('-d, --delimiter <char>', `Field delimiter in the file: ${COMMON_DELIMITERS.map(describeDelimiter).join(', ')}`)
  .option('-l, --lazyquotes', 'Try to parse improperly escaped quotes')
  .option('--rfc4180', 'Strict RFC 4180 compliance mode (implies comma delimiter and CRLF line endings)')
  .option('--max-errors <n>', 'Stop after this many errors')
  .option('--final-line-ending <policy>', 'Strict mode policy for a missing final line ending (allow|header-only|reject)')
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Configuration file (default: ./.csvlint.yaml)')
  .option('--verbose', 'Enable debug logging')
  .action(withErrorHandling(async (file: string, options: ValidateOptions) => {
    const exitCode = await runValidate(file, options);
    process.exit(exitCode);
  }));
