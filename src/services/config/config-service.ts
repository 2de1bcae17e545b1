/**
 * Configuration Service
 *
 * Loads validation defaults from .csvlint.yaml. Values given on the command
 * line take precedence over the file, which takes precedence over the
 * built-in defaults.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigurationError } from '../../core/errors.js';
import { ValidatedConfigFile, validateConfigFile } from '../../core/schemas.js';
import { FinalLineEndingPolicy, OutputFormat } from '../../models/types.js';

export const CONFIG_FILE_NAME = '.csvlint.yaml';

/**
 * Full configuration schema
 */
export type CsvLintConfig = ValidatedConfigFile;

/**
 * Validation settings after defaults are applied
 */
export interface ValidationDefaults {
  delimiter: string;
  lazyQuotes: boolean;
  rfc4180: boolean;
  maxErrors?: number;
  missingFinalLineEnding: FinalLineEndingPolicy;
}

/**
 * Default validation configuration values
 */
export const DEFAULT_VALIDATION_CONFIG: ValidationDefaults = {
  delimiter: ',',
  lazyQuotes: false,
  rfc4180: false,
  missingFinalLineEnding: 'allow'
};

export interface ConfigServiceOptions {
  /** Directory searched for .csvlint.yaml (default: current directory) */
  baseDir?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
}

/**
 * Configuration Service
 *
 * Provides access to configuration values from .csvlint.yaml
 * with sensible defaults when configuration is not present.
 */
export class ConfigService {
  private configPath: string;
  private required: boolean;
  private cachedConfig: CsvLintConfig | null = null;

  constructor(options: ConfigServiceOptions = {}) {
    this.required = options.configPath !== undefined;
    this.configPath = options.configPath ?? path.join(options.baseDir || '.', CONFIG_FILE_NAME);
  }

  /**
   * Load configuration from file, with caching
   */
  private async loadConfig(): Promise<CsvLintConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string | null;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (this.required || !isMissingFile(error)) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read configuration file ${this.configPath}: ${reason}`, 'config');
      }
      content = null;
    }

    const config = content === null ? {} : this.parse(content);
    this.cachedConfig = config;
    return config;
  }

  private parse(content: string): CsvLintConfig {
    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (err) {
      const line = err instanceof yaml.YAMLParseError ? err.linePos?.[0]?.line : undefined;
      const where = line !== undefined ? ` at line ${line}` : '';
      throw new ConfigurationError(`Invalid YAML in ${this.configPath}${where}`, 'config', { line });
    }

    // An empty document parses to null
    return validateConfigFile(parsed ?? {});
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Get validation settings merged over the defaults
   */
  async getValidationDefaults(): Promise<ValidationDefaults> {
    const config = await this.loadConfig();

    return {
      delimiter: config.delimiter ?? DEFAULT_VALIDATION_CONFIG.delimiter,
      lazyQuotes: config.lazyQuotes ?? DEFAULT_VALIDATION_CONFIG.lazyQuotes,
      rfc4180: config.rfc4180 ?? DEFAULT_VALIDATION_CONFIG.rfc4180,
      maxErrors: config.maxErrors,
      missingFinalLineEnding: config.missingFinalLineEnding ?? DEFAULT_VALIDATION_CONFIG.missingFinalLineEnding
    };
  }

  /**
   * Get the report format (default: text)
   */
  async getOutputFormat(): Promise<OutputFormat> {
    const config = await this.loadConfig();
    return config.format ?? 'text';
  }

  /**
   * Save configuration to file
   */
  async saveConfig(config: CsvLintConfig): Promise<void> {
    const checked = validateConfigFile(config);
    await fs.writeFile(this.configPath, yaml.stringify(checked), 'utf-8');
    this.cachedConfig = checked;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
