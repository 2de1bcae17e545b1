/**
 * Tests for the configuration service
 *
 * Each test works in its own directory so files never leak between cases.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ConfigService, CONFIG_FILE_NAME, CsvLintConfig, DEFAULT_VALIDATION_CONFIG } from './config-service.js';
import { ConfigurationError } from '../../core/errors.js';

const TEST_DIR = `.csvlint-test-config-${process.pid}`;

async function writeConfig(content: string): Promise<void> {
  await fs.writeFile(path.join(TEST_DIR, CONFIG_FILE_NAME), content, 'utf-8');
}

describe('ConfigService', () => {
  let configService: ConfigService;

  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
    configService = new ConfigService({ baseDir: TEST_DIR });
  });

  afterEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('getValidationDefaults', () => {
    it('should return the built-in defaults when no config file exists', async () => {
      expect(await configService.getValidationDefaults()).toEqual(DEFAULT_VALIDATION_CONFIG);
      expect(await configService.getOutputFormat()).toBe('text');
    });

    it('should merge file values over the defaults', async () => {
      await writeConfig('delimiter: ";"\nmaxErrors: 10\nformat: json\n');

      expect(await configService.getValidationDefaults()).toEqual({
        delimiter: ';',
        lazyQuotes: false,
        rfc4180: false,
        maxErrors: 10,
        missingFinalLineEnding: 'allow'
      });
      expect(await configService.getOutputFormat()).toBe('json');
    });

    it('should treat an empty file as no settings', async () => {
      await writeConfig('');
      expect(await configService.getValidationDefaults()).toEqual(DEFAULT_VALIDATION_CONFIG);
    });

    it('should cache the file until the cache is cleared', async () => {
      await writeConfig('rfc4180: true\n');
      expect((await configService.getValidationDefaults()).rfc4180).toBe(true);

      await writeConfig('rfc4180: false\n');
      expect((await configService.getValidationDefaults()).rfc4180).toBe(true);

      configService.clearCache();
      expect((await configService.getValidationDefaults()).rfc4180).toBe(false);
    });
  });

  describe('invalid files', () => {
    it('should reject malformed YAML', async () => {
      await writeConfig('delimiter: "unterminated\n');

      await expect(configService.getValidationDefaults()).rejects.toThrow(ConfigurationError);
      await expect(configService.getValidationDefaults()).rejects.toThrow(/^Invalid YAML in /);
    });

    it('should reject unknown keys', async () => {
      await writeConfig('colour: blue\n');
      await expect(configService.getValidationDefaults()).rejects.toThrow(ConfigurationError);
    });

    it('should name the offending key', async () => {
      await writeConfig('delimiter: "::"\n');
      await expect(configService.getValidationDefaults()).rejects.toThrow(
        'Invalid configuration file (delimiter): Delimiter must be a single character'
      );
    });

    it('should reject a missing explicit config path', async () => {
      const service = new ConfigService({ configPath: path.join(TEST_DIR, 'absent.yaml') });

      await expect(service.getValidationDefaults()).rejects.toThrow(ConfigurationError);
      await expect(service.getValidationDefaults()).rejects.toThrow(/^Cannot read configuration file /);
    });
  });

  describe('saveConfig', () => {
    it('should write YAML that loads back', async () => {
      await configService.saveConfig({ delimiter: '|', lazyQuotes: true, format: 'json' });

      const raw = await fs.readFile(path.join(TEST_DIR, CONFIG_FILE_NAME), 'utf-8');
      expect(yaml.parse(raw)).toEqual({ delimiter: '|', lazyQuotes: true, format: 'json' });

      const reloaded = new ConfigService({ baseDir: TEST_DIR });
      expect((await reloaded.getValidationDefaults()).delimiter).toBe('|');
    });

    it('should refuse to save invalid settings', async () => {
      await expect(configService.saveConfig({ maxErrors: -1 })).rejects.toThrow(ConfigurationError);
      await expect(fs.access(path.join(TEST_DIR, CONFIG_FILE_NAME))).rejects.toThrow();
    });

    it('should preserve any valid configuration', async () => {
      const configArb: fc.Arbitrary<CsvLintConfig> = fc.record(
        {
          delimiter: fc.constantFrom(',', ';', '|', '\t', ':'),
          lazyQuotes: fc.boolean(),
          rfc4180: fc.boolean(),
          maxErrors: fc.integer({ min: 1, max: 1000 }),
          missingFinalLineEnding: fc.constantFrom('allow' as const, 'header-only' as const, 'reject' as const),
          format: fc.constantFrom('text' as const, 'json' as const)
        },
        { requiredKeys: [] }
      );

      await fc.assert(
        fc.asyncProperty(configArb, async config => {
          await configService.saveConfig(config);
          const reloaded = new ConfigService({ baseDir: TEST_DIR });
          const defaults = await reloaded.getValidationDefaults();

          expect(defaults.delimiter).toBe(config.delimiter ?? ',');
          expect(defaults.maxErrors).toBe(config.maxErrors);
          expect(await reloaded.getOutputFormat()).toBe(config.format ?? 'text');
        }),
        { numRuns: 25 }
      );
    });
  });

  it('should resolve the config path from the base directory', () => {
    expect(configService.getConfigPath()).toBe(path.join(TEST_DIR, CONFIG_FILE_NAME));
    expect(new ConfigService().getConfigPath()).toBe(CONFIG_FILE_NAME);
  });
});
