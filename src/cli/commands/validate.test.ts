// Tests for the validate command

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { resolveSettings, runValidate, ValidateOptions } from './validate.js';
import { ConfigService, CONFIG_FILE_NAME } from '../../services/config/config-service.js';
import { ConfigurationError, NotFoundError } from '../../core/errors.js';

const TEST_DIR = `.csvlint-test-validate-${process.pid}`;
const CONFIG = path.join(TEST_DIR, CONFIG_FILE_NAME);

async function csv(name: string, content: string | Uint8Array): Promise<string> {
  const file = path.join(TEST_DIR, name);
  await fs.writeFile(file, content);
  return file;
}

function logged(): string[] {
  return vi.mocked(console.log).mock.calls.map(args => String(args[0]));
}

describe('validate command', () => {
  beforeEach(async () => {
    await fs.rm(TEST_DIR, { recursive: true, force: true });
    await fs.mkdir(TEST_DIR, { recursive: true });
    await fs.writeFile(CONFIG, '');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('resolveSettings', () => {
    const service = (): ConfigService => new ConfigService({ configPath: CONFIG });

    it('should use the defaults without flags', async () => {
      const settings = await resolveSettings({}, service());

      expect(settings.mode).toEqual({
        delimiter: ',',
        lazyQuotes: false,
        rfc4180: false,
        maxErrors: undefined,
        missingFinalLineEnding: 'allow'
      });
      expect(settings.format).toBe('text');
      expect(settings.warnings).toEqual([]);
    });

    it('should let flags override the config file', async () => {
      await fs.writeFile(CONFIG, 'delimiter: ";"\nmaxErrors: 5\nformat: json\n');

      const settings = await resolveSettings({ delimiter: 'tab', maxErrors: '2' }, service());

      expect(settings.mode.delimiter).toBe('\t');
      expect(settings.mode.maxErrors).toBe(2);
      expect(settings.format).toBe('json');
    });

    it('should force comma and strict quotes in strict mode', async () => {
      const settings = await resolveSettings({ rfc4180: true, delimiter: ';', lazyquotes: true }, service());

      expect(settings.mode.delimiter).toBe(',');
      expect(settings.mode.lazyQuotes).toBe(false);
      expect(settings.warnings).toEqual([
        '--rfc4180 mode requires comma delimiter, ignoring --delimiter option',
        '--rfc4180 mode disables lazy quotes, ignoring --lazyquotes option'
      ]);
    });

    it('should warn when leaving the RFC 4180 defaults', async () => {
      const settings = await resolveSettings({ lazyquotes: true }, service());
      expect(settings.warnings).toEqual(['not using defaults, may not validate CSV to RFC 4180']);
    });

    it('should reject a bad final line ending policy', async () => {
      await expect(resolveSettings({ finalLineEnding: 'maybe' }, service())).rejects.toThrow(ConfigurationError);
    });
  });

  describe('runValidate', () => {
    const run = (file: string, options: ValidateOptions = {}) => runValidate(file, { config: CONFIG, ...options });

    it('should report a valid file and exit 0', async () => {
      const file = await csv('ok.csv', 'a,b\n1,2\n');

      expect(await run(file)).toBe(0);
      expect(logged()).toEqual(['file is valid']);
    });

    it('should print the strict banner before the verdict', async () => {
      const file = await csv('strict.csv', 'a,b\r\n1,2\r\n');

      expect(await run(file, { rfc4180: true })).toBe(0);
      expect(logged()).toEqual([
        'Running in strict RFC 4180 compliance mode',
        '- Delimiter: comma (,)',
        '- Line endings: CRLF required',
        '- Quote escaping: strict',
        '',
        'file is valid and complies with RFC 4180'
      ]);
    });

    it('should report defects and exit 2', async () => {
      const file = await csv('short.csv', 'a,b\n1\n');

      expect(await run(file)).toBe(2);
      expect(logged()).toEqual([
        'Found 1 validation error(s):',
        '  - 1 field count error(s)',
        '',
        'Record #2 has error: wrong number of fields: expected 2, found 1'
      ]);
    });

    it('should exit 1 when the file cannot be decoded', async () => {
      const file = await csv('binary.csv', Uint8Array.from([0x61, 0x0a, 0xff, 0x0a]));

      expect(await run(file)).toBe(1);
      expect(logged().slice(-1)).toEqual(['unable to parse any further']);
    });

    it('should exit 2 when the error cap is reached', async () => {
      const file = await csv('many.csv', 'a\n1,2\n1,2\n1,2\n');

      expect(await run(file, { maxErrors: '1' })).toBe(2);
      expect(logged().slice(-1)).toEqual(['stopped after 1 error(s); later records were not checked']);
    });

    it('should print JSON when asked', async () => {
      const file = await csv('short.csv', 'a,b\n1\n');

      expect(await run(file, { json: true })).toBe(2);
      const output: unknown = JSON.parse(logged()[0]);
      expect(output).toMatchObject({ valid: false, halted: false, truncated: false, recordCount: 2 });
    });

    it('should print the strict-mode warnings', async () => {
      const file = await csv('strict.csv', 'a,b\r\n');

      await run(file, { rfc4180: true, delimiter: ';' });
      expect(console.warn).toHaveBeenCalledWith(
        'Warning: --rfc4180 mode requires comma delimiter, ignoring --delimiter option'
      );
    });

    it('should fail on a missing file', async () => {
      await expect(run(path.join(TEST_DIR, 'missing.csv'))).rejects.toThrow(NotFoundError);
    });
  });
});
