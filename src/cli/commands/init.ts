// Init command - write a starter .csvlint.yaml

import * as fs from 'fs/promises';
import * as path from 'path';
import { Command } from 'commander';
import { ConfigurationError } from '../../core/errors.js';
import { CONFIG_FILE_NAME, ConfigService, DEFAULT_VALIDATION_CONFIG } from '../../services/config/config-service.js';
import { success, withErrorHandling } from '../utils/error-handler.js';

/**
 * Create the config file in `dir`. Returns its path.
 */
export async function runInit(dir: string, force = false): Promise<string> {
  const configPath = path.join(dir, CONFIG_FILE_NAME);

  if (!force) {
    const exists = await fs.access(configPath).then(() => true, () => false);
    if (exists) {
      throw new ConfigurationError(`${configPath} already exists, use --force to overwrite`, 'config');
    }
  }

  const configService = new ConfigService({ configPath });
  await configService.saveConfig({ ...DEFAULT_VALIDATION_CONFIG, format: 'text' });
  return configPath;
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description(`Create a ${CONFIG_FILE_NAME} with the default settings`)
    .option('-p, --path <path>', 'Directory to write the file to', process.cwd())
    .option('-f, --force', 'Overwrite an existing file')
    .action(withErrorHandling(async (options: { path: string; force?: boolean }) => {
      const configPath = await runInit(options.path, options.force);
      success(`Created ${configPath}`);
    }));
}
