/**
 * Config Command
 */

import { Command } from 'commander';
import { ValidationError } from '../lib/errors.js';
import { runCommand } from '../lib/api-client.js';
import { isConfigKey, parseConfigValue } from '../services/config.js';
import { formatRecord, printResult } from '../utils/output.js';
import type { ConfigKey } from '../types/config.js';

const SECRET_KEYS: readonly ConfigKey[] = ['clientSecret'];

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ValidationError(`Unknown config key: '${key}'`, 'key');
  }
  return key;
}

/**
 * Secrets are shown masked unless they are ${VAR} references
 */
function display(key: ConfigKey, value: unknown): unknown {
  if (typeof value === 'string' && SECRET_KEYS.includes(key) && !/^\$\{[A-Za-z_][A-Za-z0-9_]*\}$/.test(value)) {
    return '********';
  }
  return value;
}

export const configCommand = new Command('config').description('Read and write the config file');

configCommand
  .command('get')
  .description('Show one config value')
  .argument('<key>', 'Config key')
  .action(async (key: string, _options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, configService }) => {
      const configKey = requireKey(key);
      const value = display(configKey, configService().get(configKey));
      printResult(format, { key: configKey, value: value ?? null }, () =>
        value === undefined ? '' : Array.isArray(value) ? value.join(' ') : String(value)
      );
    })
  );

configCommand
  .command('set')
  .description('Set a config value')
  .argument('<key>', 'Config key')
  .argument('<value>', 'New value (scopes: comma or space separated)')
  .action(async (key: string, value: string, _options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, configService }) => {
      const configKey = requireKey(key);
      configService().set(configKey, parseConfigValue(configKey, value));
      printResult(format, { key: configKey, message: `Set ${configKey}` }, () => `Set ${configKey}`);
    })
  );

configCommand
  .command('unset')
  .description('Remove a config value')
  .argument('<key>', 'Config key')
  .action(async (key: string, _options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, configService }) => {
      const configKey = requireKey(key);
      configService().delete(configKey);
      printResult(format, { key: configKey, message: `Removed ${configKey}` }, () => `Removed ${configKey}`);
    })
  );

configCommand
  .command('list')
  .description('Show every value in the config file')
  .action(async (_options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, configService }) => {
      const config: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(configService().getAll())) {
        config[key] = isConfigKey(key) ? display(key, value) : value;
      }
      printResult(format, { config }, () => formatRecord(config));
    })
  );

configCommand
  .command('path')
  .description('Show the config file location')
  .action(async (_options: object, cmd: Command) =>
    runCommand(cmd, async ({ format, configService }) => {
      const path = configService().getConfigPath();
      printResult(format, { path }, () => path);
    })
  );
