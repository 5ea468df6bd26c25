import { Command } from 'commander';
import type { ConfigKey } from '@eisen/core';
import {
  CONFIG_KEYS, ValidationError, isConfigKey,
  getExportPath, setExportPath, getHideCompleted, setHideCompleted,
} from '@eisen/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ValidationError(`Unknown config key '${key}'. Known keys: ${Object.values(CONFIG_KEYS).join(', ')}`);
  }
  return key;
}

function parseBoolean(value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true': case '1': case 'yes': case 'on': return true;
    case 'false': case '0': case 'no': case 'off': return false;
    default: throw new ValidationError(`Expected true or false, got '${value}'`);
  }
}

export function createConfigCommand(ctx: CliContext): Command {
  const config = new Command('config').description('Read or change settings');

  config.command('get')
    .description('Print a setting')
    .argument('<key>', Object.values(CONFIG_KEYS).join(' | '))
    .action((key: string) => $try(() => {
      switch (requireKey(key)) {
        case CONFIG_KEYS.exportPath: out.info(getExportPath(ctx.db)); break;
        case CONFIG_KEYS.hideCompleted: out.info(String(getHideCompleted(ctx.db))); break;
      }
    }));

  config.command('set')
    .description('Change a setting')
    .argument('<key>', Object.values(CONFIG_KEYS).join(' | '))
    .argument('<value>', 'New value')
    .action((key: string, value: string) => $try(() => {
      switch (requireKey(key)) {
        case CONFIG_KEYS.exportPath: setExportPath(ctx.db, value); break;
        case CONFIG_KEYS.hideCompleted: setHideCompleted(ctx.db, parseBoolean(value)); break;
      }
      out.success(`Set ${key} = ${value}`);
    }));

  return config;
}
