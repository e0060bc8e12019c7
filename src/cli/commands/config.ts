import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  getConfigValue,
  initProject,
  loadConfig,
  setConfigValue,
} from '../../config/index.js';
import { fail, requireProjectRoot } from '../project.js';
import { success, warning } from '../ui.js';

export const configCommand = new Command('config')
  .description('Manage memory store configuration');

// rv config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., consolidation.batchSize)')
  .description('Get configuration value(s)')
  .action((key) => {
    try {
      const root = requireProjectRoot();
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          throw new Error(`Unknown config key: ${key}`);
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (err) {
      fail(err);
    }
  });

// rv config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., forgetting.retentionDays)')
  .argument('<value>', 'New value')
  .description('Set a configuration value')
  .action((key, value) => {
    try {
      setConfigValue(key, value, requireProjectRoot());
      console.log(success(`Set ${key} = ${value}`));
    } catch (err) {
      fail(err);
    }
  });

// rv config list
configCommand
  .command('list')
  .description('List all configuration values')
  .action(() => {
    try {
      printConfigTree(loadConfig(requireProjectRoot()), '');
    } catch (err) {
      fail(err);
    }
  });

// rv config reset
configCommand
  .command('reset')
  .description('Reset configuration to defaults (the memory database is kept)')
  .option('-y, --yes', 'Skip confirmation')
  .action((options) => {
    try {
      const root = requireProjectRoot();
      if (!options.yes) {
        console.log(warning('This will reset all configuration to defaults.'));
        console.log(chalk.gray('Use --yes to skip this confirmation.'));
        return;
      }
      initProject(root, true);
      console.log(success('Configuration reset to defaults'));
    } catch (err) {
      fail(err);
    }
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

function printConfigTree(obj: object, prefix: string): void {
  for (const [key, value] of Object.entries(obj)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;

    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      console.log(chalk.bold(`${fullKey}:`));
      printConfigTree(value, fullKey);
    } else {
      console.log(`  ${chalk.cyan(fullKey)} = ${chalk.white(formatValue(value))}`);
    }
  }
}
