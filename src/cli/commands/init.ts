import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import * as path from 'path';
import { initProject, REVERIE_DIR } from '../../config/index.js';
import { openRuntime } from '../../core/runtime.js';
import { fail } from '../project.js';
import { success } from '../ui.js';

export const initCommand = new Command('init')
  .description('Create a memory store in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .action((options) => {
    try {
      const root = process.cwd();
      initProject(root, options.force ?? false);

      // Opening the store runs the migrations
      openRuntime(root).close();

      console.log(success(`Initialized memory store in ${path.join(root, REVERIE_DIR)}`));
      console.log(chalk.dim('  Record an episode: rv episode "I love lo-fi music"'));
      console.log(chalk.dim('  Then consolidate:  rv consolidate'));
    } catch (err) {
      fail(err);
    }
  });
