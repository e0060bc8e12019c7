import { Command } from '@commander-js/extra-typings';
import { configCommand } from './commands/config.js';
import { consolidateCommand, forgetCommand } from './commands/consolidate.js';
import { episodeCommand } from './commands/episode.js';
import { goalCommand } from './commands/goal.js';
import { hypothesisCommand } from './commands/hypothesis.js';
import { initCommand } from './commands/init.js';
import { queryCommand } from './commands/query.js';
import { showCommand } from './commands/show.js';

export const program = new Command()
  .name('rv')
  .description('Reverie - episodic memory with offline consolidation')
  .version('0.1.0');

// rv init
program.addCommand(initCommand);

// rv episode "..." - append to the episodic log
program.addCommand(episodeCommand);

// rv consolidate / rv forget
program.addCommand(consolidateCommand);
program.addCommand(forgetCommand);

// rv query "..."
program.addCommand(queryCommand);

// rv show [beliefs|skills|goals|hypotheses|self|episodes|runs]
program.addCommand(showCommand);

// Goal and hypothesis bookkeeping
program.addCommand(goalCommand);
program.addCommand(hypothesisCommand);

program.addCommand(configCommand);
