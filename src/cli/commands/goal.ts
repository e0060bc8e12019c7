import { Argument, Command } from '@commander-js/extra-typings';
import { GOAL_STATUSES } from '../../memory/types.js';
import { fail, parseNumber, withRuntime } from '../project.js';
import { formatGoal, success } from '../ui.js';

export const goalCommand = new Command('goal')
  .description('Manage goals');

goalCommand
  .command('add')
  .description('Create a goal')
  .argument('<description...>', 'What the goal is')
  .option('-p, --priority <n>', 'Priority from 0 to 10', '5')
  .option('-d, --deadline <date>', 'Deadline (ISO date)')
  .action(async (words, options) => {
    try {
      const deadline = options.deadline ? new Date(options.deadline) : undefined;
      if (deadline && Number.isNaN(deadline.getTime())) {
        throw new Error(`Invalid deadline: ${options.deadline}`);
      }
      const id = await withRuntime((runtime) =>
        runtime.createGoal({
          description: words.join(' '),
          priority: parseNumber(options.priority, 'priority'),
          deadline,
        })
      );
      console.log(success(`Created goal ${id}`));
    } catch (err) {
      fail(err);
    }
  });

goalCommand
  .command('progress')
  .description('Record progress on a goal')
  .argument('<id>', 'Goal ID')
  .argument('<progress>', 'Progress between 0 and 1')
  .action(async (id, value) => {
    try {
      const goal = await withRuntime((runtime) =>
        runtime.updateGoalProgress(id, parseNumber(value, 'progress'))
      );
      console.log(formatGoal(goal));
    } catch (err) {
      fail(err);
    }
  });

goalCommand
  .command('status')
  .description('Change the status of a goal')
  .argument('<id>', 'Goal ID')
  .addArgument(new Argument('<status>', 'New status').choices(GOAL_STATUSES))
  .action(async (id, status) => {
    try {
      const goal = await withRuntime((runtime) => runtime.store.setGoalStatus(id, status));
      console.log(formatGoal(goal));
    } catch (err) {
      fail(err);
    }
  });
