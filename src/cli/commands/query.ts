import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { buildMemoryContext } from '../../core/context-builder.js';
import { MEMORY_ENTITY_TYPES } from '../../memory/types.js';
import type { MemoryEntityType } from '../../memory/types.js';
import { fail, parseNumber, withRuntime } from '../project.js';
import { emptyState, formatResult, header, icons } from '../ui.js';

function parseTypes(value: string): MemoryEntityType[] {
  return value.split(',').map((raw) => {
    const type = MEMORY_ENTITY_TYPES.find((t) => t === raw.trim());
    if (!type) {
      throw new Error(`Unknown type "${raw}". Use one of: ${MEMORY_ENTITY_TYPES.join(', ')}`);
    }
    return type;
  });
}

export const queryCommand = new Command('query')
  .description('Rank memories against a query')
  .argument('<text...>', 'Query text')
  .option('-t, --type <types>', `Comma-separated types (${MEMORY_ENTITY_TYPES.join(', ')})`)
  .option('-n, --top <n>', 'Number of results')
  .option('-g, --goal <id>', 'Boost memories linked to this goal')
  .option('--all', 'Include retracted and archived beliefs')
  .option('--context', 'Print the results as a prompt block')
  .action(async (words, options) => {
    try {
      const text = words.join(' ');
      const results = await withRuntime((runtime) =>
        runtime.queryMemory({
          text,
          types: options.type ? parseTypes(options.type) : undefined,
          topK: options.top ? parseNumber(options.top, 'top') : undefined,
          activeGoalId: options.goal,
          includeInactive: options.all ?? false,
        })
      );

      if (results.length === 0) {
        emptyState('No matching memories.', 'Record episodes with rv episode, then run rv consolidate');
        return;
      }

      if (options.context) {
        console.log(buildMemoryContext(results).text);
        return;
      }

      console.log(header(`Results for "${text}"`, icons.search));
      for (const result of results) {
        console.log(formatResult(result));
      }
      console.log();
      console.log(chalk.dim(`  ${results.length} result(s)`));
    } catch (err) {
      fail(err);
    }
  });
