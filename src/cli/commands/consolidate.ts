import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { fail, withRuntime } from '../project.js';
import { formatReport, header, icons, success, warning } from '../ui.js';

export const consolidateCommand = new Command('consolidate')
  .description('Replay new episodes into beliefs and skills, then apply forgetting')
  .option('--json', 'Print the run report as JSON')
  .action(async (options) => {
    try {
      const outcome = await withRuntime((runtime) => runtime.consolidate());

      if (outcome.status === 'rejected') {
        console.log(warning('A consolidation run is already in progress; nothing to do.'));
        return;
      }

      if (options.json) {
        console.log(JSON.stringify(outcome.report, null, 2));
        return;
      }

      console.log(header('Consolidation', icons.moon));
      console.log(formatReport(outcome.report));
      console.log();
      console.log(success(outcome.report.episodesProcessed > 0
        ? `Watermark advanced to ${outcome.report.watermark}`
        : 'No new episodes'));
      console.log(chalk.dim('  Inspect the result: rv show beliefs'));
    } catch (err) {
      fail(err);
    }
  });

export const forgetCommand = new Command('forget')
  .description('Decay and prune consolidated episodes that no belief or skill cites')
  .action(async () => {
    try {
      const report = await withRuntime((runtime) => runtime.forget());
      console.log(success(
        `Decayed ${report.salienceUpdated} episodes, pruned ${report.episodesPruned} (watermark ${report.watermark})`
      ));
    } catch (err) {
      fail(err);
    }
  });
