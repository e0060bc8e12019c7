/**
 * Inspection views over the memory store:
 * - rv show → statistics
 * - rv show beliefs|skills|goals|hypotheses|self|episodes|runs
 * - rv show belief <id> → a belief with its evidence trail
 */

import { Command, Option } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { BELIEF_STATUSES, GOAL_STATUSES } from '../../memory/types.js';
import { fail, parseNumber, withRuntime } from '../project.js';
import {
  emptyState,
  formatBelief,
  formatEpisode,
  formatGoal,
  formatHypothesis,
  formatReport,
  formatSelfModel,
  formatSkill,
  header,
  icons,
  keyValue,
} from '../ui.js';

export const showCommand = new Command('show')
  .description('Show what the store remembers')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('rv show')}                   Memory statistics
  ${chalk.cyan('rv show beliefs -s disputed')} Disputed beliefs only
  ${chalk.cyan('rv show belief <id>')}       A belief and its evidence
  ${chalk.cyan('rv show runs')}              Recent consolidation runs
`)
  .action(async () => {
    try {
      const stats = await withRuntime((runtime) => runtime.store.getStats());

      console.log(header('Memory', icons.brain));
      console.log(keyValue('Episodes', `${stats.episodeCount} (${stats.prunedEpisodeCount} pruned)`));
      console.log(keyValue('Beliefs', Object.entries(stats.beliefCounts)
        .map(([status, count]) => `${count} ${status}`)
        .join(', ')));
      console.log(keyValue('Skills', String(stats.skillCount)));
      console.log(keyValue('Goals', String(stats.goalCount)));
      console.log(keyValue('Hypotheses', String(stats.hypothesisCount)));
      console.log(keyValue('Watermark', String(stats.watermark)));
      console.log(keyValue('Last run', stats.lastRunAt ? stats.lastRunAt.toISOString() : 'never'));
      console.log();
    } catch (err) {
      fail(err);
    }
  });

showCommand
  .command('beliefs')
  .description('List beliefs, most recently updated first')
  .addOption(new Option('-s, --status <status>', 'Only beliefs with this status').choices(BELIEF_STATUSES))
  .action(async (options) => {
    try {
      const beliefs = await withRuntime((runtime) => runtime.listBeliefs({ status: options.status }));
      if (beliefs.length === 0) {
        emptyState('No beliefs yet.', 'Record episodes and run rv consolidate');
        return;
      }
      console.log(header(`Beliefs (${beliefs.length})`, icons.belief));
      for (const belief of beliefs) {
        console.log(formatBelief(belief));
      }
      console.log();
    } catch (err) {
      fail(err);
    }
  });

showCommand
  .command('belief')
  .description('Show one belief with its evidence trail')
  .argument('<id>', 'Belief ID')
  .action(async (id) => {
    try {
      const { belief, evidence, missing } = await withRuntime((runtime) => runtime.provenance(id));
      console.log();
      console.log(formatBelief(belief));
      console.log(header('Evidence'));
      for (const record of evidence) {
        const state = record.pruned ? chalk.yellow('pruned') : chalk.green('present');
        console.log(`   #${record.episodeId} ${chalk.dim(record.timestamp.toISOString())} ${state} ${chalk.gray(record.contentHash)}`);
      }
      for (const episodeId of missing) {
        console.log(`   #${episodeId} ${chalk.red('missing')}`);
      }
      console.log();
    } catch (err) {
      fail(err);
    }
  });

showCommand
  .command('skills')
  .description('List learned skills')
  .action(async () => {
    try {
      const skills = await withRuntime((runtime) => runtime.listSkills());
      if (skills.length === 0) {
        emptyState('No skills yet.', 'Report attempts with rv episode --skill <name>');
        return;
      }
      console.log(header(`Skills (${skills.length})`, icons.skill));
      skills.forEach((skill) => console.log(formatSkill(skill)));
      console.log();
    } catch (err) {
      fail(err);
    }
  });

showCommand
  .command('goals')
  .description('List goals by priority')
  .addOption(new Option('-s, --status <status>', 'Only goals with this status').choices(GOAL_STATUSES))
  .action(async (options) => {
    try {
      const goals = await withRuntime((runtime) => runtime.listGoals(options.status));
      if (goals.length === 0) {
        emptyState('No goals yet.', 'Add one: rv goal add "Ship the release"');
        return;
      }
      console.log(header(`Goals (${goals.length})`, icons.goal));
      goals.forEach((goal) => console.log(formatGoal(goal)));
      console.log();
    } catch (err) {
      fail(err);
    }
  });

showCommand
  .command('hypotheses')
  .description('List hypotheses')
  .action(async () => {
    try {
      const hypotheses = await withRuntime((runtime) => runtime.listHypotheses());
      if (hypotheses.length === 0) {
        emptyState('No hypotheses yet.', 'Add one: rv hypothesis add "..." --plan "..."');
        return;
      }
      console.log(header(`Hypotheses (${hypotheses.length})`, icons.hypothesis));
      hypotheses.forEach((hypothesis) => console.log(formatHypothesis(hypothesis)));
      console.log();
    } catch (err) {
      fail(err);
    }
  });

showCommand
  .command('self')
  .description('Show the self-model: per-skill reliability and limitations')
  .action(async () => {
    try {
      const entries = await withRuntime((runtime) => runtime.listSelfModel());
      if (entries.length === 0) {
        emptyState('The self-model is empty.', 'It fills in as skill outcomes are consolidated');
        return;
      }
      console.log(header('Self-model', icons.self));
      entries.forEach((entry) => console.log(formatSelfModel(entry)));
      console.log();
    } catch (err) {
      fail(err);
    }
  });

showCommand
  .command('episodes')
  .description('List recent episodes')
  .option('-n, --limit <n>', 'Maximum episodes to show', '20')
  .action(async (options) => {
    try {
      const limit = parseNumber(options.limit, 'limit');
      const episodes = await withRuntime((runtime) => runtime.store.listEpisodes({ limit }));
      if (episodes.length === 0) {
        emptyState('No episodes yet.', 'Record one: rv episode "..."');
        return;
      }
      console.log(header(`Episodes (${episodes.length})`, icons.episode));
      episodes.forEach((episode) => console.log(formatEpisode(episode)));
      console.log();
    } catch (err) {
      fail(err);
    }
  });

showCommand
  .command('runs')
  .description('List recent consolidation runs')
  .option('-n, --limit <n>', 'Maximum runs to show', '5')
  .action(async (options) => {
    try {
      const limit = parseNumber(options.limit, 'limit');
      const runs = await withRuntime((runtime) => runtime.store.listConsolidationRuns(limit));
      if (runs.length === 0) {
        emptyState('No consolidation runs yet.', 'Run rv consolidate');
        return;
      }
      for (const run of runs) {
        console.log(header(run.finishedAt.toISOString(), icons.moon));
        console.log(formatReport(run));
      }
      console.log();
    } catch (err) {
      fail(err);
    }
  });
