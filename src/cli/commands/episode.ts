import { Command, Option } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { EPISODE_KINDS } from '../../memory/types.js';
import type { EpisodePayload } from '../../memory/types.js';
import { fail, parseNumber, withRuntime } from '../project.js';
import { success } from '../ui.js';

export const episodeCommand = new Command('episode')
  .description('Append an episode to the log')
  .argument('<text...>', 'What happened')
  .addOption(new Option('-k, --kind <kind>', 'Episode kind').choices(EPISODE_KINDS))
  .option('-s, --salience <n>', 'Initial salience')
  .option('-g, --goal <id>', 'Link the episode to a goal')
  .option('--verified', 'Mark the payload as ground truth')
  .option('--skill <name>', 'Report an attempt of a skill')
  .option('--failure <mode>', 'The skill attempt failed in this way')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('rv episode "User said: I love lo-fi music"')}
  ${chalk.cyan('rv episode --kind action --skill deploy "Ran the deploy script"')}
  ${chalk.cyan('rv episode --kind action --skill deploy --failure "missing token" "Deploy failed"')}
`)
  .action(async (words, options) => {
    try {
      const payload: EpisodePayload = { text: words.join(' ') };
      if (options.verified) {
        payload.verified = true;
      }
      if (options.skill) {
        payload.skill = {
          name: options.skill,
          succeeded: options.failure === undefined,
          failureMode: options.failure,
        };
      }

      const id = await withRuntime((runtime) =>
        runtime.appendEpisode(options.kind ?? 'observation', payload, {
          salience: options.salience !== undefined ? parseNumber(options.salience, 'salience') : undefined,
          goalId: options.goal,
        })
      );
      console.log(success(`Recorded episode #${id}`));
    } catch (err) {
      fail(err);
    }
  });
