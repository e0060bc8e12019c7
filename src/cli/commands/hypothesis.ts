import { Command, Argument } from '@commander-js/extra-typings';
import { fail, parseNumber, withRuntime } from '../project.js';
import { formatHypothesis, success } from '../ui.js';

export const hypothesisCommand = new Command('hypothesis')
  .description('Track claims that still need verification');

hypothesisCommand
  .command('add')
  .description('Register an open hypothesis')
  .argument('<claim...>', 'The claim')
  .requiredOption('--plan <plan>', 'How the claim will be verified')
  .option('-c, --confidence <n>', 'Current confidence below 1')
  .option('--risk <risk>', 'What happens if the claim is wrong')
  .option('-e, --evidence <ids>', 'Comma-separated supporting episode ids')
  .action(async (words, options) => {
    try {
      const id = await withRuntime((runtime) =>
        runtime.registerHypothesis({
          claim: words.join(' '),
          verificationPlan: options.plan,
          confidence: options.confidence !== undefined ? parseNumber(options.confidence, 'confidence') : undefined,
          riskIfWrong: options.risk,
          evidenceIds: options.evidence
            ? options.evidence.split(',').map((raw) => parseNumber(raw.trim(), 'evidence id'))
            : undefined,
        })
      );
      console.log(success(`Registered hypothesis ${id}`));
    } catch (err) {
      fail(err);
    }
  });

hypothesisCommand
  .command('resolve')
  .description('Close a hypothesis; verified ones become beliefs on the next consolidation')
  .argument('<id>', 'Hypothesis ID')
  .addArgument(new Argument('<outcome>', 'Outcome').choices(['verified', 'rejected'] as const))
  .option('-c, --confidence <n>', 'Final confidence')
  .action(async (id, outcome, options) => {
    try {
      const hypothesis = await withRuntime((runtime) =>
        runtime.resolveHypothesis(
          id,
          outcome,
          options.confidence !== undefined ? parseNumber(options.confidence, 'confidence') : undefined
        )
      );
      console.log(formatHypothesis(hypothesis));
    } catch (err) {
      fail(err);
    }
  });
