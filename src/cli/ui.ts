/**
 * Terminal formatting helpers
 */

import chalk from 'chalk';
import type { RetrievalResult } from '../memory/retriever.js';
import { describeItem } from '../memory/retriever.js';
import type {
  Belief,
  BeliefStatus,
  ConsolidationReport,
  Episode,
  Goal,
  Hypothesis,
  MemoryEntityType,
  SelfModelEntry,
  Skill,
} from '../memory/types.js';

export const icons = {
  episode: '\u{1F4DD}',   // memo
  belief: '\u{1F4A1}',    // lightbulb
  skill: '\u{1F6E0}',     // hammer and wrench
  goal: '\u{1F3AF}',      // direct hit
  hypothesis: '\u{1F52C}', // microscope
  self: '\u{1FA9E}',      // mirror

  brain: '\u{1F9E0}',
  search: '\u{1F50D}',
  moon: '\u{1F319}',      // consolidation runs
  dot: '\u{2022}',
};

export const typeColors: Record<MemoryEntityType, (text: string) => string> = {
  episode: chalk.gray,
  belief: chalk.blue,
  skill: chalk.magenta,
  goal: chalk.yellow,
  hypothesis: chalk.cyan,
};

const statusColors: Record<BeliefStatus, (text: string) => string> = {
  proposed: chalk.white,
  confirmed: chalk.green,
  disputed: chalk.yellow,
  retracted: chalk.red,
  archived: chalk.gray,
};

export function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function formatBelief(belief: Belief): string {
  const status = statusColors[belief.status](`[${belief.status}]`);
  let output = `${icons.belief} ${status} ${chalk.white(belief.statement)} ${chalk.gray(percent(belief.confidence))}`;
  if (belief.verified) {
    output += ` ${chalk.green('verified')}`;
  }
  output += `\n   ${chalk.dim(`ID: ${belief.id}  evidence: ${belief.evidenceIds.join(', ') || 'none'}`)}`;
  if (belief.conflictsWithIds.length > 0) {
    output += `\n   ${chalk.yellow(`conflicts with: ${belief.conflictsWithIds.join(', ')}`)}`;
  }
  return output;
}

export function formatSkill(skill: Skill): string {
  let output = `${icons.skill} ${chalk.bold.magenta(skill.name)} ${chalk.gray(
    `${percent(skill.successRate)} over ${skill.attempts} attempts`
  )}`;
  if (skill.steps.length > 0) {
    output += `\n   ${chalk.dim(`steps: ${skill.steps.join(' → ')}`)}`;
  }
  if (skill.failureModes.length > 0) {
    output += `\n   ${chalk.yellow(`fails when: ${skill.failureModes.join('; ')}`)}`;
  }
  return output;
}

export function formatGoal(goal: Goal): string {
  const bar = progress(goal.progress);
  return `${icons.goal} ${chalk.white(goal.description)} ${chalk.gray(`[${goal.status}, p${goal.priority}]`)} ${bar}` +
    `\n   ${chalk.dim(`ID: ${goal.id}`)}`;
}

export function formatHypothesis(hypothesis: Hypothesis): string {
  let output = `${icons.hypothesis} ${chalk.cyan(`[${hypothesis.status}]`)} ${chalk.white(hypothesis.claim)} ` +
    chalk.gray(percent(hypothesis.confidence));
  output += `\n   ${chalk.dim(`plan: ${hypothesis.verificationPlan}  risk: ${hypothesis.riskIfWrong}`)}`;
  output += `\n   ${chalk.dim(`ID: ${hypothesis.id}`)}`;
  if (hypothesis.promotedBeliefId) {
    output += `\n   ${chalk.dim(`promoted to belief ${hypothesis.promotedBeliefId}`)}`;
  }
  return output;
}

export function formatSelfModel(entry: SelfModelEntry): string {
  let output = `${icons.self} ${chalk.bold(entry.capability)} ${chalk.gray(`reliability ${percent(entry.reliabilityScore)}`)}`;
  if (entry.limitations.length > 0) {
    output += `\n   ${chalk.yellow(`limitations: ${entry.limitations.join('; ')}`)}`;
  }
  return output;
}

export function formatEpisode(episode: Episode): string {
  const text = episode.payload
    ? chalk.white(episode.payload.text)
    : chalk.dim(`(pruned, hash ${episode.contentHash.slice(0, 12)})`);
  return `${chalk.gray(`#${episode.id}`)} ${chalk.dim(episode.timestamp.toISOString())} ` +
    `${chalk.cyan(episode.kind)} ${text} ${chalk.gray(`salience ${episode.salience.toFixed(2)}`)}`;
}

export function formatResult(result: RetrievalResult): string {
  const { ref, score, item } = result;
  const colorFn = typeColors[ref.type];

  let scoreColor = chalk.red;
  if (score >= 0.8) scoreColor = chalk.green;
  else if (score >= 0.6) scoreColor = chalk.yellow;
  else if (score >= 0.4) scoreColor = chalk.cyan;

  return `${icons[ref.type]} ${colorFn(`[${ref.type}]`)} ${chalk.white(describeItem(item))}` +
    `\n   ${scoreColor(`score ${score.toFixed(3)}`)} ${chalk.dim(`ID: ${ref.id}`)}`;
}

export function formatReport(report: ConsolidationReport): string {
  return [
    keyValue('Run', report.runId),
    keyValue('Watermark', `${report.priorWatermark} → ${report.watermark}`),
    keyValue('Episodes', String(report.episodesProcessed)),
    keyValue('Beliefs', `${report.beliefsCreated} created, ${report.beliefsUpdated} updated`),
    keyValue('Disputes', `${report.beliefsDisputed} disputed, ${report.beliefsRetracted} retracted, ${report.beliefsArchived} archived`),
    keyValue('Skills', String(report.skillsUpdated)),
    keyValue('Hypotheses', `${report.hypothesesPromoted} promoted`),
    keyValue('Pruned', String(report.episodesPruned)),
  ].join('\n');
}

export function emptyState(message: string, hint?: string): void {
  console.log();
  console.log(chalk.gray(`   ${message}`));
  if (hint) {
    console.log(chalk.gray.dim(`   ${hint}`));
  }
  console.log();
}

export function success(message: string): string {
  return chalk.green('✓') + ' ' + message;
}

export function error(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

export function warning(message: string): string {
  return chalk.yellow('⚠') + ' ' + message;
}

export function header(text: string, emoji?: string): string {
  const decoration = chalk.gray('─'.repeat(40));
  const prefix = emoji ? emoji + ' ' : '';
  return `\n${prefix}${chalk.bold.cyan(text)}\n${decoration}`;
}

export function progress(value: number): string {
  const filled = Math.round(value * 10);
  return `[${chalk.green('█'.repeat(filled))}${chalk.gray('░'.repeat(10 - filled))}] ${percent(value)}`;
}

export function keyValue(key: string, value: string, keyWidth?: number): string {
  const width = keyWidth ?? 12;
  return `${chalk.cyan(key.padEnd(width))} ${value}`;
}
