import type { ForgettingConfig } from '../config/index.js';
import { createLogger } from '../core/logger.js';
import { ageInDays } from '../memory/scoring.js';
import { ALL_ROWS } from '../memory/store.js';
import type { MemoryStore } from '../memory/store.js';
import type { Belief, Episode, Skill } from '../memory/types.js';

const log = createLogger('forgetting');

export type ForgettingOptions = Pick<ForgettingConfig, 'salienceHalfLifeDays' | 'pruneFloor' | 'retentionDays'>;

export interface ForgettingPlan {
  salienceUpdates: Array<{ episodeId: number; salience: number }>;
  prunes: number[];
}

export interface ForgettingReport {
  watermark: number;
  salienceUpdated: number;
  episodesPruned: number;
}

/**
 * Episodes cited by a non-retracted belief or by any skill. These never decay
 * and are never pruned.
 */
export function collectCitedEpisodeIds(beliefs: Iterable<Belief>, skills: Iterable<Skill>): Set<number> {
  const cited = new Set<number>();
  for (const belief of beliefs) {
    if (belief.status === 'retracted') continue;
    for (const id of belief.evidenceIds) cited.add(id);
  }
  for (const skill of skills) {
    for (const id of skill.evidenceIds) cited.add(id);
  }
  return cited;
}

// Never rises: a salience lowered by an earlier pass stays lowered.
export function decayedSalience(episode: Episode, now: Date, halfLifeDays: number): number {
  const decayed = episode.initialSalience * Math.pow(0.5, ageInDays(episode.timestamp, now) / halfLifeDays);
  return Math.min(episode.salience, decayed);
}

/**
 * Decide salience updates and prunes for every unpruned episode at or below
 * the watermark. Episodes above it have not been replayed yet and are left alone.
 */
export function planForgetting(
  store: MemoryStore,
  cited: Set<number>,
  watermark: number,
  now: Date,
  options: ForgettingOptions
): ForgettingPlan {
  const plan: ForgettingPlan = { salienceUpdates: [], prunes: [] };
  if (watermark <= 0) return plan;

  const episodes = store.listEpisodes({
    upToId: watermark,
    includePruned: false,
    order: 'asc',
    limit: ALL_ROWS,
  });

  for (const episode of episodes) {
    if (cited.has(episode.id)) continue;

    const salience = decayedSalience(episode, now, options.salienceHalfLifeDays);
    if (salience < episode.salience) {
      plan.salienceUpdates.push({ episodeId: episode.id, salience });
    }

    if (salience < options.pruneFloor && ageInDays(episode.timestamp, now) >= options.retentionDays) {
      plan.prunes.push(episode.id);
    }
  }

  return plan;
}

/**
 * Standalone forgetting pass over everything already consolidated. Commits
 * through the batch path without moving the watermark.
 */
export function runForgetting(
  store: MemoryStore,
  options: ForgettingOptions,
  now: Date = store.now()
): ForgettingReport {
  const watermark = store.getWatermark().value;
  const cited = collectCitedEpisodeIds(
    store.listBeliefs({ limit: ALL_ROWS }),
    store.listSkills({ limit: ALL_ROWS })
  );
  const plan = planForgetting(store, cited, watermark, now, options);

  const commit = store.applyConsolidationBatch({
    priorWatermark: watermark,
    watermark,
    beliefUpserts: [],
    skillUpserts: [],
    selfModelUpserts: [],
    hypothesisPromotions: [],
    salienceUpdates: plan.salienceUpdates,
    prunes: plan.prunes,
    embeddings: [],
  });

  log.info(`decayed ${plan.salienceUpdates.length} episodes, pruned ${commit.episodesPruned}`);
  return {
    watermark,
    salienceUpdated: plan.salienceUpdates.length,
    episodesPruned: commit.episodesPruned,
  };
}
