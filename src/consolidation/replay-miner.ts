import { nanoid } from 'nanoid';
import type { ConsolidationConfig } from '../config/index.js';
import { createLogger } from '../core/logger.js';
import { ALL_ROWS } from '../memory/store.js';
import type { MemoryStore } from '../memory/store.js';
import type { Belief, Episode, SelfModelEntry, Skill, SkillOutcome } from '../memory/types.js';
import { HeuristicExtractor, parseClaim, normalizeSubject } from './extraction.js';
import type { ExtractedClaim, ExtractionProvider } from './extraction.js';

const log = createLogger('replay');

export type ReplayOptions = Pick<
  ConsolidationConfig,
  'batchSize' | 'heuristicConfidence' | 'corroborationGain' | 'maxReplayConfidence' | 'skillHistoryLength'
>;

export interface ReplayWindow {
  priorWatermark: number;
  watermark: number;      // Highest episode id in the window, or the prior watermark when empty
  episodes: Episode[];    // Timestamp order
}

export interface ReplayResult {
  window: ReplayWindow;
  previous: Map<string, Belief>;  // Stored beliefs as read before replay
  beliefs: Map<string, Belief>;   // Every stored belief plus drafts, keyed by id
  touched: Set<string>;
  created: Set<string>;
  skills: Map<string, Skill>;     // Touched skills only, keyed by name
  selfModel: SelfModelEntry[];
  promotions: Array<{ hypothesisId: string; beliefId: string }>;
  fallbacks: number;
}

/**
 * Episodes with ids in (priorWatermark, snapshot], lowest ids first, at most
 * `batchSize` of them. Whatever is left over belongs to the next run.
 */
export function selectWindow(
  store: MemoryStore,
  priorWatermark: number,
  snapshot: number,
  batchSize: number
): ReplayWindow {
  const episodes = snapshot > priorWatermark
    ? store.listEpisodes({ afterId: priorWatermark, upToId: snapshot, limit: batchSize, order: 'asc' })
    : [];

  const watermark = episodes.reduce((max, e) => Math.max(max, e.id), priorWatermark);
  episodes.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id);

  return { priorWatermark, watermark, episodes };
}

export function isLiveBelief(belief: Belief): boolean {
  return belief.status !== 'retracted' && belief.status !== 'archived';
}

/**
 * Replays a window of episodes into a working set of belief and skill
 * drafts. Nothing is written; the consolidator commits the result.
 */
export class ReplayMiner {
  private heuristic = new HeuristicExtractor();

  constructor(
    private store: MemoryStore,
    private extractor: ExtractionProvider,
    private options: ReplayOptions,
    private clock: () => Date = () => store.now()
  ) {}

  async mine(priorWatermark: number, snapshot: number): Promise<ReplayResult> {
    const window = selectWindow(this.store, priorWatermark, snapshot, this.options.batchSize);
    const stored = this.store.listBeliefs({ limit: ALL_ROWS });
    const result: ReplayResult = {
      window,
      previous: new Map(stored.map((b) => [b.id, b])),
      beliefs: new Map(stored.map((b) => [b.id, b])),
      touched: new Set(),
      created: new Set(),
      skills: new Map(),
      selfModel: [],
      promotions: [],
      fallbacks: 0,
    };

    for (const episode of window.episodes) {
      if (!episode.payload) continue;

      for (const claim of await this.extractClaims(episode, result)) {
        const verified = episode.payload.verified === true;
        this.applyClaim(result, claim, [episode.id], verified);
      }

      if (episode.payload.skill) {
        this.applySkillOutcome(result, episode, episode.payload.skill);
      }
    }

    this.promoteHypotheses(result);

    const now = this.clock();
    for (const skill of result.skills.values()) {
      result.selfModel.push(selfModelFor(skill, now));
    }

    log.debug(
      `window (${window.priorWatermark}, ${window.watermark}]: ${window.episodes.length} episodes, ` +
      `${result.touched.size} beliefs touched, ${result.skills.size} skills`
    );
    return result;
  }

  private async extractClaims(episode: Episode, result: ReplayResult): Promise<ExtractedClaim[]> {
    const extraction = await this.extractor.extract(episode);
    if (extraction.status === 'ok') {
      return extraction.claims;
    }

    result.fallbacks++;
    log.debug(`episode ${episode.id}: ${this.extractor.name} unavailable (${extraction.reason}), using heuristic`);
    const fallback = await this.heuristic.extract(episode);
    return fallback.status === 'ok' ? fallback.claims : [];
  }

  private applyClaim(
    result: ReplayResult,
    claim: ExtractedClaim,
    evidenceIds: number[],
    verified: boolean,
    confidence: number = claim.confidence ?? this.options.heuristicConfidence
  ): Belief {
    const now = this.clock();
    const { maxReplayConfidence, corroborationGain } = this.options;
    const existing = findMatchingBelief(result.beliefs, claim);

    if (existing) {
      const isVerified = existing.verified || verified;
      const corroborated = existing.confidence + (1 - existing.confidence) * corroborationGain;
      const updated: Belief = {
        ...existing,
        verified: isVerified,
        confidence: verified ? 1 : isVerified ? corroborated : Math.min(corroborated, maxReplayConfidence),
        evidenceIds: union(existing.evidenceIds, evidenceIds),
        lastConfirmedAt: now,
        updatedAt: now,
      };
      result.beliefs.set(updated.id, updated);
      result.touched.add(updated.id);
      return updated;
    }

    const belief: Belief = {
      id: nanoid(),
      statement: claim.statement,
      subject: claim.subject,
      polarity: claim.polarity,
      value: claim.value,
      confidence: verified ? 1 : Math.min(confidence, maxReplayConfidence),
      status: 'proposed',
      verified,
      evidenceIds: union([], evidenceIds),
      conflictsWithIds: [],
      createdAt: now,
      updatedAt: now,
    };
    result.beliefs.set(belief.id, belief);
    result.touched.add(belief.id);
    result.created.add(belief.id);
    return belief;
  }

  private applySkillOutcome(result: ReplayResult, episode: Episode, outcome: SkillOutcome): void {
    const now = this.clock();
    const name = outcome.name.trim();
    const current: Skill = result.skills.get(name) ?? this.store.getSkillByName(name) ?? {
      id: nanoid(),
      name,
      preconditions: [],
      steps: [],
      failureModes: [],
      successRate: 0,
      attempts: 0,
      successes: 0,
      successRateHistory: [],
      evidenceIds: [],
      createdAt: now,
      updatedAt: now,
    };

    const attempts = current.attempts + 1;
    const successes = current.successes + (outcome.succeeded ? 1 : 0);
    const successRate = successes / attempts;
    const failureModes = !outcome.succeeded && outcome.failureMode && !current.failureModes.includes(outcome.failureMode)
      ? [...current.failureModes, outcome.failureMode]
      : current.failureModes;

    result.skills.set(name, {
      ...current,
      attempts,
      successes,
      successRate,
      successRateHistory: [...current.successRateHistory, successRate].slice(-this.options.skillHistoryLength),
      failureModes,
      steps: outcome.steps && outcome.steps.length > 0 ? outcome.steps : current.steps,
      preconditions: [...new Set([...current.preconditions, ...(outcome.preconditions ?? [])])],
      evidenceIds: union(current.evidenceIds, [episode.id]),
      lastUsed: episode.timestamp,
      updatedAt: now,
    });
  }

  // A verified hypothesis enters the belief set once, carrying its own evidence.
  private promoteHypotheses(result: ReplayResult): void {
    const pending = this.store
      .listHypotheses({ status: 'verified', limit: ALL_ROWS })
      .filter((h) => !h.promotedBeliefId);

    for (const hypothesis of pending) {
      const claim: ExtractedClaim = parseClaim(hypothesis.claim) ?? {
        statement: hypothesis.claim,
        subject: normalizeSubject(hypothesis.claim),
        polarity: 'positive',
      };
      const belief = this.applyClaim(result, claim, hypothesis.evidenceIds, false, hypothesis.confidence);
      result.promotions.push({ hypothesisId: hypothesis.id, beliefId: belief.id });
    }
  }
}

function findMatchingBelief(beliefs: Map<string, Belief>, claim: ExtractedClaim): Belief | undefined {
  for (const belief of beliefs.values()) {
    if (
      isLiveBelief(belief) &&
      belief.subject === claim.subject &&
      belief.polarity === claim.polarity &&
      (belief.value ?? '') === (claim.value ?? '')
    ) {
      return belief;
    }
  }
  return undefined;
}

function selfModelFor(skill: Skill, now: Date): SelfModelEntry {
  const history = skill.successRateHistory;
  const reliabilityScore = history.length > 0
    ? history.reduce((sum, rate) => sum + rate, 0) / history.length
    : skill.successRate;
  return {
    capability: skill.name,
    reliabilityScore,
    limitations: [...skill.failureModes],
    updatedAt: now,
  };
}

function union(a: number[], b: number[]): number[] {
  return [...new Set([...a, ...b])].sort((x, y) => x - y);
}
