import { ALL_ROWS } from './store.js';
import type { MemoryStore } from './store.js';
import type { RetrievalWeights } from '../config/index.js';
import { cosineSimilarity } from './embeddings.js';
import { combineSignals, lexicalOverlap, recencyScore } from './scoring.js';
import type { ScoreSignals } from './scoring.js';
import { MEMORY_ENTITY_TYPES } from './types.js';
import type {
  Belief,
  Episode,
  Goal,
  Hypothesis,
  MemoryEntityType,
  Skill,
} from './types.js';

export type MemoryItem =
  | { type: 'episode'; entity: Episode }
  | { type: 'belief'; entity: Belief }
  | { type: 'skill'; entity: Skill }
  | { type: 'goal'; entity: Goal }
  | { type: 'hypothesis'; entity: Hypothesis };

export interface EntityRef {
  type: MemoryEntityType;
  id: string;
}

export interface RetrievalResult {
  ref: EntityRef;
  score: number;
  signals: ScoreSignals;
  item: MemoryItem;
}

export interface MemoryQuery {
  text: string;
  vector?: Float32Array;
  activeGoalId?: string;
  types?: MemoryEntityType[];
  topK?: number;
  includeInactive?: boolean;  // Also rank retracted and archived beliefs
}

export interface RetrieverOptions {
  weights: RetrievalWeights;
  recencyHalfLifeDays: number;
  defaultTopK: number;
  maxEpisodeCandidates?: number;
  clock?: () => Date;
}

interface Candidate {
  item: MemoryItem;
  id: string;
  text: string;
  confidence: number;
  recencyAt: Date;      // Occurrence time for episodes, last update otherwise
  evidenceIds: number[];
}

interface GoalContext {
  goal: Goal;
  linkedEpisodeIds: Set<number>;
}

/**
 * Stateless hybrid ranker. Reads point-in-time snapshots from the store and
 * never writes, so it is safe to call alongside appends and consolidation.
 */
export class MemoryRetriever {
  constructor(
    private store: MemoryStore,
    private options: RetrieverOptions
  ) {}

  query(query: MemoryQuery): RetrievalResult[] {
    const types = query.types && query.types.length > 0 ? query.types : MEMORY_ENTITY_TYPES;
    const topK = query.topK ?? this.options.defaultTopK;
    const now = (this.options.clock ?? (() => this.store.now()))();
    const goalContext = this.loadGoalContext(query.activeGoalId);

    const results: RetrievalResult[] = [];

    for (const type of types) {
      const vectors = query.vector ? this.store.listEmbeddings(type) : undefined;

      for (const candidate of this.loadCandidates(type, query.includeInactive ?? false)) {
        const signals: ScoreSignals = {
          lexical: lexicalOverlap(query.text, candidate.text),
          recency: recencyScore(candidate.recencyAt, now, this.options.recencyHalfLifeDays),
          confidence: candidate.confidence,
        };

        const stored = vectors?.get(candidate.id);
        if (query.vector && stored && stored.length === query.vector.length) {
          signals.vector = Math.max(0, cosineSimilarity(query.vector, stored));
        }

        if (goalContext) {
          signals.goal = this.goalRelevance(candidate, goalContext);
        }

        results.push({
          ref: { type, id: candidate.id },
          score: combineSignals(signals, this.options.weights),
          signals,
          item: candidate.item,
        });
      }
    }

    return results.sort(compareResults).slice(0, topK);
  }

  private loadGoalContext(goalId: string | undefined): GoalContext | undefined {
    if (!goalId) return undefined;
    const goal = this.store.getGoal(goalId);
    if (!goal) return undefined;
    return { goal, linkedEpisodeIds: this.store.episodeIdsForGoal(goal.id) };
  }

  private goalRelevance(candidate: Candidate, ctx: GoalContext): number {
    const { item } = candidate;
    if (item.type === 'goal' && item.entity.id === ctx.goal.id) return 1;
    if (item.type === 'episode' && item.entity.goalId === ctx.goal.id) return 1;
    if (candidate.evidenceIds.some((id) => ctx.linkedEpisodeIds.has(id))) return 1;
    return lexicalOverlap(ctx.goal.description, candidate.text);
  }

  private loadCandidates(type: MemoryEntityType, includeInactive: boolean): Candidate[] {
    switch (type) {
      case 'episode':
        return this.store
          .listEpisodes({ includePruned: false, limit: this.options.maxEpisodeCandidates ?? 5000 })
          .flatMap((episode) => episode.payload
            ? [{
                item: { type: 'episode' as const, entity: episode },
                id: String(episode.id),
                text: episode.payload.skill
                  ? `${episode.payload.text} ${episode.payload.skill.name}`
                  : episode.payload.text,
                confidence: 1,
                recencyAt: episode.timestamp,
                evidenceIds: [episode.id],
              }]
            : []);

      case 'belief':
        return this.store
          .listBeliefs({ limit: ALL_ROWS })
          .filter((b) => includeInactive || (b.status !== 'retracted' && b.status !== 'archived'))
          .map((belief) => ({
            item: { type: 'belief' as const, entity: belief },
            id: belief.id,
            text: belief.statement,
            confidence: belief.confidence,
            recencyAt: belief.updatedAt,
            evidenceIds: belief.evidenceIds,
          }));

      case 'skill':
        return this.store.listSkills({ limit: ALL_ROWS }).map((skill) => ({
          item: { type: 'skill' as const, entity: skill },
          id: skill.id,
          text: [skill.name, ...skill.preconditions, ...skill.steps].join(' '),
          confidence: skill.successRate,
          recencyAt: skill.updatedAt,
          evidenceIds: skill.evidenceIds,
        }));

      case 'goal':
        return this.store.listGoals({ limit: ALL_ROWS }).map((goal) => ({
          item: { type: 'goal' as const, entity: goal },
          id: goal.id,
          text: goal.description,
          confidence: 1,
          recencyAt: goal.updatedAt,
          evidenceIds: [],
        }));

      case 'hypothesis':
        return this.store.listHypotheses({ limit: ALL_ROWS }).map((hypothesis) => ({
          item: { type: 'hypothesis' as const, entity: hypothesis },
          id: hypothesis.id,
          text: hypothesis.claim,
          confidence: hypothesis.confidence,
          recencyAt: hypothesis.updatedAt,
          evidenceIds: hypothesis.evidenceIds,
        }));
    }
  }
}

// Episodes age from when they happened; salience decay does not make them recent
function recencyOf(item: MemoryItem): number {
  return item.type === 'episode' ? item.entity.timestamp.getTime() : item.entity.updatedAt.getTime();
}

// Numeric ids (episodes) compare numerically, everything else lexically.
export function compareIds(a: string, b: string): number {
  if (/^\d+$/.test(a) && /^\d+$/.test(b)) {
    return Number(a) - Number(b);
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareResults(a: RetrievalResult, b: RetrievalResult): number {
  if (b.score !== a.score) return b.score - a.score;
  const recency = recencyOf(b.item) - recencyOf(a.item);
  if (recency !== 0) return recency;
  return compareIds(a.ref.id, b.ref.id);
}

export function describeItem(item: MemoryItem): string {
  switch (item.type) {
    case 'episode':
      return item.entity.payload?.text ?? `(pruned episode ${item.entity.id})`;
    case 'belief':
      return item.entity.statement;
    case 'skill':
      return item.entity.name;
    case 'goal':
      return item.entity.description;
    case 'hypothesis':
      return item.entity.claim;
  }
}

export function itemConfidence(item: MemoryItem): number | undefined {
  switch (item.type) {
    case 'belief':
    case 'hypothesis':
      return item.entity.confidence;
    case 'skill':
      return item.entity.successRate;
    default:
      return undefined;
  }
}
