import { createAdapter, parseModelString } from '../adapters/index.js';
import type { Config } from '../config/index.js';
import { getMemoryDbPath, loadConfig } from '../config/index.js';
import { Consolidator } from '../consolidation/consolidator.js';
import type { ConsolidationOutcome, ConsolidatorState } from '../consolidation/consolidator.js';
import { HeuristicExtractor, ModelExtractor } from '../consolidation/extraction.js';
import type { ExtractionProvider } from '../consolidation/extraction.js';
import { runForgetting } from '../consolidation/forgetting.js';
import type { ForgettingReport } from '../consolidation/forgetting.js';
import { createEmbeddingProvider } from '../memory/embeddings.js';
import type { EmbeddingProvider } from '../memory/embeddings.js';
import { ValidationError } from '../memory/errors.js';
import { MemoryRetriever } from '../memory/retriever.js';
import type { MemoryQuery, RetrievalResult } from '../memory/retriever.js';
import { MemoryStore } from '../memory/store.js';
import type {
  AppendEpisodeOptions,
  Belief,
  CreateGoalInput,
  EpisodeKind,
  EpisodePayload,
  EvidenceRecord,
  Goal,
  GoalStatus,
  Hypothesis,
  RegisterHypothesisInput,
  SelfModelEntry,
  Skill,
} from '../memory/types.js';
import { setLogLevel } from './logger.js';

export interface RuntimeOptions {
  extractor?: ExtractionProvider;
  embedder?: EmbeddingProvider;
  clock?: () => Date;
  onStateChange?: (from: ConsolidatorState, to: ConsolidatorState) => void;
}

export interface BeliefProvenance {
  belief: Belief;
  evidence: EvidenceRecord[];
  missing: number[];   // Cited ids with no episode row
}

export function createExtractor(config: Config): ExtractionProvider {
  switch (config.extraction.provider) {
    case 'heuristic':
      return new HeuristicExtractor();

    case 'ollama': {
      const { model } = parseModelString(config.extraction.model);
      return new ModelExtractor(createAdapter({
        provider: 'ollama',
        config: { baseUrl: config.extraction.ollamaUrl, model },
      }));
    }

    default:
      throw new Error(`Unknown extraction provider: ${(config.extraction as { provider: string }).provider}`);
  }
}

/**
 * Single entry point for a control loop: episodic writes, retrieval,
 * goal and hypothesis bookkeeping, and consolidation over one store.
 */
export class MemoryRuntime {
  readonly retriever: MemoryRetriever;
  readonly consolidator: Consolidator;
  private readonly embedder: EmbeddingProvider;

  constructor(
    readonly store: MemoryStore,
    readonly config: Config,
    options: RuntimeOptions = {}
  ) {
    this.embedder = options.embedder ?? createEmbeddingProvider(config.embeddings);
    this.retriever = new MemoryRetriever(store, {
      weights: config.retrieval.weights,
      recencyHalfLifeDays: config.retrieval.recencyHalfLifeDays,
      defaultTopK: config.retrieval.defaultTopK,
      clock: options.clock,
    });
    this.consolidator = new Consolidator(store, {
      consolidation: config.consolidation,
      forgetting: config.forgetting,
      extractor: options.extractor ?? createExtractor(config),
      embedder: this.embedder,
      clock: options.clock,
      onStateChange: options.onStateChange,
    });
  }

  appendEpisode(kind: EpisodeKind, payload: EpisodePayload, options: AppendEpisodeOptions = {}): number {
    return this.store.appendEpisode(kind, payload, options);
  }

  async queryMemory(query: MemoryQuery): Promise<RetrievalResult[]> {
    if (query.vector || !query.text.trim()) {
      return this.retriever.query(query);
    }
    const embedded = await this.embedder.embed(query.text);
    return this.retriever.query(
      embedded.status === 'ok' ? { ...query, vector: embedded.vector } : query
    );
  }

  getBelief(id: string): Belief | null {
    return this.store.getBelief(id);
  }

  listBeliefs(options?: Parameters<MemoryStore['listBeliefs']>[0]): Belief[] {
    return this.store.listBeliefs(options);
  }

  getSkill(id: string): Skill | null {
    return this.store.getSkill(id) ?? this.store.getSkillByName(id);
  }

  listSkills(): Skill[] {
    return this.store.listSkills();
  }

  getGoal(id: string): Goal | null {
    return this.store.getGoal(id);
  }

  listGoals(status?: GoalStatus): Goal[] {
    return this.store.listGoals({ status });
  }

  createGoal(input: CreateGoalInput): string {
    return this.store.createGoal(input);
  }

  updateGoalProgress(id: string, progress: number, status?: GoalStatus): Goal {
    return this.store.updateGoalProgress(id, progress, status);
  }

  getSelfModel(capability: string): SelfModelEntry | null {
    return this.store.getSelfModel(capability);
  }

  listSelfModel(): SelfModelEntry[] {
    return this.store.listSelfModel();
  }

  getHypothesis(id: string): Hypothesis | null {
    return this.store.getHypothesis(id);
  }

  listHypotheses(): Hypothesis[] {
    return this.store.listHypotheses();
  }

  registerHypothesis(input: RegisterHypothesisInput): string {
    return this.store.registerHypothesis(input);
  }

  resolveHypothesis(id: string, outcome: 'verified' | 'rejected', confidence?: number): Hypothesis {
    return this.store.resolveHypothesis(id, outcome, confidence);
  }

  consolidate(): Promise<ConsolidationOutcome> {
    return this.consolidator.consolidate();
  }

  forget(): ForgettingReport {
    return runForgetting(this.store, this.config.forgetting);
  }

  /**
   * Evidence behind a belief. Pruned episodes still report their hash and
   * timestamp.
   */
  provenance(beliefId: string): BeliefProvenance {
    const belief = this.store.getBelief(beliefId);
    if (!belief) {
      throw new ValidationError(`Unknown belief: ${beliefId}`);
    }

    const evidence: EvidenceRecord[] = [];
    const missing: number[] = [];
    for (const id of belief.evidenceIds) {
      const record = this.store.getEvidence(id);
      if (record) {
        evidence.push(record);
      } else {
        missing.push(id);
      }
    }
    return { belief, evidence, missing };
  }

  close(): void {
    this.store.close();
  }
}

export function openRuntime(projectRoot?: string, options: RuntimeOptions = {}): MemoryRuntime {
  const config = loadConfig(projectRoot);
  setLogLevel(config.logging.level);
  const store = new MemoryStore(getMemoryDbPath(projectRoot, config), {
    clock: options.clock,
    defaultSalience: config.forgetting.defaultSalience,
  });
  return new MemoryRuntime(store, config, options);
}
