import { nanoid } from 'nanoid';
import type { ConsolidationConfig, ForgettingConfig } from '../config/index.js';
import { createLogger } from '../core/logger.js';
import { ConsolidationAbortedError, MemoryError, WatermarkMovedError } from '../memory/errors.js';
import { NoEmbeddings } from '../memory/embeddings.js';
import type { EmbeddingProvider } from '../memory/embeddings.js';
import { ALL_ROWS } from '../memory/store.js';
import type { MemoryStore } from '../memory/store.js';
import type {
  Belief,
  ConsolidationBatch,
  ConsolidationReport,
  StoredEmbedding,
} from '../memory/types.js';
import { ContradictionResolver } from './contradiction-resolver.js';
import { HeuristicExtractor } from './extraction.js';
import type { ExtractionProvider } from './extraction.js';
import { collectCitedEpisodeIds, planForgetting } from './forgetting.js';
import { ReplayMiner } from './replay-miner.js';
import type { ReplayResult } from './replay-miner.js';

const log = createLogger('consolidator');

export type ConsolidatorState = 'idle' | 'running' | 'committing' | 'aborted';

export type ConsolidationOutcome =
  | { status: 'committed'; report: ConsolidationReport }
  | { status: 'rejected'; reason: 'concurrent-run' };

export interface ConsolidatorOptions {
  consolidation: ConsolidationConfig;
  forgetting: ForgettingConfig;
  extractor?: ExtractionProvider;
  embedder?: EmbeddingProvider;
  clock?: () => Date;
  onStateChange?: (from: ConsolidatorState, to: ConsolidatorState) => void;
}

const TRANSITIONS: Record<ConsolidatorState, readonly ConsolidatorState[]> = {
  idle: ['running'],
  running: ['committing', 'aborted'],
  committing: ['idle', 'aborted'],
  aborted: ['idle'],
};

/**
 * Turns the episodes above the watermark into belief, skill and retention
 * changes, committed as one batch. At most one run is in flight; a second
 * call while one is active resolves to a rejection without doing anything,
 * as does a run whose commit loses the race to another store on the same file.
 */
export class Consolidator {
  private _state: ConsolidatorState = 'idle';
  private readonly miner: ReplayMiner;
  private readonly resolver: ContradictionResolver;
  private readonly embedder: EmbeddingProvider;
  private readonly clock: () => Date;

  constructor(
    private store: MemoryStore,
    private options: ConsolidatorOptions
  ) {
    this.clock = options.clock ?? (() => store.now());
    this.embedder = options.embedder ?? new NoEmbeddings();
    this.miner = new ReplayMiner(
      store,
      options.extractor ?? new HeuristicExtractor(),
      options.consolidation,
      this.clock
    );
    this.resolver = new ContradictionResolver(options.consolidation);
  }

  get state(): ConsolidatorState {
    return this._state;
  }

  async consolidate(): Promise<ConsolidationOutcome> {
    // Checked and claimed before the first await, so a concurrent caller sees 'running'
    if (this._state !== 'idle') {
      log.debug(`rejected: a run is already ${this._state}`);
      return { status: 'rejected', reason: 'concurrent-run' };
    }
    this.transition('running');

    const startedAt = this.clock();
    try {
      const priorWatermark = this.store.getWatermark().value;
      const snapshot = this.store.highestEpisodeId();
      const report = await this.run(priorWatermark, snapshot, startedAt);
      log.info(
        `run ${report.runId}: ${report.episodesProcessed} episodes, watermark ${report.priorWatermark} -> ${report.watermark}, ` +
        `${report.beliefsCreated} created, ${report.beliefsUpdated} updated, ${report.beliefsDisputed} disputed, ` +
        `${report.episodesPruned} pruned`
      );
      return { status: 'committed', report };
    } catch (error) {
      // Another store on the same database committed first; nothing was written here
      if (error instanceof WatermarkMovedError) {
        log.debug(`rejected at commit: ${error.message}`);
        return { status: 'rejected', reason: 'concurrent-run' };
      }
      this.transition('aborted');
      const aborted = error instanceof ConsolidationAbortedError
        ? error
        : new ConsolidationAbortedError(describeFailure(error), error);
      log.error(aborted.message);
      throw aborted;
    } finally {
      this.transition('idle');
    }
  }

  private async run(priorWatermark: number, snapshot: number, startedAt: Date): Promise<ConsolidationReport> {
    const replay = await this.miner.mine(priorWatermark, snapshot);
    const now = this.clock();
    const original = replay.previous;

    // Beliefs only move when there is something new to learn from
    const hasNewEvidence = replay.touched.size > 0 || replay.window.episodes.length > 0;
    const resolution = hasNewEvidence
      ? this.resolver.resolve(replay.beliefs, replay.touched, now)
      : undefined;

    const upsertIds = new Set([...replay.touched, ...(resolution?.changed ?? [])]);
    const beliefUpserts = [...upsertIds]
      .map((id) => replay.beliefs.get(id))
      .filter((b): b is Belief => b !== undefined);

    const embeddings = await this.embed(replay, beliefUpserts);

    const cited = collectCitedEpisodeIds(
      replay.beliefs.values(),
      [...this.store.listSkills({ limit: ALL_ROWS }), ...replay.skills.values()]
    );
    const forgetting = planForgetting(this.store, cited, replay.window.watermark, now, this.options.forgetting);

    const report: ConsolidationReport = {
      runId: nanoid(),
      priorWatermark,
      watermark: replay.window.watermark,
      episodesProcessed: replay.window.episodes.length,
      beliefsCreated: replay.created.size,
      beliefsUpdated: beliefUpserts.filter((b) => original.has(b.id)).length,
      beliefsDisputed: countEntering(beliefUpserts, original, 'disputed'),
      beliefsRetracted: countEntering(beliefUpserts, original, 'retracted'),
      beliefsArchived: countEntering(beliefUpserts, original, 'archived'),
      skillsUpdated: replay.skills.size,
      hypothesesPromoted: replay.promotions.length,
      episodesPruned: forgetting.prunes.length,
      startedAt,
      finishedAt: this.clock(),
    };

    const batch: ConsolidationBatch = {
      priorWatermark,
      watermark: replay.window.watermark,
      beliefUpserts,
      skillUpserts: [...replay.skills.values()],
      selfModelUpserts: replay.selfModel,
      hypothesisPromotions: replay.promotions,
      salienceUpdates: forgetting.salienceUpdates,
      prunes: forgetting.prunes,
      embeddings,
      report,
    };

    this.transition('committing');
    this.store.applyConsolidationBatch(batch);
    return report;
  }

  // Vectors for new or restated beliefs and for freshly replayed episodes
  private async embed(replay: ReplayResult, beliefs: Belief[]): Promise<StoredEmbedding[]> {
    const embeddings: StoredEmbedding[] = [];
    const targets: Array<{ entityType: StoredEmbedding['entityType']; entityId: string; text: string }> = [
      ...beliefs
        .filter((b) => replay.touched.has(b.id))
        .map((b) => ({ entityType: 'belief' as const, entityId: b.id, text: b.statement })),
      ...replay.window.episodes.flatMap((e) =>
        e.payload ? [{ entityType: 'episode' as const, entityId: String(e.id), text: e.payload.text }] : []
      ),
    ];

    for (const target of targets) {
      const result = await this.embedder.embed(target.text);
      if (result.status === 'unavailable') {
        log.debug(`embeddings skipped: ${result.reason}`);
        break;
      }
      embeddings.push({ entityType: target.entityType, entityId: target.entityId, vector: result.vector });
    }
    return embeddings;
  }

  private transition(to: ConsolidatorState): void {
    const from = this._state;
    if (from === to) return;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid consolidator transition ${from} -> ${to}`);
    }
    this._state = to;
    log.debug(`${from} -> ${to}`);
    this.options.onStateChange?.(from, to);
  }
}

function countEntering(upserts: Belief[], original: Map<string, Belief>, status: Belief['status']): number {
  return upserts.filter((b) => b.status === status && original.get(b.id)?.status !== status).length;
}

function describeFailure(error: unknown): string {
  if (error instanceof MemoryError) return `${error.code}: ${error.message}`;
  return error instanceof Error ? error.message : String(error);
}
