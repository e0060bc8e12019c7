import * as fs from 'fs';
import Database from 'better-sqlite3';
import { nanoid } from 'nanoid';
import { StorageUnavailableError, ValidationError, WatermarkMovedError, isStorageFault } from './errors.js';
import { episodeContentHash } from './provenance.js';
import {
  AppendEpisodeOptionsSchema,
  BeliefSchema,
  CreateGoalSchema,
  EpisodeKindSchema,
  EpisodePayloadSchema,
  GoalProgressSchema,
  RegisterHypothesisSchema,
  SelfModelEntrySchema,
  SkillSchema,
  validate,
} from './validation.js';
import { TERMINAL_GOAL_STATUSES } from './types.js';
import type {
  AppendEpisodeOptions,
  Belief,
  BeliefPolarity,
  BeliefStatus,
  ConsolidationBatch,
  ConsolidationCommit,
  ConsolidationReport,
  CreateGoalInput,
  Episode,
  EpisodeKind,
  EpisodePayload,
  EvidenceRecord,
  Goal,
  GoalStatus,
  Hypothesis,
  HypothesisStatus,
  MemoryEntityType,
  MemoryStats,
  RegisterHypothesisInput,
  SelfModelEntry,
  Skill,
  StoredEmbedding,
  Watermark,
} from './types.js';

export const DEFAULT_SALIENCE = 1.0;

// SQLite reads a negative LIMIT as "no limit"
export const ALL_ROWS = -1;

export interface MemoryStoreOptions {
  clock?: () => Date;
  defaultSalience?: number;
}

export interface ListEpisodesOptions {
  afterId?: number;
  upToId?: number;
  limit?: number;
  order?: 'asc' | 'desc';
  includePruned?: boolean;
}

export class MemoryStore {
  private db: Database.Database;
  private readonly clock: () => Date;
  private readonly defaultSalience: number;

  constructor(dbPath: string, options: MemoryStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.defaultSalience = options.defaultSalience ?? DEFAULT_SALIENCE;

    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.runMigrations();
    } catch (error) {
      throw new StorageUnavailableError('open', error);
    }

    // Restrict database file permissions (owner read/write only)
    if (dbPath !== ':memory:') {
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch {
        // May fail on some filesystems - not critical
      }
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      );
    `);

    const appliedMigrations = new Set(
      this.db.prepare('SELECT name FROM migrations').all()
        .map((row) => (row as { name: string }).name)
    );

    // Migration 001: one relation per memory type plus the watermark row
    if (!appliedMigrations.has('001_initial')) {
      this.db.exec(`
        -- Append-only episodic log; AUTOINCREMENT keeps ids monotonic and never reused
        CREATE TABLE episodes (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          kind TEXT NOT NULL CHECK (kind IN ('action', 'observation', 'perception', 'system')),
          payload TEXT,
          salience REAL NOT NULL CHECK (salience >= 0),
          initial_salience REAL NOT NULL,
          content_hash TEXT NOT NULL,
          goal_id TEXT,
          timestamp TEXT NOT NULL,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          pruned_at TEXT
        );

        CREATE TABLE beliefs (
          id TEXT PRIMARY KEY,
          statement TEXT NOT NULL,
          subject TEXT NOT NULL,
          polarity TEXT NOT NULL CHECK (polarity IN ('positive', 'negative')),
          value TEXT,
          confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
          status TEXT NOT NULL CHECK (status IN (
            'proposed', 'confirmed', 'disputed', 'retracted', 'archived'
          )),
          verified INTEGER NOT NULL DEFAULT 0,
          evidence_ids TEXT NOT NULL DEFAULT '[]',
          conflicts_with_ids TEXT NOT NULL DEFAULT '[]',
          last_confirmed_at TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE skills (
          id TEXT PRIMARY KEY,
          name TEXT NOT NULL UNIQUE,
          preconditions TEXT NOT NULL DEFAULT '[]',
          steps TEXT NOT NULL DEFAULT '[]',
          failure_modes TEXT NOT NULL DEFAULT '[]',
          success_rate REAL NOT NULL DEFAULT 0,
          attempts INTEGER NOT NULL DEFAULT 0,
          successes INTEGER NOT NULL DEFAULT 0,
          success_rate_history TEXT NOT NULL DEFAULT '[]',
          evidence_ids TEXT NOT NULL DEFAULT '[]',
          last_used TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE goals (
          id TEXT PRIMARY KEY,
          description TEXT NOT NULL,
          status TEXT NOT NULL CHECK (status IN ('active', 'blocked', 'completed', 'abandoned')),
          priority INTEGER NOT NULL DEFAULT 5,
          progress REAL NOT NULL DEFAULT 0,
          deadline TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE self_model (
          capability TEXT PRIMARY KEY,
          reliability_score REAL NOT NULL,
          limitations TEXT NOT NULL DEFAULT '[]',
          updated_at TEXT NOT NULL
        );

        CREATE TABLE hypotheses (
          id TEXT PRIMARY KEY,
          claim TEXT NOT NULL,
          verification_plan TEXT NOT NULL,
          confidence REAL NOT NULL,
          status TEXT NOT NULL CHECK (status IN ('open', 'verified', 'rejected')),
          evidence_ids TEXT NOT NULL DEFAULT '[]',
          risk_if_wrong TEXT NOT NULL DEFAULT 'unknown',
          promoted_belief_id TEXT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );

        CREATE TABLE watermark (
          id INTEGER PRIMARY KEY CHECK (id = 1),
          value INTEGER NOT NULL,
          updated_at TEXT
        );
        INSERT INTO watermark (id, value) VALUES (1, 0);

        CREATE TABLE embeddings (
          entity_type TEXT NOT NULL,
          entity_id TEXT NOT NULL,
          dims INTEGER NOT NULL,
          vector BLOB NOT NULL,
          PRIMARY KEY (entity_type, entity_id)
        );

        CREATE TABLE consolidation_runs (
          id TEXT PRIMARY KEY,
          prior_watermark INTEGER NOT NULL,
          watermark INTEGER NOT NULL,
          report TEXT NOT NULL,
          finished_at TEXT NOT NULL
        );

        -- Indexes
        CREATE INDEX idx_episode_timestamp ON episodes(timestamp);
        CREATE INDEX idx_episode_goal ON episodes(goal_id);
        CREATE INDEX idx_belief_subject ON beliefs(subject);
        CREATE INDEX idx_belief_status ON beliefs(status);
        CREATE INDEX idx_goal_status ON goals(status);
        CREATE INDEX idx_run_finished ON consolidation_runs(finished_at);
      `);

      this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_initial');
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  now(): Date {
    return this.clock();
  }

  transaction<T>(fn: () => T): T {
    return this.guard('transaction', () => this.db.transaction(fn)());
  }

  // Translates medium failures into StorageUnavailableError; everything else propagates.
  private guard<T>(operation: string, fn: () => T): T {
    if (!this.db.open) {
      throw new StorageUnavailableError(operation, new Error('The database connection is not open'));
    }
    try {
      return fn();
    } catch (error) {
      if (isStorageFault(error)) {
        throw new StorageUnavailableError(operation, error);
      }
      throw error;
    }
  }

  // --- Episodes -----------------------------------------------------------

  appendEpisode(kind: EpisodeKind, payload: EpisodePayload, options: AppendEpisodeOptions = {}): number {
    const validKind = validate(EpisodeKindSchema, kind, 'episode kind');
    const validPayload = validate(EpisodePayloadSchema, payload, 'episode payload');
    const opts = validate(AppendEpisodeOptionsSchema, options, 'episode options');

    return this.guard('appendEpisode', () => {
      if (opts.goalId && !this.getGoal(opts.goalId)) {
        throw new ValidationError(`Unknown goal: ${opts.goalId}`);
      }

      const now = this.clock().toISOString();
      const salience = opts.salience ?? this.defaultSalience;
      const result = this.db.prepare(`
        INSERT INTO episodes (
          kind, payload, salience, initial_salience, content_hash, goal_id,
          timestamp, created_at, updated_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        validKind,
        JSON.stringify(validPayload),
        salience,
        salience,
        episodeContentHash(validKind, validPayload),
        opts.goalId ?? null,
        opts.timestamp?.toISOString() ?? now,
        now,
        now
      );

      return Number(result.lastInsertRowid);
    });
  }

  getEpisode(id: number): Episode | null {
    return this.guard('getEpisode', () => {
      const row = this.db.prepare('SELECT * FROM episodes WHERE id = ?').get(id) as EpisodeRow | undefined;
      return row ? rowToEpisode(row) : null;
    });
  }

  listEpisodes(options: ListEpisodesOptions = {}): Episode[] {
    const { afterId = 0, upToId, limit = 50, order = 'desc', includePruned = true } = options;

    return this.guard('listEpisodes', () => {
      let sql = 'SELECT * FROM episodes WHERE id > ?';
      const params: number[] = [afterId];

      if (upToId !== undefined) {
        sql += ' AND id <= ?';
        params.push(upToId);
      }
      if (!includePruned) {
        sql += ' AND pruned_at IS NULL';
      }

      sql += ` ORDER BY id ${order === 'asc' ? 'ASC' : 'DESC'} LIMIT ?`;
      params.push(limit);

      const rows = this.db.prepare(sql).all(...params) as EpisodeRow[];
      return rows.map(rowToEpisode);
    });
  }

  getEpisodesByIds(ids: number[]): Episode[] {
    if (ids.length === 0) return [];
    return this.guard('getEpisodesByIds', () => {
      const placeholders = ids.map(() => '?').join(',');
      const rows = this.db.prepare(`
        SELECT * FROM episodes WHERE id IN (${placeholders}) ORDER BY id ASC
      `).all(...ids) as EpisodeRow[];
      return rows.map(rowToEpisode);
    });
  }

  episodeIdsForGoal(goalId: string): Set<number> {
    return this.guard('episodeIdsForGoal', () => {
      const rows = this.db.prepare('SELECT id FROM episodes WHERE goal_id = ?').all(goalId) as Array<{ id: number }>;
      return new Set(rows.map((row) => row.id));
    });
  }

  highestEpisodeId(): number {
    return this.guard('highestEpisodeId', () => {
      const row = this.db.prepare('SELECT MAX(id) AS max_id FROM episodes').get() as { max_id: number | null };
      return row.max_id ?? 0;
    });
  }

  // Hash and timestamp outlive the payload, so provenance survives pruning.
  getEvidence(episodeId: number): EvidenceRecord | null {
    return this.guard('getEvidence', () => {
      const row = this.db.prepare(`
        SELECT id, content_hash, timestamp, pruned_at FROM episodes WHERE id = ?
      `).get(episodeId) as Pick<EpisodeRow, 'id' | 'content_hash' | 'timestamp' | 'pruned_at'> | undefined;

      if (!row) return null;
      return {
        episodeId: row.id,
        contentHash: row.content_hash,
        timestamp: new Date(row.timestamp),
        pruned: row.pruned_at !== null,
      };
    });
  }

  // --- Beliefs ------------------------------------------------------------

  getBelief(id: string): Belief | null {
    return this.guard('getBelief', () => {
      const row = this.db.prepare('SELECT * FROM beliefs WHERE id = ?').get(id) as BeliefRow | undefined;
      return row ? rowToBelief(row) : null;
    });
  }

  listBeliefs(options: { status?: BeliefStatus | BeliefStatus[]; limit?: number } = {}): Belief[] {
    const { status, limit = 1000 } = options;

    return this.guard('listBeliefs', () => {
      let sql = 'SELECT * FROM beliefs';
      const params: (string | number)[] = [];

      const statuses = status === undefined ? [] : Array.isArray(status) ? status : [status];
      if (statuses.length > 0) {
        sql += ` WHERE status IN (${statuses.map(() => '?').join(',')})`;
        params.push(...statuses);
      }

      sql += ' ORDER BY updated_at DESC, id ASC LIMIT ?';
      params.push(limit);

      const rows = this.db.prepare(sql).all(...params) as BeliefRow[];
      return rows.map(rowToBelief);
    });
  }

  // --- Skills and self-model ---------------------------------------------

  getSkill(id: string): Skill | null {
    return this.guard('getSkill', () => {
      const row = this.db.prepare('SELECT * FROM skills WHERE id = ?').get(id) as SkillRow | undefined;
      return row ? rowToSkill(row) : null;
    });
  }

  getSkillByName(name: string): Skill | null {
    return this.guard('getSkillByName', () => {
      const row = this.db.prepare('SELECT * FROM skills WHERE name = ?').get(name) as SkillRow | undefined;
      return row ? rowToSkill(row) : null;
    });
  }

  listSkills(options: { limit?: number } = {}): Skill[] {
    return this.guard('listSkills', () => {
      const rows = this.db.prepare(`
        SELECT * FROM skills ORDER BY name ASC LIMIT ?
      `).all(options.limit ?? 1000) as SkillRow[];
      return rows.map(rowToSkill);
    });
  }

  getSelfModel(capability: string): SelfModelEntry | null {
    return this.guard('getSelfModel', () => {
      const row = this.db.prepare('SELECT * FROM self_model WHERE capability = ?').get(capability) as SelfModelRow | undefined;
      return row ? rowToSelfModel(row) : null;
    });
  }

  listSelfModel(): SelfModelEntry[] {
    return this.guard('listSelfModel', () => {
      const rows = this.db.prepare('SELECT * FROM self_model ORDER BY capability ASC').all() as SelfModelRow[];
      return rows.map(rowToSelfModel);
    });
  }

  // --- Goals --------------------------------------------------------------

  createGoal(input: CreateGoalInput): string {
    const valid = validate(CreateGoalSchema, input, 'goal');

    return this.guard('createGoal', () => {
      const id = nanoid();
      const now = this.clock().toISOString();
      this.db.prepare(`
        INSERT INTO goals (id, description, status, priority, progress, deadline, created_at, updated_at)
        VALUES (?, ?, ?, ?, 0, ?, ?, ?)
      `).run(
        id,
        valid.description,
        valid.status ?? 'active',
        valid.priority ?? 5,
        valid.deadline?.toISOString() ?? null,
        now,
        now
      );
      return id;
    });
  }

  getGoal(id: string): Goal | null {
    return this.guard('getGoal', () => {
      const row = this.db.prepare('SELECT * FROM goals WHERE id = ?').get(id) as GoalRow | undefined;
      return row ? rowToGoal(row) : null;
    });
  }

  listGoals(options: { status?: GoalStatus; limit?: number } = {}): Goal[] {
    const { status, limit = 100 } = options;

    return this.guard('listGoals', () => {
      const rows = status
        ? this.db.prepare(`
            SELECT * FROM goals WHERE status = ? ORDER BY priority DESC, created_at ASC LIMIT ?
          `).all(status, limit) as GoalRow[]
        : this.db.prepare(`
            SELECT * FROM goals ORDER BY priority DESC, created_at ASC LIMIT ?
          `).all(limit) as GoalRow[];
      return rows.map(rowToGoal);
    });
  }

  updateGoalProgress(id: string, progress: number, status?: GoalStatus): Goal {
    const valid = validate(GoalProgressSchema, { progress, status }, 'goal progress');

    return this.guard('updateGoalProgress', () => {
      const goal = this.getGoal(id);
      if (!goal) {
        throw new ValidationError(`Unknown goal: ${id}`);
      }
      if (TERMINAL_GOAL_STATUSES.includes(goal.status)) {
        throw new ValidationError(`Goal ${id} is ${goal.status}; no further updates accepted`);
      }

      const nextStatus = valid.status ?? goal.status;
      this.db.prepare(`
        UPDATE goals SET progress = ?, status = ?, updated_at = ? WHERE id = ?
      `).run(valid.progress, nextStatus, this.clock().toISOString(), id);

      return { ...goal, progress: valid.progress, status: nextStatus, updatedAt: this.clock() };
    });
  }

  setGoalStatus(id: string, status: GoalStatus): Goal {
    const goal = this.getGoal(id);
    if (!goal) {
      throw new ValidationError(`Unknown goal: ${id}`);
    }
    const progress = status === 'completed' ? 1 : goal.progress;
    return this.updateGoalProgress(id, progress, status);
  }

  // --- Hypotheses ---------------------------------------------------------

  registerHypothesis(input: RegisterHypothesisInput): string {
    const valid = validate(RegisterHypothesisSchema, input, 'hypothesis');

    return this.guard('registerHypothesis', () => {
      const id = nanoid();
      const now = this.clock().toISOString();
      this.db.prepare(`
        INSERT INTO hypotheses (
          id, claim, verification_plan, confidence, status, evidence_ids, risk_if_wrong,
          created_at, updated_at
        )
        VALUES (?, ?, ?, ?, 'open', ?, ?, ?, ?)
      `).run(
        id,
        valid.claim,
        valid.verificationPlan,
        valid.confidence ?? 0.5,
        JSON.stringify(uniqueSorted(valid.evidenceIds ?? [])),
        valid.riskIfWrong ?? 'unknown',
        now,
        now
      );
      return id;
    });
  }

  resolveHypothesis(id: string, outcome: Exclude<HypothesisStatus, 'open'>, confidence?: number): Hypothesis {
    if (outcome !== 'verified' && outcome !== 'rejected') {
      throw new ValidationError(`Invalid hypothesis outcome: ${String(outcome)}`);
    }
    if (confidence !== undefined && (!Number.isFinite(confidence) || confidence < 0 || confidence > 1)) {
      throw new ValidationError('Invalid hypothesis confidence', [`confidence must be within [0, 1], got ${confidence}`]);
    }

    return this.guard('resolveHypothesis', () => {
      const hypothesis = this.getHypothesis(id);
      if (!hypothesis) {
        throw new ValidationError(`Unknown hypothesis: ${id}`);
      }
      if (hypothesis.status !== 'open') {
        throw new ValidationError(`Hypothesis ${id} is already ${hypothesis.status}`);
      }

      const now = this.clock();
      const nextConfidence = confidence ?? hypothesis.confidence;
      this.db.prepare(`
        UPDATE hypotheses SET status = ?, confidence = ?, updated_at = ? WHERE id = ?
      `).run(outcome, nextConfidence, now.toISOString(), id);

      return { ...hypothesis, status: outcome, confidence: nextConfidence, updatedAt: now };
    });
  }

  getHypothesis(id: string): Hypothesis | null {
    return this.guard('getHypothesis', () => {
      const row = this.db.prepare('SELECT * FROM hypotheses WHERE id = ?').get(id) as HypothesisRow | undefined;
      return row ? rowToHypothesis(row) : null;
    });
  }

  listHypotheses(options: { status?: HypothesisStatus; limit?: number } = {}): Hypothesis[] {
    const { status, limit = 100 } = options;

    return this.guard('listHypotheses', () => {
      const rows = status
        ? this.db.prepare(`
            SELECT * FROM hypotheses WHERE status = ? ORDER BY created_at ASC, id ASC LIMIT ?
          `).all(status, limit) as HypothesisRow[]
        : this.db.prepare(`
            SELECT * FROM hypotheses ORDER BY created_at ASC, id ASC LIMIT ?
          `).all(limit) as HypothesisRow[];
      return rows.map(rowToHypothesis);
    });
  }

  // --- Watermark, embeddings, runs ---------------------------------------

  getWatermark(): Watermark {
    return this.guard('getWatermark', () => {
      const row = this.db.prepare('SELECT value, updated_at FROM watermark WHERE id = 1').get() as {
        value: number;
        updated_at: string | null;
      };
      return {
        value: row.value,
        updatedAt: row.updated_at ? new Date(row.updated_at) : undefined,
      };
    });
  }

  getEmbedding(entityType: MemoryEntityType, entityId: string): Float32Array | null {
    return this.guard('getEmbedding', () => {
      const row = this.db.prepare(`
        SELECT dims, vector FROM embeddings WHERE entity_type = ? AND entity_id = ?
      `).get(entityType, entityId) as { dims: number; vector: Buffer } | undefined;
      return row ? bufferToVector(row.vector, row.dims) : null;
    });
  }

  listEmbeddings(entityType: MemoryEntityType): Map<string, Float32Array> {
    return this.guard('listEmbeddings', () => {
      const rows = this.db.prepare(`
        SELECT entity_id, dims, vector FROM embeddings WHERE entity_type = ?
      `).all(entityType) as Array<{ entity_id: string; dims: number; vector: Buffer }>;

      const result = new Map<string, Float32Array>();
      for (const row of rows) {
        const vector = bufferToVector(row.vector, row.dims);
        if (vector) result.set(row.entity_id, vector);
      }
      return result;
    });
  }

  listConsolidationRuns(limit: number = 20): ConsolidationReport[] {
    return this.guard('listConsolidationRuns', () => {
      const rows = this.db.prepare(`
        SELECT report FROM consolidation_runs ORDER BY finished_at DESC, rowid DESC LIMIT ?
      `).all(limit) as Array<{ report: string }>;
      return rows.map((row) => parseReport(row.report));
    });
  }

  /**
   * Apply one consolidation batch atomically. Either every upsert, prune and
   * salience update lands and the watermark advances, or nothing changes.
   */
  applyConsolidationBatch(batch: ConsolidationBatch): ConsolidationCommit {
    for (const belief of batch.beliefUpserts) {
      validate(BeliefSchema, belief, `belief ${belief.id}`);
    }
    for (const skill of batch.skillUpserts) {
      validate(SkillSchema, skill, `skill ${skill.name}`);
    }
    for (const entry of batch.selfModelUpserts) {
      validate(SelfModelEntrySchema, entry, `self-model entry ${entry.capability}`);
    }

    return this.transaction(() => {
      const current = this.getWatermark().value;
      if (current !== batch.priorWatermark) {
        throw new WatermarkMovedError(batch.priorWatermark, current);
      }
      if (batch.watermark < batch.priorWatermark || batch.watermark > this.highestEpisodeId()) {
        throw new ValidationError(`Invalid watermark ${batch.watermark} (prior ${batch.priorWatermark})`);
      }

      const upsertBelief = this.db.prepare(`
        INSERT INTO beliefs (
          id, statement, subject, polarity, value, confidence, status, verified,
          evidence_ids, conflicts_with_ids, last_confirmed_at, created_at, updated_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          statement = excluded.statement,
          subject = excluded.subject,
          polarity = excluded.polarity,
          value = excluded.value,
          confidence = excluded.confidence,
          status = excluded.status,
          verified = excluded.verified,
          evidence_ids = excluded.evidence_ids,
          conflicts_with_ids = excluded.conflicts_with_ids,
          last_confirmed_at = excluded.last_confirmed_at,
          updated_at = excluded.updated_at
      `);
      for (const b of batch.beliefUpserts) {
        upsertBelief.run(
          b.id,
          b.statement,
          b.subject,
          b.polarity,
          b.value ?? null,
          b.confidence,
          b.status,
          b.verified ? 1 : 0,
          JSON.stringify(uniqueSorted(b.evidenceIds)),
          JSON.stringify([...new Set(b.conflictsWithIds)].sort()),
          b.lastConfirmedAt?.toISOString() ?? null,
          b.createdAt.toISOString(),
          b.updatedAt.toISOString()
        );
      }
      this.assertConflictSymmetry(batch.beliefUpserts);

      const upsertSkill = this.db.prepare(`
        INSERT INTO skills (
          id, name, preconditions, steps, failure_modes, success_rate, attempts, successes,
          success_rate_history, evidence_ids, last_used, created_at, updated_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          name = excluded.name,
          preconditions = excluded.preconditions,
          steps = excluded.steps,
          failure_modes = excluded.failure_modes,
          success_rate = excluded.success_rate,
          attempts = excluded.attempts,
          successes = excluded.successes,
          success_rate_history = excluded.success_rate_history,
          evidence_ids = excluded.evidence_ids,
          last_used = excluded.last_used,
          updated_at = excluded.updated_at
      `);
      for (const s of batch.skillUpserts) {
        upsertSkill.run(
          s.id,
          s.name,
          JSON.stringify(s.preconditions),
          JSON.stringify(s.steps),
          JSON.stringify(s.failureModes),
          s.successRate,
          s.attempts,
          s.successes,
          JSON.stringify(s.successRateHistory),
          JSON.stringify(uniqueSorted(s.evidenceIds)),
          s.lastUsed?.toISOString() ?? null,
          s.createdAt.toISOString(),
          s.updatedAt.toISOString()
        );
      }

      const upsertSelfModel = this.db.prepare(`
        INSERT INTO self_model (capability, reliability_score, limitations, updated_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(capability) DO UPDATE SET
          reliability_score = excluded.reliability_score,
          limitations = excluded.limitations,
          updated_at = excluded.updated_at
      `);
      for (const entry of batch.selfModelUpserts) {
        upsertSelfModel.run(
          entry.capability,
          entry.reliabilityScore,
          JSON.stringify(entry.limitations),
          entry.updatedAt.toISOString()
        );
      }

      const now = this.clock().toISOString();

      const promote = this.db.prepare(`
        UPDATE hypotheses SET promoted_belief_id = ?, updated_at = ?
        WHERE id = ? AND status = 'verified' AND promoted_belief_id IS NULL
      `);
      for (const p of batch.hypothesisPromotions) {
        if (promote.run(p.beliefId, now, p.hypothesisId).changes !== 1) {
          throw new ValidationError(`Hypothesis ${p.hypothesisId} cannot be promoted`);
        }
      }

      const setSalience = this.db.prepare(`
        UPDATE episodes SET salience = ? WHERE id = ? AND salience != ?
      `);
      for (const u of batch.salienceUpdates) {
        setSalience.run(u.salience, u.episodeId, u.salience);
      }

      const prune = this.db.prepare(`
        UPDATE episodes SET payload = NULL, pruned_at = ?, updated_at = ?
        WHERE id = ? AND pruned_at IS NULL
      `);
      let pruned = 0;
      for (const id of batch.prunes) {
        if (id > batch.watermark) {
          throw new ValidationError(`Episode ${id} is above the watermark and cannot be pruned`);
        }
        pruned += prune.run(now, now, id).changes;
      }
      if (batch.prunes.length > 0) {
        this.db.prepare(`
          DELETE FROM embeddings WHERE entity_type = 'episode' AND entity_id IN (
            SELECT CAST(id AS TEXT) FROM episodes WHERE pruned_at IS NOT NULL
          )
        `).run();
      }

      const putEmbedding = this.db.prepare(`
        INSERT OR REPLACE INTO embeddings (entity_type, entity_id, dims, vector)
        VALUES (?, ?, ?, ?)
      `);
      for (const e of batch.embeddings) {
        putEmbedding.run(
          e.entityType,
          e.entityId,
          e.vector.length,
          Buffer.from(e.vector.buffer, e.vector.byteOffset, e.vector.byteLength)
        );
      }

      if (batch.report) {
        this.db.prepare(`
          INSERT INTO consolidation_runs (id, prior_watermark, watermark, report, finished_at)
          VALUES (?, ?, ?, ?, ?)
        `).run(
          batch.report.runId,
          batch.priorWatermark,
          batch.watermark,
          JSON.stringify(batch.report),
          batch.report.finishedAt.toISOString()
        );
      }

      this.db.prepare('UPDATE watermark SET value = ?, updated_at = ? WHERE id = 1').run(batch.watermark, now);

      return {
        watermark: batch.watermark,
        beliefsWritten: batch.beliefUpserts.length,
        skillsWritten: batch.skillUpserts.length,
        episodesPruned: pruned,
      };
    });
  }

  private assertConflictSymmetry(upserts: Belief[]): void {
    for (const belief of upserts) {
      for (const otherId of belief.conflictsWithIds) {
        const other = this.getBelief(otherId);
        if (!other) {
          throw new ValidationError(`Belief ${belief.id} conflicts with unknown belief ${otherId}`);
        }
        if (!other.conflictsWithIds.includes(belief.id)) {
          throw new ValidationError(`Conflict link ${belief.id} -> ${otherId} is not symmetric`);
        }
      }
    }
  }

  getStats(): MemoryStats {
    return this.guard('getStats', () => {
      const episodes = this.db.prepare(`
        SELECT COUNT(*) AS total, SUM(CASE WHEN pruned_at IS NOT NULL THEN 1 ELSE 0 END) AS pruned
        FROM episodes
      `).get() as { total: number; pruned: number | null };

      const beliefCounts: Record<BeliefStatus, number> = {
        proposed: 0,
        confirmed: 0,
        disputed: 0,
        retracted: 0,
        archived: 0,
      };
      const statusRows = this.db.prepare(`
        SELECT status, COUNT(*) AS count FROM beliefs GROUP BY status
      `).all() as Array<{ status: BeliefStatus; count: number }>;
      for (const row of statusRows) {
        beliefCounts[row.status] = row.count;
      }

      const count = (table: string): number =>
        (this.db.prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as { count: number }).count;

      const lastRun = this.db.prepare(`
        SELECT MAX(finished_at) AS last FROM consolidation_runs
      `).get() as { last: string | null };

      return {
        episodeCount: episodes.total,
        prunedEpisodeCount: episodes.pruned ?? 0,
        beliefCounts,
        skillCount: count('skills'),
        goalCount: count('goals'),
        hypothesisCount: count('hypotheses'),
        watermark: this.getWatermark().value,
        lastRunAt: lastRun.last ? new Date(lastRun.last) : undefined,
      };
    });
  }
}

function uniqueSorted(ids: number[]): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

function parseNumberArray(json: string): number[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((v): v is number => typeof v === 'number') : [];
}

function parseStringArray(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function bufferToVector(buffer: Buffer, dims: number): Float32Array | null {
  if (buffer.length !== dims * 4) {
    return null;
  }
  // Copy into an aligned buffer; SQLite blobs carry no alignment guarantee.
  return new Float32Array(new Uint8Array(buffer).buffer, 0, dims);
}

function parseReport(json: string): ConsolidationReport {
  const raw = JSON.parse(json) as Omit<ConsolidationReport, 'startedAt' | 'finishedAt'> & {
    startedAt: string;
    finishedAt: string;
  };
  return { ...raw, startedAt: new Date(raw.startedAt), finishedAt: new Date(raw.finishedAt) };
}

function rowToEpisode(row: EpisodeRow): Episode {
  let payload: EpisodePayload | null = null;
  if (row.payload !== null) {
    const parsed = EpisodePayloadSchema.safeParse(JSON.parse(row.payload));
    payload = parsed.success ? parsed.data : null;
  }

  return {
    id: row.id,
    kind: row.kind as EpisodeKind,
    payload,
    salience: row.salience,
    initialSalience: row.initial_salience,
    contentHash: row.content_hash,
    goalId: row.goal_id ?? undefined,
    timestamp: new Date(row.timestamp),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    prunedAt: row.pruned_at ? new Date(row.pruned_at) : undefined,
  };
}

function rowToBelief(row: BeliefRow): Belief {
  return {
    id: row.id,
    statement: row.statement,
    subject: row.subject,
    polarity: row.polarity as BeliefPolarity,
    value: row.value ?? undefined,
    confidence: row.confidence,
    status: row.status as BeliefStatus,
    verified: row.verified === 1,
    evidenceIds: parseNumberArray(row.evidence_ids),
    conflictsWithIds: parseStringArray(row.conflicts_with_ids),
    lastConfirmedAt: row.last_confirmed_at ? new Date(row.last_confirmed_at) : undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function rowToSkill(row: SkillRow): Skill {
  return {
    id: row.id,
    name: row.name,
    preconditions: parseStringArray(row.preconditions),
    steps: parseStringArray(row.steps),
    failureModes: parseStringArray(row.failure_modes),
    successRate: row.success_rate,
    attempts: row.attempts,
    successes: row.successes,
    successRateHistory: parseNumberArray(row.success_rate_history),
    evidenceIds: parseNumberArray(row.evidence_ids),
    lastUsed: row.last_used ? new Date(row.last_used) : undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function rowToGoal(row: GoalRow): Goal {
  return {
    id: row.id,
    description: row.description,
    status: row.status as GoalStatus,
    priority: row.priority,
    progress: row.progress,
    deadline: row.deadline ? new Date(row.deadline) : undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function rowToSelfModel(row: SelfModelRow): SelfModelEntry {
  return {
    capability: row.capability,
    reliabilityScore: row.reliability_score,
    limitations: parseStringArray(row.limitations),
    updatedAt: new Date(row.updated_at),
  };
}

function rowToHypothesis(row: HypothesisRow): Hypothesis {
  return {
    id: row.id,
    claim: row.claim,
    verificationPlan: row.verification_plan,
    confidence: row.confidence,
    status: row.status as HypothesisStatus,
    evidenceIds: parseNumberArray(row.evidence_ids),
    riskIfWrong: row.risk_if_wrong,
    promotedBeliefId: row.promoted_belief_id ?? undefined,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

// Database row types
interface EpisodeRow {
  id: number;
  kind: string;
  payload: string | null;
  salience: number;
  initial_salience: number;
  content_hash: string;
  goal_id: string | null;
  timestamp: string;
  created_at: string;
  updated_at: string;
  pruned_at: string | null;
}

interface BeliefRow {
  id: string;
  statement: string;
  subject: string;
  polarity: string;
  value: string | null;
  confidence: number;
  status: string;
  verified: number;
  evidence_ids: string;
  conflicts_with_ids: string;
  last_confirmed_at: string | null;
  created_at: string;
  updated_at: string;
}

interface SkillRow {
  id: string;
  name: string;
  preconditions: string;
  steps: string;
  failure_modes: string;
  success_rate: number;
  attempts: number;
  successes: number;
  success_rate_history: string;
  evidence_ids: string;
  last_used: string | null;
  created_at: string;
  updated_at: string;
}

interface GoalRow {
  id: string;
  description: string;
  status: string;
  priority: number;
  progress: number;
  deadline: string | null;
  created_at: string;
  updated_at: string;
}

interface SelfModelRow {
  capability: string;
  reliability_score: number;
  limitations: string;
  updated_at: string;
}

interface HypothesisRow {
  id: string;
  claim: string;
  verification_plan: string;
  confidence: number;
  status: string;
  evidence_ids: string;
  risk_if_wrong: string;
  promoted_belief_id: string | null;
  created_at: string;
  updated_at: string;
}
