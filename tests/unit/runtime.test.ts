import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { MemoryStore } from '../../src/memory/store.js';
import { MemoryRuntime, createExtractor, openRuntime } from '../../src/core/runtime.js';
import { HeuristicExtractor, ModelExtractor } from '../../src/consolidation/extraction.js';
import { SimpleEmbedder } from '../../src/memory/embeddings.js';
import { ValidationError } from '../../src/memory/errors.js';
import { defaultConfig, initProject } from '../../src/config/index.js';
import { setLogLevel } from '../../src/core/logger.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function tmpDb(): string {
  return path.join(os.tmpdir(), `rv-runtime-test-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

describe('MemoryRuntime', () => {
  let runtime: MemoryRuntime;
  let dbPath: string;

  beforeAll(() => setLogLevel('silent'));
  afterAll(() => setLogLevel('warn'));

  beforeEach(() => {
    dbPath = tmpDb();
    const store = new MemoryStore(dbPath, { clock: () => NOW });
    runtime = new MemoryRuntime(store, defaultConfig(), { clock: () => NOW, embedder: new SimpleEmbedder() });
  });

  afterEach(() => {
    runtime.close();
    for (const suffix of ['', '-journal', '-wal', '-shm']) {
      try { fs.unlinkSync(dbPath + suffix); } catch { /* ignore */ }
    }
  });

  it('answers queries with consolidated beliefs', async () => {
    runtime.appendEpisode('perception', { text: 'I love lo-fi music' });
    await runtime.consolidate();

    const results = await runtime.queryMemory({ text: 'lo-fi music', types: ['belief'] });

    expect(results).toHaveLength(1);
    expect(results[0].ref.type).toBe('belief');
    expect(results[0].item.type === 'belief' && results[0].item.entity.statement).toBe('User likes lo-fi music');
    expect(results[0].signals.vector).toBeGreaterThan(0);
  });

  it('traces a belief to its evidence, including pruned and missing episodes', () => {
    const id = runtime.appendEpisode('observation', { text: 'I like tea' });
    const hash = runtime.store.getEpisode(id)?.contentHash;
    runtime.store.applyConsolidationBatch({
      priorWatermark: 0,
      watermark: id,
      beliefUpserts: [{
        id: 'tea',
        statement: 'User likes tea',
        subject: 'tea',
        polarity: 'positive',
        confidence: 0.6,
        status: 'proposed',
        verified: false,
        evidenceIds: [id, 99],
        conflictsWithIds: [],
        createdAt: NOW,
        updatedAt: NOW,
      }],
      skillUpserts: [],
      selfModelUpserts: [],
      hypothesisPromotions: [],
      salienceUpdates: [],
      prunes: [id],
      embeddings: [],
    });

    const provenance = runtime.provenance('tea');

    expect(provenance.belief.statement).toBe('User likes tea');
    expect(provenance.evidence).toEqual([{ episodeId: id, contentHash: hash, timestamp: NOW, pruned: true }]);
    expect(provenance.missing).toEqual([99]);
  });

  it('rejects provenance for an unknown belief', () => {
    expect(() => runtime.provenance('nope')).toThrow(ValidationError);
  });

  it('tracks goals and hypotheses through the store', () => {
    const goalId = runtime.createGoal({ description: 'Ship the release', priority: 8 });
    expect(runtime.updateGoalProgress(goalId, 0.5).progress).toBe(0.5);
    expect(runtime.listGoals().map((g) => g.id)).toEqual([goalId]);

    const hypothesisId = runtime.registerHypothesis({ claim: 'User likes green tea', verificationPlan: 'Offer some' });
    expect(runtime.resolveHypothesis(hypothesisId, 'rejected').status).toBe('rejected');
    expect(runtime.getHypothesis(hypothesisId)?.status).toBe('rejected');
  });

  it('looks up skills by id or by name', async () => {
    runtime.appendEpisode('action', { text: 'linted', skill: { name: 'lint', succeeded: true } });
    await runtime.consolidate();

    const byName = runtime.getSkill('lint');
    expect(byName?.attempts).toBe(1);
    expect(runtime.getSkill(byName?.id ?? '')?.name).toBe('lint');
    expect(runtime.getSelfModel('lint')?.reliabilityScore).toBe(1);
  });

  it('forgets nothing before the first consolidation', () => {
    runtime.appendEpisode('observation', { text: 'noise' }, { salience: 0.01 });
    expect(runtime.forget()).toEqual({ watermark: 0, salienceUpdated: 0, episodesPruned: 0 });
  });
});

describe('createExtractor', () => {
  it('builds the configured provider', () => {
    const config = defaultConfig();
    expect(createExtractor(config)).toBeInstanceOf(HeuristicExtractor);
    expect(createExtractor({ ...config, extraction: { ...config.extraction, provider: 'ollama' } }))
      .toBeInstanceOf(ModelExtractor);
  });
});

describe('openRuntime', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rv-runtime-project-'));
  });

  afterEach(() => {
    setLogLevel('warn');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('opens the project database and keeps episodes across sessions', () => {
    initProject(dir);

    const first = openRuntime(dir);
    const id = first.appendEpisode('observation', { text: 'persisted' });
    first.close();

    const second = openRuntime(dir);
    expect(second.store.getEpisode(id)?.payload).toEqual({ text: 'persisted' });
    second.close();

    expect(fs.existsSync(path.join(dir, '.reverie', 'memory.db'))).toBe(true);
  });
});
