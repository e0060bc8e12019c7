import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { MemoryStore } from '../../src/memory/store.js';
import { ReplayMiner, selectWindow } from '../../src/consolidation/replay-miner.js';
import { HeuristicExtractor } from '../../src/consolidation/extraction.js';
import type { ExtractionProvider } from '../../src/consolidation/extraction.js';
import { defaultConfig } from '../../src/config/index.js';
import type { Belief } from '../../src/memory/types.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const OPTIONS = defaultConfig().consolidation;

function tmpDb(): string {
  return path.join(os.tmpdir(), `rv-replay-test-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

describe('ReplayMiner', () => {
  let store: MemoryStore;
  let dbPath: string;

  function miner(extractor: ExtractionProvider = new HeuristicExtractor(), batchSize = OPTIONS.batchSize): ReplayMiner {
    return new ReplayMiner(store, extractor, { ...OPTIONS, batchSize }, () => NOW);
  }

  function seedBelief(belief: Belief): void {
    store.applyConsolidationBatch({
      priorWatermark: 0,
      watermark: 0,
      beliefUpserts: [belief],
      skillUpserts: [],
      selfModelUpserts: [],
      hypothesisPromotions: [],
      salienceUpdates: [],
      prunes: [],
      embeddings: [],
    });
  }

  beforeEach(() => {
    dbPath = tmpDb();
    store = new MemoryStore(dbPath, { clock: () => NOW });
  });

  afterEach(() => {
    store.close();
    for (const suffix of ['', '-journal', '-wal', '-shm']) {
      try { fs.unlinkSync(dbPath + suffix); } catch { /* ignore */ }
    }
  });

  describe('selectWindow', () => {
    it('takes at most batchSize episodes above the watermark, lowest ids first', () => {
      const ids = ['a', 'b', 'c'].map((text) => store.appendEpisode('observation', { text }));
      const window = selectWindow(store, 0, ids[2], 2);
      expect(window.watermark).toBe(ids[1]);
      expect(window.episodes.map((e) => e.id)).toEqual([ids[0], ids[1]]);
    });

    it('orders the window by timestamp', () => {
      const late = store.appendEpisode('observation', { text: 'late' }, { timestamp: new Date('2026-02-02T00:00:00Z') });
      const early = store.appendEpisode('observation', { text: 'early' }, { timestamp: new Date('2026-02-01T00:00:00Z') });
      const window = selectWindow(store, 0, early, 10);
      expect(window.episodes.map((e) => e.id)).toEqual([early, late]);
      expect(window.watermark).toBe(early);
    });

    it('is empty and keeps the prior watermark when nothing is new', () => {
      const id = store.appendEpisode('observation', { text: 'a' });
      expect(selectWindow(store, id, id, 10)).toEqual({ priorWatermark: id, watermark: id, episodes: [] });
    });

    it('ignores episodes appended after the snapshot', () => {
      const first = store.appendEpisode('observation', { text: 'a' });
      store.appendEpisode('observation', { text: 'b' });
      expect(selectWindow(store, 0, first, 10).episodes.map((e) => e.id)).toEqual([first]);
    });
  });

  describe('beliefs', () => {
    it('proposes a belief at the heuristic confidence with the episode as evidence', async () => {
      const id = store.appendEpisode('perception', { text: 'User said: I love lo-fi music' });
      const result = await miner().mine(0, id);

      expect(result.created.size).toBe(1);
      const [beliefId] = [...result.created];
      expect(result.beliefs.get(beliefId)).toMatchObject({
        statement: 'User likes lo-fi music',
        subject: 'lo-fi music',
        polarity: 'positive',
        confidence: 0.6,
        status: 'proposed',
        verified: false,
        evidenceIds: [id],
      });
    });

    it('corroborates a repeated claim instead of duplicating it', async () => {
      const e1 = store.appendEpisode('perception', { text: 'I love lo-fi music' });
      const e2 = store.appendEpisode('perception', { text: 'I really love lo-fi music' });
      const result = await miner().mine(0, e2);

      expect(result.created.size).toBe(1);
      const belief = result.beliefs.get([...result.created][0]);
      expect(belief?.confidence).toBeCloseTo(0.72, 10);
      expect(belief?.evidenceIds).toEqual([e1, e2]);
      expect(belief?.lastConfirmedAt).toEqual(NOW);
    });

    it('caps unverified corroboration below 1', async () => {
      seedBelief({
        id: 'stored',
        statement: 'User likes tea',
        subject: 'tea',
        polarity: 'positive',
        confidence: 0.99,
        status: 'confirmed',
        verified: false,
        evidenceIds: [],
        conflictsWithIds: [],
        createdAt: NOW,
        updatedAt: NOW,
      });
      const id = store.appendEpisode('perception', { text: 'I like tea' });

      const result = await miner().mine(0, id);

      expect(result.created.size).toBe(0);
      expect([...result.touched]).toEqual(['stored']);
      expect(result.beliefs.get('stored')?.confidence).toBe(0.99);
      expect(result.previous.get('stored')?.evidenceIds).toEqual([]);
      expect(result.beliefs.get('stored')?.evidenceIds).toEqual([id]);
    });

    it('lets verified episodes reach confidence 1', async () => {
      const id = store.appendEpisode('observation', { text: 'I like tea', verified: true });
      const result = await miner().mine(0, id);
      const belief = result.beliefs.get([...result.created][0]);
      expect(belief?.confidence).toBe(1);
      expect(belief?.verified).toBe(true);
    });

    it('does not revive retracted beliefs', async () => {
      seedBelief({
        id: 'gone',
        statement: 'User likes tea',
        subject: 'tea',
        polarity: 'positive',
        confidence: 0.3,
        status: 'retracted',
        verified: false,
        evidenceIds: [],
        conflictsWithIds: [],
        createdAt: NOW,
        updatedAt: NOW,
      });
      const id = store.appendEpisode('perception', { text: 'I like tea' });

      const result = await miner().mine(0, id);

      expect(result.created.size).toBe(1);
      expect(result.touched.has('gone')).toBe(false);
    });

    it('falls back to the heuristic when the provider is unavailable', async () => {
      const unavailable: ExtractionProvider = {
        name: 'offline',
        extract: async () => ({ status: 'unavailable', reason: 'no model' }),
      };
      const id = store.appendEpisode('perception', { text: 'I hate jazz' });

      const result = await miner(unavailable).mine(0, id);

      expect(result.fallbacks).toBe(1);
      expect([...result.beliefs.values()].map((b) => b.statement)).toEqual(['User dislikes jazz']);
    });

    it('uses the provider confidence when it reports one', async () => {
      const provider: ExtractionProvider = {
        name: 'fixed',
        extract: async () => ({
          status: 'ok',
          claims: [{ statement: 'User likes tea', subject: 'tea', polarity: 'positive', confidence: 0.4 }],
        }),
      };
      const id = store.appendEpisode('perception', { text: 'anything' });
      const result = await miner(provider).mine(0, id);
      expect(result.beliefs.get([...result.created][0])?.confidence).toBe(0.4);
    });
  });

  describe('skills', () => {
    it('tracks attempts, success rate history and failure modes', async () => {
      const early = new Date('2026-02-01T00:00:00Z');
      const late = new Date('2026-02-02T00:00:00Z');
      store.appendEpisode('action', {
        text: 'deployed the service',
        skill: { name: 'deploy', succeeded: true, steps: ['build', 'push'], preconditions: ['tests pass'] },
      }, { timestamp: early });
      const last = store.appendEpisode('action', {
        text: 'deploy timed out',
        skill: { name: 'deploy', succeeded: false, failureMode: 'registry timeout' },
      }, { timestamp: late });

      const result = await miner().mine(0, last);
      const skill = result.skills.get('deploy');

      expect(skill).toMatchObject({
        name: 'deploy',
        attempts: 2,
        successes: 1,
        successRate: 0.5,
        successRateHistory: [1, 0.5],
        failureModes: ['registry timeout'],
        steps: ['build', 'push'],
        preconditions: ['tests pass'],
        evidenceIds: [1, 2],
        lastUsed: late,
      });
      expect(result.selfModel).toEqual([{
        capability: 'deploy',
        reliabilityScore: 0.75,
        limitations: ['registry timeout'],
        updatedAt: NOW,
      }]);
    });

    it('keeps only the configured history length', async () => {
      let last = 0;
      for (let i = 0; i < 4; i++) {
        last = store.appendEpisode('action', { text: `run ${i}`, skill: { name: 'lint', succeeded: true } });
      }
      const result = await new ReplayMiner(
        store,
        new HeuristicExtractor(),
        { ...OPTIONS, skillHistoryLength: 3 },
        () => NOW
      ).mine(0, last);

      expect(result.skills.get('lint')?.successRateHistory).toEqual([1, 1, 1]);
      expect(result.skills.get('lint')?.attempts).toBe(4);
    });
  });

  describe('hypotheses', () => {
    it('promotes a verified hypothesis into a belief once', async () => {
      const evidence = store.appendEpisode('observation', { text: 'asked about drinks' });
      const hypothesisId = store.registerHypothesis({
        claim: 'User likes green tea',
        verificationPlan: 'Offer green tea',
        confidence: 0.7,
        evidenceIds: [evidence],
      });
      store.resolveHypothesis(hypothesisId, 'verified');

      const result = await miner().mine(evidence, evidence);

      expect(result.promotions).toHaveLength(1);
      const belief = result.beliefs.get(result.promotions[0].beliefId);
      expect(belief).toMatchObject({
        statement: 'User likes green tea',
        subject: 'green tea',
        confidence: 0.7,
        evidenceIds: [evidence],
        status: 'proposed',
      });
      expect(result.promotions[0].hypothesisId).toBe(hypothesisId);
    });

    it('ignores open hypotheses', async () => {
      store.registerHypothesis({ claim: 'User likes green tea', verificationPlan: 'Ask' });
      const result = await miner().mine(0, 0);
      expect(result.promotions).toEqual([]);
    });
  });
});
