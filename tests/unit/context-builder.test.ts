import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { MemoryStore } from '../../src/memory/store.js';
import { MemoryRetriever } from '../../src/memory/retriever.js';
import type { RetrievalResult } from '../../src/memory/retriever.js';
import type { Belief } from '../../src/memory/types.js';
import {
  ContextBuilder,
  buildMemoryContext,
  estimateTokens,
  formatResultForContext,
} from '../../src/core/context-builder.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

function tmpDb(): string {
  return path.join(os.tmpdir(), `rv-ctx-test-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

function beliefResult(id: string, statement: string, overrides: Partial<Belief> = {}): RetrievalResult {
  const belief: Belief = {
    id,
    statement,
    subject: statement,
    polarity: 'positive',
    confidence: 0.9,
    status: 'confirmed',
    verified: false,
    evidenceIds: [],
    conflictsWithIds: [],
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
  return {
    ref: { type: 'belief', id },
    score: 1,
    signals: { lexical: 1, recency: 1, confidence: belief.confidence },
    item: { type: 'belief', entity: belief },
  };
}

describe('formatResultForContext', () => {
  it('labels the item and appends confidence', () => {
    expect(formatResultForContext(beliefResult('a', 'User likes tea'))).toBe(
      '- [BELIEF] User likes tea (confidence=0.90)'
    );
  });

  it('flags disputed beliefs', () => {
    const result = beliefResult('a', 'User likes tea', { status: 'disputed', confidence: 0.45 });
    expect(formatResultForContext(result)).toBe('- [BELIEF] User likes tea (confidence=0.45) [disputed]');
  });
});

describe('buildMemoryContext', () => {
  it('returns an empty block for no results', () => {
    expect(buildMemoryContext([])).toEqual({ text: '', included: [], tokenEstimate: 0 });
  });

  it('renders a header followed by one line per memory', () => {
    const block = buildMemoryContext([
      beliefResult('a', 'User likes tea'),
      beliefResult('b', 'User dislikes coffee'),
    ]);

    expect(block.text).toBe([
      'Relevant memories:',
      '- [BELIEF] User likes tea (confidence=0.90)',
      '- [BELIEF] User dislikes coffee (confidence=0.90)',
    ].join('\n'));
    expect(block.included).toHaveLength(2);
  });

  it('stops before the token budget is exceeded', () => {
    const block = buildMemoryContext(
      [beliefResult('a', 'User likes tea'), beliefResult('b', 'User likes tea')],
      { maxTokens: 20, maxItems: 8 }
    );

    expect(block.included.map((r) => r.ref.id)).toEqual(['a']);
    expect(block.tokenEstimate).toBe(estimateTokens('Relevant memories:') + 11 + 1);
  });

  it('honours maxItems', () => {
    const results = ['a', 'b', 'c'].map((id) => beliefResult(id, `User likes ${id}`));
    expect(buildMemoryContext(results, { maxTokens: 1000, maxItems: 2 }).included).toHaveLength(2);
  });

  it('returns an empty block when nothing fits', () => {
    const block = buildMemoryContext([beliefResult('a', 'User likes tea')], { maxTokens: 5, maxItems: 8 });
    expect(block.text).toBe('');
  });
});

describe('ContextBuilder', () => {
  let store: MemoryStore;
  let builder: ContextBuilder;
  let dbPath: string;

  beforeEach(() => {
    dbPath = tmpDb();
    store = new MemoryStore(dbPath, { clock: () => NOW });
    const retriever = new MemoryRetriever(store, {
      weights: { lexical: 0.3, recency: 0.2, confidence: 0.25, vector: 0.15, goal: 0.1 },
      recencyHalfLifeDays: 7,
      defaultTopK: 10,
    });
    builder = new ContextBuilder(retriever);
  });

  afterEach(() => {
    store.close();
    for (const suffix of ['', '-journal', '-wal', '-shm']) {
      try { fs.unlinkSync(dbPath + suffix); } catch { /* ignore */ }
    }
  });

  it('sends only the prompt when memory is empty', () => {
    const ctx = builder.build('What should I play?');
    expect(ctx.messages).toEqual([{ role: 'user', content: 'What should I play?' }]);
    expect(ctx.memory.included).toEqual([]);
  });

  it('prepends relevant memories as a system message and keeps history', () => {
    store.appendEpisode('perception', { text: 'User asked for music suggestions' });

    const history = [
      { role: 'user' as const, content: 'hi' },
      { role: 'assistant' as const, content: 'hello' },
    ];
    const ctx = builder.build('music please', history, { types: ['episode'] });

    expect(ctx.messages).toEqual([
      { role: 'system', content: 'Relevant memories:\n- [EPISODE] User asked for music suggestions' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
      { role: 'user', content: 'music please' },
    ]);
  });
});
