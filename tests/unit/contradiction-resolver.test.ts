import { describe, it, expect } from 'vitest';
import {
  ContradictionResolver,
  contradicts,
  topicalSimilarity,
} from '../../src/consolidation/contradiction-resolver.js';
import { defaultConfig } from '../../src/config/index.js';
import type { Belief } from '../../src/memory/types.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const EARLIER = new Date('2026-02-01T12:00:00.000Z');
const resolver = new ContradictionResolver(defaultConfig().consolidation);

function belief(id: string, overrides: Partial<Belief> = {}): Belief {
  return {
    id,
    statement: 'User likes lo-fi music',
    subject: 'lo-fi music',
    polarity: 'positive',
    confidence: 0.6,
    status: 'proposed',
    verified: false,
    evidenceIds: [],
    conflictsWithIds: [],
    createdAt: EARLIER,
    updatedAt: EARLIER,
    ...overrides,
  };
}

function mapOf(...beliefs: Belief[]): Map<string, Belief> {
  return new Map(beliefs.map((b) => [b.id, b]));
}

describe('contradicts', () => {
  it('flags opposite polarity on the same subject', () => {
    expect(contradicts(belief('a'), belief('b', { polarity: 'negative' }), 0.6)).toBe(true);
  });

  it('flags different values for the same attribute', () => {
    const blue = belief('a', { subject: 'favorite color', value: 'blue' });
    const green = belief('b', { subject: 'favorite color', value: 'green' });
    expect(contradicts(blue, green, 0.6)).toBe(true);
  });

  it('ignores agreeing beliefs, the belief itself and distant topics', () => {
    expect(contradicts(belief('a'), belief('b'), 0.6)).toBe(false);
    expect(contradicts(belief('a'), belief('a', { polarity: 'negative' }), 0.6)).toBe(false);
    expect(contradicts(belief('a'), belief('b', { subject: 'music', polarity: 'negative' }), 0.6)).toBe(false);
  });

  it('measures topical similarity as subject overlap', () => {
    expect(topicalSimilarity(belief('a'), belief('b', { subject: 'music' }))).toBeCloseTo(1 / 3, 10);
  });
});

describe('ContradictionResolver', () => {
  it('disputes and penalises both sides of a new conflict', () => {
    const beliefs = mapOf(
      belief('liked', { confidence: 0.8628, status: 'confirmed' }),
      belief('disliked', { statement: 'User dislikes lo-fi music', polarity: 'negative' }),
    );

    const outcome = resolver.resolve(beliefs, new Set(['disliked']), NOW);

    expect(beliefs.get('liked')).toMatchObject({ status: 'disputed', conflictsWithIds: ['disliked'], updatedAt: NOW });
    expect(beliefs.get('disliked')).toMatchObject({ status: 'disputed', conflictsWithIds: ['liked'] });
    expect(beliefs.get('liked')?.confidence).toBeCloseTo(0.7128, 10);
    expect(beliefs.get('disliked')?.confidence).toBeCloseTo(0.45, 10);
    expect(outcome.linked).toEqual([['disliked', 'liked']]);
    expect([...outcome.changed].sort()).toEqual(['disliked', 'liked']);
  });

  it('does not penalise an existing link twice', () => {
    const beliefs = mapOf(
      belief('liked', { confidence: 0.7, status: 'disputed', conflictsWithIds: ['disliked'] }),
      belief('disliked', { polarity: 'negative', confidence: 0.45, status: 'disputed', conflictsWithIds: ['liked'] }),
    );

    const outcome = resolver.resolve(beliefs, new Set(['disliked', 'liked']), NOW);

    expect(outcome.linked).toEqual([]);
    expect(beliefs.get('liked')?.confidence).toBe(0.7);
    expect(beliefs.get('disliked')?.confidence).toBe(0.45);
    expect(beliefs.get('liked')?.conflictsWithIds).toEqual(['disliked']);
  });

  it('floors the penalty at zero', () => {
    const beliefs = mapOf(
      belief('weak', { confidence: 0.1 }),
      belief('other', { polarity: 'negative' }),
    );
    resolver.resolve(beliefs, new Set(['other']), NOW);
    expect(beliefs.get('weak')?.confidence).toBe(0);
  });

  it('retracts an unverified belief contradicted by a verified one', () => {
    const beliefs = mapOf(
      belief('truth', { confidence: 1, verified: true, status: 'confirmed' }),
      belief('guess', { polarity: 'negative' }),
    );

    const outcome = resolver.resolve(beliefs, new Set(['guess']), NOW);

    expect(beliefs.get('guess')?.status).toBe('retracted');
    expect(beliefs.get('truth')).toMatchObject({ status: 'confirmed', confidence: 1, conflictsWithIds: ['guess'] });
    expect([...outcome.retracted]).toEqual(['guess']);
  });

  it('decays stale disputes and archives the side that sinks below the floor', () => {
    const beliefs = mapOf(
      belief('sinking', { confidence: 0.22, status: 'disputed', conflictsWithIds: ['winner'] }),
      belief('winner', { polarity: 'negative', confidence: 0.9, status: 'disputed', conflictsWithIds: ['sinking'] }),
      belief('unrelated', { subject: 'weather', statement: 'User likes rain' }),
    );

    const outcome = resolver.resolve(beliefs, new Set(['unrelated']), NOW);

    expect(beliefs.get('sinking')?.status).toBe('archived');
    expect(beliefs.get('sinking')?.confidence).toBeCloseTo(0.187, 10);
    expect(beliefs.get('winner')?.confidence).toBeCloseTo(0.765, 10);
    expect(beliefs.get('winner')?.status).toBe('proposed');
    expect(beliefs.get('winner')?.conflictsWithIds).toEqual(['sinking']);
    expect([...outcome.archived]).toEqual(['sinking']);
  });

  it('archives only the weaker side when both sides of a stale dispute sink together', () => {
    const beliefs = mapOf(
      belief('a', { confidence: 0.2, status: 'disputed', conflictsWithIds: ['b'] }),
      belief('b', { polarity: 'negative', confidence: 0.22, status: 'disputed', conflictsWithIds: ['a'] }),
      belief('unrelated', { subject: 'weather', statement: 'User likes rain' }),
    );

    const outcome = resolver.resolve(beliefs, new Set(['unrelated']), NOW);

    expect([...outcome.archived]).toEqual(['a']);
    expect(beliefs.get('a')?.status).toBe('archived');
    expect(beliefs.get('b')?.status).toBe('proposed');
    expect(beliefs.get('b')?.confidence).toBeCloseTo(0.187, 10);
    expect(beliefs.get('b')?.conflictsWithIds).toEqual(['a']);
  });

  it('does not link a belief retracted earlier in the same pass', () => {
    const beliefs = mapOf(
      belief('truth', { confidence: 1, verified: true, status: 'confirmed' }),
      belief('guess', { polarity: 'negative' }),
      belief('later', { statement: 'User enjoys lo-fi music' }),
    );

    const outcome = resolver.resolve(beliefs, new Set(['guess', 'later']), NOW);

    expect(beliefs.get('guess')?.status).toBe('retracted');
    expect(beliefs.get('later')?.conflictsWithIds).toEqual([]);
    expect(beliefs.get('guess')?.conflictsWithIds).toEqual(['truth']);
    expect(outcome.linked).toEqual([['guess', 'truth']]);
  });

  it('confirms a conflict-free belief above the threshold', () => {
    const beliefs = mapOf(belief('strong', { confidence: 0.9 }));
    resolver.resolve(beliefs, new Set(['strong']), NOW);
    expect(beliefs.get('strong')?.status).toBe('confirmed');
  });

  it('leaves untouched, conflict-free beliefs alone', () => {
    const quiet = belief('quiet', { subject: 'weather', confidence: 0.95 });
    const beliefs = mapOf(quiet, belief('new', { subject: 'tea' }));

    const outcome = resolver.resolve(beliefs, new Set(['new']), NOW);

    expect(beliefs.get('quiet')).toBe(quiet);
    expect(outcome.changed.has('quiet')).toBe(false);
  });
});
