import type { RetrievalWeights } from '../config/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

/**
 * Fraction of query tokens that appear in the candidate text.
 */
export function lexicalOverlap(query: string, text: string): number {
  const queryTokens = new Set(tokenize(query));
  const textTokens = new Set(tokenize(text));
  if (queryTokens.size === 0 || textTokens.size === 0) return 0;

  let hits = 0;
  for (const token of queryTokens) {
    if (textTokens.has(token)) hits++;
  }
  return hits / queryTokens.size;
}

export function jaccard(a: string, b: string): number {
  const setA = new Set(tokenize(a));
  const setB = new Set(tokenize(b));
  if (setA.size === 0 && setB.size === 0) return 1;

  let intersection = 0;
  for (const token of setA) {
    if (setB.has(token)) intersection++;
  }
  return intersection / (setA.size + setB.size - intersection);
}

export function ageInDays(from: Date, now: Date): number {
  return Math.max(0, (now.getTime() - from.getTime()) / DAY_MS);
}

/**
 * Half-life decay: 1.0 for brand new, 0.5 after one half-life. Strictly
 * decreasing in age, so newer entries win when everything else is equal.
 */
export function recencyScore(updatedAt: Date, now: Date, halfLifeDays: number): number {
  return Math.pow(0.5, ageInDays(updatedAt, now) / halfLifeDays);
}

export interface ScoreSignals {
  lexical: number;
  recency: number;
  confidence: number;
  vector?: number;
  goal?: number;
}

/**
 * Weighted mean over the signals that are present. Absent vector or goal
 * terms drop out of both numerator and denominator.
 */
export function combineSignals(signals: ScoreSignals, weights: RetrievalWeights): number {
  let total = 0;
  let weightSum = 0;

  const add = (value: number | undefined, w: number): void => {
    if (value === undefined) return;
    total += clamp01(value) * w;
    weightSum += w;
  };

  add(signals.lexical, weights.lexical);
  add(signals.recency, weights.recency);
  add(signals.confidence, weights.confidence);
  add(signals.vector, weights.vector);
  add(signals.goal, weights.goal);

  return weightSum === 0 ? 0 : total / weightSum;
}

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
