import { z } from 'zod';
import type { ModelAdapter } from '../adapters/types.js';
import { createLogger } from '../core/logger.js';
import type { BeliefPolarity, Episode } from '../memory/types.js';

const log = createLogger('extraction');

export interface ExtractedClaim {
  statement: string;
  subject: string;
  polarity: BeliefPolarity;
  value?: string;
  confidence?: number;  // Provider's own estimate; capped by the miner
}

export type ExtractionResult =
  | { status: 'ok'; claims: ExtractedClaim[] }
  | { status: 'unavailable'; reason: string };

/**
 * Turns one episode into candidate claims. Report `unavailable` to make the
 * miner fall back to the heuristic extractor; throwing aborts the run.
 */
export interface ExtractionProvider {
  readonly name: string;
  extract(episode: Episode): Promise<ExtractionResult>;
}

export function normalizeSubject(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[.,;:!?"]+$/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

// Topic runs until a conjunction, punctuation or end of text
const TOPIC = "([a-z0-9][a-z0-9\\-'\\s]*?)(?:\\s+\\band\\b|\\s+\\bbut\\b|[.,;!?]|$)";

interface PreferenceRule {
  pattern: RegExp;
  polarity: BeliefPolarity;
}

// First matching rule per sentence wins
const PREFERENCE_RULES: PreferenceRule[] = [
  { pattern: new RegExp(`\\bi\\s+(?:really\\s+)?(?:dislike|hate|detest)\\s+${TOPIC}`, 'i'), polarity: 'negative' },
  { pattern: new RegExp(`\\bi\\s+(?:don't\\s+like|do\\s+not\\s+like|can't\\s+stand)\\s+${TOPIC}`, 'i'), polarity: 'negative' },
  { pattern: new RegExp(`\\bi\\s+(?:really\\s+)?(?:love|like|prefer|enjoy)\\s+${TOPIC}`, 'i'), polarity: 'positive' },
];

const ATTRIBUTE_RULE = new RegExp(`\\bmy\\s+([a-z0-9][a-z0-9\\-\\s]*?)\\s+is\\s+${TOPIC}`, 'i');

const CLAIM_RULES: Array<{ pattern: RegExp; polarity: BeliefPolarity }> = [
  { pattern: /^(?:the\s+)?user\s+(?:likely\s+)?(?:dislikes|hates|does\s+not\s+like|doesn't\s+like)\s+(.+)$/i, polarity: 'negative' },
  { pattern: /^(?:the\s+)?user\s+(?:likely\s+)?(?:likes|loves|prefers|enjoys)\s+(.+)$/i, polarity: 'positive' },
];

const NEGATION = /\b(?:not|never|no)\b/i;
const NEGATION_WORDS = /\b(?:not|never|no)\b/gi;

export function preferenceStatement(subject: string, polarity: BeliefPolarity): string {
  return `User ${polarity === 'positive' ? 'likes' : 'dislikes'} ${subject}`;
}

/**
 * Recover subject and polarity from a free-form claim such as
 * "User likes tea" or "The deploy script is not idempotent".
 */
export function parseClaim(statement: string): ExtractedClaim | null {
  const trimmed = statement.trim().replace(/[.!]+$/, '');
  if (!trimmed) return null;

  for (const rule of CLAIM_RULES) {
    const match = rule.pattern.exec(trimmed);
    if (match) {
      const subject = normalizeSubject(match[1]);
      return { statement: preferenceStatement(subject, rule.polarity), subject, polarity: rule.polarity };
    }
  }

  const attribute = /^(?:the\s+)?user's\s+(.+?)\s+is\s+(.+)$/i.exec(trimmed);
  if (attribute) {
    const subject = normalizeSubject(attribute[1]);
    const value = normalizeSubject(attribute[2]);
    return { statement: `User's ${subject} is ${value}`, subject, polarity: 'positive', value };
  }

  // Fallback: negation words flip polarity and are dropped from the subject
  const negated = NEGATION.test(trimmed);
  const subject = normalizeSubject(trimmed.replace(NEGATION_WORDS, ' '));
  if (!subject) return null;
  return { statement: trimmed, subject, polarity: negated ? 'negative' : 'positive' };
}

/**
 * Deterministic, offline pattern rules over the episode text.
 */
export class HeuristicExtractor implements ExtractionProvider {
  readonly name = 'heuristic';

  async extract(episode: Episode): Promise<ExtractionResult> {
    return { status: 'ok', claims: this.extractFromText(episode.payload?.text ?? '') };
  }

  extractFromText(text: string): ExtractedClaim[] {
    const claims: ExtractedClaim[] = [];
    const seen = new Set<string>();

    const add = (claim: ExtractedClaim): void => {
      const key = `${claim.subject}|${claim.polarity}|${claim.value ?? ''}`;
      if (!claim.subject || seen.has(key)) return;
      seen.add(key);
      claims.push(claim);
    };

    for (const sentence of text.split(/(?<=[.!?;])\s+/)) {
      for (const rule of PREFERENCE_RULES) {
        const match = rule.pattern.exec(sentence);
        if (match) {
          const subject = normalizeSubject(match[1]);
          add({ statement: preferenceStatement(subject, rule.polarity), subject, polarity: rule.polarity });
          break;
        }
      }

      const attribute = ATTRIBUTE_RULE.exec(sentence);
      if (attribute) {
        const subject = normalizeSubject(attribute[1]);
        const value = normalizeSubject(attribute[2]);
        add({ statement: `User's ${subject} is ${value}`, subject, polarity: 'positive', value });
      }
    }

    return claims;
  }
}

const ModelClaimSchema = z.object({
  claim: z.string().min(1),
  confidence: z.number().min(0).max(1).optional(),
});

const ModelResponseSchema = z.union([
  z.array(ModelClaimSchema),
  z.object({ claims: z.array(ModelClaimSchema) }).transform((value) => value.claims),
]);

const EXTRACTION_PROMPT = `Extract distinct user preferences, facts or beliefs from the text.
Return ONLY JSON of the form {"claims": [{"claim": string, "confidence": number}]}.
Phrase preferences as "User likes X" or "User dislikes X" and facts as "User's X is Y".
Return {"claims": []} when there is nothing to extract.`;

/**
 * Delegates phrasing to a chat model. Transport and format failures are
 * reported as `unavailable` so consolidation falls back to the heuristic.
 */
export class ModelExtractor implements ExtractionProvider {
  readonly name: string;

  constructor(private adapter: ModelAdapter) {
    this.name = `model:${adapter.name}`;
  }

  async extract(episode: Episode): Promise<ExtractionResult> {
    const text = episode.payload?.text;
    if (!text) {
      return { status: 'ok', claims: [] };
    }

    let content: string;
    try {
      const response = await this.adapter.complete({
        messages: [
          { role: 'system', content: EXTRACTION_PROMPT },
          { role: 'user', content: text },
        ],
        temperature: 0,
        format: 'json',
      });
      content = response.content;
    } catch (error) {
      return this.unavailable(`${this.adapter.name} failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    const json = extractJson(content);
    if (json === undefined) {
      return this.unavailable(`${this.adapter.name} returned no JSON`);
    }

    const parsed = ModelResponseSchema.safeParse(json);
    if (!parsed.success) {
      return this.unavailable(`${this.adapter.name} returned malformed claims`);
    }

    const claims: ExtractedClaim[] = [];
    for (const item of parsed.data) {
      const claim = parseClaim(item.claim);
      if (claim) {
        claims.push({ ...claim, confidence: item.confidence });
      }
    }
    return { status: 'ok', claims };
  }

  private unavailable(reason: string): ExtractionResult {
    log.warn(reason);
    return { status: 'unavailable', reason };
  }
}

function extractJson(content: string): unknown {
  const match = /[[{][\s\S]*[\]}]/.exec(content);
  if (!match) return undefined;
  try {
    return JSON.parse(match[0]);
  } catch {
    return undefined;
  }
}
