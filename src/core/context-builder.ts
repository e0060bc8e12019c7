import type { Message } from '../adapters/types.js';
import type { MemoryQuery, MemoryRetriever, RetrievalResult } from '../memory/retriever.js';
import { describeItem, itemConfidence } from '../memory/retriever.js';

export interface ContextBudget {
  maxTokens: number;   // Budget for the memory block
  maxItems: number;
}

export const DEFAULT_CONTEXT_BUDGET: ContextBudget = {
  maxTokens: 1000,
  maxItems: 8,
};

export interface MemoryBlock {
  text: string;
  included: RetrievalResult[];
  tokenEstimate: number;
}

export interface BuiltContext {
  messages: Message[];
  memory: MemoryBlock;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

const TYPE_LABELS: Record<RetrievalResult['ref']['type'], string> = {
  episode: 'EPISODE',
  belief: 'BELIEF',
  skill: 'SKILL',
  goal: 'GOAL',
  hypothesis: 'HYPOTHESIS',
};

export function formatResultForContext(result: RetrievalResult): string {
  const { item } = result;
  let line = `- [${TYPE_LABELS[item.type]}] ${describeItem(item)}`;

  const confidence = itemConfidence(item);
  if (confidence !== undefined) {
    line += ` (confidence=${confidence.toFixed(2)})`;
  }
  if (item.type === 'belief' && item.entity.status === 'disputed') {
    line += ' [disputed]';
  }
  return line;
}

/**
 * Render ranked memories into a prompt block, most relevant first, stopping
 * before the token budget would be exceeded.
 */
export function buildMemoryContext(
  results: RetrievalResult[],
  budget: ContextBudget = DEFAULT_CONTEXT_BUDGET
): MemoryBlock {
  if (results.length === 0) {
    return { text: '', included: [], tokenEstimate: 0 };
  }

  const header = 'Relevant memories:';
  const lines: string[] = [header];
  const included: RetrievalResult[] = [];
  let tokens = estimateTokens(header);

  for (const result of results.slice(0, budget.maxItems)) {
    const line = formatResultForContext(result);
    const cost = estimateTokens(line) + 1;
    if (tokens + cost > budget.maxTokens) break;
    lines.push(line);
    included.push(result);
    tokens += cost;
  }

  if (included.length === 0) {
    return { text: '', included: [], tokenEstimate: 0 };
  }

  return { text: lines.join('\n'), included, tokenEstimate: tokens };
}

export class ContextBuilder {
  private budget: ContextBudget;

  constructor(
    private retriever: MemoryRetriever,
    budget: Partial<ContextBudget> = {}
  ) {
    this.budget = { ...DEFAULT_CONTEXT_BUDGET, ...budget };
  }

  /**
   * Prepend a system message carrying the memories relevant to the prompt.
   */
  build(
    userPrompt: string,
    history: Message[] = [],
    query: Omit<MemoryQuery, 'text'> = {}
  ): BuiltContext {
    const results = this.retriever.query({ ...query, text: userPrompt });
    const memory = buildMemoryContext(results, this.budget);

    const messages: Message[] = [];
    if (memory.text) {
      messages.push({ role: 'system', content: memory.text });
    }
    messages.push(...history, { role: 'user', content: userPrompt });

    return { messages, memory };
  }
}
