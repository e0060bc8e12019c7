import { createLogger } from '../core/logger.js';

const log = createLogger('embeddings');

// Dimension of the offline hashing embedder
export const SIMPLE_EMBEDDING_DIM = 256;

export type EmbeddingResult =
  | { status: 'ok'; vector: Float32Array }
  | { status: 'unavailable'; reason: string };

/**
 * Optional similarity capability. Providers report `unavailable` instead of
 * throwing, so retrieval and consolidation drop the vector term and carry on.
 */
export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string): Promise<EmbeddingResult>;
}

export class NoEmbeddings implements EmbeddingProvider {
  readonly name = 'none';

  async embed(): Promise<EmbeddingResult> {
    return { status: 'unavailable', reason: 'no embedding provider configured' };
  }
}

// Token-hashing embedder. Deterministic and offline; shared words give overlapping vectors.
export class SimpleEmbedder implements EmbeddingProvider {
  readonly name = 'simple';

  constructor(readonly dimensions: number = SIMPLE_EMBEDDING_DIM) {}

  async embed(text: string): Promise<EmbeddingResult> {
    return { status: 'ok', vector: this.hashToEmbedding(text) };
  }

  hashToEmbedding(text: string): Float32Array {
    const embedding = new Float32Array(this.dimensions);
    const tokens = text.toLowerCase().split(/[^a-z0-9]+/).filter((t) => t.length > 0);

    for (const token of tokens) {
      const hash = this.simpleHash(token);
      embedding[hash % this.dimensions] += 1;
      // Second bucket with sign, reduces collisions between unrelated words
      embedding[(hash >>> 8) % this.dimensions] += (hash & 1) === 0 ? 0.5 : -0.5;
    }

    // Normalize to unit vector
    let norm = 0;
    for (let i = 0; i < this.dimensions; i++) {
      norm += embedding[i] * embedding[i];
    }
    norm = Math.sqrt(norm);

    if (norm > 0) {
      for (let i = 0; i < this.dimensions; i++) {
        embedding[i] /= norm;
      }
    }

    return embedding;
  }

  private simpleHash(str: string): number {
    let hash = 0;
    for (let i = 0; i < str.length; i++) {
      const char = str.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32bit integer
    }
    return Math.abs(hash);
  }
}

export class OllamaEmbedder implements EmbeddingProvider {
  readonly name = 'ollama';

  constructor(
    private baseUrl: string = 'http://127.0.0.1:11434',
    private model: string = 'nomic-embed-text'
  ) {}

  async embed(text: string): Promise<EmbeddingResult> {
    try {
      const response = await fetch(`${this.baseUrl.replace(/\/$/, '')}/api/embed`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          input: [text],
        }),
      });

      if (!response.ok) {
        const error = await response.text();
        return this.unavailable(`Ollama embedding failed: ${error}`);
      }

      const data = await response.json() as { embeddings?: number[][] };
      const first = data.embeddings?.[0];
      if (!first || first.length === 0) {
        return this.unavailable('Ollama returned no embedding');
      }

      return { status: 'ok', vector: new Float32Array(first) };
    } catch (error) {
      return this.unavailable(
        `Failed to reach Ollama at ${this.baseUrl}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private unavailable(reason: string): EmbeddingResult {
    log.warn(reason);
    return { status: 'unavailable', reason };
  }
}

export interface EmbedderConfig {
  provider: 'none' | 'simple' | 'ollama';
  ollamaUrl?: string;
  model?: string;
}

export function createEmbeddingProvider(config: EmbedderConfig): EmbeddingProvider {
  switch (config.provider) {
    case 'none':
      return new NoEmbeddings();

    case 'simple':
      return new SimpleEmbedder();

    case 'ollama':
      return new OllamaEmbedder(
        config.ollamaUrl ?? 'http://127.0.0.1:11434',
        config.model ?? 'nomic-embed-text'
      );

    default:
      throw new Error(`Unknown embedding provider: ${(config as { provider: string }).provider}`);
  }
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}
