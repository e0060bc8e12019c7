/**
 * Model Adapters
 */

export * from './types.js';
export * from './ollama.js';

import type { ModelAdapter, AdapterConfig } from './types.js';
import { OllamaAdapter } from './ollama.js';

/**
 * Parse a model string like "ollama:llama3.2"
 */
export function parseModelString(modelString: string): {
  provider: string;
  model: string;
} {
  const colonIndex = modelString.indexOf(':');

  if (colonIndex === -1) {
    // No provider prefix, default to ollama
    return { provider: 'ollama', model: modelString };
  }

  return {
    provider: modelString.slice(0, colonIndex),
    model: modelString.slice(colonIndex + 1),
  };
}

export function createAdapter(config: AdapterConfig): ModelAdapter {
  switch (config.provider) {
    case 'ollama':
      return new OllamaAdapter(config.config);

    default:
      throw new Error(`Unknown provider: ${(config as { provider: string }).provider}`);
  }
}
