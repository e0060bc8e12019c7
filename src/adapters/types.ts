/**
 * Type definitions for model adapters
 */

export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  format?: 'json';  // Ask the model for a single JSON document
}

export interface CompletionResponse {
  content: string;
  usage: TokenUsage;
  finishReason: 'stop' | 'length' | 'error';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Chat model used by the model-backed claim extractor.
 */
export interface ModelAdapter {
  readonly name: string;
  readonly provider: string;

  complete(request: CompletionRequest): Promise<CompletionResponse>;

  /**
   * Check if the adapter is properly configured and reachable
   */
  healthCheck(): Promise<boolean>;
}

export interface OllamaConfig {
  baseUrl: string;
  model: string;
  timeoutMs?: number;
}

export type AdapterConfig = { provider: 'ollama'; config: OllamaConfig };
