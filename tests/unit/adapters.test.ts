import { describe, it, expect, vi, afterEach } from 'vitest';
import { createAdapter, parseModelString } from '../../src/adapters/index.js';
import { OllamaAdapter } from '../../src/adapters/ollama.js';
import type { AdapterConfig } from '../../src/adapters/types.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('parseModelString', () => {
  it('parses provider:model format', () => {
    expect(parseModelString('ollama:llama3.2')).toEqual({ provider: 'ollama', model: 'llama3.2' });
  });

  it('defaults to ollama when no provider prefix', () => {
    expect(parseModelString('llama3.2')).toEqual({ provider: 'ollama', model: 'llama3.2' });
  });

  it('handles colons in model name', () => {
    expect(parseModelString('ollama:llama3.2:latest')).toEqual({
      provider: 'ollama', model: 'llama3.2:latest',
    });
  });
});

describe('createAdapter', () => {
  it('creates OllamaAdapter', () => {
    const adapter = createAdapter({
      provider: 'ollama',
      config: { baseUrl: 'http://localhost:11434', model: 'llama3.2' },
    });
    expect(adapter).toBeInstanceOf(OllamaAdapter);
    expect(adapter.provider).toBe('ollama');
    expect(adapter.name).toBe('ollama:llama3.2');
  });

  it('throws for unknown provider', () => {
    const config: unknown = { provider: 'mystery', config: {} };
    expect(() => createAdapter(config as AdapterConfig)).toThrow('Unknown provider: mystery');
  });
});

describe('OllamaAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a non-streaming chat request and maps the response', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({
      model: 'llama3.2',
      message: { role: 'assistant', content: '{"claims":[]}' },
      done: true,
      prompt_eval_count: 12,
      eval_count: 5,
    }));
    vi.stubGlobal('fetch', fetchMock);

    const adapter = new OllamaAdapter({ baseUrl: 'http://localhost:11434/', model: 'llama3.2' });
    const response = await adapter.complete({
      messages: [{ role: 'user', content: 'extract' }],
      format: 'json',
    });

    expect(response).toEqual({
      content: '{"claims":[]}',
      usage: { promptTokens: 12, completionTokens: 5, totalTokens: 17 },
      finishReason: 'stop',
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'llama3.2',
      messages: [{ role: 'user', content: 'extract' }],
      stream: false,
      format: 'json',
      options: { temperature: 0, num_predict: 1024 },
    });
  });

  it('throws with the server message on an error status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('model not found', { status: 404 })));

    const adapter = new OllamaAdapter({ baseUrl: 'http://localhost:11434', model: 'missing' });
    await expect(adapter.complete({ messages: [] })).rejects.toThrow('Ollama error: model not found');
  });

  it('reports health from the tags endpoint', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ models: [] })));
    const adapter = new OllamaAdapter({ baseUrl: 'http://localhost:11434', model: 'llama3.2' });
    expect(await adapter.healthCheck()).toBe(true);
  });

  it('reports unhealthy when the server is unreachable', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED')));
    const adapter = new OllamaAdapter({ baseUrl: 'http://localhost:11434', model: 'llama3.2' });
    expect(await adapter.healthCheck()).toBe(false);
  });
});
