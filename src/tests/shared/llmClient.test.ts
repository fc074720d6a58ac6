/**
 * Tests for Shared LLM Client
 *
 * The provider call is replaced by overriding dispatch, so retries, caching,
 * timeouts and response parsing run without any network access.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  LLMClient,
  LLMCache,
  DEFAULT_LLM_CONFIG,
  DispatchParams,
  LLMRequest,
  LLMResponse,
  TimeoutError,
  createLLMClient,
  parseJsonResponse
} from '../../shared/llm';

type Reply = string | Error | 'hang' | 'slow';

class FakeLLMClient extends LLMClient {
  calls = 0;
  inFlight = 0;
  aborted: unknown[] = [];

  constructor(private readonly replies: Reply[], timeout = 1000) {
    super(
      { provider: 'openai', apiKey: 'test-key', timeout },
      {},
      { maxAttempts: 3, delayMs: 0, backoffMs: [0, 0, 0] }
    );
  }

  protected async dispatch(_request: LLMRequest, params: DispatchParams): Promise<LLMResponse> {
    const reply = this.replies[Math.min(this.calls, this.replies.length - 1)];
    this.calls++;
    if (reply === 'hang') {
      return new Promise<LLMResponse>(() => undefined);
    }
    if (reply === 'slow') {
      return this.slowReply(params);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply, model: params.model };
  }

  /** Answers after 300ms unless the signal is aborted first */
  private slowReply(params: DispatchParams): Promise<LLMResponse> {
    this.inFlight++;
    return new Promise<LLMResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.inFlight--;
        resolve({ content: 'late', model: params.model });
      }, 300);
      params.signal.addEventListener('abort', () => {
        clearTimeout(timer);
        this.inFlight--;
        this.aborted.push(params.signal.reason);
        reject(params.signal.reason);
      }, { once: true });
    });
  }
}

describe('LLM Client', () => {
  it('should return trimmed text', async () => {
    const client = new FakeLLMClient(['  hello  ']);

    await expect(client.generate('Say hello')).resolves.toBe('hello');
  });

  it('should retry failed calls', async () => {
    const client = new FakeLLMClient([new Error('503'), new Error('503'), 'recovered']);

    await expect(client.generate('prompt')).resolves.toBe('recovered');
    expect(client.calls).toBe(3);
  });

  it('should reject once attempts are used up', async () => {
    const client = new FakeLLMClient([new Error('first'), new Error('second'), new Error('third')]);

    await expect(client.generate('prompt')).rejects.toThrow('third');
    expect(client.calls).toBe(3);
  });

  it('should answer repeated prompts from the cache', async () => {
    const client = new FakeLLMClient(['cached answer']);

    await client.generate('same prompt');
    await client.generate('same prompt');

    expect(client.calls).toBe(1);
    expect(client.getCacheStats().size).toBe(1);
  });

  it('should time out a stalled call', async () => {
    const client = new FakeLLMClient(['hang'], 10);

    await expect(client.generate('prompt')).rejects.toThrow('LLM request timed out after 10ms');
  });

  it('should abort each timed-out request', async () => {
    const client = new FakeLLMClient(['slow'], 30);

    await expect(client.generate('prompt')).rejects.toBeInstanceOf(TimeoutError);

    expect(client.calls).toBe(3);
    expect(client.aborted).toHaveLength(3);
    expect(client.inFlight).toBe(0);
  });

  it('should require a user message', async () => {
    const client = new FakeLLMClient(['unused']);

    await expect(client.complete({ messages: [{ role: 'system', content: 'x' }] })).rejects.toThrow(
      'Request must include at least one user message'
    );
  });

  it('should apply provider defaults', () => {
    const config = new FakeLLMClient(['unused']).getConfig();

    expect(config.model).toBe(DEFAULT_LLM_CONFIG.openai.model);
    expect(config.timeout).toBe(1000);
  });
});

describe('createLLMClient', () => {
  const settings = {
    provider: 'openai' as const,
    anthropicApiKey: '',
    openaiApiKey: '',
    timeoutMs: 5000,
    maxRetries: 2
  };

  it('should require a key unless a base URL is set', () => {
    expect(() => createLLMClient(settings)).toThrow('API key not found. Set OPENAI_API_KEY or LLM_BASE_URL.');
  });

  it('should accept a local server without a key', () => {
    const client = createLLMClient({ ...settings, baseUrl: 'http://127.0.0.1:1234/v1' });

    expect(client.getConfig()).toMatchObject({
      provider: 'openai',
      apiKey: 'local',
      model: 'gpt-4o-mini',
      timeout: 5000
    });
  });
});

describe('parseJsonResponse', () => {
  it('should strip markdown fences', () => {
    expect(parseJsonResponse('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('should find an object inside prose', () => {
    expect(parseJsonResponse('Here you go: {"a": [1, 2]} Hope that helps.')).toEqual({ a: [1, 2] });
  });

  it('should repair trailing commas', () => {
    expect(parseJsonResponse('{"a": [1, 2,]}')).toEqual({ a: [1, 2] });
  });
});

describe('LLM Cache', () => {
  let cache: LLMCache;
  const key = (userPrompt: string) => ({ systemPrompt: 'System', userPrompt, temperature: 0, model: 'test-model' });

  beforeEach(() => {
    cache = new LLMCache({ enabled: true, ttlSeconds: 60, maxEntries: 3 });
  });

  it('should cache and retrieve responses', () => {
    const response = { content: 'Hi there!', model: 'test-model' };

    expect(cache.get(key('Hello'))).toBeNull();
    cache.set(key('Hello'), response);

    expect(cache.get(key('Hello'))).toEqual(response);
    expect(cache.get(key('Goodbye'))).toBeNull();
  });

  it('should evict the least recently used entry', () => {
    for (let i = 0; i < 3; i++) {
      cache.set(key(`prompt-${i}`), { content: `response-${i}`, model: 'test-model' });
    }
    cache.get(key('prompt-0'));
    cache.set(key('prompt-3'), { content: 'response-3', model: 'test-model' });

    expect(cache.get(key('prompt-1'))).toBeNull();
    expect(cache.get(key('prompt-0'))).toBeTruthy();
    expect(cache.get(key('prompt-3'))).toBeTruthy();
  });

  it('should not store anything when disabled', () => {
    const disabled = new LLMCache({ enabled: false });
    disabled.set(key('Hello'), { content: 'Hi', model: 'test-model' });

    expect(disabled.get(key('Hello'))).toBeNull();
    expect(disabled.getStats().size).toBe(0);
  });

  it('should clear all entries', () => {
    cache.set(key('Hello'), { content: 'Hi', model: 'test-model' });
    cache.clear();

    expect(cache.getStats().size).toBe(0);
  });
});
