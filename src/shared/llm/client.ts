/**
 * LLM Client
 *
 * Unified client for Anthropic and OpenAI-compatible providers.
 * Supports caching, per-call timeouts and retry with backoff, and exposes
 * the plain `TextGenerator` interface consumed by the tailoring pipeline.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { jsonrepair } from 'jsonrepair';
import {
  LLMConfig,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  DEFAULT_LLM_CONFIG,
  RetryConfig,
  DEFAULT_RETRY_CONFIG,
  TextGenerator
} from './types';
import { LLMCache, CacheConfig, DEFAULT_CACHE_CONFIG } from './cache';
import { retryWithBackoff, withTimeout } from './retry';
import { loggers } from '../logging/logger';

const llmLogger = loggers.llm;

/**
 * Resolved per-call parameters
 */
export interface DispatchParams {
  temperature: number;
  maxTokens: number;
  model: string;
  /** Aborted when the attempt runs out of time */
  signal: AbortSignal;
}

/**
 * Unified LLM client supporting both Anthropic and OpenAI
 */
export class LLMClient implements TextGenerator {
  private config: LLMConfig;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;
  private cache: LLMCache;
  private retryConfig: RetryConfig;

  constructor(
    config: Partial<LLMConfig> & { apiKey: string },
    cacheConfig: Partial<CacheConfig> = {},
    retryConfig: Partial<RetryConfig> = {}
  ) {
    const provider: LLMProvider = config.provider || 'anthropic';

    this.config = {
      ...DEFAULT_LLM_CONFIG[provider],
      ...config,
      provider
    };

    // Retries are handled here, so the SDKs must not retry on their own
    if (this.config.provider === 'anthropic') {
      this.anthropicClient = new Anthropic({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseUrl,
        maxRetries: 0
      });
    } else {
      this.openaiClient = new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseUrl,
        maxRetries: 0
      });
    }

    this.cache = new LLMCache({ ...DEFAULT_CACHE_CONFIG, ...cacheConfig });
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...retryConfig };
  }

  /**
   * Generate text for a single prompt.
   * Rejects when every attempt fails; resolves to trimmed text otherwise.
   */
  async generate(prompt: string): Promise<string> {
    const response = await this.complete({
      messages: [{ role: 'user', content: prompt }]
    });
    return response.content.trim();
  }

  /**
   * Send a completion request to the LLM
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const params: Omit<DispatchParams, 'signal'> = {
      temperature: request.temperature ?? this.config.temperature,
      maxTokens: request.maxTokens ?? this.config.maxTokens,
      model: request.model ?? this.config.model
    };
    const systemPrompt = request.systemPrompt || '';

    const userMessage = request.messages.find(m => m.role === 'user');
    if (!userMessage) {
      throw new Error('Request must include at least one user message');
    }

    const cacheKey = {
      systemPrompt,
      userPrompt: userMessage.content,
      temperature: params.temperature,
      model: params.model
    };

    const cached = this.cache.get(cacheKey);
    if (cached) {
      llmLogger.debug({ model: params.model }, 'LLM cache hit');
      return cached;
    }

    const start = Date.now();
    llmLogger.debug(
      {
        provider: this.config.provider,
        model: params.model,
        temperature: params.temperature,
        maxTokens: params.maxTokens,
        promptLength: userMessage.content.length
      },
      'LLM request start'
    );

    const response = await retryWithBackoff(
      () => withTimeout(
        signal => this.dispatch(request, { ...params, signal }),
        this.config.timeout,
        'LLM request'
      ),
      this.retryConfig,
      (error, attempt, delayMs) => {
        llmLogger.warn(
          { err: error.message, attempt, delayMs },
          'LLM request failed, retrying'
        );
      }
    );

    llmLogger.debug(
      {
        model: response.model,
        finishReason: response.finishReason ?? 'unknown',
        elapsedMs: Date.now() - start,
        usage: response.usage
      },
      'LLM request end'
    );

    this.cache.set(cacheKey, response);
    return response;
  }

  /**
   * Perform one provider call. Subclasses may override to target other transports.
   */
  protected async dispatch(request: LLMRequest, params: DispatchParams): Promise<LLMResponse> {
    if (this.config.provider === 'anthropic') {
      return this.callAnthropic(request, params);
    }
    return this.callOpenAI(request, params);
  }

  /**
   * Call Anthropic API
   */
  private async callAnthropic(request: LLMRequest, params: DispatchParams): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new Error('Anthropic client not initialized');
    }

    const messages = request.messages
      .filter(m => m.role !== 'system')
      .map(m => ({
        role: m.role === 'assistant' ? ('assistant' as const) : ('user' as const),
        content: m.content
      }));

    const response = await this.anthropicClient.messages.create({
      model: params.model,
      max_tokens: params.maxTokens,
      temperature: params.temperature,
      system: request.systemPrompt || undefined,
      messages
    }, { signal: params.signal });

    const text = response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');

    return {
      content: text,
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens
      },
      finishReason: response.stop_reason || undefined
    };
  }

  /**
   * Call an OpenAI-compatible chat completions API
   */
  private async callOpenAI(request: LLMRequest, params: DispatchParams): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new Error('OpenAI client not initialized');
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];

    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }

    for (const message of request.messages) {
      if (message.role === 'assistant') {
        messages.push({ role: 'assistant', content: message.content });
      } else if (message.role === 'system') {
        messages.push({ role: 'system', content: message.content });
      } else {
        messages.push({ role: 'user', content: message.content });
      }
    }

    const response = await this.openaiClient.chat.completions.create({
      model: params.model,
      messages,
      temperature: params.temperature,
      max_tokens: params.maxTokens
    }, { signal: params.signal });

    const choice = response.choices[0];
    if (!choice || !choice.message.content) {
      throw new Error('No content in OpenAI response');
    }

    return {
      content: choice.message.content,
      model: response.model,
      usage: response.usage
        ? {
            inputTokens: response.usage.prompt_tokens,
            outputTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens
          }
        : undefined,
      finishReason: choice.finish_reason || undefined
    };
  }

  /**
   * Parse JSON response from LLM, handling potential formatting issues
   */
  parseJsonResponse(text: string): unknown {
    return parseJsonResponse(text);
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): { size: number; maxEntries: number; enabled: boolean } {
    return this.cache.getStats();
  }

  getConfig(): LLMConfig {
    return { ...this.config };
  }
}

/**
 * Parse a JSON object out of generated text.
 *
 * Tries, in order: the text with markdown fences removed, the span between
 * the first `{` and the last `}`, and a jsonrepair pass over that span.
 */
export function parseJsonResponse(text: string): unknown {
  const cleanText = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();

  try {
    return JSON.parse(cleanText);
  } catch (error) {
    const firstBrace = text.indexOf('{');
    const lastBrace = text.lastIndexOf('}');
    const candidate = firstBrace !== -1 && lastBrace > firstBrace
      ? text.substring(firstBrace, lastBrace + 1)
      : cleanText;

    try {
      return JSON.parse(candidate);
    } catch {
      // fall through to repair
    }

    try {
      return JSON.parse(jsonrepair(candidate));
    } catch {
      // fall through to detailed error
    }

    const errorMsg = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(
      `Failed to parse LLM response as JSON: ${errorMsg}\n\nResponse preview (first 200 chars):\n${text.substring(0, 200)}`
    );
  }
}

/**
 * Settings accepted by createLLMClient
 */
export interface LLMEnvSettings {
  provider: LLMProvider;
  anthropicApiKey: string;
  openaiApiKey: string;
  baseUrl?: string;
  model?: string;
  timeoutMs: number;
  maxRetries: number;
}

/**
 * Create an LLM client from resolved environment settings
 */
export function createLLMClient(
  settings: LLMEnvSettings,
  cacheConfig?: Partial<CacheConfig>
): LLMClient {
  const apiKey = settings.provider === 'anthropic'
    ? settings.anthropicApiKey
    : settings.openaiApiKey;

  // Local OpenAI-compatible servers accept any key
  const effectiveKey = apiKey || (settings.baseUrl ? 'local' : '');
  if (!effectiveKey) {
    throw new Error(
      `API key not found. Set ${settings.provider === 'anthropic' ? 'ANTHROPIC_API_KEY' : 'OPENAI_API_KEY'} or LLM_BASE_URL.`
    );
  }

  return new LLMClient(
    {
      provider: settings.provider,
      apiKey: effectiveKey,
      baseUrl: settings.baseUrl,
      model: settings.model || DEFAULT_LLM_CONFIG[settings.provider].model,
      timeout: settings.timeoutMs
    },
    cacheConfig,
    { maxAttempts: settings.maxRetries }
  );
}
