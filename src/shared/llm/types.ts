/**
 * Text generation types
 *
 * Providers: Anthropic, and anything that speaks the OpenAI chat
 * completions protocol (hosted or a local server behind `baseUrl`).
 */

export type LLMProvider = 'anthropic' | 'openai';

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Per-attempt budget in milliseconds */
  timeout: number;
  baseUrl?: string;
}

/**
 * Keyword lists and rewritten descriptions are short; a moderate
 * temperature keeps rewrites varied without drifting from the facts.
 */
export const DEFAULT_LLM_CONFIG: Record<LLMProvider, Omit<LLMConfig, 'apiKey'>> = {
  anthropic: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    temperature: 0.5,
    maxTokens: 800,
    timeout: 45000
  },
  openai: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    temperature: 0.5,
    maxTokens: 800,
    timeout: 45000
  }
};

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMRequest {
  messages: LLMMessage[];
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  /** Model override for this request only */
  model?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: TokenUsage;
  finishReason?: string;
}

/**
 * Transport retry policy. `backoffMs[n]` is the wait after failed attempt
 * `n`; past the end of the table `delayMs` applies.
 */
export interface RetryConfig {
  maxAttempts: number;
  delayMs: number;
  backoffMs: number[];
  shouldRetry?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMs: [1000, 2000, 4000]
};

/**
 * Anything that turns a prompt into generated text.
 *
 * Implementations may reject or resolve to an empty string on failure;
 * callers never assume success.
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}
