/**
 * Environment Configuration
 *
 * Loads environment variables into a typed configuration object for the
 * HTTP server, the CLI and the LLM client.
 *
 * Usage:
 *   import { config } from './config';
 *   console.log(config.server.port);
 */

import 'dotenv/config';
import { createLLMClient, LLMClient } from '../shared/llm/client';
import { DEFAULT_LLM_CONFIG, DEFAULT_RETRY_CONFIG, LLMProvider } from '../shared/llm/types';

// =============================================================================
// Types
// =============================================================================

export type NodeEnv = 'development' | 'production' | 'test';

export interface ServerConfig {
  port: number;
  nodeEnv: NodeEnv;
  isDevelopment: boolean;
  isProduction: boolean;
  isTest: boolean;
  /** Maximum accepted JSON body size, e.g. "1mb" */
  bodyLimit: string;
}

export interface LLMSettings {
  provider: LLMProvider;
  anthropicApiKey: string;
  openaiApiKey: string;
  hasAnthropicKey: boolean;
  hasOpenaiKey: boolean;
  baseUrl?: string;
  model?: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface CorsConfig {
  origins: string[];
}

export interface Config {
  server: ServerConfig;
  llm: LLMSettings;
  cors: CorsConfig;
}

// =============================================================================
// Validation Helpers
// =============================================================================

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Env = NodeJS.ProcessEnv;

function getEnv(env: Env, key: string): string {
  return env[key] || '';
}

function getEnvWithDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

/**
 * Get a non-negative numeric environment variable
 */
function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new ConfigurationError(
      `Invalid numeric value for ${key}: "${value}". Expected a non-negative number.`
    );
  }
  return parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string[] {
  if (!value) return [];
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

function parseLLMProvider(value: string): LLMProvider {
  if (value === 'openai') return 'openai';
  return 'anthropic';
}

function parseNodeEnv(value: string): NodeEnv {
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

// =============================================================================
// Configuration Loader
// =============================================================================

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = parseNodeEnv(getEnvWithDefault(env, 'NODE_ENV', 'development'));

  const anthropicApiKey = getEnv(env, 'ANTHROPIC_API_KEY');
  const openaiApiKey = getEnv(env, 'OPENAI_API_KEY');
  const hasAnthropicKey = !!anthropicApiKey;
  const hasOpenaiKey = !!openaiApiKey;
  const baseUrl = getEnv(env, 'LLM_BASE_URL') || undefined;

  // Prefer the provider that has a key. A base URL means an OpenAI-compatible server.
  let provider = parseLLMProvider(getEnvWithDefault(env, 'LLM_PROVIDER', 'anthropic'));
  if (provider === 'anthropic' && !hasAnthropicKey && (hasOpenaiKey || baseUrl)) {
    provider = 'openai';
  }

  return {
    server: {
      port: getEnvNumber(env, 'PORT', 3001),
      nodeEnv,
      isDevelopment: nodeEnv === 'development',
      isProduction: nodeEnv === 'production',
      isTest: nodeEnv === 'test',
      bodyLimit: getEnvWithDefault(env, 'BODY_LIMIT', '1mb'),
    },

    llm: {
      provider,
      anthropicApiKey,
      openaiApiKey,
      hasAnthropicKey,
      hasOpenaiKey,
      baseUrl,
      model: getEnv(env, 'LLM_MODEL') || undefined,
      timeoutMs: getEnvNumber(env, 'LLM_TIMEOUT_MS', DEFAULT_LLM_CONFIG[provider].timeout),
      maxRetries: getEnvNumber(env, 'LLM_MAX_RETRIES', DEFAULT_RETRY_CONFIG.maxAttempts),
    },

    cors: {
      origins: parseCorsOrigins(
        getEnvWithDefault(env, 'CORS_ORIGINS', 'http://localhost:5173,http://localhost:3000')
      ),
    },
  };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate settings needed to reach a text generator
 * Throws ConfigurationError listing every problem
 */
export function validateLLMSettings(settings: LLMSettings): void {
  const errors: string[] = [];

  if (!settings.hasAnthropicKey && !settings.hasOpenaiKey && !settings.baseUrl) {
    errors.push(
      'An LLM API key is required (ANTHROPIC_API_KEY or OPENAI_API_KEY), or LLM_BASE_URL for a local server'
    );
  }
  if (settings.maxRetries < 1) {
    errors.push('LLM_MAX_RETRIES must be at least 1');
  }
  if (settings.timeoutMs < 1) {
    errors.push('LLM_TIMEOUT_MS must be at least 1');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      'Configuration validation failed:\n' +
      errors.map(e => `  - ${e}`).join('\n')
    );
  }
}

/**
 * Build the LLM client described by the environment
 */
export function createLLMClientFromConfig(settings: LLMSettings = config.llm): LLMClient {
  validateLLMSettings(settings);
  return createLLMClient(settings);
}

// =============================================================================
// Export
// =============================================================================

/**
 * Application configuration loaded from environment variables
 */
export const config: Config = loadConfig();

export { ConfigurationError };
