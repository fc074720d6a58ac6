/**
 * LLM Cache
 *
 * Response cache for generation calls. Identical prompts sent during one
 * process lifetime (e.g. a job description extracted by both the HTTP API
 * and a retry) are answered without another network round-trip.
 */

import { createHash } from 'crypto';
import type { LLMResponse } from './types';

/**
 * Fields that identify a request for caching purposes
 */
export interface CacheKey {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  model: string;
}

interface CacheEntry {
  response: LLMResponse;
  timestamp: number;
}

/**
 * Cache configuration
 */
export interface CacheConfig {
  enabled: boolean;
  ttlSeconds: number;
  maxEntries: number;
}

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  ttlSeconds: 3600, // 1 hour
  maxEntries: 500
};

/**
 * LLM response cache. Evicts the least recently used entry when full.
 */
export class LLMCache {
  private entries: Map<string, CacheEntry> = new Map();
  private config: CacheConfig;

  constructor(config: Partial<CacheConfig> = {}) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  private keyFor(key: CacheKey): string {
    const digest = createHash('sha256')
      .update(`${key.systemPrompt}\u0000${key.userPrompt}`)
      .digest('hex');
    return `${key.model}|${key.temperature}|${digest}`;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return (now - entry.timestamp) / 1000 > this.config.ttlSeconds;
  }

  /**
   * Get cached response if available and not expired
   */
  get(key: CacheKey): LLMResponse | null {
    if (!this.config.enabled) {
      return null;
    }

    const id = this.keyFor(key);
    const entry = this.entries.get(id);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry, Date.now())) {
      this.entries.delete(id);
      return null;
    }

    // Re-insert so iteration order tracks recency
    this.entries.delete(id);
    this.entries.set(id, entry);
    return entry.response;
  }

  /**
   * Store response in cache
   */
  set(key: CacheKey, response: LLMResponse): void {
    if (!this.config.enabled) {
      return;
    }

    const id = this.keyFor(key);
    this.entries.delete(id);

    if (this.entries.size >= this.config.maxEntries) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) {
        this.entries.delete(oldest);
      }
    }

    this.entries.set(id, { response, timestamp: Date.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): { size: number; maxEntries: number; enabled: boolean } {
    return {
      size: this.entries.size,
      maxEntries: this.config.maxEntries,
      enabled: this.config.enabled
    };
  }
}
