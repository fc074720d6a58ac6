/**
 * LLM Module
 *
 * Unified LLM client and utilities for Anthropic and OpenAI-compatible endpoints.
 */

export * from './types';
export * from './client';
export * from './cache';
export * from './retry';
export * from './prompts';
