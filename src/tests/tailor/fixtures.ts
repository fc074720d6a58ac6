/**
 * Shared test fixtures for the tailoring pipeline
 */

import type { TextGenerator } from '../../shared/llm/types';

export const KEYWORD_PROMPT_PREFIX = 'Extract the following categories of keywords';

export const JOB_DESCRIPTION =
  'We are seeking a data analyst with strong Python and SQL skills. ' +
  'Experience with AWS and Tableau is required. Leadership of small teams is a plus.';

/**
 * Generator that records every prompt and answers through a callback
 */
export class StubGenerator implements TextGenerator {
  readonly prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => string | Promise<string>) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt);
  }

  keywordPrompts(): string[] {
    return this.prompts.filter(isKeywordPrompt);
  }

  rewritePrompts(): string[] {
    return this.prompts.filter(prompt => !isKeywordPrompt(prompt));
  }
}

export function isKeywordPrompt(prompt: string): boolean {
  return prompt.startsWith(KEYWORD_PROMPT_PREFIX);
}

/**
 * Content of a labelled prompt block ("CURRENT DESCRIPTION:\n...\n\n")
 */
export function promptSection(prompt: string, label: string): string {
  const marker = `${label.toUpperCase()}:\n`;
  const start = prompt.indexOf(marker);
  if (start === -1) {
    return '';
  }
  const from = start + marker.length;
  const end = prompt.indexOf('\n\n', from);
  return end === -1 ? prompt.slice(from) : prompt.slice(from, end);
}

/**
 * Generator answering keyword prompts with `keywordResponse` and rewrite
 * prompts through `rewrite`
 */
export function keywordAwareGenerator(
  keywordResponse: string,
  rewrite: (prompt: string) => string = prompt =>
    `Delivered measurable results: ${promptSection(prompt, 'Current Description')} using ${promptSection(prompt, 'Keywords')}`
): StubGenerator {
  return new StubGenerator(prompt => (isKeywordPrompt(prompt) ? keywordResponse : rewrite(prompt)));
}

/** Generator whose every call yields an empty string */
export const silentGenerator = (): StubGenerator => new StubGenerator(() => '');

/** Generator whose every call rejects */
export const failingGenerator = (): StubGenerator =>
  new StubGenerator(() => Promise.reject(new Error('generator unavailable')));
