/**
 * Keyword Extraction Strategies
 *
 * Each strategy turns a job description (and, for the generator-backed
 * strategies, one shared generator response) into an uncategorized or
 * categorized keyword list. Strategies return null when they have nothing
 * usable; the extractor then moves on to the next one.
 */

import { parseJsonResponse } from '../../shared/llm/client';
import { KeywordCategory, RawKeywordMap } from '../types';
import { GeneratedKeywordsSchema, GeneratedKeywordValueSchema } from '../validation/schemas';
import { categorizeTerms, resolveCategory } from './categories';
import { emptyKeywordMap, hasKeywords } from './normalizer';
import { extractStatisticalTerms } from './statistical';

/**
 * Shared state for one extraction run
 */
export interface ExtractionContext {
  jobDescription: string;
  /**
   * Generator response for the categorization prompt. Requested at most once
   * per run; resolves to null when generation failed or the response was too short.
   */
  response(): Promise<string | null>;
}

export interface ExtractionStrategy {
  readonly name: string;
  extract(context: ExtractionContext): Promise<RawKeywordMap | null>;
}

function append(map: RawKeywordMap, category: KeywordCategory, values: readonly string[]): void {
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) {
      map[category].push(trimmed);
    }
  }
}

/**
 * Parse the response as a JSON object of category → keywords.
 * Values may be arrays or comma-separated strings.
 */
export class JsonResponseStrategy implements ExtractionStrategy {
  readonly name = 'json';

  async extract(context: ExtractionContext): Promise<RawKeywordMap | null> {
    const response = await context.response();
    if (response === null || !response.includes('{')) {
      return null;
    }
    return parseJsonKeywords(response);
  }
}

/**
 * @throws Error when the text holds no JSON object
 */
export function parseJsonKeywords(text: string): RawKeywordMap | null {
  let parsed = GeneratedKeywordsSchema.parse(parseJsonResponse(text));

  // Some models wrap the map: { "keywords": { ... } }
  const wrapped = GeneratedKeywordsSchema.safeParse(parsed.keywords);
  if (wrapped.success) {
    parsed = wrapped.data;
  }

  const result = emptyKeywordMap();
  for (const [key, value] of Object.entries(parsed)) {
    const category = resolveCategory(key);
    if (!category) continue;

    const values = GeneratedKeywordValueSchema.safeParse(value);
    if (values.success) {
      append(result, category, values.data);
    }
  }

  return hasKeywords(result) ? result : null;
}

/**
 * Parse the response line by line using category headers
 * ("Technical Skills: a, b"), tolerating bullets, numbering and ** markers
 */
export class HeaderLineStrategy implements ExtractionStrategy {
  readonly name = 'header-lines';

  async extract(context: ExtractionContext): Promise<RawKeywordMap | null> {
    const response = await context.response();
    if (response === null) {
      return null;
    }
    return parseHeaderLines(response);
  }
}

const BULLET_PREFIX = /^\s*(?:[-*•]+|\d+[.)])\s*/;
const HEADER_LINE = /^([A-Za-z][A-Za-z _/&-]*?)\s*:\s*(.*)$/;

export function parseHeaderLines(text: string): RawKeywordMap | null {
  const result = emptyKeywordMap();
  let current: KeywordCategory | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const isBullet = BULLET_PREFIX.test(rawLine);
    const line = rawLine
      .replace(BULLET_PREFIX, '')
      .replace(/^#+\s*/, '')
      .replace(/\*\*|__/g, '')
      .trim();

    if (!line) {
      continue;
    }

    const header = HEADER_LINE.exec(line);
    const category = header ? resolveCategory(header[1]) : null;
    if (header && category) {
      current = category;
      append(result, category, header[2].split(','));
      continue;
    }

    // Items listed under a header with an empty value
    if (current && isBullet) {
      append(result, current, line.split(','));
      continue;
    }

    current = null;
  }

  return hasKeywords(result) ? result : null;
}

/**
 * Deterministic extraction from the job description itself
 */
export class StatisticalStrategy implements ExtractionStrategy {
  readonly name = 'statistical';

  constructor(private readonly phraseLimit = 15) {}

  async extract(context: ExtractionContext): Promise<RawKeywordMap | null> {
    const terms = extractStatisticalTerms(context.jobDescription, this.phraseLimit);
    const result = categorizeTerms(terms);
    return hasKeywords(result) ? result : null;
  }
}

/**
 * Default strategy chain, in the order they are tried
 */
export function defaultStrategies(): ExtractionStrategy[] {
  return [new JsonResponseStrategy(), new HeaderLineStrategy(), new StatisticalStrategy()];
}
