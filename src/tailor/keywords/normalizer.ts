/**
 * Keyword Normalizer
 *
 * Canonicalizes raw keyword strings: strips qualifier phrases, maps known
 * synonyms to their canonical spelling, title-cases everything else and
 * removes case-insensitive duplicates. Pure, no I/O.
 */

import synonymTable from '../data/synonyms.json';
import qualifierList from '../data/qualifiers.json';
import {
  KEYWORD_CATEGORIES,
  KeywordCategory,
  KeywordMap,
  RawKeywordMap
} from '../types';

const SYNONYMS: ReadonlyMap<string, string> = new Map(Object.entries(synonymTable));

// Longest first so "skills in" is tried before "skills"
const QUALIFIERS: readonly string[] = [...qualifierList].sort((a, b) => b.length - a.length);

const ACRONYMS: ReadonlySet<string> = new Set(['AWS', 'GCP', 'ETL', 'API', 'UI', 'UX', 'CI/CD']);

export interface NormalizeOptions {
  /** Sort the output alphabetically instead of first-occurrence order */
  sort?: boolean;
}

/**
 * Lowercase, trim and collapse internal whitespace
 */
export function cleanKeyword(raw: string): string {
  return raw.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Strip qualifier phrases anchored at either end, repeatedly until stable.
 * A qualifier only matches as a whole phrase: followed by a space at the
 * start, preceded by a space at the end.
 */
export function stripQualifiers(term: string): string {
  let current = term;
  let changed = true;

  while (changed) {
    changed = false;
    for (const qualifier of QUALIFIERS) {
      if (current.startsWith(`${qualifier} `)) {
        current = current.slice(qualifier.length + 1).trim();
        changed = true;
      }
      if (current.endsWith(` ${qualifier}`)) {
        current = current.slice(0, current.length - qualifier.length - 1).trim();
        changed = true;
      }
    }
  }

  return current;
}

function titleCaseWord(word: string): string {
  const upper = word.toUpperCase();
  if (ACRONYMS.has(upper)) {
    return upper;
  }
  const [first = '', ...rest] = word;
  const head = first.toUpperCase();
  // Letters such as ß and ŉ upper-case to several characters; leave those words alone
  if ([...head].length !== 1 || head.toLowerCase() !== first) {
    return word;
  }
  return head + rest.join('').toLowerCase();
}

/**
 * Canonical form of a single keyword, or '' when nothing is left
 */
export function canonicalize(raw: string): string {
  const stripped = stripQualifiers(cleanKeyword(raw));
  if (!stripped) {
    return '';
  }

  const canonical = SYNONYMS.get(stripped);
  if (canonical !== undefined) {
    return canonical;
  }

  return stripped.split(' ').map(titleCaseWord).join(' ');
}

/**
 * Normalize a list of raw keywords.
 *
 * Blank entries are dropped; duplicates (case-insensitive, after
 * canonicalization) keep their first occurrence.
 */
export function normalizeKeywords(
  raw: readonly string[],
  options: NormalizeOptions = {}
): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const keyword of raw) {
    if (!keyword || !keyword.trim()) continue;

    const canonical = canonicalize(keyword);
    const key = canonical.toLowerCase();
    if (!canonical || seen.has(key)) continue;

    seen.add(key);
    result.push(canonical);
  }

  if (options.sort) {
    result.sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
  }

  return result;
}

/**
 * Remove entries that are a strict case-insensitive substring of another
 * entry. The longer entry survives, at the earliest position held by either.
 */
export function enforceCategoryInvariant(list: readonly string[]): string[] {
  const result: string[] = [];

  for (const candidate of list) {
    const lower = candidate.toLowerCase();

    // Already covered by something at least as specific
    if (result.some(existing => existing.toLowerCase().includes(lower))) {
      continue;
    }

    const absorbed = result.findIndex(existing => lower.includes(existing.toLowerCase()));
    if (absorbed === -1) {
      result.push(candidate);
      continue;
    }

    // Replace the first shorter entry in place and drop any others it contains
    result[absorbed] = candidate;
    for (let i = result.length - 1; i > absorbed; i--) {
      if (lower.includes(result[i].toLowerCase())) {
        result.splice(i, 1);
      }
    }
  }

  return result;
}

/**
 * Create a map with every category present and empty
 */
export function emptyKeywordMap(): RawKeywordMap {
  return {
    technical_skills: [],
    soft_skills: [],
    programming_languages: [],
    technical_tools: [],
    data_tools: [],
    cloud_technologies: []
  };
}

/**
 * Normalize, cap and freeze every category of a raw map.
 * Categories missing from `raw` come out empty.
 */
export function finalizeKeywordMap(
  raw: Partial<Record<KeywordCategory, readonly string[]>>,
  cap: number
): KeywordMap {
  const result = emptyKeywordMap();

  for (const category of KEYWORD_CATEGORIES) {
    const normalized = enforceCategoryInvariant(normalizeKeywords(raw[category] ?? []));
    result[category] = normalized.slice(0, cap);
  }

  for (const category of KEYWORD_CATEGORIES) {
    Object.freeze(result[category]);
  }
  return Object.freeze(result);
}

/**
 * Flatten a map into one deduplicated list in the given category order
 */
export function flattenKeywordMap(
  keywords: KeywordMap,
  order: readonly KeywordCategory[] = KEYWORD_CATEGORIES
): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const category of order) {
    for (const keyword of keywords[category]) {
      const key = keyword.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      result.push(keyword);
    }
  }

  return result;
}

/**
 * True when at least one category holds a keyword
 */
export function hasKeywords(keywords: Partial<Record<KeywordCategory, readonly string[]>>): boolean {
  return KEYWORD_CATEGORIES.some(category => (keywords[category]?.length ?? 0) > 0);
}
