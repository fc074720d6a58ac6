/**
 * Keyword Categories
 *
 * Category header labels, aliases and the heuristic term → category lookup
 * used when keywords come without a category attached.
 */

import categoryHints from '../data/categoryHints.json';
import { KEYWORD_CATEGORIES, KeywordCategory, RawKeywordMap } from '../types';
import { emptyKeywordMap } from './normalizer';

type HintCategory = keyof typeof categoryHints;

/**
 * Human-readable header for each category, as used in prompts and responses
 */
export const CATEGORY_LABELS: Record<KeywordCategory, string> = {
  technical_skills: 'Technical Skills',
  soft_skills: 'Soft Skills',
  programming_languages: 'Programming Languages',
  technical_tools: 'Technical Tools',
  data_tools: 'Data Tools',
  cloud_technologies: 'Cloud Technologies'
};

/**
 * Alternate names accepted in generator output
 */
const CATEGORY_ALIASES: Record<string, KeywordCategory> = {
  programming_knowledge: 'programming_languages',
  programming: 'programming_languages',
  languages: 'programming_languages',
  tools: 'technical_tools',
  cloud: 'cloud_technologies',
  soft: 'soft_skills',
  technical: 'technical_skills'
};

/**
 * Resolve a JSON key or header label ("Technical Skills", "programming_knowledge")
 * to a category, or null if it names none
 */
export function resolveCategory(label: string): KeywordCategory | null {
  const key = label
    .trim()
    .toLowerCase()
    .replace(/[^a-z]+/g, '_')
    .replace(/^_+|_+$/g, '');

  const direct = KEYWORD_CATEGORIES.find(category => category === key);
  if (direct) {
    return direct;
  }
  return CATEGORY_ALIASES[key] ?? null;
}

// Checked in this order; anything unmatched is a technical skill
const HINT_ORDER: readonly HintCategory[] = [
  'cloud_technologies',
  'programming_languages',
  'data_tools',
  'technical_tools',
  'soft_skills'
];

const HINTS: ReadonlyArray<{ category: KeywordCategory; patterns: RegExp[] }> =
  HINT_ORDER.map(category => ({
    category,
    patterns: categoryHints[category].map(hintPattern)
  }));

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word pattern for a hint. Hints like "c++" end in a non-word
 * character, so boundaries are expressed as lookarounds.
 */
function hintPattern(hint: string): RegExp {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(hint)}(?![a-z0-9])`, 'i');
}

/**
 * Assign a term to a category by the hint table
 */
export function categorizeTerm(term: string): KeywordCategory {
  for (const { category, patterns } of HINTS) {
    if (patterns.some(pattern => pattern.test(term))) {
      return category;
    }
  }
  return 'technical_skills';
}

/**
 * Split a flat term list into categories, preserving order
 */
export function categorizeTerms(terms: readonly string[]): RawKeywordMap {
  const result = emptyKeywordMap();

  for (const term of terms) {
    result[categorizeTerm(term)].push(term);
  }
  return result;
}
