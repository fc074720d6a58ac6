/**
 * Keyword extraction prompt
 */

import { buildStructuredPrompt } from '../../shared/llm/prompts';
import { KEYWORD_CATEGORIES } from '../types';
import { CATEGORY_LABELS } from './categories';

const CATEGORY_LIST = KEYWORD_CATEGORIES
  .map((category, i) => `${i + 1}. ${CATEGORY_LABELS[category]} (key: "${category}")`)
  .join('\n');

const JSON_FORMAT = `{
${KEYWORD_CATEGORIES.map(category => `  "${category}": ["keyword1", "keyword2"]`).join(',\n')}
}`;

/**
 * Build the categorization prompt for a job description
 */
export function buildKeywordPrompt(jobDescription: string, perCategory: number): string {
  const minimum = Math.max(1, perCategory - 2);

  return buildStructuredPrompt(
    'Extract the following categories of keywords from the job description.',
    [
      { label: 'Job Description', content: jobDescription },
      { label: 'Categories', content: CATEGORY_LIST }
    ],
    [
      `Provide the top ${minimum}-${perCategory} keywords for each category.`,
      'Use short skill names ("Python", "Data Visualization"), not sentences.',
      'Do not repeat a keyword within a category.',
      'If a category has no relevant items in the description, return an empty list for it.',
      'Return only the JSON object, with no commentary.'
    ],
    JSON_FORMAT
  );
}
