/**
 * Entry rewrite prompts
 */

import { buildStructuredPrompt } from '../../shared/llm/prompts';
import type { RewriteMode, TailoredSection } from '../types';

export interface RewritePromptInput {
  section: TailoredSection;
  anchor: string;
  description: string;
  jobDescription: string;
  keywords: readonly string[];
  mode: RewriteMode;
}

const ENTRY_NOUN: Record<TailoredSection, string> = {
  experience: 'work experience entry',
  projects: 'project entry'
};

const STANDARD_INSTRUCTIONS = [
  'Incorporate the most relevant keywords naturally; do not list them.',
  'Be specific and quantitative where the original supports it.',
  'Make the description meaningfully different from the original.',
  'Keep every fact accurate: do not invent employers, titles, dates, tools or numbers.',
  'Use action verbs and professional resume language.'
];

const ESCALATED_INSTRUCTIONS = [
  'The previous rewrite was too close to the original. Substantially restructure this description.',
  'Change the sentence structure and wording throughout; a light edit is not acceptable.',
  'Lead with the outcome or impact, then the method.',
  'Work in keywords that the current text does not yet use.',
  'Keep every fact accurate: do not invent employers, titles, dates, tools or numbers.'
];

/**
 * Build the rewrite prompt for one entry. Only the description is rewritten;
 * the anchor is shown for context and must not appear altered.
 */
export function buildRewritePrompt(input: RewritePromptInput): string {
  const noun = ENTRY_NOUN[input.section];

  return buildStructuredPrompt(
    `You are an expert resume writer. Rewrite the description of this ${noun} so it aligns with the job description.`,
    [
      { label: 'Anchor (do not alter)', content: input.anchor },
      { label: 'Job Description', content: input.jobDescription },
      { label: 'Current Description', content: input.description },
      { label: 'Keywords', content: input.keywords.join(', ') }
    ],
    [
      `Do not alter or repeat the anchor "${input.anchor.trim()}"; it is kept as is.`,
      ...(input.mode === 'escalated' ? ESCALATED_INSTRUCTIONS : STANDARD_INSTRUCTIONS)
    ],
    'Return ONLY the rewritten description as plain text, with no labels, quotes or commentary.'
  );
}
