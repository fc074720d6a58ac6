/**
 * Skill Infusion
 *
 * Merges extracted keywords into the resume's skills list. Existing skills
 * are never removed or reordered; a candidate is skipped when it matches an
 * existing (or already accepted) skill exactly, or when either contains the
 * other, ignoring case.
 */

import type { KeywordCategory, KeywordMap, ResumeSections } from '../types';

/**
 * Category order used when flattening keywords into candidates
 */
export const INFUSION_PRIORITY: readonly KeywordCategory[] = [
  'technical_skills',
  'programming_languages',
  'technical_tools',
  'data_tools',
  'cloud_technologies',
  'soft_skills'
];

export interface InfuseOptions {
  /** Soft skills are left out unless this is set */
  includeSoftSkills?: boolean;
}

export interface InfusionReport {
  added: string[];
  skipped: string[];
}

/**
 * Flatten a keyword map into infusion candidates, in priority order
 */
export function infusionCandidates(keywords: KeywordMap, options: InfuseOptions = {}): string[] {
  const categories = options.includeSoftSkills
    ? INFUSION_PRIORITY
    : INFUSION_PRIORITY.filter(category => category !== 'soft_skills');

  return categories.flatMap(category => [...keywords[category]]);
}

/**
 * True when two skills are the same or one contains the other (case-insensitive)
 */
export function overlaps(a: string, b: string): boolean {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  if (!left || !right) {
    return false;
  }
  return left.includes(right) || right.includes(left);
}

/**
 * Infuse keywords into `sections.skills` and report what happened.
 * Mutates `sections`.
 */
export function infuseSkillsWithReport(
  sections: ResumeSections,
  keywords: KeywordMap,
  options: InfuseOptions = {}
): InfusionReport {
  const existing = sections.skills ?? [];
  const accepted: string[] = [];
  const skipped: string[] = [];

  for (const candidate of infusionCandidates(keywords, options)) {
    if (!candidate.trim()) continue;

    const known = [...existing, ...accepted];
    if (known.some(skill => overlaps(skill, candidate))) {
      skipped.push(candidate);
    } else {
      accepted.push(candidate);
    }
  }

  if (accepted.length > 0) {
    if (sections.skills) {
      sections.skills.push(...accepted);
    } else {
      sections.skills = accepted.slice();
    }
  }

  return { added: accepted, skipped };
}

/**
 * Infuse keywords into `sections.skills`. Mutates and returns `sections`.
 */
export function infuseSkills(
  sections: ResumeSections,
  keywords: KeywordMap,
  options: InfuseOptions = {}
): ResumeSections {
  infuseSkillsWithReport(sections, keywords, options);
  return sections;
}
