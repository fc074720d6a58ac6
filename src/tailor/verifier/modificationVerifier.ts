/**
 * Modification Verifier
 *
 * Decides whether a tailoring pass changed enough of the resume. Experience,
 * projects and skills are compared entry by entry; a section whose entry
 * count changed counts as sufficiently modified outright.
 */

import { DEFAULT_CONFIG } from '../config';
import { canonicalEntry } from '../rewriter/entries';
import {
  VERIFIED_SECTIONS,
  EntryInput,
  ResumeSections,
  SectionComparison,
  VerificationReport,
  VerifiedSection
} from '../types';

export const DEFAULT_CHANGE_THRESHOLD = DEFAULT_CONFIG.verification.changeThreshold;

function sectionEntries(sections: ResumeSections, section: VerifiedSection): readonly EntryInput[] {
  return sections[section] ?? [];
}

export function compareSection(
  before: readonly EntryInput[],
  after: readonly EntryInput[]
): SectionComparison {
  if (before.length !== after.length) {
    return { compared: 0, changed: 0, ratio: null, lengthMismatch: true };
  }

  let changed = 0;
  before.forEach((entry, index) => {
    if (canonicalEntry(entry) !== canonicalEntry(after[index])) {
      changed++;
    }
  });

  return {
    compared: before.length,
    changed,
    ratio: before.length === 0 ? null : changed / before.length,
    lengthMismatch: false
  };
}

/**
 * Compare two versions of a resume and report per-section change ratios
 */
export function verifyModification(
  before: ResumeSections,
  after: ResumeSections,
  threshold: number = DEFAULT_CHANGE_THRESHOLD
): VerificationReport {
  const compare = (section: VerifiedSection): SectionComparison =>
    compareSection(sectionEntries(before, section), sectionEntries(after, section));

  const sections: Record<VerifiedSection, SectionComparison> = {
    experience: compare('experience'),
    projects: compare('projects'),
    skills: compare('skills')
  };
  let lengthMismatch: VerifiedSection | null = null;
  let compared = 0;
  let changed = 0;

  for (const section of VERIFIED_SECTIONS) {
    const comparison = sections[section];
    if (comparison.lengthMismatch && lengthMismatch === null) {
      lengthMismatch = section;
    }
    compared += comparison.compared;
    changed += comparison.changed;
  }

  const ratio = compared === 0 ? null : changed / compared;
  const sufficient = lengthMismatch !== null || ratio === null || ratio >= threshold;

  return { sufficient, threshold, compared, changed, ratio, lengthMismatch, sections };
}

/**
 * True when `after` differs enough from `before`
 */
export function verify(
  before: ResumeSections,
  after: ResumeSections,
  threshold: number = DEFAULT_CHANGE_THRESHOLD
): boolean {
  return verifyModification(before, after, threshold).sufficient;
}
