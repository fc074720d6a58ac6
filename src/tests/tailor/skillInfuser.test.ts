/**
 * Tests for Skill Infusion
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  infuseSkills,
  infuseSkillsWithReport,
  infusionCandidates,
  overlaps
} from '../../tailor/infuser/skillInfuser';
import { finalizeKeywordMap } from '../../tailor/keywords/normalizer';
import type { ResumeSections } from '../../tailor/types';

const keywords = finalizeKeywordMap(
  {
    programming_languages: ['Python', 'SQL'],
    cloud_technologies: ['AWS'],
    data_tools: ['Tableau'],
    soft_skills: ['Leadership'],
    technical_skills: ['Data Analysis']
  },
  7
);

describe('Skill Infusion', () => {
  describe('infusionCandidates', () => {
    it('should order candidates by category priority and leave out soft skills', () => {
      expect(infusionCandidates(keywords)).toEqual(['Data Analysis', 'Python', 'SQL', 'Tableau', 'AWS']);
    });

    it('should append soft skills last when included', () => {
      expect(infusionCandidates(keywords, { includeSoftSkills: true }).at(-1)).toBe('Leadership');
    });
  });

  describe('overlaps', () => {
    it('should match containment in either direction, ignoring case', () => {
      expect(overlaps('Advanced SQL', 'sql')).toBe(true);
      expect(overlaps('AWS', 'aws lambda')).toBe(true);
      expect(overlaps('Python', 'Tableau')).toBe(false);
      expect(overlaps('', 'Python')).toBe(false);
    });
  });

  describe('infuseSkillsWithReport', () => {
    it('should append new skills after the existing ones', () => {
      const sections: ResumeSections = { skills: ['Advanced SQL', 'Excel'] };

      const report = infuseSkillsWithReport(sections, keywords);

      expect(sections.skills).toEqual(['Advanced SQL', 'Excel', 'Data Analysis', 'Python', 'Tableau', 'AWS']);
      expect(report.added).toEqual(['Data Analysis', 'Python', 'Tableau', 'AWS']);
      expect(report.skipped).toEqual(['SQL']);
    });

    it('should create the skills list when the resume has none', () => {
      const sections: ResumeSections = { summary: 'Analyst' };

      infuseSkills(sections, keywords, { includeSoftSkills: true });

      expect(sections.skills).toEqual(['Data Analysis', 'Python', 'SQL', 'Tableau', 'AWS', 'Leadership']);
    });

    it('should leave sections untouched when nothing is new', () => {
      const sections: ResumeSections = { summary: 'Analyst' };
      const empty = finalizeKeywordMap({}, 7);

      const report = infuseSkillsWithReport(sections, empty);

      expect(sections).toEqual({ summary: 'Analyst' });
      expect(report.added).toEqual([]);
    });

    it('should never remove or reorder existing skills', () => {
      fc.assert(
        fc.property(
          fc.array(fc.constantFrom('Python', 'Excel', 'Go', 'Communication', 'AWS Glue', 'R')),
          existing => {
            const sections: ResumeSections = { skills: [...existing] };
            infuseSkills(sections, keywords, { includeSoftSkills: true });

            expect(sections.skills?.slice(0, existing.length)).toEqual(existing);
            const added = sections.skills?.slice(existing.length) ?? [];
            for (const skill of added) {
              expect(existing.some(e => overlaps(e, skill))).toBe(false);
            }
          }
        )
      );
    });
  });
});
