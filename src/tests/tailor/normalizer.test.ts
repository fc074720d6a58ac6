/**
 * Tests for Keyword Normalization
 *
 * Qualifier stripping, synonym mapping, title casing, deduplication and
 * the category substring invariant.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import synonymTable from '../../tailor/data/synonyms.json';
import {
  canonicalize,
  cleanKeyword,
  enforceCategoryInvariant,
  finalizeKeywordMap,
  flattenKeywordMap,
  hasKeywords,
  normalizeKeywords,
  stripQualifiers
} from '../../tailor/keywords/normalizer';
import { KEYWORD_CATEGORIES } from '../../tailor/types';

describe('Keyword Normalization', () => {
  describe('cleanKeyword', () => {
    it('should lowercase, trim and collapse whitespace', () => {
      expect(cleanKeyword('  Data   Analysis\t')).toBe('data analysis');
    });
  });

  describe('stripQualifiers', () => {
    it('should strip qualifiers at either end until stable', () => {
      expect(stripQualifiers('knowledge of machine learning plus')).toBe('machine learning');
      expect(stripQualifiers('experience with docker')).toBe('docker');
      expect(stripQualifiers('sql skills')).toBe('sql');
    });

    it('should not strip a qualifier that is the whole term', () => {
      expect(stripQualifiers('skills')).toBe('skills');
    });
  });

  describe('canonicalize', () => {
    it('should map known synonyms to their canonical spelling', () => {
      expect(canonicalize('  Python Programming ')).toBe('Python');
      expect(canonicalize('js')).toBe('JavaScript');
      expect(canonicalize('SQL skills')).toBe('SQL');
    });

    it('should title-case unknown terms and keep acronyms upper case', () => {
      expect(canonicalize('experience with Docker')).toBe('Docker');
      expect(canonicalize('aws lambda')).toBe('AWS Lambda');
      expect(canonicalize('api integration')).toBe('API Integration');
    });

    it('should return an empty string for blank input', () => {
      expect(canonicalize('   ')).toBe('');
    });

    it('should leave every synonym target unchanged', () => {
      for (const canonical of Object.values(synonymTable)) {
        expect(canonicalize(canonical)).toBe(canonical);
      }
    });

    it('should be idempotent', () => {
      const phrase = fc.oneof(
        fc.constantFrom(
          'Python programming',
          'experience with docker',
          'strong communication skills',
          'knowledge of aws',
          'ci/cd pipelines',
          'Power BI'
        ),
        fc.stringOf(fc.constantFrom('a', 'b', 'k', 'q', 'z', ' ', '-', '+', '/'), { maxLength: 20 }),
        fc.fullUnicodeString({ maxLength: 20 })
      );

      fc.assert(
        fc.property(phrase, raw => {
          const once = canonicalize(raw);
          expect(canonicalize(once)).toBe(once);
        })
      );
    });

    it('should leave words whose first letter upper-cases to several characters', () => {
      expect(canonicalize('ŉode')).toBe('ŉode');
      expect(canonicalize('ßtraße')).toBe('ßtraße');
      expect(canonicalize('ſql')).toBe('ſql');
      expect(canonicalize('éclair')).toBe('Éclair');
    });

  });

  describe('normalizeKeywords', () => {
    it('should drop blanks and keep the first of case-insensitive duplicates', () => {
      expect(
        normalizeKeywords(['Python', 'python programming', '', '  ', 'SQL skills', 'sql'])
      ).toEqual(['Python', 'SQL']);
    });

    it('should sort alphabetically when asked', () => {
      expect(normalizeKeywords(['tableau', 'Excel', 'aws'], { sort: true })).toEqual([
        'AWS',
        'Excel',
        'Tableau'
      ]);
    });

    it('should be idempotent over arbitrary text', () => {
      fc.assert(
        fc.property(fc.array(fc.fullUnicodeString({ maxLength: 16 }), { maxLength: 8 }), raw => {
          const once = normalizeKeywords(raw);
          expect(normalizeKeywords(once)).toEqual(once);
        })
      );
    });

    it('should keep keywords starting with ŉ stable', () => {
      const once = normalizeKeywords(['ŉode']);

      expect(once).toEqual(['ŉode']);
      expect(normalizeKeywords(once)).toEqual(once);
    });
  });

  describe('enforceCategoryInvariant', () => {
    it('should keep the longer of two overlapping entries at the earliest position', () => {
      expect(enforceCategoryInvariant(['Java', 'Python', 'JavaScript', 'Script'])).toEqual([
        'JavaScript',
        'Python'
      ]);
    });

    it('should keep entries that overlap only partially', () => {
      expect(enforceCategoryInvariant(['SQL', 'PostgreSQL', 'SQL Server'])).toEqual([
        'PostgreSQL',
        'SQL Server'
      ]);
    });

    it('should never leave one entry inside another', () => {
      fc.assert(
        fc.property(
          fc.array(fc.constantFrom('Java', 'JavaScript', 'SQL', 'MySQL', 'R', 'Ruby', 'Go', 'Cargo')),
          list => {
            const result = enforceCategoryInvariant(list);
            result.forEach((a, i) =>
              result.forEach((b, j) => {
                if (i !== j) {
                  expect(b.toLowerCase().includes(a.toLowerCase())).toBe(false);
                }
              })
            );
          }
        )
      );
    });
  });

  describe('finalizeKeywordMap', () => {
    it('should fill missing categories, cap lists and freeze the result', () => {
      const map = finalizeKeywordMap(
        { data_tools: ['excel', 'tableau', 'looker', 'metabase'] },
        2
      );

      expect(map.data_tools).toEqual(['Excel', 'Tableau']);
      expect(map.soft_skills).toEqual([]);
      expect(Object.keys(map).sort()).toEqual([...KEYWORD_CATEGORIES].sort());
      expect(Object.isFrozen(map)).toBe(true);
      expect(Object.isFrozen(map.data_tools)).toBe(true);
    });
  });

  describe('flattenKeywordMap', () => {
    it('should follow the given category order and drop repeats', () => {
      const map = finalizeKeywordMap(
        { soft_skills: ['Leadership'], data_tools: ['Excel', 'SQL'], programming_languages: ['sql'] },
        7
      );

      expect(flattenKeywordMap(map, ['programming_languages', 'data_tools', 'soft_skills'])).toEqual([
        'SQL',
        'Excel',
        'Leadership'
      ]);
    });
  });

  describe('hasKeywords', () => {
    it('should detect whether any category is non-empty', () => {
      expect(hasKeywords({})).toBe(false);
      expect(hasKeywords({ cloud_technologies: ['AWS'] })).toBe(true);
    });
  });
});
