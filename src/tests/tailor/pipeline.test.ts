/**
 * Tests for the Tailoring Pipeline
 *
 * End-to-end runs with stub generators: keyword infusion, anchor
 * preservation, the single escalated pass and structural errors.
 */

import { describe, it, expect } from 'vitest';
import { TailoringPipeline, hasUsableSection } from '../../tailor/pipeline';
import { PipelineError, PipelineErrorCode } from '../../tailor/errors/types';
import { LogType } from '../../tailor/logging/logger';
import type { ResumeSections, ResumeTextParser, TextExtractor } from '../../tailor/types';
import {
  JOB_DESCRIPTION,
  StubGenerator,
  failingGenerator,
  isKeywordPrompt,
  keywordAwareGenerator,
  silentGenerator
} from './fixtures';

const KEYWORD_JSON =
  '{"programming_languages": ["Python", "SQL"], "cloud_technologies": ["AWS"], "soft_skills": ["Leadership"]}';

function parserFor(sections: ResumeSections): ResumeTextParser {
  return { parse: () => structuredClone(sections) };
}

async function expectPipelineError(promise: Promise<unknown>, code: PipelineErrorCode): Promise<void> {
  const error = await promise.then(
    () => null,
    (err: unknown) => err
  );
  expect(error).toBeInstanceOf(PipelineError);
  if (error instanceof PipelineError) {
    expect(error.code).toBe(code);
  }
}

describe('Tailoring Pipeline', () => {
  describe('tailorSections', () => {
    it('should infuse skills and rewrite descriptions behind the original anchor', async () => {
      const generator = keywordAwareGenerator(KEYWORD_JSON);
      const pipeline = new TailoringPipeline({ generator, parser: parserFor({}) });
      const input: ResumeSections = { skills: ['SQL'], experience: ['Acme Corp: Built reports'] };

      const result = await pipeline.tailorSections(input, JOB_DESCRIPTION, { jobId: 'job-42' });

      expect(result.sections.skills).toEqual(['SQL', 'Python', 'AWS']);
      expect(result.sections.experience).toEqual([
        'Acme Corp: Delivered measurable results: Built reports using Python, SQL, AWS, Leadership'
      ]);
      expect(result.extractionStrategy).toBe('json');
      expect(result.path).toBe('VERIFIED_OK');
      expect(result.escalated).toBe(false);
      expect(result.states).toEqual(['INITIAL', 'TAILORED', 'VERIFIED_OK', 'FINAL']);
      expect(result.verification.lengthMismatch).toBe('skills');
      expect(result.context.jobId).toBe('job-42');
      expect(generator.keywordPrompts()).toHaveLength(1);
    });

    it('should not modify its input', async () => {
      const pipeline = new TailoringPipeline({ generator: keywordAwareGenerator(KEYWORD_JSON), parser: parserFor({}) });
      const input: ResumeSections = { skills: ['SQL'], experience: ['Acme Corp: Built reports'] };

      await pipeline.tailorSections(input, JOB_DESCRIPTION);

      expect(input).toEqual({ skills: ['SQL'], experience: ['Acme Corp: Built reports'] });
    });

    it('should add soft skills only when configured to', async () => {
      const pipeline = new TailoringPipeline(
        { generator: keywordAwareGenerator(KEYWORD_JSON), parser: parserFor({}) },
        { infusion: { includeSoftSkills: true } }
      );

      const result = await pipeline.tailorSections({ skills: ['SQL'] }, JOB_DESCRIPTION);

      expect(result.sections.skills).toEqual(['SQL', 'Python', 'AWS', 'Leadership']);
    });

    it('should run one escalated pass when the first pass changed too little', async () => {
      const generator = keywordAwareGenerator(KEYWORD_JSON, prompt =>
        prompt.includes('Substantially restructure') ? 'Completely restructured description for the role' : ''
      );
      const pipeline = new TailoringPipeline({ generator, parser: parserFor({}) });
      const input: ResumeSections = {
        skills: ['Python', 'SQL', 'AWS'],
        experience: ['A: one', 'B: two', 'C: three']
      };

      const result = await pipeline.tailorSections(input, JOB_DESCRIPTION);

      expect(result.path).toBe('FORCE_RETRY');
      expect(result.escalated).toBe(true);
      expect(result.states).toEqual(['INITIAL', 'TAILORED', 'FORCE_RETRY', 'FINAL']);
      expect(result.sections.experience).toEqual([
        'A: Completely restructured description for the role',
        'B: Completely restructured description for the role',
        'C: Completely restructured description for the role'
      ]);
      expect(result.verification).toMatchObject({ compared: 6, changed: 3, ratio: 0.5, sufficient: true });
      expect(generator.rewritePrompts()).toHaveLength(6);
    });

    it('should accept the escalated result even when it is still insufficient', async () => {
      const generator = keywordAwareGenerator(KEYWORD_JSON, () => '');
      const pipeline = new TailoringPipeline({ generator, parser: parserFor({}) });
      const input: ResumeSections = { skills: ['Python', 'SQL', 'AWS'], experience: ['A: one'] };

      const result = await pipeline.tailorSections(input, JOB_DESCRIPTION);

      expect(result.path).toBe('FORCE_RETRY');
      expect(result.verification.sufficient).toBe(false);
      expect(result.sections).toEqual(input);
      expect(generator.rewritePrompts()).toHaveLength(2);
    });

    it('should complete when every generator call fails', async () => {
      const pipeline = new TailoringPipeline({ generator: failingGenerator(), parser: parserFor({}) });
      const input: ResumeSections = { experience: ['Acme Corp: Built reports'] };

      const result = await pipeline.tailorSections(input, JOB_DESCRIPTION);

      expect(result.extractionStrategy).toBe('statistical');
      expect(result.sections.experience).toEqual(['Acme Corp: Built reports']);
      expect(result.sections.skills).toContain('Python');
    });

    it('should reject sections without content', async () => {
      const pipeline = new TailoringPipeline({ generator: silentGenerator(), parser: parserFor({}) });

      await expectPipelineError(
        pipeline.tailorSections({ skills: [], name: '  ' }, JOB_DESCRIPTION),
        PipelineErrorCode.UNPARSEABLE_RESUME
      );
    });
  });

  describe('run', () => {
    it('should parse text and tailor the result', async () => {
      const generator = keywordAwareGenerator(KEYWORD_JSON);
      const pipeline = new TailoringPipeline({
        generator,
        parser: parserFor({ experience: ['Acme Corp: Built reports'] })
      });

      const result = await pipeline.run('any resume text', JOB_DESCRIPTION);

      expect(result.sections.skills).toEqual(['Python', 'SQL', 'AWS']);
    });

    it('should reject blank resume text', async () => {
      const pipeline = new TailoringPipeline({ generator: silentGenerator(), parser: parserFor({}) });

      await expectPipelineError(pipeline.run(' \n ', JOB_DESCRIPTION), PipelineErrorCode.EMPTY_RESUME_TEXT);
    });

    it('should wrap parser failures', async () => {
      const parser: ResumeTextParser = {
        parse: () => {
          throw new Error('bad layout');
        }
      };
      const pipeline = new TailoringPipeline({ generator: silentGenerator(), parser });

      await expectPipelineError(pipeline.run('text', JOB_DESCRIPTION), PipelineErrorCode.UNPARSEABLE_RESUME);
    });
  });

  describe('runFromFile', () => {
    const deps = { generator: silentGenerator(), parser: parserFor({ summary: 'Analyst' }) };

    it('should require an extractor', async () => {
      await expectPipelineError(
        new TailoringPipeline(deps).runFromFile('resume.pdf', JOB_DESCRIPTION),
        PipelineErrorCode.CONFIGURATION_ERROR
      );
    });

    it('should wrap extraction failures', async () => {
      const extractor: TextExtractor = { extract: () => Promise.reject(new Error('corrupt file')) };

      await expectPipelineError(
        new TailoringPipeline({ ...deps, extractor }).runFromFile('resume.pdf', JOB_DESCRIPTION),
        PipelineErrorCode.FILE_EXTRACTION_FAILED
      );
    });

    it('should reject files without text', async () => {
      const extractor: TextExtractor = { extract: async () => '   ' };

      await expectPipelineError(
        new TailoringPipeline({ ...deps, extractor }).runFromFile('scan.pdf', JOB_DESCRIPTION),
        PipelineErrorCode.EMPTY_RESUME_TEXT
      );
    });

    it('should tailor extracted text', async () => {
      const extractor: TextExtractor = { extract: async () => 'Analyst' };

      const result = await new TailoringPipeline({ ...deps, extractor }).runFromFile('resume.txt', JOB_DESCRIPTION);

      expect(result.sections.summary).toBe('Analyst');
    });
  });

  describe('configuration', () => {
    it('should reject invalid overrides', () => {
      expect(() => new TailoringPipeline(
        { generator: silentGenerator(), parser: parserFor({}) },
        { rewriting: { concurrency: 0 } }
      )).toThrow(PipelineError);
    });

    it('should pass the threshold to verification', async () => {
      const generator = new StubGenerator(prompt => (isKeywordPrompt(prompt) ? KEYWORD_JSON : ''));
      const pipeline = new TailoringPipeline(
        { generator, parser: parserFor({}) },
        { verification: { changeThreshold: 0 } }
      );

      const result = await pipeline.tailorSections({ skills: ['Python', 'SQL', 'AWS'], experience: ['A: one'] }, JOB_DESCRIPTION);

      expect(result.path).toBe('VERIFIED_OK');
      expect(result.verification.threshold).toBe(0);
    });
  });

  describe('audit log', () => {
    it('should record each stage of a run', async () => {
      const pipeline = new TailoringPipeline({ generator: keywordAwareGenerator(KEYWORD_JSON), parser: parserFor({}) });

      const result = await pipeline.tailorSections(
        { skills: ['SQL'], experience: ['Acme Corp: Built reports'] },
        JOB_DESCRIPTION,
        { jobId: 'job-audit' }
      );

      expect(result.auditLog.map(log => log.type)).toEqual([
        LogType.EXTRACTION,
        LogType.INFUSION,
        LogType.TAILORING,
        LogType.DECISION,
        LogType.VERIFICATION,
        LogType.DECISION,
        LogType.DECISION
      ]);
      expect(pipeline.getAuditLog().getLogsForJob('job-audit')).toEqual(result.auditLog);
    });

    it('should keep logging settings separate between pipelines', async () => {
      const input: ResumeSections = { skills: ['SQL'], experience: ['Acme Corp: Built reports'] };
      const pipelineA = new TailoringPipeline({ generator: keywordAwareGenerator(KEYWORD_JSON), parser: parserFor({}) });
      const pipelineB = new TailoringPipeline(
        { generator: keywordAwareGenerator(KEYWORD_JSON), parser: parserFor({}) },
        { logging: { enabled: false } }
      );

      const resultA = await pipelineA.tailorSections(input, JOB_DESCRIPTION, { jobId: 'job-a' });
      const resultB = await pipelineB.tailorSections(input, JOB_DESCRIPTION, { jobId: 'job-b' });

      expect(resultA.auditLog).toHaveLength(7);
      expect(pipelineA.getAuditLog().getLogsForJob('job-a')).toHaveLength(7);
      expect(pipelineA.getAuditLog().getLogsForJob('job-b')).toEqual([]);
      expect(resultB.auditLog).toEqual([]);
    });
  });

  describe('hasUsableSection', () => {
    it('should require at least one non-empty section', () => {
      expect(hasUsableSection({})).toBe(false);
      expect(hasUsableSection({ summary: ' ', experience: [] })).toBe(false);
      expect(hasUsableSection({ education: ['BSc'] })).toBe(true);
    });
  });
});
