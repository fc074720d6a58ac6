/**
 * Tests for pipeline errors, graceful degradation and the audit log
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  PipelineError,
  PipelineErrorCode,
  PipelineErrorFactory
} from '../../tailor/errors/types';
import { GracefulDegradation } from '../../tailor/errors/gracefulDegradation';
import { LogType, TailorLogger } from '../../tailor/logging/logger';
import { AppError, ErrorCategory } from '../../shared/errors/types';

describe('PipelineError', () => {
  it('should carry its code and user-facing details', () => {
    const error = PipelineErrorFactory.fileExtractionFailed('resume.pdf', 'corrupt');

    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(PipelineErrorCode.FILE_EXTRACTION_FAILED);
    expect(error.category).toBe(ErrorCategory.FILE_HANDLING);
    expect(error.message).toBe('Could not read the resume file');
    expect(error.technicalDetails).toBe('Failed to extract text from resume.pdf: corrupt');
  });

  it('should name the kind of file that could not be read', () => {
    const error = PipelineErrorFactory.fileExtractionFailed('job.docx', 'File not found', 'job description');

    expect(error.message).toBe('Could not read the job description file');
    expect(error.context).toEqual({ filePath: 'job.docx', role: 'job description' });
  });

  it('should mention the source of empty text when known', () => {
    expect(PipelineErrorFactory.emptyResumeText('scan.pdf').technicalDetails).toBe(
      'No text could be read from scan.pdf'
    );
    expect(PipelineErrorFactory.emptyResumeText().technicalDetails).toBe('Resume text was blank after trimming');
  });

  it('should convert to an error response', () => {
    const error = PipelineErrorFactory.invalidInput([{ field: 'jobDescription', message: 'Required' }]);

    const response = error.toErrorResponse('req-1');

    expect(response).toMatchObject({
      error: 'INVALID_INPUT',
      message: 'Invalid input',
      details: 'Validation failed for: jobDescription',
      request_id: 'req-1',
      validation_errors: [{ field: 'jobDescription', message: 'Required' }],
      retryable: false,
      suggested_action: 'Check input format and required fields'
    });
    expect(response.timestamp).toBe(error.timestamp.toISOString());
  });

  it('should be catchable by type', () => {
    const error: unknown = PipelineErrorFactory.unparseableResume('no headers');

    expect(error instanceof PipelineError && error.code === PipelineErrorCode.UNPARSEABLE_RESUME).toBe(true);
  });
});

describe('GracefulDegradation', () => {
  let audit: TailorLogger;
  let degradation: GracefulDegradation;

  beforeEach(() => {
    audit = new TailorLogger();
    degradation = new GracefulDegradation(audit);
  });

  it('should return the fallback and log when the operation rejects', async () => {
    const result = await degradation.withGracefulDegradation(
      () => Promise.reject(new Error('timeout')),
      () => 'fallback',
      'keyword_generation'
    );

    expect(result).toBe('fallback');
    const [log] = audit.getLogs();
    expect(log.type).toBe(LogType.ERROR);
    expect(log.message).toBe('timeout');
    expect(log.context).toMatchObject({ operation: 'keyword_generation', fallback: 'using_fallback_value' });
  });

  it('should pass through successful results', async () => {
    await expect(
      degradation.withGracefulDegradation(async () => 'ok', () => 'fallback', 'op')
    ).resolves.toBe('ok');
    expect(audit.getLogs()).toHaveLength(0);
  });

  it('should keep the original description on rewrite failure', () => {
    expect(degradation.handleRewriteFailure('Acme', 'Built reports', new Error('x'))).toBe('Built reports');
    expect(audit.getLogs()[0].context).toMatchObject({
      operation: 'entry_rewrite',
      anchor: 'Acme'
    });
  });
});

describe('TailorLogger', () => {
  it('should keep only the most recent entries', () => {
    const audit = new TailorLogger({ maxLogs: 2 });

    audit.logInfo('one');
    audit.logInfo('two');
    audit.logInfo('three');

    expect(audit.getLogs().map(log => log.message)).toEqual(['two', 'three']);
  });

  it('should not buffer entries when disabled', () => {
    const audit = new TailorLogger({ enabled: false });

    audit.logInfo('ignored');

    expect(audit.getLogs()).toEqual([]);
  });

  it('should keep entries separate between instances', () => {
    const first = new TailorLogger();
    const second = new TailorLogger({ enabled: false });

    first.logInfo('kept', { jobId: 'job-1' });
    second.logInfo('dropped', { jobId: 'job-1' });

    expect(first.getLogsForJob('job-1').map(log => log.message)).toEqual(['kept']);
    expect(second.getLogsForJob('job-1')).toEqual([]);
  });

  it('should summarize tailoring passes', () => {
    const audit = new TailorLogger();

    audit.logTailoring('escalated', 2, 1, 0, { jobId: 'job-7', correlationId: 'c' });
    audit.logInfo('other job', { jobId: 'job-8' });

    expect(audit.getLogsForJob('job-7').map(log => log.message)).toEqual([
      'Tailoring (escalated): 2 rewritten, 1 kept, 0 skipped'
    ]);
  });
});
