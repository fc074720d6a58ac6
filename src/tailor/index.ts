/**
 * Resume Tailor
 *
 * Keyword-aware tailoring of resume sections to a job description.
 *
 * @example
 * const pipeline = new TailoringPipeline({ generator, parser });
 * const result = await pipeline.run(resumeText, jobDescription);
 * console.log(result.sections.skills);
 */

export * from './types';
export * from './config';
export * from './errors/types';
export { GracefulDegradation } from './errors/gracefulDegradation';
export { TailorLogger, LogType } from './logging/logger';
export type { LogEntry } from './logging/logger';
export * from './keywords';
export * from './infuser/skillInfuser';
export * from './rewriter/entries';
export * from './rewriter/prompts';
export * from './rewriter/sectionTailor';
export * from './verifier';
export * from './validation';
export * from './pipeline';
