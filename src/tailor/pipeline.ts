/**
 * Tailoring Pipeline
 *
 * parse → extract keywords → infuse skills → tailor entries → verify →
 * (at most one escalated pass) → final sections.
 *
 * Generation failures degrade inside each stage. The only errors this class
 * raises are PipelineErrors for unusable input.
 */

import { randomUUID } from 'crypto';
import { ConfigManager, TailorConfig, TailorConfigOverrides } from './config';
import { PipelineError, PipelineErrorFactory } from './errors/types';
import { TailorLogger } from './logging/logger';
import { infuseSkillsWithReport } from './infuser/skillInfuser';
import { KeywordExtractor } from './keywords/extractor';
import { defaultStrategies } from './keywords/strategies';
import { SectionTailor } from './rewriter/sectionTailor';
import { verifyModification } from './verifier/modificationVerifier';
import { TailoringStateMachine } from './verifier/stateMachine';
import { toError } from '../shared/errors/types';
import type {
  PipelineContext,
  ResumeSections,
  ResumeTextParser,
  TailoringResult,
  TextExtractor,
  TextGenerator
} from './types';

export interface PipelineDependencies {
  generator: TextGenerator;
  parser: ResumeTextParser;
  /** Required only for runFromFile */
  extractor?: TextExtractor;
}

export function createPipelineContext(partial: Partial<PipelineContext> = {}): PipelineContext {
  return {
    jobId: partial.jobId ?? randomUUID(),
    correlationId: partial.correlationId ?? randomUUID()
  };
}

/**
 * Whether parsing produced anything worth tailoring
 */
export function hasUsableSection(sections: ResumeSections): boolean {
  const lists = [
    sections.skills,
    sections.experience,
    sections.education,
    sections.projects,
    sections.certifications
  ];
  return (
    Boolean(sections.name?.trim()) ||
    Boolean(sections.summary?.trim()) ||
    lists.some(list => list !== undefined && list.length > 0)
  );
}

export class TailoringPipeline {
  private readonly config: TailorConfig;
  private readonly audit: TailorLogger;
  private readonly extractor: KeywordExtractor;
  private readonly tailor: SectionTailor;

  constructor(
    private readonly deps: PipelineDependencies,
    overrides: TailorConfigOverrides = {}
  ) {
    this.config = new ConfigManager(overrides).getConfig();
    this.audit = new TailorLogger(this.config.logging);

    this.extractor = new KeywordExtractor(deps.generator, this.config.extraction, defaultStrategies(), this.audit);
    this.tailor = new SectionTailor(deps.generator, this.config.rewriting, this.audit);
  }

  getConfig(): TailorConfig {
    return this.config;
  }

  /**
   * This pipeline's audit log, covering every run it has made
   */
  getAuditLog(): TailorLogger {
    return this.audit;
  }

  /**
   * Tailor a resume given as raw text
   */
  async run(
    resumeText: string,
    jobDescription: string,
    context: Partial<PipelineContext> = {}
  ): Promise<TailoringResult> {
    if (!resumeText.trim()) {
      throw PipelineErrorFactory.emptyResumeText();
    }

    let sections: ResumeSections;
    try {
      sections = this.deps.parser.parse(resumeText);
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw PipelineErrorFactory.unparseableResume(toError(error).message);
    }

    return this.tailorSections(sections, jobDescription, context);
  }

  /**
   * Extract text from a resume file and tailor it
   */
  async runFromFile(
    filePath: string,
    jobDescription: string,
    context: Partial<PipelineContext> = {}
  ): Promise<TailoringResult> {
    if (!this.deps.extractor) {
      throw PipelineErrorFactory.configurationError('extractor', 'No text extractor configured');
    }

    let text: string;
    try {
      text = await this.deps.extractor.extract(filePath);
    } catch (error) {
      if (error instanceof PipelineError) throw error;
      throw PipelineErrorFactory.fileExtractionFailed(filePath, toError(error).message);
    }

    if (!text.trim()) {
      throw PipelineErrorFactory.emptyResumeText(filePath);
    }
    return this.run(text, jobDescription, context);
  }

  /**
   * Tailor a resume that is already split into sections. The input is not
   * modified.
   */
  async tailorSections(
    input: ResumeSections,
    jobDescription: string,
    partialContext: Partial<PipelineContext> = {}
  ): Promise<TailoringResult> {
    if (!hasUsableSection(input)) {
      throw PipelineErrorFactory.unparseableResume('No resume section contained any content');
    }

    const context = createPipelineContext(partialContext);
    const before = structuredClone(input);
    const sections = structuredClone(input);
    const machine = new TailoringStateMachine(context, this.audit);

    const { keywords, strategy } = await this.extractor.extractWithDetails(jobDescription, context);

    const infusion = infuseSkillsWithReport(sections, keywords, {
      includeSoftSkills: this.config.infusion.includeSoftSkills
    });
    this.audit.logInfusion(infusion.added, infusion.skipped.length, context);

    const threshold = this.config.verification.changeThreshold;

    let tailored = await this.tailor.tailor(sections, keywords, jobDescription, 'standard', context);
    machine.transition('TAILORED');

    const first = verifyModification(before, tailored, threshold);
    this.audit.logVerification(first, context);

    let escalated = false;
    if (first.sufficient) {
      machine.transition('VERIFIED_OK');
    } else {
      machine.transition('FORCE_RETRY');
      tailored = await this.tailor.tailor(tailored, keywords, jobDescription, 'escalated', context);
      escalated = true;
    }
    machine.transition('FINAL');

    const verification = escalated ? verifyModification(before, tailored, threshold) : first;
    if (escalated) {
      this.audit.logVerification(verification, context);
    }

    return {
      sections: tailored,
      keywords,
      verification,
      path: escalated ? 'FORCE_RETRY' : 'VERIFIED_OK',
      escalated,
      states: machine.getHistory(),
      extractionStrategy: strategy,
      context,
      auditLog: this.audit.getLogsForJob(context.jobId)
    };
  }
}
