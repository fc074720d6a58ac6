/**
 * Tailor routes - run the tailoring pipeline and keyword extraction.
 */

import { Router, Request, Response } from 'express';
import { TailoringPipeline } from '../../tailor/pipeline';
import { KeywordExtractor } from '../../tailor/keywords/extractor';
import { defaultStrategies } from '../../tailor/keywords/strategies';
import { TailorLogger } from '../../tailor/logging/logger';
import { ConfigManager, TailorConfigOverrides, mergeConfig } from '../../tailor/config';
import { KeywordsRequestSchema, TailorRequestSchema } from '../../tailor/validation/schemas';
import { loggers } from '../../shared/logging/logger';
import { asyncHandler } from '../middleware/errorHandler';
import type { ResumeTextParser, TextGenerator } from '../../tailor/types';

const tailorLogger = loggers.http;

export interface TailorRouteDependencies {
  generator: TextGenerator;
  parser: ResumeTextParser;
  /** Base pipeline configuration; request options are merged on top */
  config?: TailorConfigOverrides;
}

function correlationId(req: Request): string | undefined {
  const id: unknown = Reflect.get(req, 'id');
  return typeof id === 'string' ? id : undefined;
}

export function createTailorRouter(deps: TailorRouteDependencies): Router {
  const router = Router();
  const baseConfig = new ConfigManager(deps.config).getConfig();

  /**
   * POST /api/tailor
   * Body: { resumeText?, resume?, jobDescription, options? }
   */
  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const body = TailorRequestSchema.parse(req.body);

    const config = mergeConfig(baseConfig, {
      infusion: { includeSoftSkills: body.options?.includeSoftSkills },
      verification: { changeThreshold: body.options?.changeThreshold }
    });
    const pipeline = new TailoringPipeline({ generator: deps.generator, parser: deps.parser }, config);
    const context = { correlationId: correlationId(req) };

    const result = body.resume
      ? await pipeline.tailorSections(body.resume, body.jobDescription, context)
      : await pipeline.run(body.resumeText ?? '', body.jobDescription, context);

    tailorLogger.info(
      { jobId: result.context.jobId, path: result.path, strategy: result.extractionStrategy },
      'Tailoring complete'
    );

    res.json({
      success: true,
      jobId: result.context.jobId,
      sections: result.sections,
      keywords: result.keywords,
      verification: result.verification,
      path: result.path,
      escalated: result.escalated,
      extractionStrategy: result.extractionStrategy
    });
  }));

  /**
   * POST /api/tailor/keywords
   * Body: { jobDescription }
   */
  router.post('/keywords', asyncHandler(async (req: Request, res: Response) => {
    const { jobDescription } = KeywordsRequestSchema.parse(req.body);
    const extractor = new KeywordExtractor(
      deps.generator,
      baseConfig.extraction,
      defaultStrategies(),
      new TailorLogger(baseConfig.logging)
    );
    const { keywords, strategy } = await extractor.extractWithDetails(jobDescription);

    res.json({ keywords, strategy });
  }));

  return router;
}
