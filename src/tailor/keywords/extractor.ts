/**
 * Keyword Extractor
 *
 * Job description → categorized KeywordMap through an ordered strategy chain.
 * Never rejects: every failure degrades to the next strategy, and finally to
 * the fixed fallback map.
 */

import fallbackKeywords from '../data/fallbackKeywords.json';
import { DEFAULT_CONFIG, TailorConfig } from '../config';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import { TailorLogger } from '../logging/logger';
import type { KeywordMap, PipelineContext, RawKeywordMap, TextGenerator } from '../types';
import { finalizeKeywordMap } from './normalizer';
import { buildKeywordPrompt } from './prompts';
import { ExtractionContext, ExtractionStrategy, defaultStrategies } from './strategies';

export type KeywordExtractorOptions = TailorConfig['extraction'];

export const FALLBACK_STRATEGY = 'fallback';

export interface KeywordExtractionResult {
  keywords: KeywordMap;
  /** Name of the strategy that produced the map, or "fallback" */
  strategy: string;
}

export class KeywordExtractor {
  private readonly options: KeywordExtractorOptions;
  private readonly strategies: ExtractionStrategy[];
  private readonly degradation: GracefulDegradation;

  constructor(
    private readonly generator: TextGenerator | null,
    options: Partial<KeywordExtractorOptions> = {},
    strategies: ExtractionStrategy[] = defaultStrategies(),
    private readonly audit: TailorLogger = new TailorLogger()
  ) {
    this.options = { ...DEFAULT_CONFIG.extraction, ...options };
    this.strategies = strategies;
    this.degradation = new GracefulDegradation(audit);
  }

  /**
   * Extract keywords from a job description
   */
  async extract(jobDescription: string | null | undefined): Promise<KeywordMap> {
    const result = await this.extractWithDetails(jobDescription);
    return result.keywords;
  }

  /**
   * Extract keywords and report which strategy produced them
   */
  async extractWithDetails(
    jobDescription: string | null | undefined,
    context?: PipelineContext
  ): Promise<KeywordExtractionResult> {
    const result = await this.degradation.withGracefulDegradation(
      () => this.runChain(jobDescription ?? '', context),
      () => this.fallback(),
      'keyword_extraction'
    );

    this.audit.logExtraction(result.strategy, result.keywords, context);
    return result;
  }

  /**
   * The fixed fallback map, normalized and capped
   */
  fallback(): KeywordExtractionResult {
    return {
      keywords: finalizeKeywordMap(fallbackKeywords, this.options.maxKeywordsPerCategory),
      strategy: FALLBACK_STRATEGY
    };
  }

  private async runChain(
    jobDescription: string,
    context?: PipelineContext
  ): Promise<KeywordExtractionResult> {
    const text = jobDescription.trim();
    if (text.length < this.options.minJobDescriptionLength) {
      this.audit.logInfo('Job description too short, using fallback keywords', {
        ...context,
        length: text.length
      });
      return this.fallback();
    }

    const extraction = this.createContext(text, context);

    for (const strategy of this.strategies) {
      const raw = await this.degradation.withGracefulDegradation<RawKeywordMap | null>(
        () => strategy.extract(extraction),
        () => null,
        `keyword_strategy_${strategy.name}`
      );

      if (!raw) continue;

      const keywords = finalizeKeywordMap(raw, this.options.maxKeywordsPerCategory);
      if (Object.values(keywords).some(list => list.length > 0)) {
        return { keywords, strategy: strategy.name };
      }
    }

    return this.fallback();
  }

  /**
   * Build the shared context; the generator is called lazily and only once
   */
  private createContext(jobDescription: string, context?: PipelineContext): ExtractionContext {
    let pending: Promise<string | null> | null = null;

    const request = async (): Promise<string | null> => {
      if (!this.generator) {
        return null;
      }

      const generator = this.generator;
      const prompt = buildKeywordPrompt(jobDescription, this.options.maxKeywordsPerCategory);
      const response = await this.degradation.withGracefulDegradation<string | null>(
        () => generator.generate(prompt),
        () => null,
        'keyword_generation'
      );

      const trimmed = (response ?? '').trim();
      if (trimmed.length < this.options.minResponseLength) {
        this.audit.logInfo('Keyword generation returned no usable response', {
          ...context,
          responseLength: trimmed.length
        });
        return null;
      }
      return trimmed;
    };

    return {
      jobDescription,
      response: () => {
        if (!pending) {
          pending = request();
        }
        return pending;
      }
    };
  }
}
