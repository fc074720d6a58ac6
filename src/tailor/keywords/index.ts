/**
 * Keyword Module
 *
 * Extraction, categorization and normalization of job keywords.
 */

export * from './normalizer';
export * from './categories';
export * from './statistical';
export * from './strategies';
export * from './extractor';
export * from './prompts';
