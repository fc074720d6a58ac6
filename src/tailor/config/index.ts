/**
 * Configuration Management
 *
 * Centralized configuration for the tailoring pipeline with environment
 * variable support. Precedence: defaults < TAILOR_* env vars < overrides.
 */

import { PipelineErrorFactory } from '../errors/types';

/**
 * Complete tailoring configuration
 */
export interface TailorConfig {
  extraction: {
    /** Job descriptions shorter than this use the fixed fallback map */
    minJobDescriptionLength: number;
    /** Generator responses shorter than this count as failures */
    minResponseLength: number;
    maxKeywordsPerCategory: number;
  };

  infusion: {
    includeSoftSkills: boolean;
  };

  rewriting: {
    /** Rewrites shorter than this (after cleanup) are discarded */
    minRewriteLength: number;
    keywordsPerEntry: number;
    /** Maximum in-flight generator calls */
    concurrency: number;
  };

  verification: {
    changeThreshold: number;
  };

  logging: {
    enabled: boolean;
    maxLogs: number;
  };
}

/**
 * Recursive partial used for overrides
 */
export type TailorConfigOverrides = {
  [K in keyof TailorConfig]?: Partial<TailorConfig[K]>;
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: TailorConfig = {
  extraction: {
    minJobDescriptionLength: 20,
    minResponseLength: 10,
    maxKeywordsPerCategory: 7
  },
  infusion: {
    includeSoftSkills: false
  },
  rewriting: {
    minRewriteLength: 20,
    keywordsPerEntry: 8,
    concurrency: 2
  },
  verification: {
    changeThreshold: 0.4
  },
  logging: {
    enabled: true,
    maxLogs: 5000
  }
};

/**
 * Configuration manager
 */
export class ConfigManager {
  private readonly config: TailorConfig;

  constructor(config?: TailorConfigOverrides, env: NodeJS.ProcessEnv = process.env) {
    this.config = this.loadConfig(env, config);
    this.validateConfig();
  }

  /**
   * Load configuration from environment variables and provided config
   */
  private loadConfig(env: NodeJS.ProcessEnv, providedConfig?: TailorConfigOverrides): TailorConfig {
    const envConfig: TailorConfigOverrides = {
      extraction: {
        minJobDescriptionLength: this.parseInt(env.TAILOR_MIN_JOB_DESCRIPTION_LENGTH, DEFAULT_CONFIG.extraction.minJobDescriptionLength),
        minResponseLength: this.parseInt(env.TAILOR_MIN_RESPONSE_LENGTH, DEFAULT_CONFIG.extraction.minResponseLength),
        maxKeywordsPerCategory: this.parseInt(env.TAILOR_MAX_KEYWORDS_PER_CATEGORY, DEFAULT_CONFIG.extraction.maxKeywordsPerCategory)
      },
      infusion: {
        includeSoftSkills: env.TAILOR_INCLUDE_SOFT_SKILLS === 'true'
      },
      rewriting: {
        minRewriteLength: this.parseInt(env.TAILOR_MIN_REWRITE_LENGTH, DEFAULT_CONFIG.rewriting.minRewriteLength),
        keywordsPerEntry: this.parseInt(env.TAILOR_KEYWORDS_PER_ENTRY, DEFAULT_CONFIG.rewriting.keywordsPerEntry),
        concurrency: this.parseInt(env.TAILOR_CONCURRENCY, DEFAULT_CONFIG.rewriting.concurrency)
      },
      verification: {
        changeThreshold: this.parseFloat(env.TAILOR_CHANGE_THRESHOLD, DEFAULT_CONFIG.verification.changeThreshold)
      },
      logging: {
        enabled: env.TAILOR_LOGGING_ENABLED !== 'false',
        maxLogs: this.parseInt(env.TAILOR_MAX_LOGS, DEFAULT_CONFIG.logging.maxLogs)
      }
    };

    // Merge: DEFAULT_CONFIG < envConfig < providedConfig
    return mergeConfig(mergeConfig(DEFAULT_CONFIG, envConfig), providedConfig || {});
  }

  /**
   * Validate configuration
   */
  private validateConfig(): void {
    const { extraction, rewriting, verification, logging } = this.config;

    if (verification.changeThreshold < 0 || verification.changeThreshold > 1) {
      throw PipelineErrorFactory.configurationError(
        'changeThreshold',
        'Must be between 0 and 1'
      );
    }

    if (extraction.maxKeywordsPerCategory < 1) {
      throw PipelineErrorFactory.configurationError(
        'maxKeywordsPerCategory',
        'Must be at least 1'
      );
    }

    if (extraction.minJobDescriptionLength < 0) {
      throw PipelineErrorFactory.configurationError(
        'minJobDescriptionLength',
        'Must be non-negative'
      );
    }

    if (extraction.minResponseLength < 0) {
      throw PipelineErrorFactory.configurationError(
        'minResponseLength',
        'Must be non-negative'
      );
    }

    if (rewriting.minRewriteLength < 0) {
      throw PipelineErrorFactory.configurationError(
        'minRewriteLength',
        'Must be non-negative'
      );
    }

    if (rewriting.keywordsPerEntry < 1) {
      throw PipelineErrorFactory.configurationError(
        'keywordsPerEntry',
        'Must be at least 1'
      );
    }

    if (!Number.isInteger(rewriting.concurrency) || rewriting.concurrency < 1) {
      throw PipelineErrorFactory.configurationError(
        'concurrency',
        'Must be a positive integer'
      );
    }

    if (logging.maxLogs < 1) {
      throw PipelineErrorFactory.configurationError(
        'maxLogs',
        'Must be at least 1'
      );
    }
  }

  /**
   * Get configuration
   */
  getConfig(): TailorConfig {
    return mergeConfig(this.config, {});
  }

  /**
   * Parse integer from environment variable
   */
  private parseInt(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  /**
   * Parse float from environment variable
   */
  private parseFloat(value: string | undefined, defaultValue: number): number {
    if (!value) return defaultValue;
    const parsed = parseFloat(value);
    return isNaN(parsed) ? defaultValue : parsed;
  }
}

/**
 * Merge overrides into a configuration, one group at a time.
 * Undefined override values leave the base value in place.
 */
export function mergeConfig(base: TailorConfig, overrides: TailorConfigOverrides): TailorConfig {
  const { extraction, infusion, rewriting, verification, logging } = overrides;

  return {
    extraction: {
      minJobDescriptionLength: extraction?.minJobDescriptionLength ?? base.extraction.minJobDescriptionLength,
      minResponseLength: extraction?.minResponseLength ?? base.extraction.minResponseLength,
      maxKeywordsPerCategory: extraction?.maxKeywordsPerCategory ?? base.extraction.maxKeywordsPerCategory
    },
    infusion: {
      includeSoftSkills: infusion?.includeSoftSkills ?? base.infusion.includeSoftSkills
    },
    rewriting: {
      minRewriteLength: rewriting?.minRewriteLength ?? base.rewriting.minRewriteLength,
      keywordsPerEntry: rewriting?.keywordsPerEntry ?? base.rewriting.keywordsPerEntry,
      concurrency: rewriting?.concurrency ?? base.rewriting.concurrency
    },
    verification: {
      changeThreshold: verification?.changeThreshold ?? base.verification.changeThreshold
    },
    logging: {
      enabled: logging?.enabled ?? base.logging.enabled,
      maxLogs: logging?.maxLogs ?? base.logging.maxLogs
    }
  };
}
