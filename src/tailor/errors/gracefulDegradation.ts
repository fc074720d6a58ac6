/**
 * Graceful Degradation Utilities
 *
 * Fallback strategies for generation and parse failures.
 *
 * Strategy:
 * - If keyword generation fails, fall back to statistical extraction
 * - If an entry rewrite fails, keep the original description
 * - If a response cannot be parsed, try the next parser in the chain
 */

import { TailorLogger } from '../logging/logger';
import { toError } from '../../shared/errors/types';

/**
 * Graceful degradation handler. Failures are recorded on the owning
 * pipeline's audit log.
 */
export class GracefulDegradation {
  constructor(private readonly audit: TailorLogger) {}

  /**
   * Handle a failed entry rewrite - keep the original description
   */
  handleRewriteFailure(anchor: string, original: string, error: Error): string {
    this.audit.logError(error, {
      operation: 'entry_rewrite',
      anchor,
      fallback: 'original_description'
    });

    return original;
  }

  /**
   * Wrap operation with graceful degradation
   */
  async withGracefulDegradation<T>(
    operation: () => Promise<T>,
    fallback: () => T,
    operationName: string
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      this.audit.logError(toError(error), {
        operation: operationName,
        fallback: 'using_fallback_value'
      });
      return fallback();
    }
  }
}
