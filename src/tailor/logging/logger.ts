/**
 * Tailor Logger
 *
 * Audit log of pipeline stages: which extraction strategy won, which skills
 * were infused, how many entries were rewritten and what the verifier decided.
 * Every entry is forwarded to pino. Each logger instance also keeps its own
 * bounded buffer, so pipelines never see each other's entries or settings.
 */

import { loggers, serializeError } from '../../shared/logging/logger';
import { AppError } from '../../shared/errors/types';
import { DEFAULT_CONFIG, TailorConfig } from '../config';
import type {
  KeywordMap,
  PipelineContext,
  TailoringState,
  VerificationReport
} from '../types';

/**
 * Log entry types
 */
export enum LogType {
  EXTRACTION = 'EXTRACTION',
  INFUSION = 'INFUSION',
  TAILORING = 'TAILORING',
  VERIFICATION = 'VERIFICATION',
  DECISION = 'DECISION',
  ERROR = 'ERROR',
  INFO = 'INFO'
}

/**
 * Log entry interface
 */
export interface LogEntry {
  type: LogType;
  timestamp: Date;
  message: string;
  context?: Record<string, unknown>;
}

const pinoLogger = loggers.tailor;

/**
 * `enabled` switches the in-memory buffer only; pino forwarding is unaffected
 */
export type TailorLoggerOptions = TailorConfig['logging'];

/**
 * Tailor audit logger
 */
export class TailorLogger {
  private logs: LogEntry[] = [];
  private readonly options: TailorLoggerOptions;

  constructor(options: Partial<TailorLoggerOptions> = {}) {
    this.options = { ...DEFAULT_CONFIG.logging, ...options };
  }

  /**
   * Log the outcome of keyword extraction
   */
  logExtraction(
    strategy: string,
    keywords: KeywordMap,
    context?: PipelineContext
  ): void {
    const counts = Object.fromEntries(
      Object.entries(keywords).map(([category, list]) => [category, list.length])
    );
    const total = Object.values(keywords).reduce((sum, list) => sum + list.length, 0);

    this.addLog({
      type: LogType.EXTRACTION,
      timestamp: new Date(),
      message: `Extracted ${total} keywords using ${strategy}`,
      context: { ...context, strategy, counts }
    });
  }

  logInfusion(added: string[], skipped: number, context?: PipelineContext): void {
    this.addLog({
      type: LogType.INFUSION,
      timestamp: new Date(),
      message: `Infused ${added.length} skills`,
      context: { ...context, added, skipped }
    });
  }

  logTailoring(
    mode: string,
    rewritten: number,
    kept: number,
    skipped: number,
    context?: PipelineContext
  ): void {
    this.addLog({
      type: LogType.TAILORING,
      timestamp: new Date(),
      message: `Tailoring (${mode}): ${rewritten} rewritten, ${kept} kept, ${skipped} skipped`,
      context: { ...context, mode, rewritten, kept, skipped }
    });
  }

  logVerification(report: VerificationReport, context?: PipelineContext): void {
    this.addLog({
      type: LogType.VERIFICATION,
      timestamp: new Date(),
      message: `Verification ${report.sufficient ? 'passed' : 'failed'}` +
        (report.ratio === null ? '' : ` (ratio ${report.ratio.toFixed(2)})`),
      context: {
        ...context,
        sufficient: report.sufficient,
        ratio: report.ratio,
        threshold: report.threshold,
        lengthMismatch: report.lengthMismatch
      }
    });
  }

  /**
   * Log a state machine transition
   */
  logTransition(
    from: TailoringState,
    to: TailoringState,
    context?: PipelineContext
  ): void {
    this.addLog({
      type: LogType.DECISION,
      timestamp: new Date(),
      message: `${from} -> ${to}`,
      context: { ...context, from, to }
    });
  }

  /**
   * Log a recovered error. Forwarded to pino at warn level.
   */
  logError(error: AppError | Error, context?: Record<string, unknown>): void {
    pinoLogger.warn({ err: serializeError(error), ...context }, error.message);

    this.push({
      type: LogType.ERROR,
      timestamp: new Date(),
      message: error.message,
      context: {
        ...context,
        error: error instanceof AppError ? {
          category: error.category,
          severity: error.severity,
          recoverable: error.recoverable
        } : {
          name: error.name
        }
      }
    });
  }

  logInfo(message: string, context?: Record<string, unknown>): void {
    this.addLog({
      type: LogType.INFO,
      timestamp: new Date(),
      message,
      context
    });
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Entries for one pipeline run
   */
  getLogsForJob(jobId: string): LogEntry[] {
    return this.logs.filter(log => log.context?.jobId === jobId);
  }

  private addLog(entry: LogEntry): void {
    pinoLogger.info({ type: entry.type, ...entry.context }, entry.message);
    this.push(entry);
  }

  private push(entry: LogEntry): void {
    if (!this.options.enabled) return;

    this.logs.push(entry);
    if (this.logs.length > this.options.maxLogs) {
      this.logs = this.logs.slice(-this.options.maxLogs);
    }
  }
}
