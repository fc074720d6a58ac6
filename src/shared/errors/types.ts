/**
 * Error Types
 *
 * Error categories and the base error carried across the tailoring core,
 * the HTTP backend and the CLI.
 */

export enum ErrorCategory {
  FILE_HANDLING = 'FILE_HANDLING',
  PARSING = 'PARSING',
  GENERATION = 'GENERATION',
  VALIDATION = 'VALIDATION',
  UNEXPECTED = 'UNEXPECTED'
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information. `timestamp` defaults to construction time.
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  /** Safe to show to an end user */
  userMessage: string;
  technicalDetails: string;
  timestamp?: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
  suggestedAction?: string;
}

export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly userMessage: string;
  readonly technicalDetails: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;
  readonly recoverable: boolean;
  readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage);
    this.name = new.target.name;
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp ?? new Date();
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }

  toErrorInfo(): ErrorInfo & { timestamp: Date } {
    const { category, severity, userMessage, technicalDetails, timestamp, context, recoverable, suggestedAction } = this;
    return { category, severity, userMessage, technicalDetails, timestamp, context, recoverable, suggestedAction };
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
