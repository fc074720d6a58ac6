/**
 * Tailoring Error Types
 *
 * Error codes and response structures for the tailoring pipeline.
 * Extends shared error types from src/shared/errors/types.ts
 *
 * Only structural failures (unusable input, bad configuration) surface as
 * PipelineError. Generation and parse failures are recovered where they occur.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';

/**
 * Pipeline error codes
 */
export enum PipelineErrorCode {
  // Structural input failures
  EMPTY_RESUME_TEXT = 'EMPTY_RESUME_TEXT',
  UNPARSEABLE_RESUME = 'UNPARSEABLE_RESUME',
  EMPTY_JOB_DESCRIPTION = 'EMPTY_JOB_DESCRIPTION',
  FILE_EXTRACTION_FAILED = 'FILE_EXTRACTION_FAILED',

  // Input validation
  INVALID_INPUT = 'INVALID_INPUT',

  // General errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

/**
 * Validation error detail
 */
export interface ValidationError {
  field: string;
  message: string;
  received?: unknown;
  expected?: string;
}

/**
 * Error response structure for external communication
 */
export interface ErrorResponse {
  error: PipelineErrorCode;
  message: string;
  details?: string;
  timestamp: string;
  request_id?: string;
  validation_errors?: ValidationError[];
  retryable?: boolean;
  suggested_action?: string;
}

/**
 * Structural pipeline failure
 */
export class PipelineError extends AppError {
  public readonly code: PipelineErrorCode;
  public readonly validationErrors?: ValidationError[];
  public readonly retryable: boolean;

  constructor(
    code: PipelineErrorCode,
    userMessage: string,
    technicalDetails: string,
    options?: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      validationErrors?: ValidationError[];
      retryable?: boolean;
      suggestedAction?: string;
    }
  ) {
    super({
      category: options?.category || ErrorCategory.UNEXPECTED,
      severity: options?.severity || ErrorSeverity.MEDIUM,
      userMessage,
      technicalDetails,
      context: options?.context,
      recoverable: options?.retryable ?? false,
      suggestedAction: options?.suggestedAction
    });

    this.code = code;
    this.validationErrors = options?.validationErrors;
    this.retryable = options?.retryable ?? false;
  }

  /**
   * Convert to error response format
   */
  toErrorResponse(requestId?: string): ErrorResponse {
    return {
      error: this.code,
      message: this.userMessage,
      details: this.technicalDetails,
      timestamp: this.timestamp.toISOString(),
      request_id: requestId,
      validation_errors: this.validationErrors,
      retryable: this.retryable,
      suggested_action: this.suggestedAction
    };
  }
}

/**
 * What an extracted file holds, as named in user-facing messages
 */
export type SourceFileRole = 'resume' | 'job description';

/**
 * Factory functions for common error types
 */
export class PipelineErrorFactory {
  static emptyResumeText(source?: string): PipelineError {
    return new PipelineError(
      PipelineErrorCode.EMPTY_RESUME_TEXT,
      'Resume text is empty',
      source ? `No text could be read from ${source}` : 'Resume text was blank after trimming',
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.HIGH,
        context: source ? { source } : undefined,
        suggestedAction: 'Provide a resume containing text (scanned images are not supported)'
      }
    );
  }

  static unparseableResume(reason: string): PipelineError {
    return new PipelineError(
      PipelineErrorCode.UNPARSEABLE_RESUME,
      'Resume could not be parsed into sections',
      reason,
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.HIGH,
        suggestedAction: 'Use section headers such as "Skills", "Experience" and "Projects"'
      }
    );
  }

  static emptyJobDescription(): PipelineError {
    return new PipelineError(
      PipelineErrorCode.EMPTY_JOB_DESCRIPTION,
      'Job description is empty',
      'Job description was blank after trimming',
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        suggestedAction: 'Provide the text of the job posting'
      }
    );
  }

  static fileExtractionFailed(
    filePath: string,
    reason: string,
    role: SourceFileRole = 'resume'
  ): PipelineError {
    return new PipelineError(
      PipelineErrorCode.FILE_EXTRACTION_FAILED,
      `Could not read the ${role} file`,
      `Failed to extract text from ${filePath}: ${reason}`,
      {
        category: ErrorCategory.FILE_HANDLING,
        severity: ErrorSeverity.HIGH,
        context: { filePath, role },
        suggestedAction: 'Use a PDF, DOCX, TXT or MD file'
      }
    );
  }

  static invalidInput(validationErrors: ValidationError[]): PipelineError {
    const fields = validationErrors.map(e => e.field).join(', ');
    return new PipelineError(
      PipelineErrorCode.INVALID_INPUT,
      'Invalid input',
      `Validation failed for: ${fields}`,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        validationErrors,
        suggestedAction: 'Check input format and required fields'
      }
    );
  }

  static configurationError(field: string, reason: string): PipelineError {
    return new PipelineError(
      PipelineErrorCode.CONFIGURATION_ERROR,
      'Configuration error',
      `Invalid configuration for ${field}: ${reason}`,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.CRITICAL,
        context: { field },
        suggestedAction: 'Check configuration settings'
      }
    );
  }
}
