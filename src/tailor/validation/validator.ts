/**
 * Tailor Validator Utilities
 *
 * Validation and JSON round-tripping for resume sections and keyword maps.
 */

import { z } from 'zod';
import { PipelineErrorFactory, ValidationError } from '../errors/types';
import { KeywordMapSchema, ResumeSectionsSchema } from './schemas';
import type { KeywordMap, ResumeSections } from '../types';

/**
 * Result of validation
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Converts Zod issues to validation errors
 */
export function zodErrorToValidationErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.') || '(root)',
    message: err.message
  }));
}

function toValidationResult<T>(result: z.SafeParseReturnType<unknown, T>): ValidationResult {
  if (result.success) {
    return { isValid: true, errors: [] };
  }
  return { isValid: false, errors: zodErrorToValidationErrors(result.error) };
}

/**
 * Resume Sections Validator
 */
export class ResumeSectionsValidator {
  validate(sections: unknown): ValidationResult {
    return toValidationResult(ResumeSectionsSchema.safeParse(sections));
  }

  /**
   * Validates and parses sections
   * @throws PipelineError (INVALID_INPUT) if validation fails
   */
  validateAndParse(sections: unknown): ResumeSections {
    const result = ResumeSectionsSchema.safeParse(sections);
    if (!result.success) {
      throw PipelineErrorFactory.invalidInput(zodErrorToValidationErrors(result.error));
    }
    return result.data;
  }

  serialize(sections: ResumeSections): string {
    return JSON.stringify(sections, null, 2);
  }

  /**
   * Parse sections back from their JSON form
   * @throws PipelineError (INVALID_INPUT) on malformed JSON or shape
   */
  deserialize(json: string): ResumeSections {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw PipelineErrorFactory.invalidInput([{
        field: '(root)',
        message: error instanceof Error ? error.message : 'Invalid JSON'
      }]);
    }
    return this.validateAndParse(parsed);
  }
}

/**
 * Keyword Map Validator
 */
export class KeywordMapValidator {
  validate(keywords: unknown): ValidationResult {
    return toValidationResult(KeywordMapSchema.safeParse(keywords));
  }

  /**
   * @throws PipelineError (INVALID_INPUT) if validation fails
   */
  validateAndParse(keywords: unknown): KeywordMap {
    const result = KeywordMapSchema.safeParse(keywords);
    if (!result.success) {
      throw PipelineErrorFactory.invalidInput(zodErrorToValidationErrors(result.error));
    }
    return result.data;
  }

  serialize(keywords: KeywordMap): string {
    return JSON.stringify(keywords, null, 2);
  }

  deserialize(json: string): KeywordMap {
    let parsed: unknown;
    try {
      parsed = JSON.parse(json);
    } catch (error) {
      throw PipelineErrorFactory.invalidInput([{
        field: '(root)',
        message: error instanceof Error ? error.message : 'Invalid JSON'
      }]);
    }
    return this.validateAndParse(parsed);
  }
}
