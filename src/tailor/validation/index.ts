/**
 * Tailor Validation Module
 *
 * Exports validation utilities and schemas.
 */

export * from './validator';
export * from './schemas';
