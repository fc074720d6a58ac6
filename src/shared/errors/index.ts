/**
 * Errors Module
 *
 * Standardized error types shared across features.
 */

export * from './types';
