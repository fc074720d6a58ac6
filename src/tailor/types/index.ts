/**
 * Resume Tailor Core Type Definitions
 *
 * Data models shared by the keyword, infusion, rewriting and verification
 * stages of the tailoring pipeline.
 */

import type { LogEntry } from '../logging/logger';

// ============================================================================
// Resume Types
// ============================================================================

/**
 * Structured experience/project record as supplied by callers.
 * Fields other than anchor/description/dates are carried through untouched.
 */
export interface StructuredEntryInput {
  anchor: string;
  description: string;
  dates?: string;
  [field: string]: string | undefined;
}

/**
 * An experience/project entry: a structured record or "<anchor>: <description>"
 */
export type EntryInput = string | StructuredEntryInput;

/**
 * Section-keyed resume content. Every section is optional.
 */
export interface ResumeSections {
  name?: string;
  summary?: string;
  skills?: string[];
  experience?: EntryInput[];
  education?: string[];
  projects?: EntryInput[];
  certifications?: string[];
}

/**
 * Sections rewritten by the generator
 */
export type TailoredSection = 'experience' | 'projects';

export const TAILORED_SECTIONS: readonly TailoredSection[] = ['experience', 'projects'];

// ============================================================================
// Entry Model
// ============================================================================

export interface StructuredEntry {
  kind: 'structured';
  anchor: string;
  description: string;
  dates?: string;
  extra: Record<string, string>;
}

/**
 * Flat string entry. `anchor` and `description` are present only when the
 * raw string contains a colon.
 */
export interface FlatEntry {
  kind: 'flat';
  raw: string;
  anchor?: string;
  description?: string;
}

export type Entry = StructuredEntry | FlatEntry;

// ============================================================================
// Keyword Types
// ============================================================================

export const KEYWORD_CATEGORIES = [
  'technical_skills',
  'soft_skills',
  'programming_languages',
  'technical_tools',
  'data_tools',
  'cloud_technologies'
] as const;

export type KeywordCategory = typeof KEYWORD_CATEGORIES[number];

/**
 * Category → ordered, normalized keywords. Every category key is present.
 */
export type KeywordMap = Readonly<Record<KeywordCategory, readonly string[]>>;

/**
 * Mutable working form used while a map is being assembled
 */
export type RawKeywordMap = Record<KeywordCategory, string[]>;

// ============================================================================
// Verification Types
// ============================================================================

export type VerifiedSection = 'experience' | 'projects' | 'skills';

export const VERIFIED_SECTIONS: readonly VerifiedSection[] = ['experience', 'projects', 'skills'];

export interface SectionComparison {
  compared: number;
  changed: number;
  /** null when the section had nothing to compare */
  ratio: number | null;
  lengthMismatch: boolean;
}

export interface VerificationReport {
  sufficient: boolean;
  threshold: number;
  compared: number;
  changed: number;
  ratio: number | null;
  /** First section whose entry count changed, if any */
  lengthMismatch: VerifiedSection | null;
  sections: Record<VerifiedSection, SectionComparison>;
}

export type TailoringState = 'INITIAL' | 'TAILORED' | 'VERIFIED_OK' | 'FORCE_RETRY' | 'FINAL';

export type RewriteMode = 'standard' | 'escalated';

// ============================================================================
// Pipeline Types
// ============================================================================

export interface PipelineContext {
  jobId: string;
  correlationId: string;
}

export interface TailoringResult {
  sections: ResumeSections;
  keywords: KeywordMap;
  /** Verification of the final sections against the original input */
  verification: VerificationReport;
  /** Branch taken after the first verification */
  path: 'VERIFIED_OK' | 'FORCE_RETRY';
  escalated: boolean;
  states: TailoringState[];
  extractionStrategy: string;
  context: PipelineContext;
  /** Audit entries recorded during this run (empty when audit logging is off) */
  auditLog: LogEntry[];
}

// ============================================================================
// Collaborator Interfaces
// ============================================================================

/**
 * Turns a file on disk into plain text
 */
export interface TextExtractor {
  extract(filePath: string): Promise<string>;
}

/**
 * Turns raw resume text into sections
 */
export interface ResumeTextParser {
  parse(text: string): ResumeSections;
}

/**
 * Writes sections to a file, returning the path actually written
 */
export interface DocumentRenderer {
  render(sections: ResumeSections, targetPath: string): Promise<string>;
}

export type { TextGenerator } from '../../shared/llm/types';
