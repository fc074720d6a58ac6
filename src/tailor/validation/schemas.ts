/**
 * Tailor Validation Schemas
 *
 * Zod schemas for resume sections, keyword maps, generator output and
 * HTTP request bodies.
 */

import { z } from 'zod';

// ============================================================================
// Resume Schemas
// ============================================================================

/**
 * Structured experience/project entry. Extra string fields are kept.
 */
export const StructuredEntrySchema = z
  .object({
    anchor: z.string().min(1, 'Entry anchor is required'),
    description: z.string(),
    dates: z.string().optional()
  })
  .catchall(z.string());

export const EntrySchema = z.union([z.string(), StructuredEntrySchema]);

export const ResumeSectionsSchema = z.object({
  name: z.string().optional(),
  summary: z.string().optional(),
  skills: z.array(z.string()).optional(),
  experience: z.array(EntrySchema).optional(),
  education: z.array(z.string()).optional(),
  projects: z.array(EntrySchema).optional(),
  certifications: z.array(z.string()).optional()
});

// ============================================================================
// Keyword Schemas
// ============================================================================

export const KeywordMapSchema = z.object({
  technical_skills: z.array(z.string()),
  soft_skills: z.array(z.string()),
  programming_languages: z.array(z.string()),
  technical_tools: z.array(z.string()),
  data_tools: z.array(z.string()),
  cloud_technologies: z.array(z.string())
});

/**
 * A generated JSON object: category → keywords
 */
export const GeneratedKeywordsSchema = z.record(z.unknown());

/**
 * One category value in generated JSON: a list (non-strings dropped)
 * or a comma-separated string
 */
export const GeneratedKeywordValueSchema = z
  .union([z.string(), z.array(z.unknown())])
  .transform(value =>
    typeof value === 'string'
      ? value.split(',')
      : value.filter((item): item is string => typeof item === 'string')
  );

// ============================================================================
// HTTP Request Schemas
// ============================================================================

export const TailorOptionsSchema = z.object({
  includeSoftSkills: z.boolean().optional(),
  changeThreshold: z.number().min(0).max(1).optional()
});

export const TailorRequestSchema = z
  .object({
    resumeText: z.string().optional(),
    resume: ResumeSectionsSchema.optional(),
    jobDescription: z.string().trim().min(1, 'Job description is required'),
    options: TailorOptionsSchema.optional()
  })
  .refine(body => body.resumeText !== undefined || body.resume !== undefined, {
    message: 'Either resumeText or resume is required',
    path: ['resumeText']
  });

export const KeywordsRequestSchema = z.object({
  jobDescription: z.string()
});

/**
 * Resume file upload: base64 content plus the original file name
 */
export const ExtractRequestSchema = z.object({
  fileName: z.string().min(1, 'fileName is required'),
  fileContent: z.string().min(1, 'fileContent is required')
});

export type TailorRequest = z.infer<typeof TailorRequestSchema>;
export type KeywordsRequest = z.infer<typeof KeywordsRequestSchema>;
export type ExtractRequest = z.infer<typeof ExtractRequestSchema>;
