/**
 * JSON Resume Converter
 *
 * Converts between ResumeSections and the public JSON Resume schema
 * (basics, work, education, skills, projects, certificates).
 */

import { z } from 'zod';
import { splitAnchor, toEntry } from '../tailor/rewriter/entries';
import type { EntryInput, ResumeSections, StructuredEntryInput } from '../tailor/types';

// ============================================================================
// Schema
// ============================================================================

const optionalText = z.string().optional();

export const JsonResumeSchema = z.object({
  basics: z
    .object({
      name: optionalText,
      label: optionalText,
      email: optionalText,
      phone: optionalText,
      summary: optionalText
    })
    .passthrough()
    .optional(),
  work: z
    .array(
      z
        .object({
          name: optionalText,
          company: optionalText,
          position: optionalText,
          startDate: optionalText,
          endDate: optionalText,
          summary: optionalText,
          highlights: z.array(z.string()).optional()
        })
        .passthrough()
    )
    .optional(),
  education: z
    .array(
      z
        .object({
          institution: optionalText,
          area: optionalText,
          studyType: optionalText,
          endDate: optionalText
        })
        .passthrough()
    )
    .optional(),
  skills: z
    .array(
      z
        .object({
          name: optionalText,
          keywords: z.array(z.string()).optional()
        })
        .passthrough()
    )
    .optional(),
  projects: z
    .array(
      z
        .object({
          name: optionalText,
          description: optionalText,
          highlights: z.array(z.string()).optional()
        })
        .passthrough()
    )
    .optional(),
  certificates: z
    .array(
      z
        .object({
          name: optionalText,
          issuer: optionalText,
          date: optionalText
        })
        .passthrough()
    )
    .optional()
});

export type JsonResume = z.infer<typeof JsonResumeSchema>;

const JSON_RESUME_KEYS = ['basics', 'work', 'certificates'];

/**
 * True when a parsed JSON value looks like a JSON Resume document
 */
export function isJsonResume(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return JSON_RESUME_KEYS.some(key => key in value) && JsonResumeSchema.safeParse(value).success;
}

// ============================================================================
// Import
// ============================================================================

function joinText(parts: Array<string | undefined>, separator: string): string {
  return parts.map(part => part?.trim() ?? '').filter(Boolean).join(separator);
}

function dateRange(start?: string, end?: string): string | undefined {
  if (!start && !end) return undefined;
  return `${start ?? ''} - ${end || 'Present'}`.trim();
}

/**
 * Convert a JSON Resume document into sections. Work and project entries
 * become structured entries; `company`/`position` are kept as extra fields so
 * export can restore them.
 */
export function fromJsonResume(input: unknown): ResumeSections {
  const resume = JsonResumeSchema.parse(input);
  const sections: ResumeSections = {};

  const name = resume.basics?.name?.trim();
  if (name) sections.name = name;

  const summary = resume.basics?.summary?.trim();
  if (summary) sections.summary = summary;

  const skills = (resume.skills ?? []).flatMap(skill => [
    ...(skill.name ? [skill.name] : []),
    ...(skill.keywords ?? [])
  ]);
  if (skills.length > 0) sections.skills = skills.map(skill => skill.trim()).filter(Boolean);

  const work = resume.work ?? [];
  if (work.length > 0) {
    sections.experience = work.map(job => {
      const company = job.name ?? job.company ?? '';
      const position = job.position ?? '';
      const entry: StructuredEntryInput = {
        anchor: joinText([position, company], ' at ') || 'Experience',
        description: joinText([job.summary, ...(job.highlights ?? [])], ' ')
      };
      const dates = dateRange(job.startDate, job.endDate);
      if (dates) entry.dates = dates;
      if (company) entry.company = company;
      if (position) entry.position = position;
      return entry;
    });
  }

  const education = (resume.education ?? [])
    .map(item => {
      const degree = joinText([item.studyType, item.area], ' in ');
      const text = joinText([degree, item.institution], ', ');
      return item.endDate ? `${text} (${item.endDate})` : text;
    })
    .filter(Boolean);
  if (education.length > 0) sections.education = education;

  const projects = resume.projects ?? [];
  if (projects.length > 0) {
    sections.projects = projects.map(project => ({
      anchor: project.name?.trim() || 'Project',
      description: joinText([project.description, ...(project.highlights ?? [])], ' ')
    }));
  }

  const certifications = (resume.certificates ?? [])
    .map(cert => joinText([cert.name, cert.issuer], ', '))
    .filter(Boolean);
  if (certifications.length > 0) sections.certifications = certifications;

  return sections;
}

// ============================================================================
// Export
// ============================================================================

interface ExportedEntry {
  title: string;
  description: string;
  dates?: string;
  extra: Record<string, string>;
}

function exportEntry(input: EntryInput): ExportedEntry {
  const entry = toEntry(input);
  if (entry.kind === 'structured') {
    return { title: entry.anchor, description: entry.description, dates: entry.dates, extra: entry.extra };
  }
  const parts = splitAnchor(entry.raw);
  return parts
    ? { title: parts.anchor.trim(), description: parts.description, extra: {} }
    : { title: '', description: entry.raw, extra: {} };
}

function splitDates(dates?: string): { startDate?: string; endDate?: string } {
  if (!dates) return {};
  const [start, end] = dates.split(/\s+-\s+/);
  return {
    startDate: start?.trim() || undefined,
    endDate: end?.trim() || undefined
  };
}

/**
 * Convert sections into a JSON Resume document
 */
export function toJsonResume(sections: ResumeSections): JsonResume {
  return {
    basics: {
      name: sections.name ?? '',
      summary: sections.summary ?? ''
    },
    skills: (sections.skills ?? []).map(name => ({ name })),
    work: (sections.experience ?? []).map(input => {
      const { title, description, dates, extra } = exportEntry(input);
      return {
        name: extra.company ?? title,
        position: extra.position ?? '',
        ...splitDates(dates),
        summary: description
      };
    }),
    education: (sections.education ?? []).map(institution => ({ institution })),
    projects: (sections.projects ?? []).map(input => {
      const { title, description } = exportEntry(input);
      return { name: title, description };
    }),
    certificates: (sections.certifications ?? []).map(name => ({ name }))
  };
}
