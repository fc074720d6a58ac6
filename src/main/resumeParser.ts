/**
 * Resume Parser
 *
 * Turns raw resume text into ResumeSections. Plain text is split on section
 * headers; JSON input (sections or a JSON Resume document) is detected and
 * converted directly.
 */

import { PipelineErrorFactory } from '../tailor/errors/types';
import { ResumeSectionsValidator } from '../tailor/validation/validator';
import { loggers } from '../shared/logging/logger';
import type { EntryInput, ResumeSections, ResumeTextParser } from '../tailor/types';
import { fromJsonResume, isJsonResume } from './jsonResumeConverter';

// ============================================================================
// Types
// ============================================================================

type ParsedSection = 'summary' | 'skills' | 'experience' | 'education' | 'projects' | 'certifications';

/**
 * Header text (lower case, trailing colon removed) → section
 */
const SECTION_HEADERS = new Map<string, ParsedSection>([
  ['summary', 'summary'],
  ['professional summary', 'summary'],
  ['profile', 'summary'],
  ['objective', 'summary'],
  ['about', 'summary'],
  ['about me', 'summary'],
  ['skills', 'skills'],
  ['technical skills', 'skills'],
  ['core competencies', 'skills'],
  ['experience', 'experience'],
  ['work experience', 'experience'],
  ['professional experience', 'experience'],
  ['employment history', 'experience'],
  ['education', 'education'],
  ['projects', 'projects'],
  ['personal projects', 'projects'],
  ['selected projects', 'projects'],
  ['certifications', 'certifications'],
  ['certificates', 'certifications'],
  ['licenses and certifications', 'certifications']
]);

const BULLET = /^(?:[-*•·▪◦]|\d+[.)])\s+/;

export interface HeaderMatch {
  section: ParsedSection;
  /** Text after "Header:" on the same line */
  inline: string;
}

/**
 * Recognize a section header line such as "Experience", "SKILLS:" or
 * "Skills: Python, SQL"
 */
export function matchHeader(line: string): HeaderMatch | null {
  const cleaned = line.replace(/^#+\s*/, '').replace(/\*\*/g, '').trim();
  const colon = cleaned.indexOf(':');
  const head = (colon === -1 ? cleaned : cleaned.slice(0, colon)).trim().toLowerCase();
  const section = SECTION_HEADERS.get(head);
  if (!section) return null;
  return { section, inline: colon === -1 ? '' : cleaned.slice(colon + 1).trim() };
}

function isBullet(line: string): boolean {
  return BULLET.test(line);
}

function stripBullet(line: string): string {
  return line.replace(BULLET, '').trim();
}

/**
 * Group entry lines: a plain line starts an entry and the bullet lines under
 * it become its description. An entry head without a colon gets one, so the
 * head stays apart as the anchor.
 */
export function groupEntries(lines: readonly string[]): EntryInput[] {
  const entries: EntryInput[] = [];
  let head: string | null = null;
  let details: string[] = [];

  const flush = (): void => {
    if (head === null) return;
    if (details.length === 0) {
      entries.push(head);
    } else if (head.includes(':')) {
      entries.push(`${head} ${details.join(' ')}`);
    } else {
      entries.push(`${head}: ${details.join(' ')}`);
    }
    head = null;
    details = [];
  };

  for (const line of lines) {
    if (isBullet(line)) {
      const text = stripBullet(line);
      if (!text) continue;
      if (head === null) {
        entries.push(text);
      } else {
        details.push(text);
      }
    } else {
      flush();
      head = line;
    }
  }
  flush();
  return entries;
}

/**
 * Split skill lines on commas, semicolons, pipes and bullets
 */
export function splitSkills(lines: readonly string[]): string[] {
  return lines
    .flatMap(line => stripBullet(line).split(/[,;|•·]/))
    .map(skill => skill.trim())
    .filter(Boolean);
}

// ============================================================================
// Parser
// ============================================================================

export class ResumeParser implements ResumeTextParser {
  private readonly validator = new ResumeSectionsValidator();

  parse(text: string): ResumeSections {
    const trimmed = text.trim();
    if (!trimmed) {
      throw PipelineErrorFactory.emptyResumeText();
    }

    const sections = trimmed.startsWith('{') ? this.parseJson(trimmed) : this.parseText(trimmed);
    loggers.documents.debug({ sections: Object.keys(sections) }, 'Parsed resume');
    return sections;
  }

  /**
   * Parse a JSON document: ResumeSections or JSON Resume
   */
  parseJson(text: string): ResumeSections {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw PipelineErrorFactory.unparseableResume(
        `Resume looks like JSON but is not valid: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (isJsonResume(value)) {
      return fromJsonResume(value);
    }
    return this.validator.validateAndParse(value);
  }

  /**
   * Parse header-delimited plain text. The first line before any header is
   * the name; further lines before a header form the summary.
   */
  parseText(text: string): ResumeSections {
    const buckets = new Map<ParsedSection, string[]>();
    let current: ParsedSection | null = null;
    let name: string | undefined;
    const preamble: string[] = [];

    for (const rawLine of text.split('\n')) {
      const line = rawLine.trim();
      if (!line) continue;

      const header = matchHeader(line);
      if (header) {
        current = header.section;
        const bucket = buckets.get(current) ?? [];
        if (header.inline) bucket.push(header.inline);
        buckets.set(current, bucket);
        continue;
      }

      if (current) {
        buckets.get(current)?.push(line);
      } else if (name === undefined) {
        name = line;
      } else {
        preamble.push(line);
      }
    }

    const sections: ResumeSections = {};
    if (name) sections.name = name;

    const summary = [...preamble, ...(buckets.get('summary') ?? [])].join(' ').trim();
    if (summary) sections.summary = summary;

    const lines = (section: ParsedSection): string[] => buckets.get(section) ?? [];

    if (lines('skills').length > 0) sections.skills = splitSkills(lines('skills'));
    if (lines('experience').length > 0) sections.experience = groupEntries(lines('experience'));
    if (lines('education').length > 0) sections.education = lines('education').map(stripBullet);
    if (lines('projects').length > 0) sections.projects = groupEntries(lines('projects'));
    if (lines('certifications').length > 0) {
      sections.certifications = lines('certifications').map(stripBullet);
    }

    return sections;
  }
}

export const resumeParser = new ResumeParser();
