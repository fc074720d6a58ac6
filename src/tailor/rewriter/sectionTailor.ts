/**
 * Section Tailor
 *
 * Rewrites experience and project descriptions through the text generator.
 * Anchors (company/role, project title) never pass through the generator and
 * are reattached unchanged. A failed or too-short rewrite keeps the original
 * description.
 *
 * Keyword assignment is planned sequentially so that it is deterministic;
 * the rewrites themselves then run with bounded concurrency.
 */

import { DEFAULT_CONFIG, TailorConfig } from '../config';
import { GracefulDegradation } from '../errors/gracefulDegradation';
import { TailorLogger } from '../logging/logger';
import { INFUSION_PRIORITY } from '../infuser/skillInfuser';
import { flattenKeywordMap } from '../keywords/normalizer';
import { mapWithConcurrency } from '../../shared/utils/concurrency';
import { toError } from '../../shared/errors/types';
import {
  TAILORED_SECTIONS,
  Entry,
  KeywordMap,
  PipelineContext,
  ResumeSections,
  RewriteMode,
  TailoredSection,
  TextGenerator
} from '../types';
import {
  entryDescription,
  fromEntry,
  isTailorable,
  toEntry,
  withDescription
} from './entries';
import { buildRewritePrompt } from './prompts';

export type SectionTailorOptions = TailorConfig['rewriting'];

/**
 * Immutable per-entry plan, fixed before any generator call
 */
export interface EntryPlan {
  section: TailoredSection;
  index: number;
  entry: Entry;
  /** null when the entry is left alone (no anchor can be isolated) */
  keywords: readonly string[] | null;
}

export type EntryOutcome = 'rewritten' | 'kept' | 'skipped';

export interface TailorReport {
  mode: RewriteMode;
  rewritten: number;
  kept: number;
  skipped: number;
}

export interface TailorOutput {
  sections: ResumeSections;
  report: TailorReport;
}

/**
 * Assign candidate keywords to entries, preferring keywords no earlier entry
 * received. When every keyword has been handed out, assignment starts over
 * from the full list.
 */
export function planKeywordAssignment(
  entries: ReadonlyArray<{ section: TailoredSection; index: number; entry: Entry }>,
  keywords: readonly string[],
  perEntry: number
): EntryPlan[] {
  const used = new Set<string>();

  return entries.map(({ section, index, entry }) => {
    if (!isTailorable(entry)) {
      return { section, index, entry, keywords: null };
    }

    let pool = keywords.filter(keyword => !used.has(keyword.toLowerCase()));
    if (pool.length === 0) {
      used.clear();
      pool = [...keywords];
    }

    const chosen = pool.slice(0, perEntry);
    for (const keyword of chosen) {
      used.add(keyword.toLowerCase());
    }
    return { section, index, entry, keywords: Object.freeze(chosen) };
  });
}

const CODE_FENCE_START = /^```[a-z]*\s*/i;
const CODE_FENCE_END = /\s*```$/;
const LABEL_PREFIX =
  /^(?:(?:rephrased|rewritten|revised|updated|tailored|improved|new)\s+(?:description|version|text|entry)|description|rephrased|rewritten)\s*:\s*/i;
const QUOTE_PAIRS: ReadonlyArray<[string, string]> = [
  ['"', '"'],
  ["'", "'"],
  ['“', '”'],
  ['‘', '’'],
  ['`', '`']
];

function stripQuotes(text: string): string {
  for (const [open, close] of QUOTE_PAIRS) {
    if (text.length >= 2 && text.startsWith(open) && text.endsWith(close)) {
      return text.slice(open.length, text.length - close.length).trim();
    }
  }
  return text;
}

/**
 * Remove code fences, surrounding quotes, "Rephrased description:" style
 * labels and a repeated anchor from generated text
 */
export function cleanRewrite(text: string, anchor?: string): string {
  let cleaned = text.trim().replace(CODE_FENCE_START, '').replace(CODE_FENCE_END, '').trim();
  cleaned = stripQuotes(cleaned);
  cleaned = cleaned.replace(LABEL_PREFIX, '').trim();
  cleaned = stripQuotes(cleaned);

  const trimmedAnchor = anchor?.trim();
  if (trimmedAnchor && cleaned.startsWith(`${trimmedAnchor}:`)) {
    cleaned = cleaned.slice(trimmedAnchor.length + 1).trim();
  }

  return cleaned.replace(/\s+/g, ' ').trim();
}

export class SectionTailor {
  private readonly options: SectionTailorOptions;
  private readonly degradation: GracefulDegradation;

  constructor(
    private readonly generator: TextGenerator,
    options: Partial<SectionTailorOptions> = {},
    private readonly audit: TailorLogger = new TailorLogger()
  ) {
    this.options = { ...DEFAULT_CONFIG.rewriting, ...options };
    this.degradation = new GracefulDegradation(audit);
  }

  /**
   * Rewrite experience and project entries. Other sections are copied as is.
   */
  async tailor(
    sections: ResumeSections,
    keywords: KeywordMap,
    jobDescription: string,
    mode: RewriteMode = 'standard',
    context?: PipelineContext
  ): Promise<ResumeSections> {
    const output = await this.tailorWithReport(sections, keywords, jobDescription, mode, context);
    return output.sections;
  }

  async tailorWithReport(
    sections: ResumeSections,
    keywords: KeywordMap,
    jobDescription: string,
    mode: RewriteMode = 'standard',
    context?: PipelineContext
  ): Promise<TailorOutput> {
    const entries = TAILORED_SECTIONS.flatMap(section =>
      (sections[section] ?? []).map((input, index) => ({ section, index, entry: toEntry(input) }))
    );

    const candidates = flattenKeywordMap(keywords, INFUSION_PRIORITY);
    const plans = planKeywordAssignment(entries, candidates, this.options.keywordsPerEntry);

    const results = await mapWithConcurrency(plans, this.options.concurrency, plan =>
      this.rewriteEntry(plan, jobDescription, mode)
    );

    const tailored: ResumeSections = { ...sections };
    for (const section of TAILORED_SECTIONS) {
      if (sections[section]) {
        tailored[section] = results
          .filter(result => result.plan.section === section)
          .map(result => fromEntry(result.entry));
      }
    }

    const report: TailorReport = {
      mode,
      rewritten: results.filter(r => r.outcome === 'rewritten').length,
      kept: results.filter(r => r.outcome === 'kept').length,
      skipped: results.filter(r => r.outcome === 'skipped').length
    };
    this.audit.logTailoring(mode, report.rewritten, report.kept, report.skipped, context);

    return { sections: tailored, report };
  }

  private async rewriteEntry(
    plan: EntryPlan,
    jobDescription: string,
    mode: RewriteMode
  ): Promise<{ plan: EntryPlan; entry: Entry; outcome: EntryOutcome }> {
    const { entry } = plan;
    if (plan.keywords === null || entry.anchor === undefined) {
      return { plan, entry, outcome: 'skipped' };
    }

    const description = entryDescription(entry);
    const prompt = buildRewritePrompt({
      section: plan.section,
      anchor: entry.anchor,
      description,
      jobDescription,
      keywords: plan.keywords,
      mode
    });

    let generated: string;
    try {
      generated = await this.generator.generate(prompt);
    } catch (error) {
      this.degradation.handleRewriteFailure(entry.anchor, description, toError(error));
      return { plan, entry, outcome: 'kept' };
    }

    const cleaned = cleanRewrite(generated, entry.anchor);
    if (cleaned.length < this.options.minRewriteLength) {
      return { plan, entry, outcome: 'kept' };
    }

    return { plan, entry: withDescription(entry, cleaned), outcome: 'rewritten' };
  }
}
