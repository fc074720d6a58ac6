/**
 * Property-Based Tests for Section Tailoring
 *
 * Whatever text the generator returns (echoed or altered anchors, extra
 * colons, quotes, labels), every anchored entry comes back behind exactly
 * the anchor it went in with.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { SectionTailor } from '../../tailor/rewriter/sectionTailor';
import { finalizeKeywordMap } from '../../tailor/keywords/normalizer';
import type { EntryInput, ResumeSections } from '../../tailor/types';
import { JOB_DESCRIPTION, StubGenerator, promptSection } from './fixtures';

// ============================================================================
// Custom Arbitraries (Generators)
// ============================================================================

type Reply = (anchor: string) => string;

const keywords = finalizeKeywordMap(
  { programming_languages: ['Python', 'SQL'], cloud_technologies: ['AWS'] },
  7
);

/**
 * Anchor text as it appears before the first colon of a flat entry
 */
const anchorArbitrary = (): fc.Arbitrary<string> =>
  fc.oneof(
    fc.constantFrom('Acme Corp', ' Globex ', 'Data Analyst, Initech', '"Quoted" Ltd', ''),
    fc.string({ maxLength: 30 }).filter(text => !text.includes(':'))
  );

const textArbitrary = (): fc.Arbitrary<string> =>
  fc.oneof(
    fc.string({ maxLength: 60 }),
    fc.constantFrom(
      'Automated weekly reporting: cut turnaround by half',
      'Built ETL pipelines in Python and SQL on AWS',
      ':::',
      '   '
    )
  );

/**
 * Flat "<anchor>:<description>" strings and structured records
 */
const entryArbitrary = (): fc.Arbitrary<EntryInput> =>
  fc.oneof(
    fc.tuple(anchorArbitrary(), textArbitrary()).map(([anchor, description]) => `${anchor}:${description}`),
    fc.record({ anchor: anchorArbitrary(), description: textArbitrary() })
  );

/**
 * Generator replies shaped after the prompt's anchor
 */
const replyArbitrary = (): fc.Arbitrary<Reply> =>
  fc.tuple(
    fc.constantFrom<(anchor: string, text: string) => string>(
      (_, text) => text,
      (anchor, text) => `${anchor}: ${text}`,
      (anchor, text) => `${anchor.toUpperCase()}: ${text}`,
      (anchor, text) => `"${anchor}: ${text}"`,
      (_, text) => `Rephrased description: ${text}`,
      (_, text) => `“${text}: with a colon”`,
      (anchor, text) => `\`\`\`\n${anchor}:${text}\n\`\`\``
    ),
    textArbitrary()
  ).map(([template, text]) => (anchor: string) => template(anchor, text));

function replayGenerator(replies: readonly Reply[]): StubGenerator {
  let call = 0;
  return new StubGenerator(prompt => {
    const reply = replies[call % replies.length];
    call++;
    return reply(promptSection(prompt, 'Anchor (do not alter)'));
  });
}

function anchorPrefix(input: EntryInput): string | null {
  if (typeof input !== 'string') {
    return null;
  }
  const colon = input.indexOf(':');
  return colon === -1 ? null : input.slice(0, colon + 1);
}

// ============================================================================
// Properties
// ============================================================================

describe('Section Tailoring Properties', () => {
  it('should keep every anchor byte-for-byte whatever the generator returns', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(entryArbitrary(), { maxLength: 4 }),
        fc.array(entryArbitrary(), { maxLength: 3 }),
        fc.array(replyArbitrary(), { minLength: 1, maxLength: 5 }),
        async (experience, projects, replies) => {
          const input: ResumeSections = { experience, projects };
          const tailor = new SectionTailor(replayGenerator(replies));

          const output = await tailor.tailor(structuredClone(input), keywords, JOB_DESCRIPTION);

          for (const section of ['experience', 'projects'] as const) {
            const before = input[section] ?? [];
            const after = output[section] ?? [];
            expect(after).toHaveLength(before.length);

            before.forEach((original, i) => {
              const tailored = after[i];
              if (typeof original === 'string') {
                const prefix = anchorPrefix(original);
                expect(typeof tailored).toBe('string');
                if (typeof tailored === 'string' && prefix !== null) {
                  expect(tailored.slice(0, prefix.length)).toBe(prefix);
                }
              } else {
                expect(typeof tailored).toBe('object');
                if (typeof tailored !== 'string') {
                  expect(tailored.anchor).toBe(original.anchor);
                }
              }
            });
          }
        }
      )
    );
  });

  it('should never send anything but the anchor in the anchor block', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.constantFrom('Acme Corp', 'Globex', 'Initech'), { minLength: 1, maxLength: 4 }),
        async anchors => {
          const generator = new StubGenerator(() => 'Delivered reporting improvements: faster close');
          const experience = anchors.map(anchor => `${anchor}: Built reports`);

          await new SectionTailor(generator, { concurrency: 1 }).tailor({ experience }, keywords, JOB_DESCRIPTION);

          expect(generator.prompts.map(prompt => promptSection(prompt, 'Anchor (do not alter)'))).toEqual(anchors);
        }
      )
    );
  });
});
