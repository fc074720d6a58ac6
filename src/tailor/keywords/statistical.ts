/**
 * Statistical Keyword Extraction
 *
 * Deterministic extraction used when the generator is unavailable:
 * - known technology terms matched by pattern
 * - requirement phrases ("experience with X", "knowledge of Y")
 * - RAKE phrase scoring with a position weight favouring earlier phrases
 */

import stopwordList from '../data/stopwords.json';
import techTermList from '../data/techTerms.json';

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const MAX_PHRASE_WORDS = 4;
const POSITION_BONUS = 0.5;
const DEFAULT_PHRASE_LIMIT = 15;

// Single letters that are real terms on their own
const SINGLE_LETTER_TERMS: ReadonlySet<string> = new Set(['c', 'r']);

export interface ScoredPhrase {
  phrase: string;
  score: number;
  firstIndex: number;
  occurrences: number;
}

interface Candidate {
  words: string[];
  index: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const TECH_CANONICAL: ReadonlyMap<string, string> = new Map(
  techTermList.map(term => [term.toLowerCase(), term])
);

// Longest alternatives first so "JavaScript" wins over "Java"
const TECH_PATTERN = new RegExp(
  `(?<![A-Za-z0-9])(?:${techTermList
    .filter(term => term.length > 1)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|')})(?![A-Za-z0-9])`,
  'gi'
);

// Single-letter languages only count in upper case
const SINGLE_LETTER_PATTERN = new RegExp(
  `(?<![A-Za-z0-9])(?:${techTermList
    .filter(term => term.length === 1)
    .map(escapeRegExp)
    .join('|') || '(?!)'})(?![A-Za-z0-9&])`,
  'g'
);

const REQUIREMENT_PATTERN =
  /(?:proficient|experience|knowledge|skills|expertise|familiarity|ability) (?:in|with|of|to) ([^.;,\n]*)/gi;

/**
 * Known technology terms in order of first appearance, canonically spelled
 */
export function matchTechTerms(text: string): string[] {
  const hits: Array<{ index: number; term: string }> = [];

  for (const pattern of [TECH_PATTERN, SINGLE_LETTER_PATTERN]) {
    for (const match of text.matchAll(pattern)) {
      const term = TECH_CANONICAL.get(match[0].toLowerCase()) ?? match[0];
      hits.push({ index: match.index ?? 0, term });
    }
  }

  hits.sort((a, b) => a.index - b.index);
  return uniqueCaseInsensitive(hits.map(hit => hit.term));
}

/**
 * Objects of requirement phrases, split on "and"/"or"
 */
export function matchRequirementPhrases(text: string): string[] {
  const phrases: string[] = [];

  for (const match of text.matchAll(REQUIREMENT_PATTERN)) {
    const captured = match[1] ?? '';
    for (const part of captured.split(/\s+(?:and|or)\s+|\s*&\s*/i)) {
      const phrase = part.trim();
      if (phrase.length > 3 && phrase.split(/\s+/).length <= MAX_PHRASE_WORDS) {
        phrases.push(phrase);
      }
    }
  }

  return uniqueCaseInsensitive(phrases);
}

function cleanWord(word: string): string {
  return word
    .toLowerCase()
    .replace(/^[^a-z0-9]+/, '')
    .replace(/[^a-z0-9+#]+$/, '');
}

function isDelimiterWord(word: string): boolean {
  if (!word || STOPWORDS.has(word)) return true;
  if (/^\d+(?:[.,]\d+)*\+?$/.test(word)) return true;
  return word.length === 1 && !SINGLE_LETTER_TERMS.has(word);
}

/**
 * Split text into candidate phrases: maximal runs of content words between
 * punctuation and stopwords
 */
export function candidatePhrases(text: string): Candidate[] {
  const fragments = text.split(/[,;:!?()[\]{}"|•\r\n\t]+|\.(?=\s|$)|\s[-–—]\s/);
  const candidates: Candidate[] = [];

  const flush = (words: string[]): void => {
    if (words.length > 0 && words.length <= MAX_PHRASE_WORDS) {
      candidates.push({ words, index: candidates.length });
    }
  };

  for (const fragment of fragments) {
    let current: string[] = [];
    for (const raw of fragment.split(/\s+/)) {
      const word = cleanWord(raw);
      if (isDelimiterWord(word)) {
        flush(current);
        current = [];
      } else {
        current.push(word);
      }
    }
    flush(current);
  }

  return candidates;
}

/**
 * RAKE scoring: word score = degree / frequency, phrase score = sum of word
 * scores, repeated phrases gain one point per extra occurrence, and the
 * result is weighted by how early the phrase first appears.
 */
export function scorePhrases(text: string, limit = DEFAULT_PHRASE_LIMIT): ScoredPhrase[] {
  const candidates = candidatePhrases(text);
  if (candidates.length === 0) {
    return [];
  }

  const frequency = new Map<string, number>();
  const degree = new Map<string, number>();
  for (const { words } of candidates) {
    for (const word of words) {
      frequency.set(word, (frequency.get(word) ?? 0) + 1);
      degree.set(word, (degree.get(word) ?? 0) + words.length);
    }
  }

  const phrases = new Map<string, { words: string[]; firstIndex: number; occurrences: number }>();
  for (const { words, index } of candidates) {
    const key = words.join(' ');
    const existing = phrases.get(key);
    if (existing) {
      existing.occurrences++;
    } else {
      phrases.set(key, { words, firstIndex: index, occurrences: 1 });
    }
  }

  const total = candidates.length;
  const scored: ScoredPhrase[] = [];
  for (const [phrase, { words, firstIndex, occurrences }] of phrases) {
    const rake = words.reduce(
      (sum, word) => sum + (degree.get(word) ?? 0) / (frequency.get(word) ?? 1),
      0
    );
    const positionWeight = 1 + POSITION_BONUS * (1 - firstIndex / total);
    scored.push({
      phrase,
      score: (rake + occurrences - 1) * positionWeight,
      firstIndex,
      occurrences
    });
  }

  scored.sort((a, b) => b.score - a.score || a.firstIndex - b.firstIndex);
  return scored.slice(0, limit);
}

/**
 * Full statistical term list: technology terms, then requirement phrases,
 * then the top-scoring RAKE phrases
 */
export function extractStatisticalTerms(text: string, phraseLimit = DEFAULT_PHRASE_LIMIT): string[] {
  return uniqueCaseInsensitive([
    ...matchTechTerms(text),
    ...matchRequirementPhrases(text),
    ...scorePhrases(text, phraseLimit).map(scored => scored.phrase)
  ]);
}

function uniqueCaseInsensitive(terms: readonly string[]): string[] {
  const seen = new Set<string>();
  return terms.filter(term => {
    const key = term.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
