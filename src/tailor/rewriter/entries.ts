/**
 * Entry conversion
 *
 * Experience and project entries arrive either as structured records or as
 * "<anchor>: <description>" strings. Rewriting works on the tagged Entry
 * union; these functions convert at the boundary and restore the caller's
 * shape afterwards.
 */

import type { Entry, EntryInput, FlatEntry, StructuredEntry, StructuredEntryInput } from '../types';

const RESERVED_FIELDS = new Set(['anchor', 'description', 'dates']);

/**
 * Split a flat string at its first colon. Returns null when there is none.
 */
export function splitAnchor(raw: string): { anchor: string; description: string } | null {
  const index = raw.indexOf(':');
  if (index === -1) {
    return null;
  }
  return {
    anchor: raw.slice(0, index),
    description: raw.slice(index + 1).trim()
  };
}

export function toEntry(input: EntryInput): Entry {
  if (typeof input === 'string') {
    const parts = splitAnchor(input);
    const flat: FlatEntry = { kind: 'flat', raw: input };
    if (parts) {
      flat.anchor = parts.anchor;
      flat.description = parts.description;
    }
    return flat;
  }

  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(input)) {
    if (!RESERVED_FIELDS.has(key) && value !== undefined) {
      extra[key] = value;
    }
  }

  const entry: StructuredEntry = {
    kind: 'structured',
    anchor: input.anchor,
    description: input.description,
    extra
  };
  if (input.dates !== undefined) {
    entry.dates = input.dates;
  }
  return entry;
}

export function fromEntry(entry: Entry): EntryInput {
  if (entry.kind === 'flat') {
    return entry.raw;
  }

  const output: StructuredEntryInput = {
    anchor: entry.anchor,
    description: entry.description
  };
  if (entry.dates !== undefined) {
    output.dates = entry.dates;
  }
  return { ...output, ...entry.extra };
}

/**
 * Whether the entry has an anchor that can be kept apart from its text
 */
export function isTailorable(entry: Entry): boolean {
  return entry.kind === 'structured' || entry.anchor !== undefined;
}

export function entryDescription(entry: Entry): string {
  return entry.description ?? '';
}

/**
 * Copy of the entry with a new description. The anchor is carried over as is.
 */
export function withDescription(entry: Entry, description: string): Entry {
  if (entry.kind === 'structured') {
    return { ...entry, description, extra: { ...entry.extra } };
  }
  if (entry.anchor === undefined) {
    return entry;
  }
  return {
    kind: 'flat',
    raw: `${entry.anchor}: ${description}`,
    anchor: entry.anchor,
    description
  };
}

/**
 * Anchor of an entry as supplied, or null for colon-less strings
 */
export function anchorOf(input: EntryInput): string | null {
  if (typeof input === 'string') {
    return splitAnchor(input)?.anchor ?? null;
  }
  return input.anchor;
}

/**
 * Stable serialization for comparing entries: strings as is, records as
 * JSON with sorted keys
 */
export function canonicalEntry(input: EntryInput): string {
  if (typeof input === 'string') {
    return input;
  }
  const sorted = Object.keys(input)
    .sort()
    .filter(key => input[key] !== undefined)
    .map(key => [key, input[key]]);
  return JSON.stringify(Object.fromEntries(sorted));
}
