/**
 * Keyword taxonomy classifier
 *
 * A taxonomy is an ordered list of (category, keywords) entries. The label is
 * lower-cased and the FIRST entry with a keyword contained in it wins, even if
 * a later entry matches a longer keyword.
 */

import type {
  CategoryAssignment,
  InstrumentEntry,
  TaxonomyEntry,
  TaxonomyTable,
} from '../domain/types.js';
import { INSTRUMENTS } from './tables.js';

export function classify<E extends TaxonomyEntry>(
  label: string,
  taxonomy: TaxonomyTable<E>
): CategoryAssignment | null {
  const entry = classifyEntry(label, taxonomy);
  return entry ? { label, category: entry.entry.category, matched_keyword: entry.keyword } : null;
}

/**
 * Same as classify, but returns the matched table entry so callers can read
 * its metadata (severity, penalty, ...).
 */
export function classifyEntry<E extends TaxonomyEntry>(
  label: string,
  taxonomy: TaxonomyTable<E>
): { entry: E; keyword: string } | null {
  const text = label.toLowerCase();
  if (!text.trim()) return null;

  for (const entry of taxonomy) {
    for (const keyword of entry.keywords) {
      if (text.includes(keyword.toLowerCase())) {
        return { entry, keyword };
      }
    }
  }
  return null;
}

/**
 * Distinct categories matched by any of the labels, in table order.
 */
export function classifyAll<E extends TaxonomyEntry>(
  labels: string[],
  taxonomy: TaxonomyTable<E>
): string[] {
  const matched = new Set<string>();
  for (const label of labels) {
    const assignment = classify(label, taxonomy);
    if (assignment) matched.add(assignment.category);
  }
  return taxonomy.map((e) => e.category).filter((c) => matched.has(c));
}

/**
 * First instrument pattern contained in the label.
 */
export function matchInstrument(
  label: string,
  instruments: readonly InstrumentEntry[] = INSTRUMENTS
): InstrumentEntry | null {
  const text = label.toLowerCase();
  return instruments.find((entry) => text.includes(entry.instrument)) ?? null;
}

export function scoreInstrument(
  label: string,
  instruments: readonly InstrumentEntry[] = INSTRUMENTS
): number | null {
  return matchInstrument(label, instruments)?.score ?? null;
}
