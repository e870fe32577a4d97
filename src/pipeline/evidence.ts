/**
 * Evidence-quality dimension: sample size, venue, durability, completeness
 */

import { DURABILITY_CONFIG, NEUTRAL_SCORE } from '../config/defaults.js';
import type { EvidenceRecord, PublicationInfo } from '../domain/types.js';
import { clampScore } from '../utils/math.js';
import type { FactorResult } from './clinical.js';

// ============================================================================
// Sample size
// ============================================================================

export function bucketSampleSize(n: number): number {
  if (n >= 20) return 10;
  if (n >= 15) return 9;
  if (n >= 10) return 8;
  if (n >= 5) return 6;
  if (n >= 3) return 4;
  if (n >= 2) return 2;
  return 1;
}

export function scoreSampleSize(record: EvidenceRecord): FactorResult {
  const n = record.sample_size;
  if (n == null || !Number.isFinite(n)) {
    return { value: NEUTRAL_SCORE, basis: 'Sample size not reported' };
  }
  return { value: clampScore(bucketSampleSize(n)), basis: `N=${n}` };
}

// ============================================================================
// Publication venue
// ============================================================================

const VENUE_SCORES = {
  peer_reviewed: 10,
  preprint: 6,
  conference_abstract: 4,
  other: 2,
} as const;

export function scoreVenue(publication: PublicationInfo): FactorResult {
  if (publication.venue_type !== 'unknown') {
    return {
      value: VENUE_SCORES[publication.venue_type],
      basis: publication.venue_type,
    };
  }
  if (publication.journal && publication.journal.trim()) {
    return { value: 8, basis: `Journal named (${publication.journal})` };
  }
  return { value: NEUTRAL_SCORE, basis: 'Venue unknown' };
}

// ============================================================================
// Durability
// ============================================================================

export type Horizon = 'long' | 'medium' | 'short';

const LONG_TERM_KEYWORDS = ['long-term', 'long term', 'sustained', 'durable', 'maintained'];

const UNITS_PER_YEAR: Record<string, number> = {
  day: 365,
  week: 52,
  wk: 52,
  month: 12,
  mo: 12,
  year: 1,
  yr: 1,
};

const NUMBER_THEN_UNIT = /(\d+(?:\.\d+)?)[\s-]*(days?|weeks?|wks?|months?|mos?|years?|yrs?)\b/g;
const UNIT_THEN_NUMBER = /\b(days?|weeks?|wks?|months?|mos?|years?|yrs?)[\s-]*(\d+(?:\.\d+)?)/g;

function toMonths(value: number, unit: string): number {
  const singular = unit.endsWith('s') ? unit.slice(0, -1) : unit;
  const per_year = UNITS_PER_YEAR[singular];
  return per_year ? (value * 12) / per_year : 0;
}

/**
 * Longest duration mentioned in the text, in months. Accepts "18 months",
 * "2-year" and "week 52" forms.
 */
export function parseDurationMonths(text: string): number | null {
  const lower = text.toLowerCase();
  const durations: number[] = [];

  for (const m of lower.matchAll(NUMBER_THEN_UNIT)) {
    durations.push(toMonths(Number(m[1]), m[2]));
  }
  for (const m of lower.matchAll(UNIT_THEN_NUMBER)) {
    durations.push(toMonths(Number(m[2]), m[1]));
  }

  return durations.length > 0 ? Math.max(...durations) : null;
}

export function classifyHorizon(text: string | null | undefined): Horizon | null {
  if (!text || !text.trim()) return null;
  const lower = text.toLowerCase();
  if (LONG_TERM_KEYWORDS.some((k) => lower.includes(k))) return 'long';

  const months = parseDurationMonths(lower);
  if (months === null) return null;
  if (months >= DURABILITY_CONFIG.LONG_TERM_MONTHS) return 'long';
  if (months >= DURABILITY_CONFIG.MEDIUM_TERM_MONTHS) return 'medium';
  return 'short';
}

const HORIZON_RANK: Record<Horizon, number> = { long: 3, medium: 2, short: 1 };

function horizonScore(horizon: Horizon): number {
  if (horizon === 'long') return DURABILITY_CONFIG.LONG_TERM_SCORE;
  if (horizon === 'medium') return DURABILITY_CONFIG.MEDIUM_TERM_SCORE;
  return DURABILITY_CONFIG.SHORT_TERM_SCORE;
}

export function scoreDurability(record: EvidenceRecord): FactorResult {
  const cfg = DURABILITY_CONFIG;
  const endpoint_horizons = record.efficacy_endpoints.map((ep) => classifyHorizon(ep.timepoint));
  const candidates = [classifyHorizon(record.publication.follow_up_duration), ...endpoint_horizons]
    .filter((h): h is Horizon => h !== null);

  if (candidates.length === 0) {
    return { value: NEUTRAL_SCORE, basis: 'No follow-up duration' };
  }

  const horizon = candidates.reduce((a, b) => (HORIZON_RANK[b] > HORIZON_RANK[a] ? b : a));
  const durable_endpoints = endpoint_horizons.filter((h) => h === 'long' || h === 'medium').length;
  const bonus = Math.min(cfg.MAX_ENDPOINT_BONUS, durable_endpoints * cfg.ENDPOINT_BONUS);

  return {
    value: clampScore(horizonScore(horizon) + bonus),
    basis: `${horizon}-term follow-up` + (bonus > 0 ? ` (+${bonus} endpoint bonus)` : ''),
  };
}

// ============================================================================
// Completeness
// ============================================================================

export interface CompletenessCheck {
  item: string;
  passed: boolean;
}

function hasText(value: string | null | undefined): boolean {
  return value != null && value.trim().length > 0;
}

export function completenessChecklist(record: EvidenceRecord): CompletenessCheck[] {
  const endpoints = record.efficacy_endpoints;
  return [
    { item: 'sample_size', passed: record.sample_size != null && record.sample_size > 0 },
    { item: 'publication_year', passed: record.publication.year != null },
    { item: 'follow_up_duration', passed: hasText(record.publication.follow_up_duration) },
    { item: 'endpoints', passed: endpoints.length > 0 },
    { item: 'primary_endpoint', passed: endpoints.some((ep) => ep.category === 'primary') },
    {
      item: 'quantitative_result',
      passed:
        record.responders_pct != null ||
        endpoints.some(
          (ep) =>
            ep.responders_pct != null ||
            ep.responders_n != null ||
            ep.change_pct != null ||
            ep.change_from_baseline != null
        ),
    },
    {
      item: 'statistical_testing',
      passed: endpoints.some((ep) => ep.p_value != null || ep.statistically_significant != null),
    },
    {
      item: 'safety_data',
      passed: record.safety_events.length > 0 || hasText(record.safety_summary),
    },
    { item: 'efficacy_summary', passed: hasText(record.efficacy_summary) },
    { item: 'endpoint_timepoints', passed: endpoints.some((ep) => hasText(ep.timepoint)) },
  ];
}

export function scoreCompleteness(record: EvidenceRecord): FactorResult {
  const checks = completenessChecklist(record);
  const passed = checks.filter((c) => c.passed).length;
  return {
    value: clampScore(1 + (9 * passed) / checks.length),
    basis: `${passed}/${checks.length} items reported`,
  };
}
