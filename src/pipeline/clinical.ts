/**
 * Clinical dimension: response magnitude, endpoint quality, organ breadth, safety
 */

import {
  ENDPOINT_QUALITY_CONFIG,
  NEUTRAL_SCORE,
  POSITIVE_ENDPOINT_THRESHOLDS,
  SAFETY_CONFIG,
} from '../config/defaults.js';
import type {
  EfficacyEndpoint,
  EndpointDetail,
  EvidenceRecord,
  InstrumentScores,
  SafetyCategoryEntry,
  SafetyFinding,
} from '../domain/types.js';
import { classify, classifyEntry, matchInstrument } from '../taxonomy/classifier.js';
import { ORGAN_DOMAINS, SAFETY_CATEGORIES } from '../taxonomy/tables.js';
import { clampPercent, clampScore, mean } from '../utils/math.js';

export interface FactorResult {
  value: number;
  basis: string;
}

// ============================================================================
// Response magnitude
// ============================================================================

/**
 * Responder percentage for one endpoint, derived from the responder count
 * when only that is reported.
 */
export function endpointResponderPct(
  endpoint: EfficacyEndpoint,
  sample_size: number | null | undefined
): number | null {
  if (endpoint.responders_pct != null && Number.isFinite(endpoint.responders_pct)) {
    return clampPercent(endpoint.responders_pct);
  }
  if (
    endpoint.responders_n != null &&
    Number.isFinite(endpoint.responders_n) &&
    sample_size != null &&
    sample_size > 0
  ) {
    return clampPercent((endpoint.responders_n / sample_size) * 100);
  }
  return null;
}

/**
 * Record-level responder %, else the best primary endpoint, else the best endpoint.
 */
export function effectiveResponsePct(record: EvidenceRecord): number | null {
  if (record.responders_pct != null && Number.isFinite(record.responders_pct)) {
    return clampPercent(record.responders_pct);
  }

  const best = (endpoints: EfficacyEndpoint[]): number | null => {
    const pcts = endpoints
      .map((ep) => endpointResponderPct(ep, record.sample_size))
      .filter((p): p is number => p !== null);
    return pcts.length > 0 ? Math.max(...pcts) : null;
  };

  return (
    best(record.efficacy_endpoints.filter((ep) => ep.category === 'primary')) ??
    best(record.efficacy_endpoints)
  );
}

export function bucketResponse(pct: number): number {
  if (pct > 80) return 10;
  if (pct >= 60) return 8;
  if (pct >= 40) return 6;
  if (pct >= 20) return 4;
  return 2;
}

export function scoreResponseMagnitude(record: EvidenceRecord): FactorResult {
  const pct = effectiveResponsePct(record);
  if (pct === null) {
    return { value: NEUTRAL_SCORE, basis: 'No responder data' };
  }
  return { value: clampScore(bucketResponse(pct)), basis: `${pct.toFixed(1)}% responders` };
}

// ============================================================================
// Endpoint quality
// ============================================================================

/** Endpoint wording where a higher value means improvement */
const INCREASE_IS_GOOD_PATTERNS = [
  'acr20', 'acr50', 'acr70', 'acr90',
  'pasi50', 'pasi75', 'pasi90', 'pasi100',
  'easi50', 'easi75', 'easi90',
  'salt50', 'salt75', 'salt90',
  'response', 'responder', 'remission',
  'quality of life', 'qol', 'sf-36', 'sf36', 'eq-5d', 'eq5d',
  'facit', 'well-being', 'wellbeing',
  'function', 'improvement',
  'iga 0', 'iga 1', 'clear', 'almost clear',
  'regrowth', 'hair growth',
];

/** Most activity scores improve as they fall. */
export function isDecreaseGood(endpoint_name: string): boolean {
  const name = endpoint_name.toLowerCase();
  return !INCREASE_IS_GOOD_PATTERNS.some((p) => name.includes(p));
}

/**
 * Percent improvement, signed so that positive always means better.
 */
export function improvementPct(endpoint: EfficacyEndpoint): number | null {
  const direction = isDecreaseGood(endpoint.name) ? -1 : 1;

  if (endpoint.change_pct != null && Number.isFinite(endpoint.change_pct)) {
    return direction * endpoint.change_pct;
  }
  if (
    endpoint.change_from_baseline != null &&
    Number.isFinite(endpoint.change_from_baseline) &&
    endpoint.baseline_value != null &&
    endpoint.baseline_value !== 0
  ) {
    return direction * (endpoint.change_from_baseline / Math.abs(endpoint.baseline_value)) * 100;
  }
  return null;
}

export function isPositiveEndpoint(
  endpoint: EfficacyEndpoint,
  sample_size?: number | null
): boolean {
  if (endpoint.statistically_significant === true) return true;

  const responders = endpointResponderPct(endpoint, sample_size);
  if (responders !== null && responders > POSITIVE_ENDPOINT_THRESHOLDS.RESPONDER_PCT) return true;

  const improvement = improvementPct(endpoint);
  return improvement !== null && improvement >= POSITIVE_ENDPOINT_THRESHOLDS.IMPROVEMENT_PCT;
}

/**
 * Base quality for an endpoint: best looked-up instrument named in it, then
 * the static instrument table, then the ad-hoc default.
 */
export function instrumentBaseScore(
  endpoint_name: string,
  instruments: InstrumentScores
): { score: number; instrument: string | null } {
  const name = endpoint_name.toLowerCase();

  let best: { score: number; instrument: string } | null = null;
  for (const [instrument, score] of Object.entries(instruments)) {
    const key = instrument.toLowerCase();
    if (!key || !name.includes(key)) continue;
    if (!best || score > best.score) {
      best = { score, instrument: key };
    }
  }
  if (best) return { score: clampScore(best.score), instrument: best.instrument };

  const static_match = matchInstrument(endpoint_name);
  if (static_match) return { score: static_match.score, instrument: static_match.instrument };

  return { score: ENDPOINT_QUALITY_CONFIG.AD_HOC_BASE, instrument: null };
}

export function scoreEndpoint(endpoint: EfficacyEndpoint, instruments: InstrumentScores): number {
  const cfg = ENDPOINT_QUALITY_CONFIG;
  let score = instrumentBaseScore(endpoint.name, instruments).score;

  if (endpoint.category === 'primary') score += cfg.PRIMARY_BONUS;
  if (endpoint.category === 'exploratory') score -= cfg.EXPLORATORY_PENALTY;
  if (endpoint.statistically_significant === true) score += cfg.SIGNIFICANT_BONUS;
  if (endpoint.p_value != null && Number.isFinite(endpoint.p_value)) score += cfg.P_VALUE_BONUS;

  return clampScore(score);
}

export function scoreEndpointQuality(
  record: EvidenceRecord,
  instruments: InstrumentScores
): FactorResult {
  if (record.efficacy_endpoints.length === 0) {
    return { value: NEUTRAL_SCORE, basis: 'No endpoints reported' };
  }
  const scores = record.efficacy_endpoints.map((ep) => scoreEndpoint(ep, instruments));
  return {
    value: clampScore(mean(scores)),
    basis: `Mean of ${scores.length} endpoint score(s)`,
  };
}

export function describeEndpoints(
  record: EvidenceRecord,
  instruments: InstrumentScores
): EndpointDetail[] {
  return record.efficacy_endpoints.map((ep) => ({
    name: ep.name,
    category: ep.category,
    quality_score: scoreEndpoint(ep, instruments),
    instrument: instrumentBaseScore(ep.name, instruments).instrument,
    organ_domain: classify(ep.name, ORGAN_DOMAINS)?.category ?? null,
    positive: isPositiveEndpoint(ep, record.sample_size),
  }));
}

// ============================================================================
// Organ breadth
// ============================================================================

export function bucketOrganBreadth(domain_count: number): number {
  if (domain_count >= 5) return 10;
  if (domain_count === 4) return 9;
  if (domain_count === 3) return 7.5;
  if (domain_count === 2) return 6;
  if (domain_count === 1) return 4;
  return 3;
}

/** Distinct organ domains with at least one positive endpoint, in table order */
export function positiveOrganDomains(record: EvidenceRecord): string[] {
  const matched = new Set<string>();
  for (const ep of record.efficacy_endpoints) {
    if (!isPositiveEndpoint(ep, record.sample_size)) continue;
    const domain = classify(ep.name, ORGAN_DOMAINS);
    if (domain) matched.add(domain.category);
  }
  return ORGAN_DOMAINS.map((d) => d.category).filter((c) => matched.has(c));
}

export function scoreOrganBreadth(record: EvidenceRecord): FactorResult {
  const domains = positiveOrganDomains(record);
  return {
    value: clampScore(bucketOrganBreadth(domains.length)),
    basis: domains.length > 0 ? domains.join(', ') : 'No organ domain with a positive endpoint',
  };
}

// ============================================================================
// Safety
// ============================================================================

/**
 * Penalty for one safety category: base penalty scaled by event rate.
 * Critical categories never exceed twice their base penalty.
 */
export function safetyPenalty(category: SafetyCategoryEntry, rate: number): number {
  const penalty = category.base_penalty * (1 + SAFETY_CONFIG.RATE_MULTIPLIER * rate);
  if (category.severity_tier === 'critical') {
    return Math.min(penalty, category.base_penalty * SAFETY_CONFIG.CRITICAL_CAP_MULTIPLE);
  }
  return penalty;
}

export function detectSafetyFindings(
  record: EvidenceRecord,
  taxonomy: readonly SafetyCategoryEntry[] = SAFETY_CATEGORIES
): SafetyFinding[] {
  const events_by_category = new Map<string, { entry: SafetyCategoryEntry; events: number }>();

  for (const event of record.safety_events) {
    if (event.relatedness === 'unrelated') continue;
    const match = classifyEntry(event.name, taxonomy);
    if (!match) continue;

    const affected =
      event.patients_affected != null && Number.isFinite(event.patients_affected)
        ? Math.max(0, event.patients_affected)
        : 1;
    const current = events_by_category.get(match.entry.category);
    events_by_category.set(match.entry.category, {
      entry: match.entry,
      events: (current?.events ?? 0) + affected,
    });
  }

  const n = record.sample_size;
  return [...events_by_category.values()].map(({ entry, events }) => {
    const rate = n != null && n > 0 ? Math.min(1, events / n) : 0;
    return {
      category: entry.category,
      severity_tier: entry.severity_tier,
      events,
      rate,
      penalty: safetyPenalty(entry, rate),
      regulatory_flag: entry.regulatory_flag,
    };
  });
}

export function scoreSafety(findings: SafetyFinding[]): FactorResult {
  if (findings.length === 0) {
    return { value: SAFETY_CONFIG.START, basis: 'No classified safety signals' };
  }
  const total_penalty = findings.reduce((acc, f) => acc + f.penalty, 0);
  return {
    value: clampScore(SAFETY_CONFIG.START - total_penalty),
    basis: findings.map((f) => `${f.category} (-${f.penalty.toFixed(2)})`).join(', '),
  };
}
