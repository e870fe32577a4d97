/**
 * Multi-dimensional composite scorer
 *
 * clinical  = response magnitude, endpoint quality, organ breadth, safety
 * evidence  = sample size, venue, durability, completeness
 * market    = competitor scarcity, market size, unmet need
 * overall   = weighted sum of the three, rounded to one decimal
 *
 * Every sub-factor is clamped to [1, 10] and kept on the result with its
 * weight and a short basis string.
 */

import {
  DEFAULT_SCORING_WEIGHTS,
  POSITIVE_ENDPOINT_THRESHOLDS,
  type ScoringWeights,
} from '../config/defaults.js';
import type {
  ClinicalBreakdown,
  EvidenceBreakdown,
  EvidenceRecord,
  InstrumentScores,
  MarketBreakdown,
  OpportunityScore,
  SubFactor,
} from '../domain/types.js';
import { clampScore, round1 } from '../utils/math.js';
import {
  describeEndpoints,
  detectSafetyFindings,
  effectiveResponsePct,
  positiveOrganDomains,
  scoreEndpointQuality,
  scoreOrganBreadth,
  scoreResponseMagnitude,
  scoreSafety,
  type FactorResult,
} from './clinical.js';
import { scoreCompleteness, scoreDurability, scoreSampleSize, scoreVenue } from './evidence.js';
import { scoreCompetitorScarcity, scoreMarketSize, scoreUnmetNeed } from './market.js';
import { throwIfInvalid, validateScoringWeights } from './validation.js';

export interface ScoringContext {
  /** Instrument lookup result for the record's disease */
  instruments: InstrumentScores;
  weights?: ScoringWeights;
}

function factor(result: FactorResult, weight: number): SubFactor {
  return { value: clampScore(result.value), weight, basis: result.basis };
}

function combine(factors: Record<string, SubFactor>): number {
  const total = Object.values(factors).reduce((acc, f) => acc + f.value * f.weight, 0);
  return round1(clampScore(total));
}

/**
 * Positive efficacy signal for tournament purposes: any positive endpoint,
 * or a record-level responder rate above the positive threshold.
 */
export function hasPositiveSignal(record: EvidenceRecord, endpoints_positive: boolean[]): boolean {
  if (endpoints_positive.some(Boolean)) return true;
  const pct = effectiveResponsePct(record);
  return pct !== null && pct > POSITIVE_ENDPOINT_THRESHOLDS.RESPONDER_PCT;
}

export function scoreOpportunity(record: EvidenceRecord, context: ScoringContext): OpportunityScore {
  const weights = context.weights ?? DEFAULT_SCORING_WEIGHTS;
  if (context.weights) {
    throwIfInvalid(validateScoringWeights(weights), 'scoring weights');
  }

  const safety_findings = detectSafetyFindings(record);
  const response_pct = effectiveResponsePct(record);
  const market = record.market ?? null;

  const clinical: ClinicalBreakdown = {
    response_magnitude: factor(scoreResponseMagnitude(record), weights.clinical.response_magnitude),
    endpoint_quality: factor(
      scoreEndpointQuality(record, context.instruments),
      weights.clinical.endpoint_quality
    ),
    organ_breadth: factor(scoreOrganBreadth(record), weights.clinical.organ_breadth),
    safety: factor(scoreSafety(safety_findings), weights.clinical.safety),
  };

  const evidence: EvidenceBreakdown = {
    sample_size: factor(scoreSampleSize(record), weights.evidence.sample_size),
    publication_venue: factor(scoreVenue(record.publication), weights.evidence.publication_venue),
    durability: factor(scoreDurability(record), weights.evidence.durability),
    completeness: factor(scoreCompleteness(record), weights.evidence.completeness),
  };

  const market_breakdown: MarketBreakdown = {
    competitor_scarcity: factor(
      scoreCompetitorScarcity(market),
      weights.market.competitor_scarcity
    ),
    market_size: factor(scoreMarketSize(market), weights.market.market_size),
    unmet_need: factor(scoreUnmetNeed(market, response_pct), weights.market.unmet_need),
  };

  const clinical_score = combine({ ...clinical });
  const evidence_score = combine({ ...evidence });
  const market_score = combine({ ...market_breakdown });

  const overall = round1(
    weights.dimensions.clinical * clinical_score +
      weights.dimensions.evidence * evidence_score +
      weights.dimensions.market * market_score
  );

  const endpoints = describeEndpoints(record, context.instruments);

  return {
    source_id: record.source_id,
    disease: record.disease,
    drug: record.drug,
    mechanism: record.mechanism ?? null,
    pathway: record.pathway ?? null,
    sample_size: record.sample_size ?? null,
    response_pct,
    positive_signal: hasPositiveSignal(
      record,
      endpoints.map((ep) => ep.positive)
    ),
    publication_year: record.publication.year ?? null,
    venue_type: record.publication.venue_type,

    clinical: clinical_score,
    evidence: evidence_score,
    market: market_score,
    overall,
    weights: { ...weights.dimensions },
    breakdown: { clinical, evidence, market: market_breakdown },

    organ_domains: positiveOrganDomains(record),
    safety_findings,
    regulatory_flags: safety_findings.filter((f) => f.regulatory_flag).map((f) => f.category),
    endpoints,
  };
}
