/**
 * Weighted consensus over conflicting source estimates
 *
 * Each estimate is weighted by source quality, recency and study scale. The
 * consensus is the weighted median (weights used as repetition counts).
 * Disagreement is measured on the raw, unweighted values.
 */

import { CONSENSUS_CONFIG } from '../config/defaults.js';
import type {
  ConfidenceLabel,
  ConsensusEstimate,
  QualityTier,
  SourceEstimate,
  WeightedEstimate,
} from '../domain/types.js';
import { EmptyInputError } from '../utils/errors.js';
import { mean, round2, sampleStddev, weightedMedian } from '../utils/math.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('consensus');

/** Out-of-range tiers are clamped; a non-numeric tier counts as the weakest. */
export function normalizeTier(tier: number): QualityTier {
  if (!Number.isFinite(tier)) return 3;
  const rounded = Math.round(tier);
  if (rounded <= 1) return 1;
  if (rounded === 2) return 2;
  return 3;
}

export function estimateWeight(estimate: SourceEstimate): number {
  const tier = normalizeTier(estimate.quality_tier);
  let weight: number = CONSENSUS_CONFIG.TIER_WEIGHTS[tier];

  if (estimate.year != null && estimate.year >= CONSENSUS_CONFIG.RECENT_YEAR) {
    weight *= CONSENSUS_CONFIG.RECENCY_MULTIPLIER;
  }
  if (
    estimate.study_population != null &&
    estimate.study_population > CONSENSUS_CONFIG.LARGE_POPULATION
  ) {
    weight *= CONSENSUS_CONFIG.SCALE_MULTIPLIER;
  }
  return weight;
}

function sanitizeValue(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function coefficientOfVariation(values: number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  if (m === 0) return 0;
  return sampleStddev(values) / m;
}

export function confidenceLabel(
  source_count: number,
  high_quality_count: number,
  cv: number,
  single_source_tier?: QualityTier
): { label: ConfidenceLabel; rationale: string } {
  const { HIGH_CV, MAX_CV, MIN_SOURCES } = CONSENSUS_CONFIG;
  const cv_text = cv.toFixed(2);

  if (source_count === 1) {
    return single_source_tier === 1
      ? { label: 'Low', rationale: 'Single Tier-1 source' }
      : { label: 'Very Low', rationale: `Single Tier-${single_source_tier ?? 3} source` };
  }

  if (cv < HIGH_CV && high_quality_count >= MIN_SOURCES) {
    return {
      label: 'High',
      rationale: `CV ${cv_text} < ${HIGH_CV} with ${high_quality_count} Tier-1/2 sources`,
    };
  }
  if (source_count >= MIN_SOURCES && cv < MAX_CV) {
    return { label: 'Low-Moderate', rationale: `${source_count} sources, CV ${cv_text} < ${MAX_CV}` };
  }
  if (source_count >= MIN_SOURCES) {
    return { label: 'Low', rationale: `${source_count} sources but CV ${cv_text} >= ${MAX_CV}` };
  }
  if (cv < MAX_CV) {
    return { label: 'Low', rationale: `${source_count} sources, CV ${cv_text}` };
  }
  return { label: 'Very Low', rationale: `${source_count} sources with CV ${cv_text} >= ${MAX_CV}` };
}

/**
 * Build a consensus estimate. Input order does not affect the result.
 */
export function buildConsensus(estimates: SourceEstimate[]): ConsensusEstimate {
  if (estimates.length === 0) {
    throw new EmptyInputError('buildConsensus');
  }

  const weights: WeightedEstimate[] = estimates.map((e) => {
    const weight = estimateWeight(e);
    return {
      value: sanitizeValue(e.value),
      quality_tier: normalizeTier(e.quality_tier),
      weight,
      // Whole copies only; fractional weight is dropped
      repetitions: Math.floor(weight * CONSENSUS_CONFIG.REPETITION_SCALE),
      source: e.source ?? null,
    };
  });

  const values = weights.map((w) => w.value);
  const consensus_value = weightedMedian(
    values,
    weights.map((w) => w.repetitions)
  );
  const cv = coefficientOfVariation(values);
  const high_quality_count = weights.filter((w) => w.quality_tier <= 2).length;

  const { label, rationale } = confidenceLabel(
    weights.length,
    high_quality_count,
    cv,
    weights.length === 1 ? weights[0].quality_tier : undefined
  );

  logger.debug(
    { source_count: weights.length, consensus_value, cv: round2(cv), confidence: label },
    'Consensus built'
  );

  return {
    consensus_value,
    range: [Math.min(...values), Math.max(...values)],
    coefficient_of_variation: cv,
    confidence: label,
    confidence_rationale: rationale,
    source_count: weights.length,
    high_quality_count,
    weights,
  };
}
