/**
 * Default configuration values
 */

export const DEFAULT_MODEL = 'gpt-4o-2024-08-06';
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 2000;

export const CACHE_CONFIG = {
  DB_PATH: 'instrument_cache.db',
  TTL_DAYS: 90,
  /** Negative entries written after a failed fetch */
  FAILURE_TTL_DAYS: 1,
};

/**
 * Instrument cache path, honouring INSTRUMENT_CACHE_PATH. Read at call time so
 * values loaded from .env after import still apply.
 */
export function resolveCachePath(): string {
  return process.env.INSTRUMENT_CACHE_PATH || CACHE_CONFIG.DB_PATH;
}

/** Neutral score used wherever an input is missing */
export const NEUTRAL_SCORE = 5.0;

export interface ScoringWeights {
  dimensions: {
    clinical: number;
    evidence: number;
    market: number;
  };
  clinical: {
    response_magnitude: number;
    endpoint_quality: number;
    organ_breadth: number;
    safety: number;
  };
  evidence: {
    sample_size: number;
    publication_venue: number;
    durability: number;
    completeness: number;
  };
  market: {
    competitor_scarcity: number;
    market_size: number;
    unmet_need: number;
  };
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  dimensions: { clinical: 0.5, evidence: 0.25, market: 0.25 },
  clinical: {
    response_magnitude: 0.5,
    endpoint_quality: 0.2,
    organ_breadth: 0.2,
    safety: 0.1,
  },
  evidence: {
    sample_size: 0.4,
    publication_venue: 0.2,
    durability: 0.2,
    completeness: 0.2,
  },
  market: {
    competitor_scarcity: 0.4,
    market_size: 0.4,
    unmet_need: 0.2,
  },
};

export const ENDPOINT_QUALITY_CONFIG = {
  AD_HOC_BASE: 4.0,
  PRIMARY_BONUS: 1.0,
  SIGNIFICANT_BONUS: 1.0,
  P_VALUE_BONUS: 0.5,
  EXPLORATORY_PENALTY: 1.0,
};

export const POSITIVE_ENDPOINT_THRESHOLDS = {
  RESPONDER_PCT: 30,
  IMPROVEMENT_PCT: 20,
};

export const SAFETY_CONFIG = {
  START: 10.0,
  RATE_MULTIPLIER: 5,
  CRITICAL_CAP_MULTIPLE: 2,
};

export const DURABILITY_CONFIG = {
  LONG_TERM_MONTHS: 12,
  MEDIUM_TERM_MONTHS: 6,
  LONG_TERM_SCORE: 9,
  MEDIUM_TERM_SCORE: 7,
  SHORT_TERM_SCORE: 4,
  ENDPOINT_BONUS: 0.5,
  MAX_ENDPOINT_BONUS: 1.0,
};

export const MARKET_CONFIG = {
  /** Annual treatment cost assumed when none is given, by patient population */
  TIERED_PRICING: [
    { max_population: 10_000, annual_cost_usd: 200_000 },
    { max_population: 100_000, annual_cost_usd: 75_000 },
    { max_population: Infinity, annual_cost_usd: 20_000 },
  ],
  UNMET_NEED_MARGIN_PCT: 10,
};

export const CONSENSUS_CONFIG = {
  TIER_WEIGHTS: { 1: 3, 2: 2, 3: 1 } as const,
  RECENT_YEAR: 2020,
  RECENCY_MULTIPLIER: 1.5,
  LARGE_POPULATION: 10_000_000,
  SCALE_MULTIPLIER: 1.3,
  /** Weight -> repetition count scale for the weighted median */
  REPETITION_SCALE: 10,
  HIGH_CV: 0.3,
  MAX_CV: 1.0,
  MIN_SOURCES: 3,
};

export const TOURNAMENT_CONFIG = {
  MIN_REPLICATION_RECORDS: 2,
  MIN_REPLICATION_PATIENTS: 5,
  MIN_CONSISTENCY: 0.5,
  CONVERGENCE_BONUS: 1.15,
  FINALS_WEIGHTS: {
    aggregate_clinical: 0.4,
    evidence_volume: 0.3,
    mechanism_diversity: 0.2,
    biological_coherence: 0.1,
  },
  TIER_THRESHOLDS: { TIER_1: 8, TIER_2: 6, TIER_3: 4 },
};

export const AGGREGATION_CONFIG = {
  HIGH_CONSISTENCY_CV: 0.25,
  MODERATE_CONSISTENCY_CV: 0.5,
  MODERATE_MIN_STUDIES: 3,
  MODERATE_MIN_PATIENTS: 20,
  LOW_MIN_STUDIES: 2,
  LOW_MIN_PATIENTS: 10,
};
