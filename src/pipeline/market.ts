/**
 * Market dimension: competitor scarcity, market size, unmet need
 */

import { MARKET_CONFIG, NEUTRAL_SCORE } from '../config/defaults.js';
import type { MarketContext } from '../domain/types.js';
import { clampScore, mean } from '../utils/math.js';
import type { FactorResult } from './clinical.js';

function finite(value: number | null | undefined): value is number {
  return value != null && Number.isFinite(value);
}

export function bucketCompetitors(approved_drugs: number): number {
  if (approved_drugs <= 0) return 10;
  if (approved_drugs <= 2) return 7;
  if (approved_drugs <= 5) return 5;
  if (approved_drugs <= 10) return 3;
  return 1;
}

export function scoreCompetitorScarcity(market: MarketContext | null | undefined): FactorResult {
  const approved = market?.num_approved_drugs;
  if (!finite(approved)) {
    return { value: NEUTRAL_SCORE, basis: 'Competitive landscape unknown' };
  }
  return { value: clampScore(bucketCompetitors(approved)), basis: `${approved} approved drug(s)` };
}

export function tieredAnnualCost(patient_population: number): number {
  const tier = MARKET_CONFIG.TIERED_PRICING.find((t) => patient_population < t.max_population);
  return (tier ?? MARKET_CONFIG.TIERED_PRICING[MARKET_CONFIG.TIERED_PRICING.length - 1])
    .annual_cost_usd;
}

/**
 * Explicit market size, else population x annual cost, else population x tiered price.
 */
export function estimateMarketSize(
  market: MarketContext | null | undefined
): { size_usd: number; method: string } | null {
  if (!market) return null;

  if (finite(market.market_size_usd) && market.market_size_usd > 0) {
    return { size_usd: market.market_size_usd, method: 'reported' };
  }

  const population = market.patient_population;
  if (!finite(population) || population <= 0) return null;

  if (finite(market.avg_annual_cost_usd) && market.avg_annual_cost_usd > 0) {
    return { size_usd: population * market.avg_annual_cost_usd, method: 'population x cost' };
  }
  return { size_usd: population * tieredAnnualCost(population), method: 'population x tiered price' };
}

export function bucketMarketSize(size_usd: number): number {
  if (size_usd >= 10e9) return 10;
  if (size_usd >= 5e9) return 9;
  if (size_usd >= 1e9) return 8;
  if (size_usd >= 500e6) return 7;
  if (size_usd >= 100e6) return 6;
  if (size_usd >= 50e6) return 5;
  if (size_usd >= 10e6) return 4;
  return 2;
}

function formatUsd(value: number): string {
  if (value >= 1e9) return `$${(value / 1e9).toFixed(2)}B`;
  if (value >= 1e6) return `$${(value / 1e6).toFixed(1)}M`;
  return `$${Math.round(value).toLocaleString('en-US')}`;
}

export function scoreMarketSize(market: MarketContext | null | undefined): FactorResult {
  const estimate = estimateMarketSize(market);
  if (!estimate) {
    return { value: NEUTRAL_SCORE, basis: 'Market size unknown' };
  }
  return {
    value: clampScore(bucketMarketSize(estimate.size_usd)),
    basis: `${formatUsd(estimate.size_usd)} (${estimate.method})`,
  };
}

/**
 * Flagged unmet need or no approved therapy scores highest; otherwise the
 * record's response rate is compared with standard-of-care efficacy.
 */
export function scoreUnmetNeed(
  market: MarketContext | null | undefined,
  response_pct: number | null
): FactorResult {
  if (market?.unmet_need === true) {
    return { value: 10, basis: 'Unmet need flagged' };
  }
  if (market?.num_approved_drugs === 0) {
    return { value: 10, basis: 'No approved therapies' };
  }

  const soc = (market?.soc_efficacy_pct ?? []).filter(finite);
  if (soc.length === 0 || response_pct === null) {
    return { value: NEUTRAL_SCORE, basis: 'No standard-of-care comparison' };
  }

  const soc_mean = mean(soc);
  const delta = response_pct - soc_mean;
  const margin = MARKET_CONFIG.UNMET_NEED_MARGIN_PCT;
  const basis = `${response_pct.toFixed(1)}% vs ${soc_mean.toFixed(1)}% SOC`;

  if (delta > margin) return { value: 10, basis };
  if (delta >= -margin) return { value: 5, basis };
  return { value: 2, basis };
}
