/**
 * Per-disease pooled evidence rollup
 */

import { AGGREGATION_CONFIG } from '../config/defaults.js';
import { normalizeDiseaseKey } from '../domain/ids.js';
import type {
  ConsistencyLabel,
  DiseaseEvidenceAggregate,
  EvidenceConfidence,
  OpportunityScore,
} from '../domain/types.js';
import { EmptyInputError } from '../utils/errors.js';
import { mean, populationStddev, round1, round2, sum } from '../utils/math.js';

export function consistencyLabel(rates: number[]): { label: ConsistencyLabel; cv: number | null } {
  if (rates.length === 0) return { label: 'N/A', cv: null };
  if (rates.length === 1) return { label: 'Single study', cv: null };

  const m = mean(rates);
  const cv = m > 0 ? populationStddev(rates) / m : 0;
  if (cv < AGGREGATION_CONFIG.HIGH_CONSISTENCY_CV) return { label: 'High', cv };
  if (cv < AGGREGATION_CONFIG.MODERATE_CONSISTENCY_CV) return { label: 'Moderate', cv };
  return { label: 'Low', cv };
}

export function evidenceConfidence(
  study_count: number,
  total_patients: number,
  consistency: ConsistencyLabel,
  has_peer_reviewed: boolean
): EvidenceConfidence {
  const cfg = AGGREGATION_CONFIG;
  if (study_count === 0 || total_patients === 0) return 'None';

  if (study_count >= cfg.MODERATE_MIN_STUDIES && total_patients >= cfg.MODERATE_MIN_PATIENTS) {
    const consistent = consistency === 'High' || consistency === 'Moderate';
    if (consistent && has_peer_reviewed) return 'Moderate';
    if (consistent) return 'Low-Moderate';
    return 'Low';
  }
  if (study_count >= cfg.LOW_MIN_STUDIES && total_patients >= cfg.LOW_MIN_PATIENTS) {
    return 'Low';
  }
  return 'Very Low';
}

function aggregateOne(disease: string, disease_key: string, scores: OpportunityScore[]): DiseaseEvidenceAggregate {
  const with_n = scores.filter((s) => s.sample_size != null && s.sample_size > 0);
  const total_patients = sum(with_n.map((s) => s.sample_size ?? 0));

  const pooled = with_n.filter((s) => s.response_pct !== null);
  const pooled_n = sum(pooled.map((s) => s.sample_size ?? 0));
  const total_responders = sum(pooled.map((s) => ((s.response_pct ?? 0) / 100) * (s.sample_size ?? 0)));

  const rates = scores
    .map((s) => s.response_pct)
    .filter((r): r is number => r !== null);
  const { label, cv } = consistencyLabel(rates);

  return {
    disease,
    disease_key,
    study_count: scores.length,
    total_patients,
    total_responders: Math.round(total_responders),
    pooled_response_pct: pooled_n > 0 ? round1((total_responders / pooled_n) * 100) : null,
    response_range: rates.length > 0 ? [Math.min(...rates), Math.max(...rates)] : null,
    heterogeneity_cv: cv === null ? null : round2(cv),
    consistency: label,
    evidence_confidence: evidenceConfidence(
      scores.length,
      total_patients,
      label,
      scores.some((s) => s.venue_type === 'peer_reviewed')
    ),
    avg_clinical: round1(mean(scores.map((s) => s.clinical))),
    avg_evidence: round1(mean(scores.map((s) => s.evidence))),
    avg_market: round1(mean(scores.map((s) => s.market))),
    avg_overall: round1(mean(scores.map((s) => s.overall))),
    best_overall: Math.max(...scores.map((s) => s.overall)),
    source_ids: scores.map((s) => s.source_id),
  };
}

/**
 * Roll opportunity scores up by disease, best overall score first.
 */
export function aggregateByDisease(scores: OpportunityScore[]): DiseaseEvidenceAggregate[] {
  if (scores.length === 0) {
    throw new EmptyInputError('aggregateByDisease');
  }

  const groups = new Map<string, { disease: string; scores: OpportunityScore[] }>();
  for (const score of scores) {
    const key = normalizeDiseaseKey(score.disease);
    const group = groups.get(key);
    if (group) {
      group.scores.push(score);
    } else {
      groups.set(key, { disease: score.disease, scores: [score] });
    }
  }

  return [...groups.entries()]
    .map(([key, group]) => aggregateOne(group.disease, key, group.scores))
    .sort((a, b) => b.best_overall - a.best_overall || a.disease.localeCompare(b.disease));
}
