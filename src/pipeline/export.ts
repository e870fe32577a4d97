/**
 * Export and report functionality
 *
 * Nested results are flattened to one row per item so that every sub-factor
 * is addressable by a dotted column name (e.g. `clinical.organ_breadth`).
 */

import { extname } from 'path';
import type {
  ConsensusEstimate,
  DiseaseEvidenceAggregate,
  MechanismAggregate,
  OpportunityScore,
  RoundResult,
  SubFactor,
} from '../domain/types.js';
import { writeCsv, writeJson, type FlatRow } from '../utils/io.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('export');

export type ExportFormat = 'json' | 'csv';

function flattenFactors(prefix: string, factors: Record<string, SubFactor>): FlatRow {
  const row: FlatRow = {};
  for (const [name, factor] of Object.entries(factors)) {
    row[`${prefix}.${name}`] = factor.value;
  }
  return row;
}

/** One pass/fail column per tournament round; null where the round was not reached */
function flattenRounds(rounds: RoundResult[]): FlatRow {
  const row: FlatRow = {};
  for (const round of [1, 2, 3, 4] as const) {
    row[`round${round}.passed`] = rounds.find((r) => r.round === round)?.passed ?? null;
  }
  return row;
}

export function flattenOpportunityScore(score: OpportunityScore): FlatRow {
  return {
    source_id: score.source_id,
    disease: score.disease,
    drug: score.drug,
    mechanism: score.mechanism,
    pathway: score.pathway,
    sample_size: score.sample_size,
    response_pct: score.response_pct,
    positive_signal: score.positive_signal,
    publication_year: score.publication_year,
    overall: score.overall,
    clinical: score.clinical,
    evidence: score.evidence,
    market: score.market,
    ...flattenFactors('clinical', { ...score.breakdown.clinical }),
    ...flattenFactors('evidence', { ...score.breakdown.evidence }),
    ...flattenFactors('market', { ...score.breakdown.market }),
    organ_domains: score.organ_domains.join('; '),
    regulatory_flags: score.regulatory_flags.join('; '),
  };
}

export function flattenMechanismAggregate(aggregate: MechanismAggregate): FlatRow {
  return {
    rank: aggregate.rank,
    mechanism: aggregate.mechanism,
    tier: aggregate.tier,
    composite: aggregate.composite,
    furthest_round: aggregate.furthest_round,
    ...flattenRounds(aggregate.rounds),
    convergent: aggregate.convergent,
    paper_count: aggregate.paper_count,
    independent_sources: aggregate.independent_sources,
    unique_drugs: aggregate.unique_drugs.length,
    total_patients: aggregate.total_patients,
    weighted_response_rate: aggregate.weighted_response_rate,
    consistency_rate: aggregate.consistency_rate,
    earliest_year: aggregate.earliest_year,
    pathways: aggregate.pathways.join('; '),
    'finals.aggregate_clinical': aggregate.finals.aggregate_clinical,
    'finals.evidence_volume': aggregate.finals.evidence_volume,
    'finals.mechanism_diversity': aggregate.finals.mechanism_diversity,
    'finals.biological_coherence': aggregate.finals.biological_coherence,
  };
}

export function flattenConsensus(label: string, consensus: ConsensusEstimate): FlatRow {
  return {
    label,
    consensus_value: consensus.consensus_value,
    range_low: consensus.range[0],
    range_high: consensus.range[1],
    coefficient_of_variation: consensus.coefficient_of_variation,
    confidence: consensus.confidence,
    source_count: consensus.source_count,
    high_quality_count: consensus.high_quality_count,
  };
}

export function flattenDiseaseAggregate(aggregate: DiseaseEvidenceAggregate): FlatRow {
  return {
    disease: aggregate.disease,
    study_count: aggregate.study_count,
    total_patients: aggregate.total_patients,
    pooled_response_pct: aggregate.pooled_response_pct,
    response_low: aggregate.response_range?.[0] ?? null,
    response_high: aggregate.response_range?.[1] ?? null,
    heterogeneity_cv: aggregate.heterogeneity_cv,
    consistency: aggregate.consistency,
    evidence_confidence: aggregate.evidence_confidence,
    avg_overall: aggregate.avg_overall,
    best_overall: aggregate.best_overall,
  };
}

export function inferFormat(file_path: string, fallback: ExportFormat = 'json'): ExportFormat {
  const ext = extname(file_path).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.json') return 'json';
  return fallback;
}

/**
 * Write results to disk: nested JSON as-is, or flattened rows as CSV.
 */
export async function exportResults<T>(
  file_path: string,
  items: T[],
  flatten: (item: T) => FlatRow,
  format: ExportFormat = inferFormat(file_path)
): Promise<void> {
  if (format === 'csv') {
    await writeCsv(file_path, items.map(flatten));
  } else {
    await writeJson(file_path, items);
  }
  logger.info({ file_path, format, rows: items.length }, 'Results exported');
}

/**
 * Console summary of scored records
 */
export function printScoreReport(scores: OpportunityScore[]): void {
  console.log('\n' + '='.repeat(80));
  console.log('OPPORTUNITY SCORES');
  console.log('='.repeat(80));

  const sorted = [...scores].sort((a, b) => b.overall - a.overall);
  for (const s of sorted) {
    console.log(
      `${s.overall.toFixed(1).padStart(5)}  ${s.drug} / ${s.disease} (${s.source_id})` +
        `  clinical ${s.clinical.toFixed(1)}, evidence ${s.evidence.toFixed(1)}, market ${s.market.toFixed(1)}`
    );
    if (s.regulatory_flags.length > 0) {
      console.log(`        safety flags: ${s.regulatory_flags.join(', ')}`);
    }
  }
  console.log();
}

export function printMechanismReport(aggregates: MechanismAggregate[]): void {
  console.log('\n' + '='.repeat(80));
  console.log('MECHANISM TOURNAMENT');
  console.log('='.repeat(80));

  for (const a of aggregates) {
    console.log(
      `#${a.rank} ${a.mechanism}: ${a.tier} (composite ${a.composite.toFixed(2)}` +
        `${a.convergent ? ', convergent' : ''})`
    );
    console.log(
      `    ${a.paper_count} record(s), ${a.unique_drugs.length} drug(s), N=${a.total_patients}`
    );
  }
  console.log();
}
