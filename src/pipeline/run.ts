/**
 * Scoring pipeline orchestrator
 */

import type { ScoringWeights } from '../config/defaults.js';
import { normalizeDiseaseKey } from '../domain/ids.js';
import type {
  DiseaseEvidenceAggregate,
  EvidenceRecord,
  MechanismAggregate,
  OpportunityScore,
} from '../domain/types.js';
import type { InstrumentLookupResult, InstrumentStore } from '../lookup/instrumentStore.js';
import { createLogger } from '../utils/log.js';
import { aggregateByDisease } from './diseaseAggregation.js';
import { scoreOpportunity } from './scoreOpportunity.js';
import { rankMechanisms } from './tournament.js';
import { throwIfInvalid, validateScoringWeights } from './validation.js';

const logger = createLogger('pipeline');

export interface PipelineOptions {
  weights?: ScoringWeights;
}

export interface PipelineResult {
  scores: OpportunityScore[];
  mechanisms: MechanismAggregate[];
  diseases: DiseaseEvidenceAggregate[];
  lookups: Record<string, InstrumentLookupResult>;
}

/**
 * Look up instruments for the record's disease, then score it.
 */
export async function scoreRecord(
  record: EvidenceRecord,
  store: InstrumentStore,
  options: PipelineOptions = {}
): Promise<OpportunityScore> {
  const lookup = await store.lookup(
    record.disease,
    record.efficacy_endpoints.map((ep) => ep.name)
  );
  return scoreOpportunity(record, { instruments: lookup.instruments, weights: options.weights });
}

/**
 * Score many records. Each disease is looked up once, against the endpoint
 * labels of all its records; lookups run concurrently.
 */
export async function scoreRecords(
  records: EvidenceRecord[],
  store: InstrumentStore,
  options: PipelineOptions = {}
): Promise<{ scores: OpportunityScore[]; lookups: Record<string, InstrumentLookupResult> }> {
  if (options.weights) {
    throwIfInvalid(validateScoringWeights(options.weights), 'scoring weights');
  }

  const by_disease = new Map<string, { disease: string; labels: Set<string> }>();
  for (const record of records) {
    const key = normalizeDiseaseKey(record.disease);
    const entry = by_disease.get(key) ?? { disease: record.disease, labels: new Set<string>() };
    for (const ep of record.efficacy_endpoints) entry.labels.add(ep.name);
    by_disease.set(key, entry);
  }

  const resolved = await Promise.all(
    [...by_disease.entries()].map(async ([key, entry]) => {
      const lookup = await store.lookup(entry.disease, [...entry.labels]);
      return [key, lookup] as const;
    })
  );
  const lookups: Record<string, InstrumentLookupResult> = Object.fromEntries(resolved);

  const scores = records.map((record) =>
    scoreOpportunity(record, {
      instruments: lookups[normalizeDiseaseKey(record.disease)]?.instruments ?? {},
      weights: options.weights,
    })
  );

  return { scores, lookups };
}

export async function runPipeline(
  records: EvidenceRecord[],
  store: InstrumentStore,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const start_time = Date.now();
  logger.info({ records: records.length }, 'Starting scoring run');

  logger.info('Stage 1: Scoring records');
  const { scores, lookups } = await scoreRecords(records, store, options);

  logger.info('Stage 2: Ranking mechanisms');
  const mechanisms = scores.length > 0 ? rankMechanisms(scores) : [];

  logger.info('Stage 3: Aggregating by disease');
  const diseases = scores.length > 0 ? aggregateByDisease(scores) : [];

  logger.info(
    {
      scores: scores.length,
      mechanisms: mechanisms.length,
      diseases: diseases.length,
      duration_ms: Date.now() - start_time,
    },
    'Scoring run completed'
  );

  return { scores, mechanisms, diseases, lookups };
}
