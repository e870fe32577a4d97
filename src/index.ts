/**
 * Evidence aggregation and composite scoring engine
 */

export * from './domain/types.js';
export * from './domain/schemas.js';
export { normalizeDiseaseKey, mechanismKey, pathwayKey, UNSPECIFIED_MECHANISM } from './domain/ids.js';
export { DEFAULT_SCORING_WEIGHTS, type ScoringWeights } from './config/defaults.js';

export { ORGAN_DOMAINS, SAFETY_CATEGORIES, INSTRUMENTS, getSafetyCategory } from './taxonomy/tables.js';
export { classify, classifyAll, classifyEntry, matchInstrument, scoreInstrument } from './taxonomy/classifier.js';

export {
  InstrumentStore,
  matchStaticInstruments,
  type FetchInstruments,
  type InstrumentLookupResult,
  type InstrumentStoreOptions,
  type LookupState,
} from './lookup/instrumentStore.js';
export {
  MemoryInstrumentCache,
  type InstrumentCache,
  type InstrumentCacheEntry,
  type InstrumentCacheStats,
} from './lookup/instrumentCache.js';
export { SqliteInstrumentCache } from './lookup/sqliteCache.js';
export { createInstrumentStore, openInstrumentCache } from './lookup/factory.js';

export { buildConsensus, confidenceLabel, coefficientOfVariation } from './pipeline/consensus.js';
export { scoreOpportunity, type ScoringContext } from './pipeline/scoreOpportunity.js';
export { rankMechanisms, compareMechanisms } from './pipeline/tournament.js';
export { aggregateByDisease } from './pipeline/diseaseAggregation.js';
export { runPipeline, scoreRecord, scoreRecords, type PipelineResult } from './pipeline/run.js';
export { validateScoringWeights, throwIfInvalid, type ValidationResult } from './pipeline/validation.js';
export {
  exportResults,
  flattenConsensus,
  flattenDiseaseAggregate,
  flattenMechanismAggregate,
  flattenOpportunityScore,
} from './pipeline/export.js';
export { EmptyInputError } from './utils/errors.js';
