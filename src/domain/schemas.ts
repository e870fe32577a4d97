/**
 * Zod schemas for validating engine input at the CLI and API boundary
 *
 * Only structure is checked here. Numeric ranges are clamped by the scorers.
 */

import { z } from 'zod';

export const EfficacyEndpointSchema = z.object({
  name: z.string(),
  category: z.enum(['primary', 'secondary', 'exploratory']).default('secondary'),
  responders_n: z.number().nullish(),
  responders_pct: z.number().nullish(),
  statistically_significant: z.boolean().nullish(),
  p_value: z.number().nullish(),
  change_pct: z.number().nullish(),
  change_from_baseline: z.number().nullish(),
  baseline_value: z.number().nullish(),
  timepoint: z.string().nullish(),
  notes: z.string().nullish(),
});

export const SafetyEventSchema = z.object({
  name: z.string(),
  serious: z.boolean().default(false),
  grade: z.number().nullish(),
  relatedness: z.enum(['related', 'possibly_related', 'unrelated']).nullish(),
  patients_affected: z.number().nullish(),
});

export const PublicationInfoSchema = z.object({
  venue_type: z
    .enum(['peer_reviewed', 'preprint', 'conference_abstract', 'other', 'unknown'])
    .default('unknown'),
  year: z.number().int().nullish(),
  journal: z.string().nullish(),
  title: z.string().nullish(),
  follow_up_duration: z.string().nullish(),
});

export const MarketContextSchema = z.object({
  num_approved_drugs: z.number().nullish(),
  patient_population: z.number().nullish(),
  avg_annual_cost_usd: z.number().nullish(),
  market_size_usd: z.number().nullish(),
  unmet_need: z.boolean().nullish(),
  soc_efficacy_pct: z.array(z.number()).nullish(),
});

export const EvidenceRecordSchema = z.object({
  source_id: z.string().min(1),
  disease: z.string().min(1),
  drug: z.string().min(1),
  mechanism: z.string().nullish(),
  pathway: z.string().nullish(),
  sample_size: z.number().nullish(),
  responders_pct: z.number().nullish(),
  efficacy_endpoints: z.array(EfficacyEndpointSchema).default([]),
  safety_events: z.array(SafetyEventSchema).default([]),
  publication: PublicationInfoSchema.default({}),
  efficacy_summary: z.string().nullish(),
  safety_summary: z.string().nullish(),
  market: MarketContextSchema.nullish(),
});

export const EvidenceRecordListSchema = z.array(EvidenceRecordSchema);

export const SourceEstimateSchema = z.object({
  value: z.number(),
  quality_tier: z.number(),
  year: z.number().int().nullish(),
  study_population: z.number().nullish(),
  source: z.string().nullish(),
});

export const SourceEstimateListSchema = z.array(SourceEstimateSchema);

/** Map of label -> estimates, for building several consensus values in one call */
export const ConsensusRequestSchema = z.record(z.string(), SourceEstimateListSchema);
