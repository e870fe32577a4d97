/**
 * Core domain types for the evidence scoring engine
 */

// ============================================================================
// Evidence records (input)
// ============================================================================

export type EndpointCategory = 'primary' | 'secondary' | 'exploratory';

export type VenueType =
  | 'peer_reviewed'
  | 'preprint'
  | 'conference_abstract'
  | 'other'
  | 'unknown';

export type Relatedness = 'related' | 'possibly_related' | 'unrelated';

export interface EfficacyEndpoint {
  name: string;
  category: EndpointCategory;
  responders_n?: number | null;
  responders_pct?: number | null;
  statistically_significant?: boolean | null;
  p_value?: number | null;
  /** Percent change from baseline, signed as reported */
  change_pct?: number | null;
  change_from_baseline?: number | null;
  baseline_value?: number | null;
  timepoint?: string | null;
  notes?: string | null;
}

export interface SafetyEvent {
  name: string;
  serious: boolean;
  grade?: number | null;
  relatedness?: Relatedness | null;
  patients_affected?: number | null;
}

export interface PublicationInfo {
  venue_type: VenueType;
  year?: number | null;
  journal?: string | null;
  title?: string | null;
  follow_up_duration?: string | null;
}

export interface MarketContext {
  num_approved_drugs?: number | null;
  patient_population?: number | null;
  avg_annual_cost_usd?: number | null;
  market_size_usd?: number | null;
  unmet_need?: boolean | null;
  soc_efficacy_pct?: number[] | null;
}

export interface EvidenceRecord {
  source_id: string;
  disease: string;
  drug: string;
  mechanism?: string | null;
  pathway?: string | null;
  sample_size?: number | null;
  responders_pct?: number | null;
  efficacy_endpoints: EfficacyEndpoint[];
  safety_events: SafetyEvent[];
  publication: PublicationInfo;
  efficacy_summary?: string | null;
  safety_summary?: string | null;
  market?: MarketContext | null;
}

// ============================================================================
// Taxonomies
// ============================================================================

export interface TaxonomyEntry {
  category: string;
  keywords: string[];
}

export type TaxonomyTable<E extends TaxonomyEntry = TaxonomyEntry> = readonly E[];

export interface CategoryAssignment {
  label: string;
  category: string;
  matched_keyword: string;
}

export type SeverityTier = 'critical' | 'serious' | 'moderate' | 'mild';

export interface SafetyCategoryEntry extends TaxonomyEntry {
  description: string;
  severity_tier: SeverityTier;
  base_penalty: number;
  regulatory_flag: boolean;
  meddra_soc: string;
}

export interface OrganDomainEntry extends TaxonomyEntry {
  description: string;
}

export interface InstrumentEntry {
  instrument: string;
  score: number;
  /** Generic response wording rather than a named instrument */
  generic: boolean;
}

/** instrument name (lower-case) -> quality score 1-10 */
export type InstrumentScores = Record<string, number>;

// ============================================================================
// Consensus
// ============================================================================

export type QualityTier = 1 | 2 | 3;

export interface SourceEstimate {
  value: number;
  quality_tier: number;
  year?: number | null;
  study_population?: number | null;
  source?: string | null;
}

export type ConfidenceLabel = 'High' | 'Low-Moderate' | 'Low' | 'Very Low';

export interface WeightedEstimate {
  value: number;
  quality_tier: QualityTier;
  weight: number;
  repetitions: number;
  source: string | null;
}

export interface ConsensusEstimate {
  consensus_value: number;
  range: [number, number];
  coefficient_of_variation: number;
  confidence: ConfidenceLabel;
  confidence_rationale: string;
  source_count: number;
  high_quality_count: number;
  weights: WeightedEstimate[];
}

// ============================================================================
// Opportunity scores
// ============================================================================

export interface SubFactor {
  value: number;
  weight: number;
  basis: string;
}

export interface ClinicalBreakdown {
  response_magnitude: SubFactor;
  endpoint_quality: SubFactor;
  organ_breadth: SubFactor;
  safety: SubFactor;
}

export interface EvidenceBreakdown {
  sample_size: SubFactor;
  publication_venue: SubFactor;
  durability: SubFactor;
  completeness: SubFactor;
}

export interface MarketBreakdown {
  competitor_scarcity: SubFactor;
  market_size: SubFactor;
  unmet_need: SubFactor;
}

export interface ScoreBreakdown {
  clinical: ClinicalBreakdown;
  evidence: EvidenceBreakdown;
  market: MarketBreakdown;
}

export interface DimensionWeights {
  clinical: number;
  evidence: number;
  market: number;
}

export interface EndpointDetail {
  name: string;
  category: EndpointCategory;
  quality_score: number;
  instrument: string | null;
  organ_domain: string | null;
  positive: boolean;
}

export interface SafetyFinding {
  category: string;
  severity_tier: SeverityTier;
  events: number;
  rate: number;
  penalty: number;
  regulatory_flag: boolean;
}

export interface OpportunityScore {
  source_id: string;
  disease: string;
  drug: string;
  mechanism: string | null;
  pathway: string | null;
  sample_size: number | null;
  response_pct: number | null;
  positive_signal: boolean;
  publication_year: number | null;
  venue_type: VenueType;

  clinical: number;
  evidence: number;
  market: number;
  overall: number;
  weights: DimensionWeights;
  breakdown: ScoreBreakdown;

  organ_domains: string[];
  safety_findings: SafetyFinding[];
  regulatory_flags: string[];
  endpoints: EndpointDetail[];
}

// ============================================================================
// Mechanism tournament
// ============================================================================

export type TournamentTier =
  | 'Tier 1 (High Confidence)'
  | 'Tier 2 (Moderate)'
  | 'Tier 3 (Hypothesis-Generating)'
  | 'Hypothesis Only'
  | 'Inconsistent';

export interface RoundResult {
  round: 1 | 2 | 3 | 4;
  name: string;
  passed: boolean;
  detail: string;
}

export interface FinalsTerms {
  aggregate_clinical: number;
  evidence_volume: number;
  mechanism_diversity: number;
  biological_coherence: number;
}

export interface MechanismAggregate {
  mechanism: string;
  mechanism_key: string;
  pathways: string[];
  paper_count: number;
  /** Distinct source_ids among the records */
  independent_sources: number;
  unique_drugs: string[];
  total_patients: number;
  weighted_response_rate: number | null;
  consistency_rate: number;
  earliest_year: number | null;
  rounds: RoundResult[];
  /** Last round passed (0 if Round 1 failed) */
  furthest_round: number;
  convergent: boolean;
  convergent_with: string[];
  finals: FinalsTerms;
  composite: number;
  tier: TournamentTier;
  rank: number;
  source_ids: string[];
}

// ============================================================================
// Disease evidence rollup
// ============================================================================

export type ConsistencyLabel = 'High' | 'Moderate' | 'Low' | 'Single study' | 'N/A';

export type EvidenceConfidence = 'Moderate' | 'Low-Moderate' | 'Low' | 'Very Low' | 'None';

export interface DiseaseEvidenceAggregate {
  disease: string;
  disease_key: string;
  study_count: number;
  total_patients: number;
  total_responders: number;
  pooled_response_pct: number | null;
  response_range: [number, number] | null;
  heterogeneity_cv: number | null;
  consistency: ConsistencyLabel;
  evidence_confidence: EvidenceConfidence;
  avg_clinical: number;
  avg_evidence: number;
  avg_market: number;
  avg_overall: number;
  best_overall: number;
  source_ids: string[];
}
