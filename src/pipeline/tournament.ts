/**
 * Mechanism tournament ranker
 *
 * Records are grouped by mechanism class and pushed through four gates:
 *
 *   Round 1  signal detection   >= 1 record with a positive signal
 *   Round 2  replication        >= 2 distinct sources, or >= 5 patients in total
 *   Round 3  consistency        >= 50% of records positive
 *   Round 4  convergence        another positive mechanism on the same pathway
 *                               earns a x1.15 bonus; never eliminates
 *
 * Survivors are tiered by their finals composite. A mechanism that fails a gate
 * keeps the terminal tier of that gate and can never reach Tier 1-3.
 */

import { TOURNAMENT_CONFIG } from '../config/defaults.js';
import { mechanismKey, pathwayKey, sanitizeKey, UNSPECIFIED_MECHANISM } from '../domain/ids.js';
import type {
  FinalsTerms,
  MechanismAggregate,
  OpportunityScore,
  RoundResult,
  TournamentTier,
} from '../domain/types.js';
import { EmptyInputError } from '../utils/errors.js';
import { mean, round2, sum } from '../utils/math.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('tournament');

interface MechanismGroup {
  key: string;
  name: string;
  scores: OpportunityScore[];
}

interface GroupStats {
  paper_count: number;
  independent_sources: number;
  unique_drugs: string[];
  total_patients: number;
  weighted_response_rate: number | null;
  consistency_rate: number;
  earliest_year: number | null;
  pathways: string[];
  pathway_keys: Set<string>;
  positive_count: number;
}

function patients(score: OpportunityScore): number {
  return score.sample_size != null && score.sample_size > 0 ? score.sample_size : 0;
}

export function groupByMechanism(scores: OpportunityScore[]): MechanismGroup[] {
  const groups = new Map<string, MechanismGroup>();
  for (const score of scores) {
    const key = mechanismKey(score.mechanism);
    const group = groups.get(key);
    if (group) {
      group.scores.push(score);
    } else {
      groups.set(key, {
        key,
        name: score.mechanism?.trim() || UNSPECIFIED_MECHANISM,
        scores: [score],
      });
    }
  }
  return [...groups.values()];
}

/**
 * Patient-weighted response rate; plain mean when no record reports N.
 */
export function weightedResponseRate(scores: OpportunityScore[]): number | null {
  const with_response = scores.filter((s) => s.response_pct !== null);
  if (with_response.length === 0) return null;

  const weighted = with_response.filter((s) => patients(s) > 0);
  if (weighted.length === 0) {
    return mean(with_response.map((s) => s.response_pct ?? 0));
  }

  const total_n = sum(weighted.map(patients));
  return sum(weighted.map((s) => (s.response_pct ?? 0) * patients(s))) / total_n;
}

function computeStats(group: MechanismGroup): GroupStats {
  const drugs = new Map<string, string>();
  const pathways = new Map<string, string>();
  for (const s of group.scores) {
    const drug_key = sanitizeKey(s.drug);
    if (drug_key && !drugs.has(drug_key)) drugs.set(drug_key, s.drug);
    const pw_key = pathwayKey(s.pathway);
    if (pw_key && s.pathway && !pathways.has(pw_key)) pathways.set(pw_key, s.pathway);
  }

  const years = group.scores
    .map((s) => s.publication_year)
    .filter((y): y is number => y !== null);
  const positive_count = group.scores.filter((s) => s.positive_signal).length;
  const source_ids = new Set(group.scores.map((s) => s.source_id.trim()).filter((id) => id.length > 0));

  return {
    paper_count: group.scores.length,
    independent_sources: source_ids.size,
    unique_drugs: [...drugs.values()],
    total_patients: sum(group.scores.map(patients)),
    weighted_response_rate: weightedResponseRate(group.scores),
    consistency_rate: positive_count / group.scores.length,
    earliest_year: years.length > 0 ? Math.min(...years) : null,
    pathways: [...pathways.values()],
    pathway_keys: new Set(pathways.keys()),
    positive_count,
  };
}

/**
 * Clinical mean weighted by patients (records without N count once).
 */
function patientWeightedClinical(scores: OpportunityScore[]): number {
  const weights = scores.map((s) => Math.max(1, patients(s)));
  return sum(scores.map((s, i) => s.clinical * weights[i])) / sum(weights);
}

export function computeFinals(
  scores: OpportunityScore[],
  stats: GroupStats,
  convergent: boolean
): FinalsTerms {
  const clinical_mean = patientWeightedClinical(scores);
  const aggregate_clinical =
    stats.weighted_response_rate === null
      ? clinical_mean
      : 0.5 * (stats.weighted_response_rate / 10) + 0.5 * clinical_mean;

  return {
    aggregate_clinical,
    evidence_volume: Math.min(10, 2.5 * Math.log10(1 + stats.total_patients * stats.paper_count)),
    mechanism_diversity: Math.min(10, stats.unique_drugs.length * stats.consistency_rate * 2.5),
    biological_coherence: convergent ? 10 : 5,
  };
}

export function finalsComposite(finals: FinalsTerms, convergent: boolean): number {
  const w = TOURNAMENT_CONFIG.FINALS_WEIGHTS;
  const base =
    w.aggregate_clinical * finals.aggregate_clinical +
    w.evidence_volume * finals.evidence_volume +
    w.mechanism_diversity * finals.mechanism_diversity +
    w.biological_coherence * finals.biological_coherence;
  const boosted = convergent ? base * TOURNAMENT_CONFIG.CONVERGENCE_BONUS : base;
  return round2(Math.min(10, boosted));
}

export function tierForComposite(composite: number): TournamentTier {
  const t = TOURNAMENT_CONFIG.TIER_THRESHOLDS;
  if (composite >= t.TIER_1) return 'Tier 1 (High Confidence)';
  if (composite >= t.TIER_2) return 'Tier 2 (Moderate)';
  if (composite >= t.TIER_3) return 'Tier 3 (Hypothesis-Generating)';
  return 'Hypothesis Only';
}

interface GateOutcome {
  rounds: RoundResult[];
  furthest_round: number;
  terminal_tier: TournamentTier | null;
}

function runGates(stats: GroupStats): GateOutcome {
  const cfg = TOURNAMENT_CONFIG;
  const rounds: RoundResult[] = [];

  const signal = stats.positive_count >= 1;
  rounds.push({
    round: 1,
    name: 'Signal Detection',
    passed: signal,
    detail: `${stats.positive_count}/${stats.paper_count} record(s) with a positive signal`,
  });
  if (!signal) return { rounds, furthest_round: 0, terminal_tier: 'Hypothesis Only' };

  const replicated =
    stats.independent_sources >= cfg.MIN_REPLICATION_RECORDS ||
    stats.total_patients >= cfg.MIN_REPLICATION_PATIENTS;
  rounds.push({
    round: 2,
    name: 'Replication',
    passed: replicated,
    detail: `${stats.independent_sources} independent source(s), N=${stats.total_patients}`,
  });
  if (!replicated) return { rounds, furthest_round: 1, terminal_tier: 'Hypothesis Only' };

  const consistent = stats.consistency_rate >= cfg.MIN_CONSISTENCY;
  rounds.push({
    round: 3,
    name: 'Consistency',
    passed: consistent,
    detail: `${(stats.consistency_rate * 100).toFixed(0)}% of records positive`,
  });
  if (!consistent) return { rounds, furthest_round: 2, terminal_tier: 'Inconsistent' };

  return { rounds, furthest_round: 3, terminal_tier: null };
}

/** Lower sorts first: finalists, then Round 3 failures, then Round 1/2 failures */
function gateGroup(aggregate: MechanismAggregate): number {
  if (aggregate.furthest_round >= 3) return 0;
  if (aggregate.furthest_round === 2) return 1;
  return 2;
}

export function compareMechanisms(a: MechanismAggregate, b: MechanismAggregate): number {
  return (
    gateGroup(a) - gateGroup(b) ||
    b.composite - a.composite ||
    b.total_patients - a.total_patients ||
    (a.earliest_year ?? Infinity) - (b.earliest_year ?? Infinity) ||
    a.mechanism.localeCompare(b.mechanism)
  );
}

export function rankMechanisms(scores: OpportunityScore[]): MechanismAggregate[] {
  if (scores.length === 0) {
    throw new EmptyInputError('rankMechanisms');
  }

  const groups = groupByMechanism(scores);
  const evaluated = groups.map((group) => {
    const stats = computeStats(group);
    return { group, stats, gates: runGates(stats) };
  });

  const aggregates: MechanismAggregate[] = evaluated.map(({ group, stats, gates }) => {
    const finalist = gates.terminal_tier === null;

    // Convergence: a different mechanism with a positive signal on a shared pathway
    const convergent_with = finalist
      ? evaluated
          .filter(
            (other) =>
              other.group.key !== group.key &&
              other.stats.positive_count > 0 &&
              [...other.stats.pathway_keys].some((k) => stats.pathway_keys.has(k))
          )
          .map((other) => other.group.name)
      : [];
    const convergent = convergent_with.length > 0;

    const rounds = [...gates.rounds];
    if (finalist) {
      rounds.push({
        round: 4,
        name: 'Convergence',
        passed: true,
        detail: convergent
          ? `Converges with ${convergent_with.join(', ')}`
          : 'No convergent mechanism on a shared pathway',
      });
    }

    const finals = computeFinals(group.scores, stats, convergent);
    const composite = finalsComposite(finals, convergent);

    return {
      mechanism: group.name,
      mechanism_key: group.key,
      pathways: stats.pathways,
      paper_count: stats.paper_count,
      independent_sources: stats.independent_sources,
      unique_drugs: stats.unique_drugs,
      total_patients: stats.total_patients,
      weighted_response_rate: stats.weighted_response_rate,
      consistency_rate: stats.consistency_rate,
      earliest_year: stats.earliest_year,
      rounds,
      furthest_round: finalist ? 4 : gates.furthest_round,
      convergent,
      convergent_with,
      finals,
      composite,
      tier: gates.terminal_tier ?? tierForComposite(composite),
      rank: 0,
      source_ids: group.scores.map((s) => s.source_id),
    };
  });

  aggregates.sort(compareMechanisms);
  aggregates.forEach((a, idx) => {
    a.rank = idx + 1;
  });

  logger.info(
    {
      mechanisms: aggregates.length,
      finalists: aggregates.filter((a) => a.furthest_round === 4).length,
    },
    'Mechanism tournament ranked'
  );

  return aggregates;
}
