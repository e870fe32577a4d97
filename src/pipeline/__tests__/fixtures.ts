/**
 * Shared record fixtures for pipeline tests
 */

import type { EfficacyEndpoint, EvidenceRecord } from '../../domain/types.js';

export function createMockEndpoint(overrides: Partial<EfficacyEndpoint> = {}): EfficacyEndpoint {
  return {
    name: 'Serum ferritin',
    category: 'secondary',
    ...overrides,
  };
}

/** Bare record: every optional field missing */
export function createMockRecord(overrides: Partial<EvidenceRecord> = {}): EvidenceRecord {
  return {
    source_id: 'rec-1',
    disease: 'Rheumatoid arthritis',
    drug: 'drug-a',
    efficacy_endpoints: [],
    safety_events: [],
    publication: { venue_type: 'unknown' },
    ...overrides,
  };
}

/**
 * Strong single-study record: 85% responders, one significant primary ACR50
 * endpoint, N=60, peer reviewed, 18 months follow-up, no competitors.
 */
export function createStrongRecord(overrides: Partial<EvidenceRecord> = {}): EvidenceRecord {
  return createMockRecord({
    source_id: 'strong-1',
    mechanism: 'JAK inhibitor',
    pathway: 'JAK-STAT',
    sample_size: 60,
    responders_pct: 85,
    efficacy_endpoints: [
      createMockEndpoint({
        name: 'ACR50',
        category: 'primary',
        statistically_significant: true,
        p_value: 0.001,
        timepoint: 'week 52',
      }),
    ],
    publication: {
      venue_type: 'peer_reviewed',
      year: 2022,
      journal: 'Test Journal of Rheumatology',
      follow_up_duration: '18 months',
    },
    efficacy_summary: 'Most patients reached ACR50.',
    safety_summary: 'No serious adverse events.',
    market: { num_approved_drugs: 0, patient_population: 50_000 },
    ...overrides,
  });
}
