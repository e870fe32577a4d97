/**
 * Unit tests for the scoring pipeline orchestrator
 */

import { describe, it, expect, vi } from 'vitest';
import { runPipeline, scoreRecord, scoreRecords } from '../run.js';
import { InstrumentStore, type FetchInstruments } from '../../lookup/instrumentStore.js';
import { MemoryInstrumentCache } from '../../lookup/instrumentCache.js';
import { createMockEndpoint, createMockRecord, createStrongRecord } from './fixtures.js';

function createStore(fetcher?: FetchInstruments): InstrumentStore {
  return new InstrumentStore({ cache: new MemoryInstrumentCache(), fetch_instruments: fetcher });
}

describe('scoreRecords', () => {
  it('should look each disease up once with the labels of all its records', async () => {
    const fetcher = vi.fn<FetchInstruments>().mockResolvedValue({ 'mystery index': 9 });
    const records = [
      createStrongRecord({ source_id: 'ra-1' }),
      createMockRecord({
        source_id: 'ra-2',
        disease: 'rheumatoid arthritis',
        efficacy_endpoints: [createMockEndpoint({ name: 'HAQ-DI' })],
      }),
      createMockRecord({ source_id: 'rare-1', disease: 'Rare disease' }),
    ];

    const { scores, lookups } = await scoreRecords(records, createStore(fetcher));

    expect(scores.map((s) => s.source_id)).toEqual(['ra-1', 'ra-2', 'rare-1']);
    expect(Object.keys(lookups)).toEqual(['rheumatoid_arthritis', 'rare_disease']);
    expect(lookups.rheumatoid_arthritis.source).toBe('static');
    expect(lookups.rheumatoid_arthritis.instruments).toEqual({ acr50: 10, 'haq-di': 9 });
    expect(lookups.rare_disease.source).toBe('fetch');
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(fetcher).toHaveBeenCalledWith('Rare disease');
  });

  it('should validate custom weights before any lookup', async () => {
    const fetcher = vi.fn<FetchInstruments>();
    const weights = {
      dimensions: { clinical: 0.9, evidence: 0.9, market: 0.9 },
      clinical: { response_magnitude: 0.5, endpoint_quality: 0.2, organ_breadth: 0.2, safety: 0.1 },
      evidence: { sample_size: 0.4, publication_venue: 0.2, durability: 0.2, completeness: 0.2 },
      market: { competitor_scarcity: 0.4, market_size: 0.4, unmet_need: 0.2 },
    };

    await expect(
      scoreRecords([createMockRecord({ disease: 'Rare disease' })], createStore(fetcher), { weights })
    ).rejects.toThrow('dimensions weights must sum to 1.0');
    expect(fetcher).not.toHaveBeenCalled();
  });
});

describe('scoreRecord', () => {
  it('should score one record through the store', async () => {
    const score = await scoreRecord(createStrongRecord(), createStore());
    expect(score.overall).toBe(9.2);
  });
});

describe('runPipeline', () => {
  it('should score, rank and aggregate', async () => {
    const result = await runPipeline([createStrongRecord()], createStore());

    expect(result.scores).toHaveLength(1);
    expect(result.mechanisms.map((m) => [m.mechanism, m.rank])).toEqual([['JAK inhibitor', 1]]);
    expect(result.diseases.map((d) => d.disease_key)).toEqual(['rheumatoid_arthritis']);
  });

  it('should return empty results for no records', async () => {
    const result = await runPipeline([], createStore());

    expect(result).toEqual({ scores: [], mechanisms: [], diseases: [], lookups: {} });
  });
});
