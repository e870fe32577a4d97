/**
 * Unit tests for the evidence-quality dimension
 */

import { describe, it, expect } from 'vitest';
import {
  bucketSampleSize,
  classifyHorizon,
  completenessChecklist,
  parseDurationMonths,
  scoreCompleteness,
  scoreDurability,
  scoreSampleSize,
  scoreVenue,
} from '../evidence.js';
import { createMockEndpoint, createMockRecord, createStrongRecord } from './fixtures.js';

describe('scoreSampleSize', () => {
  it('should bucket sample sizes', () => {
    expect([0, 1, 2, 3, 5, 10, 15, 20, 500].map(bucketSampleSize)).toEqual([
      1, 1, 2, 4, 6, 8, 9, 10, 10,
    ]);
  });

  it('should score an unreported sample size as neutral', () => {
    expect(scoreSampleSize(createMockRecord())).toEqual({ value: 5, basis: 'Sample size not reported' });
    expect(scoreSampleSize(createMockRecord({ sample_size: 12 }))).toEqual({ value: 8, basis: 'N=12' });
  });
});

describe('scoreVenue', () => {
  it('should score known venue types', () => {
    expect(scoreVenue({ venue_type: 'peer_reviewed' }).value).toBe(10);
    expect(scoreVenue({ venue_type: 'preprint' }).value).toBe(6);
    expect(scoreVenue({ venue_type: 'conference_abstract' }).value).toBe(4);
    expect(scoreVenue({ venue_type: 'other' }).value).toBe(2);
  });

  it('should credit a named journal when the venue type is unknown', () => {
    expect(scoreVenue({ venue_type: 'unknown', journal: 'Lancet' })).toEqual({
      value: 8,
      basis: 'Journal named (Lancet)',
    });
    expect(scoreVenue({ venue_type: 'unknown', journal: '  ' }).value).toBe(5);
  });
});

describe('parseDurationMonths', () => {
  it('should parse number-then-unit and unit-then-number forms', () => {
    expect(parseDurationMonths('18 months')).toBe(18);
    expect(parseDurationMonths('2-year extension')).toBe(24);
    expect(parseDurationMonths('week 52')).toBe(12);
    expect(parseDurationMonths('90 days')).toBeCloseTo(2.959, 3);
  });

  it('should take the longest duration mentioned', () => {
    expect(parseDurationMonths('12 weeks, then open label to 1 year')).toBe(12);
  });

  it('should return null without a duration', () => {
    expect(parseDurationMonths('at baseline')).toBeNull();
  });
});

describe('classifyHorizon', () => {
  it('should classify by months', () => {
    expect(classifyHorizon('week 52')).toBe('long');
    expect(classifyHorizon('6 months')).toBe('medium');
    expect(classifyHorizon('12 weeks')).toBe('short');
  });

  it('should treat long-term wording as long', () => {
    expect(classifyHorizon('Long-term extension')).toBe('long');
    expect(classifyHorizon('sustained remission')).toBe('long');
  });

  it('should return null for missing or unparseable text', () => {
    expect(classifyHorizon(null)).toBeNull();
    expect(classifyHorizon('')).toBeNull();
    expect(classifyHorizon('at baseline')).toBeNull();
  });
});

describe('scoreDurability', () => {
  it('should score the best horizon plus the endpoint bonus', () => {
    expect(scoreDurability(createStrongRecord())).toEqual({
      value: 9.5,
      basis: 'long-term follow-up (+0.5 endpoint bonus)',
    });
  });

  it('should cap the endpoint bonus', () => {
    const record = createMockRecord({
      efficacy_endpoints: [
        createMockEndpoint({ timepoint: 'month 6' }),
        createMockEndpoint({ timepoint: 'month 12' }),
        createMockEndpoint({ timepoint: 'month 9' }),
        createMockEndpoint({ timepoint: 'week 4' }),
      ],
    });
    expect(scoreDurability(record).value).toBe(10);
  });

  it('should score short follow-up without bonus', () => {
    const record = createMockRecord({
      publication: { venue_type: 'preprint', follow_up_duration: '12 weeks' },
    });
    expect(scoreDurability(record)).toEqual({ value: 4, basis: 'short-term follow-up' });
  });

  it('should score missing durations as neutral', () => {
    expect(scoreDurability(createMockRecord()).value).toBe(5);
  });
});

describe('scoreCompleteness', () => {
  it('should pass every item on a fully reported record', () => {
    const checks = completenessChecklist(createStrongRecord());
    expect(checks).toHaveLength(10);
    expect(checks.every((c) => c.passed)).toBe(true);
    expect(scoreCompleteness(createStrongRecord())).toEqual({ value: 10, basis: '10/10 items reported' });
  });

  it('should map the passed fraction onto 1-10', () => {
    expect(scoreCompleteness(createMockRecord()).value).toBe(1);

    const partial = createMockRecord({
      sample_size: 40,
      publication: { venue_type: 'unknown', year: 2020 },
      efficacy_endpoints: [createMockEndpoint()],
    });
    expect(scoreCompleteness(partial)).toEqual({ value: 3.7, basis: '3/10 items reported' });
  });
});
