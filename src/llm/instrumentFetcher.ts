/**
 * LLM-backed instrument fetcher for the lookup store
 */

import type { InstrumentScores } from '../domain/types.js';
import type { FetchInstruments } from '../lookup/instrumentStore.js';
import { createLogger } from '../utils/log.js';
import type { StructuredCaller } from './client.js';
import { createInstrumentLookupUserPrompt, INSTRUMENT_LOOKUP_SYSTEM_PROMPT } from './prompts.js';
import { INSTRUMENT_LIST_JSON_SCHEMA, InstrumentListSchema, type InstrumentList } from './schemas.js';

const logger = createLogger('instrument-fetcher');

export function toInstrumentScores(list: InstrumentList): InstrumentScores {
  const scores: InstrumentScores = {};
  for (const item of list.instruments) {
    const name = item.instrument_name.trim().toLowerCase();
    if (!name) continue;
    // Keep the best score when the model lists an instrument twice
    scores[name] = Math.max(scores[name] ?? 0, item.quality_score);
  }
  return scores;
}

/**
 * Errors propagate; the store turns them into an empty result.
 */
export function createLlmInstrumentFetcher(client: StructuredCaller): FetchInstruments {
  return async (disease: string): Promise<InstrumentScores> => {
    const result = await client.callWithSchema(
      'InstrumentList',
      INSTRUMENT_LIST_JSON_SCHEMA,
      InstrumentListSchema,
      INSTRUMENT_LOOKUP_SYSTEM_PROMPT,
      createInstrumentLookupUserPrompt(disease)
    );

    const scores = toInstrumentScores(result.data);
    logger.info(
      { disease, canonical: result.data.canonical_disease_name, count: Object.keys(scores).length },
      'Instruments fetched from LLM'
    );
    return scores;
  };
}
