/**
 * Zod schemas for validating LLM outputs with structured outputs
 */

import { z } from 'zod';

export const ValidatedInstrumentSchema = z.object({
  instrument_name: z.string(),
  quality_score: z.number(),
  instrument_type: z.enum([
    'composite',
    'patient_reported',
    'clinician_reported',
    'biomarker',
    'imaging',
    'other',
  ]),
  regulatory_acceptance: z.boolean(),
});

export const InstrumentListSchema = z.object({
  canonical_disease_name: z.string(),
  instruments: z.array(ValidatedInstrumentSchema),
});

export type ValidatedInstrument = z.infer<typeof ValidatedInstrumentSchema>;
export type InstrumentList = z.infer<typeof InstrumentListSchema>;

// Manual JSON schema for OpenAI (must match the Zod schema above)
export const INSTRUMENT_LIST_JSON_SCHEMA = {
  type: 'object',
  properties: {
    canonical_disease_name: { type: 'string' },
    instruments: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          instrument_name: { type: 'string' },
          quality_score: { type: 'number' },
          instrument_type: {
            type: 'string',
            enum: [
              'composite',
              'patient_reported',
              'clinician_reported',
              'biomarker',
              'imaging',
              'other',
            ],
          },
          regulatory_acceptance: { type: 'boolean' },
        },
        required: ['instrument_name', 'quality_score', 'instrument_type', 'regulatory_acceptance'],
        additionalProperties: false,
      },
    },
  },
  required: ['canonical_disease_name', 'instruments'],
  additionalProperties: false,
};
