/**
 * Static taxonomy tables loaded from data/*.json
 *
 * Table order is significant: classification is first-match, so specific
 * keywords must precede generic ones.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type {
  InstrumentEntry,
  OrganDomainEntry,
  SafetyCategoryEntry,
} from '../domain/types.js';

const OrganDomainSchema = z.object({
  category: z.string(),
  description: z.string(),
  keywords: z.array(z.string().min(1)),
});

const SafetyCategorySchema = z.object({
  category: z.string(),
  description: z.string(),
  keywords: z.array(z.string().min(1)),
  severity_tier: z.enum(['critical', 'serious', 'moderate', 'mild']),
  base_penalty: z.number().positive(),
  regulatory_flag: z.boolean(),
  meddra_soc: z.string(),
});

const InstrumentSchema = z.object({
  instrument: z.string().min(1),
  score: z.number().min(1).max(10),
  generic: z.boolean(),
});

function loadTable<T>(file_name: string, schema: z.ZodType<T>): T[] {
  const file_url = new URL(`../../data/${file_name}`, import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(file_url, 'utf-8'));
  return z.array(schema).parse(raw);
}

export const ORGAN_DOMAINS: readonly OrganDomainEntry[] = loadTable(
  'organ-domains.json',
  OrganDomainSchema
);

export const SAFETY_CATEGORIES: readonly SafetyCategoryEntry[] = loadTable(
  'safety-categories.json',
  SafetyCategorySchema
);

export const INSTRUMENTS: readonly InstrumentEntry[] = loadTable(
  'instruments.json',
  InstrumentSchema
);

const SAFETY_BY_CATEGORY = new Map(SAFETY_CATEGORIES.map((c) => [c.category, c]));

export function getSafetyCategory(category: string): SafetyCategoryEntry | undefined {
  return SAFETY_BY_CATEGORY.get(category);
}
