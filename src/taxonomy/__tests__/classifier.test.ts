/**
 * Unit tests for the keyword taxonomy classifier
 */

import { describe, it, expect } from 'vitest';
import {
  classify,
  classifyAll,
  classifyEntry,
  matchInstrument,
  scoreInstrument,
} from '../classifier.js';
import { INSTRUMENTS, ORGAN_DOMAINS, SAFETY_CATEGORIES, getSafetyCategory } from '../tables.js';
import type { TaxonomyEntry } from '../../domain/types.js';

describe('Taxonomy tables', () => {
  it('should load organ domains in declared order', () => {
    expect(ORGAN_DOMAINS.map((d) => d.category)).toEqual([
      'musculoskeletal',
      'mucocutaneous',
      'renal',
      'neurological',
      'gastrointestinal',
      'hematological',
      'cardiopulmonary',
      'immunological',
      'systemic',
      'ocular',
      'constitutional',
    ]);
  });

  it('should carry severity metadata on safety categories', () => {
    expect(SAFETY_CATEGORIES).toHaveLength(13);

    const malignancy = getSafetyCategory('malignancy');
    expect(malignancy?.severity_tier).toBe('critical');
    expect(malignancy?.base_penalty).toBe(2.0);
    expect(malignancy?.regulatory_flag).toBe(true);

    const mild = getSafetyCategory('non_serious_infection');
    expect(mild?.severity_tier).toBe('mild');
    expect(mild?.regulatory_flag).toBe(false);

    expect(getSafetyCategory('metabolic')).toBeUndefined();
  });

  it('should list generic response wording after every named instrument', () => {
    const first_generic = INSTRUMENTS.findIndex((e) => e.generic);
    expect(first_generic).toBeGreaterThan(0);
    expect(INSTRUMENTS.slice(first_generic).every((e) => e.generic)).toBe(true);
  });
});

describe('classify', () => {
  it('should match case-insensitively and report the keyword', () => {
    expect(classify('ACR50 response at week 24', ORGAN_DOMAINS)).toEqual({
      label: 'ACR50 response at week 24',
      category: 'musculoskeletal',
      matched_keyword: 'acr50',
    });
    expect(classify('Anti-dsDNA titer', ORGAN_DOMAINS)?.category).toBe('immunological');
  });

  it('should take the first matching entry in table order', () => {
    // skin (mucocutaneous) and joint (musculoskeletal) both match
    expect(classify('Skin and joint involvement', ORGAN_DOMAINS)?.category).toBe('musculoskeletal');

    expect(classify('Pneumonia requiring hospitalization', SAFETY_CATEGORIES)?.category).toBe(
      'serious_infection'
    );
  });

  it('should resolve overlapping keywords to the more specific category', () => {
    expect(classify('Interstitial pneumonia', SAFETY_CATEGORIES)?.category).toBe('pulmonary');
    expect(classify('Urticaria', SAFETY_CATEGORIES)?.category).toBe('hypersensitivity');
    expect(classify('URTI', SAFETY_CATEGORIES)?.category).toBe('non_serious_infection');
    expect(classify('Oral candidiasis', SAFETY_CATEGORIES)?.category).toBe('non_serious_infection');
    expect(classify('Esophageal candidiasis', SAFETY_CATEGORIES)?.category).toBe('serious_infection');

    expect(classify('Cardiomyopathy improvement', ORGAN_DOMAINS)?.category).toBe('cardiopulmonary');
    expect(classify('FACIT-Fatigue', ORGAN_DOMAINS)?.category).toBe('constitutional');
    expect(classify('Mucosal healing', ORGAN_DOMAINS)?.category).toBe('gastrointestinal');
    expect(classify('Necrotizing scleritis', ORGAN_DOMAINS)?.category).toBe('ocular');
    expect(classify('Retinal vasculitis', ORGAN_DOMAINS)?.category).toBe('ocular');
  });

  it('should return null for blank or unmatched labels', () => {
    expect(classify('', ORGAN_DOMAINS)).toBeNull();
    expect(classify('   ', ORGAN_DOMAINS)).toBeNull();
    expect(classify('Nausea', SAFETY_CATEGORIES)).toBeNull();
  });

  it('should work with caller-supplied tables', () => {
    const table: TaxonomyEntry[] = [
      { category: 'first', keywords: ['alpha'] },
      { category: 'second', keywords: ['alpha beta', 'gamma'] },
    ];
    expect(classify('alpha beta', table)?.category).toBe('first');
    expect(classify('Gamma', table)?.category).toBe('second');
  });
});

describe('Taxonomy keyword order', () => {
  /** Keywords that can never match because an earlier entry's keyword is contained in them */
  function shadowedKeywords(table: readonly TaxonomyEntry[]): string[] {
    const shadowed: string[] = [];
    table.forEach((earlier, i) => {
      for (const later of table.slice(i + 1)) {
        if (later.category === earlier.category) continue;
        for (const generic of earlier.keywords) {
          for (const specific of later.keywords) {
            if (specific.toLowerCase().includes(generic.toLowerCase())) {
              shadowed.push(`${earlier.category}:${generic} > ${later.category}:${specific}`);
            }
          }
        }
      }
    });
    return shadowed;
  }

  it('should leave every organ-domain keyword reachable', () => {
    expect(shadowedKeywords(ORGAN_DOMAINS)).toEqual([]);
  });

  it('should leave every safety keyword reachable', () => {
    expect(shadowedKeywords(SAFETY_CATEGORIES)).toEqual([]);
  });

  it('should leave every instrument pattern reachable', () => {
    const table = INSTRUMENTS.map((e) => ({ category: e.instrument, keywords: [e.instrument] }));
    expect(shadowedKeywords(table)).toEqual([]);
  });

  it('should flag a generic keyword listed ahead of a specific one', () => {
    const table: TaxonomyEntry[] = [
      { category: 'infection', keywords: ['urti'] },
      { category: 'allergy', keywords: ['urticaria'] },
    ];
    expect(shadowedKeywords(table)).toEqual(['infection:urti > allergy:urticaria']);
  });
});

describe('classifyEntry', () => {
  it('should return the matched entry with its metadata', () => {
    const result = classifyEntry('Herpes zoster', SAFETY_CATEGORIES);
    expect(result?.entry.category).toBe('non_serious_infection');
    expect(result?.entry.base_penalty).toBe(0.6);
    expect(result?.keyword).toBe('herpes zoster');
  });
});

describe('classifyAll', () => {
  it('should return distinct categories in table order', () => {
    expect(classifyAll(['Skin rash', 'SJC28', 'skin thickness', 'Nothing here'], ORGAN_DOMAINS)).toEqual([
      'musculoskeletal',
      'mucocutaneous',
    ]);
  });

  it('should return an empty list when nothing matches', () => {
    expect(classifyAll([], ORGAN_DOMAINS)).toEqual([]);
  });
});

describe('matchInstrument', () => {
  it('should prefer the specific pattern listed first', () => {
    expect(matchInstrument('PASI75 at week 16')?.instrument).toBe('pasi75');
    expect(matchInstrument('PASI 75')?.instrument).toBe('pasi');
    expect(matchInstrument('HAQ-DI')?.instrument).toBe('haq-di');
    expect(matchInstrument('DAS28-CRP remission')?.instrument).toBe('das28');
    expect(matchInstrument('BASDAI50')?.instrument).toBe('basdai');
    expect(matchInstrument('SDAI remission')?.instrument).toBe('sdai');
  });

  it('should fall back to generic response wording', () => {
    const entry = matchInstrument('Clinical remission');
    expect(entry).toEqual({ instrument: 'remission', score: 7, generic: true });
  });

  it('should score unknown labels as null', () => {
    expect(scoreInstrument('Serum ferritin')).toBeNull();
    expect(scoreInstrument('SRI-4 response')).toBe(9);
  });
});
