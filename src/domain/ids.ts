/**
 * Stable keys for diseases, mechanisms and pathways
 */

export function sanitizeKey(key: string): string {
  return key
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function normalizeDiseaseKey(disease: string): string {
  return sanitizeKey(disease);
}

export const UNSPECIFIED_MECHANISM = 'unspecified';

export function mechanismKey(mechanism: string | null | undefined): string {
  const key = mechanism ? sanitizeKey(mechanism) : '';
  return key || UNSPECIFIED_MECHANISM;
}

export function pathwayKey(pathway: string | null | undefined): string | null {
  if (!pathway) return null;
  const key = sanitizeKey(pathway);
  return key || null;
}
