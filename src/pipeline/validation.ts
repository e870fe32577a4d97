/**
 * Validation helpers for scoring weights
 */

import type { ScoringWeights } from '../config/defaults.js';
import { createLogger } from '../utils/log.js';
import { sum } from '../utils/math.js';

const logger = createLogger('validation');

export const WEIGHT_SUM_TOLERANCE = 0.001;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validate that a weight is between 0 and 1
 */
export function validateWeight(weight: number, name: string): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
  };

  if (typeof weight !== 'number' || isNaN(weight)) {
    result.valid = false;
    result.errors.push(`${name} must be a valid number, got: ${weight}`);
    return result;
  }

  if (weight < 0) {
    result.valid = false;
    result.errors.push(`${name} cannot be negative: ${weight}`);
  } else if (weight > 1) {
    result.valid = false;
    result.errors.push(`${name} cannot exceed 1.0: ${weight}`);
  } else if (weight === 0) {
    result.warnings.push(`${name} is zero and will not contribute`);
  }

  return result;
}

/**
 * Validate one group of weights: each in [0, 1], summing to 1.0
 */
export function validateWeightGroup(
  weights: Record<string, number>,
  group_name: string
): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
  };

  for (const [key, value] of Object.entries(weights)) {
    const check = validateWeight(value, `${group_name}.${key}`);
    result.errors.push(...check.errors);
    result.warnings.push(...check.warnings);
    if (!check.valid) result.valid = false;
  }

  const total = sum(Object.values(weights));
  if (Math.abs(total - 1.0) > WEIGHT_SUM_TOLERANCE) {
    result.valid = false;
    result.errors.push(`${group_name} weights must sum to 1.0, got: ${total.toFixed(4)}`);
  }

  return result;
}

export function validateScoringWeights(weights: ScoringWeights): ValidationResult {
  const groups = [
    validateWeightGroup(weights.dimensions, 'dimensions'),
    validateWeightGroup(weights.clinical, 'clinical'),
    validateWeightGroup(weights.evidence, 'evidence'),
    validateWeightGroup(weights.market, 'market'),
  ];

  return {
    valid: groups.every((g) => g.valid),
    errors: groups.flatMap((g) => g.errors),
    warnings: groups.flatMap((g) => g.warnings),
  };
}

/**
 * Throw if validation failed
 */
export function throwIfInvalid(result: ValidationResult, context: string): void {
  if (!result.valid) {
    const errorMessage = `Validation failed for ${context}:\n` +
      result.errors.map((e) => `  - ${e}`).join('\n');
    throw new Error(errorMessage);
  }

  // Log warnings even if valid
  for (const warning of result.warnings) {
    logger.warn({ context }, warning);
  }
}
