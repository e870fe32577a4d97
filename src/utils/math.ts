/**
 * Mathematical utility functions
 */

export function sum(values: number[]): number {
  return values.reduce((acc, val) => acc + val, 0);
}

export function mean(values: number[]): number {
  return sum(values) / values.length;
}

/**
 * Clamp to [min, max]. NaN collapses to min.
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function clampPercent(value: number): number {
  return clamp(value, 0, 100);
}

export function clampScore(value: number): number {
  return clamp(value, 1, 10);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  // toFixed strips binary drift such as 91.74999999999999 before rounding
  return Math.round(Number((value * factor).toFixed(6))) / factor;
}

export function round1(value: number): number {
  return roundTo(value, 1);
}

export function round2(value: number): number {
  return roundTo(value, 2);
}

/** Sample standard deviation (n - 1). Zero for fewer than two values. */
export function sampleStddev(values: number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const squared = values.map((v) => (v - m) ** 2);
  return Math.sqrt(sum(squared) / (values.length - 1));
}

/** Population standard deviation (n). */
export function populationStddev(values: number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - m) ** 2)));
}

/**
 * Weighted median using integer repetition counts. Each value is repeated
 * `counts[i]` times; the ordinary median of the expanded list is returned.
 * Values with a count of zero are dropped.
 */
export function weightedMedian(values: number[], counts: number[]): number {
  if (values.length !== counts.length) {
    throw new Error('Values and weights must have same length');
  }

  const pairs = values
    .map((value, idx) => ({ value, count: counts[idx] }))
    .filter((p) => p.count > 0)
    .sort((a, b) => a.value - b.value);

  const total = sum(pairs.map((p) => p.count));
  if (total === 0) {
    throw new Error('Weighted median requires at least one positive weight');
  }

  // 0-based positions of the middle element(s) in the expanded list
  const lower_pos = Math.floor((total - 1) / 2);
  const upper_pos = Math.floor(total / 2);

  const valueAt = (pos: number): number => {
    let seen = 0;
    for (const p of pairs) {
      seen += p.count;
      if (pos < seen) return p.value;
    }
    return pairs[pairs.length - 1].value;
  };

  return (valueAt(lower_pos) + valueAt(upper_pos)) / 2;
}
