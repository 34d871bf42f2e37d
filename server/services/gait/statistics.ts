export const finiteSorted = (values: ArrayLike<number>): number[] => {
  const out: number[] = [];
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (Number.isFinite(value)) out.push(value);
  }
  return out.sort((a, b) => a - b);
};

/**
 * Percentile (0..100) of ascending-sorted values, interpolating linearly
 * between closest ranks. NaN for an empty input.
 */
export function percentileOfSorted(sorted: readonly number[], percentile: number): number {
  if (sorted.length === 0) return Number.NaN;
  if (sorted.length === 1) return sorted[0];
  const rank = (Math.min(100, Math.max(0, percentile)) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.min(lower + 1, sorted.length - 1);
  const weight = rank - lower;
  if (weight === 0) return sorted[lower];
  return (1 - weight) * sorted[lower] + weight * sorted[upper];
}

export const mean = (values: readonly number[]): number => {
  if (values.length === 0) return Number.NaN;
  let sum = 0;
  for (const value of values) sum += value;
  return sum / values.length;
};

// Population standard deviation.
export const standardDeviation = (values: readonly number[]): number => {
  if (values.length === 0) return Number.NaN;
  const mu = mean(values);
  let sse = 0;
  for (const value of values) {
    const d = value - mu;
    sse += d * d;
  }
  return Math.sqrt(sse / values.length);
};
