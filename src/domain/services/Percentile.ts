/**
 * Quantile with linear interpolation between the two closest ranks
 * (position = (n - 1) * q over the sorted values). Returns 0 for no values.
 */
export const percentile = (values: readonly number[], q: number): number => {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * Math.min(Math.max(q, 0), 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const weight = position - lower;

  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
};
