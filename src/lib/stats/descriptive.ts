// Sample statistics (ddof = 1) and linear-interpolation quantiles, matching
// the defaults of the common dataframe libraries.

export const sortAscending = (values: number[]): number[] => [...values].sort((a, b) => a - b);

export const mean = (values: number[]): number | null => {
  if (values.length === 0) {
    return null;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
};

export const sampleStdDev = (values: number[]): number | null => {
  const average = mean(values);
  if (average === null || values.length < 2) {
    return null;
  }
  const squared = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
};

/** Quantile of already-sorted values; position (n - 1) * q, interpolated between neighbours. */
export const quantile = (sorted: number[], q: number): number | null => {
  if (sorted.length === 0) {
    return null;
  }
  const position = (sorted.length - 1) * q;
  const base = Math.floor(position);
  const rest = position - base;
  const next = sorted[base + 1];
  if (next === undefined) {
    return sorted[base];
  }
  return sorted[base] + rest * (next - sorted[base]);
};

export const median = (values: number[]): number | null => quantile(sortAscending(values), 0.5);

/** Adjusted Fisher-Pearson sample skewness; null below three values or without spread. */
export const skewness = (values: number[]): number | null => {
  const n = values.length;
  const average = mean(values);
  if (average === null || n < 3) {
    return null;
  }
  const m2 = values.reduce((sum, value) => sum + (value - average) ** 2, 0) / n;
  if (m2 === 0) {
    return null;
  }
  const m3 = values.reduce((sum, value) => sum + (value - average) ** 3, 0) / n;
  const biased = m3 / m2 ** 1.5;
  return (biased * Math.sqrt(n * (n - 1))) / (n - 2);
};
