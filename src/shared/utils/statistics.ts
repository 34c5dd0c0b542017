export const roundTo = (value: number, decimals: number): number => {
  const scale = 10 ** decimals;
  return Math.round(value * scale) / scale;
};

export const mean = (values: readonly number[]): number =>
  values.reduce((total, value) => total + value, 0) / values.length;

export const median = (values: readonly number[]): number => {
  const sorted = [...values].sort((left, right) => left - right);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;

  if (sorted.length % 2 === 1) {
    return upper;
  }

  return ((sorted[middle - 1] ?? upper) + upper) / 2;
};

/**
 * Sample (n - 1) standard deviation. Callers guarantee at least two values.
 */
export const sampleStdDev = (values: readonly number[]): number => {
  const average = mean(values);
  const squared = values.reduce(
    (total, value) => total + (value - average) ** 2,
    0,
  );
  return Math.sqrt(squared / (values.length - 1));
};
