export const roundTo = (value: number, places: number): number => {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
};

export const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

export const sum = (values: readonly number[]): number => values.reduce((total, value) => total + value, 0);

export const mean = (values: readonly number[]): number => (values.length === 0 ? 0 : sum(values) / values.length);

export const median = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);

  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
};

/** Sample standard deviation (n - 1). Zero below two values. */
export const sampleStdDev = (values: readonly number[]): number => {
  if (values.length < 2) {
    return 0;
  }

  const average = mean(values);
  const squared = values.map((value) => (value - average) ** 2);
  return Math.sqrt(sum(squared) / (values.length - 1));
};
