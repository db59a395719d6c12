import type { ClassHistogram, Sample } from '../types/dataset';

export const classHistogram = (pool: readonly Sample[]): ClassHistogram => {
  const counts = new Map<number, number>();
  for (const sample of pool) {
    counts.set(sample.label, (counts.get(sample.label) ?? 0) + 1);
  }
  // ascending label order, empty sentinel first
  return new Map([...counts.entries()].sort((a, b) => a[0] - b[0]));
};

export const histogramToRecord = (histogram: ClassHistogram): Record<string, number> =>
  Object.fromEntries([...histogram.entries()].map(([label, count]) => [String(label), count]));
