import { ConfigurationError } from '../errors';
import { EMPTY_LABEL, type ClassHistogram, type PruneResult, type Sample } from '../types/dataset';
import { classHistogram } from '../utils/histogram';
import { sampleWithoutReplacement, type Rng } from '../utils/random';

export interface PruneOptions {
  nDump?: number;
  minSamples: number;
}

/**
 * Drops exactly `nDump` randomly chosen empty-label samples.
 * Throws before touching the pool when there are not enough of them.
 */
export function dumpEmptySamples(
  pool: readonly Sample[],
  nDump: number,
  rng: Rng
): { pool: Sample[]; dumped: string[] } {
  const empty = pool.filter(s => s.label === EMPTY_LABEL);
  if (nDump > empty.length) {
    throw new ConfigurationError(
      `Cannot dump ${nDump} empty samples: only ${empty.length} empty labels in the pool`
    );
  }

  const dumped = new Set(sampleWithoutReplacement(empty, nDump, rng).map(s => s.id));
  return {
    pool: pool.filter(s => !dumped.has(s.id)),
    dumped: pool.filter(s => dumped.has(s.id)).map(s => s.id)
  };
}

/**
 * Removes every sample whose class has fewer than `minSamples` members.
 * Single pass: classes are judged on the histogram taken before removal.
 */
export function filterByMinSamples(
  pool: readonly Sample[],
  minSamples: number
): { pool: Sample[]; underrepresented: Array<{ label: number; count: number }> } {
  const underrepresented = [...classHistogram(pool).entries()]
    .filter(([, count]) => count < minSamples)
    .map(([label, count]) => ({ label, count }));

  const marked = new Set(underrepresented.map(c => c.label));
  return {
    pool: pool.filter(s => !marked.has(s.label)),
    underrepresented
  };
}

export function pruneSamples(pool: readonly Sample[], options: PruneOptions, rng: Rng): PruneResult {
  const histogramBefore: ClassHistogram = classHistogram(pool);

  let current: Sample[] = [...pool];
  let dumped: string[] = [];
  if (options.nDump !== undefined && options.nDump > 0) {
    ({ pool: current, dumped } = dumpEmptySamples(current, options.nDump, rng));
    console.log(`[PRUNE] Dumped ${dumped.length} empty-label samples`);
  }

  const filtered = filterByMinSamples(current, options.minSamples);
  for (const { label, count } of filtered.underrepresented) {
    console.log(`[PRUNE] Class ${label} has ${count} samples (< ${options.minSamples}), removing`);
  }

  return {
    pool: filtered.pool,
    histogramBefore,
    histogramAfter: classHistogram(filtered.pool),
    dumped,
    underrepresented: filtered.underrepresented,
    removedCount: pool.length - filtered.pool.length
  };
}
