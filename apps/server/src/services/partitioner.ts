import { SplitError } from '../errors';
import type { ClassHistogram, PartitionOutcome, Sample } from '../types/dataset';
import { classHistogram } from '../utils/histogram';
import { permutation, type Rng } from '../utils/random';

// absorbs float noise such as 0.1 * 30 = 3.0000000000000004 or 0.35 * 10 = 3.4999999999999996
const EPSILON = 1e-9;

/**
 * Returns why a stratified split is impossible, or null when every class
 * can be represented on both sides.
 */
function stratificationProblem(histogram: ClassHistogram): string | null {
  for (const [label, count] of histogram) {
    if (count < 2) return `class ${label} has only ${count} member`;
  }
  return null;
}

/**
 * Held-out count per class: `fraction * count` rounded to the nearest integer,
 * clamped to [1, count - 1] so each class lands on both sides.
 * Every quota stays within one sample of `fraction * count`.
 */
function allocateQuotas(histogram: ClassHistogram, fraction: number): Map<number, number> {
  const quotas = new Map<number, number>();
  for (const [label, count] of histogram) {
    const nearest = Math.round(fraction * count + EPSILON);
    quotas.set(label, Math.min(count - 1, Math.max(1, nearest)));
  }
  return quotas;
}

function collect(pool: readonly Sample[], held: boolean[], mode: PartitionOutcome['mode']): PartitionOutcome {
  return {
    mode,
    kept: pool.filter((_, i) => !held[i]),
    heldOut: pool.filter((_, i) => held[i])
  };
}

function stratifiedSplit(
  pool: readonly Sample[],
  histogram: ClassHistogram,
  fraction: number,
  rng: Rng
): PartitionOutcome {
  const quotas = allocateQuotas(histogram, fraction);
  const held = new Array<boolean>(pool.length).fill(false);

  for (const i of permutation(pool.length, rng)) {
    const left = quotas.get(pool[i].label) ?? 0;
    if (left > 0) {
      held[i] = true;
      quotas.set(pool[i].label, left - 1);
    }
  }
  return collect(pool, held, 'stratified');
}

function randomSplit(pool: readonly Sample[], fraction: number, rng: Rng): PartitionOutcome {
  const nHeld = Math.floor(pool.length * fraction + EPSILON);
  if (nHeld === 0 || nHeld === pool.length) {
    throw new SplitError(
      `Cannot split ${pool.length} samples at fraction ${fraction}: one side would be empty`
    );
  }

  const held = new Array<boolean>(pool.length).fill(false);
  for (const i of permutation(pool.length, rng).slice(0, nHeld)) {
    held[i] = true;
  }
  return collect(pool, held, 'fallback');
}

/**
 * Binary split of `pool` with roughly `fraction` of every class held out.
 * Falls back to an unstratified random split when some class cannot be
 * represented on both sides; the outcome's `mode` says which path ran.
 * Both sides keep the pool's original order.
 */
export function partitionSamples(pool: readonly Sample[], fraction: number, rng: Rng): PartitionOutcome {
  if (!(fraction > 0 && fraction < 1)) {
    throw new SplitError(`Split fraction must be between 0 and 1 (got ${fraction})`);
  }
  if (pool.length < 2) {
    throw new SplitError(`Cannot split a pool of ${pool.length} sample(s)`);
  }

  const histogram = classHistogram(pool);
  const problem = stratificationProblem(histogram);

  if (problem === null) {
    return stratifiedSplit(pool, histogram, fraction, rng);
  }

  console.warn(`[SPLIT] Stratified split not possible (${problem}), using random split`);
  return { ...randomSplit(pool, fraction, rng), reason: problem };
}
