import { ConfigurationError } from '../errors';
import type { DatasetSplit, PartitionOutcome, Sample, SplitOptions, StageReport } from '../types/dataset';
import { createRng, type Rng } from '../utils/random';
import { partitionSamples } from './partitioner';
import { pruneSamples } from './pruner';
import { scanDataset, type ScanResult } from './scanner';

const inUnitInterval = (v: number) => Number.isFinite(v) && v > 0 && v < 1;

export function validateSplitOptions(options: SplitOptions): void {
  const { validationFraction, testFraction, nDump, minSamples, randomSeed } = options;

  if (!inUnitInterval(validationFraction)) {
    throw new ConfigurationError(`validationFraction must be in (0, 1), got ${validationFraction}`);
  }
  if (testFraction !== undefined) {
    if (!inUnitInterval(testFraction)) {
      throw new ConfigurationError(`testFraction must be in (0, 1), got ${testFraction}`);
    }
    if (validationFraction + testFraction >= 1) {
      throw new ConfigurationError(
        `validationFraction + testFraction must be below 1 (got ${validationFraction + testFraction})`
      );
    }
  }
  if (nDump !== undefined && !(Number.isInteger(nDump) && nDump >= 0)) {
    throw new ConfigurationError(`nDump must be a non-negative integer, got ${nDump}`);
  }
  if (!(Number.isInteger(minSamples) && minSamples >= 1)) {
    throw new ConfigurationError(`minSamples must be an integer >= 1, got ${minSamples}`);
  }
  if (!Number.isInteger(randomSeed)) {
    throw new ConfigurationError(`randomSeed must be an integer, got ${randomSeed}`);
  }
}

function stageReport(stage: string, fraction: number, outcome: PartitionOutcome): StageReport {
  return {
    stage,
    fraction,
    mode: outcome.mode,
    kept: outcome.kept.length,
    heldOut: outcome.heldOut.length,
    ...(outcome.reason !== undefined && { reason: outcome.reason })
  };
}

/**
 * Prunes the pool, then splits it into train / valid (/ test).
 * A three-way split runs two binary partitions: train vs. the combined
 * held-out share, then that remainder into valid and test at test / combined.
 * Nothing is returned unless every stage succeeded.
 */
export function splitDataset(pool: readonly Sample[], options: SplitOptions, rng: Rng = createRng(options.randomSeed)): DatasetSplit {
  validateSplitOptions(options);

  const prune = pruneSamples(pool, { nDump: options.nDump, minSamples: options.minSamples }, rng);
  const { validationFraction, testFraction } = options;

  if (testFraction === undefined) {
    const outcome = partitionSamples(prune.pool, validationFraction, rng);
    return {
      train: outcome.kept,
      valid: outcome.heldOut,
      test: null,
      stages: [stageReport('train/valid', validationFraction, outcome)],
      prune
    };
  }

  const combined = validationFraction + testFraction;
  const first = partitionSamples(prune.pool, combined, rng);
  const testShare = testFraction / combined;
  const second = partitionSamples(first.heldOut, testShare, rng);

  return {
    train: first.kept,
    valid: second.kept,
    test: second.heldOut,
    stages: [
      stageReport('train/rest', combined, first),
      stageReport('valid/test', testShare, second)
    ],
    prune
  };
}

export interface SplitPlan {
  scan: ScanResult;
  split: DatasetSplit;
}

/** Scans `srcDir` and splits it; options are checked before any file is read. */
export function planDatasetSplit(srcDir: string, options: SplitOptions): SplitPlan {
  validateSplitOptions(options);
  const scan = scanDataset(srcDir);
  return { scan, split: splitDataset(scan.samples, options) };
}
