export const EMPTY_LABEL = -1; // representative label of a record with no objects

export type SplitName = 'train' | 'valid' | 'test';

export interface Sample {
  id: string; // shared file stem
  imageFile: string | null; // file name inside all_images
  labelFile: string; // file name inside all_labels
  label: number; // representative class index, or EMPTY_LABEL
}

export type ClassHistogram = Map<number, number>;

export interface SplitOptions {
  validationFraction: number; // 0..1
  testFraction?: number; // 0..1, absent for a two-way split
  nDump?: number; // empty-label samples to drop
  minSamples: number;
  randomSeed: number;
}

export type PartitionMode = 'stratified' | 'fallback';

export interface PartitionOutcome {
  mode: PartitionMode;
  kept: Sample[];
  heldOut: Sample[];
  reason?: string; // why stratification was abandoned
}

export interface StageReport {
  stage: string;
  fraction: number;
  mode: PartitionMode;
  kept: number;
  heldOut: number;
  reason?: string;
}

export interface PruneResult {
  pool: Sample[];
  histogramBefore: ClassHistogram;
  histogramAfter: ClassHistogram;
  dumped: string[]; // ids of dumped empty samples
  underrepresented: Array<{ label: number; count: number }>;
  removedCount: number;
}

export interface DatasetSplit {
  train: Sample[];
  valid: Sample[];
  test: Sample[] | null;
  stages: StageReport[];
  prune: PruneResult;
}
