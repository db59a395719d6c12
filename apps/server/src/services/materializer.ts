import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../errors';
import { EMPTY_LABEL, type DatasetSplit, type Sample, type SplitName, type SplitOptions } from '../types/dataset';
import { classHistogram, histogramToRecord } from '../utils/histogram';
import { IMAGES_DIR, LABELS_DIR } from './scanner';

export const SPLIT_NAMES: SplitName[] = ['train', 'valid', 'test'];

export interface MaterializeResult {
  outDir: string;
  filesCopied: number;
  metadataPath: string;
}

function prepareOutput(outDir: string, force: boolean): void {
  const existing = SPLIT_NAMES.map(name => path.join(outDir, name)).filter(dir => fs.existsSync(dir));
  if (existing.length > 0) {
    if (!force) {
      throw new ConfigurationError(
        `Output directory already contains ${existing.map(d => path.basename(d)).join(', ')}; pass force to overwrite`
      );
    }
    for (const dir of existing) {
      fs.rmSync(dir, { recursive: true, force: true });
      console.log(`[COPY] Removed existing ${dir}`);
    }
  }
  fs.mkdirSync(outDir, { recursive: true });
}

function copySamples(srcDir: string, outDir: string, name: SplitName, samples: readonly Sample[]): number {
  const imageDir = path.join(outDir, name, 'images');
  const labelDir = path.join(outDir, name, 'labels');
  fs.mkdirSync(imageDir, { recursive: true });
  fs.mkdirSync(labelDir, { recursive: true });

  let copied = 0;
  for (const sample of samples) {
    fs.copyFileSync(path.join(srcDir, LABELS_DIR, sample.labelFile), path.join(labelDir, sample.labelFile));
    copied++;
    if (sample.imageFile !== null) {
      fs.copyFileSync(path.join(srcDir, IMAGES_DIR, sample.imageFile), path.join(imageDir, sample.imageFile));
      copied++;
    }
  }
  console.log(`[COPY] ${name}: ${samples.length} samples, ${copied} files`);
  return copied;
}

const splitMetadata = (samples: readonly Sample[]) => ({
  samples: samples.length,
  classes: histogramToRecord(classHistogram(samples))
});

/**
 * Copies each split's images and labels into <out>/<split>/{images,labels}
 * and writes <out>/metadata.json describing the run.
 */
export function materializeSplit(
  srcDir: string,
  outDir: string,
  split: DatasetSplit,
  options: SplitOptions,
  { force = false }: { force?: boolean } = {}
): MaterializeResult {
  prepareOutput(outDir, force);

  let filesCopied = copySamples(srcDir, outDir, 'train', split.train);
  filesCopied += copySamples(srcDir, outDir, 'valid', split.valid);
  if (split.test) {
    filesCopied += copySamples(srcDir, outDir, 'test', split.test);
  }

  const classIds = [...split.prune.histogramAfter.keys()].filter(label => label !== EMPTY_LABEL);
  const metadata = {
    created_at: new Date().toISOString(),
    source: path.resolve(srcDir),
    random_seed: options.randomSeed,
    validation_fraction: options.validationFraction,
    test_fraction: options.testFraction ?? null,
    min_samples: options.minSamples,
    removed: {
      dumped_empty: split.prune.dumped.length,
      underrepresented_classes: split.prune.underrepresented,
      total: split.prune.removedCount
    },
    class_ids: classIds,
    stages: split.stages,
    splits: {
      train: splitMetadata(split.train),
      valid: splitMetadata(split.valid),
      ...(split.test && { test: splitMetadata(split.test) })
    }
  };

  const metadataPath = path.join(outDir, 'metadata.json');
  fs.writeFileSync(metadataPath, JSON.stringify(metadata, null, 2));
  return { outDir, filesCopied, metadataPath };
}
