/*
  Create a class-balanced train/valid(/test) split of a YOLO dataset

  Expects <src>/all_images and <src>/all_labels, paired by file stem.

  Usage:
    npm run split -- \
      --src datasets/site_survey \
      --out datasets/site_survey_split \
      --valid 0.2 \
      --test 0.1 \
      --dump 50 \
      --min-samples 10 \
      --rand 1
*/

import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { config } from '../src/config';
import { DatasetError } from '../src/errors';
import { materializeSplit } from '../src/services/materializer';
import { planDatasetSplit } from '../src/services/orchestrator';
import { formatSplitReport } from '../src/services/report';
import type { SplitOptions } from '../src/types/dataset';

const argv = yargs(hideBin(process.argv))
  .option('src', { type:'string', demandOption:true, desc:'Source dataset directory' })
  .option('out', { type:'string', desc:'Output directory for splits (default: same as source)' })
  .option('valid', { type:'number', default:config.defaults.validationFraction, desc:'Fraction to split for validation, 0-1' })
  .option('test', { type:'number', desc:'Fraction to split for testing, 0-1' })
  .option('dump', { type:'number', desc:'Number of empty-label images to drop' })
  .option('rand', { type:'number', default:config.defaults.randomSeed, desc:'Seed for random generation' })
  .option('min-samples', { type:'number', default:config.defaults.minSamples, desc:'Minimum number of samples per class' })
  .option('force', { type:'boolean', default:false, desc:'Overwrite existing train/valid/test directories' })
  .parseSync();

const SRC_DIR = path.resolve(argv.src);
const OUT_DIR = argv.out ? path.resolve(argv.out) : SRC_DIR;

const options: SplitOptions = {
  validationFraction: argv.valid,
  testFraction: argv.test,
  nDump: argv.dump,
  minSamples: argv['min-samples'],
  randomSeed: argv.rand
};

// -------- Main --------
console.log('\n📁 Starting dataset split...');
console.log(`🔍 Source: ${SRC_DIR}`);
console.log(`📂 Output: ${OUT_DIR}`);

try {
  const { split } = planDatasetSplit(SRC_DIR, options);

  console.log('');
  for (const line of formatSplitReport(split)) console.log(line);

  const degraded = split.stages.filter(stage => stage.mode === 'fallback');
  if (degraded.length > 0) {
    console.warn(`\n⚠️  ${degraded.length} stage(s) fell back to an unstratified random split`);
  }

  console.log('\n📋 Copying files to splits...');
  const result = materializeSplit(SRC_DIR, OUT_DIR, split, options, { force: argv.force });

  console.log('\n✨ Dataset split completed successfully!');
  console.log(`- Training set: ${split.train.length} images/labels`);
  console.log(`- Validation set: ${split.valid.length} images/labels`);
  if (split.test) console.log(`- Test set: ${split.test.length} images/labels`);
  console.log(`- Files copied: ${result.filesCopied}`);
  console.log(`\n📊 Metadata saved to: ${result.metadataPath}`);
} catch (err) {
  if (err instanceof DatasetError) {
    console.error(`❌ ${err.name}: ${err.message}`);
  } else {
    console.error('❌ Dataset split failed:', err);
  }
  process.exit(1);
}
