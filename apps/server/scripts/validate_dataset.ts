/*
  Check that every image has a label and every label has an image

  Usage:
    npm run validate -- --dataset datasets/site_survey [--remove]
*/

import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { DatasetError } from '../src/errors';
import { removeUnmatched, validatePairs } from '../src/services/scanner';

const argv = yargs(hideBin(process.argv))
  .option('dataset', { type:'string', demandOption:true, desc:'Dataset directory containing all_images and all_labels' })
  .option('remove', { type:'boolean', default:false, desc:'Delete unmatched images and labels' })
  .parseSync();

const DATASET_DIR = path.resolve(argv.dataset);

console.log('\nValidating dataset:', DATASET_DIR);

try {
  const report = validatePairs(DATASET_DIR);

  if (report.imagesWithoutLabels.length === 0 && report.labelsWithoutImages.length === 0) {
    console.log('\n✅ All images have corresponding labels and vice versa.');
    process.exit(0);
  }

  if (report.imagesWithoutLabels.length > 0) {
    console.log(`\nFound ${report.imagesWithoutLabels.length} images without labels:`);
    for (const stem of report.imagesWithoutLabels) console.log(`  - ${stem}`);
  }
  if (report.labelsWithoutImages.length > 0) {
    console.log(`\nFound ${report.labelsWithoutImages.length} labels without images:`);
    for (const stem of report.labelsWithoutImages) console.log(`  - ${stem}`);
  }

  if (argv.remove) {
    const removed = removeUnmatched(DATASET_DIR, report);
    for (const file of removed) console.log(`Removed: ${file}`);
    console.log(`\n🗑️  Removed ${removed.length} unmatched files`);
  } else {
    console.log('\nRe-run with --remove to delete the unmatched files.');
  }
} catch (err) {
  if (err instanceof DatasetError) {
    console.error(`❌ ${err.name}: ${err.message}`);
  } else {
    console.error('❌ Validation failed:', err);
  }
  process.exit(1);
}
