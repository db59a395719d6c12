import fs from 'fs';
import path from 'path';
import { DatasetNotFoundError } from '../errors';
import type { Sample } from '../types/dataset';
import { summarizeLabelFile } from './summarizer';

export const IMAGES_DIR = 'all_images';
export const LABELS_DIR = 'all_labels';
export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp', '.jfif'];
export const LABEL_EXTENSION = '.txt';

export interface DatasetListing {
  images: Map<string, string>; // stem -> file name
  labels: Map<string, string>;
}

export interface ScanResult {
  samples: Sample[];
  imagesWithoutLabels: string[];
  labelsWithoutImages: string[];
}

export interface PairReport {
  imagesWithoutLabels: string[];
  labelsWithoutImages: string[];
}

const stemOf = (file: string) => path.parse(file).name;

function requireDir(dir: string): void {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new DatasetNotFoundError(`Source directory ${dir} does not exist`);
  }
}

function listByStem(dir: string, accept: (file: string) => boolean): Map<string, string> {
  const byStem = new Map<string, string>();
  for (const file of fs.readdirSync(dir).sort()) {
    if (!accept(file)) continue;
    const stem = stemOf(file);
    const existing = byStem.get(stem);
    if (existing !== undefined) {
      console.warn(`[SCAN] Duplicate stem "${stem}": keeping ${existing}, ignoring ${file}`);
      continue;
    }
    byStem.set(stem, file);
  }
  return byStem;
}

export function listDataset(srcDir: string): DatasetListing {
  const imageDir = path.join(srcDir, IMAGES_DIR);
  const labelDir = path.join(srcDir, LABELS_DIR);
  requireDir(imageDir);
  requireDir(labelDir);

  return {
    images: listByStem(imageDir, f => IMAGE_EXTENSIONS.includes(path.extname(f).toLowerCase())),
    labels: listByStem(labelDir, f => path.extname(f) === LABEL_EXTENSION)
  };
}

/** Cross-references image and label stems. */
export function validatePairs(srcDir: string): PairReport {
  const { images, labels } = listDataset(srcDir);
  return {
    imagesWithoutLabels: [...images.keys()].filter(stem => !labels.has(stem)),
    labelsWithoutImages: [...labels.keys()].filter(stem => !images.has(stem))
  };
}

/** Deletes the files named in a pair report; returns the removed paths. */
export function removeUnmatched(srcDir: string, report: PairReport): string[] {
  const { images, labels } = listDataset(srcDir);
  const removed: string[] = [];

  for (const stem of report.imagesWithoutLabels) {
    const file = images.get(stem);
    if (file === undefined) continue;
    const target = path.join(srcDir, IMAGES_DIR, file);
    fs.rmSync(target);
    removed.push(target);
  }
  for (const stem of report.labelsWithoutImages) {
    const file = labels.get(stem);
    if (file === undefined) continue;
    const target = path.join(srcDir, LABELS_DIR, file);
    fs.rmSync(target);
    removed.push(target);
  }
  return removed;
}

/**
 * Builds the sample pool: one Sample per label file, in sorted file order,
 * each with its representative class already computed.
 * Images without a label are reported and left out.
 */
export function scanDataset(srcDir: string): ScanResult {
  const { images, labels } = listDataset(srcDir);
  console.log(`[SCAN] Found ${images.size} images and ${labels.size} labels in ${srcDir}`);

  const samples: Sample[] = [];
  const labelsWithoutImages: string[] = [];
  for (const [stem, labelFile] of labels) {
    const imageFile = images.get(stem) ?? null;
    if (imageFile === null) labelsWithoutImages.push(stem);
    samples.push({
      id: stem,
      imageFile,
      labelFile,
      label: summarizeLabelFile(path.join(srcDir, LABELS_DIR, labelFile))
    });
  }

  const imagesWithoutLabels = [...images.keys()].filter(stem => !labels.has(stem));
  if (imagesWithoutLabels.length > 0) {
    console.warn(`[SCAN] ${imagesWithoutLabels.length} images have no label and are ignored`);
  }
  if (labelsWithoutImages.length > 0) {
    console.warn(`[SCAN] ${labelsWithoutImages.length} labels have no image`);
  }

  return { samples, imagesWithoutLabels, labelsWithoutImages };
}
