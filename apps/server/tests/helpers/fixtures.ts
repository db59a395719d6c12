import fs from 'fs';
import os from 'os';
import path from 'path';
import { EMPTY_LABEL, type Sample } from '../../src/types/dataset';

const pad = (n: number) => String(n).padStart(3, '0');

/** Builds a pool with `count` samples per label, in label-then-index order. */
export function makePool(counts: Array<[label: number, count: number]>): Sample[] {
  const pool: Sample[] = [];
  for (const [label, count] of counts) {
    const prefix = label === EMPTY_LABEL ? 'empty' : `c${label}`;
    for (let i = 0; i < count; i++) {
      const id = `${prefix}_${pad(i)}`;
      pool.push({ id, imageFile: `${id}.jpg`, labelFile: `${id}.txt`, label });
    }
  }
  return pool;
}

export const ids = (samples: readonly Sample[]) => samples.map(s => s.id);

export const countByLabel = (samples: readonly Sample[], label: number) =>
  samples.filter(s => s.label === label).length;

const tempDirs: string[] = [];

export function makeTempDir(prefix = 'splitter-test-'): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/** Removes every directory made by makeTempDir so far. */
export function removeTempDirs(): void {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export interface FixtureFile {
  stem: string;
  label?: string; // label file content, omitted for an image without label
  image?: string; // image extension, omitted for a label without image
}

/** Writes an all_images / all_labels dataset under `root`. */
export function writeDataset(root: string, files: FixtureFile[]): string {
  const imageDir = path.join(root, 'all_images');
  const labelDir = path.join(root, 'all_labels');
  fs.mkdirSync(imageDir, { recursive: true });
  fs.mkdirSync(labelDir, { recursive: true });

  for (const file of files) {
    if (file.label !== undefined) {
      fs.writeFileSync(path.join(labelDir, `${file.stem}.txt`), file.label);
    }
    if (file.image !== undefined) {
      fs.writeFileSync(path.join(imageDir, `${file.stem}${file.image}`), `image:${file.stem}`);
    }
  }
  return root;
}

/** `count` image/label pairs whose labels hold one box of class `cls` each. */
export function classFiles(cls: number, count: number): FixtureFile[] {
  return Array.from({ length: count }, (_, i) => ({
    stem: `img_c${cls}_${pad(i)}`,
    label: `${cls} 0.5 0.5 0.2 0.2\n`,
    image: '.jpg'
  }));
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => { });
  jest.spyOn(console, 'warn').mockImplementation(() => { });
  jest.spyOn(console, 'error').mockImplementation(() => { });
}
