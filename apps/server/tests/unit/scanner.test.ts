import fs from 'fs';
import path from 'path';
import { DatasetNotFoundError, ParseError } from '../../src/errors';
import { removeUnmatched, scanDataset, validatePairs } from '../../src/services/scanner';
import { EMPTY_LABEL } from '../../src/types/dataset';
import { makeTempDir, removeTempDirs, silenceConsole, writeDataset } from '../helpers/fixtures';

describe('Pool Scanner', () => {
  let root: string;

  beforeEach(() => {
    silenceConsole();
    root = writeDataset(makeTempDir(), [
      { stem: 'b', label: '', image: '.png' },
      { stem: 'a', label: '2 0.5 0.5 0.1 0.1\n2 0.1 0.1 0.1 0.1\n0 0.3 0.3 0.1 0.1\n', image: '.jpg' },
      { stem: 'c', image: '.jpg' },
      { stem: 'd', label: '1 0.5 0.5 0.1 0.1\n' }
    ]);
    fs.writeFileSync(path.join(root, 'all_images', 'notes.md'), 'not an image');
    fs.writeFileSync(path.join(root, 'all_labels', 'classes.json'), '{}');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeTempDirs();
  });

  describe('scanDataset', () => {
    test('should pair labels with images by stem in sorted order', () => {
      const scan = scanDataset(root);

      expect(scan.samples).toEqual([
        { id: 'a', imageFile: 'a.jpg', labelFile: 'a.txt', label: 2 },
        { id: 'b', imageFile: 'b.png', labelFile: 'b.txt', label: EMPTY_LABEL },
        { id: 'd', imageFile: null, labelFile: 'd.txt', label: 1 }
      ]);
      expect(scan.imagesWithoutLabels).toEqual(['c']);
      expect(scan.labelsWithoutImages).toEqual(['d']);
    });

    test('should throw DatasetNotFoundError when a source directory is missing', () => {
      fs.rmSync(path.join(root, 'all_labels'), { recursive: true });
      expect(() => scanDataset(root)).toThrow(DatasetNotFoundError);
    });

    test('should abort on a malformed label file', () => {
      fs.writeFileSync(path.join(root, 'all_labels', 'e.txt'), '0 0.1 0.1 0.1 0.1\nx 0.2 0.2 0.1 0.1\n');
      expect(() => scanDataset(root)).toThrow(`${path.join(root, 'all_labels', 'e.txt')}:2:`);
      expect(() => scanDataset(root)).toThrow(ParseError);
    });
  });

  describe('validatePairs', () => {
    test('should report unmatched stems on both sides', () => {
      expect(validatePairs(root)).toEqual({ imagesWithoutLabels: ['c'], labelsWithoutImages: ['d'] });
    });

    test('should delete unmatched files on request', () => {
      const removed = removeUnmatched(root, validatePairs(root));

      expect(removed).toEqual([path.join(root, 'all_images', 'c.jpg'), path.join(root, 'all_labels', 'd.txt')]);
      expect(validatePairs(root)).toEqual({ imagesWithoutLabels: [], labelsWithoutImages: [] });
      expect(fs.existsSync(path.join(root, 'all_images', 'a.jpg'))).toBe(true);
    });
  });
});
