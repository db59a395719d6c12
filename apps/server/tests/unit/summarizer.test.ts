import fs from 'fs';
import path from 'path';
import { ParseError } from '../../src/errors';
import { summarizeLabelFile, summarizeRecord } from '../../src/services/summarizer';
import { EMPTY_LABEL } from '../../src/types/dataset';
import { makeTempDir, removeTempDirs } from '../helpers/fixtures';

describe('summarizeRecord', () => {
  test('should return the empty sentinel for a record without objects', () => {
    expect(summarizeRecord('', 'a.txt')).toBe(EMPTY_LABEL);
    expect(summarizeRecord('\n   \n\t\n', 'a.txt')).toBe(EMPTY_LABEL);
  });

  test('should return the most frequent class index', () => {
    const text = ['3 0.1 0.1 0.2 0.2', '7 0.4 0.4 0.1 0.1', '7 0.6 0.6 0.1 0.1'].join('\n');
    expect(summarizeRecord(text, 'a.txt')).toBe(7);
  });

  test('should break ties in favour of the lowest class index', () => {
    const text = '5 0.1 0.1 0.1 0.1\n2 0.2 0.2 0.1 0.1\n5 0.3 0.3 0.1 0.1\n2 0.4 0.4 0.1 0.1\n';
    expect(summarizeRecord(text, 'a.txt')).toBe(2);
  });

  test('should read multi-digit class indices and CRLF line endings', () => {
    expect(summarizeRecord('12 0.5 0.5 0.1 0.1\r\n12 0.2 0.2 0.1 0.1\r\n1 0.3 0.3 0.1 0.1\r\n', 'a.txt')).toBe(12);
  });

  test('should throw ParseError with file and line for a non-numeric class', () => {
    const text = '0 0.5 0.5 0.1 0.1\n\ncar 0.5 0.5 0.1 0.1\n';
    try {
      summarizeRecord(text, 'frame_01.txt');
      throw new Error('expected ParseError');
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      if (!(err instanceof ParseError)) return;
      expect(err.file).toBe('frame_01.txt');
      expect(err.line).toBe(3);
      expect(err.statusCode).toBe(422);
      expect(err.message).toBe('frame_01.txt:3: class index "car" is not a non-negative integer');
    }
  });

  test('should reject class indices beyond the safe integer range', () => {
    expect(() => summarizeRecord('9007199254740993 0.5 0.5 0.1 0.1\n', 'big.txt')).toThrow(
      'big.txt:1: class index "9007199254740993" is too large'
    );
    expect(summarizeRecord('9007199254740991 0.5 0.5 0.1 0.1\n', 'max.txt')).toBe(9007199254740991);
  });

  test('should reject negative and fractional class indices', () => {
    expect(() => summarizeRecord('-1 0.5 0.5 0.1 0.1', 'a.txt')).toThrow(ParseError);
    expect(() => summarizeRecord('1.5 0.5 0.5 0.1 0.1', 'a.txt')).toThrow(ParseError);
  });
});

describe('summarizeLabelFile', () => {
  afterEach(() => {
    removeTempDirs();
  });

  test('should summarize a label file from disk', () => {
    const dir = makeTempDir();
    const file = path.join(dir, 'x.txt');
    fs.writeFileSync(file, '4 0.5 0.5 0.1 0.1\n');
    expect(summarizeLabelFile(file)).toBe(4);
  });

  test('should throw ParseError naming an unreadable file', () => {
    const missing = path.join(makeTempDir(), 'missing.txt');
    expect(() => summarizeLabelFile(missing)).toThrow(ParseError);
    expect(() => summarizeLabelFile(missing)).toThrow(missing);
  });
});
