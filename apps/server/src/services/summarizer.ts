import fs from 'fs';
import { ParseError } from '../errors';
import { EMPTY_LABEL } from '../types/dataset';

const CLASS_TOKEN = /^\d+$/;

/**
 * Reduces one YOLO label record to a single representative class:
 * the most frequent class index, or EMPTY_LABEL when the record has no objects.
 * Ties go to the lowest class index so the result does not depend on line order.
 */
export function summarizeRecord(text: string, file: string): number {
  const counts = new Map<number, number>();

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;

    const token = line.split(/\s+/)[0];
    if (!CLASS_TOKEN.test(token)) {
      throw new ParseError(file, `class index "${token}" is not a non-negative integer`, i + 1);
    }
    const cls = Number(token);
    if (!Number.isSafeInteger(cls)) {
      throw new ParseError(file, `class index "${token}" is too large`, i + 1);
    }
    counts.set(cls, (counts.get(cls) ?? 0) + 1);
  });

  if (counts.size === 0) return EMPTY_LABEL;

  let best = EMPTY_LABEL;
  let bestCount = 0;
  for (const [cls, count] of counts) {
    if (count > bestCount || (count === bestCount && cls < best)) {
      best = cls;
      bestCount = count;
    }
  }
  return best;
}

export function summarizeLabelFile(labelPath: string): number {
  let text: string;
  try {
    text = fs.readFileSync(labelPath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(labelPath, `unreadable label file (${reason})`);
  }
  return summarizeRecord(text, labelPath);
}
