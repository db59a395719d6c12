import { EMPTY_LABEL, type ClassHistogram, type DatasetSplit } from '../types/dataset';

const classLabel = (label: number) => (label === EMPTY_LABEL ? 'empty' : `Class ${label}`);

const histogramLines = (histogram: ClassHistogram): string[] =>
  [...histogram.entries()].map(([label, count]) => `- ${classLabel(label)}: ${count} images`);

/** Human-readable summary of one pipeline run, one entry per line. */
export function formatSplitReport(split: DatasetSplit): string[] {
  const { prune } = split;
  const lines = ['Label distribution:', ...histogramLines(prune.histogramBefore)];

  if (prune.dumped.length > 0) {
    lines.push(`Dumped ${prune.dumped.length} empty-label samples`);
  }
  if (prune.underrepresented.length > 0) {
    lines.push('Removed classes below the minimum sample count:');
    for (const { label, count } of prune.underrepresented) {
      lines.push(`- ${classLabel(label)}: ${count} images`);
    }
  }
  if (prune.removedCount > 0) {
    lines.push(`Removed ${prune.removedCount} samples in total`);
    lines.push('Updated label distribution:', ...histogramLines(prune.histogramAfter));
  }

  for (const stage of split.stages) {
    const line = `Stage ${stage.stage} @ ${stage.fraction.toFixed(3)}: ${stage.mode}, ${stage.kept} kept / ${stage.heldOut} held out`;
    lines.push(stage.reason ? `${line} (DEGRADED: ${stage.reason})` : line);
  }

  const counts = [`${split.train.length} train`, `${split.valid.length} validation`];
  if (split.test) counts.push(`${split.test.length} test`);
  lines.push(`Split: ${counts.join(', ')}`);
  return lines;
}
