import path from 'path';
import { Router } from 'express';
import { z } from 'zod';
import type { Config } from '../config';
import { ConfigurationError } from '../errors';
import { planDatasetSplit } from '../services/orchestrator';
import { formatSplitReport } from '../services/report';
import type { Sample, SplitOptions } from '../types/dataset';
import { histogramToRecord } from '../utils/histogram';

export const splitRequestSchema = z.object({
  datasetDir: z.string().min(1),
  validationFraction: z.number().gt(0).lt(1).optional(),
  testFraction: z.number().gt(0).lt(1).optional(),
  nDump: z.number().int().nonnegative().optional(),
  minSamples: z.number().int().positive().optional(),
  randomSeed: z.number().int().optional()
});

export type SplitRequest = z.infer<typeof splitRequestSchema>;

const ids = (samples: readonly Sample[]) => samples.map(s => s.id);

function resolveDataset(root: string, datasetDir: string): string {
  const resolved = path.resolve(root, datasetDir);
  const relative = path.relative(root, resolved);
  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ConfigurationError(`datasetDir must stay inside the dataset root`);
  }
  return resolved;
}

export function createSplitRouter(cfg: Pick<Config, 'datasetRoot' | 'defaults'>): Router {
  const router = Router();

  // POST /api/split/plan
  // Body: JSON SplitRequest
  // Returns the train/valid/test stems and the run report; no files are written.
  router.post('/split/plan', (req, res) => {
    const parsed = splitRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
      throw new ConfigurationError(`Invalid split request: ${detail}`);
    }

    const body = parsed.data;
    const srcDir = resolveDataset(cfg.datasetRoot, body.datasetDir);
    const options: SplitOptions = {
      validationFraction: body.validationFraction ?? cfg.defaults.validationFraction,
      testFraction: body.testFraction,
      nDump: body.nDump,
      minSamples: body.minSamples ?? cfg.defaults.minSamples,
      randomSeed: body.randomSeed ?? cfg.defaults.randomSeed
    };

    console.log(`[API] Planning split for ${srcDir}`);
    const { scan, split } = planDatasetSplit(srcDir, options);

    res.json({
      train: ids(split.train),
      valid: ids(split.valid),
      test: split.test ? ids(split.test) : null,
      stages: split.stages,
      histogramBefore: histogramToRecord(split.prune.histogramBefore),
      histogramAfter: histogramToRecord(split.prune.histogramAfter),
      removed: {
        dumped: split.prune.dumped,
        underrepresented: split.prune.underrepresented,
        total: split.prune.removedCount
      },
      unmatched: {
        imagesWithoutLabels: scan.imagesWithoutLabels,
        labelsWithoutImages: scan.labelsWithoutImages
      },
      report: formatSplitReport(split)
    });
  });

  // GET /api/health
  router.get('/health', (_, res) => res.json({ ok: true }));

  return router;
}
