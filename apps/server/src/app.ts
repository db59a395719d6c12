import express from 'express';
import cors from 'cors';
import { config, type Config } from './config';
import { errorHandler } from './middleware/errorHandler';
import { createSplitRouter } from './routes/split';

export function createApp(cfg: Config = config): express.Express {
  const app = express();

  app.use(cors({ origin: cfg.corsOrigins, credentials: true }));
  app.use(express.json({ limit: '1mb' }));

  app.use('/api', createSplitRouter(cfg));
  app.use(errorHandler);

  return app;
}
