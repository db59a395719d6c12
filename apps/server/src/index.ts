import { createApp } from './app';
import { config } from './config';

const app = createApp(config);

app.listen(config.port, () => {
  console.log(`========================================`);
  console.log(`Dataset split API listening on port ${config.port}`);
  console.log(`========================================`);
  console.log(`Dataset root: ${config.datasetRoot}`);
  console.log(`Health check: http://localhost:${config.port}/api/health`);
  console.log(`Plan endpoint: http://localhost:${config.port}/api/split/plan`);
});
