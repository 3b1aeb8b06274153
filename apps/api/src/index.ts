import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { createApp } from './app.js';
import { getEnv, getPipelineConfig } from './env.js';
import { errorMessage } from './errors.js';
import { closeFirebase } from './firebase.js';
import { createLogger, setLogLevel } from './logger.js';
import { createPipeline } from './pipeline/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load repo-root .env first, then optionally let apps/api/.env override it.
// __dirname is .../apps/api/src, so repo-root is three levels up.
dotenv.config({ path: path.resolve(__dirname, '../../../.env') });
dotenv.config({ override: true });

const env = getEnv();
setLogLevel(env.LOG_LEVEL);
const logger = createLogger('server');

const config = getPipelineConfig(env);
const coordinator = createPipeline(config);
const app = createApp(coordinator, env);

const server = app.listen(env.PORT, () => {
  logger.info(`API listening on http://localhost:${env.PORT}`, { adapters: config.adapters });
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('shutting down', { signal });

  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await coordinator.close();
  await closeFirebase();
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      }
    );
  });
}
