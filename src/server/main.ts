/**
 * Server entry point: wire configuration, storage and the pipeline, then listen.
 */

import { loadEnv } from '../config/index.js';
import { BrightDataGateway } from '../gateway/index.js';
import { createLogger } from '../logging/index.js';
import { runResearch } from '../pipeline/index.js';
import { preflightCheck } from '../preflight/index.js';
import { RunStore } from '../run-store/index.js';
import { SettingsStore } from '../settings/index.js';
import { createStorageAdapter } from '../storage/index.js';
import { buildServer } from './index.js';

async function main(): Promise<void> {
  const env = loadEnv();
  const logger = createLogger('server', env.LOG_LEVEL);

  const storage =
    env.STORAGE_DRIVER === 's3' && env.S3_BUCKET
      ? createStorageAdapter({
          type: 's3',
          bucket: env.S3_BUCKET,
          region: env.AWS_REGION,
          prefix: env.S3_PREFIX,
          ...(env.S3_ENDPOINT ? { endpoint: env.S3_ENDPOINT, forcePathStyle: true } : {}),
        })
      : createStorageAdapter({ type: 'memory' });

  const gateway = new BrightDataGateway(
    {
      apiUrl: env.BRIGHTDATA_API_URL,
      serpZone: env.SERP_ZONE,
      snapshotMaxAttempts: env.SNAPSHOT_MAX_ATTEMPTS,
      snapshotPollDelayMs: env.SNAPSHOT_POLL_DELAY_MS,
    },
    createLogger('gateway', env.LOG_LEVEL)
  );

  const app = await buildServer({
    runResearch: (question, config, options) =>
      runResearch(question, config, {
        ...options,
        gateway,
        logger: createLogger('pipeline', env.LOG_LEVEL),
      }),
    preflight: (credentials) =>
      preflightCheck(credentials, {
        apiUrl: env.BRIGHTDATA_API_URL,
        logger: createLogger('preflight', env.LOG_LEVEL),
      }),
    runStore: new RunStore(storage, createLogger('run-store', env.LOG_LEVEL)),
    settingsStore: new SettingsStore(),
    env,
    logger: { level: env.LOG_LEVEL },
  });

  logger.info('Starting research API server', {
    host: env.HOST,
    port: env.PORT,
    storage: env.STORAGE_DRIVER,
  });
  await app.listen({ host: env.HOST, port: env.PORT });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
