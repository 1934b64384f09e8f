import path from 'node:path';
import process from 'node:process';
import { loadRunConfig } from './config';
import { createDockerEncodeRunner } from './encoder';
import { env } from './env';
import { logger } from './logger';
import { startEncodeWorker } from './queue';

// Queue worker for ENCODE_BACKEND=bullmq. Tile folders and ENCODER_OUTPUT must
// resolve to the same storage as on the pipeline host. GoF size, thread count
// and bit depth come with each job; only the docker setup is local.
async function main() {
  const config = loadRunConfig(env);
  logger.info(
    { queue: config.queueName, redis: config.redisUrl, concurrency: config.budget.maxConcurrentEncodes },
    'Starting encode worker',
  );

  const logsDir = path.join(config.logsDir, 'encoding');
  const handle = await startEncodeWorker({
    redisUrl: config.redisUrl,
    queueName: config.queueName,
    concurrency: config.budget.maxConcurrentEncodes,
    runnerFor: (settings) => createDockerEncodeRunner({ ...config.encoder, ...settings, logsDir }),
  });

  const shutdown = async (signal: string) => {
    try {
      logger.info({ signal, pid: process.pid }, 'Shutting down worker');
      await handle.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during worker shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal({ err }, 'Worker failed to start');
  process.exit(1);
});
