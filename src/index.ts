#!/usr/bin/env node
import process from 'node:process';
import { loadRunConfig } from './config';
import { env } from './env';
import { ConfigInvariantViolation } from './errors';
import { logger } from './logger';
import { runPipeline } from './pipeline';

// 0 clean, 2 degraded, 1 fatal
async function main(): Promise<number> {
  const config = loadRunConfig(env);
  const controller = new AbortController();

  const stop = (signal: string) => {
    if (controller.signal.aborted) return;
    logger.warn({ signal, pid: process.pid }, 'Stop requested; cancelling running encodes');
    controller.abort();
  };
  process.on('SIGTERM', () => stop('SIGTERM'));
  process.on('SIGINT', () => stop('SIGINT'));

  logger.info({ project: config.project, pid: process.pid }, 'Starting V3C pipeline');
  const summary = await runPipeline(config, { signal: controller.signal });
  return summary.degraded || summary.cancelled ? 2 : 0;
}

main().then(
  (code) => process.exit(code),
  (err) => {
    if (err instanceof ConfigInvariantViolation) logger.fatal({ reason: err.message }, 'Invalid configuration');
    else logger.fatal({ err }, 'Pipeline aborted');
    process.exit(1);
  },
);
