import pino from 'pino';
import { env } from './env';

export type { Logger } from 'pino';

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { pid: process.pid, project: env.PROJECT_NAME },
  timestamp: pino.stdTimeFunctions.isoTime,
});
