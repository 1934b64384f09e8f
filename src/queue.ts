import { Job, Queue, QueueEvents, Worker } from 'bullmq';
import IORedis from 'ioredis';
import { z } from 'zod';
import { EncodeSettings } from './encoder';
import { errorMessage } from './errors';
import { logger } from './logger';
import { EncodeRunner } from './scheduler';
import { EncodeJob, EncodeOutcome, QualityTriplet, Tile } from './types';

// What travels through Redis: the job without its run-local state, plus the
// run's encoder settings so every worker encodes with the same GoF and threads
export type EncodeJobData = {
  identity: string;
  tile: Tile;
  triplet: QualityTriplet;
  outputPath: string;
  threadsPerInstance: number;
  encoderGof: number;
};

export type QueueOptions = {
  redisUrl: string;
  queueName: string;
};

export function createConnection(redisUrl: string): IORedis {
  return new IORedis(redisUrl, { maxRetriesPerRequest: null });
}

// Pub/sub channel carrying the ids of jobs the producer has stopped
export function cancelChannel(queueName: string): string {
  return `${queueName}:cancel`;
}

export function toJobData(job: EncodeJob, settings: EncodeSettings): EncodeJobData {
  return {
    identity: job.identity,
    tile: job.tile,
    triplet: job.triplet,
    outputPath: job.outputPath,
    threadsPerInstance: settings.threadsPerInstance,
    encoderGof: settings.encoderGof,
  };
}

export function fromJobData(data: EncodeJobData): EncodeJob {
  return { identity: data.identity, tile: data.tile, triplet: data.triplet, outputPath: data.outputPath, state: 'pending' };
}

const payloadSettingsSchema = z.object({
  threadsPerInstance: z.number().int().positive(),
  encoderGof: z.number().int().positive(),
  tile: z.object({ vox: z.number().int().positive() }),
});

// Payloads from older producers lack the settings; such jobs are refused, not encoded with local defaults
export function settingsOf(data: unknown): EncodeSettings | undefined {
  const parsed = payloadSettingsSchema.safeParse(data);
  if (!parsed.success) return undefined;
  return { threadsPerInstance: parsed.data.threadsPerInstance, encoderGof: parsed.data.encoderGof };
}

const outcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('succeeded'), path: z.string() }),
  z.object({ status: z.literal('failed'), reason: z.string() }),
]);

// Return values come back from Redis as plain JSON
export function parseOutcome(value: unknown): EncodeOutcome {
  const parsed = outcomeSchema.safeParse(value);
  return parsed.success ? parsed.data : { status: 'failed', reason: 'worker returned a malformed result' };
}

const EARLY_CANCEL_LIMIT = 1024;

/**
 * Abort controllers for the jobs a worker holds, keyed by job id.
 * Every controller also fires when the worker shuts down.
 */
export class JobCancellations {
  private readonly held = new Map<string, { controller: AbortController; detach(): void }>();
  // Cancels that arrived before the job reached this worker's processor
  private readonly early = new Set<string>();

  constructor(private readonly shutdown: AbortSignal) {}

  open(jobId: string): AbortSignal {
    const controller = new AbortController();
    const onShutdown = () => controller.abort();
    if (this.shutdown.aborted || this.early.delete(jobId)) controller.abort();
    else this.shutdown.addEventListener('abort', onShutdown, { once: true });

    this.held.set(jobId, {
      controller,
      detach: () => this.shutdown.removeEventListener('abort', onShutdown),
    });
    return controller.signal;
  }

  // Returns whether this worker holds the job
  cancel(jobId: string): boolean {
    const entry = this.held.get(jobId);
    if (entry) {
      entry.controller.abort();
      return true;
    }
    this.early.add(jobId);
    if (this.early.size > EARLY_CANCEL_LIMIT) {
      const [oldest] = this.early;
      this.early.delete(oldest);
    }
    return false;
  }

  release(jobId: string): void {
    this.held.get(jobId)?.detach();
    this.held.delete(jobId);
  }
}

export type RunnerFactory = (settings: EncodeSettings) => EncodeRunner;

/**
 * Processor for the encode queue.
 * @param runnerFor builds the runner from the settings carried by each job
 * @param cancellations per-job abort signals, fed by the cancel channel
 */
export function createEncodeProcessor(runnerFor: RunnerFactory, cancellations: JobCancellations) {
  return async (job: Pick<Job<EncodeJobData>, 'id' | 'data'>): Promise<EncodeOutcome> => {
    const jobId = job.id ?? job.data.identity;
    logger.info({ jobId, identity: job.data.identity }, 'Worker received job');

    const settings = settingsOf(job.data);
    if (!settings) {
      logger.error({ jobId }, 'Job payload carries no encoder settings');
      return { status: 'failed', reason: 'job payload carries no encoder settings' };
    }

    const signal = cancellations.open(jobId);
    try {
      return await runnerFor(settings)(fromJobData(job.data), signal);
    } catch (err) {
      return { status: 'failed', reason: errorMessage(err) };
    } finally {
      cancellations.release(jobId);
    }
  };
}

export type EncodeWorkerHandle = {
  worker: Worker<EncodeJobData, EncodeOutcome>;
  close(): Promise<void>;
};

export async function startEncodeWorker(
  options: QueueOptions & { runnerFor: RunnerFactory; concurrency: number },
): Promise<EncodeWorkerHandle> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  logger.info({ concurrency, queue: options.queueName, pid: process.pid }, 'Initializing BullMQ worker');

  const connection = createConnection(options.redisUrl);
  const subscriber = createConnection(options.redisUrl);
  const controller = new AbortController();
  const cancellations = new JobCancellations(controller.signal);

  // Subscribe before taking jobs so no cancel for a held job is missed
  const channel = cancelChannel(options.queueName);
  subscriber.on('message', (from: string, jobId: string) => {
    if (from !== channel) return;
    const held = cancellations.cancel(jobId);
    logger.info({ jobId, held }, 'Cancel requested for job');
  });
  await subscriber.subscribe(channel);

  const worker = new Worker<EncodeJobData, EncodeOutcome>(
    options.queueName,
    createEncodeProcessor(options.runnerFor, cancellations),
    { connection, concurrency },
  );

  worker.on('completed', (job, result) => {
    logger.info({ jobId: job.id, result }, 'Job completed');
  });
  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Job failed');
  });
  worker.on('error', (err) => {
    logger.error({ err }, 'Worker error');
  });

  return {
    worker,
    async close() {
      // Active encodes are terminated rather than awaited to completion
      controller.abort();
      await worker.close();
      await subscriber.quit();
      await connection.quit();
    },
  };
}

export type QueueRunnerHandle = {
  runner: EncodeRunner;
  close(): Promise<void>;
};

function whenAborted(signal: AbortSignal): { promise: Promise<EncodeOutcome>; dispose(): void } {
  let onAbort = () => {};
  const promise = new Promise<EncodeOutcome>((resolve) => {
    onAbort = () => resolve({ status: 'failed', reason: 'cancelled' });
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

// Producer side: each call enqueues one job and resolves with the worker's outcome
export function createQueueEncodeRunner(options: QueueOptions & { settings: EncodeSettings }): QueueRunnerHandle {
  const connection = createConnection(options.redisUrl);
  const eventsConnection = createConnection(options.redisUrl);
  const queue = new Queue<EncodeJobData, EncodeOutcome>(options.queueName, { connection });
  const queueEvents = new QueueEvents(options.queueName, { connection: eventsConnection });
  const channel = cancelChannel(options.queueName);
  const runId = Date.now();

  queueEvents.on('waiting', ({ jobId }) => logger.debug({ jobId }, 'Job waiting'));
  queueEvents.on('active', ({ jobId }) => logger.debug({ jobId }, 'Job active'));
  queueEvents.on('failed', ({ jobId, failedReason }) => logger.error({ jobId, failedReason }, 'Job failed event'));

  const runner: EncodeRunner = async (job, signal) => {
    if (signal.aborted) return { status: 'failed', reason: 'cancelled' };
    const jobLog = logger.child({ identity: job.identity });
    const jobId = `${job.identity}-${runId}`;

    let queued: Job<EncodeJobData, EncodeOutcome>;
    try {
      queued = await queue.add(job.identity, toJobData(job, options.settings), {
        jobId,
        attempts: 1,
        removeOnComplete: { age: 24 * 3600 },
        removeOnFail: { age: 24 * 3600 },
      });
    } catch (err) {
      return { status: 'failed', reason: `could not enqueue encode job: ${errorMessage(err)}` };
    }
    jobLog.debug({ jobId }, 'Encode job enqueued');

    const aborted = whenAborted(signal);
    const finished = queued.waitUntilFinished(queueEvents).then(parseOutcome, (err: unknown): EncodeOutcome => ({
      status: 'failed',
      reason: errorMessage(err),
    }));
    try {
      const outcome = await Promise.race([finished, aborted.promise]);
      if (signal.aborted) {
        // A waiting job is withdrawn; an active one is stopped by its worker
        await queued.remove().catch((err: unknown) =>
          jobLog.debug({ err, jobId }, 'Job already taken by a worker'),
        );
        await connection.publish(channel, jobId).catch((err: unknown) =>
          jobLog.warn({ err, jobId }, 'Could not publish job cancel'),
        );
      }
      return outcome;
    } finally {
      aborted.dispose();
    }
  };

  return {
    runner,
    async close() {
      await queueEvents.close();
      await queue.close();
      await Promise.all([connection.quit(), eventsConnection.quit()]);
    },
  };
}
