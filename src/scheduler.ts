import { errorMessage } from './errors';
import { logger } from './logger';
import { EncodeJob, EncodeOutcome } from './types';

// One external encode. Must resolve (never reject) and honour the signal.
export type EncodeRunner = (job: EncodeJob, signal: AbortSignal) => Promise<EncodeOutcome>;

export type ScheduleOptions = {
  concurrency: number;
  runner: EncodeRunner;
  signal?: AbortSignal;
  // Fires once per job, after it reached a terminal state
  onSettled?: (job: EncodeJob) => void;
};

export type EncodeRunReport = {
  jobs: EncodeJob[];
  succeeded: EncodeJob[];
  failed: EncodeJob[];
  degraded: boolean;
  cancelled: boolean;
  peakConcurrency: number;
};

// Shared by every slot. take() is synchronous, so two slots never claim the same job.
class JobQueue {
  private next = 0;

  constructor(private readonly jobs: readonly EncodeJob[]) {}

  take(): EncodeJob | undefined {
    const current = this.next++;
    return current < this.jobs.length ? this.jobs[current] : undefined;
  }
}

export async function runEncodeJobs(jobs: EncodeJob[], options: ScheduleOptions): Promise<EncodeRunReport> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const queue = new JobQueue(jobs);
  const controller = new AbortController();
  const stop = () => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) stop();
  else options.signal?.addEventListener('abort', stop, { once: true });

  const total = jobs.length;
  let running = 0;
  let peakConcurrency = 0;
  let completed = 0;

  const settle = (job: EncodeJob, outcome: EncodeOutcome) => {
    job.finishedAt = Date.now();
    if (outcome.status === 'succeeded') {
      job.state = 'succeeded';
      job.outputPath = outcome.path;
    } else {
      job.state = 'failed';
      job.reason = outcome.reason;
    }
    completed += 1;
    const pct = total ? ((completed / total) * 100).toFixed(1) : '100.0';
    const fields = { identity: job.identity, state: job.state, reason: job.reason, progress: `${completed}/${total} (${pct}%)` };
    if (job.state === 'succeeded') logger.info(fields, 'Encode job finished');
    else logger.warn(fields, 'Encode job failed');

    try {
      options.onSettled?.(job);
    } catch (err) {
      logger.error({ err, identity: job.identity }, 'onSettled hook threw');
    }
  };

  const slot = async () => {
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const job = queue.take();
      if (!job) break;
      if (controller.signal.aborted) {
        settle(job, { status: 'failed', reason: 'cancelled before start' });
        continue;
      }

      job.state = 'running';
      job.startedAt = Date.now();
      running += 1;
      peakConcurrency = Math.max(peakConcurrency, running);
      logger.info(
        { identity: job.identity, tile: job.tile.name, triplet: job.triplet, running },
        'Encode job started',
      );

      let outcome: EncodeOutcome;
      try {
        outcome = await options.runner(job, controller.signal);
      } catch (err) {
        outcome = { status: 'failed', reason: errorMessage(err) };
      } finally {
        running -= 1;
      }
      settle(job, outcome);
    }
  };

  const slots: Promise<void>[] = [];
  const slotCount = Math.min(concurrency, jobs.length);
  for (let i = 0; i < slotCount; i++) slots.push(slot());
  try {
    await Promise.all(slots);
  } finally {
    options.signal?.removeEventListener('abort', stop);
  }

  const succeeded = jobs.filter((j) => j.state === 'succeeded');
  const failed = jobs.filter((j) => j.state === 'failed');
  return {
    jobs,
    succeeded,
    failed,
    degraded: failed.length > 0,
    cancelled: controller.signal.aborted,
    peakConcurrency,
  };
}
