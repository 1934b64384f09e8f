import fs from 'node:fs/promises';
import path from 'node:path';
import { RunConfig, encodeSettingsOf } from './config';
import { createDockerEncodeRunner } from './encoder';
import { EncodeJobFailure, MultiplexMismatch, SegmentationFailure, StageError, errorMessage } from './errors';
import { logger } from './logger';
import { MANIFEST_FEED_FILE, ManifestFeed, buildManifestFeed, deliverManifestFeed, writeManifestFeed } from './manifestFeed';
import { multiplexDirectory } from './multiplexer';
import { buildEncodeJobs } from './plan';
import { QueueRunnerHandle, createQueueEncodeRunner } from './queue';
import { EncodeRunner, runEncodeJobs } from './scheduler';
import { segmentFile } from './segmenter';
import { discoverTiles } from './tiles';
import { EncodeJob, IdentityReport, RunSummary, StageFailure, Tile } from './types';

export const RUN_SUMMARY_FILE = 'run-summary.json';

export type PipelineDeps = {
  // Replaces the configured encode backend
  runner?: EncodeRunner;
  signal?: AbortSignal;
  deliver?: (feed: ManifestFeed) => Promise<unknown>;
};

export function createEncodeRunner(config: RunConfig): QueueRunnerHandle {
  const settings = encodeSettingsOf(config);
  if (config.backend === 'bullmq') {
    return createQueueEncodeRunner({ redisUrl: config.redisUrl, queueName: config.queueName, settings });
  }
  const runner = createDockerEncodeRunner({
    ...config.encoder,
    ...settings,
    logsDir: path.join(config.logsDir, 'encoding'),
  });
  return { runner, close: async () => {} };
}

function logConfigSummary(config: RunConfig, tiles: Tile[], jobs: number) {
  logger.info(
    {
      project: config.project,
      tiles: tiles.map((t) => t.id),
      frames: tiles.map((t) => t.frameCount),
      qualities: config.triplets.map((q) => `${q.occ}:${q.geo}:${q.attr}`),
      jobs,
      gofPlan: config.gofPlan,
      budget: config.budget,
      splitComponents: config.splitComponents,
      multiplex: config.multiplex,
      backend: config.backend,
      skipEncoding: config.skipEncoding,
      skipSegmentation: config.skipSegmentation,
    },
    'Pipeline configuration',
  );
}

async function pathExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

// Never rejects: a leftover that cannot be removed is logged and the run goes on
async function discardArtifacts(identity: string, paths: string[]): Promise<void> {
  for (const target of paths) {
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (err) {
      logger.error({ err, identity, target }, 'Could not discard artifact of failed identity');
    }
  }
}

export async function runPipeline(config: RunConfig, deps: PipelineDeps = {}): Promise<RunSummary> {
  const startedAt = new Date().toISOString();
  const signal = deps.signal ?? new AbortController().signal;

  // 1) Tiles and the job list; config errors surface here, before anything runs
  const tiles = await discoverTiles(config.tilesRoot, {
    startFrameNumber: config.startFrameNumber,
    frameCount: config.frameCount,
    vox: config.vox,
  });
  const jobs = buildEncodeJobs(config.project, tiles, config.triplets, config.encoderOutput);
  logConfigSummary(config, tiles, jobs.length);

  // 2) One report per identity, filled in stage by stage
  const reports = new Map<string, IdentityReport>();
  for (const job of jobs) {
    reports.set(job.identity, {
      identity: job.identity,
      tile: job.tile,
      triplet: job.triplet,
      containerPath: job.outputPath,
      segmentDir: path.join(config.segmentOutput, job.identity),
      muxDir: path.join(config.muxOutput, job.identity),
      encode: 'pending',
      segment: 'pending',
      multiplex: 'pending',
    });
  }
  const reportOf = (job: EncodeJob): IdentityReport => {
    const report = reports.get(job.identity);
    if (!report) throw new Error(`no report for ${job.identity}`);
    return report;
  };

  // Marks the failing stage and records the reason for the summary
  const failures: StageFailure[] = [];
  const fail = (report: IdentityReport, err: StageError) => {
    report[err.stage] = 'failed';
    failures.push({ identity: report.identity, stage: err.stage, reason: err.message });
    logger.warn({ identity: report.identity, stage: err.stage, reason: err.message }, 'Identity failed');
  };

  const segmentOne = async (report: IdentityReport, frameCount: number): Promise<void> => {
    if (config.skipSegmentation || signal.aborted) {
      report.segment = 'skipped';
      return;
    }
    try {
      report.segmentIndex = await segmentFile(report.containerPath, report.segmentDir, {
        gofPlan: config.gofPlan,
        splitComponents: config.splitComponents,
        frameCount,
        identity: report.identity,
      });
      report.segment = 'succeeded';
    } catch (err) {
      fail(
        report,
        err instanceof SegmentationFailure ? err : new SegmentationFailure(report.identity, errorMessage(err), { cause: err }),
      );
      await discardArtifacts(report.identity, [report.muxDir]);
    }
  };

  const segmentTasks: Promise<void>[] = [];
  let cancelled = false;

  // 3) Encode, or reuse the containers already on disk
  if (config.skipEncoding) {
    for (const job of jobs) {
      const report = reportOf(job);
      if (await pathExists(job.outputPath)) {
        report.encode = 'skipped';
        segmentTasks.push(segmentOne(report, job.tile.frameCount));
      } else {
        // A missing container is an encode failure of this identity
        fail(report, new EncodeJobFailure(job.identity, `container not found: ${job.outputPath}`));
      }
    }
    cancelled = signal.aborted;
  } else {
    // Segmentation of a job starts from onSettled, while other encodes still run
    const backend = deps.runner ? { runner: deps.runner, close: async () => {} } : createEncodeRunner(config);
    try {
      const encodeReport = await runEncodeJobs(jobs, {
        concurrency: config.budget.maxConcurrentEncodes,
        runner: backend.runner,
        signal,
        onSettled: (job) => {
          const report = reportOf(job);
          if (job.state === 'succeeded') {
            report.encode = 'succeeded';
            report.containerPath = job.outputPath;
            segmentTasks.push(segmentOne(report, job.tile.frameCount));
          } else {
            fail(report, new EncodeJobFailure(job.identity, job.reason ?? 'unknown encoder failure'));
            segmentTasks.push(discardArtifacts(job.identity, [job.outputPath, report.segmentDir, report.muxDir]));
          }
        },
      });
      cancelled = encodeReport.cancelled;
    } finally {
      await backend.close();
    }
  }
  await Promise.all(segmentTasks);

  // 4) Multiplex split trees back into combined ones
  if (config.multiplex) {
    await Promise.all(
      [...reports.values()].map(async (report) => {
        if (report.segment !== 'succeeded' || !report.segmentIndex) return;
        if (report.segmentIndex.layout !== 'split' || signal.aborted) {
          report.multiplex = 'skipped';
          return;
        }
        try {
          report.muxIndex = await multiplexDirectory(report.segmentDir, report.muxDir);
          report.multiplex = 'succeeded';
        } catch (err) {
          fail(
            report,
            err instanceof MultiplexMismatch ? err : new MultiplexMismatch(report.identity, errorMessage(err), { cause: err }),
          );
        }
      }),
    );
  }

  // Stages never reached count as skipped
  const identities = [...reports.values()];
  for (const report of identities) {
    if (report.encode === 'pending') report.encode = 'skipped';
    if (report.segment === 'pending') report.segment = 'skipped';
    if (report.multiplex === 'pending') report.multiplex = 'skipped';
  }

  const summary: RunSummary = {
    project: config.project,
    startedAt,
    finishedAt: new Date().toISOString(),
    gofPlan: config.gofPlan,
    budget: config.budget,
    frameRate: config.frameRate,
    identities,
    failures,
    degraded: failures.length > 0,
    cancelled: cancelled || signal.aborted,
  };

  // 5) Run summary and manifest feed beside the segment trees
  await fs.mkdir(config.segmentOutput, { recursive: true });
  await fs.writeFile(path.join(config.segmentOutput, RUN_SUMMARY_FILE), JSON.stringify(summary, null, 2));
  const feed = buildManifestFeed(summary, { feedDir: config.segmentOutput });
  await writeManifestFeed(path.join(config.segmentOutput, MANIFEST_FEED_FILE), feed);

  // 6) Feed delivery; a failure here is logged only
  const target = config.manifestFeed;
  const deliver = deps.deliver ?? (target ? (f: ManifestFeed) => deliverManifestFeed(f, target) : undefined);
  if (deliver) {
    try {
      await deliver(feed);
    } catch (err) {
      logger.error({ err }, 'Manifest feed was not delivered; run result unchanged');
    }
  }

  logger.info(
    {
      identities: identities.length,
      segmented: identities.filter((r) => r.segment === 'succeeded').length,
      multiplexed: identities.filter((r) => r.multiplex === 'succeeded').length,
      failures: failures.length,
      cancelled: summary.cancelled,
    },
    summary.degraded ? 'Pipeline finished with failures' : 'Pipeline finished',
  );
  return summary;
}
