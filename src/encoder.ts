import { spawn } from 'node:child_process';
import fsSync from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from './errors';
import { logger } from './logger';
import { EncodeRunner } from './scheduler';
import { EncodeJob, EncodeOutcome } from './types';
import { parseSampleStream } from './v3c';

export type EncoderParams = Record<string, string | number | Array<string | number>>;

// PccAppEncoder defaults (CTC all-intra, rate point r1). Paths are container-side.
export const DEFAULT_ENCODER_PARAMS: EncoderParams = {
  configurationFolder: '/workspace/TMC2/cfg/',
  config: [
    '/workspace/TMC2/cfg/common/ctc-common.cfg',
    '/workspace/TMC2/cfg/condition/ctc-all-intra.cfg',
    '/workspace/TMC2/cfg/rate/ctc-r1.cfg',
  ],
  resolution: 2047,
  keepIntermediateFiles: 0,
  mapCountMinus1: 0,
  videoEncoderInternalBitdepth: 8,
  computeMetrics: 0,
  computeChecksum: 0,
  reconstructedDataPath: '""',
  geometryNominal2dBitdepth: 8,
  voxelDimensionRefineSegmentation: 2,
  minNormSumOfInvDist4MPSelection: 0.36,
  partialAdditionalProjectionPlane: 0.15,
  minPointCountPerCCPatchSegmentation: 16,
  maxNNCountRefineSegmentation: 32,
  nnNormalEstimation: 6,
  iterationCountRefineSegmentation: 3,
  lambdaRefineSegmentation: 3.5,
  minimumImageWidth: 1024,
  minimumImageHeight: 1024,
};

const CONTAINER_INPUT = '/data/input';
const CONTAINER_OUTPUT = '/data/output';
const CONTAINER_REPO = '/workspace/TMC2';

// Run-wide encoder settings; in queue mode they travel with every job
export type EncodeSettings = {
  threadsPerInstance: number; // nbThread
  encoderGof: number; // groupOfFramesSize
};

export function partialPathOf(outputPath: string): string {
  return `${outputPath}.partial`;
}

export function buildEncoderParams(job: EncodeJob, settings: EncodeSettings, compressedStreamPath: string): EncoderParams {
  return {
    ...DEFAULT_ENCODER_PARAMS,
    geometry3dCoordinatesBitdepth: job.tile.vox,
    uncompressedDataFolder: `${CONTAINER_INPUT}/`,
    uncompressedDataPath: job.tile.framePattern,
    startFrameNumber: job.tile.frameRange[0],
    frameCount: job.tile.frameCount,
    groupOfFramesSize: settings.encoderGof,
    nbThread: settings.threadsPerInstance,
    occupancyMapQP: job.triplet.occ,
    geometryQP: job.triplet.geo,
    attributeQP: job.triplet.attr,
    compressedStreamPath,
  };
}

export function encoderArgs(params: EncoderParams): string[] {
  const args: string[] = [];
  for (const [key, value] of Object.entries(params)) {
    const values = Array.isArray(value) ? value : [value];
    for (const v of values) args.push(`--${key}=${v}`);
  }
  return args;
}

export function containerNameFor(job: EncodeJob): string {
  const safe = job.identity.replace(/[^a-zA-Z0-9_.-]/g, '_');
  return `v3c_enc_${process.pid}_${Date.now()}_${safe}`;
}

export type DockerEncoderOptions = EncodeSettings & {
  command: string; // docker binary
  image: string;
  repoDir: string; // host checkout holding bin/PccAppEncoder
};

export function dockerRunArgs(job: EncodeJob, options: DockerEncoderOptions, containerName: string): string[] {
  const partial = partialPathOf(job.outputPath);
  const params = buildEncoderParams(job, options, `${CONTAINER_OUTPUT}/${path.basename(partial)}`);
  return [
    'run',
    '--rm',
    '--name',
    containerName,
    '-v',
    `${path.resolve(options.repoDir)}:${CONTAINER_REPO}`,
    '-v',
    `${path.resolve(job.tile.dir)}:${CONTAINER_INPUT}:ro`,
    '-v',
    `${path.resolve(path.dirname(job.outputPath))}:${CONTAINER_OUTPUT}`,
    options.image,
    `${CONTAINER_REPO}/bin/PccAppEncoder`,
    ...encoderArgs(params),
  ];
}

export type ProcessRunnerOptions = {
  command: string;
  buildArgs: (job: EncodeJob, partialPath: string) => string[];
  // Extra teardown on cancel, e.g. killing the container behind the docker client
  onAbort?: (job: EncodeJob) => void;
  logsDir?: string;
  killGraceMs?: number;
};

type ProcessExit = {
  code: number | null;
  cancelled: boolean;
  error?: Error;
  tail: string[];
};

const TAIL_LINES = 20;

function runProcess(
  command: string,
  args: string[],
  signal: AbortSignal,
  logFile: string | undefined,
  killGraceMs: number,
  onAbort: () => void,
): Promise<ProcessExit> {
  return new Promise((resolve) => {
    // Output goes to the job's log file; the last lines are kept for the failure reason
    const tail: string[] = [];
    const log = logFile ? fsSync.createWriteStream(logFile, { flags: 'a' }) : undefined;
    log?.on('error', (err) => logger.warn({ err, logFile }, 'Encoder log file write failed'));
    log?.write(`$ ${command} ${args.join(' ')}\n`);

    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let cancelled = false;
    let spawnError: Error | undefined;

    const collect = (chunk: Buffer) => {
      log?.write(chunk);
      for (const line of chunk.toString('utf-8').split('\n')) {
        if (!line.trim()) continue;
        tail.push(line);
        if (tail.length > TAIL_LINES) tail.shift();
      }
    };
    child.stdout.on('data', collect);
    child.stderr.on('data', collect);

    // Stop: container teardown first, then SIGTERM, then SIGKILL after the grace period
    const abort = () => {
      cancelled = true;
      logger.warn({ pid: child.pid, command }, 'Stop requested; terminating encoder process');
      onAbort();
      child.kill('SIGTERM');
      setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          logger.warn({ pid: child.pid }, 'Encoder process did not exit; killing');
          child.kill('SIGKILL');
        }
      }, killGraceMs).unref();
    };
    if (signal.aborted) abort();
    else signal.addEventListener('abort', abort, { once: true });

    // Resolve once, after the log file is flushed
    let finished = false;
    const finish = (code: number | null) => {
      if (finished) return;
      finished = true;
      signal.removeEventListener('abort', abort);
      const exit = { code, cancelled, error: spawnError, tail };
      if (log) log.end(() => resolve(exit));
      else resolve(exit);
    };
    child.on('error', (err) => {
      spawnError = err;
      // No pid: the process never started and 'close' may not follow
      if (child.pid === undefined) finish(null);
    });
    child.on('close', (code) => finish(code));
  });
}

// Accepts the container only when it is non-empty and parses as a V3C sample stream
async function verifyContainer(file: string): Promise<string | undefined> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(file);
  } catch (err) {
    return `encoder produced no container: ${errorMessage(err)}`;
  }
  if (bytes.length === 0) return 'encoder produced an empty container';
  try {
    if (parseSampleStream(bytes).units.length === 0) return 'encoder produced a container with no V3C units';
  } catch (err) {
    return `encoder produced an unparsable container: ${errorMessage(err)}`;
  }
  return undefined;
}

export function createProcessEncodeRunner(options: ProcessRunnerOptions): EncodeRunner {
  const killGraceMs = options.killGraceMs ?? 5000;

  return async (job: EncodeJob, signal: AbortSignal): Promise<EncodeOutcome> => {
    const jobLog = logger.child({ identity: job.identity });
    const partial = partialPathOf(job.outputPath);
    if (signal.aborted) return { status: 'failed', reason: 'cancelled' };

    try {
      await fs.mkdir(path.dirname(job.outputPath), { recursive: true });
      // A re-run replaces whatever a previous run left behind
      await fs.rm(job.outputPath, { force: true });
      await fs.rm(partial, { force: true });

      let logFile: string | undefined;
      if (options.logsDir) {
        await fs.mkdir(options.logsDir, { recursive: true });
        logFile = path.join(options.logsDir, `${job.identity}.log`);
      }

      const args = options.buildArgs(job, partial);
      jobLog.debug({ command: options.command, args }, 'Launching encoder');
      const exit = await runProcess(options.command, args, signal, logFile, killGraceMs, () =>
        options.onAbort?.(job),
      );

      let reason: string | undefined;
      if (exit.cancelled) reason = 'cancelled';
      else if (exit.error) reason = `encoder could not be started: ${exit.error.message}`;
      else if (exit.code !== 0) reason = `encoder exited with code ${exit.code}${exit.tail.length ? `: ${exit.tail.slice(-3).join(' | ')}` : ''}`;
      else reason = await verifyContainer(partial);

      if (reason) {
        await fs.rm(partial, { force: true });
        return { status: 'failed', reason };
      }

      await fs.rename(partial, job.outputPath);
      return { status: 'succeeded', path: job.outputPath };
    } catch (err) {
      await fs.rm(partial, { force: true }).catch((rmErr: unknown) =>
        jobLog.warn({ err: rmErr, partial }, 'Could not remove partial container'),
      );
      return { status: 'failed', reason: errorMessage(err) };
    }
  };
}

// TMC2 in its builder image; cancel also kills the container, since the docker client alone may leave it running
export function createDockerEncodeRunner(options: DockerEncoderOptions & { logsDir?: string }): EncodeRunner {
  const names = new Map<string, string>();
  const nameFor = (job: EncodeJob) => {
    let name = names.get(job.identity);
    if (!name) {
      name = containerNameFor(job);
      names.set(job.identity, name);
    }
    return name;
  };

  const inner = createProcessEncodeRunner({
    command: options.command,
    logsDir: options.logsDir,
    buildArgs: (job) => dockerRunArgs(job, options, nameFor(job)),
    onAbort: (job) => {
      const name = nameFor(job);
      logger.info({ container: name }, 'Killing encoder container');
      const kill = spawn(options.command, ['kill', name], { stdio: 'ignore' });
      kill.on('error', (err) => logger.warn({ err, container: name }, 'docker kill failed'));
    },
  });

  return async (job, signal) => {
    try {
      return await inner(job, signal);
    } finally {
      names.delete(job.identity);
    }
  };
}
