import path from 'node:path';
import { ConfigInvariantViolation } from './errors';
import { logger } from './logger';
import { EncodeJob, GofPlan, QualityTriplet, ThreadBudget, Tile } from './types';

// Budget shared by every encoder instance of a run.
// threadsPerInstance above the cap is clamped rather than rejected.
export function resolveThreadBudget(parallelism: number, threadsPerInstance?: number): ThreadBudget {
  if (!Number.isInteger(parallelism) || parallelism <= 0) {
    throw new ConfigInvariantViolation(`encoding parallelism must be a positive integer (got ${parallelism})`);
  }
  let threads = threadsPerInstance ?? 1;
  if (!Number.isInteger(threads) || threads <= 0) {
    throw new ConfigInvariantViolation(`threads per encoder instance must be a positive integer (got ${threads})`);
  }
  if (threads > parallelism) {
    logger.warn({ requested: threads, cap: parallelism }, 'Capping threads per encoder instance to the thread budget');
    threads = parallelism;
  }
  return {
    parallelism,
    threadsPerInstance: threads,
    maxConcurrentEncodes: Math.max(1, Math.floor(parallelism / threads)),
  };
}

export function resolveGofPlan(segmentSize: number, encoderGof: number): GofPlan {
  if (!Number.isInteger(segmentSize) || segmentSize <= 0) {
    throw new ConfigInvariantViolation(`segment size must be a positive integer (got ${segmentSize})`);
  }
  if (!Number.isInteger(encoderGof) || encoderGof <= 0) {
    throw new ConfigInvariantViolation(`encoder GoF must be a positive integer (got ${encoderGof})`);
  }
  if (segmentSize % encoderGof !== 0) {
    throw new ConfigInvariantViolation(
      `segment size (${segmentSize}) must be a multiple of encoder GoF (${encoderGof})`,
    );
  }
  return { segmentSize, encoderGof, gofsPerSegment: segmentSize / encoderGof };
}

// "24:32:43,28:36:45" -> [{ occ: 24, geo: 32, attr: 43 }, ...]
export function parseQualityTriplets(text: string): QualityTriplet[] {
  const triplets: QualityTriplet[] = [];
  for (const raw of text.split(',')) {
    const item = raw.trim();
    if (!item) continue;
    const parts = item.split(':').map((p) => p.trim());
    if (parts.length !== 3 || parts.some((p) => !/^-?\d+$/.test(p))) {
      throw new ConfigInvariantViolation(`invalid QP group '${item}', expected occ:geo:attr`);
    }
    const [occ, geo, attr] = parts.map((p) => parseInt(p, 10));
    if (occ < 0 || geo < 0 || attr < 0) {
      throw new ConfigInvariantViolation(`invalid QP triplet (${item}); QP values must be non-negative`);
    }
    triplets.push({ occ, geo, attr });
  }
  if (triplets.length === 0) {
    throw new ConfigInvariantViolation('QP triplet list cannot be empty');
  }
  return triplets;
}

export function bitstreamIdentity(project: string, tileName: string, triplet: QualityTriplet): string {
  return `${project}_${tileName}_occ${triplet.occ}_geo${triplet.geo}_attr${triplet.attr}`;
}

export function containerPath(outputRoot: string, identity: string): string {
  return path.join(outputRoot, `${identity}.bin`);
}

// One job per (tile, triplet), tile-major then quality-minor.
export function buildEncodeJobs(
  project: string,
  tiles: Tile[],
  triplets: QualityTriplet[],
  outputRoot: string,
): EncodeJob[] {
  const jobs: EncodeJob[] = [];
  const seen = new Set<string>();
  for (const tile of tiles) {
    for (const triplet of triplets) {
      const identity = bitstreamIdentity(project, tile.name, triplet);
      if (seen.has(identity)) {
        throw new ConfigInvariantViolation(`duplicate bitstream identity ${identity}`);
      }
      seen.add(identity);
      jobs.push({
        identity,
        tile,
        triplet,
        state: 'pending',
        outputPath: containerPath(outputRoot, identity),
      });
    }
  }
  return jobs;
}

export function expectedGofCount(frameCount: number, encoderGof: number): number {
  return Math.ceil(frameCount / encoderGof);
}

// Frames carried by each GoF; the last one is short when frameCount is not a multiple of encoderGof
export function gofFrameCounts(frameCount: number, encoderGof: number): number[] {
  const counts: number[] = [];
  for (let remaining = frameCount; remaining > 0; remaining -= encoderGof) {
    counts.push(Math.min(encoderGof, remaining));
  }
  return counts;
}
