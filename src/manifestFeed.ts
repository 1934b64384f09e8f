import axios, { AxiosInstance } from 'axios';
import fs from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from './errors';
import { logger } from './logger';
import { GofPlan, QualityTriplet, RunSummary, SpatialBounds, StageFailure, TrackName } from './types';

export type FeedSegment = {
  index: number;
  file: string; // relative to the entry's baseDir
  bytes: number;
  frameCount: number;
  startFrame: number;
  durationMs: number;
  parameterSets: number[]; // positions in the track's init, one per GoF
};

export type FeedTrack = {
  name: TrackName;
  init: { file: string; bytes: number };
  segments: FeedSegment[];
};

export type FeedEntry = {
  identity: string;
  tileId: number;
  tileName: string;
  spatialBounds: Record<string, SpatialBounds>;
  triplet: QualityTriplet;
  layout: 'split' | 'combined';
  multiplexed: boolean;
  baseDir: string; // relative to the feed file, forward slashes
  frameCount: number;
  totalDurationMs: number;
  tracks: FeedTrack[];
};

// Everything a manifest generator needs to describe the run's segments
export type ManifestFeed = {
  project: string;
  generatedAt: string;
  frameRate: number;
  gofPlan: GofPlan;
  segmentDurationMs: number;
  entries: FeedEntry[];
  omitted: StageFailure[];
};

export const MANIFEST_FEED_FILE = 'manifest-feed.json';

export function durationMs(frames: number, frameRate: number): number {
  return Math.round((frames * 1000) / frameRate);
}

function relativeDir(from: string, to: string): string {
  return path.relative(from, to).split(path.sep).join('/');
}

export function buildManifestFeed(summary: RunSummary, options: { feedDir: string }): ManifestFeed {
  const { frameRate } = summary;
  const entries: FeedEntry[] = [];

  for (const report of summary.identities) {
    if (report.segment !== 'succeeded' || !report.segmentIndex) continue;
    // Publish the combined tree when multiplexing produced one
    const multiplexed = report.multiplex === 'succeeded' && report.muxIndex !== undefined;
    const index = multiplexed && report.muxIndex ? report.muxIndex : report.segmentIndex;
    const dir = multiplexed ? report.muxDir : report.segmentDir;

    entries.push({
      identity: report.identity,
      tileId: report.tile.id,
      tileName: report.tile.name,
      spatialBounds: report.tile.spatialBounds,
      triplet: report.triplet,
      layout: index.layout,
      multiplexed,
      baseDir: relativeDir(options.feedDir, dir),
      frameCount: index.frameCount,
      totalDurationMs: durationMs(index.frameCount, frameRate),
      tracks: index.tracks.map((track) => ({
        name: track.name,
        init: { file: `${track.name}/${track.init.file}`, bytes: track.init.bytes },
        segments: track.segments.map((seg) => ({
          index: seg.index,
          file: `${track.name}/${seg.file}`,
          bytes: seg.bytes,
          frameCount: seg.frameCount,
          startFrame: seg.startFrame,
          durationMs: durationMs(seg.frameCount, frameRate),
          parameterSets: seg.gofParameterSets,
        })),
      })),
    });
  }

  return {
    project: summary.project,
    generatedAt: summary.finishedAt,
    frameRate,
    gofPlan: summary.gofPlan,
    segmentDurationMs: Math.max(1, durationMs(summary.gofPlan.segmentSize, frameRate)),
    entries,
    omitted: summary.failures,
  };
}

export async function writeManifestFeed(file: string, feed: ManifestFeed): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(feed, null, 2));
}

export type DeliveryOptions = {
  url: string;
  token?: string;
  maxRetries?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  client?: Pick<AxiosInstance, 'post'>;
};

// Returns the attempt that succeeded; throws once every attempt failed
export async function deliverManifestFeed(feed: ManifestFeed, options: DeliveryOptions): Promise<number> {
  const maxRetries = Math.max(1, options.maxRetries ?? 5);
  const baseDelayMs = options.baseDelayMs ?? 2000;
  const client = options.client ?? axios;

  for (let attempt = 1; ; attempt++) {
    try {
      await client.post(options.url, feed, {
        headers: options.token ? { Authorization: `Bearer ${options.token}` } : undefined,
        timeout: options.timeoutMs ?? 120000,
      });
      logger.info({ url: options.url, attempt, entries: feed.entries.length }, 'Manifest feed delivered');
      return attempt;
    } catch (err) {
      if (attempt >= maxRetries) {
        logger.error({ err, url: options.url, attempt, maxRetries }, 'Manifest feed delivery failed after all retries');
        throw new Error(`manifest feed delivery failed after ${attempt} attempt(s): ${errorMessage(err)}`, { cause: err });
      }
      // Exponential backoff: base, 2x, 4x, ...
      const retryDelay = baseDelayMs * Math.pow(2, attempt - 1);
      logger.warn(
        { url: options.url, attempt, nextRetryIn: `${retryDelay}ms`, errorDetails: errorMessage(err) },
        `Manifest feed delivery failed, retrying... (${attempt}/${maxRetries})`,
      );
      await new Promise((resolve) => setTimeout(resolve, retryDelay));
    }
  }
}
