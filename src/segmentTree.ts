import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { logger } from './logger';
import { SegmentIndex, TrackName } from './types';

export const INDEX_FILE = 'segments.json';
export const INIT_FILE = 'init.bin';

export function segmentFileName(index: number): string {
  return `segment_${String(index).padStart(4, '0')}.bin`;
}

// Bytes of one track, in the order they are written: init first, then segments by ascending index
export type TrackPayload = {
  name: TrackName;
  init: Buffer;
  segments: Buffer[];
};

export type SegmentTree = {
  index: SegmentIndex;
  payloads: TrackPayload[];
};

const trackNameSchema = z.enum(['atlas', 'occp', 'geom', 'attr', 'combined']);

const segmentIndexSchema = z.object({
  identity: z.string(),
  layout: z.enum(['split', 'combined']),
  gofPlan: z.object({
    segmentSize: z.number().int().positive(),
    encoderGof: z.number().int().positive(),
    gofsPerSegment: z.number().int().positive(),
  }),
  frameCount: z.number().int().nonnegative(),
  sampleStreamHeader: z.number().int().min(0).max(255),
  tracks: z.array(
    z.object({
      name: trackNameSchema,
      init: z.object({ file: z.string(), bytes: z.number().int().nonnegative() }),
      segments: z.array(
        z.object({
          index: z.number().int().positive(),
          file: z.string(),
          bytes: z.number().int().nonnegative(),
          frameCount: z.number().int().positive(),
          startFrame: z.number().int().nonnegative(),
          gofCount: z.number().int().positive(),
          gofUnitCounts: z.array(z.number().int().nonnegative()),
          gofParameterSets: z.array(z.number().int().nonnegative()),
        }),
      ),
    }),
  ),
});

export async function readSegmentIndex(dir: string): Promise<SegmentIndex> {
  const raw = await fs.readFile(path.join(dir, INDEX_FILE), 'utf-8');
  return segmentIndexSchema.parse(JSON.parse(raw));
}

// Writes into a sibling staging folder and swaps it in, so readers never see a half-written tree
export async function writeSegmentTree(outDir: string, tree: SegmentTree): Promise<void> {
  const staging = `${outDir}.staging-${process.pid}-${Date.now()}`;
  await fs.rm(staging, { recursive: true, force: true });
  await fs.mkdir(staging, { recursive: true });

  try {
    await fs.writeFile(path.join(staging, INDEX_FILE), JSON.stringify(tree.index, null, 2));

    // Tracks in parallel; within a track, strictly ascending index
    await Promise.all(
      tree.payloads.map(async (track) => {
        const trackDir = path.join(staging, track.name);
        await fs.mkdir(trackDir, { recursive: true });
        await fs.writeFile(path.join(trackDir, INIT_FILE), track.init);
        for (let i = 0; i < track.segments.length; i++) {
          await fs.writeFile(path.join(trackDir, segmentFileName(i + 1)), track.segments[i]);
        }
      }),
    );

    await fs.rm(outDir, { recursive: true, force: true });
    await fs.rename(staging, outDir);
  } catch (err) {
    await fs.rm(staging, { recursive: true, force: true });
    throw err;
  }
}

// Removes every artifact of an identity so no later stage picks up a stale or partial tree
export async function discardSegmentTree(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch (err) {
    logger.error({ err, dir }, 'Could not remove segment tree');
    throw err;
  }
}
