import path from 'node:path';
import { EncodeSettings } from './encoder';
import { Env } from './env';
import { parseQualityTriplets, resolveGofPlan, resolveThreadBudget } from './plan';
import { GofPlan, QualityTriplet, ThreadBudget } from './types';

export type RunConfig = {
  project: string;
  tilesRoot: string;
  encoderOutput: string;
  segmentOutput: string;
  muxOutput: string;
  logsDir: string;
  triplets: QualityTriplet[];
  gofPlan: GofPlan;
  budget: ThreadBudget;
  frameRate: number;
  splitComponents: boolean;
  multiplex: boolean;
  vox?: number;
  startFrameNumber?: number;
  frameCount?: number;
  skipEncoding: boolean;
  skipSegmentation: boolean;
  encoder: {
    command: string;
    image: string;
    repoDir: string;
  };
  backend: 'local' | 'bullmq';
  redisUrl: string;
  queueName: string;
  manifestFeed?: {
    url: string;
    token?: string;
  };
};

// Every invariant is checked here, before anything is scheduled
export function loadRunConfig(e: Env): RunConfig {
  const project = e.PROJECT_NAME;
  return {
    project,
    tilesRoot: path.join(e.TILES_ROOT, project),
    encoderOutput: path.join(e.ENCODER_OUTPUT, project),
    segmentOutput: path.join(e.V3C_OUTPUT, project),
    muxOutput: path.join(e.MUX_OUTPUT, project),
    logsDir: path.join(e.LOGS_DIR, project),
    triplets: parseQualityTriplets(e.QP_TRIPLETS),
    gofPlan: resolveGofPlan(e.SEGMENT_SIZE, e.ENCODER_GOF),
    budget: resolveThreadBudget(e.ENCODING_PARALLELISM, e.ENCODING_THREADS_PER_INSTANCE),
    frameRate: e.FRAME_RATE,
    splitComponents: e.SPLIT_COMPONENTS,
    multiplex: e.MULTIPLEX_SEGMENTS,
    vox: e.VOX,
    startFrameNumber: e.START_FRAME_NUMBER,
    frameCount: e.FRAME_COUNT,
    skipEncoding: e.SKIP_ENCODING,
    skipSegmentation: e.SKIP_SEGMENTATION,
    encoder: {
      command: e.ENCODER_COMMAND,
      image: e.ENCODER_IMAGE,
      repoDir: e.ENCODER_REPO_DIR,
    },
    backend: e.ENCODE_BACKEND,
    redisUrl: e.REDIS_URL,
    queueName: e.QUEUE_NAME,
    manifestFeed: e.MANIFEST_FEED_URL ? { url: e.MANIFEST_FEED_URL, token: e.MANIFEST_FEED_TOKEN } : undefined,
  };
}

export function encodeSettingsOf(config: RunConfig): EncodeSettings {
  return { threadsPerInstance: config.budget.threadsPerInstance, encoderGof: config.gofPlan.encoderGof };
}
