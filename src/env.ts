import 'dotenv/config';
import { z } from 'zod';

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((v) => v === 'true' || v === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const schema = z.object({
  PROJECT_NAME: z.string().min(1).default('default_project'),

  // Tiler output (tile_* folders + tile_boundaries.json) and stage outputs
  TILES_ROOT: z.string().min(1).default('output/tiles'),
  ENCODER_OUTPUT: z.string().min(1).default('output/encoded'),
  V3C_OUTPUT: z.string().min(1).default('output/v3c'),
  MUX_OUTPUT: z.string().min(1).default('output/v3c-combined'),
  LOGS_DIR: z.string().min(1).default('output/logs'),

  QP_TRIPLETS: z.string().min(1).default('24:32:43'),
  SEGMENT_SIZE: positiveInt(16),
  ENCODER_GOF: positiveInt(16),
  FRAME_RATE: z.coerce.number().positive().default(30),
  SPLIT_COMPONENTS: flag('true'),
  MULTIPLEX_SEGMENTS: flag('false'),

  // Thread cap shared by every encoder instance
  ENCODING_PARALLELISM: positiveInt(1),
  ENCODING_THREADS_PER_INSTANCE: z.coerce.number().int().positive().optional(),

  START_FRAME_NUMBER: z.coerce.number().int().nonnegative().optional(),
  FRAME_COUNT: z.coerce.number().int().positive().optional(),
  VOX: z.coerce.number().int().positive().optional(),

  SKIP_ENCODING: flag('false'),
  SKIP_SEGMENTATION: flag('false'),

  ENCODER_COMMAND: z.string().min(1).default('docker'),
  ENCODER_IMAGE: z.string().min(1).default('tmc2-builder-image'),
  ENCODER_REPO_DIR: z.string().min(1).default('./encoder/TMC2'),

  ENCODE_BACKEND: z.enum(['local', 'bullmq']).default('local'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  QUEUE_NAME: z.string().default('v3c-encode'),

  // Optional delivery of segment metadata to the manifest builder
  MANIFEST_FEED_URL: z.string().url().optional(),
  MANIFEST_FEED_TOKEN: z.string().optional(),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Env = z.infer<typeof schema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  // Blank entries in a .env file mean "not set"
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  return schema.parse(cleaned);
}

export const env = parseEnv(process.env);
