import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { ConfigInvariantViolation } from './errors';
import { logger } from './logger';
import { SpatialBounds, Tile } from './types';

const FRAME_NUMBER = /^(.*?)(\d+)$/;
const VOX = /vox(\d+)/i;

const boundariesSchema = z.record(
  z.string(),
  z.array(
    z.object({
      id: z.number().int().nonnegative(),
      xmin: z.number(),
      xmax: z.number(),
      ymin: z.number(),
      ymax: z.number(),
      zmin: z.number(),
      zmax: z.number(),
    }),
  ),
);

export type FrameSequence = {
  pattern: string;
  startFrame: number;
  frameCount: number;
};

// Infer "<prefix>%0Nd.ply", first frame number and frame count from a tile folder
export function deriveFrameSequence(tileDir: string, fileNames: string[]): FrameSequence {
  const stems = fileNames
    .filter((name) => name.toLowerCase().endsWith('.ply'))
    .sort()
    .map((name) => name.slice(0, -'.ply'.length));
  if (stems.length === 0) {
    throw new ConfigInvariantViolation(`${tileDir}: no .ply frames found`);
  }

  const first = FRAME_NUMBER.exec(stems[0]);
  if (!first) {
    throw new ConfigInvariantViolation(`${tileDir}: unable to infer numbering pattern from ${stems[0]}`);
  }
  const prefix = first[1];
  let width = first[2].length;
  const numbers: number[] = [];
  for (const stem of stems) {
    const m = FRAME_NUMBER.exec(stem);
    if (!m) continue;
    width = Math.max(width, m[2].length);
    numbers.push(parseInt(m[2], 10));
  }

  return {
    pattern: `${prefix}%0${width}d.ply`,
    startFrame: Math.min(...numbers),
    frameCount: numbers.length,
  };
}

// Geometry bit depth from a name such as longdress_vox10_%04d.ply
export function voxFromPattern(pattern: string): number | undefined {
  const m = VOX.exec(pattern);
  if (!m) return undefined;
  const vox = parseInt(m[1], 10);
  return vox > 0 ? vox : undefined;
}

export async function readTileBoundaries(file: string): Promise<Map<number, Record<string, SpatialBounds>>> {
  const byTile = new Map<number, Record<string, SpatialBounds>>();
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return byTile;
    throw err;
  }

  const parsed = boundariesSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new ConfigInvariantViolation(`${file}: invalid tile boundaries (${parsed.error.issues[0]?.message})`);
  }
  for (const [segment, tiles] of Object.entries(parsed.data)) {
    for (const { id, ...bounds } of tiles) {
      const entry = byTile.get(id) ?? {};
      entry[segment] = bounds;
      byTile.set(id, entry);
    }
  }
  return byTile;
}

export type TileOverrides = {
  startFrameNumber?: number;
  frameCount?: number;
  vox?: number; // replaces the bit depth read from frame names
};

// Tiles written by the tiler: <tilesRoot>/tile_<n>/*.ply plus tile_boundaries.json
export async function discoverTiles(tilesRoot: string, overrides: TileOverrides = {}): Promise<Tile[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(tilesRoot, { withFileTypes: true });
  } catch {
    throw new ConfigInvariantViolation(`tiles root does not exist: ${tilesRoot}`);
  }

  const tileDirs = entries
    .filter((e) => e.isDirectory() && /^tile_\d+$/.test(e.name))
    .map((e) => ({ name: e.name, id: parseInt(e.name.slice('tile_'.length), 10) }))
    .sort((a, b) => a.id - b.id);
  if (tileDirs.length === 0) {
    throw new ConfigInvariantViolation(`no tile directories found in ${tilesRoot}`);
  }

  const bounds = await readTileBoundaries(path.join(tilesRoot, 'tile_boundaries.json'));

  const tiles: Tile[] = [];
  for (const { name, id } of tileDirs) {
    const dir = path.join(tilesRoot, name);
    const seq = deriveFrameSequence(dir, await fs.readdir(dir));
    const startFrame = overrides.startFrameNumber ?? seq.startFrame;
    const frameCount = overrides.frameCount ?? seq.frameCount;
    const vox = overrides.vox ?? voxFromPattern(seq.pattern);
    if (vox === undefined) {
      throw new ConfigInvariantViolation(`${dir}: geometry bit depth cannot be inferred from ${seq.pattern}; set VOX`);
    }
    tiles.push({
      id,
      name,
      dir,
      frameRange: [startFrame, startFrame + frameCount],
      frameCount,
      framePattern: seq.pattern,
      vox,
      spatialBounds: bounds.get(id) ?? {},
    });
  }

  logger.info(
    { tilesRoot, tiles: tiles.length, vox: [...new Set(tiles.map((t) => t.vox))], boundsSegments: bounds.size > 0 },
    'Discovered tiles',
  );
  return tiles;
}
