import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"

import { EncodeJob, Tile } from "../src/types"
import { V3C_AD, V3C_AVD, V3C_GVD, V3C_OVD, V3C_VPS, V3cUnit, writeSampleStream } from "../src/v3c"

// 4-byte size fields
export const HEADER = 0x60

export function unit(type: number, ...body: number[]): V3cUnit {
  return { type, payload: Buffer.from([type << 3, ...body]) }
}

// Per GoF: one parameter set (identical across GoFs) then atlas, occupancy, geometry, attribute
export function gofUnits(gofCount: number): V3cUnit[] {
  const units: V3cUnit[] = []
  for (let g = 0; g < gofCount; g++) {
    units.push(
      unit(V3C_VPS, 0xaa),
      unit(V3C_AD, g),
      unit(V3C_OVD, g),
      unit(V3C_GVD, g),
      unit(V3C_AVD, g, g)
    )
  }
  return units
}

export function containerBytes(gofCount: number): Buffer {
  return writeSampleStream(HEADER, gofUnits(gofCount))
}

export async function tempDir(prefix = "v3c-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix))
}

export function makeTile(overrides: Partial<Tile> = {}): Tile {
  return {
    id: 0,
    name: "tile_0",
    dir: "/tmp/tiles/tile_0",
    frameRange: [0, 40],
    frameCount: 40,
    framePattern: "frame_vox10_%04d.ply",
    vox: 10,
    spatialBounds: {},
    ...overrides
  }
}

export function makeJob(identity: string, outputRoot: string, tile: Tile = makeTile()): EncodeJob {
  return {
    identity,
    tile,
    triplet: { occ: 24, geo: 32, attr: 43 },
    state: "pending",
    outputPath: path.join(outputRoot, `${identity}.bin`)
  }
}

// Tile folders with empty .ply frames, as the tiler lays them out
export async function writeTiles(root: string, tileIds: number[], frames: number): Promise<void> {
  for (const id of tileIds) {
    const dir = path.join(root, `tile_${id}`)
    await fs.mkdir(dir, { recursive: true })
    for (let f = 0; f < frames; f++) {
      await fs.writeFile(path.join(dir, `frame_vox10_${String(f).padStart(4, "0")}.ply`), "")
    }
  }
}
