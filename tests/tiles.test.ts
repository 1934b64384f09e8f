import { strict as assert } from "node:assert"
import fs from "node:fs/promises"
import path from "node:path"
import { describe, test } from "node:test"

import { ConfigInvariantViolation } from "../src/errors"
import { deriveFrameSequence, discoverTiles, readTileBoundaries, voxFromPattern } from "../src/tiles"
import { tempDir, writeTiles } from "./helpers"

describe("frame sequence", () => {
  test("infers pattern, first frame and count", () => {
    const seq = deriveFrameSequence("/t", ["ld_vox10_1052.ply", "ld_vox10_1051.ply", "notes.txt", "ld_vox10_1053.ply"])
    assert.deepEqual(seq, { pattern: "ld_vox10_%04d.ply", startFrame: 1051, frameCount: 3 })
  })

  test("folder without frames is a config error", () => {
    assert.throws(() => deriveFrameSequence("/t", ["readme.md"]), ConfigInvariantViolation)
  })

  test("frame names without a number are rejected", () => {
    assert.throws(() => deriveFrameSequence("/t", ["cloud.ply"]), ConfigInvariantViolation)
  })

  test("geometry bit depth comes from the vox token", () => {
    assert.equal(voxFromPattern("longdress_vox10_%04d.ply"), 10)
    assert.equal(voxFromPattern("soldier_VOX11_%04d.ply"), 11)
    assert.equal(voxFromPattern("frame_%04d.ply"), undefined)
    assert.equal(voxFromPattern("frame_vox0_%04d.ply"), undefined)
  })
})

describe("tile discovery", () => {
  test("finds tile folders in id order with their bounds", async () => {
    const root = await tempDir()
    await writeTiles(root, [10, 2], 3)
    await fs.mkdir(path.join(root, "scratch"))
    await fs.writeFile(
      path.join(root, "tile_boundaries.json"),
      JSON.stringify({ "0": [{ id: 2, xmin: 0, xmax: 1, ymin: 0, ymax: 2, zmin: 0, zmax: 3 }] })
    )

    const tiles = await discoverTiles(root)
    assert.deepEqual(
      tiles.map((t) => t.name),
      ["tile_2", "tile_10"]
    )
    assert.deepEqual(tiles[0].frameRange, [0, 3])
    assert.equal(tiles[0].framePattern, "frame_vox10_%04d.ply")
    assert.equal(tiles[0].vox, 10)
    assert.deepEqual(tiles[0].spatialBounds, { "0": { xmin: 0, xmax: 1, ymin: 0, ymax: 2, zmin: 0, zmax: 3 } })
    assert.deepEqual(tiles[1].spatialBounds, {})
  })

  test("overrides replace the detected frame range", async () => {
    const root = await tempDir()
    await writeTiles(root, [0], 5)
    const [tile] = await discoverTiles(root, { startFrameNumber: 2, frameCount: 2 })
    assert.deepEqual(tile.frameRange, [2, 4])
    assert.equal(tile.frameCount, 2)
  })

  test("the vox override replaces the inferred bit depth", async () => {
    const root = await tempDir()
    await writeTiles(root, [0], 2)
    const [tile] = await discoverTiles(root, { vox: 9 })
    assert.equal(tile.vox, 9)
  })

  test("frames without a vox token need an override", async () => {
    const root = await tempDir()
    const dir = path.join(root, "tile_0")
    await fs.mkdir(dir)
    await fs.writeFile(path.join(dir, "cloud_0001.ply"), "")

    await assert.rejects(discoverTiles(root), {
      name: "ConfigInvariantViolation",
      message: `${dir}: geometry bit depth cannot be inferred from cloud_%04d.ply; set VOX`
    })
    const [tile] = await discoverTiles(root, { vox: 11 })
    assert.equal(tile.vox, 11)
  })

  test("missing root and empty root are config errors", async () => {
    const root = await tempDir()
    await assert.rejects(discoverTiles(path.join(root, "absent")), ConfigInvariantViolation)
    await assert.rejects(discoverTiles(root), ConfigInvariantViolation)
  })

  test("absent boundaries file yields no bounds", async () => {
    const root = await tempDir()
    const bounds = await readTileBoundaries(path.join(root, "tile_boundaries.json"))
    assert.equal(bounds.size, 0)
  })
})
