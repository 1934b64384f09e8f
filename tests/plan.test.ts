import { strict as assert } from "node:assert"
import path from "node:path"
import { describe, test } from "node:test"

import { ConfigInvariantViolation } from "../src/errors"
import {
  bitstreamIdentity,
  buildEncodeJobs,
  containerPath,
  expectedGofCount,
  gofFrameCounts,
  parseQualityTriplets,
  resolveGofPlan,
  resolveThreadBudget
} from "../src/plan"
import { makeTile } from "./helpers"

describe("thread budget", () => {
  test("single-threaded instances fill the whole budget", () => {
    assert.deepEqual(resolveThreadBudget(4, 1), { parallelism: 4, threadsPerInstance: 1, maxConcurrentEncodes: 4 })
  })

  test("budget that does not divide evenly rounds down", () => {
    assert.equal(resolveThreadBudget(4, 3).maxConcurrentEncodes, 1)
    assert.equal(resolveThreadBudget(8, 3).maxConcurrentEncodes, 2)
  })

  test("threads per instance defaults to one", () => {
    assert.deepEqual(resolveThreadBudget(3), { parallelism: 3, threadsPerInstance: 1, maxConcurrentEncodes: 3 })
  })

  test("threads above the budget are clamped to it", () => {
    assert.deepEqual(resolveThreadBudget(4, 8), { parallelism: 4, threadsPerInstance: 4, maxConcurrentEncodes: 1 })
  })

  test("non-positive parallelism is rejected", () => {
    assert.throws(() => resolveThreadBudget(0, 1), ConfigInvariantViolation)
    assert.throws(() => resolveThreadBudget(4, 0), ConfigInvariantViolation)
  })
})

describe("GoF plan", () => {
  test("segment size equal to the encoder GoF", () => {
    assert.deepEqual(resolveGofPlan(16, 16), { segmentSize: 16, encoderGof: 16, gofsPerSegment: 1 })
  })

  test("segment spanning several GoFs", () => {
    assert.equal(resolveGofPlan(32, 8).gofsPerSegment, 4)
  })

  test("segment size that is not a multiple is a config error", () => {
    assert.throws(
      () => resolveGofPlan(20, 16),
      (err: unknown) =>
        err instanceof ConfigInvariantViolation &&
        err.stage === "config" &&
        err.message === "segment size (20) must be a multiple of encoder GoF (16)"
    )
  })

  test("GoF frame counts end with the short remainder", () => {
    assert.deepEqual(gofFrameCounts(40, 16), [16, 16, 8])
    assert.deepEqual(gofFrameCounts(32, 16), [16, 16])
    assert.equal(expectedGofCount(40, 16), 3)
    assert.equal(expectedGofCount(32, 16), 2)
  })
})

describe("quality triplets", () => {
  test("parses comma separated occ:geo:attr groups", () => {
    assert.deepEqual(parseQualityTriplets("24:32:43, 28:36:45,"), [
      { occ: 24, geo: 32, attr: 43 },
      { occ: 28, geo: 36, attr: 45 }
    ])
  })

  test("rejects malformed groups and empty lists", () => {
    assert.throws(() => parseQualityTriplets("24:32"), ConfigInvariantViolation)
    assert.throws(() => parseQualityTriplets("24:x:43"), ConfigInvariantViolation)
    assert.throws(() => parseQualityTriplets("24:-1:43"), ConfigInvariantViolation)
    assert.throws(() => parseQualityTriplets(" , "), ConfigInvariantViolation)
  })
})

describe("encode jobs", () => {
  test("identity names project, tile and every QP", () => {
    assert.equal(bitstreamIdentity("demo", "tile_3", { occ: 24, geo: 32, attr: 43 }), "demo_tile_3_occ24_geo32_attr43")
    assert.equal(containerPath("/out", "demo_tile_3_occ24_geo32_attr43"), path.join("/out", "demo_tile_3_occ24_geo32_attr43.bin"))
  })

  test("one job per tile and triplet, tile-major", () => {
    const tiles = [makeTile({ id: 0, name: "tile_0" }), makeTile({ id: 1, name: "tile_1" })]
    const triplets = parseQualityTriplets("24:32:43,28:36:45")
    const jobs = buildEncodeJobs("demo", tiles, triplets, "/out")

    assert.deepEqual(
      jobs.map((j) => j.identity),
      [
        "demo_tile_0_occ24_geo32_attr43",
        "demo_tile_0_occ28_geo36_attr45",
        "demo_tile_1_occ24_geo32_attr43",
        "demo_tile_1_occ28_geo36_attr45"
      ]
    )
    assert.ok(jobs.every((j) => j.state === "pending"))
  })

  test("duplicate triplets collide on identity", () => {
    const triplets = parseQualityTriplets("24:32:43,24:32:43")
    assert.throws(() => buildEncodeJobs("demo", [makeTile()], triplets, "/out"), ConfigInvariantViolation)
  })
})
