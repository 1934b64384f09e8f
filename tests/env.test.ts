import { strict as assert } from "node:assert"
import path from "node:path"
import { describe, test } from "node:test"

import { loadRunConfig } from "../src/config"
import { parseEnv } from "../src/env"
import { ConfigInvariantViolation } from "../src/errors"

describe("environment", () => {
  test("every key has a default", () => {
    const e = parseEnv({})
    assert.equal(e.PROJECT_NAME, "default_project")
    assert.equal(e.SEGMENT_SIZE, 16)
    assert.equal(e.ENCODER_GOF, 16)
    assert.equal(e.SPLIT_COMPONENTS, true)
    assert.equal(e.MULTIPLEX_SEGMENTS, false)
    assert.equal(e.ENCODE_BACKEND, "local")
    assert.equal(e.ENCODING_THREADS_PER_INSTANCE, undefined)
    assert.equal(e.MANIFEST_FEED_URL, undefined)
  })

  test("values are trimmed and coerced; blanks count as unset", () => {
    const e = parseEnv({
      SEGMENT_SIZE: " 32 ",
      SPLIT_COMPONENTS: "0",
      MULTIPLEX_SEGMENTS: "true",
      QP_TRIPLETS: " 24:32:43 ",
      MANIFEST_FEED_URL: "   "
    })
    assert.equal(e.SEGMENT_SIZE, 32)
    assert.equal(e.SPLIT_COMPONENTS, false)
    assert.equal(e.MULTIPLEX_SEGMENTS, true)
    assert.equal(e.QP_TRIPLETS, "24:32:43")
    assert.equal(e.MANIFEST_FEED_URL, undefined)
  })

  test("invalid values are rejected", () => {
    assert.throws(() => parseEnv({ ENCODE_BACKEND: "sqs" }))
    assert.throws(() => parseEnv({ SPLIT_COMPONENTS: "yes" }))
    assert.throws(() => parseEnv({ SEGMENT_SIZE: "0" }))
  })
})

describe("run config", () => {
  test("derives per-project folders and the encode plan", () => {
    const config = loadRunConfig(
      parseEnv({
        PROJECT_NAME: "demo",
        TILES_ROOT: "/data/tiles",
        V3C_OUTPUT: "/data/v3c",
        SEGMENT_SIZE: "32",
        ENCODER_GOF: "16",
        ENCODING_PARALLELISM: "8",
        ENCODING_THREADS_PER_INSTANCE: "3",
        QP_TRIPLETS: "24:32:43,28:36:45",
        MANIFEST_FEED_URL: "http://manifests.test/feed",
        MANIFEST_FEED_TOKEN: "test-secret"
      })
    )

    assert.equal(config.tilesRoot, path.join("/data/tiles", "demo"))
    assert.equal(config.segmentOutput, path.join("/data/v3c", "demo"))
    assert.deepEqual(config.gofPlan, { segmentSize: 32, encoderGof: 16, gofsPerSegment: 2 })
    assert.deepEqual(config.budget, { parallelism: 8, threadsPerInstance: 3, maxConcurrentEncodes: 2 })
    assert.equal(config.triplets.length, 2)
    assert.deepEqual(config.manifestFeed, { url: "http://manifests.test/feed", token: "test-secret" })
  })

  test("config invariants fail before anything runs", () => {
    assert.throws(() => loadRunConfig(parseEnv({ SEGMENT_SIZE: "20", ENCODER_GOF: "16" })), ConfigInvariantViolation)
    assert.throws(() => loadRunConfig(parseEnv({ QP_TRIPLETS: "24:32" })), ConfigInvariantViolation)
  })
})
