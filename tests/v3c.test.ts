import { strict as assert } from "node:assert"
import { describe, test } from "node:test"

import {
  SampleStreamError,
  V3C_AD,
  V3C_CAD,
  V3C_VPS,
  componentOf,
  distinctUnits,
  parseSampleStream,
  precisionOf,
  writeSampleStream
} from "../src/v3c"
import { HEADER, unit } from "./helpers"

describe("V3C sample stream", () => {
  test("precision comes from the top three header bits", () => {
    assert.equal(precisionOf(0x00), 1)
    assert.equal(precisionOf(0x40), 3)
    assert.equal(precisionOf(0xe0), 8)
  })

  test("parses size-prefixed units and their types", () => {
    // precision 1: header 0x00, then [size][payload]...
    const bytes = Buffer.from([0x00, 2, V3C_VPS << 3, 0x01, 1, V3C_AD << 3])
    const stream = parseSampleStream(bytes)
    assert.equal(stream.header, 0)
    assert.equal(stream.precision, 1)
    assert.deepEqual(
      stream.units.map((u) => u.type),
      [V3C_VPS, V3C_AD]
    )
    assert.deepEqual([...stream.units[0].payload], [0x00, 0x01])
  })

  test("writing regenerates big-endian framing", () => {
    const out = writeSampleStream(HEADER, [unit(V3C_AD, 7)])
    assert.deepEqual([...out], [0x60, 0, 0, 0, 2, 0x08, 7])
    assert.deepEqual(parseSampleStream(out).units[0].payload, unit(V3C_AD, 7).payload)
  })

  test("a unit larger than the size field allows is refused", () => {
    assert.throws(() => writeSampleStream(0x00, [{ type: V3C_AD, payload: Buffer.alloc(256, 0x08) }]))
  })

  test("malformed streams report the failing offset", () => {
    assert.throws(() => parseSampleStream(Buffer.alloc(0)), SampleStreamError)
    assert.throws(() => parseSampleStream(Buffer.from([0x20, 0])), {
      name: "SampleStreamError",
      message: "truncated unit size field at byte 1"
    })
    assert.throws(() => parseSampleStream(Buffer.from([0x00, 0])), {
      message: "zero-length unit at byte 1"
    })
    assert.throws(() => parseSampleStream(Buffer.from([0x00, 3, 0x08])), {
      message: "truncated unit (declared 3 bytes) at byte 1"
    })
    assert.throws(() => parseSampleStream(Buffer.from([0x00, 1, 7 << 3])), {
      message: "unrecognised V3C unit type 7 at byte 1"
    })
  })

  test("header-only stream has no units", () => {
    assert.equal(parseSampleStream(Buffer.from([HEADER])).units.length, 0)
  })

  test("component mapping", () => {
    assert.equal(componentOf(V3C_AD), "atlas")
    assert.equal(componentOf(V3C_CAD), "atlas")
    assert.equal(componentOf(2), "occp")
    assert.equal(componentOf(3), "geom")
    assert.equal(componentOf(4), "attr")
    assert.equal(componentOf(V3C_VPS), undefined)
    assert.equal(componentOf(5), undefined)
  })

  test("distinct units keep first occurrences only", () => {
    const a = unit(V3C_VPS, 1)
    const b = unit(V3C_VPS, 2)
    assert.deepEqual(distinctUnits([a, unit(V3C_VPS, 1), b, a]), [a, b])
  })
})
