import { strict as assert } from "node:assert"
import { setTimeout as sleep } from "node:timers/promises"
import { describe, test } from "node:test"

import { EncodeRunner, runEncodeJobs } from "../src/scheduler"
import { EncodeJob } from "../src/types"
import { makeJob } from "./helpers"

function jobs(...identities: string[]): EncodeJob[] {
  return identities.map((id) => makeJob(id, "/out"))
}

describe("encode scheduler", () => {
  test("never runs more encodes than the concurrency bound", async () => {
    let active = 0
    let maxActive = 0
    const runner: EncodeRunner = async (job) => {
      active++
      maxActive = Math.max(maxActive, active)
      await sleep(15)
      active--
      return { status: "succeeded", path: job.outputPath }
    }

    const report = await runEncodeJobs(jobs("a", "b", "c", "d", "e", "f"), { concurrency: 2, runner })
    assert.equal(maxActive, 2)
    assert.equal(report.peakConcurrency, 2)
    assert.equal(report.succeeded.length, 6)
    assert.equal(report.degraded, false)
  })

  test("opens no more slots than there are jobs", async () => {
    const report = await runEncodeJobs(jobs("a", "b"), {
      concurrency: 8,
      runner: async (job) => {
        await sleep(5)
        return { status: "succeeded", path: job.outputPath }
      }
    })
    assert.equal(report.peakConcurrency, 2)
  })

  test("a failing or throwing job does not affect the others", async () => {
    const runner: EncodeRunner = async (job) => {
      if (job.identity === "b") return { status: "failed", reason: "encoder exited with code 1" }
      if (job.identity === "c") throw new Error("encoder crashed")
      return { status: "succeeded", path: job.outputPath }
    }

    const report = await runEncodeJobs(jobs("a", "b", "c", "d"), { concurrency: 2, runner })
    assert.deepEqual(
      report.succeeded.map((j) => j.identity),
      ["a", "d"]
    )
    assert.deepEqual(
      report.failed.map((j) => [j.identity, j.reason]),
      [
        ["b", "encoder exited with code 1"],
        ["c", "encoder crashed"]
      ]
    )
    assert.equal(report.degraded, true)
    assert.ok(report.jobs.every((j) => j.finishedAt !== undefined))
  })

  test("onSettled fires once per job, even when it throws", async () => {
    const seen: string[] = []
    const report = await runEncodeJobs(jobs("a", "b", "c"), {
      concurrency: 3,
      runner: async (job) => ({ status: "succeeded", path: job.outputPath }),
      onSettled: (job) => {
        seen.push(job.identity)
        if (job.identity === "a") throw new Error("hook failure")
      }
    })
    assert.deepEqual([...seen].sort(), ["a", "b", "c"])
    assert.equal(report.succeeded.length, 3)
  })

  test("cancellation stops the running encode and never starts the rest", async () => {
    let calls = 0
    const runner: EncodeRunner = (_job, signal) =>
      new Promise((resolve) => {
        calls++
        signal.addEventListener("abort", () => resolve({ status: "failed", reason: "cancelled" }), { once: true })
      })

    const controller = new AbortController()
    const run = runEncodeJobs(jobs("a", "b", "c"), { concurrency: 1, runner, signal: controller.signal })
    controller.abort()
    const report = await run

    assert.equal(calls, 1)
    assert.equal(report.cancelled, true)
    assert.deepEqual(
      report.jobs.map((j) => [j.state, j.reason]),
      [
        ["failed", "cancelled"],
        ["failed", "cancelled before start"],
        ["failed", "cancelled before start"]
      ]
    )
  })

  test("an already aborted signal schedules nothing", async () => {
    let calls = 0
    const report = await runEncodeJobs(jobs("a", "b"), {
      concurrency: 2,
      signal: AbortSignal.abort(),
      runner: async (job) => {
        calls++
        return { status: "succeeded", path: job.outputPath }
      }
    })
    assert.equal(calls, 0)
    assert.equal(report.failed.length, 2)
    assert.equal(report.peakConcurrency, 0)
  })

  test("no jobs yields an empty clean report", async () => {
    const report = await runEncodeJobs([], {
      concurrency: 4,
      runner: async (job) => ({ status: "succeeded", path: job.outputPath })
    })
    assert.equal(report.jobs.length, 0)
    assert.equal(report.degraded, false)
    assert.equal(report.cancelled, false)
  })
})
