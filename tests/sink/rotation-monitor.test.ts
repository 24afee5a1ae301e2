// tests/sink/rotation-monitor.test.ts — Size-triggered rotation, reclaim retries, cancellation

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs"
import { join } from "node:path"
import { tmpdir } from "node:os"
import { RotatingWriter } from "../../src/sink/rotating-writer.js"
import { RotationMonitor, DEFAULT_CHECK_INTERVAL_MS, DEFAULT_MAX_SEGMENT_BYTES } from "../../src/sink/rotation-monitor.js"
import { ReclaimError, RotationError } from "../../src/sink/errors.js"
import { CaptureLogger, faultyOpener, gatedOpener, type DiskFaults } from "../helpers/sink-fakes.js"

function lines(path: string): string[] {
  return readFileSync(path, "utf-8").split("\n").filter(Boolean)
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

describe("RotationMonitor", () => {
  let dir: string
  let log: CaptureLogger

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sink-monitor-test-"))
    log = new CaptureLogger()
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it("uses 100MB and 5s by default, reclaiming on the check interval", async () => {
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out" })
    const monitor = new RotationMonitor(writer, { logger: log })

    expect(monitor.maxSegmentBytes).toBe(DEFAULT_MAX_SEGMENT_BYTES)
    expect(DEFAULT_MAX_SEGMENT_BYTES).toBe(100_000_000)
    expect(monitor.checkIntervalMs).toBe(DEFAULT_CHECK_INTERVAL_MS)
    expect(DEFAULT_CHECK_INTERVAL_MS).toBe(5_000)
    expect(monitor.reclaimIntervalMs).toBe(5_000)
    await writer.closeActive()
  })

  it("threshold 100, five 30-byte records: rotates after the 4th and splits 4/1", async () => {
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out" })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 100, logger: log })

    const rotated: boolean[] = []
    for (let i = 0; i < 5; i++) {
      // 29 characters + newline = 30 bytes
      await writer.append(`record-${i}-${"x".repeat(20)}`)
      const tick = await monitor.runOnce()
      rotated.push(tick.rotated)
    }
    await writer.reclaim()
    await writer.closeActive()

    expect(rotated).toEqual([false, false, false, true, false])
    expect(lines(join(dir, "diag.out"))).toHaveLength(4)
    expect(lines(join(dir, "diag.out-0"))).toEqual([`record-4-${"x".repeat(20)}`])
    expect(log.messages("info")).toEqual(["segment size limit reached, rotated"])
  })

  it("the tick that rotates also closes the segment it retired", async () => {
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out" })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 10, logger: log })
    await writer.append("x".repeat(20))

    const tick = await monitor.runOnce()

    expect(tick).toEqual({ rotated: true, reclaimed: [join(dir, "diag.out")], reclaimFailures: [] })
    expect(writer.retiredCount).toBe(0)
    await writer.closeActive()
  })

  it("overlapping ticks rotate an oversized segment once", async () => {
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out" })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 10, logger: log })
    await writer.append("x".repeat(20))

    const [first, second] = await Promise.all([monitor.runOnce(), monitor.runOnce()])

    expect(first.rotated).toBe(true)
    expect(second.rotated).toBe(false)
    expect(writer.currentSegmentInfo().sequence).toBe(1)
    expect(existsSync(join(dir, "diag.out-1"))).toBe(false)
    expect(log.messages("info")).toEqual(["segment size limit reached, rotated"])
    await writer.reclaim()
    await writer.closeActive()
  })

  it("a failed rotation is logged and the reclaim step still runs", async () => {
    const faults: DiskFaults = {}
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out", openFile: faultyOpener(faults) })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 10, logger: log })

    await writer.rotate()
    faults.failOpen = (p) => p.endsWith("diag.out-1")
    await writer.append("x".repeat(20))

    const tick = await monitor.runOnce()

    expect(tick.rotated).toBe(false)
    expect(tick.reclaimed).toEqual([join(dir, "diag.out")])
    expect(writer.currentSegmentInfo().path).toBe(join(dir, "diag.out-0"))
    const failure = log.entries.find((e) => e.message === "rotation failed, keeping current segment")
    expect(failure?.error).toBeInstanceOf(RotationError)
    expect(failure?.metadata).toEqual({ segment: join(dir, "diag.out-0") })

    // Next tick with the disk healthy again rotates the oversized segment
    faults.failOpen = undefined
    expect((await monitor.runOnce()).rotated).toBe(true)
    expect(writer.currentSegmentInfo().path).toBe(join(dir, "diag.out-1"))

    await writer.reclaim()
    await writer.closeActive()
  })

  it("a retired segment that fails to close is retried on the next cycle", async () => {
    const faults: DiskFaults = { failClose: (p) => p.endsWith("diag.out") }
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out", openFile: faultyOpener(faults) })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 1_000, logger: log })
    await writer.rotate()

    const first = await monitor.runOnce()
    expect(first.reclaimed).toEqual([])
    expect(first.reclaimFailures).toHaveLength(1)
    expect(first.reclaimFailures[0]).toBeInstanceOf(ReclaimError)
    expect(first.reclaimFailures[0].segmentPath).toBe(join(dir, "diag.out"))
    expect(writer.retiredCount).toBe(1)
    expect(log.messages("error")).toEqual(["closing retired segment failed, will retry"])

    faults.failClose = undefined
    const second = await monitor.runOnce()
    expect(second.reclaimed).toEqual([join(dir, "diag.out")])
    expect(second.reclaimFailures).toEqual([])
    expect(writer.retiredCount).toBe(0)

    await writer.closeActive()
  })

  it("skips rotation once the writer is closed", async () => {
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out" })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 1, logger: log })
    await writer.append("data")
    await writer.closeActive()

    await expect(monitor.checkSize()).resolves.toEqual({ rotated: false })
  })

  it("runs on its timer until stopped", async () => {
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out" })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 100, checkIntervalMs: 10, logger: log })
    await writer.append("x".repeat(150))

    monitor.start()
    expect(monitor.isRunning).toBe(true)
    await vi.waitFor(() => expect(writer.currentSegmentInfo().sequence).toBe(1))
    await vi.waitFor(() => expect(writer.retiredCount).toBe(0))

    await monitor.stop()
    expect(monitor.isRunning).toBe(false)

    await writer.append("y".repeat(150))
    await sleep(60)
    expect(writer.currentSegmentInfo().sequence).toBe(1)
    await writer.closeActive()
  })

  it("stop lets an in-progress rotation finish and starts no new tick", async () => {
    const gate = gatedOpener()
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out", openFile: gate.openFile })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 10, checkIntervalMs: 10, logger: log })
    await writer.append("x".repeat(20))

    monitor.start()
    await vi.waitFor(() => expect(gate.isWaiting()).toBe(true))

    let stopped = false
    const stopping = monitor.stop().then(() => {
      stopped = true
    })
    await sleep(30)
    expect(stopped).toBe(false)

    gate.release()
    await stopping
    expect(writer.currentSegmentInfo().sequence).toBe(1)
    expect(writer.retiredCount).toBe(0)

    await writer.append("y".repeat(20))
    await sleep(40)
    expect(writer.currentSegmentInfo().sequence).toBe(1)
    await writer.closeActive()
  })

  it("a restart while stop is pending leaves no stale loop behind", async () => {
    const gate = gatedOpener()
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out", openFile: gate.openFile })
    const monitor = new RotationMonitor(writer, { maxSegmentBytes: 10, checkIntervalMs: 10, logger: log })
    await writer.append("x".repeat(20))

    monitor.start()
    await vi.waitFor(() => expect(gate.isWaiting()).toBe(true))

    const stopping = monitor.stop()
    monitor.start()
    gate.release()
    await stopping
    await monitor.stop()
    expect(monitor.isRunning).toBe(false)
    expect(writer.currentSegmentInfo().sequence).toBe(1)

    await writer.append("y".repeat(20))
    await sleep(60)
    expect(writer.currentSegmentInfo().sequence).toBe(1)
    await writer.reclaim()
    await writer.closeActive()
  })

  it("reclaims on its own interval when decoupled from the size check", async () => {
    const writer = await RotatingWriter.open({ dir, baseName: "diag.out" })
    const monitor = new RotationMonitor(writer, {
      checkIntervalMs: 60_000,
      reclaimIntervalMs: 10,
      logger: log,
    })
    await writer.rotate()
    expect(writer.retiredCount).toBe(1)

    monitor.start()
    await vi.waitFor(() => expect(writer.retiredCount).toBe(0))
    await monitor.stop()
    await writer.closeActive()
  })
})
