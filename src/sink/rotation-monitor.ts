// src/sink/rotation-monitor.ts — Periodic size check, rotation and reclaim
//
// Each step of a tick is caught on its own: a failed rotation still lets the
// reclaim pass run, and nothing thrown inside a tick stops the loop.

import type { SinkLogger } from "../logger.js"
import type { ReclaimError } from "./errors.js"
import type { RotatingWriter } from "./rotating-writer.js"

export const DEFAULT_MAX_SEGMENT_BYTES = 100_000_000
export const DEFAULT_CHECK_INTERVAL_MS = 5_000

export interface RotationMonitorOptions {
  /** Rotate once the active segment reaches this many bytes */
  maxSegmentBytes?: number
  /** Size check interval */
  checkIntervalMs?: number
  /** Reclaim interval (default: same as checkIntervalMs, run in the same tick) */
  reclaimIntervalMs?: number
  logger: SinkLogger
}

export interface RotationCheck {
  rotated: boolean
  /** Path of the segment that became active */
  segmentPath?: string
  error?: unknown
}

export interface TickResult {
  rotated: boolean
  reclaimed: string[]
  reclaimFailures: ReclaimError[]
}

interface Loop {
  id: "tick" | "size_check" | "reclaim"
  intervalMs: number
  run: () => Promise<unknown>
  timer: ReturnType<typeof setTimeout> | undefined
}

export class RotationMonitor {
  readonly maxSegmentBytes: number
  readonly checkIntervalMs: number
  readonly reclaimIntervalMs: number
  private readonly log: SinkLogger
  private loops: Loop[] = []
  private readonly inFlight = new Set<Promise<unknown>>()
  private checking: Promise<RotationCheck> = Promise.resolve({ rotated: false })
  private started = false

  constructor(
    private readonly writer: RotatingWriter,
    options: RotationMonitorOptions,
  ) {
    this.maxSegmentBytes = options.maxSegmentBytes ?? DEFAULT_MAX_SEGMENT_BYTES
    this.checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS
    this.reclaimIntervalMs = options.reclaimIntervalMs ?? this.checkIntervalMs
    this.log = options.logger
  }

  get isRunning(): boolean {
    return this.started
  }

  start(): void {
    if (this.started) return
    this.started = true

    this.loops =
      this.reclaimIntervalMs === this.checkIntervalMs
        ? [this.loop("tick", this.checkIntervalMs, () => this.runOnce())]
        : [
            this.loop("size_check", this.checkIntervalMs, () => this.checkSize()),
            this.loop("reclaim", this.reclaimIntervalMs, () => this.reclaim()),
          ]

    for (const loop of this.loops) {
      this.scheduleNext(loop)
    }
    this.log.info("rotation monitor started", {
      max_segment_bytes: this.maxSegmentBytes,
      check_interval_ms: this.checkIntervalMs,
      reclaim_interval_ms: this.reclaimIntervalMs,
    })
  }

  /**
   * Cancel the loop. No tick starts after this call; a tick already running
   * completes before the returned promise resolves.
   */
  async stop(): Promise<void> {
    if (!this.started) return
    this.started = false
    for (const loop of this.loops) {
      if (loop.timer) {
        clearTimeout(loop.timer)
        loop.timer = undefined
      }
    }
    await Promise.allSettled([...this.inFlight])
    this.log.info("rotation monitor stopped")
  }

  /** One full tick: size check (and rotation), then reclaim. */
  async runOnce(): Promise<TickResult> {
    const check = await this.checkSize()
    const reclaim = await this.reclaim()
    return { rotated: check.rotated, ...reclaim }
  }

  /**
   * Rotate when the active segment has reached the size limit. Overlapping
   * calls run one after another, so each sees the segment the previous one
   * left active.
   */
  checkSize(): Promise<RotationCheck> {
    const next = this.checking.then(() => this.checkSizeNow())
    this.checking = next
    return next
  }

  private async checkSizeNow(): Promise<RotationCheck> {
    if (this.writer.isClosed) return { rotated: false }

    let path: string | undefined
    try {
      const info = this.writer.currentSegmentInfo()
      path = info.path
      if (info.approximateSize < this.maxSegmentBytes) return { rotated: false }

      const segment = await this.writer.rotate()
      this.log.info("segment size limit reached, rotated", {
        previous: info.path,
        previous_size: info.approximateSize,
        segment: segment.path,
      })
      return { rotated: true, segmentPath: segment.path }
    } catch (err) {
      this.log.error("rotation failed, keeping current segment", err, { segment: path })
      return { rotated: false, error: err }
    }
  }

  /** One close attempt per retired segment. */
  async reclaim(): Promise<Omit<TickResult, "rotated">> {
    try {
      const result = await this.writer.reclaim()
      for (const failure of result.failures) {
        this.log.error("closing retired segment failed, will retry", failure, {
          segment: failure.segmentPath,
        })
      }
      return { reclaimed: result.closed, reclaimFailures: result.failures }
    } catch (err) {
      this.log.error("reclaim pass failed", err)
      return { reclaimed: [], reclaimFailures: [] }
    }
  }

  private loop(id: Loop["id"], intervalMs: number, run: () => Promise<unknown>): Loop {
    return { id, intervalMs, run, timer: undefined }
  }

  private scheduleNext(loop: Loop): void {
    // A tick finishing after a stop/start cycle belongs to a replaced loop
    if (!this.started || !this.loops.includes(loop)) return

    loop.timer = setTimeout(async () => {
      loop.timer = undefined
      if (!this.started) return
      const run = loop.run()
      this.inFlight.add(run)
      try {
        await run
      } catch (err) {
        this.log.error(`monitor ${loop.id} failed`, err)
      } finally {
        this.inFlight.delete(run)
      }
      this.scheduleNext(loop)
    }, loop.intervalMs)

    // Allow Node to exit cleanly if only timers remain
    loop.timer.unref()
  }
}
