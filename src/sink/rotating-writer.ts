// src/sink/rotating-writer.ts — Active segment ownership, append and rotation
//
// The active segment is a single reference swapped by one synchronous
// assignment, so every append sees either the old segment or the new one.
// Appends capture the reference before their write is queued: an append that
// started before a swap completes against the old segment.

import { mkdir } from "node:fs/promises"
import { join } from "node:path"
import { RotationError } from "./errors.js"
import { RetiredWriterSet, type ReclaimResult } from "./retired-set.js"
import { Segment, openSegmentFile, type OpenSegmentFile } from "./segment.js"
import { segmentFileName } from "./segment-name.js"

export interface RotatingWriterOptions {
  /** Directory holding the segment files */
  dir: string
  /** File name of segment 0; later segments append `-<n>` */
  baseName: string
  /** Override for file opening (tests inject failures here) */
  openFile?: OpenSegmentFile
}

export interface SegmentInfo {
  path: string
  sequence: number
  approximateSize: number
}

export class RotatingWriter {
  private active: Segment
  private nextSequence: number
  private rotating: Promise<Segment> | undefined
  private closed = false
  private readonly retired = new RetiredWriterSet()

  private constructor(
    private readonly options: RotatingWriterOptions,
    initial: Segment,
  ) {
    this.active = initial
    this.nextSequence = initial.sequence + 1
  }

  /** Create the directory if needed and open segment 0 in append mode. */
  static async open(options: RotatingWriterOptions): Promise<RotatingWriter> {
    await mkdir(options.dir, { recursive: true })
    const path = join(options.dir, segmentFileName(options.baseName, 0))
    const initial = await Segment.open(path, 0, "append", options.openFile ?? openSegmentFile)
    return new RotatingWriter(options, initial)
  }

  /** Append one newline-terminated record to the active segment. */
  append(record: string): Promise<void> {
    return this.active.write(`${record}\n`)
  }

  /** Non-blocking snapshot; size counts completed writes only. */
  currentSegmentInfo(): SegmentInfo {
    const segment = this.active
    return { path: segment.path, sequence: segment.sequence, approximateSize: segment.size }
  }

  get retiredCount(): number {
    return this.retired.size
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Open the next segment, publish it as active and retire the previous one.
   * Concurrent calls are serialized; each produces its own segment.
   */
  rotate(): Promise<Segment> {
    const previous = this.rotating ?? Promise.resolve(this.active)
    const next = previous.then(
      () => this.rotateNow(),
      () => this.rotateNow(),
    )
    this.rotating = next
    return next.finally(() => {
      if (this.rotating === next) this.rotating = undefined
    })
  }

  /** Close retired segments; failures stay retired for the next pass. */
  reclaim(): Promise<ReclaimResult> {
    return this.retired.drain()
  }

  /** End the writing phase: no further rotation, active segment closed. */
  async closeActive(): Promise<void> {
    this.closed = true
    if (this.rotating) {
      await this.rotating.then(
        () => undefined,
        () => undefined,
      )
    }
    await this.active.close()
  }

  private async rotateNow(): Promise<Segment> {
    const sequence = this.nextSequence
    const path = join(this.options.dir, segmentFileName(this.options.baseName, sequence))
    if (this.closed) {
      throw new RotationError(path, new Error("writer is closed"))
    }

    let segment: Segment
    try {
      segment = await Segment.open(path, sequence, "truncate", this.options.openFile ?? openSegmentFile)
    } catch (err) {
      throw new RotationError(path, err)
    }

    // closeActive() may have run while the file was opening
    if (this.closed) {
      await segment.close()
      throw new RotationError(path, new Error("writer closed during rotation"))
    }

    this.nextSequence = sequence + 1
    const old = this.active
    this.active = segment
    this.retired.add(old)
    return segment
  }
}
