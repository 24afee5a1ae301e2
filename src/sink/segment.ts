// src/sink/segment.ts — One append-only segment file with a serialized write queue

import { open } from "node:fs/promises"
import { AppendError } from "./errors.js"

/** The slice of `FileHandle` a segment needs. */
export interface SegmentHandle {
  appendFile(data: Uint8Array): Promise<void>
  stat(): Promise<{ size: number }>
  close(): Promise<void>
}

export type OpenSegmentFile = (path: string, flags: "a" | "w") => Promise<SegmentHandle>

export const openSegmentFile: OpenSegmentFile = (path, flags) => open(path, flags)

export type SegmentState = "open" | "closing" | "closed"

export class Segment {
  /** Tail of the write queue. Never rejects; failures go to the caller of write(). */
  private tail: Promise<void> = Promise.resolve()
  private pending: Promise<void> | undefined
  private closed = false
  private bytes: number

  private constructor(
    readonly path: string,
    readonly sequence: number,
    private readonly handle: SegmentHandle,
    initialSize: number,
  ) {
    this.bytes = initialSize
  }

  /**
   * Open a segment file. `append` keeps existing content (initial segment),
   * `truncate` starts empty (rotated segments).
   */
  static async open(
    path: string,
    sequence: number,
    mode: "append" | "truncate",
    openFile: OpenSegmentFile = openSegmentFile,
  ): Promise<Segment> {
    const handle = await openFile(path, mode === "append" ? "a" : "w")
    let size: number
    try {
      size = (await handle.stat()).size
    } catch (err) {
      await handle.close()
      throw err
    }
    return new Segment(path, sequence, handle, size)
  }

  get state(): SegmentState {
    if (this.closed) return "closed"
    return this.pending ? "closing" : "open"
  }

  /** Bytes on disk: initial size plus every completed write. */
  get size(): number {
    return this.bytes
  }

  /**
   * Queue one write. Writes complete in call order and never interleave.
   * Rejects with AppendError once the segment is closing or closed.
   */
  write(data: string): Promise<void> {
    if (this.state !== "open") {
      return Promise.reject(new AppendError(this.path, new Error(`segment is ${this.state}`)))
    }

    const buf = Buffer.from(data, "utf-8")
    const run = this.tail.then(async () => {
      try {
        await this.handle.appendFile(buf)
      } catch (err) {
        throw new AppendError(this.path, err)
      }
      this.bytes += buf.length
    })
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  /**
   * Close after every queued write has settled. Concurrent callers share one
   * attempt; after success further calls resolve immediately; after failure
   * the next call tries again.
   */
  close(): Promise<void> {
    if (this.closed) return Promise.resolve()
    if (!this.pending) {
      this.pending = this.tail
        .then(() => this.handle.close())
        .then(
          () => {
            this.closed = true
            this.pending = undefined
          },
          (err: unknown) => {
            this.pending = undefined
            throw err
          },
        )
    }
    return this.pending
  }
}
