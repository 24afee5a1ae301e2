// src/sink/upload-coordinator.ts — Drain all segments, then ship them to object storage
//
// Lifecycle: recording → draining (flush) → uploaded (uploadAll). The move out
// of recording is one-way. uploadAll may run again from uploaded: puts
// overwrite, so a re-run after a partial failure is safe.

import type { SinkLogger } from "../logger.js"
import type { ObjectStore } from "../storage/object-store.js"
import { remoteObjectName } from "../storage/remote-name.js"
import { ListingError, SinkStateError, UploadError } from "./errors.js"
import type { RotatingWriter } from "./rotating-writer.js"
import { listSegmentFiles, type SegmentFile } from "./segment-name.js"

export type SinkState = "recording" | "draining" | "uploaded"

export interface UploadCoordinatorOptions {
  dir: string
  baseName: string
  hostId: string
  prefix?: string
  store: ObjectStore
  logger: SinkLogger
}

export interface UploadFailure {
  path: string
  key: string
  error: UploadError
}

export interface UploadReport {
  /** Object keys uploaded, in sequence order */
  succeeded: string[]
  failed: UploadFailure[]
  /** Set when the segment directory could not be listed */
  listingError?: ListingError
}

export class UploadCoordinator {
  private current: SinkState = "recording"
  private flushing: Promise<void> | undefined
  private readonly log: SinkLogger

  constructor(
    private readonly writer: RotatingWriter,
    private readonly options: UploadCoordinatorOptions,
  ) {
    this.log = options.logger
  }

  get state(): SinkState {
    return this.current
  }

  /**
   * Close every retired segment, then the active one. Failures are logged;
   * flush itself never rejects. Calling it again returns the same drain.
   */
  flush(): Promise<void> {
    if (!this.flushing) {
      this.current = "draining"
      this.flushing = this.drain()
    }
    return this.flushing
  }

  async uploadAll(): Promise<UploadReport> {
    if (this.current === "recording") {
      throw new SinkStateError("flush() must complete before uploadAll()")
    }
    await this.flush()

    const report: UploadReport = { succeeded: [], failed: [] }
    let files: SegmentFile[]
    try {
      files = await listSegmentFiles(this.options.dir, this.options.baseName)
    } catch (err) {
      report.listingError = new ListingError(this.options.dir, err)
      this.log.error("listing segment files failed", report.listingError, { dir: this.options.dir })
      this.current = "uploaded"
      return report
    }

    this.log.info("uploading diagnostics", { files: files.length })
    for (const [i, file] of files.entries()) {
      const key = remoteObjectName({
        hostId: this.options.hostId,
        prefix: this.options.prefix,
        index: file.sequence,
      })
      this.log.info(`uploading ${i + 1} of ${files.length}`, { file: file.path, key })

      try {
        await this.options.store.putFile(key, file.path)
        report.succeeded.push(key)
      } catch (err) {
        const error = new UploadError(file.path, key, err)
        this.log.error("segment upload failed", error, { file: file.path, key })
        report.failed.push({ path: file.path, key, error })
      }
    }

    this.current = "uploaded"
    this.log.info("upload finished", {
      succeeded: report.succeeded.length,
      failed: report.failed.length,
    })
    return report
  }

  private async drain(): Promise<void> {
    const reclaim = await this.writer.reclaim()
    for (const failure of reclaim.failures) {
      this.log.error("closing retired segment failed", failure, { segment: failure.segmentPath })
    }

    try {
      await this.writer.closeActive()
    } catch (err) {
      this.log.error("closing active segment failed", err, {
        segment: this.writer.currentSegmentInfo().path,
      })
    }

    // A rotation may have swapped segments between the first pass and
    // closeActive(); the segment it retired still needs closing
    if (this.writer.retiredCount > 0) {
      const late = await this.writer.reclaim()
      for (const failure of late.failures) {
        this.log.error("closing retired segment failed", failure, { segment: failure.segmentPath })
      }
    }
  }
}
