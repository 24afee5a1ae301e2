// src/sink/diagnostic-sink.ts — Latency events → rotating segments → object storage
//
// Boot: open segment 0 → start monitor → attach sources.
// Shutdown: stop monitor → detach → flush → upload.

import { ulid } from "ulid"
import type { SinkConfig } from "../config.js"
import type { EventSource, LatencyEvent, Unsubscribe } from "../events/latency-source.js"
import { createLogger, type SinkLogger } from "../logger.js"
import type { ObjectStore } from "../storage/object-store.js"
import { RotatingWriter } from "./rotating-writer.js"
import { RotationMonitor, type TickResult } from "./rotation-monitor.js"
import type { OpenSegmentFile } from "./segment.js"
import { UploadCoordinator, type SinkState, type UploadReport } from "./upload-coordinator.js"

export interface DiagnosticSinkOptions {
  dir: string
  baseName: string
  hostId: string
  store: ObjectStore
  prefix?: string
  maxSegmentBytes?: number
  checkIntervalMs?: number
  reclaimIntervalMs?: number
  logger?: SinkLogger
  openFile?: OpenSegmentFile
}

/** Build sink options from a loaded config and a store. */
export function sinkOptionsFromConfig(config: SinkConfig, store: ObjectStore): DiagnosticSinkOptions {
  return {
    dir: config.dir,
    baseName: config.baseName,
    hostId: config.hostId,
    store,
    prefix: config.storage.prefix,
    maxSegmentBytes: config.rotation.maxSegmentBytes,
    checkIntervalMs: config.rotation.checkIntervalMs,
    reclaimIntervalMs: config.rotation.reclaimIntervalMs,
  }
}

/** `<latency> ; <diagnostics>` on one line; embedded line breaks are escaped. */
export function formatLatencyRecord(event: LatencyEvent): string {
  const oneLine = (value: unknown) => String(value).replace(/\r?\n/g, "\\n")
  return `${oneLine(event.latencyMs)} ; ${oneLine(event.diagnostics)}`
}

export class DiagnosticSink {
  readonly runId: string
  private readonly monitor: RotationMonitor
  private readonly coordinator: UploadCoordinator
  private readonly subscriptions = new Set<Unsubscribe>()
  private dropped = 0

  private constructor(
    private readonly writer: RotatingWriter,
    private readonly log: SinkLogger,
    options: DiagnosticSinkOptions,
  ) {
    this.runId = ulid()
    this.monitor = new RotationMonitor(writer, {
      maxSegmentBytes: options.maxSegmentBytes,
      checkIntervalMs: options.checkIntervalMs,
      reclaimIntervalMs: options.reclaimIntervalMs,
      logger: log.child("monitor"),
    })
    this.coordinator = new UploadCoordinator(writer, {
      dir: options.dir,
      baseName: options.baseName,
      hostId: options.hostId,
      prefix: options.prefix,
      store: options.store,
      logger: log.child("upload"),
    })
  }

  static async open(options: DiagnosticSinkOptions): Promise<DiagnosticSink> {
    const log = options.logger ?? createLogger("sink")
    const writer = await RotatingWriter.open({
      dir: options.dir,
      baseName: options.baseName,
      openFile: options.openFile,
    })
    const sink = new DiagnosticSink(writer, log, options)
    log.info("diagnostic sink opened", {
      run_id: sink.runId,
      segment: writer.currentSegmentInfo().path,
      host_id: options.hostId,
    })
    return sink
  }

  get state(): SinkState {
    return this.coordinator.state
  }

  /** Records dropped after an append failure */
  get droppedRecords(): number {
    return this.dropped
  }

  get rotationMonitor(): RotationMonitor {
    return this.monitor
  }

  get rotatingWriter(): RotatingWriter {
    return this.writer
  }

  /** Start the background rotation monitor. */
  start(): void {
    if (this.state !== "recording") return
    this.monitor.start()
  }

  /** Subscribe to a source; each event becomes one line. */
  attach(source: EventSource<LatencyEvent>): Unsubscribe {
    const unsubscribe = source.subscribe((event) => {
      void this.record(formatLatencyRecord(event))
    })
    this.subscriptions.add(unsubscribe)
    return () => {
      if (this.subscriptions.delete(unsubscribe)) unsubscribe()
    }
  }

  /**
   * Append one line. Never rejects: a failed append is logged and the record
   * dropped. Resolves true when the line was written.
   */
  async record(line: string): Promise<boolean> {
    try {
      await this.writer.append(line)
      return true
    } catch (err) {
      this.dropped++
      this.log.error("writing diagnostic record failed, dropped", err, {
        dropped_total: this.dropped,
      })
      return false
    }
  }

  /** One monitor tick outside the timer. */
  tick(): Promise<TickResult> {
    return this.monitor.runOnce()
  }

  flush(): Promise<void> {
    return this.coordinator.flush()
  }

  uploadAll(): Promise<UploadReport> {
    return this.coordinator.uploadAll()
  }

  /** Stop capturing, drain every segment and upload them. */
  async shutdown(): Promise<UploadReport> {
    await this.monitor.stop()
    for (const unsubscribe of this.subscriptions) unsubscribe()
    this.subscriptions.clear()

    await this.flush()
    const report = await this.uploadAll()
    this.log.info("diagnostic sink shut down", {
      run_id: this.runId,
      uploaded: report.succeeded.length,
      failed: report.failed.length,
      listing_failed: report.listingError !== undefined,
      dropped_records: this.dropped,
    })
    return report
  }
}
