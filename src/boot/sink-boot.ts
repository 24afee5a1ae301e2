// src/boot/sink-boot.ts — Diagnostic sink boot orchestrator
//
// Boot sequence: config → object store → open sink → start monitor → attach
// sources. Shutdown hooks drain and upload on SIGINT/SIGTERM.

import { loadConfig, type SinkConfig } from "../config.js"
import type { EventSource, LatencyEvent } from "../events/latency-source.js"
import { createLogger, type SinkLogger } from "../logger.js"
import type { ObjectStore } from "../storage/object-store.js"
import { S3ObjectStore } from "../storage/s3-object-store.js"
import { DiagnosticSink, sinkOptionsFromConfig } from "../sink/diagnostic-sink.js"
import type { UploadReport } from "../sink/upload-coordinator.js"

// ── Dependency injection interface ─────────────────────────

export interface SinkBootDeps {
  env?: Record<string, string | undefined>
  /** Replaces the S3 store built from config */
  store?: ObjectStore
  logger?: SinkLogger
  sources?: EventSource<LatencyEvent>[]
}

export interface SinkBootResult {
  config: SinkConfig
  sink: DiagnosticSink
}

export function createObjectStore(config: SinkConfig): S3ObjectStore {
  return new S3ObjectStore({
    endpoint: config.storage.endpoint,
    region: config.storage.region,
    bucket: config.storage.bucket,
    accessKeyId: config.storage.accessKeyId,
    secretAccessKey: config.storage.secretAccessKey,
  })
}

export async function bootDiagnosticSink(deps: SinkBootDeps = {}): Promise<SinkBootResult> {
  const log = deps.logger ?? createLogger("sink")
  const config = loadConfig(deps.env ?? process.env)
  const store = deps.store ?? createObjectStore(config)

  const sink = await DiagnosticSink.open({ ...sinkOptionsFromConfig(config, store), logger: log })
  sink.start()
  for (const source of deps.sources ?? []) {
    sink.attach(source)
  }

  log.info("boot complete", {
    dir: config.dir,
    base_name: config.baseName,
    bucket: config.storage.bucket,
    prefix: config.storage.prefix || undefined,
  })
  return { config, sink }
}

/**
 * Drain and upload once when the process is asked to stop.
 * Returns a function that removes the handlers.
 */
export function installShutdownHooks(
  sink: DiagnosticSink,
  onDone: (report: UploadReport | undefined, error?: unknown) => void,
  signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
): () => void {
  let shuttingDown = false
  const handler = () => {
    if (shuttingDown) return
    shuttingDown = true
    sink.shutdown().then(
      (report) => onDone(report),
      (err: unknown) => onDone(undefined, err),
    )
  }
  for (const signal of signals) process.on(signal, handler)
  return () => {
    for (const signal of signals) process.off(signal, handler)
  }
}
