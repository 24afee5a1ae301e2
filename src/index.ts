// src/index.ts — Barrel export

export { loadConfig, DEFAULT_BASE_NAME, DEFAULT_BUCKET } from "./config.js"
export type { SinkConfig } from "./config.js"

export { createLogger } from "./logger.js"
export type { SinkLogger, SinkLogEntry, LogLevel } from "./logger.js"

export { LatencyEventSource, LATENCY_EVENT } from "./events/latency-source.js"
export type { LatencyEvent, EventSource, Unsubscribe } from "./events/latency-source.js"

export {
  SinkError,
  AppendError,
  RotationError,
  ReclaimError,
  UploadError,
  ListingError,
  SinkStateError,
  ConfigError,
} from "./sink/errors.js"
export { Segment } from "./sink/segment.js"
export type { SegmentState, SegmentHandle, OpenSegmentFile } from "./sink/segment.js"
export { segmentFileName, parseSegmentSequence, listSegmentFiles } from "./sink/segment-name.js"
export type { SegmentFile } from "./sink/segment-name.js"
export { RetiredWriterSet } from "./sink/retired-set.js"
export type { ReclaimResult } from "./sink/retired-set.js"
export { RotatingWriter } from "./sink/rotating-writer.js"
export type { RotatingWriterOptions, SegmentInfo } from "./sink/rotating-writer.js"
export {
  RotationMonitor,
  DEFAULT_MAX_SEGMENT_BYTES,
  DEFAULT_CHECK_INTERVAL_MS,
} from "./sink/rotation-monitor.js"
export type { RotationMonitorOptions, RotationCheck, TickResult } from "./sink/rotation-monitor.js"
export { UploadCoordinator } from "./sink/upload-coordinator.js"
export type {
  SinkState,
  UploadReport,
  UploadFailure,
  UploadCoordinatorOptions,
} from "./sink/upload-coordinator.js"
export { DiagnosticSink, formatLatencyRecord, sinkOptionsFromConfig } from "./sink/diagnostic-sink.js"
export type { DiagnosticSinkOptions } from "./sink/diagnostic-sink.js"

export type { ObjectStore } from "./storage/object-store.js"
export { S3ObjectStore } from "./storage/s3-object-store.js"
export type { S3ObjectStoreConfig } from "./storage/s3-object-store.js"
export { remoteObjectName } from "./storage/remote-name.js"
export type { RemoteNameParts } from "./storage/remote-name.js"

export { bootDiagnosticSink, createObjectStore, installShutdownHooks } from "./boot/sink-boot.js"
export type { SinkBootDeps, SinkBootResult } from "./boot/sink-boot.js"
