// src/config.ts — Configuration loader from environment variables

import { hostname } from "node:os"
import { ConfigError } from "./sink/errors.js"

export interface SinkConfig {
  /** Directory for local segment files */
  dir: string
  /** File name of the first segment */
  baseName: string
  /** Host identifier used in remote object names */
  hostId: string

  rotation: {
    maxSegmentBytes: number
    checkIntervalMs: number
    reclaimIntervalMs: number
  }

  storage: {
    endpoint: string
    region: string
    bucket: string
    accessKeyId: string
    secretAccessKey: string
    /** Key prefix; empty means objects sit at the bucket root */
    prefix: string
  }
}

export const DEFAULT_BASE_NAME = "BenchmarkDiagnostics.out"
export const DEFAULT_BUCKET = "diagnostics"

type Env = Record<string, string | undefined>

/** Parse a positive integer from an environment variable, failing fast otherwise. */
function parsePositiveIntEnv(env: Env, key: string, fallback: string): number {
  const raw = (env[key] ?? fallback).trim()
  const value = Number(raw)
  if (!/^[0-9]+$/.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer (got "${raw}")`)
  }
  return value
}

export function loadConfig(env: Env = process.env): SinkConfig {
  const checkIntervalMs = parsePositiveIntEnv(env, "SINK_CHECK_INTERVAL_MS", "5000")

  const baseName = env.SINK_BASE_NAME ?? DEFAULT_BASE_NAME
  if (!baseName || baseName.includes("/") || baseName.includes("\\")) {
    throw new ConfigError(`SINK_BASE_NAME must be a plain file name (got "${baseName}")`)
  }

  return {
    dir: env.SINK_DIR ?? ".",
    baseName,
    hostId: env.SINK_HOST_ID || hostname(),

    rotation: {
      maxSegmentBytes: parsePositiveIntEnv(env, "SINK_MAX_SEGMENT_BYTES", "100000000"),
      checkIntervalMs,
      reclaimIntervalMs: parsePositiveIntEnv(env, "SINK_RECLAIM_INTERVAL_MS", String(checkIntervalMs)),
    },

    storage: {
      endpoint: env.SINK_STORAGE_ENDPOINT ?? "",
      region: env.SINK_STORAGE_REGION ?? "auto",
      bucket: env.SINK_STORAGE_BUCKET ?? DEFAULT_BUCKET,
      accessKeyId: env.SINK_STORAGE_ACCESS_KEY_ID ?? "",
      secretAccessKey: env.SINK_STORAGE_SECRET_ACCESS_KEY ?? "",
      prefix: env.SINK_STORAGE_PREFIX ?? "",
    },
  }
}
