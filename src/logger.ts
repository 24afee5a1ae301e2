// src/logger.ts — Structured sink logger
//
// Outputs timestamped JSON lines to the console. Components take a logger by
// injection so tests can capture what was reported.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "info" | "warn" | "error"

/** Structured log entry shape */
export interface SinkLogEntry {
  timestamp: string
  level: LogLevel
  component: string
  message: string
  error?: string
  error_name?: string
  [key: string]: unknown
}

export interface SinkLogger {
  info(message: string, metadata?: Record<string, unknown>): void
  warn(message: string, metadata?: Record<string, unknown>): void
  /** Log a failure; `error` may be any thrown value */
  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void
  /** Derive a logger for a sub-component ("sink" → "sink.monitor") */
  child(component: string): SinkLogger
}

// ---------------------------------------------------------------------------
// Default Implementation
// ---------------------------------------------------------------------------

class ConsoleSinkLogger implements SinkLogger {
  constructor(private readonly component: string) {}

  info(message: string, metadata?: Record<string, unknown>): void {
    console.log(JSON.stringify(this.entry("info", message, metadata)))
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    console.warn(JSON.stringify(this.entry("warn", message, metadata)))
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    const entry = this.entry("error", message, metadata)
    if (error !== undefined) {
      entry.error = error instanceof Error ? error.message : String(error)
      if (error instanceof Error) entry.error_name = error.name
    }
    console.error(JSON.stringify(entry))
  }

  child(component: string): SinkLogger {
    return new ConsoleSinkLogger(`${this.component}.${component}`)
  }

  private entry(level: LogLevel, message: string, metadata?: Record<string, unknown>): SinkLogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...(metadata ?? {}),
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createLogger(component: string): SinkLogger {
  return new ConsoleSinkLogger(component)
}
