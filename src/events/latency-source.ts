// src/events/latency-source.ts — Latency events emitted by the benchmark process

import { EventEmitter } from "node:events"

/** One request's latency and its diagnostics dump. Opaque to the sink. */
export interface LatencyEvent {
  databaseName: string
  containerName: string
  latencyMs: number
  diagnostics: string
}

export type Unsubscribe = () => void

export interface EventSource<T> {
  subscribe(listener: (event: T) => void): Unsubscribe
}

export const LATENCY_EVENT = "latency"

export class LatencyEventSource extends EventEmitter implements EventSource<LatencyEvent> {
  subscribe(listener: (event: LatencyEvent) => void): Unsubscribe {
    this.on(LATENCY_EVENT, listener)
    return () => {
      this.off(LATENCY_EVENT, listener)
    }
  }

  /** Deliver one event to every subscriber synchronously. */
  emitLatency(event: LatencyEvent): boolean {
    return this.emit(LATENCY_EVENT, event)
  }
}
