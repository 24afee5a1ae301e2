// src/sink/retired-set.ts — Segments superseded by rotation, awaiting close

import { ReclaimError } from "./errors.js"
import type { Segment } from "./segment.js"

export interface ReclaimResult {
  closed: string[]
  failures: ReclaimError[]
}

export class RetiredWriterSet {
  private readonly segments = new Set<Segment>()

  get size(): number {
    return this.segments.size
  }

  /** Add a segment retired by rotation. Adding twice is a no-op. */
  add(segment: Segment): void {
    this.segments.add(segment)
  }

  /**
   * One close attempt per retired segment. Closed segments leave the set;
   * failed ones stay for the next pass. Overlapping drains share each
   * segment's close, so nothing is removed twice.
   */
  async drain(): Promise<ReclaimResult> {
    const snapshot = [...this.segments]
    const outcomes = await Promise.allSettled(snapshot.map((s) => s.close()))

    const result: ReclaimResult = { closed: [], failures: [] }
    outcomes.forEach((outcome, i) => {
      const segment = snapshot[i]
      if (outcome.status === "fulfilled") {
        if (this.segments.delete(segment)) result.closed.push(segment.path)
      } else {
        result.failures.push(new ReclaimError(segment.path, outcome.reason))
      }
    })
    return result
  }
}
