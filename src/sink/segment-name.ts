// src/sink/segment-name.ts — Local segment file naming
//
// Layout: the initial segment (sequence 0) is `<base>`; the segment created by
// the k-th rotation (sequence k) is `<base>-<k-1>`.

import { readdir } from "node:fs/promises"
import { join } from "node:path"

export interface SegmentFile {
  path: string
  sequence: number
}

export function segmentFileName(baseName: string, sequence: number): string {
  if (!Number.isInteger(sequence) || sequence < 0) {
    throw new Error(`Segment sequence must be a non-negative integer (got ${sequence})`)
  }
  return sequence === 0 ? baseName : `${baseName}-${sequence - 1}`
}

/** Inverse of segmentFileName. Returns undefined for files outside the pattern. */
export function parseSegmentSequence(baseName: string, fileName: string): number | undefined {
  if (fileName === baseName) return 0
  if (!fileName.startsWith(`${baseName}-`)) return undefined

  const suffix = fileName.slice(baseName.length + 1)
  if (!/^(0|[1-9][0-9]*)$/.test(suffix)) return undefined
  const n = Number(suffix)
  return Number.isSafeInteger(n) ? n + 1 : undefined
}

/** All segment files in `dir`, in increasing sequence order. */
export async function listSegmentFiles(dir: string, baseName: string): Promise<SegmentFile[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  const files: SegmentFile[] = []
  for (const entry of entries) {
    if (!entry.isFile()) continue
    const sequence = parseSegmentSequence(baseName, entry.name)
    if (sequence === undefined) continue
    files.push({ path: join(dir, entry.name), sequence })
  }
  return files.sort((a, b) => a.sequence - b.sequence)
}
