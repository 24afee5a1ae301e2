// src/storage/remote-name.ts — Object key for an uploaded segment

export interface RemoteNameParts {
  hostId: string
  /** Optional key prefix; empty or undefined means none */
  prefix?: string
  index: number
}

/**
 * `[<prefix>/]<host>-<host>-<index>.out`. Unique per host per run as long as
 * segment indexes are unique. Slashes around the prefix are trimmed.
 */
export function remoteObjectName({ hostId, prefix, index }: RemoteNameParts): string {
  if (!hostId) {
    throw new Error("Remote object name requires a host id")
  }
  const name = `${hostId}-${hostId}-${index}.out`
  const trimmed = (prefix ?? "").replace(/^\/+|\/+$/g, "")
  return trimmed ? `${trimmed}/${name}` : name
}
