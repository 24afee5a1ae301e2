// src/storage/object-store.ts — Remote object storage port

export interface ObjectStore {
  /**
   * Upload a local file under `key`, replacing any existing object.
   * Re-uploading the same key must succeed.
   */
  putFile(key: string, filePath: string): Promise<void>
}
