// src/storage/s3-object-store.ts — ObjectStore adapter over @aws-sdk/client-s3
// Works against S3 and S3-compatible endpoints (R2, MinIO).

import { createHash } from "node:crypto"
import { readFile } from "node:fs/promises"
import {
  CreateBucketCommand,
  HeadBucketCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3"
import type { ObjectStore } from "./object-store.js"

export interface S3ObjectStoreConfig {
  /** Custom endpoint for S3-compatible stores; empty uses AWS */
  endpoint?: string
  region: string
  bucket: string
  /** Static credentials; when empty the SDK's default provider chain applies */
  accessKeyId?: string
  secretAccessKey?: string
  /** Pre-built client (tests) */
  client?: S3Client
}

function isS3StatusCode(err: unknown, code: number): boolean {
  return err instanceof S3ServiceException && err.$metadata?.httpStatusCode === code
}

function isAlreadyOwned(err: unknown): boolean {
  return err instanceof S3ServiceException && err.name === "BucketAlreadyOwnedByYou"
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client
  private readonly bucket: string
  private bucketReady: Promise<void> | undefined

  constructor(config: S3ObjectStoreConfig) {
    this.bucket = config.bucket
    this.client =
      config.client ??
      new S3Client({
        region: config.region,
        ...(config.endpoint ? { endpoint: config.endpoint } : {}),
        ...(config.accessKeyId && config.secretAccessKey
          ? {
              credentials: {
                accessKeyId: config.accessKeyId,
                secretAccessKey: config.secretAccessKey,
              },
            }
          : {}),
      })
  }

  get bucketName(): string {
    return this.bucket
  }

  async putFile(key: string, filePath: string): Promise<void> {
    await this.ensureBucket()

    const content = await readFile(filePath)
    const sha256 = createHash("sha256").update(content).digest("hex")
    await this.client.send(new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: content,
      ContentType: "text/plain; charset=utf-8",
      Metadata: { sha256 },
    }))
  }

  /** Create the bucket on first use if it does not exist. Retried after a failure. */
  ensureBucket(): Promise<void> {
    if (!this.bucketReady) {
      this.bucketReady = this.createBucketIfMissing().catch((err: unknown) => {
        this.bucketReady = undefined
        throw err
      })
    }
    return this.bucketReady
  }

  private async createBucketIfMissing(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }))
      return
    } catch (err) {
      if (!isS3StatusCode(err, 404)) throw err
    }

    try {
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }))
    } catch (err) {
      if (!isAlreadyOwned(err)) throw err
    }
  }
}
