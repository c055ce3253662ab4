import { mkdtemp } from "fs/promises"
import os from "os"
import path from "path"
import sharp from "sharp"
import { vi } from "vitest"
import type { S3Event, S3EventRecord } from "aws-lambda"
import type { AuditRecord, ObjectLocation } from "../lib/lambdas/resizer/@types/Pipeline"
import type { AuditStore } from "../lib/lambdas/resizer/audit"
import { StorageError } from "../lib/lambdas/resizer/errors"
import type { Logger } from "../lib/lambdas/resizer/logger"
import type { ObjectStorage, StoreOptions } from "../lib/lambdas/resizer/storage"

export interface StoredObject {
  location: ObjectLocation
  body: Buffer
  options: StoreOptions
}

/** In-memory bucket contents keyed by `bucket/key`. */
export class FakeObjectStorage implements ObjectStorage {
  readonly objects = new Map<string, Buffer>()
  readonly fetched: ObjectLocation[] = []
  readonly stored: StoredObject[] = []
  failStoreWith?: Error

  put(bucket: string, key: string, body: Buffer) {
    this.objects.set(`${bucket}/${key}`, body)
  }

  async fetch(location: ObjectLocation): Promise<Buffer> {
    this.fetched.push(location)
    const body = this.objects.get(`${location.bucket}/${location.key}`)
    if (!body) {
      throw new StorageError(`No such key ${location.key}`, "NotFound")
    }
    return body
  }

  async store(location: ObjectLocation, body: Buffer, options: StoreOptions): Promise<void> {
    if (this.failStoreWith) {
      throw this.failStoreWith
    }
    this.stored.push({ location, body, options })
  }
}

export class FakeAuditStore implements AuditStore {
  readonly records: AuditRecord[] = []
  failWith?: Error

  async put(record: AuditRecord): Promise<void> {
    if (this.failWith) {
      throw this.failWith
    }
    this.records.push(record)
  }
}

export function silentLogger() {
  return {
    log: vi.fn<Logger["log"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
  }
}

export function sequentialIds(prefix = "id") {
  let next = 0
  return () => `${prefix}-${++next}`
}

export function makeS3Record(key: string, overrides: { bucket?: string, size?: number } = {}): S3EventRecord {
  const bucket = overrides.bucket ?? "uploads"
  return {
    eventVersion: "2.1",
    eventSource: "aws:s3",
    awsRegion: "eu-west-1",
    eventTime: "2026-10-18T09:30:00.000Z",
    eventName: "ObjectCreated:Put",
    userIdentity: { principalId: "AWS:TESTUSER" },
    requestParameters: { sourceIPAddress: "127.0.0.1" },
    responseElements: { "x-amz-request-id": "request-1", "x-amz-id-2": "host-1" },
    s3: {
      s3SchemaVersion: "1.0",
      configurationId: "uploads-notification",
      bucket: { name: bucket, ownerIdentity: { principalId: "TESTOWNER" }, arn: `arn:aws:s3:::${bucket}` },
      object: { key, size: overrides.size ?? 1024, eTag: "test-etag", sequencer: "0001" },
    },
  }
}

export function makeS3Event(...records: S3EventRecord[]): S3Event {
  return { Records: records }
}

export async function createImage(width: number, height: number, format: "png" | "jpeg" = "png"): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 120, b: 40 } },
  }).toFormat(format).toBuffer()
}

/** A 400x400 noisy PNG cut in half: the header reads, the pixel data does not. */
export async function truncatedPng(): Promise<Buffer> {
  const bytes = await sharp({
    create: { width: 400, height: 400, channels: 3, noise: { type: "gaussian", mean: 128, sigma: 30 } },
  }).png().toBuffer()
  return bytes.subarray(0, Math.floor(bytes.length / 2))
}

export async function makeScratchDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "resizer-test-"))
}
