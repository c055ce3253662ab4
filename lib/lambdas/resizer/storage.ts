import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  S3ServiceException,
} from "@aws-sdk/client-s3"
import { Readable } from "stream"
import type { ObjectLocation } from "./@types/Pipeline"
import { StorageError, type StorageFailureReason, errorMessage } from "./errors"

export interface StoreOptions {
  metadata: Record<string, string>
  contentType?: string
}

export interface ObjectStorage {
  fetch(location: ObjectLocation): Promise<Buffer>
  store(location: ObjectLocation, body: Buffer, options: StoreOptions): Promise<void>
}

const notFoundNames = new Set(["NoSuchKey", "NoSuchBucket", "NotFound"])
const accessDeniedNames = new Set(["AccessDenied", "Forbidden", "InvalidAccessKeyId"])

export function toStorageFailureReason(err: unknown): StorageFailureReason {
  if (!(err instanceof S3ServiceException)) {
    return "Unknown"
  }
  const status = err.$metadata.httpStatusCode
  if (notFoundNames.has(err.name) || status === 404) {
    return "NotFound"
  }
  if (accessDeniedNames.has(err.name) || status === 403) {
    return "AccessDenied"
  }
  return "Unknown"
}

export function toStorageError(err: unknown, operation: "fetch" | "store", { bucket, key }: ObjectLocation): StorageError {
  if (err instanceof StorageError) {
    return err
  }
  return new StorageError(
    `Failed to ${operation} s3://${bucket}/${key}: ${errorMessage(err)}`,
    toStorageFailureReason(err),
    { cause: err },
  )
}

async function toArrayBuffer(stream: Readable): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = []
    stream.on('data', chunk => chunks.push(Buffer.from(chunk)))
    stream.once('end', () => resolve(Buffer.concat(chunks)))
    stream.once('error', reject)
  })
}

export class S3ObjectStorage implements ObjectStorage {
  constructor(private readonly s3Client: S3Client) {}

  async fetch(location: ObjectLocation): Promise<Buffer> {
    try {
      const object = await this.s3Client.send(new GetObjectCommand({
        Bucket: location.bucket,
        Key: location.key,
      }))
      if (!object.Body) {
        throw new StorageError(`Empty body for s3://${location.bucket}/${location.key}`)
      }
      if (object.Body instanceof Readable) {
        return await toArrayBuffer(object.Body)
      }
      return Buffer.from(await object.Body.transformToByteArray())
    } catch (err) {
      throw toStorageError(err, "fetch", location)
    }
  }

  async store(location: ObjectLocation, body: Buffer, { metadata, contentType }: StoreOptions): Promise<void> {
    try {
      await this.s3Client.send(new PutObjectCommand({
        Bucket: location.bucket,
        Key: location.key,
        Body: body,
        ContentType: contentType,
        Metadata: metadata,
      }))
    } catch (err) {
      throw toStorageError(err, "store", location)
    }
  }
}
