import path from "path"
import { differenceInMilliseconds } from "date-fns"
import { v4 as uuidv4 } from "uuid"
import type { AuditRecord, NotificationRecord, RecordResult } from "./@types/Pipeline"
import { ok, err } from "./@types/Pipeline"
import { TemporaryArtifacts } from "./artifacts"
import type { AuditStore } from "./audit"
import type { RasterCodec } from "./codec"
import { PersistenceError, errorMessage, toPipelineError } from "./errors"
import type { Logger } from "./logger"
import { extractMetadata } from "./metadata"
import { assertMeasurable, computeDerivedMetrics, toDimensionString } from "./metrics"
import { parseNotificationRecord } from "./notifications"
import { resizeImage } from "./resize"
import { type ObjectStorage, toStorageError } from "./storage"

export interface RecordProcessorOptions {
  storage: ObjectStorage
  auditStore: AuditStore
  codec: RasterCodec
  logger: Logger
  destinationBucket: string
  scratchDir: string
  resizedKeyPrefix: string
  now?: () => Date
  newId?: () => string
}

export class RecordProcessor {
  private readonly now: () => Date
  private readonly newId: () => string

  constructor(private readonly options: RecordProcessorOptions) {
    this.now = options.now ?? (() => new Date())
    this.newId = options.newId ?? uuidv4
  }

  async process(raw: unknown): Promise<RecordResult> {
    const { logger, scratchDir } = this.options

    let record: NotificationRecord
    try {
      record = parseNotificationRecord(raw)
    } catch (e) {
      const error = toPipelineError(e)
      logger.error(`Error parsing notification record: ${error.message}`)
      return err({ kind: error.kind, error })
    }

    const baseName = path.posix.basename(record.key)
    const artifacts = new TemporaryArtifacts(scratchDir, baseName, logger, this.newId())
    try {
      const audit = await this.transform(record, baseName, artifacts)
      logger.log(`Successfully processed ${record.key}. Original: ${audit.original.sizeBytes} bytes, Resized: ${audit.resized.sizeBytes} bytes`)
      return ok({
        record,
        audit,
        originalBytes: audit.original.sizeBytes,
        resizedBytes: audit.resized.sizeBytes,
      })
    } catch (e) {
      const error = toPipelineError(e)
      logger.error(`Error processing ${record.key}: ${error.message}`)
      return err({ record, kind: error.kind, error })
    } finally {
      await artifacts.release()
    }
  }

  private async transform(record: NotificationRecord, baseName: string, artifacts: TemporaryArtifacts): Promise<AuditRecord> {
    const { storage, auditStore, codec, destinationBucket, resizedKeyPrefix } = this.options
    const startedAt = this.now()

    const source = { bucket: record.bucket, key: record.key }
    let sourceBytes: Buffer
    try {
      sourceBytes = await storage.fetch(source)
    } catch (e) {
      throw toStorageError(e, "fetch", source)
    }
    await artifacts.write("original", sourceBytes)

    const original = await extractMetadata(artifacts.paths.original, codec)
    assertMeasurable(original.metadata)

    const resizedImage = await resizeImage(original.raster, codec)
    await artifacts.write("resized", resizedImage.bytes)
    const resized = await extractMetadata(artifacts.paths.resized, codec)

    const metrics = computeDerivedMetrics(original.metadata, resized.metadata, resizedImage.result)

    const destination = { bucket: destinationBucket, key: `${resizedKeyPrefix}${baseName}` }
    const processedAt = this.now()
    const processingTime = processedAt.toISOString()
    try {
      await storage.store(destination, resizedImage.bytes, {
        contentType: `image/${resized.metadata.format.toLowerCase()}`,
        metadata: {
          original_filename: baseName,
          original_bucket: record.bucket,
          resized_dimensions: toDimensionString(resizedImage.result.target),
          processing_time: processingTime,
        },
      })
    } catch (e) {
      throw toStorageError(e, "store", destination)
    }

    const audit: AuditRecord = {
      resourceId: this.newId(),
      eventTime: record.eventTime,
      eventType: record.eventName,
      originalBucket: record.bucket,
      originalObjectKey: record.key,
      originalSize: record.sizeHint ?? -1,
      original: original.metadata,
      resizedBucket: destination.bucket,
      resizedObjectKey: destination.key,
      resized: resized.metadata,
      processingTime,
      processingDurationMs: differenceInMilliseconds(processedAt, startedAt),
      metrics,
      eventSource: "aws:s3",
      awsRegion: record.region,
      eventVersion: record.eventVersion,
    }

    try {
      await auditStore.put(audit)
    } catch (e) {
      throw e instanceof PersistenceError
        ? e
        : new PersistenceError(`Failed to write audit record ${audit.resourceId}: ${errorMessage(e)}`, { cause: e })
    }

    return audit
  }
}
