import type { S3Event, S3EventRecord, SNSEvent, SNSEventRecord } from "aws-lambda"
import { z } from "zod"
import type { NotificationRecord } from "./@types/Pipeline"
import { MalformedNotificationError, errorMessage } from "./errors"

/** Sent by S3 when a notification configuration is saved; carries no records. */
export interface S3TestEvent {
  Service: string
  Event: string
  Bucket?: string
}

export type NotificationEvent = S3Event | SNSEvent | S3TestEvent

const S3NotificationRecordSchema = z.object({
  eventVersion: z.string().default(""),
  awsRegion: z.string().default(""),
  eventTime: z.string(),
  eventName: z.string(),
  s3: z.object({
    bucket: z.object({ name: z.string().min(1) }),
    object: z.object({
      key: z.string().min(1),
      // advisory only; an unusable size is dropped rather than failing the record
      size: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).optional().catch(undefined),
    }),
  }),
})

const SnsMessageSchema = z.object({
  Records: z.array(z.unknown()).optional(),
})

/** `+` stands for a space in notification keys, everything else is percent-encoded. */
export function decodeObjectKey(key: string): string {
  try {
    return decodeURIComponent(key.replace(/\+/g, " "))
  } catch (err) {
    throw new MalformedNotificationError(`Object key ${key} is not a valid URL-encoded string`, { cause: err })
  }
}

function isSnsRecord(record: S3EventRecord | SNSEventRecord): record is SNSEventRecord {
  return "Sns" in record
}

function unwrapSnsRecord(record: SNSEventRecord): unknown[] {
  let message: unknown
  try {
    message = JSON.parse(record.Sns.Message)
  } catch (err) {
    throw new MalformedNotificationError(`SNS message ${record.Sns.MessageId} is not JSON: ${errorMessage(err)}`, { cause: err })
  }

  const parsed = SnsMessageSchema.safeParse(message)
  if (!parsed.success) {
    throw new MalformedNotificationError(`SNS message ${record.Sns.MessageId} is not an S3 notification`)
  }
  return parsed.data.Records ?? []
}

/** Flattens direct and SNS-wrapped S3 notifications into raw S3 records, in delivery order. */
export function extractS3Records(event: NotificationEvent): unknown[] {
  if (!("Records" in event)) {
    return []
  }
  const records: Array<S3EventRecord | SNSEventRecord> = event.Records
  return records.flatMap(record => isSnsRecord(record) ? unwrapSnsRecord(record) : [record])
}

export function parseNotificationRecord(raw: unknown): NotificationRecord {
  const parsed = S3NotificationRecordSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    throw new MalformedNotificationError(`Invalid S3 notification record: ${issues}`)
  }

  const { s3, eventName, eventTime, awsRegion, eventVersion } = parsed.data
  return {
    bucket: s3.bucket.name,
    key: decodeObjectKey(s3.object.key),
    sizeHint: s3.object.size,
    eventName,
    eventTime,
    region: awsRegion,
    eventVersion,
  }
}
