import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import fs from "fs-extra"
import type { SNSEvent } from "aws-lambda"
import { BatchCoordinator } from "../lib/lambdas/resizer/batch"
import { SharpCodec } from "../lib/lambdas/resizer/codec"
import type { BatchPolicy } from "../lib/lambdas/resizer/config"
import { BatchProcessingError, ConfigurationError, DecodeError } from "../lib/lambdas/resizer/errors"
import { createHandler, handler } from "../lib/lambdas/resizer/index"
import { RecordProcessor } from "../lib/lambdas/resizer/processor"
import {
  FakeAuditStore,
  FakeObjectStorage,
  createImage,
  makeS3Event,
  makeS3Record,
  makeScratchDir,
  silentLogger,
} from "./helpers"

function viaSns(message: object): SNSEvent {
  return {
    Records: [{
      EventVersion: "1.0",
      EventSubscriptionArn: "arn:aws:sns:eu-west-1:123456789012:uploads:sub",
      EventSource: "aws:sns",
      Sns: {
        SignatureVersion: "1",
        Timestamp: "2026-10-18T09:30:01.000Z",
        Signature: "test-signature",
        SigningCertUrl: "https://example.com/cert.pem",
        MessageId: "message-1",
        Message: JSON.stringify(message),
        MessageAttributes: {},
        Type: "Notification",
        UnsubscribeUrl: "https://example.com/unsubscribe",
        TopicArn: "arn:aws:sns:eu-west-1:123456789012:uploads",
        Subject: "Amazon S3 Notification",
      },
    }],
  }
}

describe("resizer handler", () => {
  let scratchDir: string
  let storage: FakeObjectStorage
  let auditStore: FakeAuditStore
  let logger: ReturnType<typeof silentLogger>

  function buildHandler(policy: BatchPolicy = "halt-on-first-failure") {
    const processor = new RecordProcessor({
      storage,
      auditStore,
      codec: new SharpCodec(),
      logger,
      destinationBucket: "resized-images",
      scratchDir,
      resizedKeyPrefix: "resized-",
    })
    return createHandler({ coordinator: new BatchCoordinator(processor, policy, logger), logger })
  }

  beforeEach(async () => {
    scratchDir = await makeScratchDir()
    storage = new FakeObjectStorage()
    auditStore = new FakeAuditStore()
    logger = silentLogger()
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    await fs.remove(scratchDir)
  })

  it("answers 200 with the processed count", async () => {
    storage.put("uploads", "one.png", await createImage(16, 8))
    storage.put("uploads", "two.jpg", await createImage(16, 8, "jpeg"))

    const output = await buildHandler()(makeS3Event(makeS3Record("one.png"), makeS3Record("two.jpg")))

    expect(output).toEqual({
      statusCode: 200,
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ message: "Image processing completed successfully", processed_count: 2 }),
      isBase64Encoded: false,
    })
    expect(storage.stored.map(object => object.location.key)).toEqual(["resized-one.png", "resized-two.jpg"])
    expect(storage.stored.map(object => object.options.contentType)).toEqual(["image/png", "image/jpeg"])
    expect(auditStore.records).toHaveLength(2)
  })

  it("accepts S3 notifications fanned out through SNS", async () => {
    storage.put("uploads", "one.png", await createImage(16, 8))

    const output = await buildHandler()(viaSns({ Records: [makeS3Record("one.png")] }))

    expect(JSON.parse(output.body)).toEqual({ message: "Image processing completed successfully", processed_count: 1 })
  })

  it("answers the S3 test event without processing anything", async () => {
    const output = await buildHandler()({ Service: "Amazon S3", Event: "s3:TestEvent", Bucket: "uploads" })

    expect(JSON.parse(output.body)).toEqual({ message: "Image processing completed successfully", processed_count: 0 })
    expect(storage.fetched).toEqual([])
  })

  it("fails the invocation when the second of three records cannot be decoded", async () => {
    storage.put("uploads", "one.png", await createImage(16, 8))
    storage.put("uploads", "two.png", Buffer.from("not an image at all"))
    storage.put("uploads", "three.png", await createImage(16, 8))

    const event = makeS3Event(makeS3Record("one.png"), makeS3Record("two.png"), makeS3Record("three.png"))

    await expect(buildHandler()(event)).rejects.toBeInstanceOf(DecodeError)
    expect(storage.fetched.map(location => location.key)).toEqual(["one.png", "two.png"])
    expect(auditStore.records.map(record => record.originalObjectKey)).toEqual(["one.png"])
    expect(logger.error).toHaveBeenLastCalledWith(expect.stringContaining("Batch failed after 2 of 3 records"))
  })

  it("tries the remaining records under the continue policy", async () => {
    storage.put("uploads", "one.png", await createImage(16, 8))
    storage.put("uploads", "two.png", Buffer.from("not an image at all"))
    storage.put("uploads", "three.png", await createImage(16, 8))

    const event = makeS3Event(makeS3Record("one.png"), makeS3Record("two.png"), makeS3Record("three.png"))

    await expect(buildHandler("continue")(event)).rejects.toBeInstanceOf(BatchProcessingError)
    expect(auditStore.records.map(record => record.originalObjectKey)).toEqual(["one.png", "three.png"])
  })

  it("refuses to start without its configuration", async () => {
    vi.stubEnv("REGION", "eu-west-1")
    vi.stubEnv("DEST_BUCKET_NAME", "resized-images")
    vi.stubEnv("TABLE_NAME", "")

    await expect(handler(makeS3Event())).rejects.toBeInstanceOf(ConfigurationError)
  })
})
