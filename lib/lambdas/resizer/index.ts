import { S3Client } from '@aws-sdk/client-s3';
import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoAuditStore } from "./audit";
import { BatchCoordinator } from "./batch";
import { SharpCodec } from "./codec";
import { loadConfig, type ResizerConfig } from "./config";
import { consoleLogger, type Logger } from "./logger";
import { extractS3Records, type NotificationEvent } from "./notifications";
import { RecordProcessor } from "./processor";
import { S3ObjectStorage } from "./storage";

export interface LambdaOutput {
  statusCode: number
  headers: Record<string, string>
  body: string
  isBase64Encoded: boolean
}

export interface ResizerDependencies {
  coordinator: BatchCoordinator
  logger: Logger
}

export type ResizerHandler = (event: NotificationEvent) => Promise<LambdaOutput>

function toLambdaOutput(statusCode: number, body: unknown): LambdaOutput {
  return {
    statusCode,
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
    isBase64Encoded: false
  };
}

export function createDependencies(config: ResizerConfig, logger: Logger = consoleLogger): ResizerDependencies {
  const s3Client = new S3Client({ region: config.region })
  const ddbClient = new DynamoDBClient({ region: config.region });
  const processor = new RecordProcessor({
    storage: new S3ObjectStorage(s3Client),
    auditStore: new DynamoAuditStore(ddbClient, config.tableName),
    codec: new SharpCodec(),
    logger,
    destinationBucket: config.destinationBucket,
    scratchDir: config.scratchDir,
    resizedKeyPrefix: config.resizedKeyPrefix,
  })

  return {
    coordinator: new BatchCoordinator(processor, config.batchPolicy, logger),
    logger,
  }
}

export function createHandler({ coordinator, logger }: ResizerDependencies): ResizerHandler {
  return async (event) => {
    logger.log(JSON.stringify(event))
    const records = extractS3Records(event)
    const outcome = await coordinator.run(records)
    if (!outcome.ok) {
      logger.error(`Batch failed after ${outcome.attempted} of ${records.length} records: ${outcome.error.message}`)
      throw outcome.error
    }

    return toLambdaOutput(outcome.statusCode, {
      message: "Image processing completed successfully",
      processed_count: outcome.processedCount,
    })
  }
}

// clients are built once per container, on the first invocation
let defaultHandler: ResizerHandler | undefined

export const handler: ResizerHandler = async (event) => {
  defaultHandler ??= createHandler(createDependencies(loadConfig(process.env)))
  return defaultHandler(event)
}
