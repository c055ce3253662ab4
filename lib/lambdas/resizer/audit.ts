import {
  type AttributeValue,
  DynamoDBClient,
  PutItemCommand,
  type PutItemCommandInput,
} from "@aws-sdk/client-dynamodb"
import type { AuditRecord } from "./@types/Pipeline"
import { PersistenceError, errorMessage } from "./errors"

export const auditPartitionKey = "resource-id"

export interface AuditStore {
  put(record: AuditRecord): Promise<void>
}

function s(value: string): AttributeValue {
  return { S: value }
}

function n(value: number): AttributeValue {
  return { N: Math.trunc(value).toString() }
}

export function toAuditItem(record: AuditRecord): Record<string, AttributeValue> {
  const { original, resized, metrics } = record
  return {
    [auditPartitionKey]: s(record.resourceId),
    EventTime: s(record.eventTime),
    EventType: s(record.eventType),

    OriginalBucket: s(record.originalBucket),
    OriginalObjectKey: s(record.originalObjectKey),
    OriginalSize: n(record.originalSize),
    OriginalWidth: n(original.width),
    OriginalHeight: n(original.height),
    OriginalFormat: s(original.format),
    OriginalMode: s(original.colorMode),
    OriginalFileSize: n(original.sizeBytes),

    ResizedBucket: s(record.resizedBucket),
    ResizedObjectKey: s(record.resizedObjectKey),
    ResizedWidth: n(resized.width),
    ResizedHeight: n(resized.height),
    ResizedFormat: s(resized.format),
    ResizedMode: s(resized.colorMode),
    ResizedFileSize: n(resized.sizeBytes),

    ProcessingTime: s(record.processingTime),
    ProcessingDurationMs: n(record.processingDurationMs),
    ReductionPercentage: n(metrics.reductionPercentage),
    DimensionReduction: s(metrics.dimensionChange),

    EventSource: s(record.eventSource),
    AWSRegion: s(record.awsRegion),
    EventVersion: s(record.eventVersion),
  }
}

/** Appends audit items; a put never replaces an existing `resource-id`. */
export class DynamoAuditStore implements AuditStore {
  constructor(private readonly ddbClient: DynamoDBClient, private readonly tableName: string) {}

  async put(record: AuditRecord): Promise<void> {
    const params: PutItemCommandInput = {
      TableName: this.tableName,
      Item: toAuditItem(record),
      ConditionExpression: "attribute_not_exists(#id)",
      ExpressionAttributeNames: {
        "#id": auditPartitionKey,
      },
    }

    try {
      await this.ddbClient.send(new PutItemCommand(params))
    } catch (err) {
      throw new PersistenceError(`Failed to write audit record ${record.resourceId}: ${errorMessage(err)}`, { cause: err })
    }
  }
}
