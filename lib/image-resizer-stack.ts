import {
  Stack,
  StackProps,
  aws_lambda as lambda,
  aws_logs as logs,
  aws_s3 as s3,
  aws_s3_notifications as s3n,
  aws_dynamodb as ddb,
  aws_sqs as sqs,
  aws_sns as sns,
  Duration,
  RemovalPolicy,
} from 'aws-cdk-lib';

import * as path from 'path';
import { Table } from 'aws-cdk-lib/aws-dynamodb';
import { Construct } from 'constructs';
import { SnsEventSource } from 'aws-cdk-lib/aws-lambda-event-sources';
import type { BatchPolicy } from './lambdas/resizer/config';

export interface ImageResizerStackProps extends StackProps {
  /**
   * Directory holding the built resizer handler. It must also contain the
   * handler's node_modules (zod, sharp for linux-arm64, uuid, fs-extra, date-fns).
   */
  resizerCodePath?: string
  sourcePrefix?: string
  resizedKeyPrefix?: string
  batchPolicy?: BatchPolicy
}

function createAuditTable(scope: Construct): Table {
  return new ddb.Table(scope, 'AuditTable', {
    partitionKey: { name: 'resource-id', type: ddb.AttributeType.STRING },
    billingMode: ddb.BillingMode.PAY_PER_REQUEST,
    encryption: ddb.TableEncryption.AWS_MANAGED,
    removalPolicy: RemovalPolicy.RETAIN,
  });
}

function createImagesBucket(scope: Construct, id: string): s3.Bucket {
  return new s3.Bucket(scope, id, {
    enforceSSL: true,
    blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
    autoDeleteObjects: true,
    removalPolicy: RemovalPolicy.DESTROY,
  });
}

function createArmLambda(scope: Construct, name: string, codePath: string, environment?: { [key: string]: string }, timeout = Duration.seconds(3), memorySize = 128, runtime = lambda.Runtime.NODEJS_20_X) {
  return new lambda.Function(scope, name, {
    architecture: lambda.Architecture.ARM_64,
    handler: 'index.handler',
    logRetention: logs.RetentionDays.ONE_WEEK,
    code: lambda.Code.fromAsset(codePath),
    timeout,
    environment,
    memorySize,
    runtime,
  });
}

export class ImageResizerStack extends Stack {
  readonly sourceBucket: s3.Bucket
  readonly destinationBucket: s3.Bucket
  readonly auditTable: Table
  readonly resizerLambda: lambda.Function

  constructor(scope: Construct, id: string, props: ImageResizerStackProps = {}) {
    super(scope, id, props);

    const codePath = props.resizerCodePath ?? path.join(__dirname, 'lambdas', 'resizer')
    this.sourceBucket = createImagesBucket(this, 'SourceBucket')
    this.destinationBucket = createImagesBucket(this, 'DestinationBucket')
    this.auditTable = createAuditTable(this)

    this.resizerLambda = createArmLambda(this, "ResizerLambda", codePath, {
      "REGION": this.region,
      "TABLE_NAME": this.auditTable.tableName,
      "DEST_BUCKET_NAME": this.destinationBucket.bucketName,
      "SCRATCH_DIR": "/tmp",
      "RESIZED_KEY_PREFIX": props.resizedKeyPrefix ?? "resized-",
      "BATCH_POLICY": props.batchPolicy ?? "halt-on-first-failure",
    }, Duration.seconds(60), 1024)

    const uploadsTopic = new sns.Topic(this, "UploadsTopic")

    this.sourceBucket.addEventNotification(
      s3.EventType.OBJECT_CREATED,
      new s3n.SnsDestination(uploadsTopic),
      ...(props.sourcePrefix ? [{ prefix: props.sourcePrefix }] : [])
    )

    const resizerDLQ = new sqs.Queue(this, "ResizerDLQ", {
      retentionPeriod: Duration.days(14),
      removalPolicy: RemovalPolicy.DESTROY
    })

    this.resizerLambda.addEventSource(new SnsEventSource(uploadsTopic, {
      deadLetterQueue: resizerDLQ
    }))

    this.sourceBucket.grantRead(this.resizerLambda)
    this.destinationBucket.grantPut(this.resizerLambda)
    this.auditTable.grantWriteData(this.resizerLambda)
  }
}
