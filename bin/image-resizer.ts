#!/usr/bin/env node
import { App } from 'aws-cdk-lib';
import { ImageResizerStack } from '../lib/image-resizer-stack';

const app = new App();

new ImageResizerStack(app, 'ImageResizerStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  sourcePrefix: process.env.SOURCE_PREFIX,
});
