#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { SoilHealthStack } from './soil-health-stack';

const app = new cdk.App();

// Get environment configuration
const env = {
  account: process.env.CDK_DEFAULT_ACCOUNT,
  region: process.env.CDK_DEFAULT_REGION || 'ap-south-1',
};

function deploymentStage(value: string | undefined): 'development' | 'staging' | 'production' {
  return value === 'production' || value === 'staging' ? value : 'development';
}

const stage = deploymentStage(process.env.ENVIRONMENT);

new SoilHealthStack(app, 'SoilHealthStack', {
  env,
  stage,
  thingSpeakChannelId: process.env.THINGSPEAK_CHANNEL_ID,
  thingSpeakFieldId: process.env.THINGSPEAK_FIELD_ID,
  description: 'Black pepper soil health scoring and fertilizer recommendation service',
  tags: {
    Project: 'SoilHealth',
    Environment: stage,
  },
});

app.synth();
