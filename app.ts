#!/usr/bin/env node
import 'source-map-support/register';
import * as cdk from 'aws-cdk-lib';
import { AwsSolutionsChecks } from 'cdk-nag';
import { TweetAnalysisPipelineStack } from './lib/tweet-analysis-pipeline-stack';

/**
 * CDK application entry point for the batch tweet analysis pipeline.
 *
 * Deploys the staging and results buckets, the Comprehend analyzer function
 * triggered by chunk uploads, and the Glue/Athena resources used to query
 * the results.
 */
const app = new cdk.App();

const projectName = app.node.tryGetContext('projectName') ?? 'tweet-sentiment';
const environment = app.node.tryGetContext('environment') ?? 'dev';
const objectNaming = app.node.tryGetContext('objectNaming') === 'deterministic' ? 'deterministic' : 'random';

new TweetAnalysisPipelineStack(app, 'TweetAnalysisPipelineStack', {
  description: 'Batch tweet sentiment, entity and key phrase analysis with Amazon Comprehend',
  projectName: String(projectName),
  environment: String(environment),
  chunkKeyPrefix: String(app.node.tryGetContext('chunkKeyPrefix') ?? 'input/'),
  languageCode: String(app.node.tryGetContext('languageCode') ?? 'en'),
  objectNaming,

  tags: {
    Project: 'TweetSentimentPipeline',
    Environment: String(environment),
  },

  env: {
    // Inherit environment from CDK CLI or use defaults
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
});

// Apply CDK Nag for security best practices validation
cdk.Aspects.of(app).add(new AwsSolutionsChecks({ verbose: true }));

app.synth();
