import * as path from 'path';
import * as cdk from 'aws-cdk-lib';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3n from 'aws-cdk-lib/aws-s3-notifications';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as glue from 'aws-cdk-lib/aws-glue';
import * as athena from 'aws-cdk-lib/aws-athena';
import { NodejsFunction, OutputFormat } from 'aws-cdk-lib/aws-lambda-nodejs';
import { NagSuppressions } from 'cdk-nag';
import { Construct } from 'constructs';
import { RESULT_VARIANTS } from '../src/pipeline/results';

export interface TweetAnalysisPipelineStackProps extends cdk.StackProps {
  projectName: string;
  environment: string;
  /** Folder of the staging bucket watched for new chunks. */
  chunkKeyPrefix?: string;
  languageCode?: string;
  objectNaming?: 'random' | 'deterministic';
  analyzerTimeout?: cdk.Duration;
  analyzerMemorySize?: number;
  maxAttempts?: number;
  logRetentionDays?: logs.RetentionDays;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Batch tweet analysis pipeline.
 *
 * Chunks uploaded to the staging bucket trigger the analyzer function, which
 * runs Amazon Comprehend sentiment, entity and key phrase detection and writes
 * newline-delimited JSON into per-variant folders of the results bucket. A Glue
 * crawler catalogs those folders as tables for Athena.
 */
export class TweetAnalysisPipelineStack extends cdk.Stack {
  public readonly stagingBucket: s3.Bucket;
  public readonly resultsBucket: s3.Bucket;
  public readonly queryResultsBucket: s3.Bucket;
  public readonly analyzerFunction: NodejsFunction;
  public readonly database: glue.CfnDatabase;
  public readonly crawler: glue.CfnCrawler;
  public readonly workgroup: athena.CfnWorkGroup;

  constructor(scope: Construct, id: string, props: TweetAnalysisPipelineStackProps) {
    super(scope, id, props);

    const {
      projectName,
      environment,
      chunkKeyPrefix = 'input/',
      languageCode = 'en',
      objectNaming = 'random',
      analyzerTimeout = cdk.Duration.seconds(60),
      analyzerMemorySize = 512,
      maxAttempts = 3,
      logRetentionDays = logs.RetentionDays.TWO_WEEKS,
      logLevel = 'info',
    } = props;

    // Generate unique suffix for resource naming
    const uniqueSuffix = this.node.addr.slice(-8).toLowerCase();
    const resourcePrefix = `${projectName}-${environment}`.toLowerCase();

    this.stagingBucket = new s3.Bucket(this, 'StagingBucket', {
      bucketName: `${resourcePrefix}-staging-${uniqueSuffix}`,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      lifecycleRules: [{
        id: 'ExpireStagedChunks',
        enabled: true,
        prefix: chunkKeyPrefix,
        expiration: cdk.Duration.days(30),
        abortIncompleteMultipartUploadAfter: cdk.Duration.days(1),
      }],
    });

    this.resultsBucket = new s3.Bucket(this, 'ResultsBucket', {
      bucketName: `${resourcePrefix}-results-${uniqueSuffix}`,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
    });

    this.queryResultsBucket = new s3.Bucket(this, 'QueryResultsBucket', {
      bucketName: `${resourcePrefix}-athena-${uniqueSuffix}`,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      encryption: s3.BucketEncryption.S3_MANAGED,
      enforceSSL: true,
      lifecycleRules: [{
        id: 'ExpireQueryResults',
        enabled: true,
        expiration: cdk.Duration.days(7),
      }],
    });

    // Create CloudWatch Log Group for the analyzer function
    const analyzerLogGroup = new logs.LogGroup(this, 'AnalyzerLogGroup', {
      logGroupName: `/aws/lambda/${resourcePrefix}-analyzer-${uniqueSuffix}`,
      retention: logRetentionDays,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    this.analyzerFunction = new NodejsFunction(this, 'AnalyzerFunction', {
      functionName: `${resourcePrefix}-analyzer-${uniqueSuffix}`,
      description: 'Runs Comprehend sentiment, entity and key phrase detection on staged tweet chunks',
      entry: path.join(__dirname, '..', 'lambda', 'tweet-analyzer.ts'),
      handler: 'handler',
      projectRoot: path.join(__dirname, '..'),
      depsLockFilePath: path.join(__dirname, '..', 'package.json'),
      runtime: lambda.Runtime.NODEJS_20_X,
      architecture: lambda.Architecture.ARM_64,
      timeout: analyzerTimeout,
      memorySize: analyzerMemorySize,
      logGroup: analyzerLogGroup,
      // Retries come from S3's asynchronous invocation, not from a queue
      retryAttempts: 2,
      environment: {
        RESULTS_BUCKET: this.resultsBucket.bucketName,
        LANGUAGE_CODE: languageCode,
        MAX_ATTEMPTS: String(maxAttempts),
        OBJECT_NAMING: objectNaming,
        LOG_LEVEL: logLevel,
        NODE_OPTIONS: '--enable-source-maps',
      },
      bundling: {
        minify: true,
        sourceMap: true,
        target: 'node20',
        format: OutputFormat.CJS,
      },
    });

    this.stagingBucket.grantRead(this.analyzerFunction, `${chunkKeyPrefix}*`);
    this.resultsBucket.grantPut(this.analyzerFunction);
    this.analyzerFunction.addToRolePolicy(new iam.PolicyStatement({
      effect: iam.Effect.ALLOW,
      actions: [
        'comprehend:BatchDetectSentiment',
        'comprehend:BatchDetectEntities',
        'comprehend:BatchDetectKeyPhrases',
      ],
      resources: ['*'],
    }));

    // Configure S3 event notification to trigger the analyzer for each chunk
    this.stagingBucket.addEventNotification(
      s3.EventType.OBJECT_CREATED,
      new s3n.LambdaDestination(this.analyzerFunction),
      { prefix: chunkKeyPrefix, suffix: '.csv' },
    );

    // Glue Data Catalog over the result folders, one table per variant
    const databaseName = `${projectName}_${environment}_tweets`.replace(/[^a-z0-9_]/gi, '_').toLowerCase();
    this.database = new glue.CfnDatabase(this, 'TweetsDatabase', {
      catalogId: this.account,
      databaseInput: {
        name: databaseName,
        description: 'Tweet sentiment, entity and key phrase results',
      },
    });

    const crawlerRole = new iam.Role(this, 'CrawlerRole', {
      assumedBy: new iam.ServicePrincipal('glue.amazonaws.com'),
      description: 'Service role for the tweet results crawler',
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSGlueServiceRole'),
      ],
    });
    this.resultsBucket.grantRead(crawlerRole);

    this.crawler = new glue.CfnCrawler(this, 'ResultsCrawler', {
      name: `${resourcePrefix}-results-crawler-${uniqueSuffix}`,
      role: crawlerRole.roleArn,
      databaseName: this.database.ref,
      description: 'Catalogs the sentiment, entities and keyphrases result folders',
      targets: {
        s3Targets: RESULT_VARIANTS.map((variant) => ({
          path: `s3://${this.resultsBucket.bucketName}/${variant}/`,
        })),
      },
      schemaChangePolicy: {
        updateBehavior: 'UPDATE_IN_DATABASE',
        deleteBehavior: 'LOG',
      },
      schedule: {
        scheduleExpression: 'cron(0 * * * ? *)',
      },
    });

    this.workgroup = new athena.CfnWorkGroup(this, 'AnalyticsWorkgroup', {
      name: `${resourcePrefix}-tweets`,
      description: 'Workgroup for querying tweet analysis results',
      state: 'ENABLED',
      recursiveDeleteOption: true,
      workGroupConfiguration: {
        resultConfiguration: {
          outputLocation: `s3://${this.queryResultsBucket.bucketName}/query-results/`,
          encryptionConfiguration: {
            encryptionOption: 'SSE_S3',
          },
        },
        enforceWorkGroupConfiguration: true,
        publishCloudWatchMetricsEnabled: true,
      },
    });

    // Create CloudFormation outputs for easy reference
    new cdk.CfnOutput(this, 'StagingBucketName', {
      value: this.stagingBucket.bucketName,
      description: `Upload chunks under s3://<bucket>/${chunkKeyPrefix}`,
    });

    new cdk.CfnOutput(this, 'ResultsBucketName', {
      value: this.resultsBucket.bucketName,
      description: 'Bucket holding sentiment/, entities/ and keyphrases/ results',
    });

    new cdk.CfnOutput(this, 'AnalyzerFunctionName', {
      value: this.analyzerFunction.functionName,
      description: 'Lambda function analyzing staged chunks',
    });

    new cdk.CfnOutput(this, 'GlueDatabaseName', {
      value: databaseName,
      description: 'Glue database with one table per result variant',
    });

    new cdk.CfnOutput(this, 'CrawlerName', {
      value: this.crawler.ref,
      description: 'Run this crawler after new results arrive to refresh the tables',
    });

    new cdk.CfnOutput(this, 'AthenaWorkgroupName', {
      value: this.workgroup.ref,
      description: 'Athena workgroup for the results tables',
    });

    NagSuppressions.addStackSuppressions(this, [
      {
        id: 'AwsSolutions-S1',
        reason: 'Server access logging is not required for the analysis buckets in this pipeline',
      },
      {
        id: 'AwsSolutions-IAM4',
        reason: 'AWS managed policies are used for the Glue crawler and Lambda basic execution roles',
      },
      {
        id: 'AwsSolutions-IAM5',
        reason: 'Comprehend batch detection actions do not support resource-level permissions; bucket grants are prefix-scoped',
      },
      {
        id: 'AwsSolutions-GL1',
        reason: 'The crawler only reads result objects that are already encrypted with S3 managed keys',
      },
      {
        id: 'AwsSolutions-L1',
        reason: 'Bucket notification and auto-delete custom resources are managed by CDK',
      },
    ]);

    // Add tags to all resources in the stack
    cdk.Tags.of(this).add('Project', projectName);
    cdk.Tags.of(this).add('Environment', environment);
    cdk.Tags.of(this).add('ManagedBy', 'CDK');
  }
}
