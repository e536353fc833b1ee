import { Context, S3Event } from 'aws-lambda';
import { TweetAnalyzer, type AnalysisSummary } from '../src/pipeline/analyzer';
import { createComprehendClient, createS3Client } from '../src/pipeline/aws-clients';
import { ComprehendTextAnalysisService } from '../src/pipeline/comprehend-text-analysis';
import { loadAnalyzerConfig } from '../src/pipeline/config';
import { normaliseError } from '../src/pipeline/errors';
import { createLogger, loggerFromEnv, type Logger } from '../src/pipeline/logger';
import { formatLocation, type ObjectLocation } from '../src/pipeline/object-store';
import { S3ObjectStore } from '../src/pipeline/s3-object-store';

// Initialize AWS SDK clients once per container
const s3Client = createS3Client({ region: process.env.AWS_REGION });
const comprehendClient = createComprehendClient({ region: process.env.AWS_REGION });

/**
 * Extracts the bucket and key of every record in an S3 notification.
 * Keys arrive URL-encoded with `+` standing for a space.
 */
export function sourcesFromEvent(event: S3Event): ObjectLocation[] {
  return (event.Records ?? []).map((record) => ({
    bucket: record.s3.bucket.name,
    key: decodeURIComponent(record.s3.object.key.replace(/\+/g, ' ')),
  }));
}

export interface AnalyzerRuntime {
  analyzer: TweetAnalyzer;
  logger: Logger;
}

export type ChunkHandler = (event: S3Event, context: Context) => Promise<AnalysisSummary[]>;

/**
 * Builds the handler around a runtime factory. The factory runs on the first
 * invocation so that a configuration error surfaces in the invocation log.
 */
export function createHandler(buildRuntime: () => AnalyzerRuntime): ChunkHandler {
  let runtime: AnalyzerRuntime | undefined;

  const resolveRuntime = (requestId: string): AnalyzerRuntime => {
    if (runtime) {
      return runtime;
    }
    try {
      const built = buildRuntime();
      runtime = built;
      return built;
    } catch (error) {
      loggerFromEnv().error({ requestId, error: normaliseError(error) }, 'Analyzer could not be configured');
      throw error;
    }
  };

  return async (event, context) => {
    const { analyzer, logger } = resolveRuntime(context.awsRequestId);
    const log = logger.child({ requestId: context.awsRequestId });
    const sources = sourcesFromEvent(event);
    log.info({ functionName: context.functionName, objects: sources.map(formatLocation) }, 'Lambda function invoked');

    const summaries: AnalysisSummary[] = [];
    for (const source of sources) {
      try {
        summaries.push(await analyzer.analyzeChunk(source));
      } catch (error) {
        // Rethrown so the asynchronous invocation is retried by Lambda
        log.error({ source: formatLocation(source), error: normaliseError(error) }, 'Chunk analysis failed');
        throw error;
      }
    }

    return summaries;
  };
}

export const handler = createHandler(() => {
  const config = loadAnalyzerConfig(process.env);
  const logger = createLogger(config.logLevel, { functionName: process.env.AWS_LAMBDA_FUNCTION_NAME });

  return {
    logger,
    analyzer: new TweetAnalyzer({
      store: new S3ObjectStore(s3Client),
      analysis: new ComprehendTextAnalysisService(comprehendClient, {
        languageCode: config.languageCode,
        retry: config.retry,
        logger,
      }),
      resultsBucket: config.resultsBucket,
      retry: config.retry,
      objectNaming: config.objectNaming,
      logger,
    }),
  };
});
