import { ComprehendClient, type ComprehendClientConfig } from '@aws-sdk/client-comprehend';
import { S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';

/**
 * Clients used behind `withRetry`. The SDK's own retry strategy is limited to
 * a single attempt so that the pipeline's retry policy is the only bound on
 * the number of requests per call.
 */
export function createS3Client(config: S3ClientConfig = {}): S3Client {
  return new S3Client({ ...config, maxAttempts: 1 });
}

export function createComprehendClient(config: ComprehendClientConfig = {}): ComprehendClient {
  return new ComprehendClient({ ...config, maxAttempts: 1 });
}
