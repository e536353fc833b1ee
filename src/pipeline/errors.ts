/**
 * Error types raised by the splitter and the analyzer.
 *
 * Everything thrown on purpose extends PipelineError so that the Lambda
 * handler and the CLI can log a stable `code` next to the message.
 */
export class PipelineError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

export class RecordShapeError extends PipelineError {
  constructor(
    message: string,
    public readonly rowNumber: number,
    public readonly field: string,
  ) {
    super(message, 'RECORD_SHAPE_ERROR');
  }
}

export class AnalysisContractError extends PipelineError {
  constructor(
    public readonly operation: string,
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(
      `${operation} returned ${received} results for ${expected} submitted texts`,
      'ANALYSIS_CONTRACT_ERROR',
    );
  }
}

export class BatchItemError extends PipelineError {
  constructor(
    public readonly operation: string,
    public readonly documentIndex: number,
    public readonly errorCode: string,
    errorMessage: string,
  ) {
    super(
      `${operation} failed for document ${documentIndex}: ${errorCode} ${errorMessage}`.trim(),
      'BATCH_ITEM_ERROR',
    );
  }
}

export class AnalysisIncompleteError extends PipelineError {
  constructor(
    public readonly source: string,
    public readonly failures: Record<string, unknown>,
  ) {
    super(
      `Analysis of ${source} incomplete; failed variants: ${Object.keys(failures).join(', ')}`,
      'ANALYSIS_INCOMPLETE',
    );
  }
}

export interface NormalisedError {
  readonly name: string;
  readonly message: string;
  readonly code?: string;
  readonly stack?: string;
}

export function normaliseError(error: unknown): NormalisedError {
  if (error instanceof PipelineError) {
    return { name: error.name, message: error.message, code: error.code, stack: error.stack };
  }

  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }

  if (typeof error === 'string') {
    return { name: 'Error', message: error };
  }

  return { name: 'UnknownError', message: JSON.stringify(error) ?? String(error) };
}

const TRANSIENT_ERROR_NAMES = new Set([
  'ThrottlingException',
  'TooManyRequestsException',
  'ProvisionedThroughputExceededException',
  'InternalServerException',
  'InternalServerError',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'SlowDown',
  'RequestTimeout',
  'RequestTimeoutException',
  'TimeoutError',
]);

const TRANSIENT_NETWORK_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ECONNREFUSED', 'EAI_AGAIN']);

/**
 * True for failures worth another attempt: throttling, 5xx responses,
 * socket faults, and anything the AWS SDK flags as `$retryable`.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof PipelineError || typeof error !== 'object' || error === null) {
    return false;
  }

  if ('$retryable' in error && error.$retryable) {
    return true;
  }

  if ('name' in error && typeof error.name === 'string' && TRANSIENT_ERROR_NAMES.has(error.name)) {
    return true;
  }

  if ('code' in error && typeof error.code === 'string' && TRANSIENT_NETWORK_CODES.has(error.code)) {
    return true;
  }

  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    const metadata = error.$metadata;
    if ('httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
      return metadata.httpStatusCode >= 500 || metadata.httpStatusCode === 429;
    }
  }

  return false;
}
