import {
  AnalysisContractError,
  ConfigurationError,
  PipelineError,
  isTransientError,
  normaliseError,
} from '../src/pipeline/errors';
import { createLogger } from '../src/pipeline/logger';
import { backoffDelay, withRetry, type RetryPolicy } from '../src/pipeline/retry';

const policy: RetryPolicy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 300 };

function throttled(): Error {
  const error = new Error('Rate exceeded');
  error.name = 'ThrottlingException';
  return error;
}

describe('backoffDelay', () => {
  test('doubles per attempt up to the maximum', () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(policy, attempt))).toEqual([100, 200, 300, 300]);
  });
});

describe('withRetry', () => {
  test('returns the first successful result', async () => {
    const delays: number[] = [];
    const fn = jest.fn<Promise<string>, []>()
      .mockRejectedValueOnce(throttled())
      .mockRejectedValueOnce(throttled())
      .mockResolvedValue('ok');

    const result = await withRetry(fn, {
      policy,
      operation: 'DetectSentiment',
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([100, 200]);
  });

  test('rethrows the last error once attempts are used up', async () => {
    const errors = [throttled(), throttled(), throttled(), throttled()];
    let call = 0;
    const fn = jest.fn(async (): Promise<string> => {
      throw errors[call++];
    });

    await expect(withRetry(fn, { policy, operation: 'PutObject', sleep: async () => undefined })).rejects.toBe(
      errors[3],
    );
    expect(fn).toHaveBeenCalledTimes(4);
  });

  test('does not retry permanent errors', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new ConfigurationError('bad input'));

    await expect(withRetry(fn, { policy, operation: 'GetObject', sleep: async () => undefined })).rejects.toThrow(
      'bad input',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('honours a custom retry predicate', async () => {
    const fn = jest.fn<Promise<number>, []>().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue(7);

    await expect(
      withRetry(fn, { policy, operation: 'custom', shouldRetry: () => true, sleep: async () => undefined }),
    ).resolves.toBe(7);
  });

  test('logs each retry as a warning', async () => {
    const lines: string[] = [];
    const logger = createLogger('warn', {}, { write: (line: string) => lines.push(line) });
    const fn = jest.fn<Promise<string>, []>().mockRejectedValueOnce(throttled()).mockResolvedValue('ok');

    await withRetry(fn, { policy, operation: 'DetectEntities', logger, sleep: async () => undefined });

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      expect.objectContaining({
        level: 'warn',
        msg: 'Transient failure, retrying',
        operation: 'DetectEntities',
        attempt: 1,
        delayMs: 100,
        error: 'Rate exceeded',
      }),
    ]);
  });
});

describe('isTransientError', () => {
  test.each([
    ['throttling', throttled()],
    ['SDK retryable flag', { $retryable: { throttling: false } }],
    ['socket reset', Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })],
    ['5xx response', { name: 'UnknownError', $metadata: { httpStatusCode: 503 } }],
    ['429 response', { name: 'UnknownError', $metadata: { httpStatusCode: 429 } }],
  ])('%s is transient', (_label, error) => {
    expect(isTransientError(error)).toBe(true);
  });

  test.each([
    ['pipeline error', new AnalysisContractError('DetectSentiment', 2, 1)],
    ['4xx response', { name: 'AccessDeniedException', $metadata: { httpStatusCode: 403 } }],
    ['plain error', new Error('boom')],
    ['string', 'boom'],
    ['null', null],
  ])('%s is permanent', (_label, error) => {
    expect(isTransientError(error)).toBe(false);
  });
});

describe('normaliseError', () => {
  test('keeps the code of pipeline errors', () => {
    const normalised = normaliseError(new PipelineError('Object s3://a/b has no body', 'EMPTY_OBJECT'));

    expect(normalised).toMatchObject({ name: 'PipelineError', message: 'Object s3://a/b has no body', code: 'EMPTY_OBJECT' });
  });

  test('handles non-error values', () => {
    expect(normaliseError('boom')).toEqual({ name: 'Error', message: 'boom' });
    expect(normaliseError({ reason: 'x' })).toEqual({ name: 'UnknownError', message: '{"reason":"x"}' });
  });

  test('formats contract errors', () => {
    expect(new AnalysisContractError('DetectEntities', 3, 2).message).toBe(
      'DetectEntities returned 2 results for 3 submitted texts',
    );
  });
});
