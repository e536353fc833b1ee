import {
  BatchDetectEntitiesCommand,
  BatchDetectKeyPhrasesCommand,
  BatchDetectSentimentCommand,
  type ComprehendClient,
  LanguageCode,
  type BatchItemError as ComprehendBatchItemError,
} from '@aws-sdk/client-comprehend';
import { createComprehendClient } from './aws-clients';
import { AnalysisContractError, BatchItemError, ConfigurationError } from './errors';
import type { Logger } from './logger';
import { DEFAULT_RETRY_POLICY, sleep, withRetry, type RetryPolicy } from './retry';
import type {
  EntityFinding,
  KeyPhraseFinding,
  SentimentFinding,
  TextAnalysisService,
} from './text-analysis';

/** Comprehend rejects batch requests with more documents than this. */
export const MAX_DOCUMENTS_PER_BATCH = 25;

interface IndexedResult<T> {
  index?: number;
  value: T;
}

interface BatchOutcome<T> {
  results: IndexedResult<T>[];
  errors: ComprehendBatchItemError[];
}

export interface ComprehendAnalysisOptions {
  languageCode?: string;
  /** Documents per batch request, at most MAX_DOCUMENTS_PER_BATCH. */
  batchSize?: number;
  /** Applied to each batch request on its own. */
  retry?: RetryPolicy;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function isLanguageCode(value: string): value is LanguageCode {
  return Object.values(LanguageCode).some((code) => code === value);
}

export class ComprehendTextAnalysisService implements TextAnalysisService {
  private readonly languageCode: LanguageCode;
  private readonly batchSize: number;
  private readonly retry: RetryPolicy;
  private readonly logger?: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly client: ComprehendClient = createComprehendClient(),
    options: ComprehendAnalysisOptions = {},
  ) {
    const { languageCode = 'en', batchSize = MAX_DOCUMENTS_PER_BATCH } = options;
    if (!isLanguageCode(languageCode)) {
      throw new ConfigurationError(`Unsupported language code: ${languageCode}`, ['LANGUAGE_CODE']);
    }
    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_DOCUMENTS_PER_BATCH) {
      throw new ConfigurationError(
        `Batch size must be an integer between 1 and ${MAX_DOCUMENTS_PER_BATCH}, got ${batchSize}`,
      );
    }
    this.languageCode = languageCode;
    this.batchSize = batchSize;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.logger = options.logger;
    this.sleep = options.sleep ?? sleep;
  }

  async detectSentiment(texts: string[]): Promise<SentimentFinding[]> {
    return this.inBatches(texts, 'BatchDetectSentiment', async (batch) => {
      const response = await this.client.send(
        new BatchDetectSentimentCommand({ TextList: batch, LanguageCode: this.languageCode }),
      );
      return {
        results: (response.ResultList ?? []).map((item) => ({
          index: item.Index,
          value: {
            sentiment: item.Sentiment ?? 'NEUTRAL',
            scores: {
              positive: item.SentimentScore?.Positive ?? 0,
              negative: item.SentimentScore?.Negative ?? 0,
              mixed: item.SentimentScore?.Mixed ?? 0,
              neutral: item.SentimentScore?.Neutral ?? 0,
            },
          },
        })),
        errors: response.ErrorList ?? [],
      };
    });
  }

  async detectEntities(texts: string[]): Promise<EntityFinding[][]> {
    return this.inBatches(texts, 'BatchDetectEntities', async (batch) => {
      const response = await this.client.send(
        new BatchDetectEntitiesCommand({ TextList: batch, LanguageCode: this.languageCode }),
      );
      return {
        results: (response.ResultList ?? []).map((item) => ({
          index: item.Index,
          value: (item.Entities ?? []).map((entity) => ({
            text: entity.Text ?? '',
            score: entity.Score ?? 0,
            type: entity.Type ?? 'OTHER',
          })),
        })),
        errors: response.ErrorList ?? [],
      };
    });
  }

  async detectKeyPhrases(texts: string[]): Promise<KeyPhraseFinding[][]> {
    return this.inBatches(texts, 'BatchDetectKeyPhrases', async (batch) => {
      const response = await this.client.send(
        new BatchDetectKeyPhrasesCommand({ TextList: batch, LanguageCode: this.languageCode }),
      );
      return {
        results: (response.ResultList ?? []).map((item) => ({
          index: item.Index,
          value: (item.KeyPhrases ?? []).map((phrase) => ({
            text: phrase.Text ?? '',
            score: phrase.Score ?? 0,
          })),
        })),
        errors: response.ErrorList ?? [],
      };
    });
  }

  // Result indexes are relative to the batch, so they are shifted by the batch offset.
  // A failed batch is retried alone; batches already answered are not sent again.
  private async inBatches<T>(
    texts: string[],
    operation: string,
    call: (batch: string[]) => Promise<BatchOutcome<T>>,
  ): Promise<T[]> {
    const slots = new Map<number, T>();

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const { results, errors } = await withRetry(() => call(batch), {
        policy: this.retry,
        operation,
        logger: this.logger?.child({ batchStart: start }),
        sleep: this.sleep,
      });

      const [firstError] = errors;
      if (firstError) {
        throw new BatchItemError(
          operation,
          start + (firstError.Index ?? 0),
          firstError.ErrorCode ?? 'UnknownError',
          firstError.ErrorMessage ?? '',
        );
      }

      results.forEach((result, position) => {
        slots.set(start + (result.index ?? position), result.value);
      });
    }

    if (slots.size !== texts.length) {
      throw new AnalysisContractError(operation, texts.length, slots.size);
    }

    return texts.map((_, index) => {
      const value = slots.get(index);
      if (value === undefined) {
        throw new AnalysisContractError(operation, texts.length, slots.size);
      }
      return value;
    });
  }
}
