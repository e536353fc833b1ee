import type { ObjectNaming } from './config';
import { AnalysisContractError, AnalysisIncompleteError, normaliseError, type NormalisedError } from './errors';
import { createLogger, type Logger } from './logger';
import { resultKey, type NamingContext } from './naming';
import { formatLocation, type ObjectLocation, type ObjectStore } from './object-store';
import { parseTweetChunk, type TweetRecord } from './records';
import {
  toEntityResults,
  toJsonLines,
  toKeyPhraseResults,
  toSentimentResults,
  type ResultVariant,
} from './results';
import { DEFAULT_RETRY_POLICY, sleep, withRetry, type RetryPolicy } from './retry';
import type { TextAnalysisService } from './text-analysis';

export const RESULT_CONTENT_TYPE = 'application/x-ndjson';

export interface TweetAnalyzerOptions {
  store: ObjectStore;
  analysis: TextAnalysisService;
  resultsBucket: string;
  retry?: RetryPolicy;
  objectNaming?: ObjectNaming;
  logger?: Logger;
  clock?: () => Date;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type VariantOutcome =
  | { status: 'written'; location: ObjectLocation; lines: number }
  | { status: 'failed'; error: NormalisedError; cause: unknown };

export interface AnalysisSummary {
  source: ObjectLocation;
  records: number;
  variants: Record<ResultVariant, VariantOutcome>;
}

function expectOnePerText<T>(operation: string, texts: readonly string[], results: T[]): T[] {
  if (results.length !== texts.length) {
    throw new AnalysisContractError(operation, texts.length, results.length);
  }
  return results;
}

/**
 * Turns one chunk object into three newline-delimited JSON result objects:
 * sentiment, entities and key phrases.
 *
 * Each variant is analyzed and written on its own, so a failure in one of
 * them still leaves the other two in the results bucket. The chunk is then
 * reported as incomplete by throwing AnalysisIncompleteError.
 *
 * Object store reads and writes are retried here; the analysis service
 * retries its own requests.
 */
export class TweetAnalyzer {
  private readonly store: ObjectStore;
  private readonly analysis: TextAnalysisService;
  private readonly resultsBucket: string;
  private readonly retry: RetryPolicy;
  private readonly objectNaming: ObjectNaming;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TweetAnalyzerOptions) {
    this.store = options.store;
    this.analysis = options.analysis;
    this.resultsBucket = options.resultsBucket;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.objectNaming = options.objectNaming ?? 'random';
    this.logger = options.logger ?? createLogger();
    this.clock = options.clock ?? (() => new Date());
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;
  }

  async analyzeChunk(source: ObjectLocation): Promise<AnalysisSummary> {
    const log = this.logger.child({ source: formatLocation(source) });

    const body = await this.retrying('GetObject', log, () => this.store.getText(source));
    const records = parseTweetChunk(body);
    const texts = records.map((record) => record.text);
    log.info({ records: records.length }, 'Chunk parsed');

    const naming: NamingContext = { source, now: this.clock(), random: this.random };

    const sentiment = await this.publishVariant('sentiment', records, naming, log, async () => {
      const findings = await this.analysis.detectSentiment(texts);
      return toSentimentResults(records, expectOnePerText('DetectSentiment', texts, findings));
    });

    const entities = await this.publishVariant('entities', records, naming, log, async () => {
      const findings = await this.analysis.detectEntities(texts);
      return toEntityResults(records, expectOnePerText('DetectEntities', texts, findings));
    });

    const keyphrases = await this.publishVariant('keyphrases', records, naming, log, async () => {
      const findings = await this.analysis.detectKeyPhrases(texts);
      return toKeyPhraseResults(records, expectOnePerText('DetectKeyPhrases', texts, findings));
    });

    const summary: AnalysisSummary = {
      source,
      records: records.length,
      variants: { sentiment, entities, keyphrases },
    };

    const failures: Record<string, unknown> = {};
    for (const [variant, outcome] of Object.entries(summary.variants)) {
      if (outcome.status === 'failed') {
        failures[variant] = outcome.cause;
      }
    }
    if (Object.keys(failures).length > 0) {
      throw new AnalysisIncompleteError(formatLocation(source), failures);
    }

    log.info(
      {
        records: records.length,
        sentimentLines: sentiment.status === 'written' ? sentiment.lines : 0,
        entityLines: entities.status === 'written' ? entities.lines : 0,
        keyPhraseLines: keyphrases.status === 'written' ? keyphrases.lines : 0,
      },
      'Chunk analyzed',
    );
    return summary;
  }

  private async publishVariant(
    variant: ResultVariant,
    records: readonly TweetRecord[],
    naming: NamingContext,
    log: Logger,
    analyze: () => Promise<object[]>,
  ): Promise<VariantOutcome> {
    try {
      // A header-only chunk still gets its (empty) result objects.
      const results = records.length === 0 ? [] : await analyze();
      const location: ObjectLocation = {
        bucket: this.resultsBucket,
        key: resultKey(variant, this.objectNaming, naming),
      };
      await this.retrying('PutObject', log, () =>
        this.store.putText(location, toJsonLines(results), RESULT_CONTENT_TYPE),
      );
      log.debug({ variant, location: formatLocation(location), lines: results.length }, 'Result object written');
      return { status: 'written', location, lines: results.length };
    } catch (cause) {
      const error = normaliseError(cause);
      log.error({ variant, error }, 'Result variant failed');
      return { status: 'failed', error, cause };
    }
  }

  private retrying<T>(operation: string, log: Logger, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, { policy: this.retry, operation, logger: log, sleep: this.sleep });
  }
}
