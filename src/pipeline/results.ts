import type { TweetRecord } from './records';
import type { EntityFinding, KeyPhraseFinding, SentimentFinding } from './text-analysis';

export const RESULT_VARIANTS = ['sentiment', 'entities', 'keyphrases'] as const;

export type ResultVariant = (typeof RESULT_VARIANTS)[number];

interface TweetReference {
  tweet_id: string;
  tweet_text: string;
  tweet_date: string;
}

export interface SentimentResult extends TweetReference {
  sentiment: string;
  positive_score: number;
  negative_score: number;
  mixed_score: number;
  neutral_score: number;
}

export interface EntityResult extends TweetReference {
  entity: string;
  score: number;
  type: string;
}

export interface KeyPhraseResult extends TweetReference {
  /** The phrase text; the column keeps the entity name so both tables join alike. */
  entity: string;
  score: number;
}

const reference = (record: TweetRecord): TweetReference => ({
  tweet_id: record.id,
  tweet_text: record.text,
  tweet_date: record.createdAt,
});

export function toSentimentResults(
  records: readonly TweetRecord[],
  findings: readonly SentimentFinding[],
): SentimentResult[] {
  return records.map((record, index) => {
    const finding = findings[index];
    return {
      ...reference(record),
      sentiment: finding.sentiment,
      positive_score: finding.scores.positive,
      negative_score: finding.scores.negative,
      mixed_score: finding.scores.mixed,
      neutral_score: finding.scores.neutral,
    };
  });
}

export function toEntityResults(
  records: readonly TweetRecord[],
  findings: readonly EntityFinding[][],
): EntityResult[] {
  return records.flatMap((record, index) =>
    findings[index].map((entity) => ({
      ...reference(record),
      entity: entity.text,
      score: entity.score,
      type: entity.type,
    })),
  );
}

export function toKeyPhraseResults(
  records: readonly TweetRecord[],
  findings: readonly KeyPhraseFinding[][],
): KeyPhraseResult[] {
  return records.flatMap((record, index) =>
    findings[index].map((phrase) => ({
      ...reference(record),
      entity: phrase.text,
      score: phrase.score,
    })),
  );
}

/** Newline-delimited JSON: one object per line, every line terminated. */
export function toJsonLines(results: readonly object[]): string {
  return results.map((result) => `${JSON.stringify(result)}\n`).join('');
}
