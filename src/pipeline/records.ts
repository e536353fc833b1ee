import { z } from 'zod';
import { parseCsv, type CsvRow } from './csv';
import { RecordShapeError } from './errors';

/** Column layout of the tweet CSV, in file order. */
export const TWEET_COLUMNS = ['id', 'retweet_count', 'favorite_count', 'created_at', 'text'] as const;

export type TweetColumn = (typeof TWEET_COLUMNS)[number];

export interface TweetRecord {
  readonly id: string;
  readonly retweetCount: string;
  readonly favoriteCount: string;
  readonly createdAt: string;
  readonly text: string;
}

const notBlank = (value: string) => value.trim().length > 0;

const TweetRowSchema = z.object({
  id: z.string().refine(notBlank, 'must not be blank'),
  retweet_count: z.string(),
  favorite_count: z.string(),
  created_at: z.string().refine(notBlank, 'must not be blank'),
  text: z.string().refine(notBlank, 'must not be blank'),
});

/**
 * Maps one positional CSV row onto the named tweet schema.
 * `rowNumber` is the 1-based row within the chunk (the header is row 1).
 */
export function toTweetRecord(row: CsvRow, rowNumber: number): TweetRecord {
  if (row.length !== TWEET_COLUMNS.length) {
    const field = TWEET_COLUMNS[Math.min(row.length, TWEET_COLUMNS.length - 1)];
    throw new RecordShapeError(
      `Row ${rowNumber} has ${row.length} fields, expected ${TWEET_COLUMNS.length}`,
      rowNumber,
      row.length < TWEET_COLUMNS.length ? field : 'extra',
    );
  }

  const named: Record<string, string> = {};
  TWEET_COLUMNS.forEach((column, offset) => {
    named[column] = row[offset];
  });

  const parsed = TweetRowSchema.safeParse(named);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = String(issue.path[0] ?? 'row');
    throw new RecordShapeError(`Row ${rowNumber} field ${field} ${issue.message}`, rowNumber, field);
  }

  return {
    id: parsed.data.id,
    retweetCount: parsed.data.retweet_count,
    favoriteCount: parsed.data.favorite_count,
    createdAt: parsed.data.created_at,
    text: parsed.data.text,
  };
}

/** Parses a chunk object: drops the header row and validates every data row. */
export function parseTweetChunk(body: string): TweetRecord[] {
  const [, ...dataRows] = parseCsv(body);
  return dataRows.map((row, index) => toTweetRecord(row, index + 2));
}
