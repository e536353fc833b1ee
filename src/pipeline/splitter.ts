import { readFile } from 'fs/promises';
import { parseCsv, serializeCsv, type CsvRow } from './csv';
import { ConfigurationError } from './errors';
import { createLogger, type Logger } from './logger';
import { formatLocation, type ObjectLocation, type ObjectStore } from './object-store';

export const CHUNK_CONTENT_TYPE = 'text/csv';

export interface Chunk {
  readonly index: number;
  readonly header: CsvRow;
  readonly rows: CsvRow[];
}

export interface SplitOptions {
  sourcePath: string;
  store: ObjectStore;
  bucket: string;
  prefix: string;
  chunkSize: number;
  /** Logical folder inside the bucket, e.g. `input/`. */
  keyPrefix?: string;
  logger?: Logger;
}

export interface WrittenChunk {
  readonly location: ObjectLocation;
  readonly rows: number;
}

export function assertChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${chunkSize}`, ['chunkSize']);
  }
}

export function chunkKey(prefix: string, index: number, keyPrefix = ''): string {
  return `${keyPrefix}${prefix}_${index}.csv`;
}

/**
 * Splits `rows` (header first) into chunks of at most `chunkSize` data rows,
 * each carrying the header. No chunk is produced without data rows.
 */
export function partitionRows(rows: readonly CsvRow[], chunkSize: number): Chunk[] {
  assertChunkSize(chunkSize);

  const [header, ...data] = rows;
  if (header === undefined) {
    return [];
  }

  const chunks: Chunk[] = [];
  for (let start = 0; start < data.length; start += chunkSize) {
    chunks.push({ index: chunks.length, header, rows: data.slice(start, start + chunkSize) });
  }
  return chunks;
}

/** Reads a tweet CSV from disk and writes `{keyPrefix}{prefix}_{index}.csv` chunk objects. */
export async function splitCsvFile(options: SplitOptions): Promise<WrittenChunk[]> {
  const { sourcePath, store, bucket, prefix, chunkSize, keyPrefix = '' } = options;
  const logger = options.logger ?? createLogger();

  assertChunkSize(chunkSize);
  if (prefix.trim().length === 0) {
    throw new ConfigurationError('Chunk name prefix must not be empty', ['prefix']);
  }

  const rows = parseCsv(await readFile(sourcePath, 'utf-8'));
  const chunks = partitionRows(rows, chunkSize);
  logger.info(
    { sourcePath, dataRows: Math.max(rows.length - 1, 0), chunks: chunks.length, chunkSize },
    'Source partitioned',
  );

  const written: WrittenChunk[] = [];
  for (const chunk of chunks) {
    const location: ObjectLocation = { bucket, key: chunkKey(prefix, chunk.index, keyPrefix) };
    await store.putText(location, serializeCsv([chunk.header, ...chunk.rows]), CHUNK_CONTENT_TYPE);
    logger.debug({ location: formatLocation(location), rows: chunk.rows.length }, 'Chunk written');
    written.push({ location, rows: chunk.rows.length });
  }

  return written;
}
