#!/usr/bin/env node
import 'source-map-support/register';
import { S3Client } from '@aws-sdk/client-s3';
import { parseArgs } from 'util';
import { ConfigurationError, normaliseError } from '../src/pipeline/errors';
import { LocalDirectoryStore } from '../src/pipeline/local-directory-store';
import { loggerFromEnv } from '../src/pipeline/logger';
import type { ObjectStore } from '../src/pipeline/object-store';
import { S3ObjectStore } from '../src/pipeline/s3-object-store';
import { splitCsvFile } from '../src/pipeline/splitter';

const USAGE = `Usage: split-tweets --file <tweets.csv> --prefix <name> --chunk-size <n>
                    (--bucket <staging-bucket> [--key-prefix input/] | --out-dir <dir>)

Splits a tweet CSV into chunks of <n> rows, each repeating the header,
named <key-prefix><name>_<index>.csv.`;

export interface SplitCommand {
  file: string;
  prefix: string;
  chunkSize: number;
  keyPrefix: string;
  destination: { kind: 's3'; bucket: string } | { kind: 'local'; outDir: string };
}

export function parseCommand(argv: string[]): SplitCommand {
  const { values } = parseArgs({
    args: argv,
    options: {
      file: { type: 'string' },
      prefix: { type: 'string' },
      'chunk-size': { type: 'string' },
      bucket: { type: 'string' },
      'key-prefix': { type: 'string', default: 'input/' },
      'out-dir': { type: 'string' },
    },
    strict: true,
  });

  const missing = (['file', 'prefix', 'chunk-size'] as const).filter((name) => !values[name]);
  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required option(s): ${missing.map((name) => `--${name}`).join(', ')}`);
  }

  const rawChunkSize = values['chunk-size'] ?? '';
  const chunkSize = /^-?\d+$/.test(rawChunkSize) ? Number(rawChunkSize) : Number.NaN;

  let destination: SplitCommand['destination'];
  if (values.bucket && values['out-dir']) {
    throw new ConfigurationError('Use either --bucket or --out-dir, not both');
  } else if (values.bucket) {
    destination = { kind: 's3', bucket: values.bucket };
  } else if (values['out-dir']) {
    destination = { kind: 'local', outDir: values['out-dir'] };
  } else {
    throw new ConfigurationError('One of --bucket or --out-dir is required');
  }

  return {
    file: values.file ?? '',
    prefix: values.prefix ?? '',
    chunkSize,
    keyPrefix: values['key-prefix'] ?? '',
    destination,
  };
}

export async function main(argv: string[]): Promise<number> {
  const logger = loggerFromEnv();

  let command: SplitCommand;
  try {
    command = parseCommand(argv);
  } catch (error) {
    console.error(`${normaliseError(error).message}\n\n${USAGE}`);
    return 2;
  }

  // A local destination is laid out as <out-dir>/<key>, with no bucket level
  const [store, bucket]: [ObjectStore, string] =
    command.destination.kind === 's3'
      ? [new S3ObjectStore(new S3Client({})), command.destination.bucket]
      : [new LocalDirectoryStore(command.destination.outDir), '.'];

  try {
    const written = await splitCsvFile({
      sourcePath: command.file,
      store,
      bucket,
      prefix: command.prefix,
      chunkSize: command.chunkSize,
      keyPrefix: command.keyPrefix,
      logger,
    });
    logger.info({ chunks: written.length, rows: written.reduce((sum, chunk) => sum + chunk.rows, 0) }, 'Split complete');
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    logger.error({ error: normaliseError(error) }, 'Split failed');
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
