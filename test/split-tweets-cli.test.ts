import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { mockClient } from 'aws-sdk-client-mock';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { main, parseCommand } from '../bin/split-tweets';
import { ConfigurationError } from '../src/pipeline/errors';
import { TWEET_HEADER, tweetCsv, tweetRow } from './helpers';

const s3Mock = mockClient(S3Client);

describe('parseCommand', () => {
  test('parses an S3 destination with the default key prefix', () => {
    expect(parseCommand(['--file', 'tweets.csv', '--prefix', 'tweets', '--chunk-size', '10', '--bucket', 'staging'])).toEqual({
      file: 'tweets.csv',
      prefix: 'tweets',
      chunkSize: 10,
      keyPrefix: 'input/',
      destination: { kind: 's3', bucket: 'staging' },
    });
  });

  test('parses a local destination and a custom key prefix', () => {
    expect(
      parseCommand(['--file=tweets.csv', '--prefix=batch', '--chunk-size=5', '--out-dir=/tmp/out', '--key-prefix=raw/']),
    ).toEqual({
      file: 'tweets.csv',
      prefix: 'batch',
      chunkSize: 5,
      keyPrefix: 'raw/',
      destination: { kind: 'local', outDir: '/tmp/out' },
    });
  });

  test('keeps a non-numeric chunk size invalid', () => {
    const command = parseCommand(['--file', 'a.csv', '--prefix', 'a', '--chunk-size', '10rows', '--out-dir', 'out']);
    expect(command.chunkSize).toBeNaN();
  });

  test('reports every missing required option', () => {
    expect(() => parseCommand(['--bucket', 'staging'])).toThrow(
      new ConfigurationError('Missing required option(s): --file, --prefix, --chunk-size'),
    );
  });

  test('requires exactly one destination', () => {
    const base = ['--file', 'a.csv', '--prefix', 'a', '--chunk-size', '2'];
    expect(() => parseCommand(base)).toThrow('One of --bucket or --out-dir is required');
    expect(() => parseCommand([...base, '--bucket', 'b', '--out-dir', 'out'])).toThrow(
      'Use either --bucket or --out-dir, not both',
    );
  });
});

describe('main', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), 'split-tweets-cli-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(workDir, { recursive: true, force: true });
  });

  test('writes chunks into the output directory', async () => {
    const sourcePath = path.join(workDir, 'tweets.csv');
    const outDir = path.join(workDir, 'out');
    await writeFile(sourcePath, tweetCsv(5), 'utf-8');

    const code = await main(['--file', sourcePath, '--prefix', 'tweets', '--chunk-size', '2', '--out-dir', outDir]);

    expect(code).toBe(0);
    expect((await readdir(path.join(outDir, 'input'))).sort()).toEqual(['tweets_0.csv', 'tweets_1.csv', 'tweets_2.csv']);
    expect(await readFile(path.join(outDir, 'input', 'tweets_2.csv'), 'utf-8')).toBe(`${TWEET_HEADER}\n${tweetRow(5)}\n`);
  });

  test('uploads chunks to the staging bucket', async () => {
    s3Mock.reset();
    s3Mock.on(PutObjectCommand).resolves({});
    const sourcePath = path.join(workDir, 'tweets.csv');
    await writeFile(sourcePath, tweetCsv(3), 'utf-8');

    const code = await main(['--file', sourcePath, '--prefix', 'tweets', '--chunk-size', '2', '--bucket', 'staging']);

    expect(code).toBe(0);
    expect(s3Mock).toHaveReceivedCommandTimes(PutObjectCommand, 2);
    const [first, second] = s3Mock.commandCalls(PutObjectCommand).map((call) => call.args[0].input);
    expect(first).toEqual({
      Bucket: 'staging',
      Key: 'input/tweets_0.csv',
      Body: `${TWEET_HEADER}\n${tweetRow(1)}\n${tweetRow(2)}\n`,
      ContentType: 'text/csv',
    });
    expect(second).toEqual({
      Bucket: 'staging',
      Key: 'input/tweets_1.csv',
      Body: `${TWEET_HEADER}\n${tweetRow(3)}\n`,
      ContentType: 'text/csv',
    });
  });

  test('exits with 1 when an upload fails', async () => {
    s3Mock.reset();
    s3Mock.on(PutObjectCommand).rejects(new Error('AccessDenied'));
    const sourcePath = path.join(workDir, 'tweets.csv');
    await writeFile(sourcePath, tweetCsv(1), 'utf-8');

    await expect(
      main(['--file', sourcePath, '--prefix', 'tweets', '--chunk-size', '2', '--bucket', 'staging']),
    ).resolves.toBe(1);
  });

  test('exits with 2 on a usage error', async () => {
    await expect(main(['--file', 'tweets.csv'])).resolves.toBe(2);
    await expect(main(['--unknown'])).resolves.toBe(2);
  });

  test('exits with 2 on an invalid chunk size', async () => {
    const sourcePath = path.join(workDir, 'tweets.csv');
    await writeFile(sourcePath, tweetCsv(1), 'utf-8');

    await expect(
      main(['--file', sourcePath, '--prefix', 'tweets', '--chunk-size', '0', '--out-dir', path.join(workDir, 'out')]),
    ).resolves.toBe(2);
  });

  test('exits with 1 when the source cannot be read', async () => {
    await expect(
      main([
        '--file',
        path.join(workDir, 'missing.csv'),
        '--prefix',
        'tweets',
        '--chunk-size',
        '2',
        '--out-dir',
        path.join(workDir, 'out'),
      ]),
    ).resolves.toBe(1);
  });
});
