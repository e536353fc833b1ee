import { createLogger, type Logger } from '../src/pipeline/logger';
import type { ObjectLocation, ObjectStore } from '../src/pipeline/object-store';
import type {
  EntityFinding,
  KeyPhraseFinding,
  SentimentFinding,
  TextAnalysisService,
} from '../src/pipeline/text-analysis';

export const silentLogger = (): Logger => createLogger('silent');

export const TWEET_HEADER = 'id,retweet_count,favorite_count,created_at,text';

export function tweetRow(n: number): string {
  return `${1000 + n},${n % 3},${n % 5},2020-03-0${(n % 9) + 1} 10:00:00,tweet number ${n}`;
}

export function tweetCsv(count: number): string {
  const rows = Array.from({ length: count }, (_, index) => tweetRow(index + 1));
  return [TWEET_HEADER, ...rows].join('\n') + '\n';
}

export interface StoredObject {
  body: string;
  contentType: string;
}

export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();
  readonly calls: string[] = [];

  seed(location: ObjectLocation, body: string): void {
    this.objects.set(InMemoryObjectStore.id(location), { body, contentType: 'text/csv' });
  }

  async getText(location: ObjectLocation): Promise<string> {
    this.calls.push(`get ${InMemoryObjectStore.id(location)}`);
    const stored = this.objects.get(InMemoryObjectStore.id(location));
    if (!stored) {
      throw new Error(`NoSuchKey: ${InMemoryObjectStore.id(location)}`);
    }
    return stored.body;
  }

  async putText(location: ObjectLocation, body: string, contentType: string): Promise<void> {
    this.calls.push(`put ${InMemoryObjectStore.id(location)}`);
    this.objects.set(InMemoryObjectStore.id(location), { body, contentType });
  }

  keysUnder(prefix: string): string[] {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  body(id: string): string {
    const stored = this.objects.get(id);
    if (!stored) {
      throw new Error(`missing object ${id}`);
    }
    return stored.body;
  }

  static id({ bucket, key }: ObjectLocation): string {
    return `${bucket}/${key}`;
  }
}

/**
 * Text analysis stand-in whose findings are looked up by text, so that tests
 * can tell which record a finding was attributed to.
 */
export class FakeTextAnalysis implements TextAnalysisService {
  readonly submissions: { operation: string; texts: string[] }[] = [];
  sentiments = new Map<string, SentimentFinding>();
  entities = new Map<string, EntityFinding[]>();
  keyPhrases = new Map<string, KeyPhraseFinding[]>();

  async detectSentiment(texts: string[]): Promise<SentimentFinding[]> {
    this.submissions.push({ operation: 'sentiment', texts });
    return texts.map(
      (text) =>
        this.sentiments.get(text) ?? {
          sentiment: 'NEUTRAL',
          scores: { positive: 0.1, negative: 0.1, mixed: 0, neutral: 0.8 },
        },
    );
  }

  async detectEntities(texts: string[]): Promise<EntityFinding[][]> {
    this.submissions.push({ operation: 'entities', texts });
    return texts.map((text) => this.entities.get(text) ?? []);
  }

  async detectKeyPhrases(texts: string[]): Promise<KeyPhraseFinding[][]> {
    this.submissions.push({ operation: 'keyphrases', texts });
    return texts.map((text) => this.keyPhrases.get(text) ?? []);
  }
}

export function parseJsonLines(body: string): unknown[] {
  return body
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => JSON.parse(line));
}
