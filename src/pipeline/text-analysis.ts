export interface SentimentScores {
  readonly positive: number;
  readonly negative: number;
  readonly mixed: number;
  readonly neutral: number;
}

export interface SentimentFinding {
  /** POSITIVE, NEGATIVE, NEUTRAL or MIXED. */
  readonly sentiment: string;
  readonly scores: SentimentScores;
}

export interface EntityFinding {
  readonly text: string;
  readonly score: number;
  readonly type: string;
}

export interface KeyPhraseFinding {
  readonly text: string;
  readonly score: number;
}

/**
 * Batch text analysis. Each method returns one entry per submitted text,
 * in submission order: entry `i` describes `texts[i]`.
 *
 * Implementations retry transient failures of their own requests, so callers
 * do not wrap these methods in another retry.
 */
export interface TextAnalysisService {
  detectSentiment(texts: string[]): Promise<SentimentFinding[]>;
  detectEntities(texts: string[]): Promise<EntityFinding[][]>;
  detectKeyPhrases(texts: string[]): Promise<KeyPhraseFinding[][]>;
}
