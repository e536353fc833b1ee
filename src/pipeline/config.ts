import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LOG_LEVELS, type LogLevel } from './logger';
import type { RetryPolicy } from './retry';

export type ObjectNaming = 'random' | 'deterministic';

export interface AnalyzerConfig {
  resultsBucket: string;
  languageCode: string;
  retry: RetryPolicy;
  objectNaming: ObjectNaming;
  logLevel: LogLevel;
}

const EnvSchema = z.object({
  RESULTS_BUCKET: z.string().trim().min(1, 'RESULTS_BUCKET is required'),
  LANGUAGE_CODE: z.string().trim().min(2).default('en'),
  MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  OBJECT_NAMING: z.enum(['random', 'deterministic']).default('random'),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
});

/**
 * Builds the analyzer configuration from the Lambda environment.
 * Empty strings count as unset so that CDK can pass optional values through.
 */
export function loadAnalyzerConfig(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  const source: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      source[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid analyzer configuration: ${issues.join(', ')}`, issues);
  }

  const values = parsed.data;
  if (values.RETRY_MAX_DELAY_MS < values.RETRY_BASE_DELAY_MS) {
    throw new ConfigurationError('RETRY_MAX_DELAY_MS must not be lower than RETRY_BASE_DELAY_MS', [
      'RETRY_MAX_DELAY_MS',
    ]);
  }

  return {
    resultsBucket: values.RESULTS_BUCKET,
    languageCode: values.LANGUAGE_CODE,
    retry: {
      maxAttempts: values.MAX_ATTEMPTS,
      baseDelayMs: values.RETRY_BASE_DELAY_MS,
      maxDelayMs: values.RETRY_MAX_DELAY_MS,
    },
    objectNaming: values.OBJECT_NAMING,
    logLevel: values.LOG_LEVEL,
  };
}
