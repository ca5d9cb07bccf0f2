import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

// `KEY=` in .env arrives as an empty string
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGINS: z.string().default(''),

  STORE_DRIVER: z.enum(['sqlite', 'mongo']).default('sqlite'),
  DB_PATH: z.string().default('./data/coverage_compass.db'),
  MONGODB_URI: optionalString,
  MONGODB_DB_NAME: z.string().default('coverage_compass'),

  REASONING_PROVIDER: z.enum(['gemini', 'openai']).default('gemini'),
  GOOGLE_AI_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  REASONING_MODEL: optionalString,
  REASONING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  REASONING_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  REASONING_BACKOFF_MS: z.coerce.number().int().min(0).default(500),

  SCORING_CACHE_TTL: z.coerce.number().int().positive().default(86400),
  SCORING_CACHE_DIR: optionalString,
  MAX_ARTICLES_PER_BATCH: z.coerce.number().int().positive().default(50),
  SCORING_CONCURRENCY: z.coerce.number().int().positive().default(3),
  BATCH_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),
  MIN_CONTENT_LENGTH: z.coerce.number().int().min(1).default(240),

  REPRESENTATION_METHOD: z.enum(['lexical', 'embedding']).default('lexical'),
  EMBEDDING_MODEL: z.string().default('text-embedding-004'),
  CLUSTER_SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(0.35)
});

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  store:
    | { driver: 'sqlite'; path: string }
    | { driver: 'mongo'; uri: string; dbName: string };
  reasoning:
    | { provider: 'gemini'; apiKey: string; model: string }
    | { provider: 'openai'; apiKey: string; baseUrl: string; model: string };
  reasoningTimeoutMs: number;
  reasoningMaxAttempts: number;
  reasoningBackoffMs: number;
  cacheTtlSeconds: number;
  cacheDir?: string;
  maxArticlesPerBatch: number;
  scoringConcurrency: number;
  batchTimeoutMs?: number;
  minContentLength: number;
  representation:
    | { method: 'lexical' }
    | { method: 'embedding'; model: string; apiKey: string };
  similarityThreshold: number;
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

/** Reads configuration from an environment map. Only the entry point calls this. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  const problems: string[] = [];

  let store: AppConfig['store'] = { driver: 'sqlite', path: e.DB_PATH };
  if (e.STORE_DRIVER === 'mongo') {
    if (!e.MONGODB_URI) problems.push('MONGODB_URI is required when STORE_DRIVER=mongo');
    store = { driver: 'mongo', uri: e.MONGODB_URI ?? '', dbName: e.MONGODB_DB_NAME };
  }

  let reasoning: AppConfig['reasoning'];
  if (e.REASONING_PROVIDER === 'gemini') {
    if (!e.GOOGLE_AI_KEY) problems.push('GOOGLE_AI_KEY is required when REASONING_PROVIDER=gemini');
    reasoning = { provider: 'gemini', apiKey: e.GOOGLE_AI_KEY ?? '', model: e.REASONING_MODEL ?? 'gemini-2.5-flash' };
  } else {
    if (!e.OPENAI_API_KEY) problems.push('OPENAI_API_KEY is required when REASONING_PROVIDER=openai');
    reasoning = {
      provider: 'openai',
      apiKey: e.OPENAI_API_KEY ?? '',
      baseUrl: e.OPENAI_BASE_URL,
      model: e.REASONING_MODEL ?? 'gpt-4o-mini'
    };
  }

  let representation: AppConfig['representation'] = { method: 'lexical' };
  if (e.REPRESENTATION_METHOD === 'embedding') {
    if (!e.GOOGLE_AI_KEY) problems.push('GOOGLE_AI_KEY is required when REPRESENTATION_METHOD=embedding');
    representation = { method: 'embedding', model: e.EMBEDDING_MODEL, apiKey: e.GOOGLE_AI_KEY ?? '' };
  }

  if (problems.length) throw new ConfigError(problems);

  return {
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean),
    store,
    reasoning,
    reasoningTimeoutMs: e.REASONING_TIMEOUT_MS,
    reasoningMaxAttempts: e.REASONING_MAX_ATTEMPTS,
    reasoningBackoffMs: e.REASONING_BACKOFF_MS,
    cacheTtlSeconds: e.SCORING_CACHE_TTL,
    cacheDir: e.SCORING_CACHE_DIR,
    maxArticlesPerBatch: e.MAX_ARTICLES_PER_BATCH,
    scoringConcurrency: e.SCORING_CONCURRENCY,
    batchTimeoutMs: e.BATCH_TIMEOUT_MS,
    minContentLength: e.MIN_CONTENT_LENGTH,
    representation,
    similarityThreshold: e.CLUSTER_SIMILARITY_THRESHOLD
  };
}
