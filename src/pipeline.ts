import type { AppConfig } from "./config";
import { BiasAnalyzer } from "./services/biasAnalyzer";
import { ClusterEngine } from "./services/clusterEngine";
import { NarrativeService } from "./services/narratives";
import { PromptBuilder } from "./services/promptBuilder";
import { GeminiReasoningService } from "./services/reasoning/gemini";
import { OpenAICompatibleReasoningService } from "./services/reasoning/openaiCompatible";
import type { ReasoningService } from "./services/reasoning/types";
import { EmbeddingRepresentationBuilder, LexicalRepresentationBuilder } from "./services/representation";
import type { RepresentationBuilder } from "./services/representation";
import { FileCacheStore, MemoryCacheStore, ScoreCache } from "./services/scoreCache";
import type { CacheStore } from "./services/scoreCache";
import { ScoringOrchestrator } from "./services/scoringOrchestrator";
import type { ArticleStore } from "./utils/dataStore";
import { SqliteArticleStore } from "./utils/database";
import { MongoArticleStore } from "./utils/database.mongo";

export interface Pipeline {
  store: ArticleStore;
  scoring: ScoringOrchestrator;
  narratives: NarrativeService;
  modelVersion: string;
}

/** Collaborators a caller (usually a test) may supply instead of the configured ones. */
export interface PipelineOverrides {
  store?: ArticleStore;
  reasoning?: ReasoningService;
  cacheStore?: CacheStore;
  representations?: RepresentationBuilder;
  now?: () => Date;
}

export function createStore(config: AppConfig): ArticleStore {
  if (config.store.driver === 'mongo') {
    return new MongoArticleStore({ uri: config.store.uri, dbName: config.store.dbName });
  }
  return new SqliteArticleStore(config.store.path);
}

export function createReasoningService(config: AppConfig): ReasoningService {
  const reasoning = config.reasoning;
  if (reasoning.provider === 'openai') {
    return new OpenAICompatibleReasoningService({
      baseUrl: reasoning.baseUrl,
      apiKey: reasoning.apiKey,
      model: reasoning.model
    });
  }
  return new GeminiReasoningService({ apiKey: reasoning.apiKey, model: reasoning.model });
}

export function createRepresentationBuilder(config: AppConfig): RepresentationBuilder {
  if (config.representation.method === 'embedding') {
    return new EmbeddingRepresentationBuilder({
      model: config.representation.model,
      apiKey: config.representation.apiKey
    });
  }
  return new LexicalRepresentationBuilder();
}

export function createPipeline(config: AppConfig, overrides: PipelineOverrides = {}): Pipeline {
  const now = overrides.now ?? (() => new Date());
  const store = overrides.store ?? createStore(config);
  const reasoning = overrides.reasoning ?? createReasoningService(config);
  const cacheStore = overrides.cacheStore
    ?? (config.cacheDir ? new FileCacheStore(config.cacheDir) : new MemoryCacheStore());

  const analyzer = new BiasAnalyzer(reasoning, {
    maxAttempts: config.reasoningMaxAttempts,
    baseDelayMs: config.reasoningBackoffMs,
    timeoutMs: config.reasoningTimeoutMs,
    now
  });
  const scoring = new ScoringOrchestrator(
    {
      promptBuilder: new PromptBuilder({ minContentLength: config.minContentLength }),
      analyzer,
      cache: new ScoreCache(cacheStore, { ttlSeconds: config.cacheTtlSeconds, now: () => now().getTime() }),
      store
    },
    {
      maxArticlesPerBatch: config.maxArticlesPerBatch,
      concurrency: config.scoringConcurrency,
      batchTimeoutMs: config.batchTimeoutMs
    }
  );
  const narratives = new NarrativeService(
    {
      store,
      representations: overrides.representations ?? createRepresentationBuilder(config),
      engine: new ClusterEngine({ now })
    },
    { similarityThreshold: config.similarityThreshold }
  );

  return { store, scoring, narratives, modelVersion: reasoning.modelVersion };
}
