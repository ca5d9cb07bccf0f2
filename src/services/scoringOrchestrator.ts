import type { Article, ArticleStore, BiasAssessment } from "../utils/dataStore";
import { mapWithConcurrency } from "../utils/concurrency";
import { BatchTooLargeError, InputError, ScoringFailedError, describeError } from "../utils/errors";
import type { FailureKind } from "../utils/errors";
import type { BiasAnalyzer } from "./biasAnalyzer";
import { locatePhrases } from "./biasSchema";
import type { ScoredResponse } from "./biasSchema";
import type { PromptBuilder } from "./promptBuilder";
import { scoreCacheKey } from "./scoreCache";
import type { ScoreCache } from "./scoreCache";

export interface ScoringFailure {
  articleId: string;
  reason: string;
  kind: FailureKind;
}

export type ScoreOutcome =
  | { status: 'scored'; assessment: BiasAssessment }
  | { status: 'failed'; failure: ScoringFailure }
  | { status: 'not-attempted' };

export interface BatchScoreReport {
  results: Record<string, ScoreOutcome>;
  summary: { scored: number; failed: number; notAttempted: number };
  startedAt: string;
  finishedAt: string;
}

export interface ScoringOrchestratorDeps {
  promptBuilder: PromptBuilder;
  analyzer: BiasAnalyzer;
  cache: ScoreCache;
  store: ArticleStore;
}

export interface ScoringOrchestratorOptions {
  maxArticlesPerBatch: number;
  concurrency: number;
  // After this no new article starts and the report is returned; in-flight calls finish in the background
  batchTimeoutMs?: number;
}

export class ScoringOrchestrator {
  constructor(
    private readonly deps: ScoringOrchestratorDeps,
    private readonly options: ScoringOrchestratorOptions
  ) {}

  get maxArticlesPerBatch(): number {
    return this.options.maxArticlesPerBatch;
  }

  /** Scores up to `limit` articles the store reports as unscored. */
  async scorePending(limit: number = this.options.maxArticlesPerBatch): Promise<BatchScoreReport> {
    const articles = await this.deps.store.listUnscored(Math.min(limit, this.options.maxArticlesPerBatch));
    console.log(`[Scoring] Found ${articles.length} unscored article(s)`);
    return this.scoreBatch(articles);
  }

  async scoreBatch(articles: Article[], maxBatchSize: number = this.options.maxArticlesPerBatch): Promise<BatchScoreReport> {
    const ceiling = Math.min(maxBatchSize, this.options.maxArticlesPerBatch);
    if (articles.length > ceiling) {
      throw new BatchTooLargeError(articles.length, ceiling);
    }

    const startedAt = new Date().toISOString();
    const unique = dedupeById(articles);
    const finished = new Map<string, ScoreOutcome>();
    const controller = new AbortController();

    console.log(`[Scoring] Scoring ${unique.length} article(s), concurrency ${this.options.concurrency}`);
    const run = mapWithConcurrency(
      unique,
      { limit: this.options.concurrency, signal: controller.signal },
      async article => {
        const outcome = await this.scoreOne(article).catch((error: unknown): ScoreOutcome => ({
          // scoreOne turns failures into data; anything here is a bug worth surfacing as a failure
          status: 'failed',
          failure: { articleId: article.id, reason: describeError(error), kind: 'unknown' }
        }));
        finished.set(article.id, outcome);
      }
    );
    await this.untilDoneOrDeadline(run, controller);

    // Calls still in flight at the deadline keep running and persist on their own
    const results: Record<string, ScoreOutcome> = {};
    const summary = { scored: 0, failed: 0, notAttempted: 0 };
    for (const article of unique) {
      const outcome: ScoreOutcome = finished.get(article.id) ?? { status: 'not-attempted' };
      results[article.id] = outcome;
      if (outcome.status === 'scored') summary.scored++;
      else if (outcome.status === 'failed') summary.failed++;
      else summary.notAttempted++;
    }

    console.log(
      `[Scoring] Batch complete: ${summary.scored} scored, ${summary.failed} failed, ${summary.notAttempted} not attempted`
    );
    return { results, summary, startedAt, finishedAt: new Date().toISOString() };
  }

  private async untilDoneOrDeadline(run: Promise<unknown>, controller: AbortController): Promise<void> {
    const timeoutMs = this.options.batchTimeoutMs;
    if (timeoutMs === undefined) {
      await run;
      return;
    }
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>(resolve => {
      timer = setTimeout(() => {
        console.warn(`[Scoring] ⚠️ Batch deadline of ${timeoutMs}ms reached, no further articles start`);
        controller.abort(new Error('batch deadline exceeded'));
        resolve();
      }, timeoutMs);
    });
    try {
      await Promise.race([run, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async scoreOne(article: Article): Promise<ScoreOutcome> {
    const fail = (reason: string, kind: FailureKind): ScoreOutcome => {
      console.error(`[Scoring] ❌ ${article.id}: ${reason}`);
      return { status: 'failed', failure: { articleId: article.id, reason, kind } };
    };

    let response: ScoredResponse;
    try {
      const prompt = this.deps.promptBuilder.build(article);
      const key = scoreCacheKey(article.contentFingerprint, this.deps.analyzer.modelVersion);
      // No batch signal reaches the shared compute: other batches may be waiting on it
      response = await this.deps.cache.getOrCompute(key, () => {
        console.log(`[Scoring] Analyzing article: "${article.title.substring(0, 50)}..."`);
        return this.deps.analyzer.score(prompt);
      });
    } catch (error) {
      if (error instanceof InputError) return fail(error.message, 'input');
      if (error instanceof ScoringFailedError) return fail(error.reason, error.kind);
      return fail(describeError(error), 'unknown');
    }

    const { kept, dropped } = locatePhrases(response.candidatePhrases, article.content);
    if (dropped > 0) {
      console.warn(`[Scoring] Dropped ${dropped} phrase(s) not found in ${article.id}`);
    }
    const assessment: BiasAssessment = {
      articleId: article.id,
      scores: response.scores,
      justifications: response.justifications,
      biasPhrases: kept,
      notableClaims: response.notableClaims,
      computedAt: response.computedAt,
      modelVersion: response.modelVersion
    };
    try {
      await this.deps.store.saveAssessment(article.id, assessment);
    } catch (error) {
      return fail(`could not save assessment: ${describeError(error)}`, 'storage');
    }
    return { status: 'scored', assessment };
  }
}

function dedupeById(articles: Article[]): Article[] {
  const seen = new Set<string>();
  return articles.filter(article => {
    if (seen.has(article.id)) return false;
    seen.add(article.id);
    return true;
  });
}
