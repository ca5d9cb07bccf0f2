import { BiasAnalyzer } from "../src/services/biasAnalyzer";
import { PromptBuilder } from "../src/services/promptBuilder";
import { MemoryCacheStore, ScoreCache } from "../src/services/scoreCache";
import { ScoringOrchestrator } from "../src/services/scoringOrchestrator";
import type { ScoringOrchestratorOptions } from "../src/services/scoringOrchestrator";
import { BatchTooLargeError, TransportError } from "../src/utils/errors";
import type { Article } from "../src/utils/dataStore";
import {
  FIXED_NOW,
  FakeReasoningService,
  MemoryArticleStore,
  SAMPLE_BODY,
  makeArticle,
  makeAssessment,
  validResponse
} from "./helpers";

const wait = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

function setup(
  service: FakeReasoningService,
  articles: Article[],
  options: Partial<ScoringOrchestratorOptions> = {},
  cache = new ScoreCache(new MemoryCacheStore())
) {
  const store = new MemoryArticleStore(articles);
  const orchestrator = new ScoringOrchestrator(
    {
      promptBuilder: new PromptBuilder(),
      analyzer: new BiasAnalyzer(service, { baseDelayMs: 0, now: () => FIXED_NOW }),
      cache,
      store
    },
    { maxArticlesPerBatch: 50, concurrency: 3, ...options }
  );
  return { store, orchestrator };
}

const phraseReply = () => validResponse(undefined, [
  { text: 'reckless gamble', dimension: 'tone' },
  { text: 'a phrase nobody wrote', dimension: 'framing' }
]);

describe("ScoringOrchestrator.scoreBatch", () => {
  it("scores every article and keeps only phrases found in its text", async () => {
    const service = new FakeReasoningService(phraseReply);
    const articles = [makeArticle('a1'), makeArticle('a2')];
    const { store, orchestrator } = setup(service, articles);

    const report = await orchestrator.scoreBatch(articles);

    expect(report.summary).toEqual({ scored: 2, failed: 0, notAttempted: 0 });
    const outcome = report.results['a1'];
    expect(outcome.status).toBe('scored');
    if (outcome.status !== 'scored') return;
    const start = SAMPLE_BODY.indexOf('reckless gamble');
    expect(outcome.assessment.articleId).toBe('a1');
    expect(outcome.assessment.biasPhrases).toEqual([
      { text: 'reckless gamble', dimension: 'tone', start, end: start + 'reckless gamble'.length }
    ]);
    expect((await store.getArticleById('a2'))?.assessment?.articleId).toBe('a2');
  });

  it("isolates a failing article from the rest of the batch", async () => {
    const service = new FakeReasoningService(prompt => {
      if (prompt.includes('Title: Story a3\n')) {
        throw new TransportError('HTTP 400', { retryable: false, status: 400 });
      }
      return validResponse();
    });
    const articles = ['a1', 'a2', 'a3', 'a4', 'a5'].map(id => makeArticle(id));
    const { store, orchestrator } = setup(service, articles);

    const report = await orchestrator.scoreBatch(articles);

    expect(report.summary).toEqual({ scored: 4, failed: 1, notAttempted: 0 });
    expect(report.results['a3']).toEqual({
      status: 'failed',
      failure: { articleId: 'a3', reason: 'HTTP 400 (after 1 attempt)', kind: 'transport' }
    });
    expect(await store.getArticleById('a3')).toMatchObject({ assessment: null });
    expect((await store.listUnscored(10)).map(a => a.id)).toEqual(['a3']);
  });

  it("makes no further service calls when the same batch is scored again", async () => {
    const service = new FakeReasoningService(() => validResponse());
    const articles = ['a1', 'a2', 'a3'].map(id => makeArticle(id));
    const { store, orchestrator } = setup(service, articles);

    await orchestrator.scoreBatch(articles);
    const first = structuredClone(await store.listArticles());
    expect(service.calls).toBe(3);

    const again = await orchestrator.scoreBatch(articles);
    expect(service.calls).toBe(3);
    expect(again.summary.scored).toBe(3);
    expect(await store.listArticles()).toEqual(first);
  });

  it("scores identical text once across articles", async () => {
    const service = new FakeReasoningService(() => validResponse());
    const shared = { title: 'Wire copy', content: SAMPLE_BODY };
    const articles = [makeArticle('outlet-a', shared), makeArticle('outlet-b', shared)];
    const { orchestrator } = setup(service, articles);

    const report = await orchestrator.scoreBatch(articles);

    expect(service.calls).toBe(1);
    expect(report.summary.scored).toBe(2);
  });

  it("rejects a batch over the ceiling before calling the service", async () => {
    const service = new FakeReasoningService(() => validResponse());
    const articles = Array.from({ length: 51 }, (_, i) => makeArticle(`a${i}`));
    const { orchestrator } = setup(service, articles);

    await expect(orchestrator.scoreBatch(articles)).rejects.toBeInstanceOf(BatchTooLargeError);
    await expect(orchestrator.scoreBatch(articles.slice(0, 3), 2)).rejects.toThrow(
      'Batch of 3 articles exceeds the limit of 2'
    );
    expect(service.calls).toBe(0);
  });

  it("reports unusable content as an input failure without calling the service", async () => {
    const service = new FakeReasoningService(() => validResponse());
    const articles = [makeArticle('short', { content: 'Too short to score.' })];
    const { orchestrator } = setup(service, articles);

    const report = await orchestrator.scoreBatch(articles);

    expect(report.results['short']).toEqual({
      status: 'failed',
      failure: {
        articleId: 'short',
        reason: 'Article content has 19 characters, at least 240 are required',
        kind: 'input'
      }
    });
    expect(service.calls).toBe(0);
  });

  it("returns at the deadline and lets calls in flight finish on their own", async () => {
    const service = new FakeReasoningService(async prompt => {
      if (prompt.includes('Title: Story a2\n')) await wait(60);
      return validResponse();
    });
    const articles = ['a1', 'a2', 'a3'].map(id => makeArticle(id));
    const { store, orchestrator } = setup(service, articles, { concurrency: 1, batchTimeoutMs: 30 });

    const report = await orchestrator.scoreBatch(articles);

    expect(report.summary).toEqual({ scored: 1, failed: 0, notAttempted: 2 });
    expect(report.results['a1'].status).toBe('scored');
    expect(report.results['a2']).toEqual({ status: 'not-attempted' });
    expect(report.results['a3']).toEqual({ status: 'not-attempted' });

    await wait(80);
    expect((await store.getArticleById('a2'))?.assessment?.articleId).toBe('a2');
    expect((await store.getArticleById('a3'))?.assessment).toBeNull();
    expect(service.calls).toBe(2);
  });

  it("does not fail a batch sharing a call with another batch whose deadline passed", async () => {
    const service = new FakeReasoningService(async () => {
      await wait(60);
      return validResponse();
    });
    const article = makeArticle('a1');
    const cache = new ScoreCache(new MemoryCacheStore());
    const hurried = setup(service, [article], { batchTimeoutMs: 20 }, cache);
    const relaxed = setup(service, [article], {}, cache);

    const [early, complete] = await Promise.all([
      hurried.orchestrator.scoreBatch([article]),
      relaxed.orchestrator.scoreBatch([article])
    ]);

    expect(early.results['a1']).toEqual({ status: 'not-attempted' });
    expect(complete.results['a1'].status).toBe('scored');
    expect(service.calls).toBe(1);
  });

  it("locates cached phrases in each copy's own text", async () => {
    const service = new FakeReasoningService(() => validResponse(undefined, [
      { text: 'reckless gamble', dimension: 'tone' },
      { text: 'bus riders had waited years', dimension: 'omission' }
    ]));
    const reflowed = SAMPLE_BODY.replace('City council', 'City  council').replace('reckless gamble', 'reckless\ngamble');
    const original = makeArticle('wire', { title: 'Wire copy', content: SAMPLE_BODY });
    const copy = makeArticle('copy', { title: 'Wire copy', content: reflowed });
    expect(copy.contentFingerprint).toBe(original.contentFingerprint);
    const { orchestrator } = setup(service, [original, copy]);

    const first = await orchestrator.scoreBatch([original]);
    const second = await orchestrator.scoreBatch([copy]);

    expect(service.calls).toBe(1);
    const gamble = SAMPLE_BODY.indexOf('reckless gamble');
    const riders = SAMPLE_BODY.indexOf('bus riders had waited years');
    expect(first.results['wire']).toMatchObject({
      status: 'scored',
      assessment: {
        biasPhrases: [
          { text: 'reckless gamble', dimension: 'tone', start: gamble, end: gamble + 15 },
          { text: 'bus riders had waited years', dimension: 'omission', start: riders, end: riders + 27 }
        ]
      }
    });
    expect(second.results['copy']).toMatchObject({
      status: 'scored',
      assessment: {
        articleId: 'copy',
        biasPhrases: [{ text: 'bus riders had waited years', dimension: 'omission', start: riders + 1, end: riders + 28 }]
      }
    });
    const outcome = second.results['copy'];
    if (outcome.status !== 'scored') return;
    outcome.assessment.biasPhrases.forEach(phrase => {
      expect(reflowed.slice(phrase.start, phrase.end)).toBe(phrase.text);
    });
  });

  it("reports a duplicated article once", async () => {
    const service = new FakeReasoningService(() => validResponse());
    const article = makeArticle('a1');
    const { orchestrator } = setup(service, [article]);

    const report = await orchestrator.scoreBatch([article, article]);

    expect(Object.keys(report.results)).toEqual(['a1']);
    expect(report.summary.scored).toBe(1);
  });
});

describe("ScoringOrchestrator.scorePending", () => {
  it("scores the most recent unscored articles up to the limit", async () => {
    const service = new FakeReasoningService(() => validResponse());
    const articles = [
      makeArticle('old', { publishedAt: '2026-02-01T00:00:00.000Z' }),
      makeArticle('mid', { publishedAt: '2026-02-10T00:00:00.000Z' }),
      makeArticle('new', { publishedAt: '2026-02-20T00:00:00.000Z' }),
      makeArticle('done', { publishedAt: '2026-02-25T00:00:00.000Z', assessment: makeAssessment('done') })
    ];
    const { orchestrator } = setup(service, articles);

    const report = await orchestrator.scorePending(2);

    expect(Object.keys(report.results).sort()).toEqual(['mid', 'new']);
    expect(service.calls).toBe(2);
  });
});
