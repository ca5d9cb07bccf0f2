import type { ScoredResponse } from "../src/services/biasSchema";
import type { CompletionOptions, ReasoningService } from "../src/services/reasoning/types";
import type {
  Article,
  ArticleStore,
  BiasAnalysis,
  BiasAssessment,
  DimensionScores,
  NarrativeCluster
} from "../src/utils/dataStore";
import { contentFingerprint } from "../src/utils/fingerprint";

export const SAMPLE_BODY =
  'City council members voted on Tuesday evening to approve a revised transit budget after a long public hearing. ' +
  'Supporters called the plan a reckless gamble with public money, while opponents argued that bus riders had waited ' +
  'years for better service. The vote followed months of negotiation between the mayor and the transit authority.';

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export function makeArticle(id: string, overrides: Partial<Article> = {}): Article {
  const title = overrides.title ?? `Story ${id}`;
  const content = overrides.content ?? `${SAMPLE_BODY} Reference ${id}.`;
  return {
    id,
    sourceOutlet: 'Daily Example',
    title,
    content,
    url: `https://news.example.org/${id}`,
    publishedAt: '2026-02-20T08:00:00.000Z',
    fetchedAt: '2026-02-20T09:00:00.000Z',
    contentFingerprint: contentFingerprint(title, content),
    assessment: null,
    clusterId: null,
    ...overrides
  };
}

export function makeScores(value = 2): DimensionScores {
  return { framing: value, omission: value, tone: value, source_selection: value, word_choice: value };
}

export function makeAnalysis(overrides: Partial<BiasAnalysis> = {}): BiasAnalysis {
  return {
    scores: makeScores(),
    justifications: {
      framing: 'Balanced framing',
      omission: 'Little missing context',
      tone: 'Mostly neutral',
      source_selection: 'Both sides quoted',
      word_choice: 'One loaded phrase'
    },
    biasPhrases: [],
    notableClaims: [],
    computedAt: FIXED_NOW.toISOString(),
    modelVersion: 'fake-model@1',
    ...overrides
  };
}

export function makeScoredResponse(overrides: Partial<ScoredResponse> = {}): ScoredResponse {
  const { scores, justifications, notableClaims, computedAt, modelVersion } = makeAnalysis();
  return { scores, justifications, candidatePhrases: [], notableClaims, computedAt, modelVersion, ...overrides };
}

export function makeAssessment(articleId: string, overrides: Partial<BiasAnalysis> = {}): BiasAssessment {
  return { articleId, ...makeAnalysis(overrides) };
}

export function validResponse(scores: DimensionScores = makeScores(3), phrases: Array<{ text: string; dimension: string }> = []): string {
  return JSON.stringify({
    scores,
    justifications: {
      framing: 'Frames the vote as contested',
      omission: 'Ridership numbers are missing',
      tone: 'Some charged wording',
      source_selection: 'Quotes both camps',
      word_choice: 'Uses "reckless gamble"'
    },
    bias_phrases: phrases,
    notable_claims: [{ span: 'bus riders had waited years', claim: 'Service delays' }]
  });
}

type Responder = (prompt: string, call: number, options: CompletionOptions) => string | Promise<string>;

/** Reasoning service whose replies come from a function; records every prompt. */
export class FakeReasoningService implements ReasoningService {
  readonly prompts: string[] = [];

  constructor(private readonly responder: Responder, readonly modelVersion = 'fake-model@1') {}

  get calls(): number {
    return this.prompts.length;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    return this.responder(prompt, this.prompts.length, options);
  }
}

/** Never settles unless the caller aborts. */
export function hangUntilAborted(options: CompletionOptions): Promise<string> {
  return new Promise((_resolve, reject) => {
    options.signal.addEventListener('abort', () => reject(options.signal.reason), { once: true });
  });
}

export class MemoryArticleStore implements ArticleStore {
  readonly articles = new Map<string, Article>();
  clusters: NarrativeCluster[] = [];

  constructor(initial: Article[] = []) {
    initial.forEach(article => this.articles.set(article.id, { ...article }));
  }

  private ordered(): Article[] {
    return [...this.articles.values()].sort((a, b) =>
      b.publishedAt.localeCompare(a.publishedAt) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
    );
  }

  async listUnscored(maxCount: number): Promise<Article[]> {
    return this.ordered().filter(article => !article.assessment).slice(0, maxCount);
  }

  async saveAssessment(articleId: string, assessment: BiasAssessment): Promise<void> {
    const article = this.articles.get(articleId);
    if (article) article.assessment = assessment;
  }

  async saveClusters(clusters: NarrativeCluster[]): Promise<void> {
    this.clusters = clusters;
    const index = new Map<string, string>();
    clusters.forEach(c => c.memberArticleIds.forEach(id => index.set(id, c.clusterId)));
    for (const article of this.articles.values()) article.clusterId = index.get(article.id) ?? null;
  }

  async saveArticles(articles: Article[]): Promise<void> {
    articles.forEach(article => this.articles.set(article.id, { ...article }));
  }

  async listArticles(limit?: number): Promise<Article[]> {
    const all = this.ordered();
    return limit === undefined ? all : all.slice(0, limit);
  }

  async getArticleById(id: string): Promise<Article | null> {
    return this.articles.get(id) ?? null;
  }

  async loadClusters(): Promise<NarrativeCluster[]> {
    return this.clusters;
  }

  async close(): Promise<void> {}
}
