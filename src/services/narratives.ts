import type { Article, ArticleStore, BiasDimension, DimensionScores, NarrativeCluster } from "../utils/dataStore";
import { mapWithConcurrency } from "../utils/concurrency";
import type { ClusterEngine } from "./clusterEngine";
import { labelClusters } from "./clusterLabels";
import type { RepresentationBuilder } from "./representation";

export interface OutletComparison {
  sourceOutlet: string;
  articleCount: number;
  scoredCount: number;
  avgScores: DimensionScores | null;
  distinctivePhrases: string[];
}

export interface TimelineEntry {
  articleId: string;
  publishedAt: string;
  sourceOutlet: string;
  title: string;
  scores: DimensionScores | null;
}

export interface NarrativeComparison {
  cluster: NarrativeCluster;
  avgScores: DimensionScores | null;
  outlets: OutletComparison[];
  timeline: TimelineEntry[];
  // Shown as "scoring unavailable" rather than hidden
  unscoredArticleIds: string[];
}

export interface NarrativeServiceDeps {
  store: ArticleStore;
  representations: RepresentationBuilder;
  engine: ClusterEngine;
}

export interface NarrativeServiceOptions {
  similarityThreshold: number;
  representationConcurrency?: number;
}

export class NarrativeService {
  constructor(
    private readonly deps: NarrativeServiceDeps,
    private readonly options: NarrativeServiceOptions
  ) {}

  /** Rebuilds the whole partition over the current article set and persists it. */
  async recluster(): Promise<NarrativeCluster[]> {
    const articles = (await this.deps.store.listArticles()).map(article => ({ ...article }));
    console.log(`[Cluster] Building ${this.deps.representations.method} representations for ${articles.length} article(s)`);

    const settled = await mapWithConcurrency(
      articles,
      { limit: this.options.representationConcurrency ?? 4 },
      article => this.deps.representations.represent(article)
    );
    const representations = settled.map((outcome, i) => {
      if (outcome.status === 'fulfilled') return outcome.value;
      const reason = outcome.status === 'rejected' ? outcome.reason : 'not built';
      throw new Error(`Could not build representation for ${articles[i].id}`, { cause: reason });
    });

    const clusters = labelClusters(
      this.deps.engine.cluster(representations, this.options.similarityThreshold),
      articles
    );
    await this.deps.store.saveClusters(clusters);
    return clusters;
  }

  listClusters(): Promise<NarrativeCluster[]> {
    return this.deps.store.loadClusters();
  }

  async compare(clusterId: string): Promise<NarrativeComparison | null> {
    const clusters = await this.deps.store.loadClusters();
    const cluster = clusters.find(c => c.clusterId === clusterId);
    if (!cluster) return null;

    const loaded = await Promise.all(cluster.memberArticleIds.map(id => this.deps.store.getArticleById(id)));
    const members = loaded.filter((article): article is Article => article !== null);

    const byOutlet = new Map<string, Article[]>();
    for (const article of members) {
      const list = byOutlet.get(article.sourceOutlet);
      if (list) list.push(article);
      else byOutlet.set(article.sourceOutlet, [article]);
    }

    const outlets = [...byOutlet.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([sourceOutlet, articles]): OutletComparison => {
        const phrases = new Set<string>();
        for (const article of articles) {
          article.assessment?.biasPhrases.forEach(phrase => phrases.add(phrase.text));
        }
        return {
          sourceOutlet,
          articleCount: articles.length,
          scoredCount: articles.filter(article => article.assessment).length,
          avgScores: averageScores(articles),
          distinctivePhrases: [...phrases]
        };
      });

    const timeline = [...members]
      .sort((a, b) => new Date(a.publishedAt).getTime() - new Date(b.publishedAt).getTime())
      .map(article => ({
        articleId: article.id,
        publishedAt: article.publishedAt,
        sourceOutlet: article.sourceOutlet,
        title: article.title,
        scores: article.assessment ? article.assessment.scores : null
      }));

    return {
      cluster,
      avgScores: averageScores(members),
      outlets,
      timeline,
      unscoredArticleIds: members.filter(article => !article.assessment).map(article => article.id)
    };
  }
}

/** Mean per dimension over scored articles, two decimals; null when none are scored. */
export function averageScores(articles: Article[]): DimensionScores | null {
  const scored = articles.flatMap(article => (article.assessment ? [article.assessment.scores] : []));
  if (scored.length === 0) return null;
  const avg = (dimension: BiasDimension) =>
    Math.round((scored.reduce((acc, s) => acc + s[dimension], 0) / scored.length) * 100) / 100;
  return {
    framing: avg('framing'),
    omission: avg('omission'),
    tone: avg('tone'),
    source_selection: avg('source_selection'),
    word_choice: avg('word_choice')
  };
}
