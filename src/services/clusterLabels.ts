import stopwordList from "../data/stopwords.json";
import type { Article, NarrativeCluster } from "../utils/dataStore";

const STOPWORDS = new Set<string>(stopwordList);

function labelTerms(article: Pick<Article, 'title' | 'content'>): Set<string> {
  const words = `${article.title} ${article.content.substring(0, 500)}`
    .replace(/<[^>]+>/g, ' ')
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(word => word.length >= 3 && !STOPWORDS.has(word) && !/^\d+$/.test(word));
  return new Set(words);
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Names each cluster after its three most distinctive terms: frequent among
 * its members, rare across the whole article set.
 */
export function labelClusters(clusters: NarrativeCluster[], articles: Article[]): NarrativeCluster[] {
  const termsById = new Map(articles.map(article => [article.id, labelTerms(article)]));
  const corpusDf = new Map<string, number>();
  for (const terms of termsById.values()) {
    for (const term of terms) corpusDf.set(term, (corpusDf.get(term) ?? 0) + 1);
  }
  const total = termsById.size;

  return clusters.map((cluster, index) => {
    const clusterDf = new Map<string, number>();
    for (const id of cluster.memberArticleIds) {
      for (const term of termsById.get(id) ?? []) {
        clusterDf.set(term, (clusterDf.get(term) ?? 0) + 1);
      }
    }
    const ranked = [...clusterDf.entries()]
      .map(([term, df]) => ({ term, score: df * (Math.log((1 + total) / (1 + (corpusDf.get(term) ?? 0))) + 1) }))
      .sort((a, b) => b.score - a.score || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
      .slice(0, 3)
      .map(entry => titleCase(entry.term));
    return { ...cluster, label: ranked.length > 0 ? ranked.join(' ') : `Cluster ${index + 1}` };
  });
}
