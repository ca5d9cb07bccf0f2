import { z } from "zod";
import type { Article, ArticleStore } from "../utils/dataStore";
import { contentFingerprint, fnv1a } from "../utils/fingerprint";

export const IncomingArticleSchema = z.object({
  id: z.string().min(1).optional(),
  sourceOutlet: z.string().min(1),
  title: z.string().min(1),
  content: z.string(),
  url: z.string().default(''),
  publishedAt: z.string().datetime({ offset: true }),
  fetchedAt: z.string().datetime({ offset: true }).optional()
});

export type IncomingArticle = z.infer<typeof IncomingArticleSchema>;

export function articleIdFor(input: Pick<IncomingArticle, 'id' | 'url'>, fingerprint: string): string {
  if (input.id) return input.id;
  if (input.url) return fnv1a(input.url).toString(36);
  return fingerprint.substring(0, 16);
}

/**
 * Normalizes incoming records into stored articles. An article whose text is
 * unchanged keeps its assessment and cluster; changed text starts unscored.
 */
export async function ingestArticles(
  store: ArticleStore,
  inputs: IncomingArticle[],
  now: () => Date = () => new Date()
): Promise<Article[]> {
  const articles: Article[] = [];
  for (const input of inputs) {
    const fingerprint = contentFingerprint(input.title, input.content);
    const id = articleIdFor(input, fingerprint);
    const existing = await store.getArticleById(id);
    const unchanged = existing !== null && existing.contentFingerprint === fingerprint;
    articles.push({
      id,
      sourceOutlet: input.sourceOutlet.trim(),
      title: input.title.trim(),
      content: input.content.trim(),
      url: input.url,
      publishedAt: input.publishedAt,
      fetchedAt: input.fetchedAt ?? now().toISOString(),
      contentFingerprint: fingerprint,
      assessment: unchanged ? existing.assessment : null,
      clusterId: unchanged ? existing.clusterId : null
    });
  }
  await store.saveArticles(articles);
  return articles;
}
