import { Router } from "express";
import { z } from "zod";
import type { Pipeline } from "../pipeline";
import { IncomingArticleSchema, ingestArticles } from "../services/articleIngest";
import type { Article } from "../utils/dataStore";
import { sendError } from "./respond";

const IngestBodySchema = z.object({
  articles: z.array(IncomingArticleSchema).min(1)
});

const ScorePendingSchema = z.object({
  limit: z.coerce.number().int().positive().optional()
});

const ScoreBatchSchema = z.object({
  articleIds: z.array(z.string().min(1))
});

export default function articlesRouter(pipeline: Pipeline): Router {
  const router = Router();
  const { store, scoring } = pipeline;

  // GET /api/articles - Most recently published first
  router.get("/", async (req, res) => {
    try {
      const raw = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
      const limit = Number.isFinite(raw) && raw > 0 ? Math.min(raw, 200) : 50;
      const articles = await store.listArticles(limit);
      res.json({
        articles,
        total: articles.length,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch articles");
    }
  });

  // POST /api/articles - Ingest normalized articles
  router.post("/", async (req, res) => {
    try {
      const body = IngestBodySchema.parse(req.body);
      const saved = await ingestArticles(store, body.articles);
      const unscored = saved.filter(article => !article.assessment).length;
      console.log(`[Ingest] Stored ${saved.length} article(s), ${unscored} awaiting scoring`);
      res.status(201).json({
        message: `Stored ${saved.length} articles`,
        articles: saved.map(article => ({
          id: article.id,
          contentFingerprint: article.contentFingerprint,
          scored: article.assessment !== null
        })),
      });
    } catch (error) {
      sendError(res, error, "Failed to ingest articles");
    }
  });

  // POST /api/articles/score - Score whatever is still unscored
  router.post("/score", async (req, res) => {
    try {
      const { limit } = ScorePendingSchema.parse(req.body ?? {});
      const report = await scoring.scorePending(limit);
      res.json(report);
    } catch (error) {
      sendError(res, error, "Failed to score articles");
    }
  });

  // POST /api/articles/score-batch - Score the named articles
  router.post("/score-batch", async (req, res) => {
    try {
      const { articleIds } = ScoreBatchSchema.parse(req.body);
      const found = await Promise.all(articleIds.map(id => store.getArticleById(id)));
      const missing = articleIds.filter((_, i) => found[i] === null);
      if (missing.length) {
        return res.status(404).json({ error: "Articles not found", missing });
      }
      const articles = found.filter((article): article is Article => article !== null);
      const report = await scoring.scoreBatch(articles);
      res.json(report);
    } catch (error) {
      sendError(res, error, "Failed to score articles");
    }
  });

  // GET /api/articles/diagnostics/status - Scored vs pending, by model version
  router.get('/diagnostics/status', async (_req, res) => {
    try {
      const articles = await store.listArticles();
      const summary = articles.reduce<Record<string, number>>((acc, a) => {
        const status = a.assessment ? a.assessment.modelVersion : 'unscored';
        acc[status] = (acc[status] || 0) + 1;
        return acc;
      }, {});
      res.json({ summary, total: articles.length, timestamp: new Date().toISOString() });
    } catch (error) {
      sendError(res, error, 'Failed to build diagnostics');
    }
  });

  // GET /api/articles/:id - Article with its assessment
  router.get("/:id", async (req, res) => {
    try {
      const article = await store.getArticleById(req.params.id);
      if (!article) {
        return res.status(404).json({ error: "Article not found" });
      }
      res.json(article);
    } catch (error) {
      sendError(res, error, "Failed to fetch article details");
    }
  });

  return router;
}
