import { Router } from "express";
import type { Pipeline } from "../pipeline";
import { sendError } from "./respond";

export default function narrativesRouter(pipeline: Pipeline): Router {
  const router = Router();
  const { narratives } = pipeline;

  // GET /api/narratives - Persisted clusters
  router.get("/", async (_req, res) => {
    try {
      const clusters = await narratives.listClusters();
      res.json({
        clusters,
        total: clusters.length,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch narratives");
    }
  });

  // POST /api/narratives/recluster - Rebuild the partition over all stored articles
  router.post("/recluster", async (_req, res) => {
    try {
      const clusters = await narratives.recluster();
      res.json({
        message: `Built ${clusters.length} narrative clusters`,
        clusters,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      sendError(res, error, "Failed to cluster narratives");
    }
  });

  // GET /api/narratives/:clusterId - Side-by-side outlet comparison
  router.get("/:clusterId", async (req, res) => {
    try {
      const comparison = await narratives.compare(req.params.clusterId);
      if (!comparison) {
        return res.status(404).json({ error: "Narrative cluster not found" });
      }
      res.json(comparison);
    } catch (error) {
      sendError(res, error, "Failed to fetch narrative details");
    }
  });

  return router;
}
