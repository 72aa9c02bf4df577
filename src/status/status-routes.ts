/**
 * Express route handlers for the read-only moderation status API.
 *
 * Routes:
 *   GET  /api/moderation/status          → paused flag, counts, last pass
 *   GET  /api/moderation/pending?limit=N → decided-but-unexecuted requests
 *
 * Nothing here writes. Fingerprints and file paths never leave the process.
 */

import express from "express";
import type { Express, Request, Response, Router } from "express";
import type { DecisionCache } from "../cache/DecisionCache.js";
import type { RunnerState } from "../moderation/RunnerState.js";

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

export function parseLimit(raw: unknown): number {
  const parsed = parseInt(String(raw ?? DEFAULT_LIMIT), 10);
  if (!Number.isFinite(parsed) || parsed < 1) return DEFAULT_LIMIT;
  return Math.min(parsed, MAX_LIMIT);
}

export function registerStatusRoutes(router: Router, cache: DecisionCache, state: RunnerState): void {
  // GET /api/moderation/status
  router.get("/moderation/status", (_req: Request, res: Response) => {
    res.json({
      paused: state.paused,
      nightMode: state.nightMode,
      pendingDecisions: cache.listPending().length,
      cachedRequests: cache.size,
      lastPass: state.lastPass ?? null,
    });
  });

  // GET /api/moderation/pending?limit=20
  router.get("/moderation/pending", (req: Request, res: Response) => {
    const limit = parseLimit(req.query.limit);
    const pending = cache
      .listPending()
      .map((r) => ({
        name: r.name,
        decision: r.decision,
        notifiedAt: r.notifiedAt,
        decidedAt: r.decidedAt ?? null,
        unanswered: r.unanswered,
      }))
      .sort((a, b) => Date.parse(b.decidedAt ?? b.notifiedAt) - Date.parse(a.decidedAt ?? a.notifiedAt))
      .slice(0, limit);
    res.json({ total: cache.listPending().length, pending });
  });
}

export function createStatusApp(cache: DecisionCache, state: RunnerState): Express {
  const app = express();
  const router = express.Router();
  registerStatusRoutes(router, cache, state);
  app.use("/api", router);
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "not found" });
  });
  return app;
}
