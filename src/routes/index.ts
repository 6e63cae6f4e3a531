/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import type { AppDeps } from "../app.js";
import { createHealthRouter } from "./health.js";
import { createMediaRouter } from "./media.js";
import { createSessionsRouter } from "./sessions.js";

export function createRouter(deps: AppDeps): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(deps.recorder));
  router.use("/api", createMediaRouter(deps.media));
  router.use("/api/sessions", createSessionsRouter(deps.sessions));

  return router;
}
