/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import { Router } from "express";
import type { OutcomeRecorder } from "../repositories/outcomeRepository.js";

export function createHealthRouter(recorder: OutcomeRecorder): Router {
  const healthRouter = Router();

  /** Service banner. */
  healthRouter.get("/", (_req, res) => {
    res.json({ message: "Media fetch & convert API running" });
  });

  /** Simple health check endpoint. */
  healthRouter.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Readiness check endpoint; reports which outcome store is in use. */
  healthRouter.get("/ready", (_req, res) => {
    res.json({ ready: true, recorder: recorder.name });
  });

  return healthRouter;
}
