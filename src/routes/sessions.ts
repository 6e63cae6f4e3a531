/**
 * Session Routes
 * Workspace listing and explicit deletion.
 */

import { Router } from "express";
import type { SessionManager } from "../services/business/sessionService.js";
import { createSessionController } from "../controllers/sessionController.js";

export function createSessionsRouter(sessions: SessionManager): Router {
  const sessionsRouter = Router();
  const controller = createSessionController(sessions);

  sessionsRouter.get("/", controller.listSessions);
  sessionsRouter.delete("/:id", controller.deleteSession);

  return sessionsRouter;
}
