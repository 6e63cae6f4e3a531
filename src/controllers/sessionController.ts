/**
 * Session Controller
 * Lists and deletes session workspaces.
 */

import { Request, Response, NextFunction } from "express";
import type { SessionManager } from "../services/business/sessionService.js";

export function createSessionController(sessions: SessionManager) {
  return {
    /**
     * GET /api/sessions - Lists workspaces, newest first
     */
    async listSessions(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const list = await sessions.listSessions();
        res.json({
          sessions: list.map((s) => ({
            id: s.id,
            workspaceDir: s.workspaceDir,
            createdAt: s.createdAt.toISOString(),
          })),
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * DELETE /api/sessions/:id - Removes a workspace and its files
     */
    async deleteSession(req: Request<{ id: string }>, res: Response, next: NextFunction): Promise<void> {
      try {
        await sessions.deleteSession(req.params.id);
        res.status(204).send();
      } catch (error) {
        next(error);
      }
    },
  };
}
