/**
 * Session Workspace Service
 * Allocates one isolated working directory per fetch request under the download root.
 * Workspaces outlive the request so their files stay retrievable; the retention job removes them.
 */

import type { Dirent } from "fs";
import { mkdir, readdir, rm, stat } from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { NotFoundError, BadRequestError, WorkspaceCreationError } from "../../utils/errors.js";

export interface Session {
  id: string;
  workspaceDir: string;
  createdAt: Date;
}

export interface SessionManager {
  readonly root: string;
  newSession(): Promise<Session>;
  listSessions(): Promise<Session[]>;
  deleteSession(id: string): Promise<void>;
}

const SESSION_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}

/**
 * Creates a session manager rooted at `root`.
 */
export function createSessionManager(root: string): SessionManager {
  return {
    root,

    async newSession() {
      const id = randomUUID();
      const workspaceDir = path.join(root, id);
      try {
        await mkdir(workspaceDir, { recursive: true });
      } catch (error) {
        throw new WorkspaceCreationError(workspaceDir, error);
      }
      return { id, workspaceDir, createdAt: new Date() };
    },

    async listSessions() {
      let entries: Dirent[];
      try {
        entries = await readdir(root, { withFileTypes: true });
      } catch (error) {
        if (isMissing(error)) return [];
        throw error;
      }

      const sessions: Session[] = [];
      for (const entry of entries) {
        if (!entry.isDirectory() || !isSessionId(entry.name)) continue;
        const workspaceDir = path.join(root, entry.name);
        try {
          const stats = await stat(workspaceDir);
          sessions.push({ id: entry.name, workspaceDir, createdAt: stats.mtime });
        } catch (error) {
          // Removed between readdir and stat
          if (!isMissing(error)) throw error;
        }
      }

      return sessions.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    },

    async deleteSession(id) {
      if (!isSessionId(id)) {
        throw new BadRequestError(`Invalid session id: ${id}`);
      }
      const workspaceDir = path.join(root, id);
      try {
        await stat(workspaceDir);
      } catch (error) {
        if (isMissing(error)) throw new NotFoundError("Session", id);
        throw error;
      }
      await rm(workspaceDir, { recursive: true, force: true });
      console.log(`[sessions] Removed workspace ${workspaceDir}`);
    },
  };
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
