/**
 * Workspace Retention Service
 * Evicts session workspaces older than the configured retention window.
 */

import type { SessionManager } from "./sessionService.js";

export interface RetentionResult {
  deleted: number;
  kept: number;
  errors: number;
}

/**
 * Deletes workspaces whose last modification is older than `maxAgeHours`.
 * A negative or non-numeric `maxAgeHours` disables eviction.
 */
export async function evictExpiredSessions(
  sessions: SessionManager,
  maxAgeHours: number,
  nowMs: number = Date.now()
): Promise<RetentionResult> {
  const result: RetentionResult = { deleted: 0, kept: 0, errors: 0 };
  if (!Number.isFinite(maxAgeHours)) {
    console.warn(`[cleanup] Invalid retention window ${maxAgeHours}, skipping eviction`);
    return result;
  }
  if (maxAgeHours < 0) return result;

  const cutoff = nowMs - maxAgeHours * 60 * 60 * 1000;

  for (const session of await sessions.listSessions()) {
    if (session.createdAt.getTime() >= cutoff) {
      result.kept++;
      continue;
    }
    try {
      await sessions.deleteSession(session.id);
      result.deleted++;
    } catch (error) {
      result.errors++;
      console.warn(`[cleanup] Failed to remove ${session.workspaceDir}:`, error);
    }
  }

  console.log(
    `[cleanup] ✓ Removed ${result.deleted} workspaces, kept ${result.kept}, ${result.errors} errors`
  );
  return result;
}
