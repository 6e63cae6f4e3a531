/**
 * Workspace Cleanup Cron Job
 * Scheduled eviction of expired session workspaces.
 */

import cron, { type ScheduledTask } from "node-cron";
import { evictExpiredSessions } from "../../services/business/retentionService.js";
import type { SessionManager } from "../../services/business/sessionService.js";

/**
 * Starts the workspace cleanup cron job.
 * Runs at minute 0 of every hour. Returns null when retention is disabled.
 */
export function startWorkspaceCleanupJob(
  sessions: SessionManager,
  maxAgeHours: number
): ScheduledTask | null {
  if (maxAgeHours < 0) {
    console.log("[Workspace Cleanup Job] Disabled (WORKSPACE_RETENTION_HOURS < 0)");
    return null;
  }

  const task = cron.schedule("0 * * * *", async () => {
    console.log("[Workspace Cleanup Job] Starting...");
    try {
      await evictExpiredSessions(sessions, maxAgeHours);
    } catch (error) {
      console.error("[Workspace Cleanup Job] ✗ Failed:", error);
    }
  });

  console.log(`[Workspace Cleanup Job] Scheduled (hourly, retention ${maxAgeHours}h)`);
  return task;
}
