/**
 * Evict expired session workspaces once
 * Run with: tsx src/scripts/cleanupWorkspaces.ts [maxAgeHours]
 */

import "dotenv/config";
import {
  DOWNLOAD_ROOT,
  WORKSPACE_RETENTION_HOURS,
  parseRetentionHours,
} from "../config/env.js";
import { createSessionManager } from "../services/business/sessionService.js";
import { evictExpiredSessions } from "../services/business/retentionService.js";

async function cleanupWorkspaces() {
  const maxAgeHours = process.argv[2]
    ? parseRetentionHours(process.argv[2])
    : WORKSPACE_RETENTION_HOURS;

  console.log(`Scanning ${DOWNLOAD_ROOT} for workspaces older than ${maxAgeHours}h...`);
  const result = await evictExpiredSessions(createSessionManager(DOWNLOAD_ROOT), maxAgeHours);
  console.log(`Done: ${JSON.stringify(result)}`);
}

cleanupWorkspaces()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error("Cleanup failed:", error);
    process.exit(1);
  });
