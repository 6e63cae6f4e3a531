/**
 * HTTP Server Entry Point
 * Wires the media service, starts the Express application and the cleanup job.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { initializeApp } from "./config/init.js";
import { DOWNLOAD_ROOT, PORT, WORKSPACE_RETENTION_HOURS } from "./config/env.js";
import { fetchToolConfigFromEnv, transcodeToolConfigFromEnv } from "./config/media.js";
import { supabase } from "./config/supabase.js";
import { createDisabledRecorder, createSupabaseRecorder } from "./repositories/outcomeRepository.js";
import { createProcessRunner } from "./services/external/processRunner.js";
import { createSessionManager } from "./services/business/sessionService.js";
import { createMediaService } from "./services/business/mediaService.js";
import { startWorkspaceCleanupJob } from "./jobs/crons/workspaceCleanup.js";

const sessions = createSessionManager(DOWNLOAD_ROOT);
const recorder = supabase ? createSupabaseRecorder(supabase) : createDisabledRecorder();
if (!supabase) {
  console.log("[recorder] SUPABASE_URL/SUPABASE_SERVICE_ROLE_KEY not set - outcome log disabled");
}

const media = createMediaService({
  runner: createProcessRunner(),
  sessions,
  recorder,
  fetchTool: fetchToolConfigFromEnv(),
  transcodeTool: transcodeToolConfigFromEnv(),
});

/** HTTP server instance wrapping the Express application. */
const server = createServer(createApp({ media, sessions, recorder }));

initializeApp()
  .then(() => {
    server.listen(PORT, "0.0.0.0", () => {
      console.log(`Server running on 0.0.0.0:${PORT}`);
    });
    startWorkspaceCleanupJob(sessions, WORKSPACE_RETENTION_HOURS);
  })
  .catch((error) => {
    console.error("✗ Initialization failed:", error);
    process.exit(1);
  });

/**
 * Handles graceful shutdown on SIGTERM signal.
 * Closes the server and exits the process cleanly.
 */
process.on("SIGTERM", () => {
  server.close(() => process.exit(0));
});
