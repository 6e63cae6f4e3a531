import express from "express";
import helmet from "helmet";
import cors from "cors";
import type { MediaService } from "./services/business/mediaService.js";
import type { SessionManager } from "./services/business/sessionService.js";
import type { OutcomeRecorder } from "./repositories/outcomeRepository.js";
import { createRouter } from "./routes/index.js";
import { apiLimiter } from "./middlewares/rateLimiting.js";
import { errorHandler } from "./middlewares/errorHandler.js";
import { CORS_ORIGIN } from "./config/env.js";

export interface AppDeps {
  media: MediaService;
  sessions: SessionManager;
  recorder: OutcomeRecorder;
}

/**
 * Builds the Express application.
 * Configures global middleware and routes.
 */
export function createApp(deps: AppDeps): express.Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors({ origin: CORS_ORIGIN }));
  /** Parses JSON request bodies. */
  app.use(express.json({ limit: "1mb" }));

  /** Rate limiting for all routes. */
  app.use(apiLimiter);

  /** Application routes. */
  app.use(createRouter(deps));

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
