/**
 * Media Routes
 * HTTP endpoints for fetching, converting, probing and retrieving media.
 */

import { Router } from "express";
import type { MediaService } from "../services/business/mediaService.js";
import { createMediaController } from "../controllers/mediaController.js";
import { validateBody, validateQuery } from "../middlewares/validation.js";
import { toolLimiter } from "../middlewares/rateLimiting.js";
import {
  batchFetchRequestSchema,
  convertRequestSchema,
  fetchRequestSchema,
  historyQuerySchema,
  pathQuerySchema,
} from "../middlewares/schemas/mediaSchemas.js";

export function createMediaRouter(media: MediaService): Router {
  const mediaRouter = Router();
  const controller = createMediaController(media);

  /** Fetch remote media with yt-dlp */
  mediaRouter.post("/download", toolLimiter, validateBody(fetchRequestSchema), controller.fetchMedia);

  /** Fetch several URLs with shared options */
  mediaRouter.post("/download/batch", toolLimiter, validateBody(batchFetchRequestSchema), controller.fetchBatch);

  /** Convert or trim a local file with ffmpeg */
  mediaRouter.post("/convert", toolLimiter, validateBody(convertRequestSchema), controller.convertMedia);

  /** Inspect a local file with ffprobe */
  mediaRouter.get("/probe", toolLimiter, validateQuery(pathQuerySchema), controller.probeMedia);

  /** Download a produced file */
  mediaRouter.get("/file", validateQuery(pathQuerySchema), controller.getFile);

  /** Recent fetch attempts */
  mediaRouter.get("/history", validateQuery(historyQuerySchema), controller.getHistory);

  return mediaRouter;
}
