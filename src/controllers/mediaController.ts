/**
 * Media Controller
 * Handles HTTP requests for fetch, convert, probe, file retrieval and history.
 */

import { Request, Response, NextFunction } from "express";
import type { MediaService } from "../services/business/mediaService.js";
import type {
  BatchFetchRequestBody,
  ConvertRequestBody,
  FetchRequestBody,
  HistoryQuery,
  PathQuery,
} from "../middlewares/schemas/mediaSchemas.js";

export interface MediaController {
  fetchMedia(req: Request, res: Response, next: NextFunction): Promise<void>;
  fetchBatch(req: Request, res: Response, next: NextFunction): Promise<void>;
  convertMedia(req: Request, res: Response, next: NextFunction): Promise<void>;
  probeMedia(req: Request, res: Response, next: NextFunction): Promise<void>;
  getFile(req: Request, res: Response, next: NextFunction): Promise<void>;
  getHistory(req: Request, res: Response, next: NextFunction): Promise<void>;
}

export function createMediaController(media: MediaService): MediaController {
  return {
    /**
     * POST /api/download - Fetches remote media into a new session workspace
     */
    async fetchMedia(req, res, next) {
      try {
        const body: FetchRequestBody = req.body;
        const result = await media.fetchMedia(body);
        res.json({ path: result.path });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/download/batch - Fetches several URLs with shared options
     */
    async fetchBatch(req, res, next) {
      try {
        const body: BatchFetchRequestBody = req.body;
        const results = await media.fetchBatch(body.urls, body.common);
        res.json({ results });
      } catch (error) {
        next(error);
      }
    },

    /**
     * POST /api/convert - Converts/trims a local file with ffmpeg
     */
    async convertMedia(req, res, next) {
      try {
        const body: ConvertRequestBody = req.body;
        const output = await media.convertMedia(body);
        res.json({ output });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/probe?path= - Raw ffprobe output
     */
    async probeMedia(_req, res, next) {
      try {
        const query: PathQuery = res.locals.query;
        const raw = await media.probeMedia(query.path);
        res.json({ raw });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/file?path= - Streams a file back as an attachment
     */
    async getFile(_req, res, next) {
      try {
        const query: PathQuery = res.locals.query;
        const file = await media.resolveFile(query.path);
        res.download(file.path, file.filename, { dotfiles: "allow" }, (error) => {
          if (error && !res.headersSent) next(error);
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/history?limit= - Most recent fetch attempts
     */
    async getHistory(_req, res, next) {
      try {
        const query: HistoryQuery = res.locals.query;
        const items = await media.listHistory(query.limit);
        res.json({ items });
      } catch (error) {
        next(error);
      }
    },
  };
}
