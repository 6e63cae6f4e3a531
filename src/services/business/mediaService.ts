/**
 * Media Service
 * Orchestrates fetch, convert and probe: build the invocation, run it,
 * resolve the result path and log the outcome.
 */

import { stat } from "fs/promises";
import path from "path";
import type { FetchToolConfig, TranscodeToolConfig } from "../../config/media.js";
import type { OutcomeRecorder, StoredOutcome } from "../../repositories/outcomeRepository.js";
import type { ProcessRunner } from "../external/processRunner.js";
import { ExternalToolError, NotFoundError } from "../../utils/errors.js";
import { buildFetchArgs, type FetchRequest } from "./fetchCommand.js";
import { buildConvertArgs, type ConvertRequest } from "./convertCommand.js";
import { locateArtifact } from "./artifactLocator.js";
import { isMissing, type Session, type SessionManager } from "./sessionService.js";
import { recordOutcome, listRecentOutcomes } from "./outcomeRecorder.js";

export interface MediaServiceDeps {
  runner: ProcessRunner;
  sessions: SessionManager;
  recorder: OutcomeRecorder;
  fetchTool: FetchToolConfig;
  transcodeTool: TranscodeToolConfig;
  /** Replaceable so a tool-reported path can stand in for the directory scan */
  locate?: (session: Session) => Promise<string>;
}

export interface FetchResult {
  path: string;
  sessionId: string;
}

export type BatchFetchItem =
  | { url: string; path: string }
  | { url: string; error: string; details?: string };

export interface ResolvedFile {
  path: string;
  filename: string;
}

export interface MediaService {
  fetchMedia(req: FetchRequest): Promise<FetchResult>;
  fetchBatch(urls: string[], common: Omit<FetchRequest, "url">): Promise<BatchFetchItem[]>;
  convertMedia(req: ConvertRequest): Promise<string>;
  probeMedia(filePath: string): Promise<string>;
  resolveFile(filePath: string): Promise<ResolvedFile>;
  listHistory(limit: number): Promise<StoredOutcome[]>;
}

async function assertFile(filePath: string): Promise<void> {
  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) throw new NotFoundError("File", filePath);
  } catch (error) {
    if (isMissing(error)) throw new NotFoundError("File", filePath);
    throw error;
  }
}

export function createMediaService(deps: MediaServiceDeps): MediaService {
  const { runner, sessions, recorder, fetchTool, transcodeTool } = deps;
  const locate = deps.locate ?? locateArtifact;

  async function fetchMedia(req: FetchRequest): Promise<FetchResult> {
    const session = await sessions.newSession();
    const args = buildFetchArgs(req, session, fetchTool);

    console.log(`[ytdlp] Session ${session.id}: fetching ${req.url} as ${req.format}`);
    const output = await runner.run(args);

    const artifactPath = await locate(session);
    console.log(`[ytdlp] Session ${session.id}: done -> ${artifactPath}`);

    recordOutcome(recorder, "history", {
      session_id: session.id,
      url: req.url,
      format: req.format,
      audio_only: req.audioOnly,
      subtitles: req.subtitles,
      embed_subs: req.embedSubs,
      out_dir: session.workspaceDir,
      output_hint: artifactPath,
      stdout: output,
    });

    return { path: artifactPath, sessionId: session.id };
  }

  async function fetchBatch(
    urls: string[],
    common: Omit<FetchRequest, "url">
  ): Promise<BatchFetchItem[]> {
    const settled = await Promise.allSettled(urls.map((url) => fetchMedia({ ...common, url })));

    return settled.map((result, index): BatchFetchItem => {
      const url = urls[index] ?? "";
      if (result.status === "fulfilled") {
        return { url, path: result.value.path };
      }
      const reason: unknown = result.reason;
      if (reason instanceof ExternalToolError) {
        return { url, error: reason.message, details: reason.output };
      }
      return { url, error: reason instanceof Error ? reason.message : String(reason) };
    });
  }

  async function convertMedia(req: ConvertRequest): Promise<string> {
    const { args, outputPath } = await buildConvertArgs(req, transcodeTool);

    console.log(`[ffmpeg] Converting ${req.inputPath} -> ${outputPath}`);
    await runner.run(args);

    recordOutcome(recorder, "conversions", {
      input: req.inputPath,
      output: outputPath,
      extra_args: req.extraArgs ?? null,
    });

    return outputPath;
  }

  async function probeMedia(filePath: string): Promise<string> {
    await assertFile(filePath);
    return runner.run([transcodeTool.ffprobeBinary, "-hide_banner", "-i", filePath]);
  }

  async function resolveFile(filePath: string): Promise<ResolvedFile> {
    await assertFile(filePath);
    return { path: path.resolve(filePath), filename: path.basename(filePath) };
  }

  function listHistory(limit: number): Promise<StoredOutcome[]> {
    return listRecentOutcomes(recorder, "history", limit);
  }

  return { fetchMedia, fetchBatch, convertMedia, probeMedia, resolveFile, listHistory };
}
