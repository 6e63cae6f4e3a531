/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Optional integrations (Supabase) are disabled when their variables are missing.
 */

import os from "os";
import path from "path";

/** Server configuration */
export const PORT = parseInt(process.env.PORT || "8000", 10);
export const NODE_ENV = process.env.NODE_ENV || "development";
/** Allowed CORS origin ("*" for any) */
export const CORS_ORIGIN = process.env.CORS_ORIGIN || "*";

/** Root directory under which every fetch session gets its own workspace */
export const DOWNLOAD_ROOT =
  process.env.DOWNLOAD_ROOT || path.join(os.tmpdir(), "downloads");

/** External tools */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";
/** Passed to yt-dlp as --ffmpeg-location when set */
export const FFMPEG_PATH = process.env.FFMPEG_PATH || undefined;
export const FFMPEG_BINARY = process.env.FFMPEG_BINARY || "ffmpeg";
export const FFPROBE_BINARY = process.env.FFPROBE_BINARY || "ffprobe";
export const ENABLE_SPONSORBLOCK = parseBoolean(process.env.ENABLE_SPONSORBLOCK);

/** Workspace retention in hours; -1 keeps workspaces forever */
export const WORKSPACE_RETENTION_HOURS = parseRetentionHours(
  process.env.WORKSPACE_RETENTION_HOURS
);

/** Supabase configuration (outcome log). Both must be set to enable recording. */
export const SUPABASE_URL = process.env.SUPABASE_URL || undefined;
export const SUPABASE_SERVICE_ROLE_KEY = process.env.SUPABASE_SERVICE_ROLE_KEY || undefined;

/**
 * Parses a boolean-like environment value.
 * Only "true" (any case) enables a flag.
 */
export function parseBoolean(value: string | undefined): boolean {
  return (value ?? "false").trim().toLowerCase() === "true";
}

/**
 * Parses the retention window in hours. Unset means 72.
 * Throws on anything that is not a number.
 */
export function parseRetentionHours(value: string | undefined): number {
  const raw = value?.trim() || "72";
  const hours = Number(raw);
  if (!Number.isFinite(hours)) {
    throw new Error(`Invalid WORKSPACE_RETENTION_HOURS: ${value}`);
  }
  return hours;
}
