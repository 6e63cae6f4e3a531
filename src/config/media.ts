/**
 * Media Tool Configuration
 * Fixed media formats and the tool settings injected into the invocation builders.
 */

import {
  YTDLP_PATH,
  FFMPEG_PATH,
  FFMPEG_BINARY,
  FFPROBE_BINARY,
  ENABLE_SPONSORBLOCK,
} from "./env.js";

/** Container/audio formats accepted for fetch and convert requests. */
export const MEDIA_FORMATS = ["mp3", "mp4", "wav", "mkv", "webm", "m4a", "opus"] as const;

export type MediaFormat = (typeof MEDIA_FORMATS)[number];

/** File extensions the artifact locator treats as finished media. */
export const MEDIA_EXTENSIONS: readonly string[] = MEDIA_FORMATS.map((format) => `.${format}`);

/** SponsorBlock categories removed when content-marker removal is enabled. */
export const SPONSORBLOCK_CATEGORIES = ["sponsor", "intro", "outro"] as const;

export interface FetchToolConfig {
  /** yt-dlp binary name or path */
  binary: string;
  /** Forwarded as --ffmpeg-location */
  ffmpegLocation?: string;
  sponsorBlock: boolean;
  sponsorBlockCategories: readonly string[];
}

export interface TranscodeToolConfig {
  ffmpegBinary: string;
  ffprobeBinary: string;
}

export const DEFAULT_FETCH_TOOL_CONFIG: FetchToolConfig = {
  binary: "yt-dlp",
  sponsorBlock: false,
  sponsorBlockCategories: SPONSORBLOCK_CATEGORIES,
};

/**
 * Builds the fetch tool configuration from the process environment.
 * Called once at startup; builders never read the environment themselves.
 */
export function fetchToolConfigFromEnv(): FetchToolConfig {
  return {
    ...DEFAULT_FETCH_TOOL_CONFIG,
    binary: YTDLP_PATH,
    ffmpegLocation: FFMPEG_PATH,
    sponsorBlock: ENABLE_SPONSORBLOCK,
  };
}

export function transcodeToolConfigFromEnv(): TranscodeToolConfig {
  return {
    ffmpegBinary: FFMPEG_BINARY,
    ffprobeBinary: FFPROBE_BINARY,
  };
}
