/**
 * Fetch Command Builder
 * Translates a fetch request into the yt-dlp argument list for one session.
 */

import path from "path";
import type { FetchToolConfig, MediaFormat } from "../../config/media.js";
import type { Session } from "./sessionService.js";

export interface FetchRequest {
  url: string;
  format: MediaFormat;
  quality: string;
  subtitles: boolean;
  subtitleLangs: string[];
  embedSubs: boolean;
  audioOnly: boolean;
  filenameTemplate?: string;
  /** Appended verbatim after every built flag */
  extraArgs?: string[];
}

/** yt-dlp output template used when the request does not name one. */
export const DEFAULT_FILENAME_TEMPLATE = "%(title)s-%(id)s.%(ext)s";

/**
 * Named quality presets. Anything else is passed through as a yt-dlp format selector.
 */
export const QUALITY_PRESETS: ReadonlyMap<string, string> = new Map([
  ["best", "bestvideo+bestaudio/best"],
  ["worst", "worstvideo+worstaudio/worst"],
]);

export const DEFAULT_QUALITY = "best";

/**
 * Resolves the -f selector for a quality value.
 */
export function resolveFormatSelector(quality: string | undefined): string {
  const key = quality && quality.length > 0 ? quality : DEFAULT_QUALITY;
  return QUALITY_PRESETS.get(key) ?? key;
}

/**
 * Builds the yt-dlp invocation, binary first.
 *
 * Order: base (url, output template, merge format), quality branch,
 * subtitles, configured flags, caller extra args.
 */
export function buildFetchArgs(
  req: FetchRequest,
  session: Session,
  config: FetchToolConfig
): string[] {
  const template = req.filenameTemplate || DEFAULT_FILENAME_TEMPLATE;
  const args = [
    config.binary,
    req.url,
    "-o",
    path.join(session.workspaceDir, template),
    "--merge-output-format",
    req.format,
  ];

  // Audio extraction wins over any quality selector
  if (req.audioOnly) {
    args.push("-x", "--audio-format", req.format);
  } else {
    args.push("-f", resolveFormatSelector(req.quality));
  }

  if (req.subtitles) {
    const langs = req.subtitleLangs.length > 0 ? req.subtitleLangs : ["en"];
    args.push("--write-subs", "--sub-langs", langs.join(","));
    if (req.embedSubs) {
      args.push("--embed-subs");
    }
  }

  if (config.ffmpegLocation) {
    args.push("--ffmpeg-location", config.ffmpegLocation);
  }

  if (config.sponsorBlock) {
    args.push("--sponsorblock-remove", config.sponsorBlockCategories.join(","));
  }

  if (req.extraArgs && req.extraArgs.length > 0) {
    args.push(...req.extraArgs);
  }

  return args;
}
