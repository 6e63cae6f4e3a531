/**
 * Convert Command Builder
 * Translates a convert request into the ffmpeg argument list and its output path.
 */

import { access } from "fs/promises";
import path from "path";
import type { MediaFormat, TranscodeToolConfig } from "../../config/media.js";
import { InputNotFoundError } from "../../utils/errors.js";

export interface ConvertRequest {
  inputPath: string;
  outputFormat: MediaFormat;
  /** HH:MM:SS, passed through to -ss unchecked */
  start?: string;
  /** HH:MM:SS, passed through to -to unchecked */
  end?: string;
  extraArgs?: string[];
}

export interface ConvertCommand {
  args: string[];
  outputPath: string;
}

export const CONVERTED_SUFFIX = "_conv";

/**
 * `a/b.mp4` + `mp3` -> `a/b_conv.mp3`
 */
export function convertedOutputPath(inputPath: string, format: MediaFormat): string {
  const ext = path.extname(inputPath);
  const base = ext ? inputPath.slice(0, -ext.length) : inputPath;
  return `${base}${CONVERTED_SUFFIX}.${format}`;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Builds the ffmpeg invocation, binary first. Output is overwritten unconditionally (-y).
 */
export async function buildConvertArgs(
  req: ConvertRequest,
  config: TranscodeToolConfig
): Promise<ConvertCommand> {
  if (!(await fileExists(req.inputPath))) {
    throw new InputNotFoundError(req.inputPath);
  }

  const outputPath = convertedOutputPath(req.inputPath, req.outputFormat);
  const args = [config.ffmpegBinary, "-y", "-i", req.inputPath];

  if (req.start) {
    args.push("-ss", req.start);
  }
  if (req.end) {
    args.push("-to", req.end);
  }
  if (req.extraArgs) {
    args.push(...req.extraArgs);
  }
  args.push(outputPath);

  return { args, outputPath };
}
