/**
 * Process Runner
 * Executes external command-line tools (yt-dlp, ffmpeg, ffprobe) using execa.
 * Arguments are always passed as a discrete list; no shell is involved.
 */

import { execa } from "execa";
import path from "path";
import { ExternalToolError } from "../../utils/errors.js";

/** Failure output is cut to this many trailing characters. */
export const MAX_FAILURE_OUTPUT_CHARS = 2000;

export interface InvocationResult {
  /** stdout and stderr interleaved in arrival order */
  stdoutCombined: string;
  exitSucceeded: boolean;
  exitCode: number;
  /** execa's one-line failure summary, e.g. "spawn yt-dlp ENOENT" */
  failureMessage?: string;
}

export interface ProcessRunner {
  /**
   * Runs `args[0]` with the remaining arguments and resolves with the combined output.
   * Rejects with ExternalToolError when the process exits non-zero or cannot be spawned.
   */
  run(args: readonly string[]): Promise<string>;
}

/**
 * Keeps the trailing part of tool output, where the relevant diagnostics usually are.
 */
export function truncateOutput(output: string, maxChars: number = MAX_FAILURE_OUTPUT_CHARS): string {
  return output.length > maxChars ? output.slice(-maxChars) : output;
}

/**
 * Runs a command and reports the outcome without throwing on a non-zero exit.
 */
export async function runCommand(args: readonly string[]): Promise<InvocationResult> {
  const [command, ...rest] = args;
  if (!command) {
    throw new Error("Cannot run an empty command");
  }

  const result = await execa(command, rest, {
    all: true,
    reject: false,
    stripFinalNewline: false,
    windowsHide: true,
  });

  const failureMessage =
    result.failed && "shortMessage" in result && typeof result.shortMessage === "string"
      ? result.shortMessage
      : undefined;

  return {
    stdoutCombined: result.all ?? "",
    exitSucceeded: !result.failed,
    exitCode: result.exitCode ?? -1,
    failureMessage,
  };
}

/**
 * Default runner backed by execa. Failures are never retried.
 */
export function createProcessRunner(): ProcessRunner {
  return {
    async run(args) {
      const result = await runCommand(args);
      if (result.exitSucceeded) {
        return result.stdoutCombined;
      }

      const tool = path.basename(args[0] ?? "command");
      const output =
        truncateOutput(result.stdoutCombined) ||
        result.failureMessage ||
        `${tool} produced no output`;
      console.error(`[${tool}] exited with code ${result.exitCode}`);
      throw new ExternalToolError(tool, result.exitCode, output);
    },
  };
}
