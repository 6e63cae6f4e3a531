/**
 * Media Validation Schemas
 * Zod schemas for fetch, batch fetch, convert and file-path requests.
 * Bodies may use camelCase or the snake_case field names of earlier clients.
 */

import path from "path";
import { z } from "zod";
import { MEDIA_FORMATS } from "../../config/media.js";

const SNAKE_CASE_ALIASES: Record<string, string> = {
  subtitle_langs: "subtitleLangs",
  embed_subs: "embedSubs",
  audio_only: "audioOnly",
  filename_template: "filenameTemplate",
  extra_args: "extraArgs",
  input_path: "inputPath",
  output_format: "outputFormat",
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

/**
 * Renames snake_case keys to camelCase. An explicit camelCase key wins.
 */
export function withCamelCaseKeys(value: unknown): unknown {
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    const target = Object.hasOwn(SNAKE_CASE_ALIASES, key) ? SNAKE_CASE_ALIASES[key] : undefined;
    if (target) {
      if (!(target in value)) out[target] = field;
    } else {
      out[key] = field;
    }
  }
  return out;
}

/** Output templates stay inside the session workspace. */
function isContainedTemplate(template: string): boolean {
  return !path.isAbsolute(template) && !template.split(/[\\/]/).includes("..");
}

const optionalString = z
  .string()
  .min(1)
  .nullish()
  .transform((value) => value ?? undefined);

const optionalArgs = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? undefined);

const fetchOptionsShape = {
  format: z.enum(MEDIA_FORMATS).default("mp4"),
  quality: z
    .string()
    .nullish()
    .transform((value) => (value ? value : "best")),
  subtitles: z.boolean().default(false),
  subtitleLangs: z
    .array(z.string().min(1))
    .nullish()
    .transform((value) => (value && value.length > 0 ? value : ["en"])),
  embedSubs: z.boolean().default(false),
  audioOnly: z.boolean().default(false),
  filenameTemplate: optionalString.refine(
    (value) => value === undefined || isContainedTemplate(value),
    "filenameTemplate must be a relative path without '..' segments"
  ),
  extraArgs: optionalArgs,
};

const fetchOptionsSchema = z.preprocess(
  (value) => withCamelCaseKeys(value ?? {}),
  z.object(fetchOptionsShape)
);

/**
 * Schema for POST /api/download.
 */
export const fetchRequestSchema = z.preprocess(
  withCamelCaseKeys,
  z.object({
    url: z.string().trim().min(1, "url is required"),
    ...fetchOptionsShape,
  })
);

/**
 * Schema for POST /api/download/batch. `common` applies to every URL.
 */
export const batchFetchRequestSchema = z.object({
  urls: z.array(z.string().trim().min(1)).min(1, "urls must not be empty").max(50),
  common: fetchOptionsSchema,
});

/**
 * Schema for POST /api/convert. Timestamps are passed to ffmpeg unchecked.
 */
export const convertRequestSchema = z.preprocess(
  withCamelCaseKeys,
  z.object({
    inputPath: z.string().min(1, "inputPath is required"),
    outputFormat: z.enum(MEDIA_FORMATS),
    start: optionalString,
    end: optionalString,
    extraArgs: optionalArgs,
  })
);

/**
 * Schema for ?path= queries (probe, file).
 */
export const pathQuerySchema = z.object({
  path: z.string().min(1, "path is required"),
});

/**
 * Schema for GET /api/history.
 */
export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export type FetchRequestBody = z.infer<typeof fetchRequestSchema>;
export type BatchFetchRequestBody = z.infer<typeof batchFetchRequestSchema>;
export type ConvertRequestBody = z.infer<typeof convertRequestSchema>;
export type PathQuery = z.infer<typeof pathQuerySchema>;
export type HistoryQuery = z.infer<typeof historyQuerySchema>;
