/**
 * Artifact Locator
 * Finds the media file a fetch produced by scanning its session workspace.
 */

import type { Dirent } from "fs";
import { readdir } from "fs/promises";
import path from "path";
import { MEDIA_EXTENSIONS } from "../../config/media.js";
import type { Session } from "./sessionService.js";

export function isMediaFile(name: string): boolean {
  return MEDIA_EXTENSIONS.some((ext) => name.endsWith(ext));
}

async function listEntries(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (error) {
    console.warn(`[artifacts] Could not read ${dir}:`, error);
    return [];
  }
}

const byName = (a: Dirent, b: Dirent) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/**
 * Depth-first search: files of a directory (lexical order) before its subdirectories.
 */
async function findFirstMedia(dir: string): Promise<string | null> {
  const entries = (await listEntries(dir)).sort(byName);

  for (const entry of entries) {
    if (entry.isFile() && isMediaFile(entry.name)) {
      return path.join(dir, entry.name);
    }
  }

  for (const entry of entries) {
    if (entry.isDirectory()) {
      const found = await findFirstMedia(path.join(dir, entry.name));
      if (found) return found;
    }
  }

  return null;
}

/**
 * Returns the first media file in the session workspace.
 * Falls back to the workspace directory itself when nothing matches; never throws.
 */
export async function locateArtifact(session: Session): Promise<string> {
  const found = await findFirstMedia(session.workspaceDir);
  if (!found) {
    console.warn(`[artifacts] No media file in ${session.workspaceDir}, returning workspace`);
    return session.workspaceDir;
  }
  return found;
}
