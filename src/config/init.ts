/**
 * Application Initialization
 * Ensures the download root exists on startup.
 */

import { mkdir } from "fs/promises";
import { DOWNLOAD_ROOT } from "./env.js";

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(): Promise<void> {
  console.log("Initializing application...");

  try {
    await mkdir(DOWNLOAD_ROOT, { recursive: true });
    console.log(`✓ Download root ready at ${DOWNLOAD_ROOT}\n`);
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
