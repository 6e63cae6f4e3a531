/**
 * Outcome Recording
 * Fire-and-forget writes to the outcome log. A failing store never fails a media operation.
 */

import type {
  OutcomeCollection,
  OutcomeRecordMap,
  OutcomeRecorder,
  StoredOutcome,
} from "../../repositories/outcomeRepository.js";

/**
 * Sends one record to the recorder without awaiting it.
 * Sync throws and rejections are logged and dropped; nothing is retried.
 */
export function recordOutcome<C extends OutcomeCollection>(
  recorder: OutcomeRecorder,
  collection: C,
  record: OutcomeRecordMap[C]
): void {
  const onFailure = (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[recorder] ${collection} record dropped: ${message}`);
  };

  try {
    void recorder.record(collection, record).catch(onFailure);
  } catch (error) {
    onFailure(error);
  }
}

/**
 * Reads recent records; an unavailable store yields an empty list.
 */
export async function listRecentOutcomes(
  recorder: OutcomeRecorder,
  collection: OutcomeCollection,
  limit: number
): Promise<StoredOutcome[]> {
  try {
    return await recorder.listRecent(collection, limit);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[recorder] Could not list ${collection}: ${message}`);
    return [];
  }
}
