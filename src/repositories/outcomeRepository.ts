/**
 * Outcome Repository
 * Append-only log of fetch ("history") and convert ("conversions") attempts.
 */

import type { SupabaseClient } from "@supabase/supabase-js";

export type OutcomeCollection = "history" | "conversions";

export interface FetchOutcomeRecord {
  session_id: string;
  url: string;
  format: string;
  audio_only: boolean;
  subtitles: boolean;
  embed_subs: boolean;
  out_dir: string;
  output_hint: string;
  stdout: string;
}

export interface ConvertOutcomeRecord {
  input: string;
  output: string;
  extra_args: string[] | null;
}

export interface OutcomeRecordMap {
  history: FetchOutcomeRecord;
  conversions: ConvertOutcomeRecord;
}

/** A stored record as read back, including columns the store adds (id, created_at). */
export type StoredOutcome = Record<string, unknown>;

export interface OutcomeRecorder {
  /** "supabase", "disabled", ... */
  readonly name: string;
  record<C extends OutcomeCollection>(collection: C, record: OutcomeRecordMap[C]): Promise<void>;
  listRecent(collection: OutcomeCollection, limit: number): Promise<StoredOutcome[]>;
}

/**
 * Records outcomes as rows of the `history` and `conversions` tables.
 */
export function createSupabaseRecorder(client: SupabaseClient): OutcomeRecorder {
  return {
    name: "supabase",

    async record(collection, record) {
      const { error } = await client.from(collection).insert(record);

      if (error) {
        throw new Error(`Failed to insert ${collection} record: ${error.message}`);
      }
    },

    async listRecent(collection, limit) {
      const { data, error } = await client
        .from(collection)
        .select()
        .order("created_at", { ascending: false })
        .limit(limit);

      if (error) {
        throw new Error(`Failed to list ${collection}: ${error.message}`);
      }

      return data || [];
    },
  };
}

/**
 * Stand-in used when no store is configured. Every call rejects.
 */
export function createDisabledRecorder(): OutcomeRecorder {
  const unavailable = () => Promise.reject(new Error("Outcome store is not configured"));
  return {
    name: "disabled",
    record: unavailable,
    listRecent: unavailable,
  };
}
