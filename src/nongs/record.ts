// ─── Song Records ───────────────────────────────────────────────────────────
//
// Factories, the duplicate rule, and JSON conversion for SongRecord.
// Optional metadata is omitted from JSON rather than written as null, so
// files written by older and newer builds stay readable by both.
// ─────────────────────────────────────────────────────────────────────────────

import { randomInt } from "node:crypto";
import type { SongMetadata, SongRecord } from "./types.js";
import { UNIQUE_ID_LENGTH } from "./types.js";
import type { SongRecordJSON } from "./schema.js";

const ID_ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

/** Generate a fresh opaque uniqueID. */
export function createUniqueID(length: number = UNIQUE_ID_LENGTH): string {
  let out = "";
  for (let i = 0; i < length; i++) {
    out += ID_ALPHABET[randomInt(ID_ALPHABET.length)];
  }
  return out;
}

type NewMetadata = Omit<SongMetadata, "uniqueID"> & { uniqueID?: string };

/** A song whose audio lives at `path`. */
export function createLocalSong(metadata: NewMetadata, path: string): SongRecord {
  return {
    metadata: { ...metadata, uniqueID: metadata.uniqueID ?? createUniqueID() },
    storage: { kind: "file", path },
  };
}

/** A song whose audio is not on disk yet. */
export function createPendingSong(metadata: NewMetadata): SongRecord {
  return {
    metadata: { ...metadata, uniqueID: metadata.uniqueID ?? createUniqueID() },
    storage: { kind: "pending" },
  };
}

/** Placeholder default for a track nobody has told us about yet. */
export function createUnknownSong(trackID: number): SongRecord {
  return createPendingSong({ trackID, name: "Unknown", artist: "" });
}

/** Audio path of a record, or undefined while pending. */
export function songPath(record: SongRecord): string | undefined {
  return record.storage.kind === "file" ? record.storage.path : undefined;
}

// ─── Duplicate Rule ─────────────────────────────────────────────────────────

/**
 * How start offsets take part in duplicate detection.
 * - "compare": offsets must match too (absent counts as 0)
 * - "ignore":  only name and artist are compared
 */
export type OffsetPolicy = "compare" | "ignore";

export function isDuplicateSong(
  a: SongRecord,
  b: SongRecord,
  offsetPolicy: OffsetPolicy = "compare"
): boolean {
  const am = a.metadata;
  const bm = b.metadata;
  if (am.name !== bm.name || am.artist !== bm.artist) return false;
  if (offsetPolicy === "ignore") return true;
  return (am.startOffset ?? 0) === (bm.startOffset ?? 0);
}

// ─── JSON ───────────────────────────────────────────────────────────────────

export function recordToJSON(record: SongRecord): SongRecordJSON {
  const m = record.metadata;
  const json: SongRecordJSON = { uniqueID: m.uniqueID, name: m.name, artist: m.artist };
  if (m.level !== undefined) json.level = m.level;
  if (m.startOffset !== undefined) json.startOffset = m.startOffset;
  if (record.storage.kind === "file") {
    json.path = record.storage.path;
  } else {
    json.pending = true;
  }
  return json;
}

/** Build a record from already-validated JSON. */
export function recordFromJSON(trackID: number, json: SongRecordJSON): SongRecord {
  const metadata: SongMetadata = {
    trackID,
    uniqueID: json.uniqueID,
    name: json.name,
    artist: json.artist,
  };
  if (json.level !== undefined) metadata.level = json.level;
  if (json.startOffset !== undefined) metadata.startOffset = json.startOffset;

  return {
    metadata,
    storage: json.path !== undefined ? { kind: "file", path: json.path } : { kind: "pending" },
  };
}
