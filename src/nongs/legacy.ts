// ─── Legacy Manifest Reader ─────────────────────────────────────────────────
//
// Reads the old single-file manifest (nong_data.json) that held every
// track's songs in one document:
//
//   { "version": 3,
//     "nongs": { "<trackID>": { "active": <path>, "defaultPath": <path>,
//                               "songs": [{ path, songName, authorName, ... }] } } }
//
// Legacy songs carry no uniqueID, so each one gets a fresh ID here.
// Used once, by the store's migration step.
// ─────────────────────────────────────────────────────────────────────────────

import { copyFileSync, existsSync, readFileSync, unlinkSync } from "node:fs";
import { basename } from "node:path";
import type { SongMetadata, SongRecord } from "./types.js";
import { ManifestError, ioError } from "./errors.js";
import { LegacyManifestSchema, formatIssues, type LegacySong } from "./schema.js";
import { createLocalSong } from "./record.js";
import { BACKUP_SUFFIX } from "./files.js";

/** One track's worth of legacy data, converted to records. */
export interface LegacyTrack {
  readonly trackID: number;
  readonly defaultSong: SongRecord;
  /** Every legacy song, the default included, in file order. */
  readonly songs: readonly SongRecord[];
  readonly active: SongRecord;
}

export function legacyManifestExists(path: string): boolean {
  return existsSync(path);
}

function toRecord(trackID: number, song: LegacySong): SongRecord {
  const metadata: Omit<SongMetadata, "uniqueID"> = {
    trackID,
    name: song.songName,
    artist: song.authorName,
  };
  if (song.levelName !== undefined) metadata.level = song.levelName;
  if (song.startOffset !== undefined) metadata.startOffset = song.startOffset;
  return createLocalSong(metadata, song.path);
}

/**
 * Convert a parsed legacy document into LegacyTrack entries,
 * sorted by track ID. Throws ParseError on anything malformed.
 */
export function parseLegacyManifest(raw: unknown, file = "legacy manifest"): LegacyTrack[] {
  const result = LegacyManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ManifestError("ParseError", { file, detail: formatIssues(result.error) });
  }

  const tracks: LegacyTrack[] = [];

  for (const [key, entry] of Object.entries(result.data.nongs)) {
    const trackID = /^[1-9]\d*$/.test(key) ? Number(key) : 0;
    if (!Number.isSafeInteger(trackID) || trackID <= 0) {
      throw new ManifestError("ParseError", { file, detail: `invalid track ID "${key}"` });
    }

    const songs = entry.songs.map((s) => toRecord(trackID, s));
    const defaultIndex = entry.songs.findIndex((s) => s.path === entry.defaultPath);
    if (defaultIndex === -1) {
      throw new ManifestError("ParseError", {
        trackID,
        file,
        detail: `default path "${entry.defaultPath}" matches no song`,
      });
    }
    const activeIndex = entry.songs.findIndex((s) => s.path === entry.active);
    const defaultSong = songs[defaultIndex];

    tracks.push({
      trackID,
      defaultSong,
      songs,
      active: activeIndex === -1 ? defaultSong : songs[activeIndex],
    });
  }

  return tracks.sort((a, b) => a.trackID - b.trackID);
}

/** Read and parse the legacy manifest at `path`. */
export function readLegacyManifest(path: string): LegacyTrack[] {
  const file = basename(path);
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw ioError(err, { file });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ManifestError("ParseError", {
      file,
      detail: err instanceof Error ? err.message : String(err),
    });
  }

  return parseLegacyManifest(raw, file);
}

/**
 * Copy the legacy manifest to `<path>.bak`, then (by default) delete the
 * original. Once the original is gone, migration never runs again.
 */
export function backupLegacyManifest(path: string, deleteOriginal = true): string {
  const backup = path + BACKUP_SUFFIX;
  try {
    copyFileSync(path, backup);
    if (deleteOriginal) unlinkSync(path);
  } catch (err) {
    throw ioError(err, { file: basename(path) });
  }
  return backup;
}
