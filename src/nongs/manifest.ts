// ─── Track Manifest ─────────────────────────────────────────────────────────
//
// All songs for one track ID: the default (official) record, the alternates
// the user added, and which of them is active. Mutations only touch memory;
// commit() writes the backing <trackID>.json file.
//
// Invariants:
//   - alternates are unique by uniqueID, and never reuse the default's ID
//   - the active ID always names the default or an existing alternate
// ─────────────────────────────────────────────────────────────────────────────

import { join } from "node:path";
import type { SongInfo, SongRecord } from "./types.js";
import { MANIFEST_VERSION } from "./types.js";
import { ManifestError } from "./errors.js";
import { TrackManifestSchema, formatIssues, type TrackManifestJSON } from "./schema.js";
import { recordFromJSON, recordToJSON, songPath } from "./record.js";
import { removeFile, writeFileAtomic } from "./files.js";

function copyRecord(record: SongRecord): SongRecord {
  return {
    metadata: { ...record.metadata },
    storage: { ...record.storage },
  };
}

export class TrackManifest {
  readonly trackID: number;
  private readonly dir: string;
  private readonly defaultRecord: SongRecord;
  private alternates: SongRecord[] = [];
  private activeUniqueID: string;

  constructor(trackID: number, defaultRecord: SongRecord, dir: string) {
    if (defaultRecord.metadata.trackID !== trackID) {
      throw new ManifestError("IDMismatch", {
        trackID,
        uniqueID: defaultRecord.metadata.uniqueID,
        detail: `default song belongs to track ${defaultRecord.metadata.trackID}`,
      });
    }
    this.trackID = trackID;
    this.dir = dir;
    this.defaultRecord = copyRecord(defaultRecord);
    this.activeUniqueID = defaultRecord.metadata.uniqueID;
  }

  /** Path of the backing manifest file. */
  get filePath(): string {
    return join(this.dir, `${this.trackID}.json`);
  }

  get activeID(): string {
    return this.activeUniqueID;
  }

  // ─── Accessors ──────────────────────────────────────────────────────────

  defaultSong(): SongRecord {
    return this.defaultRecord;
  }

  locals(): readonly SongRecord[] {
    return this.alternates;
  }

  /** Default first, then alternates in insertion order. */
  songs(): readonly SongRecord[] {
    return [this.defaultRecord, ...this.alternates];
  }

  findSong(uniqueID: string): SongRecord | undefined {
    if (this.defaultRecord.metadata.uniqueID === uniqueID) return this.defaultRecord;
    return this.alternates.find((s) => s.metadata.uniqueID === uniqueID);
  }

  active(): SongRecord {
    return this.findSong(this.activeUniqueID) ?? this.defaultRecord;
  }

  // ─── Mutations ──────────────────────────────────────────────────────────

  add(record: SongRecord): void {
    const uniqueID = record.metadata.uniqueID;
    if (record.metadata.trackID !== this.trackID) {
      throw new ManifestError("IDMismatch", {
        trackID: this.trackID,
        uniqueID,
        detail: `song belongs to track ${record.metadata.trackID}`,
      });
    }
    if (this.findSong(uniqueID)) {
      throw new ManifestError("DuplicateID", { trackID: this.trackID, uniqueID });
    }
    this.alternates.push(copyRecord(record));
  }

  setActive(uniqueID: string): void {
    if (!this.findSong(uniqueID)) {
      throw new ManifestError("UnknownID", { trackID: this.trackID, uniqueID });
    }
    this.activeUniqueID = uniqueID;
  }

  /**
   * Remove an alternate and its audio file. The default record can only be
   * hidden by activating something else, never deleted.
   */
  deleteSong(uniqueID: string): void {
    if (uniqueID === this.defaultRecord.metadata.uniqueID) {
      if (this.alternates.length === 0) {
        this.activeUniqueID = uniqueID;
      }
      throw new ManifestError("ActiveRecordProtected", { trackID: this.trackID, uniqueID });
    }

    const index = this.alternates.findIndex((s) => s.metadata.uniqueID === uniqueID);
    if (index === -1) {
      throw new ManifestError("UnknownID", { trackID: this.trackID, uniqueID });
    }

    // Audio goes first: a failed delete leaves the record and selection as they were.
    this.removeAudio(this.alternates[index]);
    this.alternates.splice(index, 1);
    if (this.activeUniqueID === uniqueID) {
      this.activeUniqueID = this.defaultRecord.metadata.uniqueID;
    }
  }

  /**
   * Delete an alternate's audio but keep its record, which becomes pending.
   */
  deleteSongAudio(uniqueID: string): void {
    if (uniqueID === this.defaultRecord.metadata.uniqueID) {
      throw new ManifestError("ActiveRecordProtected", { trackID: this.trackID, uniqueID });
    }
    const song = this.alternates.find((s) => s.metadata.uniqueID === uniqueID);
    if (!song) {
      throw new ManifestError("UnknownID", { trackID: this.trackID, uniqueID });
    }
    this.removeAudio(song);
    song.storage = { kind: "pending" };
  }

  /**
   * Remove every alternate. File errors don't stop the sweep; the first one
   * is thrown once everything removable is gone.
   */
  deleteAllSongs(): void {
    const removed = this.alternates;
    this.alternates = [];
    this.activeUniqueID = this.defaultRecord.metadata.uniqueID;

    let firstError: unknown;
    for (const song of removed) {
      try {
        this.removeAudio(song);
      } catch (err) {
        firstError ??= err;
      }
    }
    if (firstError !== undefined) throw firstError;
  }

  /**
   * Add every alternate of `other` whose uniqueID isn't present yet.
   * Existing records are never overwritten. Returns how many were added.
   */
  merge(other: TrackManifest): number {
    if (other.trackID !== this.trackID) {
      throw new ManifestError("IDMismatch", {
        trackID: this.trackID,
        detail: `cannot merge track ${other.trackID}`,
      });
    }
    let added = 0;
    for (const song of other.locals()) {
      if (this.findSong(song.metadata.uniqueID)) continue;
      this.alternates.push(copyRecord(song));
      added++;
    }
    return added;
  }

  /** Correct the default's display metadata. Returns true if it changed. */
  updateDefaultMetadata(info: SongInfo): boolean {
    const meta = this.defaultRecord.metadata;
    if (meta.name === info.name && meta.artist === info.artist) return false;
    meta.name = info.name;
    meta.artist = info.artist;
    return true;
  }

  private removeAudio(song: SongRecord): void {
    const path = songPath(song);
    // Alternates may point at the official audio; that file is not ours.
    if (path === undefined || path === songPath(this.defaultRecord)) return;
    removeFile(path, this.trackID);
  }

  // ─── Persistence ────────────────────────────────────────────────────────

  toJSON(): TrackManifestJSON {
    return {
      version: MANIFEST_VERSION,
      defaultSong: recordToJSON(this.defaultRecord),
      songs: this.alternates.map(recordToJSON),
      active: this.activeUniqueID,
    };
  }

  /** Write the manifest to `<dir>/<trackID>.json` atomically. */
  commit(): void {
    writeFileAtomic(this.filePath, JSON.stringify(this.toJSON(), null, 2) + "\n", this.trackID);
  }

  /** Validate a parsed JSON document and build a manifest from it. */
  static fromJSON(trackID: number, raw: unknown, dir: string): TrackManifest {
    const result = TrackManifestSchema.safeParse(raw);
    if (!result.success) {
      throw new ManifestError("ParseError", {
        trackID,
        file: `${trackID}.json`,
        detail: formatIssues(result.error),
      });
    }

    const doc = result.data;
    const manifest = new TrackManifest(trackID, recordFromJSON(trackID, doc.defaultSong), dir);
    for (const song of doc.songs) {
      manifest.add(recordFromJSON(trackID, song));
    }
    manifest.setActive(doc.active);
    return manifest;
  }
}
