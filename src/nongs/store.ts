// ─── Manifest Store ─────────────────────────────────────────────────────────
//
// Owns every TrackManifest, keyed by track ID. One store per process,
// created by the host integration and handed to whoever needs it.
//
// init() scans the manifest directory, quarantines files it can't load,
// then migrates the legacy combined manifest (once). After that, every
// mutation goes look up → mutate → save.
//
// All file work is synchronous, so a mutation and its save always run
// back to back with nothing interleaved.
// ─────────────────────────────────────────────────────────────────────────────

import { copyFileSync, existsSync, mkdirSync, readFileSync, readdirSync } from "node:fs";
import { basename, dirname, extname, join } from "node:path";
import type { SongInfoMessage, SongMetadata, SongRecord, TrackHint } from "./types.js";
import { MANIFEST_VERSION } from "./types.js";
import { ManifestError, describeError, ioError } from "./errors.js";
import { TrackManifest } from "./manifest.js";
import {
  createLocalSong,
  createPendingSong,
  createUniqueID,
  createUnknownSong,
  isDuplicateSong,
  songPath,
} from "./record.js";
import {
  backupLegacyManifest,
  legacyManifestExists,
  readLegacyManifest,
  type LegacyTrack,
} from "./legacy.js";
import { quarantineFile, removeFile } from "./files.js";
import type { NongboxConfig } from "../config.js";
import type { HostTrackResolver, MetadataFetcher } from "../host.js";
import { createSilentLogger, type Logger } from "../logger.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export type MigrationState =
  | "NotStarted"
  | "Checked"
  | "Skipped"
  | "Parsing"
  | "Parsed"
  | "Merging"
  | "BackedUp"
  | "Done"
  | "Failed";

export interface MigrationReport {
  state: MigrationState;
  /** Legacy track IDs merged into the store. */
  migrated: number;
  error?: unknown;
}

export interface InitReport {
  loaded: number;
  /** Backup paths of files that failed to load. */
  quarantined: string[];
  migration: MigrationReport;
}

export interface ManifestStoreOptions {
  config: NongboxConfig;
  host: HostTrackResolver;
  fetcher: MetadataFetcher;
  logger?: Logger;
}

// ─── File Loading ───────────────────────────────────────────────────────────

/**
 * Track ID encoded in a manifest filename ("123.json" → 123).
 * Throws InvalidFilename unless the stem is a canonical positive integer.
 */
export function parseTrackFilename(file: string): number {
  const stem = basename(file, ".json");
  const id = Number(stem);
  if (!/^[1-9]\d*$/.test(stem) || !Number.isSafeInteger(id)) {
    throw new ManifestError("InvalidFilename", { file });
  }
  return id;
}

/** Load and validate one per-track manifest file. */
export function loadManifestFile(path: string): TrackManifest {
  const file = basename(path);
  const trackID = parseTrackFilename(file);

  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw ioError(err, { trackID, file });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ManifestError("ParseError", {
      trackID,
      file,
      detail: err instanceof Error ? err.message : String(err),
    });
  }

  return TrackManifest.fromJSON(trackID, raw, dirname(path));
}

// ─── Store ──────────────────────────────────────────────────────────────────

export class ManifestStore {
  readonly version = MANIFEST_VERSION;
  private readonly tracks = new Map<number, TrackManifest>();
  private readonly config: NongboxConfig;
  private readonly host: HostTrackResolver;
  private readonly fetcher: MetadataFetcher;
  private readonly logger: Logger;
  private report: InitReport | null = null;
  private _migrationState: MigrationState = "NotStarted";

  constructor(options: ManifestStoreOptions) {
    this.config = options.config;
    this.host = options.host;
    this.fetcher = options.fetcher;
    this.logger = options.logger ?? createSilentLogger();
  }

  get initialized(): boolean {
    return this.report !== null;
  }

  get migrationState(): MigrationState {
    return this._migrationState;
  }

  get manifestDir(): string {
    return this.config.manifestDir;
  }

  // ─── Init ───────────────────────────────────────────────────────────────

  /**
   * Load every manifest file and run legacy migration. Safe to call again;
   * later calls return the first call's report.
   */
  init(): InitReport {
    if (this.report) return this.report;

    const dir = this.config.manifestDir;
    this.logger.info("Starting manifest read");
    this.ensureDir(dir);

    const quarantined: string[] = [];
    const files = readdirSync(dir).filter((f) => f.endsWith(".json")).sort();

    for (const file of files) {
      const path = join(dir, file);
      try {
        const manifest = loadManifestFile(path);
        this.tracks.set(manifest.trackID, manifest);
      } catch (err) {
        this.logger.error(`Failed to read file ${file}: ${describeError(err)}`);
        try {
          quarantined.push(quarantineFile(path));
        } catch (renameErr) {
          this.logger.error(describeError(renameErr));
        }
      }
    }

    const loaded = this.tracks.size;
    this.logger.info(`Read ${loaded} files successfully`);

    let migration: MigrationReport;
    try {
      const migrated = this.migrateLegacy();
      migration = { state: this._migrationState, migrated };
    } catch (err) {
      this._migrationState = "Failed";
      this.logger.error(`Legacy migration failed: ${describeError(err)}`);
      migration = { state: "Failed", migrated: 0, error: err };
    }

    this.report = { loaded, quarantined, migration };
    return this.report;
  }

  // ─── Legacy Migration ───────────────────────────────────────────────────

  /** Returns the number of legacy tracks merged. */
  private migrateLegacy(): number {
    const path = this.config.legacyManifestPath;
    this._migrationState = "Checked";

    if (!legacyManifestExists(path)) {
      this._migrationState = "Skipped";
      this.logger.info("Nothing to migrate from legacy manifest");
      return 0;
    }

    this._migrationState = "Parsing";
    // Parsed into an immutable snapshot before the store is touched.
    const snapshot: readonly LegacyTrack[] = readLegacyManifest(path);
    this._migrationState = "Parsed";

    this._migrationState = "Merging";
    for (const legacy of snapshot) {
      this.mergeLegacyTrack(legacy);
    }

    backupLegacyManifest(path, true);
    this._migrationState = "BackedUp";

    this.logger.info(`Migrated ${snapshot.length} ids from legacy manifest`);
    this._migrationState = "Done";
    return snapshot.length;
  }

  private mergeLegacyTrack(legacy: LegacyTrack): void {
    const id = legacy.trackID;
    let track = this.tracks.get(id);
    if (!track) {
      track = new TrackManifest(id, legacy.defaultSong, this.config.manifestDir);
      this.tracks.set(id, track);
    }

    const defaultPath = songPath(legacy.defaultSong);
    let activeID: string | undefined =
      songPath(legacy.active) === defaultPath ? track.defaultSong().metadata.uniqueID : undefined;

    for (const song of legacy.songs) {
      if (songPath(song) === defaultPath) continue;

      const existing = track
        .locals()
        .find((stored) => isDuplicateSong(stored, song, this.config.legacyOffsetPolicy));
      if (existing) {
        if (song === legacy.active) activeID = existing.metadata.uniqueID;
        continue;
      }

      try {
        track.add(song);
        if (song === legacy.active) activeID = song.metadata.uniqueID;
      } catch (err) {
        this.logger.error(`Failed to add migrated song to manifest: ${describeError(err)}`);
      }
    }

    if (activeID !== undefined) {
      try {
        track.setActive(activeID);
      } catch (err) {
        this.logger.error(`Failed to restore active song: ${describeError(err)}`);
      }
    }

    try {
      track.commit();
    } catch (err) {
      this.logger.error(`Failed to save migrated track: ${describeError(err)}`);
    }
  }

  // ─── Lookup ─────────────────────────────────────────────────────────────

  getTrack(trackID: number): TrackManifest | undefined {
    return this.tracks.get(trackID);
  }

  trackIDs(): number[] {
    return [...this.tracks.keys()].sort((a, b) => a - b);
  }

  trackCount(): number {
    return this.tracks.size;
  }

  // ─── Track Setup ────────────────────────────────────────────────────────

  /**
   * Make sure a manifest exists for `trackID`, building its default record
   * from (in order) the host's official track, song info the host already
   * has, or a pending placeholder while the fetcher looks the song up.
   * Returns undefined only for an official track the host can't resolve.
   */
  initTrack(trackID: number, hint: TrackHint = {}): TrackManifest | undefined {
    this.requireInit();
    const existing = this.tracks.get(trackID);
    if (existing) return existing;

    const record = this.resolveDefault(trackID, hint);
    if (!record) return undefined;

    const manifest = new TrackManifest(trackID, record, this.config.manifestDir);
    this.tracks.set(trackID, manifest);
    this.saveTrack(trackID);
    return manifest;
  }

  private resolveDefault(trackID: number, hint: TrackHint): SongRecord | undefined {
    if (hint.official) {
      const official = this.host.officialTrack(trackID);
      if (!official) {
        this.logger.error(`No song object for official track ${trackID}`);
        return undefined;
      }
      const info = hint.song ?? official;
      return createLocalSong({ trackID, name: info.name, artist: info.artist }, official.audioPath);
    }

    const cached = this.host.cachedSong(trackID);
    if (cached) {
      const info = hint.song ?? cached;
      return createLocalSong({ trackID, name: info.name, artist: info.artist }, cached.audioPath);
    }

    if (hint.song) {
      return createPendingSong({ trackID, name: hint.song.name, artist: hint.song.artist });
    }

    this.fetcher.requestSongInfo(trackID);
    return createUnknownSong(trackID);
  }

  // ─── Persistence ────────────────────────────────────────────────────────

  /**
   * Commit one track, or every track in ID order. Saving all stops at the
   * first failure; the thrown IOError names the failing track.
   */
  saveTrack(trackID?: number): void {
    this.requireInit();
    this.ensureDir(this.config.manifestDir);

    if (trackID !== undefined) {
      this.requireTrack(trackID).commit();
      return;
    }

    for (const id of this.trackIDs()) {
      this.requireTrack(id).commit();
    }
  }

  // ─── Mutations ──────────────────────────────────────────────────────────

  setActiveSong(trackID: number, uniqueID: string): void {
    this.mutate(trackID, (track) => track.setActive(uniqueID));
  }

  deleteSong(trackID: number, uniqueID: string): void {
    this.mutate(trackID, (track) => track.deleteSong(uniqueID));
  }

  deleteSongAudio(trackID: number, uniqueID: string): void {
    this.mutate(trackID, (track) => track.deleteSongAudio(uniqueID));
  }

  /**
   * Reset a track to its default. Records whose audio couldn't be deleted
   * are still dropped, so the manifest is saved before that IOError is
   * rethrown. A save failure in that case is logged and the audio error wins.
   */
  deleteAllSongs(trackID: number): void {
    const track = this.requireTrack(trackID);
    let audioError: unknown;
    try {
      track.deleteAllSongs();
    } catch (err) {
      audioError = err;
    }
    try {
      this.saveTrack(trackID);
    } catch (err) {
      if (audioError === undefined) throw err;
      this.logger.error(describeError(err));
    }
    if (audioError !== undefined) throw audioError;
  }

  /** Merge another manifest's alternates into the stored one. Returns how many were added. */
  addSongs(manifest: TrackManifest): number {
    return this.mutate(manifest.trackID, (track) => track.merge(manifest));
  }

  addSong(trackID: number, record: SongRecord): void {
    this.mutate(trackID, (track) => track.add(record));
  }

  /**
   * Copy an audio file into the songs directory and add it as an alternate.
   * If the song can't be added, the copy is removed again.
   */
  importSong(trackID: number, source: string, metadata: Omit<SongMetadata, "trackID" | "uniqueID">): SongRecord {
    const track = this.requireTrack(trackID);
    const destination = this.generateSongFilePath(extname(source) || ".mp3");
    try {
      copyFileSync(source, destination);
    } catch (err) {
      throw ioError(err, { trackID, file: basename(source) });
    }

    const song = createLocalSong({ ...metadata, trackID }, destination);
    try {
      this.addSong(trackID, song);
    } catch (err) {
      try {
        if (track.findSong(song.metadata.uniqueID)) track.deleteSong(song.metadata.uniqueID);
        else removeFile(destination, trackID);
      } catch (cleanupErr) {
        this.logger.error(describeError(cleanupErr));
      }
      throw err;
    }
    return song;
  }

  /**
   * Drop a track entirely: alternates, their audio, and the manifest file.
   */
  forgetTrack(trackID: number): void {
    const track = this.requireTrack(trackID);
    // The manifest file goes first; if it stays, so does everything else.
    removeFile(track.filePath, trackID);
    this.tracks.delete(trackID);
    track.deleteAllSongs();
  }

  /** Run a mutation, then save. A mutation that throws leaves nothing to save. */
  private mutate<T>(trackID: number, fn: (track: TrackManifest) => T): T {
    const result = fn(this.requireTrack(trackID));
    this.saveTrack(trackID);
    return result;
  }

  // ─── Fetch Messages ─────────────────────────────────────────────────────

  /**
   * The metadata fetch for a track finished. Corrects the default record's
   * name and artist and saves. Returns true when something changed.
   */
  handleSongInfo(message: SongInfoMessage): boolean {
    const track = this.tracks.get(message.trackID);
    if (!track) return false;
    if (!track.updateDefaultMetadata(message)) return false;

    try {
      this.saveTrack(message.trackID);
    } catch (err) {
      this.logger.error(describeError(err));
    }
    return true;
  }

  handleSongError(message: string): void {
    this.logger.error(message);
  }

  refetchDefault(trackID: number): void {
    this.requireInit();
    this.fetcher.requestSongInfo(trackID, { refresh: true });
  }

  // ─── Audio Paths ────────────────────────────────────────────────────────

  /**
   * Where to store a new alternate's audio: `<songsDir>/<name><extension>`,
   * with a random name unless one is given.
   */
  generateSongFilePath(extension: string, filename?: string): string {
    this.ensureDir(this.config.songsDir);
    return join(this.config.songsDir, (filename ?? createUniqueID()) + extension);
  }

  // ─── Guards ─────────────────────────────────────────────────────────────

  private requireInit(): void {
    if (!this.report) throw new ManifestError("NotInitialized");
  }

  private requireTrack(trackID: number): TrackManifest {
    this.requireInit();
    const track = this.tracks.get(trackID);
    if (!track) throw new ManifestError("TrackNotInitialized", { trackID });
    return track;
  }

  private ensureDir(dir: string): void {
    if (existsSync(dir)) return;
    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      throw ioError(err, { file: dir });
    }
  }
}
