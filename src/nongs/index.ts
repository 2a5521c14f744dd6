// ─── Nongs Subsystem ────────────────────────────────────────────────────────
//
// Everything for the manifest layer: types, records, per-track manifests,
// the legacy reader and the store.
// ─────────────────────────────────────────────────────────────────────────────

// Types
export type {
  SongMetadata,
  SongStorage,
  SongRecord,
  HostSong,
  SongInfo,
  TrackHint,
  SongInfoMessage,
} from "./types.js";

export { UNIQUE_ID_LENGTH, MANIFEST_VERSION } from "./types.js";

// Errors
export { ManifestError, ERROR_KINDS, isManifestError, describeError } from "./errors.js";
export type { ErrorKind, ErrorContext } from "./errors.js";

// Records
export {
  createUniqueID,
  createLocalSong,
  createPendingSong,
  createUnknownSong,
  songPath,
  isDuplicateSong,
  recordToJSON,
  recordFromJSON,
} from "./record.js";
export type { OffsetPolicy } from "./record.js";

// Schemas
export {
  SongRecordSchema,
  TrackManifestSchema,
  LegacyManifestSchema,
  formatIssues,
} from "./schema.js";
export type { SongRecordJSON, TrackManifestJSON, LegacyManifest } from "./schema.js";

// Manifests
export { TrackManifest } from "./manifest.js";

// Legacy manifest
export {
  legacyManifestExists,
  parseLegacyManifest,
  readLegacyManifest,
  backupLegacyManifest,
} from "./legacy.js";
export type { LegacyTrack } from "./legacy.js";

// Store
export { ManifestStore, parseTrackFilename, loadManifestFile } from "./store.js";
export type {
  MigrationState,
  MigrationReport,
  InitReport,
  ManifestStoreOptions,
} from "./store.js";
