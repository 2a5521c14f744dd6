// ─── Nong Types ─────────────────────────────────────────────────────────────
//
// A "nong" (not-official-game-song) is an alternate audio track that can
// stand in for one of the game's built-in music tracks.
//
// Every track ID owns:
//   1. A default record  — the official song (always present)
//   2. Alternates        — user-added songs, unique by uniqueID
//   3. An active pointer — which of the above currently plays
// ─────────────────────────────────────────────────────────────────────────────

/** Length of every generated uniqueID. */
export const UNIQUE_ID_LENGTH = 16;

/** Format version written into every per-track manifest file. */
export const MANIFEST_VERSION = 1;

// ─── Metadata ───────────────────────────────────────────────────────────────

export interface SongMetadata {
  /** Track slot this song belongs to. */
  trackID: number;

  /** Opaque per-record token. Generated once, never reused. */
  uniqueID: string;

  /** Display name. */
  name: string;

  /** Display artist. */
  artist: string;

  /** Level the song was downloaded for, when known. */
  level?: string;

  /** Playback start offset in milliseconds. */
  startOffset?: number;
}

// ─── Storage ────────────────────────────────────────────────────────────────

/**
 * Where a record's audio lives. "pending" means the metadata is known
 * but the audio has not been fetched (or was deleted).
 */
export type SongStorage =
  | { kind: "file"; path: string }
  | { kind: "pending" };

/** One audio variant for a track. */
export interface SongRecord {
  metadata: SongMetadata;
  storage: SongStorage;
}

// ─── Host Collaborators ─────────────────────────────────────────────────────

/** What the host knows about a song it can play. */
export interface HostSong {
  name: string;
  artist: string;
  audioPath: string;
}

/** Display info the host passes along when a track is about to play. */
export interface SongInfo {
  name: string;
  artist: string;
}

/** Hint supplied with `initTrack`. */
export interface TrackHint {
  /** True when the track is one of the game's own (official) songs. */
  official?: boolean;

  /** Song info the host already has in hand. */
  song?: SongInfo;
}

/** Inbound message: the metadata fetch for a track completed. */
export interface SongInfoMessage {
  trackID: number;
  name: string;
  artist: string;
}
