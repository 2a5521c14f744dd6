// ─── nongbox: Host Collaborators ────────────────────────────────────────────
//
// The store never talks to the game or the network directly. It asks:
//   HostTrackResolver — "is this an official track? where's its audio?"
//   MetadataFetcher   — "go find name/artist for this track"
// Fetch results come back as messages: store.handleSongInfo / handleSongError.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import { join } from "node:path";
import type { HostSong } from "./nongs/types.js";
import type { Logger } from "./logger.js";

export interface HostTrackResolver {
  /** An official (built-in) track and its bundled audio file. */
  officialTrack(trackID: number): HostSong | undefined;

  /** Song info the host has cached for a custom track, with its download path. */
  cachedSong(trackID: number): HostSong | undefined;
}

export interface FetchOptions {
  /** Drop anything cached and fetch again. */
  refresh?: boolean;
}

export interface MetadataFetcher {
  /** Fire-and-forget. The answer arrives later through the store's message handlers. */
  requestSongInfo(trackID: number, options?: FetchOptions): void;
}

// ─── Implementations ────────────────────────────────────────────────────────

export interface StaticHostSongs {
  official?: Record<number, HostSong>;
  cached?: Record<number, HostSong>;
}

/** Resolver backed by fixed tables. */
export function createStaticHost(songs: StaticHostSongs = {}): HostTrackResolver {
  return {
    officialTrack: (id) => songs.official?.[id],
    cachedSong: (id) => songs.cached?.[id],
  };
}

/**
 * Resolver that looks for `<trackID>.mp3` in the game's resources directory
 * (official tracks) and in the download directory (cached custom tracks).
 * It knows no names, so display info has to come from the caller's hint.
 */
export function createDirectoryHost(resourcesDir: string, downloadDir: string): HostTrackResolver {
  const lookup = (dir: string, id: number): HostSong | undefined => {
    const audioPath = join(dir, `${id}.mp3`);
    return existsSync(audioPath) ? { name: `Track ${id}`, artist: "", audioPath } : undefined;
  };
  return {
    officialTrack: (id) => lookup(resourcesDir, id),
    cachedSong: (id) => lookup(downloadDir, id),
  };
}

/** Fetcher for environments without network access. Requests are logged and dropped. */
export function createOfflineFetcher(logger: Logger): MetadataFetcher {
  return {
    requestSongInfo(trackID) {
      logger.warn(`Song info for track ${trackID} unavailable offline`);
    },
  };
}

/** Fetcher that records every request (tests, embedding hosts that poll). */
export function createRecordingFetcher(): MetadataFetcher & {
  requests: Array<{ trackID: number; refresh: boolean }>;
} {
  const requests: Array<{ trackID: number; refresh: boolean }> = [];
  return {
    requests,
    requestSongInfo(trackID, options = {}) {
      requests.push({ trackID, refresh: options.refresh ?? false });
    },
  };
}
