// ─── nongbox ────────────────────────────────────────────────────────────────
//
// Alternate song manager — keeps, per game track, the official song plus
// any user-added replacements, and which one plays.
//
// Usage:
//   import { createNongbox } from "nongbox";
//   const store = createNongbox({ host, fetcher });
//   store.init();
//   store.initTrack(500476, { song: { name: "Fingerdash", artist: "MDK" } });
// ─────────────────────────────────────────────────────────────────────────────

import { resolveConfig, type NongboxConfig } from "./config.js";
import { createDirectoryHost, createOfflineFetcher } from "./host.js";
import type { HostTrackResolver, MetadataFetcher } from "./host.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { ManifestStore } from "./nongs/store.js";

export * from "./nongs/index.js";

export { resolveConfig } from "./config.js";
export type { NongboxConfig } from "./config.js";

export {
  createStaticHost,
  createDirectoryHost,
  createOfflineFetcher,
  createRecordingFetcher,
} from "./host.js";
export type {
  HostTrackResolver,
  MetadataFetcher,
  FetchOptions,
  StaticHostSongs,
} from "./host.js";

export { createConsoleLogger, createSilentLogger, createRecordingLogger } from "./logger.js";
export type { Logger, LogLevel, LogEntry } from "./logger.js";

export interface NongboxOptions {
  config?: Partial<NongboxConfig>;
  host?: HostTrackResolver;
  fetcher?: MetadataFetcher;
  logger?: Logger;
}

/**
 * Build a store with sensible defaults: config from the environment,
 * a directory-backed host, an offline fetcher and a stderr logger.
 * The caller still has to call init().
 */
export function createNongbox(options: NongboxOptions = {}): ManifestStore {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? createConsoleLogger();
  return new ManifestStore({
    config,
    host: options.host ?? createDirectoryHost(config.resourcesDir, config.songsDir),
    fetcher: options.fetcher ?? createOfflineFetcher(logger),
    logger,
  });
}
