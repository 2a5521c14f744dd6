// ─── nongbox: Configuration ─────────────────────────────────────────────────
//
// Directory layout (defaults under ~/.nongbox):
//   manifests/        one <trackID>.json per track
//   songs/            audio files for user-added alternates
//   nong_data.json    legacy combined manifest (migrated once, then .bak)
//
// Environment:
//   NONGBOX_HOME       base data directory
//   NONGBOX_RESOURCES  where the game's official audio lives
// ─────────────────────────────────────────────────────────────────────────────

import { homedir } from "node:os";
import { join } from "node:path";
import type { OffsetPolicy } from "./nongs/record.js";

export interface NongboxConfig {
  dataDir: string;
  manifestDir: string;
  songsDir: string;
  resourcesDir: string;
  legacyManifestPath: string;
  /** Whether legacy migration compares start offsets when de-duplicating. */
  legacyOffsetPolicy: OffsetPolicy;
}

type Env = Record<string, string | undefined>;

/**
 * Resolve the configuration. Explicit overrides win over environment
 * variables, which win over defaults.
 */
export function resolveConfig(
  overrides: Partial<NongboxConfig> = {},
  env: Env = process.env
): NongboxConfig {
  const dataDir = overrides.dataDir ?? env.NONGBOX_HOME ?? join(homedir(), ".nongbox");
  return {
    dataDir,
    manifestDir: overrides.manifestDir ?? join(dataDir, "manifests"),
    songsDir: overrides.songsDir ?? join(dataDir, "songs"),
    resourcesDir: overrides.resourcesDir ?? env.NONGBOX_RESOURCES ?? join(dataDir, "resources"),
    legacyManifestPath: overrides.legacyManifestPath ?? join(dataDir, "nong_data.json"),
    legacyOffsetPolicy: overrides.legacyOffsetPolicy ?? "compare",
  };
}
