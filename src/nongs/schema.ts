// ─── Manifest Schemas ───────────────────────────────────────────────────────
//
// Zod schemas for the two on-disk documents:
//   - the per-track manifest  (<manifests>/<trackID>.json)
//   - the legacy combined manifest (nong_data.json), read once for migration
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Per-Track Manifest ─────────────────────────────────────────────────────

export const SongRecordSchema = z
  .object({
    uniqueID: z.string().min(1),
    name: z.string(),
    artist: z.string(),
    level: z.string().optional(),
    startOffset: z.number().int().optional(),
    path: z.string().min(1).optional(),
    pending: z.literal(true).optional(),
  })
  .refine((r) => (r.path === undefined) !== (r.pending === undefined), {
    message: "record must have exactly one of path or pending",
  });

export const TrackManifestSchema = z
  .object({
    version: z.number().int().min(1),
    defaultSong: SongRecordSchema,
    songs: z.array(SongRecordSchema),
    active: z.string().min(1),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>([doc.defaultSong.uniqueID]);
    doc.songs.forEach((song, i) => {
      if (seen.has(song.uniqueID)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["songs", i, "uniqueID"],
          message: `duplicate uniqueID "${song.uniqueID}"`,
        });
      }
      seen.add(song.uniqueID);
    });
    if (!seen.has(doc.active)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["active"],
        message: `active "${doc.active}" does not match any song`,
      });
    }
  });

export type SongRecordJSON = z.infer<typeof SongRecordSchema>;
export type TrackManifestJSON = z.infer<typeof TrackManifestSchema>;

// ─── Legacy Combined Manifest ───────────────────────────────────────────────

export const LegacySongSchema = z.object({
  path: z.string().min(1),
  songName: z.string(),
  authorName: z.string(),
  songUrl: z.string().optional(),
  levelName: z.string().optional(),
  startOffset: z.number().int().optional(),
});

export const LegacyEntrySchema = z.object({
  active: z.string(),
  defaultPath: z.string().min(1),
  songs: z.array(LegacySongSchema),
});

export const LegacyManifestSchema = z.object({
  version: z.number().int().optional(),
  nongs: z.record(z.string(), LegacyEntrySchema),
});

export type LegacySong = z.infer<typeof LegacySongSchema>;
export type LegacyEntry = z.infer<typeof LegacyEntrySchema>;
export type LegacyManifest = z.infer<typeof LegacyManifestSchema>;

// ─── Issue Formatting ───────────────────────────────────────────────────────

/** Flatten zod issues into "path: message" lines joined by "; ". */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "root"}: ${i.message}`)
    .join("; ");
}
