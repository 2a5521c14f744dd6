// ─── Manifest File Helpers ──────────────────────────────────────────────────

import { renameSync, rmSync, unlinkSync, writeFileSync } from "node:fs";
import { basename } from "node:path";
import { ioError } from "./errors.js";

export const TEMP_SUFFIX = ".tmp";
export const BACKUP_SUFFIX = ".bak";

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Write `contents` to `path` without ever exposing a partial file under
 * that name: write `<path>.tmp`, then rename over the target.
 * Throws IOError; the temp file is removed on failure.
 */
export function writeFileAtomic(path: string, contents: string, trackID?: number): void {
  const tmp = path + TEMP_SUFFIX;
  try {
    writeFileSync(tmp, contents, "utf8");
    renameSync(tmp, path);
  } catch (err) {
    rmSync(tmp, { force: true });
    throw ioError(err, { trackID, file: basename(path) });
  }
}

/**
 * Delete a file. A file that is already gone is not an error;
 * anything else (permissions, busy) throws IOError.
 */
export function removeFile(path: string, trackID?: number): void {
  try {
    unlinkSync(path);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return;
    throw ioError(err, { trackID, file: basename(path) });
  }
}

/** Rename a bad file to `<file>.bak`. Returns the backup path. */
export function quarantineFile(path: string): string {
  const backup = path + BACKUP_SUFFIX;
  try {
    renameSync(path, backup);
  } catch (err) {
    throw ioError(err, { file: basename(path) });
  }
  return backup;
}
