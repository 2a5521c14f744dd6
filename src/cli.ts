#!/usr/bin/env node
// ─── nongbox: CLI Entry Point ───────────────────────────────────────────────
//
// Usage:
//   nongbox                                   # Show help
//   nongbox list                              # List tracks with songs
//   nongbox info <track-id>                   # Show a track's songs
//   nongbox init <track-id> [--name N --artist A] [--official]
//   nongbox add <track-id> <audio-file> --name N --artist A [--offset MS] [--level L]
//   nongbox activate <track-id> <unique-id>   # Choose which song plays
//   nongbox delete <track-id> <unique-id>     # Remove a song and its audio
//   nongbox delete-audio <track-id> <unique-id>
//   nongbox clear <track-id>                  # Remove every alternate
//   nongbox forget <track-id>                 # Remove the track entirely
//   nongbox migrate-status                    # Legacy manifest migration result
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import { createNongbox } from "./index.js";
import type { InitReport, ManifestStore, SongRecord, TrackManifest } from "./index.js";
import { describeError, songPath } from "./nongs/index.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function padRight(s: string, len: number): string {
  return s.length >= len ? s : s + " ".repeat(len - s.length);
}

function truncate(s: string, len: number): string {
  return s.length <= len ? s : s.slice(0, len - 1) + "…";
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function parseTrackID(arg: string | undefined): number {
  if (arg === undefined) fail("Missing track ID.");
  const id = Number(arg);
  if (!Number.isSafeInteger(id) || id <= 0) fail(`Invalid track ID: "${arg}"`);
  return id;
}

function requireArg(arg: string | undefined, what: string): string {
  if (arg === undefined) fail(`Missing ${what}.`);
  return arg;
}

function describeSong(song: SongRecord): string {
  const m = song.metadata;
  const where = songPath(song) ?? "(pending download)";
  const offset = m.startOffset ? `  +${m.startOffset}ms` : "";
  return `${m.name} — ${m.artist || "unknown artist"}${offset}\n      ${where}`;
}

function printTrack(track: TrackManifest): void {
  console.log(`\nTrack ${track.trackID}\n`);
  for (const song of track.songs()) {
    const marker = song.metadata.uniqueID === track.activeID ? "▶" : " ";
    const label = song === track.defaultSong() ? " [default]" : "";
    console.log(` ${marker} ${song.metadata.uniqueID}${label}`);
    console.log(`      ${describeSong(song)}`);
  }
  console.log();
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdList(store: ManifestStore): void {
  const ids = store.trackIDs();
  console.log("\n" + padRight("Track", 12) + padRight("Active", 44) + "Alternates");
  console.log("─".repeat(68));
  for (const id of ids) {
    const track = store.getTrack(id);
    if (!track) continue;
    const active = track.active().metadata;
    console.log(
      padRight(String(id), 12) +
        padRight(truncate(`${active.name} — ${active.artist}`, 42), 44) +
        String(track.locals().length)
    );
  }
  console.log(`\n${ids.length} track(s).\n`);
}

function cmdInfo(store: ManifestStore, args: string[]): void {
  const id = parseTrackID(args[0]);
  const track = store.getTrack(id);
  if (!track) fail(`Track ${id} has no manifest. Run 'nongbox init ${id}' first.`);
  printTrack(track);
}

function cmdInit(store: ManifestStore, args: string[]): void {
  const id = parseTrackID(args[0]);
  const name = getFlag(args, "--name");
  const artist = getFlag(args, "--artist");
  const track = store.initTrack(id, {
    official: args.includes("--official"),
    song: name !== null ? { name, artist: artist ?? "" } : undefined,
  });
  if (!track) fail(`Couldn't resolve official track ${id}.`);
  printTrack(track);
}

function cmdAdd(store: ManifestStore, args: string[]): void {
  const id = parseTrackID(args[0]);
  const source = requireArg(args[1], "audio file");
  const name = requireArg(getFlag(args, "--name") ?? undefined, "--name");
  const artist = getFlag(args, "--artist") ?? "";
  const offsetFlag = getFlag(args, "--offset");
  const level = getFlag(args, "--level");

  if (!existsSync(source)) fail(`Audio file not found: ${source}`);
  const startOffset = offsetFlag !== null ? Number(offsetFlag) : undefined;
  if (startOffset !== undefined && !Number.isInteger(startOffset)) {
    fail(`Invalid offset: "${offsetFlag}"`);
  }

  if (!store.getTrack(id)) fail(`Track ${id} has no manifest. Run 'nongbox init ${id}' first.`);

  const song = store.importSong(id, source, {
    name,
    artist,
    ...(startOffset !== undefined ? { startOffset } : {}),
    ...(level !== null ? { level } : {}),
  });
  if (args.includes("--activate")) store.setActiveSong(id, song.metadata.uniqueID);
  console.log(`Added ${song.metadata.uniqueID} to track ${id}.`);
}

function cmdActivate(store: ManifestStore, args: string[]): void {
  const id = parseTrackID(args[0]);
  const uniqueID = requireArg(args[1], "unique ID");
  store.setActiveSong(id, uniqueID);
  console.log(`Track ${id} now plays ${uniqueID}.`);
}

function cmdDelete(store: ManifestStore, args: string[], audioOnly: boolean): void {
  const id = parseTrackID(args[0]);
  const uniqueID = requireArg(args[1], "unique ID");
  if (audioOnly) {
    store.deleteSongAudio(id, uniqueID);
    console.log(`Deleted audio for ${uniqueID}.`);
  } else {
    store.deleteSong(id, uniqueID);
    console.log(`Deleted ${uniqueID} from track ${id}.`);
  }
}

function cmdClear(store: ManifestStore, args: string[]): void {
  const id = parseTrackID(args[0]);
  store.deleteAllSongs(id);
  console.log(`Track ${id} reset to its default song.`);
}

function cmdForget(store: ManifestStore, args: string[]): void {
  const id = parseTrackID(args[0]);
  store.forgetTrack(id);
  console.log(`Track ${id} removed.`);
}

function cmdMigrateStatus(report: InitReport): void {
  const m = report.migration;
  console.log(`\nLoaded manifests:  ${report.loaded}`);
  console.log(`Quarantined:       ${report.quarantined.length}`);
  for (const q of report.quarantined) console.log(`  ${q}`);
  console.log(`Legacy migration:  ${m.state}${m.migrated > 0 ? ` (${m.migrated} tracks)` : ""}`);
  if (m.error !== undefined) console.log(`  ${describeError(m.error)}`);
  console.log();
}

function cmdHelp(): void {
  console.log(`
nongbox — manage replacement songs for game tracks

Commands:
  list                                   List tracks with songs
  info <track-id>                        Show a track's songs
  init <track-id> [--name N] [--artist A] [--official]
  add <track-id> <audio-file> --name N [--artist A] [--offset MS] [--level L] [--activate]
  activate <track-id> <unique-id>        Choose which song plays
  delete <track-id> <unique-id>          Remove a song and its audio
  delete-audio <track-id> <unique-id>    Remove only the audio file
  clear <track-id>                       Remove every alternate
  forget <track-id>                      Remove the track entirely
  migrate-status                         Show the legacy migration result

Environment:
  NONGBOX_HOME        data directory (default ~/.nongbox)
  NONGBOX_RESOURCES   official game audio directory
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";
  const rest = args.slice(1);

  if (command === "help" || command === "--help" || command === "-h") {
    cmdHelp();
    return;
  }

  const store = createNongbox();
  const report = store.init();

  switch (command) {
    case "list":
      cmdList(store);
      break;
    case "info":
      cmdInfo(store, rest);
      break;
    case "init":
      cmdInit(store, rest);
      break;
    case "add":
      cmdAdd(store, rest);
      break;
    case "activate":
      cmdActivate(store, rest);
      break;
    case "delete":
      cmdDelete(store, rest, false);
      break;
    case "delete-audio":
      cmdDelete(store, rest, true);
      break;
    case "clear":
      cmdClear(store, rest);
      break;
    case "forget":
      cmdForget(store, rest);
      break;
    case "migrate-status":
      cmdMigrateStatus(report);
      break;
    default:
      fail(`Unknown command: "${command}". Run 'nongbox help' for usage.`);
  }
}

try {
  main();
} catch (err) {
  fail(describeError(err));
}
