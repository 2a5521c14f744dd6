import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { TrackManifest } from "./manifest.js";
import { createLocalSong, createPendingSong, songPath } from "./record.js";
import { loadManifestFile } from "./store.js";
import type { SongRecord } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "nongbox-manifest-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

/** A song whose audio file actually exists in the temp dir. */
function songWithFile(trackID: number, uniqueID: string, name = uniqueID): SongRecord {
  const path = join(dir, `${uniqueID}.mp3`);
  writeFileSync(path, "audio");
  return createLocalSong({ trackID, uniqueID, name, artist: "Artist" }, path);
}

function makeManifest(trackID = 10): TrackManifest {
  const def = createLocalSong({ trackID, uniqueID: "default", name: "Official", artist: "Game" }, join(dir, "official.mp3"));
  return new TrackManifest(trackID, def, dir);
}

function assertActiveExists(m: TrackManifest): void {
  expect(m.findSong(m.activeID)).toBeDefined();
}

// ─── Construction ───────────────────────────────────────────────────────────

describe("TrackManifest construction", () => {
  it("starts with the default active and no alternates", () => {
    const m = makeManifest();
    expect(m.activeID).toBe("default");
    expect(m.active().metadata.name).toBe("Official");
    expect(m.locals()).toHaveLength(0);
    expect(m.songs()).toHaveLength(1);
    expect(m.filePath).toBe(join(dir, "10.json"));
  });

  it("rejects a default record from another track", () => {
    const def = createPendingSong({ trackID: 2, name: "x", artist: "y" });
    expect(() => new TrackManifest(3, def, dir)).toThrow("IDMismatch");
  });
});

// ─── add / setActive ────────────────────────────────────────────────────────

describe("add", () => {
  it("keeps insertion order", () => {
    const m = makeManifest();
    m.add(songWithFile(10, "b"));
    m.add(songWithFile(10, "a"));
    expect(m.locals().map((s) => s.metadata.uniqueID)).toEqual(["b", "a"]);
  });

  it("rejects a repeated uniqueID", () => {
    const m = makeManifest();
    m.add(songWithFile(10, "a"));
    expect(() => m.add(songWithFile(10, "a"))).toThrow("DuplicateID");
    expect(m.locals()).toHaveLength(1);
  });

  it("rejects the default's uniqueID", () => {
    const m = makeManifest();
    expect(() => m.add(songWithFile(10, "default"))).toThrow("DuplicateID");
  });

  it("rejects songs for another track", () => {
    const m = makeManifest();
    expect(() => m.add(songWithFile(11, "a"))).toThrow("IDMismatch");
  });

  it("stores a copy, not the caller's object", () => {
    const m = makeManifest();
    const song = songWithFile(10, "a");
    m.add(song);
    song.metadata.name = "changed";
    expect(m.findSong("a")?.metadata.name).toBe("a");
  });
});

describe("setActive", () => {
  it("switches to an alternate and back", () => {
    const m = makeManifest();
    m.add(songWithFile(10, "a"));
    m.setActive("a");
    expect(m.active().metadata.uniqueID).toBe("a");
    m.setActive("default");
    expect(m.active().metadata.uniqueID).toBe("default");
  });

  it("is idempotent", () => {
    const m = makeManifest();
    m.add(songWithFile(10, "a"));
    m.setActive("a");
    m.setActive("a");
    expect(m.activeID).toBe("a");
  });

  it("rejects unknown IDs and leaves the selection alone", () => {
    const m = makeManifest();
    expect(() => m.setActive("nope")).toThrow("UnknownID");
    expect(m.activeID).toBe("default");
  });
});

// ─── Deletion ───────────────────────────────────────────────────────────────

describe("deleteSong", () => {
  it("removes the record and its audio file", () => {
    const m = makeManifest();
    const song = songWithFile(10, "a");
    m.add(song);
    m.deleteSong("a");
    expect(m.locals()).toHaveLength(0);
    expect(existsSync(join(dir, "a.mp3"))).toBe(false);
  });

  it("falls back to the default when the active song is deleted", () => {
    const m = makeManifest();
    m.add(songWithFile(10, "a"));
    m.setActive("a");
    m.deleteSong("a");
    expect(m.activeID).toBe("default");
  });

  it("tolerates audio that is already gone", () => {
    const m = makeManifest();
    m.add(createLocalSong({ trackID: 10, uniqueID: "ghost", name: "g", artist: "" }, join(dir, "missing.mp3")));
    expect(() => m.deleteSong("ghost")).not.toThrow();
    expect(m.locals()).toHaveLength(0);
  });

  it("keeps the record and selection when the audio can't be removed", () => {
    const m = makeManifest();
    const blocked = join(dir, "blocked.mp3");
    mkdirSync(blocked);
    m.add(createLocalSong({ trackID: 10, uniqueID: "b", name: "b", artist: "" }, blocked));
    m.setActive("b");
    expect(() => m.deleteSong("b")).toThrow("IOError");
    expect(m.findSong("b")).toBeDefined();
    expect(m.activeID).toBe("b");
    expect(m.locals()).toHaveLength(1);
  });

  it("never deletes the default", () => {
    const m = makeManifest();
    expect(() => m.deleteSong("default")).toThrow("ActiveRecordProtected");
    m.add(songWithFile(10, "a"));
    m.setActive("a");
    expect(() => m.deleteSong("default")).toThrow("ActiveRecordProtected");
    expect(m.songs()).toHaveLength(2);
    expect(m.activeID).toBe("a");
  });

  it("rejects unknown IDs", () => {
    const m = makeManifest();
    expect(() => m.deleteSong("nope")).toThrow("UnknownID");
  });

  it("leaves the official audio alone when an alternate shares its path", () => {
    const m = makeManifest();
    const official = songPath(m.defaultSong()) ?? "";
    writeFileSync(official, "official");
    m.add(createLocalSong({ trackID: 10, uniqueID: "copy", name: "c", artist: "" }, official));
    m.deleteSong("copy");
    expect(existsSync(official)).toBe(true);
  });

  it("keeps the active selection valid through any add/delete sequence", () => {
    const m = makeManifest();
    const ops: Array<["add" | "del" | "act", string]> = [
      ["add", "a"], ["act", "a"], ["add", "b"], ["del", "a"], ["act", "b"],
      ["add", "c"], ["del", "b"], ["del", "c"], ["add", "d"], ["act", "d"], ["del", "d"],
    ];
    for (const [op, id] of ops) {
      if (op === "add") m.add(songWithFile(10, id));
      if (op === "act") m.setActive(id);
      if (op === "del") m.deleteSong(id);
      assertActiveExists(m);
    }
    expect(m.activeID).toBe("default");
  });
});

describe("deleteSongAudio", () => {
  it("removes the file and marks the record pending", () => {
    const m = makeManifest();
    m.add(songWithFile(10, "a"));
    m.deleteSongAudio("a");
    expect(existsSync(join(dir, "a.mp3"))).toBe(false);
    expect(m.findSong("a")?.storage).toEqual({ kind: "pending" });
  });

  it("refuses the default", () => {
    const m = makeManifest();
    expect(() => m.deleteSongAudio("default")).toThrow("ActiveRecordProtected");
  });
});

describe("deleteAllSongs", () => {
  it("leaves exactly the default, active", () => {
    const m = makeManifest();
    m.add(songWithFile(10, "a"));
    m.add(songWithFile(10, "b"));
    m.setActive("b");
    m.deleteAllSongs();
    expect(m.songs()).toHaveLength(1);
    expect(m.activeID).toBe("default");
    expect(existsSync(join(dir, "a.mp3"))).toBe(false);
    expect(existsSync(join(dir, "b.mp3"))).toBe(false);
  });

  it("removes everything it can and reports the first failure", () => {
    const m = makeManifest();
    const blocked = join(dir, "blocked.mp3");
    mkdirSync(blocked);
    m.add(createLocalSong({ trackID: 10, uniqueID: "x", name: "x", artist: "" }, blocked));
    m.add(songWithFile(10, "a"));
    expect(() => m.deleteAllSongs()).toThrow("IOError");
    expect(m.locals()).toHaveLength(0);
    expect(existsSync(join(dir, "a.mp3"))).toBe(false);
    expect(m.activeID).toBe("default");
  });
});

// ─── merge ──────────────────────────────────────────────────────────────────

describe("merge", () => {
  it("adds alternates that are missing", () => {
    const target = makeManifest();
    target.add(songWithFile(10, "a"));
    const source = makeManifest();
    source.add(songWithFile(10, "a"));
    source.add(songWithFile(10, "b"));

    expect(target.merge(source)).toBe(1);
    expect(target.locals().map((s) => s.metadata.uniqueID)).toEqual(["a", "b"]);
  });

  it("is idempotent", () => {
    const target = makeManifest();
    const source = makeManifest();
    source.add(songWithFile(10, "a"));
    source.add(songWithFile(10, "b"));

    target.merge(source);
    const once = target.locals().map((s) => s.metadata.uniqueID);
    expect(target.merge(source)).toBe(0);
    expect(target.locals().map((s) => s.metadata.uniqueID)).toEqual(once);
  });

  it("never overwrites an existing record", () => {
    const target = makeManifest();
    target.add(songWithFile(10, "a", "Mine"));
    const source = makeManifest();
    source.add(songWithFile(10, "a", "Theirs"));
    target.merge(source);
    expect(target.findSong("a")?.metadata.name).toBe("Mine");
  });

  it("rejects manifests of another track", () => {
    expect(() => makeManifest(10).merge(makeManifest(11))).toThrow("IDMismatch");
  });
});

// ─── Persistence ────────────────────────────────────────────────────────────

describe("commit", () => {
  it("round-trips through disk", () => {
    const m = makeManifest();
    m.add(songWithFile(10, "a"));
    m.add(createPendingSong({ trackID: 10, uniqueID: "p", name: "Later", artist: "X", startOffset: 300 }));
    m.setActive("a");
    m.commit();

    const loaded = loadManifestFile(m.filePath);
    expect(loaded.toJSON()).toEqual(m.toJSON());
    expect(loaded.active().metadata.uniqueID).toBe("a");
    expect(loaded.findSong("p")?.storage.kind).toBe("pending");
  });

  it("leaves no temp file behind", () => {
    const m = makeManifest();
    m.commit();
    expect(readdirSync(dir).filter((f) => f.endsWith(".tmp"))).toEqual([]);
  });

  it("writes the documented shape", () => {
    const m = makeManifest();
    m.commit();
    const doc = JSON.parse(readFileSync(m.filePath, "utf8"));
    expect(doc).toEqual({
      version: 1,
      defaultSong: { uniqueID: "default", name: "Official", artist: "Game", path: join(dir, "official.mp3") },
      songs: [],
      active: "default",
    });
  });

  it("throws IOError when the target can't be replaced", () => {
    const m = makeManifest();
    mkdirSync(m.filePath);
    expect(() => m.commit()).toThrow("IOError");
    expect(existsSync(m.filePath + ".tmp")).toBe(false);
  });
});

describe("fromJSON", () => {
  it("rejects an active ID that names no song", () => {
    const doc = {
      version: 1,
      defaultSong: { uniqueID: "d", name: "n", artist: "a", pending: true },
      songs: [],
      active: "other",
    };
    expect(() => TrackManifest.fromJSON(4, doc, dir)).toThrow("ParseError");
  });

  it("rejects duplicate alternates", () => {
    const rec = { uniqueID: "x", name: "n", artist: "a", path: "/p.mp3" };
    const doc = {
      version: 1,
      defaultSong: { uniqueID: "d", name: "n", artist: "a", pending: true },
      songs: [rec, rec],
      active: "d",
    };
    expect(() => TrackManifest.fromJSON(4, doc, dir)).toThrow("ParseError");
  });
});

describe("updateDefaultMetadata", () => {
  it("reports whether anything changed", () => {
    const m = makeManifest();
    expect(m.updateDefaultMetadata({ name: "Official", artist: "Game" })).toBe(false);
    expect(m.updateDefaultMetadata({ name: "Renamed", artist: "Game" })).toBe(true);
    expect(m.defaultSong().metadata.name).toBe("Renamed");
  });
});
