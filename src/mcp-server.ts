#!/usr/bin/env node
// ─── nongbox: MCP Server ────────────────────────────────────────────────────
//
// Exposes the manifest store as MCP tools, so an assistant can inspect and
// rearrange which song plays for each track.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   list_tracks       — every track with its active song
//   track_info        — all songs for one track
//   set_active_song   — choose which song plays
//   add_song          — register an audio file as an alternate
//   delete_song       — remove an alternate and its audio
//   delete_all_songs  — reset a track to its default song
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { createNongbox } from "./index.js";
import { createLocalSong, describeError, songPath } from "./nongs/index.js";
import type { ManifestStore } from "./nongs/index.js";

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function text(body: string): ToolResult {
  return { content: [{ type: "text", text: body }] };
}

function errorResult(err: unknown): ToolResult {
  return { content: [{ type: "text", text: describeError(err) }], isError: true };
}

const trackIdParam = z.number().int().positive().describe("Game track ID");

/** Build the server around an initialized store. */
export function createServer(store: ManifestStore): McpServer {
  const server = new McpServer({
    name: "nongbox",
    version: "0.1.0",
  });

  // ─── Tool: list_tracks ──────────────────────────────────────────────────

  server.tool(
    "list_tracks",
    "List every track that has a manifest, with the song currently active for it.",
    async () => {
      const lines = store.trackIDs().flatMap((id) => {
        const track = store.getTrack(id);
        if (!track) return [];
        const a = track.active().metadata;
        return [`${id} — ${a.name} by ${a.artist || "unknown"} (${track.locals().length} alternates)`];
      });
      return text(lines.length === 0 ? "No tracks yet." : lines.join("\n"));
    }
  );

  // ─── Tool: track_info ───────────────────────────────────────────────────

  server.tool(
    "track_info",
    "Show all songs for a track: the default, every alternate, and which is active.",
    { trackID: trackIdParam },
    async ({ trackID }) => {
      const track = store.getTrack(trackID);
      if (!track) return errorResult(`Track ${trackID} has no manifest.`);

      const lines = [`# Track ${trackID}`, ""];
      for (const song of track.songs()) {
        const m = song.metadata;
        const flags = [
          song === track.defaultSong() ? "default" : null,
          m.uniqueID === track.activeID ? "active" : null,
        ].filter((f): f is string => f !== null);
        lines.push(
          `- **${m.name}** by ${m.artist || "unknown"} \`${m.uniqueID}\`` +
            (flags.length > 0 ? ` (${flags.join(", ")})` : "") +
            ` — ${songPath(song) ?? "pending download"}`
        );
      }
      return text(lines.join("\n"));
    }
  );

  // ─── Tool: set_active_song ──────────────────────────────────────────────

  server.tool(
    "set_active_song",
    "Choose which song plays for a track.",
    {
      trackID: trackIdParam,
      uniqueID: z.string().min(1).describe("Unique ID of the song to activate"),
    },
    async ({ trackID, uniqueID }) => {
      try {
        store.setActiveSong(trackID, uniqueID);
        return text(`Track ${trackID} now plays ${uniqueID}.`);
      } catch (err) {
        return errorResult(err);
      }
    }
  );

  // ─── Tool: add_song ─────────────────────────────────────────────────────

  server.tool(
    "add_song",
    "Register an audio file already on disk as an alternate song for a track.",
    {
      trackID: trackIdParam,
      path: z.string().min(1).describe("Absolute path of the audio file"),
      name: z.string().min(1).describe("Song name"),
      artist: z.string().default("").describe("Artist name"),
      startOffset: z.number().int().optional().describe("Start offset in milliseconds"),
      activate: z.boolean().default(false).describe("Make it the active song"),
    },
    async ({ trackID, path, name, artist, startOffset, activate }) => {
      const song = createLocalSong({ trackID, name, artist }, path);
      if (startOffset !== undefined) song.metadata.startOffset = startOffset;
      try {
        store.addSong(trackID, song);
        if (activate) store.setActiveSong(trackID, song.metadata.uniqueID);
        return text(`Added ${song.metadata.uniqueID} to track ${trackID}.`);
      } catch (err) {
        return errorResult(err);
      }
    }
  );

  // ─── Tool: delete_song ──────────────────────────────────────────────────

  server.tool(
    "delete_song",
    "Remove an alternate song and its audio file. The default song cannot be deleted.",
    {
      trackID: trackIdParam,
      uniqueID: z.string().min(1).describe("Unique ID of the song to delete"),
    },
    async ({ trackID, uniqueID }) => {
      try {
        store.deleteSong(trackID, uniqueID);
        return text(`Deleted ${uniqueID} from track ${trackID}.`);
      } catch (err) {
        return errorResult(err);
      }
    }
  );

  // ─── Tool: delete_all_songs ─────────────────────────────────────────────

  server.tool(
    "delete_all_songs",
    "Remove every alternate for a track and go back to the default song.",
    { trackID: trackIdParam },
    async ({ trackID }) => {
      try {
        store.deleteAllSongs(trackID);
        return text(`Track ${trackID} reset to its default song.`);
      } catch (err) {
        return errorResult(err);
      }
    }
  );

  return server;
}

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const store = createNongbox();
  store.init();

  const server = createServer(store);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("nongbox MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
