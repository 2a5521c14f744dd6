// ─── nongbox: Logging ───────────────────────────────────────────────────────
//
// The store reports quarantined files, migration problems and failed saves
// through a Logger. Loggers never throw back into the caller.
//
// Three implementations:
//   createConsoleLogger()   — stderr (stdout stays free for CLI output / MCP stdio)
//   createSilentLogger()    — drops everything
//   createRecordingLogger() — keeps entries in memory (tests)
// ─────────────────────────────────────────────────────────────────────────────

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export function createConsoleLogger(prefix = "nongbox"): Logger {
  const write = (level: LogLevel, message: string): void => {
    console.error(`[${prefix}] ${level.toUpperCase()} ${message}`);
  };
  return {
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
  };
}

export function createSilentLogger(): Logger {
  return {
    info() {},
    warn() {},
    error() {},
  };
}

/** Logger that records every entry. */
export function createRecordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (message) => { entries.push({ level: "info", message }); },
    warn: (message) => { entries.push({ level: "warn", message }); },
    error: (message) => { entries.push({ level: "error", message }); },
  };
}
