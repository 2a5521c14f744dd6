// ─── Manifest Errors ────────────────────────────────────────────────────────
//
// Every failure the manifest subsystem reports is a ManifestError tagged with
// one of ERROR_KINDS. Context (track, record, file) rides along as data;
// human-readable text is built by describeError at the edges.
// ─────────────────────────────────────────────────────────────────────────────

export const ERROR_KINDS = [
  "NotInitialized",
  "TrackNotInitialized",
  "DuplicateID",
  "UnknownID",
  "ActiveRecordProtected",
  "IDMismatch",
  "IOError",
  "ParseError",
  "InvalidFilename",
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface ErrorContext {
  trackID?: number;
  uniqueID?: string;
  file?: string;
  /** Underlying error text (fs errno message, zod issues, JSON syntax). */
  detail?: string;
}

export class ManifestError extends Error {
  readonly kind: ErrorKind;
  readonly context: ErrorContext;

  constructor(kind: ErrorKind, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(kind, options);
    this.name = "ManifestError";
    this.kind = kind;
    this.context = context;
  }
}

/** Narrow an unknown thrown value to a ManifestError of the given kind. */
export function isManifestError(err: unknown, kind?: ErrorKind): err is ManifestError {
  return err instanceof ManifestError && (kind === undefined || err.kind === kind);
}

/** Wrap a filesystem failure as an IOError. */
export function ioError(err: unknown, context: ErrorContext): ManifestError {
  const detail = err instanceof Error ? err.message : String(err);
  return new ManifestError("IOError", { ...context, detail }, { cause: err });
}

// ─── Formatting ─────────────────────────────────────────────────────────────

function where(ctx: ErrorContext): string {
  const parts: string[] = [];
  if (ctx.trackID !== undefined) parts.push(`track ${ctx.trackID}`);
  if (ctx.uniqueID !== undefined) parts.push(`song ${ctx.uniqueID}`);
  if (ctx.file !== undefined) parts.push(ctx.file);
  return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}

/** Render any thrown value as one line of text. */
export function describeError(err: unknown): string {
  if (!(err instanceof ManifestError)) {
    return err instanceof Error ? err.message : String(err);
  }

  const ctx = err.context;
  const suffix = ctx.detail ? `: ${ctx.detail}` : "";

  switch (err.kind) {
    case "NotInitialized":
      return "Manifest store has not been initialized";
    case "TrackNotInitialized":
      return `Song not initialized in manifest${where(ctx)}`;
    case "DuplicateID":
      return `Song already exists in manifest${where(ctx)}`;
    case "UnknownID":
      return `No song with that ID in manifest${where(ctx)}`;
    case "ActiveRecordProtected":
      return `The default song cannot be deleted${where(ctx)}`;
    case "IDMismatch":
      return `Track IDs do not match${where(ctx)}${suffix}`;
    case "IOError":
      return `File operation failed${where(ctx)}${suffix}`;
    case "ParseError":
      return `Couldn't parse manifest${where(ctx)}${suffix}`;
    case "InvalidFilename":
      return `Invalid filename${where(ctx)}`;
  }
}
