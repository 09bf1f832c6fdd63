export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_PORT = 8000;
export const DEFAULT_API_PREFIX = "/api";

// One hour, the customary validity of a presigned URL.
export const DEFAULT_PRESIGN_EXPIRES_IN = 3600;
// SigV4 query signatures cannot outlive seven days.
export const MAX_PRESIGN_EXPIRES_IN = 604_800;

export const PATH_DELIMITER = "/";

export type PartUrlResponseMode = "json" | "redirect";

export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

const VERBOSITY_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug", "trace"];

/**
 * Maps a repeated `-v` count onto a pino level: 0 is `error`, 4 and above is `trace`.
 */
export function logLevelFromVerbosity(verbosity: number): LogLevel {
  const index = Math.min(Math.max(Math.trunc(verbosity), 0), VERBOSITY_LEVELS.length - 1);
  return VERBOSITY_LEVELS[index] ?? "error";
}

export interface ObjectRef {
  bucket: string;
  key: string;
}

export interface ListingEntry {
  path: string;
  isDirectory: boolean;
}

export interface CompletedUploadPart {
  number: number;
  etag: string;
}
