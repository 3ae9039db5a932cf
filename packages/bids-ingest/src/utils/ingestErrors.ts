/**
 * Error taxonomy for sidecar ingest
 *
 * Fatal conditions abort the whole ingest call and surface as
 * BidsIngestError. Recoverable ones are reported as diagnostics instead
 * (see IngestDiagnostic).
 */

import type { ZodError } from "zod";

export type IngestErrorCode =
  | "MISSING_FILE"
  | "SCHEMA_MISMATCH"
  | "MALFORMED_FILE"
  | "CAPABILITY_UNAVAILABLE"
  | "UNSUPPORTED_FORMAT"
  | "INVALID_OPTIONS";

export class BidsIngestError extends Error {
  readonly code: IngestErrorCode;
  readonly path?: string;

  constructor(
    code: IngestErrorCode,
    message: string,
    options?: { path?: string; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "BidsIngestError";
    this.code = code;
    this.path = options?.path;
  }
}

export function isBidsIngestError(error: unknown): error is BidsIngestError {
  return error instanceof BidsIngestError;
}

/**
 * Extract a readable message from whatever a parser threw
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "An unexpected error occurred";
}

export function missingFile(path: string, what: string): BidsIngestError {
  return new BidsIngestError("MISSING_FILE", `${what} not found: ${path}`, {
    path,
  });
}

export function schemaMismatch(path: string, message: string): BidsIngestError {
  return new BidsIngestError("SCHEMA_MISMATCH", `${message} (${path})`, {
    path,
  });
}

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function invalidCompanion(
  path: string,
  what: string,
  error: ZodError,
): BidsIngestError {
  return new BidsIngestError(
    "SCHEMA_MISMATCH",
    `Invalid ${what} ${path}: ${formatZodIssues(error)}`,
    { path, cause: error },
  );
}
