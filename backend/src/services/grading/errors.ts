/**
 * Ingestion and configuration errors. These are the only grading failures thrown as
 * exceptions; per-unit, per-question and per-assertion failures travel as data on outcomes.
 */

import type { IngestionErrorKind } from "../../../../packages/shared/src/types";

export class NotFoundError extends Error {
  readonly kind: IngestionErrorKind = "NotFound";

  constructor(public filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = "NotFoundError";
  }
}

export class FormatError extends Error {
  readonly kind: IngestionErrorKind = "FormatError";

  constructor(
    public source: string,
    detail: string
  ) {
    super(`Cannot read ${source}: ${detail}`);
    this.name = "FormatError";
  }
}

export class UnsupportedFormatError extends Error {
  readonly kind: IngestionErrorKind = "UnsupportedFormat";

  constructor(
    public source: string,
    public extension: string
  ) {
    super(`Unsupported submission format: ${extension || "(none)"} (${source})`);
    this.name = "UnsupportedFormatError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type IngestionError = NotFoundError | FormatError | UnsupportedFormatError;

export function isIngestionError(err: unknown): err is IngestionError {
  return err instanceof NotFoundError || err instanceof FormatError || err instanceof UnsupportedFormatError;
}
