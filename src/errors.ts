/**
 * Error taxonomy for the archiver.
 *
 * Per-image and per-chapter errors are caught and turned into skip reasons;
 * only {@link FatalRunError} is meant to reach the command line.
 */

export type ArchiverErrorCode =
  | "DECODE_ERROR"
  | "INVALID_DIMENSIONS"
  | "FETCH_ERROR"
  | "EXTRACTION_EMPTY"
  | "NAVIGATION_TIMEOUT"
  | "ASSEMBLY_ERROR"
  | "ARTIFACT_IO_ERROR"
  | "FATAL_RUN_ERROR";

export abstract class ArchiverError extends Error {
  abstract readonly code: ArchiverErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bytes are not a readable image or fail the integrity check */
export class DecodeError extends ArchiverError {
  readonly code = "DECODE_ERROR";
}

/** Source image reports a zero width or height */
export class InvalidDimensions extends ArchiverError {
  readonly code = "INVALID_DIMENSIONS";

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    super(`Invalid image dimensions ${width}x${height}`);
  }
}

export class FetchError extends ArchiverError {
  readonly code = "FETCH_ERROR";
  readonly url: string;
  readonly status: number | undefined;

  constructor(message: string, details: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.url = details.url;
    this.status = details.status;
  }
}

export class ExtractionEmpty extends ArchiverError {
  readonly code = "EXTRACTION_EMPTY";
}

export class NavigationTimeout extends ArchiverError {
  readonly code = "NAVIGATION_TIMEOUT";
}

export class AssemblyError extends ArchiverError {
  readonly code = "ASSEMBLY_ERROR";
}

export class ArtifactIOError extends ArchiverError {
  readonly code = "ARTIFACT_IO_ERROR";

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The book cannot be opened or the rendering session cannot be established */
export class FatalRunError extends ArchiverError {
  readonly code = "FATAL_RUN_ERROR";
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
