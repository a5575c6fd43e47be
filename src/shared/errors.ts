/**
 * Error types raised by ytd.
 *
 * URL errors are kept as distinct classes even though the CLI maps both
 * to the same exit code.
 */

/**
 * The URL does not point to a supported YouTube host.
 */
export class InvalidUrlError extends Error {
  constructor(readonly url: string) {
    super(`Not a valid YouTube URL: "${url}"`);
    this.name = "InvalidUrlError";
  }
}

/**
 * The URL is on a YouTube host, but its path is neither a video nor a playlist.
 */
export class InvalidUrlStructureError extends Error {
  constructor(readonly url: string) {
    super(`Unsupported or invalid YouTube URL structure: "${url}"`);
    this.name = "InvalidUrlStructureError";
  }
}

export interface DownloadEngineErrorDetails {
  /** Exit code of the engine process, if it ran at all */
  exitCode?: number | undefined;
  /** The command line that failed */
  command?: string | undefined;
}

/**
 * Any failure reported by the download engine (extraction, network, muxing).
 */
export class DownloadEngineError extends Error {
  readonly details: DownloadEngineErrorDetails;

  constructor(message: string, details: DownloadEngineErrorDetails = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = "DownloadEngineError";
    this.details = details;
  }
}

/**
 * True for both URL error kinds.
 */
export function isUrlValidationError(
  error: unknown
): error is InvalidUrlError | InvalidUrlStructureError {
  return error instanceof InvalidUrlError || error instanceof InvalidUrlStructureError;
}
