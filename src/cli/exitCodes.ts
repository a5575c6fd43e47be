import { CommanderError } from "commander";
import type { Logger } from "pino";
import { DownloadEngineError, isUrlValidationError } from "../shared/errors.js";

export const EXIT_CODES = {
  success: 0,
  unhandled: 1,
  downloadFailed: 2,
  invalidUrl: 3,
  usage: 64,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Logs a failure as a structured error event and returns the exit code for it.
 */
export function resolveExitCode(error: unknown, logger: Logger): ExitCode {
  if (error instanceof CommanderError) {
    // --help and --version end up here too
    if (error.exitCode === 0) return EXIT_CODES.success;
    logger.error({ error: error.message, code: error.code }, "cli_error");
    return EXIT_CODES.usage;
  }

  if (isUrlValidationError(error)) {
    logger.error({ error: error.message }, "validation_error");
    return EXIT_CODES.invalidUrl;
  }

  if (error instanceof DownloadEngineError) {
    logger.error({ error: error.message, exitCode: error.details.exitCode }, "download_error");
    return EXIT_CODES.downloadFailed;
  }

  logger.error(
    { err: error, error: error instanceof Error ? error.message : String(error) },
    "unhandled_exception"
  );
  return EXIT_CODES.unhandled;
}
