/**
 * Signal handling for the CLI.
 * On SIGINT/SIGTERM registered cleanups run (killing yt-dlp, flushing logs)
 * before the process exits.
 */
import type { Logger } from "pino";

/** Exit codes for signal termination (128 + signal number) */
export const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143,
} as const;

export type ShutdownSignal = keyof typeof SIGNAL_EXIT_CODES;

/**
 * Shutdown manager instance returned by createShutdownManager.
 */
export interface ShutdownManager {
  /** Set up SIGINT and SIGTERM handlers. Call once at startup. */
  setup: () => void;
  /** Register a cleanup callback. Callbacks run in registration order. */
  registerCleanup: (fn: () => void | Promise<void>) => void;
  /** Check if shutdown is in progress. */
  isShuttingDown: () => boolean;
}

/**
 * Creates a shutdown manager for graceful CLI termination.
 *
 * @example
 * ```typescript
 * const shutdown = createShutdownManager(logger);
 * shutdown.setup();
 * shutdown.registerCleanup(() => engine.abort());
 * shutdown.registerCleanup(() => logging.close());
 * ```
 */
export function createShutdownManager(logger?: Logger): ShutdownManager {
  let shuttingDown = false;
  let onCleanup: (() => Promise<void>) | undefined;

  const shutdown = async (signal: ShutdownSignal): Promise<void> => {
    if (shuttingDown) {
      // Force exit on second signal
      process.exit(SIGNAL_EXIT_CODES[signal]);
    }

    shuttingDown = true;
    logger?.warn({ signal }, "shutdown_requested");

    try {
      if (onCleanup) {
        await onCleanup();
      }
    } catch (error) {
      logger?.error({ err: error }, "shutdown_cleanup_failed");
    }

    process.exit(SIGNAL_EXIT_CODES[signal]);
  };

  return {
    setup: () => {
      process.on("SIGINT", () => void shutdown("SIGINT"));
      process.on("SIGTERM", () => void shutdown("SIGTERM"));
    },

    isShuttingDown: () => shuttingDown,

    registerCleanup: (fn: () => void | Promise<void>) => {
      const previousCleanup = onCleanup;
      onCleanup = async () => {
        if (previousCleanup) {
          await previousCleanup();
        }
        await fn();
      };
    },
  };
}
