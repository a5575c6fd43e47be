/**
 * Bridges yt-dlp's text output into structured log events.
 */
import type { Logger } from "pino";

/**
 * The three text channels the download engine reports on.
 */
export interface EngineLogger {
  debug: (message: string) => void;
  warning: (message: string) => void;
  error: (message: string) => void;
}

const DEBUG_MARKER = "[debug]";
const WARNING_MARKER = "WARNING:";
const ERROR_MARKER = "ERROR:";

function stripMarker(text: string, marker: string): string {
  return text.startsWith(marker) ? text.slice(marker.length).trim() : text;
}

/**
 * Creates an EngineLogger that writes to a pino logger.
 *
 * yt-dlp sends both its info and its debug lines to the debug channel;
 * they are told apart by the `[debug]` prefix.
 */
export function createEngineLogAdapter(logger: Logger): EngineLogger {
  return {
    debug: (message) => {
      const text = message.trim();
      if (!text) return;

      if (text.startsWith(DEBUG_MARKER)) {
        logger.debug({ detail: stripMarker(text, DEBUG_MARKER) }, "yt_dlp_debug");
      } else {
        logger.info({ detail: text }, "yt_dlp_info");
      }
    },

    warning: (message) => {
      const text = message.trim();
      if (!text) return;
      logger.warn({ detail: stripMarker(text, WARNING_MARKER) }, "yt_dlp_warning");
    },

    error: (message) => {
      const text = message.trim();
      if (!text) return;
      logger.error({ detail: stripMarker(text, ERROR_MARKER) }, "yt_dlp_error");
    },
  };
}

/**
 * Sends one raw line of engine output to the matching channel.
 */
export function routeEngineLine(line: string, engineLogger: EngineLogger): void {
  if (line.startsWith(ERROR_MARKER)) {
    engineLogger.error(line);
  } else if (line.startsWith(WARNING_MARKER)) {
    engineLogger.warning(line);
  } else {
    engineLogger.debug(line);
  }
}

/**
 * Returns the message of an `ERROR:` line without its marker, or null.
 */
export function parseEngineErrorLine(line: string): string | null {
  const text = line.trim();
  return text.startsWith(ERROR_MARKER) ? stripMarker(text, ERROR_MARKER) : null;
}
