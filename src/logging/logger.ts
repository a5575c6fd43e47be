/**
 * Process-wide logging context.
 *
 * Console sinks render with pino-pretty; the log file gets one JSON object
 * per line and rotates by size.
 */
import { multistream, pino, type DestinationStream, type Level, type Logger, type StreamEntry } from "pino";
import { build as prettyStream } from "pino-pretty";
import { createStream } from "rotating-file-stream";
import { LOG_FILE_NAME } from "../config/paths.js";

export const LOG_FILE_MAX_SIZE = "10M";
export const LOG_FILE_MAX_SEGMENTS = 7;

export interface LogRotation {
  /** Segment size in rotating-file-stream notation, e.g. "10M" */
  size: string;
  /** Rotated segments kept beside the active file */
  segments: number;
}

export interface LoggingOptions {
  /** Directory of the log file (default: current working directory) */
  directory?: string;
  fileName?: string;
  rotation?: LogRotation;
  /** Minimum level the logger itself emits (default: info) */
  level?: Level;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Force colors on or off (default: only when attached to a TTY) */
  colorize?: boolean;
}

export interface LoggingContext {
  logger: Logger;
  /** Flushes and closes the file sink. Safe to call more than once. */
  close: () => Promise<void>;
}

function consoleStream(
  destination: NodeJS.WritableStream | number,
  colorize: boolean
): DestinationStream {
  return prettyStream({
    destination,
    colorize,
    sync: true,
    messageKey: "event",
    ignore: "pid,hostname,logger",
    translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
  });
}

/**
 * Sets up logging to stdout (info+), stderr (error+) and a rotating file (info+).
 *
 * @example
 * ```typescript
 * const logging = createLoggingContext();
 * logging.logger.info({ url }, "downloading_single_video");
 * await logging.close();
 * ```
 */
export function createLoggingContext(options: LoggingOptions = {}): LoggingContext {
  const fileName = options.fileName ?? LOG_FILE_NAME;
  const rotation = options.rotation ?? { size: LOG_FILE_MAX_SIZE, segments: LOG_FILE_MAX_SEGMENTS };

  // Classical rotation: the generator gets the segment number, ytd.log.1 is the newest
  const fileStream = createStream(
    (segment: number | Date | null) =>
      typeof segment === "number" ? `${fileName}.${segment}` : fileName,
    {
      path: options.directory ?? process.cwd(),
      size: rotation.size,
      rotate: rotation.segments,
      encoding: "utf8",
    }
  );

  let fileClosed = false;
  const fileSink: DestinationStream = {
    write: (line: string) => {
      if (!fileClosed) {
        fileStream.write(line);
      }
    },
  };

  const streams: StreamEntry[] = [
    {
      level: "info",
      stream: consoleStream(
        options.stdout ?? 1,
        options.colorize ?? (options.stdout ? false : Boolean(process.stdout.isTTY))
      ),
    },
    {
      level: "error",
      stream: consoleStream(
        options.stderr ?? 2,
        options.colorize ?? (options.stderr ? false : Boolean(process.stderr.isTTY))
      ),
    },
    { level: "info", stream: fileSink },
  ];

  const logger = pino(
    {
      level: options.level ?? "info",
      messageKey: "event",
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      base: { logger: "ytd" },
    },
    multistream(streams)
  );

  fileStream.on("error", (error: Error) => {
    fileClosed = true;
    logger.error({ err: error }, "log_file_error");
  });

  let closed: Promise<void> | null = null;

  return {
    logger,
    close: () => {
      if (!closed) {
        fileClosed = true;
        closed = new Promise<void>((resolve) => {
          fileStream.end(() => resolve());
        });
      }
      return closed;
    },
  };
}

