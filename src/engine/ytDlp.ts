/**
 * yt-dlp engine: runs the yt-dlp program through execa.
 */
import { execa, ExecaError } from "execa";
import { videoMetadataSchema } from "../config/schema.js";
import { DownloadEngineError } from "../shared/errors.js";
import { parseEngineErrorLine, routeEngineLine } from "../logging/engineLogAdapter.js";
import { toYtDlpArgs } from "./args.js";
import type { DownloadEngine, EngineConfig, EngineSession, VideoMetadata } from "./types.js";

export interface YtDlpEngineOptions {
  /** yt-dlp executable (default: "yt-dlp" from PATH) */
  binary?: string;
}

/**
 * Builds the error for a failed run. The last `ERROR:` line yt-dlp printed is
 * the most useful message; execa's summary is the fallback.
 */
function toEngineError(
  result: { exitCode?: number | undefined; command: string },
  lastError: string | null,
  fallback: string,
  cause?: unknown
): DownloadEngineError {
  return new DownloadEngineError(
    lastError ?? fallback,
    { exitCode: result.exitCode, command: result.command },
    cause === undefined ? undefined : { cause }
  );
}

class YtDlpSession implements EngineSession {
  private closed = false;
  /** Kill functions of the subprocesses still running */
  private readonly running = new Set<() => void>();

  constructor(
    readonly config: EngineConfig,
    private readonly binary: string,
    private readonly onClose: (session: YtDlpSession) => void
  ) {}

  async extract(url: string): Promise<VideoMetadata> {
    this.assertOpen();

    const subprocess = execa(
      this.binary,
      [...toYtDlpArgs(this.config), "--dump-single-json", "--skip-download", url],
      { reject: false }
    );
    const stop = () => {
      subprocess.kill();
    };
    this.running.add(stop);
    const result = await subprocess.finally(() => this.running.delete(stop));

    let lastError: string | null = null;
    for (const line of result.stderr.split(/\r?\n/)) {
      lastError = parseEngineErrorLine(line) ?? lastError;
      routeEngineLine(line, this.config.logger);
    }

    if (result.failed) {
      const summary = result instanceof ExecaError ? result.shortMessage : "yt-dlp failed";
      throw toEngineError(result, lastError, summary, result);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (error) {
      throw toEngineError(result, null, "yt-dlp printed invalid metadata JSON", error);
    }

    const parsed = videoMetadataSchema.safeParse(json);
    return parsed.success ? parsed.data : {};
  }

  async download(urls: string[]): Promise<void> {
    this.assertOpen();

    const subprocess = execa(this.binary, [...toYtDlpArgs(this.config), ...urls], {
      all: true,
      buffer: false,
      reject: false,
    });
    const stop = () => {
      subprocess.kill();
    };
    this.running.add(stop);

    let lastError: string | null = null;
    try {
      for await (const line of subprocess.iterable({ from: "all" })) {
        lastError = parseEngineErrorLine(line) ?? lastError;
        routeEngineLine(line, this.config.logger);
      }
    } finally {
      this.running.delete(stop);
    }

    const result = await subprocess;
    if (result.failed) {
      const summary = result instanceof ExecaError ? result.shortMessage : "yt-dlp failed";
      throw toEngineError(result, lastError, summary, result);
    }
  }

  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.kill();
      this.onClose(this);
    }
    return Promise.resolve();
  }

  /** Terminates running subprocesses. */
  kill(): void {
    for (const stop of this.running) {
      stop();
    }
    this.running.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Engine session is closed");
    }
  }
}

/**
 * Download engine backed by the yt-dlp command-line program.
 *
 * @example
 * ```typescript
 * const engine = new YtDlpEngine({ binary: settings.ytDlpPath });
 * await withSession(engine, config, (session) => session.download([url]));
 * ```
 */
export class YtDlpEngine implements DownloadEngine {
  readonly binary: string;
  private readonly sessions = new Set<YtDlpSession>();

  constructor(options: YtDlpEngineOptions = {}) {
    this.binary = options.binary ?? "yt-dlp";
  }

  openSession(config: EngineConfig): EngineSession {
    const session = new YtDlpSession(config, this.binary, (closed) => {
      this.sessions.delete(closed);
    });
    this.sessions.add(session);
    return session;
  }

  /** Kills every running yt-dlp process, e.g. on SIGINT. */
  abort(): void {
    for (const session of this.sessions) {
      session.kill();
    }
  }
}
