/**
 * Download engine boundary.
 *
 * ytd never fetches or muxes media itself; it hands a configuration and URLs
 * to an engine (yt-dlp in production, a fake in tests).
 */
import type { VideoMetadata } from "../config/schema.js";
import type { EngineLogger } from "../logging/engineLogAdapter.js";

export type { VideoMetadata } from "../config/schema.js";

/**
 * Output filename templates, in yt-dlp's `%(field)s` syntax.
 * An empty string leaves the engine's default in place.
 */
export interface OutputTemplates {
  default: string;
  /** Playlist thumbnail file; empty disables writing it */
  playlistThumbnail: string;
}

export type PostProcessor =
  | { key: "FFmpegEmbedSubtitle"; alreadyHaveSubtitle: boolean }
  | {
      key: "FFmpegMetadata";
      addChapters: boolean;
      addMetadata: boolean;
      addInfoJson: boolean | "if_exists";
    }
  | { key: "EmbedThumbnail"; alreadyHaveThumbnail: boolean }
  | { key: "FFmpegConcat"; onlyMultiVideo: boolean; when: "playlist" };

/**
 * Options passed to the engine for one request.
 */
export interface EngineConfig {
  format: string;
  allowMultipleAudioStreams: boolean;
  compatOptions: string[];
  subtitleLanguages: string[];
  writeSubtitles: boolean;
  writeThumbnail: boolean;
  postprocessors: PostProcessor[];
  mergeOutputFormat: string;
  outputTemplates: OutputTemplates;
  httpHeaders: Record<string, string>;
  retries: number;
  fragmentRetries: number;
  /** Seconds between retries */
  retrySleep: number;
  skipUnavailableFragments: boolean;
  continueDownloads: boolean;
  updateModifiedTime: boolean;
  windowsFilenames: boolean;
  remoteComponents: string[];
  noProgress: boolean;
  /** Netscape-format cookie file */
  cookieFile?: string | undefined;
  /** Directory downloads are written to */
  outputDir?: string | undefined;
  ffmpegLocation?: string | undefined;
  logger: EngineLogger;
}

/**
 * One engine session, bound to a single configuration copy.
 * `config` is read when an operation runs, so it may be changed in between.
 */
export interface EngineSession {
  readonly config: EngineConfig;
  /** Fetches metadata without downloading anything. */
  extract: (url: string) => Promise<VideoMetadata>;
  download: (urls: string[]) => Promise<void>;
  close: () => Promise<void>;
}

export interface DownloadEngine {
  openSession: (config: EngineConfig) => EngineSession;
}

/**
 * Runs `fn` inside an engine session and always closes it afterwards.
 */
export async function withSession<T>(
  engine: DownloadEngine,
  config: EngineConfig,
  fn: (session: EngineSession) => Promise<T>
): Promise<T> {
  const session = engine.openSession(config);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
