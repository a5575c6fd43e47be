/**
 * Base engine configuration shared by every download.
 */
import type { EngineLogger } from "../logging/engineLogAdapter.js";
import type { EngineConfig } from "./types.js";

/**
 * Best video with Russian and English audio, degrading step by step to the
 * best single file.
 */
export const FORMAT_SELECTOR = [
  "bestvideo+bestaudio[language^=ru]+bestaudio[language^=en]",
  "bestvideo+bestaudio[language^=ru]",
  "bestvideo+bestaudio[language^=en]",
  "bestvideo+bestaudio",
  "best",
].join("/");

export const USER_AGENT =
  "Mozilla/5.0 (iPhone17,5; CPU iPhone OS 18_3_2 like Mac OS X) " +
  "AppleWebKit/605.1.15 (KHTML, like Gecko) Mobile/15E148 FireKeepers/1.7.0";

export const RETRY_COUNT = 15;
export const RETRY_SLEEP_SECONDS = 5;

/**
 * Returns a fresh base configuration on every call.
 */
export function buildBaseConfig(logger: EngineLogger): EngineConfig {
  return {
    format: FORMAT_SELECTOR,
    allowMultipleAudioStreams: true,
    compatOptions: ["no-certifi"],
    subtitleLanguages: ["ru", "en"],
    writeSubtitles: true,
    writeThumbnail: true,
    postprocessors: [
      { key: "FFmpegEmbedSubtitle", alreadyHaveSubtitle: false },
      { key: "FFmpegMetadata", addChapters: true, addMetadata: true, addInfoJson: "if_exists" },
      { key: "EmbedThumbnail", alreadyHaveThumbnail: false },
      { key: "FFmpegConcat", onlyMultiVideo: true, when: "playlist" },
    ],
    mergeOutputFormat: "mkv/mp4",
    outputTemplates: {
      default: "",
      playlistThumbnail: "",
    },
    httpHeaders: {
      "User-Agent": USER_AGENT,
    },
    retries: RETRY_COUNT,
    fragmentRetries: RETRY_COUNT,
    retrySleep: RETRY_SLEEP_SECONDS,
    skipUnavailableFragments: false,
    continueDownloads: true,
    updateModifiedTime: true,
    windowsFilenames: true,
    remoteComponents: ["ejs:github"],
    noProgress: true,
    logger,
  };
}

/**
 * Deep-copies a configuration so a request can change it freely.
 * The logger is the process-wide sink and stays shared.
 */
export function cloneEngineConfig(config: EngineConfig): EngineConfig {
  const { logger, ...data } = config;
  return { ...structuredClone(data), logger };
}
