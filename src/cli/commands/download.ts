import type { Logger } from "pino";
import { expandPath } from "../../config/paths.js";
import type { Settings } from "../../config/schema.js";
import { downloadCollection, downloadSingleItem } from "../../downloader/orchestrator.js";
import { buildBaseConfig } from "../../engine/options.js";
import type { DownloadEngine, EngineConfig } from "../../engine/types.js";
import { createEngineLogAdapter } from "../../logging/engineLogAdapter.js";
import { InvalidUrlError } from "../../shared/errors.js";
import { isSingleVideo, isYoutubeUrl } from "../../youtube/url.js";

export interface DownloadCommandOptions {
  /** Netscape-formatted cookies file */
  cookies?: string;
}

export interface DownloadCommandDeps {
  engine: DownloadEngine;
  logger: Logger;
  settings: Settings;
}

export type DownloadStage = "validating" | "classifying" | "downloading";

/**
 * Base engine config with the user's settings applied.
 */
export function buildCommandConfig(logger: Logger, settings: Settings): EngineConfig {
  const config = buildBaseConfig(createEngineLogAdapter(logger));
  config.outputDir = expandPath(settings.outputDir);
  if (settings.ffmpegLocation) {
    config.ffmpegLocation = expandPath(settings.ffmpegLocation);
  }
  return config;
}

/**
 * Downloads a YouTube video or playlist.
 * Runs validating → classifying → downloading; any error ends the run.
 */
export async function downloadCommand(
  url: string,
  options: DownloadCommandOptions,
  deps: DownloadCommandDeps
): Promise<void> {
  const { engine, logger, settings } = deps;
  const enter = (stage: DownloadStage) => logger.debug({ url, stage }, "stage_entered");

  enter("validating");
  if (!isYoutubeUrl(url)) {
    logger.error({ url }, "invalid_url");
    throw new InvalidUrlError(url);
  }

  const baseConfig = buildCommandConfig(logger, settings);

  enter("classifying");
  const singleVideo = isSingleVideo(url);

  enter("downloading");
  const downloadOptions = { engine, logger, cookies: options.cookies };
  if (singleVideo) {
    logger.info({ url }, "downloading_single_video");
    await downloadSingleItem(url, baseConfig, downloadOptions);
  } else {
    logger.info({ url }, "downloading_playlist");
    await downloadCollection(url, baseConfig, downloadOptions);
  }

  logger.info({ url }, "download_finished");
}
