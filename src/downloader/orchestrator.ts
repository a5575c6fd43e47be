/**
 * Single video and playlist downloads on top of the download engine.
 */
import type { Logger } from "pino";
import { escapeTemplateText } from "../engine/args.js";
import { cloneEngineConfig } from "../engine/options.js";
import {
  type DownloadEngine,
  type EngineConfig,
  type VideoMetadata,
  withSession,
} from "../engine/types.js";

export const UNKNOWN_AUTHOR = "Unknown Author";

/** Playlist items go into "<channel> - <playlist>/NNN - <title>.<ext>" */
export const PLAYLIST_OUTPUT_TEMPLATE =
  "%(channel)s - %(playlist_title)s/%(playlist_index)03d - %(title)s.%(ext)s";

export interface DownloadOptions {
  engine: DownloadEngine;
  /** Netscape-format cookie file passed to the engine */
  cookies?: string | undefined;
  logger?: Logger | undefined;
}

/**
 * Picks the author label for a video: channel, uploader, creator, then
 * uploader id. A leading "@" (channel handles) is removed.
 *
 * @example
 * deriveAuthor({ channel: "", uploader: "@JohnDoe" })
 * // => "JohnDoe"
 */
export function deriveAuthor(metadata: VideoMetadata): string {
  const author =
    metadata.channel ||
    metadata.uploader ||
    metadata.creator ||
    metadata.uploader_id ||
    UNKNOWN_AUTHOR;

  return author.startsWith("@") ? author.slice(1) : author;
}

/**
 * Output template for a single video: "<author> - <title>.<ext>".
 */
export function singleVideoOutputTemplate(author: string): string {
  return `${escapeTemplateText(author)} - %(title)s.%(ext)s`;
}

function requestConfig(baseConfig: EngineConfig, cookies: string | undefined): EngineConfig {
  const config = cloneEngineConfig(baseConfig);
  if (cookies) {
    config.cookieFile = cookies;
  }
  return config;
}

/**
 * Downloads one video, named after its author.
 * Metadata is fetched first; if that fails the author is "Unknown Author".
 */
export async function downloadSingleItem(
  url: string,
  baseConfig: EngineConfig,
  options: DownloadOptions
): Promise<void> {
  const config = requestConfig(baseConfig, options.cookies);

  await withSession(options.engine, config, async (session) => {
    let metadata: VideoMetadata = {};
    try {
      metadata = await session.extract(url);
    } catch (error) {
      options.logger?.warn(
        { url, error: error instanceof Error ? error.message : String(error) },
        "metadata_prefetch_failed"
      );
    }

    const author = deriveAuthor(metadata);
    options.logger?.debug({ url, author }, "author_resolved");

    session.config.outputTemplates.default = singleVideoOutputTemplate(author);
    await session.download([url]);
  });
}

/**
 * Downloads a playlist into its own folder.
 */
export async function downloadCollection(
  url: string,
  baseConfig: EngineConfig,
  options: DownloadOptions
): Promise<void> {
  const config = requestConfig(baseConfig, options.cookies);
  config.outputTemplates.default = PLAYLIST_OUTPUT_TEMPLATE;

  await withSession(options.engine, config, (session) => session.download([url]));
}
