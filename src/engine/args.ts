/**
 * Translates an EngineConfig into yt-dlp command-line flags.
 */
import type { EngineConfig, PostProcessor } from "./types.js";

function postprocessorArgs(pp: PostProcessor): string[] {
  switch (pp.key) {
    case "FFmpegEmbedSubtitle":
      return ["--embed-subs"];

    case "FFmpegMetadata": {
      const args: string[] = [];
      if (pp.addMetadata) args.push("--embed-metadata");
      if (pp.addChapters) args.push("--embed-chapters");
      // "if_exists" is yt-dlp's own default
      if (pp.addInfoJson === true) args.push("--embed-info-json");
      if (pp.addInfoJson === false) args.push("--no-embed-info-json");
      return args;
    }

    case "EmbedThumbnail":
      return ["--embed-thumbnail"];

    case "FFmpegConcat":
      return ["--concat-playlist", pp.onlyMultiVideo ? "multi_video" : "always"];
  }
}

/**
 * Builds the flags shared by every yt-dlp invocation of a session.
 * URLs and mode flags (such as `--dump-single-json`) are appended by the caller.
 */
export function toYtDlpArgs(config: EngineConfig): string[] {
  const args: string[] = ["--format", config.format];

  if (config.allowMultipleAudioStreams) args.push("--audio-multistreams");
  if (config.compatOptions.length > 0) {
    args.push("--compat-options", config.compatOptions.join(","));
  }

  if (config.writeSubtitles) args.push("--write-subs");
  if (config.subtitleLanguages.length > 0) {
    args.push("--sub-langs", config.subtitleLanguages.join(","));
  }
  if (config.writeThumbnail) args.push("--write-thumbnail");

  for (const pp of config.postprocessors) {
    args.push(...postprocessorArgs(pp));
  }

  args.push("--merge-output-format", config.mergeOutputFormat);

  if (config.outputTemplates.default) {
    args.push("--output", config.outputTemplates.default);
  }
  args.push("--output", `pl_thumbnail:${config.outputTemplates.playlistThumbnail}`);

  for (const [name, value] of Object.entries(config.httpHeaders)) {
    args.push("--add-headers", `${name}:${value}`);
  }

  args.push(
    "--retries",
    String(config.retries),
    "--fragment-retries",
    String(config.fragmentRetries),
    "--retry-sleep",
    String(config.retrySleep)
  );
  args.push(
    config.skipUnavailableFragments
      ? "--skip-unavailable-fragments"
      : "--abort-on-unavailable-fragments"
  );
  args.push(config.continueDownloads ? "--continue" : "--no-continue");
  args.push(config.updateModifiedTime ? "--mtime" : "--no-mtime");
  if (config.windowsFilenames) args.push("--windows-filenames");

  for (const component of config.remoteComponents) {
    args.push("--remote-components", component);
  }

  if (config.noProgress) args.push("--no-progress");
  if (config.cookieFile) args.push("--cookies", config.cookieFile);
  if (config.outputDir) args.push("--paths", config.outputDir);
  if (config.ffmpegLocation) args.push("--ffmpeg-location", config.ffmpegLocation);

  return args;
}

/**
 * Escapes literal text for use inside an output template.
 */
export function escapeTemplateText(text: string): string {
  return text.replace(/%/g, "%%");
}
