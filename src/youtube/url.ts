/**
 * YouTube URL classification.
 */
import { InvalidUrlStructureError } from "../shared/errors.js";

/**
 * Hosts (and their subdomains) that belong to YouTube.
 */
export const YOUTUBE_DOMAINS = ["youtube.com", "youtu.be"] as const;

/** Short-link hosts; every path on them is a single video. */
const SHORT_LINK_HOSTS = ["youtu.be", "www.youtu.be"];

const SINGLE_VIDEO_PATH_PREFIXES = ["/watch", "/shorts/", "/live/"];
const PLAYLIST_PATH_PREFIX = "/playlist";

/**
 * Adds an https:// scheme when the URL has none.
 *
 * @example
 * normalizeUrl("youtube.com/watch?v=abc")
 * // => "https://youtube.com/watch?v=abc"
 */
export function normalizeUrl(url: string): string {
  if (url.startsWith("http://") || url.startsWith("https://")) {
    return url;
  }
  return `https://${url}`;
}

interface UrlParts {
  host: string;
  path: string;
}

function parseUrl(url: string): UrlParts {
  try {
    const parsed = new URL(normalizeUrl(url));
    return { host: parsed.hostname.toLowerCase(), path: parsed.pathname };
  } catch {
    return { host: "", path: "" };
  }
}

/**
 * Checks whether a URL points to a YouTube host (www., m., music. and other
 * subdomains included).
 */
export function isYoutubeUrl(url: string): boolean {
  const { host } = parseUrl(url);
  return YOUTUBE_DOMAINS.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

/**
 * Decides whether a YouTube URL is a single video (true) or a playlist (false).
 *
 * @throws InvalidUrlStructureError for any other path shape
 */
export function isSingleVideo(url: string): boolean {
  const { host, path } = parseUrl(url);

  if (SHORT_LINK_HOSTS.includes(host)) {
    return true;
  }

  if (SINGLE_VIDEO_PATH_PREFIXES.some((prefix) => path.startsWith(prefix))) {
    return true;
  }

  if (path.startsWith(PLAYLIST_PATH_PREFIX)) {
    return false;
  }

  throw new InvalidUrlStructureError(normalizeUrl(url));
}
