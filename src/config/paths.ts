import { homedir } from "node:os";
import { join } from "node:path";
import untildify from "untildify";

/**
 * Application directory paths.
 * Uses ~/.ytd/ for easy access and visibility.
 */
export const APP_DIR = join(homedir(), ".ytd");
export const CONFIG_FILE = join(APP_DIR, "config.json");

/** Log file name, created in the directory the command runs from. */
export const LOG_FILE_NAME = "ytd.log";

/**
 * Get the log file path for a working directory.
 */
export function getLogFilePath(directory: string = process.cwd()): string {
  return join(directory, LOG_FILE_NAME);
}

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}
