import { z } from "zod";

/**
 * User settings for ytd.
 */
export const settingsSchema = z.object({
  ytDlpPath: z.string().min(1).default("yt-dlp"),
  ffmpegLocation: z.string().default(""),
  outputDir: z.string().min(1).default("."),
});

export type Settings = z.infer<typeof settingsSchema>;

export type SettingsKey = keyof Settings;

export const SETTINGS_KEYS = Object.keys(settingsSchema.shape) as SettingsKey[];

export function isSettingsKey(key: string): key is SettingsKey {
  return (SETTINGS_KEYS as string[]).includes(key);
}

/**
 * Video metadata printed by `yt-dlp --dump-single-json`.
 * Only the fields ytd reads are declared; everything else passes through.
 */
export const videoMetadataSchema = z.looseObject({
  id: z.string().nullish(),
  title: z.string().nullish(),
  channel: z.string().nullish(),
  uploader: z.string().nullish(),
  creator: z.string().nullish(),
  uploader_id: z.string().nullish(),
});

export type VideoMetadata = z.infer<typeof videoMetadataSchema>;
