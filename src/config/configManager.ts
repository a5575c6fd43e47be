import Conf from "conf";
import { APP_DIR } from "./paths.js";
import { type Settings, type SettingsKey, settingsSchema } from "./schema.js";

/**
 * Settings store using conf package.
 * Provides atomic writes and safe defaults.
 */
const store = new Conf<Settings>({
  projectName: "ytd",
  cwd: APP_DIR,
  configName: "config",
  defaults: settingsSchema.parse({}),
});

/**
 * Loads the settings, with environment overrides applied.
 * Returns validated settings with defaults applied.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const settings = settingsSchema.parse(store.store);
  const ytDlpPath = env["YTDLP_PATH"];
  return ytDlpPath ? { ...settings, ytDlpPath } : settings;
}

/**
 * Updates specific settings values.
 */
export function updateSettings(updates: Partial<Settings>): Settings {
  const current = settingsSchema.parse(store.store);
  const updated = settingsSchema.parse({ ...current, ...updates });
  store.store = updated;
  return updated;
}

/**
 * Gets a specific settings value as stored.
 */
export function getSettingsValue<K extends SettingsKey>(key: K): Settings[K] {
  return settingsSchema.parse(store.store)[key];
}

/**
 * Gets the path to the settings file.
 */
export function getSettingsPath(): string {
  return store.path;
}
