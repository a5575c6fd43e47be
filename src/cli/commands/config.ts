import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import {
  getSettingsPath,
  getSettingsValue,
  loadSettings,
  updateSettings,
} from "../../config/configManager.js";
import { getLogFilePath } from "../../config/paths.js";
import {
  isSettingsKey,
  SETTINGS_KEYS,
  type Settings,
  type SettingsKey,
} from "../../config/schema.js";

function assertSettingsKey(key: string): SettingsKey {
  if (!isSettingsKey(key)) {
    throw new InvalidArgumentError(
      `Unknown config key: ${key}. Valid keys: ${SETTINGS_KEYS.join(", ")}`
    );
  }
  return key;
}

/**
 * Shows all current settings (environment overrides applied).
 */
export function configShowCommand(): void {
  const settings = loadSettings();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getSettingsPath()}`));
  console.log(chalk.gray(`   Log:  ${getLogFilePath()}\n`));

  for (const [key, value] of Object.entries(settings)) {
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(String(value))}`);
  }
  console.log();
}

/**
 * Sets a settings value.
 */
export function configSetCommand(key: string, value: string): void {
  const updates: Partial<Settings> = {};
  updates[assertSettingsKey(key)] = value;

  try {
    updateSettings(updates);
  } catch (error) {
    throw new InvalidArgumentError(`Invalid value for ${key}: ${value} (${String(error)})`);
  }
  console.log(chalk.green(`\n✅ Set ${key} = ${value}\n`));
}

/**
 * Gets a specific settings value as stored.
 */
export function configGetCommand(key: string): void {
  console.log(String(getSettingsValue(assertSettingsKey(key))));
}
