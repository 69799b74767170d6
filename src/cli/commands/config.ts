import chalk from "chalk";
import {
  getConfigPath,
  getConfigValue,
  loadConfig,
  updateConfig,
} from "../../config/configManager.js";
import { CONFIG_KEYS, isConfigKey, type ConfigKey } from "../../config/schema.js";
import { errorMessage } from "../../shared/errors.js";

function requireConfigKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    console.log(chalk.red(`\n❌ Unknown config key: ${key}`));
    console.log(chalk.gray(`   Valid keys: ${CONFIG_KEYS.join(", ")}\n`));
    process.exit(1);
  }
  return key;
}

/**
 * Converts a command-line string to the type the key's current value has.
 */
export function parseConfigValue(current: unknown, value: string): string | number {
  if (typeof current === "number") {
    return Number(value);
  }
  return value;
}

/**
 * Shows all current configuration values.
 */
export function configShowCommand(): void {
  const config = loadConfig();

  console.log(chalk.blue("\n⚙️  Configuration\n"));
  console.log(chalk.gray(`   File: ${getConfigPath()}\n`));

  for (const key of CONFIG_KEYS) {
    const value = config[key];
    const shown = value === undefined ? "(default)" : String(value);
    console.log(`   ${chalk.cyan(key)}: ${chalk.white(shown)}`);
  }
  console.log();
}

/**
 * Sets a configuration value.
 */
export function configSetCommand(key: string, value: string): void {
  const configKey = requireConfigKey(key);
  const parsedValue = parseConfigValue(getConfigValue(configKey), value);

  try {
    updateConfig({ [configKey]: parsedValue });
    console.log(chalk.green(`\n✅ Set ${configKey} = ${parsedValue}\n`));
  } catch (error) {
    console.log(chalk.red(`\n❌ Invalid value for ${configKey}: ${value}`));
    console.log(chalk.gray(`   ${errorMessage(error)}\n`));
    process.exit(1);
  }
}

/**
 * Gets a specific configuration value.
 */
export function configGetCommand(key: string): void {
  const value = getConfigValue(requireConfigKey(key));
  console.log(value === undefined ? "" : String(value));
}
