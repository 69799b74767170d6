import Conf from "conf";
import { APP_DIR } from "./paths.js";
import { type Config, type ConfigKey, configSchema } from "./schema.js";

/**
 * Application configuration store using conf package.
 * Provides atomic writes, dot-notation access, and safe defaults.
 */
let store: Conf<Config> | undefined;

/**
 * Opens the store on first use, so importing this module touches no files.
 */
function getStore(): Conf<Config> {
  store ??= new Conf<Config>({
    projectName: "hlsgrab",
    cwd: APP_DIR,
    configName: "config",
    defaults: configSchema.parse({}),
  });
  return store;
}

/**
 * Loads the application configuration.
 * Returns validated config with defaults applied.
 */
export function loadConfig(): Config {
  // Validate with zod to ensure type safety
  return configSchema.parse(getStore().store);
}

/**
 * Updates specific config values.
 */
export function updateConfig(updates: Partial<Config>): Config {
  const current = loadConfig();
  const updated = configSchema.parse({ ...current, ...updates });
  getStore().store = updated;
  return updated;
}

/**
 * Gets a specific config value.
 */
export function getConfigValue<K extends ConfigKey>(key: K): Config[K] {
  return loadConfig()[key];
}

/**
 * Gets the path to the config file.
 */
export function getConfigPath(): string {
  return getStore().path;
}
