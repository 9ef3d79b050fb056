/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  PartialStructmatchConfig,
  StructmatchConfig,
} from "../types";
import {
  StructmatchConfigSchema,
  PartialStructmatchConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths (XDG base directories on Linux)
const paths = envPaths("structmatch", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/structmatch or ~/.config/structmatch
 * - macOS: ~/Library/Preferences/structmatch
 * - Windows: %APPDATA%\structmatch
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<StructmatchConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return StructmatchConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable or invalid
 */
export async function loadConfigFile(
  configPath: string,
): Promise<PartialStructmatchConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialStructmatchConfigSchema.parse(JSON.parse(content));
}

/**
 * Merge per section; arrays are replaced, not concatenated
 */
export function mergeConfig(
  base: StructmatchConfig,
  override: PartialStructmatchConfig,
): StructmatchConfig {
  return {
    build: { ...base.build, ...override.build },
    compare: { ...base.compare, ...override.compare },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: StructmatchConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadConfigFile(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadConfigFile(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
