/**
 * Config file loader for csvtable
 * Supports .csvtablerc (JSON) in current directory or parent directories
 */

import { existsSync, readFileSync } from "fs";
import { join, dirname } from "path";
import { homedir } from "os";
import { TableParser } from "./parser";
import { logger, setDebug } from "./logger";

export interface CsvTableConfig {
  delimiter?: string;
  debug?: boolean;
}

const CONFIG_FILENAMES = [".csvtablerc", ".csvtablerc.json", "csvtable.config.json"];

/**
 * Search for config file starting from the given directory,
 * walking up to parent directories and finally home directory.
 */
function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  // Walk up directory tree
  for (;;) {
    for (const filename of CONFIG_FILENAMES) {
      const configPath = join(currentDir, filename);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) break;
    currentDir = parentDir;
  }

  // Check home directory
  const homeConfig = join(homedir(), ".csvtablerc");
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

/**
 * Validate parsed JSON against the config shape.
 */
function toConfig(value: unknown): CsvTableConfig {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new Error("expected a JSON object");
  }

  const config: CsvTableConfig = {};
  if ("delimiter" in value && value.delimiter !== undefined) {
    if (typeof value.delimiter !== "string") {
      throw new Error('"delimiter" must be a string');
    }
    config.delimiter = value.delimiter;
  }
  if ("debug" in value && value.debug !== undefined) {
    if (typeof value.debug !== "boolean") {
      throw new Error('"debug" must be a boolean');
    }
    config.debug = value.debug;
  }
  return config;
}

/**
 * Load configuration from file.
 */
export function loadConfig(startDir?: string): { config: CsvTableConfig; path: string | null } {
  const configPath = findConfigFile(startDir);

  if (!configPath) {
    return { config: {}, path: null };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const config = toConfig(JSON.parse(content));
    return { config, path: configPath };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Failed to parse config file ${configPath}: ${message}`);
    return { config: {}, path: configPath };
  }
}

/**
 * Merge configuration sources with proper precedence.
 * Overrides > environment variables > config file > defaults
 */
export function mergeConfig(
  overrides: Partial<CsvTableConfig>,
  fileConfig: CsvTableConfig
): CsvTableConfig {
  // Environment variable overrides
  const envConfig: Partial<CsvTableConfig> = {};

  if (process.env.CSVTABLE_DELIMITER) {
    envConfig.delimiter = process.env.CSVTABLE_DELIMITER;
  }
  if (process.env.CSVTABLE_DEBUG === "1" || process.env.CSVTABLE_DEBUG === "true") {
    envConfig.debug = true;
  }

  return {
    ...getDefaults(),
    ...fileConfig,
    ...envConfig,
    ...overrides,
  };
}

/**
 * Get default configuration values.
 */
export function getDefaults(): CsvTableConfig {
  return {
    debug: false,
  };
}

/** Options for createTableParser */
export interface CreateParserOptions {
  /** Directory the config search starts from (default: process.cwd()) */
  cwd?: string;
  /** Values that win over every other config source */
  overrides?: Partial<CsvTableConfig>;
}

/**
 * Build a TableParser from the resolved configuration, loading
 * `filePath` when given.
 */
export function createTableParser(filePath?: string, options: CreateParserOptions = {}): TableParser {
  const { config: fileConfig, path } = loadConfig(options.cwd);
  const config = mergeConfig(options.overrides ?? {}, fileConfig);

  setDebug(config.debug ?? false);
  if (path) {
    logger.debug(`using config ${path}`);
  }

  return new TableParser(filePath, { delimiter: config.delimiter });
}
