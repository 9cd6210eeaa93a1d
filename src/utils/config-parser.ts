/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isJsonObject } from "../types/json.js";
import type { EngineConfig } from "../types/config.js";
import { ConfigError, FileIOError } from "./errors.js";
import { loadEngineConfig } from "./config-loader.js";
import { logger } from "./logger.js";

/**
 * Parse configuration file (JSON or YAML) and return its raw contents
 */
export function parseConfigFile(filePath: string): Record<string, unknown> {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  // An empty YAML file parses to null
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${filePath}`, {
      filePath,
    });
  }

  logger.info("Configuration file parsed successfully", {
    hasEngineConfig: parsed.engine !== undefined,
  });

  return parsed;
}

/**
 * Read the `engine` section of a config file and merge it with options
 */
export function loadEngineConfigFile(
  filePath: string,
  options: Partial<EngineConfig> = {},
): EngineConfig {
  const file = parseConfigFile(filePath);
  return loadEngineConfig(options, file.engine ?? {});
}
