/**
 * Engine configuration loading and validation
 */

import { Ajv } from "ajv";
import {
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineConfigSection,
} from "../types/config.js";
import { ConfigError } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";

const stringList = { type: "array", items: { type: "string" } } as const;

/**
 * Schema for a config file `engine` section; every key optional
 */
export const ENGINE_CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    deduplicate: { type: "boolean" },
    allOfPolicy: { type: "string", enum: ["inheritance", "flatten"] },
    aliasWhitelist: stringList,
    constraintConflict: { type: "string", enum: ["last-wins", "first-wins"] },
    inferDiscriminators: { type: "boolean" },
    nameScope: { type: "string", enum: ["global", "document"] },
    materializeAliases: { type: "boolean" },
    fieldNameStyle: { type: "string", enum: ["original", "snake", "camel"] },
    reservedNames: stringList,
    reservedFieldNames: stringList,
    definitionCollections: {
      type: "array",
      items: { type: "string", pattern: "^#(/.*)?$" },
    },
    arrayItemSuffix: { type: "string" },
    unnamedModelPrefix: { type: "string", minLength: 1 },
    logLevel: { type: "string", enum: ["error", "warn", "info", "debug"] },
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateSection = ajv.compile<EngineConfigSection>(ENGINE_CONFIG_SCHEMA);

/**
 * Check an untrusted config section (parsed from JSON/YAML)
 *
 * @throws ConfigError listing every violation
 */
export function validateEngineConfig(section: unknown): EngineConfigSection {
  if (validateSection(section)) {
    return section;
  }
  const errors = (validateSection.errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
  );
  throw new ConfigError(`Invalid engine configuration: ${errors.join("; ")}`, {
    errors,
  });
}

/**
 * Load engine configuration from programmatic options and a config file section
 *
 * @example
 * const config = loadEngineConfig({ deduplicate: false }, { nameScope: "document" });
 * // deduplicate: false from options, nameScope from the file, the rest defaults
 */
export function loadEngineConfig(
  options: EngineConfigSection = {},
  configFile: unknown = {},
  log: Logger = defaultLogger,
): EngineConfig {
  const fileSection = validateEngineConfig(configFile);
  const optionSection = validateEngineConfig(options);

  // Precedence: options > config file > defaults
  const config: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...fileSection,
    ...optionSection,
  };

  log.debug("Engine config loaded", {
    deduplicate: config.deduplicate,
    allOfPolicy: config.allOfPolicy,
    nameScope: config.nameScope,
  });

  return config;
}
