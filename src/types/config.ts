/**
 * Configuration types for modelsmith
 */

import type { LogLevel } from "../utils/logger.js";

export type AllOfPolicy = "inheritance" | "flatten";

/** Which value survives when two allOf members set a non-orderable keyword differently */
export type ConstraintConflictPolicy = "last-wins" | "first-wins";

export type NameScope = "global" | "document";

export type FieldNameStyle = "original" | "snake" | "camel";

export interface EngineConfig {
  /** Collapse structurally identical models into one */
  deduplicate: boolean;
  /** `inheritance` keeps allOf refs as bases when no field is overridden */
  allOfPolicy: AllOfPolicy;
  /** Sibling keywords that leave a `$ref` a pure alias */
  aliasWhitelist: string[];
  constraintConflict: ConstraintConflictPolicy;
  /** Derive a discriminator from branch literals when none is declared */
  inferDiscriminators: boolean;
  nameScope: NameScope;
  /** Name non-object definitions (unions, scalars, arrays) as alias models */
  materializeAliases: boolean;
  fieldNameStyle: FieldNameStyle;
  reservedNames: string[];
  reservedFieldNames: string[];
  /** JSON pointers of definition collections, walked for every document */
  definitionCollections: string[];
  arrayItemSuffix: string;
  unnamedModelPrefix: string;
  logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  deduplicate: true,
  allOfPolicy: "inheritance",
  aliasWhitelist: ["const"],
  constraintConflict: "last-wins",
  inferDiscriminators: true,
  nameScope: "global",
  materializeAliases: true,
  fieldNameStyle: "original",
  reservedNames: [],
  reservedFieldNames: [],
  definitionCollections: ["#/$defs", "#/definitions", "#/components/schemas"],
  arrayItemSuffix: "Item",
  unnamedModelPrefix: "Model_",
  logLevel: "info",
};

/**
 * Config file section (JSON or YAML), every key optional
 */
export type EngineConfigSection = Partial<EngineConfig>;

export interface ModelSmithConfigFile {
  engine?: EngineConfigSection;
}
