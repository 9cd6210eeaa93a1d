/**
 * Model definitions owned by the registry and handed to emission back ends
 */

import type {
  CanonicalType,
  ModelId,
  ScalarKind,
} from "./canonical-type.js";
import type { Diagnostic } from "./diagnostics.js";
import type { JsonValue } from "./json.js";

export type ModelKind = "object" | "enum" | "alias";

/**
 * Where a model's display name comes from, strongest first.
 * Names from a stronger source win collisions over weaker ones.
 */
export type NameSource =
  | "title"
  | "definition"
  | "literal"
  | "property"
  | "document"
  | "synthetic";

export const NAME_SOURCE_PRIORITY: readonly NameSource[] = [
  "title",
  "definition",
  "literal",
  "property",
  "document",
  "synthetic",
];

export interface NameHint {
  source: NameSource;
  name?: string;
}

export interface FieldMetadata {
  title?: string;
  description?: string;
  examples?: JsonValue[];
  deprecated?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  /** Value pinned beside a `$ref`; the field keeps the referenced type */
  const?: JsonValue;
}

export interface FieldDefinition {
  /** Identifier for the target dialect; assigned by the registry */
  name: string;
  /** Property name as written in the schema */
  originalName: string;
  type: CanonicalType;
  required: boolean;
  default?: JsonValue;
  metadata: FieldMetadata;
  /** Schema paths that contributed this field */
  provenance: string[];
}

export interface EnumMember {
  name: string;
  value: JsonValue;
}

export interface ModelMetadata {
  title?: string;
  description?: string;
  deprecated?: boolean;
  examples?: JsonValue[];
  /** Vendor `x-*` keywords, passed through untouched */
  extensions: Record<string, JsonValue>;
}

export interface ModelProvenance {
  documentId: string;
  path: string;
  /** Fragments merged into this model (allOf members, union commons) */
  fragments: string[];
}

export interface ModelCandidate {
  kind: ModelKind;
  nameHint: NameHint;
  fields: FieldDefinition[];
  bases: ModelId[];
  enumBase?: ScalarKind;
  enumMembers?: EnumMember[];
  aliasOf?: CanonicalType;
  /** Type of undeclared properties; absent when unconstrained */
  additionalProperties?: CanonicalType;
  /** `additionalProperties: false` */
  closed: boolean;
  metadata: ModelMetadata;
  provenance: ModelProvenance;
  /** Output scope (module) the name must be unique within */
  scope: string;
}

export interface ModelDefinition extends ModelCandidate {
  id: ModelId;
  name: string;
  fingerprint: string;
  /** Names of candidates deduplicated into this model */
  alsoKnownAs: string[];
  registrationIndex: number;
}

export type DependencyKind = "field" | "base" | "alias";

export interface DependencyEdge {
  from: ModelId;
  to: ModelId;
  kind: DependencyKind;
}

export interface DependencyGraph {
  nodes: ModelId[];
  edges: DependencyEdge[];
}

export interface EmissionPlan {
  /** Models in declaration order */
  order: ModelId[];
  models: ReadonlyMap<ModelId, ModelDefinition>;
  graph: DependencyGraph;
  /** model -> models it references that are declared after it */
  forwardReferences: ReadonlyMap<ModelId, ModelId[]>;
  /** Top-level type of each input document root */
  roots: ReadonlyMap<string, CanonicalType>;
  diagnostics: Diagnostic[];
}
