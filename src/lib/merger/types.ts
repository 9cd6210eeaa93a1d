/**
 * Merger module types
 */

import type { Constraints } from "../../types/canonical-type.js";
import type { JsonValue } from "../../types/json.js";
import type { SchemaNode, ScopeStack } from "../../types/schema-node.js";
import type { MalformedSchemaNodeError } from "../../utils/errors.js";
import type { ResolvedRef } from "../resolver/index.js";

/**
 * How a merged object came to be:
 * `single` one fragment, `flatten` several fragments folded into one shape,
 * `inheritance` refs kept as bases with inline members as own fields
 */
export type MergePolicy = "single" | "flatten" | "inheritance";

export type UnionMode = "oneOf" | "anyOf";

/** A subschema together with the dynamic scope it is evaluated in */
export interface SchemaRef {
  node: SchemaNode;
  scope: ScopeStack;
}

/** Child lookup that may hit a value that is not a schema */
export type Subschema =
  | { ok: true; node: SchemaNode; scope: ScopeStack }
  | { ok: false; error: MalformedSchemaNodeError };

export interface SchemaMetadata {
  title?: string;
  description?: string;
  examples?: JsonValue[];
  deprecated?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  default?: JsonValue;
}

export interface PropertySource extends SchemaRef {
  name: string;
  /** Paths of every fragment that declared the property, in merge order */
  origins: string[];
}

export interface BaseRef {
  resolved: ResolvedRef;
  scope: ScopeStack;
}

export interface PatternPropertySource extends SchemaRef {
  pattern: string;
}

export interface DeclaredDiscriminator {
  propertyName: string;
  /** Discriminant value -> raw reference string */
  mapping: Record<string, string>;
  /** Node carrying the `discriminator` keyword; mapping refs resolve from it */
  origin: SchemaNode;
}

interface MergedBase {
  documentId: string;
  path: string;
  /** Annotations of the merged node itself, never of its members */
  metadata: SchemaMetadata;
  extensions: Record<string, JsonValue>;
  /** Keys of every fragment folded into this schema */
  provenance: string[];
  policy: MergePolicy;
  nullable: boolean;
}

export interface MergedObject extends MergedBase {
  kind: "object";
  properties: PropertySource[];
  required: string[];
  bases: BaseRef[];
  constraints: Constraints;
  /** Schema of undeclared properties; `false` closes the object */
  additionalProperties?: SchemaRef | false;
  patternProperties: PatternPropertySource[];
}

export interface MergedArray extends MergedBase {
  kind: "array";
  items?: SchemaRef;
  prefixItems: SchemaRef[];
  constraints: Constraints;
}

export interface MergedScalar extends MergedBase {
  kind: "scalar";
  /** Declared non-null types; empty when untyped */
  types: string[];
  format?: string;
  constraints: Constraints;
  enumValues?: JsonValue[];
  constValue?: { value: JsonValue };
}

export interface UnionBranch extends SchemaRef {
  /** Branch already merged with the fragments common to every branch */
  merged?: MergedSchema;
}

export interface MergedUnion extends MergedBase {
  kind: "union";
  mode: UnionMode;
  branches: UnionBranch[];
  discriminator?: DeclaredDiscriminator;
}

/** `$ref` whose siblings leave it a plain alias of its target */
export interface MergedAlias extends MergedBase {
  kind: "alias";
  resolved: ResolvedRef;
  scope: ScopeStack;
  constValue?: { value: JsonValue };
}

export interface MergedNever extends MergedBase {
  kind: "never";
  reason: string;
}

export type MergedSchema =
  | MergedObject
  | MergedArray
  | MergedScalar
  | MergedUnion
  | MergedAlias
  | MergedNever;
