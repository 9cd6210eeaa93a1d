/**
 * Raw, document-scoped schema fragments.
 * A SchemaNode is a classified view over one mapping (or boolean) of a loaded
 * document; the raw keyword bag is kept as-is for the merger and synthesizer.
 */

import type { JsonObject, JsonValue } from "./json.js";

export type SchemaNodeKind =
  | "boolean"
  | "reference"
  | "combinator"
  | "object"
  | "array"
  | "scalar";

export type ReferenceKeyword = "$ref" | "$dynamicRef" | "$recursiveRef";

export type CombinatorKeyword = "allOf" | "oneOf" | "anyOf";

interface SchemaNodeBase {
  documentId: string;
  /** JSON pointer fragment, e.g. "#/$defs/Node/properties/next" */
  path: string;
}

interface KeywordNodeBase extends SchemaNodeBase {
  keywords: JsonObject;
  /** Declared `type` list, "null" included when declared */
  types: string[];
  /** `type` includes "null", or OpenAPI `nullable: true` */
  nullable: boolean;
}

export interface BooleanSchemaNode extends SchemaNodeBase {
  kind: "boolean";
  value: boolean;
}

export interface ReferenceSchemaNode extends KeywordNodeBase {
  kind: "reference";
  keyword: ReferenceKeyword;
  ref: string;
}

export interface CombinatorSchemaNode extends KeywordNodeBase {
  kind: "combinator";
  combinators: CombinatorKeyword[];
}

export interface ObjectSchemaNode extends KeywordNodeBase {
  kind: "object";
}

export interface ArraySchemaNode extends KeywordNodeBase {
  kind: "array";
}

export interface ScalarSchemaNode extends KeywordNodeBase {
  kind: "scalar";
}

export type SchemaNode =
  | BooleanSchemaNode
  | ReferenceSchemaNode
  | CombinatorSchemaNode
  | ObjectSchemaNode
  | ArraySchemaNode
  | ScalarSchemaNode;

export type KeywordSchemaNode = Exclude<SchemaNode, BooleanSchemaNode>;

/**
 * A schema resource: the document root or any subschema carrying `$id`.
 * Relative references and anchors are scoped to the nearest resource.
 */
export interface SchemaResource {
  uri: string;
  documentId: string;
  pointer: string;
  anchors: Map<string, string>;
  dynamicAnchors: Map<string, string>;
  /** `$recursiveAnchor: true` on the resource root */
  recursiveAnchor: boolean;
  /** Any `$dynamicRef` / `$recursiveRef` inside the resource */
  usesDynamicRefs: boolean;
}

/**
 * One entry of the dynamic scope: a schema resource entered on the way to
 * the point of use.
 */
export interface ScopeFrame {
  resourceUri: string;
  documentId: string;
  pointer: string;
}

export type ScopeStack = readonly ScopeFrame[];

export interface SchemaDocumentInput {
  id: string;
  root: JsonValue;
}

/**
 * Synchronous "fetch sibling document" collaborator.
 * Returns the parsed root, or undefined when the document does not exist.
 */
export type DocumentFetcher = (documentId: string) => JsonValue | undefined;
