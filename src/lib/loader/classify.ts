/**
 * Classify raw schema values into SchemaNode variants
 */

import { isJsonObject, type JsonObject, type JsonValue } from "../../types/json.js";
import type {
  CombinatorKeyword,
  ReferenceKeyword,
  SchemaNode,
} from "../../types/schema-node.js";
import { MalformedSchemaNodeError } from "../../utils/errors.js";

const REFERENCE_KEYWORDS: ReferenceKeyword[] = ["$ref", "$dynamicRef", "$recursiveRef"];

export const COMBINATOR_KEYWORDS: CombinatorKeyword[] = ["allOf", "oneOf", "anyOf"];

const OBJECT_KEYWORDS = [
  "properties",
  "additionalProperties",
  "patternProperties",
  "required",
  "minProperties",
  "maxProperties",
];

const ARRAY_KEYWORDS = ["items", "prefixItems", "minItems", "maxItems", "uniqueItems"];

/** Keywords that identify or annotate a schema without constraining it */
export const IDENTIFIER_KEYWORDS = new Set([
  "$id",
  "$schema",
  "$anchor",
  "$dynamicAnchor",
  "$recursiveAnchor",
  "$comment",
  "$vocabulary",
  "$defs",
  "definitions",
]);

export const ANNOTATION_KEYWORDS = new Set([
  "title",
  "description",
  "examples",
  "example",
  "default",
  "deprecated",
  "readOnly",
  "writeOnly",
  "externalDocs",
  "xml",
  "nullable",
]);

export function isExtensionKeyword(keyword: string): boolean {
  return keyword.startsWith("x-");
}

/** Keywords that change the shape or the accepted values of a schema */
export function structuralKeywords(keywords: JsonObject): string[] {
  return Object.keys(keywords).filter(
    (keyword) =>
      !IDENTIFIER_KEYWORDS.has(keyword) &&
      !ANNOTATION_KEYWORDS.has(keyword) &&
      !isExtensionKeyword(keyword),
  );
}

function readTypes(
  keywords: JsonObject,
  documentId: string,
  path: string,
): string[] {
  const declared = keywords.type;
  if (declared === undefined) {
    return [];
  }
  if (typeof declared === "string") {
    return [declared];
  }
  if (Array.isArray(declared) && declared.every((t) => typeof t === "string")) {
    return declared.filter((t): t is string => typeof t === "string");
  }
  throw new MalformedSchemaNodeError(documentId, path, "`type` must be a string or a list of strings");
}

function hasAny(keywords: JsonObject, names: string[]): boolean {
  return names.some((name) => keywords[name] !== undefined);
}

/**
 * Build a SchemaNode for `raw` located at `path` in `documentId`.
 *
 * @throws MalformedSchemaNodeError when `raw` is not a schema
 */
export function classifyNode(
  raw: JsonValue,
  documentId: string,
  path: string,
): SchemaNode {
  if (typeof raw === "boolean") {
    return { kind: "boolean", documentId, path, value: raw };
  }
  if (!isJsonObject(raw)) {
    throw new MalformedSchemaNodeError(
      documentId,
      path,
      `expected a schema object or boolean, got ${raw === null ? "null" : Array.isArray(raw) ? "array" : typeof raw}`,
    );
  }

  const types = readTypes(raw, documentId, path);
  const nullable = types.includes("null") || raw.nullable === true;
  const base = { documentId, path, keywords: raw, types, nullable };

  for (const keyword of REFERENCE_KEYWORDS) {
    const value = raw[keyword];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== "string") {
      throw new MalformedSchemaNodeError(documentId, path, `\`${keyword}\` must be a string`);
    }
    return { ...base, kind: "reference", keyword, ref: value };
  }

  const combinators = COMBINATOR_KEYWORDS.filter((keyword) => raw[keyword] !== undefined);
  for (const keyword of combinators) {
    const members = raw[keyword];
    if (!Array.isArray(members) || members.length === 0) {
      throw new MalformedSchemaNodeError(
        documentId,
        path,
        `\`${keyword}\` must be a non-empty list of schemas`,
      );
    }
  }
  if (combinators.length > 0) {
    return { ...base, kind: "combinator", combinators };
  }

  const concrete = types.filter((t) => t !== "null");
  if (concrete.length > 1) {
    return { ...base, kind: "scalar" };
  }
  const [single] = concrete;
  if (single === "array" || (single === undefined && hasAny(raw, ARRAY_KEYWORDS))) {
    return { ...base, kind: "array" };
  }
  if (single === "object" || (single === undefined && hasAny(raw, OBJECT_KEYWORDS))) {
    return { ...base, kind: "object" };
  }
  return { ...base, kind: "scalar" };
}

/**
 * View of a multi-typed node restricted to one of its types
 */
export function narrowNode(node: SchemaNode, type: string): SchemaNode {
  if (node.kind === "boolean") {
    return node;
  }
  return classifyNode({ ...node.keywords, type }, node.documentId, node.path);
}
