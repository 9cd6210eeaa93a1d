/**
 * GraphQL SDL front end - converts an SDL schema into a schema document
 * whose `$defs` hold one entry per named type
 */

import { readFileSync } from "fs";
import {
  buildSchema,
  GraphQLError,
  isEnumType,
  isInputObjectType,
  isInterfaceType,
  isListType,
  isNonNullType,
  isObjectType,
  isScalarType,
  isSpecifiedScalarType,
  isUnionType,
  lexicographicSortSchema,
  type GraphQLField,
  type GraphQLInputField,
  type GraphQLNamedType,
  type GraphQLSchema,
  type GraphQLType,
} from "graphql";
import { isJsonValue, type JsonObject } from "../../types/json.js";
import type { SchemaDocumentInput } from "../../types/schema-node.js";
import { FileIOError, MalformedSchemaNodeError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { appendPointer, ROOT_POINTER } from "../../utils/pointer.js";

/** Field carrying the concrete type name of an object */
export const TYPENAME_FIELD = "__typename";

const BUILTIN_SCALARS: Record<string, JsonObject> = {
  String: { type: "string" },
  ID: { type: "string" },
  Int: { type: "integer" },
  Float: { type: "number" },
  Boolean: { type: "boolean" },
};

function definitionRef(name: string): string {
  return appendPointer("#/$defs", name);
}

function describe(schema: JsonObject, description: string | null | undefined): JsonObject {
  return description ? { ...schema, description } : schema;
}

function namedSchema(type: GraphQLNamedType): JsonObject {
  const builtin = isSpecifiedScalarType(type) ? BUILTIN_SCALARS[type.name] : undefined;
  return builtin ? { ...builtin } : { $ref: definitionRef(type.name) };
}

function withNull(schema: JsonObject): JsonObject {
  if (typeof schema.type === "string") {
    return { ...schema, type: [schema.type, "null"] };
  }
  return { anyOf: [schema, { type: "null" }] };
}

/**
 * Schema of a (possibly wrapped) field type. The outermost non-null marks
 * the field required; nullable list items become unions with null.
 */
function typeSchema(type: GraphQLType, nested: boolean): JsonObject {
  if (isNonNullType(type)) {
    return typeSchema(type.ofType, false);
  }
  const schema = isListType(type)
    ? { type: "array", items: typeSchema(type.ofType, true) }
    : namedSchema(type);
  return nested ? withNull(schema) : schema;
}

function fieldSchema(field: GraphQLField<unknown, unknown> | GraphQLInputField): JsonObject {
  let schema = describe(typeSchema(field.type, false), field.description);
  if (field.deprecationReason) {
    schema = { ...schema, deprecated: true };
  }
  if ("defaultValue" in field && field.defaultValue !== undefined && isJsonValue(field.defaultValue)) {
    schema = { ...schema, default: field.defaultValue };
  }
  return schema;
}

function objectSchema(
  fields: Record<string, GraphQLField<unknown, unknown> | GraphQLInputField>,
  inherited: ReadonlySet<string>,
  typename?: string,
): JsonObject {
  const properties: JsonObject = {};
  const required: string[] = [];
  for (const [name, field] of Object.entries(fields)) {
    if (inherited.has(name)) {
      continue;
    }
    properties[name] = fieldSchema(field);
    if (isNonNullType(field.type)) {
      required.push(name);
    }
  }
  if (typename !== undefined) {
    properties[TYPENAME_FIELD] = { const: typename, default: typename };
  }
  return {
    type: "object",
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

function rootTypeNames(schema: GraphQLSchema): Set<string> {
  return new Set(
    [schema.getQueryType(), schema.getMutationType(), schema.getSubscriptionType()].flatMap(
      (type) => (type ? [type.name] : []),
    ),
  );
}

function definitionFor(type: GraphQLNamedType): JsonObject | undefined {
  if (isScalarType(type)) {
    return isSpecifiedScalarType(type) ? undefined : describe({}, type.description);
  }
  if (isEnumType(type)) {
    return describe(
      { type: "string", enum: type.getValues().map((value) => value.name) },
      type.description,
    );
  }
  if (isInterfaceType(type) || isObjectType(type)) {
    const listed = type.getInterfaces();
    const inherited = new Set(listed.flatMap((parent) => Object.keys(parent.getFields())));
    // SDL lists every transitive interface; only the most derived become bases
    const implied = new Set(
      listed.flatMap((parent) => parent.getInterfaces().map((grand) => grand.name)),
    );
    const interfaces = listed.filter((parent) => !implied.has(parent.name));
    const own = objectSchema(
      type.getFields(),
      inherited,
      isObjectType(type) ? type.name : undefined,
    );
    const schema: JsonObject =
      interfaces.length === 0
        ? own
        : { allOf: [...interfaces.map((parent) => ({ $ref: definitionRef(parent.name) })), own] };
    return describe(schema, type.description);
  }
  if (isInputObjectType(type)) {
    return describe(objectSchema(type.getFields(), new Set()), type.description);
  }
  if (isUnionType(type)) {
    const members = type.getTypes();
    const mapping: JsonObject = {};
    for (const member of members) {
      mapping[member.name] = definitionRef(member.name);
    }
    return describe(
      {
        oneOf: members.map((member) => ({ $ref: definitionRef(member.name) })),
        discriminator: { propertyName: TYPENAME_FIELD, mapping },
      },
      type.description,
    );
  }
  return undefined;
}

/**
 * Convert SDL text into a schema document. Operation root types (Query,
 * Mutation, Subscription) and introspection types are left out.
 *
 * @throws MalformedSchemaNodeError when the SDL does not build
 */
export function graphqlToDocument(sdl: string, documentId: string): SchemaDocumentInput {
  let schema: GraphQLSchema;
  try {
    schema = lexicographicSortSchema(buildSchema(sdl));
  } catch (error) {
    const reason = error instanceof GraphQLError ? error.message : String(error);
    throw new MalformedSchemaNodeError(documentId, ROOT_POINTER, `invalid GraphQL SDL: ${reason}`);
  }

  const skipped = rootTypeNames(schema);
  const defs: JsonObject = {};
  for (const [name, type] of Object.entries(schema.getTypeMap())) {
    if (name.startsWith("__") || skipped.has(name)) {
      continue;
    }
    const definition = definitionFor(type);
    if (definition) {
      defs[name] = definition;
    }
  }
  logger.debug("GraphQL schema converted", {
    documentId,
    definitions: Object.keys(defs).length,
  });
  return { id: documentId, root: { $defs: defs } };
}

/**
 * Read an SDL file; the path becomes the document id
 */
export function readGraphqlDocument(filePath: string): SchemaDocumentInput {
  let sdl: string;
  try {
    sdl = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read GraphQL schema: ${filePath}`, { filePath }, {
      cause: error,
    });
  }
  return graphqlToDocument(sdl, filePath);
}
