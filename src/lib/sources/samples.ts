/**
 * Sample data front end - infers a JSON Schema from example documents so
 * raw data runs through the same synthesis pass as hand-written schemas
 */

import { readFileSync } from "fs";
import { parseAllDocuments } from "yaml";
import { isJsonObject, isJsonValue, type JsonObject, type JsonValue } from "../../types/json.js";
import type { SchemaDocumentInput } from "../../types/schema-node.js";
import { FileIOError, MalformedSchemaNodeError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { appendPointer, ROOT_POINTER } from "../../utils/pointer.js";
import { parseDocumentText } from "../loader/parse.js";

type ScalarName = "boolean" | "integer" | "number" | "string" | "null";

/** Order scalar names appear in an inferred `type` list */
const SCALAR_ORDER: ScalarName[] = ["boolean", "integer", "number", "string", "null"];

/** Everything observed at one position across the samples */
interface Shape {
  scalars: Set<ScalarName>;
  object?: { seen: number; properties: Map<string, Shape> };
  array?: { items?: Shape };
}

/** How many objects carried each property shape */
const presence = new WeakMap<Shape, number>();

function emptyShape(): Shape {
  return { scalars: new Set() };
}

function scalarName(value: string | number | boolean | null): ScalarName {
  if (value === null) return "null";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
  return typeof value === "string" ? "string" : "boolean";
}

function observe(shape: Shape, value: JsonValue): void {
  if (Array.isArray(value)) {
    shape.array ??= {};
    for (const item of value) {
      shape.array.items ??= emptyShape();
      observe(shape.array.items, item);
    }
    return;
  }
  if (isJsonObject(value)) {
    shape.object ??= { seen: 0, properties: new Map() };
    shape.object.seen++;
    for (const [key, child] of Object.entries(value)) {
      let property = shape.object.properties.get(key);
      if (!property) {
        property = emptyShape();
        shape.object.properties.set(key, property);
      }
      presence.set(property, (presence.get(property) ?? 0) + 1);
      observe(property, child);
    }
    return;
  }
  shape.scalars.add(scalarName(value));
}

function scalarSchema(scalars: Set<ScalarName>): JsonObject | undefined {
  // integer widens to number once both were seen
  const names = SCALAR_ORDER.filter(
    (name) => scalars.has(name) && !(name === "integer" && scalars.has("number")),
  );
  const [only] = names;
  if (only === undefined) {
    return undefined;
  }
  return { type: names.length === 1 ? only : names };
}

function toSchema(shape: Shape): JsonObject {
  const parts: JsonObject[] = [];
  const scalars = scalarSchema(shape.scalars);
  if (scalars) {
    parts.push(scalars);
  }
  if (shape.object) {
    const { seen, properties } = shape.object;
    const required = [...properties.entries()]
      .filter(([, property]) => presence.get(property) === seen)
      .map(([name]) => name);
    parts.push({
      type: "object",
      properties: Object.fromEntries(
        [...properties.entries()].map(([name, property]): [string, JsonValue] => [
          name,
          toSchema(property),
        ]),
      ),
      ...(required.length > 0 ? { required } : {}),
    });
  }
  if (shape.array) {
    parts.push({
      type: "array",
      ...(shape.array.items ? { items: toSchema(shape.array.items) } : {}),
    });
  }

  const [first] = parts;
  if (first === undefined) {
    return {};
  }
  return parts.length === 1 ? first : { anyOf: parts };
}

/**
 * JSON Schema accepting every sample: properties present in all objects are
 * required, integer and number widen to number, null joins the type list,
 * and scalars mixed with objects or arrays become `anyOf`.
 */
export function inferSchema(samples: readonly JsonValue[]): JsonObject {
  const shape = emptyShape();
  for (const sample of samples) {
    observe(shape, sample);
  }
  return toSchema(shape);
}

/**
 * Schema document inferred from samples; the root is a schema of its own,
 * named after the document id unless a title is given
 *
 * @throws MalformedSchemaNodeError when there are no samples
 */
export function samplesToDocument(
  samples: readonly JsonValue[],
  documentId: string,
  title?: string,
): SchemaDocumentInput {
  if (samples.length === 0) {
    throw new MalformedSchemaNodeError(documentId, ROOT_POINTER, "no samples to infer a schema from");
  }
  const root = inferSchema(samples);
  logger.debug("Schema inferred from samples", { documentId, samples: samples.length });
  return {
    id: documentId,
    root: {
      $schema: "https://json-schema.org/draft/2020-12/schema",
      ...(title !== undefined ? { title } : {}),
      ...root,
    },
  };
}

function parseSampleLines(text: string, filePath: string): JsonValue[] {
  const samples: JsonValue[] = [];
  text.split("\n").forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedSchemaNodeError(filePath, appendPointer(ROOT_POINTER, index), `unparseable line: ${reason}`);
    }
    if (!isJsonValue(parsed)) {
      throw new MalformedSchemaNodeError(filePath, appendPointer(ROOT_POINTER, index), "line is not JSON data");
    }
    samples.push(parsed);
  });
  return samples;
}

function parseYamlSamples(text: string, filePath: string): JsonValue[] {
  return parseAllDocuments(text).map((document, index) => {
    const pointer = appendPointer(ROOT_POINTER, index);
    const [problem] = document.errors;
    if (problem) {
      throw new MalformedSchemaNodeError(filePath, pointer, `unparseable document: ${problem.message}`);
    }
    const value: unknown = document.toJS();
    if (!isJsonValue(value)) {
      throw new MalformedSchemaNodeError(filePath, pointer, "document contains values that are not JSON data");
    }
    return value;
  });
}

/**
 * Read example data from disk. JSON Lines files hold one sample per line,
 * YAML files one per `---` document, and a top-level JSON array one per
 * element; anything else is a single sample.
 */
export function readSamples(filePath: string): JsonValue[] {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read sample data: ${filePath}`, { filePath }, {
      cause: error,
    });
  }
  if (filePath.endsWith(".jsonl") || filePath.endsWith(".ndjson")) {
    return parseSampleLines(text, filePath);
  }
  if (filePath.endsWith(".yaml") || filePath.endsWith(".yml")) {
    return parseYamlSamples(text, filePath);
  }
  const parsed = parseDocumentText(text, filePath);
  return Array.isArray(parsed) ? parsed : [parsed];
}

/**
 * Sample file as a schema document; the path becomes the document id
 */
export function readSampleDocument(filePath: string, title?: string): SchemaDocumentInput {
  return samplesToDocument(readSamples(filePath), filePath, title);
}
