/**
 * Schema document text parsing (JSON and YAML) and file loading
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isJsonValue, type JsonValue } from "../../types/json.js";
import type {
  DocumentFetcher,
  SchemaDocumentInput,
} from "../../types/schema-node.js";
import { FileIOError, MalformedSchemaNodeError } from "../../utils/errors.js";
import { ROOT_POINTER } from "../../utils/pointer.js";
import { logger } from "../../utils/logger.js";

function looksLikeJson(text: string, documentId: string): boolean {
  if (documentId.endsWith(".json")) {
    return true;
  }
  const first = text.trimStart().charAt(0);
  return first === "{" || first === "[";
}

/**
 * Parse document text; JSON when the id ends in .json or the text opens a
 * JSON container, YAML otherwise.
 *
 * @throws MalformedSchemaNodeError when the text does not parse to JSON data
 */
export function parseDocumentText(text: string, documentId: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = looksLikeJson(text, documentId) ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedSchemaNodeError(documentId, ROOT_POINTER, `unparseable document: ${reason}`);
  }
  if (!isJsonValue(parsed)) {
    throw new MalformedSchemaNodeError(
      documentId,
      ROOT_POINTER,
      "document contains values that are not JSON data",
    );
  }
  return parsed;
}

/**
 * Read a schema document from disk; the path becomes the document id
 */
export function readSchemaDocument(filePath: string): SchemaDocumentInput {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read schema document: ${filePath}`, { filePath }, {
      cause: error,
    });
  }
  logger.debug("Schema document read", { filePath, bytes: text.length });
  return { id: filePath, root: parseDocumentText(text, filePath) };
}

/**
 * Fetcher for sibling documents addressed by file path
 */
export function createFileFetcher(): DocumentFetcher {
  return (documentId) => {
    const filePath = documentId.startsWith("file://")
      ? new URL(documentId).pathname
      : documentId;
    if (!existsSync(filePath)) {
      return undefined;
    }
    return readSchemaDocument(filePath).root;
  };
}
