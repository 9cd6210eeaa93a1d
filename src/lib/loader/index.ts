/**
 * Loader module - document set, schema resources and node classification
 */

import { isJsonObject, type JsonValue } from "../../types/json.js";
import type {
  DocumentFetcher,
  SchemaDocumentInput,
  SchemaNode,
  SchemaResource,
} from "../../types/schema-node.js";
import {
  appendPointer,
  isPointerPrefix,
  ROOT_POINTER,
  valueAtPointer,
} from "../../utils/pointer.js";
import { FileIOError, MalformedSchemaNodeError } from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import { classifyNode, narrowNode } from "./classify.js";
import { resolveUri, stripFragment } from "./uri.js";

export * from "./classify.js";
export * from "./parse.js";
export * from "./uri.js";

/** Keywords holding data, never subschemas */
const DATA_KEYWORDS = new Set(["enum", "const", "examples", "example", "default"]);

/** Keywords whose value maps names to subschemas */
const SCHEMA_MAP_KEYWORDS = new Set([
  "properties",
  "patternProperties",
  "$defs",
  "definitions",
  "dependentSchemas",
]);

function newResource(uri: string, documentId: string, pointer: string): SchemaResource {
  return {
    uri,
    documentId,
    pointer,
    anchors: new Map(),
    dynamicAnchors: new Map(),
    recursiveAnchor: false,
    usesDynamicRefs: false,
  };
}

/**
 * Raw documents of one pass, indexed by schema resource.
 * Documents not yet loaded are requested from the fetcher on first use.
 */
export class DocumentSet {
  private documents = new Map<string, JsonValue>();
  private order: string[] = [];
  private resourcesByUri = new Map<string, SchemaResource>();
  private resourcesByDocument = new Map<string, SchemaResource[]>();
  private nodes = new Map<string, SchemaNode>();
  private fetched = new Set<string>();
  private failures = new Map<string, FileIOError | MalformedSchemaNodeError>();

  constructor(
    inputs: SchemaDocumentInput[] = [],
    private readonly fetcher?: DocumentFetcher,
    private readonly log: Logger = defaultLogger,
  ) {
    for (const input of inputs) {
      this.add(input);
    }
  }

  add(input: SchemaDocumentInput): void {
    if (this.documents.has(input.id)) {
      this.log.warn("Document already loaded, keeping the first copy", {
        documentId: input.id,
      });
      return;
    }
    this.documents.set(input.id, input.root);
    this.order.push(input.id);
    this.resourcesByDocument.set(input.id, []);

    const ownId = isJsonObject(input.root) ? input.root.$id : undefined;
    const uri =
      typeof ownId === "string" && !ownId.startsWith("#")
        ? resolveUri(input.id, ownId)
        : input.id;
    const root = this.registerResource(newResource(uri, input.id, ROOT_POINTER));
    if (uri !== input.id && !this.resourcesByUri.has(input.id)) {
      this.resourcesByUri.set(input.id, root);
    }
    this.indexValue(input.root, ROOT_POINTER, root, true);
    this.log.debug("Document indexed", {
      documentId: input.id,
      resources: this.resourcesByDocument.get(input.id)?.length ?? 0,
    });
  }

  has(documentId: string): boolean {
    return this.documents.has(documentId);
  }

  /** Document ids in input order (fetched documents last) */
  ids(): string[] {
    return [...this.order];
  }

  root(documentId: string): JsonValue | undefined {
    return this.documents.get(documentId);
  }

  rawAt(documentId: string, pointer: string): JsonValue | undefined {
    const root = this.documents.get(documentId);
    return root === undefined ? undefined : valueAtPointer(root, pointer);
  }

  /**
   * Classified node at `pointer`; undefined when nothing is there.
   *
   * @throws MalformedSchemaNodeError when the value is not a schema
   */
  nodeAt(documentId: string, pointer: string): SchemaNode | undefined {
    const key = `${documentId}${pointer}`;
    const cached = this.nodes.get(key);
    if (cached) {
      return cached;
    }
    const raw = this.rawAt(documentId, pointer);
    if (raw === undefined) {
      return undefined;
    }
    const node = classifyNode(raw, documentId, pointer);
    this.nodes.set(key, node);
    return node;
  }

  child(node: SchemaNode, ...segments: Array<string | number>): SchemaNode | undefined {
    return this.nodeAt(node.documentId, appendPointer(node.path, ...segments));
  }

  narrow(node: SchemaNode, type: string): SchemaNode {
    return narrowNode(node, type);
  }

  /**
   * Schema resource for an absolute or document-id URI, fetching the
   * document when it is not loaded yet.
   *
   * @throws FileIOError or MalformedSchemaNodeError when the fetched document
   * cannot be read; later lookups of the same document throw it again
   */
  locate(uri: string): SchemaResource | undefined {
    const target = stripFragment(uri);
    const known = this.resourcesByUri.get(target);
    const failure = this.failures.get(target);
    if (failure) {
      throw failure;
    }
    if (known || !this.fetcher || this.fetched.has(target)) {
      return known;
    }
    this.fetched.add(target);
    let root: JsonValue | undefined;
    try {
      root = this.fetcher(target);
    } catch (error) {
      if (error instanceof FileIOError || error instanceof MalformedSchemaNodeError) {
        this.failures.set(target, error);
      }
      throw error;
    }
    if (root === undefined) {
      this.log.debug("Fetcher has no document", { documentId: target });
      return undefined;
    }
    this.add({ id: target, root });
    return this.resourcesByUri.get(target);
  }

  /** Innermost resource enclosing `pointer` */
  resourceFor(documentId: string, pointer: string): SchemaResource {
    const resources = this.resourcesByDocument.get(documentId) ?? [];
    let best: SchemaResource | undefined;
    for (const resource of resources) {
      if (
        isPointerPrefix(resource.pointer, pointer) &&
        (!best || resource.pointer.length > best.pointer.length)
      ) {
        best = resource;
      }
    }
    return best ?? newResource(documentId, documentId, ROOT_POINTER);
  }

  resources(): SchemaResource[] {
    return [...this.resourcesByDocument.values()].flat();
  }

  private registerResource(resource: SchemaResource): SchemaResource {
    if (!this.resourcesByUri.has(resource.uri)) {
      this.resourcesByUri.set(resource.uri, resource);
    }
    this.resourcesByDocument.get(resource.documentId)?.push(resource);
    return resource;
  }

  private indexValue(
    value: JsonValue,
    pointer: string,
    resource: SchemaResource,
    schemaPosition: boolean,
  ): void {
    if (Array.isArray(value)) {
      value.forEach((item, index) =>
        this.indexValue(item, appendPointer(pointer, index), resource, true),
      );
      return;
    }
    if (!isJsonObject(value)) {
      return;
    }
    if (!schemaPosition) {
      for (const [key, item] of Object.entries(value)) {
        this.indexValue(item, appendPointer(pointer, key), resource, true);
      }
      return;
    }

    let current = resource;
    const id = value.$id;
    if (pointer !== ROOT_POINTER && typeof id === "string") {
      if (id.startsWith("#")) {
        current.anchors.set(id.slice(1), pointer);
      } else {
        current = this.registerResource(
          newResource(resolveUri(resource.uri, id), resource.documentId, pointer),
        );
      }
    }
    if (typeof value.$anchor === "string") {
      current.anchors.set(value.$anchor, pointer);
    }
    if (typeof value.$dynamicAnchor === "string") {
      current.anchors.set(value.$dynamicAnchor, pointer);
      current.dynamicAnchors.set(value.$dynamicAnchor, pointer);
    }
    if (value.$recursiveAnchor === true && pointer === current.pointer) {
      current.recursiveAnchor = true;
    }
    if (value.$dynamicRef !== undefined || value.$recursiveRef !== undefined) {
      current.usesDynamicRefs = true;
    }

    for (const [key, item] of Object.entries(value)) {
      if (DATA_KEYWORDS.has(key)) {
        continue;
      }
      this.indexValue(
        item,
        appendPointer(pointer, key),
        current,
        !SCHEMA_MAP_KEYWORDS.has(key),
      );
    }
  }
}
