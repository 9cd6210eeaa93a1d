/**
 * Reference resolver - dereferences $ref, $dynamicRef and $recursiveRef
 * against a DocumentSet, with per-pass caching and cycle markers
 */

import type {
  ReferenceKeyword,
  ReferenceSchemaNode,
  SchemaNode,
  SchemaResource,
  ScopeFrame,
  ScopeStack,
} from "../../types/schema-node.js";
import {
  DanglingReferenceError,
  FileIOError,
  UnsupportedPointerDialectError,
} from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import type { DocumentSet } from "../loader/index.js";
import {
  isAbsoluteUri,
  resolveUri,
  splitRef,
  SUPPORTED_SCHEMES,
  uriScheme,
} from "../loader/uri.js";

export type PointerDialect = "local" | "cross-document" | "dynamic";

export interface ResolvedRef {
  ref: string;
  /** Canonical target key: documentId + "#/pointer" */
  key: string;
  target: SchemaNode;
  dialect: PointerDialect;
  crossedDocument: boolean;
  /** Keys on the resolution stack when the ref was first resolved */
  resolutionPath: string[];
  /** Target is already being resolved further up the stack */
  cycle: boolean;
}

export interface RefOrigin {
  documentId: string;
  path: string;
}

const RELATIVE_JSON_POINTER = /^\d+(#|\/|$)/;
const ANCHOR_NAME = /^[A-Za-z_][-A-Za-z0-9._:]*$/;

interface StaticTarget {
  resource: SchemaResource;
  pointer: string;
  /** Anchor name when the fragment is a plain name */
  anchor?: string;
}

export function nodeKey(node: { documentId: string; path: string }): string {
  return `${node.documentId}${node.path}`;
}

export class ReferenceResolver {
  private cache = new Map<string, ResolvedRef>();
  private stack: string[] = [];
  private hits = 0;

  constructor(
    private readonly documents: DocumentSet,
    private readonly log: Logger = defaultLogger,
  ) {}

  /**
   * Resolve the reference carried by `node`.
   *
   * @throws DanglingReferenceError when the target does not exist
   * @throws UnsupportedPointerDialectError for refs this resolver cannot follow
   */
  resolve(node: ReferenceSchemaNode, scope: ScopeStack = []): ResolvedRef {
    return this.resolveRef(node.ref, node, scope, node.keyword);
  }

  resolveRef(
    ref: string,
    origin: RefOrigin,
    scope: ScopeStack = [],
    keyword: ReferenceKeyword = "$ref",
  ): ResolvedRef {
    if (keyword === "$recursiveRef" && ref !== "#") {
      throw new UnsupportedPointerDialectError(
        ref,
        origin.documentId,
        origin.path,
        '$recursiveRef only supports "#"',
      );
    }

    const originResource = this.documents.resourceFor(origin.documentId, origin.path);
    const staticTarget = this.resolveStatic(ref, origin, originResource);

    let cacheKey = `${staticTarget.resource.uri}|${staticTarget.pointer}`;
    let dynamicResource: SchemaResource | undefined;
    if (keyword !== "$ref") {
      const fullScope = this.scopeFor(scope, originResource);
      dynamicResource = this.dynamicTarget(keyword, staticTarget, fullScope);
      if (dynamicResource) {
        cacheKey = `${keyword}|${cacheKey}|${dynamicResource.uri}`;
      }
    }

    const cached = this.cache.get(cacheKey);
    const resolved = cached ?? this.materialize(ref, origin, staticTarget, dynamicResource);
    if (cached) {
      this.hits++;
    } else {
      this.cache.set(cacheKey, resolved);
    }

    if (this.stack.includes(resolved.key)) {
      this.log.debug("Reference cycle", { ref, key: resolved.key });
      return { ...resolved, cycle: true, resolutionPath: [...this.stack] };
    }
    return resolved;
  }

  /**
   * Node at `pointer` of a loaded (or fetchable) document
   *
   * @throws DanglingReferenceError when nothing is there
   */
  resolvePointer(documentId: string, pointer: string): SchemaNode {
    const resource = this.documents.locate(documentId);
    const node = resource ? this.documents.nodeAt(resource.documentId, pointer) : undefined;
    if (!node) {
      throw new DanglingReferenceError(`${documentId}${pointer}`, documentId, pointer);
    }
    return node;
  }

  /**
   * Run `fn` with the target of `resolved` on the resolution stack
   */
  track<T>(resolved: ResolvedRef, fn: () => T): T {
    this.stack.push(resolved.key);
    try {
      return fn();
    } finally {
      this.stack.pop();
    }
  }

  isActive(key: string): boolean {
    return this.stack.includes(key);
  }

  /**
   * Dynamic scope extended with the resource enclosing `node`
   */
  enterScope(scope: ScopeStack, node: { documentId: string; path: string }): ScopeStack {
    return this.scopeFor(scope, this.documents.resourceFor(node.documentId, node.path));
  }

  stats(): { entries: number; hits: number } {
    return { entries: this.cache.size, hits: this.hits };
  }

  private scopeFor(scope: ScopeStack, resource: SchemaResource): ScopeStack {
    const last = scope[scope.length - 1];
    if (last && last.resourceUri === resource.uri) {
      return scope;
    }
    const frame: ScopeFrame = {
      resourceUri: resource.uri,
      documentId: resource.documentId,
      pointer: resource.pointer,
    };
    return [...scope, frame];
  }

  private resolveStatic(
    ref: string,
    origin: RefOrigin,
    originResource: SchemaResource,
  ): StaticTarget {
    const unsupported = (reason: string): UnsupportedPointerDialectError =>
      new UnsupportedPointerDialectError(ref, origin.documentId, origin.path, reason);

    if (RELATIVE_JSON_POINTER.test(ref)) {
      throw unsupported("relative JSON pointers are not supported");
    }
    const { document, fragment: rawFragment } = splitRef(ref);
    if (isAbsoluteUri(document)) {
      const scheme = uriScheme(document);
      if (!scheme || !SUPPORTED_SCHEMES.includes(scheme)) {
        throw unsupported(`unsupported URI scheme "${scheme ?? ""}"`);
      }
    }

    let fragment: string | undefined;
    try {
      fragment = rawFragment === undefined ? undefined : decodeURIComponent(rawFragment);
    } catch {
      throw unsupported("fragment is not valid percent-encoding");
    }

    const targetUri = document === "" ? originResource.uri : resolveUri(originResource.uri, document);
    const resource = this.locateFor(targetUri, ref, origin);
    if (!resource) {
      throw new DanglingReferenceError(ref, origin.documentId, origin.path);
    }

    if (fragment === undefined || fragment === "") {
      return { resource, pointer: resource.pointer };
    }
    if (fragment.startsWith("/")) {
      return { resource, pointer: `${resource.pointer}${fragment}` };
    }
    if (ANCHOR_NAME.test(fragment)) {
      const pointer = resource.anchors.get(fragment);
      if (pointer === undefined) {
        throw new DanglingReferenceError(ref, origin.documentId, origin.path);
      }
      return { resource, pointer, anchor: fragment };
    }
    throw unsupported("fragment is neither a JSON pointer nor an anchor name");
  }

  /** A document that cannot be read is reported where it is referenced */
  private locateFor(uri: string, ref: string, origin: RefOrigin): SchemaResource | undefined {
    try {
      return this.documents.locate(uri);
    } catch (error) {
      if (!(error instanceof FileIOError)) {
        throw error;
      }
      throw new FileIOError(
        `Failed to load "${ref}" at ${origin.documentId}${origin.path}: ${error.message}`,
        { ...error.details, ref, documentId: origin.documentId, path: origin.path },
        { cause: error },
      );
    }
  }

  /**
   * Outermost resource of the scope that re-declares the anchor the static
   * target carries; undefined when the ref behaves statically
   */
  private dynamicTarget(
    keyword: ReferenceKeyword,
    target: StaticTarget,
    scope: ScopeStack,
  ): SchemaResource | undefined {
    const declares = (resource: SchemaResource): boolean => {
      if (keyword === "$recursiveRef") {
        return resource.recursiveAnchor;
      }
      return target.anchor !== undefined && resource.dynamicAnchors.has(target.anchor);
    };

    if (keyword === "$dynamicRef") {
      if (!target.anchor || target.resource.dynamicAnchors.get(target.anchor) !== target.pointer) {
        return undefined;
      }
    } else if (!target.resource.recursiveAnchor) {
      return undefined;
    }

    for (const frame of scope) {
      const resource = this.documents.locate(frame.resourceUri);
      if (resource && declares(resource)) {
        return resource;
      }
    }
    return undefined;
  }

  private materialize(
    ref: string,
    origin: RefOrigin,
    target: StaticTarget,
    dynamicResource: SchemaResource | undefined,
  ): ResolvedRef {
    let documentId = target.resource.documentId;
    let pointer = target.pointer;
    if (dynamicResource) {
      documentId = dynamicResource.documentId;
      pointer =
        target.anchor !== undefined
          ? dynamicResource.dynamicAnchors.get(target.anchor) ?? dynamicResource.pointer
          : dynamicResource.pointer;
    }

    const node = this.documents.nodeAt(documentId, pointer);
    if (!node) {
      throw new DanglingReferenceError(ref, origin.documentId, origin.path);
    }
    const crossedDocument = documentId !== origin.documentId;
    return {
      ref,
      key: `${documentId}${pointer}`,
      target: node,
      dialect: dynamicResource ? "dynamic" : crossedDocument ? "cross-document" : "local",
      crossedDocument,
      resolutionPath: [...this.stack],
      cycle: false,
    };
  }
}
