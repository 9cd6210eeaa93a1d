/**
 * Combinator merger - folds allOf members, ref siblings and unions into a
 * single MergedSchema per node
 */

import type { Constraints } from "../../types/canonical-type.js";
import type { EngineConfig } from "../../types/config.js";
import {
  isJsonObject,
  stableStringify,
  type JsonObject,
  type JsonValue,
} from "../../types/json.js";
import type {
  KeywordSchemaNode,
  ReferenceSchemaNode,
  SchemaNode,
  ScopeStack,
} from "../../types/schema-node.js";
import type { DiagnosticLog } from "../../utils/diagnostics.js";
import {
  ErrorCode,
  isRecoverable,
  MalformedSchemaNodeError,
  type RecoverableError,
} from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import { appendPointer } from "../../utils/pointer.js";
import {
  ANNOTATION_KEYWORDS,
  IDENTIFIER_KEYWORDS,
  isExtensionKeyword,
  structuralKeywords,
  type DocumentSet,
} from "../loader/index.js";
import { nodeKey, type ReferenceResolver, type ResolvedRef } from "../resolver/index.js";
import {
  intersectConstraints,
  pickConflicting,
  readConstraints,
  unsatisfiableBounds,
  type ConstraintConflict,
} from "./constraints.js";
import type {
  BaseRef,
  DeclaredDiscriminator,
  MergedObject,
  MergedSchema,
  PatternPropertySource,
  PropertySource,
  SchemaMetadata,
  SchemaRef,
  Subschema,
  UnionBranch,
  UnionMode,
} from "./types.js";

export * from "./constraints.js";
export * from "./types.js";

export type MergerConfig = Pick<
  EngineConfig,
  "allOfPolicy" | "aliasWhitelist" | "constraintConflict"
>;

const UNION_MODES: UnionMode[] = ["oneOf", "anyOf"];

interface PendingUnion {
  mode: UnionMode;
  owner: KeywordSchemaNode;
  scope: ScopeStack;
  branches: SchemaNode[];
  discriminator?: DeclaredDiscriminator;
}

/** Running state while folding fragments into one schema */
interface Fold {
  fragments: number;
  provenance: string[];
  types?: string[];
  nullable?: boolean;
  properties: Map<string, PropertySource>;
  required: string[];
  bases: BaseRef[];
  constraints: Constraints;
  format?: string;
  enumValues?: JsonValue[];
  constValue?: { value: JsonValue };
  items?: SchemaRef;
  prefixItems?: SchemaRef[];
  additionalProperties?: SchemaRef | false;
  patternProperties: PatternPropertySource[];
  unions: PendingUnion[];
  never?: string;
}

function emptyFold(): Fold {
  return {
    fragments: 0,
    provenance: [],
    properties: new Map(),
    required: [],
    bases: [],
    constraints: {},
    patternProperties: [],
    unions: [],
  };
}

type Attempt<T> = { value: T } | { error: RecoverableError };

/** Run `fn`, turning a recoverable error into a value */
function attempt<T>(fn: () => T): Attempt<T> {
  try {
    return { value: fn() };
  } catch (error) {
    if (isRecoverable(error)) {
      return { error };
    }
    throw error;
  }
}

function unionKey(owner: SchemaNode, mode: UnionMode): string {
  return `${nodeKey(owner)}/${mode}`;
}

function isSubtype(type: string, of: string): boolean {
  return type === of || (type === "integer" && of === "number");
}

/** Declared types allowed by both lists; integer narrows number */
function intersectTypes(current: string[], incoming: string[]): string[] {
  const result: string[] = [];
  for (const type of current) {
    for (const other of incoming) {
      const narrower = isSubtype(type, other) ? type : isSubtype(other, type) ? other : undefined;
      if (narrower && !result.includes(narrower)) {
        result.push(narrower);
      }
    }
  }
  return result;
}

export function readMetadata(keywords: JsonObject): SchemaMetadata {
  const metadata: SchemaMetadata = {};
  if (typeof keywords.title === "string") metadata.title = keywords.title;
  if (typeof keywords.description === "string") metadata.description = keywords.description;
  if (Array.isArray(keywords.examples)) {
    metadata.examples = keywords.examples;
  } else if (keywords.example !== undefined) {
    metadata.examples = [keywords.example];
  }
  if (typeof keywords.deprecated === "boolean") metadata.deprecated = keywords.deprecated;
  if (typeof keywords.readOnly === "boolean") metadata.readOnly = keywords.readOnly;
  if (typeof keywords.writeOnly === "boolean") metadata.writeOnly = keywords.writeOnly;
  if (Object.prototype.hasOwnProperty.call(keywords, "default") && keywords.default !== undefined) {
    metadata.default = keywords.default;
  }
  return metadata;
}

export function readExtensions(keywords: JsonObject): Record<string, JsonValue> {
  const extensions: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(keywords)) {
    if (isExtensionKeyword(key)) {
      extensions[key] = value;
    }
  }
  return extensions;
}

function readDiscriminator(node: KeywordSchemaNode): DeclaredDiscriminator | undefined {
  const raw = node.keywords.discriminator;
  if (!isJsonObject(raw) || typeof raw.propertyName !== "string") {
    return undefined;
  }
  const entries = Object.entries(isJsonObject(raw.mapping) ? raw.mapping : {});
  const mapping = Object.fromEntries(
    entries.flatMap(([value, ref]): Array<[string, string]> =>
      typeof ref === "string" ? [[value, ref]] : [],
    ),
  );
  return { propertyName: raw.propertyName, mapping, origin: node };
}

export class CombinatorMerger {
  /** Nested merges run only to inspect shapes; their diagnostics are dropped */
  private probing = 0;
  private reported = new Set<string>();

  constructor(
    private readonly documents: DocumentSet,
    private readonly resolver: ReferenceResolver,
    private readonly config: MergerConfig,
    private readonly diagnostics: DiagnosticLog,
    private readonly log: Logger = defaultLogger,
  ) {}

  /**
   * Merge `node` into one logical schema
   *
   * @throws DanglingReferenceError from any ref; UnsupportedPointerDialectError
   * when `node` itself is an alias that cannot be followed
   */
  merge(node: SchemaNode, scope: ScopeStack = []): MergedSchema {
    if (node.kind === "boolean") {
      const fold = emptyFold();
      this.absorb(fold, node, scope, new Set());
      return this.finish(fold, node, scope, new Set());
    }

    const inner = this.resolver.enterScope(scope, node);
    if (node.kind === "reference" && this.isPureAlias(node)) {
      const resolved = this.resolver.resolve(node, inner);
      const constValue = Object.prototype.hasOwnProperty.call(node.keywords, "const")
        ? node.keywords.const
        : undefined;
      return {
        kind: "alias",
        documentId: node.documentId,
        path: node.path,
        metadata: readMetadata(node.keywords),
        extensions: readExtensions(node.keywords),
        provenance: [nodeKey(node), resolved.key],
        policy: "single",
        nullable: node.nullable,
        resolved,
        scope: inner,
        ...(constValue !== undefined ? { constValue: { value: constValue } } : {}),
      };
    }

    const inherited = this.planInheritance(node, inner);
    if (inherited) {
      return inherited;
    }
    return this.flatten(node, scope, new Set(), []);
  }

  /**
   * A `$ref` whose siblings only identify, annotate, or are whitelisted
   */
  isPureAlias(node: ReferenceSchemaNode): boolean {
    return Object.keys(node.keywords).every(
      (keyword) =>
        keyword === node.keyword ||
        IDENTIFIER_KEYWORDS.has(keyword) ||
        ANNOTATION_KEYWORDS.has(keyword) ||
        isExtensionKeyword(keyword) ||
        this.config.aliasWhitelist.includes(keyword),
    );
  }

  subschema(node: SchemaNode, ...segments: Array<string | number>): Subschema {
    try {
      const child = this.documents.child(node, ...segments);
      if (child) {
        return { ok: true, node: child, scope: [] };
      }
      return {
        ok: false,
        error: new MalformedSchemaNodeError(
          node.documentId,
          appendPointer(node.path, ...segments),
          "subschema is missing",
        ),
      };
    } catch (error) {
      if (error instanceof MalformedSchemaNodeError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * Child schema, or an accept-anything node in place of a malformed one
   */
  subschemaOrUnknown(node: SchemaNode, ...segments: Array<string | number>): SchemaNode {
    const child = this.subschema(node, ...segments);
    if (child.ok) {
      return child.node;
    }
    if (this.probing === 0) {
      this.diagnostics.reportError(child.error, "error");
    }
    return {
      kind: "boolean",
      documentId: node.documentId,
      path: appendPointer(node.path, ...segments),
      value: true,
    };
  }

  private listAt(node: KeywordSchemaNode, keyword: string): SchemaNode[] {
    const raw = node.keywords[keyword];
    if (!Array.isArray(raw)) {
      return [];
    }
    return raw.map((_, index) => this.subschemaOrUnknown(node, keyword, index));
  }

  private flatten(
    root: SchemaNode,
    scope: ScopeStack,
    skip: ReadonlySet<string>,
    extra: SchemaRef[],
  ): MergedSchema {
    const fold = emptyFold();
    this.absorb(fold, root, scope, skip);
    for (const fragment of extra) {
      this.absorb(fold, fragment.node, fragment.scope, skip);
    }
    return this.finish(fold, root, scope, skip);
  }

  private absorb(
    fold: Fold,
    node: SchemaNode,
    scope: ScopeStack,
    skip: ReadonlySet<string>,
  ): void {
    fold.fragments++;
    fold.provenance.push(nodeKey(node));
    if (node.kind === "boolean") {
      if (!node.value && fold.never === undefined) {
        fold.never = `false schema at ${nodeKey(node)}`;
      }
      return;
    }

    const inner = this.resolver.enterScope(scope, node);
    if (node.kind === "reference") {
      const target = attempt(() => this.resolver.resolve(node, inner));
      if ("error" in target) {
        // only this fragment is lost; its siblings still merge
        this.reportRecoverable(target.error);
      } else if (target.value.cycle) {
        // cut: the target is already being merged further up
        fold.bases.push({ resolved: target.value, scope: inner });
      } else {
        const resolved = target.value;
        this.resolver.track(resolved, () =>
          this.absorb(fold, resolved.target, inner, skip),
        );
      }
    }

    if (node.keywords.allOf !== undefined) {
      for (const member of this.listAt(node, "allOf")) {
        this.absorb(fold, member, inner, skip);
      }
    }

    const discriminator = readDiscriminator(node);
    for (const mode of UNION_MODES) {
      if (node.keywords[mode] !== undefined && !skip.has(unionKey(node, mode))) {
        fold.unions.push({
          mode,
          owner: node,
          scope: inner,
          branches: this.listAt(node, mode),
          ...(discriminator ? { discriminator } : {}),
        });
      }
    }

    this.absorbOwn(fold, node, inner);
  }

  /** Keywords of `node` itself, without following refs or combinators */
  private absorbOwn(fold: Fold, node: KeywordSchemaNode, scope: ScopeStack): void {
    const keywords = node.keywords;
    const origin = nodeKey(node);

    if (node.types.length > 0) {
      const declared = node.types.filter((type) => type !== "null");
      const incoming = declared.length > 0 ? declared : ["null"];
      if (fold.types === undefined) {
        fold.types = incoming;
      } else {
        const intersection = intersectTypes(fold.types, incoming);
        if (intersection.length === 0) {
          this.conflict(node, {
            keyword: "type",
            kept: incoming.join("|"),
            dropped: fold.types.join("|"),
          });
          fold.types = incoming;
        } else {
          fold.types = intersection;
        }
      }
    }
    if (node.types.length > 0 || keywords.nullable !== undefined) {
      fold.nullable = (fold.nullable ?? true) && node.nullable;
    }

    if (isJsonObject(keywords.properties)) {
      for (const name of Object.keys(keywords.properties)) {
        const existing = fold.properties.get(name);
        fold.properties.set(name, {
          name,
          node: this.subschemaOrUnknown(node, "properties", name),
          scope,
          origins: [...(existing?.origins ?? []), origin],
        });
      }
    }
    if (Array.isArray(keywords.required)) {
      for (const name of keywords.required) {
        if (typeof name === "string" && !fold.required.includes(name)) {
          fold.required.push(name);
        }
      }
    }

    fold.constraints = intersectConstraints(
      fold.constraints,
      readConstraints(keywords),
      this.config.constraintConflict,
      (conflict) => this.conflict(node, conflict),
    );

    if (typeof keywords.format === "string") {
      fold.format =
        fold.format === undefined
          ? keywords.format
          : pickConflicting(
              "format",
              fold.format,
              keywords.format,
              this.config.constraintConflict,
              (conflict) => this.conflict(node, conflict),
            );
    }

    if (Array.isArray(keywords.enum)) {
      const incoming = keywords.enum;
      if (fold.enumValues === undefined) {
        fold.enumValues = incoming;
      } else {
        const allowed = new Set(incoming.map((value) => stableStringify(value)));
        const intersection = fold.enumValues.filter((value) =>
          allowed.has(stableStringify(value)),
        );
        if (intersection.length === 0) {
          this.conflict(node, {
            keyword: "enum",
            kept: stableStringify(incoming),
            dropped: stableStringify(fold.enumValues),
          });
          fold.enumValues = incoming;
        } else {
          fold.enumValues = intersection;
        }
      }
    }
    if (Object.prototype.hasOwnProperty.call(keywords, "const") && keywords.const !== undefined) {
      const incoming = keywords.const;
      if (fold.constValue === undefined) {
        fold.constValue = { value: incoming };
      } else {
        const kept = pickConflicting(
          "const",
          stableStringify(fold.constValue.value),
          stableStringify(incoming),
          this.config.constraintConflict,
          (conflict) => this.conflict(node, conflict),
        );
        if (kept === stableStringify(incoming)) {
          fold.constValue = { value: incoming };
        }
      }
    }

    if (Array.isArray(keywords.prefixItems)) {
      fold.prefixItems = this.listAt(node, "prefixItems").map((item) => ({ node: item, scope }));
    }
    if (Array.isArray(keywords.items)) {
      // draft-04 tuple form
      fold.prefixItems = this.listAt(node, "items").map((item) => ({ node: item, scope }));
      if (keywords.additionalItems !== undefined && keywords.additionalItems !== false) {
        fold.items = { node: this.subschemaOrUnknown(node, "additionalItems"), scope };
      }
    } else if (keywords.items !== undefined) {
      fold.items = { node: this.subschemaOrUnknown(node, "items"), scope };
    }

    if (keywords.additionalProperties === false) {
      fold.additionalProperties = false;
    } else if (keywords.additionalProperties !== undefined) {
      fold.additionalProperties = {
        node: this.subschemaOrUnknown(node, "additionalProperties"),
        scope,
      };
    }
    if (isJsonObject(keywords.patternProperties)) {
      for (const pattern of Object.keys(keywords.patternProperties)) {
        fold.patternProperties.push({
          pattern,
          node: this.subschemaOrUnknown(node, "patternProperties", pattern),
          scope,
        });
      }
    }
  }

  private hasStructure(fold: Fold): boolean {
    return (
      fold.properties.size > 0 ||
      fold.required.length > 0 ||
      fold.bases.length > 0 ||
      Object.keys(fold.constraints).length > 0 ||
      fold.format !== undefined ||
      fold.enumValues !== undefined ||
      fold.constValue !== undefined ||
      fold.items !== undefined ||
      fold.prefixItems !== undefined ||
      fold.additionalProperties !== undefined ||
      fold.patternProperties.length > 0
    );
  }

  private finish(
    fold: Fold,
    root: SchemaNode,
    scope: ScopeStack,
    skip: ReadonlySet<string>,
  ): MergedSchema {
    const keywords = root.kind === "boolean" ? {} : root.keywords;
    const rootNullable = root.kind !== "boolean" && root.nullable;
    const base = {
      documentId: root.documentId,
      path: root.path,
      metadata: readMetadata(keywords),
      extensions: readExtensions(keywords),
      provenance: fold.provenance,
      policy: fold.fragments > 1 ? ("flatten" as const) : ("single" as const),
      nullable: rootNullable || fold.nullable === true,
    };

    if (fold.never !== undefined) {
      return { ...base, kind: "never", reason: fold.never };
    }

    const [union] = fold.unions;
    if (union) {
      const distribute = fold.unions.length > 1 || this.hasStructure(fold);
      const branches: UnionBranch[] = union.branches.map((branch) => {
        if (!distribute) {
          return { node: branch, scope: union.scope };
        }
        const merged = this.flatten(
          root,
          scope,
          new Set([...skip, unionKey(union.owner, union.mode)]),
          [{ node: branch, scope: union.scope }],
        );
        const own = branch.kind === "boolean" ? {} : branch.keywords;
        return {
          node: branch,
          scope: union.scope,
          merged: { ...merged, metadata: readMetadata(own), extensions: readExtensions(own) },
        };
      });
      return {
        ...base,
        kind: "union",
        mode: union.mode,
        branches,
        ...(union.discriminator ? { discriminator: union.discriminator } : {}),
      };
    }

    for (const problem of unsatisfiableBounds(fold.constraints)) {
      this.report(root, `Constraints cannot be satisfied: ${problem}`);
    }

    const types = fold.types;
    const objectShaped =
      fold.properties.size > 0 ||
      fold.bases.length > 0 ||
      (types === undefined &&
        (fold.required.length > 0 ||
          fold.additionalProperties !== undefined ||
          fold.patternProperties.length > 0 ||
          fold.constraints.minProperties !== undefined ||
          fold.constraints.maxProperties !== undefined));
    if (types?.includes("object") || objectShaped) {
      return {
        ...base,
        kind: "object",
        properties: [...fold.properties.values()],
        required: fold.required,
        bases: fold.bases,
        constraints: fold.constraints,
        ...(fold.additionalProperties !== undefined
          ? { additionalProperties: fold.additionalProperties }
          : {}),
        patternProperties: fold.patternProperties,
      };
    }

    const arrayShaped =
      types === undefined && (fold.items !== undefined || fold.prefixItems !== undefined);
    if (types?.includes("array") || arrayShaped) {
      return {
        ...base,
        kind: "array",
        ...(fold.items ? { items: fold.items } : {}),
        prefixItems: fold.prefixItems ?? [],
        constraints: fold.constraints,
      };
    }

    return {
      ...base,
      kind: "scalar",
      types: (types ?? []).filter((type) => type !== "null" || types?.length === 1),
      ...(fold.format !== undefined ? { format: fold.format } : {}),
      constraints: fold.constraints,
      ...(fold.enumValues !== undefined ? { enumValues: fold.enumValues } : {}),
      ...(fold.constValue !== undefined ? { constValue: fold.constValue } : {}),
    };
  }

  /**
   * allOf (or a ref with structural siblings) whose refs can stay bases:
   * every ref is bare and object-like, inline members are plain objects, no
   * field is declared twice and no inline `required` names a base field
   */
  private planInheritance(
    node: KeywordSchemaNode,
    scope: ScopeStack,
  ): MergedObject | undefined {
    if (this.config.allOfPolicy !== "inheritance") {
      return undefined;
    }

    let members: SchemaNode[];
    const bases: BaseRef[] = [];
    if (node.kind === "combinator") {
      if (node.combinators.length !== 1 || node.combinators[0] !== "allOf") {
        return undefined;
      }
      members = this.listAt(node, "allOf");
    } else if (
      node.kind === "reference" &&
      node.keyword === "$ref" &&
      !UNION_MODES.some((mode) => node.keywords[mode] !== undefined) &&
      node.keywords.allOf === undefined
    ) {
      members = [];
      const target = attempt(() => this.resolver.resolve(node, scope));
      if ("error" in target) {
        return undefined;
      }
      const resolved = target.value;
      if (!resolved.cycle && !this.isObjectLike(resolved.target, scope, 0)) {
        return undefined;
      }
      bases.push({ resolved, scope });
    } else {
      return undefined;
    }

    const ownTypes = node.types.filter((type) => type !== "null");
    if (ownTypes.some((type) => type !== "object")) {
      return undefined;
    }

    const inline: KeywordSchemaNode[] = [node];
    const unresolved: RecoverableError[] = [];
    for (const member of members) {
      if (member.kind === "boolean") {
        if (!member.value) return undefined;
        continue;
      }
      if (member.kind === "reference") {
        if (member.keyword !== "$ref" || !this.isPureAlias(member)) {
          return undefined;
        }
        const memberScope = this.resolver.enterScope(scope, member);
        const target = attempt(() => this.resolver.resolve(member, memberScope));
        if ("error" in target) {
          unresolved.push(target.error);
          continue;
        }
        const resolved = target.value;
        if (!resolved.cycle && !this.isObjectLike(resolved.target, memberScope, 0)) {
          return undefined;
        }
        bases.push({ resolved, scope: memberScope });
      } else if (
        member.kind === "object" ||
        (member.kind === "scalar" && structuralKeywords(member.keywords).length === 0)
      ) {
        if (member.types.some((type) => type !== "object" && type !== "null")) {
          return undefined;
        }
        inline.push(member);
      } else {
        return undefined;
      }
    }
    if (bases.length === 0) {
      return undefined;
    }

    const seen = new Set<string>();
    const baseFields = new Set<string>();
    const claim = (names: string[]): boolean => {
      for (const name of names) {
        if (seen.has(name)) {
          return false;
        }
        seen.add(name);
      }
      return true;
    };
    for (const base of bases) {
      const names = this.propertyNamesOf(base.resolved, base.scope);
      if (!claim(names)) {
        this.log.debug("allOf members share a field, flattening", { path: nodeKey(node) });
        return undefined;
      }
      names.forEach((name) => baseFields.add(name));
    }
    for (const member of inline) {
      const properties = member.keywords.properties;
      if (!claim(isJsonObject(properties) ? Object.keys(properties) : [])) {
        this.log.debug("Inline member overrides a field, flattening", { path: nodeKey(node) });
        return undefined;
      }
      const required = member.keywords.required;
      if (
        Array.isArray(required) &&
        required.some((name) => typeof name === "string" && baseFields.has(name))
      ) {
        return undefined;
      }
    }

    unresolved.forEach((error) => this.reportRecoverable(error));
    const fold = emptyFold();
    fold.provenance.push(...bases.map((base) => base.resolved.key));
    for (const member of inline) {
      fold.fragments++;
      fold.provenance.push(nodeKey(member));
      this.absorbOwn(fold, member, this.resolver.enterScope(scope, member));
    }
    return {
      kind: "object",
      documentId: node.documentId,
      path: node.path,
      metadata: readMetadata(node.keywords),
      extensions: readExtensions(node.keywords),
      provenance: fold.provenance,
      policy: "inheritance",
      nullable: node.nullable,
      properties: [...fold.properties.values()],
      required: fold.required,
      bases,
      constraints: fold.constraints,
      ...(fold.additionalProperties !== undefined
        ? { additionalProperties: fold.additionalProperties }
        : {}),
      patternProperties: fold.patternProperties,
    };
  }

  private isObjectLike(node: SchemaNode, scope: ScopeStack, depth: number): boolean {
    switch (node.kind) {
      case "object":
        return true;
      case "combinator":
        return node.combinators.length === 1 && node.combinators[0] === "allOf";
      case "reference": {
        if (depth > 32) {
          return false;
        }
        const inner = this.resolver.enterScope(scope, node);
        const target = attempt(() => this.resolver.resolve(node, inner));
        if ("error" in target) {
          return false;
        }
        const resolved = target.value;
        if (resolved.cycle) {
          return true;
        }
        return this.resolver.track(resolved, () =>
          this.isObjectLike(resolved.target, inner, depth + 1),
        );
      }
      case "boolean":
      case "array":
      case "scalar":
        return false;
    }
  }

  /** Every property a ref target declares, its bases included */
  private propertyNamesOf(resolved: ResolvedRef, scope: ScopeStack): string[] {
    if (resolved.cycle) {
      return [];
    }
    this.probing++;
    try {
      return this.resolver.track(resolved, () => {
        const result = attempt(() => this.merge(resolved.target, scope));
        if ("error" in result) {
          return [];
        }
        const merged = result.value;
        if (merged.kind === "alias") {
          return this.propertyNamesOf(merged.resolved, merged.scope);
        }
        if (merged.kind !== "object") {
          return [];
        }
        return [
          ...merged.bases.flatMap((base) => this.propertyNamesOf(base.resolved, base.scope)),
          ...merged.properties.map((property) => property.name),
        ];
      });
    } finally {
      this.probing--;
    }
  }

  /** Once per error; nothing while probing */
  private reportRecoverable(error: RecoverableError): void {
    if (this.probing > 0 || this.reported.has(error.message)) {
      return;
    }
    this.reported.add(error.message);
    this.diagnostics.reportRecoverable(error);
  }

  private conflict(node: SchemaNode, conflict: ConstraintConflict): void {
    this.report(
      node,
      `Conflicting "${conflict.keyword}" across allOf members: kept ${String(conflict.kept)}, dropped ${String(conflict.dropped)}`,
      { keyword: conflict.keyword, kept: conflict.kept, dropped: conflict.dropped },
    );
  }

  private report(node: SchemaNode, message: string, details?: Record<string, unknown>): void {
    if (this.probing > 0) {
      return;
    }
    this.diagnostics.report({
      severity: "warning",
      code: ErrorCode.CONFLICTING_CONSTRAINT,
      message,
      documentId: node.documentId,
      path: node.path,
      ...(details ? { details } : {}),
    });
  }
}
