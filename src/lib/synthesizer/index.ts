/**
 * Synthesizer module - turns merged schemas into canonical types and
 * registers object, enum and alias shapes with the model registry
 */

import {
  containerOf,
  modelRef,
  NEVER,
  nullableOf,
  nullType,
  scalarOf,
  UNKNOWN,
  unionOf,
  type CanonicalType,
  type Constraints,
  type DiscriminatorInfo,
  type ModelId,
  type ScalarKind,
} from "../../types/canonical-type.js";
import type { JsonValue } from "../../types/json.js";
import type {
  FieldDefinition,
  FieldMetadata,
  ModelCandidate,
  ModelMetadata,
  NameHint,
} from "../../types/model.js";
import type { SchemaNode, ScopeStack } from "../../types/schema-node.js";
import type { DiagnosticLog } from "../../utils/diagnostics.js";
import { DanglingReferenceError, ErrorCode, isRecoverable } from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import { documentStem, toClassName, toEnumMemberName } from "../../utils/naming.js";
import {
  appendPointer,
  escapeSegment,
  lastSegment,
  parentPointer,
  ROOT_POINTER,
} from "../../utils/pointer.js";
import type { DocumentSet } from "../loader/index.js";
import {
  readExtensions,
  readMetadata,
  type CombinatorMerger,
  type MergedArray,
  type MergedObject,
  type MergedScalar,
  type MergedSchema,
  type MergedUnion,
  type PropertySource,
  type SchemaMetadata,
  type SchemaRef,
} from "../merger/index.js";
import type { ModelRegistry } from "../registry/index.js";
import { nodeKey, type ReferenceResolver, type ResolvedRef } from "../resolver/index.js";
import { lookupFormat } from "./scalar-formats.js";
import type { SynthesisContext, SynthesizerConfig } from "./types.js";

export * from "./scalar-formats.js";
export * from "./types.js";

const SCALAR_KINDS: ReadonlySet<string> = new Set([
  "string",
  "integer",
  "number",
  "boolean",
  "null",
]);

function isScalarKind(type: string): type is ScalarKind {
  return SCALAR_KINDS.has(type);
}

/** Kind shared by every literal; "mixed" when they disagree */
function literalKind(values: JsonValue[]): ScalarKind {
  if (values.length === 0) return "null";
  if (values.every((value) => typeof value === "string")) return "string";
  if (values.every((value) => typeof value === "boolean")) return "boolean";
  if (values.every((value) => typeof value === "number")) {
    return values.every((value) => Number.isInteger(value)) ? "integer" : "number";
  }
  return "mixed";
}

function literalText(value: JsonValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function pick(constraints: Constraints, keys: Array<keyof Constraints>): Constraints {
  const picked: Constraints = {};
  for (const key of keys) {
    if (constraints[key] !== undefined) {
      Object.assign(picked, { [key]: constraints[key] });
    }
  }
  return picked;
}

function modelMetadata(metadata: SchemaMetadata, extensions: Record<string, JsonValue>): ModelMetadata {
  return {
    ...(metadata.title !== undefined ? { title: metadata.title } : {}),
    ...(metadata.description !== undefined ? { description: metadata.description } : {}),
    ...(metadata.deprecated !== undefined ? { deprecated: metadata.deprecated } : {}),
    ...(metadata.examples !== undefined ? { examples: metadata.examples } : {}),
    extensions,
  };
}

function fieldMetadata(metadata: SchemaMetadata): FieldMetadata {
  const { default: _default, ...rest } = metadata;
  return rest;
}

export class TypeSynthesizer {
  private memo = new Map<string, CanonicalType>();
  /** Target key -> id reserved for it by a recursive reference */
  private reservations = new Map<string, ModelId>();
  /** Resolved key -> target keys currently being synthesized */
  private active = new Map<string, string[]>();

  constructor(
    private readonly documents: DocumentSet,
    private readonly resolver: ReferenceResolver,
    private readonly merger: CombinatorMerger,
    private readonly registry: ModelRegistry,
    private readonly config: SynthesizerConfig,
    private readonly diagnostics: DiagnosticLog,
    private readonly log: Logger = defaultLogger,
  ) {}

  /**
   * Canonical type of one schema node. Reference and schema errors inside
   * the node are reported and the node becomes `unknown`.
   */
  synthesizeNode(node: SchemaNode, context: SynthesisContext): CanonicalType {
    return this.guarded(() => {
      if (node.kind === "boolean") {
        return node.value ? UNKNOWN : NEVER;
      }
      const concrete = node.types.filter((type) => type !== "null");
      if (concrete.length > 1 && node.kind !== "reference" && node.kind !== "combinator") {
        const members = concrete.map((type) =>
          this.synthesizeNode(this.documents.narrow(node, type), {
            scope: context.scope,
            nameHint: context.nameHint,
          }),
        );
        const union = unionOf(members);
        return node.nullable ? nullableOf(union) : union;
      }
      return this.synthesize(this.merger.merge(node, context.scope), context);
    }, UNKNOWN);
  }

  /**
   * Synthesize a definition (or document root) addressed by pointer
   */
  synthesizeDefinition(documentId: string, pointer: string, hint: NameHint): CanonicalType {
    return this.guarded(() => {
      const node = this.resolver.resolvePointer(documentId, pointer);
      const resolved: ResolvedRef = {
        ref: pointer,
        key: nodeKey(node),
        target: node,
        dialect: "local",
        crossedDocument: false,
        resolutionPath: [],
        cycle: false,
      };
      return this.synthesizeTarget(resolved, [], hint, true);
    }, UNKNOWN);
  }

  synthesize(merged: MergedSchema, context: SynthesisContext): CanonicalType {
    switch (merged.kind) {
      case "never":
        return NEVER;
      case "alias": {
        // a pinned const stays field metadata; the type is the target's
        const target = merged.resolved.target;
        const type = this.synthesizeTarget(
          merged.resolved,
          merged.scope,
          this.hintForTarget(target),
          this.isDefinition(target),
        );
        return merged.nullable ? nullableOf(type) : type;
      }
      case "scalar":
        return this.synthesizeScalar(merged, context);
      case "array":
        return this.synthesizeArray(merged, context);
      case "object":
        return this.synthesizeObject(merged, context);
      case "union":
        return this.synthesizeUnion(merged, context);
    }
  }

  /**
   * Type of a ref target, memoized per target (and per dynamic scope when
   * the target's resource uses dynamic refs). A target reached again while
   * it is being synthesized becomes a reference to a reserved model id.
   */
  synthesizeTarget(
    resolved: ResolvedRef,
    scope: ScopeStack,
    hint: NameHint,
    materialize: boolean,
  ): CanonicalType {
    const targetKey = this.targetKey(resolved, scope);
    const memoized = this.memo.get(targetKey);
    if (memoized) {
      return memoized;
    }

    const inProgress = this.active.get(resolved.key) ?? [];
    const activeKey = inProgress[inProgress.length - 1];
    if (activeKey !== undefined) {
      return modelRef(this.reservationFor(activeKey, hint));
    }

    this.active.set(resolved.key, [...inProgress, targetKey]);
    let type: CanonicalType;
    try {
      type = this.resolver.track(resolved, () =>
        this.synthesizeNode(resolved.target, { scope, nameHint: hint, targetKey }),
      );
    } finally {
      this.active.set(resolved.key, inProgress);
    }

    type = this.settleReservation(targetKey, type, resolved.target, hint);
    if (materialize && this.config.materializeAliases && type.kind !== "model") {
      type = modelRef(
        this.registry.registerCandidate(this.aliasCandidate(type, resolved.target, hint)),
      );
    }
    this.memo.set(targetKey, type);
    return type;
  }

  /** Definition-collection entries and document roots */
  isDefinition(node: SchemaNode): boolean {
    const source = this.hintForTarget(node).source;
    return source === "definition" || source === "document";
  }

  hintForTarget(node: SchemaNode): NameHint {
    if (node.path === ROOT_POINTER) {
      return { source: "document", name: documentStem(node.documentId) };
    }
    const parent = parentPointer(node.path);
    const name = lastSegment(node.path);
    const inCollection =
      this.config.definitionCollections.includes(parent) ||
      parent.endsWith("/$defs") ||
      parent.endsWith("/definitions");
    if (name !== undefined && inCollection) {
      return { source: "definition", name };
    }
    if (name !== undefined && !/^\d+$/.test(name)) {
      return { source: "property", name };
    }
    return { source: "synthetic" };
  }

  private guarded(fn: () => CanonicalType, fallback: CanonicalType): CanonicalType {
    try {
      return fn();
    } catch (error) {
      if (error instanceof DanglingReferenceError) {
        this.diagnostics.reportError(error, "fatal");
      } else if (isRecoverable(error)) {
        this.diagnostics.reportRecoverable(error);
      } else {
        throw error;
      }
      return fallback;
    }
  }

  private targetKey(resolved: ResolvedRef, scope: ScopeStack): string {
    const target = resolved.target;
    const resource = this.documents.resourceFor(target.documentId, target.path);
    if (!resource.usesDynamicRefs) {
      return resolved.key;
    }
    const anchoring = this.resolver
      .enterScope(scope, target)
      .filter((frame) => {
        const declared = this.documents.locate(frame.resourceUri);
        return declared !== undefined && (declared.dynamicAnchors.size > 0 || declared.recursiveAnchor);
      })
      .map((frame) => frame.resourceUri);
    return `${resolved.key}@${anchoring.join(">")}`;
  }

  private reservationFor(targetKey: string, hint: NameHint): ModelId {
    const existing = this.reservations.get(targetKey);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.registry.reserve(hint);
    this.reservations.set(targetKey, id);
    return id;
  }

  private reservedFor(context: SynthesisContext): ModelId | undefined {
    if (context.targetKey === undefined) {
      return undefined;
    }
    const reserved = this.reservations.get(context.targetKey);
    return reserved !== undefined && !this.registry.isDefined(reserved) ? reserved : undefined;
  }

  /**
   * A reservation the node's own model did not take: a recursive union,
   * list or alias. It becomes an alias model of the synthesized type.
   */
  private settleReservation(
    targetKey: string,
    type: CanonicalType,
    node: SchemaNode,
    hint: NameHint,
  ): CanonicalType {
    const reserved = this.reservations.get(targetKey);
    if (reserved === undefined || this.registry.isDefined(reserved)) {
      return type;
    }
    if (type.kind === "model" && this.registry.canonical(type.modelId) !== reserved) {
      this.registry.alias(reserved, type.modelId);
      return type;
    }
    const aliasOf = type.kind === "model" ? UNKNOWN : type;
    return modelRef(this.registry.registerCandidate(this.aliasCandidate(aliasOf, node, hint), reserved));
  }

  private aliasCandidate(type: CanonicalType, node: SchemaNode, hint: NameHint): ModelCandidate {
    const keywords = node.kind === "boolean" ? {} : node.keywords;
    const metadata = readMetadata(keywords);
    return {
      kind: "alias",
      nameHint: metadata.title ? { source: "title", name: metadata.title } : hint,
      fields: [],
      bases: [],
      aliasOf: type,
      closed: false,
      metadata: modelMetadata(metadata, readExtensions(keywords)),
      provenance: { documentId: node.documentId, path: node.path, fragments: [nodeKey(node)] },
      scope: node.documentId,
    };
  }

  private modelHint(merged: MergedSchema, context: SynthesisContext): NameHint {
    return merged.metadata.title
      ? { source: "title", name: merged.metadata.title }
      : context.nameHint;
  }

  private baseCandidate(merged: MergedSchema, context: SynthesisContext) {
    return {
      nameHint: this.modelHint(merged, context),
      metadata: modelMetadata(merged.metadata, merged.extensions),
      provenance: {
        documentId: merged.documentId,
        path: merged.path,
        fragments: merged.provenance,
      },
      scope: merged.documentId,
    };
  }

  private synthesizeScalar(merged: MergedScalar, context: SynthesisContext): CanonicalType {
    const values = merged.constValue ? [merged.constValue.value] : merged.enumValues;
    if (values) {
      const nonNull = values.filter((value) => value !== null);
      const declared = merged.types.length === 1 ? merged.types[0] : undefined;
      const base = declared !== undefined && isScalarKind(declared) ? declared : literalKind(nonNull);
      let type: CanonicalType;
      if (nonNull.length === 0) {
        type = nullType();
      } else if (
        !merged.constValue &&
        declared !== undefined &&
        isScalarKind(declared) &&
        declared !== "null" &&
        nonNull.length > 1
      ) {
        type = modelRef(this.registerEnum(merged, declared, nonNull, context));
      } else {
        type = scalarOf(base, { constraints: merged.constraints, literals: nonNull });
      }
      return merged.nullable || nonNull.length !== values.length ? nullableOf(type) : type;
    }

    let type: CanonicalType;
    if (merged.types.length === 0) {
      type = this.untypedScalar(merged);
    } else {
      type = unionOf(merged.types.map((name) => this.plainScalar(name, merged)));
    }
    return merged.nullable ? nullableOf(type) : type;
  }

  private untypedScalar(merged: MergedScalar): CanonicalType {
    const c = merged.constraints;
    if (
      merged.format !== undefined ||
      c.pattern !== undefined ||
      c.minLength !== undefined ||
      c.maxLength !== undefined
    ) {
      return this.plainScalar("string", merged);
    }
    if (
      c.minimum !== undefined ||
      c.maximum !== undefined ||
      c.exclusiveMinimum !== undefined ||
      c.exclusiveMaximum !== undefined ||
      c.multipleOf !== undefined
    ) {
      return this.plainScalar("number", merged);
    }
    return UNKNOWN;
  }

  private plainScalar(name: string, merged: MergedScalar): CanonicalType {
    if (name === "object") return containerOf("map", [UNKNOWN]);
    if (name === "array") return containerOf("list", [UNKNOWN]);
    if (!isScalarKind(name)) {
      this.log.debug("Unknown schema type", { type: name, path: merged.path });
      return UNKNOWN;
    }
    if (name === "null") return nullType();
    if (name === "boolean") return scalarOf("boolean");

    const constraints =
      name === "string"
        ? pick(merged.constraints, ["minLength", "maxLength", "pattern"])
        : pick(merged.constraints, [
            "minimum",
            "maximum",
            "exclusiveMinimum",
            "exclusiveMaximum",
            "multipleOf",
          ]);
    if (merged.format === undefined) {
      return scalarOf(name, { constraints });
    }
    const format = lookupFormat(name, merged.format);
    if (!format.known) {
      this.diagnostics.report({
        severity: "warning",
        code: ErrorCode.UNKNOWN_FORMAT,
        message: `Unknown format "${merged.format}" for ${name}, using plain ${name}`,
        documentId: merged.documentId,
        path: merged.path,
      });
      return scalarOf(name, { constraints });
    }
    return scalarOf(name, {
      constraints,
      format: merged.format,
      ...(format.semantic !== undefined ? { semantic: format.semantic } : {}),
    });
  }

  private registerEnum(
    merged: MergedScalar,
    base: ScalarKind,
    values: JsonValue[],
    context: SynthesisContext,
  ): ModelId {
    const candidate: ModelCandidate = {
      ...this.baseCandidate(merged, context),
      kind: "enum",
      fields: [],
      bases: [],
      enumBase: base,
      enumMembers: values.map((value) => ({ name: toEnumMemberName(value), value })),
      closed: false,
    };
    return this.registry.registerCandidate(candidate, this.reservedFor(context));
  }

  private itemHint(hint: NameHint): NameHint {
    return hint.name
      ? { source: "property", name: `${hint.name}${this.config.arrayItemSuffix}` }
      : { source: "synthetic" };
  }

  private synthesizeArray(merged: MergedArray, context: SynthesisContext): CanonicalType {
    const nameHint = this.itemHint(this.modelHint(merged, context));
    const item = (ref: SchemaRef): CanonicalType =>
      this.synthesizeNode(ref.node, { scope: ref.scope, nameHint });
    const constraints = pick(merged.constraints, ["minItems", "maxItems", "uniqueItems"]);

    let type: CanonicalType;
    if (merged.prefixItems.length > 0) {
      const positions = merged.prefixItems.map(item);
      const { minItems, maxItems } = merged.constraints;
      if (minItems === positions.length && maxItems === positions.length) {
        type = containerOf("tuple", positions, constraints);
      } else {
        const rest = merged.items ? [item(merged.items)] : [];
        const members = [...positions, ...rest].filter((member) => member.kind !== "never");
        type = containerOf("list", [unionOf(members)], constraints);
      }
    } else if (merged.items) {
      type = containerOf(merged.constraints.uniqueItems ? "set" : "list", [item(merged.items)], constraints);
    } else {
      type = containerOf("list", [UNKNOWN], constraints);
    }
    return merged.nullable ? nullableOf(type) : type;
  }

  private synthesizeField(
    property: PropertySource,
    required: readonly string[],
  ): FieldDefinition {
    const keywords = property.node.kind === "boolean" ? {} : property.node.keywords;
    const metadata = readMetadata(keywords);
    const type = this.synthesizeNode(property.node, {
      scope: property.scope,
      nameHint: { source: "property", name: property.name },
    });
    const pinned =
      property.node.kind === "reference" &&
      Object.prototype.hasOwnProperty.call(keywords, "const")
        ? keywords.const
        : undefined;
    return {
      name: property.name,
      originalName: property.name,
      type,
      required: required.includes(property.name),
      ...(metadata.default !== undefined ? { default: metadata.default } : {}),
      metadata: {
        ...fieldMetadata(metadata),
        ...(pinned !== undefined ? { const: pinned } : {}),
      },
      provenance: property.origins,
    };
  }

  private synthesizeObject(merged: MergedObject, context: SynthesisContext): CanonicalType {
    const wrap = (type: CanonicalType): CanonicalType =>
      merged.nullable ? nullableOf(type) : type;
    const { properties, bases, required } = merged;
    const extraHint = this.itemHint(this.modelHint(merged, context));
    const extraTypes = [
      ...(merged.additionalProperties
        ? [this.synthesizeNode(merged.additionalProperties.node, {
            scope: merged.additionalProperties.scope,
            nameHint: extraHint,
          })]
        : []),
      ...merged.patternProperties.map((source) =>
        this.synthesizeNode(source.node, { scope: source.scope, nameHint: extraHint }),
      ),
    ];
    const closed = merged.additionalProperties === false;

    if (properties.length === 0 && bases.length === 0 && required.length === 0 && !closed) {
      const map = containerOf(
        "map",
        [extraTypes.length > 0 ? unionOf(extraTypes) : UNKNOWN],
        pick(merged.constraints, ["minProperties", "maxProperties"]),
      );
      const [only] = merged.patternProperties;
      if (only && merged.patternProperties.length === 1 && !merged.additionalProperties) {
        map.keyPattern = only.pattern;
      }
      return wrap(map);
    }

    const baseIds: ModelId[] = [];
    for (const base of bases) {
      const target = base.resolved.target;
      const type = this.synthesizeTarget(
        base.resolved,
        base.scope,
        this.hintForTarget(target),
        this.isDefinition(target),
      );
      if (type.kind === "model") {
        baseIds.push(type.modelId);
      } else {
        this.log.debug("Base is not a model, skipped", { base: base.resolved.key });
      }
    }

    const fields = properties.map((property) => this.synthesizeField(property, required));
    if (bases.length === 0) {
      for (const name of required) {
        if (!properties.some((property) => property.name === name)) {
          fields.push({
            name,
            originalName: name,
            type: UNKNOWN,
            required: true,
            metadata: {},
            provenance: [],
          });
        }
      }
    }

    const candidate: ModelCandidate = {
      ...this.baseCandidate(merged, context),
      kind: "object",
      fields,
      bases: baseIds,
      closed,
      ...(extraTypes.length > 0 ? { additionalProperties: unionOf(extraTypes) } : {}),
    };
    return wrap(modelRef(this.registry.registerCandidate(candidate, this.reservedFor(context))));
  }

  private synthesizeUnion(merged: MergedUnion, context: SynthesisContext): CanonicalType {
    const members = merged.branches.map((branch) => {
      const keywords = branch.node.kind === "boolean" ? {} : branch.node.keywords;
      // inline branches rank below a discriminant literal
      const nameHint: NameHint =
        typeof keywords.title === "string"
          ? { source: "title", name: keywords.title }
          : context.nameHint.name
            ? { source: "property", name: context.nameHint.name }
            : context.nameHint;
      const branchContext = { scope: branch.scope, nameHint };
      return branch.merged
        ? this.synthesize(branch.merged, branchContext)
        : this.synthesizeNode(branch.node, branchContext);
    });

    const discriminator = this.discriminatorFor(merged, members);
    if (discriminator) {
      for (const [value, id] of Object.entries(discriminator.mapping)) {
        this.registry.refineHint(id, { source: "literal", name: toClassName(value) });
      }
    }
    const union = unionOf(members, discriminator);
    return merged.nullable ? nullableOf(union) : union;
  }

  /** Single literal of `propertyName` in a model or its bases */
  private literalOf(id: ModelId, propertyName: string): string | undefined {
    const fields = this.registry.allFields(id).filter((field) => field.originalName === propertyName);
    const field = fields[fields.length - 1];
    if (field?.type.kind !== "scalar") {
      return undefined;
    }
    const [literal] = field.type.literals ?? [];
    return field.type.literals?.length === 1 && literal !== undefined ? literalText(literal) : undefined;
  }

  private mappingRef(ref: string, origin: SchemaNode): string {
    if (ref.includes("#") || ref.includes("/")) {
      return ref;
    }
    for (const collection of this.config.definitionCollections) {
      const pointer = appendPointer(collection, ref);
      if (this.documents.rawAt(origin.documentId, pointer) !== undefined) {
        return pointer;
      }
    }
    return `#/components/schemas/${escapeSegment(ref)}`;
  }

  private discriminatorFor(
    merged: MergedUnion,
    members: CanonicalType[],
  ): DiscriminatorInfo | undefined {
    const modelIds = members.flatMap((member) => (member.kind === "model" ? [member.modelId] : []));
    const declared = merged.discriminator;

    if (declared) {
      const mapping = new Map<string, ModelId>();
      for (const [value, ref] of Object.entries(declared.mapping)) {
        const type = this.guarded(() => {
          const resolved = this.resolver.resolveRef(this.mappingRef(ref, declared.origin), declared.origin);
          return this.synthesizeTarget(
            resolved,
            [],
            this.hintForTarget(resolved.target),
            this.isDefinition(resolved.target),
          );
        }, UNKNOWN);
        if (type.kind === "model") {
          mapping.set(value, type.modelId);
        }
      }
      const mapped = new Set([...mapping.values()].map((id) => this.registry.canonical(id)));
      for (const id of modelIds) {
        if (mapped.has(this.registry.canonical(id))) {
          continue;
        }
        const value = this.literalOf(id, declared.propertyName) ?? this.registry.get(id)?.nameHint.name;
        if (value !== undefined && !mapping.has(value)) {
          mapping.set(value, id);
        }
      }
      return {
        propertyName: declared.propertyName,
        mapping: Object.fromEntries(mapping),
        inferred: false,
      };
    }

    if (!this.config.inferDiscriminators || modelIds.length < 2 || modelIds.length !== members.length) {
      return undefined;
    }
    const [first] = modelIds;
    if (first === undefined) {
      return undefined;
    }
    const candidates = [...new Set(this.registry.allFields(first).map((field) => field.originalName))];
    for (const propertyName of candidates) {
      const mapping = new Map<string, ModelId>();
      const complete = modelIds.every((id) => {
        const value = this.literalOf(id, propertyName);
        if (value === undefined || mapping.has(value)) {
          return false;
        }
        mapping.set(value, id);
        return true;
      });
      if (complete) {
        this.log.debug("Discriminator inferred", { propertyName, path: merged.path });
        return { propertyName, mapping: Object.fromEntries(mapping), inferred: true };
      }
    }
    return undefined;
  }
}
