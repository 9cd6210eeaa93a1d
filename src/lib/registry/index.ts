/**
 * Model registry - owns model definitions for one pass: structural
 * deduplication, naming, validation and emission order
 */

import { createHash } from "crypto";
import {
  mapModelRefs,
  referencedModels,
  typeToJson,
  type CanonicalType,
  type ModelId,
} from "../../types/canonical-type.js";
import type { EngineConfig } from "../../types/config.js";
import { stableStringify, type JsonObject } from "../../types/json.js";
import {
  NAME_SOURCE_PRIORITY,
  type DependencyEdge,
  type DependencyGraph,
  type DependencyKind,
  type ModelCandidate,
  type ModelDefinition,
  type NameHint,
} from "../../types/model.js";
import {
  CyclicInheritanceError,
  DanglingModelReferenceError,
  ErrorCode,
  ModelSmithError,
} from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import {
  assignEnumMemberNames,
  assignFieldNames,
  assignModelNames,
} from "./naming.js";
import { emissionOrder, forwardReferences } from "./ordering.js";

export * from "./naming.js";
export * from "./ordering.js";

export type RegistryConfig = Pick<
  EngineConfig,
  | "deduplicate"
  | "nameScope"
  | "fieldNameStyle"
  | "reservedNames"
  | "reservedFieldNames"
  | "unnamedModelPrefix"
>;

const SELF = "$self";

export interface FinalizedRegistry {
  order: ModelId[];
  models: ReadonlyMap<ModelId, ModelDefinition>;
  graph: DependencyGraph;
  forwardReferences: ReadonlyMap<ModelId, ModelId[]>;
  /** Whole-run violations: dangling model ids, inheritance cycles */
  errors: ModelSmithError[];
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    children.forEach((child) => deepFreeze(child));
  }
  return value;
}

function strongerHint(current: NameHint, incoming: NameHint): boolean {
  if (!incoming.name) {
    return false;
  }
  if (!current.name) {
    return true;
  }
  return (
    NAME_SOURCE_PRIORITY.indexOf(incoming.source) <
    NAME_SOURCE_PRIORITY.indexOf(current.source)
  );
}

export class ModelRegistry {
  private models = new Map<ModelId, ModelDefinition>();
  private reservations = new Map<ModelId, NameHint>();
  private aliases = new Map<ModelId, ModelId>();
  private byFingerprint = new Map<string, ModelId>();
  private hashes = new Map<string, string>();
  private nextId = 1;
  private named = false;
  private finalized?: FinalizedRegistry;

  constructor(
    private readonly config: RegistryConfig,
    private readonly log: Logger = defaultLogger,
  ) {}

  /**
   * Placeholder id for a model whose definition is still being built
   */
  reserve(hint: NameHint): ModelId {
    this.assertOpen();
    const id = `m${this.nextId++}`;
    this.reservations.set(id, hint);
    this.log.debug("Model id reserved", { id, hint: hint.name });
    return id;
  }

  /**
   * Register a model shape. With deduplication on, a shape identical to an
   * existing model returns that model's id (and `reservedId` aliases it).
   */
  registerCandidate(candidate: ModelCandidate, reservedId?: ModelId): ModelId {
    this.assertOpen();
    if (reservedId !== undefined && this.models.has(reservedId)) {
      throw new ModelSmithError(ErrorCode.GENERAL_ERROR, `Model ${reservedId} is already defined`, {
        modelId: reservedId,
      });
    }
    const id = reservedId ?? `m${this.nextId++}`;
    const fingerprint = this.fingerprint(candidate, id);

    const existing = this.config.deduplicate ? this.byFingerprint.get(fingerprint) : undefined;
    const target = existing ? this.models.get(existing) : undefined;
    if (existing && target) {
      if (reservedId !== undefined) {
        this.aliases.set(reservedId, existing);
        this.reservations.delete(reservedId);
      }
      if (candidate.nameHint.name && !target.alsoKnownAs.includes(candidate.nameHint.name)) {
        target.alsoKnownAs.push(candidate.nameHint.name);
      }
      if (strongerHint(target.nameHint, candidate.nameHint)) {
        target.nameHint = candidate.nameHint;
      }
      this.log.debug("Model deduplicated", { into: existing, hint: candidate.nameHint.name });
      return existing;
    }

    const nameHint =
      reservedId !== undefined && !candidate.nameHint.name
        ? this.reservations.get(reservedId) ?? candidate.nameHint
        : candidate.nameHint;
    this.reservations.delete(id);
    this.models.set(id, {
      ...candidate,
      nameHint,
      id,
      name: "",
      fingerprint,
      alsoKnownAs: [],
      registrationIndex: this.models.size,
    });
    if (!this.byFingerprint.has(fingerprint)) {
      this.byFingerprint.set(fingerprint, id);
    }
    return id;
  }

  /** Point a reserved id at another model */
  alias(reservedId: ModelId, target: ModelId): void {
    this.assertOpen();
    if (this.canonical(target) === reservedId) {
      return;
    }
    this.aliases.set(reservedId, target);
    this.reservations.delete(reservedId);
  }

  /** Upgrade a model's name hint when `hint` comes from a stronger source */
  refineHint(id: ModelId, hint: NameHint): void {
    const model = this.models.get(this.canonical(id));
    if (model && strongerHint(model.nameHint, hint)) {
      model.nameHint = hint;
    }
  }

  canonical(id: ModelId): ModelId {
    let current = id;
    const seen = new Set<ModelId>();
    let next = this.aliases.get(current);
    while (next !== undefined && !seen.has(next)) {
      seen.add(current);
      current = next;
      next = this.aliases.get(current);
    }
    return current;
  }

  isDefined(id: ModelId): boolean {
    return this.models.has(this.canonical(id));
  }

  get(id: ModelId): ModelDefinition | undefined {
    return this.models.get(this.canonical(id));
  }

  /** Definitions in registration order */
  definitions(): ModelDefinition[] {
    return [...this.models.values()];
  }

  size(): number {
    return this.models.size;
  }

  /**
   * Fields of a model and, first, of its bases
   */
  allFields(id: ModelId): ModelDefinition["fields"] {
    const visited = new Set<ModelId>();
    const collect = (current: ModelId): ModelDefinition["fields"] => {
      const model = this.get(current);
      if (!model || visited.has(model.id)) {
        return [];
      }
      visited.add(model.id);
      return [...model.bases.flatMap(collect), ...model.fields];
    };
    return collect(id);
  }

  /**
   * Give every model, field and enum member its final name. Runs once.
   */
  assignNames(): void {
    if (this.named) {
      return;
    }
    const names = assignModelNames(this.definitions(), this.config);
    for (const model of this.models.values()) {
      model.name = names.get(model.id) ?? model.id;
      const fieldNames = assignFieldNames(model.fields, this.config);
      model.fields = model.fields.map((field, index) => ({
        ...field,
        name: fieldNames[index] ?? field.name,
      }));
      if (model.enumMembers) {
        const memberNames = assignEnumMemberNames(model.enumMembers);
        model.enumMembers = model.enumMembers.map((member, index) => ({
          ...member,
          name: memberNames[index] ?? member.name,
        }));
      }
    }
    this.named = true;
  }

  /**
   * Dangling model references and inheritance cycles
   */
  validate(): ModelSmithError[] {
    const errors: ModelSmithError[] = [];

    const referencedBy = new Map<ModelId, string[]>();
    for (const model of this.models.values()) {
      for (const id of this.referencesOf(model).map((edge) => edge.to)) {
        if (!this.isDefined(id)) {
          const users = referencedBy.get(id) ?? [];
          if (!users.includes(model.name || model.id)) {
            users.push(model.name || model.id);
          }
          referencedBy.set(id, users);
        }
      }
    }
    for (const [id, users] of referencedBy) {
      errors.push(new DanglingModelReferenceError(id, users));
    }

    const state = new Map<ModelId, "visiting" | "done">();
    const path: ModelId[] = [];
    const reported = new Set<string>();
    const visit = (id: ModelId): void => {
      state.set(id, "visiting");
      path.push(id);
      for (const base of this.get(id)?.bases ?? []) {
        const next = this.canonical(base);
        if (state.get(next) === "visiting") {
          const cycle = [...path.slice(path.indexOf(next)), next];
          const key = [...new Set(cycle)].sort().join(",");
          if (!reported.has(key)) {
            reported.add(key);
            errors.push(
              new CyclicInheritanceError(cycle.map((member) => this.get(member)?.name || member)),
            );
          }
        } else if (state.get(next) === undefined && this.models.has(next)) {
          visit(next);
        }
      }
      path.pop();
      state.set(id, "done");
    };
    for (const id of this.models.keys()) {
      if (state.get(id) === undefined) {
        visit(id);
      }
    }
    return errors;
  }

  dependencyGraph(): DependencyGraph {
    const edges: DependencyEdge[] = [];
    const seen = new Set<string>();
    for (const model of this.models.values()) {
      for (const edge of this.referencesOf(model)) {
        const key = `${edge.from}|${edge.to}|${edge.kind}`;
        if (edge.from === edge.to || seen.has(key) || !this.models.has(edge.to)) {
          continue;
        }
        seen.add(key);
        edges.push(edge);
      }
    }
    return { nodes: [...this.models.keys()], edges };
  }

  orderForEmission(graph: DependencyGraph = this.dependencyGraph()): ModelId[] {
    return emissionOrder(graph, (id) => this.models.get(id)?.registrationIndex ?? 0);
  }

  /**
   * Rewrite dedup aliases, name, validate, order and freeze. Idempotent.
   */
  finalize(): FinalizedRegistry {
    if (this.finalized) {
      return this.finalized;
    }
    const rewrite = (type: CanonicalType): CanonicalType =>
      mapModelRefs(type, (id) => this.canonical(id));
    for (const model of this.models.values()) {
      model.fields = model.fields.map((field) => ({ ...field, type: rewrite(field.type) }));
      model.bases = [...new Set(model.bases.map((id) => this.canonical(id)))];
      if (model.aliasOf) model.aliasOf = rewrite(model.aliasOf);
      if (model.additionalProperties) {
        model.additionalProperties = rewrite(model.additionalProperties);
      }
    }
    this.assignNames();

    const errors = this.validate();
    const graph = this.dependencyGraph();
    const order = this.orderForEmission(graph);
    const forward = forwardReferences(order, graph);
    for (const model of this.models.values()) {
      deepFreeze(model);
    }
    this.log.info("Model registry finalized", {
      models: this.models.size,
      aliases: this.aliases.size,
      errors: errors.length,
    });

    this.finalized = {
      order,
      models: this.models,
      graph,
      forwardReferences: forward,
      errors,
    };
    return this.finalized;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new ModelSmithError(ErrorCode.GENERAL_ERROR, "Model registry is finalized");
    }
  }

  private referencesOf(model: ModelDefinition): DependencyEdge[] {
    const edges: DependencyEdge[] = [];
    const add = (ids: ModelId[], kind: DependencyKind): void => {
      for (const id of ids) {
        edges.push({ from: model.id, to: this.canonical(id), kind });
      }
    };
    add(model.bases, "base");
    for (const field of model.fields) {
      add(referencedModels(field.type), "field");
    }
    if (model.additionalProperties) {
      add(referencedModels(model.additionalProperties), "field");
    }
    if (model.aliasOf) {
      add(referencedModels(model.aliasOf), "alias");
    }
    return edges;
  }

  /**
   * sha256 over the shape: kind, fields by original name, bases, enum values,
   * alias target, extra properties. Names and descriptions stay out.
   */
  private fingerprint(candidate: ModelCandidate, selfId: ModelId): string {
    const render = (id: ModelId): string => {
      const canonical = this.canonical(id);
      return canonical === selfId ? SELF : canonical;
    };
    const shape: JsonObject = {
      kind: candidate.kind,
      fields: [...candidate.fields]
        .sort((a, b) => (a.originalName < b.originalName ? -1 : a.originalName > b.originalName ? 1 : 0))
        .map((field) => ({
          n: field.originalName,
          t: typeToJson(field.type, render),
          r: field.required,
        })),
      bases: candidate.bases.map(render),
      closed: candidate.closed,
    };
    if (candidate.enumBase !== undefined) shape.enumBase = candidate.enumBase;
    if (candidate.enumMembers) shape.values = candidate.enumMembers.map((member) => member.value);
    if (candidate.aliasOf) shape.aliasOf = typeToJson(candidate.aliasOf, render);
    if (candidate.additionalProperties) {
      shape.additional = typeToJson(candidate.additionalProperties, render);
    }

    const serialized = stableStringify(shape);
    let hash = this.hashes.get(serialized);
    if (hash === undefined) {
      hash = createHash("sha256").update(serialized).digest("hex");
      this.hashes.set(serialized, hash);
    }
    return hash;
  }
}
