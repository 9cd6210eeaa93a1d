/**
 * Canonical type values produced by the synthesizer.
 * Compared structurally through typeKey(); model references compare by id.
 */

import {
  stableStringify,
  type JsonObject,
  type JsonValue,
} from "./json.js";

export type ModelId = string;

export type ScalarKind =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "null"
  | "mixed";

export interface Constraints {
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: number;
  exclusiveMaximum?: number;
  multipleOf?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
  minProperties?: number;
  maxProperties?: number;
}

export interface ScalarType {
  kind: "scalar";
  scalar: ScalarKind;
  format?: string;
  /** Semantic refinement from the format table, e.g. "date-time", "uuid" */
  semantic?: string;
  constraints: Constraints;
  literals?: JsonValue[];
}

export type ContainerKind = "list" | "set" | "tuple" | "map";

export interface ContainerType {
  kind: "container";
  container: ContainerKind;
  elements: CanonicalType[];
  constraints: Constraints;
  keyPattern?: string;
}

export interface DiscriminatorInfo {
  propertyName: string;
  /** discriminant literal (stringified) -> model id */
  mapping: Record<string, ModelId>;
  /** true when derived from branch literals rather than declared */
  inferred: boolean;
}

export interface UnionType {
  kind: "union";
  members: CanonicalType[];
  discriminator?: DiscriminatorInfo;
}

export interface ModelRefType {
  kind: "model";
  modelId: ModelId;
}

export interface UnknownType {
  kind: "unknown";
}

export interface NeverType {
  kind: "never";
}

export type CanonicalType =
  | ScalarType
  | ContainerType
  | UnionType
  | ModelRefType
  | UnknownType
  | NeverType;

export const UNKNOWN: UnknownType = Object.freeze({ kind: "unknown" });
export const NEVER: NeverType = Object.freeze({ kind: "never" });

export function scalarOf(
  scalar: ScalarKind,
  extra: Partial<Omit<ScalarType, "kind" | "scalar">> = {},
): ScalarType {
  return { kind: "scalar", scalar, constraints: {}, ...extra };
}

export function nullType(): ScalarType {
  return scalarOf("null");
}

export function modelRef(modelId: ModelId): ModelRefType {
  return { kind: "model", modelId };
}

export function containerOf(
  container: ContainerKind,
  elements: CanonicalType[],
  constraints: Constraints = {},
): ContainerType {
  return { kind: "container", container, elements, constraints };
}

/**
 * Build a union, flattening nested unions and dropping structural duplicates.
 * A single remaining member is returned as-is; no members is `never`.
 */
export function unionOf(
  members: CanonicalType[],
  discriminator?: DiscriminatorInfo,
): CanonicalType {
  const flat: CanonicalType[] = [];
  const seen = new Set<string>();
  const push = (member: CanonicalType): void => {
    if (member.kind === "union" && !member.discriminator) {
      member.members.forEach(push);
      return;
    }
    const key = typeKey(member);
    if (!seen.has(key)) {
      seen.add(key);
      flat.push(member);
    }
  };
  members.forEach(push);

  const [only] = flat;
  if (flat.length === 1 && only && !discriminator) {
    return only;
  }
  if (flat.length === 0) {
    return NEVER;
  }
  return discriminator
    ? { kind: "union", members: flat, discriminator }
    : { kind: "union", members: flat };
}

export function nullableOf(type: CanonicalType): CanonicalType {
  if (type.kind === "unknown" || isNullable(type)) {
    return type;
  }
  if (type.kind === "union") {
    return { ...type, members: [...type.members, nullType()] };
  }
  return unionOf([type, nullType()]);
}

export function isNullable(type: CanonicalType): boolean {
  if (type.kind === "scalar") {
    return type.scalar === "null";
  }
  if (type.kind === "union") {
    return type.members.some(isNullable);
  }
  return false;
}

/** Model ids referenced anywhere inside a type */
export function referencedModels(type: CanonicalType): ModelId[] {
  switch (type.kind) {
    case "model":
      return [type.modelId];
    case "container":
      return type.elements.flatMap(referencedModels);
    case "union":
      return [
        ...type.members.flatMap(referencedModels),
        ...Object.values(type.discriminator?.mapping ?? {}),
      ];
    case "scalar":
    case "unknown":
    case "never":
      return [];
  }
}

/** Rewrite every model reference inside a type */
export function mapModelRefs(
  type: CanonicalType,
  map: (id: ModelId) => ModelId,
): CanonicalType {
  switch (type.kind) {
    case "model":
      return modelRef(map(type.modelId));
    case "container":
      return {
        ...type,
        elements: type.elements.map((element) => mapModelRefs(element, map)),
      };
    case "union": {
      const members = type.members.map((member) => mapModelRefs(member, map));
      if (!type.discriminator) {
        return { kind: "union", members };
      }
      const mapping = Object.fromEntries(
        Object.entries(type.discriminator.mapping).map(([value, id]): [string, ModelId] => [value, map(id)]),
      );
      return {
        kind: "union",
        members,
        discriminator: { ...type.discriminator, mapping },
      };
    }
    case "scalar":
    case "unknown":
    case "never":
      return type;
  }
}

function constraintsToJson(constraints: Constraints): JsonObject {
  const json: JsonObject = {};
  for (const [key, value] of Object.entries(constraints)) {
    if (value !== undefined) {
      json[key] = value;
    }
  }
  return json;
}

/**
 * JSON form of a type used for structural comparison.
 * `renderId` decides how a model reference appears (self references use a
 * fixed token so recursive shapes fingerprint independently of their id).
 */
export function typeToJson(
  type: CanonicalType,
  renderId: (id: ModelId) => string = (id) => id,
): JsonObject {
  switch (type.kind) {
    case "scalar": {
      const json: JsonObject = {
        k: "scalar",
        s: type.scalar,
        c: constraintsToJson(type.constraints),
      };
      if (type.format !== undefined) json.f = type.format;
      if (type.semantic !== undefined) json.t = type.semantic;
      if (type.literals !== undefined) json.l = type.literals;
      return json;
    }
    case "container": {
      const json: JsonObject = {
        k: "container",
        n: type.container,
        e: type.elements.map((element) => typeToJson(element, renderId)),
        c: constraintsToJson(type.constraints),
      };
      if (type.keyPattern !== undefined) json.p = type.keyPattern;
      return json;
    }
    case "union": {
      const json: JsonObject = {
        k: "union",
        m: type.members.map((member) => typeToJson(member, renderId)),
      };
      if (type.discriminator) {
        const mapping: JsonObject = Object.fromEntries(
          Object.entries(type.discriminator.mapping).map(([value, id]): [string, string] => [value, renderId(id)]),
        );
        json.d = { p: type.discriminator.propertyName, m: mapping };
      }
      return json;
    }
    case "model":
      return { k: "model", id: renderId(type.modelId) };
    case "unknown":
      return { k: "unknown" };
    case "never":
      return { k: "never" };
  }
}

export function typeKey(
  type: CanonicalType,
  renderId?: (id: ModelId) => string,
): string {
  return stableStringify(typeToJson(type, renderId));
}

export function typesEqual(a: CanonicalType, b: CanonicalType): boolean {
  return typeKey(a) === typeKey(b);
}

/**
 * Discriminant literal -> model id for a discriminated union, or an empty map
 * when the type carries no discriminator.
 */
export function discriminatorMapping(
  type: CanonicalType,
): Map<string, ModelId> {
  if (type.kind !== "union" || !type.discriminator) {
    return new Map();
  }
  return new Map(Object.entries(type.discriminator.mapping));
}
