/**
 * Emitter module types
 */

import type { JsonValue } from "../../types/json.js";
import type { EmissionPlan, ModelKind } from "../../types/model.js";

/**
 * A back end renders a finalized plan into its own output
 */
export interface EmissionBackend<T> {
  readonly name: string;
  render(plan: EmissionPlan): T;
}

export interface FieldRecord {
  name: string;
  originalName: string;
  type: string;
  required: boolean;
  default?: JsonValue;
  const?: JsonValue;
  description?: string;
  deprecated?: boolean;
}

export interface EnumMemberRecord {
  name: string;
  value: JsonValue;
}

/** One model in the JSON intermediate representation */
export interface ModelRecord {
  name: string;
  kind: ModelKind;
  bases: string[];
  fields: FieldRecord[];
  members?: EnumMemberRecord[];
  aliasOf?: string;
  additionalProperties?: string;
  closed: boolean;
  description?: string;
  deprecated?: boolean;
  alsoKnownAs: string[];
  /** Names of later-declared models this one references */
  forwardReferences: string[];
  extensions: Record<string, JsonValue>;
  source: string;
}

export interface ModelGraphDocument {
  models: ModelRecord[];
  roots: Record<string, string>;
}
