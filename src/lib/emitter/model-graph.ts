/**
 * Reference back end: renders the plan as a JSON model graph
 */

import type { CanonicalType, ModelId } from "../../types/canonical-type.js";
import type { EmissionPlan, ModelDefinition } from "../../types/model.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import type {
  EmissionBackend,
  FieldRecord,
  ModelGraphDocument,
  ModelRecord,
} from "./types.js";

/**
 * Dialect-neutral type text: list[T], set[T], tuple[A, B],
 * map[string, T], A | B, literal["a", 1], unknown, never
 */
export function renderTypeExpression(
  type: CanonicalType,
  nameOf: (id: ModelId) => string,
): string {
  const render = (inner: CanonicalType): string => renderTypeExpression(inner, nameOf);
  switch (type.kind) {
    case "scalar":
      if (type.literals) {
        return `literal[${type.literals.map((value) => JSON.stringify(value)).join(", ")}]`;
      }
      return type.semantic ?? type.scalar;
    case "container": {
      const elements = type.elements.map(render);
      if (type.container === "map") {
        return `map[string, ${elements.join(" | ")}]`;
      }
      return `${type.container}[${elements.join(", ")}]`;
    }
    case "union":
      return type.members.map(render).join(" | ");
    case "model":
      return nameOf(type.modelId);
    case "unknown":
    case "never":
      return type.kind;
  }
}

function modelNames(plan: EmissionPlan): (id: ModelId) => string {
  return (id) => plan.models.get(id)?.name ?? id;
}

function fieldRecord(
  field: ModelDefinition["fields"][number],
  nameOf: (id: ModelId) => string,
): FieldRecord {
  return {
    name: field.name,
    originalName: field.originalName,
    type: renderTypeExpression(field.type, nameOf),
    required: field.required,
    ...(field.default !== undefined ? { default: field.default } : {}),
    ...(field.metadata.const !== undefined ? { const: field.metadata.const } : {}),
    ...(field.metadata.description !== undefined
      ? { description: field.metadata.description }
      : {}),
    ...(field.metadata.deprecated !== undefined
      ? { deprecated: field.metadata.deprecated }
      : {}),
  };
}

export function toModelRecord(model: ModelDefinition, plan: EmissionPlan): ModelRecord {
  const nameOf = modelNames(plan);
  return {
    name: model.name,
    kind: model.kind,
    bases: model.bases.map(nameOf),
    fields: model.fields.map((field) => fieldRecord(field, nameOf)),
    ...(model.enumMembers
      ? {
          members: model.enumMembers.map((member) => ({
            name: member.name,
            value: member.value,
          })),
        }
      : {}),
    ...(model.aliasOf ? { aliasOf: renderTypeExpression(model.aliasOf, nameOf) } : {}),
    ...(model.additionalProperties
      ? { additionalProperties: renderTypeExpression(model.additionalProperties, nameOf) }
      : {}),
    closed: model.closed,
    ...(model.metadata.description !== undefined
      ? { description: model.metadata.description }
      : {}),
    ...(model.metadata.deprecated !== undefined
      ? { deprecated: model.metadata.deprecated }
      : {}),
    alsoKnownAs: [...model.alsoKnownAs],
    forwardReferences: (plan.forwardReferences.get(model.id) ?? []).map(nameOf),
    extensions: { ...model.metadata.extensions },
    source: `${model.provenance.documentId}${model.provenance.path}`,
  };
}

/** Model records in declaration order */
export function* renderModelRecords(plan: EmissionPlan): Generator<ModelRecord> {
  for (const id of plan.order) {
    const model = plan.models.get(id);
    if (model) {
      yield toModelRecord(model, plan);
    }
  }
}

export class ModelGraphBackend implements EmissionBackend<ModelGraphDocument> {
  readonly name = "model-graph";

  constructor(private readonly log: Logger = defaultLogger) {}

  render(plan: EmissionPlan): ModelGraphDocument {
    const nameOf = modelNames(plan);
    const models = [...renderModelRecords(plan)];
    const roots: Record<string, string> = {};
    for (const [documentId, type] of plan.roots) {
      roots[documentId] = renderTypeExpression(type, nameOf);
    }
    this.log.debug("Model graph rendered", { models: models.length });
    return { models, roots };
  }
}
