/**
 * Display names for models, fields and enum members
 */

import type { FieldNameStyle, NameScope } from "../../types/config.js";
import {
  NAME_SOURCE_PRIORITY,
  type EnumMember,
  type FieldDefinition,
  type ModelDefinition,
} from "../../types/model.js";
import type { ModelId } from "../../types/canonical-type.js";
import {
  documentStem,
  toCamelCase,
  toClassName,
  toIdentifier,
  toSnakeCase,
  uniqueName,
} from "../../utils/naming.js";

export interface NamingOptions {
  nameScope: NameScope;
  fieldNameStyle: FieldNameStyle;
  reservedNames: string[];
  reservedFieldNames: string[];
  unnamedModelPrefix: string;
}

/** Output scope a model name must be unique within */
export function outputScope(model: ModelDefinition, nameScope: NameScope): string {
  return nameScope === "global" ? "" : documentStem(model.scope);
}

/**
 * Names by tier (title, definition, literal, property, document,
 * synthetic) and then registration order; collisions get 1, 2, ...
 */
export function assignModelNames(
  models: readonly ModelDefinition[],
  options: NamingOptions,
): Map<ModelId, string> {
  const tier = (model: ModelDefinition): number => {
    const source = model.nameHint.name ? model.nameHint.source : "synthetic";
    return NAME_SOURCE_PRIORITY.indexOf(source);
  };
  const ordered = [...models].sort(
    (a, b) => tier(a) - tier(b) || a.registrationIndex - b.registrationIndex,
  );

  const takenByScope = new Map<string, Set<string>>();
  const names = new Map<ModelId, string>();
  let synthetic = 0;
  for (const model of ordered) {
    const scope = outputScope(model, options.nameScope);
    let taken = takenByScope.get(scope);
    if (!taken) {
      taken = new Set(options.reservedNames);
      takenByScope.set(scope, taken);
    }

    let base = model.nameHint.name ? toClassName(model.nameHint.name) : "";
    if (base === "") {
      synthetic++;
      base = `${options.unnamedModelPrefix}${synthetic}`;
    }
    const name = uniqueName(base, taken);
    taken.add(name);
    names.set(model.id, name);
  }
  return names;
}

export function styleFieldName(originalName: string, style: FieldNameStyle): string {
  const styled =
    style === "snake"
      ? toSnakeCase(originalName)
      : style === "camel"
        ? toCamelCase(originalName)
        : originalName;
  return toIdentifier(styled === "" ? originalName : styled);
}

/**
 * Field identifiers unique within one model; reserved words get a
 * trailing underscore, repeats become name_1, name_2
 */
export function assignFieldNames(
  fields: readonly FieldDefinition[],
  options: NamingOptions,
): string[] {
  const taken = new Set<string>();
  return fields.map((field) => {
    let base = styleFieldName(field.originalName, options.fieldNameStyle);
    if (options.reservedFieldNames.includes(base)) {
      base = `${base}_`;
    }
    const name = uniqueName(base, taken, "_");
    taken.add(name);
    return name;
  });
}

export function assignEnumMemberNames(members: readonly EnumMember[]): string[] {
  const taken = new Set<string>();
  return members.map((member) => {
    const name = uniqueName(member.name, taken, "_");
    taken.add(name);
    return name;
  });
}
