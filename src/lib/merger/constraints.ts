/**
 * Constraint extraction and intersection for allOf members
 */

import type { Constraints } from "../../types/canonical-type.js";
import type { JsonObject } from "../../types/json.js";
import type { ConstraintConflictPolicy } from "../../types/config.js";

type NumericKeyword = Exclude<keyof Constraints, "pattern" | "uniqueItems">;

const LOWER_BOUNDS: NumericKeyword[] = [
  "minimum",
  "exclusiveMinimum",
  "minLength",
  "minItems",
  "minProperties",
];

const UPPER_BOUNDS: NumericKeyword[] = [
  "maximum",
  "exclusiveMaximum",
  "maxLength",
  "maxItems",
  "maxProperties",
];

export interface ConstraintConflict {
  keyword: string;
  kept: string | number;
  dropped: string | number;
}

export type ConflictReporter = (conflict: ConstraintConflict) => void;

function numberAt(keywords: JsonObject, keyword: string): number | undefined {
  const value = keywords[keyword];
  return typeof value === "number" ? value : undefined;
}

/**
 * Constraint keywords of one fragment. Draft-04 boolean
 * `exclusiveMinimum`/`exclusiveMaximum` move the bound into the exclusive slot.
 */
export function readConstraints(keywords: JsonObject): Constraints {
  const constraints: Constraints = {};
  for (const keyword of [...LOWER_BOUNDS, ...UPPER_BOUNDS, "multipleOf" as const]) {
    const value = numberAt(keywords, keyword);
    if (value !== undefined) {
      constraints[keyword] = value;
    }
  }
  if (keywords.exclusiveMinimum === true && constraints.minimum !== undefined) {
    constraints.exclusiveMinimum = constraints.minimum;
    delete constraints.minimum;
  }
  if (keywords.exclusiveMaximum === true && constraints.maximum !== undefined) {
    constraints.exclusiveMaximum = constraints.maximum;
    delete constraints.maximum;
  }
  if (typeof keywords.pattern === "string") {
    constraints.pattern = keywords.pattern;
  }
  if (typeof keywords.uniqueItems === "boolean") {
    constraints.uniqueItems = keywords.uniqueItems;
  }
  return constraints;
}

/**
 * Resolve two differing values of a keyword that has no ordering
 */
export function pickConflicting<T extends string | number>(
  keyword: string,
  current: T,
  incoming: T,
  policy: ConstraintConflictPolicy,
  report: ConflictReporter,
): T {
  if (current === incoming) {
    return current;
  }
  const kept = policy === "first-wins" ? current : incoming;
  const dropped = policy === "first-wins" ? incoming : current;
  report({ keyword, kept, dropped });
  return kept;
}

/**
 * Intersect `incoming` into `current`: lower bounds take the max, upper
 * bounds the min, uniqueItems ORs, pattern and multipleOf follow `policy`
 */
export function intersectConstraints(
  current: Constraints,
  incoming: Constraints,
  policy: ConstraintConflictPolicy,
  report: ConflictReporter,
): Constraints {
  const merged: Constraints = { ...current };

  for (const keyword of LOWER_BOUNDS) {
    const value = incoming[keyword];
    if (value !== undefined) {
      const existing = merged[keyword];
      merged[keyword] = existing === undefined ? value : Math.max(existing, value);
    }
  }
  for (const keyword of UPPER_BOUNDS) {
    const value = incoming[keyword];
    if (value !== undefined) {
      const existing = merged[keyword];
      merged[keyword] = existing === undefined ? value : Math.min(existing, value);
    }
  }

  if (incoming.multipleOf !== undefined) {
    merged.multipleOf =
      merged.multipleOf === undefined
        ? incoming.multipleOf
        : pickConflicting("multipleOf", merged.multipleOf, incoming.multipleOf, policy, report);
  }
  if (incoming.pattern !== undefined) {
    merged.pattern =
      merged.pattern === undefined
        ? incoming.pattern
        : pickConflicting("pattern", merged.pattern, incoming.pattern, policy, report);
  }
  if (incoming.uniqueItems !== undefined) {
    merged.uniqueItems = (merged.uniqueItems ?? false) || incoming.uniqueItems;
  }

  return merged;
}

/**
 * Lower bounds above their upper bound; such a schema accepts nothing
 */
export function unsatisfiableBounds(constraints: Constraints): string[] {
  const pairs: Array<[NumericKeyword, NumericKeyword]> = [
    ["minimum", "maximum"],
    ["minLength", "maxLength"],
    ["minItems", "maxItems"],
    ["minProperties", "maxProperties"],
  ];
  const problems: string[] = [];
  for (const [low, high] of pairs) {
    const min = constraints[low];
    const max = constraints[high];
    if (min !== undefined && max !== undefined && min > max) {
      problems.push(`${low} ${min} > ${high} ${max}`);
    }
  }
  return problems;
}
