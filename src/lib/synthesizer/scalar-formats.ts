/**
 * Format table: (scalar kind, format) -> semantic refinement
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import type { ScalarKind } from "../../types/canonical-type.js";
import { isJsonObject } from "../../types/json.js";

const TABLE_PATH = fileURLToPath(
  new URL("../../../data/scalar-formats.json", import.meta.url),
);

let table: Map<string, Map<string, string>> | undefined;

function loadTable(): Map<string, Map<string, string>> {
  const parsed: unknown = JSON.parse(readFileSync(TABLE_PATH, "utf-8"));
  const result = new Map<string, Map<string, string>>();
  if (!isJsonObject(parsed)) {
    return result;
  }
  for (const [kind, formats] of Object.entries(parsed)) {
    const entries = new Map<string, string>();
    if (isJsonObject(formats)) {
      for (const [format, semantic] of Object.entries(formats)) {
        if (typeof semantic === "string") {
          entries.set(format, semantic);
        }
      }
    }
    result.set(kind, entries);
  }
  return result;
}

function formatTable(): Map<string, Map<string, string>> {
  if (!table) {
    table = loadTable();
  }
  return table;
}

export type FormatLookup =
  | { known: true; semantic?: string }
  | { known: false };

/**
 * Semantic type for `format` on a scalar of `kind`. A semantic equal to the
 * kind itself (uri-reference on string) means the plain scalar.
 */
export function lookupFormat(kind: ScalarKind, format: string): FormatLookup {
  const semantic = formatTable().get(kind)?.get(format);
  if (semantic === undefined) {
    return { known: false };
  }
  return semantic === kind ? { known: true } : { known: true, semantic };
}

export function knownFormats(kind: ScalarKind): string[] {
  return [...(formatTable().get(kind)?.keys() ?? [])];
}
