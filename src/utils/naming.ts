/**
 * Identifier helpers for model, field and enum member names
 */

function words(raw: string): string[] {
  return raw
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0);
}

/**
 * "pet_store" -> "PetStore", "user-name" -> "UserName", "HTTPStatus" stays.
 * Returns "" when the input carries no identifier characters.
 */
export function toClassName(raw: string): string {
  const parts = raw.split(/[^A-Za-z0-9]+/).filter((part) => part.length > 0);
  const name = parts
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
  if (name === "") {
    return "";
  }
  return /^\d/.test(name) ? `Model${name}` : name;
}

export function toSnakeCase(raw: string): string {
  return words(raw)
    .map((word) => word.toLowerCase())
    .join("_");
}

export function toCamelCase(raw: string): string {
  const parts = words(raw);
  return parts
    .map((word, index) =>
      index === 0
        ? word.toLowerCase()
        : word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
    )
    .join("");
}

/**
 * Replace characters that cannot appear in an identifier; a leading digit
 * gets the `field_` prefix, an empty name becomes "field".
 */
export function toIdentifier(raw: string): string {
  const cleaned = raw.replace(/[^A-Za-z0-9_$]/g, "_");
  if (cleaned === "" || /^_+$/.test(cleaned)) {
    return "field";
  }
  return /^\d/.test(cleaned) ? `field_${cleaned}` : cleaned;
}

/**
 * Enum member name for a literal value: "in-progress" -> "IN_PROGRESS",
 * 42 -> "VALUE_42", -1.5 -> "VALUE_MINUS_1_5", 1e21 -> "VALUE_1E21", null -> "NULL"
 */
export function toEnumMemberName(value: unknown): string {
  if (value === null) {
    return "NULL";
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  if (typeof value === "number") {
    const digits = String(Math.abs(value))
      .toUpperCase()
      .replace("E+", "E")
      .replace("E-", "E_MINUS_")
      .replace(/\./g, "_");
    return `VALUE_${value < 0 ? "MINUS_" : ""}${digits}`;
  }
  if (typeof value === "string") {
    const snake = toSnakeCase(value).toUpperCase();
    if (snake === "") {
      return "EMPTY";
    }
    return /^\d/.test(snake) ? `VALUE_${snake}` : snake;
  }
  return "VALUE";
}

/**
 * Suffix generator used for every collision: base, base1, base2, ...
 */
export function uniqueName(
  base: string,
  taken: ReadonlySet<string>,
  separator = "",
): string {
  if (!taken.has(base)) {
    return base;
  }
  let count = 1;
  while (taken.has(`${base}${separator}${count}`)) {
    count++;
  }
  return `${base}${separator}${count}`;
}

/** "schemas/pet-store.yaml" -> "pet-store" */
export function documentStem(documentId: string): string {
  const withoutFragment = documentId.split("#")[0] ?? documentId;
  const trimmed = withoutFragment.replace(/\/+$/, "");
  const base = trimmed.slice(trimmed.lastIndexOf("/") + 1);
  const dot = base.indexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}
