/**
 * JSON Pointer helpers. Paths are kept in fragment form: "#", "#/a/b~1c/0".
 */

import { isJsonObject, type JsonValue } from "../types/json.js";

export const ROOT_POINTER = "#";

export function escapeSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

export function unescapeSegment(segment: string): string {
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

export function appendPointer(
  pointer: string,
  ...segments: Array<string | number>
): string {
  return segments.reduce<string>(
    (acc, segment) => `${acc}/${escapeSegment(String(segment))}`,
    pointer,
  );
}

/**
 * Split "#/a/b", "/a/b" or "" into unescaped segments
 */
export function splitPointer(pointer: string): string[] {
  const body = pointer.startsWith("#") ? pointer.slice(1) : pointer;
  if (body === "") {
    return [];
  }
  return body
    .slice(1)
    .split("/")
    .map((segment) => unescapeSegment(segment));
}

export function joinPointer(segments: string[]): string {
  return appendPointer(ROOT_POINTER, ...segments);
}

/** True when `prefix` is `pointer` or one of its ancestors */
export function isPointerPrefix(prefix: string, pointer: string): boolean {
  return pointer === prefix || pointer.startsWith(`${prefix}/`);
}

export function lastSegment(pointer: string): string | undefined {
  const segments = splitPointer(pointer);
  return segments[segments.length - 1];
}

export function parentPointer(pointer: string): string {
  const segments = splitPointer(pointer);
  return joinPointer(segments.slice(0, -1));
}

/**
 * Walk a raw JSON tree; undefined when any segment is missing
 */
export function valueAtPointer(
  root: JsonValue,
  pointer: string,
): JsonValue | undefined {
  let current: JsonValue | undefined = root;
  for (const segment of splitPointer(pointer)) {
    if (Array.isArray(current)) {
      if (!/^(0|[1-9]\d*)$/.test(segment)) {
        return undefined;
      }
      current = current[Number(segment)];
    } else if (isJsonObject(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) {
        return undefined;
      }
      current = current[segment];
    } else {
      return undefined;
    }
    if (current === undefined) {
      return undefined;
    }
  }
  return current;
}
