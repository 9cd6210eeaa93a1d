/**
 * Reference string parsing and base-URI resolution
 */

import path from "path";

const SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

export const SUPPORTED_SCHEMES = ["http", "https", "file", "urn", "tag"];

export function isAbsoluteUri(value: string): boolean {
  return SCHEME.test(value);
}

export function uriScheme(value: string): string | undefined {
  const match = SCHEME.exec(value);
  return match ? match[0].slice(0, -1).toLowerCase() : undefined;
}

export function stripFragment(uri: string): string {
  const hash = uri.indexOf("#");
  return hash === -1 ? uri : uri.slice(0, hash);
}

export interface SplitRef {
  /** Document part before "#", may be empty */
  document: string;
  /** Fragment after "#"; undefined when there is no "#" */
  fragment: string | undefined;
}

export function splitRef(ref: string): SplitRef {
  const hash = ref.indexOf("#");
  if (hash === -1) {
    return { document: ref, fragment: undefined };
  }
  return { document: ref.slice(0, hash), fragment: ref.slice(hash + 1) };
}

/**
 * Resolve `ref` (without fragment) against `base`.
 * URL bases use WHATWG resolution; plain ids resolve as POSIX paths
 * relative to the base document's directory.
 */
export function resolveUri(base: string, ref: string): string {
  const target = stripFragment(ref);
  if (target === "") {
    return stripFragment(base);
  }
  if (isAbsoluteUri(target)) {
    return target;
  }
  const baseDocument = stripFragment(base);
  if (isAbsoluteUri(baseDocument)) {
    try {
      return stripFragment(new URL(target, baseDocument).href);
    } catch {
      // non-hierarchical bases such as urn: cannot anchor relative refs
      return target;
    }
  }
  if (target.startsWith("/")) {
    return path.posix.normalize(target);
  }
  return path.posix.normalize(
    path.posix.join(path.posix.dirname(baseDocument), target),
  );
}
