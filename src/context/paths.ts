/** Error raised when a context path cannot be normalised. */
export class ContextPathError extends Error {
  public readonly code = "E-CONTEXT-PATH";
  public readonly details: { path: string };

  constructor(path: string, message: string) {
    super(message);
    this.name = "ContextPathError";
    this.details = { path };
  }
}

/**
 * Splits a slash-delimited path into its segments, dropping empty segments so
 * `"/repo//files/"` and `"repo/files"` address the same entry.
 */
export function splitContextPath(path: string): string[] {
  const segments: string[] = [];
  for (const raw of path.split("/")) {
    const segment = raw.trim();
    if (segment.length === 0) {
      continue;
    }
    if (segment === "*") {
      throw new ContextPathError(path, `context path "${path}" uses the reserved segment "*"`);
    }
    segments.push(segment);
  }
  return segments;
}

/** Canonical form of an entry path. Empty paths are rejected. */
export function normaliseContextPath(path: string): string {
  const segments = splitContextPath(path);
  if (segments.length === 0) {
    throw new ContextPathError(path, "context path must contain at least one segment");
  }
  return segments.join("/");
}

/** Canonical form of a prefix. The empty prefix addresses the whole store. */
export function normaliseContextPrefix(prefix: string): string {
  return splitContextPath(prefix).join("/");
}

/**
 * Segment-wise prefix test on canonical paths: `repo` contains `repo` and
 * `repo/files` but not `repository`.
 */
export function isWithinPrefix(path: string, prefix: string): boolean {
  if (prefix.length === 0) {
    return true;
  }
  return path === prefix || path.startsWith(`${prefix}/`);
}

/** Joins path fragments into a canonical path. */
export function joinContextPath(...parts: string[]): string {
  return normaliseContextPath(parts.join("/"));
}
