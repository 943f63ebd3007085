/**
 * Environment readers shared by the configuration loader. Unset, blank and
 * malformed values all resolve to `undefined`.
 */
function readRaw(name: string): string | undefined {
  const raw = process.env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

interface IntegerBounds {
  readonly min?: number;
  readonly max?: number;
}

/**
 * Reads a base-10 integer. Literals outside the safe integer range or the
 * provided bounds are treated as absent.
 */
export function readOptionalInt(name: string, bounds: IntegerBounds = {}): number | undefined {
  const raw = readRaw(name);
  if (raw === undefined || !/^[-+]?\d+$/.test(raw)) {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  if (bounds.min !== undefined && value < bounds.min) {
    return undefined;
  }
  if (bounds.max !== undefined && value > bounds.max) {
    return undefined;
  }
  return value;
}

export function readOptionalString(name: string): string | undefined {
  return readRaw(name);
}

/** Reads an enum-like literal, case-insensitively, against an allow-list. */
export function readOptionalEnum<T extends string>(name: string, allowed: readonly T[]): T | undefined {
  const raw = readRaw(name)?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  return allowed.find((candidate) => candidate.toLowerCase() === raw);
}
