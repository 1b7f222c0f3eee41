import type { JsonObject, JsonValue } from "@/types/search";

/**
 * Outcome of a lookup that could not be resolved. Distinct from `""` and from JSON `null`.
 */
export const ABSENT: unique symbol = Symbol("absent");
export type Absent = typeof ABSENT;

export function isAbsent(value: JsonValue | Absent): value is Absent {
  return value === ABSENT;
}

export function isJsonObject(value: JsonValue | Absent | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function splitPath(path: string): string[] {
  const trimmed = path.trim();
  return trimmed.length === 0 ? [] : trimmed.split(".");
}

/**
 * Walks `path` through `document` one object key per segment.
 *
 * Segments never index into arrays; an array is only reachable as the value a
 * path ends on. Missing keys, non-object intermediates and `null` all resolve
 * to {@link ABSENT}.
 */
export function extract(document: JsonValue, path: string): JsonValue | Absent {
  let current: JsonValue = document;

  for (const segment of splitPath(path)) {
    if (!isJsonObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return ABSENT;
    }
    current = current[segment];
    if (current === null) {
      return ABSENT;
    }
  }

  return current === null ? ABSENT : current;
}

/**
 * Collapses an extracted value into display text. Only scalars carry text.
 */
export function toText(value: JsonValue | Absent): string {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}
