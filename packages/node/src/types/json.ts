/**
 * JSON rendering for domain values.
 *
 * Domain results carry bigint amounts, which JSON.stringify rejects.
 * Responses go through `toJson`, which renders every bigint as a decimal
 * string and drops undefined fields.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function toJson(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case "bigint":
      return value.toString();
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "object":
      break;
    default:
      return null;
  }

  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJson(item));
  }

  const out: Record<string, JsonValue> = {};
  for (const [key, field] of Object.entries(value)) {
    if (field !== undefined) {
      out[key] = toJson(field);
    }
  }
  return out;
}
