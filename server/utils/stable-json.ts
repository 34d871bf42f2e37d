import { createHash } from "node:crypto";

type JsonPrimitive = string | number | boolean | null;
type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

const isRecord = (value: unknown): value is Record<string, unknown> => {
  if (!value || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const toStableValue = (value: unknown): JsonValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toStableValue);
  if (value instanceof Float64Array || value instanceof Float32Array || value instanceof Int32Array) {
    return Array.from(value, (entry: number) => toStableValue(entry));
  }
  if (isRecord(value)) {
    const out: Record<string, JsonValue> = {};
    for (const key of Object.keys(value).sort()) {
      if (value[key] === undefined) continue;
      out[key] = toStableValue(value[key]);
    }
    return out;
  }
  return String(value);
};

/** JSON with sorted keys; non-finite numbers become null. */
export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(toStableValue(value));
}

export function stableHash(value: unknown): string {
  return createHash("sha256").update(stableJsonStringify(value)).digest("hex");
}
